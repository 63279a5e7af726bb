/**
 * CLI Tests: tree rendering and error formatting
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import {
  explainError,
  FileParseError,
  formatError,
  formatExpr,
  formatReport,
  formatTree,
  MissingPathError,
  parse,
  ParseError,
} from '../../src/index.js';
import { bin, ident, int, str, un } from '../helpers/ast.js';

function parseFailure(source: string): ParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected the parse to fail');
}

describe('formatExpr', () => {
  it('renders operators as S-expressions', () => {
    expect(
      formatExpr(bin('Attr', ident('a'), bin('Attr', bin('Index', ident('b'), int('1')), ident('c'))))
    ).toBe('(Attr a (Attr (Index b 1) c))');
    expect(formatExpr(un('Minus', ident('x')))).toBe('(Minus x)');
  });

  it('keeps literal spelling', () => {
    expect(formatExpr(int('0x1F', 31n))).toBe('0x1F');
    expect(formatExpr(str('it', "'"))).toBe("'it'");
    expect(formatExpr({ type: 'NodePath', path: '$"A B"' })).toBe('$"A B"');
    expect(formatExpr({ type: 'Boolean', value: false })).toBe('false');
  });
});

describe('formatTree', () => {
  it('renders the collision handler sample', () => {
    const source = readFileSync(
      fileURLToPath(new URL('../fixtures/player.gd', import.meta.url)),
      'utf-8'
    );

    expect(formatTree(parse(source)).split('\n')).toEqual([
      'ClassName Foo',
      'Extends Node2D',
      'Func _on_area_detector_body_entered(body: PhysicsBody2D) -> void',
      '  If (Is body Bullet)',
      '    Var bullet := (As body Bullet)',
      '    If (Attr bullet hurt_player)',
      '      Expr (Attr bullet (Call destroy))',
      '      Expr (Call kill)',
    ]);
  });

  it('renders every kind of line', () => {
    const source = [
      '# settings',
      'export var hp: int = 10 setget set_hp',
      'var x setget , get_x',
      'const MAX := 5',
      'signal moved(from, to)',
      'enum { A, B = 2 }',
      'class Inner extends Node:',
      '    pass',
      'static func f(a: int, b = "s") -> int:',
      '    match a:',
      '        1:',
      '            return',
      '    while a < 3:',
      '        a += 1',
      '    for i in range(3):',
      '        print(i)',
      '    if a:',
      '        pass',
      '    elif b:',
      '        pass',
      '    else:',
      '        pass',
      '    return [1, {"k": null}]',
      '',
    ].join('\n');

    expect(formatTree(parse(source)).split('\n')).toEqual([
      'Comment settings',
      'Var export hp: int = 10 setget set_hp',
      'Var x setget , get_x',
      'Const MAX := 5',
      'Signal moved(from, to)',
      'Enum { A, B = 2 }',
      'Class Inner extends Node',
      '  Pass',
      'Func static f(a: int, b = "s") -> int',
      '  Match a',
      '    Case 1',
      '      Return',
      '  While (Lt a 3)',
      '    Assign a += 1',
      '  For (In i (Call range 3))',
      '    Expr (Call print i)',
      '  If a',
      '    Pass',
      '  Elif b',
      '    Pass',
      '  Else',
      '    Pass',
      '  Return [1, {"k": null}]',
    ]);
  });

  it('writes integer values as decimal strings in JSON', () => {
    const json = JSON.parse(formatTree(parse('x = 0x10'), 'json'));
    expect(json.lines[0].stmt.value).toEqual({
      type: 'Int',
      value: '16',
      raw: '0x10',
    });
  });

  it('renders JSON with spans', () => {
    const block = parse('pass');
    expect(JSON.parse(formatTree(block, 'json'))).toEqual({
      type: 'Block',
      lines: [
        {
          type: 'StmtLine',
          stmt: { type: 'PassStmt' },
          span: {
            start: { line: 1, column: 1, offset: 0 },
            end: { line: 1, column: 5, offset: 4 },
          },
        },
      ],
    });
  });
});

describe('formatReport', () => {
  it('renders OK and ERROR lines', () => {
    expect(formatReport({ path: 'a.gd', status: 'OK' })).toBe('a.gd:OK');
    expect(
      formatReport({ path: 'b.gd', status: 'ERROR', detail: 'file: bad at 1:1' })
    ).toBe('b.gd:ERROR: file: bad at 1:1');
  });
});

describe('formatError', () => {
  it('renders a file failure with its rule frames', () => {
    const cause = parseFailure('if a\n    pass');
    const err = new FileParseError('x.gd', cause.trace(), cause);

    expect(formatError(err).split('\n')).toEqual([
      "Parse error on file x.gd: file > block > line > stmt > if_stmt > condition: Expected ':', found newline at 1:5",
      '  while parsing condition at 1:3',
      '  while parsing if_stmt at 1:1',
      '  while parsing stmt at 1:1',
      '  while parsing line at 1:1',
      '  while parsing block at 1:1',
      '  while parsing file at 1:1',
    ]);
  });

  it('renders a bare parse failure with detail()', () => {
    const cause = parseFailure('if a\n    pass');
    expect(formatError(cause)).toBe(cause.detail());
  });

  it('renders other errors by message', () => {
    expect(formatError(new MissingPathError('nowhere'))).toBe(
      'Path does not exist: nowhere'
    );
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(formatError('plain')).toBe('plain');
  });
});

describe('explainError', () => {
  it('renders cause, resolution and examples', () => {
    const doc = explainError('GDS-P002');
    expect(doc?.split('\n').slice(0, 3)).toEqual([
      'GDS-P002: Indentation mismatch',
      '',
      'Cause:',
    ]);
    expect(doc).toContain('Resolution:\n  Indent every line of a block');
    expect(doc).toContain('Examples:\n  Body at header level\n\n    if a:\n    pass');
  });

  it('renders an entry without documentation sections', () => {
    expect(explainError('GDS-P003')).toBe('GDS-P003: Trailing content');
  });

  it('returns null for malformed or unknown IDs', () => {
    expect(explainError('P002')).toBeNull();
    expect(explainError('GDS-P999')).toBeNull();
  });
});
