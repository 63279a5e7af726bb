/**
 * Parser Tests: Blocks and Lines
 * Indentation, comment lines, `;` separators and line spans
 */

import { describe, expect, it } from 'vitest';
import { parse } from '../../src/index.js';
import {
  block,
  condition,
  declLine,
  exprLine,
  ident,
  int,
  parseLines,
  parseShape,
  stmtLine,
} from '../helpers/ast.js';

const pass = stmtLine({ type: 'PassStmt' });

const assign = (name: string, value: string): unknown =>
  stmtLine({
    type: 'AssignStmt',
    target: ident(name),
    op: '=',
    value: int(value),
  });

describe('Parser: Blocks', () => {
  it('parses an empty script', () => {
    expect(parse('').lines).toEqual([]);
    expect(parse('\n\n   \n# only a comment\n').lines).toHaveLength(1);
  });

  it('keeps comment lines at the block indentation', () => {
    const source = '# header\nvar a = 1\n  # stray\nvar b = 2\n';
    expect(parseShape(source)).toEqual([
      { type: 'CommentLine', text: 'header' },
      declLine({
        type: 'VarDecl',
        modifier: null,
        name: 'a',
        infer: false,
        typeHint: null,
        value: int('1'),
        setter: null,
        getter: null,
      }),
      declLine({
        type: 'VarDecl',
        modifier: null,
        name: 'b',
        infer: false,
        typeHint: null,
        value: int('2'),
        setter: null,
        getter: null,
      }),
    ]);
  });

  it('skips blank lines inside a block', () => {
    expect(parseShape('if a:\n    x = 1\n\n      \n    y = 2\n')).toEqual([
      stmtLine({
        type: 'IfStmt',
        ifBranch: condition(ident('a'), block(assign('x', '1'), assign('y', '2'))),
        elifBranches: [],
        elseBranch: null,
      }),
    ]);
  });

  it('ends a block at a shallower line', () => {
    expect(parseShape('if a:\n    pass\nb()\n')).toEqual([
      stmtLine({
        type: 'IfStmt',
        ifBranch: condition(ident('a'), block(pass)),
        elifBranches: [],
        elseBranch: null,
      }),
      exprLine({ type: 'FunctionCall', name: 'b', args: [] }),
    ]);
  });

  it('accepts CRLF line breaks', () => {
    expect(parseShape('if a:\r\n    pass\r\nb = 1\r\n')).toEqual([
      stmtLine({
        type: 'IfStmt',
        ifBranch: condition(ident('a'), block(pass)),
        elifBranches: [],
        elseBranch: null,
      }),
      assign('b', '1'),
    ]);
  });

  describe('semicolons', () => {
    it('splits a line into several items', () => {
      expect(parseShape('a = 1; b = 2')).toEqual([
        assign('a', '1'),
        assign('b', '2'),
      ]);
    });

    it('allows a trailing semicolon', () => {
      expect(parseShape('pass;\npass; # done')).toEqual([pass, pass]);
    });

    it('gives each item its own span', () => {
      const [first, second] = parseLines('a = 1; b = 2');
      expect(first?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 6, offset: 5 },
      });
      expect(second?.span).toEqual({
        start: { line: 1, column: 8, offset: 7 },
        end: { line: 1, column: 13, offset: 12 },
      });
    });
  });

  describe('spans', () => {
    it('covers a nested block from header to last body line', () => {
      const [line] = parseLines('func f():\n    pass\n');
      expect(line?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 2, column: 9, offset: 18 },
      });
    });

    it('starts a body line after its indentation', () => {
      const [line] = parseLines('func f():\n    pass\n');
      if (line?.type !== 'DeclLine' || line.decl.type !== 'FunctionDecl') {
        throw new Error('expected a function declaration');
      }
      expect(line.decl.body.lines[0]?.span.start).toEqual({
        line: 2,
        column: 5,
        offset: 14,
      });
    });

    it('places a comment line span after its indentation', () => {
      const [line] = parseLines('  # indented\n');
      expect(line).toBeUndefined();

      const [comment] = parseLines('# note');
      expect(comment?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 7, offset: 6 },
      });
    });
  });
});
