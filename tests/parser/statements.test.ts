/**
 * Parser Tests: Statements
 */

import { describe, expect, it } from 'vitest';
import {
  bin,
  block,
  call,
  condition,
  exprLine,
  ident,
  int,
  parseShape,
  stmtLine,
} from '../helpers/ast.js';

const pass = stmtLine({ type: 'PassStmt' });

describe('Parser: Statements', () => {
  describe('if', () => {
    it('parses a condition and its indented block', () => {
      expect(parseShape('if 123456:\n    hello')).toEqual([
        stmtLine({
          type: 'IfStmt',
          ifBranch: condition(int('123456'), block(exprLine(ident('hello')))),
          elifBranches: [],
          elseBranch: null,
        }),
      ]);
    });

    it('collects elif and else branches at the same indentation', () => {
      const source = [
        'if a:',
        '    pass',
        'elif b:',
        '    pass',
        '',
        'elif c:',
        '    pass',
        'else:',
        '    pass',
        '',
      ].join('\n');

      expect(parseShape(source)).toEqual([
        stmtLine({
          type: 'IfStmt',
          ifBranch: condition(ident('a'), block(pass)),
          elifBranches: [
            condition(ident('b'), block(pass)),
            condition(ident('c'), block(pass)),
          ],
          elseBranch: block(pass),
        }),
      ]);
    });

    it('keeps an elif with its own nested if', () => {
      const source = [
        'if a:',
        '    if b:',
        '        pass',
        'else:',
        '    pass',
      ].join('\n');

      expect(parseShape(source)).toEqual([
        stmtLine({
          type: 'IfStmt',
          ifBranch: condition(
            ident('a'),
            block(
              stmtLine({
                type: 'IfStmt',
                ifBranch: condition(ident('b'), block(pass)),
                elifBranches: [],
                elseBranch: null,
              })
            )
          ),
          elifBranches: [],
          elseBranch: block(pass),
        }),
      ]);
    });

    it('accepts a trailing comment on the header', () => {
      expect(parseShape('if ready: # go\n    pass\n')).toEqual([
        stmtLine({
          type: 'IfStmt',
          ifBranch: condition(ident('ready'), block(pass)),
          elifBranches: [],
          elseBranch: null,
        }),
      ]);
    });
  });

  describe('loops', () => {
    it('parses while', () => {
      expect(parseShape('while i < 10:\n    i += 1\n')).toEqual([
        stmtLine({
          type: 'WhileStmt',
          condition: condition(
            bin('Lt', ident('i'), int('10')),
            block(
              stmtLine({
                type: 'AssignStmt',
                target: ident('i'),
                op: '+=',
                value: int('1'),
              })
            )
          ),
        }),
      ]);
    });

    it('stores the for header as an In expression', () => {
      expect(parseShape('for x in xs:\n    print(x)\n')).toEqual([
        stmtLine({
          type: 'ForStmt',
          condition: condition(
            bin('In', ident('x'), ident('xs')),
            block(exprLine(call('print', ident('x'))))
          ),
        }),
      ]);
    });
  });

  describe('match', () => {
    it('parses cases indented under the match', () => {
      const source = [
        'match state:',
        '    1:',
        '        pass',
        '',
        '    _:',
        '        run()',
      ].join('\n');

      expect(parseShape(source)).toEqual([
        stmtLine({
          type: 'MatchStmt',
          expr: ident('state'),
          cases: [
            condition(int('1'), block(pass)),
            condition(ident('_'), block(exprLine(call('run')))),
          ],
        }),
      ]);
    });
  });

  describe('assignment', () => {
    it('takes an attribute or index target', () => {
      expect(parseShape('velocity.x -= 1\ngrid[0] = 2')).toEqual([
        stmtLine({
          type: 'AssignStmt',
          target: bin('Attr', ident('velocity'), ident('x')),
          op: '-=',
          value: int('1'),
        }),
        stmtLine({
          type: 'AssignStmt',
          target: bin('Index', ident('grid'), int('0')),
          op: '=',
          value: int('2'),
        }),
      ]);
    });

    it('treats == as a comparison, not an assignment', () => {
      expect(parseShape('a == b')).toEqual([
        exprLine(bin('Eq', ident('a'), ident('b'))),
      ]);
    });
  });

  describe('return and pass', () => {
    it('parses return with and without a value', () => {
      expect(parseShape('return a + 1\nreturn\nreturn # done')).toEqual([
        stmtLine({
          type: 'ReturnStmt',
          value: bin('Add', ident('a'), int('1')),
        }),
        stmtLine({ type: 'ReturnStmt', value: null }),
        stmtLine({ type: 'ReturnStmt', value: null }),
      ]);
    });

    it('drops a trailing comment after pass', () => {
      expect(parseShape('pass # nothing yet')).toEqual([pass]);
    });

    it('does not read pass out of a longer name', () => {
      expect(parseShape('passage')).toEqual([exprLine(ident('passage'))]);
    });
  });
});
