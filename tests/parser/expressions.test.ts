/**
 * Parser Tests: Expressions
 * Precedence levels, unary prefixes and attribute/index chains
 */

import { describe, expect, it } from 'vitest';
import {
  bin,
  call,
  float,
  ident,
  int,
  parseExpression,
  str,
  un,
} from '../helpers/ast.js';

describe('Parser: Expressions', () => {
  describe('precedence', () => {
    it('parses a * (b + c) as Mul(a, Add(b, c))', () => {
      const { expr, rest } = parseExpression('a * (b + c)');
      expect(expr).toEqual(
        bin('Mul', ident('a'), bin('Add', ident('b'), ident('c')))
      );
      expect(rest).toBe('');
    });

    it('binds multiplication tighter than addition', () => {
      expect(parseExpression('1 + 2 * 3 - 4').expr).toEqual(
        bin('Sub', bin('Add', int('1'), bin('Mul', int('2'), int('3'))), int('4'))
      );
    });

    it('folds one level left to right', () => {
      expect(parseExpression('a - b - c').expr).toEqual(
        bin('Sub', bin('Sub', ident('a'), ident('b')), ident('c'))
      );
    });

    it('keeps comparison and logic operators on one level', () => {
      expect(parseExpression('x == 1 && y').expr).toEqual(
        bin('And', bin('Eq', ident('x'), int('1')), ident('y'))
      );
    });

    it('reads word operators', () => {
      expect(parseExpression('a and b or not c').expr).toEqual(
        bin('Or', bin('And', ident('a'), ident('b')), un('Not', ident('c')))
      );
      expect(parseExpression('body is Bullet').expr).toEqual(
        bin('Is', ident('body'), ident('Bullet'))
      );
      expect(parseExpression('body as Bullet').expr).toEqual(
        bin('As', ident('body'), ident('Bullet'))
      );
    });

    it('does not split identifiers that start with a word operator', () => {
      const { expr, rest } = parseExpression('x instance');
      expect(expr).toEqual(ident('x'));
      expect(rest).toBe(' instance');
    });

    it('reads bitwise operators at the multiplicative level', () => {
      expect(parseExpression('a | b & c').expr).toEqual(
        bin('BinAnd', bin('BinOr', ident('a'), ident('b')), ident('c'))
      );
    });
  });

  describe('unary', () => {
    it('applies a prefix to the operand only', () => {
      expect(parseExpression('-x * 2').expr).toEqual(
        bin('Mul', un('Minus', ident('x')), int('2'))
      );
    });

    it('keeps the sign out of integer literals', () => {
      expect(parseExpression('-1').expr).toEqual(un('Minus', int('1')));
    });

    it('nests repeated prefixes', () => {
      expect(parseExpression('!!ok').expr).toEqual(
        un('Not', un('Not', ident('ok')))
      );
    });
  });

  describe('chains', () => {
    it('parses a.b[1].c as Attr(a, Attr(Index(b, 1), c))', () => {
      expect(parseExpression('a.b[1].c').expr).toEqual(
        bin(
          'Attr',
          ident('a'),
          bin('Attr', bin('Index', ident('b'), int('1')), ident('c'))
        )
      );
    });

    it('right-folds attribute calls', () => {
      expect(parseExpression('a.b.c()').expr).toEqual(
        bin('Attr', ident('a'), bin('Attr', ident('b'), call('c')))
      );
    });

    it('left-folds repeated subscripts', () => {
      expect(parseExpression('grid[0][1]').expr).toEqual(
        bin('Index', bin('Index', ident('grid'), int('0')), int('1'))
      );
    });

    it('chains onto parenthesized expressions and literals', () => {
      expect(parseExpression('(a + b).add()').expr).toEqual(
        bin('Attr', bin('Add', ident('a'), ident('b')), call('add'))
      );
      expect(parseExpression('"x{0}".format(y)').expr).toEqual(
        bin('Attr', str('x{0}'), call('format', ident('y')))
      );
    });

    it('chains onto node paths', () => {
      expect(parseExpression('$Sprite/Body.visible').expr).toEqual(
        bin('Attr', { type: 'NodePath', path: '$Sprite/Body' }, ident('visible'))
      );
    });

    it('needs the call parenthesis right after the name', () => {
      const { expr, rest } = parseExpression('foo (1)');
      expect(expr).toEqual(ident('foo'));
      expect(rest).toBe(' (1)');
    });
  });

  describe('values', () => {
    it('reads keyword literals as whole words', () => {
      expect(parseExpression('null').expr).toEqual({ type: 'Null' });
      expect(parseExpression('True').expr).toEqual({
        type: 'Boolean',
        value: true,
      });
      expect(parseExpression('false').expr).toEqual({
        type: 'Boolean',
        value: false,
      });
      expect(parseExpression('truex').expr).toEqual(ident('truex'));
    });

    it('reads numbers', () => {
      expect(parseExpression('0x1f').expr).toEqual(int('0x1f', 31n));
      expect(parseExpression('2.50').expr).toEqual(float('2.50'));
    });

    it('keeps integers past 2^53 exact', () => {
      expect(parseExpression('9007199254740993').expr).toEqual({
        type: 'Int',
        value: 9007199254740993n,
        raw: '9007199254740993',
      });
    });

    it('reads calls with arguments', () => {
      expect(parseExpression('max(a, 1.5)').expr).toEqual(
        call('max', ident('a'), float('1.5'))
      );
    });

    it('reads arrays with a trailing comma', () => {
      expect(parseExpression('[1, 2,]').expr).toEqual({
        type: 'Array',
        elements: [int('1'), int('2')],
      });
      expect(parseExpression('[]').expr).toEqual({ type: 'Array', elements: [] });
    });

    it('lets arrays span lines with comments', () => {
      const { expr, rest } = parseExpression('[\n  1, # one\n\n  2\n]');
      expect(expr).toEqual({ type: 'Array', elements: [int('1'), int('2')] });
      expect(rest).toBe('');
    });

    it('reads objects', () => {
      expect(parseExpression('{"a": 1, b: [2],}').expr).toEqual({
        type: 'Object',
        pairs: [
          { key: str('a'), value: int('1') },
          {
            key: ident('b'),
            value: { type: 'Array', elements: [int('2')] },
          },
        ],
      });
    });

    it('leaves input after the expression unconsumed', () => {
      const { expr, rest } = parseExpression('0foo');
      expect(expr).toEqual(int('0'));
      expect(rest).toBe('foo');
    });
  });
});
