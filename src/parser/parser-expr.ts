/**
 * Parser Extension: Expression Parsing
 * Precedence levels, unary prefixes, index and attribute chains
 */

import { Parser } from './parser.js';
import type { BinOp, Expr } from '../ast-nodes.js';
import { advance, isIdentifierStart, mark, peek, reset } from '../lexer/index.js';
import {
  ADDITIVE_OPERATORS,
  LOGIC_OPERATORS,
  MULTIPLICATIVE_OPERATORS,
  type OperatorSpec,
  readOperator,
  UNARY_OPERATORS,
} from './helpers.js';
import { check, expect, gap, withContext, withNesting } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpr(): Expr;
    parseLogicExpr(): Expr;
    parseMathExpr(): Expr;
    parseTermExpr(): Expr;
    parseUnaryExpr(): Expr;
    parsePostfixExpr(): Expr;
    parsePrimaryExpr(): Expr;
    parseChain(base: Expr): Expr;
    parseIndexSuffix(): Expr;
  }
}

/**
 * Parse `operand (op operand)*` and fold left to right.
 * The gap before an unmatched operator is left unconsumed.
 */
function foldBinary(
  parser: Parser,
  table: readonly OperatorSpec<BinOp>[],
  operand: () => Expr
): Expr {
  const state = parser.state;
  let left = operand();

  for (;;) {
    const saved = mark(state.cursor);
    gap(state);
    const op = readOperator(state.cursor, table);
    if (op === null) {
      reset(state.cursor, saved);
      return left;
    }
    gap(state);
    const right = operand();
    left = { type: 'BinaryExpr', op, left, right };
  }
}

// ============================================================
// PRECEDENCE LEVELS
// ============================================================

Parser.prototype.parseExpr = function (this: Parser): Expr {
  return withContext(this.state, 'expr', () => this.parseLogicExpr());
};

/** `&& and || or >= <= > < == != is in as` */
Parser.prototype.parseLogicExpr = function (this: Parser): Expr {
  return foldBinary(this, LOGIC_OPERATORS, () => this.parseMathExpr());
};

/** `+ -` */
Parser.prototype.parseMathExpr = function (this: Parser): Expr {
  return foldBinary(this, ADDITIVE_OPERATORS, () => this.parseTermExpr());
};

/** `* / % | & ^` */
Parser.prototype.parseTermExpr = function (this: Parser): Expr {
  return foldBinary(this, MULTIPLICATIVE_OPERATORS, () =>
    this.parseUnaryExpr()
  );
};

/** Prefix `- + ! not`, which may repeat */
Parser.prototype.parseUnaryExpr = function (this: Parser): Expr {
  const op = readOperator(this.state.cursor, UNARY_OPERATORS);
  if (op === null) return this.parsePostfixExpr();

  gap(this.state);
  return withContext(this.state, 'expr_un', () => ({
    type: 'UnaryExpr',
    op,
    operand: this.parseUnaryExpr(),
  }));
};

// ============================================================
// POSTFIX AND PRIMARY
// ============================================================

Parser.prototype.parsePostfixExpr = function (this: Parser): Expr {
  return this.parseChain(this.parsePrimaryExpr());
};

/** `( expr )` or a value */
Parser.prototype.parsePrimaryExpr = function (this: Parser): Expr {
  if (!check(this.state, '(')) return this.parseValue();

  return withContext(this.state, 'expr_parens', () => {
    expect(this.state, '(');
    return withNesting(this.state, () => {
      gap(this.state);
      const inner = this.parseExpr();
      gap(this.state);
      expect(this.state, ')');
      return inner;
    });
  });
};

/**
 * Subscripts fold left onto `base`; a `.member` takes the rest of the chain
 * as its right side.
 *
 * @example
 * a.b[1].c  =>  Attr(a, Attr(Index(b, 1), c))
 */
Parser.prototype.parseChain = function (this: Parser, base: Expr): Expr {
  let expr = base;
  while (check(this.state, '[')) {
    expr = {
      type: 'BinaryExpr',
      op: 'Index',
      left: expr,
      right: this.parseIndexSuffix(),
    };
  }

  const cursor = this.state.cursor;
  if (peek(cursor) !== '.' || !isIdentifierStart(peek(cursor, 1))) {
    return expr;
  }

  advance(cursor);
  const member = this.parseIdentOrCall();
  return {
    type: 'BinaryExpr',
    op: 'Attr',
    left: expr,
    right: withContext(this.state, 'attr', () => this.parseChain(member)),
  };
};

Parser.prototype.parseIndexSuffix = function (this: Parser): Expr {
  return withContext(this.state, 'expr_index', () => {
    expect(this.state, '[');
    return withNesting(this.state, () => {
      gap(this.state);
      const index = this.parseExpr();
      gap(this.state);
      expect(this.state, ']');
      return index;
    });
  });
};
