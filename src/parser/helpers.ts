/**
 * Parser Helpers
 * Operator tables and modifier keywords
 * @internal This module contains internal parser utilities
 */

import type {
  AssignOp,
  BinOp,
  FunctionModifier,
  UnOp,
  VarModifier,
} from '../ast-nodes.js';
import {
  advanceBy,
  isIdentifierChar,
  type LexerState,
  peek,
  readKeyword,
  startsWith,
} from '../lexer/index.js';

// ============================================================
// OPERATOR TABLES
// ============================================================

/** @internal */
export interface OperatorSpec<Op extends string> {
  readonly text: string;
  readonly op: Op;
  /** Needs a word boundary after it */
  readonly word?: boolean;
  /** Characters that must not follow the operator */
  readonly notFollowedBy?: string;
}

/** Lowest precedence level. Longer spellings come first. @internal */
export const LOGIC_OPERATORS: readonly OperatorSpec<BinOp>[] = [
  { text: '&&', op: 'And' },
  { text: '||', op: 'Or' },
  { text: '>=', op: 'Gte' },
  { text: '<=', op: 'Lte' },
  { text: '==', op: 'Eq' },
  { text: '!=', op: 'Neq' },
  { text: '>', op: 'Gt' },
  { text: '<', op: 'Lt' },
  { text: 'and', op: 'And', word: true },
  { text: 'or', op: 'Or', word: true },
  { text: 'is', op: 'Is', word: true },
  { text: 'in', op: 'In', word: true },
  { text: 'as', op: 'As', word: true },
];

/** @internal */
export const ADDITIVE_OPERATORS: readonly OperatorSpec<BinOp>[] = [
  { text: '+', op: 'Add', notFollowedBy: '=' },
  { text: '-', op: 'Sub', notFollowedBy: '=>' },
];

/** `|` and `&` exclude their doubled logical forms @internal */
export const MULTIPLICATIVE_OPERATORS: readonly OperatorSpec<BinOp>[] = [
  { text: '*', op: 'Mul', notFollowedBy: '=' },
  { text: '/', op: 'Div', notFollowedBy: '=' },
  { text: '%', op: 'Mod', notFollowedBy: '=' },
  { text: '|', op: 'BinOr', notFollowedBy: '|=' },
  { text: '&', op: 'BinAnd', notFollowedBy: '&=' },
  { text: '^', op: 'BinXor', notFollowedBy: '=' },
];

/** @internal */
export const UNARY_OPERATORS: readonly OperatorSpec<UnOp>[] = [
  { text: '-', op: 'Minus' },
  { text: '+', op: 'Plus' },
  { text: '!', op: 'Not', notFollowedBy: '=' },
  { text: 'not', op: 'Not', word: true },
];

/** @internal */
export const ASSIGN_OPERATORS: readonly OperatorSpec<AssignOp>[] = [
  { text: '+=', op: '+=' },
  { text: '-=', op: '-=' },
  { text: '*=', op: '*=' },
  { text: '/=', op: '/=' },
  { text: '%=', op: '%=' },
  { text: '=', op: '=', notFollowedBy: '=' },
];

/**
 * Find the first operator in `table` at the cursor without consuming it.
 * @internal
 */
export function matchOperator<Op extends string>(
  cursor: LexerState,
  table: readonly OperatorSpec<Op>[]
): OperatorSpec<Op> | null {
  for (const spec of table) {
    if (!startsWith(cursor, spec.text)) continue;

    const next = peek(cursor, spec.text.length);
    if (spec.word && isIdentifierChar(next)) continue;
    if (spec.notFollowedBy && next !== '' && spec.notFollowedBy.includes(next)) {
      continue;
    }
    return spec;
  }
  return null;
}

/** Match and consume an operator @internal */
export function readOperator<Op extends string>(
  cursor: LexerState,
  table: readonly OperatorSpec<Op>[]
): Op | null {
  const spec = matchOperator(cursor, table);
  if (!spec) return null;
  advanceBy(cursor, spec.text.length);
  return spec.op;
}

// ============================================================
// KEYWORDS
// ============================================================

/** @internal */
export const VAR_MODIFIERS: readonly VarModifier[] = ['onready', 'export'];

/** @internal */
export const FUNCTION_MODIFIERS: readonly FunctionModifier[] = [
  'static',
  'remotesync',
  'mastersync',
  'puppetsync',
  'remote',
  'master',
  'puppet',
];

/** Consume the first keyword of `words` found at the cursor @internal */
export function readOneOf<Word extends string>(
  cursor: LexerState,
  words: readonly Word[]
): Word | null {
  for (const word of words) {
    if (readKeyword(cursor, word)) return word;
  }
  return null;
}
