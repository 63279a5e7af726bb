/**
 * Literal Readers
 *
 * Each reader either consumes a complete literal and returns it, or returns
 * null without consuming. Malformed literals that cannot be anything else
 * throw a LexerError.
 */

import { createLexerError } from './errors.js';
import {
  describeChar,
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isIdentifierStart,
  isLineEnd,
} from './helpers.js';
import {
  advance,
  advanceBy,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  startsWith,
} from './state.js';

export interface NumberLiteral {
  readonly value: number;
  /** Spelling as written */
  readonly raw: string;
}

/** Integers keep the full signed 64-bit range */
export interface IntLiteral {
  readonly value: bigint;
  readonly raw: string;
}

export interface StringLiteral {
  /** Body between the quotes, escapes left as written */
  readonly value: string;
  readonly quote: '"' | "'";
}

const I64_MAX = BigInt('9223372036854775807');

// ============================================================
// IDENTIFIERS AND KEYWORDS
// ============================================================

export function readIdentifier(state: LexerState): string | null {
  if (!isIdentifierStart(peek(state))) return null;

  const start = state.pos;
  while (isIdentifierChar(peek(state))) advance(state);
  return state.source.slice(start, state.pos);
}

/** `Name` or `Outer.Inner`, as used in type hints */
export function readDottedIdentifier(state: LexerState): string | null {
  const start = state.pos;
  if (readIdentifier(state) === null) return null;

  while (peek(state) === '.' && isIdentifierStart(peek(state, 1))) {
    advance(state);
    readIdentifier(state);
  }
  return state.source.slice(start, state.pos);
}

/** Consume `word` only when it is not the prefix of a longer identifier */
export function readKeyword(state: LexerState, word: string): boolean {
  if (!startsWith(state, word) || isIdentifierChar(peek(state, word.length))) {
    return false;
  }
  advanceBy(state, word.length);
  return true;
}

// ============================================================
// NUMBERS
// ============================================================

/**
 * `0x` followed by hex digits, or decimal digits. Leading zeros are allowed
 * and reading stops at the first character that is not a digit.
 */
export function readInt(state: LexerState): IntLiteral | null {
  const location = currentLocation(state);
  let raw: string;

  if (startsWith(state, '0x') && isHexDigit(peek(state, 2))) {
    const start = state.pos;
    advanceBy(state, 2);
    while (isHexDigit(peek(state))) advance(state);
    raw = state.source.slice(start, state.pos);
  } else if (isDigit(peek(state))) {
    const start = state.pos;
    while (isDigit(peek(state))) advance(state);
    raw = state.source.slice(start, state.pos);
  } else {
    return null;
  }

  const value = BigInt(raw);
  if (value > I64_MAX) {
    throw createLexerError('GDS-L003', { value: raw }, location);
  }
  return { value, raw };
}

/** `digits.digits`; there is no exponent form */
export function readFloat(state: LexerState): NumberLiteral | null {
  let length = 0;
  while (isDigit(peek(state, length))) length++;
  if (length === 0 || peek(state, length) !== '.') return null;
  if (!isDigit(peek(state, length + 1))) return null;

  length++;
  while (isDigit(peek(state, length))) length++;

  const raw = advanceBy(state, length);
  return { value: Number(raw), raw };
}

// ============================================================
// STRINGS AND NODE PATHS
// ============================================================

/**
 * Single- or double-quoted string. A backslash may only escape the
 * delimiter, a backslash or `n`. Strings may span lines.
 */
export function readString(state: LexerState): StringLiteral | null {
  const quote = peek(state);
  if (quote !== '"' && quote !== "'") return null;

  const start = currentLocation(state);
  advance(state);

  let value = '';
  for (;;) {
    if (isAtEnd(state)) {
      throw createLexerError('GDS-L001', {}, start);
    }

    const ch = peek(state);
    if (ch === quote) {
      advance(state);
      return { value, quote };
    }

    if (ch === '\\') {
      const escapeStart = currentLocation(state);
      advance(state);
      const escaped = peek(state);
      if (escaped === '') {
        throw createLexerError('GDS-L001', {}, start);
      }
      if (escaped !== quote && escaped !== '\\' && escaped !== 'n') {
        throw createLexerError(
          'GDS-L002',
          { char: isLineEnd(escaped) ? describeChar(escaped) : escaped },
          escapeStart
        );
      }
      value += `\\${advance(state)}`;
      continue;
    }

    value += advance(state);
  }
}

/** `$` followed by `a/b/c` or a quoted string; returns the text with `$` */
export function readNodePath(state: LexerState): string | null {
  if (peek(state) !== '$') return null;

  const next = peek(state, 1);
  if (next !== '"' && next !== "'" && !isIdentifierStart(next)) return null;

  const start = state.pos;
  advance(state);

  if (readString(state) === null) {
    readIdentifier(state);
    while (peek(state) === '/' && isIdentifierStart(peek(state, 1))) {
      advance(state);
      readIdentifier(state);
    }
  }
  return state.source.slice(start, state.pos);
}

// ============================================================
// COMMENTS
// ============================================================

/** `#` to end of line; returns the trimmed text after `#` */
export function readComment(state: LexerState): string | null {
  if (peek(state) !== '#') return null;

  advance(state);
  const start = state.pos;
  while (!isAtEnd(state) && !isLineEnd(peek(state))) advance(state);
  return state.source.slice(start, state.pos).trim();
}
