/**
 * Whitespace, Comments and Indentation
 *
 * Indentation is the count of leading space characters. Tabs are gaps
 * inside a line but never count toward indentation.
 */

import { isLineEnd, isSpace } from './helpers.js';
import { advance, advanceBy, isAtEnd, type LexerState, peek } from './state.js';

/** Skip spaces and tabs within the current line */
export function skipSpaces(state: LexerState): void {
  while (isSpace(peek(state))) advance(state);
}

/**
 * Skip whitespace, line breaks and `#` comments.
 * Used between elements of bracketed constructs, which may span lines.
 */
export function skipLayout(state: LexerState): void {
  for (;;) {
    const ch = peek(state);
    if (isSpace(ch) || isLineEnd(ch)) {
      advance(state);
    } else if (ch === '#') {
      while (!isAtEnd(state) && !isLineEnd(peek(state))) advance(state);
    } else {
      return;
    }
  }
}

/** Width of the leading run of spaces at the cursor, without consuming */
export function scanIndentation(state: LexerState): number {
  let width = 0;
  while (peek(state, width) === ' ') width++;
  return width;
}

/** Consume exactly `width` spaces when the indentation is `width` */
export function sameIndent(state: LexerState, width: number): boolean {
  if (scanIndentation(state) !== width) return false;
  advanceBy(state, width);
  return true;
}

/** Indentation at the cursor when it exceeds `width`; nothing is consumed */
export function moreIndent(state: LexerState, width: number): number | null {
  const found = scanIndentation(state);
  return found > width ? found : null;
}

/** At a line break or the end of input */
export function isAtLineEnd(state: LexerState): boolean {
  return isAtEnd(state) || isLineEnd(peek(state));
}

/** Consume one `\n` or `\r\n`; false when not at a line break */
export function consumeLineEnd(state: LexerState): boolean {
  if (peek(state) === '\r' && peek(state, 1) === '\n') {
    advance(state);
    advance(state);
    return true;
  }
  if (peek(state) === '\n') {
    advance(state);
    return true;
  }
  return false;
}

function firstNonSpace(state: LexerState): string {
  let offset = 0;
  while (isSpace(peek(state, offset))) offset++;
  return peek(state, offset);
}

/** The line starting at the cursor holds only spaces and tabs */
export function isBlankLine(state: LexerState): boolean {
  const ch = firstNonSpace(state);
  return ch === '' || isLineEnd(ch);
}

/** The line starting at the cursor holds only a `#` comment */
export function isCommentLine(state: LexerState): boolean {
  return firstNonSpace(state) === '#';
}

/** Consume the rest of the current line including its line break */
export function skipLine(state: LexerState): void {
  while (!isAtEnd(state) && peek(state) !== '\n') advance(state);
  advance(state);
}
