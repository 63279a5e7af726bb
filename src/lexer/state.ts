/**
 * Lexer State
 * Cursor over the source text with absolute line/column tracking
 */

import type { SourceLocation } from '../source-location.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

/** Saved cursor position for backtracking */
export interface Mark {
  readonly pos: number;
  readonly line: number;
  readonly column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function mark(state: LexerState): Mark {
  return { pos: state.pos, line: state.line, column: state.column };
}

export function reset(state: LexerState, saved: Mark): void {
  state.pos = saved.pos;
  state.line = saved.line;
  state.column = saved.column;
}

export function peek(state: LexerState, offset = 0): string {
  return state.source.charAt(state.pos + offset);
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function startsWith(state: LexerState, text: string): boolean {
  return state.source.startsWith(text, state.pos);
}

export function advance(state: LexerState): string {
  const ch = state.source.charAt(state.pos);
  if (ch === '') return ch;
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function advanceBy(state: LexerState, count: number): string {
  const start = state.pos;
  for (let i = 0; i < count; i++) advance(state);
  return state.source.slice(start, state.pos);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
