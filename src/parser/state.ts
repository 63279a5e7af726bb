/**
 * Parser State
 * Cursor, context stack and furthest-failure tracking shared by every
 * grammar rule
 */

import type { ContextFrame } from '../error-classes.js';
import { InternalError, ParseError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import {
  createLexerState,
  currentLocation,
  describeChar,
  type LexerState,
  LexerError,
  mark,
  peek,
  reset,
  skipLayout,
  skipSpaces,
  startsWith,
  advanceBy,
  readKeyword,
} from '../lexer/index.js';
import type { SourceLocation, SourceSpan } from '../source-location.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly cursor: LexerState;
  /** Active grammar rules, outermost first */
  readonly contexts: ContextFrame[];
  /** Failure that got furthest into the input so far */
  furthest: ParseError | null;
  readonly maxDepth: number;
  /** Open brackets around the cursor; gaps inside them may span lines */
  nesting: number;
}

export interface ParserStateOptions {
  /**
   * Maximum number of simultaneously active grammar rules.
   * Values above MAX_DEPTH_LIMIT are lowered to it.
   */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 512;
/** Highest accepted maxDepth; deeper nesting would exhaust the call stack */
export const MAX_DEPTH_LIMIT = 1024;

export function createParserState(
  source: string,
  options: ParserStateOptions = {}
): ParserState {
  return {
    cursor: createLexerState(source),
    contexts: [],
    furthest: null,
    maxDepth: Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT),
    nesting: 0,
  };
}

/** @internal */
export function makeSpan(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}

/** @internal */
export function location(state: ParserState): SourceLocation {
  return currentLocation(state.cursor);
}

// ============================================================
// FAILURES
// ============================================================

/**
 * Keep the failure that reached furthest. At equal offsets a hard failure
 * replaces the previous one and a noted one does not.
 */
function record(state: ParserState, error: ParseError, noted: boolean): void {
  const best = state.furthest;
  if (
    best === null ||
    error.location.offset > best.location.offset ||
    (!noted && error.location.offset === best.location.offset)
  ) {
    state.furthest = error;
  }
}

function buildError(
  state: ParserState,
  errorId: string,
  context: Record<string, unknown>,
  at: SourceLocation,
  hint?: string,
  recoverable = true
): ParseError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  const message = renderMessage(definition.messageTemplate, context);
  return new ParseError(
    errorId,
    hint ? `${message}. ${hint}` : message,
    at,
    [...state.contexts],
    { context, recoverable }
  );
}

/** Raise a recoverable failure at the cursor (or `at`) @internal */
export function fail(
  state: ParserState,
  errorId: string,
  context: Record<string, unknown>,
  at: SourceLocation = location(state),
  hint?: string
): never {
  const error = buildError(state, errorId, context, at, hint);
  record(state, error, false);
  throw error;
}

/**
 * Record a failure without raising it. Used where a rule ends normally but
 * the reason it ended may explain a later error.
 * @internal
 */
export function note(
  state: ParserState,
  errorId: string,
  context: Record<string, unknown>,
  at: SourceLocation = location(state),
  hint?: string
): void {
  record(state, buildError(state, errorId, context, at, hint), true);
}

const CLOSER_HINTS: Record<string, string> = {
  "')'": 'Hint: Check for unclosed parenthesis',
  "']'": 'Hint: Check for unclosed bracket',
  "'}'": 'Hint: Check for unclosed brace',
};

/** Fail with "Expected {what}, found {next char}" @internal */
export function expected(state: ParserState, what: string): never {
  const found = describeChar(peek(state.cursor));
  const hint = found === 'end of input' ? CLOSER_HINTS[what] : undefined;
  return fail(state, 'GDS-P001', { expected: what, found }, location(state), hint);
}

// ============================================================
// COMBINATORS
// ============================================================

/**
 * Run `fn` with `label` pushed on the context stack.
 * Exceeding maxDepth raises a non-recoverable error.
 * @internal
 */
export function withContext<T>(
  state: ParserState,
  label: string,
  fn: () => T
): T {
  if (state.contexts.length >= state.maxDepth) {
    const error = buildError(
      state,
      'GDS-P004',
      { maxDepth: state.maxDepth },
      location(state),
      undefined,
      false
    );
    state.furthest = error;
    throw error;
  }

  state.contexts.push({ label, location: location(state) });
  try {
    return fn();
  } finally {
    state.contexts.pop();
  }
}

/** Run `fn` inside a bracket pair, where gaps may span lines @internal */
export function withNesting<T>(state: ParserState, fn: () => T): T {
  state.nesting++;
  try {
    return fn();
  } finally {
    state.nesting--;
  }
}

/**
 * Try `fn`; on a recoverable failure restore the cursor and return null.
 * @internal
 */
export function attempt<T>(state: ParserState, fn: () => T): T | null {
  const saved = mark(state.cursor);
  try {
    return fn();
  } catch (err) {
    if (err instanceof ParseError && err.recoverable) {
      reset(state.cursor, saved);
      return null;
    }
    throw err;
  }
}

/**
 * Try each alternative in order and return the first success. When all
 * fail, rethrow the failure that got furthest (the first one on ties).
 * @internal
 */
export function choice<T>(
  state: ParserState,
  alternatives: ReadonlyArray<() => T>
): T {
  let best: ParseError | null = null;
  for (const alternative of alternatives) {
    const saved = mark(state.cursor);
    try {
      return alternative();
    } catch (err) {
      if (!(err instanceof ParseError) || !err.recoverable) throw err;
      reset(state.cursor, saved);
      if (best === null || err.location.offset > best.location.offset) {
        best = err;
      }
    }
  }
  if (best === null) {
    throw new InternalError('choice() needs at least one alternative');
  }
  throw best;
}

/**
 * Run a lexer reader, turning a LexerError into a recorded ParseError
 * carrying the current context stack.
 * @internal
 */
export function lex<T>(
  state: ParserState,
  reader: (cursor: LexerState) => T
): T {
  try {
    return reader(state.cursor);
  } catch (err) {
    if (err instanceof LexerError) {
      const error = new ParseError(
        err.errorId,
        err.toData().message,
        err.location,
        [...state.contexts],
        { context: err.context }
      );
      record(state, error, false);
      throw error;
    }
    throw err;
  }
}

// ============================================================
// TOKEN HELPERS
// ============================================================

/** Skip the gap before the next token; spans lines inside brackets @internal */
export function gap(state: ParserState): void {
  if (state.nesting > 0) {
    skipLayout(state.cursor);
  } else {
    skipSpaces(state.cursor);
  }
}

/** @internal */
export function check(state: ParserState, text: string): boolean {
  return startsWith(state.cursor, text);
}

/** Consume `text` if it is next @internal */
export function consume(state: ParserState, text: string): boolean {
  if (!startsWith(state.cursor, text)) return false;
  advanceBy(state.cursor, text.length);
  return true;
}

/** @internal */
export function expect(state: ParserState, text: string): void {
  if (!consume(state, text)) expected(state, `'${text}'`);
}

/** @internal */
export function expectKeyword(state: ParserState, word: string): void {
  if (!readKeyword(state.cursor, word)) expected(state, `'${word}'`);
}
