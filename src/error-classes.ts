/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { formatLocation } from './source-location.js';
import type { ErrorCategory } from './error-registry.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ScriptErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * A grammar rule that was active when a parse failed.
 * `location` is where the rule started.
 */
export interface ContextFrame {
  readonly label: string;
  readonly location: SourceLocation;
}

function lookupDefinition(errorId: string, categories: ErrorCategory[]) {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (!categories.includes(definition.category)) {
    throw new TypeError(
      `Expected ${categories.join(' or ')} error ID, got: ${errorId}`
    );
  }
  return definition;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("GDS-P001", { expected: "':'", found: "newline" }, location)
 * // ScriptError: "Expected ':', found newline at 2:9"
 */
export function createError(
  errorId: string,
  context: Readonly<Record<string, unknown>>,
  location?: SourceLocation | undefined
): ScriptError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new ScriptError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all parser errors.
 * Provides structured data for host applications to format as needed.
 */
export class ScriptError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Readonly<Record<string, unknown>> | undefined;

  constructor(data: ScriptErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'ScriptError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ScriptErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ScriptErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// PARSE ERRORS
// ============================================================

const TRACE_MAX_LABELS = 32;
const TRACE_HEAD_LABELS = 8;
const TRACE_TAIL_LABELS = 16;

/**
 * Grammar failure. Carries the context frames that were active when it was
 * raised, outermost first.
 *
 * A recoverable error lets an enclosing alternative try something else. The
 * nesting-depth error is not recoverable and unwinds the whole parse.
 */
export class ParseError extends ScriptError {
  override readonly location: SourceLocation;
  readonly frames: readonly ContextFrame[];
  readonly recoverable: boolean;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    frames: readonly ContextFrame[] = [],
    options?: {
      context?: Readonly<Record<string, unknown>>;
      recoverable?: boolean;
    }
  ) {
    // Lexical failures surface through the parser with their own IDs
    lookupDefinition(errorId, ['parse', 'lexer']);

    super({ errorId, message, location, context: options?.context });
    this.name = 'ParseError';
    this.location = location;
    this.frames = frames;
    this.recoverable = options?.recoverable ?? true;
  }

  /** Labels of the active grammar rules, outermost first */
  get labels(): string[] {
    return this.frames.map((frame) => frame.label);
  }

  /**
   * Multi-line rendering: the message, then one line per frame, innermost
   * first.
   *
   * @example
   * Expected ':', found newline at 1:5
   *   while parsing condition at 1:3
   *   while parsing if_stmt at 1:1
   */
  detail(): string {
    const lines = [this.message];
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame === undefined) continue;
      lines.push(
        `  while parsing ${frame.label} at ${formatLocation(frame.location)}`
      );
    }
    return lines.join('\n');
  }

  /**
   * One-line rendering: `file > block > line: message at L:C`.
   * Chains longer than TRACE_MAX_LABELS keep their outer and inner ends.
   */
  trace(): string {
    if (this.frames.length === 0) return this.message;
    let labels = this.labels;
    if (labels.length > TRACE_MAX_LABELS) {
      const omitted = labels.length - TRACE_HEAD_LABELS - TRACE_TAIL_LABELS;
      labels = [
        ...labels.slice(0, TRACE_HEAD_LABELS),
        `... ${omitted} more ...`,
        ...labels.slice(-TRACE_TAIL_LABELS),
      ];
    }
    return `${labels.join(' > ')}: ${this.message}`;
  }
}

// ============================================================
// DRIVER ERRORS
// ============================================================

/** The input path is neither a file nor a directory */
export class MissingPathError extends ScriptError {
  readonly path: string;

  constructor(path: string) {
    const definition = lookupDefinition('GDS-F001', ['file']);
    super({
      errorId: definition.errorId,
      message: renderMessage(definition.messageTemplate, { path }),
      context: { path },
    });
    this.name = 'MissingPathError';
    this.path = path;
  }
}

/** A single file failed to parse */
export class FileParseError extends ScriptError {
  readonly path: string;
  readonly detail: string;
  readonly parseError: ParseError | undefined;

  constructor(path: string, detail: string, parseError?: ParseError) {
    const definition = lookupDefinition('GDS-F002', ['file']);
    super({
      errorId: definition.errorId,
      message: renderMessage(definition.messageTemplate, { path, detail }),
      context: { path },
    });
    this.name = 'FileParseError';
    this.path = path;
    this.detail = detail;
    this.parseError = parseError;
  }
}

/** Invariant violation inside the parser or driver */
export class InternalError extends ScriptError {
  constructor(message: string) {
    const definition = lookupDefinition('GDS-I001', ['internal']);
    super({
      errorId: definition.errorId,
      message: renderMessage(definition.messageTemplate, { message }),
      context: { message },
    });
    this.name = 'InternalError';
  }
}

/** Errors surfaced by the path-based entry points */
export type ParserError = MissingPathError | InternalError | FileParseError;
