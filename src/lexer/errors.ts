/**
 * Lexer Errors
 */

import { ScriptError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import type { SourceLocation } from '../source-location.js';

export class LexerError extends ScriptError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });

    this.name = 'LexerError';
    this.location = location;
  }
}

/**
 * Create a LexerError with its message rendered from the registry template.
 */
export function createLexerError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): LexerError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return new LexerError(
    errorId,
    renderMessage(definition.messageTemplate, context),
    location,
    context
  );
}
