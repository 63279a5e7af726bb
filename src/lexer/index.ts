/**
 * Lexer
 * Source cursor and literal readers used by the parser
 */

export { LexerError, createLexerError } from './errors.js';
export * from './helpers.js';
export * from './readers.js';
export * from './state.js';
export * from './whitespace.js';
