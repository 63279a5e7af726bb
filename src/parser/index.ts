/**
 * GDScript Parser
 * Main entry point and re-exports
 */

import type { BlockNode } from '../ast-nodes.js';
import { Parser } from './parser.js';
import type { ParserStateOptions } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-literals.js';
import './parser-control.js';
import './parser-decl.js';
import './parser-functions.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

export type ParseOptions = ParserStateOptions;

/**
 * Parse GDScript source into its top-level block.
 *
 * Throws ParseError carrying the failure that got furthest into the input,
 * with the grammar rules that were active at that point.
 *
 * @example
 * ```typescript
 * const block = parse('extends Node2D\nvar speed := 200\n');
 * block.lines.length; // 2
 * ```
 */
export function parse(source: string, options?: ParseOptions): BlockNode {
  return new Parser(source, options).parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export {
  createParserState,
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
  type ParserState,
  type ParserStateOptions,
} from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
