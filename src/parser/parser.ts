/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { BlockNode } from '../ast-nodes.js';
import {
  type ParserState,
  type ParserStateOptions,
  createParserState,
} from './state.js';

/**
 * Recursive-descent parser over GDScript source text.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: File, blocks, lines, indented blocks
 * - parser-expr.ts: Precedence levels, postfix and attribute chains
 * - parser-literals.ts: Values, arrays, objects, function calls
 * - parser-control.ts: if/elif/else, while, for, match, assign, return, pass
 * - parser-decl.ts: var, const, extends, class_name, signal, enum
 * - parser-functions.ts: func and class declarations
 *
 * @example
 * ```typescript
 * const parser = new Parser(source);
 * const block = parser.parse();
 * ```
 */
export class Parser {
  /** Cursor, context stack and furthest failure */
  state: ParserState;

  constructor(source: string, options?: ParserStateOptions) {
    this.state = createParserState(source, options);
  }

  /**
   * Parse the whole source into its top-level block.
   */
  parse(): BlockNode {
    return this.parseFile();
  }
}
