/**
 * GDScript Syntax Types
 * Source locations, error taxonomy and AST node shapes
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { formatLocation } from './source-location.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================

export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';

export {
  type ContextFrame,
  createError,
  FileParseError,
  InternalError,
  MissingPathError,
  ParseError,
  type ParserError,
  ScriptError,
  type ScriptErrorData,
} from './error-classes.js';

// ============================================================
// AST NODES
// ============================================================

export type * from './ast-nodes.js';
