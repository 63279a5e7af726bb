/**
 * gdparse Module
 * Exports lexer, parser, driver and AST types
 */

export { LexerError } from './lexer/index.js';
export {
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
  parse,
  type ParseOptions,
  Parser,
} from './parser/index.js';

// ============================================================
// DRIVER
// ============================================================
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  createNodeFileSystem,
  type DriverOptions,
  type FileReport,
  type GdparseConfig,
  loadConfig,
  type OutputFormat,
  parseDir,
  parseFileAtPath,
  parsePath,
  type PathKind,
  type PathResult,
  type ScriptFileSystem,
  validateConfig,
} from './driver/index.js';

// ============================================================
// RENDERING
// ============================================================
export {
  explainError,
  formatError,
  formatExpr,
  formatReport,
  formatTree,
  VERSION,
} from './cli-shared.js';

// ============================================================
// ERROR TAXONOMY AND AST TYPES
// ============================================================
export * from './types.js';
