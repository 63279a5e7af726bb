/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'file' | 'internal';

/**
 * Example demonstrating an error condition.
 * Shown by `gdparse --explain`.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: GDS-{category letter}{3-digit} (e.g., GDS-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (GDS-L0xx)
  {
    errorId: 'GDS-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'A string was opened with a quote that is never closed.',
    resolution: 'Add the matching closing quote.',
    examples: [{ description: 'Missing closing quote', code: 'var s = "hello' }],
  },
  {
    errorId: 'GDS-L002',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence \\{char} in string',
    cause:
      'Only the delimiting quote, a backslash and n may follow a backslash.',
    resolution: 'Remove the backslash or escape it as \\\\.',
    examples: [{ description: 'Tab escape', code: 'var s = "a\\tb"' }],
  },
  {
    errorId: 'GDS-L003',
    category: 'lexer',
    description: 'Integer literal out of range',
    messageTemplate: 'Integer literal {value} is out of range',
    cause: 'The literal does not fit in a signed 64-bit integer.',
    resolution: 'Use a smaller value or a float literal.',
  },

  // Parse Errors (GDS-P0xx)
  {
    errorId: 'GDS-P001',
    category: 'parse',
    description: 'Unexpected input',
    messageTemplate: 'Expected {expected}, found {found}',
    cause: 'The input does not match any grammar rule at this position.',
    resolution: 'Check the syntax around the reported location.',
    examples: [
      { description: 'Missing colon after condition', code: 'if a\n    pass' },
    ],
  },
  {
    errorId: 'GDS-P002',
    category: 'parse',
    description: 'Indentation mismatch',
    messageTemplate: 'Expected indentation {relation} {expected}, found {found}',
    cause:
      'A line is indented differently from the block it belongs to, or a block body is not indented deeper than its header.',
    resolution:
      'Indent every line of a block with the same number of spaces. Tabs do not count as indentation.',
    examples: [
      { description: 'Body at header level', code: 'if a:\npass' },
      { description: 'Unexpected indent', code: 'var a = 1\n    var b = 2' },
    ],
  },
  {
    errorId: 'GDS-P003',
    category: 'parse',
    description: 'Trailing content',
    messageTemplate: 'Unexpected content after end of script: {found}',
  },
  {
    errorId: 'GDS-P004',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'Nesting exceeds the maximum depth of {maxDepth}',
    cause: 'Expressions or blocks are nested deeper than the parser allows.',
    resolution: 'Split the expression or raise maxDepth in .gdparse.yaml.',
  },

  // File Errors (GDS-F0xx)
  {
    errorId: 'GDS-F001',
    category: 'file',
    description: 'Missing path',
    messageTemplate: 'Path does not exist: {path}',
  },
  {
    errorId: 'GDS-F002',
    category: 'file',
    description: 'File parse error',
    messageTemplate: 'Parse error on file {path}: {detail}',
  },

  // Internal Errors (GDS-I0xx)
  {
    errorId: 'GDS-I001',
    category: 'internal',
    description: 'Internal error',
    messageTemplate: 'Error: {message}',
  },
];

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template by replacing {placeholder} with context values.
 *
 * Missing placeholders render as empty strings, `{{` renders a literal brace,
 * and an unclosed brace returns the template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, found {found}", { expected: "':'", found: "newline" })
 * // Returns: "Expected ':', found newline"
 */
export function renderMessage(
  template: string,
  context: Readonly<Record<string, unknown>>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      if (template.charAt(i + 1) === '{') {
        result += '{';
        i += 2;
        continue;
      }

      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    if (char === '}' && template.charAt(i + 1) === '}') {
      result += '}';
      i += 2;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
