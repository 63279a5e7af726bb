/**
 * CLI Shared Utilities
 * Tree rendering, report lines and error formatting for the gdparse CLI
 */

import type {
  BlockNode,
  ConditionNode,
  Decl,
  Expr,
  FunctionArg,
  LineNode,
  Stmt,
} from './ast-nodes.js';
import {
  FileParseError,
  ParseError,
  ScriptError,
} from './error-classes.js';
import { ERROR_REGISTRY } from './error-registry.js';
import type { OutputFormat } from './driver/config.js';

export const VERSION = '0.1.0';

// ============================================================
// EXPRESSIONS
// ============================================================

/**
 * S-expression rendering of an expression.
 *
 * @example
 * a.b[1].c  =>  (Attr a (Attr (Index b 1) c))
 */
export function formatExpr(expr: Expr): string {
  switch (expr.type) {
    case 'Null':
      return 'null';
    case 'Boolean':
      return String(expr.value);
    case 'Int':
    case 'Float':
      return expr.raw;
    case 'String':
      return `${expr.quote}${expr.value}${expr.quote}`;
    case 'NodePath':
      return expr.path;
    case 'Ident':
      return expr.name;
    case 'Array':
      return `[${expr.elements.map(formatExpr).join(', ')}]`;
    case 'Object':
      return `{${expr.pairs
        .map((pair) => `${formatExpr(pair.key)}: ${formatExpr(pair.value)}`)
        .join(', ')}}`;
    case 'FunctionCall':
      return `(Call ${[expr.name, ...expr.args.map(formatExpr)].join(' ')})`;
    case 'BinaryExpr':
      return `(${expr.op} ${formatExpr(expr.left)} ${formatExpr(expr.right)})`;
    case 'UnaryExpr':
      return `(${expr.op} ${formatExpr(expr.operand)})`;
  }
}

// ============================================================
// TREE
// ============================================================

function formatArg(arg: FunctionArg): string {
  let text = arg.name;
  if (arg.typeHint !== null) text += `: ${arg.typeHint}`;
  if (arg.defaultValue !== null) text += ` = ${formatExpr(arg.defaultValue)}`;
  return text;
}

function formatDecl(decl: Decl, depth: number, out: string[]): void {
  const pad = '  '.repeat(depth);

  switch (decl.type) {
    case 'VarDecl': {
      let text = decl.modifier ? `Var ${decl.modifier} ${decl.name}` : `Var ${decl.name}`;
      if (decl.infer) text += ' :=';
      if (decl.typeHint !== null) text += `: ${decl.typeHint}`;
      if (decl.value !== null) {
        text += decl.infer ? ` ${formatExpr(decl.value)}` : ` = ${formatExpr(decl.value)}`;
      }
      if (decl.setter !== null || decl.getter !== null) {
        text += ` setget ${decl.setter ?? ''}`;
        if (decl.getter !== null) text += `, ${decl.getter}`;
      }
      out.push(pad + text);
      return;
    }
    case 'ConstDecl': {
      const hint = decl.typeHint !== null ? `: ${decl.typeHint}` : '';
      const assign = decl.infer ? ':=' : '=';
      out.push(`${pad}Const ${decl.name}${hint} ${assign} ${formatExpr(decl.value)}`);
      return;
    }
    case 'ExtendsDecl':
      out.push(`${pad}Extends ${decl.quoted ? `"${decl.target}"` : decl.target}`);
      return;
    case 'ClassNameDecl':
      out.push(`${pad}ClassName ${decl.name}`);
      return;
    case 'EnumDecl': {
      const variants = decl.variants
        .map((v) => (v.value === null ? v.name : `${v.name} = ${formatExpr(v.value)}`))
        .join(', ');
      const name = decl.name === null ? '' : ` ${decl.name}`;
      out.push(`${pad}Enum${name} { ${variants} }`);
      return;
    }
    case 'SignalDecl': {
      const params = decl.params.length > 0 ? `(${decl.params.join(', ')})` : '';
      out.push(`${pad}Signal ${decl.name}${params}`);
      return;
    }
    case 'FunctionDecl': {
      const modifier = decl.modifier ? `${decl.modifier} ` : '';
      const returns = decl.returnType !== null ? ` -> ${decl.returnType}` : '';
      out.push(
        `${pad}Func ${modifier}${decl.name}(${decl.args.map(formatArg).join(', ')})${returns}`
      );
      formatLines(decl.body, depth + 1, out);
      return;
    }
    case 'ClassDecl': {
      const base = decl.extendsTarget !== null ? ` extends ${decl.extendsTarget}` : '';
      out.push(`${pad}Class ${decl.name}${base}`);
      formatLines(decl.body, depth + 1, out);
      return;
    }
  }
}

function formatCondition(
  keyword: string,
  condition: ConditionNode,
  depth: number,
  out: string[]
): void {
  out.push(`${'  '.repeat(depth)}${keyword} ${formatExpr(condition.expr)}`);
  formatLines(condition.block, depth + 1, out);
}

function formatStmt(stmt: Stmt, depth: number, out: string[]): void {
  const pad = '  '.repeat(depth);

  switch (stmt.type) {
    case 'IfStmt':
      formatCondition('If', stmt.ifBranch, depth, out);
      for (const branch of stmt.elifBranches) {
        formatCondition('Elif', branch, depth, out);
      }
      if (stmt.elseBranch) {
        out.push(`${pad}Else`);
        formatLines(stmt.elseBranch, depth + 1, out);
      }
      return;
    case 'WhileStmt':
      formatCondition('While', stmt.condition, depth, out);
      return;
    case 'ForStmt':
      formatCondition('For', stmt.condition, depth, out);
      return;
    case 'MatchStmt':
      out.push(`${pad}Match ${formatExpr(stmt.expr)}`);
      for (const matchCase of stmt.cases) {
        formatCondition('Case', matchCase, depth + 1, out);
      }
      return;
    case 'AssignStmt':
      out.push(`${pad}Assign ${formatExpr(stmt.target)} ${stmt.op} ${formatExpr(stmt.value)}`);
      return;
    case 'ReturnStmt':
      out.push(stmt.value === null ? `${pad}Return` : `${pad}Return ${formatExpr(stmt.value)}`);
      return;
    case 'PassStmt':
      out.push(`${pad}Pass`);
      return;
  }
}

function formatLine(line: LineNode, depth: number, out: string[]): void {
  switch (line.type) {
    case 'DeclLine':
      formatDecl(line.decl, depth, out);
      return;
    case 'StmtLine':
      formatStmt(line.stmt, depth, out);
      return;
    case 'ExprLine':
      out.push(`${'  '.repeat(depth)}Expr ${formatExpr(line.expr)}`);
      return;
    case 'CommentLine':
      out.push(`${'  '.repeat(depth)}Comment ${line.text}`);
      return;
  }
}

/** Integer values are written as decimal strings */
function jsonValue(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function formatLines(block: BlockNode, depth: number, out: string[]): void {
  for (const line of block.lines) {
    formatLine(line, depth, out);
  }
}

/**
 * Render a parsed script: one line per line node, nested blocks indented
 * by two spaces, expressions as S-expressions. `json` gives the tree as
 * JSON including line spans.
 *
 * @example
 * formatTree(parse('if a:\n    pass\n'))
 * // "If a\n  Pass"
 */
export function formatTree(block: BlockNode, format: OutputFormat = 'debug'): string {
  if (format === 'json') return JSON.stringify(block, jsonValue, 2);
  const out: string[] = [];
  formatLines(block, 0, out);
  return out.join('\n');
}

// ============================================================
// REPORTS AND ERRORS
// ============================================================

/** Directory-mode line: `path:OK` or `path:ERROR: detail` */
export function formatReport(
  report:
    | { readonly path: string; readonly status: 'OK' }
    | { readonly path: string; readonly status: 'ERROR'; readonly detail: string }
): string {
  if (report.status === 'OK') return `${report.path}:OK`;
  return `${report.path}:ERROR: ${report.detail}`;
}

/**
 * Format error for stderr output
 *
 * Parse failures are followed by the grammar rules that were active,
 * innermost first.
 */
export function formatError(err: unknown): string {
  if (err instanceof FileParseError) {
    if (!err.parseError) return err.message;
    const frames = err.parseError.detail().split('\n').slice(1);
    return [err.message, ...frames].join('\n');
  }

  if (err instanceof ParseError) {
    return err.detail();
  }

  if (err instanceof ScriptError) {
    return err.message;
  }

  if (err instanceof Error) {
    return err.message;
  }

  return String(err);
}

/**
 * Render full error documentation for --explain command.
 *
 * @param errorId - Error identifier (format: GDS-{category}{3-digit})
 * @returns Formatted documentation string, or null if errorId is invalid/unknown
 *
 * @example
 * explainError("GDS-P002")
 * // Returns: formatted documentation with cause, resolution, examples
 */
export function explainError(errorId: string): string | null {
  const errorIdPattern = /^GDS-[LPFI]\d{3}$/;
  if (!errorIdPattern.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];

  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push('');

  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push('');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
