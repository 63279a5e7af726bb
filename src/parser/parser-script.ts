/**
 * Parser Extension: Script Structure
 * Files, indentation-delimited blocks and lines
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  CommentLineNode,
  LineNode,
} from '../ast-nodes.js';
import {
  consumeLineEnd,
  isAtEnd,
  isAtLineEnd,
  isBlankLine,
  isCommentLine,
  isLineEnd,
  mark,
  moreIndent,
  peek,
  readComment,
  reset,
  sameIndent,
  scanIndentation,
  skipLine,
  skipSpaces,
} from '../lexer/index.js';
import type { SourceLocation } from '../source-location.js';
import {
  attempt,
  check,
  choice,
  consume,
  expected,
  fail,
  location,
  makeSpan,
  note,
  withContext,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFile(): BlockNode;
    parseBlock(level: number, required: boolean): BlockNode;
    parseIndentedBlock(parent: number): BlockNode;
    parseBlockOpening(parent: number): number;
    parseLine(indent: number): LineNode[];
    parseLineItem(indent: number): LineNode;
    parseCommentLine(): CommentLineNode;
    skipEmptyLines(): void;
    seekLine(level: number): boolean;
  }
}

const TABS_HINT = 'Hint: Tabs do not count as indentation';

/** Location of the first character after `width` leading spaces */
function afterIndentation(parser: Parser, width: number): SourceLocation {
  const at = location(parser.state);
  return {
    line: at.line,
    column: at.column + width,
    offset: at.offset + width,
  };
}

function indentationHint(parser: Parser, width: number): string | undefined {
  return peek(parser.state.cursor, width) === '\t' ? TABS_HINT : undefined;
}

// ============================================================
// FILE
// ============================================================

/**
 * Parse a block at indentation 0 that must reach the end of input, apart
 * from trailing blank and comment lines.
 */
Parser.prototype.parseFile = function (this: Parser): BlockNode {
  return withContext(this.state, 'file', () => {
    const cursor = this.state.cursor;
    const block = this.parseBlock(0, false);

    const end = mark(cursor);
    this.skipEmptyLines();
    if (isAtEnd(cursor)) return block;
    reset(cursor, end);

    const furthest = this.state.furthest;
    if (furthest && furthest.location.offset >= cursor.pos) {
      throw furthest;
    }

    this.skipEmptyLines();
    let rest = '';
    for (let i = 0; i < 30 && !isLineEnd(peek(cursor, i)); i++) {
      rest += peek(cursor, i);
    }
    return fail(this.state, 'GDS-P003', { found: `'${rest}'` });
  });
};

// ============================================================
// BLOCKS
// ============================================================

/**
 * Collect lines indented by exactly `level` spaces, starting at the start of
 * a line.
 *
 * Blank lines and comment lines at other indentations are skipped. The
 * block ends at the first code line with a different indentation or one
 * that does not parse; the cursor is then left at the end of the last line
 * taken. When `required` is set the first code line must parse.
 */
Parser.prototype.parseBlock = function (
  this: Parser,
  level: number,
  required: boolean
): BlockNode {
  return withContext(this.state, 'block', () => {
    const cursor = this.state.cursor;
    const lines: LineNode[] = [];
    let end = mark(cursor);
    let sawCode = false;

    for (;;) {
      if (isAtEnd(cursor)) break;
      if (isBlankLine(cursor)) {
        skipLine(cursor);
        continue;
      }

      const width = scanIndentation(cursor);
      if (isCommentLine(cursor)) {
        if (width !== level) {
          skipLine(cursor);
          continue;
        }
        lines.push(this.parseCommentLine());
        end = mark(cursor);
        consumeLineEnd(cursor);
        continue;
      }

      if (width !== level) {
        note(
          this.state,
          'GDS-P002',
          { relation: 'of', expected: level, found: width },
          afterIndentation(this, width),
          indentationHint(this, width)
        );
        break;
      }

      sameIndent(cursor, level);
      const parsed =
        required && !sawCode
          ? this.parseLine(level)
          : attempt(this.state, () => this.parseLine(level));
      if (parsed === null) break;

      lines.push(...parsed);
      sawCode = true;
      end = mark(cursor);
      consumeLineEnd(cursor);
    }

    reset(cursor, end);
    return { type: 'Block', lines };
  });
};

/**
 * After a header's `:`, a block indented deeper than `parent`.
 */
Parser.prototype.parseIndentedBlock = function (
  this: Parser,
  parent: number
): BlockNode {
  return withContext(this.state, 'indented_block', () => {
    const level = this.parseBlockOpening(parent);
    return this.parseBlock(level, true);
  });
};

/**
 * Finish a header line (optional trailing comment, line break) and measure
 * the indentation of the next code line, which must exceed `parent`.
 * Leaves the cursor at the start of the line after the header.
 */
Parser.prototype.parseBlockOpening = function (
  this: Parser,
  parent: number
): number {
  const cursor = this.state.cursor;
  skipSpaces(cursor);
  readComment(cursor);
  if (!isAtLineEnd(cursor)) return expected(this.state, 'newline');
  consumeLineEnd(cursor);

  const bodyStart = mark(cursor);
  while (!isAtEnd(cursor) && (isBlankLine(cursor) || isCommentLine(cursor))) {
    skipLine(cursor);
  }
  if (isAtEnd(cursor)) return expected(this.state, 'indented block');

  const width = moreIndent(cursor, parent);
  if (width === null) {
    const found = scanIndentation(cursor);
    return fail(
      this.state,
      'GDS-P002',
      { relation: 'greater than', expected: parent, found },
      afterIndentation(this, found),
      indentationHint(this, found)
    );
  }

  reset(cursor, bodyStart);
  return width;
};

// ============================================================
// LINES
// ============================================================

/**
 * One source line after its indentation: one or more `;`-separated items
 * and an optional trailing comment, which is dropped.
 */
Parser.prototype.parseLine = function (
  this: Parser,
  indent: number
): LineNode[] {
  return withContext(this.state, 'line', () => {
    const cursor = this.state.cursor;
    const lines: LineNode[] = [this.parseLineItem(indent)];

    for (;;) {
      skipSpaces(cursor);
      readComment(cursor);
      if (isAtLineEnd(cursor)) return lines;
      if (!consume(this.state, ';')) return expected(this.state, 'end of line');

      skipSpaces(cursor);
      if (isAtLineEnd(cursor) || check(this.state, '#')) continue;
      lines.push(this.parseLineItem(indent));
    }
  });
};

/** Declaration, then statement, then bare expression */
Parser.prototype.parseLineItem = function (
  this: Parser,
  indent: number
): LineNode {
  const start = location(this.state);

  return choice<LineNode>(this.state, [
    () => {
      const decl = this.parseDecl(indent);
      return { type: 'DeclLine', decl, span: makeSpan(start, location(this.state)) };
    },
    () => {
      const stmt = this.parseStmt(indent);
      return { type: 'StmtLine', stmt, span: makeSpan(start, location(this.state)) };
    },
    () => {
      const expr = this.parseExpr();
      return { type: 'ExprLine', expr, span: makeSpan(start, location(this.state)) };
    },
  ]);
};

/** Whole-line comment; the cursor is at the start of the line */
Parser.prototype.parseCommentLine = function (this: Parser): CommentLineNode {
  const cursor = this.state.cursor;
  skipSpaces(cursor);
  const start = location(this.state);
  const text = readComment(cursor) ?? '';
  return {
    type: 'CommentLine',
    text,
    span: makeSpan(start, location(this.state)),
  };
};

// ============================================================
// LINE NAVIGATION
// ============================================================

/** Consume a pending line break, then any blank or comment-only lines */
Parser.prototype.skipEmptyLines = function (this: Parser): void {
  const cursor = this.state.cursor;
  consumeLineEnd(cursor);
  while (!isAtEnd(cursor) && (isBlankLine(cursor) || isCommentLine(cursor))) {
    skipLine(cursor);
  }
};

/**
 * Move past empty lines to the next code line and its indentation when that
 * line is indented by exactly `level`. Otherwise leave the cursor in place.
 */
Parser.prototype.seekLine = function (this: Parser, level: number): boolean {
  const cursor = this.state.cursor;
  const saved = mark(cursor);

  this.skipEmptyLines();
  if (!isAtEnd(cursor) && sameIndent(cursor, level)) return true;

  reset(cursor, saved);
  return false;
};
