/**
 * Parser Extension: Statement Parsing
 * Conditionals, loops, match, assignment, return and pass
 */

import { Parser } from './parser.js';
import type {
  AssignStmtNode,
  BlockNode,
  ConditionNode,
  ForStmtNode,
  IfStmtNode,
  MatchStmtNode,
  PassStmtNode,
  ReturnStmtNode,
  Stmt,
  WhileStmtNode,
} from '../ast-nodes.js';
import {
  isAtLineEnd,
  mark,
  peek,
  readKeyword,
  reset,
  sameIndent,
  skipSpaces,
} from '../lexer/index.js';
import { ASSIGN_OPERATORS, readOperator } from './helpers.js';
import {
  choice,
  expect,
  expectKeyword,
  expected,
  withContext,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseStmt(indent: number): Stmt;
    parseIfStmt(indent: number): IfStmtNode;
    parseElifBranch(indent: number): ConditionNode | null;
    parseElseBranch(indent: number): BlockNode | null;
    parseWhileStmt(indent: number): WhileStmtNode;
    parseForStmt(indent: number): ForStmtNode;
    parseMatchStmt(indent: number): MatchStmtNode;
    parseAssignStmt(): AssignStmtNode;
    parseReturnStmt(): ReturnStmtNode;
    parsePass(): PassStmtNode;
    parseCondition(indent: number): ConditionNode;
  }
}

// ============================================================
// DISPATCH
// ============================================================

Parser.prototype.parseStmt = function (this: Parser, indent: number): Stmt {
  return withContext(this.state, 'stmt', () =>
    choice<Stmt>(this.state, [
      () => this.parseIfStmt(indent),
      () => this.parseWhileStmt(indent),
      () => this.parseForStmt(indent),
      () => this.parseMatchStmt(indent),
      () => this.parseReturnStmt(),
      () => this.parseAssignStmt(),
      () => this.parsePass(),
    ])
  );
};

// ============================================================
// CONDITIONALS
// ============================================================

Parser.prototype.parseIfStmt = function (
  this: Parser,
  indent: number
): IfStmtNode {
  return withContext(this.state, 'if_stmt', () => {
    expectKeyword(this.state, 'if');
    const ifBranch = this.parseCondition(indent);

    const elifBranches: ConditionNode[] = [];
    for (;;) {
      const branch = this.parseElifBranch(indent);
      if (!branch) break;
      elifBranches.push(branch);
    }

    return {
      type: 'IfStmt',
      ifBranch,
      elifBranches,
      elseBranch: this.parseElseBranch(indent),
    };
  });
};

/**
 * Position the cursor after `indent` spaces on the next code line when that
 * line starts with `keyword`. Otherwise leave the cursor where it was.
 */
function seekContinuation(
  parser: Parser,
  indent: number,
  keyword: string
): boolean {
  const cursor = parser.state.cursor;
  const saved = mark(cursor);

  parser.skipEmptyLines();
  if (sameIndent(cursor, indent)) {
    const afterIndent = mark(cursor);
    if (readKeyword(cursor, keyword)) {
      reset(cursor, afterIndent);
      return true;
    }
  }

  reset(cursor, saved);
  return false;
}

/** `elif cond:` at the same indentation as its `if` */
Parser.prototype.parseElifBranch = function (
  this: Parser,
  indent: number
): ConditionNode | null {
  if (!seekContinuation(this, indent, 'elif')) return null;

  return withContext(this.state, 'elif_stmt', () => {
    expectKeyword(this.state, 'elif');
    return this.parseCondition(indent);
  });
};

Parser.prototype.parseElseBranch = function (
  this: Parser,
  indent: number
): BlockNode | null {
  if (!seekContinuation(this, indent, 'else')) return null;

  return withContext(this.state, 'else_stmt', () => {
    expectKeyword(this.state, 'else');
    skipSpaces(this.state.cursor);
    expect(this.state, ':');
    return this.parseIndentedBlock(indent);
  });
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhileStmt = function (
  this: Parser,
  indent: number
): WhileStmtNode {
  return withContext(this.state, 'while_stmt', () => {
    expectKeyword(this.state, 'while');
    return { type: 'WhileStmt', condition: this.parseCondition(indent) };
  });
};

/** The loop variable and iterable parse as one `In` expression */
Parser.prototype.parseForStmt = function (
  this: Parser,
  indent: number
): ForStmtNode {
  return withContext(this.state, 'for_stmt', () => {
    expectKeyword(this.state, 'for');
    return { type: 'ForStmt', condition: this.parseCondition(indent) };
  });
};

// ============================================================
// MATCH
// ============================================================

/**
 * `match expr:` followed by cases indented deeper than the `match`. Each
 * case is a pattern expression and an indented block.
 */
Parser.prototype.parseMatchStmt = function (
  this: Parser,
  indent: number
): MatchStmtNode {
  return withContext(this.state, 'match_stmt', () => {
    const cursor = this.state.cursor;
    expectKeyword(this.state, 'match');
    skipSpaces(cursor);
    const expr = this.parseExpr();
    skipSpaces(cursor);
    expect(this.state, ':');

    const caseIndent = this.parseBlockOpening(indent);
    const cases: ConditionNode[] = [];
    while (this.seekLine(caseIndent)) {
      cases.push(
        withContext(this.state, 'match_case_stmt', () =>
          this.parseCondition(caseIndent)
        )
      );
    }
    if (cases.length === 0) return expected(this.state, 'match case');

    return { type: 'MatchStmt', expr, cases };
  });
};

// ============================================================
// SIMPLE STATEMENTS
// ============================================================

/** Target is an attribute-or-index expression */
Parser.prototype.parseAssignStmt = function (this: Parser): AssignStmtNode {
  return withContext(this.state, 'assign_stmt', () => {
    const cursor = this.state.cursor;
    const target = this.parsePostfixExpr();
    skipSpaces(cursor);
    const op = readOperator(cursor, ASSIGN_OPERATORS);
    if (op === null) return expected(this.state, 'assignment operator');
    skipSpaces(cursor);
    return { type: 'AssignStmt', target, op, value: this.parseExpr() };
  });
};

/** `return expr`, or a bare `return` */
Parser.prototype.parseReturnStmt = function (this: Parser): ReturnStmtNode {
  return withContext(this.state, 'return_stmt', () => {
    const cursor = this.state.cursor;
    expectKeyword(this.state, 'return');
    skipSpaces(cursor);

    const next = peek(cursor);
    if (isAtLineEnd(cursor) || next === '#' || next === ';') {
      return { type: 'ReturnStmt', value: null };
    }
    return { type: 'ReturnStmt', value: this.parseExpr() };
  });
};

Parser.prototype.parsePass = function (this: Parser): PassStmtNode {
  return withContext(this.state, 'pass', () => {
    expectKeyword(this.state, 'pass');
    return { type: 'PassStmt' };
  });
};

// ============================================================
// CONDITION
// ============================================================

/** `expr:` then a block indented deeper than `indent` */
Parser.prototype.parseCondition = function (
  this: Parser,
  indent: number
): ConditionNode {
  return withContext(this.state, 'condition', () => {
    const cursor = this.state.cursor;
    skipSpaces(cursor);
    const expr = this.parseExpr();
    skipSpaces(cursor);
    expect(this.state, ':');
    return { type: 'Condition', expr, block: this.parseIndentedBlock(indent) };
  });
};
