/**
 * Parser Extension: Function and Class Declarations
 */

import { Parser } from './parser.js';
import type {
  ClassDeclNode,
  FunctionArg,
  FunctionDeclNode,
} from '../ast-nodes.js';
import { mark, readKeyword, reset, skipSpaces } from '../lexer/index.js';
import { FUNCTION_MODIFIERS, readOneOf } from './helpers.js';
import {
  check,
  consume,
  expect,
  expectKeyword,
  gap,
  withContext,
  withNesting,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunctionDecl(indent: number): FunctionDeclNode;
    parseFunctionArgs(): FunctionArg[];
    parseFunctionArg(): FunctionArg;
    parseClassDecl(indent: number): ClassDeclNode;
  }
}

// ============================================================
// FUNCTIONS
// ============================================================

/**
 * `[modifier] func name(args) [-> Type]:` and an indented body.
 *
 * @example
 * static func clamp_speed(speed: float, limit = 10.0) -> float:
 */
Parser.prototype.parseFunctionDecl = function (
  this: Parser,
  indent: number
): FunctionDeclNode {
  return withContext(this.state, 'function_decl', () => {
    const cursor = this.state.cursor;
    const modifier = readOneOf(cursor, FUNCTION_MODIFIERS);
    skipSpaces(cursor);
    expectKeyword(this.state, 'func');
    skipSpaces(cursor);
    const name = this.parseName();
    skipSpaces(cursor);
    const args = this.parseFunctionArgs();
    skipSpaces(cursor);

    let returnType: string | null = null;
    if (consume(this.state, '->')) {
      skipSpaces(cursor);
      returnType = this.parseTypeHint();
      skipSpaces(cursor);
    }
    expect(this.state, ':');

    return {
      type: 'FunctionDecl',
      modifier,
      name,
      args,
      returnType,
      body: this.parseIndentedBlock(indent),
    };
  });
};

Parser.prototype.parseFunctionArgs = function (this: Parser): FunctionArg[] {
  expect(this.state, '(');

  return withNesting(this.state, () => {
    const args: FunctionArg[] = [];
    gap(this.state);
    if (consume(this.state, ')')) return args;

    for (;;) {
      args.push(this.parseFunctionArg());
      gap(this.state);
      if (!consume(this.state, ',')) break;
      gap(this.state);
    }
    expect(this.state, ')');
    return args;
  });
};

/** `name [: Type] [= default]` */
Parser.prototype.parseFunctionArg = function (this: Parser): FunctionArg {
  return withContext(this.state, 'function_arg', () => {
    const name = this.parseName();
    let typeHint: string | null = null;

    const beforeType = mark(this.state.cursor);
    gap(this.state);
    if (check(this.state, ':') && !check(this.state, ':=')) {
      expect(this.state, ':');
      gap(this.state);
      typeHint = this.parseTypeHint();
    } else {
      reset(this.state.cursor, beforeType);
    }

    return { name, typeHint, defaultValue: this.parseInitializer() };
  });
};

// ============================================================
// INNER CLASSES
// ============================================================

/** `class Name [extends Base]:` and an indented body */
Parser.prototype.parseClassDecl = function (
  this: Parser,
  indent: number
): ClassDeclNode {
  return withContext(this.state, 'class_decl', () => {
    const cursor = this.state.cursor;
    expectKeyword(this.state, 'class');
    skipSpaces(cursor);
    const name = this.parseName();
    skipSpaces(cursor);

    let extendsTarget: string | null = null;
    if (readKeyword(cursor, 'extends')) {
      skipSpaces(cursor);
      extendsTarget = this.parseTypeHint();
      skipSpaces(cursor);
    }
    expect(this.state, ':');

    return {
      type: 'ClassDecl',
      name,
      extendsTarget,
      body: this.parseIndentedBlock(indent),
    };
  });
};
