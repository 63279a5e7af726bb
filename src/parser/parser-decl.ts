/**
 * Parser Extension: Declaration Parsing
 * var, const, extends, class_name, signal and enum
 */

import { Parser } from './parser.js';
import type {
  ClassNameDeclNode,
  ConstDeclNode,
  Decl,
  EnumDeclNode,
  EnumVariant,
  Expr,
  ExtendsDeclNode,
  SignalDeclNode,
  VarDeclNode,
} from '../ast-nodes.js';
import {
  mark,
  readDottedIdentifier,
  readIdentifier,
  readKeyword,
  readString,
  reset,
  skipSpaces,
} from '../lexer/index.js';
import { readOneOf, VAR_MODIFIERS } from './helpers.js';
import {
  check,
  choice,
  consume,
  expect,
  expectKeyword,
  expected,
  gap,
  lex,
  withContext,
  withNesting,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseDecl(indent: number): Decl;
    parseVarDecl(): VarDeclNode;
    parseConstDecl(): ConstDeclNode;
    parseExtendsDecl(): ExtendsDeclNode;
    parseClassNameDecl(): ClassNameDeclNode;
    parseSignalDecl(): SignalDeclNode;
    parseEnumDecl(): EnumDeclNode;
    parseEnumVariant(): EnumVariant;
    parseName(): string;
    parseTypeHint(): string;
    parseInitializer(): Expr | null;
  }
}

// ============================================================
// DISPATCH
// ============================================================

Parser.prototype.parseDecl = function (this: Parser, indent: number): Decl {
  return withContext(this.state, 'decl', () =>
    choice<Decl>(this.state, [
      () => this.parseClassNameDecl(),
      () => this.parseExtendsDecl(),
      () => this.parseSignalDecl(),
      () => this.parseEnumDecl(),
      () => this.parseClassDecl(indent),
      () => this.parseFunctionDecl(indent),
      () => this.parseConstDecl(),
      () => this.parseVarDecl(),
    ])
  );
};

// ============================================================
// SHARED PIECES
// ============================================================

Parser.prototype.parseName = function (this: Parser): string {
  const name = readIdentifier(this.state.cursor);
  if (name === null) return expected(this.state, 'identifier');
  return name;
};

/** Dotted type name after `:` or `->` */
Parser.prototype.parseTypeHint = function (this: Parser): string {
  const hint = readDottedIdentifier(this.state.cursor);
  if (hint === null) return expected(this.state, 'type name');
  return hint;
};

/** `= expr` when present; `==` is not an initializer */
Parser.prototype.parseInitializer = function (this: Parser): Expr | null {
  const cursor = this.state.cursor;
  const saved = mark(cursor);
  skipSpaces(cursor);
  if (!check(this.state, '=') || check(this.state, '==')) {
    reset(cursor, saved);
    return null;
  }
  expect(this.state, '=');
  skipSpaces(cursor);
  return this.parseExpr();
};

// ============================================================
// VARIABLES AND CONSTANTS
// ============================================================

/**
 * `[onready|export] var name [: Type | :=] [= expr] [setget setter[, getter]]`
 */
Parser.prototype.parseVarDecl = function (this: Parser): VarDeclNode {
  return withContext(this.state, 'var_decl', () => {
    const cursor = this.state.cursor;
    const modifier = readOneOf(cursor, VAR_MODIFIERS);
    skipSpaces(cursor);
    expectKeyword(this.state, 'var');
    skipSpaces(cursor);
    const name = this.parseName();

    let infer = false;
    let typeHint: string | null = null;
    let value: Expr | null;

    skipSpaces(cursor);
    if (consume(this.state, ':=')) {
      infer = true;
      skipSpaces(cursor);
      value = this.parseExpr();
    } else {
      if (consume(this.state, ':')) {
        skipSpaces(cursor);
        typeHint = this.parseTypeHint();
      }
      value = this.parseInitializer();
    }

    let setter: string | null = null;
    let getter: string | null = null;
    const beforeSetget = mark(cursor);
    skipSpaces(cursor);
    if (readKeyword(cursor, 'setget')) {
      skipSpaces(cursor);
      if (!check(this.state, ',')) {
        setter = this.parseName();
        skipSpaces(cursor);
      }
      if (consume(this.state, ',')) {
        skipSpaces(cursor);
        getter = this.parseName();
      }
    } else {
      reset(cursor, beforeSetget);
    }

    return {
      type: 'VarDecl',
      modifier,
      name,
      infer,
      typeHint,
      value,
      setter,
      getter,
    };
  });
};

/** `const name [: Type | :=] = expr`; the initializer is required */
Parser.prototype.parseConstDecl = function (this: Parser): ConstDeclNode {
  return withContext(this.state, 'const_decl', () => {
    const cursor = this.state.cursor;
    expectKeyword(this.state, 'const');
    skipSpaces(cursor);
    const name = this.parseName();
    skipSpaces(cursor);

    if (consume(this.state, ':=')) {
      skipSpaces(cursor);
      return {
        type: 'ConstDecl',
        name,
        infer: true,
        typeHint: null,
        value: this.parseExpr(),
      };
    }

    let typeHint: string | null = null;
    if (consume(this.state, ':')) {
      skipSpaces(cursor);
      typeHint = this.parseTypeHint();
    }
    const value = this.parseInitializer();
    if (value === null) return expected(this.state, "'='");

    return { type: 'ConstDecl', name, infer: false, typeHint, value };
  });
};

// ============================================================
// SCRIPT HEADER
// ============================================================

/** `extends "res://path.gd"` or `extends ClassName` */
Parser.prototype.parseExtendsDecl = function (this: Parser): ExtendsDeclNode {
  return withContext(this.state, 'extends_decl', () => {
    expectKeyword(this.state, 'extends');
    skipSpaces(this.state.cursor);

    const path = lex(this.state, readString);
    if (path) return { type: 'ExtendsDecl', target: path.value, quoted: true };

    return { type: 'ExtendsDecl', target: this.parseName(), quoted: false };
  });
};

Parser.prototype.parseClassNameDecl = function (
  this: Parser
): ClassNameDeclNode {
  return withContext(this.state, 'classname_decl', () => {
    expectKeyword(this.state, 'class_name');
    skipSpaces(this.state.cursor);
    return { type: 'ClassNameDecl', name: this.parseName() };
  });
};

// ============================================================
// SIGNALS AND ENUMS
// ============================================================

/** `signal name` or `signal name(a, b)` */
Parser.prototype.parseSignalDecl = function (this: Parser): SignalDeclNode {
  return withContext(this.state, 'signal_decl', () => {
    const cursor = this.state.cursor;
    expectKeyword(this.state, 'signal');
    skipSpaces(cursor);
    const name = this.parseName();

    const beforeParams = mark(cursor);
    skipSpaces(cursor);
    if (!consume(this.state, '(')) {
      reset(cursor, beforeParams);
      return { type: 'SignalDecl', name, params: [] };
    }

    const params = withNesting(this.state, () => {
      const items: string[] = [];
      gap(this.state);
      if (consume(this.state, ')')) return items;
      for (;;) {
        items.push(this.parseName());
        gap(this.state);
        if (!consume(this.state, ',')) break;
        gap(this.state);
      }
      expect(this.state, ')');
      return items;
    });

    return { type: 'SignalDecl', name, params };
  });
};

/** `enum [Name] { A, B = expr, }` */
Parser.prototype.parseEnumDecl = function (this: Parser): EnumDeclNode {
  return withContext(this.state, 'enum_decl', () => {
    const cursor = this.state.cursor;
    expectKeyword(this.state, 'enum');
    skipSpaces(cursor);
    const name = check(this.state, '{') ? null : this.parseName();
    skipSpaces(cursor);
    expect(this.state, '{');

    const variants = withNesting(this.state, () => {
      const items: EnumVariant[] = [this.parseEnumVariant()];
      for (;;) {
        gap(this.state);
        if (!consume(this.state, ',')) break;
        gap(this.state);
        if (check(this.state, '}')) break;
        items.push(this.parseEnumVariant());
      }
      gap(this.state);
      expect(this.state, '}');
      return items;
    });

    return { type: 'EnumDecl', name, variants };
  });
};

Parser.prototype.parseEnumVariant = function (this: Parser): EnumVariant {
  return withContext(this.state, 'enum_variant', () => {
    gap(this.state);
    const name = this.parseName();
    gap(this.state);
    if (!check(this.state, '=') || check(this.state, '==')) {
      return { name, value: null };
    }
    expect(this.state, '=');
    gap(this.state);
    return { name, value: this.parseExpr() };
  });
};
