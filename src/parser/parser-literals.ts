/**
 * Parser Extension: Literal Parsing
 * Keywords, numbers, strings, node paths, arrays, objects and calls
 */

import { Parser } from './parser.js';
import type {
  ArrayNode,
  Expr,
  FunctionCallNode,
  IdentNode,
  ObjectNode,
  ObjectPair,
  FloatNode,
  IntNode,
  NodePathNode,
  StringNode,
  ValueNode,
} from '../ast-nodes.js';
import {
  isDigit,
  isIdentifierStart,
  peek,
  readFloat,
  readIdentifier,
  readInt,
  readKeyword,
  readNodePath,
  readString,
} from '../lexer/index.js';
import {
  check,
  consume,
  expect,
  expected,
  gap,
  lex,
  withContext,
  withNesting,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseValue(): ValueNode;
    parseKeywordLiteral(): ValueNode | null;
    parseNumber(): IntNode | FloatNode;
    parseStringLiteral(): StringNode;
    parseNodePath(): NodePathNode;
    parseArray(): ArrayNode;
    parseObject(): ObjectNode;
    parsePair(): ObjectPair;
    parseIdentOrCall(): IdentNode | FunctionCallNode;
    parseCallArgs(): Expr[];
  }
}

// ============================================================
// VALUE DISPATCH
// ============================================================

Parser.prototype.parseValue = function (this: Parser): ValueNode {
  return withContext(this.state, 'value', () => {
    const ch = peek(this.state.cursor);

    if (ch === '[') return this.parseArray();
    if (ch === '{') return this.parseObject();
    if (ch === '$') return this.parseNodePath();
    if (ch === '"' || ch === "'") return this.parseStringLiteral();
    if (isDigit(ch)) return this.parseNumber();
    if (isIdentifierStart(ch)) {
      return this.parseKeywordLiteral() ?? this.parseIdentOrCall();
    }

    return expected(this.state, 'expression');
  });
};

/** `null`, `true`, `false`, `True`, `False` as whole words */
Parser.prototype.parseKeywordLiteral = function (
  this: Parser
): ValueNode | null {
  const cursor = this.state.cursor;
  if (readKeyword(cursor, 'null')) return { type: 'Null' };
  if (readKeyword(cursor, 'true') || readKeyword(cursor, 'True')) {
    return { type: 'Boolean', value: true };
  }
  if (readKeyword(cursor, 'false') || readKeyword(cursor, 'False')) {
    return { type: 'Boolean', value: false };
  }
  return null;
};

// ============================================================
// SCALARS
// ============================================================

Parser.prototype.parseNumber = function (this: Parser): IntNode | FloatNode {
  const float = lex(this.state, readFloat);
  if (float) return { type: 'Float', value: float.value, raw: float.raw };

  const int = withContext(this.state, 'int', () => lex(this.state, readInt));
  if (int) return { type: 'Int', value: int.value, raw: int.raw };

  return expected(this.state, 'number');
};

Parser.prototype.parseStringLiteral = function (this: Parser): StringNode {
  return withContext(this.state, 'string', () => {
    const literal = lex(this.state, readString);
    if (!literal) return expected(this.state, 'string');
    return { type: 'String', value: literal.value, quote: literal.quote };
  });
};

Parser.prototype.parseNodePath = function (this: Parser): NodePathNode {
  return withContext(this.state, 'node_path', () => {
    const path = lex(this.state, readNodePath);
    if (path === null) return expected(this.state, 'node path');
    return { type: 'NodePath', path };
  });
};

// ============================================================
// COLLECTIONS
// ============================================================

/** `[a, b, ]`; elements may be separated by line breaks and comments */
Parser.prototype.parseArray = function (this: Parser): ArrayNode {
  return withContext(this.state, 'array', () => {
    expect(this.state, '[');

    const elements = withNesting(this.state, () => {
      const items: Expr[] = [];
      gap(this.state);
      while (!consume(this.state, ']')) {
        items.push(this.parseExpr());
        gap(this.state);
        if (consume(this.state, ',')) {
          gap(this.state);
          continue;
        }
        expect(this.state, ']');
        break;
      }
      return items;
    });

    return { type: 'Array', elements };
  });
};

/** `{key: value, }` */
Parser.prototype.parseObject = function (this: Parser): ObjectNode {
  return withContext(this.state, 'object', () => {
    expect(this.state, '{');

    const pairs = withNesting(this.state, () => {
      const items: ObjectPair[] = [];
      gap(this.state);
      while (!consume(this.state, '}')) {
        items.push(this.parsePair());
        gap(this.state);
        if (consume(this.state, ',')) {
          gap(this.state);
          continue;
        }
        expect(this.state, '}');
        break;
      }
      return items;
    });

    return { type: 'Object', pairs };
  });
};

Parser.prototype.parsePair = function (this: Parser): ObjectPair {
  return withContext(this.state, 'pair', () => {
    const key = this.parseExpr();
    gap(this.state);
    expect(this.state, ':');
    gap(this.state);
    const value = this.parseExpr();
    return { key, value };
  });
};

// ============================================================
// IDENTIFIERS AND CALLS
// ============================================================

/** A call needs `(` directly after the name */
Parser.prototype.parseIdentOrCall = function (
  this: Parser
): IdentNode | FunctionCallNode {
  const name = readIdentifier(this.state.cursor);
  if (name === null) return expected(this.state, 'identifier');

  if (!check(this.state, '(')) return { type: 'Ident', name };

  return withContext(this.state, 'function_call', () => ({
    type: 'FunctionCall',
    name,
    args: this.parseCallArgs(),
  }));
};

/** `(a, b)`; no trailing comma */
Parser.prototype.parseCallArgs = function (this: Parser): Expr[] {
  expect(this.state, '(');

  return withNesting(this.state, () => {
    const args: Expr[] = [];
    gap(this.state);
    if (consume(this.state, ')')) return args;

    for (;;) {
      args.push(this.parseExpr());
      gap(this.state);
      if (!consume(this.state, ',')) break;
      gap(this.state);
    }
    expect(this.state, ')');
    return args;
  });
};
