/**
 * AST Node Types
 *
 * Nodes are discriminated by `type`. Text fields are copied out of the source
 * buffer; each Line records the span of source it was parsed from.
 */

import type { SourceSpan } from './source-location.js';

// ============================================================
// OPERATORS
// ============================================================

export type BinOp =
  | 'Add'
  | 'Sub'
  | 'Mul'
  | 'Div'
  | 'Mod'
  | 'BinAnd'
  | 'BinOr'
  | 'BinXor'
  | 'Attr'
  | 'Index'
  | 'And'
  | 'Or'
  | 'Eq'
  | 'Neq'
  | 'Lt'
  | 'Lte'
  | 'Gt'
  | 'Gte'
  | 'Is'
  | 'In'
  | 'As';

export type UnOp = 'Plus' | 'Minus' | 'Not';

export type AssignOp = '=' | '+=' | '-=' | '*=' | '/=' | '%=';

export type VarModifier = 'onready' | 'export';

export type FunctionModifier =
  | 'static'
  | 'remote'
  | 'master'
  | 'puppet'
  | 'remotesync'
  | 'mastersync'
  | 'puppetsync';

// ============================================================
// VALUES
// ============================================================

export interface NullNode {
  readonly type: 'Null';
}

export interface BooleanNode {
  readonly type: 'Boolean';
  readonly value: boolean;
}

export interface IntNode {
  readonly type: 'Int';
  readonly value: bigint;
  readonly raw: string;
}

export interface FloatNode {
  readonly type: 'Float';
  readonly value: number;
  readonly raw: string;
}

/** `value` is the body between the quotes with escapes left as written */
export interface StringNode {
  readonly type: 'String';
  readonly value: string;
  readonly quote: '"' | "'";
}

/** `path` includes the leading `$` */
export interface NodePathNode {
  readonly type: 'NodePath';
  readonly path: string;
}

export interface ArrayNode {
  readonly type: 'Array';
  readonly elements: Expr[];
}

export interface ObjectPair {
  readonly key: Expr;
  readonly value: Expr;
}

export interface ObjectNode {
  readonly type: 'Object';
  readonly pairs: ObjectPair[];
}

export interface IdentNode {
  readonly type: 'Ident';
  readonly name: string;
}

export interface FunctionCallNode {
  readonly type: 'FunctionCall';
  readonly name: string;
  readonly args: Expr[];
}

export type ValueNode =
  | NullNode
  | BooleanNode
  | IntNode
  | FloatNode
  | StringNode
  | NodePathNode
  | ArrayNode
  | ObjectNode
  | IdentNode
  | FunctionCallNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export interface BinaryExprNode {
  readonly type: 'BinaryExpr';
  readonly op: BinOp;
  readonly left: Expr;
  readonly right: Expr;
}

export interface UnaryExprNode {
  readonly type: 'UnaryExpr';
  readonly op: UnOp;
  readonly operand: Expr;
}

export type Expr = ValueNode | BinaryExprNode | UnaryExprNode;

// ============================================================
// DECLARATIONS
// ============================================================

export interface VarDeclNode {
  readonly type: 'VarDecl';
  readonly modifier: VarModifier | null;
  readonly name: string;
  /** Declared with `:=` */
  readonly infer: boolean;
  readonly typeHint: string | null;
  readonly value: Expr | null;
  readonly setter: string | null;
  readonly getter: string | null;
}

export interface ConstDeclNode {
  readonly type: 'ConstDecl';
  readonly name: string;
  readonly infer: boolean;
  readonly typeHint: string | null;
  readonly value: Expr;
}

export interface ExtendsDeclNode {
  readonly type: 'ExtendsDecl';
  readonly target: string;
  /** Target was a quoted resource path rather than a class name */
  readonly quoted: boolean;
}

export interface ClassNameDeclNode {
  readonly type: 'ClassNameDecl';
  readonly name: string;
}

export interface EnumVariant {
  readonly name: string;
  readonly value: Expr | null;
}

export interface EnumDeclNode {
  readonly type: 'EnumDecl';
  /** null for an anonymous enum */
  readonly name: string | null;
  readonly variants: EnumVariant[];
}

export interface SignalDeclNode {
  readonly type: 'SignalDecl';
  readonly name: string;
  readonly params: string[];
}

export interface FunctionArg {
  readonly name: string;
  readonly typeHint: string | null;
  readonly defaultValue: Expr | null;
}

export interface FunctionDeclNode {
  readonly type: 'FunctionDecl';
  readonly modifier: FunctionModifier | null;
  readonly name: string;
  readonly args: FunctionArg[];
  readonly returnType: string | null;
  readonly body: BlockNode;
}

export interface ClassDeclNode {
  readonly type: 'ClassDecl';
  readonly name: string;
  readonly extendsTarget: string | null;
  readonly body: BlockNode;
}

export type Decl =
  | VarDeclNode
  | ConstDeclNode
  | ExtendsDeclNode
  | ClassNameDeclNode
  | EnumDeclNode
  | SignalDeclNode
  | FunctionDeclNode
  | ClassDeclNode;

// ============================================================
// STATEMENTS
// ============================================================

/** Expression followed by an indented block: if/elif/while/for/match case */
export interface ConditionNode {
  readonly type: 'Condition';
  readonly expr: Expr;
  readonly block: BlockNode;
}

export interface IfStmtNode {
  readonly type: 'IfStmt';
  readonly ifBranch: ConditionNode;
  readonly elifBranches: ConditionNode[];
  readonly elseBranch: BlockNode | null;
}

export interface WhileStmtNode {
  readonly type: 'WhileStmt';
  readonly condition: ConditionNode;
}

/** `for x in xs:` stores `In(x, xs)` as the condition expression */
export interface ForStmtNode {
  readonly type: 'ForStmt';
  readonly condition: ConditionNode;
}

export interface MatchStmtNode {
  readonly type: 'MatchStmt';
  readonly expr: Expr;
  readonly cases: ConditionNode[];
}

export interface AssignStmtNode {
  readonly type: 'AssignStmt';
  readonly target: Expr;
  readonly op: AssignOp;
  readonly value: Expr;
}

export interface ReturnStmtNode {
  readonly type: 'ReturnStmt';
  readonly value: Expr | null;
}

export interface PassStmtNode {
  readonly type: 'PassStmt';
}

export type Stmt =
  | IfStmtNode
  | WhileStmtNode
  | ForStmtNode
  | MatchStmtNode
  | AssignStmtNode
  | ReturnStmtNode
  | PassStmtNode;

// ============================================================
// LINES AND BLOCKS
// ============================================================

export interface DeclLineNode {
  readonly type: 'DeclLine';
  readonly decl: Decl;
  readonly span: SourceSpan;
}

export interface StmtLineNode {
  readonly type: 'StmtLine';
  readonly stmt: Stmt;
  readonly span: SourceSpan;
}

export interface ExprLineNode {
  readonly type: 'ExprLine';
  readonly expr: Expr;
  readonly span: SourceSpan;
}

/** Whole-line comment; `text` is trimmed and excludes the `#` */
export interface CommentLineNode {
  readonly type: 'CommentLine';
  readonly text: string;
  readonly span: SourceSpan;
}

export type LineNode = DeclLineNode | StmtLineNode | ExprLineNode | CommentLineNode;

export interface BlockNode {
  readonly type: 'Block';
  readonly lines: LineNode[];
}

export type ASTNode =
  | Expr
  | Decl
  | Stmt
  | ConditionNode
  | LineNode
  | BlockNode;
