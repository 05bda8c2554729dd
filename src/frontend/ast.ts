/**
 * Frontend AST contracts for minicc.
 *
 * This module defines types only (no parsing/semantics). The typed tree produced by semantic
 * analysis lives in `semantics/typed.ts` and shares no nodes with this one.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the source text. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * Type names as written in source.
 */
export type TypeName = 'int' | 'float' | 'bool' | 'void';

/**
 * One compilation unit: top-level functions, global declarations and statements, in source order.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  items: TopLevelNode[];
}

export type TopLevelNode = FunctionDeclNode | StmtNode;

export interface ParamNode extends BaseNode {
  kind: 'Param';
  type: Exclude<TypeName, 'void'>;
  name: string;
}

export interface FunctionDeclNode extends BaseNode {
  kind: 'FunctionDecl';
  returnType: TypeName;
  name: string;
  params: ParamNode[];
  body: BlockNode;
}

export type StmtNode =
  | VarDeclNode
  | BlockNode
  | IfStmtNode
  | WhileStmtNode
  | ForStmtNode
  | ReturnStmtNode
  | PrintStmtNode
  | ExprStmtNode;

export interface VarDeclNode extends BaseNode {
  kind: 'VarDecl';
  type: Exclude<TypeName, 'void'>;
  name: string;
  initializer?: ExprNode;
}

export interface BlockNode extends BaseNode {
  kind: 'Block';
  statements: StmtNode[];
}

export interface IfStmtNode extends BaseNode {
  kind: 'IfStmt';
  condition: ExprNode;
  thenBranch: StmtNode;
  elseBranch?: StmtNode;
}

export interface WhileStmtNode extends BaseNode {
  kind: 'WhileStmt';
  condition: ExprNode;
  body: StmtNode;
}

/**
 * `for (init; condition; update) body`.
 *
 * Kept as its own variant; lowering normalizes it into a condition-tested loop.
 */
export interface ForStmtNode extends BaseNode {
  kind: 'ForStmt';
  init?: VarDeclNode | ExprStmtNode;
  /** Absent condition loops forever. */
  condition?: ExprNode;
  update?: ExprNode;
  body: StmtNode;
}

export interface ReturnStmtNode extends BaseNode {
  kind: 'ReturnStmt';
  value?: ExprNode;
}

export interface PrintStmtNode extends BaseNode {
  kind: 'PrintStmt';
  value: ExprNode;
}

export interface ExprStmtNode extends BaseNode {
  kind: 'ExprStmt';
  expr: ExprNode;
}

export type ExprNode =
  | AssignExprNode
  | BinaryExprNode
  | UnaryExprNode
  | CallExprNode
  | IdentifierNode
  | IntLiteralNode
  | FloatLiteralNode
  | BoolLiteralNode;

export type BinaryOperator =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type UnaryOperator = '-' | '!' | '+';

/**
 * `name = value`; right-associative, evaluates to the stored value.
 */
export interface AssignExprNode extends BaseNode {
  kind: 'AssignExpr';
  target: IdentifierNode;
  value: ExprNode;
}

export interface BinaryExprNode extends BaseNode {
  kind: 'BinaryExpr';
  op: BinaryOperator;
  left: ExprNode;
  right: ExprNode;
}

export interface UnaryExprNode extends BaseNode {
  kind: 'UnaryExpr';
  op: UnaryOperator;
  operand: ExprNode;
}

export interface CallExprNode extends BaseNode {
  kind: 'CallExpr';
  callee: string;
  args: ExprNode[];
}

export interface IdentifierNode extends BaseNode {
  kind: 'Identifier';
  name: string;
}

export interface IntLiteralNode extends BaseNode {
  kind: 'IntLiteral';
  value: number;
}

export interface FloatLiteralNode extends BaseNode {
  kind: 'FloatLiteral';
  value: number;
}

export interface BoolLiteralNode extends BaseNode {
  kind: 'BoolLiteral';
  value: boolean;
}
