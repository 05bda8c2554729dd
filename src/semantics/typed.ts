import type { BinaryOperator, SourceSpan, UnaryOperator } from '../frontend/ast.js';
import type { Storage } from './symbols.js';
import type { ScalarType, ValueType } from './types.js';
import type { Value } from '../vm/value.js';

/**
 * Typed AST produced by semantic analysis.
 *
 * Built fresh from the parser's tree: no node is shared between the two. Every expression carries
 * its resolved type, implicit int -> float conversions are explicit `Widen` nodes and every
 * variable reference carries its resolved storage.
 */
export interface TypedProgram {
  kind: 'Program';
  span: SourceSpan;
  globals: TypedGlobal[];
  functions: TypedFunction[];
  /** Top-level statements in source order (global initializers included). */
  main: TypedStmt[];
  /** Frame slots used by top-level blocks. */
  mainLocals: number;
}

export interface TypedGlobal {
  name: string;
  type: ValueType;
  slot: number;
}

export interface TypedFunction {
  kind: 'FunctionDecl';
  span: SourceSpan;
  name: string;
  returnType: ScalarType;
  params: { name: string; type: ValueType; slot: number }[];
  /** Parameters plus every local declared anywhere in the body. */
  frameSlots: number;
  body: TypedStmt[];
}

export type TypedStmt =
  | TypedVarDecl
  | TypedBlock
  | TypedIf
  | TypedWhile
  | TypedFor
  | TypedReturn
  | TypedPrint
  | TypedExprStmt;

export interface TypedVarDecl {
  kind: 'VarDecl';
  span: SourceSpan;
  name: string;
  type: ValueType;
  storage: Storage;
  initializer?: TypedExpr;
}

export interface TypedBlock {
  kind: 'Block';
  span: SourceSpan;
  statements: TypedStmt[];
}

export interface TypedIf {
  kind: 'IfStmt';
  span: SourceSpan;
  condition: TypedExpr;
  thenBranch: TypedStmt;
  elseBranch?: TypedStmt;
}

export interface TypedWhile {
  kind: 'WhileStmt';
  span: SourceSpan;
  condition: TypedExpr;
  body: TypedStmt;
}

export interface TypedFor {
  kind: 'ForStmt';
  span: SourceSpan;
  init?: TypedVarDecl | TypedExprStmt;
  condition?: TypedExpr;
  update?: TypedExpr;
  body: TypedStmt;
}

export interface TypedReturn {
  kind: 'ReturnStmt';
  span: SourceSpan;
  value?: TypedExpr;
}

export interface TypedPrint {
  kind: 'PrintStmt';
  span: SourceSpan;
  value: TypedExpr;
}

export interface TypedExprStmt {
  kind: 'ExprStmt';
  span: SourceSpan;
  expr: TypedExpr;
}

export type TypedExpr =
  | TypedAssign
  | TypedBinary
  | TypedUnary
  | TypedCall
  | TypedVariable
  | TypedLiteral
  | TypedWiden;

interface TypedExprBase {
  span: SourceSpan;
  type: ScalarType;
}

export interface TypedAssign extends TypedExprBase {
  kind: 'AssignExpr';
  type: ValueType;
  name: string;
  storage: Storage;
  value: TypedExpr;
}

/**
 * Binary operation. Both operands already have the same type (`operandType`).
 */
export interface TypedBinary extends TypedExprBase {
  kind: 'BinaryExpr';
  type: ValueType;
  op: BinaryOperator;
  operandType: ValueType;
  left: TypedExpr;
  right: TypedExpr;
}

export interface TypedUnary extends TypedExprBase {
  kind: 'UnaryExpr';
  type: ValueType;
  op: UnaryOperator;
  operand: TypedExpr;
}

export interface TypedCall extends TypedExprBase {
  kind: 'CallExpr';
  callee: string;
  args: TypedExpr[];
}

export interface TypedVariable extends TypedExprBase {
  kind: 'Identifier';
  type: ValueType;
  name: string;
  storage: Storage;
}

export interface TypedLiteral extends TypedExprBase {
  kind: 'Literal';
  type: ValueType;
  value: Value;
}

/**
 * Implicit int -> float conversion inserted by the analyzer.
 */
export interface TypedWiden extends TypedExprBase {
  kind: 'Widen';
  type: 'float';
  operand: TypedExpr;
}
