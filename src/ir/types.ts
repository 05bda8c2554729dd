import type { ScalarType, ValueType } from '../semantics/types.js';
import type { BinaryOpcode, UnaryOpcode, Value } from '../vm/value.js';

/**
 * Three-address IR contracts.
 *
 * Every function is a flat instruction list. Temporaries (`t0`, `t1`, ...) are numbered per
 * function and each is defined by exactly one instruction that precedes all of its uses.
 */

export interface TempOperand {
  kind: 'temp';
  id: number;
}

export interface ConstOperand {
  kind: 'const';
  value: Value;
}

export interface LocalOperand {
  kind: 'local';
  slot: number;
  name: string;
}

export interface GlobalOperand {
  kind: 'global';
  slot: number;
  name: string;
}

export type VarOperand = LocalOperand | GlobalOperand;
export type Operand = TempOperand | ConstOperand | VarOperand;

export type IrInstr =
  | { op: 'LABEL'; label: string }
  | { op: 'JMP'; label: string }
  /** Jump when `cond` is false. */
  | { op: 'JZ'; cond: Operand; label: string }
  | { op: 'MOV'; dst: TempOperand | VarOperand; src: Operand }
  /** `line` is set on DIV and MOD, which can trap. */
  | { op: BinaryOpcode; dst: TempOperand; a: Operand; b: Operand; line?: number }
  | { op: UnaryOpcode; dst: TempOperand; a: Operand }
  | { op: 'PARAM'; src: Operand }
  | { op: 'CALL'; fn: string; argc: number; dst?: TempOperand; line: number }
  | { op: 'RET'; src?: Operand }
  | { op: 'PRINT'; src: Operand }
  /** Reached the end of a non-void function without a return. */
  | { op: 'NORET'; fn: string; line: number };

export interface IrFunction {
  name: string;
  returnType: ScalarType;
  /** Number of parameters; they occupy local slots `0..arity-1`. */
  arity: number;
  /** Parameter and local variable slots (temps are not included). */
  locals: number;
  /** Number of temporaries used by `body`. */
  temps: number;
  body: IrInstr[];
}

export interface IrProgram {
  globals: { name: string; type: ValueType }[];
  /** `@main` first, then user functions in source order. */
  functions: IrFunction[];
}

export const MAIN_FUNCTION = '@main';
