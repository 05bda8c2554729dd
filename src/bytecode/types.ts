import type { ScalarType, ValueType } from '../semantics/types.js';
import type { BinaryOpcode, UnaryOpcode, Value } from '../vm/value.js';

/**
 * Stack-machine instruction set.
 *
 * Jump targets are absolute indices into {@link BytecodeProgram.code}; variable operands are frame
 * or global slot indices; `CALL` and `NORET` name an index into {@link BytecodeProgram.functions}.
 */
export type Instr =
  | { op: 'PUSH_CONST'; value: Value }
  | { op: 'LOAD' | 'STORE' | 'LOAD_GLOBAL' | 'STORE_GLOBAL'; slot: number }
  | { op: 'JMP' | 'JZ'; target: number }
  | { op: BinaryOpcode; line?: number }
  | { op: UnaryOpcode }
  | { op: 'CALL'; fn: number; line: number }
  | { op: 'NORET'; fn: number; line: number }
  | { op: 'RET' | 'RET_VALUE' | 'PRINT' | 'POP' | 'HALT' };

export type Opcode = Instr['op'];

export interface FunctionInfo {
  name: string;
  /** Index of the first instruction. */
  address: number;
  arity: number;
  /** Total frame slots: parameters, locals, then temps. */
  frameSize: number;
  /** First slot that holds a temp rather than a named variable. */
  tempBase: number;
  returnType: ScalarType;
}

export interface BytecodeProgram {
  code: Instr[];
  /** Entry 0 is `@main`, whose address is 0. */
  functions: FunctionInfo[];
  globals: { name: string; type: ValueType }[];
}

/**
 * Opcodes that unconditionally leave the current instruction stream.
 */
export const TERMINATORS: ReadonlySet<Opcode> = new Set<Opcode>([
  'JMP',
  'RET',
  'RET_VALUE',
  'NORET',
  'HALT',
]);

export function isJump(instr: Instr): instr is Extract<Instr, { target: number }> {
  return instr.op === 'JMP' || instr.op === 'JZ';
}
