import { formatConstant } from '../vm/value.js';
import type { FunctionInfo, Instr } from './types.js';

/**
 * One instruction as `OPCODE operand`, e.g. `PUSH_CONST 2.0`, `JZ 14`, `CALL fact`.
 */
export function formatInstr(instr: Instr, functions: readonly FunctionInfo[]): string {
  switch (instr.op) {
    case 'PUSH_CONST':
      return `PUSH_CONST ${formatConstant(instr.value)}`;
    case 'LOAD':
    case 'STORE':
    case 'LOAD_GLOBAL':
    case 'STORE_GLOBAL':
      return `${instr.op} ${instr.slot}`;
    case 'JMP':
    case 'JZ':
      return `${instr.op} ${instr.target}`;
    case 'CALL':
    case 'NORET':
      return `${instr.op} ${functions[instr.fn]?.name ?? `#${instr.fn}`}`;
    default:
      return instr.op;
  }
}
