import { formatConstant } from '../vm/value.js';
import type { IrInstr, Operand } from './types.js';

/**
 * Operand spelling: `t3` temps, `x#1` locals (with frame slot), `$g` globals, literal constants.
 */
export function formatOperand(o: Operand): string {
  switch (o.kind) {
    case 'temp':
      return `t${o.id}`;
    case 'const':
      return formatConstant(o.value);
    case 'local':
      return `${o.name}#${o.slot}`;
    case 'global':
      return `$${o.name}`;
  }
}

/**
 * One instruction without indentation or source line, e.g. `t2 = ADD x#0, 1` or `JZ t3, L1`.
 */
export function formatIrInstr(instr: IrInstr): string {
  switch (instr.op) {
    case 'LABEL':
      return `${instr.label}:`;
    case 'JMP':
      return `JMP ${instr.label}`;
    case 'JZ':
      return `JZ ${formatOperand(instr.cond)}, ${instr.label}`;
    case 'MOV':
      return `${formatOperand(instr.dst)} = MOV ${formatOperand(instr.src)}`;
    case 'NEG':
    case 'NOT':
    case 'I2F':
      return `${formatOperand(instr.dst)} = ${instr.op} ${formatOperand(instr.a)}`;
    case 'PARAM':
      return `PARAM ${formatOperand(instr.src)}`;
    case 'CALL': {
      const call = `CALL ${instr.fn}, ${instr.argc}`;
      return instr.dst ? `${formatOperand(instr.dst)} = ${call}` : call;
    }
    case 'RET':
      return instr.src ? `RET ${formatOperand(instr.src)}` : 'RET';
    case 'PRINT':
      return `PRINT ${formatOperand(instr.src)}`;
    case 'NORET':
      return `NORET ${instr.fn}`;
    default:
      return `${formatOperand(instr.dst)} = ${instr.op} ${formatOperand(instr.a)}, ${formatOperand(instr.b)}`;
  }
}
