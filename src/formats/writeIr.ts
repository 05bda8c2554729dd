import { formatIrInstr } from '../ir/listing.js';
import type { IrFunction, IrProgram } from '../ir/types.js';
import type { IrArtifact, WriteStageOptions } from './types.js';

function functionLines(fn: IrFunction): string[] {
  const lines = [
    `function ${fn.name} (arity ${fn.arity}, locals ${fn.locals}, temps ${fn.temps}) -> ${fn.returnType}`,
  ];
  for (const instr of fn.body) {
    const text = formatIrInstr(instr);
    if (instr.op === 'LABEL') {
      lines.push(text);
      continue;
    }
    const line = 'line' in instr ? instr.line : undefined;
    lines.push(line === undefined ? `  ${text}` : `  ${text.padEnd(28)}; line ${line}`);
  }
  return lines;
}

/**
 * Create an IR listing: the globals table, then each function with its instructions.
 */
export function writeIr(program: IrProgram, opts?: WriteStageOptions): IrArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  lines.push(opts?.optimized ? '; optimized IR' : '; IR');
  for (const g of program.globals) lines.push(`global ${g.type} $${g.name}`);
  for (const fn of program.functions) {
    lines.push('');
    lines.push(...functionLines(fn));
  }
  return {
    kind: opts?.optimized ? 'ir-optimized' : 'ir',
    text: lines.join(lineEnding) + lineEnding,
  };
}
