import { formatInstr } from '../bytecode/listing.js';
import type { BytecodeProgram } from '../bytecode/types.js';
import type { BytecodeArtifact, WriteStageOptions } from './types.js';

function toAddress(n: number): string {
  return n.toString().padStart(4, '0');
}

/**
 * Create a bytecode listing: function and global tables, then the flat instruction array with
 * a header comment at every function entry.
 */
export function writeBytecode(program: BytecodeProgram, opts?: WriteStageOptions): BytecodeArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  lines.push(opts?.optimized ? '; optimized bytecode' : '; bytecode');
  lines.push(`; ${program.code.length} instructions`);
  lines.push('');

  lines.push('functions:');
  program.functions.forEach((fn, i) => {
    lines.push(
      `  #${i} ${fn.name} @${toAddress(fn.address)} arity=${fn.arity} frame=${fn.frameSize} -> ${fn.returnType}`,
    );
  });
  if (program.globals.length > 0) {
    lines.push('globals:');
    program.globals.forEach((g, i) => lines.push(`  #${i} ${g.type} ${g.name}`));
  }
  lines.push('');

  const entries = new Map(program.functions.map((fn) => [fn.address, fn.name]));
  program.code.forEach((instr, pc) => {
    const entry = entries.get(pc);
    if (entry !== undefined) lines.push(`; ${entry}`);
    const text = `${toAddress(pc)}  ${formatInstr(instr, program.functions)}`;
    const line = 'line' in instr ? instr.line : undefined;
    lines.push(line === undefined ? text : `${text.padEnd(28)}; line ${line}`);
  });

  return {
    kind: opts?.optimized ? 'bytecode-optimized' : 'bytecode',
    text: lines.join(lineEnding) + lineEnding,
  };
}
