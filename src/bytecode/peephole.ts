import type { BinaryOpcode, UnaryOpcode } from '../vm/value.js';
import { BINARY_OPCODES, evalBinary, evalUnary } from '../vm/value.js';
import { validateTargets } from './codegen.js';
import { formatInstr } from './listing.js';
import type { BytecodeProgram, Instr } from './types.js';
import { TERMINATORS, isJump } from './types.js';

export interface PeepholeResult {
  program: BytecodeProgram;
  notes: string[];
}

type Note = (text: string) => void;

function isPush(instr: Instr): boolean {
  return instr.op === 'PUSH_CONST' || instr.op === 'LOAD' || instr.op === 'LOAD_GLOBAL';
}

function isBinary(instr: Instr): instr is Extract<Instr, { op: BinaryOpcode }> {
  return BINARY_OPCODES.has(instr.op);
}

function isUnary(instr: Instr): instr is Extract<Instr, { op: UnaryOpcode }> {
  return instr.op === 'NEG' || instr.op === 'NOT' || instr.op === 'I2F';
}

/**
 * Point every jump whose target is a `JMP` straight at that jump's final destination.
 */
function threadJumps(program: BytecodeProgram, note: Note): BytecodeProgram {
  const code = program.code.map((instr, pc): Instr => {
    if (!isJump(instr)) return instr;
    const seen = new Set<number>([pc]);
    let target = instr.target;
    for (;;) {
      const next = program.code[target];
      if (!next || next.op !== 'JMP' || seen.has(target)) break;
      seen.add(target);
      target = next.target;
    }
    if (target === instr.target) return instr;
    note(`thread ${instr.op} at ${pc} from ${instr.target} to ${target}`);
    return { op: instr.op, target };
  });
  return { ...program, code };
}

/**
 * Remove the instructions flagged in `removed` and re-point jumps and function addresses.
 *
 * A jump to a removed instruction lands on the next surviving one.
 */
function compact(program: BytecodeProgram, removed: boolean[]): BytecodeProgram {
  const newIndex: number[] = [];
  let survivors = 0;
  for (let i = 0; i <= program.code.length; i++) {
    newIndex.push(survivors);
    if (i < program.code.length && !removed[i]) survivors++;
  }
  const remap = (pc: number): number => newIndex[pc] ?? pc;

  const code: Instr[] = [];
  program.code.forEach((instr, pc) => {
    if (removed[pc]) return;
    code.push(isJump(instr) ? { op: instr.op, target: remap(instr.target) } : instr);
  });
  return {
    ...program,
    code,
    functions: program.functions.map((fn) => ({ ...fn, address: remap(fn.address) })),
  };
}

/**
 * One left-to-right pass of the window rules. Returns the program unchanged when no rule fired.
 */
function sweep(program: BytecodeProgram, note: Note): BytecodeProgram {
  const code = [...program.code];
  const { functions } = program;
  const removed: boolean[] = code.map(() => false);
  const show = (instr: Instr): string => formatInstr(instr, functions);

  const targets = new Set<number>(functions.map((fn) => fn.address));
  for (const instr of code) {
    if (isJump(instr)) targets.add(instr.target);
  }

  // Index of the function each instruction belongs to.
  const ownerAt = code.map((_, pc) => {
    let owner = 0;
    functions.forEach((fn, k) => {
      if (fn.address <= pc) owner = k;
    });
    return owner;
  });

  // How often each (function, slot) pair is loaded.
  const loads = new Map<string, number>();
  code.forEach((instr, pc) => {
    if (instr.op !== 'LOAD') return;
    const key = `${ownerAt[pc] ?? 0}:${instr.slot}`;
    loads.set(key, (loads.get(key) ?? 0) + 1);
  });

  /** `pc` exists, survives so far and no jump lands on it. */
  const inWindow = (pc: number): boolean => pc < code.length && !targets.has(pc) && !removed[pc];
  const drop = (...pcs: number[]): void => {
    for (const pc of pcs) removed[pc] = true;
  };

  for (let i = 0; i < code.length; i++) {
    if (removed[i]) continue;
    const a = code[i];
    const b = code[i + 1];
    const c = code[i + 2];
    if (!a) continue;

    if (b && isPush(a) && b.op === 'POP' && inWindow(i + 1)) {
      note(`remove ${show(a)}; POP at ${i}`);
      drop(i, i + 1);
      i++;
      continue;
    }

    if (b && a.op === 'STORE' && b.op === 'LOAD' && a.slot === b.slot && inWindow(i + 1)) {
      const owner = ownerAt[i] ?? 0;
      const fn = functions[owner];
      if (fn && a.slot >= fn.tempBase && loads.get(`${owner}:${a.slot}`) === 1) {
        note(`remove ${show(a)}; ${show(b)} at ${i}`);
        drop(i, i + 1);
        i++;
        continue;
      }
    }

    if (a.op === 'PUSH_CONST' && b?.op === 'PUSH_CONST' && c && isBinary(c) && inWindow(i + 1) && inWindow(i + 2)) {
      const r = evalBinary(c.op, a.value, b.value);
      if (r.ok) {
        const folded: Instr = { op: 'PUSH_CONST', value: r.value };
        note(`fold ${show(a)}; ${show(b)}; ${show(c)} at ${i} to ${show(folded)}`);
        code[i] = folded;
        drop(i + 1, i + 2);
        i += 2;
        continue;
      }
    }

    if (a.op === 'PUSH_CONST' && b && isUnary(b) && inWindow(i + 1)) {
      const r = evalUnary(b.op, a.value);
      if (r.ok) {
        const folded: Instr = { op: 'PUSH_CONST', value: r.value };
        note(`fold ${show(a)}; ${show(b)} at ${i} to ${show(folded)}`);
        code[i] = folded;
        drop(i + 1);
        i++;
        continue;
      }
    }

    if (a.op === 'JMP' && a.target === i + 1) {
      note(`remove ${show(a)} to next instruction at ${i}`);
      drop(i);
      continue;
    }

    if (TERMINATORS.has(a.op)) {
      let j = i + 1;
      while (j < code.length && !targets.has(j)) {
        const dead = code[j];
        if (dead && !removed[j]) {
          note(`remove unreachable ${show(dead)} at ${j}`);
          drop(j);
        }
        j++;
      }
      i = j - 1;
    }
  }

  return removed.includes(true) ? compact({ ...program, code }, removed) : program;
}

/**
 * Sliding-window cleanup of generated bytecode, repeated until no rule applies.
 *
 * Every removal re-points jump targets and function addresses at the surviving instruction.
 */
export function peephole(program: BytecodeProgram): PeepholeResult {
  const notes: string[] = [];
  const note: Note = (text) => {
    notes.push(text);
  };
  let current = program;
  for (;;) {
    const before = notes.length;
    current = sweep(threadJumps(current, note), note);
    if (notes.length === before) break;
  }
  validateTargets(current);
  return { program: current, notes };
}
