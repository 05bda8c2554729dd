import type { Value } from '../vm/value.js';
import { evalBinary, evalUnary } from '../vm/value.js';
import { formatIrInstr } from './listing.js';
import type { IrFunction, IrInstr, IrProgram, Operand, TempOperand } from './types.js';

export interface OptimizeResult {
  program: IrProgram;
  /** One line per rewrite, prefixed with the function name. */
  notes: string[];
}

type Note = (text: string) => void;

const quote = (instr: IrInstr): string => `"${formatIrInstr(instr)}"`;

/**
 * Apply `f` to every operand the instruction reads (never to its destination).
 */
function mapSources(instr: IrInstr, f: (o: Operand) => Operand): IrInstr {
  switch (instr.op) {
    case 'LABEL':
    case 'JMP':
    case 'CALL':
    case 'NORET':
      return instr;
    case 'JZ':
      return { ...instr, cond: f(instr.cond) };
    case 'MOV':
    case 'PARAM':
    case 'PRINT':
      return { ...instr, src: f(instr.src) };
    case 'RET':
      return instr.src ? { ...instr, src: f(instr.src) } : instr;
    case 'NEG':
    case 'NOT':
    case 'I2F':
      return { ...instr, a: f(instr.a) };
    default:
      return { ...instr, a: f(instr.a), b: f(instr.b) };
  }
}

function sources(instr: IrInstr): Operand[] {
  const out: Operand[] = [];
  mapSources(instr, (o) => {
    out.push(o);
    return o;
  });
  return out;
}

function isIntConst(o: Operand, n: number): boolean {
  return o.kind === 'const' && o.value.type === 'int' && o.value.value === n;
}

function isNonZeroConst(o: Operand): boolean {
  return o.kind === 'const' && o.value.type !== 'bool' && o.value.value !== 0;
}

/**
 * Constant folding with propagation through temps, algebraic identities and constant branches.
 *
 * A temp is defined exactly once, so once its value is known it can replace every later read.
 */
function foldConstants(body: IrInstr[], note: Note): IrInstr[] {
  const constants = new Map<number, Value>();
  const aliases = new Map<number, TempOperand>();
  const out: IrInstr[] = [];

  for (const original of body) {
    let substituted = false;
    const instr = mapSources(original, (o) => {
      if (o.kind !== 'temp') return o;
      const value = constants.get(o.id);
      if (value) {
        substituted = true;
        return { kind: 'const', value };
      }
      const alias = aliases.get(o.id);
      if (alias) {
        substituted = true;
        return alias;
      }
      return o;
    });
    if (substituted) note(`propagate into ${quote(instr)}`);

    let result: IrInstr | undefined = instr;
    switch (instr.op) {
      case 'JZ':
        if (instr.cond.kind === 'const') {
          if (instr.cond.value.value === false) {
            result = { op: 'JMP', label: instr.label };
            note(`branch ${quote(instr)} always taken`);
          } else {
            result = undefined;
            note(`branch ${quote(instr)} never taken, removed`);
          }
        }
        break;
      case 'NEG':
      case 'NOT':
      case 'I2F':
        if (instr.a.kind === 'const') {
          const r = evalUnary(instr.op, instr.a.value);
          if (r.ok) {
            result = { op: 'MOV', dst: instr.dst, src: { kind: 'const', value: r.value } };
            note(`fold ${quote(instr)} to ${quote(result)}`);
          }
        }
        break;
      case 'LABEL':
      case 'JMP':
      case 'MOV':
      case 'PARAM':
      case 'CALL':
      case 'RET':
      case 'PRINT':
      case 'NORET':
        break;
      default: {
        const { a, b, dst } = instr;
        if (a.kind === 'const' && b.kind === 'const') {
          // A trapping division stays in place so the VM reports it.
          const r = evalBinary(instr.op, a.value, b.value);
          if (r.ok) {
            result = { op: 'MOV', dst, src: { kind: 'const', value: r.value } };
            note(`fold ${quote(instr)} to ${quote(result)}`);
          }
          break;
        }
        let same: Operand | undefined;
        if (instr.op === 'ADD') same = isIntConst(b, 0) ? a : isIntConst(a, 0) ? b : undefined;
        else if (instr.op === 'SUB' || instr.op === 'DIV') {
          same = isIntConst(b, instr.op === 'SUB' ? 0 : 1) ? a : undefined;
        } else if (instr.op === 'MUL') same = isIntConst(b, 1) ? a : isIntConst(a, 1) ? b : undefined;
        if (same) {
          result = { op: 'MOV', dst, src: same };
          note(`simplify ${quote(instr)} to ${quote(result)}`);
        }
      }
    }

    if (!result) continue;
    if (result.op === 'MOV' && result.dst.kind === 'temp') {
      if (result.src.kind === 'const') constants.set(result.dst.id, result.src.value);
      else if (result.src.kind === 'temp') aliases.set(result.dst.id, result.src);
    }
    out.push(result);
  }
  return out;
}

/**
 * Control-flow cleanup: code after an unconditional transfer up to the next label, labels no jump
 * names, and jumps to the label that immediately follows.
 */
function removeUnreachable(body: IrInstr[], note: Note): IrInstr[] {
  const referenced = new Set<string>();
  for (const instr of body) {
    if (instr.op === 'JMP' || instr.op === 'JZ') referenced.add(instr.label);
  }

  const out: IrInstr[] = [];
  let dead = false;
  for (const instr of body) {
    if (instr.op === 'LABEL') {
      if (!referenced.has(instr.label)) {
        note(`remove unused label ${instr.label}`);
        continue;
      }
      dead = false;
    }
    if (dead) {
      note(`remove unreachable ${quote(instr)}`);
      continue;
    }
    out.push(instr);
    if (instr.op === 'JMP' || instr.op === 'RET' || instr.op === 'NORET') dead = true;
  }

  return out.filter((instr, i) => {
    const next = out[i + 1];
    if (instr.op === 'JMP' && next?.op === 'LABEL' && next.label === instr.label) {
      note(`remove jump to next instruction ${quote(instr)}`);
      return false;
    }
    return true;
  });
}

/**
 * Drop definitions of temps nobody reads. Calls lose only their result; a division whose
 * divisor is not a known non-zero constant is kept because it may trap.
 */
function removeDeadTemps(body: IrInstr[], note: Note): IrInstr[] {
  const reads = new Map<number, number>();
  for (const instr of body) {
    for (const o of sources(instr)) {
      if (o.kind === 'temp') reads.set(o.id, (reads.get(o.id) ?? 0) + 1);
    }
  }
  const unused = (t: Operand | undefined): boolean =>
    t !== undefined && t.kind === 'temp' && !reads.has(t.id);

  const out: IrInstr[] = [];
  for (const instr of body) {
    switch (instr.op) {
      case 'LABEL':
      case 'JMP':
      case 'JZ':
      case 'PARAM':
      case 'RET':
      case 'PRINT':
      case 'NORET':
        out.push(instr);
        break;
      case 'CALL':
        if (instr.dst && unused(instr.dst)) {
          note(`drop unused result of ${quote(instr)}`);
          out.push({ op: 'CALL', fn: instr.fn, argc: instr.argc, line: instr.line });
        } else {
          out.push(instr);
        }
        break;
      case 'MOV':
      case 'NEG':
      case 'NOT':
      case 'I2F':
        if (unused(instr.dst)) note(`remove unused ${quote(instr)}`);
        else out.push(instr);
        break;
      default:
        if (unused(instr.dst) && ((instr.op !== 'DIV' && instr.op !== 'MOD') || isNonZeroConst(instr.b))) {
          note(`remove unused ${quote(instr)}`);
        } else {
          out.push(instr);
        }
    }
  }
  return out;
}

function optimizeFunction(fn: IrFunction, notes: string[]): IrFunction {
  const note: Note = (text) => {
    notes.push(`${fn.name}: ${text}`);
  };
  let body = fn.body;
  for (;;) {
    const before = notes.length;
    body = foldConstants(body, note);
    body = removeUnreachable(body, note);
    body = removeDeadTemps(body, note);
    if (notes.length === before) break;
  }
  return { ...fn, body };
}

/**
 * Run folding and dead-code elimination over every function until nothing changes.
 *
 * The result runs with the same output and the same run-time error as the input, and optimizing
 * it again changes nothing.
 */
export function optimizeIr(program: IrProgram): OptimizeResult {
  const notes: string[] = [];
  const functions = program.functions.map((fn) => optimizeFunction(fn, notes));
  return { program: { globals: program.globals, functions }, notes };
}
