import type { IrFunction, IrInstr, IrProgram, Operand, TempOperand, VarOperand } from '../ir/types.js';
import { MAIN_FUNCTION } from '../ir/types.js';
import type { BytecodeProgram, FunctionInfo, Instr } from './types.js';
import { isJump } from './types.js';

/**
 * Check that every jump target and function address lies inside `code`.
 *
 * Throws on the first bad reference: a bad target is a compiler bug, not a user error.
 */
export function validateTargets(program: BytecodeProgram): void {
  const size = program.code.length;
  program.code.forEach((instr, pc) => {
    if (isJump(instr) && (instr.target < 0 || instr.target >= size)) {
      throw new Error(`${instr.op} at ${pc} targets ${instr.target}, outside 0..${size - 1}`);
    }
    if ((instr.op === 'CALL' || instr.op === 'NORET') && !program.functions[instr.fn]) {
      throw new Error(`${instr.op} at ${pc} names unknown function #${instr.fn}`);
    }
  });
  for (const fn of program.functions) {
    if (fn.address < 0 || fn.address >= size) {
      throw new Error(`function ${fn.name} starts at ${fn.address}, outside 0..${size - 1}`);
    }
  }
}

/**
 * Translate IR into stack-machine bytecode.
 *
 * `@main` comes first (address 0) and ends in `HALT`; each function follows in IR order. Frame
 * slots are laid out as parameters, locals, then one slot per temp.
 */
export function generateBytecode(ir: IrProgram): BytecodeProgram {
  const code: Instr[] = [];
  const functions: FunctionInfo[] = [];
  const indexOf = new Map<string, number>();
  ir.functions.forEach((fn, i) => indexOf.set(fn.name, i));

  const fnIndex = (name: string): number => {
    const i = indexOf.get(name);
    if (i === undefined) throw new Error(`call to unknown function "${name}"`);
    return i;
  };

  function emitFunction(fn: IrFunction): void {
    const isMain = fn.name === MAIN_FUNCTION;
    const labels = new Map<string, number>();
    const fixups: { at: number; label: string }[] = [];
    const slotOf = (o: TempOperand | VarOperand): number =>
      o.kind === 'temp' ? fn.locals + o.id : o.slot;

    functions.push({
      name: fn.name,
      address: code.length,
      arity: fn.arity,
      frameSize: fn.locals + fn.temps,
      tempBase: fn.locals,
      returnType: fn.returnType,
    });

    const push = (o: Operand): void => {
      switch (o.kind) {
        case 'const':
          code.push({ op: 'PUSH_CONST', value: o.value });
          return;
        case 'global':
          code.push({ op: 'LOAD_GLOBAL', slot: o.slot });
          return;
        default:
          code.push({ op: 'LOAD', slot: slotOf(o) });
      }
    };
    const store = (o: TempOperand | VarOperand): void => {
      code.push(o.kind === 'global' ? { op: 'STORE_GLOBAL', slot: o.slot } : { op: 'STORE', slot: slotOf(o) });
    };
    const jump = (op: 'JMP' | 'JZ', label: string): void => {
      fixups.push({ at: code.length, label });
      code.push({ op, target: -1 });
    };

    const lower = (instr: IrInstr): void => {
      switch (instr.op) {
        case 'LABEL':
          labels.set(instr.label, code.length);
          return;
        case 'JMP':
          jump('JMP', instr.label);
          return;
        case 'JZ':
          push(instr.cond);
          jump('JZ', instr.label);
          return;
        case 'MOV':
          push(instr.src);
          store(instr.dst);
          return;
        case 'NEG':
        case 'NOT':
        case 'I2F':
          push(instr.a);
          code.push({ op: instr.op });
          store(instr.dst);
          return;
        case 'PARAM':
          push(instr.src);
          return;
        case 'CALL': {
          const callee = fnIndex(instr.fn);
          code.push({ op: 'CALL', fn: callee, line: instr.line });
          if (instr.dst) store(instr.dst);
          else if (ir.functions[callee]?.returnType !== 'void') code.push({ op: 'POP' });
          return;
        }
        case 'RET':
          if (isMain) {
            code.push({ op: 'HALT' });
          } else if (instr.src) {
            push(instr.src);
            code.push({ op: 'RET_VALUE' });
          } else {
            code.push({ op: 'RET' });
          }
          return;
        case 'PRINT':
          push(instr.src);
          code.push({ op: 'PRINT' });
          return;
        case 'NORET':
          code.push({ op: 'NORET', fn: fnIndex(instr.fn), line: instr.line });
          return;
        default:
          push(instr.a);
          push(instr.b);
          code.push(instr.line === undefined ? { op: instr.op } : { op: instr.op, line: instr.line });
          store(instr.dst);
      }
    };

    fn.body.forEach(lower);
    if (isMain && code[code.length - 1]?.op !== 'HALT') code.push({ op: 'HALT' });

    for (const { at, label } of fixups) {
      const target = labels.get(label);
      const instr = code[at];
      if (target === undefined || !instr || !isJump(instr)) {
        throw new Error(`unresolved label ${label} in ${fn.name}`);
      }
      code[at] = { op: instr.op, target };
    }
  }

  ir.functions.forEach(emitFunction);

  const program: BytecodeProgram = {
    code,
    functions,
    globals: ir.globals.map((g) => ({ name: g.name, type: g.type })),
  };
  validateTargets(program);
  return program;
}
