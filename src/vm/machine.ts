import type { BytecodeProgram, FunctionInfo } from '../bytecode/types.js';
import type { Value } from './value.js';
import { evalBinary, evalUnary, formatValue, zeroOf } from './value.js';

export interface ExecutionLimits {
  /** Maximum number of live frames, `@main` included. */
  maxCallDepth: number;
  /** Maximum number of instructions executed before the run is stopped. */
  maxInstructions: number;
}

export const DEFAULT_LIMITS: ExecutionLimits = {
  maxCallDepth: 1024,
  maxInstructions: 5_000_000,
};

export type RuntimeErrorKind =
  | 'division-by-zero'
  | 'modulo-by-zero'
  | 'call-depth-exceeded'
  | 'instruction-limit-exceeded'
  | 'missing-return'
  | 'invalid-jump'
  | 'stack-underflow'
  | 'uninitialized-slot'
  | 'type-fault';

export interface RuntimeError {
  kind: RuntimeErrorKind;
  message: string;
  /** Index of the failing instruction. */
  pc: number;
  /** Source line, for instructions that carry one. */
  line?: number;
}

export interface ExecutionResult {
  /** Printed values in order; partial when `error` is set. */
  output: string[];
  error?: RuntimeError;
  /** Instructions executed. */
  steps: number;
}

/**
 * Fault raised inside the fetch-execute loop; converted to a {@link RuntimeError} by `execute`.
 */
export class VmFault extends Error {
  readonly kind: RuntimeErrorKind;

  constructor(kind: RuntimeErrorKind, message: string) {
    super(message);
    this.name = 'VmFault';
    this.kind = kind;
  }
}

interface Frame {
  fn: FunctionInfo;
  returnAddress: number;
  locals: (Value | undefined)[];
  /** Operand stack depth when the frame was entered (after its arguments were taken). */
  stackBase: number;
}

const TRAP_MESSAGES = {
  'division-by-zero': 'Division by zero',
  'modulo-by-zero': 'Modulo by zero',
  'type-fault': 'Operand types do not match the instruction',
} as const;

/**
 * Run a bytecode program from address 0 until `HALT` or the first run-time error.
 *
 * Each call builds fresh machine state; nothing survives between runs.
 */
export function execute(program: BytecodeProgram, limits: Partial<ExecutionLimits> = {}): ExecutionResult {
  const maxCallDepth = limits.maxCallDepth ?? DEFAULT_LIMITS.maxCallDepth;
  const maxInstructions = limits.maxInstructions ?? DEFAULT_LIMITS.maxInstructions;
  const { code, functions } = program;

  const output: string[] = [];
  const stack: Value[] = [];
  const globals: Value[] = program.globals.map((g) => zeroOf(g.type));
  const main = functions[0];
  if (!main) throw new Error('bytecode program has no @main function');
  const frames: Frame[] = [
    { fn: main, returnAddress: -1, locals: new Array<Value | undefined>(main.frameSize), stackBase: 0 },
  ];
  let pc = main.address;
  let steps = 0;

  const frame = (): Frame => {
    const f = frames[frames.length - 1];
    if (!f) throw new VmFault('stack-underflow', 'No active frame');
    return f;
  };
  const pop = (): Value => {
    if (stack.length <= frame().stackBase) throw new VmFault('stack-underflow', `Operand stack underflow at ${pc}`);
    const v = stack.pop();
    if (!v) throw new VmFault('stack-underflow', `Operand stack underflow at ${pc}`);
    return v;
  };
  const jumpTo = (target: number): void => {
    if (target < 0 || target >= code.length) {
      throw new VmFault('invalid-jump', `Jump to ${target} is outside the program (0..${code.length - 1})`);
    }
    pc = target;
  };
  const slot = (locals: (Value | undefined)[], index: number, what: string): Value => {
    const v = locals[index];
    if (!v) throw new VmFault('uninitialized-slot', `Read of uninitialized ${what} slot ${index}`);
    return v;
  };
  const leave = (): void => {
    const f = frame();
    frames.pop();
    stack.length = f.stackBase;
    jumpTo(f.returnAddress);
  };

  try {
    for (;;) {
      if (steps >= maxInstructions) {
        throw new VmFault('instruction-limit-exceeded', `Instruction limit of ${maxInstructions} exceeded`);
      }
      const instr = code[pc];
      if (!instr) throw new VmFault('invalid-jump', `Program counter ${pc} is outside the program`);
      steps++;
      let next = pc + 1;

      switch (instr.op) {
        case 'PUSH_CONST':
          stack.push(instr.value);
          break;
        case 'LOAD':
          stack.push(slot(frame().locals, instr.slot, 'local'));
          break;
        case 'STORE':
          frame().locals[instr.slot] = pop();
          break;
        case 'LOAD_GLOBAL':
          stack.push(slot(globals, instr.slot, 'global'));
          break;
        case 'STORE_GLOBAL':
          globals[instr.slot] = pop();
          break;
        case 'JMP':
          jumpTo(instr.target);
          next = pc;
          break;
        case 'JZ': {
          const cond = pop();
          if (cond.type !== 'bool') throw new VmFault('type-fault', `JZ expects a bool, found ${cond.type}`);
          if (!cond.value) {
            jumpTo(instr.target);
            next = pc;
          }
          break;
        }
        case 'CALL': {
          const callee = functions[instr.fn];
          if (!callee) throw new VmFault('invalid-jump', `Call to unknown function #${instr.fn}`);
          if (frames.length >= maxCallDepth) {
            throw new VmFault('call-depth-exceeded', `Call depth exceeded ${maxCallDepth} frames in "${callee.name}"`);
          }
          const locals = new Array<Value | undefined>(callee.frameSize);
          for (let i = callee.arity - 1; i >= 0; i--) locals[i] = pop();
          frames.push({ fn: callee, returnAddress: pc + 1, locals, stackBase: stack.length });
          jumpTo(callee.address);
          next = pc;
          break;
        }
        case 'RET':
          leave();
          next = pc;
          break;
        case 'RET_VALUE': {
          const result = pop();
          leave();
          stack.push(result);
          next = pc;
          break;
        }
        case 'NORET': {
          const fn = functions[instr.fn];
          throw new VmFault(
            'missing-return',
            `Function "${fn?.name ?? `#${instr.fn}`}" reached its end without returning a value`,
          );
        }
        case 'PRINT':
          output.push(formatValue(pop()));
          break;
        case 'POP':
          pop();
          break;
        case 'HALT':
          return { output, steps };
        case 'NEG':
        case 'NOT':
        case 'I2F': {
          const r = evalUnary(instr.op, pop());
          if (!r.ok) throw new VmFault(r.trap, TRAP_MESSAGES[r.trap]);
          stack.push(r.value);
          break;
        }
        default: {
          const b = pop();
          const a = pop();
          const r = evalBinary(instr.op, a, b);
          if (!r.ok) throw new VmFault(r.trap, TRAP_MESSAGES[r.trap]);
          stack.push(r.value);
        }
      }
      pc = next;
    }
  } catch (err) {
    if (!(err instanceof VmFault)) throw err;
    const instr = code[pc];
    const line = instr && 'line' in instr ? instr.line : undefined;
    return {
      output,
      error: { kind: err.kind, message: err.message, pc, ...(line !== undefined ? { line } : {}) },
      steps,
    };
  }
}
