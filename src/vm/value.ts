import type { ValueType } from '../semantics/types.js';

/**
 * A tagged run-time value. Ints are signed 32-bit; floats are IEEE doubles.
 */
export type Value =
  | { type: 'int'; value: number }
  | { type: 'float'; value: number }
  | { type: 'bool'; value: boolean };

/**
 * Two-operand opcodes shared by the IR and the bytecode.
 */
export type BinaryOpcode =
  | 'ADD'
  | 'SUB'
  | 'MUL'
  | 'DIV'
  | 'MOD'
  | 'CMP_EQ'
  | 'CMP_NE'
  | 'CMP_LT'
  | 'CMP_LE'
  | 'CMP_GT'
  | 'CMP_GE'
  | 'AND'
  | 'OR';

export type UnaryOpcode = 'NEG' | 'NOT' | 'I2F';

export const BINARY_OPCODES: ReadonlySet<string> = new Set<BinaryOpcode>([
  'ADD',
  'SUB',
  'MUL',
  'DIV',
  'MOD',
  'CMP_EQ',
  'CMP_NE',
  'CMP_LT',
  'CMP_LE',
  'CMP_GT',
  'CMP_GE',
  'AND',
  'OR',
]);

/**
 * Ways an operation can fail instead of producing a value.
 *
 * `type-fault` means the operands do not fit the opcode, which well-typed code never produces.
 */
export type Trap = 'division-by-zero' | 'modulo-by-zero' | 'type-fault';

export type EvalResult = { ok: true; value: Value } | { ok: false; trap: Trap };

export const intValue = (value: number): Value => ({ type: 'int', value: value | 0 });
export const floatValue = (value: number): Value => ({ type: 'float', value });
export const boolValue = (value: boolean): Value => ({ type: 'bool', value });

export function zeroOf(type: ValueType): Value {
  switch (type) {
    case 'int':
      return intValue(0);
    case 'float':
      return floatValue(0);
    case 'bool':
      return boolValue(false);
  }
}

const ok = (value: Value): EvalResult => ({ ok: true, value });
const trap = (t: Trap): EvalResult => ({ ok: false, trap: t });

function compare(op: BinaryOpcode, a: number, b: number): boolean {
  switch (op) {
    case 'CMP_EQ':
      return a === b;
    case 'CMP_NE':
      return a !== b;
    case 'CMP_LT':
      return a < b;
    case 'CMP_LE':
      return a <= b;
    case 'CMP_GT':
      return a > b;
    default:
      return a >= b;
  }
}

function intArith(op: BinaryOpcode, a: number, b: number): EvalResult {
  switch (op) {
    case 'ADD':
      return ok(intValue(a + b));
    case 'SUB':
      return ok(intValue(a - b));
    case 'MUL':
      return ok(intValue(Math.imul(a, b)));
    case 'DIV':
      if (b === 0) return trap('division-by-zero');
      return ok(intValue(Math.trunc(a / b)));
    case 'MOD':
      if (b === 0) return trap('modulo-by-zero');
      return ok(intValue(a % b));
    case 'AND':
    case 'OR':
      return trap('type-fault');
    default:
      return ok(boolValue(compare(op, a, b)));
  }
}

function floatArith(op: BinaryOpcode, a: number, b: number): EvalResult {
  switch (op) {
    case 'ADD':
      return ok(floatValue(a + b));
    case 'SUB':
      return ok(floatValue(a - b));
    case 'MUL':
      return ok(floatValue(a * b));
    case 'DIV':
      if (b === 0) return trap('division-by-zero');
      return ok(floatValue(a / b));
    case 'MOD':
      if (b === 0) return trap('modulo-by-zero');
      return ok(floatValue(a % b));
    case 'AND':
    case 'OR':
      return trap('type-fault');
    default:
      return ok(boolValue(compare(op, a, b)));
  }
}

/**
 * Apply a two-operand opcode. Both the optimizers and the VM go through here, so folding a
 * constant expression always gives the value the VM would compute.
 */
export function evalBinary(op: BinaryOpcode, a: Value, b: Value): EvalResult {
  if (a.type === 'int' && b.type === 'int') return intArith(op, a.value, b.value);
  if (a.type === 'float' && b.type === 'float') return floatArith(op, a.value, b.value);
  if (a.type === 'bool' && b.type === 'bool') {
    switch (op) {
      case 'AND':
        return ok(boolValue(a.value && b.value));
      case 'OR':
        return ok(boolValue(a.value || b.value));
      case 'CMP_EQ':
        return ok(boolValue(a.value === b.value));
      case 'CMP_NE':
        return ok(boolValue(a.value !== b.value));
      default:
        return trap('type-fault');
    }
  }
  return trap('type-fault');
}

export function evalUnary(op: UnaryOpcode, a: Value): EvalResult {
  switch (op) {
    case 'NEG':
      if (a.type === 'int') return ok(intValue(-a.value));
      if (a.type === 'float') return ok(floatValue(-a.value));
      return trap('type-fault');
    case 'NOT':
      if (a.type === 'bool') return ok(boolValue(!a.value));
      return trap('type-fault');
    case 'I2F':
      if (a.type === 'int') return ok(floatValue(a.value));
      return trap('type-fault');
  }
}

/**
 * Text written by `print`: ints in decimal, floats in shortest round-trip form (`4`, `2.5`),
 * bools as `1` / `0`.
 */
export function formatValue(v: Value): string {
  if (v.type === 'bool') return v.value ? '1' : '0';
  return String(v.value);
}

/**
 * Operand spelling used by the IR and bytecode listings: floats always show a fraction so they
 * can be told apart from ints.
 */
export function formatConstant(v: Value): string {
  switch (v.type) {
    case 'int':
      return String(v.value);
    case 'float':
      return Number.isInteger(v.value) ? v.value.toFixed(1) : String(v.value);
    case 'bool':
      return v.value ? 'true' : 'false';
  }
}
