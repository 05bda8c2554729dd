import { describe, expect, it } from 'vitest';

import { generateBytecode } from '../src/bytecode/codegen.js';
import { formatIrInstr } from '../src/ir/listing.js';
import { optimizeIr } from '../src/ir/optimize.js';
import type { IrProgram } from '../src/ir/types.js';
import { execute } from '../src/vm/machine.js';
import { irLines, lowerSource } from './helpers/stages.js';

function optimized(text: string, name = '@main'): { lines: string[]; notes: string[]; program: IrProgram } {
  const { program, notes } = optimizeIr(lowerSource(text));
  return { lines: irLines(program, name), notes, program };
}

function run(ir: IrProgram): { output: string[]; error: string | undefined } {
  const res = execute(generateBytecode(ir));
  return { output: res.output, error: res.error?.kind };
}

const SAMPLES = [
  'int x = 2 + 3;\nprint(x);',
  'if (1 < 2) print(1); else print(2);',
  'while (false) print(1);\nprint(2);',
  'int fact(int n) { if (n <= 1) { return 1; } return n * fact(n - 1); }\nprint(fact(6));',
  'int s = 0;\nfor (int i = 0; i < 10; i = i + 1) { if (i % 2 == 0) { s = s + i * 1; } }\nprint(s + 0);',
  'float f = 1;\nprint(f / 4 + 2 * 3);\nprint(-(7 / 2));',
  'bool b = !(3 > 4) && true;\nprint(b == true);',
  'print(1);\nprint(1 / 0);\nprint(2);',
  'int z = 0;\nprint(5 % z);',
  'int f() { return 1; print(2); }\nprint(f());',
  'int g() { }\nprint(g());',
];

describe('IR optimizer', () => {
  it('folds constants, propagates them and removes the dead temp', () => {
    const { lines, notes } = optimized('int x = 2 + 3;\nprint(x);');
    expect(lines).toEqual(['$x = MOV 5', 'PRINT $x', 'RET']);
    expect(notes).toEqual([
      '@main: fold "t0 = ADD 2, 3" to "t0 = MOV 5"',
      '@main: propagate into "$x = MOV 5"',
      '@main: remove unused "t0 = MOV 5"',
    ]);
  });

  it('removes a never-taken branch and the code it guarded', () => {
    const { lines, notes } = optimized('if (1 < 2) print(1); else print(2);');
    expect(lines).toEqual(['PRINT 1', 'RET']);
    expect(notes).toEqual([
      '@main: fold "t0 = CMP_LT 1, 2" to "t0 = MOV true"',
      '@main: propagate into "JZ true, L0"',
      '@main: branch "JZ true, L0" never taken, removed',
      '@main: remove unused label L0',
      '@main: remove unreachable "PRINT 2"',
      '@main: remove jump to next instruction "JMP L1"',
      '@main: remove unused "t0 = MOV true"',
      '@main: remove unused label L1',
    ]);
  });

  it('turns an always-taken branch into a jump and drops the loop', () => {
    const { lines, notes } = optimized('while (false) print(1);\nprint(2);');
    expect(lines).toEqual(['PRINT 2', 'RET']);
    expect(notes.slice(0, 4)).toEqual([
      '@main: branch "JZ false, L1" always taken',
      '@main: remove unreachable "PRINT 1"',
      '@main: remove unreachable "JMP L0"',
      '@main: remove jump to next instruction "JMP L1"',
    ]);
  });

  it('never folds a division that would trap', () => {
    const source = 'print(1);\nprint(1 / 0);\nprint(2);';
    const { lines, notes } = optimized(source);
    expect(lines).toEqual(irLines(lowerSource(source)));
    expect(lines).toContain('t0 = DIV 1, 0');
    expect(notes).toEqual([]);
  });

  it('keeps an unused division unless its divisor is a known non-zero constant', () => {
    expect(optimized('int z = 0;\n1 / z;').lines).toEqual(['$z = MOV 0', 't0 = DIV 1, $z', 'RET']);
    const kept = optimized('int y = 5;\ny / 2;');
    expect(kept.lines).toEqual(['$y = MOV 5', 'RET']);
    expect(kept.notes).toEqual(['@main: remove unused "t0 = DIV $y, 2"']);
  });

  it('applies int identities without touching the variable', () => {
    const { lines, notes } = optimized('int a = 4;\nprint(a + 0);\nprint(1 * a);');
    expect(lines).toEqual(['$a = MOV 4', 't0 = MOV $a', 'PRINT t0', 't1 = MOV $a', 'PRINT t1', 'RET']);
    expect(notes).toEqual([
      '@main: simplify "t0 = ADD $a, 0" to "t0 = MOV $a"',
      '@main: simplify "t1 = MUL 1, $a" to "t1 = MOV $a"',
    ]);
  });

  it('folds floats and wraps int overflow the way the VM does', () => {
    expect(optimized('print(1.5 * 2.0);').lines).toEqual(['PRINT 3.0', 'RET']);
    expect(optimized('print(2147483647 + 1);').lines).toEqual(['PRINT -2147483648', 'RET']);
  });

  it('drops the result of a call nobody reads but keeps the call', () => {
    const { lines, notes } = optimized('int q() { return 1; }\nq();');
    expect(lines).toEqual(['CALL q, 0', 'RET']);
    expect(notes).toEqual(['@main: drop unused result of "t0 = CALL q, 0"']);
  });

  it('removes code after a return inside a function', () => {
    const { lines, notes } = optimized('int f() { return 1; print(2); }\nprint(f());', 'f');
    expect(lines).toEqual(['RET 1']);
    expect(notes).toEqual(['f: remove unreachable "PRINT 2"', 'f: remove unreachable "NORET f"']);
  });

  it('reaches a fixed point: optimizing twice changes nothing', () => {
    for (const source of SAMPLES) {
      const once = optimizeIr(lowerSource(source));
      const twice = optimizeIr(once.program);
      expect(twice.notes).toEqual([]);
      expect(twice.program.functions.map((f) => f.body.map(formatIrInstr))).toEqual(
        once.program.functions.map((f) => f.body.map(formatIrInstr)),
      );
    }
  });

  it('preserves output and run-time errors', () => {
    for (const source of SAMPLES) {
      const ir = lowerSource(source);
      expect(run(optimizeIr(ir).program)).toEqual(run(ir));
    }
  });
});
