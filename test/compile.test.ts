import { describe, expect, it } from 'vitest';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { compileFile, compileSource } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const fixture = (name: string): string => join(__dirname, 'fixtures', name);

function outputOf(source: string, optimize = true): string[] {
  const res = compileSource(source, { optimize });
  expect(res.diagnostics).toEqual([]);
  return res.output;
}

describe('compile pipeline', () => {
  it('runs factorial end to end', async () => {
    const res = await compileFile(fixture('factorial.mc'), {}, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([]);
    expect(res.output).toEqual(['120']);
  });

  it('runs a counting loop over a global accumulator', async () => {
    const res = await compileFile(fixture('counting.mc'));
    expect(res.output).toEqual(['1', '2', '3', '4', '5', '15']);
  });

  it('logs one numbered line per stage', () => {
    const res = compileSource('print(1);');
    expect(res.log).toEqual([
      '01. Lexical analysis produced 6 tokens',
      '02. Parsing produced 1 top-level item',
      '03. Semantic analysis checked 0 functions and 0 globals',
      '04. IR generation produced 2 instructions in 1 function',
      '05. IR optimization applied 0 rewrites (2 -> 2 instructions)',
      '06. Code generation produced 3 bytecode instructions',
      '07. Peephole optimization applied 0 rewrites (3 -> 3 instructions)',
      '08. Execution printed 1 value in 3 steps',
    ]);
  });

  it('indents optimizer notes under their stage', () => {
    const res = compileSource('print(2 + 3);');
    expect(res.log.slice(4, 7)).toEqual([
      '05. IR optimization applied 3 rewrites (3 -> 2 instructions)',
      '    @main: fold "t0 = ADD 2, 3" to "t0 = MOV 5"',
      '    @main: propagate into "PRINT 5"',
    ]);
  });

  it('skips the optimizers and execution on request', () => {
    const res = compileSource('print(1);', { optimize: false, run: false });
    expect(res.log.slice(4)).toEqual([
      '05. IR optimization skipped',
      '06. Code generation produced 3 bytecode instructions',
      '07. Peephole optimization skipped',
      '08. Execution skipped',
    ]);
    expect(res.output).toEqual([]);
    expect(res.stages.irOptimized).toBe(res.stages.ir);
    expect(res.stages.bytecodeOptimized).toBe(res.stages.bytecode);
  });

  it('produces every listing unless told not to', () => {
    expect(compileSource('print(1);').artifacts.map((a) => a.kind)).toEqual([
      'tokens',
      'ast',
      'typed-ast',
      'symbols',
      'ir',
      'ir-optimized',
      'bytecode',
      'bytecode-optimized',
    ]);
    expect(compileSource('print(1);', { emitListings: false }).artifacts).toEqual([]);
  });

  it('stops at the first lexical error', () => {
    const res = compileSource('int x = 1 @;', { path: 'bad.mc' });
    expect(res.diagnostics).toEqual([
      {
        id: 'MCC100',
        severity: 'error',
        stage: 'lex',
        message: 'Unexpected character "@"',
        file: 'bad.mc',
        line: 1,
        column: 11,
      },
    ]);
    expect(res.log).toEqual(['01. Lexical analysis failed: [MCC100] Unexpected character "@"']);
    expect(res.stages).toEqual({});
    expect(res.artifacts).toEqual([]);
  });

  it('keeps earlier stages when a later one fails', async () => {
    const parse = await compileFile(fixture('syntax_error.mc'));
    expect(parse.diagnostics.map((d) => d.id)).toEqual(['MCC200']);
    expect(parse.stages.tokens).toBeDefined();
    expect(parse.stages.ast).toBeUndefined();

    const res = compileSource('print(y);');
    expect(res.log[2]).toBe('03. Semantic analysis failed: [MCC300] Undeclared identifier "y"');
    expect(res.stages.ast).toBeDefined();
    expect(res.stages.typedAst).toBeUndefined();
    expect(res.artifacts.map((a) => a.kind)).toEqual(['tokens', 'ast']);
  });

  it('reports a run-time error after the output printed before it', async () => {
    const path = fixture('div_zero.mc');
    const res = await compileFile(path);
    expect(res.output).toEqual(['1']);
    expect(res.diagnostics).toEqual([
      {
        id: 'MCC400',
        severity: 'error',
        stage: 'runtime',
        message: 'Runtime error (division-by-zero): Division by zero',
        file: path,
        line: 2,
      },
    ]);
    expect(res.runtimeError?.kind).toBe('division-by-zero');
    expect(res.log[res.log.length - 1]).toBe('08. Execution stopped after 1 printed value: division-by-zero');
  });

  it('reports a missing file as an io diagnostic', async () => {
    const res = await compileFile(fixture('does_not_exist.mc'));
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({ id: 'MCC001', stage: 'io' });
    expect(res.diagnostics[0]?.message.startsWith('Failed to read entry file: ')).toBe(true);
    expect(res.log[0]?.startsWith('00. Reading ')).toBe(true);
  });

  it('bounds recursion depth', () => {
    const res = compileSource('int down(int n) { return down(n + 1); }\nprint(down(0));', { maxCallDepth: 50 });
    expect(res.diagnostics).toEqual([
      {
        id: 'MCC402',
        severity: 'error',
        stage: 'runtime',
        message: 'Runtime error (call-depth-exceeded): Call depth exceeded 50 frames in "down"',
        file: '<input>',
        line: 1,
      },
    ]);
  });

  it('bounds the number of executed instructions', () => {
    const res = compileSource('while (true) {}', { maxInstructions: 1000 });
    expect(res.diagnostics.map((d) => d.id)).toEqual(['MCC403']);
    expect(res.runtimeError).toMatchObject({
      kind: 'instruction-limit-exceeded',
      message: 'Instruction limit of 1000 exceeded',
    });
  });

  it('reports a value function that falls off its end', () => {
    const res = compileSource('int g(int x) {\n  if (x > 0) { return 1; }\n}\nprint(g(1));\nprint(g(0));');
    expect(res.output).toEqual(['1']);
    expect(res.diagnostics[0]).toMatchObject({
      id: 'MCC404',
      message: 'Runtime error (missing-return): Function "g" reached its end without returning a value',
      line: 3,
    });
  });

  it('prints floats in shortest form and bools as 1/0', () => {
    expect(outputOf('float h = 10;\nprint(h / 4);\nprint(h / 2.5);\nprint(3 == 3.0);\nprint(1 > 2);')).toEqual([
      '2.5',
      '4',
      '1',
      '0',
    ]);
  });

  it('evaluates both operands of && and ||', () => {
    const source =
      'int calls = 0;\nbool touch() { calls = calls + 1; return true; }\n' +
      'bool r = false && touch();\nr = true || touch();\nprint(calls);';
    expect(outputOf(source)).toEqual(['2']);
  });

  it('resolves shadowed names to the innermost declaration', () => {
    expect(outputOf('int x = 1;\n{ int x = 2; print(x); }\nprint(x);')).toEqual(['2', '1']);
  });

  it('uses truncating int division', () => {
    expect(outputOf('print(-7 / 2);\nprint(-7 % 2);\nprint(7 / 2 * 2.0);')).toEqual(['-3', '-1', '6']);
  });

  it('shares globals between functions and top-level code', () => {
    expect(outputOf('int counter = 0;\nvoid bump() { counter = counter + 1; }\nbump(); bump();\nprint(counter);')).toEqual([
      '2',
    ]);
  });

  it('prints the same values with and without optimization', () => {
    const sources = [
      'int fib(int n) { if (n < 2) { return n; } return fib(n - 1) + fib(n - 2); }\nprint(fib(10));',
      'int a = 3;\nint b = a * 2 + 1;\nwhile (b > 0) { b = b - a; print(b); }',
      'float s = 0;\nfor (int i = 1; i <= 4; i = i + 1) { s = s + 1.0 / i; }\nprint(s);',
      'bool flag = !(1 < 2) || 2 * 3 == 6;\nif (flag) { print(1); } else { print(0); }',
    ];
    for (const source of sources) {
      expect(outputOf(source, true)).toEqual(outputOf(source, false));
    }
  });
});
