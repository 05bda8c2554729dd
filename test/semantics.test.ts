import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { tokenize } from '../src/frontend/lexer.js';
import { parseProgram } from '../src/frontend/parser.js';
import { makeSourceFile } from '../src/frontend/source.js';
import type { AnalysisResult } from '../src/semantics/analyze.js';
import { analyzeProgram } from '../src/semantics/analyze.js';

function analyze(text: string): { result: AnalysisResult | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const file = makeSourceFile('sem.mc', text);
  const tokens = tokenize(file, diagnostics);
  const program = tokens ? parseProgram(file, tokens, diagnostics) : undefined;
  if (!program) throw new Error(`front end failed: ${diagnostics[0]?.message ?? ''}`);
  return { result: analyzeProgram(program, diagnostics), diagnostics };
}

function accepted(text: string): AnalysisResult {
  const { result, diagnostics } = analyze(text);
  expect(diagnostics).toEqual([]);
  if (!result) throw new Error('analysis failed');
  return result;
}

function rejected(text: string): Diagnostic {
  const { result, diagnostics } = analyze(text);
  expect(result).toBeUndefined();
  expect(diagnostics).toHaveLength(1);
  const [d] = diagnostics;
  if (!d) throw new Error('no diagnostic');
  return d;
}

describe('semantic analysis', () => {
  it('widens int operands of a mixed expression to float', () => {
    const { typed } = accepted('float f = 1 + 2.5;');
    expect(typed.globals).toEqual([{ name: 'f', type: 'float', slot: 0 }]);
    expect(typed.main[0]).toMatchObject({
      kind: 'VarDecl',
      storage: { kind: 'global', slot: 0 },
      initializer: {
        kind: 'BinaryExpr',
        type: 'float',
        operandType: 'float',
        left: { kind: 'Widen', type: 'float', operand: { kind: 'Literal', value: { type: 'int', value: 1 } } },
        right: { kind: 'Literal', value: { type: 'float', value: 2.5 } },
      },
    });
  });

  it('widens an int argument passed to a float parameter', () => {
    const { typed } = accepted('float h(float x) { return x; }\nprint(h(3));');
    expect(typed.main[0]).toMatchObject({
      kind: 'PrintStmt',
      value: { kind: 'CallExpr', type: 'float', args: [{ kind: 'Widen', operand: { kind: 'Literal' } }] },
    });
  });

  it('puts outermost variables in globals and nested ones in the main frame', () => {
    const { typed } = accepted('int x = 1;\n{ float x = 2.0; print(x); }');
    expect(typed.globals).toEqual([{ name: 'x', type: 'int', slot: 0 }]);
    expect(typed.mainLocals).toBe(1);
    expect(typed.main[1]).toMatchObject({
      kind: 'Block',
      statements: [
        { kind: 'VarDecl', name: 'x', type: 'float', storage: { kind: 'local', slot: 0 } },
        { kind: 'PrintStmt', value: { kind: 'Identifier', type: 'float', storage: { kind: 'local', slot: 0 } } },
      ],
    });
  });

  it('gives parameters the first slots and every local its own slot', () => {
    const { typed } = accepted(
      'int f(int a, int b) {\n  int c = a;\n  { int d = b; }\n  for (int i = 0; i < 1; i = i + 1) {}\n  return c;\n}',
    );
    const [f] = typed.functions;
    expect(f?.params).toEqual([
      { name: 'a', type: 'int', slot: 0 },
      { name: 'b', type: 'int', slot: 1 },
    ]);
    expect(f?.frameSlots).toBe(5);
  });

  it('lets code call functions declared later in the file', () => {
    const { typed } = accepted('print(twice(4));\nint twice(int n) { return n * 2; }');
    expect(typed.functions.map((f) => f.name)).toEqual(['twice']);
  });

  it('only shows a function the globals declared before it', () => {
    expect(rejected('int f() { return late; }\nint late = 1;')).toMatchObject({
      id: 'MCC300',
      message: 'Undeclared identifier "late"',
      line: 1,
      column: 18,
    });
  });

  it('reports undeclared names', () => {
    expect(rejected('print(y);')).toEqual({
      id: 'MCC300',
      severity: 'error',
      stage: 'semantic',
      message: 'Undeclared identifier "y"',
      file: 'sem.mc',
      line: 1,
      column: 7,
    });
    expect(rejected('nope(1);').message).toBe('Undeclared function "nope"');
  });

  it('hides block and for variables once their scope closes', () => {
    expect(rejected('{ int x = 1; }\nprint(x);')).toMatchObject({
      id: 'MCC300',
      message: 'Undeclared identifier "x"',
      line: 2,
      column: 7,
    });
    expect(rejected('for (int i = 0; i < 2; i = i + 1) {}\nprint(i);')).toMatchObject({
      id: 'MCC300',
      message: 'Undeclared identifier "i"',
      line: 2,
      column: 7,
    });
  });

  it('reports redeclarations in one scope', () => {
    expect(rejected('int x; int x;')).toMatchObject({
      id: 'MCC301',
      message: '"x" is already declared in this scope',
      column: 8,
    });
    expect(rejected('int f() { return 1; } int f() { return 2; }')).toMatchObject({ id: 'MCC301', column: 23 });
    expect(rejected('int f() { return 1; }\nint f;').id).toBe('MCC301');
    expect(rejected('int f(int a, int a) { return a; }').id).toBe('MCC301');
    expect(rejected('int f(int a) { int a = 1; return a; }').id).toBe('MCC301');
  });

  it('checks initializers against the declared type', () => {
    expect(rejected('int z = 1.5;')).toMatchObject({
      id: 'MCC302',
      message: 'Cannot initialize int variable "z" with a float value',
      column: 9,
    });
    expect(rejected('bool b = 1;').message).toBe('Cannot initialize bool variable "b" with an int value');
  });

  it('checks assignments against the variable type', () => {
    expect(rejected('int z;\nz = 2.5;').message).toBe('Cannot assign float value to int variable "z"');
  });

  it('checks operator operand types', () => {
    expect(rejected('bool b = 1 + true;')).toMatchObject({
      id: 'MCC302',
      message: 'Operator "+" needs int or float operands, found int and bool',
      column: 10,
    });
    expect(rejected('print(1.5 % 2);').message).toBe('Operator "%" needs int operands, found float and int');
    expect(rejected('print(true == 1);').message).toBe('Operator "==" cannot compare bool and int');
    expect(rejected('print(1 && true);').message).toBe('Operator "&&" needs bool operands, found int and bool');
    expect(rejected('print(!1);').message).toBe('Operator "!" needs a bool operand, found int');
    expect(rejected('print(-true);').message).toBe('Operator "-" needs an int or float operand, found bool');
  });

  it('requires bool conditions', () => {
    expect(rejected('if (1) {}')).toMatchObject({ message: 'Condition of if must be bool, found int', column: 5 });
    expect(rejected('while (2.0) {}').message).toBe('Condition of while must be bool, found float');
    expect(rejected('for (; 0;) {}').message).toBe('Condition of for must be bool, found int');
  });

  it('checks call arity and argument types', () => {
    expect(rejected('int f(int a) { return a; }\nprint(f());')).toMatchObject({
      id: 'MCC303',
      message: 'Function "f" expects 1 argument, found 0',
      line: 2,
      column: 7,
    });
    expect(rejected('void g(int a) {}\ng(2.5);').message).toBe('Argument 1 of "g" must be int, found float');
  });

  it('separates variables from functions', () => {
    expect(rejected('int v;\nv();')).toMatchObject({ id: 'MCC305', message: '"v" is not a function' });
    expect(rejected('int f() { return 1; }\nprint(f);')).toMatchObject({
      id: 'MCC305',
      message: '"f" is a function and cannot be used as a variable',
    });
  });

  it('checks return statements against the enclosing function', () => {
    expect(rejected('void f() { return 1; }')).toMatchObject({
      id: 'MCC304',
      message: 'Function "f" returns void and cannot return a value',
    });
    expect(rejected('int f() { return; }').message).toBe('Function "f" must return an int value');
    expect(rejected('return 3;').message).toBe('A return outside a function cannot carry a value');
    expect(rejected('float f() { return true; }')).toMatchObject({
      id: 'MCC302',
      message: 'Function "f" returns float, found bool',
    });
    accepted('return;');
    accepted('float f() { return 1; }');
  });

  it('refuses to print a void call', () => {
    expect(rejected('void f() {}\nprint(f());').message).toBe('Cannot print a void value');
  });

  it('records every scope with its symbols', () => {
    const { symbols } = accepted('int g;\nint f(int a) {\n  { int b; }\n  return a;\n}');
    expect(symbols.scopes).toEqual([
      {
        id: 0,
        owner: 'global',
        within: '@main',
        depth: 0,
        symbols: [
          { kind: 'function', name: 'f', returnType: 'int', params: ['int'], line: 2 },
          { kind: 'variable', name: 'g', type: 'int', storage: { kind: 'global', slot: 0 }, line: 1 },
        ],
      },
      {
        id: 1,
        owner: 'function',
        within: 'f',
        depth: 1,
        symbols: [{ kind: 'variable', name: 'a', type: 'int', storage: { kind: 'local', slot: 0 }, line: 2 }],
      },
      {
        id: 2,
        owner: 'block',
        within: 'f',
        depth: 2,
        symbols: [{ kind: 'variable', name: 'b', type: 'int', storage: { kind: 'local', slot: 1 }, line: 3 }],
      },
    ]);
  });
});
