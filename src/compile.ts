import { readFile } from 'node:fs/promises';

import { generateBytecode } from './bytecode/codegen.js';
import { peephole } from './bytecode/peephole.js';
import type { Diagnostic, DiagnosticId } from './diagnostics/types.js';
import { DiagnosticIds, runStage } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import { tokenize } from './frontend/lexer.js';
import { parseProgram } from './frontend/parser.js';
import { makeSourceFile } from './frontend/source.js';
import { lowerProgram } from './ir/builder.js';
import { optimizeIr } from './ir/optimize.js';
import type { IrProgram } from './ir/types.js';
import type { CompileFn, CompileResult, CompilerOptions, PipelineDeps } from './pipeline.js';
import { analyzeProgram } from './semantics/analyze.js';
import type { RuntimeError, RuntimeErrorKind } from './vm/machine.js';
import { execute } from './vm/machine.js';

export const DEFAULT_SOURCE_PATH = '<input>';

const RUNTIME_DIAGNOSTICS: Record<RuntimeErrorKind, DiagnosticId> = {
  'division-by-zero': DiagnosticIds.DivideByZero,
  'modulo-by-zero': DiagnosticIds.ModuloByZero,
  'call-depth-exceeded': DiagnosticIds.CallDepthExceeded,
  'instruction-limit-exceeded': DiagnosticIds.InstructionLimitExceeded,
  'missing-return': DiagnosticIds.MissingReturn,
  'invalid-jump': DiagnosticIds.VmFault,
  'stack-underflow': DiagnosticIds.VmFault,
  'uninitialized-slot': DiagnosticIds.VmFault,
  'type-fault': DiagnosticIds.VmFault,
};

function instructionCount(ir: IrProgram): number {
  return ir.functions.reduce((n, fn) => n + fn.body.length, 0);
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function runtimeDiagnostic(file: string, error: RuntimeError): Diagnostic {
  return {
    id: RUNTIME_DIAGNOSTICS[error.kind],
    severity: 'error',
    stage: 'runtime',
    message: `Runtime error (${error.kind}): ${error.message}`,
    file,
    ...(error.line !== undefined ? { line: error.line } : {}),
  };
}

/**
 * Compile and (optionally) run one source text through every stage.
 *
 * Never throws: problems become diagnostics, and whatever stages finished before the first error
 * stay available in `stages`, `artifacts` and `log`.
 */
export const compileSource: CompileFn = (
  sourceText: string,
  options: CompilerOptions = {},
  deps: PipelineDeps = { formats: defaultFormatWriters },
): CompileResult => {
  const path = options.path ?? DEFAULT_SOURCE_PATH;
  const optimize = options.optimize ?? true;
  const emitListings = options.emitListings ?? true;
  const { formats } = deps;

  const result: CompileResult = { diagnostics: [], log: [], output: [], stages: {}, artifacts: [] };
  const { diagnostics, log, stages, artifacts } = result;

  const failed = (step: string, stage: string): CompileResult => {
    const d = diagnostics[diagnostics.length - 1];
    log.push(`${step}. ${stage} failed${d ? `: [${d.id}] ${d.message}` : ''}`);
    return result;
  };
  const notes = (lines: string[]): void => {
    for (const line of lines) log.push(`    ${line}`);
  };

  const file = makeSourceFile(path, sourceText);

  const tokens = tokenize(file, diagnostics);
  if (!tokens) return failed('01', 'Lexical analysis');
  stages.tokens = tokens;
  log.push(`01. Lexical analysis produced ${plural(tokens.length, 'token')}`);
  if (emitListings) artifacts.push(formats.writeTokens(tokens));

  const ast = parseProgram(file, tokens, diagnostics);
  if (!ast) return failed('02', 'Parsing');
  stages.ast = ast;
  log.push(`02. Parsing produced ${plural(ast.items.length, 'top-level item')}`);
  if (emitListings) artifacts.push(formats.writeAst(ast));

  const analysis = analyzeProgram(ast, diagnostics);
  if (!analysis) return failed('03', 'Semantic analysis');
  stages.typedAst = analysis.typed;
  stages.symbols = analysis.symbols;
  log.push(
    `03. Semantic analysis checked ${plural(analysis.typed.functions.length, 'function')} and ${plural(
      analysis.typed.globals.length,
      'global',
    )}`,
  );
  if (emitListings) {
    artifacts.push(formats.writeTypedAst(analysis.typed));
    artifacts.push(formats.writeSymbols(analysis.symbols));
  }

  const ir = runStage(diagnostics, path, () => lowerProgram(analysis.typed));
  if (!ir) return failed('04', 'IR generation');
  stages.ir = ir;
  log.push(
    `04. IR generation produced ${plural(instructionCount(ir), 'instruction')} in ${plural(
      ir.functions.length,
      'function',
    )}`,
  );
  if (emitListings) artifacts.push(formats.writeIr(ir));

  let irOptimized = ir;
  if (optimize) {
    const opt = runStage(diagnostics, path, () => optimizeIr(ir));
    if (!opt) return failed('05', 'IR optimization');
    irOptimized = opt.program;
    log.push(
      `05. IR optimization applied ${plural(opt.notes.length, 'rewrite')} (${instructionCount(ir)} -> ${instructionCount(
        irOptimized,
      )} instructions)`,
    );
    notes(opt.notes);
  } else {
    log.push('05. IR optimization skipped');
  }
  stages.irOptimized = irOptimized;
  if (emitListings) artifacts.push(formats.writeIr(irOptimized, { optimized: true }));

  const bytecode = runStage(diagnostics, path, () => generateBytecode(irOptimized));
  if (!bytecode) return failed('06', 'Code generation');
  stages.bytecode = bytecode;
  log.push(`06. Code generation produced ${plural(bytecode.code.length, 'bytecode instruction')}`);
  if (emitListings) artifacts.push(formats.writeBytecode(bytecode));

  let bytecodeOptimized = bytecode;
  if (optimize) {
    const opt = runStage(diagnostics, path, () => peephole(bytecode));
    if (!opt) return failed('07', 'Peephole optimization');
    bytecodeOptimized = opt.program;
    log.push(
      `07. Peephole optimization applied ${plural(opt.notes.length, 'rewrite')} (${bytecode.code.length} -> ${
        bytecodeOptimized.code.length
      } instructions)`,
    );
    notes(opt.notes);
  } else {
    log.push('07. Peephole optimization skipped');
  }
  stages.bytecodeOptimized = bytecodeOptimized;
  if (emitListings) artifacts.push(formats.writeBytecode(bytecodeOptimized, { optimized: true }));

  if (options.run === false) {
    log.push('08. Execution skipped');
    return result;
  }

  const run = execute(bytecodeOptimized, {
    ...(options.maxCallDepth !== undefined ? { maxCallDepth: options.maxCallDepth } : {}),
    ...(options.maxInstructions !== undefined ? { maxInstructions: options.maxInstructions } : {}),
  });
  result.output = run.output;
  if (run.error) {
    result.runtimeError = run.error;
    diagnostics.push(runtimeDiagnostic(path, run.error));
    log.push(
      `08. Execution stopped after ${plural(run.output.length, 'printed value')}: ${run.error.kind}`,
    );
    return result;
  }
  log.push(
    `08. Execution printed ${plural(run.output.length, 'value')} in ${plural(run.steps, 'step')}`,
  );
  return result;
};

/**
 * Read `entryFile` and compile it. Read failures become an `MCC001` diagnostic.
 */
export async function compileFile(
  entryFile: string,
  options: CompilerOptions = {},
  deps: PipelineDeps = { formats: defaultFormatWriters },
): Promise<CompileResult> {
  let sourceText: string;
  try {
    sourceText = await readFile(entryFile, 'utf8');
  } catch (err) {
    const message = `Failed to read entry file: ${err instanceof Error ? err.message : String(err)}`;
    return {
      diagnostics: [
        { id: DiagnosticIds.IoReadFailed, severity: 'error', stage: 'io', message, file: entryFile },
      ],
      log: [`00. Reading ${entryFile} failed: [${DiagnosticIds.IoReadFailed}] ${message}`],
      output: [],
      stages: {},
      artifacts: [],
    };
  }
  return compileSource(sourceText, { path: entryFile, ...options }, deps);
}
