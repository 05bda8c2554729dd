import type { BytecodeProgram } from './bytecode/types.js';
import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { ProgramNode } from './frontend/ast.js';
import type { Token } from './frontend/tokens.js';
import type { IrProgram } from './ir/types.js';
import type { SymbolTableSnapshot } from './semantics/symbols.js';
import type { TypedProgram } from './semantics/typed.js';
import type { RuntimeError } from './vm/machine.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /** File name reported in diagnostics and spans (default `<input>`). */
  path?: string;
  /** Run the IR optimizer and the peephole optimizer (default true). */
  optimize?: boolean;
  /** Execute the final bytecode (default true). */
  run?: boolean;
  /** Render every produced stage through the format writers (default true). */
  emitListings?: boolean;
  /** Frame limit for the VM, `@main` included (default 1024). */
  maxCallDepth?: number;
  /** Executed-instruction limit for the VM (default 5,000,000). */
  maxInstructions?: number;
}

/**
 * Output of every stage that ran. A stage that failed leaves its entry (and all later ones) unset.
 */
export interface CompileStages {
  tokens?: Token[];
  ast?: ProgramNode;
  typedAst?: TypedProgram;
  symbols?: SymbolTableSnapshot;
  ir?: IrProgram;
  /** Equal to `ir` when optimization is off. */
  irOptimized?: IrProgram;
  bytecode?: BytecodeProgram;
  /** Equal to `bytecode` when optimization is off. */
  bytecodeOptimized?: BytecodeProgram;
}

/**
 * Result of a compilation run.
 */
export interface CompileResult {
  /** At most one error: compilation stops at the first one. */
  diagnostics: Diagnostic[];
  /** Numbered stage progress lines, followed by indented optimizer notes. */
  log: string[];
  /** Values printed by the program, in order; partial when execution failed. */
  output: string[];
  stages: CompileStages;
  artifacts: Artifact[];
  /** Set when execution stopped with a run-time error (also reported in `diagnostics`). */
  runtimeError?: RuntimeError;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  sourceText: string,
  options?: CompilerOptions,
  deps?: PipelineDeps,
) => CompileResult;
