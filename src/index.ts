export { compileFile, compileSource, DEFAULT_SOURCE_PATH } from './compile.js';
export type {
  CompileFn,
  CompileResult,
  CompileStages,
  CompilerOptions,
  PipelineDeps,
} from './pipeline.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { CompileError, DiagnosticIds } from './diagnostics/types.js';
export { defaultFormatWriters } from './formats/index.js';
export type { Artifact, ArtifactKind, FormatWriters } from './formats/types.js';
export { ARTIFACT_EXTENSIONS } from './formats/types.js';
export { tokenize } from './frontend/lexer.js';
export { parseProgram } from './frontend/parser.js';
export { analyzeProgram } from './semantics/analyze.js';
export { lowerProgram } from './ir/builder.js';
export { optimizeIr } from './ir/optimize.js';
export { generateBytecode } from './bytecode/codegen.js';
export { peephole } from './bytecode/peephole.js';
export { DEFAULT_LIMITS, execute } from './vm/machine.js';
export type { ExecutionLimits, ExecutionResult, RuntimeError, RuntimeErrorKind } from './vm/machine.js';
