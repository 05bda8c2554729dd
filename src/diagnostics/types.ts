/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * Pipeline stage that produced a diagnostic.
 */
export type DiagnosticStage = 'io' | 'lex' | 'parse' | 'semantic' | 'runtime' | 'internal';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `MCC200`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  stage: DiagnosticStage;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** Parse errors only: what the grammar wanted at this point. */
  expected?: string;
  /** Parse errors only: the lexeme actually found. */
  found?: string;
}

/**
 * Known diagnostic IDs.
 *
 * The hundreds digit follows the pipeline stage: 1xx lexer, 2xx parser, 3xx semantics, 4xx VM.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'MCC000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'MCC001',

  /** Unexpected exception inside a pipeline stage. */
  InternalError: 'MCC002',

  /** Character that does not start any token. */
  UnexpectedCharacter: 'MCC100',

  /** `/*` without a closing `*\/`. */
  UnterminatedComment: 'MCC101',

  /** Integer literal that does not fit in a signed 32-bit int. */
  IntLiteralOutOfRange: 'MCC102',

  /** Generic syntax error. */
  ParseError: 'MCC200',

  /** Reference to a name with no visible declaration. */
  UndeclaredIdentifier: 'MCC300',

  /** Second declaration of a name in the same scope. */
  Redeclaration: 'MCC301',

  /** Operand, initializer, argument, assignment or condition of the wrong type. */
  TypeMismatch: 'MCC302',

  /** Call with the wrong number of arguments. */
  ArityMismatch: 'MCC303',

  /** `return` with/without a value where the function disagrees. */
  InvalidReturn: 'MCC304',

  /** Calling a variable, or reading/assigning a function as a variable. */
  SymbolKindMismatch: 'MCC305',

  /** Division by zero at run time. */
  DivideByZero: 'MCC400',

  /** Modulo by zero at run time. */
  ModuloByZero: 'MCC401',

  /** Frame stack grew past the configured bound. */
  CallDepthExceeded: 'MCC402',

  /** Executed-instruction counter passed the configured bound. */
  InstructionLimitExceeded: 'MCC403',

  /** Non-void function reached its end without returning a value. */
  MissingReturn: 'MCC404',

  /** VM invariant violated (bad jump, stack underflow, ...): a code generation bug. */
  VmFault: 'MCC405',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Error thrown inside a stage to abort it at the first problem.
 *
 * Stage entry points catch it and append {@link CompileError.diagnostic} to the caller's list.
 */
export class CompileError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = 'CompileError';
    this.diagnostic = diagnostic;
  }
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Run `body`, converting a thrown {@link CompileError} into a pushed diagnostic.
 *
 * Any other exception is reported as {@link DiagnosticIds.InternalError}.
 */
export function runStage<T>(
  diagnostics: Diagnostic[],
  file: string,
  body: () => T,
): T | undefined {
  try {
    return body();
  } catch (err) {
    if (err instanceof CompileError) {
      diagnostics.push(err.diagnostic);
      return undefined;
    }
    diagnostics.push({
      id: DiagnosticIds.InternalError,
      severity: 'error',
      stage: 'internal',
      message: `Internal compiler error: ${err instanceof Error ? err.message : String(err)}`,
      file,
    });
    return undefined;
  }
}
