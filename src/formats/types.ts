import type { BytecodeProgram } from '../bytecode/types.js';
import type { ProgramNode } from '../frontend/ast.js';
import type { Token } from '../frontend/tokens.js';
import type { IrProgram } from '../ir/types.js';
import type { SymbolTableSnapshot } from '../semantics/symbols.js';
import type { TypedProgram } from '../semantics/typed.js';

/**
 * Options shared by the text listing writers.
 */
export interface WriteTextOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for the IR and bytecode listings, which exist before and after optimization.
 */
export interface WriteStageOptions extends WriteTextOptions {
  /** Label the listing as the optimizer's output (`.opt.ir` / `.opt.bc`). */
  optimized?: boolean;
}

/**
 * Token listing (`.tokens.txt`): one token per line with its position.
 */
export interface TokensArtifact {
  kind: 'tokens';
  path?: string;
  text: string;
}

/**
 * JSON dump of the parser's tree (`.ast.json`).
 */
export interface AstArtifact {
  kind: 'ast';
  path?: string;
  json: ProgramNode;
}

/**
 * JSON dump of the typed tree (`.typed.json`).
 */
export interface TypedAstArtifact {
  kind: 'typed-ast';
  path?: string;
  json: TypedProgram;
}

/**
 * Scope-by-scope symbol table listing (`.symbols.txt`).
 */
export interface SymbolsArtifact {
  kind: 'symbols';
  path?: string;
  text: string;
}

/**
 * Three-address IR listing (`.ir`, or `.opt.ir` after optimization).
 */
export interface IrArtifact {
  kind: 'ir' | 'ir-optimized';
  path?: string;
  text: string;
}

/**
 * Bytecode listing (`.bc`, or `.opt.bc` after peephole optimization).
 */
export interface BytecodeArtifact {
  kind: 'bytecode' | 'bytecode-optimized';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact =
  | TokensArtifact
  | AstArtifact
  | TypedAstArtifact
  | SymbolsArtifact
  | IrArtifact
  | BytecodeArtifact;

export type ArtifactKind = Artifact['kind'];

/**
 * File extension (after the source stem) used when an artifact is written to disk.
 */
export const ARTIFACT_EXTENSIONS: Record<ArtifactKind, string> = {
  tokens: '.tokens.txt',
  ast: '.ast.json',
  'typed-ast': '.typed.json',
  symbols: '.symbols.txt',
  ir: '.ir',
  'ir-optimized': '.opt.ir',
  bytecode: '.bc',
  'bytecode-optimized': '.opt.bc',
};

/**
 * Format writers used by the pipeline to turn stage outputs into artifacts.
 */
export interface FormatWriters {
  writeTokens(tokens: Token[], opts?: WriteTextOptions): TokensArtifact;
  writeAst(program: ProgramNode): AstArtifact;
  writeTypedAst(program: TypedProgram): TypedAstArtifact;
  writeSymbols(symbols: SymbolTableSnapshot, opts?: WriteTextOptions): SymbolsArtifact;
  writeIr(program: IrProgram, opts?: WriteStageOptions): IrArtifact;
  writeBytecode(program: BytecodeProgram, opts?: WriteStageOptions): BytecodeArtifact;
}
