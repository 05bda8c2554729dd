import type { ProgramNode } from '../frontend/ast.js';
import type { TypedProgram } from '../semantics/typed.js';
import type { AstArtifact, TypedAstArtifact } from './types.js';

/**
 * Wrap the parser's tree as a JSON artifact. The tree is plain data, so it serializes as-is.
 */
export function writeAst(program: ProgramNode): AstArtifact {
  return { kind: 'ast', json: program };
}

export function writeTypedAst(program: TypedProgram): TypedAstArtifact {
  return { kind: 'typed-ast', json: program };
}
