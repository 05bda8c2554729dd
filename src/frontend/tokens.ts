export type TokenKind =
  | 'Keyword'
  | 'Identifier'
  | 'IntLiteral'
  | 'FloatLiteral'
  | 'BoolLiteral'
  | 'Operator'
  | 'Punctuation'
  | 'EOF';

/**
 * A lexical token. Tokens are never mutated after the lexer produces them.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  /** 1-based line of the first character. */
  readonly line: number;
  /** 1-based column of the first character. */
  readonly column: number;
  /** 0-based offset of the first character. */
  readonly offset: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'int',
  'float',
  'bool',
  'void',
  'if',
  'else',
  'while',
  'for',
  'return',
  'print',
]);

export const BOOL_LITERALS: ReadonlySet<string> = new Set(['true', 'false']);

/** Two-character operators, checked before single characters. */
export const OPERATORS_2: ReadonlySet<string> = new Set(['==', '!=', '<=', '>=', '&&', '||']);

export const OPERATORS_1: ReadonlySet<string> = new Set(['+', '-', '*', '/', '%', '!', '=', '<', '>']);

export const PUNCTUATION: ReadonlySet<string> = new Set(['(', ')', '{', '}', ',', ';']);

/**
 * Human-readable token description for diagnostics (`"x"`, `end of input`).
 */
export function describeToken(token: Token): string {
  if (token.kind === 'EOF') return 'end of input';
  return `"${token.lexeme}"`;
}
