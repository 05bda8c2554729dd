import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { CompileError, DiagnosticIds, runStage } from '../diagnostics/types.js';
import type { SourceFile } from './source.js';
import { posAtOffset } from './source.js';
import type { Token, TokenKind } from './tokens.js';
import { BOOL_LITERALS, KEYWORDS, OPERATORS_1, OPERATORS_2, PUNCTUATION } from './tokens.js';

const INT_MAX = 2 ** 31 - 1;

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

function lexError(file: SourceFile, id: DiagnosticId, offset: number, message: string): never {
  const pos = posAtOffset(file, offset);
  throw new CompileError({
    id,
    severity: 'error',
    stage: 'lex',
    message,
    file: file.path,
    line: pos.line,
    column: pos.column,
  });
}

/**
 * Scan the whole file eagerly. Throws {@link CompileError} at the first bad character.
 */
function scan(file: SourceFile): Token[] {
  const text = file.text;
  const out: Token[] = [];
  let i = 0;

  const push = (kind: TokenKind, start: number, end: number): void => {
    const pos = posAtOffset(file, start);
    out.push({
      kind,
      lexeme: text.slice(start, end),
      line: pos.line,
      column: pos.column,
      offset: start,
    });
  };

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
      i++;
      continue;
    }

    if (ch === '/' && next === '/') {
      while (i < text.length && text[i] !== '\n') i++;
      continue;
    }

    if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      if (close < 0) {
        lexError(file, DiagnosticIds.UnterminatedComment, i, 'Unterminated block comment');
      }
      i = close + 2;
      continue;
    }

    if (isIdentStart(ch)) {
      const start = i;
      while (isIdentPart(text[i])) i++;
      const word = text.slice(start, i);
      const kind: TokenKind = KEYWORDS.has(word)
        ? 'Keyword'
        : BOOL_LITERALS.has(word)
          ? 'BoolLiteral'
          : 'Identifier';
      push(kind, start, i);
      continue;
    }

    if (isDigit(ch)) {
      const start = i;
      while (isDigit(text[i])) i++;
      if (text[i] === '.' && isDigit(text[i + 1])) {
        i++;
        while (isDigit(text[i])) i++;
        push('FloatLiteral', start, i);
        continue;
      }
      if (Number.parseInt(text.slice(start, i), 10) > INT_MAX) {
        lexError(
          file,
          DiagnosticIds.IntLiteralOutOfRange,
          start,
          `Integer literal ${text.slice(start, i)} does not fit in a 32-bit int`,
        );
      }
      push('IntLiteral', start, i);
      continue;
    }

    const two = text.slice(i, i + 2);
    if (OPERATORS_2.has(two)) {
      push('Operator', i, i + 2);
      i += 2;
      continue;
    }
    if (ch !== undefined && OPERATORS_1.has(ch)) {
      push('Operator', i, i + 1);
      i++;
      continue;
    }
    if (ch !== undefined && PUNCTUATION.has(ch)) {
      push('Punctuation', i, i + 1);
      i++;
      continue;
    }

    lexError(
      file,
      DiagnosticIds.UnexpectedCharacter,
      i,
      `Unexpected character ${JSON.stringify(ch)}`,
    );
  }

  push('EOF', text.length, text.length);
  return out;
}

/**
 * Split a source file into tokens, ending with exactly one `EOF` token.
 *
 * On a lexical error, a single diagnostic is appended and `undefined` is returned.
 */
export function tokenize(file: SourceFile, diagnostics: Diagnostic[]): Token[] | undefined {
  return runStage(diagnostics, file.path, () => scan(file));
}
