import type {
  BinaryOperator,
  BlockNode,
  ExprNode,
  ExprStmtNode,
  ForStmtNode,
  FunctionDeclNode,
  IdentifierNode,
  IfStmtNode,
  ParamNode,
  PrintStmtNode,
  ProgramNode,
  ReturnStmtNode,
  SourceSpan,
  StmtNode,
  TopLevelNode,
  TypeName,
  VarDeclNode,
  WhileStmtNode,
} from './ast.js';
import type { SourceFile } from './source.js';
import { span } from './source.js';
import type { Token } from './tokens.js';
import { describeToken } from './tokens.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { CompileError, DiagnosticIds, runStage } from '../diagnostics/types.js';

const TYPE_KEYWORDS = new Set<string>(['int', 'float', 'bool', 'void']);

/**
 * Deepest statement/expression nesting accepted. Every later stage walks the tree recursively,
 * so this also bounds their stack use.
 */
export const MAX_NESTING_DEPTH = 256;

/**
 * Binary precedence levels, lowest first. Every level is left-associative.
 */
const BINARY_LEVELS: readonly (readonly BinaryOperator[])[] = [
  ['||'],
  ['&&'],
  ['==', '!='],
  ['<', '<=', '>', '>='],
  ['+', '-'],
  ['*', '/', '%'],
];

function isTypeName(lexeme: string): lexeme is TypeName {
  return TYPE_KEYWORDS.has(lexeme);
}

/**
 * Recursive-descent parser over a token array. Throws {@link CompileError} at the first deviation.
 */
function parseTokens(file: SourceFile, tokens: Token[]): ProgramNode {
  let idx = 0;

  const eof = tokens[tokens.length - 1];
  if (!eof || eof.kind !== 'EOF') {
    throw new Error('token stream must end with EOF');
  }

  const peek = (ahead = 0): Token => tokens[Math.min(idx + ahead, tokens.length - 1)] ?? eof;
  const previous = (): Token => tokens[idx - 1] ?? eof;
  const advance = (): Token => {
    const t = peek();
    if (t.kind !== 'EOF') idx++;
    return t;
  };
  const check = (lexeme: string): boolean => {
    const t = peek();
    return t.kind !== 'EOF' && t.kind !== 'Identifier' && t.lexeme === lexeme;
  };
  const match = (lexeme: string): boolean => {
    if (!check(lexeme)) return false;
    advance();
    return true;
  };

  const fail = (expected: string, context: string, at: Token = peek()): never => {
    throw new CompileError({
      id: DiagnosticIds.ParseError,
      severity: 'error',
      stage: 'parse',
      message: `Expected ${expected} ${context}, found ${describeToken(at)}`,
      file: file.path,
      line: at.line,
      column: at.column,
      expected,
      found: at.kind === 'EOF' ? '<eof>' : at.lexeme,
    });
  };

  let depth = 0;
  const nested = <T>(parse: () => T): T => {
    const at = peek();
    if (depth >= MAX_NESTING_DEPTH) {
      const expected = `at most ${MAX_NESTING_DEPTH} levels of nesting`;
      throw new CompileError({
        id: DiagnosticIds.ParseError,
        severity: 'error',
        stage: 'parse',
        message: `Expected ${expected}, found ${describeToken(at)}`,
        file: file.path,
        line: at.line,
        column: at.column,
        expected,
        found: at.kind === 'EOF' ? '<eof>' : at.lexeme,
      });
    }
    depth++;
    try {
      return parse();
    } finally {
      depth--;
    }
  };

  const expect = (lexeme: string, context: string): Token => {
    if (check(lexeme)) return advance();
    return fail(`"${lexeme}"`, context);
  };

  const expectIdentifier = (context: string): Token => {
    if (peek().kind === 'Identifier') return advance();
    return fail('identifier', context);
  };

  const spanFrom = (start: Token): SourceSpan => {
    const last = previous();
    return span(file, start.offset, last.offset + last.lexeme.length);
  };

  const spanOf = (from: { span: SourceSpan }, to: { span: SourceSpan }): SourceSpan => ({
    file: file.path,
    start: from.span.start,
    end: to.span.end,
  });

  // ---------- declarations ----------

  function topLevel(): TopLevelNode {
    const t = peek();
    if (t.kind === 'Keyword' && isTypeName(t.lexeme) && peek(1).kind === 'Identifier') {
      if (peek(2).lexeme === '(' && peek(2).kind === 'Punctuation') {
        return functionDecl();
      }
    }
    return statement();
  }

  function functionDecl(): FunctionDeclNode {
    const start = advance();
    const returnType = start.lexeme;
    if (!isTypeName(returnType)) return fail('type name', 'before function name', start);
    const name = expectIdentifier('after return type');
    expect('(', 'after function name');
    const params: ParamNode[] = [];
    if (!check(')')) {
      do {
        params.push(param());
      } while (match(','));
    }
    expect(')', 'after parameters');
    if (!check('{')) fail('"{"', 'before function body');
    const body = block();
    return {
      kind: 'FunctionDecl',
      span: spanFrom(start),
      returnType,
      name: name.lexeme,
      params,
      body,
    };
  }

  function param(): ParamNode {
    const t = peek();
    if (t.kind !== 'Keyword' || !isTypeName(t.lexeme) || t.lexeme === 'void') {
      return fail('parameter type (int, float or bool)', 'in parameter list');
    }
    advance();
    const name = expectIdentifier('after parameter type');
    return {
      kind: 'Param',
      span: spanFrom(t),
      type: t.lexeme === 'int' || t.lexeme === 'float' ? t.lexeme : 'bool',
      name: name.lexeme,
    };
  }

  /**
   * `type name (= expr)? ;` with the type keyword still unconsumed.
   */
  function varDecl(): VarDeclNode {
    const start = advance();
    const type = start.lexeme;
    if (type === 'void') {
      return fail('variable type (int, float or bool)', 'in declaration', start);
    }
    if (type !== 'int' && type !== 'float' && type !== 'bool') {
      return fail('type name', 'in declaration', start);
    }
    const name = expectIdentifier('after type in declaration');
    if (check('(')) {
      return fail('"=" or ";"', 'after variable name (functions are only allowed at top level)');
    }
    let initializer: ExprNode | undefined;
    if (match('=')) initializer = expression();
    expect(';', 'after declaration');
    return {
      kind: 'VarDecl',
      span: spanFrom(start),
      type,
      name: name.lexeme,
      ...(initializer ? { initializer } : {}),
    };
  }

  // ---------- statements ----------

  function statement(): StmtNode {
    return nested(statementAt);
  }

  function statementAt(): StmtNode {
    const t = peek();
    if (t.kind === 'Keyword') {
      switch (t.lexeme) {
        case 'int':
        case 'float':
        case 'bool':
        case 'void':
          return varDecl();
        case 'if':
          return ifStmt();
        case 'while':
          return whileStmt();
        case 'for':
          return forStmt();
        case 'return':
          return returnStmt();
        case 'print':
          return printStmt();
        default:
          break;
      }
    }
    if (check('{')) return block();
    return exprStmt();
  }

  function block(): BlockNode {
    const start = expect('{', 'to open block');
    const statements: StmtNode[] = [];
    while (!check('}') && peek().kind !== 'EOF') {
      statements.push(statement());
    }
    expect('}', 'to close block');
    return { kind: 'Block', span: spanFrom(start), statements };
  }

  function ifStmt(): IfStmtNode {
    const start = advance();
    expect('(', 'after "if"');
    const condition = expression();
    expect(')', 'after if condition');
    const thenBranch = statement();
    const elseBranch = match('else') ? statement() : undefined;
    return {
      kind: 'IfStmt',
      span: spanFrom(start),
      condition,
      thenBranch,
      ...(elseBranch ? { elseBranch } : {}),
    };
  }

  function whileStmt(): WhileStmtNode {
    const start = advance();
    expect('(', 'after "while"');
    const condition = expression();
    expect(')', 'after while condition');
    const body = statement();
    return { kind: 'WhileStmt', span: spanFrom(start), condition, body };
  }

  function forStmt(): ForStmtNode {
    const start = advance();
    expect('(', 'after "for"');

    let init: VarDeclNode | ExprStmtNode | undefined;
    if (!match(';')) {
      const t = peek();
      init = t.kind === 'Keyword' && isTypeName(t.lexeme) ? varDecl() : exprStmt();
    }

    const condition = check(';') ? undefined : expression();
    expect(';', 'after for condition');
    const update = check(')') ? undefined : expression();
    expect(')', 'after for clauses');
    const body = statement();

    return {
      kind: 'ForStmt',
      span: spanFrom(start),
      ...(init ? { init } : {}),
      ...(condition ? { condition } : {}),
      ...(update ? { update } : {}),
      body,
    };
  }

  function returnStmt(): ReturnStmtNode {
    const start = advance();
    const value = check(';') ? undefined : expression();
    expect(';', 'after return');
    return { kind: 'ReturnStmt', span: spanFrom(start), ...(value ? { value } : {}) };
  }

  function printStmt(): PrintStmtNode {
    const start = advance();
    expect('(', 'after "print"');
    const value = expression();
    expect(')', 'after print argument');
    expect(';', 'after print statement');
    return { kind: 'PrintStmt', span: spanFrom(start), value };
  }

  function exprStmt(): ExprStmtNode {
    const start = peek();
    const expr = expression();
    expect(';', 'after expression');
    return { kind: 'ExprStmt', span: spanFrom(start), expr };
  }

  // ---------- expressions ----------

  function expression(): ExprNode {
    return nested(assignment);
  }

  function assignment(): ExprNode {
    const target = binary(0);
    if (!check('=')) return target;
    const equals = advance();
    if (target.kind !== 'Identifier') {
      return fail('identifier', 'on the left of "="', equals);
    }
    const value = nested(assignment);
    return { kind: 'AssignExpr', span: spanOf(target, value), target, value };
  }

  function binary(level: number): ExprNode {
    const ops = BINARY_LEVELS[level];
    if (!ops) return unary();
    let left = binary(level + 1);
    while (true) {
      const t = peek();
      const op = ops.find((o) => t.kind === 'Operator' && t.lexeme === o);
      if (!op) break;
      advance();
      const right = binary(level + 1);
      left = { kind: 'BinaryExpr', span: spanOf(left, right), op, left, right };
    }
    return left;
  }

  function unary(): ExprNode {
    const t = peek();
    const op = t.lexeme;
    if (t.kind === 'Operator' && (op === '-' || op === '!' || op === '+')) {
      advance();
      const operand = nested(unary);
      return { kind: 'UnaryExpr', span: spanFrom(t), op, operand };
    }
    return primary();
  }

  function primary(): ExprNode {
    const t = peek();
    switch (t.kind) {
      case 'IntLiteral':
        advance();
        return { kind: 'IntLiteral', span: spanFrom(t), value: Number.parseInt(t.lexeme, 10) };
      case 'FloatLiteral':
        advance();
        return { kind: 'FloatLiteral', span: spanFrom(t), value: Number.parseFloat(t.lexeme) };
      case 'BoolLiteral':
        advance();
        return { kind: 'BoolLiteral', span: spanFrom(t), value: t.lexeme === 'true' };
      case 'Identifier': {
        advance();
        if (!match('(')) {
          const id: IdentifierNode = { kind: 'Identifier', span: spanFrom(t), name: t.lexeme };
          return id;
        }
        const args: ExprNode[] = [];
        if (!check(')')) {
          do {
            args.push(expression());
          } while (match(','));
        }
        expect(')', 'after call arguments');
        return { kind: 'CallExpr', span: spanFrom(t), callee: t.lexeme, args };
      }
      default:
        break;
    }
    if (match('(')) {
      const inner = expression();
      expect(')', 'after parenthesized expression');
      return inner;
    }
    return fail('expression', 'here');
  }

  const items: TopLevelNode[] = [];
  const first = peek();
  while (peek().kind !== 'EOF') {
    items.push(topLevel());
  }
  const programSpan = span(file, first.offset, file.text.length);
  return { kind: 'Program', span: programSpan, items };
}

/**
 * Parse a token stream (as produced by `tokenize`) into a {@link ProgramNode}.
 *
 * Parsing stops at the first syntax error: one diagnostic is appended and `undefined` returned.
 */
export function parseProgram(
  file: SourceFile,
  tokens: Token[],
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  return runStage(diagnostics, file.path, () => parseTokens(file, tokens));
}
