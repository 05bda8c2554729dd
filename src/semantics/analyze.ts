import type {
  BinaryExprNode,
  CallExprNode,
  ExprNode,
  ForStmtNode,
  FunctionDeclNode,
  ProgramNode,
  SourceSpan,
  StmtNode,
  UnaryExprNode,
  VarDeclNode,
} from '../frontend/ast.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { CompileError, DiagnosticIds, runStage } from '../diagnostics/types.js';
import type { FunctionSymbol, Storage, SymbolTableSnapshot, VariableSymbol } from './symbols.js';
import { SymbolTable } from './symbols.js';
import type {
  TypedExpr,
  TypedExprStmt,
  TypedFor,
  TypedFunction,
  TypedGlobal,
  TypedProgram,
  TypedStmt,
  TypedVarDecl,
} from './typed.js';
import type { ScalarType, ValueType } from './types.js';
import { isAssignable, isNumeric, promote } from './types.js';
import { boolValue, floatValue, intValue } from '../vm/value.js';

export interface AnalysisResult {
  typed: TypedProgram;
  symbols: SymbolTableSnapshot;
}

/**
 * Frame being filled while a function (or top-level code) is analysed.
 */
interface FrameContext {
  name: string;
  /** Present inside a function body; absent for top-level code. */
  returnType?: ScalarType;
  nextSlot: number;
}

function article(t: ScalarType): string {
  return t === 'int' ? 'an' : 'a';
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function analyze(program: ProgramNode): AnalysisResult {
  const table = new SymbolTable();
  const globals: TypedGlobal[] = [];
  const mainFrame: FrameContext = { name: '@main', nextSlot: 0 };
  let frame = mainFrame;

  const fail = (id: DiagnosticId, at: SourceSpan, message: string): never => {
    throw new CompileError({
      id,
      severity: 'error',
      stage: 'semantic',
      message,
      file: at.file,
      line: at.start.line,
      column: at.start.column,
    });
  };

  const mismatch = (at: SourceSpan, message: string): never =>
    fail(DiagnosticIds.TypeMismatch, at, message);

  const widen = (expr: TypedExpr, to: 'int' | 'float'): TypedExpr =>
    to === 'float' && expr.type === 'int'
      ? { kind: 'Widen', span: expr.span, type: 'float', operand: expr }
      : expr;

  /**
   * Make `expr` usable where `to` is expected, inserting a widening node for int -> float.
   */
  const coerce = (expr: TypedExpr, to: ValueType, message: () => string): TypedExpr => {
    if (!isAssignable(to, expr.type)) return mismatch(expr.span, message());
    return to === 'bool' ? expr : widen(expr, to);
  };

  const declareVariable = (name: string, type: ValueType, at: SourceSpan): Storage => {
    const storage: Storage = table.atGlobalScope()
      ? { kind: 'global', slot: globals.length }
      : { kind: 'local', slot: frame.nextSlot };
    const entry: VariableSymbol = { kind: 'variable', name, type, storage, line: at.start.line };
    if (table.declare(entry)) {
      return fail(DiagnosticIds.Redeclaration, at, `"${name}" is already declared in this scope`);
    }
    if (storage.kind === 'global') {
      globals.push({ name, type, slot: storage.slot });
    } else {
      frame.nextSlot++;
    }
    return storage;
  };

  const lookupVariable = (name: string, at: SourceSpan): VariableSymbol => {
    const entry = table.lookup(name);
    if (!entry) return fail(DiagnosticIds.UndeclaredIdentifier, at, `Undeclared identifier "${name}"`);
    if (entry.kind !== 'variable') {
      return fail(
        DiagnosticIds.SymbolKindMismatch,
        at,
        `"${name}" is a function and cannot be used as a variable`,
      );
    }
    return entry;
  };

  // ---------- expressions ----------

  function expression(node: ExprNode): TypedExpr {
    switch (node.kind) {
      case 'IntLiteral':
        return { kind: 'Literal', span: node.span, type: 'int', value: intValue(node.value) };
      case 'FloatLiteral':
        return { kind: 'Literal', span: node.span, type: 'float', value: floatValue(node.value) };
      case 'BoolLiteral':
        return { kind: 'Literal', span: node.span, type: 'bool', value: boolValue(node.value) };
      case 'Identifier': {
        const v = lookupVariable(node.name, node.span);
        return {
          kind: 'Identifier',
          span: node.span,
          type: v.type,
          name: v.name,
          storage: v.storage,
        };
      }
      case 'AssignExpr': {
        const v = lookupVariable(node.target.name, node.target.span);
        const value = expression(node.value);
        const coerced = coerce(
          value,
          v.type,
          () => `Cannot assign ${value.type} value to ${v.type} variable "${v.name}"`,
        );
        return {
          kind: 'AssignExpr',
          span: node.span,
          type: v.type,
          name: v.name,
          storage: v.storage,
          value: coerced,
        };
      }
      case 'BinaryExpr':
        return binary(node);
      case 'UnaryExpr':
        return unary(node);
      case 'CallExpr':
        return call(node);
    }
  }

  function binary(node: BinaryExprNode): TypedExpr {
    const left = expression(node.left);
    const right = expression(node.right);
    const op = node.op;
    const lt = left.type;
    const rt = right.type;

    switch (op) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '<':
      case '<=':
      case '>':
      case '>=': {
        if (!isNumeric(lt) || !isNumeric(rt)) {
          return mismatch(node.span, `Operator "${op}" needs int or float operands, found ${lt} and ${rt}`);
        }
        const operandType = promote(lt, rt);
        return {
          kind: 'BinaryExpr',
          span: node.span,
          type: op === '+' || op === '-' || op === '*' || op === '/' ? operandType : 'bool',
          op,
          operandType,
          left: widen(left, operandType),
          right: widen(right, operandType),
        };
      }
      case '%':
        if (lt !== 'int' || rt !== 'int') {
          return mismatch(node.span, `Operator "%" needs int operands, found ${lt} and ${rt}`);
        }
        return { kind: 'BinaryExpr', span: node.span, type: 'int', op, operandType: 'int', left, right };
      case '==':
      case '!=': {
        if (lt === 'bool' && rt === 'bool') {
          return { kind: 'BinaryExpr', span: node.span, type: 'bool', op, operandType: 'bool', left, right };
        }
        if (!isNumeric(lt) || !isNumeric(rt)) {
          return mismatch(node.span, `Operator "${op}" cannot compare ${lt} and ${rt}`);
        }
        const operandType = promote(lt, rt);
        return {
          kind: 'BinaryExpr',
          span: node.span,
          type: 'bool',
          op,
          operandType,
          left: widen(left, operandType),
          right: widen(right, operandType),
        };
      }
      case '&&':
      case '||':
        if (lt !== 'bool' || rt !== 'bool') {
          return mismatch(node.span, `Operator "${op}" needs bool operands, found ${lt} and ${rt}`);
        }
        return { kind: 'BinaryExpr', span: node.span, type: 'bool', op, operandType: 'bool', left, right };
    }
  }

  function unary(node: UnaryExprNode): TypedExpr {
    const operand = expression(node.operand);
    const t = operand.type;
    if (node.op === '!') {
      if (t !== 'bool') return mismatch(node.span, `Operator "!" needs a bool operand, found ${t}`);
      return { kind: 'UnaryExpr', span: node.span, type: 'bool', op: '!', operand };
    }
    if (t !== 'int' && t !== 'float') {
      return mismatch(node.span, `Operator "${node.op}" needs an int or float operand, found ${t}`);
    }
    return { kind: 'UnaryExpr', span: node.span, type: t, op: node.op, operand };
  }

  function call(node: CallExprNode): TypedExpr {
    const entry = table.lookup(node.callee);
    if (!entry) {
      return fail(DiagnosticIds.UndeclaredIdentifier, node.span, `Undeclared function "${node.callee}"`);
    }
    if (entry.kind !== 'function') {
      return fail(DiagnosticIds.SymbolKindMismatch, node.span, `"${node.callee}" is not a function`);
    }
    if (entry.params.length !== node.args.length) {
      return fail(
        DiagnosticIds.ArityMismatch,
        node.span,
        `Function "${entry.name}" expects ${plural(entry.params.length, 'argument')}, found ${node.args.length}`,
      );
    }
    const args = node.args.map((argNode, i) => {
      const arg = expression(argNode);
      const want = entry.params[i] ?? 'int';
      return coerce(arg, want, () => `Argument ${i + 1} of "${entry.name}" must be ${want}, found ${arg.type}`);
    });
    return { kind: 'CallExpr', span: node.span, type: entry.returnType, callee: entry.name, args };
  }

  const condition = (node: ExprNode, owner: string): TypedExpr => {
    const c = expression(node);
    if (c.type !== 'bool') {
      return mismatch(c.span, `Condition of ${owner} must be bool, found ${c.type}`);
    }
    return c;
  };

  // ---------- statements ----------

  function varDecl(node: VarDeclNode): TypedVarDecl {
    const init = node.initializer ? expression(node.initializer) : undefined;
    const initializer = init
      ? coerce(
          init,
          node.type,
          () => `Cannot initialize ${node.type} variable "${node.name}" with ${article(init.type)} ${init.type} value`,
        )
      : undefined;
    const storage = declareVariable(node.name, node.type, node.span);
    return {
      kind: 'VarDecl',
      span: node.span,
      name: node.name,
      type: node.type,
      storage,
      ...(initializer ? { initializer } : {}),
    };
  }

  function forStmt(node: ForStmtNode): TypedFor {
    table.push('for');
    let init: TypedVarDecl | TypedExprStmt | undefined;
    if (node.init?.kind === 'VarDecl') {
      init = varDecl(node.init);
    } else if (node.init) {
      init = { kind: 'ExprStmt', span: node.init.span, expr: expression(node.init.expr) };
    }
    const c = node.condition ? condition(node.condition, 'for') : undefined;
    const update = node.update ? expression(node.update) : undefined;
    const body = statement(node.body);
    table.pop();
    return {
      kind: 'ForStmt',
      span: node.span,
      ...(init ? { init } : {}),
      ...(c ? { condition: c } : {}),
      ...(update ? { update } : {}),
      body,
    };
  }

  function statement(node: StmtNode): TypedStmt {
    switch (node.kind) {
      case 'VarDecl':
        return varDecl(node);
      case 'Block': {
        table.push('block');
        const statements = node.statements.map(statement);
        table.pop();
        return { kind: 'Block', span: node.span, statements };
      }
      case 'IfStmt': {
        const c = condition(node.condition, 'if');
        const thenBranch = statement(node.thenBranch);
        const elseBranch = node.elseBranch ? statement(node.elseBranch) : undefined;
        return {
          kind: 'IfStmt',
          span: node.span,
          condition: c,
          thenBranch,
          ...(elseBranch ? { elseBranch } : {}),
        };
      }
      case 'WhileStmt':
        return {
          kind: 'WhileStmt',
          span: node.span,
          condition: condition(node.condition, 'while'),
          body: statement(node.body),
        };
      case 'ForStmt':
        return forStmt(node);
      case 'ReturnStmt': {
        const returnType = frame.returnType;
        if (returnType === undefined) {
          if (node.value) {
            return fail(
              DiagnosticIds.InvalidReturn,
              node.span,
              'A return outside a function cannot carry a value',
            );
          }
          return { kind: 'ReturnStmt', span: node.span };
        }
        if (returnType === 'void') {
          if (node.value) {
            return fail(
              DiagnosticIds.InvalidReturn,
              node.span,
              `Function "${frame.name}" returns void and cannot return a value`,
            );
          }
          return { kind: 'ReturnStmt', span: node.span };
        }
        if (!node.value) {
          return fail(
            DiagnosticIds.InvalidReturn,
            node.span,
            `Function "${frame.name}" must return ${article(returnType)} ${returnType} value`,
          );
        }
        const value = expression(node.value);
        const coerced = coerce(
          value,
          returnType,
          () => `Function "${frame.name}" returns ${returnType}, found ${value.type}`,
        );
        return { kind: 'ReturnStmt', span: node.span, value: coerced };
      }
      case 'PrintStmt': {
        const value = expression(node.value);
        if (value.type === 'void') return mismatch(value.span, 'Cannot print a void value');
        return { kind: 'PrintStmt', span: node.span, value };
      }
      case 'ExprStmt':
        return { kind: 'ExprStmt', span: node.span, expr: expression(node.expr) };
    }
  }

  function functionDecl(node: FunctionDeclNode): TypedFunction {
    const ctx: FrameContext = { name: node.name, returnType: node.returnType, nextSlot: 0 };
    frame = ctx;
    table.push('function', node.name);
    const params = node.params.map((p) => {
      const storage = declareVariable(p.name, p.type, p.span);
      return { name: p.name, type: p.type, slot: storage.slot };
    });
    const body = node.body.statements.map(statement);
    table.pop();
    frame = mainFrame;
    return {
      kind: 'FunctionDecl',
      span: node.span,
      name: node.name,
      returnType: node.returnType,
      params,
      frameSlots: ctx.nextSlot,
      body,
    };
  }

  table.push('global', '@main');

  // Signatures first, so bodies and top-level code may call any function in the file.
  for (const item of program.items) {
    if (item.kind !== 'FunctionDecl') continue;
    const sig: FunctionSymbol = {
      kind: 'function',
      name: item.name,
      returnType: item.returnType,
      params: item.params.map((p) => p.type),
      line: item.span.start.line,
    };
    if (table.declare(sig)) {
      fail(DiagnosticIds.Redeclaration, item.span, `"${item.name}" is already declared in this scope`);
    }
  }

  const functions: TypedFunction[] = [];
  const main: TypedStmt[] = [];
  for (const item of program.items) {
    if (item.kind === 'FunctionDecl') functions.push(functionDecl(item));
    else main.push(statement(item));
  }

  table.pop();

  return {
    typed: {
      kind: 'Program',
      span: program.span,
      globals,
      functions,
      main,
      mainLocals: mainFrame.nextSlot,
    },
    symbols: table.snapshot(),
  };
}

/**
 * Resolve names, check types and assign storage for every variable.
 *
 * Stops at the first semantic error: one diagnostic is appended and `undefined` returned.
 */
export function analyzeProgram(
  program: ProgramNode,
  diagnostics: Diagnostic[],
): AnalysisResult | undefined {
  return runStage(diagnostics, program.span.file, () => analyze(program));
}
