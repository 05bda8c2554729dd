import type { BinaryOperator } from '../frontend/ast.js';
import type { Storage } from '../semantics/symbols.js';
import type { TypedCall, TypedExpr, TypedFunction, TypedProgram, TypedStmt } from '../semantics/typed.js';
import type { ScalarType } from '../semantics/types.js';
import type { BinaryOpcode } from '../vm/value.js';
import { zeroOf } from '../vm/value.js';
import type { IrFunction, IrInstr, IrProgram, Operand, TempOperand, VarOperand } from './types.js';
import { MAIN_FUNCTION } from './types.js';

const BINARY_OPCODE: Record<BinaryOperator, BinaryOpcode> = {
  '+': 'ADD',
  '-': 'SUB',
  '*': 'MUL',
  '/': 'DIV',
  '%': 'MOD',
  '==': 'CMP_EQ',
  '!=': 'CMP_NE',
  '<': 'CMP_LT',
  '<=': 'CMP_LE',
  '>': 'CMP_GT',
  '>=': 'CMP_GE',
  '&&': 'AND',
  '||': 'OR',
};

/**
 * Whether evaluating `e` can write a variable (assignment, or any call).
 */
function hasEffects(e: TypedExpr): boolean {
  switch (e.kind) {
    case 'AssignExpr':
    case 'CallExpr':
      return true;
    case 'BinaryExpr':
      return hasEffects(e.left) || hasEffects(e.right);
    case 'UnaryExpr':
    case 'Widen':
      return hasEffects(e.operand);
    case 'Identifier':
    case 'Literal':
      return false;
  }
}

function endsInReturn(body: IrInstr[]): boolean {
  const last = body[body.length - 1];
  return last !== undefined && (last.op === 'RET' || last.op === 'NORET');
}

/**
 * Lower a typed program to three-address IR.
 *
 * Top-level statements become the body of `@main`. Labels are unique across the whole program.
 */
export function lowerProgram(program: TypedProgram): IrProgram {
  let nextLabel = 0;
  const newLabel = (): string => `L${nextLabel++}`;

  function lowerBody(
    name: string,
    returnType: ScalarType,
    arity: number,
    locals: number,
    statements: TypedStmt[],
    endLine: number,
  ): IrFunction {
    const body: IrInstr[] = [];
    let nextTemp = 0;
    const newTemp = (): TempOperand => ({ kind: 'temp', id: nextTemp++ });
    const emit = (instr: IrInstr): void => {
      body.push(instr);
    };

    const varOperand = (storage: Storage, varName: string): VarOperand =>
      storage.kind === 'global'
        ? { kind: 'global', slot: storage.slot, name: varName }
        : { kind: 'local', slot: storage.slot, name: varName };

    /**
     * Evaluate operands left to right. A variable read is copied into a temp when a later operand
     * could change it.
     */
    const operands = (exprs: TypedExpr[]): Operand[] =>
      exprs.map((e, i) => {
        const v = expression(e);
        if ((v.kind === 'local' || v.kind === 'global') && exprs.slice(i + 1).some(hasEffects)) {
          const t = newTemp();
          emit({ op: 'MOV', dst: t, src: v });
          return t;
        }
        return v;
      });

    /**
     * Non-void calls always get a result temp; the optimizer drops it when nothing reads it.
     */
    function call(e: TypedCall): TempOperand | undefined {
      const args = operands(e.args);
      for (const src of args) emit({ op: 'PARAM', src });
      const dst = e.type === 'void' ? undefined : newTemp();
      emit({
        op: 'CALL',
        fn: e.callee,
        argc: args.length,
        ...(dst ? { dst } : {}),
        line: e.span.start.line,
      });
      return dst;
    }

    function expression(e: TypedExpr): Operand {
      switch (e.kind) {
        case 'Literal':
          return { kind: 'const', value: e.value };
        case 'Identifier':
          return varOperand(e.storage, e.name);
        case 'Widen': {
          const a = expression(e.operand);
          const dst = newTemp();
          emit({ op: 'I2F', dst, a });
          return dst;
        }
        case 'UnaryExpr': {
          const a = expression(e.operand);
          if (e.op === '+') return a;
          const dst = newTemp();
          emit({ op: e.op === '-' ? 'NEG' : 'NOT', dst, a });
          return dst;
        }
        case 'BinaryExpr': {
          const [a, b] = operands([e.left, e.right]);
          if (!a || !b) throw new Error('binary operands missing');
          const dst = newTemp();
          const op = BINARY_OPCODE[e.op];
          if (op === 'DIV' || op === 'MOD') {
            emit({ op, dst, a, b, line: e.span.start.line });
          } else {
            emit({ op, dst, a, b });
          }
          return dst;
        }
        case 'AssignExpr': {
          const src = expression(e.value);
          emit({ op: 'MOV', dst: varOperand(e.storage, e.name), src });
          if (src.kind === 'const' || src.kind === 'temp') return src;
          const copy = newTemp();
          emit({ op: 'MOV', dst: copy, src });
          return copy;
        }
        case 'CallExpr': {
          const dst = call(e);
          if (!dst) throw new Error(`void call to "${e.callee}" used as a value`);
          return dst;
        }
      }
    }

    function statement(s: TypedStmt): void {
      switch (s.kind) {
        case 'VarDecl': {
          const dst = varOperand(s.storage, s.name);
          if (s.initializer) {
            emit({ op: 'MOV', dst, src: expression(s.initializer) });
          } else if (dst.kind === 'local') {
            emit({ op: 'MOV', dst, src: { kind: 'const', value: zeroOf(s.type) } });
          }
          return;
        }
        case 'Block':
          s.statements.forEach(statement);
          return;
        case 'IfStmt': {
          const cond = expression(s.condition);
          if (!s.elseBranch) {
            const end = newLabel();
            emit({ op: 'JZ', cond, label: end });
            statement(s.thenBranch);
            emit({ op: 'LABEL', label: end });
            return;
          }
          const otherwise = newLabel();
          const end = newLabel();
          emit({ op: 'JZ', cond, label: otherwise });
          statement(s.thenBranch);
          emit({ op: 'JMP', label: end });
          emit({ op: 'LABEL', label: otherwise });
          statement(s.elseBranch);
          emit({ op: 'LABEL', label: end });
          return;
        }
        case 'WhileStmt': {
          const top = newLabel();
          const end = newLabel();
          emit({ op: 'LABEL', label: top });
          emit({ op: 'JZ', cond: expression(s.condition), label: end });
          statement(s.body);
          emit({ op: 'JMP', label: top });
          emit({ op: 'LABEL', label: end });
          return;
        }
        case 'ForStmt': {
          if (s.init) statement(s.init);
          const top = newLabel();
          const end = newLabel();
          emit({ op: 'LABEL', label: top });
          if (s.condition) emit({ op: 'JZ', cond: expression(s.condition), label: end });
          statement(s.body);
          if (s.update) expression(s.update);
          emit({ op: 'JMP', label: top });
          emit({ op: 'LABEL', label: end });
          return;
        }
        case 'ReturnStmt':
          emit(s.value ? { op: 'RET', src: expression(s.value) } : { op: 'RET' });
          return;
        case 'PrintStmt':
          emit({ op: 'PRINT', src: expression(s.value) });
          return;
        case 'ExprStmt':
          if (s.expr.kind === 'CallExpr') call(s.expr);
          else expression(s.expr);
          return;
      }
    }

    statements.forEach(statement);
    if (!endsInReturn(body)) {
      emit(returnType === 'void' ? { op: 'RET' } : { op: 'NORET', fn: name, line: endLine });
    }
    return { name, returnType, arity, locals, temps: nextTemp, body };
  }

  const lowerFunction = (f: TypedFunction): IrFunction =>
    lowerBody(f.name, f.returnType, f.params.length, f.frameSlots, f.body, f.span.end.line);

  const main = lowerBody(MAIN_FUNCTION, 'void', 0, program.mainLocals, program.main, program.span.end.line);

  return {
    globals: program.globals.map((g) => ({ name: g.name, type: g.type })),
    functions: [main, ...program.functions.map(lowerFunction)],
  };
}
