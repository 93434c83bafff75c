import { DiagnosticIds } from '../diagnostics/types.js';
import { ProblemCollector } from '../diagnostics/problems.js';
import type {
  BinaryExprNode,
  CallExprNode,
  ExprNode,
  ProgramNode,
  SlateType,
  StmtNode,
} from '../frontend/ast.js';
import type { GlobalDeclarations, PassReport } from './env.js';
import { globalScope } from './env.js';
import type { ExprType } from './scope.js';

/** Printable form of a type; the error type prints as `ERROR`. */
export function typeName(t: ExprType): string {
  return t === 'error' ? 'ERROR' : t;
}

/**
 * True when `actual` is a concrete type other than `expected`.
 *
 * An `error` type has already been reported further down the tree and never mismatches again.
 */
function mismatches(actual: ExprType, expected: SlateType): boolean {
  return actual !== 'error' && actual !== expected;
}

interface OperatorRule {
  operand: SlateType;
  result: SlateType;
}

const OPERATOR_RULES: Record<Exclude<BinaryExprNode['op'], '==' | '!='>, OperatorRule> = {
  '+': { operand: 'int', result: 'int' },
  '-': { operand: 'int', result: 'int' },
  '*': { operand: 'int', result: 'int' },
  '/': { operand: 'int', result: 'int' },
  '%': { operand: 'int', result: 'int' },
  '<': { operand: 'int', result: 'bool' },
  '<=': { operand: 'int', result: 'bool' },
  '>': { operand: 'int', result: 'bool' },
  '>=': { operand: 'int', result: 'bool' },
  '&&': { operand: 'bool', result: 'bool' },
  '||': { operand: 'bool', result: 'bool' },
};

/**
 * Compute the static type of every expression and check it against the typing rules.
 *
 * An expression whose operand is already erroneous resolves to `error` without a new problem, so
 * each mistake is reported once, on the innermost expression with a concrete wrong type.
 */
export function resolveTypes(program: ProgramNode, env: GlobalDeclarations): PassReport {
  const scope = globalScope(env);
  const problems = new ProblemCollector(
    DiagnosticIds.TypeError,
    'type',
    program.file,
    program.lines,
  );

  const checkCall = (expr: CallExprNode): ExprType => {
    const argTypes = expr.args.map((a) => typeOf(a));
    const callee = scope.lookup(expr.name);
    if (!callee || callee.kind !== 'function') return 'error';

    const params = callee.params ?? [];
    if (params.length !== expr.args.length) {
      problems.report(
        expr.span,
        `Function ${expr.name} expects ${params.length} parameters, but was given ${expr.args.length}.`,
      );
    }
    params.forEach((p, i) => {
      const arg = expr.args[i];
      const t = argTypes[i];
      if (arg && t !== undefined && mismatches(t, p.type)) {
        problems.report(
          arg.span,
          `Parameter '${p.name}' is of type ${p.type}, but was given value of type ${typeName(t)}.`,
        );
      }
    });
    return callee.type;
  };

  const checkBinary = (expr: BinaryExprNode): ExprType => {
    const left = typeOf(expr.left);
    const right = typeOf(expr.right);

    if (expr.op === '==' || expr.op === '!=') {
      if (left === 'error' || right === 'error') return 'error';
      if (left !== right) {
        problems.report(
          expr.span,
          `Operator '${expr.op}' expects expressions of the same type, but left expression is of type ${left} while right expression is of type ${right}.`,
        );
        return 'error';
      }
      return 'bool';
    }

    const rule = OPERATOR_RULES[expr.op];
    let ok = true;
    for (const [operand, t] of [
      [expr.left, left],
      [expr.right, right],
    ] as const) {
      if (t === rule.operand) continue;
      ok = false;
      if (t !== 'error') {
        problems.report(
          operand.span,
          `Operator '${expr.op}' expects expressions of type ${rule.operand}, but got expression of type ${t}.`,
        );
      }
    }
    return ok ? rule.result : 'error';
  };

  function typeOf(expr: ExprNode): ExprType {
    switch (expr.kind) {
      case 'Literal':
        return typeof expr.value === 'boolean' ? 'bool' : 'int';
      case 'Variable': {
        const r = scope.lookup(expr.name);
        return r?.kind === 'variable' ? r.type : 'error';
      }
      case 'Unary': {
        const t = typeOf(expr.operand);
        const expected: SlateType = expr.op === '!' ? 'bool' : 'int';
        if (t === 'error') return 'error';
        if (t !== expected) {
          problems.report(
            expr.span,
            `Operator '${expr.op}' expects expression of type ${expected}, but got expression of type ${t}.`,
          );
          return 'error';
        }
        return expected;
      }
      case 'Binary':
        return checkBinary(expr);
      case 'Call':
        return checkCall(expr);
    }
  }

  const checkCondition = (condition: ExprNode): void => {
    const t = typeOf(condition);
    if (mismatches(t, 'bool')) {
      problems.report(
        condition.span,
        `Conditional expressions need to be of type bool, but this expression is of type ${typeName(t)}.`,
      );
    }
  };

  function visitStmt(stmt: StmtNode): void {
    problems.flush();
    switch (stmt.kind) {
      case 'Block':
        scope.push();
        for (const s of stmt.statements) visitStmt(s);
        scope.pop();
        break;
      case 'ExprStmt':
        typeOf(stmt.expr);
        break;
      case 'VarDecl': {
        if (stmt.initializer) {
          const t = typeOf(stmt.initializer);
          if (mismatches(t, stmt.varType)) {
            problems.report(
              stmt.initializer.span,
              `Variable '${stmt.name}' expected value of type ${stmt.varType}, but value is of type ${typeName(t)}.`,
            );
          }
        }
        if (!scope.isFunction(stmt.name) || !scope.atGlobal) {
          scope.declare(stmt.name, { kind: 'variable', type: stmt.varType, initialized: true });
        }
        break;
      }
      case 'FuncDecl':
        scope.push(stmt.returnType);
        for (const p of stmt.params) {
          scope.declare(p.name, { kind: 'variable', type: p.paramType, initialized: true });
        }
        for (const s of stmt.body.statements) visitStmt(s);
        scope.pop();
        break;
      case 'Assign': {
        const target = scope.lookup(stmt.name);
        const t = typeOf(stmt.value);
        if (target?.kind === 'variable' && mismatches(t, target.type)) {
          problems.report(
            stmt.value.span,
            `Variable '${stmt.name}' expected value of type ${target.type}, but value is of type ${typeName(t)}.`,
          );
        }
        break;
      }
      case 'If':
        checkCondition(stmt.condition);
        visitStmt(stmt.thenBranch);
        if (stmt.elseBranch) visitStmt(stmt.elseBranch);
        break;
      case 'While':
        checkCondition(stmt.condition);
        visitStmt(stmt.body);
        break;
      case 'Return': {
        const expected = scope.returnType();
        const t = typeOf(stmt.value);
        if (expected === undefined) {
          problems.report(stmt.span, 'Return statements can only be used within functions.');
        } else if (mismatches(t, expected)) {
          problems.report(
            stmt.value.span,
            `Function is of type ${expected}, but return value is of type ${typeName(t)}.`,
          );
        }
        break;
      }
      case 'Print':
        if (stmt.expr) typeOf(stmt.expr);
        break;
    }
    problems.flush();
  }

  for (const stmt of program.statements) visitStmt(stmt);

  return { diagnostics: problems.diagnostics, problemCount: problems.problemCount };
}
