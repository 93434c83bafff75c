import { DiagnosticIds } from '../diagnostics/types.js';
import { ProblemCollector } from '../diagnostics/problems.js';
import type {
  ExprNode,
  FuncDeclNode,
  ProgramNode,
  SourceSpan,
  StmtNode,
  VarDeclNode,
} from '../frontend/ast.js';
import type { GlobalDeclarations, PassReport } from './env.js';
import { globalScope } from './env.js';
import { suggestName } from './spelling.js';

/**
 * Bind every identifier use to a declaration and report what cannot be bound.
 *
 * Problems raised while checking one statement are grouped into one diagnostic. The pass never
 * throws on user errors and never stops early.
 */
export function resolveNames(program: ProgramNode, env: GlobalDeclarations): PassReport {
  const scope = globalScope(env);
  const problems = new ProblemCollector(
    DiagnosticIds.NameError,
    'name',
    program.file,
    program.lines,
  );

  const withSuggestion = (message: string, name: string, kind: 'variable' | 'function'): string => {
    const suggestion = suggestName(name, scope.visibleNames(kind));
    return suggestion ? `${message} Did you mean '${suggestion}'?` : message;
  };

  const undeclaredVariable = (span: SourceSpan, name: string): void => {
    problems.report(
      span,
      withSuggestion(`Variable '${name}' was used but never declared.`, name, 'variable'),
    );
  };

  const visitExpr = (expr: ExprNode): void => {
    switch (expr.kind) {
      case 'Literal':
        return;
      case 'Variable': {
        const r = scope.lookup(expr.name);
        if (!r) {
          undeclaredVariable(expr.span, expr.name);
        } else if (r.kind === 'function') {
          problems.report(
            expr.span,
            `Function '${expr.name}' was referenced without being called. Must use '()' to call a function.`,
          );
        } else if (!r.initialized) {
          problems.report(expr.span, `Variable '${expr.name}' was used but never initialized.`);
        }
        return;
      }
      case 'Unary':
        visitExpr(expr.operand);
        return;
      case 'Binary':
        visitExpr(expr.left);
        visitExpr(expr.right);
        return;
      case 'Call': {
        const r = scope.lookup(expr.name);
        if (!r) {
          problems.report(
            expr.nameSpan,
            withSuggestion(`Function '${expr.name}' was used but never declared.`, expr.name, 'function'),
          );
        } else if (r.kind === 'variable') {
          problems.report(
            expr.nameSpan,
            `Identifier '${expr.name}' was declared as a variable but used as a function.`,
          );
        }
        for (const a of expr.args) visitExpr(a);
        return;
      }
    }
  };

  const visitVarDecl = (stmt: VarDeclNode): void => {
    // The initializer sees the bindings from before this declaration.
    if (stmt.initializer) visitExpr(stmt.initializer);

    const existing = scope.lookup(stmt.name);
    if (existing?.kind === 'function') {
      // A global may take the name of a function that is checked later; the function reports it.
      const functionComesLater = scope.atGlobal && !existing.initialized;
      if (!functionComesLater) {
        problems.report(
          stmt.declaratorSpan,
          `Variable '${stmt.name}' was previously declared as a function; variables and functions cannot share identifiers.`,
        );
        return;
      }
    } else if (scope.isDeclaredInScope(stmt.name)) {
      problems.report(
        stmt.declaratorSpan,
        `Variable '${stmt.name}' was previously declared in this scope; cannot redeclare variables.`,
      );
      return;
    }

    scope.declare(stmt.name, {
      kind: 'variable',
      type: stmt.varType,
      initialized: stmt.initializer !== undefined,
    });
  };

  const visitFunction = (stmt: FuncDeclNode): void => {
    const own = scope.lookup(stmt.name);
    if (own?.kind === 'variable') {
      problems.report(
        stmt.headerSpan,
        `Identifier '${stmt.name}' was previously used to define a variable; variables and functions cannot share names.`,
      );
    } else {
      scope.initialize(stmt.name);
    }

    scope.push(stmt.returnType);
    for (const p of stmt.params) {
      if (scope.isFunction(p.name)) {
        problems.report(
          p.span,
          `Parameter '${p.name}' shares an identifier with a function; parameters and functions cannot share names.`,
        );
      } else if (scope.isDeclaredInScope(p.name)) {
        problems.report(
          p.span,
          `Parameter '${p.name}' is already used for this function; cannot have duplicate parameter names.`,
        );
      } else {
        scope.declare(p.name, { kind: 'variable', type: p.paramType, initialized: true });
      }
    }
    for (const s of stmt.body.statements) visitStmt(s);
    scope.pop();
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
        visitExpr(stmt.expr);
        break;
      case 'VarDecl':
        visitVarDecl(stmt);
        break;
      case 'FuncDecl':
        visitFunction(stmt);
        break;
      case 'Assign': {
        const r = scope.lookup(stmt.name);
        if (!r) {
          undeclaredVariable(stmt.nameSpan, stmt.name);
        } else if (r.kind === 'function') {
          problems.report(stmt.nameSpan, `Function '${stmt.name}' cannot be assigned a value.`);
        }
        visitExpr(stmt.value);
        if (r?.kind === 'variable') scope.initialize(stmt.name);
        break;
      }
      case 'If':
        visitExpr(stmt.condition);
        visitStmt(stmt.thenBranch);
        if (stmt.elseBranch) visitStmt(stmt.elseBranch);
        break;
      case 'While':
        visitExpr(stmt.condition);
        visitStmt(stmt.body);
        break;
      case 'Return':
        visitExpr(stmt.value);
        break;
      case 'Print':
        if (stmt.expr) visitExpr(stmt.expr);
        break;
    }
    problems.flush();
  }

  for (const stmt of program.statements) visitStmt(stmt);

  return { diagnostics: problems.diagnostics, problemCount: problems.problemCount };
}
