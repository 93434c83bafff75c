import { InternalCompilerError } from '../diagnostics/errors.js';
import type { ExprNode, FuncDeclNode, ProgramNode, StmtNode } from '../frontend/ast.js';
import { DEFAULT_ENTRY_POINT } from './env.js';

export interface FlattenOptions {
  /** Function whose name is kept verbatim. Defaults to `main`. */
  entryPoint?: string;
}

/**
 * Give every declaration a program-wide unique name and rewrite every use to match.
 *
 * Unique names are `<name>_<n>` with one counter per run; a number whose name is already taken
 * is skipped. Top-level functions are numbered first,
 * in declaration order, so calls to functions declared further down resolve; everything else is
 * numbered in visit order. Returns a new tree; `program` is not modified.
 *
 * Runs only on programs that passed name and type checking, so an unbound name is an internal
 * error.
 */
export function flattenProgram(program: ProgramNode, options: FlattenOptions = {}): ProgramNode {
  const entryPoint = options.entryPoint ?? DEFAULT_ENTRY_POINT;
  let counter = 0;
  // The entry point keeps its source name, so no generated name may take it.
  const issued = new Set<string>([entryPoint]);
  const fresh = (name: string): string => {
    let unique = `${name}_${counter++}`;
    while (issued.has(unique)) unique = `${name}_${counter++}`;
    issued.add(unique);
    return unique;
  };

  const frames: Array<Map<string, string>> = [new Map()];
  const install = (name: string, unique: string): void => {
    frames[frames.length - 1]?.set(name, unique);
  };
  const resolve = (name: string): string => {
    for (let i = frames.length - 1; i >= 0; i--) {
      const unique = frames[i]?.get(name);
      if (unique !== undefined) return unique;
    }
    throw new InternalCompilerError(`Unresolved identifier '${name}' while flattening.`);
  };
  const inFrame = <T>(body: () => T): T => {
    frames.push(new Map());
    try {
      return body();
    } finally {
      frames.pop();
    }
  };

  for (const stmt of program.statements) {
    if (stmt.kind !== 'FuncDecl' || frames[0]?.has(stmt.name)) continue;
    install(stmt.name, stmt.name === entryPoint ? stmt.name : fresh(stmt.name));
  }

  const renameExpr = (expr: ExprNode): ExprNode => {
    switch (expr.kind) {
      case 'Literal':
        return expr;
      case 'Variable':
        return { ...expr, name: resolve(expr.name) };
      case 'Unary':
        return { ...expr, operand: renameExpr(expr.operand) };
      case 'Binary':
        return { ...expr, left: renameExpr(expr.left), right: renameExpr(expr.right) };
      case 'Call':
        return { ...expr, name: resolve(expr.name), args: expr.args.map(renameExpr) };
    }
  };

  const renameFunction = (stmt: FuncDeclNode): FuncDeclNode => {
    const name = resolve(stmt.name);
    return inFrame(() => {
      const params = stmt.params.map((p) => {
        const unique = fresh(p.name);
        install(p.name, unique);
        return { ...p, name: unique };
      });
      // Parameters and the body's top-level locals share one frame.
      const statements = stmt.body.statements.map(renameStmt);
      return { ...stmt, name, params, body: { ...stmt.body, statements } };
    });
  };

  function renameStmt(stmt: StmtNode): StmtNode {
    switch (stmt.kind) {
      case 'Block':
        return { ...stmt, statements: inFrame(() => stmt.statements.map(renameStmt)) };
      case 'ExprStmt':
        return { ...stmt, expr: renameExpr(stmt.expr) };
      case 'VarDecl': {
        const initializer = stmt.initializer ? renameExpr(stmt.initializer) : undefined;
        const unique = fresh(stmt.name);
        install(stmt.name, unique);
        return { ...stmt, name: unique, ...(initializer ? { initializer } : {}) };
      }
      case 'FuncDecl':
        return renameFunction(stmt);
      case 'Assign':
        return { ...stmt, name: resolve(stmt.name), value: renameExpr(stmt.value) };
      case 'If': {
        const condition = renameExpr(stmt.condition);
        const thenBranch = renameStmt(stmt.thenBranch);
        const elseBranch = stmt.elseBranch ? renameStmt(stmt.elseBranch) : undefined;
        return { ...stmt, condition, thenBranch, ...(elseBranch ? { elseBranch } : {}) };
      }
      case 'While':
        return { ...stmt, condition: renameExpr(stmt.condition), body: renameStmt(stmt.body) };
      case 'Return':
        return { ...stmt, value: renameExpr(stmt.value) };
      case 'Print':
        return stmt.expr ? { ...stmt, expr: renameExpr(stmt.expr) } : stmt;
    }
  }

  return { ...program, statements: program.statements.map(renameStmt) };
}
