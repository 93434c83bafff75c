import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { ProblemCollector } from '../diagnostics/problems.js';
import type { ExprNode, ProgramNode, SlateType, SourceSpan } from '../frontend/ast.js';
import type { ParamSignature } from './scope.js';
import { ScopeChain } from './scope.js';

/**
 * Signature of a top-level function, as registered before checking begins.
 */
export interface FunctionSignature {
  name: string;
  returnType: SlateType;
  params: ParamSignature[];
  headerSpan: SourceSpan;
}

/**
 * Everything the checking passes need to know before visiting the first statement.
 */
export interface GlobalDeclarations {
  /** First declaration of each function name, in declaration order. */
  functions: Map<string, FunctionSignature>;
  /** Name of the function the program starts in. */
  entryPoint: string;
}

/**
 * Output of one checking pass.
 */
export interface PassReport {
  diagnostics: Diagnostic[];
  /** Number of individual problems (a diagnostic may group several). */
  problemCount: number;
}

export interface CollectOptions {
  /** Defaults to `main`. */
  entryPoint?: string;
}

export const DEFAULT_ENTRY_POINT = 'main';

function callsIn(expr: ExprNode, out: ExprNode[] = []): ExprNode[] {
  switch (expr.kind) {
    case 'Call':
      out.push(expr);
      for (const a of expr.args) callsIn(a, out);
      break;
    case 'Unary':
      callsIn(expr.operand, out);
      break;
    case 'Binary':
      callsIn(expr.left, out);
      callsIn(expr.right, out);
      break;
    case 'Literal':
    case 'Variable':
      break;
  }
  return out;
}

/**
 * Register every top-level function signature and enforce top-level discipline.
 *
 * Reported here: executable statements outside any function, redeclared functions, calls inside a
 * global initializer, and a missing (or parameterized) entry point. Later passes see only the first
 * declaration of a duplicated function.
 */
export function collectDeclarations(
  program: ProgramNode,
  options: CollectOptions = {},
): { env: GlobalDeclarations; report: PassReport } {
  const entryPoint = options.entryPoint ?? DEFAULT_ENTRY_POINT;
  const functions = new Map<string, FunctionSignature>();
  const problems = new ProblemCollector(
    DiagnosticIds.ScopeError,
    'scope',
    program.file,
    program.lines,
  );

  for (const stmt of program.statements) {
    problems.flush();
    switch (stmt.kind) {
      case 'FuncDecl': {
        if (functions.has(stmt.name)) {
          problems.report(
            stmt.headerSpan,
            `Function '${stmt.name}' was previously declared; functions cannot be redeclared.`,
          );
          break;
        }
        functions.set(stmt.name, {
          name: stmt.name,
          returnType: stmt.returnType,
          params: stmt.params.map((p) => ({ name: p.name, type: p.paramType })),
          headerSpan: stmt.headerSpan,
        });
        if (stmt.name === entryPoint && stmt.params.length > 0) {
          problems.report(
            stmt.headerSpan,
            `Entry point '${entryPoint}' cannot take parameters.`,
          );
        }
        break;
      }
      case 'VarDecl':
        if (stmt.initializer) {
          for (const call of callsIn(stmt.initializer)) {
            problems.report(
              call.span,
              'Global variable initial values must be constant; this is not a constant value.',
            );
          }
        }
        break;
      default:
        problems.report(
          stmt.span,
          'Global statements are not allowed; all executable statements must appear inside of a function.',
        );
    }
  }
  problems.flush();

  const diagnostics = problems.diagnostics;
  let problemCount = problems.problemCount;
  if (!functions.has(entryPoint)) {
    diagnostics.push({
      id: DiagnosticIds.ScopeError,
      kind: 'scope',
      severity: 'error',
      message: `No '${entryPoint}' function found; program must have a '${entryPoint}' function as the entry point.`,
      file: program.file,
      problems: [],
      lines: [],
    });
    problemCount++;
  }

  return { env: { functions, entryPoint }, report: { diagnostics, problemCount } };
}

/**
 * A fresh global scope holding one not-yet-checked record per collected function.
 */
export function globalScope(env: GlobalDeclarations): ScopeChain {
  const scope = new ScopeChain();
  for (const sig of env.functions.values()) {
    scope.declare(sig.name, {
      kind: 'function',
      type: sig.returnType,
      params: sig.params.map((p) => ({ ...p })),
      initialized: false,
    });
  }
  return scope;
}
