import { InternalCompilerError } from '../diagnostics/errors.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { singleProblem } from '../diagnostics/problems.js';
import type { BinaryExprNode, ExprNode, ProgramNode, SlateType, StmtNode } from '../frontend/ast.js';

/** Storage width of every scalar type, in bytes. */
export const WORD_SIZE = 4;

export type ConstValue = number | boolean;

export interface VariableSymbol {
  kind: 'variable';
  name: string;
  type: SlateType;
  offset: number;
  /** Folded initial value; only globals with a constant initializer have one. */
  initial?: ConstValue;
}

export interface ParameterSymbol {
  kind: 'parameter';
  name: string;
  type: SlateType;
  offset: number;
}

export interface FunctionSymbol {
  kind: 'function';
  name: string;
  returnType: SlateType;
  /** Parameters and locals of the function. */
  locals: SymbolTable;
}

export type SymbolEntry = VariableSymbol | ParameterSymbol | FunctionSymbol;

/** Value a variable of `type` holds when it has no initial value. */
export function zeroValue(type: SlateType): ConstValue {
  return type === 'int' ? 0 : false;
}

/**
 * Flat, unscoped table of one function (or of the globals).
 *
 * Variables and parameters take offsets from two independent sequences, each starting at 0 and
 * advancing by {@link WORD_SIZE} in insertion order.
 */
export class SymbolTable {
  private readonly byName = new Map<string, SymbolEntry>();
  private nextVariableOffset = 0;
  private nextParameterOffset = 0;

  addVariable(name: string, type: SlateType, initial?: ConstValue): VariableSymbol {
    this.claim(name);
    const entry: VariableSymbol = {
      kind: 'variable',
      name,
      type,
      offset: this.nextVariableOffset,
      ...(initial !== undefined ? { initial } : {}),
    };
    this.nextVariableOffset += WORD_SIZE;
    this.byName.set(name, entry);
    return entry;
  }

  addParameter(name: string, type: SlateType): ParameterSymbol {
    this.claim(name);
    const entry: ParameterSymbol = { kind: 'parameter', name, type, offset: this.nextParameterOffset };
    this.nextParameterOffset += WORD_SIZE;
    this.byName.set(name, entry);
    return entry;
  }

  addFunction(name: string, returnType: SlateType): FunctionSymbol {
    this.claim(name);
    const entry: FunctionSymbol = { kind: 'function', name, returnType, locals: new SymbolTable() };
    this.byName.set(name, entry);
    return entry;
  }

  /** Names are unique after flattening; a repeat means an earlier pass went wrong. */
  private claim(name: string): void {
    if (this.byName.has(name)) {
      throw new InternalCompilerError(`Symbol '${name}' is laid out twice.`);
    }
  }

  get(name: string): SymbolEntry | undefined {
    return this.byName.get(name);
  }

  entries(): SymbolEntry[] {
    return [...this.byName.values()];
  }

  variables(): VariableSymbol[] {
    return this.entries().filter((e): e is VariableSymbol => e.kind === 'variable');
  }

  parameters(): ParameterSymbol[] {
    return this.entries().filter((e): e is ParameterSymbol => e.kind === 'parameter');
  }

  functions(): FunctionSymbol[] {
    return this.entries().filter((e): e is FunctionSymbol => e.kind === 'function');
  }

  /** Bytes needed for the variables of this table. */
  get localSize(): number {
    return this.nextVariableOffset;
  }

  /** Bytes of parameters the caller pushes. */
  get parameterSize(): number {
    return this.nextParameterOffset;
  }

  /**
   * One line per entry; a function's own table follows it, indented.
   *
   * ```
   * g_1 : int (VARIABLE), offset=0, initial=14
   * add_0 : int (FUNCTION), locals=0
   *   a_2 : int (PARAMETER), offset=0
   * ```
   */
  toString(indent = ''): string {
    const lines: string[] = [];
    for (const e of this.entries()) {
      switch (e.kind) {
        case 'variable': {
          const initial = e.initial !== undefined ? `, initial=${String(e.initial)}` : '';
          lines.push(`${indent}${e.name} : ${e.type} (VARIABLE), offset=${e.offset}${initial}`);
          break;
        }
        case 'parameter':
          lines.push(`${indent}${e.name} : ${e.type} (PARAMETER), offset=${e.offset}`);
          break;
        case 'function': {
          lines.push(`${indent}${e.name} : ${e.returnType} (FUNCTION), locals=${e.locals.localSize}`);
          const inner = e.locals.toString(`${indent}  `);
          if (inner.length > 0) lines.push(inner);
          break;
        }
      }
    }
    return lines.join('\n');
  }
}

/**
 * Resolves a global name to its folded value.
 */
export type ConstLookup = (name: string) => ConstValue | undefined;

const wrap32 = (n: number): number => n | 0;

/**
 * Evaluate a global initializer with the runtime's 32-bit semantics.
 *
 * Returns `undefined` when the expression is not a constant: a call, a name without a value, an
 * operand of the wrong type, or division/modulo by zero (`onDivideByZero` is told about the last).
 */
export function evalConstExpr(
  expr: ExprNode,
  lookup: ConstLookup,
  onDivideByZero?: (expr: BinaryExprNode) => void,
): ConstValue | undefined {
  const evalInt = (e: ExprNode): number | undefined => {
    const v = evalConstExpr(e, lookup, onDivideByZero);
    return typeof v === 'number' ? v : undefined;
  };
  const evalBool = (e: ExprNode): boolean | undefined => {
    const v = evalConstExpr(e, lookup, onDivideByZero);
    return typeof v === 'boolean' ? v : undefined;
  };

  switch (expr.kind) {
    case 'Literal':
      return typeof expr.value === 'number' ? wrap32(expr.value) : expr.value;
    case 'Variable':
      return lookup(expr.name);
    case 'Call':
      return undefined;
    case 'Unary': {
      if (expr.op === '!') {
        const v = evalBool(expr.operand);
        return v === undefined ? undefined : !v;
      }
      const v = evalInt(expr.operand);
      if (v === undefined) return undefined;
      return expr.op === '-' ? wrap32(-v) : v;
    }
    case 'Binary': {
      switch (expr.op) {
        case '&&':
        case '||': {
          const l = evalBool(expr.left);
          const r = evalBool(expr.right);
          if (l === undefined || r === undefined) return undefined;
          return expr.op === '&&' ? l && r : l || r;
        }
        case '==':
        case '!=': {
          const l = evalConstExpr(expr.left, lookup, onDivideByZero);
          const r = evalConstExpr(expr.right, lookup, onDivideByZero);
          if (l === undefined || r === undefined) return undefined;
          return expr.op === '==' ? l === r : l !== r;
        }
        default:
          break;
      }
      const l = evalInt(expr.left);
      const r = evalInt(expr.right);
      if (l === undefined || r === undefined) return undefined;
      switch (expr.op) {
        case '+':
          return wrap32(l + r);
        case '-':
          return wrap32(l - r);
        case '*':
          return Math.imul(l, r);
        case '/':
        case '%':
          if (r === 0) {
            onDivideByZero?.(expr);
            return undefined;
          }
          // Truncating division; the remainder takes the dividend's sign.
          return expr.op === '/' ? wrap32(Math.trunc(l / r)) : wrap32(l % r);
        case '<':
          return l < r;
        case '<=':
          return l <= r;
        case '>':
          return l > r;
        case '>=':
          return l >= r;
      }
    }
  }
}

/**
 * Build the global symbol table (with one nested table per function) from a flattened program.
 *
 * Global initializers are folded to constants; those that cannot be folded leave the variable
 * without an initial value. Division by zero in a global initializer adds a warning to
 * `diagnostics` when one is given.
 */
export function buildLayout(program: ProgramNode, diagnostics?: Diagnostic[]): SymbolTable {
  const globals = new SymbolTable();
  let current = globals;

  const globalValue: ConstLookup = (name) => {
    const e = globals.get(name);
    return e?.kind === 'variable' ? e.initial : undefined;
  };

  const warnDivideByZero = (expr: BinaryExprNode): void => {
    diagnostics?.push(
      singleProblem(
        DiagnosticIds.ConstDivideByZero,
        'layout',
        program.lines,
        expr.span,
        `Division by zero in a global initializer; the variable starts at 0.`,
        'warning',
      ),
    );
  };

  function visit(stmt: StmtNode): void {
    switch (stmt.kind) {
      case 'VarDecl': {
        const initial =
          current === globals && stmt.initializer
            ? evalConstExpr(stmt.initializer, globalValue, warnDivideByZero)
            : undefined;
        current.addVariable(stmt.name, stmt.varType, initial);
        return;
      }
      case 'FuncDecl': {
        const fn = globals.addFunction(stmt.name, stmt.returnType);
        current = fn.locals;
        for (const p of stmt.params) current.addParameter(p.name, p.paramType);
        for (const s of stmt.body.statements) visit(s);
        current = globals;
        return;
      }
      case 'Block':
        for (const s of stmt.statements) visit(s);
        return;
      case 'If':
        visit(stmt.thenBranch);
        if (stmt.elseBranch) visit(stmt.elseBranch);
        return;
      case 'While':
        visit(stmt.body);
        return;
      case 'ExprStmt':
      case 'Assign':
      case 'Return':
      case 'Print':
        return;
    }
  }

  for (const stmt of program.statements) visit(stmt);
  return globals;
}
