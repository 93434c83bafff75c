import { InternalCompilerError } from '../diagnostics/errors.js';
import type {
  BinaryExprNode,
  ExprNode,
  FuncDeclNode,
  PrintMode,
  ProgramNode,
  StmtNode,
} from '../frontend/ast.js';
import type { AsmLine, AsmProgram, DataSlot, FunctionBlock } from '../formats/types.js';
import { DEFAULT_ENTRY_POINT } from '../semantics/env.js';
import type { ConstValue, FunctionSymbol, SymbolTable } from '../semantics/layout.js';
import { WORD_SIZE, zeroValue } from '../semantics/layout.js';

export interface EmitOptions {
  /** Function the startup code calls before exiting. Defaults to `main`. */
  entryPoint?: string;
}

/** Saved `$ra` and caller `$fp`, just below the frame pointer. */
const SAVED_REGISTERS_SIZE = 2 * WORD_SIZE;

const SYSCALL_PRINT_INT = 1;
const SYSCALL_EXIT = 10;
const SYSCALL_PRINT_CHAR = 11;

const TRAILING_CHAR: Record<PrintMode, number | undefined> = {
  plain: undefined,
  space: 0x20,
  newline: 0x0a,
};

function word(value: ConstValue): number {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value | 0;
}

/**
 * Lower a flattened, checked program to stack-machine assembly.
 *
 * Expressions evaluate on the memory stack: every expression pushes exactly one word. `$t0` and
 * `$t1` are scratch, `$v0` carries return values and syscall numbers, `$a0` syscall arguments.
 *
 * Frame layout, relative to `$fp` (which points at the first argument):
 *
 * ```
 *   4*i($fp)          argument i (pushed by the caller, last argument first)
 *   -4($fp)           saved $ra
 *   -8($fp)           saved caller $fp
 *   -(12+k)($fp)      local at offset k
 * ```
 *
 * The caller pops its arguments after `jal` and pushes `$v0`. Every function, the entry point
 * included, returns with `jr $ra`; the startup code calls the entry point and then exits.
 */
export function emitProgram(
  program: ProgramNode,
  globals: SymbolTable,
  options: EmitOptions = {},
): AsmProgram {
  const entry = options.entryPoint ?? DEFAULT_ENTRY_POINT;
  let labelCounter = 0;

  const data: DataSlot[] = globals
    .variables()
    .map((v) => ({ label: v.name, value: word(v.initial ?? zeroValue(v.type)) }));

  const emitFunction = (fn: FuncDeclNode, symbol: FunctionSymbol): FunctionBlock => {
    const lines: AsmLine[] = [];
    const ins = (text: string): void => {
      lines.push({ kind: 'instruction', text });
    };
    const label = (name: string): void => {
      lines.push({ kind: 'label', name });
    };
    const push = (reg: string): void => {
      ins(`subu $sp, $sp, ${WORD_SIZE}`);
      ins(`sw ${reg}, 0($sp)`);
    };
    const pop = (reg: string): void => {
      ins(`lw ${reg}, 0($sp)`);
      ins(`addu $sp, $sp, ${WORD_SIZE}`);
    };

    const locals = symbol.locals;
    const epilogue = `${fn.name}.epilogue`;

    const addressOf = (name: string): string => {
      const local = locals.get(name);
      if (local?.kind === 'parameter') return `${local.offset}($fp)`;
      if (local?.kind === 'variable') {
        return `${-(SAVED_REGISTERS_SIZE + WORD_SIZE + local.offset)}($fp)`;
      }
      if (globals.get(name)?.kind === 'variable') return name;
      throw new InternalCompilerError(`No storage for '${name}' in function '${fn.name}'.`);
    };

    const emitBinaryOp = (expr: BinaryExprNode): void => {
      switch (expr.op) {
        case '+':
          ins('addu $t0, $t0, $t1');
          return;
        case '-':
          ins('subu $t0, $t0, $t1');
          return;
        case '*':
          ins('mul $t0, $t0, $t1');
          return;
        case '/':
          ins('div $t0, $t1');
          ins('mflo $t0');
          return;
        case '%':
          ins('div $t0, $t1');
          ins('mfhi $t0');
          return;
        case '&&':
          ins('and $t0, $t0, $t1');
          return;
        case '||':
          ins('or $t0, $t0, $t1');
          return;
        case '<':
          ins('slt $t0, $t0, $t1');
          return;
        case '>':
          ins('slt $t0, $t1, $t0');
          return;
        case '<=':
          ins('slt $t0, $t1, $t0');
          ins('xori $t0, $t0, 1');
          return;
        case '>=':
          ins('slt $t0, $t0, $t1');
          ins('xori $t0, $t0, 1');
          return;
        case '==':
          ins('xor $t0, $t0, $t1');
          ins('sltiu $t0, $t0, 1');
          return;
        case '!=':
          ins('xor $t0, $t0, $t1');
          ins('sltu $t0, $zero, $t0');
          return;
        default: {
          const unsupported: never = expr.op;
          throw new InternalCompilerError(`Unsupported binary operator '${String(unsupported)}'.`);
        }
      }
    };

    const emitExpr = (expr: ExprNode): void => {
      switch (expr.kind) {
        case 'Literal':
          ins(`li $t0, ${word(expr.value)}`);
          push('$t0');
          return;
        case 'Variable':
          ins(`lw $t0, ${addressOf(expr.name)}`);
          push('$t0');
          return;
        case 'Unary':
          emitExpr(expr.operand);
          if (expr.op === '+') return;
          pop('$t0');
          ins(expr.op === '-' ? 'subu $t0, $zero, $t0' : 'xori $t0, $t0, 1');
          push('$t0');
          return;
        case 'Binary':
          emitExpr(expr.left);
          emitExpr(expr.right);
          pop('$t1');
          pop('$t0');
          emitBinaryOp(expr);
          push('$t0');
          return;
        case 'Call': {
          const callee = globals.get(expr.name);
          if (callee?.kind !== 'function') {
            throw new InternalCompilerError(`Call to '${expr.name}', which has no layout.`);
          }
          for (let i = expr.args.length - 1; i >= 0; i--) {
            const arg = expr.args[i];
            if (arg) emitExpr(arg);
          }
          ins(`jal ${expr.name}`);
          const argBytes = callee.locals.parameterSize;
          if (argBytes > 0) ins(`addu $sp, $sp, ${argBytes}`);
          push('$v0');
          return;
        }
      }
    };

    const store = (name: string): void => {
      pop('$t0');
      ins(`sw $t0, ${addressOf(name)}`);
    };

    const emitStmt = (stmt: StmtNode): void => {
      switch (stmt.kind) {
        case 'Block':
          for (const s of stmt.statements) emitStmt(s);
          return;
        case 'ExprStmt':
          emitExpr(stmt.expr);
          ins(`addu $sp, $sp, ${WORD_SIZE}`);
          return;
        case 'VarDecl':
          if (stmt.initializer) {
            emitExpr(stmt.initializer);
            store(stmt.name);
          } else {
            ins(`sw $zero, ${addressOf(stmt.name)}`);
          }
          return;
        case 'Assign':
          emitExpr(stmt.value);
          store(stmt.name);
          return;
        case 'If': {
          const n = labelCounter++;
          const elseLabel = `if.else.${n}`;
          const endLabel = `if.end.${n}`;
          emitExpr(stmt.condition);
          pop('$t0');
          ins(`beq $t0, $zero, ${stmt.elseBranch ? elseLabel : endLabel}`);
          emitStmt(stmt.thenBranch);
          if (stmt.elseBranch) {
            ins(`j ${endLabel}`);
            label(elseLabel);
            emitStmt(stmt.elseBranch);
          }
          label(endLabel);
          return;
        }
        case 'While': {
          const n = labelCounter++;
          const topLabel = `while.top.${n}`;
          const endLabel = `while.end.${n}`;
          label(topLabel);
          emitExpr(stmt.condition);
          pop('$t0');
          ins(`beq $t0, $zero, ${endLabel}`);
          emitStmt(stmt.body);
          ins(`j ${topLabel}`);
          label(endLabel);
          return;
        }
        case 'Return':
          emitExpr(stmt.value);
          pop('$v0');
          ins(`j ${epilogue}`);
          return;
        case 'Print': {
          if (stmt.expr) {
            emitExpr(stmt.expr);
            pop('$a0');
            ins(`li $v0, ${SYSCALL_PRINT_INT}`);
            ins('syscall');
          }
          const trailing = TRAILING_CHAR[stmt.mode];
          if (trailing !== undefined) {
            ins(`li $a0, ${trailing}`);
            ins(`li $v0, ${SYSCALL_PRINT_CHAR}`);
            ins('syscall');
          }
          return;
        }
        case 'FuncDecl':
          throw new InternalCompilerError(`Nested function '${stmt.name}' reached code generation.`);
      }
    };

    lines.push({
      kind: 'comment',
      text: `${fn.name}: ${fn.params.length} parameter(s), ${locals.localSize} bytes of locals`,
    });
    label(fn.name);
    ins(`subu $sp, $sp, ${SAVED_REGISTERS_SIZE}`);
    ins(`sw $ra, ${WORD_SIZE}($sp)`);
    ins('sw $fp, 0($sp)');
    ins(`addu $fp, $sp, ${SAVED_REGISTERS_SIZE}`);
    if (locals.localSize > 0) ins(`subu $sp, $sp, ${locals.localSize}`);

    for (const s of fn.body.statements) emitStmt(s);

    // Falling off the end returns 0.
    ins('li $v0, 0');
    label(epilogue);
    ins(`lw $ra, -${WORD_SIZE}($fp)`);
    ins('move $sp, $fp');
    ins(`lw $fp, -${SAVED_REGISTERS_SIZE}($fp)`);
    ins('jr $ra');

    return { name: fn.name, lines };
  };

  const functions: FunctionBlock[] = [];
  for (const stmt of program.statements) {
    if (stmt.kind === 'VarDecl') continue;
    if (stmt.kind !== 'FuncDecl') {
      throw new InternalCompilerError(`Top-level ${stmt.kind} statement reached code generation.`);
    }
    const symbol = globals.get(stmt.name);
    if (symbol?.kind !== 'function') {
      throw new InternalCompilerError(`Function '${stmt.name}' has no layout.`);
    }
    functions.push(emitFunction(stmt, symbol));
  }

  if (!functions.some((f) => f.name === entry)) {
    throw new InternalCompilerError(`Entry point '${entry}' was not generated.`);
  }

  const startup: AsmLine[] = [
    { kind: 'instruction', text: `jal ${entry}` },
    { kind: 'instruction', text: `li $v0, ${SYSCALL_EXIT}` },
    { kind: 'instruction', text: 'syscall' },
  ];

  return { data, entry, startup, functions };
}
