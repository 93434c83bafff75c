import type { SourceSpan } from '../frontend/ast.js';

/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * Which stage of the compiler raised a diagnostic.
 *
 * `lex` and `parse` diagnostics are fatal (the first one stops the compile). `scope`, `name` and
 * `type` diagnostics are accumulated and reported together before lowering is skipped.
 */
export type DiagnosticKind = 'io' | 'lex' | 'parse' | 'scope' | 'name' | 'type' | 'layout' | 'internal';

/**
 * One located complaint about the source.
 */
export interface Problem {
  span: SourceSpan;
  message: string;
}

/**
 * A numbered source line carried by a diagnostic for rendering.
 */
export interface SourceLine {
  /** 1-based line number. */
  line: number;
  text: string;
}

/**
 * A compiler diagnostic.
 *
 * One diagnostic aggregates every problem of one kind raised while checking a single syntactic
 * statement. `message`, `line` and `column` mirror the first problem so that the diagnostic can be
 * printed on one line; `lines` holds the source text the problems cover.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `SLT300`). */
  id: DiagnosticId;
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  problems: Problem[];
  lines: SourceLine[];
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'SLT000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'SLT001',

  /** A pass found the tree in a state an earlier pass should have ruled out. */
  InternalError: 'SLT002',

  /** Invalid character, lone `&`/`|`, unterminated comment or oversized literal. */
  LexError: 'SLT100',

  /** Unexpected token. */
  ParseError: 'SLT110',

  /** Executable statement at top level, duplicate function, non-constant global or missing entry point. */
  ScopeError: 'SLT200',

  /** Undeclared/uninitialized identifier, kind mismatch or name collision. */
  NameError: 'SLT300',

  /** Operand, argument, return or condition type mismatch. */
  TypeError: 'SLT400',

  /** Division or modulo by zero while folding a global initializer. */
  ConstDivideByZero: 'SLT500',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Smallest start line over a diagnostic's problems (falls back to `line`, then to +Infinity).
 */
export function diagnosticStartLine(d: Diagnostic): number {
  let min = d.line ?? Number.POSITIVE_INFINITY;
  for (const p of d.problems) min = Math.min(min, p.span.start.line);
  return min;
}

/**
 * Interleave independent per-pass diagnostic lists by start line.
 *
 * The merge is stable: diagnostics starting on the same line keep the order of the lists they came
 * from, then their order within that list.
 */
export function mergeDiagnostics(...lists: ReadonlyArray<readonly Diagnostic[]>): Diagnostic[] {
  const tagged = lists.flatMap((list, listIndex) =>
    list.map((d, index) => ({ d, listIndex, index, line: diagnosticStartLine(d) })),
  );
  tagged.sort((a, b) => a.line - b.line || a.listIndex - b.listIndex || a.index - b.index);
  return tagged.map((t) => t.d);
}

/**
 * Number of problems over a list of diagnostics (a diagnostic without problems counts once).
 */
export function countProblems(diagnostics: readonly Diagnostic[]): number {
  return diagnostics.reduce((n, d) => n + Math.max(1, d.problems.length), 0);
}
