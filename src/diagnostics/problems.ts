import type { SourceSpan } from '../frontend/ast.js';
import type {
  Diagnostic,
  DiagnosticId,
  DiagnosticKind,
  DiagnosticSeverity,
  Problem,
  SourceLine,
} from './types.js';

export interface ProblemGroup {
  id: DiagnosticId;
  kind: DiagnosticKind;
  severity?: DiagnosticSeverity;
  file: string;
  /** All lines of the source file, 0-indexed. */
  sourceLines: readonly string[];
  problems: Problem[];
}

function comparePosition(a: Problem, b: Problem): number {
  return a.span.start.line - b.span.start.line || a.span.start.column - b.span.start.column;
}

/**
 * Source lines touched by any of `problems`, ascending and de-duplicated.
 */
export function linesCovered(problems: readonly Problem[], sourceLines: readonly string[]): SourceLine[] {
  const numbers = new Set<number>();
  for (const p of problems) {
    for (let n = p.span.start.line; n <= p.span.end.line; n++) numbers.add(n);
  }
  return [...numbers]
    .sort((a, b) => a - b)
    .map((line) => ({ line, text: sourceLines[line - 1] ?? '' }));
}

/**
 * Fold a statement's problems into one diagnostic.
 */
export function diagnosticFromProblems(group: ProblemGroup): Diagnostic {
  const first = [...group.problems].sort(comparePosition)[0];
  return {
    id: group.id,
    kind: group.kind,
    severity: group.severity ?? 'error',
    message: first?.message ?? '',
    file: group.file,
    ...(first ? { line: first.span.start.line, column: first.span.start.column } : {}),
    problems: group.problems,
    lines: linesCovered(group.problems, group.sourceLines),
  };
}

/**
 * Single-problem diagnostic, used by the fatal front-end stages and the declaration collector.
 */
export function singleProblem(
  id: DiagnosticId,
  kind: DiagnosticKind,
  sourceLines: readonly string[],
  span: SourceSpan,
  message: string,
  severity: DiagnosticSeverity = 'error',
): Diagnostic {
  return diagnosticFromProblems({
    id,
    kind,
    severity,
    file: span.file,
    sourceLines,
    problems: [{ span, message }],
  });
}

/**
 * Accumulates the problems of the statement currently being checked.
 *
 * A checking pass calls `flush()` whenever it starts or finishes a statement; everything reported
 * in between becomes one diagnostic.
 */
export class ProblemCollector {
  readonly diagnostics: Diagnostic[] = [];
  private pending: Problem[] = [];
  private total = 0;

  constructor(
    private readonly id: DiagnosticId,
    private readonly kind: DiagnosticKind,
    private readonly file: string,
    private readonly sourceLines: readonly string[],
  ) {}

  report(span: SourceSpan, message: string): void {
    this.pending.push({ span, message });
    this.total++;
  }

  flush(): void {
    if (this.pending.length === 0) return;
    this.diagnostics.push(
      diagnosticFromProblems({
        id: this.id,
        kind: this.kind,
        file: this.file,
        sourceLines: this.sourceLines,
        problems: this.pending,
      }),
    );
    this.pending = [];
  }

  /** Problems reported so far, flushed or not. */
  get problemCount(): number {
    return this.total;
  }
}
