import type { Diagnostic, DiagnosticKind } from './types.js';
import { countProblems } from './types.js';

const HEADINGS: Record<DiagnosticKind, string> = {
  io: 'File Error',
  lex: 'Lexical Error',
  parse: 'Syntax Error',
  scope: 'Scope Error',
  name: 'Name Error',
  type: 'Type Error',
  layout: 'Layout Error',
  internal: 'Internal Error',
};

const RULE = '~~~~~~~~~~~~~~~~~~~';

function heading(d: Diagnostic): string {
  if (d.severity === 'warning') return 'Warning';
  if (d.severity === 'info') return 'Note';
  return HEADINGS[d.kind];
}

/**
 * Caret columns (1-based, end exclusive) that `d`'s problems cover on `line`.
 */
function caretRanges(d: Diagnostic, line: number, text: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  for (const p of d.problems) {
    const { start, end } = p.span;
    if (line < start.line || line > end.line) continue;
    const firstNonBlank = text.search(/\S/) + 1;
    const from = line === start.line ? start.column : Math.max(1, firstNonBlank);
    const to = line === end.line ? end.column : text.length + 1;
    ranges.push([from, Math.max(to, from + 1)]);
  }
  return ranges;
}

function caretLine(ranges: ReadonlyArray<[number, number]>): string {
  const width = ranges.reduce((w, [, to]) => Math.max(w, to - 1), 0);
  const cells = Array.from({ length: width }, () => ' ');
  for (const [from, to] of ranges) {
    for (let c = from; c < to; c++) cells[c - 1] = '^';
  }
  return cells.join('').trimEnd();
}

/**
 * Render one diagnostic with its source lines, carets and messages.
 *
 * ```
 * Type Error
 * ~~~~~~~~~~~~~~~~~~~
 * 3 |     int y = true + 1;
 *   |             ^^^^
 *   | Operator '+' expects expressions of type int, but got expression of type bool.
 * ```
 */
export function renderDiagnostic(d: Diagnostic): string {
  const out: string[] = [heading(d), RULE];
  if (d.lines.length === 0) {
    const loc = d.line !== undefined ? `${d.file}:${d.line}:${d.column ?? 1}` : d.file;
    out.push(`${loc}: ${d.message}`);
    return out.join('\n');
  }

  const gutter = Math.max(...d.lines.map((l) => String(l.line).length));
  const pad = ' '.repeat(gutter);
  for (const { line, text } of d.lines) {
    out.push(`${String(line).padStart(gutter)} | ${text}`.trimEnd());
    const ranges = caretRanges(d, line, text);
    if (ranges.length > 0) out.push(`${pad} | ${caretLine(ranges)}`);
    for (const p of d.problems) {
      if (p.span.start.line === line) out.push(`${pad} | ${p.message}`);
    }
  }
  return out.join('\n');
}

function countLine(n: number): string {
  return n === 1 ? '1 error' : `${n} errors`;
}

/**
 * Full report: the error count, every diagnostic (blank-line separated), the error count again.
 */
export function renderReport(diagnostics: readonly Diagnostic[]): string {
  const errors = countProblems(diagnostics.filter((d) => d.severity === 'error'));
  const parts = [countLine(errors), ...diagnostics.map(renderDiagnostic), countLine(errors)];
  return parts.join('\n\n') + '\n';
}
