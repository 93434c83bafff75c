import { compileSource } from '../../src/compile.js';
import type { Diagnostic } from '../../src/diagnostics/types.js';
import { defaultFormatWriters } from '../../src/formats/index.js';
import type { ProgramNode } from '../../src/frontend/ast.js';
import { parseProgram } from '../../src/frontend/parser.js';
import type { CompilerOptions, CompileResult } from '../../src/pipeline.js';
import type { PassReport } from '../../src/semantics/env.js';
import { runAsm } from './mips.js';

export function parseOk(text: string, path = 'test.sl'): ProgramNode {
  const diagnostics: Diagnostic[] = [];
  const program = parseProgram(path, text, diagnostics);
  if (!program) throw new Error(diagnostics.map((d) => d.message).join('\n'));
  return program;
}

export function compileText(text: string, options: CompilerOptions = {}): CompileResult {
  return compileSource('test.sl', text, options, { formats: defaultFormatWriters });
}

/** Assembly text of a program expected to compile without errors. */
export function compileOk(text: string, options: CompilerOptions = {}): string {
  const res = compileText(text, options);
  const errors = res.diagnostics.filter((d) => d.severity === 'error');
  if (errors.length > 0) throw new Error(errors.map((d) => d.message).join('\n'));
  const asm = res.artifacts.find((a) => a.kind === 'asm');
  if (!asm) throw new Error('no asm artifact');
  return asm.text;
}

/** Compile and run a program, returning what it prints. */
export function runSlate(text: string, options: CompilerOptions = {}): string {
  const res = runAsm(compileOk(text, options));
  if (!res.exited) throw new Error('program did not exit');
  return res.output;
}

export function messagesOf(report: PassReport): string[] {
  return report.diagnostics.flatMap((d) => d.problems.map((p) => p.message));
}
