import { readFile } from 'node:fs/promises';

import { InternalCompilerError } from './diagnostics/errors.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, mergeDiagnostics } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import { parseProgram } from './frontend/parser.js';
import { emitProgram } from './lowering/emit.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import { collectDeclarations } from './semantics/env.js';
import { flattenProgram } from './semantics/flatten.js';
import { buildLayout } from './semantics/layout.js';
import { resolveNames } from './semantics/names.js';
import { resolveTypes } from './semantics/typecheck.js';

function internalError(file: string, err: InternalCompilerError): Diagnostic {
  return {
    id: DiagnosticIds.InternalError,
    kind: 'internal',
    severity: 'error',
    message: `Internal compiler error: ${err.message}`,
    file,
    problems: [],
    lines: [],
  };
}

/**
 * Compile source text already in memory.
 *
 * Parse, then collect declarations, resolve names and resolve types. If any of those three report
 * a problem, their diagnostics come back merged in source-line order and nothing is generated.
 * Otherwise flatten, lay out and generate code.
 */
export function compileSource(
  path: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  const program = parseProgram(path, text, diagnostics);
  if (!program) return { diagnostics, artifacts: [] };

  const entryPoint = options.entryPoint;
  const passOptions = entryPoint !== undefined ? { entryPoint } : {};

  const { env, report: scope } = collectDeclarations(program, passOptions);
  const names = resolveNames(program, env);
  const types = resolveTypes(program, env);
  const problemCount = scope.problemCount + names.problemCount + types.problemCount;
  if (problemCount > 0) {
    return {
      diagnostics: mergeDiagnostics(scope.diagnostics, names.diagnostics, types.diagnostics),
      artifacts: [],
    };
  }

  try {
    const flat = flattenProgram(program, passOptions);
    const globals = buildLayout(flat, diagnostics);
    const asm = emitProgram(flat, globals, passOptions);

    const writeOpts = options.lineEnding ? { lineEnding: options.lineEnding } : {};
    const artifacts: Artifact[] = [deps.formats.writeAsm(asm, writeOpts)];
    if (options.emitSymbols && deps.formats.writeSymbols) {
      artifacts.push(deps.formats.writeSymbols(globals, writeOpts));
    }
    return { diagnostics, artifacts };
  } catch (err) {
    if (err instanceof InternalCompilerError) {
      return { diagnostics: [...diagnostics, internalError(path, err)], artifacts: [] };
    }
    throw err;
  }
}

/**
 * Compile a program from disk.
 *
 * A file that cannot be read yields a single `SLT001` diagnostic.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  let text: string;
  try {
    text = await readFile(entryFile, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          kind: 'io',
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryFile,
          problems: [],
          lines: [],
        },
      ],
      artifacts: [],
    };
  }
  return compileSource(entryFile, text, options, deps);
};
