import type { SymbolTable } from '../semantics/layout.js';
import type { SymbolsArtifact, WriteSymbolsOptions } from './types.js';

/**
 * Dump the global symbol table and every function's table, one entry per line.
 */
export function writeSymbols(globals: SymbolTable, opts?: WriteSymbolsOptions): SymbolsArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const body = globals.toString();
  const lines = body.length > 0 ? body.split('\n') : [];
  return { kind: 'sym', text: ['# symbols', ...lines].join(lineEnding) + lineEnding };
}
