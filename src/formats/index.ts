import type { FormatWriters } from './types.js';
import { writeAsm } from './writeAsm.js';
import { writeSymbols } from './writeSymbols.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeAsm,
  writeSymbols,
};
