import type { SymbolTable } from '../semantics/layout.js';

/**
 * One line of a function's generated code.
 */
export type AsmLine =
  | { kind: 'comment'; text: string }
  | { kind: 'label'; name: string }
  | { kind: 'instruction'; text: string };

/**
 * One word-sized slot of the `.data` section.
 */
export interface DataSlot {
  label: string;
  value: number;
}

export interface FunctionBlock {
  name: string;
  lines: AsmLine[];
}

/**
 * Generated program before rendering: globals, the entry label, the startup code that calls it,
 * and one block per function.
 */
export interface AsmProgram {
  data: DataSlot[];
  entry: string;
  /** First instructions of `.text`: call the entry point, then exit. */
  startup: AsmLine[];
  functions: FunctionBlock[];
}

/**
 * Options for `.asm` source emission.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /** Instruction indentation (default four spaces). */
  indent?: string;
}

/**
 * Options for symbol table writing.
 */
export interface WriteSymbolsOptions {
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory `.asm` artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * In-memory symbol table dump (`.sym`).
 */
export interface SymbolsArtifact {
  kind: 'sym';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact | SymbolsArtifact;

/**
 * Format writers used by the pipeline to turn generated code and layout into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: AsmProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeSymbols?(globals: SymbolTable, opts?: WriteSymbolsOptions): SymbolsArtifact;
}
