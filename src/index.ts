export { compile, compileSource } from './compile.js';
export type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
export { defaultFormatWriters } from './formats/index.js';
export type { Artifact, AsmProgram, FormatWriters } from './formats/types.js';
export type { Diagnostic, DiagnosticKind, Problem } from './diagnostics/types.js';
export { DiagnosticIds, mergeDiagnostics } from './diagnostics/types.js';
export { renderDiagnostic, renderReport } from './diagnostics/render.js';
export { parseProgram } from './frontend/parser.js';
export { collectDeclarations } from './semantics/env.js';
export { resolveNames } from './semantics/names.js';
export { resolveTypes } from './semantics/typecheck.js';
export { flattenProgram } from './semantics/flatten.js';
export { buildLayout, SymbolTable } from './semantics/layout.js';
export { emitProgram } from './lowering/emit.js';
