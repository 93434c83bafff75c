import { describe, expect, it } from 'vitest';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import { runAsm } from './helpers/mips.js';
import { compileText } from './helpers/slate.js';

const fixtures = fileURLToPath(new URL('./fixtures/', import.meta.url));
const deps = { formats: defaultFormatWriters };

describe('compileSource', () => {
  it('produces only assembly by default', () => {
    const res = compileText('fun int main() { return 0; }');
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm']);
  });

  it('adds the symbol table when asked', () => {
    const res = compileText('int g = 2;\nfun int main() { println g; return 0; }', { emitSymbols: true });
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm', 'sym']);
    expect(res.artifacts[1]?.text).toBe(
      '# symbols\ng_0 : int (VARIABLE), offset=0, initial=2\nmain : int (FUNCTION), locals=0\n',
    );
  });

  it('uses the requested line ending', () => {
    const res = compileText('fun int main() { return 0; }', { lineEnding: '\r\n' });
    expect(res.artifacts[0]?.text.startsWith('.data\r\n\r\n.text\r\n    jal main\r\n')).toBe(true);
  });

  it('merges scope, name and type diagnostics by source line', () => {
    const res = compileText(
      ['fun int main() {', 'int a = true;', 'print zz;', 'return 0;', '}', 'print 1;'].join('\n'),
    );
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics.map((d) => [d.kind, d.line])).toEqual([
      ['type', 2],
      ['name', 3],
      ['scope', 6],
    ]);
    expect(res.diagnostics[2]?.message).toBe(
      'Global statements are not allowed; all executable statements must appear inside of a function.',
    );
  });

  it('stops at the first lexical error', () => {
    const res = compileText('int x = 1 @ 2;\nfun int main() { return y; }');
    expect(res.diagnostics.map((d) => d.kind)).toEqual(['lex']);
    expect(res.artifacts).toEqual([]);
  });

  it('rejects an entry point with parameters', () => {
    const res = compileText('fun int main(int a) { return a; }');
    expect(res.diagnostics.map((d) => d.message)).toEqual([
      "Entry point 'main' cannot take parameters.",
    ]);
  });

  it('requires the configured entry point instead of main', () => {
    const res = compileText('fun int main() { return 0; }', { entryPoint: 'start' });
    expect(res.diagnostics.map((d) => d.message)).toEqual([
      "No 'start' function found; program must have a 'start' function as the entry point.",
    ]);
  });

  it('keeps layout warnings alongside the output', () => {
    const res = compileText('int z = 5 / 0;\nfun int main() { println z; return 0; }');
    expect(res.diagnostics.map((d) => [d.id, d.severity])).toEqual([
      [DiagnosticIds.ConstDivideByZero, 'warning'],
    ]);
    const asm = res.artifacts[0]?.text ?? '';
    expect(asm.split('\n')[1]).toBe('z_0: .word 0');
    expect(runAsm(asm).output).toBe('0\n');
  });
});

describe('compile', () => {
  it('compiles a file from disk', async () => {
    const res = await compile(join(fixtures, 'hello.sl'), {}, deps);
    expect(res.diagnostics).toEqual([]);
    const asm = res.artifacts.find((a) => a.kind === 'asm');
    expect(runAsm(asm?.text ?? '').output).toBe('15\n');
  });

  it('reports problems against the file path', async () => {
    const path = join(fixtures, 'broken.sl');
    const res = await compile(path, {}, deps);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({
      id: DiagnosticIds.NameError,
      file: path,
      line: 3,
      column: 9,
      message: "Variable 'coutn' was used but never declared. Did you mean 'count'?",
    });
  });

  it('turns an unreadable file into a diagnostic', async () => {
    const path = join(fixtures, 'missing.sl');
    const res = await compile(path, {}, deps);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({ id: DiagnosticIds.IoReadFailed, kind: 'io', file: path });
    expect(res.diagnostics[0]?.message.startsWith('Failed to read entry file: ')).toBe(true);
  });
});
