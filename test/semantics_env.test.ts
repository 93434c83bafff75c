import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import { collectDeclarations, globalScope } from '../src/semantics/env.js';
import { messagesOf, parseOk } from './helpers/slate.js';

describe('collectDeclarations', () => {
  it('registers function signatures in declaration order', () => {
    const { env, report } = collectDeclarations(
      parseOk('fun bool odd(int n) { return n % 2 == 1; }\nfun int main() { return 0; }'),
    );
    expect(report.problemCount).toBe(0);
    expect([...env.functions.keys()]).toEqual(['odd', 'main']);
    expect(env.functions.get('odd')).toMatchObject({
      returnType: 'bool',
      params: [{ name: 'n', type: 'int' }],
    });
    expect(env.entryPoint).toBe('main');
  });

  it('rejects executable statements at top level', () => {
    const { report } = collectDeclarations(parseOk('print 1;\nfun int main() { return 0; }'));
    expect(messagesOf(report)).toEqual([
      'Global statements are not allowed; all executable statements must appear inside of a function.',
    ]);
    expect(report.diagnostics[0]).toMatchObject({
      id: DiagnosticIds.ScopeError,
      kind: 'scope',
      line: 1,
    });
  });

  it('keeps the first of two functions with the same name', () => {
    const { env, report } = collectDeclarations(
      parseOk('fun int f() { return 1; }\nfun bool f() { return true; }\nfun int main() { return 0; }'),
    );
    expect(messagesOf(report)).toEqual([
      "Function 'f' was previously declared; functions cannot be redeclared.",
    ]);
    expect(report.diagnostics[0]?.line).toBe(2);
    expect(env.functions.get('f')?.returnType).toBe('int');
  });

  it('rejects calls in global initializers', () => {
    const { report } = collectDeclarations(
      parseOk('int g = f() + 1;\nfun int f() { return 1; }\nfun int main() { return 0; }'),
    );
    expect(messagesOf(report)).toEqual([
      'Global variable initial values must be constant; this is not a constant value.',
    ]);
  });

  it('requires an entry point', () => {
    const { report } = collectDeclarations(parseOk('fun int helper() { return 0; }'));
    expect(report.problemCount).toBe(1);
    expect(report.diagnostics[0]?.message).toBe(
      "No 'main' function found; program must have a 'main' function as the entry point.",
    );
  });

  it('honors a configured entry point', () => {
    const program = parseOk('fun int main() { return 0; }');
    const { report } = collectDeclarations(program, { entryPoint: 'start' });
    expect(report.diagnostics[0]?.message).toBe(
      "No 'start' function found; program must have a 'start' function as the entry point.",
    );
  });

  it('rejects an entry point with parameters', () => {
    const { report } = collectDeclarations(parseOk('fun int main(int argc) { return argc; }'));
    expect(messagesOf(report)).toEqual(["Entry point 'main' cannot take parameters."]);
  });
});

describe('globalScope', () => {
  it('holds one unchecked record per function', () => {
    const { env } = collectDeclarations(parseOk('fun int main() { return 0; }'));
    const scope = globalScope(env);
    expect(scope.lookup('main')).toEqual({
      kind: 'function',
      type: 'int',
      params: [],
      initialized: false,
    });
  });
});
