import { describe, expect, it } from 'vitest';

import { InternalCompilerError } from '../src/diagnostics/errors.js';
import type { ProgramNode, StmtNode } from '../src/frontend/ast.js';
import { flattenProgram } from '../src/semantics/flatten.js';
import { parseOk } from './helpers/slate.js';

const declaredNames = (program: ProgramNode): string[] => {
  const names: string[] = [];
  const visit = (stmt: StmtNode): void => {
    switch (stmt.kind) {
      case 'VarDecl':
        names.push(stmt.name);
        return;
      case 'FuncDecl':
        names.push(stmt.name, ...stmt.params.map((p) => p.name));
        stmt.body.statements.forEach(visit);
        return;
      case 'Block':
        stmt.statements.forEach(visit);
        return;
      case 'If':
        visit(stmt.thenBranch);
        if (stmt.elseBranch) visit(stmt.elseBranch);
        return;
      case 'While':
        visit(stmt.body);
        return;
      default:
        return;
    }
  };
  program.statements.forEach(visit);
  return names;
};

describe('flattenProgram', () => {
  it('numbers functions first, then declarations in visit order', () => {
    const program = parseOk(
      'int base = 10;\nfun int add(int a, int b) { int r = a + b; return r; }\nfun int main() { println add(base, 5); return 0; }',
    );
    const flat = flattenProgram(program);
    expect(flat.statements).toMatchObject([
      { kind: 'VarDecl', name: 'base_1' },
      {
        kind: 'FuncDecl',
        name: 'add_0',
        params: [{ name: 'a_2' }, { name: 'b_3' }],
        body: {
          statements: [
            {
              kind: 'VarDecl',
              name: 'r_4',
              initializer: { left: { name: 'a_2' }, right: { name: 'b_3' } },
            },
            { kind: 'Return', value: { name: 'r_4' } },
          ],
        },
      },
      {
        kind: 'FuncDecl',
        name: 'main',
        body: {
          statements: [
            { kind: 'Print', expr: { kind: 'Call', name: 'add_0', args: [{ name: 'base_1' }, {}] } },
            { kind: 'Return' },
          ],
        },
      },
    ]);
  });

  it('gives a shadowing declaration its own name and resolves its initializer outside it', () => {
    const program = parseOk(
      'fun int main() {\nint x = 1;\n{ int x = x + 1; x = x * 2; }\nreturn x;\n}',
    );
    const flat = flattenProgram(program);
    expect(flat.statements[0]).toMatchObject({
      body: {
        statements: [
          { kind: 'VarDecl', name: 'x_0' },
          {
            kind: 'Block',
            statements: [
              { kind: 'VarDecl', name: 'x_1', initializer: { left: { name: 'x_0' } } },
              { kind: 'Assign', name: 'x_1', value: { left: { name: 'x_1' } } },
            ],
          },
          { kind: 'Return', value: { name: 'x_0' } },
        ],
      },
    });
  });

  it('resolves calls to functions declared further down', () => {
    const flat = flattenProgram(
      parseOk('fun int main() { return helper(); }\nfun int helper() { return 1; }'),
    );
    expect(flat.statements).toMatchObject([
      { name: 'main', body: { statements: [{ value: { kind: 'Call', name: 'helper_0' } }] } },
      { name: 'helper_0' },
    ]);
  });

  it('keeps the configured entry point verbatim', () => {
    const flat = flattenProgram(
      parseOk('fun int start() { return main(); }\nfun int main() { return 1; }'),
      { entryPoint: 'start' },
    );
    expect(flat.statements).toMatchObject([
      { name: 'start', body: { statements: [{ value: { name: 'main_0' } }] } },
      { name: 'main_0' },
    ]);
  });

  it('renames inside if, else and while', () => {
    const flat = flattenProgram(
      parseOk(
        'fun int main() { bool b = true; if (b) { int t = 1; } else b = false; while (b) { int w = 2; b = false; } return 0; }',
      ),
    );
    expect(flat.statements[0]).toMatchObject({
      body: {
        statements: [
          { name: 'b_0' },
          {
            kind: 'If',
            condition: { name: 'b_0' },
            thenBranch: { statements: [{ name: 't_1' }] },
            elseBranch: { kind: 'Assign', name: 'b_0' },
          },
          {
            kind: 'While',
            condition: { name: 'b_0' },
            body: { statements: [{ name: 'w_2' }, { name: 'b_0' }] },
          },
          { kind: 'Return' },
        ],
      },
    });
  });

  it('gives every declaration a distinct name without adding or dropping any', () => {
    const program = parseOk(
      [
        'int g = 1;',
        'fun int f(int x) { int y = x; { int x = 2; y = y + x; } return y; }',
        'fun int main() { int x = f(g); if (x > 0) { int y = 1; } else { int y = 2; } while (false) { int x = 3; } return x; }',
      ].join('\n'),
    );
    const before = declaredNames(program);
    const after = declaredNames(flattenProgram(program));
    expect(before).toHaveLength(10);
    expect(after).toHaveLength(before.length);
    expect(new Set(after).size).toBe(after.length);
  });

  it('never generates the entry point name for another declaration', () => {
    const flat = flattenProgram(
      parseOk(
        'fun int bar() { return 1; }\nfun int foo() { return 2; }\nfun int foo_1() { println foo(); return 0; }',
      ),
      { entryPoint: 'foo_1' },
    );
    expect(flat.statements).toMatchObject([
      { name: 'bar_0' },
      { name: 'foo_2' },
      { name: 'foo_1', body: { statements: [{ expr: { kind: 'Call', name: 'foo_2' } }, {}] } },
    ]);
  });

  it('leaves the input tree untouched', () => {
    const program = parseOk('int g = 1;\nfun int main() { return g; }');
    flattenProgram(program);
    expect(program.statements[0]).toMatchObject({ kind: 'VarDecl', name: 'g' });
  });

  it('throws an internal error on an unbound name', () => {
    const program = parseOk('fun int main() { return y; }');
    expect(() => flattenProgram(program)).toThrow(InternalCompilerError);
    expect(() => flattenProgram(program)).toThrow("Unresolved identifier 'y' while flattening.");
  });
});
