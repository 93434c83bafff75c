import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { lex } from '../src/frontend/lexer.js';
import { makeSourceFile } from '../src/frontend/source.js';

const lexText = (text: string) => {
  const diagnostics: Diagnostic[] = [];
  const tokens = lex(makeSourceFile('t.sl', text), diagnostics);
  return { tokens, diagnostics };
};

describe('lex', () => {
  it('splits keywords, identifiers, numbers and operators', () => {
    const { tokens, diagnostics } = lexText('fun int f(){ return a<=10 && !b; }');
    expect(diagnostics).toEqual([]);
    expect(tokens?.map((t) => t.text)).toEqual([
      'fun', 'int', 'f', '(', ')', '{', 'return', 'a', '<=', '10', '&&', '!', 'b', ';', '}', '',
    ]);
    expect(tokens?.map((t) => t.kind)).toEqual([
      'keyword', 'keyword', 'identifier', 'symbol', 'symbol', 'symbol', 'keyword', 'identifier',
      'symbol', 'number', 'symbol', 'symbol', 'identifier', 'symbol', 'symbol', 'eof',
    ]);
    expect(tokens?.[9]?.value).toBe(10);
  });

  it('skips line and block comments and tracks positions across them', () => {
    const { tokens } = lexText('int x; // note\n/* multi\nline */ bool y;');
    expect(tokens?.map((t) => t.text)).toEqual(['int', 'x', ';', 'bool', 'y', ';', '']);
    const boolToken = tokens?.[3];
    expect(boolToken?.span.start).toEqual({ line: 3, column: 9, offset: 32 });
    expect(boolToken?.span.end.column).toBe(13);
  });

  it('rejects a lone ampersand', () => {
    const { tokens, diagnostics } = lexText('a & b');
    expect(tokens).toBeUndefined();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      id: DiagnosticIds.LexError,
      kind: 'lex',
      message: "Undefined token '&'; did you mean '&&'?",
      line: 1,
      column: 3,
    });
  });

  it('rejects an unterminated block comment', () => {
    const { diagnostics } = lexText('int x; /* open');
    expect(diagnostics[0]?.message).toBe('Unterminated multi-line comment.');
    expect(diagnostics[0]?.column).toBe(8);
  });

  it('rejects characters outside the language', () => {
    const { diagnostics } = lexText('int @;');
    expect(diagnostics[0]?.message).toBe("Unexpected character '@' (code 64).");
    expect(diagnostics[0]?.column).toBe(5);
  });

  it('rejects integer literals wider than 32 bits', () => {
    const { diagnostics } = lexText('4294967296');
    expect(diagnostics[0]?.message).toBe('Integer literal 4294967296 does not fit in 32 bits.');
  });

  it('keeps the offending source line on the diagnostic', () => {
    const { diagnostics } = lexText('int a;\nint b = 1 | 2;');
    expect(diagnostics[0]?.lines).toEqual([{ line: 2, text: 'int b = 1 | 2;' }]);
  });
});
