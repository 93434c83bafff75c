import { describe, expect, it } from 'vitest';

import type { AsmProgram } from '../src/formats/types.js';
import { writeAsm } from '../src/formats/writeAsm.js';
import { writeSymbols } from '../src/formats/writeSymbols.js';
import { SymbolTable } from '../src/semantics/layout.js';

const sample: AsmProgram = {
  data: [{ label: 'g_0', value: 3 }],
  entry: 'main',
  startup: [
    { kind: 'instruction', text: 'jal main' },
    { kind: 'instruction', text: 'li $v0, 10' },
    { kind: 'instruction', text: 'syscall' },
  ],
  functions: [
    {
      name: 'main',
      lines: [
        { kind: 'comment', text: 'hi' },
        { kind: 'label', name: 'main' },
        { kind: 'instruction', text: 'jr $ra' },
      ],
    },
  ],
};

describe('writeAsm', () => {
  it('renders the data section, the startup code and each function block', () => {
    expect(writeAsm(sample)).toEqual({
      kind: 'asm',
      text: '.data\ng_0: .word 3\n\n.text\n    jal main\n    li $v0, 10\n    syscall\n\n# hi\nmain:\n    jr $ra\n',
    });
  });

  it('honours the line ending and indent options', () => {
    const { text } = writeAsm({ ...sample, data: [] }, { lineEnding: '\r\n', indent: '\t' });
    expect(text).toBe('.data\r\n\r\n.text\r\n\tjal main\r\n\tli $v0, 10\r\n\tsyscall\r\n\r\n# hi\r\nmain:\r\n\tjr $ra\r\n');
  });
});

describe('writeSymbols', () => {
  it('dumps globals and function tables under a header', () => {
    const table = new SymbolTable();
    table.addVariable('g_1', 'int', 14);
    table.addFunction('main', 'int').locals.addVariable('x_0', 'bool');
    expect(writeSymbols(table)).toEqual({
      kind: 'sym',
      text: '# symbols\ng_1 : int (VARIABLE), offset=0, initial=14\nmain : int (FUNCTION), locals=4\n  x_0 : bool (VARIABLE), offset=0\n',
    });
  });

  it('writes only the header for an empty table', () => {
    expect(writeSymbols(new SymbolTable()).text).toBe('# symbols\n');
  });
});
