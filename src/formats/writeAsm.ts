import type { AsmArtifact, AsmLine, AsmProgram, WriteAsmOptions } from './types.js';

/**
 * Render a generated program as assembly text.
 *
 * The `.data` section holds one `.word` per global. The `.text` section starts with the startup
 * code, followed by one blank-line-separated block per function.
 */
export function writeAsm(program: AsmProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const indent = opts?.indent ?? '    ';

  const lines: string[] = ['.data'];
  for (const slot of program.data) {
    lines.push(`${slot.label}: .word ${slot.value}`);
  }

  const render = (line: AsmLine): string => {
    switch (line.kind) {
      case 'comment':
        return `# ${line.text}`;
      case 'label':
        return `${line.name}:`;
      case 'instruction':
        return `${indent}${line.text}`;
    }
  };

  lines.push('', '.text', ...program.startup.map(render));
  for (const fn of program.functions) {
    lines.push('', ...fn.lines.map(render));
  }

  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
