import type { AsmArtifact, AsmLine, EmittedAsm, WriteAsmOptions } from './types.js';

function renderLine(line: AsmLine): string {
  switch (line.kind) {
    case 'comment':
      return `// ${line.text}`;
    case 'label':
      return `(${line.name})`;
    case 'instruction':
      return line.text;
  }
}

/**
 * Create the `.asm` artifact: one instruction per line, labels as `(NAME)`.
 */
export function writeAsm(asm: EmittedAsm, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const comments = opts?.comments ?? true;

  const lines = asm.lines
    .filter((line) => comments || line.kind !== 'comment')
    .map(renderLine);

  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
