import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import type { AsmLine, EmittedAsm, LineOrigin, RomImage } from '../src/formats/types.js';
import { writeAsm } from '../src/formats/writeAsm.js';
import { toBinaryWord, writeHack } from '../src/formats/writeHack.js';
import { writeListing } from '../src/formats/writeListing.js';
import { writeMap } from '../src/formats/writeMap.js';
import { encodeProgram } from '../src/hack/encode.js';

const push: LineOrigin = {
  command: 'push constant 7',
  span: { file: '/work/prog/Main.vm', line: 1, column: 1 },
};
const jump: LineOrigin = { command: 'goto L' };

const lines: AsmLine[] = [
  { kind: 'comment', text: 'push constant 7', origin: push },
  { kind: 'instruction', text: '@7', origin: push },
  { kind: 'instruction', text: 'D=A', origin: push },
  { kind: 'label', name: 'L', origin: jump },
  { kind: 'instruction', text: '@L', origin: jump },
];
const asm: EmittedAsm = { lines };

function assemble(): RomImage {
  const diagnostics: Diagnostic[] = [];
  const image = encodeProgram(asm, diagnostics);
  if (!image) throw new Error(JSON.stringify(diagnostics));
  return image;
}

describe('writeAsm', () => {
  it('renders comments, labels and instructions', () => {
    expect(writeAsm(asm)).toEqual({
      kind: 'asm',
      text: '// push constant 7\n@7\nD=A\n(L)\n@L\n',
    });
  });

  it('drops comments and switches line endings on request', () => {
    expect(writeAsm(asm, { comments: false, lineEnding: '\r\n' }).text).toBe('@7\r\nD=A\r\n(L)\r\n@L\r\n');
  });
});

describe('writeHack', () => {
  it('writes one 16-digit word per line', () => {
    expect(toBinaryWord(-1)).toBe('1111111111111111');
    expect(writeHack(assemble()).text).toBe(
      ['0000000000000111', '1110110000010000', '0000000000000010', ''].join('\n'),
    );
  });
});

describe('writeListing', () => {
  it('shows addresses, words and the symbol table', () => {
    expect(writeListing(asm, assemble()).text).toBe(
      [
        '// VM translator listing',
        '// rom: 3 words',
        '',
        '// push constant 7',
        '00000: 0007  @7',
        '00001: EC10  D=A',
        '00002:       (L)',
        '00002: 0002  @L',
        '',
        '// symbols:',
        '// label L = 2',
        '',
      ].join('\n'),
    );
  });
});

describe('writeMap', () => {
  it('groups ROM ranges by originating command', () => {
    const map = writeMap(asm, assemble(), { rootDir: '/work/prog' });
    expect(map.json).toEqual({
      format: 'vm-source-map',
      version: 1,
      romSize: 3,
      segments: [
        { start: 0, end: 2, command: 'push constant 7', file: 'Main.vm', line: 1 },
        { start: 2, end: 3, command: 'goto L' },
      ],
      symbols: [{ kind: 'label', name: 'L', address: 2 }],
    });
  });

  it('keeps paths outside the root absolute', () => {
    const map = writeMap(asm, assemble(), { rootDir: '/elsewhere' });
    expect(map.json.segments[0]?.file).toBe('/work/prog/Main.vm');
  });
});
