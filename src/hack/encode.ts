import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { AsmLine, EmittedAsm, RomImage, SymbolEntry } from '../formats/types.js';
import { SEGMENT_TABLE, STACK_BASE } from '../lowering/segments.js';

const ROM_SIZE = 0x8000;
const MAX_LITERAL = 0x7fff;
const FIRST_VARIABLE = SEGMENT_TABLE.static.base;

const PREDEFINED: ReadonlyMap<string, number> = new Map<string, number>([
  ['SP', 0],
  ['LCL', 1],
  ['ARG', 2],
  ['THIS', 3],
  ['THAT', 4],
  ...Array.from({ length: 16 }, (_, r): [string, number] => [`R${r}`, r]),
  ['SCREEN', 0x4000],
  ['KBD', 0x6000],
]);

// a + c1..c6
// prettier-ignore
const COMP: ReadonlyMap<string, number> = new Map<string, number>([
  ['0',   0b0101010],
  ['1',   0b0111111],
  ['-1',  0b0111010],
  ['D',   0b0001100],
  ['A',   0b0110000], ['M',   0b1110000],
  ['!D',  0b0001101],
  ['!A',  0b0110001], ['!M',  0b1110001],
  ['-D',  0b0001111],
  ['-A',  0b0110011], ['-M',  0b1110011],
  ['D+1', 0b0011111],
  ['A+1', 0b0110111], ['M+1', 0b1110111],
  ['D-1', 0b0001110],
  ['A-1', 0b0110010], ['M-1', 0b1110010],
  ['D+A', 0b0000010], ['D+M', 0b1000010],
  ['D-A', 0b0010011], ['D-M', 0b1010011],
  ['A-D', 0b0000111], ['M-D', 0b1000111],
  ['D&A', 0b0000000], ['D&M', 0b1000000],
  ['D|A', 0b0010101], ['D|M', 0b1010101],
]);

// Commuted spellings of the symmetric operations.
const COMP_ALIASES: ReadonlyMap<string, string> = new Map<string, string>([
  ['1+D', 'D+1'],
  ['1+A', 'A+1'],
  ['1+M', 'M+1'],
  ['A+D', 'D+A'],
  ['M+D', 'D+M'],
  ['A&D', 'D&A'],
  ['M&D', 'D&M'],
  ['A|D', 'D|A'],
  ['M|D', 'D|M'],
]);

const DEST: ReadonlyMap<string, number> = new Map<string, number>([
  ['', 0b000],
  ['M', 0b001],
  ['D', 0b010],
  ['MD', 0b011],
  ['DM', 0b011],
  ['A', 0b100],
  ['AM', 0b101],
  ['MA', 0b101],
  ['AD', 0b110],
  ['DA', 0b110],
  ['AMD', 0b111],
  ['ADM', 0b111],
]);

const JUMP: ReadonlyMap<string, number> = new Map<string, number>([
  ['', 0b000],
  ['JGT', 0b001],
  ['JEQ', 0b010],
  ['JGE', 0b011],
  ['JLT', 0b100],
  ['JNE', 0b101],
  ['JLE', 0b110],
  ['JMP', 0b111],
]);

function diag(diagnostics: Diagnostic[], line: AsmLine, message: string): void {
  const span = line.origin?.span;
  diagnostics.push({
    id: DiagnosticIds.EncodeError,
    severity: 'error',
    message,
    file: span?.file ?? '<generated>',
    ...(span ? { line: span.line, column: span.column } : {}),
  });
}

/**
 * Encode a C-instruction `dest=comp;jump` as `111a cccc ccdd djjj`.
 */
export function encodeCompute(text: string): number | undefined {
  const eq = text.indexOf('=');
  const dest = eq >= 0 ? text.slice(0, eq) : '';
  const rest = eq >= 0 ? text.slice(eq + 1) : text;
  const semi = rest.indexOf(';');
  const compText = semi >= 0 ? rest.slice(0, semi) : rest;
  const jump = semi >= 0 ? rest.slice(semi + 1) : '';

  const comp = COMP.get(COMP_ALIASES.get(compText) ?? compText);
  const destBits = DEST.get(dest);
  const jumpBits = JUMP.get(jump);
  if (comp === undefined || destBits === undefined || jumpBits === undefined) return undefined;
  if (eq >= 0 && dest === '') return undefined;
  if (semi >= 0 && jump === '') return undefined;

  return (0b111 << 13) | (comp << 6) | (destBits << 3) | jumpBits;
}

/**
 * Assemble generated lines into ROM words.
 *
 * Pass 1 binds every label to the address of the instruction that follows it; pass 2 encodes
 * instructions, handing out RAM cells from 16 upward to symbols that are neither predefined nor
 * labels (the `static` cells). On any error a diagnostic is appended and `undefined` is returned.
 */
export function encodeProgram(asm: EmittedAsm, diagnostics: Diagnostic[]): RomImage | undefined {
  const errorsBefore = diagnostics.length;
  const labels = new Map<string, number>();
  const lineAddresses: number[] = [];
  let address = 0;

  for (const line of asm.lines) {
    lineAddresses.push(address);
    if (line.kind === 'label') {
      if (PREDEFINED.has(line.name) || labels.has(line.name)) {
        diag(diagnostics, line, `Duplicate label "${line.name}"`);
        continue;
      }
      labels.set(line.name, address);
      continue;
    }
    if (line.kind === 'instruction') address++;
  }

  if (address > ROM_SIZE) {
    diagnostics.push({
      id: DiagnosticIds.EncodeError,
      severity: 'error',
      message: `Program needs ${address} ROM words; the ROM holds ${ROM_SIZE}`,
      file: '<generated>',
    });
  }
  if (diagnostics.length > errorsBefore) return undefined;

  const variables = new Map<string, number>();
  let nextVariable = FIRST_VARIABLE;
  const words: number[] = [];

  const resolve = (line: AsmLine, symbol: string): number | undefined => {
    const known = PREDEFINED.get(symbol) ?? labels.get(symbol) ?? variables.get(symbol);
    if (known !== undefined) return known;
    if (nextVariable >= STACK_BASE) {
      diag(
        diagnostics,
        line,
        `Too many static variables: "${symbol}" would be placed at ${nextVariable}, inside the stack`,
      );
      return undefined;
    }
    const allocated = nextVariable++;
    variables.set(symbol, allocated);
    return allocated;
  };

  for (const line of asm.lines) {
    if (line.kind !== 'instruction') continue;
    const text = line.text;

    if (text.startsWith('@')) {
      const operand = text.slice(1);
      if (/^[0-9]+$/.test(operand)) {
        const value = Number.parseInt(operand, 10);
        if (value > MAX_LITERAL) {
          diag(diagnostics, line, `Literal ${value} does not fit in an A-instruction`);
          continue;
        }
        words.push(value);
        continue;
      }
      const value = resolve(line, operand);
      if (value !== undefined) words.push(value);
      continue;
    }

    const word = encodeCompute(text);
    if (word === undefined) {
      diag(diagnostics, line, `Malformed instruction "${text}"`);
      continue;
    }
    words.push(word);
  }

  if (diagnostics.length > errorsBefore) return undefined;

  const symbols: SymbolEntry[] = [
    ...[...labels].map(([name, addr]): SymbolEntry => ({ kind: 'label', name, address: addr })),
    ...[...variables].map(
      ([name, addr]): SymbolEntry => ({ kind: 'variable', name, address: addr }),
    ),
  ];

  return { words, lineAddresses, symbols };
}
