import type {
  AsmLine,
  EmittedAsm,
  ListingArtifact,
  RomImage,
  SymbolEntry,
  WriteListingOptions,
} from './types.js';

function toHexWord(n: number): string {
  return (n & 0xffff).toString(16).toUpperCase().padStart(4, '0');
}

function toRomAddress(n: number): string {
  return String(n).padStart(5, '0');
}

function formatLine(line: AsmLine, address: number, word: number | undefined): string {
  switch (line.kind) {
    case 'comment':
      return `// ${line.text}`;
    case 'label':
      return `${toRomAddress(address)}:       (${line.name})`;
    case 'instruction':
      return `${toRomAddress(address)}: ${toHexWord(word ?? 0)}  ${line.text}`;
  }
}

function sortSymbols(a: SymbolEntry, b: SymbolEntry): number {
  if (a.kind !== b.kind) return a.kind === 'label' ? -1 : 1;
  if (a.address !== b.address) return a.address - b.address;
  return a.name.localeCompare(b.name);
}

/**
 * Create a deterministic `.lst` listing artifact.
 *
 * Each instruction shows its ROM address and encoded word next to the assembly text; labels show the
 * address they bind to. A symbol table follows.
 */
export function writeListing(
  asm: EmittedAsm,
  image: RomImage,
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';

  const lines: string[] = [];
  lines.push('// VM translator listing');
  lines.push(`// rom: ${image.words.length} words`);
  lines.push('');

  asm.lines.forEach((line, i) => {
    const address = image.lineAddresses[i] ?? 0;
    lines.push(formatLine(line, address, image.words[address]));
  });

  lines.push('');
  lines.push('// symbols:');
  for (const s of [...image.symbols].sort(sortSymbols)) {
    lines.push(`// ${s.kind} ${s.name} = ${s.address}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
