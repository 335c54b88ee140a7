import type { SourceLocation } from '../frontend/ast.js';

/**
 * VM command a generated line was emitted for.
 */
export interface LineOrigin {
  /** Canonical VM text of the command (e.g. `push constant 7`), or `bootstrap`. */
  command: string;
  /** Absent for the bootstrap and for commands built without a location. */
  span?: SourceLocation;
}

/**
 * One line of generated assembly, in emission order.
 */
export type AsmLine =
  | { kind: 'comment'; text: string; origin?: LineOrigin }
  | { kind: 'label'; name: string; origin?: LineOrigin }
  | { kind: 'instruction'; text: string; origin?: LineOrigin };

/**
 * Generated assembly for a whole output stream.
 */
export interface EmittedAsm {
  lines: AsmLine[];
}

/**
 * A resolved assembler symbol.
 */
export interface SymbolEntry {
  kind: 'label' | 'variable';
  name: string;
  /** ROM address for labels, RAM address for variables. */
  address: number;
}

/**
 * Assembled machine code for an {@link EmittedAsm}.
 */
export interface RomImage {
  /** 16-bit instruction words, ROM address order. */
  words: number[];
  /**
   * ROM address of each entry of `EmittedAsm.lines` (same index). Labels and comments take the
   * address of the next instruction.
   */
  lineAddresses: number[];
  symbols: SymbolEntry[];
}

/**
 * Options for `.asm` writing.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /** Keep `//` comment lines (default true). */
  comments?: boolean;
}

/**
 * Options for `.hack` writing.
 */
export interface WriteHackOptions {
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for source-map writing.
 */
export interface WriteMapOptions {
  /**
   * Base directory used to normalize file paths in the map.
   * When provided, file paths are made project-relative and use `/` separators.
   */
  rootDir?: string;
}

/**
 * In-memory `.asm` artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * In-memory `.hack` artifact (one binary word per line).
 */
export interface HackArtifact {
  kind: 'hack';
  path?: string;
  text: string;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * In-memory source-map artifact.
 */
export interface MapArtifact {
  kind: 'map';
  path?: string;
  json: SourceMapJson;
}

/**
 * Union of all artifact kinds produced by the translator.
 */
export type Artifact = AsmArtifact | HackArtifact | ListingArtifact | MapArtifact;

/**
 * ROM range `[start, end)` produced by one VM command.
 */
export interface SourceMapSegment {
  start: number;
  end: number;
  command: string;
  file?: string;
  line?: number;
}

export type SourceMapJson = {
  format: 'vm-source-map';
  version: 1;
  romSize: number;
  segments: SourceMapSegment[];
  symbols: SymbolEntry[];
};

/**
 * Format writers used by the pipeline to turn generated assembly into artifacts.
 */
export interface FormatWriters {
  writeAsm(asm: EmittedAsm, opts?: WriteAsmOptions): AsmArtifact;
  writeHack(image: RomImage, opts?: WriteHackOptions): HackArtifact;
  writeListing?(asm: EmittedAsm, image: RomImage, opts?: WriteListingOptions): ListingArtifact;
  writeMap?(asm: EmittedAsm, image: RomImage, opts?: WriteMapOptions): MapArtifact;
}
