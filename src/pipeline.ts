import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that influence translation and which artifacts are produced.
 */
export interface TranslatorOptions {
  /** Emit the `.asm` output stream (default true). */
  emitAsm?: boolean;
  /** Assemble and emit machine code (`.hack`). */
  emitHack?: boolean;
  /** Assemble and emit a listing (`.lst`). */
  emitListing?: boolean;
  /** Assemble and emit a ROM-to-source map (`.map.json`). */
  emitMap?: boolean;
  /** Keep the per-command `//` comments in `.asm` (default true). */
  comments?: boolean;
  /** Zero each declared local on function entry instead of only reserving it. */
  zeroLocals?: boolean;
  /**
   * Scope labels to their enclosing function as `function$label` (default true).
   *
   * Turn off when the input already carries qualified names.
   */
  qualifyLabels?: boolean;
  /** Line ending for text artifacts. */
  lineEnding?: '\n' | '\r\n';
}

/**
 * One `.vm` source held in memory.
 */
export interface VmSource {
  /** Translation unit name; namespaces the unit's `static` cells. */
  name: string;
  path: string;
  text: string;
}

/**
 * Result of a translation run: diagnostics plus any produced artifacts.
 */
export interface TranslateResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  /** Input path minus extension (file input) or `<dir>/<dirname>` (directory input). */
  outputBase?: string;
}

/**
 * Dependency injection surface for the translator pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level translate function signature used by the pipeline contract.
 */
export type TranslateFn = (
  inputPath: string,
  options: TranslatorOptions,
  deps: PipelineDeps,
) => Promise<TranslateResult>;
