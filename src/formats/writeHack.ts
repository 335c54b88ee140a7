import type { HackArtifact, RomImage, WriteHackOptions } from './types.js';

export function toBinaryWord(word: number): string {
  return (word & 0xffff).toString(2).padStart(16, '0');
}

/**
 * Create the `.hack` artifact: one 16-digit binary word per ROM address.
 */
export function writeHack(image: RomImage, opts?: WriteHackOptions): HackArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const text = image.words.map((w) => toBinaryWord(w) + lineEnding).join('');
  return { kind: 'hack', text };
}
