import type { FormatWriters } from './types.js';
import { writeAsm } from './writeAsm.js';
import { writeHack } from './writeHack.js';
import { writeListing } from './writeListing.js';
import { writeMap } from './writeMap.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeAsm,
  writeHack,
  writeListing,
  writeMap,
};
