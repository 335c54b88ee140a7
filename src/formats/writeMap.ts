import { isAbsolute, relative, resolve } from 'node:path';

import type {
  EmittedAsm,
  LineOrigin,
  MapArtifact,
  RomImage,
  SourceMapSegment,
  WriteMapOptions,
} from './types.js';

function normalizeMapPath(file: string, rootDir?: string): string {
  const withSlashes = file.replace(/\\/g, '/');
  if (!rootDir) return withSlashes;
  const absFile = resolve(file);
  const absRoot = resolve(rootDir);
  const rel = relative(absRoot, absFile);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return absFile.replace(/\\/g, '/');
  }
  return rel.replace(/\\/g, '/');
}

function toSegment(
  origin: LineOrigin,
  start: number,
  rootDir: string | undefined,
): SourceMapSegment {
  return {
    start,
    end: start,
    command: origin.command,
    ...(origin.span
      ? { file: normalizeMapPath(origin.span.file, rootDir), line: origin.span.line }
      : {}),
  };
}

/**
 * Create the source-map artifact: one `[start, end)` ROM range per VM command that produced code.
 */
export function writeMap(asm: EmittedAsm, image: RomImage, opts?: WriteMapOptions): MapArtifact {
  const segments: SourceMapSegment[] = [];
  let open: { origin: LineOrigin; segment: SourceMapSegment } | undefined;

  for (const [i, line] of asm.lines.entries()) {
    if (line.kind !== 'instruction' || !line.origin) continue;
    const address = image.lineAddresses[i] ?? 0;
    if (!open || open.origin !== line.origin) {
      open = { origin: line.origin, segment: toSegment(line.origin, address, opts?.rootDir) };
      segments.push(open.segment);
    }
    open.segment.end = address + 1;
  }

  return {
    kind: 'map',
    json: {
      format: 'vm-source-map',
      version: 1,
      romSize: image.words.length,
      segments,
      symbols: [...image.symbols].sort((a, b) => a.name.localeCompare(b.name)),
    },
  };
}
