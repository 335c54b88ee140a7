#!/usr/bin/env node
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { translate } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type CliOptions = {
  inputPath: string;
  outputPath?: string;
  emitHack: boolean;
  emitListing: boolean;
  emitMap: boolean;
  comments: boolean;
  zeroLocals: boolean;
  qualifyLabels: boolean;
  lineEnding: '\n' | '\r\n';
};

function usage(): string {
  return [
    'vmt [options] <input.vm | directory>',
    '',
    'Options:',
    '  -o, --output <file>   Output path for the .asm stream (must end in .asm)',
    '      --hack            Also assemble to machine code (.hack)',
    '      --list            Also write a listing (.lst)',
    '      --map             Also write a ROM-to-source map (.map.json)',
    '      --no-comments     Omit per-command comments from .asm',
    '      --zero-locals     Zero function locals on entry',
    '      --raw-labels      Do not scope labels to their enclosing function',
    '      --crlf            Write CRLF line endings',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - The input must be the last argument.',
    '  - A directory input translates every .vm file in it into <dir>/<dir>.asm.',
    '  - Sidecar artifacts are written next to the .asm output using its base name.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts when run from source, dist/src/cli.js when built.
  for (const candidate of [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let emitHack = false;
  let emitListing = false;
  let emitMap = false;
  let comments = true;
  let zeroLocals = false;
  let qualifyLabels = true;
  let lineEnding: '\n' | '\r\n' = '\n';
  let inputPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      if (a.startsWith('--output=')) {
        const v = a.slice('--output='.length);
        if (!v) fail(`--output expects a value`);
        outputPath = v;
        continue;
      }
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '--hack') {
      emitHack = true;
      continue;
    }
    if (a === '--list') {
      emitListing = true;
      continue;
    }
    if (a === '--map') {
      emitMap = true;
      continue;
    }
    if (a === '--no-comments') {
      comments = false;
      continue;
    }
    if (a === '--zero-locals') {
      zeroLocals = true;
      continue;
    }
    if (a === '--raw-labels') {
      qualifyLabels = false;
      continue;
    }
    if (a === '--crlf') {
      lineEnding = '\r\n';
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (inputPath !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <input> argument (and it must be last)`);
    }
    inputPath = a;
  }

  if (!inputPath) {
    fail(`Expected exactly one <input> argument (and it must be last)`);
  }

  if (outputPath && extname(outputPath).toLowerCase() !== '.asm') {
    fail(`--output must end with ".asm"`);
  }

  return {
    inputPath,
    ...(outputPath ? { outputPath } : {}),
    emitHack,
    emitListing,
    emitMap,
    comments,
    zeroLocals,
    qualifyLabels,
    lineEnding,
  };
}

function artifactBase(defaultBase: string, outputPath?: string): string {
  if (!outputPath) return defaultBase;
  const resolved = resolve(outputPath);
  const ext = extname(resolved);
  return ext.length > 0 ? resolved.slice(0, -ext.length) : resolved;
}

function artifactPath(base: string, artifact: Artifact): string {
  switch (artifact.kind) {
    case 'asm':
      return `${base}.asm`;
    case 'hack':
      return `${base}.hack`;
    case 'lst':
      return `${base}.lst`;
    case 'map':
      return `${base}.map.json`;
  }
}

function artifactText(artifact: Artifact): string {
  return artifact.kind === 'map' ? JSON.stringify(artifact.json, null, 2) + '\n' : artifact.text;
}

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<void> {
  await mkdir(dirname(base), { recursive: true });
  await Promise.all(
    artifacts.map((a) => writeFile(artifactPath(base, a), artifactText(a), 'utf8')),
  );
  process.stdout.write(`${base}.asm\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0 && !Number.isNaN(lineCmp)) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0 && !Number.isNaN(colCmp)) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await translate(
      parsed.inputPath,
      {
        emitAsm: true,
        emitHack: parsed.emitHack,
        emitListing: parsed.emitListing,
        emitMap: parsed.emitMap,
        comments: parsed.comments,
        zeroLocals: parsed.zeroLocals,
        qualifyLabels: parsed.qualifyLabels,
        lineEnding: parsed.lineEnding,
      },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error') || !res.outputBase) {
      return 1;
    }

    await writeArtifacts(artifactBase(res.outputBase, parsed.outputPath), res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`vmt: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = existsSync(resolved) ? realpathSync.native(resolved) : resolved;
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
