import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type {
  PipelineDeps,
  TranslateFn,
  TranslateResult,
  TranslatorOptions,
  VmSource,
} from './pipeline.js';

import type { ProgramNode, TranslationUnit, VmCommand } from './frontend/ast.js';
import { isIdentifier, parseVmFile } from './frontend/parser.js';
import { qualifyLabels } from './frontend/qualify.js';
import type { Artifact } from './formats/types.js';
import { encodeProgram } from './hack/encode.js';
import { lintCallGraph } from './lint/call_graph.js';
import { emitProgram } from './lowering/emit.js';

const VM_EXTENSION = '.vm';

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

function stripExtension(path: string): string {
  const ext = extname(path);
  return ext.length > 0 ? path.slice(0, -ext.length) : path;
}

/**
 * Unit name for a source path: the file name without its extension.
 */
export function unitNameForPath(path: string): string {
  return stripExtension(basename(path));
}

function checkUnitNames(sources: VmSource[], diagnostics: Diagnostic[]): void {
  const seen = new Map<string, VmSource>();
  for (const source of sources) {
    if (!isIdentifier(source.name)) {
      diagnostics.push({
        id: DiagnosticIds.UnitNameInvalid,
        severity: 'error',
        message: `Unit name "${source.name}" cannot prefix static symbols; rename the file`,
        file: source.path,
      });
      continue;
    }
    const key = source.name.toLowerCase();
    const prev = seen.get(key);
    if (prev) {
      diagnostics.push({
        id: DiagnosticIds.UnitNameCollision,
        severity: 'error',
        message: `Unit name collision: "${source.name}" maps to both "${prev.path}" and "${source.path}".`,
        file: source.path,
      });
    } else {
      seen.set(key, source);
    }
  }
}

function parseUnits(
  sources: VmSource[],
  options: TranslatorOptions,
  diagnostics: Diagnostic[],
): TranslationUnit[] {
  const units: TranslationUnit[] = [];
  for (const source of sources) {
    let commands: VmCommand[];
    try {
      commands = parseVmFile(source.path, source.text, diagnostics);
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.InternalParseError,
        severity: 'error',
        message: `Internal error during parse: ${String(err)}`,
        file: source.path,
      });
      continue;
    }
    units.push({
      name: source.name,
      path: source.path,
      commands: (options.qualifyLabels ?? true) ? qualifyLabels(commands) : commands,
    });
  }
  return units;
}

/**
 * Translate in-memory sources into one output stream.
 *
 * Sources are translated in the order given, all sharing one code generator. Any error diagnostic
 * suppresses every artifact.
 */
export function translateSources(
  sources: VmSource[],
  options: TranslatorOptions,
  deps: PipelineDeps,
  context: { rootDir?: string } = {},
): TranslateResult {
  const diagnostics: Diagnostic[] = [];

  checkUnitNames(sources, diagnostics);
  const units = parseUnits(sources, options, diagnostics);
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const program: ProgramNode = { units };
  lintCallGraph(program, diagnostics);
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const asm = emitProgram(program, diagnostics, {
    ...(options.zeroLocals !== undefined ? { zeroLocals: options.zeroLocals } : {}),
  });
  if (!asm || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const lineEnding = options.lineEnding ?? '\n';
  const artifacts: Artifact[] = [];

  if (options.emitAsm ?? true) {
    artifacts.push(deps.formats.writeAsm(asm, { lineEnding, comments: options.comments ?? true }));
  }

  const needsImage = options.emitHack || options.emitListing || options.emitMap;
  if (!needsImage) return { diagnostics, artifacts };

  const image = encodeProgram(asm, diagnostics);
  if (!image) return { diagnostics, artifacts: [] };

  if (options.emitHack) {
    artifacts.push(deps.formats.writeHack(image, { lineEnding }));
  }
  if (options.emitListing) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(asm, image, { lineEnding }));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: sources[0]?.path ?? '<program>',
      });
    }
  }
  if (options.emitMap) {
    if (deps.formats.writeMap) {
      artifacts.push(
        deps.formats.writeMap(asm, image, {
          ...(context.rootDir !== undefined ? { rootDir: context.rootDir } : {}),
        }),
      );
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitMap=true but no map writer is configured; skipping .map.json artifact.',
        file: sources[0]?.path ?? '<program>',
      });
    }
  }

  return { diagnostics, artifacts };
}

async function loadSources(
  inputPath: string,
  diagnostics: Diagnostic[],
): Promise<{ sources: VmSource[]; outputBase: string; rootDir: string } | undefined> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(inputPath)).isDirectory();
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to open input: ${String(err)}`,
      file: inputPath,
    });
    return undefined;
  }

  let paths: string[];
  if (isDirectory) {
    try {
      const entries = await readdir(inputPath, { withFileTypes: true });
      paths = entries
        .filter((e) => e.isFile() && extname(e.name) === VM_EXTENSION)
        .map((e) => e.name)
        .sort()
        .map((name) => join(inputPath, name));
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: `Failed to list input directory: ${String(err)}`,
        file: inputPath,
      });
      return undefined;
    }
    if (paths.length === 0) {
      diagnostics.push({
        id: DiagnosticIds.NoSourceFiles,
        severity: 'error',
        message: `No ${VM_EXTENSION} files in directory`,
        file: inputPath,
      });
      return undefined;
    }
  } else {
    paths = [inputPath];
  }

  const sources: VmSource[] = [];
  for (const path of paths) {
    try {
      // eslint-disable-next-line no-await-in-loop
      const text = await readFile(path, 'utf8');
      sources.push({ name: unitNameForPath(path), path, text });
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: `Failed to read source file: ${String(err)}`,
        file: path,
      });
    }
  }
  if (hasErrors(diagnostics)) return undefined;

  return {
    sources,
    outputBase: isDirectory ? join(inputPath, basename(inputPath)) : stripExtension(inputPath),
    rootDir: isDirectory ? inputPath : dirname(inputPath),
  };
}

/**
 * Translate a `.vm` file, or every `.vm` file of a directory, into one program.
 *
 * Directory members are translated in file-name order; each file is its own `static` namespace.
 * Artifacts are produced in memory via `deps.formats` (no filesystem writes).
 */
export const translate: TranslateFn = async (
  inputPath: string,
  options: TranslatorOptions,
  deps: PipelineDeps,
): Promise<TranslateResult> => {
  const resolvedInput = resolve(inputPath);
  const diagnostics: Diagnostic[] = [];
  const loaded = await loadSources(resolvedInput, diagnostics);
  if (!loaded) return { diagnostics, artifacts: [] };

  const result = translateSources(loaded.sources, options, deps, { rootDir: loaded.rootDir });
  return { ...result, outputBase: loaded.outputBase };
};
