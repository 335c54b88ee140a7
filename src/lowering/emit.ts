import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { TranslationError } from '../diagnostics/errors.js';
import type { ProgramNode, SourceLocation } from '../frontend/ast.js';
import { CommandSource } from '../frontend/commandSource.js';
import type { EmittedAsm } from '../formats/types.js';
import type { CodeWriterOptions } from './codeWriter.js';
import { CodeWriter } from './codeWriter.js';

function diagAt(
  diagnostics: Diagnostic[],
  err: TranslationError,
  file: string,
  span: SourceLocation | undefined,
): void {
  diagnostics.push({
    id: err.id,
    severity: 'error',
    message: err.message,
    file: span?.file ?? file,
    ...(span ? { line: span.line, column: span.column } : {}),
  });
}

/**
 * Generate assembly for every translation unit of a program into one output stream.
 *
 * Implementation notes:
 * - One `CodeWriter` serves the whole program, so generated labels stay unique across units.
 * - Each unit switches the `static` namespace before its first command.
 * - The first fatal error aborts the stream: one located diagnostic is recorded and `undefined` is
 *   returned instead of a partial output.
 */
export function emitProgram(
  program: ProgramNode,
  diagnostics: Diagnostic[],
  options: CodeWriterOptions = {},
): EmittedAsm | undefined {
  const writer = new CodeWriter(options);
  let unitFile = '<bootstrap>';
  let lastSpan: SourceLocation | undefined;

  try {
    for (const unit of program.units) {
      unitFile = unit.path;
      lastSpan = undefined;
      writer.setUnit(unit.name);
      const source = new CommandSource(unit.commands);
      while (source.hasMoreCommands()) {
        const command = source.advance();
        lastSpan = command.span;
        writer.write(command);
      }
    }
  } catch (err) {
    if (err instanceof TranslationError) {
      diagAt(diagnostics, err, unitFile, lastSpan);
      return undefined;
    }
    diagnostics.push({
      id: DiagnosticIds.EmitError,
      severity: 'error',
      message: `Internal error during code generation: ${String(err)}`,
      file: unitFile,
    });
    return undefined;
  }

  return writer.toEmittedAsm();
}
