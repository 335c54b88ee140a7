import { DiagnosticIds, type Diagnostic } from '../diagnostics/types.js';
import type {
  CallCommand,
  FunctionCommand,
  GotoCommand,
  IfGotoCommand,
  LabelCommand,
  ProgramNode,
  SourceLocation,
} from '../frontend/ast.js';
import { ENTRY_FUNCTION } from '../lowering/codeWriter.js';

type Located<T> = { command: T; file: string };

// `<unit>.<index>`, the spelling of a static cell.
const STATIC_SYMBOL_RE = /^(.+)\.[0-9]+$/;

function locate(span: SourceLocation | undefined): { line?: number; column?: number } {
  return span ? { line: span.line, column: span.column } : {};
}

/**
 * Whole-program checks over functions, calls and branch labels.
 *
 * - A function defined twice is an error: both definitions would bind the same entry label.
 * - A call to a function no unit defines is a warning.
 * - A function or label spelled `<unit>.<index>` for some unit is an error: the assembler would bind
 *   that unit's static cell to the code address.
 * - A `goto`/`if-goto` to a label nothing declares is a warning.
 * - A program without `Sys.init` gets a warning, since the bootstrap always calls it.
 */
export function lintCallGraph(program: ProgramNode, diagnostics: Diagnostic[]): void {
  const defined = new Map<string, Located<FunctionCommand>>();
  const calls: Located<CallCommand>[] = [];
  const labels = new Set<string>();
  const jumps: Located<GotoCommand | IfGotoCommand>[] = [];
  const unitNames = new Set(program.units.map((u) => u.name));

  const checkStaticSpelling = (command: FunctionCommand | LabelCommand, file: string): void => {
    const unit = STATIC_SYMBOL_RE.exec(command.name)?.[1];
    if (unit === undefined || !unitNames.has(unit)) return;
    const what = command.kind === 'Function' ? 'Function' : 'Label';
    diagnostics.push({
      id: DiagnosticIds.StaticSymbolCollision,
      severity: 'error',
      message: `${what} "${command.name}" has the name of a static cell of unit ${unit}`,
      file,
      ...locate(command.span),
    });
  };

  for (const unit of program.units) {
    for (const command of unit.commands) {
      if (command.kind === 'Label') {
        checkStaticSpelling(command, unit.path);
        labels.add(command.name);
      } else if (command.kind === 'Goto' || command.kind === 'IfGoto') {
        jumps.push({ command, file: unit.path });
      } else if (command.kind === 'Function') {
        checkStaticSpelling(command, unit.path);
        const prev = defined.get(command.name);
        if (prev) {
          const prevLine = prev.command.span ? `:${prev.command.span.line}` : '';
          diagnostics.push({
            id: DiagnosticIds.DuplicateFunction,
            severity: 'error',
            message: `Function "${command.name}" is already defined at ${prev.file}${prevLine}`,
            file: unit.path,
            ...locate(command.span),
          });
          continue;
        }
        defined.set(command.name, { command, file: unit.path });
      } else if (command.kind === 'Call') {
        calls.push({ command, file: unit.path });
      }
    }
  }

  for (const { command, file } of calls) {
    if (defined.has(command.name)) continue;
    diagnostics.push({
      id: DiagnosticIds.UndefinedCallTarget,
      severity: 'warning',
      message: `Call to undefined function "${command.name}"`,
      file,
      ...locate(command.span),
    });
  }

  for (const { command, file } of jumps) {
    if (labels.has(command.name)) continue;
    diagnostics.push({
      id: DiagnosticIds.UndefinedLabel,
      severity: 'warning',
      message: `Jump to undeclared label "${command.name}"`,
      file,
      ...locate(command.span),
    });
  }

  if (!defined.has(ENTRY_FUNCTION)) {
    diagnostics.push({
      id: DiagnosticIds.MissingEntryFunction,
      severity: 'warning',
      message: `No unit defines ${ENTRY_FUNCTION}; the bootstrap calls it unconditionally`,
      file: program.units[0]?.path ?? '<program>',
    });
  }
}
