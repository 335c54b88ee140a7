import type { ArithmeticOp, SourceLocation, VmCommand } from './ast.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { isSegmentName } from '../lowering/segments.js';

const ARITHMETIC_OPS: ReadonlySet<string> = new Set<ArithmeticOp>([
  'add',
  'sub',
  'neg',
  'eq',
  'gt',
  'lt',
  'and',
  'or',
  'not',
]);

/**
 * User identifiers never start with `$`; that prefix is reserved for generated labels.
 */
const IDENTIFIER_RE = /^[A-Za-z_.:][A-Za-z0-9_.:$]*$/;

function isArithmeticOp(token: string): token is ArithmeticOp {
  return ARITHMETIC_OPS.has(token);
}

export function isIdentifier(text: string): boolean {
  return IDENTIFIER_RE.test(text);
}

function diag(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  where: SourceLocation,
  message: string,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: where.file,
    line: where.line,
    column: where.column,
  });
}

function stripComment(line: string): string {
  const slash = line.indexOf('//');
  return slash >= 0 ? line.slice(0, slash) : line;
}

function parseCount(text: string): number | undefined {
  if (!/^[0-9]+$/.test(text)) return undefined;
  return Number.parseInt(text, 10);
}

/**
 * Parse one line's tokens into a command, or report why it cannot be parsed.
 */
function parseTokens(
  tokens: string[],
  where: SourceLocation,
  diagnostics: Diagnostic[],
): VmCommand | undefined {
  const [head = '', first, second] = tokens;
  const operandCount = tokens.length - 1;

  const expectOperands = (count: number, shape: string): boolean => {
    if (operandCount === count) return true;
    diag(diagnostics, DiagnosticIds.ParseError, where, `${head} expects ${shape}`);
    return false;
  };

  const name = (text: string | undefined, what: string): string | undefined => {
    if (text !== undefined && isIdentifier(text)) return text;
    diag(diagnostics, DiagnosticIds.ParseError, where, `Invalid ${what} "${text ?? ''}"`);
    return undefined;
  };

  const count = (text: string | undefined, what: string): number | undefined => {
    const n = text === undefined ? undefined : parseCount(text);
    if (n !== undefined) return n;
    diag(
      diagnostics,
      DiagnosticIds.ParseError,
      where,
      `${head} expects a non-negative integer ${what}, got "${text ?? ''}"`,
    );
    return undefined;
  };

  if (isArithmeticOp(head)) {
    if (!expectOperands(0, 'no operands')) return undefined;
    return { kind: 'Arithmetic', op: head, span: where };
  }

  switch (head) {
    case 'push':
    case 'pop': {
      if (!expectOperands(2, 'a segment and an index')) return undefined;
      const segment = first ?? '';
      if (!isSegmentName(segment)) {
        diag(diagnostics, DiagnosticIds.InvalidSegment, where, `Unknown segment "${segment}"`);
        return undefined;
      }
      const index = count(second, 'index');
      if (index === undefined) return undefined;
      return { kind: 'MemoryAccess', direction: head, segment, index, span: where };
    }
    case 'label':
    case 'goto':
    case 'if-goto': {
      if (!expectOperands(1, 'a label name')) return undefined;
      const label = name(first, 'label name');
      if (label === undefined) return undefined;
      if (head === 'label') return { kind: 'Label', name: label, span: where };
      if (head === 'goto') return { kind: 'Goto', name: label, span: where };
      return { kind: 'IfGoto', name: label, span: where };
    }
    case 'function': {
      if (!expectOperands(2, 'a function name and a local count')) return undefined;
      const fn = name(first, 'function name');
      const nLocals = count(second, 'local count');
      if (fn === undefined || nLocals === undefined) return undefined;
      return { kind: 'Function', name: fn, nLocals, span: where };
    }
    case 'call': {
      if (!expectOperands(2, 'a function name and an argument count')) return undefined;
      const fn = name(first, 'function name');
      const nArgs = count(second, 'argument count');
      if (fn === undefined || nArgs === undefined) return undefined;
      return { kind: 'Call', name: fn, nArgs, span: where };
    }
    case 'return':
      if (!expectOperands(0, 'no operands')) return undefined;
      return { kind: 'Return', span: where };
    default:
      diag(diagnostics, DiagnosticIds.UnknownCommand, where, `Unknown command "${head}"`);
      return undefined;
  }
}

/**
 * Parse the text of one `.vm` file into commands.
 *
 * Every malformed line is reported; the returned list holds only the lines that parsed.
 */
export function parseVmFile(file: string, text: string, diagnostics: Diagnostic[]): VmCommand[] {
  const commands: VmCommand[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const body = stripComment(raw);
    const trimmed = body.trim();
    if (trimmed.length === 0) return;

    const where: SourceLocation = {
      file,
      line: i + 1,
      column: body.length - body.trimStart().length + 1,
    };
    const command = parseTokens(trimmed.split(/\s+/), where, diagnostics);
    if (command) commands.push(command);
  });

  return commands;
}
