/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A translator diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `VMT101`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible.
   */
  Unknown: 'VMT000',

  /** Failed to read a source file or directory from disk. */
  IoReadFailed: 'VMT001',

  /** Internal error during parsing (unexpected exception). */
  InternalParseError: 'VMT002',

  /** Input directory holds no `.vm` files. */
  NoSourceFiles: 'VMT003',

  /** Generic parse error (arity, malformed index/count, malformed identifier). */
  ParseError: 'VMT100',

  /** Command kind (or arithmetic op) outside the recognized set. */
  UnknownCommand: 'VMT101',

  /** Memory-access command naming a segment outside the segment table. */
  InvalidSegment: 'VMT102',

  /** Pop to `constant`, out-of-range segment index, or an argument read on a kind without it. */
  InvalidOperation: 'VMT103',

  /** Assembler error (duplicate label, malformed instruction, ROM/static overflow). */
  EncodeError: 'VMT200',

  /** Internal emission error (unexpected exception from the code generator). */
  EmitError: 'VMT300',

  /** Translation unit name cannot be used as a static namespace. */
  UnitNameInvalid: 'VMT400',

  /** Two translation units map to the same static namespace. */
  UnitNameCollision: 'VMT401',

  /** No unit defines `Sys.init`, which the bootstrap always calls. */
  MissingEntryFunction: 'VMT500',

  /** `call` targets a function that no unit defines. */
  UndefinedCallTarget: 'VMT501',

  /** The same function name is defined more than once. */
  DuplicateFunction: 'VMT502',

  /** A function or label is spelled like a unit's static cell (`<unit>.<index>`). */
  StaticSymbolCollision: 'VMT503',

  /** `goto`/`if-goto` names a label that no `label` command declares. */
  UndefinedLabel: 'VMT504',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
