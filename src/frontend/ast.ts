/**
 * Frontend command contracts for VM code.
 *
 * This module intentionally defines types/interfaces only (no parsing/codegen).
 */

/**
 * 1-based source location of a command.
 */
export interface SourceLocation {
  /** User-facing file path (as provided on input). */
  file: string;
  line: number;
  column: number;
}

export type BinaryArithmeticOp = 'add' | 'sub' | 'and' | 'or';
export type UnaryArithmeticOp = 'neg' | 'not';
export type ComparisonOp = 'eq' | 'gt' | 'lt';

/**
 * All nine stack arithmetic/logic operators.
 */
export type ArithmeticOp = BinaryArithmeticOp | UnaryArithmeticOp | ComparisonOp;

/**
 * Addressable memory segments.
 */
export type Segment =
  | 'constant'
  | 'local'
  | 'argument'
  | 'this'
  | 'that'
  | 'temp'
  | 'pointer'
  | 'static';

export type AccessDirection = 'push' | 'pop';

/**
 * Base shape for all commands.
 */
export interface BaseCommand {
  kind: string;
  /** Present for commands produced by the parser. */
  span?: SourceLocation;
}

export interface ArithmeticCommand extends BaseCommand {
  kind: 'Arithmetic';
  op: ArithmeticOp;
}

/**
 * `push segment index` / `pop segment index`.
 */
export interface MemoryAccessCommand extends BaseCommand {
  kind: 'MemoryAccess';
  direction: AccessDirection;
  segment: Segment;
  index: number;
}

export interface LabelCommand extends BaseCommand {
  kind: 'Label';
  name: string;
}

export interface GotoCommand extends BaseCommand {
  kind: 'Goto';
  name: string;
}

/**
 * Pops one cell and jumps when it is nonzero.
 */
export interface IfGotoCommand extends BaseCommand {
  kind: 'IfGoto';
  name: string;
}

export interface FunctionCommand extends BaseCommand {
  kind: 'Function';
  name: string;
  nLocals: number;
}

/**
 * Invokes `name` with `nArgs` arguments already pushed.
 */
export interface CallCommand extends BaseCommand {
  kind: 'Call';
  name: string;
  nArgs: number;
}

export interface ReturnCommand extends BaseCommand {
  kind: 'Return';
}

/**
 * A single parsed VM command.
 */
export type VmCommand =
  | ArithmeticCommand
  | MemoryAccessCommand
  | LabelCommand
  | GotoCommand
  | IfGotoCommand
  | FunctionCommand
  | CallCommand
  | ReturnCommand;

/**
 * Coarse command classification exposed by the command source.
 */
export type CommandType =
  | 'arithmetic'
  | 'push'
  | 'pop'
  | 'label'
  | 'goto'
  | 'if'
  | 'function'
  | 'call'
  | 'return';

/**
 * One `.vm` file. `name` doubles as the namespace for its `static` segment.
 */
export interface TranslationUnit {
  name: string;
  path: string;
  commands: VmCommand[];
}

/**
 * Ordered translation units that share one output stream.
 */
export interface ProgramNode {
  units: TranslationUnit[];
}
