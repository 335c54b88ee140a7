import { TranslationError } from '../diagnostics/errors.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { AccessDirection, VmCommand } from '../frontend/ast.js';
import { isIdentifier } from '../frontend/parser.js';
import type { AsmLine, EmittedAsm, LineOrigin } from '../formats/types.js';
import type { SegmentBase } from './segments.js';
import { lookupSegment, POINTER_ALIASES, SCRATCH, STACK_BASE } from './segments.js';

/** Function the bootstrap calls. */
export const ENTRY_FUNCTION = 'Sys.init';

/** Cells a call pushes ahead of the callee's frame: return address + LCL, ARG, THIS, THAT. */
const SAVED_FRAME_CELLS = 5;
const SAVED_POINTERS = ['LCL', 'ARG', 'THIS', 'THAT'] as const;

// A-instructions carry 15 bits.
const MAX_LITERAL = 0x7fff;

// D -> *SP, SP++
const PUSH_D = ['@SP', 'A=M', 'M=D', '@SP', 'M=M+1'];
// SP--, D <- *SP (A is left on the popped cell)
const POP_D = ['@SP', 'AM=M-1', 'D=M'];

const BINARY_COMP: ReadonlyMap<string, string> = new Map<string, string>([
  ['add', 'D+M'],
  ['sub', 'M-D'],
  ['and', 'D&M'],
  ['or', 'D|M'],
]);

const UNARY_COMP: ReadonlyMap<string, string> = new Map<string, string>([
  ['neg', '-M'],
  ['not', '!M'],
]);

const COMPARISON_JUMP: ReadonlyMap<string, string> = new Map<string, string>([
  ['eq', 'JEQ'],
  ['gt', 'JGT'],
  ['lt', 'JLT'],
]);

/**
 * Generated labels start with `$`, which no parsed identifier can.
 */
export const GeneratedLabels = {
  comparisonTrue: (id: number): string => `$TRUE.${id}`,
  comparisonEnd: (id: number): string => `$END.${id}`,
  returnAddress: (id: number): string => `$RET.${id}`,
} as const;

export interface CodeWriterOptions {
  /** Push a zero for each declared local instead of only advancing SP past them. */
  zeroLocals?: boolean;
}

/**
 * Canonical VM text for a command, e.g. `push local 2` or `if-goto LOOP`.
 */
export function describeCommand(command: VmCommand): string {
  switch (command.kind) {
    case 'Arithmetic':
      return command.op;
    case 'MemoryAccess':
      return `${command.direction} ${command.segment} ${command.index}`;
    case 'Label':
      return `label ${command.name}`;
    case 'Goto':
      return `goto ${command.name}`;
    case 'IfGoto':
      return `if-goto ${command.name}`;
    case 'Function':
      return `function ${command.name} ${command.nLocals}`;
    case 'Call':
      return `call ${command.name} ${command.nArgs}`;
    case 'Return':
      return 'return';
    default: {
      const unknown: never = command;
      throw new TranslationError(
        DiagnosticIds.UnknownCommand,
        `Unknown command ${JSON.stringify(unknown)}`,
      );
    }
  }
}

/**
 * Stack-machine to assembly code generator for one output stream.
 *
 * Invariants kept by every fragment: SP points one past the top of the stack, and LCL/ARG/THIS/THAT
 * point at the first cell of their segments. The bootstrap (`SP = 256; call Sys.init 0`) is
 * emitted by the constructor, ahead of any command.
 *
 * The label counter is shared by comparisons and call sites and only ever grows.
 */
export class CodeWriter {
  private readonly out: AsmLine[] = [];
  private readonly zeroLocals: boolean;
  private labelCounter = 0;
  private unitName: string | undefined;
  private origin: LineOrigin | undefined;

  constructor(options: CodeWriterOptions = {}) {
    this.zeroLocals = options.zeroLocals ?? false;
    this.writeInit();
  }

  get lines(): readonly AsmLine[] {
    return this.out;
  }

  toEmittedAsm(): EmittedAsm {
    return { lines: [...this.out] };
  }

  /**
   * Switch the `static` namespace to a new translation unit.
   */
  setUnit(name: string): void {
    if (!isIdentifier(name)) {
      throw new TranslationError(
        DiagnosticIds.UnitNameInvalid,
        `Translation unit name "${name}" is not a valid symbol prefix`,
      );
    }
    this.unitName = name;
  }

  /**
   * Emit the fragment for one command, preceded by a comment carrying its VM text.
   */
  write(command: VmCommand): void {
    const text = describeCommand(command);
    this.origin = command.span ? { command: text, span: command.span } : { command: text };
    this.comment(text);

    switch (command.kind) {
      case 'Arithmetic':
        this.writeArithmetic(command.op);
        return;
      case 'MemoryAccess':
        this.writePushPop(command.direction, command.segment, command.index);
        return;
      case 'Label':
        this.writeLabel(command.name);
        return;
      case 'Goto':
        this.writeGoto(command.name);
        return;
      case 'IfGoto':
        this.writeIf(command.name);
        return;
      case 'Function':
        this.writeFunction(command.name, command.nLocals);
        return;
      case 'Call':
        this.writeCall(command.name, command.nArgs);
        return;
      case 'Return':
        this.writeReturn();
        return;
    }
  }

  writeArithmetic(op: string): void {
    const binary = BINARY_COMP.get(op);
    if (binary !== undefined) {
      this.emit(...POP_D, 'A=A-1', `M=${binary}`);
      return;
    }

    const unary = UNARY_COMP.get(op);
    if (unary !== undefined) {
      this.emit('@SP', 'A=M-1', `M=${unary}`);
      return;
    }

    const jump = COMPARISON_JUMP.get(op);
    if (jump !== undefined) {
      const id = this.nextLabelId();
      const whenTrue = GeneratedLabels.comparisonTrue(id);
      const end = GeneratedLabels.comparisonEnd(id);
      this.emit(...POP_D, 'A=A-1', 'D=M-D', `@${whenTrue}`, `D;${jump}`);
      this.emit('@SP', 'A=M-1', 'M=0', `@${end}`, '0;JMP');
      this.label(whenTrue);
      this.emit('@SP', 'A=M-1', 'M=-1');
      this.label(end);
      return;
    }

    throw new TranslationError(DiagnosticIds.UnknownCommand, `Unknown arithmetic command "${op}"`);
  }

  writePushPop(direction: AccessDirection, segment: string, index: number): void {
    const base = lookupSegment(segment);
    if (!base) {
      throw new TranslationError(DiagnosticIds.InvalidSegment, `Unknown segment "${segment}"`);
    }
    this.checkCount(index, `${segment} index`);

    if (direction === 'push') {
      this.writePush(segment, base, index);
    } else {
      this.writePop(segment, base, index);
    }
  }

  writeLabel(name: string): void {
    this.checkSymbol(name, 'label');
    this.label(name);
  }

  writeGoto(name: string): void {
    this.checkSymbol(name, 'label');
    this.emit(`@${name}`, '0;JMP');
  }

  /**
   * The pop happens on both paths; only a nonzero value jumps.
   */
  writeIf(name: string): void {
    this.checkSymbol(name, 'label');
    this.emit(...POP_D, `@${name}`, 'D;JNE');
  }

  writeFunction(name: string, nLocals: number): void {
    this.checkSymbol(name, 'function');
    this.checkCount(nLocals, 'local count');
    this.label(name);

    if (this.zeroLocals) {
      for (let i = 0; i < nLocals; i++) {
        this.emit('@SP', 'A=M', 'M=0', '@SP', 'M=M+1');
      }
      return;
    }
    if (nLocals > 0) {
      this.emit(`@${nLocals}`, 'D=A', '@SP', 'M=D+M');
    }
  }

  writeCall(name: string, nArgs: number): void {
    this.checkSymbol(name, 'function');
    // nArgs + 5 is loaded as one A-instruction literal.
    this.checkCount(nArgs, 'argument count', MAX_LITERAL - SAVED_FRAME_CELLS);
    const returnLabel = GeneratedLabels.returnAddress(this.nextLabelId());

    this.emit(`@${returnLabel}`, 'D=A', ...PUSH_D);
    for (const pointer of SAVED_POINTERS) {
      this.emit(`@${pointer}`, 'D=M', ...PUSH_D);
    }
    // ARG = SP - (nArgs + 5)
    this.emit('@SP', 'D=M', `@${nArgs + SAVED_FRAME_CELLS}`, 'D=D-A', '@ARG', 'M=D');
    // LCL = SP
    this.emit('@SP', 'D=M', '@LCL', 'M=D');
    this.emit(`@${name}`, '0;JMP');
    this.label(returnLabel);
  }

  writeReturn(): void {
    const frame = SCRATCH.address;
    const returnAddress = SCRATCH.returnAddress;

    this.emit('@LCL', 'D=M', `@${frame}`, 'M=D');
    // Read before *ARG is overwritten: with no arguments ARG points at the saved return address.
    this.emit(`@${SAVED_FRAME_CELLS}`, 'A=D-A', 'D=M', `@${returnAddress}`, 'M=D');
    this.emit(...POP_D, '@ARG', 'A=M', 'M=D');
    // SP = ARG + 1, computed from the callee's ARG before it is restored.
    this.emit('@ARG', 'D=M+1', '@SP', 'M=D');
    for (const pointer of [...SAVED_POINTERS].reverse()) {
      this.emit(`@${frame}`, 'AM=M-1', 'D=M', `@${pointer}`, 'M=D');
    }
    this.emit(`@${returnAddress}`, 'A=M', '0;JMP');
  }

  private writeInit(): void {
    this.origin = { command: 'bootstrap' };
    this.comment('bootstrap');
    this.emit(`@${STACK_BASE}`, 'D=A', '@SP', 'M=D');
    this.writeCall(ENTRY_FUNCTION, 0);
  }

  private writePush(segment: string, base: SegmentBase, index: number): void {
    switch (base.kind) {
      case 'constant':
        this.emit(`@${index}`, 'D=A');
        break;
      case 'register':
        this.emit(`@${base.register}`, 'D=M', `@${index}`, 'A=D+A', 'D=M');
        break;
      case 'fixed':
      case 'static':
        this.emit(`@${this.directAddress(segment, base, index)}`, 'D=M');
        break;
    }
    this.emit(...PUSH_D);
  }

  private writePop(segment: string, base: SegmentBase, index: number): void {
    switch (base.kind) {
      case 'constant':
        throw new TranslationError(DiagnosticIds.InvalidOperation, 'Cannot pop to constant');
      case 'register':
        this.emit(`@${base.register}`, 'D=M', `@${index}`, 'D=D+A', `@${SCRATCH.address}`, 'M=D');
        this.emit(...POP_D, `@${SCRATCH.address}`, 'A=M', 'M=D');
        return;
      case 'fixed':
      case 'static':
        this.emit(...POP_D, `@${this.directAddress(segment, base, index)}`, 'M=D');
        return;
    }
  }

  /**
   * Symbol or literal address for `temp`, `pointer` and `static` cells.
   */
  private directAddress(
    segment: string,
    base: Extract<SegmentBase, { kind: 'fixed' | 'static' }>,
    index: number,
  ): string {
    if (base.kind === 'static') {
      if (this.unitName === undefined) {
        throw new TranslationError(
          DiagnosticIds.InvalidOperation,
          'static segment used before a translation unit was set',
        );
      }
      return `${this.unitName}.${index}`;
    }

    if (index >= base.size) {
      throw new TranslationError(
        DiagnosticIds.InvalidOperation,
        `${segment} index ${index} out of range (0..${base.size - 1})`,
      );
    }
    if (segment === 'pointer') {
      return POINTER_ALIASES[index] ?? String(base.base + index);
    }
    return String(base.base + index);
  }

  private checkSymbol(name: string, what: string): void {
    if (!isIdentifier(name)) {
      throw new TranslationError(DiagnosticIds.InvalidOperation, `Invalid ${what} name "${name}"`);
    }
  }

  private checkCount(value: number, what: string, max = MAX_LITERAL): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new TranslationError(
        DiagnosticIds.InvalidOperation,
        `${what} must be an integer in 0..${max}, got ${value}`,
      );
    }
  }

  private nextLabelId(): number {
    return this.labelCounter++;
  }

  private comment(text: string): void {
    this.out.push({ kind: 'comment', text, ...this.originField() });
  }

  private label(name: string): void {
    this.out.push({ kind: 'label', name, ...this.originField() });
  }

  private emit(...texts: string[]): void {
    for (const text of texts) {
      this.out.push({ kind: 'instruction', text, ...this.originField() });
    }
  }

  private originField(): { origin?: LineOrigin } {
    return this.origin ? { origin: this.origin } : {};
  }
}
