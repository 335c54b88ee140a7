import { TranslationError } from '../diagnostics/errors.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { CommandType, VmCommand } from './ast.js';

/**
 * Consume-once cursor over a command sequence.
 *
 * The sequence is pulled lazily with one command of lookahead, so `hasMoreCommands()` can be asked
 * before every `advance()`.
 */
export class CommandSource {
  private readonly iterator: Iterator<VmCommand>;
  private lookahead: IteratorResult<VmCommand>;
  private currentCommand: VmCommand | undefined;

  constructor(commands: Iterable<VmCommand>) {
    this.iterator = commands[Symbol.iterator]();
    this.lookahead = this.iterator.next();
  }

  hasMoreCommands(): boolean {
    return this.lookahead.done !== true;
  }

  advance(): VmCommand {
    const next = this.lookahead;
    if (next.done === true) {
      throw new Error('advance() called with no remaining commands');
    }
    this.currentCommand = next.value;
    this.lookahead = this.iterator.next();
    return next.value;
  }

  current(): VmCommand {
    if (!this.currentCommand) {
      throw new Error('No current command; call advance() first');
    }
    return this.currentCommand;
  }

  commandType(): CommandType {
    const command = this.current();
    switch (command.kind) {
      case 'Arithmetic':
        return 'arithmetic';
      case 'MemoryAccess':
        return command.direction;
      case 'Label':
        return 'label';
      case 'Goto':
        return 'goto';
      case 'IfGoto':
        return 'if';
      case 'Function':
        return 'function';
      case 'Call':
        return 'call';
      case 'Return':
        return 'return';
    }
  }

  /**
   * First argument: the op name for arithmetic, the segment for push/pop, otherwise the name.
   */
  arg1(): string {
    const command = this.current();
    switch (command.kind) {
      case 'Arithmetic':
        return command.op;
      case 'MemoryAccess':
        return command.segment;
      case 'Label':
      case 'Goto':
      case 'IfGoto':
      case 'Function':
      case 'Call':
        return command.name;
      case 'Return':
        throw new TranslationError(DiagnosticIds.InvalidOperation, 'arg1 requested on return');
    }
  }

  /**
   * Second argument: index, local count or argument count.
   */
  arg2(): number {
    const command = this.current();
    switch (command.kind) {
      case 'MemoryAccess':
        return command.index;
      case 'Function':
        return command.nLocals;
      case 'Call':
        return command.nArgs;
      default:
        throw new TranslationError(
          DiagnosticIds.InvalidOperation,
          `arg2 requested on a ${this.commandType()} command`,
        );
    }
  }
}
