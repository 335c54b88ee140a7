import type { VmCommand } from './ast.js';

/**
 * Scope `label`/`goto`/`if-goto` names to their enclosing function as `function$label`.
 *
 * Commands ahead of the first `function` keep their names.
 */
export function qualifyLabels(commands: VmCommand[]): VmCommand[] {
  let currentFunction: string | undefined;

  return commands.map((command) => {
    switch (command.kind) {
      case 'Function':
        currentFunction = command.name;
        return command;
      case 'Label':
      case 'Goto':
      case 'IfGoto':
        return currentFunction === undefined
          ? command
          : { ...command, name: `${currentFunction}$${command.name}` };
      default:
        return command;
    }
  });
}
