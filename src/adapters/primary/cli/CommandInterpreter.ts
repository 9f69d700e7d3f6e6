import { parseInput } from './parse-input';
import { toUserMessage } from './error-handler';
import type { CommandRegistry } from './commands';

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['close', 'exit']);
export const GOODBYE_MESSAGE = 'Goodbye!';
export const UNKNOWN_COMMAND_MESSAGE = 'Invalid command.';

/**
 * What the loop should print, and whether it should stop afterwards
 */
export interface InterpreterReply {
  output: string;
  exit: boolean;
}

/**
 * CommandInterpreter - turns one input line into one reply
 *
 * Errors never escape: each is translated into a message by toUserMessage,
 * so a bad command cannot end the session.
 */
export class CommandInterpreter {
  public constructor(private readonly commands: CommandRegistry) {}

  public handle(line: string): InterpreterReply {
    const { command, args } = parseInput(line);

    if (EXIT_COMMANDS.has(command)) {
      return { output: GOODBYE_MESSAGE, exit: true };
    }

    const definition = this.commands.get(command);
    if (!definition) {
      return { output: UNKNOWN_COMMAND_MESSAGE, exit: false };
    }

    try {
      return { output: definition.run(args), exit: false };
    } catch (error) {
      return { output: toUserMessage(error, command, definition.usage), exit: false };
    }
  }
}
