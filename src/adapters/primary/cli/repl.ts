import { createInterface } from 'readline';
import type { CommandInterpreter } from './CommandInterpreter';

export const WELCOME_MESSAGE = 'Welcome to the assistant bot!';
export const PROMPT = 'Enter a command: ';

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  interpreter: CommandInterpreter;
  prompt?: string;
}

/**
 * Read-eval-print loop
 *
 * Reads lines until an exit command or the end of input and writes each
 * reply followed by a newline. Resolves when the loop stops.
 */
export async function runRepl({
  input,
  output,
  interpreter,
  prompt = PROMPT,
}: ReplOptions): Promise<void> {
  const lines = createInterface({ input, terminal: false });

  output.write(`${WELCOME_MESSAGE}\n`);
  output.write(prompt);

  try {
    for await (const line of lines) {
      const reply = interpreter.handle(line);
      output.write(`${reply.output}\n`);

      if (reply.exit) {
        return;
      }

      output.write(prompt);
    }
  } finally {
    lines.close();
  }
}
