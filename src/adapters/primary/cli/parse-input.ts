/**
 * A tokenized input line
 */
export interface ParsedInput {
  command: string;
  args: string[];
}

/**
 * Splits a line on whitespace. The first token, lower-cased, is the command;
 * arguments keep their case. A blank line yields an empty command.
 */
export function parseInput(line: string): ParsedInput {
  const [command = '', ...args] = line.trim().split(/\s+/).filter((token) => token.length > 0);
  return { command: command.toLowerCase(), args };
}
