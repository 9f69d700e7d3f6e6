import { ZodError } from 'zod';
import { DomainError } from '../../../domain/errors/DomainError';
import { logger } from '../../../shared/logger';

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred.';

/**
 * Translates an error thrown by a command into the single line shown to the user
 *
 * - ZodError (wrong argument count) → the command's usage message
 * - DomainError (InvalidFormat, NotFound, InvalidArgument) → the error message,
 *   e.g. "Contact not found: {name}"
 * - anything else → logged at error level, generic message
 *
 * @param error - Whatever the command threw
 * @param command - Command name, for the log entry
 * @param usage - Usage message for this command
 */
export function toUserMessage(error: unknown, command: string, usage: string): string {
  if (error instanceof ZodError) {
    return usage;
  }

  if (error instanceof DomainError) {
    logger.debug({ msg: 'Command rejected', command, kind: error.kind, error: error.message });
    return error.message;
  }

  logger.error({
    msg: 'Command failed unexpectedly',
    command,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });

  return UNEXPECTED_ERROR_MESSAGE;
}
