#!/usr/bin/env node
/**
 * Contact Book Entry Point
 *
 * Starts the interactive command interpreter on stdin/stdout.
 *
 * **Usage:**
 * - Production: `npm run build && npm start`
 *
 * **Commands:**
 * - hello, add, change, phone, all, add-birthday, show-birthday, birthdays, delete
 * - close / exit to quit
 *
 * **Environment Variables:**
 * - LOG_LEVEL: pino log level (default: warn)
 * - CONTACTS_TODAY_OVERRIDE: fixed "today" for the birthdays report (testing only)
 */

import { AddressBook } from './modules/contacts/domain/entities/AddressBook';
import { resolveToday, isTodayOverrideActive } from './modules/contacts/config/today-config';
import { createCommandRegistry } from './adapters/primary/cli/commands';
import { CommandInterpreter, GOODBYE_MESSAGE } from './adapters/primary/cli/CommandInterpreter';
import { runRepl } from './adapters/primary/cli/repl';
import { logger } from './shared/logger';

/**
 * One book per process, owned here and injected into every command
 */
const book = new AddressBook();

if (isTodayOverrideActive()) {
  logger.warn(
    `⚠️  CONTACTS_TODAY_OVERRIDE active: ${process.env.CONTACTS_TODAY_OVERRIDE ?? ''} - birthdays report uses ${resolveToday().toISODate() ?? 'the clock'} (TESTING ONLY)`
  );
}

const interpreter = new CommandInterpreter(createCommandRegistry(book, () => resolveToday()));

runRepl({ input: process.stdin, output: process.stdout, interpreter })
  .then(() => {
    process.exit(0);
  })
  .catch((err: unknown) => {
    logger.error({
      msg: 'Interpreter stopped unexpectedly',
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  });

process.on('SIGINT', () => {
  process.stdout.write(`\n${GOODBYE_MESSAGE}\n`);
  process.exit(0);
});
