import { z } from 'zod';

/**
 * Zod schemas for command arguments
 *
 * Commands arrive as whitespace-split tokens. Each schema fixes the exact
 * number of tokens a command takes; extra or missing tokens fail parsing
 * with a ZodError, which the CLI turns into the command's usage message.
 *
 * Field formats (10-digit phone, DD-MM-YYYY birthday) are NOT checked here:
 * the value objects own those rules and raise InvalidFormatError.
 */

const token = z.string().min(1, 'Argument cannot be empty');

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const NoArgsSchema = z.tuple([]);

export type NoArgs = z.infer<typeof NoArgsSchema>;

/**
 * `phone <name>`, `show-birthday <name>`, `delete <name>`
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const NameArgsSchema = z.tuple([token]);

export type NameArgs = z.infer<typeof NameArgsSchema>;

/**
 * `add <name> <phone>`, `change <name> <new phone>`
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const NamePhoneArgsSchema = z.tuple([token, token]);

export type NamePhoneArgs = z.infer<typeof NamePhoneArgsSchema>;

/**
 * `add-birthday <name> <DD-MM-YYYY>`
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const NameBirthdayArgsSchema = z.tuple([token, token]);

export type NameBirthdayArgs = z.infer<typeof NameBirthdayArgsSchema>;
