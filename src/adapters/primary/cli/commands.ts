import type { AddressBook } from '../../../modules/contacts/domain/entities/AddressBook';
import { AddContactUseCase } from '../../../modules/contacts/application/use-cases/AddContactUseCase';
import { ChangeContactUseCase } from '../../../modules/contacts/application/use-cases/ChangeContactUseCase';
import { ShowPhoneUseCase } from '../../../modules/contacts/application/use-cases/ShowPhoneUseCase';
import { ListContactsUseCase } from '../../../modules/contacts/application/use-cases/ListContactsUseCase';
import { AddBirthdayUseCase } from '../../../modules/contacts/application/use-cases/AddBirthdayUseCase';
import { ShowBirthdayUseCase } from '../../../modules/contacts/application/use-cases/ShowBirthdayUseCase';
import { DeleteContactUseCase } from '../../../modules/contacts/application/use-cases/DeleteContactUseCase';
import {
  Clock,
  GetBirthdaysPerWeekUseCase,
} from '../../../modules/contacts/application/use-cases/GetBirthdaysPerWeekUseCase';
import { formatPhones, renderBirthdays, renderContactTable } from './render';

/**
 * A command the interpreter can dispatch to
 *
 * @property usage - Shown when the argument count is wrong
 * @property run - Executes the command and returns the text to print
 */
export interface CommandDefinition {
  usage: string;
  run(args: readonly string[]): string;
}

export type CommandRegistry = ReadonlyMap<string, CommandDefinition>;

const NAME_USAGE = 'Invalid command. Please provide a name.';

/**
 * Builds the command table over one AddressBook
 *
 * **Dependency Injection:**
 * The book and the clock are passed in; each command wraps one use case
 * constructed over them, so every command sees the same contacts.
 *
 * @param book - The contacts every command operates on
 * @param clock - Source of "today" for the `birthdays` command
 */
export function createCommandRegistry(book: AddressBook, clock?: Clock): CommandRegistry {
  const addContact = new AddContactUseCase(book);
  const changeContact = new ChangeContactUseCase(book);
  const showPhone = new ShowPhoneUseCase(book);
  const listContacts = new ListContactsUseCase(book);
  const addBirthday = new AddBirthdayUseCase(book);
  const showBirthday = new ShowBirthdayUseCase(book);
  const deleteContact = new DeleteContactUseCase(book);
  const birthdaysPerWeek = new GetBirthdaysPerWeekUseCase(book, clock);

  return new Map<string, CommandDefinition>([
    [
      'hello',
      {
        usage: "Invalid command. 'hello' command doesn't require additional arguments.",
        run: () => 'How can I help you?',
      },
    ],
    [
      'add',
      {
        usage: 'Invalid command. Please provide a name and a phone number.',
        run: (args) => {
          const record = addContact.execute(args);
          const [phone] = record.phones;
          return `Contact ${record.name.toString()} with phone ${phone?.toString() ?? ''} added successfully.`;
        },
      },
    ],
    [
      'change',
      {
        usage: 'Invalid command. Please provide a name and a new phone number.',
        run: (args) => {
          changeContact.execute(args);
          return 'Contact updated.';
        },
      },
    ],
    [
      'phone',
      {
        usage: NAME_USAGE,
        run: (args) => {
          const record = showPhone.execute(args);
          return `${record.name.toString()}: ${formatPhones(record)}`;
        },
      },
    ],
    [
      'all',
      {
        usage: "Invalid command. 'all' command doesn't require additional arguments.",
        run: (args) => renderContactTable(listContacts.execute(args)),
      },
    ],
    [
      'add-birthday',
      {
        usage: 'Invalid command. Please provide a name and a birthday (format: DD-MM-YYYY).',
        run: (args) => {
          const record = addBirthday.execute(args);
          return `Birthday added for ${record.name.toString()}.`;
        },
      },
    ],
    [
      'show-birthday',
      {
        usage: NAME_USAGE,
        run: (args) => {
          const birthday = showBirthday.execute(args);
          const name = args[0] ?? '';
          return birthday
            ? `${name}'s birthday: ${birthday.toString()}`
            : `${name} has no recorded birthday.`;
        },
      },
    ],
    [
      'birthdays',
      {
        usage: "Invalid command. 'birthdays' command doesn't require additional arguments.",
        run: (args) => renderBirthdays(birthdaysPerWeek.execute(args)),
      },
    ],
    [
      'delete',
      {
        usage: NAME_USAGE,
        run: (args) => {
          deleteContact.execute(args);
          return `Contact ${args[0] ?? ''} deleted.`;
        },
      },
    ],
  ]);
}
