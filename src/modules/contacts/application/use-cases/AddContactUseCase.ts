import { NamePhoneArgsSchema } from '../../../../shared/validation/schemas';
import { logger } from '../../../../shared/logger';
import type { AddressBook } from '../../domain/entities/AddressBook';
import type { ContactRecord } from '../../domain/entities/ContactRecord';

/**
 * AddContactUseCase - `add <name> <phone>`
 *
 * Stores a new contact with a single phone. An existing contact with the
 * same name is replaced.
 *
 * **Throws:**
 * - ZodError if the argument count is wrong
 * - InvalidPhoneNumberError if the phone is not 10 digits
 */
export class AddContactUseCase {
  public constructor(private readonly book: AddressBook) {}

  public execute(args: readonly string[]): ContactRecord {
    const [name, phone] = NamePhoneArgsSchema.parse(args);

    const replacing = this.book.find(name) !== null;
    const record = this.book.addRecord(name, phone);

    logger.debug({ msg: 'Contact added', contact: name, replaced: replacing });

    return record;
  }
}
