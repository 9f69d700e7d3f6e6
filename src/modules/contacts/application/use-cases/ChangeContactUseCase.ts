import { NamePhoneArgsSchema } from '../../../../shared/validation/schemas';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';
import type { AddressBook } from '../../domain/entities/AddressBook';
import type { ContactRecord } from '../../domain/entities/ContactRecord';

/**
 * ChangeContactUseCase - `change <name> <new phone>`
 *
 * Replaces the contact's first phone. The new phone is validated before the
 * old one is removed; a contact without phones simply gains the new one.
 *
 * **Throws:**
 * - ZodError if the argument count is wrong
 * - ContactNotFoundError if the contact does not exist
 * - InvalidPhoneNumberError if the new phone is not 10 digits
 */
export class ChangeContactUseCase {
  public constructor(private readonly book: AddressBook) {}

  public execute(args: readonly string[]): ContactRecord {
    const [name, newPhone] = NamePhoneArgsSchema.parse(args);

    const record = this.book.find(name);
    if (!record) {
      throw new ContactNotFoundError(name);
    }

    const [current] = record.phones;
    if (current) {
      record.editPhone(current.toString(), newPhone);
    } else {
      record.addPhone(newPhone);
    }

    return record;
  }
}
