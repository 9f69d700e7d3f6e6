import { NameBirthdayArgsSchema } from '../../../../shared/validation/schemas';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';
import { logger } from '../../../../shared/logger';
import { Birthday } from '../../domain/value-objects/Birthday';
import type { AddressBook } from '../../domain/entities/AddressBook';
import type { ContactRecord } from '../../domain/entities/ContactRecord';

/**
 * AddBirthdayUseCase - `add-birthday <name> <DD-MM-YYYY>`
 *
 * Sets or replaces the contact's birthday. The contact is looked up before
 * the date is parsed, so an unknown name is reported even when the date is
 * malformed too.
 *
 * **Throws:**
 * - ZodError if the argument count is wrong
 * - ContactNotFoundError if the contact does not exist
 * - InvalidBirthdayError if the date is not a real DD-MM-YYYY date
 */
export class AddBirthdayUseCase {
  public constructor(private readonly book: AddressBook) {}

  public execute(args: readonly string[]): ContactRecord {
    const [name, rawBirthday] = NameBirthdayArgsSchema.parse(args);

    const record = this.book.find(name);
    if (!record) {
      throw new ContactNotFoundError(name);
    }

    const previous = record.birthday;
    record.addBirthday(Birthday.parse(rawBirthday));

    if (previous) {
      logger.info({
        msg: 'Birthday replaced',
        contact: name,
        previous: previous.toString(),
        current: rawBirthday,
      });
    }

    return record;
  }
}
