import { NameArgsSchema } from '../../../../shared/validation/schemas';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';
import type { AddressBook } from '../../domain/entities/AddressBook';
import type { Birthday } from '../../domain/value-objects/Birthday';

/**
 * ShowBirthdayUseCase - `show-birthday <name>`
 */
export class ShowBirthdayUseCase {
  public constructor(private readonly book: AddressBook) {}

  /**
   * @returns The contact's birthday, or null when none is recorded
   * @throws ContactNotFoundError if the contact does not exist
   */
  public execute(args: readonly string[]): Birthday | null {
    const [name] = NameArgsSchema.parse(args);

    const record = this.book.find(name);
    if (!record) {
      throw new ContactNotFoundError(name);
    }

    return record.birthday;
  }
}
