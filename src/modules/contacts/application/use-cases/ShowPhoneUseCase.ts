import { NameArgsSchema } from '../../../../shared/validation/schemas';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';
import type { AddressBook } from '../../domain/entities/AddressBook';
import type { ContactRecord } from '../../domain/entities/ContactRecord';

/**
 * ShowPhoneUseCase - `phone <name>`
 */
export class ShowPhoneUseCase {
  public constructor(private readonly book: AddressBook) {}

  /**
   * @throws ContactNotFoundError if the contact does not exist
   */
  public execute(args: readonly string[]): ContactRecord {
    const [name] = NameArgsSchema.parse(args);

    const record = this.book.find(name);
    if (!record) {
      throw new ContactNotFoundError(name);
    }

    return record;
  }
}
