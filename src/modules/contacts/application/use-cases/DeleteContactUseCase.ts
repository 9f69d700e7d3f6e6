import { NameArgsSchema } from '../../../../shared/validation/schemas';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';
import type { AddressBook } from '../../domain/entities/AddressBook';

/**
 * DeleteContactUseCase - `delete <name>`
 *
 * AddressBook.delete ignores unknown names; this use case checks first so the
 * user learns about a mistyped name.
 */
export class DeleteContactUseCase {
  public constructor(private readonly book: AddressBook) {}

  /**
   * @throws ContactNotFoundError if the contact does not exist
   */
  public execute(args: readonly string[]): void {
    const [name] = NameArgsSchema.parse(args);

    if (!this.book.find(name)) {
      throw new ContactNotFoundError(name);
    }

    this.book.delete(name);
  }
}
