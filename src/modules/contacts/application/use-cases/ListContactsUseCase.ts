import { NoArgsSchema } from '../../../../shared/validation/schemas';
import type { AddressBook } from '../../domain/entities/AddressBook';
import type { ContactRecord } from '../../domain/entities/ContactRecord';

/**
 * ListContactsUseCase - `all`
 * Returns every record in insertion order.
 */
export class ListContactsUseCase {
  public constructor(private readonly book: AddressBook) {}

  public execute(args: readonly string[]): ContactRecord[] {
    NoArgsSchema.parse(args);

    return [...this.book.records()].map(([, record]) => record);
  }
}
