import { DomainError } from './DomainError';

/**
 * ContactNotFoundError - lookup miss on a contact name
 *
 * **Usage:**
 * ```typescript
 * if (!book.find(name)) {
 *   throw new ContactNotFoundError(name);
 * }
 * ```
 */
export class ContactNotFoundError extends DomainError {
  public readonly kind = 'NotFound';

  public constructor(public readonly contactName: string) {
    super(`Contact not found: ${contactName}`);
  }
}
