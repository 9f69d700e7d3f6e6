import { InvalidArgumentError } from '../../../../domain/errors/InvalidArgumentError';

/**
 * ContactName value object
 * Free-form text; the only rule is that it is not blank
 */
export class ContactName {
  private readonly value: string;

  public constructor(value: string) {
    if (value.trim().length === 0) {
      throw new InvalidArgumentError('Contact name cannot be empty');
    }
    this.value = value;
  }

  public toString(): string {
    return this.value;
  }

  public equals(other: ContactName): boolean {
    return this.value === other.value;
  }
}
