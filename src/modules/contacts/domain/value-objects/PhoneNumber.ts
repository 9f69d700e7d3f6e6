import { InvalidPhoneNumberError } from '../../../../domain/errors/InvalidFormatError';

const PHONE_PATTERN = /^[0-9]{10}$/;

/**
 * PhoneNumber value object
 * Exactly 10 decimal digits, stored verbatim (no separators, no country code)
 */
export class PhoneNumber {
  private readonly value: string;

  public constructor(raw: string) {
    if (!PhoneNumber.isValid(raw)) {
      throw new InvalidPhoneNumberError(raw);
    }
    this.value = raw;
  }

  public static parse(raw: string): PhoneNumber {
    return new PhoneNumber(raw);
  }

  public static isValid(raw: string): boolean {
    return PHONE_PATTERN.test(raw);
  }

  public toString(): string {
    return this.value;
  }

  public equals(other: PhoneNumber): boolean {
    return this.value === other.value;
  }
}
