import { DomainError } from './DomainError';

/**
 * Thrown when a raw field value does not match the format its value object requires
 */
export class InvalidFormatError extends DomainError {
  public readonly kind = 'InvalidFormat';

  public constructor(
    message: string,
    public readonly rawValue: string
  ) {
    super(message);
  }
}

/**
 * Thrown when a phone number is not exactly 10 decimal digits
 */
export class InvalidPhoneNumberError extends InvalidFormatError {
  public constructor(rawValue: string) {
    super(`Invalid phone number format: ${rawValue}. Must be exactly 10 digits.`, rawValue);
  }
}

/**
 * Thrown when a birthday is not a real calendar date in DD-MM-YYYY form
 */
export class InvalidBirthdayError extends InvalidFormatError {
  public constructor(rawValue: string) {
    super(`Invalid birthday format: ${rawValue}. Use 'DD-MM-YYYY'.`, rawValue);
  }
}
