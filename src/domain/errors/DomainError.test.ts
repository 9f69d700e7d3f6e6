import { DomainError } from './DomainError';
import {
  InvalidBirthdayError,
  InvalidFormatError,
  InvalidPhoneNumberError,
} from './InvalidFormatError';
import { InvalidArgumentError } from './InvalidArgumentError';
import { ContactNotFoundError } from './ContactNotFoundError';

describe('Domain errors', () => {
  it('should name InvalidPhoneNumberError after its class and keep the raw value', () => {
    // Arrange & Act
    const error = new InvalidPhoneNumberError('12345');

    // Assert
    expect(error).toBeInstanceOf(InvalidFormatError);
    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe('InvalidPhoneNumberError');
    expect(error.rawValue).toBe('12345');
    expect(error.kind).toBe('InvalidFormat');
    expect(error.message).toBe('Invalid phone number format: 12345. Must be exactly 10 digits.');
  });

  it('should format InvalidBirthdayError message', () => {
    // Arrange & Act
    const error = new InvalidBirthdayError('1990-03-24');

    // Assert
    expect(error).toBeInstanceOf(InvalidFormatError);
    expect(error.message).toBe("Invalid birthday format: 1990-03-24. Use 'DD-MM-YYYY'.");
  });

  it('should carry the contact name on ContactNotFoundError', () => {
    // Arrange & Act
    const error = new ContactNotFoundError('Alice');

    // Assert
    expect(error.contactName).toBe('Alice');
    expect(error.kind).toBe('NotFound');
    expect(error.message).toBe('Contact not found: Alice');
    expect(error.name).toBe('ContactNotFoundError');
  });

  it('should keep the message passed to InvalidArgumentError', () => {
    // Arrange & Act
    const error = new InvalidArgumentError('Contact name cannot be empty');

    // Assert
    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe('InvalidArgumentError');
    expect(error.kind).toBe('InvalidArgument');
    expect(error.message).toBe('Contact name cannot be empty');
  });
});
