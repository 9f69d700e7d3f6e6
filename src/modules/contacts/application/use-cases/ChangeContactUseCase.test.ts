import { ZodError } from 'zod';
import { ChangeContactUseCase } from './ChangeContactUseCase';
import { AddressBook } from '../../domain/entities/AddressBook';
import { ContactRecord } from '../../domain/entities/ContactRecord';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';
import { InvalidPhoneNumberError } from '../../../../domain/errors/InvalidFormatError';

describe('ChangeContactUseCase', () => {
  let book: AddressBook;
  let useCase: ChangeContactUseCase;

  beforeEach(() => {
    book = new AddressBook();
    useCase = new ChangeContactUseCase(book);
  });

  describe('execute', () => {
    it('should replace the first phone', () => {
      // Arrange
      const record = book.addRecord('Alice', '0123456789');
      record.addPhone('5555555555');

      // Act
      useCase.execute(['Alice', '0987654321']);

      // Assert
      expect(record.phones.map((p) => p.toString())).toEqual(['5555555555', '0987654321']);
    });

    it('should keep the old phone when the new one is invalid', () => {
      // Arrange
      const record = book.addRecord('Alice', '0123456789');

      // Act & Assert
      expect(() => useCase.execute(['Alice', '98765'])).toThrow(InvalidPhoneNumberError);
      expect(record.phones.map((p) => p.toString())).toEqual(['0123456789']);
    });

    it('should add the phone to a contact without phones', () => {
      // Arrange
      book.addRecord('Alice', '0123456789');
      book.updateRecord('Alice', new ContactRecord('Alice'));

      // Act
      const record = useCase.execute(['Alice', '0987654321']);

      // Assert
      expect(record.phones.map((p) => p.toString())).toEqual(['0987654321']);
    });

    it('should throw ContactNotFoundError for unknown contacts', () => {
      // Act & Assert
      expect(() => useCase.execute(['Bob', '0987654321'])).toThrow(ContactNotFoundError);
    });

    it('should throw ZodError for extra arguments', () => {
      // Act & Assert
      expect(() => useCase.execute(['Alice', '0987654321', 'extra'])).toThrow(ZodError);
    });
  });
});
