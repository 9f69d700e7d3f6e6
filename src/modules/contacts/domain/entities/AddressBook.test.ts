import { DateTime } from 'luxon';
import { AddressBook } from './AddressBook';
import { ContactRecord } from './ContactRecord';
import { BirthdayScheduler } from '../services/BirthdayScheduler';
import { Birthday } from '../value-objects/Birthday';
import {
  InvalidBirthdayError,
  InvalidPhoneNumberError,
} from '../../../../domain/errors/InvalidFormatError';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';

describe('AddressBook', () => {
  let book: AddressBook;

  beforeEach(() => {
    book = new AddressBook();
  });

  describe('addRecord', () => {
    it('should store a record findable by name with its first phone', () => {
      // Act
      book.addRecord('Alice', '0123456789');
      const found = book.find('Alice');

      // Assert
      expect(found?.name.toString()).toBe('Alice');
      expect(found?.phones[0]?.toString()).toBe('0123456789');
      expect(found?.birthday).toBeNull();
    });

    it('should parse an optional birthday', () => {
      // Act
      const record = book.addRecord('Alice', '0123456789', '24-03-1990');

      // Assert
      expect(record.birthday?.toString()).toBe('24-03-1990');
    });

    it('should overwrite an existing record with the same name', () => {
      // Arrange
      book.addRecord('Alice', '0123456789');

      // Act
      book.addRecord('Alice', '0987654321');

      // Assert
      expect(book.size).toBe(1);
      expect(book.find('Alice')?.phones.map((p) => p.toString())).toEqual(['0987654321']);
    });

    it('should leave the book unchanged when the phone is invalid', () => {
      // Arrange
      const original = book.addRecord('Alice', '0123456789');

      // Act & Assert
      expect(() => book.addRecord('Alice', '12345')).toThrow(InvalidPhoneNumberError);
      expect(() => book.addRecord('Bob', '12345')).toThrow(InvalidPhoneNumberError);
      expect(book.find('Alice')).toBe(original);
      expect(book.find('Bob')).toBeNull();
    });

    it('should leave the book unchanged when the birthday is invalid', () => {
      // Act & Assert
      expect(() => book.addRecord('Bob', '0123456789', '31-02-2000')).toThrow(
        InvalidBirthdayError
      );
      expect(book.size).toBe(0);
    });
  });

  describe('find', () => {
    it('should return null for unknown names', () => {
      // Act & Assert
      expect(book.find('Nobody')).toBeNull();
    });

    it('should match names exactly', () => {
      // Arrange
      book.addRecord('Alice', '0123456789');

      // Act & Assert
      expect(book.find('alice')).toBeNull();
    });
  });

  describe('updateRecord', () => {
    it('should replace the stored record', () => {
      // Arrange
      book.addRecord('Alice', '0123456789');
      const replacement = new ContactRecord('Alice');
      replacement.addPhone('5555555555');

      // Act
      book.updateRecord('Alice', replacement);

      // Assert
      expect(book.find('Alice')).toBe(replacement);
    });

    it('should throw ContactNotFoundError for unknown names', () => {
      // Arrange
      const record = new ContactRecord('Bob');

      // Act & Assert
      expect(() => book.updateRecord('Bob', record)).toThrow(ContactNotFoundError);
      expect(() => book.updateRecord('Bob', record)).toThrow('Contact not found: Bob');
      expect(book.size).toBe(0);
    });
  });

  describe('delete', () => {
    it('should remove the record so find returns null', () => {
      // Arrange
      book.addRecord('Alice', '0123456789');

      // Act
      const removed = book.delete('Alice');

      // Assert
      expect(removed).toBe(true);
      expect(book.find('Alice')).toBeNull();
    });

    it('should be a no-op for unknown names', () => {
      // Arrange
      book.addRecord('Alice', '0123456789');

      // Act
      const removed = book.delete('Bob');

      // Assert
      expect(removed).toBe(false);
      expect(book.size).toBe(1);
    });
  });

  describe('records', () => {
    it('should iterate in insertion order', () => {
      // Arrange
      book.addRecord('Carol', '0000000003');
      book.addRecord('Alice', '0000000001');
      book.addRecord('Bob', '0000000002');

      // Act
      const names = [...book.records()].map(([name]) => name);

      // Assert
      expect(names).toEqual(['Carol', 'Alice', 'Bob']);
    });
  });

  describe('getBirthdaysPerWeek', () => {
    // 2025-06-11 is a Wednesday
    const today = DateTime.utc(2025, 6, 11);

    it('should group upcoming birthdays by celebration weekday', () => {
      // Arrange
      book.addRecord('Alice', '0000000001', '14-06-1990');
      book.addRecord('Bob', '0000000002');
      book.addRecord('Carol', '0000000003', '12-06-1985');
      book.addRecord('Dave', '0000000004', '15-06-2000');
      book.addRecord('Eve', '0000000005', '21-06-1995');

      // Act
      const result = book.getBirthdaysPerWeek(today);

      // Assert
      expect([...result]).toEqual([
        ['Monday', ['Alice', 'Dave']],
        ['Thursday', ['Carol']],
      ]);
    });

    it('should pick up a birthday added later through the record', () => {
      // Arrange
      const record = book.addRecord('Bob', '0000000002');
      record.addBirthday(Birthday.parse('13-06-1970'));

      // Act
      const result = book.getBirthdaysPerWeek(today);

      // Assert
      expect(result.get('Friday')).toEqual(['Bob']);
    });

    it('should delegate to the injected scheduler with the injected today', () => {
      // Arrange
      const scheduler = new BirthdayScheduler();
      const spy = jest.spyOn(scheduler, 'groupByCelebrationDay');
      const injected = new AddressBook(scheduler);
      injected.addRecord('Alice', '0000000001', '14-06-1990');

      // Act
      injected.getBirthdaysPerWeek(today);

      // Assert
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy.mock.calls[0]?.[1]).toBe(today);
    });
  });
});
