import { createCommandRegistry } from './commands';
import { AddressBook } from '../../../modules/contacts/domain/entities/AddressBook';

describe('createCommandRegistry', () => {
  it('should register every contact command', () => {
    // Act
    const registry = createCommandRegistry(new AddressBook());

    // Assert
    expect([...registry.keys()]).toEqual([
      'hello',
      'add',
      'change',
      'phone',
      'all',
      'add-birthday',
      'show-birthday',
      'birthdays',
      'delete',
    ]);
  });

  it('should share one book between commands', () => {
    // Arrange
    const book = new AddressBook();
    const registry = createCommandRegistry(book);

    // Act
    registry.get('add')?.run(['Alice', '0123456789']);

    // Assert
    expect(book.find('Alice')).not.toBeNull();
    expect(registry.get('phone')?.run(['Alice'])).toBe('Alice: 0123456789');
  });
});
