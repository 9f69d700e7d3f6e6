import { ContactName } from '../value-objects/ContactName';
import { PhoneNumber } from '../value-objects/PhoneNumber';
import { Birthday } from '../value-objects/Birthday';
import { InvalidArgumentError } from '../../../../domain/errors/InvalidArgumentError';

/**
 * ContactRecord entity
 * One contact: a name, an ordered list of phones (duplicates allowed) and
 * an optional birthday. Mutable; the AddressBook shares it by reference.
 */
export class ContactRecord {
  public readonly name: ContactName;
  private phoneList: PhoneNumber[] = [];
  private birthdayValue: Birthday | null;

  public constructor(name: string, birthday: Birthday | null = null) {
    this.name = new ContactName(name);
    this.birthdayValue = birthday;
  }

  public get phones(): readonly PhoneNumber[] {
    return [...this.phoneList];
  }

  public get birthday(): Birthday | null {
    return this.birthdayValue;
  }

  /**
   * Parses and appends a phone number
   * @throws InvalidPhoneNumberError if the value is not 10 digits
   */
  public addPhone(raw: string): PhoneNumber {
    const phone = PhoneNumber.parse(raw);
    this.phoneList.push(phone);
    return phone;
  }

  /**
   * Removes every phone equal to the given value. Unknown values are ignored.
   */
  public removePhone(value: string): void {
    this.phoneList = this.phoneList.filter((phone) => phone.toString() !== value);
  }

  /**
   * Replaces a phone. The new value is validated before anything is removed,
   * so a failed edit leaves the phone list untouched.
   * @throws InvalidPhoneNumberError if newValue is not 10 digits
   */
  public editPhone(oldValue: string, newValue: string): PhoneNumber {
    const replacement = PhoneNumber.parse(newValue);
    this.removePhone(oldValue);
    this.phoneList.push(replacement);
    return replacement;
  }

  public findPhone(value: string): PhoneNumber | null {
    return this.phoneList.find((phone) => phone.toString() === value) ?? null;
  }

  /**
   * Assigns or overwrites the birthday. Raw strings must go through
   * Birthday.parse first.
   * @throws InvalidArgumentError when given an unparsed string
   */
  public addBirthday(birthday: Birthday | string): void {
    if (!(birthday instanceof Birthday)) {
      throw new InvalidArgumentError(
        `Birthday must be a parsed Birthday, got raw value: ${birthday}`
      );
    }
    this.birthdayValue = birthday;
  }

  public toString(): string {
    const phones = this.phoneList.map((phone) => phone.toString()).join('; ');
    const birthday = this.birthdayValue ? `, birthday: ${this.birthdayValue.toString()}` : '';
    return `Contact name: ${this.name.toString()}, phones: ${phones}${birthday}`;
  }
}
