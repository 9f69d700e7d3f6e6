import { DateTime } from 'luxon';
import { ContactRecord } from './ContactRecord';
import { Birthday } from '../value-objects/Birthday';
import {
  BirthdayEntry,
  BirthdayScheduler,
  BirthdaysByWeekday,
} from '../services/BirthdayScheduler';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';

/**
 * AddressBook aggregate
 * Name-keyed collection of ContactRecords, kept in insertion order.
 *
 * At most one record exists per name: addRecord overwrites silently,
 * updateRecord requires the name to exist.
 */
export class AddressBook {
  private readonly data = new Map<string, ContactRecord>();

  public constructor(private readonly scheduler: BirthdayScheduler = new BirthdayScheduler()) {}

  public get size(): number {
    return this.data.size;
  }

  /**
   * Creates a record with one phone and an optional birthday and stores it
   * under `name`, replacing any existing record. The record is fully built
   * before it is stored, so a failed call leaves the book unchanged.
   *
   * @throws InvalidArgumentError if the name is blank
   * @throws InvalidPhoneNumberError if the phone is not 10 digits
   * @throws InvalidBirthdayError if the birthday is given and malformed
   */
  public addRecord(name: string, phone: string, birthday?: string): ContactRecord {
    const parsedBirthday = birthday === undefined ? null : Birthday.parse(birthday);

    const record = new ContactRecord(name, parsedBirthday);
    record.addPhone(phone);
    this.data.set(name, record);
    return record;
  }

  public find(name: string): ContactRecord | null {
    return this.data.get(name) ?? null;
  }

  /**
   * @throws ContactNotFoundError if no record is stored under `name`
   */
  public updateRecord(name: string, record: ContactRecord): void {
    if (!this.data.has(name)) {
      throw new ContactNotFoundError(name);
    }
    this.data.set(name, record);
  }

  /**
   * Removes the record if present
   * @returns true when a record was removed
   */
  public delete(name: string): boolean {
    return this.data.delete(name);
  }

  public records(): Iterable<[string, ContactRecord]> {
    return this.data.entries();
  }

  /**
   * Weekly birthday report: contact names grouped by the weekday their
   * birthday is celebrated on, for the week starting `today`
   */
  public getBirthdaysPerWeek(today: DateTime): BirthdaysByWeekday {
    return this.scheduler.groupByCelebrationDay(this.birthdayEntries(), today);
  }

  private *birthdayEntries(): Generator<BirthdayEntry> {
    for (const [name, record] of this.data) {
      if (record.birthday) {
        yield { name, birthday: record.birthday };
      }
    }
  }
}
