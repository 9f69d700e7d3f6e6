import { DateTime } from 'luxon';
import { InvalidBirthdayError } from '../../../../domain/errors/InvalidFormatError';

export const BIRTHDAY_FORMAT = 'dd-MM-yyyy';

/**
 * Birthday value object
 * Calendar date entered as DD-MM-YYYY. Any real date is accepted, including
 * dates later than today.
 */
export class Birthday {
  private readonly value: DateTime;
  private readonly raw: string;

  public constructor(raw: string) {
    const parsed = DateTime.fromFormat(raw, BIRTHDAY_FORMAT, { zone: 'utc' });
    if (!parsed.isValid) {
      throw new InvalidBirthdayError(raw);
    }
    this.value = parsed;
    this.raw = raw;
  }

  public static parse(raw: string): Birthday {
    return new Birthday(raw);
  }

  /**
   * Returns the month and day of the birthday
   */
  public getMonthDay(): { month: number; day: number } {
    return { month: this.value.month, day: this.value.day };
  }

  /**
   * Returns the date exactly as entered (DD-MM-YYYY)
   */
  public toString(): string {
    return this.raw;
  }

  public equals(other: Birthday): boolean {
    return this.value.equals(other.value);
  }
}
