import { DateTime } from 'luxon';
import { Birthday } from '../value-objects/Birthday';
import {
  BIRTHDAY_WINDOW,
  BirthdayWindowConfig,
  WEEKDAYS,
  Weekday,
} from '../../config/birthday-window';

/**
 * A contact name paired with the birthday to schedule
 */
export interface BirthdayEntry {
  name: string;
  birthday: Birthday;
}

/**
 * Celebration weekday → contact names, in the order weekdays were first used
 */
export type BirthdaysByWeekday = Map<Weekday, string[]>;

/**
 * BirthdayScheduler - decides which birthdays fall into the coming week and on
 * which weekday each one is celebrated
 *
 * **Rules:**
 * - A birthday is upcoming when its next occurrence lies between `graceDays`
 *   before today and `lookaheadDays` after it (exclusive).
 * - Birthdays that passed in the last `graceDays` are only kept when the
 *   report is taken on a Monday or a weekend; on other days they roll over
 *   to next year.
 * - On Tuesday to Friday, a birthday landing on Saturday or Sunday is
 *   celebrated on Monday.
 * - On Monday, birthdays from the weekend just gone are celebrated that
 *   Monday, and the coming Sunday is left for next Monday's report.
 * - On Sunday, a birthday that is today is celebrated on Monday.
 *
 * Every date is reduced to a UTC calendar day, so the time of day and DST
 * never affect the day count.
 */
export class BirthdayScheduler {
  public constructor(private readonly window: BirthdayWindowConfig = BIRTHDAY_WINDOW) {}

  /**
   * Groups names by celebration weekday. Entries outside the window are dropped.
   *
   * @param entries - Birthdays in the order names should appear in each bucket
   * @param today - Reference date; only its calendar day is used
   */
  public groupByCelebrationDay(entries: Iterable<BirthdayEntry>, today: DateTime): BirthdaysByWeekday {
    const day = toCalendarDay(today);
    const grouped: BirthdaysByWeekday = new Map();

    for (const entry of entries) {
      const weekday = this.resolveCelebrationDay(entry.birthday, day);
      if (weekday === null) {
        continue;
      }

      const bucket = grouped.get(weekday);
      if (bucket) {
        bucket.push(entry.name);
      } else {
        grouped.set(weekday, [entry.name]);
      }
    }

    return grouped;
  }

  /**
   * Returns the weekday a birthday is celebrated on, or null when it is not
   * reported this week
   */
  public resolveCelebrationDay(birthday: Birthday, today: DateTime): Weekday | null {
    const day = toCalendarDay(today);
    const deltaDays = this.daysUntilOccurrence(birthday, day);

    if (deltaDays < -this.window.graceDays || deltaDays >= this.window.lookaheadDays) {
      return null;
    }

    const todayWeekday = weekdayOf(day);
    const rawWeekday = weekdayOf(day.plus({ days: deltaDays }));

    if (!isMondayOrWeekend(todayWeekday) && deltaDays >= 0) {
      return isWeekend(rawWeekday) ? 'Monday' : rawWeekday;
    }

    if (todayWeekday === 'Monday' && deltaDays > 0 && rawWeekday === 'Sunday') {
      // picked up by next Monday's report as a passed birthday
      return null;
    }

    if (todayWeekday === 'Monday' && deltaDays <= 0) {
      return 'Monday';
    }

    if (todayWeekday === 'Sunday' && deltaDays === 0) {
      return 'Monday';
    }

    return rawWeekday;
  }

  /**
   * Signed day count from today to the occurrence of the birthday that the
   * report considers "next"
   *
   * The first candidate (previous, current, next year) that is not further
   * back than the grace period wins. The grace period is zero unless today is
   * a Monday or a weekend day.
   */
  public daysUntilOccurrence(birthday: Birthday, today: DateTime): number {
    const day = toCalendarDay(today);
    const grace = isMondayOrWeekend(weekdayOf(day)) ? this.window.graceDays : 0;

    for (const year of [day.year - 1, day.year]) {
      const delta = daysBetween(day, occurrenceIn(birthday, year));
      if (delta >= -grace) {
        return delta;
      }
    }

    return daysBetween(day, occurrenceIn(birthday, day.year + 1));
  }
}

function toCalendarDay(date: DateTime): DateTime {
  return DateTime.utc(date.year, date.month, date.day);
}

/**
 * Birthday in the given year; 29 February falls on the 28th in common years
 */
function occurrenceIn(birthday: Birthday, year: number): DateTime {
  const { month, day } = birthday.getMonthDay();
  if (month === 2 && day === 29 && !isLeapYear(year)) {
    return DateTime.utc(year, 2, 28);
  }
  return DateTime.utc(year, month, day);
}

function daysBetween(from: DateTime, to: DateTime): number {
  return Math.round(to.diff(from, 'days').days);
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function weekdayOf(date: DateTime): Weekday {
  const weekday = WEEKDAYS[date.weekday - 1];
  if (!weekday) {
    throw new Error(`Invalid date provided: ${date.invalidReason ?? 'unknown weekday'}`);
  }
  return weekday;
}

function isWeekend(weekday: Weekday): boolean {
  return weekday === 'Saturday' || weekday === 'Sunday';
}

function isMondayOrWeekend(weekday: Weekday): boolean {
  return weekday === 'Monday' || isWeekend(weekday);
}
