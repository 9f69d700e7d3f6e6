/**
 * Birthday Window Configuration
 *
 * Business constants for the weekly birthday report. Kept in code because
 * they change only together with the shifting rules in BirthdayScheduler.
 *
 * Usage:
 * ```typescript
 * // Production: default one-week window
 * const scheduler = new BirthdayScheduler();
 *
 * // Testing: custom window
 * const scheduler = new BirthdayScheduler({ lookaheadDays: 7, graceDays: 1 });
 * ```
 */

/**
 * @property lookaheadDays - Days from today (inclusive) that count as "this week"
 * @property graceDays - How many days back a birthday may lie and still be reported,
 *                       when the report is taken on a Monday or a weekend
 */
export interface BirthdayWindowConfig {
  lookaheadDays: number;
  graceDays: number;
}

export const BIRTHDAY_WINDOW: BirthdayWindowConfig = {
  lookaheadDays: 7,
  graceDays: 2,
};

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];
