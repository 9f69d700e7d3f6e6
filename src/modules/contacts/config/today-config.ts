import { DateTime } from 'luxon';

const OVERRIDE_FORMATS = ['dd-MM-yyyy', 'yyyy-MM-dd'] as const;

/**
 * Resolve the date the weekly birthday report treats as "today"
 *
 * **Behavior:**
 * 1. If CONTACTS_TODAY_OVERRIDE is set and valid → use that date (testing only)
 * 2. If CONTACTS_TODAY_OVERRIDE is invalid → fall back to the clock
 * 3. Otherwise → the clock
 *
 * **Override:**
 * ```bash
 * CONTACTS_TODAY_OVERRIDE=24-03-2025   # DD-MM-YYYY, same as birthdays
 * CONTACTS_TODAY_OVERRIDE=2025-03-24   # ISO date
 * CONTACTS_TODAY_OVERRIDE=24/03/2025   # NOT SUPPORTED - falls back to the clock
 * ```
 * ⚠️ **TESTING ONLY** - reproduce a report for a fixed day by hand
 *
 * Invalid values never throw, so a typo cannot stop the interpreter from starting.
 *
 * @param now - Clock reading used when no valid override is set
 *
 * @example
 * // With ENV: CONTACTS_TODAY_OVERRIDE=15-06-2025
 * resolveToday().toISODate(); // '2025-06-15'
 */
export function resolveToday(now: DateTime = DateTime.now()): DateTime {
  const override = process.env.CONTACTS_TODAY_OVERRIDE;

  if (override) {
    const parsed = parseTodayOverride(override);
    if (parsed !== null) {
      return parsed;
    }
  }

  return now;
}

/**
 * @returns true if CONTACTS_TODAY_OVERRIDE is set, valid or not
 */
export function isTodayOverrideActive(): boolean {
  return !!process.env.CONTACTS_TODAY_OVERRIDE;
}

function parseTodayOverride(value: string): DateTime | null {
  const trimmed = value.trim();

  for (const format of OVERRIDE_FORMATS) {
    const parsed = DateTime.fromFormat(trimmed, format);
    if (parsed.isValid) {
      return parsed;
    }
  }

  return null;
}
