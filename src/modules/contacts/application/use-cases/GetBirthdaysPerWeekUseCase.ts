import { DateTime } from 'luxon';
import { NoArgsSchema } from '../../../../shared/validation/schemas';
import { logger } from '../../../../shared/logger';
import type { AddressBook } from '../../domain/entities/AddressBook';
import type { BirthdaysByWeekday } from '../../domain/services/BirthdayScheduler';

/**
 * Source of "today" for the weekly report
 */
export type Clock = () => DateTime;

/**
 * GetBirthdaysPerWeekUseCase - `birthdays`
 *
 * Reads "today" from the injected clock and returns the contacts whose
 * birthdays are celebrated in the coming week, grouped by weekday.
 *
 * **Usage:**
 * ```typescript
 * const useCase = new GetBirthdaysPerWeekUseCase(book, () => DateTime.utc(2025, 6, 11));
 * useCase.execute([]); // Map { 'Monday' => ['Alice'], ... }
 * ```
 */
export class GetBirthdaysPerWeekUseCase {
  /**
   * @param book - Contacts to report on
   * @param clock - Returns the reference date; defaults to the system clock
   */
  public constructor(
    private readonly book: AddressBook,
    private readonly clock: Clock = () => DateTime.now()
  ) {}

  public execute(args: readonly string[]): BirthdaysByWeekday {
    NoArgsSchema.parse(args);

    const today = this.clock();
    const birthdays = this.book.getBirthdaysPerWeek(today);

    logger.debug({
      msg: 'Weekly birthday report computed',
      today: today.toISODate(),
      weekdays: birthdays.size,
    });

    return birthdays;
  }
}
