import type { ContactRecord } from '../../../modules/contacts/domain/entities/ContactRecord';
import type { BirthdaysByWeekday } from '../../../modules/contacts/domain/services/BirthdayScheduler';

interface Column {
  title: string;
  width: number;
}

const CONTACT_COLUMNS: readonly Column[] = [
  { title: 'Name', width: 20 },
  { title: 'Phones', width: 40 },
  { title: 'Birthday', width: 20 },
];

export const NO_CONTACTS_MESSAGE = 'No contacts found.';
export const NO_BIRTHDAYS_MESSAGE = 'No birthdays in the coming week.';

/**
 * Plain-text table of contacts: Name | Phones | Birthday.
 * Cells wider than their column are cut with an ellipsis.
 */
export function renderContactTable(records: readonly ContactRecord[]): string {
  if (records.length === 0) {
    return NO_CONTACTS_MESSAGE;
  }

  const header = renderRow(CONTACT_COLUMNS.map((column) => column.title));
  const separator = CONTACT_COLUMNS.map((column) => '-'.repeat(column.width)).join('-+-');
  const rows = records.map((record) =>
    renderRow([
      record.name.toString(),
      formatPhones(record),
      record.birthday ? record.birthday.toString() : 'None',
    ])
  );

  return [header, separator, ...rows].join('\n');
}

/**
 * One line per weekday: "Monday: Alice, Bob"
 */
export function renderBirthdays(birthdays: BirthdaysByWeekday): string {
  if (birthdays.size === 0) {
    return NO_BIRTHDAYS_MESSAGE;
  }

  return [...birthdays].map(([weekday, names]) => `${weekday}: ${names.join(', ')}`).join('\n');
}

export function formatPhones(record: ContactRecord): string {
  return record.phones.map((phone) => phone.toString()).join(', ');
}

function renderRow(cells: readonly string[]): string {
  return CONTACT_COLUMNS.map((column, index) => fit(cells[index] ?? '', column.width))
    .join(' | ')
    .trimEnd();
}

function fit(value: string, width: number): string {
  if (value.length > width) {
    return `${value.slice(0, width - 1)}…`;
  }
  return value.padEnd(width);
}
