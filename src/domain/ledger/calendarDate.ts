import { InvalidDateError } from './errors.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Validate a `YYYY-MM-DD` string as a real calendar date and return it
 * unchanged. Day overflow ("2024-02-30") is rejected.
 */
export function parseCalendarDate(input: string): string {
  const value = input.trim();
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new InvalidDateError();
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new InvalidDateError();
  }
  return value;
}

/** Local calendar date of `now` as `YYYY-MM-DD`. */
export function formatCalendarDate(now: Date): string {
  const year = String(now.getFullYear()).padStart(4, '0');
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
