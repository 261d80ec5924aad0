/**
 * Date and time formats shared by the catalog and the request validators
 */

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

/**
 * YYYY-MM-DD with year 1900..2100, month 1..12, day 1..31.
 * Month lengths and leap years are not checked.
 */
export function isValidDate(date: string): boolean {
  const match = DATE_PATTERN.exec(date);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  return year >= 1900 && year <= 2100 && month >= 1 && month <= 12 && day >= 1 && day <= 31;
}

/**
 * HH:MM, 24-hour clock
 */
export function isValidTime(time: string): boolean {
  const match = TIME_PATTERN.exec(time);
  if (!match) return false;

  const hour = Number(match[1]);
  const minute = Number(match[2]);

  return hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59;
}
