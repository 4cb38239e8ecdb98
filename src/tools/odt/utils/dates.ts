/**
 * Date Utilities
 *
 * Pure functions for ODF date-time values (meta:creation-date and friends).
 *
 * @module odt/utils/dates
 */

export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/** yyyy-MM-ddTHH:mm[:ss[.fraction]] with no offset or zone designator; the T may be lowercase. */
const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/i;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Parse an ISO-8601 local date-time; null when the text is not one or names an impossible date. */
export function parseLocalDateTime(text: string): LocalDateTime | null {
  const match = LOCAL_DATE_TIME.exec(text);
  if (!match) return null;

  const [year, month, day, hour, minute] = match.slice(1, 6).map(Number);
  const second = match[6] === undefined ? 0 : Number(match[6]);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  return { year, month, day, hour, minute, second };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Render as dd/MM/yyyy HH:mm. */
export function formatDayMonthYear(value: LocalDateTime): string {
  return `${pad(value.day)}/${pad(value.month)}/${pad(value.year, 4)} ${pad(value.hour)}:${pad(value.minute)}`;
}

/** Reformat a stored creation date, or hand the raw text back unchanged. */
export function formatCreationDate(raw: string): string {
  const parsed = parseLocalDateTime(raw);
  return parsed ? formatDayMonthYear(parsed) : raw;
}
