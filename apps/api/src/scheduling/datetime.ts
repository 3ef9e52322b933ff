/**
 * ISO-8601 handling for meeting timestamps.
 *
 * Accepts `YYYY-MM-DD`, `YYYY-MM-DDTHH:MM`, `YYYY-MM-DDTHH:MM:SS[.fraction]`
 * with an optional `Z` or `±HH:MM` offset. Timestamps without an offset are
 * read in UTC.
 */

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

const MINUTE_MS = 60_000;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

const isLeapYear = (year: number) => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number =>
  month === 2 && isLeapYear(year) ? 29 : (DAYS_IN_MONTH[month - 1] ?? 0);

const parseOffsetMinutes = (raw: string | undefined): number | null => {
  if (!raw || raw.toUpperCase() === 'Z') return 0;
  const sign = raw.startsWith('-') ? -1 : 1;
  const digits = raw.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
};

export function parseIsoTimestamp(input: string): Date | null {
  const match = ISO_PATTERN.exec(input.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '', offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(fraction.padEnd(3, '0').slice(0, 3));

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offsetMinutes = parseOffsetMinutes(offset);
  if (offsetMinutes === null) return null;

  // Date.UTC maps years 0-99 onto 1900-1999
  const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millis));
  date.setUTCFullYear(year);
  return new Date(date.getTime() - offsetMinutes * MINUTE_MS);
}

export const addMinutes = (date: Date, minutes: number): Date => new Date(date.getTime() + minutes * MINUTE_MS);

/**
 * `2024-01-08T10:30:00+00:00`; sub-second precision is written as microseconds
 * and only when present.
 */
export function formatIsoWithOffset(date: Date): string {
  const iso = date.toISOString();
  const ms = date.getUTCMilliseconds();
  const fraction = ms === 0 ? '' : `.${String(ms).padStart(3, '0')}000`;
  return `${iso.slice(0, 19)}${fraction}+00:00`;
}

// `2024-01-08 10:30`
export const formatSlotLabel = (date: Date): string => date.toISOString().slice(0, 16).replace('T', ' ');
