/**
 * UTC time helpers for feed timestamps and trailing windows
 */

import { PublishedInstant } from '../types/article';

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// A numeric offset only counts as a zone when it follows a time of day
const NUMERIC_OFFSET_PATTERN = /\d{2}:\d{2}(?::\d{2})?\s*(?:GMT|UTC)?[+-]\d{2}:?\d{2}$/i;

// Zone names Date.parse understands at the end of an RFC 822 style date
const NAMED_ZONE_PATTERN = /[\s\d](?:GMT|UTC|UT|Z|[ECMP][SD]T)$/i;

const UNKNOWN_ZONE_PATTERN = /(\d{2}:\d{2}(?::\d{2})?)\s+[A-Z]{2,5}$/i;

/**
 * Parse an ISO-8601 zone designator into minutes east of UTC
 */
function parseOffsetMinutes(designator: string | undefined): number {
  if (!designator || designator.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

function daysInUtcMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

function parseIsoTimestamp(match: RegExpMatchArray): Date | undefined {
  const [, y, mo, d, h = '00', mi = '00', s = '00', fraction = '', zone] = match;
  const year = Number(y);
  const monthIndex = Number(mo) - 1;
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (monthIndex < 0 || monthIndex > 11) return undefined;
  if (day < 1 || day > daysInUtcMonth(year, monthIndex)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const millis = Number((fraction + '000').slice(0, 3));
  const wallClock = Date.UTC(year, monthIndex, day, hour, minute, second, millis);
  return new Date(wallClock - parseOffsetMinutes(zone) * 60000);
}

/**
 * Pin a free-form date to UTC unless it names a zone Date.parse knows.
 * An unknown zone name after the time is dropped, leaving the wall clock.
 */
function withUtcDefault(text: string): string {
  if (NUMERIC_OFFSET_PATTERN.test(text) || NAMED_ZONE_PATTERN.test(text)) {
    return text;
  }
  return `${text.replace(UNKNOWN_ZONE_PATTERN, '$1')} GMT`;
}

/**
 * Parse a feed timestamp string into a UTC instant.
 *
 * A string that carries a zone designator keeps its absolute moment; one
 * without zone information, or with a zone name that is not recognized, is
 * read as a UTC wall clock.
 *
 * @returns the instant, or undefined when the string cannot be parsed
 */
export function parseFeedTimestamp(raw: string): Date | undefined {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  const isoMatch = trimmed.match(ISO_PATTERN);
  if (isoMatch) {
    return parseIsoTimestamp(isoMatch);
  }

  const parsed = Date.parse(withUtcDefault(trimmed));
  return isNaN(parsed) ? undefined : new Date(parsed);
}

/**
 * Normalize a published instant to a UTC Date
 */
export function normalizeInstant(value: PublishedInstant): Date | undefined {
  if (value instanceof Date) {
    const time = value.getTime();
    return isNaN(time) ? undefined : new Date(time);
  }
  return parseFeedTimestamp(value);
}

/**
 * Subtract calendar months in UTC. The day of month is clamped to the last
 * valid day of the target month (March 31 minus one month is the last day
 * of February).
 */
export function subtractMonthsUtc(date: Date, months: number): Date {
  const totalMonths = date.getUTCFullYear() * 12 + date.getUTCMonth() - months;
  const year = Math.floor(totalMonths / 12);
  const monthIndex = totalMonths - year * 12;
  const day = Math.min(date.getUTCDate(), daysInUtcMonth(year, monthIndex));

  return new Date(
    Date.UTC(
      year,
      monthIndex,
      day,
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds()
    )
  );
}

/**
 * Format an instant as its UTC calendar date (YYYY-MM-DD)
 */
export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
