/**
 * Time helper tests
 *
 * Naive timestamps are read as UTC wall clocks; zoned ones keep their
 * absolute moment. Month subtraction is calendar-aware and clamps the day.
 */

import * as fc from 'fast-check';
import { formatUtcDate, normalizeInstant, parseFeedTimestamp, subtractMonthsUtc } from './time';
import { utcDateArb } from '../test/generators';

describe('parseFeedTimestamp', () => {
  it('reads an ISO timestamp without zone as UTC', () => {
    expect(parseFeedTimestamp('2024-03-10T08:30:00')?.toISOString()).toBe('2024-03-10T08:30:00.000Z');
    expect(parseFeedTimestamp('2024-03-10 08:30')?.toISOString()).toBe('2024-03-10T08:30:00.000Z');
    expect(parseFeedTimestamp('2024-03-10')?.toISOString()).toBe('2024-03-10T00:00:00.000Z');
  });

  it('converts zoned ISO timestamps to UTC', () => {
    expect(parseFeedTimestamp('2024-03-10T08:30:00+05:30')?.toISOString()).toBe('2024-03-10T03:00:00.000Z');
    expect(parseFeedTimestamp('2024-03-10T08:30:00-0400')?.toISOString()).toBe('2024-03-10T12:30:00.000Z');
    expect(parseFeedTimestamp('2024-03-10T08:30:00Z')?.toISOString()).toBe('2024-03-10T08:30:00.000Z');
  });

  it('keeps millisecond precision of long fractions', () => {
    expect(parseFeedTimestamp('2024-03-10T08:30:00.123456Z')?.toISOString()).toBe('2024-03-10T08:30:00.123Z');
  });

  it('parses RFC 822 dates with and without zone', () => {
    expect(parseFeedTimestamp('Sun, 10 Mar 2024 08:30:00 GMT')?.toISOString()).toBe('2024-03-10T08:30:00.000Z');
    expect(parseFeedTimestamp('Sun, 10 Mar 2024 08:30:00 +0800')?.toISOString()).toBe('2024-03-10T00:30:00.000Z');
    expect(parseFeedTimestamp('Sun, 10 Mar 2024 08:30:00')?.toISOString()).toBe('2024-03-10T08:30:00.000Z');
  });

  it('returns undefined for unusable input', () => {
    expect(parseFeedTimestamp('')).toBeUndefined();
    expect(parseFeedTimestamp('   ')).toBeUndefined();
    expect(parseFeedTimestamp('not a date')).toBeUndefined();
    expect(parseFeedTimestamp('2024-02-30T00:00:00')).toBeUndefined();
    expect(parseFeedTimestamp('2024-13-01')).toBeUndefined();
  });

  it('reads any naive ISO rendering of an instant back as that instant', () => {
    fc.assert(
      fc.property(utcDateArb(), (date) => {
        const naive = date.toISOString().replace('Z', '');
        expect(parseFeedTimestamp(naive)?.getTime()).toBe(date.getTime());
      }),
      { numRuns: 100 }
    );
  });
});

describe('parseFeedTimestamp outside a UTC host zone', () => {
  const hostZone = process.env.TZ;

  beforeAll(() => {
    process.env.TZ = 'America/New_York';
  });

  afterAll(() => {
    if (hostZone === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = hostZone;
    }
  });

  it('does not take a trailing year for a zone offset', () => {
    expect(parseFeedTimestamp('10-Mar-2024')?.toISOString()).toBe('2024-03-10T00:00:00.000Z');
    expect(parseFeedTimestamp('Sun, 10 Mar 2024')?.toISOString()).toBe('2024-03-10T00:00:00.000Z');
  });

  it('reads the wall clock as UTC when the zone name is not recognized', () => {
    expect(parseFeedTimestamp('Sun, 10 Mar 2024 08:30:00 CET')?.toISOString()).toBe('2024-03-10T08:30:00.000Z');
    expect(parseFeedTimestamp('Sun, 10 Mar 2024 08:30:00 BST')?.toISOString()).toBe('2024-03-10T08:30:00.000Z');
  });

  it('still honours numeric offsets and known zone names', () => {
    expect(parseFeedTimestamp('Sun, 10 Mar 2024 08:30:00 -0500')?.toISOString()).toBe('2024-03-10T13:30:00.000Z');
    expect(parseFeedTimestamp('Sun, 10 Mar 2024 08:30:00 EST')?.toISOString()).toBe('2024-03-10T13:30:00.000Z');
    expect(parseFeedTimestamp('Sun, 10 Mar 2024 08:30:00')?.toISOString()).toBe('2024-03-10T08:30:00.000Z');
  });
});

describe('normalizeInstant', () => {
  it('copies valid dates and rejects invalid ones', () => {
    const date = new Date('2024-06-01T10:00:00Z');
    const normalized = normalizeInstant(date);
    expect(normalized?.getTime()).toBe(date.getTime());
    expect(normalized).not.toBe(date);
    expect(normalizeInstant(new Date(NaN))).toBeUndefined();
  });
});

describe('subtractMonthsUtc', () => {
  it('clamps to the last day of a shorter month', () => {
    expect(subtractMonthsUtc(new Date('2024-03-31T12:00:00Z'), 1).toISOString()).toBe('2024-02-29T12:00:00.000Z');
    expect(subtractMonthsUtc(new Date('2023-03-31T12:00:00Z'), 1).toISOString()).toBe('2023-02-28T12:00:00.000Z');
    expect(subtractMonthsUtc(new Date('2024-01-31T00:00:00Z'), 2).toISOString()).toBe('2023-11-30T00:00:00.000Z');
  });

  it('lands on the same day across years', () => {
    expect(subtractMonthsUtc(new Date('2024-01-15T09:45:30.250Z'), 12).toISOString()).toBe('2023-01-15T09:45:30.250Z');
    expect(subtractMonthsUtc(new Date('2024-02-29T00:00:00Z'), 12).toISOString()).toBe('2023-02-28T00:00:00.000Z');
  });

  it('moves back exactly the requested number of calendar months', () => {
    fc.assert(
      fc.property(utcDateArb(), fc.integer({ min: 1, max: 36 }), (date, months) => {
        const result = subtractMonthsUtc(date, months);
        const monthDelta =
          (date.getUTCFullYear() - result.getUTCFullYear()) * 12 + (date.getUTCMonth() - result.getUTCMonth());

        expect(monthDelta).toBe(months);
        expect(result.getUTCDate()).toBeLessThanOrEqual(date.getUTCDate());
        expect(result.getTime()).toBeLessThan(date.getTime());
      }),
      { numRuns: 100 }
    );
  });
});

describe('formatUtcDate', () => {
  it('formats the UTC calendar date', () => {
    expect(formatUtcDate(new Date('2024-12-31T23:59:59Z'))).toBe('2024-12-31');
  });
});
