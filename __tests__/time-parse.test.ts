/**
 * Calendar parsing: strict ISO for API params, M/D/YYYY and H:MM for sales files.
 */

import {
  formatClockTime,
  formatIsoDate,
  formatUsDate,
  InvalidIsoDateError,
  isMonthName,
  monthName,
  parseClockTimeOrNull,
  parseIsoDateOrThrow,
  parseUsDateOrNull,
  weekdayName,
} from '@/lib/time/parse';

describe('parseIsoDateOrThrow', () => {
  it('parses valid YYYY-MM-DD and returns Date at UTC midnight', () => {
    const d = parseIsoDateOrThrow('2024-02-15');
    expect(d.toISOString()).toBe('2024-02-15T00:00:00.000Z');
  });

  it('throws InvalidIsoDateError for non-ISO format', () => {
    expect(() => parseIsoDateOrThrow('02/15/2024')).toThrow(InvalidIsoDateError);
    expect(() => parseIsoDateOrThrow('2024/02/15')).toThrow(InvalidIsoDateError);
    expect(() => parseIsoDateOrThrow('')).toThrow(InvalidIsoDateError);
  });

  it('throws for invalid month or day', () => {
    expect(() => parseIsoDateOrThrow('2024-13-01')).toThrow(InvalidIsoDateError);
    expect(() => parseIsoDateOrThrow('2023-02-29')).toThrow(InvalidIsoDateError);
  });

  it('accepts leap day', () => {
    expect(formatIsoDate(parseIsoDateOrThrow('2024-02-29'))).toBe('2024-02-29');
  });
});

describe('parseUsDateOrNull', () => {
  it('parses month-first dates with or without zero padding', () => {
    expect(parseUsDateOrNull('1/5/2024')?.toISOString()).toBe('2024-01-05T00:00:00.000Z');
    expect(parseUsDateOrNull('03/09/2024')?.toISOString()).toBe('2024-03-09T00:00:00.000Z');
  });

  it('returns null for impossible dates and other formats', () => {
    expect(parseUsDateOrNull('13/01/2024')).toBeNull();
    expect(parseUsDateOrNull('2/30/2024')).toBeNull();
    expect(parseUsDateOrNull('2024-01-05')).toBeNull();
    expect(parseUsDateOrNull('1/5/24')).toBeNull();
    expect(parseUsDateOrNull('')).toBeNull();
  });
});

describe('parseClockTimeOrNull', () => {
  it('parses 24-hour H:MM and HH:MM', () => {
    expect(parseClockTimeOrNull('13:08')).toEqual({ hour: 13, minute: 8 });
    expect(parseClockTimeOrNull('7:05')).toEqual({ hour: 7, minute: 5 });
    expect(parseClockTimeOrNull('00:00')).toEqual({ hour: 0, minute: 0 });
  });

  it('returns null outside 00:00-23:59 or with seconds', () => {
    expect(parseClockTimeOrNull('24:00')).toBeNull();
    expect(parseClockTimeOrNull('12:60')).toBeNull();
    expect(parseClockTimeOrNull('12:30:00')).toBeNull();
    expect(parseClockTimeOrNull('noon')).toBeNull();
  });
});

describe('names and formatting', () => {
  it('weekdayName is Monday-based English', () => {
    expect(weekdayName(new Date('2024-01-01T00:00:00.000Z'))).toBe('Monday');
    expect(weekdayName(new Date('2024-01-07T00:00:00.000Z'))).toBe('Sunday');
  });

  it('monthName returns English month', () => {
    expect(monthName(new Date('2024-03-31T00:00:00.000Z'))).toBe('March');
  });

  it('formats US date and clock time zero-padded', () => {
    expect(formatUsDate(new Date('2024-01-05T00:00:00.000Z'))).toBe('01/05/2024');
    expect(formatClockTime({ hour: 7, minute: 5 })).toBe('07:05');
  });

  it('isMonthName is case-sensitive', () => {
    expect(isMonthName('February')).toBe(true);
    expect(isMonthName('february')).toBe(false);
  });
});
