import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { addDays, formatCalendarDate, formatDate, parseCalendarDate, yearOf } from '../dates.js';

describe('parseCalendarDate', () => {
  it('keeps ISO dates as written', () => {
    expect(parseCalendarDate('2031-05-14')).toBe('2031-05-14');
    expect(parseCalendarDate('2031-5-4')).toBe('2031-05-04');
  });

  it('ignores the time part of ISO timestamps', () => {
    expect(parseCalendarDate('2031-05-14T23:30:00Z')).toBe('2031-05-14');
    expect(parseCalendarDate('2031-05-14 08:00')).toBe('2031-05-14');
  });

  it('rejects impossible calendar days', () => {
    expect(parseCalendarDate('2031-02-30')).toBeNull();
    expect(parseCalendarDate('2031-13-01')).toBeNull();
  });

  it('accepts leap days only in leap years', () => {
    expect(parseCalendarDate('2032-02-29')).toBe('2032-02-29');
    expect(parseCalendarDate('2031-02-29')).toBeNull();
  });

  it('reads partial ISO dates as the first day of the period', () => {
    expect(parseCalendarDate('2031')).toBe('2031-01-01');
    expect(parseCalendarDate('2031-05')).toBe('2031-05-01');
    expect(parseCalendarDate('2031-13')).toBeNull();
  });

  it('accepts US numeric and written month formats', () => {
    expect(parseCalendarDate('05/14/2031')).toBe('2031-05-14');
    expect(parseCalendarDate('March 5, 2031')).toBe('2031-03-05');
    expect(parseCalendarDate('Mar. 5th 2031')).toBe('2031-03-05');
    expect(parseCalendarDate('14 May 2031')).toBe('2031-05-14');
    expect(parseCalendarDate('02/30/2031')).toBeNull();
  });

  it('rejects words that are not dates', () => {
    expect(parseCalendarDate('TBD 2031')).toBeNull();
    expect(parseCalendarDate('launch 2031')).toBeNull();
    expect(parseCalendarDate('Smarch 5, 2031')).toBeNull();
    expect(parseCalendarDate('2031-05-14 garbage')).toBeNull();
    expect(parseCalendarDate('2031-05-14T')).toBeNull();
  });

  it('returns null for blanks and non-dates', () => {
    expect(parseCalendarDate(undefined)).toBeNull();
    expect(parseCalendarDate(null)).toBeNull();
    expect(parseCalendarDate('   ')).toBeNull();
    expect(parseCalendarDate('soon')).toBeNull();
    expect(parseCalendarDate('12')).toBeNull();
  });
});

describe('parseCalendarDate west of UTC', () => {
  const originalTz = process.env.TZ;

  beforeAll(() => {
    process.env.TZ = 'America/New_York';
  });

  afterAll(() => {
    if (originalTz === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = originalTz;
    }
  });

  it('keeps the written day and year', () => {
    expect(new Date(Date.UTC(2031, 0, 1)).getDate()).toBe(31);
    expect(parseCalendarDate('2031')).toBe('2031-01-01');
    expect(parseCalendarDate('2031-05')).toBe('2031-05-01');
    expect(parseCalendarDate('2031-05-14T01:00:00Z')).toBe('2031-05-14');
    expect(parseCalendarDate('January 1, 2031')).toBe('2031-01-01');
    expect(yearOf(parseCalendarDate('2031'))).toBe(2031);
  });
});

describe('formatCalendarDate', () => {
  it('zero-pads components', () => {
    expect(formatCalendarDate(987, 1, 2)).toBe('0987-01-02');
  });

  it('rejects non-integer components', () => {
    expect(formatCalendarDate(2031, 1.5, 2)).toBeNull();
  });
});

describe('formatDate and addDays', () => {
  it('formats the local calendar day', () => {
    expect(formatDate(new Date(2031, 4, 14, 23, 59))).toBe('2031-05-14');
  });

  it('crosses month and year boundaries', () => {
    expect(formatDate(addDays(new Date(2031, 11, 30), 3))).toBe('2032-01-02');
    expect(formatDate(addDays(new Date(2031, 2, 1), -1))).toBe('2031-02-28');
  });

  it('does not mutate its input', () => {
    const start = new Date(2031, 4, 14);
    addDays(start, 5);
    expect(formatDate(start)).toBe('2031-05-14');
  });
});

describe('yearOf', () => {
  it('reads the leading year', () => {
    expect(yearOf('2031-05-14')).toBe(2031);
    expect(yearOf(null)).toBeNull();
  });
});
