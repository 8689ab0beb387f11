/**
 * Calendar date helpers (local time, YYYY-MM-DD strings)
 */

// Date, optionally followed by a clock time and offset
const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;
const ISO_YEAR_MONTH = /^(\d{4})-(\d{1,2})$/;
const YEAR_ONLY = /^(\d{4})$/;
const US_NUMERIC = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const MONTH_DAY_YEAR = /^([a-z]+)\.? (\d{1,2})(?:st|nd|rd|th)?,? (\d{4})$/i;
const DAY_MONTH_YEAR = /^(\d{1,2})(?:st|nd|rd|th)? ([a-z]+)\.?,? (\d{4})$/i;

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Build a YYYY-MM-DD string, or null when the components do not form a real date
 */
export function formatCalendarDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }

  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Format a Date as its local calendar day
 */
export function formatDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setDate(result.getDate() + days);
  return result;
}

/**
 * Month number for a full or three-letter English month name
 */
function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  if (lower.length < 3) {
    return null;
  }
  const index = MONTH_NAMES.findIndex((month) =>
    lower.length === 3 ? month.startsWith(lower) : month === lower
  );
  return index === -1 ? null : index + 1;
}

/**
 * Parse a loosely formatted date into YYYY-MM-DD.
 *
 * Accepted forms: YYYY-MM-DD (with an optional time part, which is ignored),
 * YYYY-MM and YYYY (first day of the period), MM/DD/YYYY, "Month D, YYYY"
 * and "D Month YYYY". Components are read literally so the local timezone
 * never shifts the day. Anything else is null.
 */
export function parseCalendarDate(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  const trimmed = value.trim().replace(/\s+/g, ' ');
  if (trimmed === '') {
    return null;
  }

  let match = ISO_DATE.exec(trimmed);
  if (match) {
    return formatCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = ISO_YEAR_MONTH.exec(trimmed);
  if (match) {
    return formatCalendarDate(Number(match[1]), Number(match[2]), 1);
  }

  match = YEAR_ONLY.exec(trimmed);
  if (match) {
    return formatCalendarDate(Number(match[1]), 1, 1);
  }

  match = US_NUMERIC.exec(trimmed);
  if (match) {
    return formatCalendarDate(Number(match[3]), Number(match[1]), Number(match[2]));
  }

  match = MONTH_DAY_YEAR.exec(trimmed);
  if (match) {
    const month = monthFromName(match[1] ?? '');
    return month === null ? null : formatCalendarDate(Number(match[3]), month, Number(match[2]));
  }

  match = DAY_MONTH_YEAR.exec(trimmed);
  if (match) {
    const month = monthFromName(match[2] ?? '');
    return month === null ? null : formatCalendarDate(Number(match[3]), month, Number(match[1]));
  }

  return null;
}

/**
 * Year of a YYYY-MM-DD string
 */
export function yearOf(date: string | null): number | null {
  if (date === null) {
    return null;
  }
  const year = Number(date.slice(0, 4));
  return Number.isInteger(year) ? year : null;
}
