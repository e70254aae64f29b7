import { format, isValid, parse, parseISO } from 'date-fns';
import { Cell } from './types';

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}/;

// Trailing UTC offset on a timestamp; the date part alone never matches
// because the time component is required before it.
const UTC_OFFSET = /(\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

// Formats seen in MATT exports and hand-maintained sheets. Two-digit years
// are tried first because 'yyyy' would otherwise read "23" as the year 0023.
const REPORT_FORMATS = [
  'M/d/yy',
  'M/d/yyyy',
  'M/d/yyyy h:mm:ss a',
  'M/d/yyyy h:mm a',
  'M/d/yyyy H:mm:ss',
  'M/d/yyyy H:mm',
  'yyyy-M-d',
  'yyyy/M/d',
  'MMMM d, yyyy',
  'MMM d, yyyy',
  'MMM d yyyy',
  'dd-MMM-yyyy'
];

/**
 * Parse a report date. Anything that is not a recognizable date (blank,
 * whitespace, free text, numbers) becomes null instead of throwing.
 *
 * Offset timestamps keep their wall-clock time, so "2023-07-09T02:00:00Z"
 * is 2 a.m. on July 9 whatever the host timezone.
 */
export function parseReportDate(value: Cell | undefined): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim().replace(UTC_OFFSET, '$1');
  if (text === '') {
    return null;
  }

  if (ISO_PREFIX.test(text)) {
    const date = parseISO(text);
    if (isValid(date)) return date;
  }

  const reference = new Date(2000, 0, 1);
  for (const pattern of REPORT_FORMATS) {
    const date = parse(text, pattern, reference);
    if (isValid(date)) return date;
  }

  return null;
}

/** Full English weekday name, e.g. "Saturday" */
export function weekdayName(date: Date | null): string | null {
  return date ? format(date, 'EEEE') : null;
}

/** True when the date carries no time of day (local midnight) */
export function isDateOnly(date: Date): boolean {
  return date.getHours() === 0 && date.getMinutes() === 0 && date.getSeconds() === 0 && date.getMilliseconds() === 0;
}
