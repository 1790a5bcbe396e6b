import { format, isValid, parse } from 'date-fns';
import { err, ok, type Result } from 'neverthrow';

import { ParseError } from '../errors/index.js';

/**
 * Calendar date without a time component, as ISO `YYYY-MM-DD`.
 * String comparison orders these chronologically.
 */
export type CalendarDate = string;

interface DateFormat {
  pattern: RegExp;
  formats: string[];
}

// Month-first for ambiguous numeric dates, as US brokerage exports write them.
const DATE_FORMATS: DateFormat[] = [
  { pattern: /^\d{4}-\d{1,2}-\d{1,2}$/, formats: ['yyyy-M-d'] },
  { pattern: /^\d{4}\/\d{1,2}\/\d{1,2}$/, formats: ['yyyy/M/d'] },
  { pattern: /^\d{4}\.\d{1,2}\.\d{1,2}$/, formats: ['yyyy.M.d'] },
  { pattern: /^\d{1,2}\/\d{1,2}\/\d{4}$/, formats: ['M/d/yyyy'] },
  { pattern: /^\d{1,2}\/\d{1,2}\/\d{2}$/, formats: ['M/d/yy'] },
  { pattern: /^\d{1,2}-\d{1,2}-\d{4}$/, formats: ['M-d-yyyy'] },
  { pattern: /^\d{8}$/, formats: ['yyyyMMdd'] },
  { pattern: /^[A-Za-z]{3,9} \d{1,2} \d{4}$/, formats: ['MMM d yyyy', 'MMMM d yyyy'] },
  { pattern: /^\d{1,2} [A-Za-z]{3,9} \d{4}$/, formats: ['d MMM yyyy', 'd MMMM yyyy'] },
  { pattern: /^\d{1,2}-[A-Za-z]{3}-\d{4}$/, formats: ['d-MMM-yyyy'] },
  { pattern: /^\d{1,2}-[A-Za-z]{3}-\d{2}$/, formats: ['d-MMM-yy'] },
];

// "T10:30", " 3:45 PM", " 10:00:00.000 UTC", "T10:00:00+05:00"
const TIME_OF_DAY = /(?:T|\s+)\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*[AaPp]\.?[Mm]\.?)?(?:\s*(?:Z|[A-Z]{2,5}|[+-]\d{2}:?\d{2}))?$/;

const WEEKDAY_PREFIX = /^(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+/i;

// Reference date only fills fields a format leaves out; every format here is complete.
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Format a Date as a calendar date in local time
 */
export function toCalendarDate(date: Date): CalendarDate {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parse a free-form textual date into a calendar date.
 * Datetime values keep their calendar date and drop the time of day.
 */
export function parseCalendarDate(value: string): Result<CalendarDate, ParseError> {
  const trimmed = value.trim();

  // "Thu, Jan. 2, 2020 10:30" -> "Jan 2 2020"; dots between digits stay for "2020.01.02"
  const normalized = trimmed
    .replace(WEEKDAY_PREFIX, '')
    .replace(TIME_OF_DAY, '')
    .replace(/,|(?<=[A-Za-z])\./g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\bsept\b/i, 'Sep');

  for (const { pattern, formats } of DATE_FORMATS) {
    if (!pattern.test(normalized)) continue;

    for (const fmt of formats) {
      const parsed = parse(normalized, fmt, REFERENCE_DATE);
      if (isValid(parsed)) {
        return ok(toCalendarDate(parsed));
      }
    }
  }

  return err(new ParseError(`Invalid date: ${JSON.stringify(value)}`, value));
}
