import {
  format,
  getISOWeek,
  getISOWeekYear,
  isValid,
  parse,
  startOfISOWeek,
} from 'date-fns';

/** Calendar dates are carried around as yyyy-MM-dd strings. */
export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Zoom's participants export, e.g. "01/10/2020 09:00:00 AM". The hour is
 * read on the 24-hour clock and the AM/PM marker is ignored, so
 * "13:05:00 PM" is accepted.
 */
export const DEFAULT_TIMESTAMP_FORMAT = 'd/M/yyyy H:mm:ss';

const REFERENCE_DATE = new Date(2000, 0, 1);

const MERIDIEM_SUFFIX = /\s*[AP]M$/i;

export interface IsoWeek {
  isoYear: number;
  week: number;
  /** Monday of the ISO week, yyyy-MM-dd */
  weekStart: string;
}

/**
 * Parse a session start timestamp. When `pattern` does not match the text
 * in full, it is tried once more without a trailing AM/PM marker; a
 * pattern that reads the marker itself (`h:mm:ss a`) therefore stays
 * strict. Returns null when neither matches. No timezone conversion is
 * applied.
 */
export function parseSessionStart(
  text: string,
  pattern: string = DEFAULT_TIMESTAMP_FORMAT,
): Date | null {
  const trimmed = text.trim();
  const parsed = parse(trimmed, pattern, REFERENCE_DATE);
  if (isValid(parsed)) return parsed;

  const withoutMeridiem = trimmed.replace(MERIDIEM_SUFFIX, '');
  if (withoutMeridiem === trimmed) return null;
  const retried = parse(withoutMeridiem, pattern, REFERENCE_DATE);
  return isValid(retried) ? retried : null;
}

export function toCalendarDate(date: Date): string {
  return format(date, CALENDAR_DATE_FORMAT);
}

function fromCalendarDate(calendarDate: string): Date {
  const parsed = parse(calendarDate, CALENDAR_DATE_FORMAT, REFERENCE_DATE);
  if (!isValid(parsed)) {
    throw new RangeError(`Not a yyyy-MM-dd date: "${calendarDate}"`);
  }
  return parsed;
}

export function isoWeekOf(calendarDate: string): IsoWeek {
  const date = fromCalendarDate(calendarDate);
  return {
    isoYear: getISOWeekYear(date),
    week: getISOWeek(date),
    weekStart: toCalendarDate(startOfISOWeek(date)),
  };
}
