import { MalformedRowError } from '../attendance/attendance.errors';
import type {
  RawAttendanceRecord,
  RowSource,
} from '../attendance/attendance.types';
import {
  DEFAULT_TIMESTAMP_FORMAT,
  parseSessionStart,
  toCalendarDate,
} from '../attendance/session-date.util';

/**
 * Suffix of the first header cell. Matched with endsWith because the
 * export starts with a byte-order mark glued to "Name".
 */
export const HEADER_MARKER = 'Name (Original Name)';

const NAME_COLUMN = 0;
const EMAIL_COLUMN = 1;
const START_COLUMN = 2;
const DURATION_COLUMN = 4;

const INTEGER_PATTERN = /^\s*\+?\d+\s*$/;

export function isHeaderRow(row: readonly string[]): boolean {
  return row.length > 0 && row[NAME_COLUMN].endsWith(HEADER_MARKER);
}

/**
 * Convert one data row of a participants export into a record.
 * Columns: 0 name, 1 email, 2 join time, 3 leave time (unused), 4 minutes.
 */
export function parseParticipantRow(
  row: readonly string[],
  source: RowSource,
  timestampFormat: string = DEFAULT_TIMESTAMP_FORMAT,
): RawAttendanceRecord {
  if (row.length <= DURATION_COLUMN) {
    throw new MalformedRowError(
      source,
      `expected at least ${DURATION_COLUMN + 1} columns, found ${row.length}`,
    );
  }

  const start = row[START_COLUMN];
  const startedAt = parseSessionStart(start, timestampFormat);
  if (!startedAt) {
    throw new MalformedRowError(
      source,
      `unparseable start time "${start}" (expected ${timestampFormat})`,
    );
  }

  const duration = row[DURATION_COLUMN];
  if (!INTEGER_PATTERN.test(duration)) {
    throw new MalformedRowError(
      source,
      `duration "${duration}" is not a whole number of minutes`,
    );
  }

  return {
    name: row[NAME_COLUMN],
    // Lowercased because some participants change case mid-term
    email: row[EMAIL_COLUMN].trim().toLowerCase(),
    start,
    date: toCalendarDate(startedAt),
    minutes: Number.parseInt(duration, 10),
  };
}
