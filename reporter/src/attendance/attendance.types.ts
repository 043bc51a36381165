/** One data row of a participants export, already validated. */
export interface RawAttendanceRecord {
  name: string;
  /** Lowercased */
  email: string;
  /** Start timestamp as written in the export */
  start: string;
  /** Calendar date of `start`, yyyy-MM-dd */
  date: string;
  minutes: number;
}

/**
 * Everything one identity attended on one calendar date. The
 * representative fields come from the first record folded in.
 */
export interface DailyAttendance {
  name: string;
  email: string;
  start: string;
  date: string;
  minutes: number;
}

export interface ParticipantRecord {
  identityKey: string;
  /** date → attendance, in the order dates were first seen */
  days: ReadonlyMap<string, DailyAttendance>;
}

/** Where a row came from, for error messages */
export interface RowSource {
  file: string;
  /** 1-based row number, counting non-blank rows */
  line: number;
}
