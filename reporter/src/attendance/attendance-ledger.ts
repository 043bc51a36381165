import type {
  DailyAttendance,
  ParticipantRecord,
  RawAttendanceRecord,
} from './attendance.types';

export interface IdentityResolver {
  resolve(email: string): string;
}

/** Code-unit ordering, the same as a plain sort of the key strings. */
export function compareIdentityKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** The first date entry recorded for a participant. */
export function representativeEntry(
  participant: ParticipantRecord,
): DailyAttendance {
  const first = participant.days.values().next();
  if (first.done) {
    throw new Error(`Participant ${participant.identityKey} has no entries`);
  }
  return first.value;
}

/**
 * Accumulates the attendance of one directory run. Records are grouped by
 * resolved identity key and calendar date; several records for the same
 * key and date are fused by adding their minutes, and the first record
 * seen supplies the name, email and start shown in reports.
 *
 * Build a new ledger per directory; instances are never shared.
 */
export class AttendanceLedger {
  private readonly byIdentity = new Map<string, Map<string, DailyAttendance>>();

  constructor(private readonly resolver: IdentityResolver) {}

  /** Fold one record in and return the entry it landed in. */
  record(raw: RawAttendanceRecord): DailyAttendance {
    const identityKey = this.resolver.resolve(raw.email);

    let days = this.byIdentity.get(identityKey);
    if (!days) {
      days = new Map();
      this.byIdentity.set(identityKey, days);
    }

    const existing = days.get(raw.date);
    if (existing) {
      existing.minutes += raw.minutes;
      return existing;
    }

    const entry: DailyAttendance = {
      name: raw.name,
      email: raw.email,
      start: raw.start,
      date: raw.date,
      minutes: raw.minutes,
    };
    days.set(raw.date, entry);
    return entry;
  }

  /** All participants, ascending by identity key. */
  participants(): ParticipantRecord[] {
    return [...this.byIdentity.keys()]
      .sort(compareIdentityKeys)
      .map((identityKey) => ({
        identityKey,
        days: this.daysOf(identityKey),
      }));
  }

  private daysOf(identityKey: string): ReadonlyMap<string, DailyAttendance> {
    return this.byIdentity.get(identityKey) ?? new Map();
  }
}
