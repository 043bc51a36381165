import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  AttendanceConfig,
  AttendanceReportsDto,
  AttendanceWarningDto,
  ChronologicalReportRowDto,
  PivotReportDto,
  ReportCell,
  WeekBucketing,
} from '@attendance-reports/contract';
import { ATTENDANCE_CONFIG } from '../config/attendance.config';
import { IdentityClassifierService } from '../attendance/identity-classifier.service';
import {
  compareIdentityKeys,
  representativeEntry,
} from '../attendance/attendance-ledger';
import { isoWeekOf } from '../attendance/session-date.util';
import type { ParticipantRecord } from '../attendance/attendance.types';

export interface WeekColumn {
  /** ISO week number, or isoYear * 100 + week when bucketing by iso-week */
  bucket: number;
  /** Monday of the week, yyyy-MM-dd */
  weekStart: string;
}

export interface ChronologicalReport {
  rows: ChronologicalReportRowDto[];
  warnings: AttendanceWarningDto[];
}

export function weekBucketOf(
  calendarDate: string,
  bucketing: WeekBucketing,
): WeekColumn {
  const { isoYear, week, weekStart } = isoWeekOf(calendarDate);
  return {
    bucket: bucketing === 'iso-week' ? isoYear * 100 + week : week,
    weekStart,
  };
}

function sortedDates(participant: ParticipantRecord): string[] {
  // yyyy-MM-dd sorts chronologically as plain strings
  return [...participant.days.keys()].sort();
}

/** Every distinct date attended, ascending. */
export function buildDateCatalogue(
  participants: readonly ParticipantRecord[],
): string[] {
  const dates = new Set<string>();
  for (const participant of participants) {
    for (const date of participant.days.keys()) {
      dates.add(date);
    }
  }
  return [...dates].sort();
}

/**
 * Every distinct week bucket attended, in calendar order of the heading
 * Monday. Under `week-number` bucketing the heading is the Monday of the
 * first date seen for that week number, scanning participants in the
 * order given and each participant's dates in recording order, so a term
 * running from December into January still lists December first.
 */
export function buildWeekCatalogue(
  participants: readonly ParticipantRecord[],
  bucketing: WeekBucketing,
): WeekColumn[] {
  const weeks = new Map<number, string>();
  for (const participant of participants) {
    for (const date of participant.days.keys()) {
      const { bucket, weekStart } = weekBucketOf(date, bucketing);
      if (!weeks.has(bucket)) {
        weeks.set(bucket, weekStart);
      }
    }
  }
  return [...weeks.entries()]
    .map(([bucket, weekStart]) => ({ bucket, weekStart }))
    .sort((a, b) => compareIdentityKeys(a.weekStart, b.weekStart));
}

@Injectable()
export class ReportPivotService {
  private readonly studentAttendanceOnly: boolean;
  private readonly weekBucketing: WeekBucketing;
  private readonly defaultWarningThreshold: number;

  constructor(
    configService: ConfigService,
    private readonly classifier: IdentityClassifierService,
  ) {
    const config =
      configService.getOrThrow<AttendanceConfig>(ATTENDANCE_CONFIG);
    this.studentAttendanceOnly = config.studentAttendanceOnly;
    this.weekBucketing = config.weekBucketing;
    this.defaultWarningThreshold = config.warningThreshold;
  }

  /** Participants that appear in reports, ascending by identity key. */
  includedParticipants(
    participants: readonly ParticipantRecord[],
  ): ParticipantRecord[] {
    const sorted = [...participants].sort((a, b) =>
      compareIdentityKeys(a.identityKey, b.identityKey),
    );
    if (!this.studentAttendanceOnly) return sorted;
    return sorted.filter((p) => !this.classifier.isExcluded(p.identityKey));
  }

  /**
   * meeting-report.csv: one row per participant per date, dates ascending.
   * Participants on `warningThreshold` dates or fewer are flagged; the
   * warning carries the name and email of their latest date.
   */
  buildChronologicalReport(
    participants: readonly ParticipantRecord[],
    warningThreshold: number = this.defaultWarningThreshold,
  ): ChronologicalReport {
    const rows: ChronologicalReportRowDto[] = [];
    const warnings: AttendanceWarningDto[] = [];

    for (const participant of this.includedParticipants(participants)) {
      let latest: ChronologicalReportRowDto | undefined;
      for (const date of sortedDates(participant)) {
        const day = participant.days.get(date);
        if (!day) continue;
        latest = {
          name: day.name,
          email: day.email,
          start: day.start,
          minutes: day.minutes,
        };
        rows.push(latest);
      }

      const sessions = participant.days.size;
      if (
        latest &&
        !this.classifier.isExcluded(participant.identityKey) &&
        sessions <= warningThreshold
      ) {
        warnings.push({ name: latest.name, email: latest.email, sessions });
      }
    }

    return { rows, warnings };
  }

  /** meeting-report-by-date.csv: minutes per participant per date. */
  buildDateReport(participants: readonly ParticipantRecord[]): PivotReportDto {
    const included = this.includedParticipants(participants);
    const dates = buildDateCatalogue(included);

    return {
      columns: dates,
      rows: included.map((participant) => ({
        name: representativeEntry(participant).name,
        email: participant.identityKey,
        cells: dates.map(
          (date): ReportCell => participant.days.get(date)?.minutes ?? '',
        ),
      })),
    };
  }

  /**
   * meeting-report-by-week.csv: minutes per participant per week, summed
   * over the dates falling in each week. A zero sum is left blank.
   */
  buildWeekReport(participants: readonly ParticipantRecord[]): PivotReportDto {
    const included = this.includedParticipants(participants);
    const weeks = buildWeekCatalogue(included, this.weekBucketing);

    return {
      columns: weeks.map((w) => w.weekStart),
      rows: included.map((participant) => {
        const totals = new Map<number, number>();
        for (const day of participant.days.values()) {
          const { bucket } = weekBucketOf(day.date, this.weekBucketing);
          totals.set(bucket, (totals.get(bucket) ?? 0) + day.minutes);
        }
        return {
          name: representativeEntry(participant).name,
          email: participant.identityKey,
          cells: weeks.map(({ bucket }): ReportCell => {
            const total = totals.get(bucket) ?? 0;
            return total > 0 ? total : '';
          }),
        };
      }),
    };
  }

  buildReports(
    participants: readonly ParticipantRecord[],
    warningThreshold: number = this.defaultWarningThreshold,
  ): AttendanceReportsDto {
    const { rows, warnings } = this.buildChronologicalReport(
      participants,
      warningThreshold,
    );
    return {
      chronological: rows,
      byDate: this.buildDateReport(participants),
      byWeek: this.buildWeekReport(participants),
      warnings,
    };
  }
}
