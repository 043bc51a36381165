import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  AttendanceConfig,
  AttendanceReportsDto,
  DirectoryRunResultDto,
} from '@attendance-reports/contract';
import { ATTENDANCE_CONFIG } from '../config/attendance.config';
import {
  AliasResolverService,
  formatAliasEntry,
} from '../attendance/alias-resolver.service';
import {
  AttendanceLedger,
  representativeEntry,
} from '../attendance/attendance-ledger';
import { timed } from '../common/perf-logger';
import { ParticipantsFileReader } from '../ingest/participants-file.reader';
import { ReportFileWriter } from '../ingest/report-file.writer';
import {
  isHeaderRow,
  parseParticipantRow,
} from '../ingest/participant-row.parser';
import { ReportPivotService } from './report-pivot.service';

export interface RunOptions {
  /** Overrides warningThreshold from the config file */
  warningThreshold?: number;
}

/** Rows of one directory, folded into a fresh ledger. */
export interface CollectedAttendance {
  ledger: AttendanceLedger;
  filesRead: number;
}

const START_COLUMN = 2;

/**
 * Runs the whole pipeline once per directory. Every directory gets its
 * own ledger, and a failure in one (a malformed row, an unreadable file)
 * is logged and leaves the others untouched. Reports are only written
 * once all three have been built.
 */
@Injectable()
export class ReportRunnerService {
  private readonly logger = new Logger(ReportRunnerService.name);
  private readonly timestampFormat: string;

  constructor(
    configService: ConfigService,
    private readonly aliasResolver: AliasResolverService,
    private readonly pivot: ReportPivotService,
    private readonly reader: ParticipantsFileReader,
    private readonly writer: ReportFileWriter,
  ) {
    this.timestampFormat =
      configService.getOrThrow<AttendanceConfig>(
        ATTENDANCE_CONFIG,
      ).timestampFormat;
  }

  run(
    directories: readonly string[],
    options: RunOptions = {},
  ): DirectoryRunResultDto[] {
    return directories.map((directory) =>
      this.processDirectory(directory, options),
    );
  }

  processDirectory(
    directory: string,
    options: RunOptions = {},
  ): DirectoryRunResultDto {
    this.logger.log(`===== Processing directory "${directory}" =====`);

    try {
      return timed(
        'DIRECTORY',
        directory,
        () => {
          const { ledger, filesRead } = this.collect(directory);
          const participants = ledger.participants();

          this.reportUnresolvedIdentities(ledger);

          const reports = timed(
            'REPORT',
            directory,
            () =>
              this.pivot.buildReports(participants, options.warningThreshold),
            (built) => ({
              dates: built.byDate.columns.length,
              weeks: built.byWeek.columns.length,
            }),
          );
          this.reportWarnings(reports);

          this.writer.writeReports(directory, reports);
          this.logger.log(
            `Wrote reports for ${reports.byDate.rows.length} participant(s) from ${filesRead} file(s) in "${directory}"`,
          );

          return {
            directory,
            status: 'written' as const,
            filesRead,
            participants: participants.length,
          };
        },
        (result) => ({
          files: result.filesRead,
          participants: result.participants,
        }),
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(
        `Aborted "${directory}", no reports written: ${message}`,
      );
      return {
        directory,
        status: 'failed',
        filesRead: 0,
        participants: 0,
        error: message,
      };
    }
  }

  /**
   * Read every participants file of `directory` into a new ledger.
   * Throws MalformedRowError on the first bad row.
   */
  collect(directory: string): CollectedAttendance {
    const ledger = new AttendanceLedger(this.aliasResolver);
    const files = this.reader.listParticipantFiles(directory);

    if (files.length === 0) {
      this.logger.warn(
        `No participants*.csv files in "${directory}"; writing empty reports`,
      );
    }

    for (const file of files) {
      timed('FILE', file, () => {
        const rows = this.reader.readRows(file);
        const firstData = rows.find((row) => !isHeaderRow(row));
        this.logger.log(
          `Processing file ${file} (date ${firstData?.[START_COLUMN] ?? 'unknown'})`,
        );

        rows.forEach((row, index) => {
          if (isHeaderRow(row)) return;
          ledger.record(
            parseParticipantRow(
              row,
              { file, line: index + 1 },
              this.timestampFormat,
            ),
          );
        });
      });
    }

    return { ledger, filesRead: files.length };
  }

  private reportUnresolvedIdentities(ledger: AttendanceLedger): void {
    const participants = ledger.participants();

    for (const unresolved of this.aliasResolver.findUnresolved(participants)) {
      const entry = representativeEntry(unresolved);
      this.logger.log(
        `NOTE: participant ${entry.name}, ${entry.email} not matched to an institutional address`,
      );
      for (const suggestion of this.aliasResolver.suggestPairingsFor(
        unresolved,
        participants,
      )) {
        this.logger.log(
          ` Might match to ${suggestion.candidateName}, ${suggestion.candidateEmail}? If so, add to "aliases": ${formatAliasEntry(suggestion)}`,
        );
      }
    }
  }

  private reportWarnings(reports: AttendanceReportsDto): void {
    for (const warning of reports.warnings) {
      this.logger.warn(
        `Participant ${warning.name} ${warning.email} only attended ${warning.sessions} session(s)`,
      );
    }
  }
}
