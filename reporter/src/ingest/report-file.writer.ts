import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as Papa from 'papaparse';
import type {
  AttendanceReportsDto,
  ChronologicalReportRowDto,
  PivotReportDto,
} from '@attendance-reports/contract';

export const REPORT_FILES = {
  chronological: 'meeting-report.csv',
  byDate: 'meeting-report-by-date.csv',
  byWeek: 'meeting-report-by-week.csv',
} as const;

const NEWLINE = '\r\n';

type CsvRow = (string | number)[];

function toCsv(rows: CsvRow[]): string {
  if (rows.length === 0) return '';
  return Papa.unparse(rows, { newline: NEWLINE }) + NEWLINE;
}

/** meeting-report.csv has no header row. */
export function chronologicalToCsv(rows: ChronologicalReportRowDto[]): string {
  return toCsv(rows.map((r) => [r.name, r.email, r.start, r.minutes]));
}

export function pivotToCsv(report: PivotReportDto): string {
  return toCsv([
    ['Name', 'Email', ...report.columns],
    ...report.rows.map((r) => [r.name, r.email, ...r.cells]),
  ]);
}

/** Hidden sibling a report is staged in before it replaces the real file. */
export function temporaryNameFor(reportFile: string): string {
  return `.${reportFile}.tmp`;
}

@Injectable()
export class ReportFileWriter {
  private readonly logger = new Logger(ReportFileWriter.name);

  /**
   * Write the three report files into `directory`, replacing earlier runs.
   * Each report goes to a temporary sibling first; only when all three
   * are on disk are they renamed into place, so a failed write leaves the
   * previous reports untouched. Returns the paths written.
   */
  writeReports(directory: string, reports: AttendanceReportsDto): string[] {
    const outputs: [string, string][] = [
      [REPORT_FILES.chronological, chronologicalToCsv(reports.chronological)],
      [REPORT_FILES.byDate, pivotToCsv(reports.byDate)],
      [REPORT_FILES.byWeek, pivotToCsv(reports.byWeek)],
    ];

    const staged: { tempPath: string; filepath: string }[] = [];
    try {
      for (const [name, csv] of outputs) {
        const tempPath = path.join(directory, temporaryNameFor(name));
        fs.writeFileSync(tempPath, csv, 'utf8');
        staged.push({ tempPath, filepath: path.join(directory, name) });
      }
    } catch (err) {
      for (const { tempPath } of staged) {
        fs.rmSync(tempPath, { force: true });
      }
      throw err;
    }

    return staged.map(({ tempPath, filepath }) => {
      fs.renameSync(tempPath, filepath);
      this.logger.debug(`Wrote ${filepath}`);
      return filepath;
    });
  }
}
