import { z } from 'zod';

// ============================================================
// Attendance report tables
// ============================================================

/** A pivot cell: minutes attended, or '' when there is nothing to report */
export const ReportCellSchema = z.union([z.number().int().min(0), z.literal('')]);
export type ReportCell = z.infer<typeof ReportCellSchema>;

/** One (participant, date) line of meeting-report.csv */
export const ChronologicalReportRowSchema = z.object({
    name: z.string(),
    email: z.string(),
    /** Start timestamp exactly as it appeared in the export */
    start: z.string(),
    minutes: z.number().int().min(0),
});
export type ChronologicalReportRowDto = z.infer<
    typeof ChronologicalReportRowSchema
>;

export const PivotReportRowSchema = z.object({
    name: z.string(),
    email: z.string(),
    cells: z.array(ReportCellSchema),
});
export type PivotReportRowDto = z.infer<typeof PivotReportRowSchema>;

/** meeting-report-by-date.csv and meeting-report-by-week.csv */
export const PivotReportSchema = z.object({
    /** Column headings after Name and Email, as yyyy-MM-dd dates */
    columns: z.array(z.string()),
    rows: z.array(PivotReportRowSchema),
});
export type PivotReportDto = z.infer<typeof PivotReportSchema>;

export const AttendanceWarningSchema = z.object({
    name: z.string(),
    email: z.string(),
    sessions: z.number().int().min(0),
});
export type AttendanceWarningDto = z.infer<typeof AttendanceWarningSchema>;

/** A guessed pairing between an unresolved email and a verified identity */
export const AliasSuggestionSchema = z.object({
    unresolvedName: z.string(),
    unresolvedEmail: z.string(),
    candidateName: z.string(),
    candidateEmail: z.string(),
});
export type AliasSuggestionDto = z.infer<typeof AliasSuggestionSchema>;

export const AttendanceReportsSchema = z.object({
    chronological: z.array(ChronologicalReportRowSchema),
    byDate: PivotReportSchema,
    byWeek: PivotReportSchema,
    warnings: z.array(AttendanceWarningSchema),
});
export type AttendanceReportsDto = z.infer<typeof AttendanceReportsSchema>;

export const DirectoryRunResultSchema = z.object({
    directory: z.string(),
    status: z.enum(['written', 'failed']),
    filesRead: z.number().int().min(0),
    participants: z.number().int().min(0),
    error: z.string().optional(),
});
export type DirectoryRunResultDto = z.infer<typeof DirectoryRunResultSchema>;
