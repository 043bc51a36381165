import { z } from 'zod';

// ============================================================
// Attendance report configuration
// ============================================================

const normalizedEmail = z.string().trim().toLowerCase().min(1);

/**
 * How the week pivot groups dates into columns.
 * - `week-number`: ISO week number only; the same week number in two ISO
 *   years lands in one column.
 * - `iso-week`: ISO (year, week) pair.
 */
export const WeekBucketingEnum = z.enum(['week-number', 'iso-week']);
export type WeekBucketing = z.infer<typeof WeekBucketingEnum>;

/**
 * Alternate (usually personal) email → canonical institutional email.
 * Keys and values are lowercased; two alternates that collide after
 * normalisation are rejected.
 */
export const AliasMappingSchema = z
    .record(z.string(), z.string())
    .superRefine((mapping, ctx) => {
        const seen = new Map<string, string>();
        for (const [alternate, canonical] of Object.entries(mapping)) {
            const key = alternate.trim().toLowerCase();
            if (!key || !canonical.trim()) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Alias entry "${alternate}" must map a non-empty email to a non-empty email`,
                    path: [alternate],
                });
                continue;
            }
            const previous = seen.get(key);
            if (previous !== undefined) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Alias "${alternate}" duplicates "${previous}"`,
                    path: [alternate],
                });
            }
            seen.set(key, alternate);
        }
    })
    .transform((mapping) => {
        const normalized: Record<string, string> = {};
        for (const [alternate, canonical] of Object.entries(mapping)) {
            normalized[alternate.trim().toLowerCase()] = canonical
                .trim()
                .toLowerCase();
        }
        return normalized;
    });

export type AliasMapping = z.infer<typeof AliasMappingSchema>;

export const AttendanceConfigSchema = z.object({
    /** Warn for participants who attended on this many dates or fewer (0 disables) */
    warningThreshold: z.number().int().min(0).default(0),
    aliases: AliasMappingSchema.default({}),
    /** Staff/demonstrator domain suffixes, e.g. "@gla.ac.uk" */
    excludedDomains: z.array(normalizedEmail).default([]),
    /** Individual staff emails that look like student emails */
    excludedEmails: z.array(normalizedEmail).default([]),
    /** Official student domain suffixes, e.g. "@student.gla.ac.uk" */
    verifiedDomains: z.array(normalizedEmail).default([]),
    /** Leave excluded identities out of every report */
    studentAttendanceOnly: z.boolean().default(true),
    weekBucketing: WeekBucketingEnum.default('week-number'),
    /**
     * date-fns pattern of the session start column. A trailing AM/PM the
     * pattern does not read is ignored.
     */
    timestampFormat: z.string().min(1).default('d/M/yyyy H:mm:ss'),
});

/** Configuration as written in attendance.config.json */
export type AttendanceConfigInput = z.input<typeof AttendanceConfigSchema>;

/** Configuration after validation and defaults */
export type AttendanceConfig = z.infer<typeof AttendanceConfigSchema>;

/** The subset of configuration the identity predicates read */
export type IdentityRules = Pick<
    AttendanceConfig,
    'excludedDomains' | 'excludedEmails' | 'verifiedDomains'
>;
