import { registerAs } from '@nestjs/config';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  AttendanceConfigSchema,
  type AttendanceConfig,
} from '@attendance-reports/contract';

/** Config namespace registered with ConfigModule */
export const ATTENDANCE_CONFIG = 'attendance';

/** Looked up in the working directory when ATTENDANCE_CONFIG is unset */
export const DEFAULT_CONFIG_FILE = 'attendance.config.json';

export class AttendanceConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AttendanceConfigError';
  }
}

/**
 * Validate a parsed config object. Zod issues are flattened into one
 * message so the operator sees every problem at once.
 */
export function parseAttendanceConfig(
  raw: unknown,
  source = 'configuration',
): AttendanceConfig {
  const result = AttendanceConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new AttendanceConfigError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Read the JSON config file. An explicitly named file must exist; the
 * default file is optional and its absence yields the schema defaults.
 */
export function loadAttendanceConfig(
  explicitPath: string | undefined,
  cwd: string = process.cwd(),
): AttendanceConfig {
  const configPath = path.resolve(cwd, explicitPath || DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new AttendanceConfigError(
        `Config file not found: ${configPath}`,
      );
    }
    return parseAttendanceConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new AttendanceConfigError(
      `Could not read ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseAttendanceConfig(raw, configPath);
}

export default registerAs(ATTENDANCE_CONFIG, () =>
  loadAttendanceConfig(process.env.ATTENDANCE_CONFIG),
);
