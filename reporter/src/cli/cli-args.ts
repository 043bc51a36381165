export interface CliNotice {
  level: 'log' | 'warn';
  message: string;
}

export interface CliArgs {
  directories: string[];
  /** Set by -m<N>; undefined leaves the configured threshold in place */
  warningThreshold?: number;
  notices: CliNotice[];
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE =
  'Usage: attendance-reports [-m<N>] [directory ...]\n' +
  '  -m<N>      warn for participants who attended <= N sessions\n' +
  '  directory  folder holding participants*.csv exports (default: .)';

const THRESHOLD_FLAG = '-m';

/**
 * Parse `[-m<N>] [directory ...]`. Each directory is processed on its own.
 * Quoted wildcards reach us unexpanded and are ignored with a warning;
 * they still count as a directory argument, so `.` is not used instead.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const directories: string[] = [];
  const notices: CliNotice[] = [];
  let warningThreshold: number | undefined;
  let sawDirectoryArg = false;

  for (const arg of argv) {
    if (arg.startsWith(THRESHOLD_FLAG)) {
      const value = arg.slice(THRESHOLD_FLAG.length);
      if (value === '') {
        notices.push({
          level: 'log',
          message:
            'Usage: "-m4" to warn for participants who have attended <=4 sessions',
        });
        continue;
      }
      if (!/^\d+$/.test(value)) {
        throw new CliUsageError(
          `Invalid threshold "${arg}": expected -m followed by a whole number\n${USAGE}`,
        );
      }
      warningThreshold = Number.parseInt(value, 10);
      notices.push({
        level: 'log',
        message: `Will warn for participants who have attended <=${warningThreshold} sessions`,
      });
      continue;
    }

    sawDirectoryArg = true;
    if (arg.includes('*')) {
      notices.push({
        level: 'warn',
        message:
          `Ignoring quoted wildcard "${arg}". Use an unquoted wildcard ` +
          'to process a batch of directories independently',
      });
      continue;
    }
    directories.push(arg);
  }

  if (!sawDirectoryArg) {
    notices.push({
      level: 'log',
      message: 'No directories given - processing current directory',
    });
    directories.push('.');
  }

  return { directories, warningThreshold, notices };
}
