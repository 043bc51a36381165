import type { RowSource } from './attendance.types';

/**
 * A participants row that cannot be read: a missing column, a start
 * timestamp that does not match the configured pattern, or a duration
 * that is not a non-negative integer. Aborts the directory being processed.
 */
export class MalformedRowError extends Error {
  readonly file: string;
  readonly line: number;

  constructor(source: RowSource, reason: string) {
    super(`${source.file}:${source.line}: ${reason}`);
    this.name = 'MalformedRowError';
    this.file = source.file;
    this.line = source.line;
  }
}
