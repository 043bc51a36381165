import { Logger } from '@nestjs/common';

const perfLogger = new Logger('PERF');

export type PerfCategory = 'DIRECTORY' | 'FILE' | 'REPORT';

type PerfMeta = Record<string, string | number | null | undefined>;

/** Timing lines are only emitted with DEBUG=true. */
export function isPerfEnabled(): boolean {
  return process.env.DEBUG === 'true';
}

/**
 * Format: `[PERF] <CATEGORY> | <operation> | <duration>ms | key=value ...`
 */
export function formatPerfLine(
  category: PerfCategory,
  operation: string,
  durationMs: number,
  meta?: PerfMeta,
): string {
  const head = `[PERF] ${category} | ${operation} | ${Math.round(durationMs)}ms`;
  const pairs = Object.entries(meta ?? {})
    .filter(([, v]) => v != null)
    .map(([k, v]) => `${k}=${v}`);
  return pairs.length > 0 ? `${head} | ${pairs.join(' ')}` : head;
}

/**
 * Run `work` and log how long it took. The result (or the thrown error)
 * passes through untouched; a failed run is logged with `failed=true`.
 */
export function timed<T>(
  category: PerfCategory,
  operation: string,
  work: () => T,
  meta?: (result: T) => PerfMeta,
): T {
  if (!isPerfEnabled()) return work();

  const startedAt = performance.now();
  let result: T;
  try {
    result = work();
  } catch (err) {
    perfLogger.debug(
      formatPerfLine(category, operation, performance.now() - startedAt, {
        failed: 'true',
      }),
    );
    throw err;
  }
  perfLogger.debug(
    formatPerfLine(
      category,
      operation,
      performance.now() - startedAt,
      meta?.(result),
    ),
  );
  return result;
}
