#!/usr/bin/env node
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { Logger, type LogLevel } from '@nestjs/common';
import { AppModule } from './app.module';
import { parseCliArgs } from './cli/cli-args';
import { ReportRunnerService } from './reports/report-runner.service';

const logger = new Logger('AttendanceReports');

async function bootstrap(): Promise<number> {
  const isDebug = process.env.DEBUG === 'true';
  const logLevels: LogLevel[] = isDebug
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  const args = parseCliArgs(process.argv.slice(2));

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels,
  });

  try {
    for (const notice of args.notices) {
      if (notice.level === 'warn') logger.warn(notice.message);
      else logger.log(notice.message);
    }

    const results = app
      .get(ReportRunnerService)
      .run(args.directories, { warningThreshold: args.warningThreshold });

    const failed = results.filter((r) => r.status === 'failed');
    if (failed.length > 0) {
      logger.error(
        `${failed.length} of ${results.length} director${results.length === 1 ? 'y' : 'ies'} failed: ${failed.map((r) => r.directory).join(', ')}`,
      );
      return 1;
    }
    return 0;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
