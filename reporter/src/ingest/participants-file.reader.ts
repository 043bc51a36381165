import { Injectable } from '@nestjs/common';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as Papa from 'papaparse';
import { MalformedRowError } from '../attendance/attendance.errors';

/** Participants exports downloaded from the meeting reports page */
export const PARTICIPANTS_FILE_PATTERN = /^participants.*\.csv$/;

@Injectable()
export class ParticipantsFileReader {
  /**
   * `participants*.csv` files directly inside `directory`, sorted by name.
   * An empty list is not an error.
   */
  listParticipantFiles(directory: string): string[] {
    return fs
      .readdirSync(directory, { withFileTypes: true })
      .filter(
        (entry) => entry.isFile() && PARTICIPANTS_FILE_PATTERN.test(entry.name),
      )
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(directory, name));
  }

  /** Parse a CSV file into rows of fields. Blank lines are dropped. */
  readRows(file: string): string[][] {
    return parseCsvRows(fs.readFileSync(file, 'utf8'), file);
  }
}

export function parseCsvRows(text: string, file: string): string[][] {
  const result = Papa.parse<string[]>(text, {
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  const quoteError = result.errors.find((e) => e.type === 'Quotes');
  if (quoteError) {
    throw new MalformedRowError(
      { file, line: (quoteError.row ?? 0) + 1 },
      quoteError.message,
    );
  }

  return result.data;
}
