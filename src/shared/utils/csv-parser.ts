// CSV parsing utilities
import csv from 'csv-parser';
import { createReadStream } from 'fs';
import type { InputRecord } from '../models';

/**
 * Maps a header-less csv-parser row (keyed '0', '1', ...) to its ordered fields
 */
export function mapRowToRecord(row: Record<string, string>): InputRecord {
  return Object.keys(row)
    .map(key => Number(key))
    .sort((a, b) => a - b)
    .map(index => String(row[String(index)] ?? ''));
}

/**
 * Reads a field by position, empty when the row is shorter
 */
export function fieldAt(record: InputRecord, position: number): string {
  return record[position] ?? '';
}

/**
 * Streams every CSV row of a file, header included, as positional records.
 * Breaking out of the loop releases the file.
 */
export async function* readCSVRecords(filePath: string): AsyncGenerator<InputRecord> {
  const source = createReadStream(filePath);
  const parser = source.pipe(csv({ headers: false }));

  // pipe() does not forward source errors
  source.on('error', error => parser.destroy(error));

  try {
    for await (const row of parser) {
      const fields: Record<string, string> = row;
      yield mapRowToRecord(fields);
    }
  } finally {
    parser.destroy();
    source.destroy();
  }
}

/**
 * Counts the CSV records of a file, header included
 */
export async function countCSVRecords(filePath: string): Promise<number> {
  let count = 0;

  for await (const _record of readCSVRecords(filePath)) {
    count++;
  }

  return count;
}
