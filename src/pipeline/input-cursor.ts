// Positions the input stream after the rows already present in the output
import type { InputRecord, Reporter } from '../shared/models';
import { readCSVRecords } from '../shared/utils/csv-parser';

export interface InputCursor extends AsyncIterable<InputRecord> {
  /** Data rows actually skipped; less than requested when the input ran short */
  readonly skipped: number;
  close(): Promise<void>;
}

/**
 * Discards the header and `skipCount` data rows, then yields the rest in file
 * order. An input shorter than the checkpoint is warned about and read from
 * wherever it ends.
 */
export async function openInputCursor(
  inputPath: string,
  skipCount: number,
  reporter: Reporter = console
): Promise<InputCursor> {
  return createInputCursor(readCSVRecords(inputPath), skipCount, reporter);
}

export async function createInputCursor(
  records: AsyncIterator<InputRecord>,
  skipCount: number,
  reporter: Reporter = console
): Promise<InputCursor> {
  let exhausted = (await records.next()).done === true; // header
  let skipped = 0;

  if (skipCount > 0) {
    reporter.log(`Skipping ${skipCount} already processed rows...`);

    while (skipped < skipCount) {
      if (exhausted || (await records.next()).done) {
        exhausted = true;
        reporter.warn('Warning: Input file has fewer rows than output. Starting from end of input.');
        break;
      }
      skipped++;
    }
  }

  return {
    skipped,
    async *[Symbol.asyncIterator]() {
      if (exhausted) {
        return;
      }

      for (;;) {
        const next = await records.next();
        if (next.done) {
          exhausted = true;
          return;
        }
        yield next.value;
      }
    },
    async close() {
      if (records.return) {
        await records.return();
      }
    }
  };
}
