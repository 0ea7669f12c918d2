// Checkpoint detection from a partially written output file
import type { Reporter } from '../shared/models';
import { countCSVRecords } from '../shared/utils/csv-parser';
import { describeError } from '../shared/utils/error-handling';
import { fileExists } from '../shared/utils/file-handler';

/**
 * Counts the data rows already in the output file, header excluded. A missing,
 * empty or unreadable file counts as zero; the last case is only warned about.
 */
export async function countOutputRows(outputPath: string, reporter: Reporter = console): Promise<number> {
  if (!(await fileExists(outputPath))) {
    return 0;
  }

  try {
    const records = await countCSVRecords(outputPath);
    return Math.max(records - 1, 0);
  } catch (error) {
    reporter.warn(`Warning: Could not read output file ${outputPath}: ${describeError(error)}`);
    return 0;
  }
}
