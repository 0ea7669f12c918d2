// Resumable annotation run over an NPPES endpoint file
import type { Reporter, SessionState, SessionSummary } from '../shared/models';
import { config } from '../shared/utils/environment';
import { RecordProcessingError, describeError } from '../shared/utils/error-handling';
import { OutputWriter } from '../shared/utils/file-handler';
import {
  FlushScheduler,
  createProcessingSession,
  formatCompletion,
  formatProgress,
  formatProgressSaved,
  formatRerunHint,
  formatStartMessage,
  summarizeSession
} from '../shared/utils/progress-tracker';
import { countOutputRows } from './checkpoint-resolver';
import { openInputCursor } from './input-cursor';
import { transformRow } from './row-transformer';
import type { ValidationDispatcher } from './validation-dispatcher';

export interface ProcessEndpointOptions {
  dispatcher: ValidationDispatcher;
  reporter?: Reporter;
  flushInterval?: number;
  /** Checked between records only; a record in flight is always finished and written */
  signal?: AbortSignal;
}

/**
 * Annotates every endpoint of `inputPath` into `outputPath`, resuming after the
 * rows a previous run already wrote there.
 *
 * Resolves with the summary of a complete or interrupted run. A failure while
 * reading, validating or writing a record rejects with a RecordProcessingError
 * once everything written so far is flushed.
 */
export async function processEndpointFile(
  inputPath: string,
  outputPath: string = config.defaultOutputPath,
  options: ProcessEndpointOptions
): Promise<SessionSummary> {
  const { dispatcher, reporter = console, flushInterval = config.flushInterval, signal } = options;

  const existingRows = await countOutputRows(outputPath, reporter);
  const session = createProcessingSession(existingRows);
  reporter.log(formatStartMessage(session));

  const cursor = await openInputCursor(inputPath, existingRows, reporter);

  let writer: OutputWriter;
  try {
    writer = await OutputWriter.open(outputPath, session.mode);
  } catch (error) {
    await cursor.close();
    throw error;
  }

  const scheduler = new FlushScheduler(flushInterval);
  const records = cursor[Symbol.asyncIterator]();
  let state: SessionState = 'complete';
  let failure: unknown;

  try {
    for (;;) {
      if (signal?.aborted) {
        state = 'interrupted';
        break;
      }

      const next = await records.next();
      if (next.done) {
        break;
      }

      const result = await dispatcher(next.value);
      const { output, statusLine } = transformRow(next.value, result);
      reporter.log(statusLine);

      writer.writeRow(output);
      session.totalRowsInOutput++;
      session.rowsProcessed++;

      if (scheduler.recordWritten()) {
        await writer.flush();
        reporter.log(formatProgress(session));
      }
    }
  } catch (error) {
    state = 'aborted';
    failure = error;
  } finally {
    try {
      await writer.close();
    } catch (closeError) {
      if (state === 'aborted') {
        reporter.error(`Warning: Final flush of ${outputPath} failed: ${describeError(closeError)}`);
      } else {
        state = 'aborted';
        failure = closeError;
      }
    }
    await cursor.close();
  }

  const summary = summarizeSession(session, state, outputPath);

  if (state === 'interrupted') {
    reporter.log(`\nProcessing interrupted by user. ${formatProgressSaved(summary)}`);
    reporter.log(formatRerunHint(summary));
    return summary;
  }

  if (state === 'aborted') {
    const message = describeError(failure);
    reporter.error(`\nError during processing at row ${summary.resumeFromRow}: ${message}`);
    reporter.log(formatProgressSaved(summary));
    reporter.log(formatRerunHint(summary));
    throw new RecordProcessingError(
      `Processing failed at row ${summary.resumeFromRow}: ${message}`,
      summary.resumeFromRow,
      summary,
      { cause: failure }
    );
  }

  formatCompletion(summary).forEach(line => reporter.log(line));
  return summary;
}
