// Progress tracking utilities
import type { ProcessingSession, SessionSummary } from '../models';

export const DEFAULT_FLUSH_INTERVAL = 50;

/**
 * Counts rows written in the current run and signals every `interval` rows
 * that the output must be forced to disk.
 */
export class FlushScheduler {
  private written = 0;

  constructor(public readonly interval: number = DEFAULT_FLUSH_INTERVAL) {
    if (!Number.isInteger(interval) || interval < 1) {
      throw new Error(`Flush interval must be a positive integer, got ${interval}`);
    }
  }

  /**
   * Records one written row; true when a flush is due
   */
  recordWritten(): boolean {
    this.written++;
    return this.written % this.interval === 0;
  }

  get rowsWritten(): number {
    return this.written;
  }
}

/**
 * Creates the run state from the checkpoint count
 */
export function createProcessingSession(existingRows: number): ProcessingSession {
  return {
    existingRows,
    mode: existingRows > 0 ? 'append' : 'fresh',
    totalRowsInOutput: existingRows,
    rowsProcessed: 0
  };
}

export function summarizeSession(
  session: ProcessingSession,
  state: SessionSummary['state'],
  outputPath: string
): SessionSummary {
  return {
    state,
    outputPath,
    existingRows: session.existingRows,
    rowsProcessed: session.rowsProcessed,
    totalRowsInOutput: session.totalRowsInOutput,
    resumeFromRow: session.totalRowsInOutput + 1
  };
}

export function formatProgress(session: ProcessingSession): string {
  return `Progress: ${session.rowsProcessed} rows processed in this session, ${session.totalRowsInOutput} total rows in output`;
}

export function formatStartMessage(session: ProcessingSession): string {
  if (session.mode === 'append') {
    return `Found existing output with ${session.existingRows} rows. Resuming from row ${session.existingRows + 1}...`;
  }

  return 'Starting fresh processing...';
}

export function formatProgressSaved(summary: SessionSummary): string {
  return `Progress saved: ${summary.totalRowsInOutput} rows in output.`;
}

/**
 * Where the next run picks up after an interrupted or failed one
 */
export function formatRerunHint(summary: SessionSummary): string {
  return `Run the script again to resume from row ${summary.resumeFromRow}`;
}

export function formatCompletion(summary: SessionSummary): string[] {
  const lines = [
    '\nProcessing complete!',
    `Total rows written to ${summary.outputPath}: ${summary.totalRowsInOutput}`
  ];

  if (summary.existingRows > 0) {
    lines.push(`(Resumed from row ${summary.existingRows + 1}, processed ${summary.rowsProcessed} new rows in this session)`);
  }

  return lines;
}
