// Property-based tests for flush scheduling and progress reporting
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  DEFAULT_FLUSH_INTERVAL,
  FlushScheduler,
  createProcessingSession,
  formatCompletion,
  formatProgress,
  formatProgressSaved,
  formatRerunHint,
  formatStartMessage,
  summarizeSession
} from '../src/shared/utils/progress-tracker';

describe('Progress Tracking Properties', () => {
  /**
   * Property: a flush is due exactly at every multiple of the interval
   */
  it('should signal a flush exactly every interval rows', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 60 }),
        fc.integer({ min: 0, max: 300 }),
        (interval, rows) => {
          const scheduler = new FlushScheduler(interval);
          const due: number[] = [];

          for (let row = 1; row <= rows; row++) {
            if (scheduler.recordWritten()) {
              due.push(row);
            }
          }

          expect(scheduler.rowsWritten).toBe(rows);
          expect(due.length).toBe(Math.floor(rows / interval));
          due.forEach(row => expect(row % interval).toBe(0));

          // Rows left unflushed never reach a full interval
          expect(rows - (due[due.length - 1] ?? 0)).toBeLessThan(interval);
        }
      )
    );
  });

  it('should default to flushing every 50 rows', () => {
    const scheduler = new FlushScheduler();
    const results = Array.from({ length: 100 }, () => scheduler.recordWritten());

    expect(DEFAULT_FLUSH_INTERVAL).toBe(50);
    expect(results.filter(Boolean).length).toBe(2);
    expect(results[49]).toBe(true);
    expect(results[99]).toBe(true);
  });

  it('should reject intervals that are not positive integers', () => {
    expect(() => new FlushScheduler(0)).toThrow('Flush interval must be a positive integer, got 0');
    expect(() => new FlushScheduler(2.5)).toThrow('Flush interval must be a positive integer, got 2.5');
  });

  it('should pick the output mode from the checkpoint', () => {
    expect(createProcessingSession(0)).toEqual({ existingRows: 0, mode: 'fresh', totalRowsInOutput: 0, rowsProcessed: 0 });
    expect(createProcessingSession(12)).toEqual({ existingRows: 12, mode: 'append', totalRowsInOutput: 12, rowsProcessed: 0 });
  });

  it('should format start, progress and resume messages', () => {
    const session = createProcessingSession(100);
    session.rowsProcessed = 50;
    session.totalRowsInOutput = 150;
    const summary = summarizeSession(session, 'interrupted', 'out.csv');

    expect(formatStartMessage(createProcessingSession(0))).toBe('Starting fresh processing...');
    expect(formatStartMessage(createProcessingSession(100))).toBe('Found existing output with 100 rows. Resuming from row 101...');
    expect(formatProgress(session)).toBe('Progress: 50 rows processed in this session, 150 total rows in output');
    expect(summary.resumeFromRow).toBe(151);
    expect(formatProgressSaved(summary)).toBe('Progress saved: 150 rows in output.');
    expect(formatRerunHint(summary)).toBe('Run the script again to resume from row 151');
  });

  it('should mention the resume point in the completion report only for resumed runs', () => {
    const fresh = createProcessingSession(0);
    fresh.rowsProcessed = 3;
    fresh.totalRowsInOutput = 3;
    const resumed = createProcessingSession(1);
    resumed.rowsProcessed = 2;
    resumed.totalRowsInOutput = 3;

    expect(formatCompletion(summarizeSession(fresh, 'complete', 'out.csv'))).toEqual([
      '\nProcessing complete!',
      'Total rows written to out.csv: 3'
    ]);
    expect(formatCompletion(summarizeSession(resumed, 'complete', 'out.csv'))).toEqual([
      '\nProcessing complete!',
      'Total rows written to out.csv: 3',
      '(Resumed from row 2, processed 2 new rows in this session)'
    ]);
  });
});
