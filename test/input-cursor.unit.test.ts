// Unit tests for input resynchronization
import { describe, it, expect, vi } from 'vitest';
import { createInputCursor } from '../src/pipeline/input-cursor';
import type { InputRecord, Reporter } from '../src/shared/models';

function createReporter() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Reporter;
}

async function* recordsOf(rows: InputRecord[]): AsyncGenerator<InputRecord> {
  for (const row of rows) {
    yield row;
  }
}

async function collect(iterable: AsyncIterable<InputRecord>): Promise<InputRecord[]> {
  const rows: InputRecord[] = [];
  for await (const row of iterable) {
    rows.push(row);
  }
  return rows;
}

const HEADER = ['NPI', 'EndpointType', 'EndpointDescription', 'Endpoint'];
const ROWS = [
  ['1000000001', 'EMAIL', '', 'a@example.com'],
  ['1000000002', 'EMAIL', '', 'b@example.com'],
  ['1000000003', 'DIRECT', '', 'c@direct.example'],
  ['1000000004', 'OTHER', '', 'https://example.com']
];

describe('Input Cursor Unit Tests', () => {
  it('should drop only the header on a fresh run', async () => {
    const reporter = createReporter();
    const cursor = await createInputCursor(recordsOf([HEADER, ...ROWS]), 0, reporter);

    expect(cursor.skipped).toBe(0);
    expect(await collect(cursor)).toEqual(ROWS);
    expect(reporter.log).not.toHaveBeenCalled();
  });

  it('should skip exactly the checkpoint count after the header', async () => {
    const reporter = createReporter();
    const cursor = await createInputCursor(recordsOf([HEADER, ...ROWS]), 2, reporter);

    expect(cursor.skipped).toBe(2);
    expect(await collect(cursor)).toEqual(ROWS.slice(2));
    expect(reporter.log).toHaveBeenCalledWith('Skipping 2 already processed rows...');
    expect(reporter.warn).not.toHaveBeenCalled();
  });

  it('should yield nothing when the checkpoint covers the whole input', async () => {
    const reporter = createReporter();
    const cursor = await createInputCursor(recordsOf([HEADER, ...ROWS]), 4, reporter);

    expect(cursor.skipped).toBe(4);
    expect(await collect(cursor)).toEqual([]);
    expect(reporter.warn).not.toHaveBeenCalled();
  });

  it('should warn and continue from the end when the input is shorter than the checkpoint', async () => {
    const reporter = createReporter();
    const cursor = await createInputCursor(recordsOf([HEADER, ...ROWS]), 7, reporter);

    expect(cursor.skipped).toBe(4);
    expect(await collect(cursor)).toEqual([]);
    expect(reporter.warn).toHaveBeenCalledTimes(1);
    expect(reporter.warn).toHaveBeenCalledWith('Warning: Input file has fewer rows than output. Starting from end of input.');
  });

  it('should handle an input with no rows at all', async () => {
    const reporter = createReporter();
    const fresh = await createInputCursor(recordsOf([]), 0, reporter);
    expect(await collect(fresh)).toEqual([]);

    const resumed = await createInputCursor(recordsOf([]), 1, reporter);
    expect(resumed.skipped).toBe(0);
    expect(await collect(resumed)).toEqual([]);
    expect(reporter.warn).toHaveBeenCalledTimes(1);
  });

  it('should release the underlying records on close', async () => {
    const release = vi.fn();
    async function* tracked(): AsyncGenerator<InputRecord> {
      try {
        yield HEADER;
        yield* ROWS;
      } finally {
        release();
      }
    }

    const cursor = await createInputCursor(tracked(), 0);
    const iterator = cursor[Symbol.asyncIterator]();
    const first = await iterator.next();
    await cursor.close();

    expect(first.value).toEqual(ROWS[0]);
    expect(release).toHaveBeenCalledTimes(1);
  });
});
