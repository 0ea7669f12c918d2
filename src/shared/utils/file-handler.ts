// File handling utilities
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { OUTPUT_FIELDNAMES } from '../models';
import type { OutputMode, OutputRecord } from '../models';
import { wrapError } from './error-handling';

/**
 * Escapes a single CSV field
 */
export function escapeCSVValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

/**
 * Formats one CSV line, terminated with CRLF like the registry export
 */
export function formatCSVLine(values: readonly string[]): string {
  return values.map(escapeCSVValue).join(',') + '\r\n';
}

/**
 * Checks if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Buffered writer for the annotated output file. Rows reach the disk only on
 * flush(), which writes the buffer and syncs the file.
 */
export class OutputWriter {
  private pending: string[] = [];
  private closed = false;

  private constructor(private readonly handle: FileHandle, public readonly filePath: string) {}

  /**
   * Opens the output file. A fresh file is truncated and gets the header row;
   * an appended file is written after its existing rows.
   */
  static async open(filePath: string, mode: OutputMode): Promise<OutputWriter> {
    let handle: FileHandle;
    try {
      handle = await fs.open(filePath, mode === 'fresh' ? 'w' : 'a');
    } catch (error) {
      throw wrapError(error, { operation: 'open output file', path: filePath });
    }

    const writer = new OutputWriter(handle, filePath);
    if (mode === 'fresh') {
      writer.pending.push(formatCSVLine(OUTPUT_FIELDNAMES));
    }

    return writer;
  }

  writeRow(record: OutputRecord): void {
    if (this.closed) {
      throw new Error(`Output file ${this.filePath} is already closed`);
    }

    this.pending.push(formatCSVLine(OUTPUT_FIELDNAMES.map(field => record[field])));
  }

  get bufferedRows(): number {
    return this.pending.length;
  }

  async flush(): Promise<void> {
    if (this.closed) {
      return;
    }

    if (this.pending.length > 0) {
      const chunk = this.pending.join('');
      this.pending = [];
      await this.handle.write(chunk);
    }

    await this.handle.sync();
  }

  /**
   * Flushes anything still buffered and releases the file. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    try {
      await this.flush();
    } finally {
      this.closed = true;
      await this.handle.close();
    }
  }
}
