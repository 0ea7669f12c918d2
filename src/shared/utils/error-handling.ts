// Error handling utilities
import type { SessionSummary } from '../models';

export interface ErrorContext {
  operation: string;
  path?: string;
}

/**
 * Raised when a record cannot be validated, read or written. The session has
 * already flushed and closed its streams when this reaches the caller.
 */
export class RecordProcessingError extends Error {
  constructor(
    message: string,
    public rowNumber: number,
    public summary: SessionSummary,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RecordProcessingError';
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Renders any thrown value as a message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error';
}

/**
 * Wraps an error with the failing operation, keeping the original as cause
 */
export function wrapError(error: unknown, context: ErrorContext): Error {
  const target = context.path ? ` ${context.path}` : '';
  return new Error(`Failed to ${context.operation}${target}: ${describeError(error)}`, { cause: error });
}

/**
 * True for filesystem errors carrying the given code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
