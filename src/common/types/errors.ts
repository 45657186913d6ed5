/**
 * Base error types shared across modules
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * A validation problem tied to one row of a tabular input.
 * `row` is the 1-based line number in the source file (the header is line 1).
 */
export interface RowError {
  readonly row: number;
  readonly field?: string | undefined;
  readonly value?: unknown;
  readonly message: string;
}

export const createRowError = (
  row: number,
  message: string,
  field?: string,
  value?: unknown
): RowError => ({
  row,
  message,
  ...(field !== undefined && { field }),
  ...(value !== undefined && { value }),
});

/**
 * Errors reading an input file from disk
 */
export type FileSourceError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string };

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
};
