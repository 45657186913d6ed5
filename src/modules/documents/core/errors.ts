/**
 * Domain errors for the documents module.
 */

export interface NetworkError {
  readonly type: 'NetworkError';
  readonly message: string;
  readonly cause?: unknown;
}

export interface TimeoutError {
  readonly type: 'TimeoutError';
  readonly message: string;
  readonly timeoutMs: number;
}

export interface HttpError {
  readonly type: 'HttpError';
  readonly message: string;
  readonly status: number;
}

export interface ParseError {
  readonly type: 'ParseError';
  readonly message: string;
}

export type DocumentFetchError = NetworkError | TimeoutError | HttpError | ParseError;

export const createNetworkError = (message: string, cause?: unknown): NetworkError => ({
  type: 'NetworkError',
  message,
  cause,
});

export const createTimeoutError = (message: string, timeoutMs: number): TimeoutError => ({
  type: 'TimeoutError',
  message,
  timeoutMs,
});

export const createHttpError = (status: number, message: string): HttpError => ({
  type: 'HttpError',
  message,
  status,
});

export const createParseError = (message: string): ParseError => ({
  type: 'ParseError',
  message,
});
