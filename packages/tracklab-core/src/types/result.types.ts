import { isBaseError, toError } from '../errors/base.error';

/**
 * Explicit handler outcome. The executor's retry decision reads
 * the variant instead of catching everything.
 */
export type TaskResult<T> =
  | { type: 'success'; value: T }
  | { type: 'retryable'; error: Error }
  | { type: 'fatal'; error: Error };

export function succeed<T>(value: T): TaskResult<T> {
  return { type: 'success', value };
}

export function retryable<T = never>(error: Error): TaskResult<T> {
  return { type: 'retryable', error };
}

export function fatal<T = never>(error: Error): TaskResult<T> {
  return { type: 'fatal', error };
}

/**
 * Classify a thrown value: errors marked non-retryable are fatal,
 * anything else (including unknown values) is retryable
 */
export function fromError<T = never>(error: unknown): TaskResult<T> {
  const normalized = toError(error);
  return isBaseError(normalized) && !normalized.retryable ? fatal(normalized) : retryable(normalized);
}
