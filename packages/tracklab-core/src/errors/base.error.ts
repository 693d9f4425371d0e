/**
 * Base error for every failure the worker classifies.
 *
 * `retryable` tells the executor whether another attempt could succeed;
 * content problems (corrupt audio, bad arguments) are not retryable.
 */
export class BaseError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly context?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    context?: Record<string, unknown>,
    retryable: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.retryable = retryable;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context
    };
  }
}

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Normalize any thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  return new Error(`Non-error thrown: ${JSON.stringify(value)}`);
}

/**
 * Error code used in FAILURE payloads
 */
export function errorCode(error: unknown): string {
  return isBaseError(error) ? error.code : 'INTERNAL_ERROR';
}
