import { BaseError } from './base.error';

/**
 * Task validation error - for invalid task arguments or rejected input files
 */
export class TaskValidationError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TASK_VALIDATION_ERROR', 400, context, false);
  }
}
