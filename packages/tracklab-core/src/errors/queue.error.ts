import { BaseError } from './base.error';

/**
 * Queue error - broker call failed
 */
export class QueueError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'QUEUE_ERROR', 503, context);
  }
}
