import { BaseError } from './base.error';

/**
 * Webhook error - callback POST failed or returned non-2xx
 */
export class WebhookError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'WEBHOOK_ERROR', 502, context);
  }
}
