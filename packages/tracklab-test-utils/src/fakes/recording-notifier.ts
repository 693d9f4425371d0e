import { WebhookError, type Notifier, type WebhookEndpoint, type WebhookEnvelope } from '@tracklab/core';

export type RecordedCall = {
  endpoint: WebhookEndpoint;
  envelope: WebhookEnvelope;
  delivered: boolean;
};

/**
 * Records every callback attempt; endpoints in `failing` reject
 */
export class RecordingNotifier implements Notifier {
  readonly calls: RecordedCall[] = [];
  readonly failing = new Set<WebhookEndpoint>();

  async notify(endpoint: WebhookEndpoint, envelope: WebhookEnvelope): Promise<void> {
    const delivered = !this.failing.has(endpoint);
    this.calls.push({ endpoint, envelope, delivered });

    if (!delivered) {
      throw new WebhookError(`Webhook ${endpoint} failed: Request failed with status code 503`, { endpoint });
    }
  }

  callsTo(endpoint: WebhookEndpoint): RecordedCall[] {
    return this.calls.filter((call) => call.endpoint === endpoint);
  }
}
