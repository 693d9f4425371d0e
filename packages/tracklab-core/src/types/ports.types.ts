import type { WebhookEndpoint, WebhookEnvelope } from '../schemas/webhook.schema';

/**
 * Object storage port. Transfer methods report success instead of
 * throwing; `probe` throws when the bucket is unreachable.
 */
export interface ObjectStore {
  download(key: string, localPath: string): Promise<boolean>;
  /** Returns the stored key, or null on failure */
  upload(localPath: string, key: string, contentType?: string): Promise<string | null>;
  /** Deleting a missing key counts as success */
  delete(key: string): Promise<boolean>;
  uploadJson(value: unknown, key: string): Promise<string | null>;
  probe(): Promise<void>;
}

/**
 * A message handed out by the broker
 */
export type QueueMessage = {
  messageId: string;
  receiptHandle: string;
  body: string;
  /** How many times the broker has delivered this message, starting at 1 */
  receiveCount: number;
};

export type ReceiveOptions = {
  maxMessages: number;
  waitTimeSeconds: number;
  visibilityTimeoutSeconds: number;
};

/**
 * Queue port. Every method throws QueueError on broker failure.
 */
export interface QueueClient {
  receive(options: ReceiveOptions, signal?: AbortSignal): Promise<QueueMessage[]>;
  delete(receiptHandle: string): Promise<void>;
  changeVisibility(receiptHandle: string, seconds: number): Promise<void>;
  send(body: string, delaySeconds?: number): Promise<string | undefined>;
  probe(): Promise<void>;
}

/**
 * Callback port. `notify` throws WebhookError on failure.
 */
export interface Notifier {
  notify(endpoint: WebhookEndpoint, envelope: WebhookEnvelope): Promise<void>;
}
