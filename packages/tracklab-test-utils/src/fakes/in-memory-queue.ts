import { QueueError, type QueueClient, type QueueMessage, type ReceiveOptions } from '@tracklab/core';

type StoredMessage = {
  messageId: string;
  body: string;
  receiveCount: number;
  visibleAt: number;
  receiptHandle: string | null;
};

/**
 * In-process queue with visibility timeouts driven by an injectable clock
 */
export class InMemoryQueue implements QueueClient {
  readonly deleted: string[] = [];
  readonly sent: Array<{ body: string; delaySeconds: number }> = [];
  readonly visibilityChanges: Array<{ messageId: string; seconds: number }> = [];

  private messages: StoredMessage[] = [];
  private sequence = 0;
  private receiveFailures: Error[] = [];
  probeError: Error | null = null;

  constructor(
    private readonly options: { now?: () => number; idleDelayMs?: number } = {}
  ) {}

  enqueue(body: string, options: { receiveCount?: number } = {}): string {
    const messageId = `msg-${++this.sequence}`;
    this.messages.push({
      messageId,
      body,
      receiveCount: options.receiveCount ?? 0,
      visibleAt: 0,
      receiptHandle: null
    });
    return messageId;
  }

  failNextReceive(error: Error = new QueueError('Broker unavailable')): void {
    this.receiveFailures.push(error);
  }

  get size(): number {
    return this.messages.length;
  }

  has(messageId: string): boolean {
    return this.messages.some((message) => message.messageId === messageId);
  }

  async receive(options: ReceiveOptions, signal?: AbortSignal): Promise<QueueMessage[]> {
    if (signal?.aborted) {
      throw new QueueError('Receive aborted');
    }

    const failure = this.receiveFailures.shift();
    if (failure) throw failure;

    const now = this.now();
    const visible = this.messages.filter((message) => message.visibleAt <= now).slice(0, options.maxMessages);

    if (visible.length === 0) {
      await this.idle(signal);
      return [];
    }

    return visible.map((message) => {
      message.receiveCount++;
      message.visibleAt = now + options.visibilityTimeoutSeconds * 1000;
      message.receiptHandle = `${message.messageId}:${message.receiveCount}`;

      return {
        messageId: message.messageId,
        receiptHandle: message.receiptHandle,
        body: message.body,
        receiveCount: message.receiveCount
      };
    });
  }

  async delete(receiptHandle: string): Promise<void> {
    const message = this.find(receiptHandle);
    this.messages = this.messages.filter((candidate) => candidate !== message);
    this.deleted.push(message.messageId);
  }

  async changeVisibility(receiptHandle: string, seconds: number): Promise<void> {
    const message = this.find(receiptHandle);
    message.visibleAt = this.now() + seconds * 1000;
    this.visibilityChanges.push({ messageId: message.messageId, seconds });
  }

  async send(body: string, delaySeconds: number = 0): Promise<string | undefined> {
    this.sent.push({ body, delaySeconds });
    const messageId = this.enqueue(body);
    const message = this.messages[this.messages.length - 1];
    message.visibleAt = this.now() + delaySeconds * 1000;
    return messageId;
  }

  async probe(): Promise<void> {
    if (this.probeError) throw this.probeError;
  }

  private find(receiptHandle: string): StoredMessage {
    const message = this.messages.find((candidate) => candidate.receiptHandle === receiptHandle);
    if (!message) {
      throw new QueueError(`Unknown receipt handle: ${receiptHandle}`);
    }
    return message;
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }

  private idle(signal?: AbortSignal): Promise<void> {
    const delay = this.options.idleDelayMs ?? 5;

    return new Promise((resolve) => {
      const timer = setTimeout(resolve, delay);
      signal?.addEventListener('abort', () => {
        clearTimeout(timer);
        resolve();
      }, { once: true });
    });
  }
}
