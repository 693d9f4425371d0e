import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  GetQueueAttributesCommand,
  ReceiveMessageCommand,
  SendMessageCommand,
  SQSClient
} from '@aws-sdk/client-sqs';
import {
  QUEUE_MAX_DELAY_SEC,
  QueueError,
  createLogger,
  toError,
  type QueueClient,
  type QueueMessage,
  type ReceiveOptions
} from '@tracklab/core';
import type { WorkerSettings } from '../config/worker-settings';

const logger = createLogger('sqs-queue');

/**
 * Queue client for Amazon SQS (or an SQS-compatible endpoint)
 */
export class SqsQueueClient implements QueueClient {
  private readonly client: SQSClient;
  private readonly queueUrl: string;

  constructor(settings: WorkerSettings['queue'], client?: SQSClient) {
    this.queueUrl = settings.url;
    this.client = client ?? new SQSClient({
      region: settings.region,
      ...(settings.endpoint ? { endpoint: settings.endpoint } : {})
    });

    logger.info({ queueUrl: this.queueUrl, region: settings.region }, 'SQS client initialized');
  }

  async receive(options: ReceiveOptions, signal?: AbortSignal): Promise<QueueMessage[]> {
    const output = await this.call('receive', () =>
      this.client.send(
        new ReceiveMessageCommand({
          QueueUrl: this.queueUrl,
          MaxNumberOfMessages: options.maxMessages,
          WaitTimeSeconds: options.waitTimeSeconds,
          VisibilityTimeout: options.visibilityTimeoutSeconds,
          MessageSystemAttributeNames: ['ApproximateReceiveCount']
        }),
        { abortSignal: signal }
      )
    );

    const messages: QueueMessage[] = [];

    for (const message of output.Messages ?? []) {
      if (!message.ReceiptHandle) {
        logger.warn({ messageId: message.MessageId }, 'Skipping message without receipt handle');
        continue;
      }

      messages.push({
        messageId: message.MessageId ?? 'unknown',
        receiptHandle: message.ReceiptHandle,
        body: message.Body ?? '',
        receiveCount: Number(message.Attributes?.ApproximateReceiveCount ?? '1') || 1
      });
    }

    return messages;
  }

  async delete(receiptHandle: string): Promise<void> {
    await this.call('delete', () =>
      this.client.send(new DeleteMessageCommand({ QueueUrl: this.queueUrl, ReceiptHandle: receiptHandle }))
    );
  }

  async changeVisibility(receiptHandle: string, seconds: number): Promise<void> {
    await this.call('changeVisibility', () =>
      this.client.send(
        new ChangeMessageVisibilityCommand({
          QueueUrl: this.queueUrl,
          ReceiptHandle: receiptHandle,
          VisibilityTimeout: seconds
        })
      )
    );
  }

  async send(body: string, delaySeconds: number = 0): Promise<string | undefined> {
    const output = await this.call('send', () =>
      this.client.send(
        new SendMessageCommand({
          QueueUrl: this.queueUrl,
          MessageBody: body,
          DelaySeconds: Math.min(Math.max(0, Math.round(delaySeconds)), QUEUE_MAX_DELAY_SEC)
        })
      )
    );

    return output.MessageId;
  }

  async probe(): Promise<void> {
    await this.call('probe', () =>
      this.client.send(
        new GetQueueAttributesCommand({
          QueueUrl: this.queueUrl,
          AttributeNames: ['ApproximateNumberOfMessages']
        })
      )
    );
  }

  destroy(): void {
    this.client.destroy();
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new QueueError(`SQS ${operation} failed: ${toError(error).message}`, {
        operation,
        queueUrl: this.queueUrl
      });
    }
  }
}
