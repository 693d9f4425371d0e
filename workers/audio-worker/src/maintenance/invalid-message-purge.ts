import { createLogger, isMalformed, type QueueClient } from '@tracklab/core';
import { decodeMessage, encodeWrappedMessage } from '../dispatch/message-codec';

const logger = createLogger('invalid-message-purge');

export type PurgeOptions = {
  defaultKind: string;
  dryRun: boolean;
  batchSize?: number;
  waitTimeSeconds?: number;
  /** Long enough to hold messages until the scan ends */
  holdSeconds?: number;
};

export type PurgeSummary = {
  checked: number;
  deleted: number;
  kept: number;
  requeued: number;
  failed: number;
  reasons: Record<string, number>;
};

type Requeue = {
  messageId: string;
  receiptHandle: string;
  body: string;
};

/**
 * Scan the queue once and delete every message that can never decode.
 *
 * Receiving a message raises its receive count, which the consumer reads as
 * a spent attempt. Valid messages are therefore re-sent once the scan ends,
 * with their attempt number in the headers, and the originals deleted.
 * Malformed messages kept by a dry run are released as they are.
 */
export async function purgeInvalidMessages(queue: QueueClient, options: PurgeOptions): Promise<PurgeSummary> {
  const summary: PurgeSummary = { checked: 0, deleted: 0, kept: 0, requeued: 0, failed: 0, reasons: {} };
  const held: string[] = [];
  const requeue: Requeue[] = [];
  const seen = new Set<string>();

  try {
    for (;;) {
      const messages = await queue.receive({
        maxMessages: options.batchSize ?? 10,
        waitTimeSeconds: options.waitTimeSeconds ?? 5,
        visibilityTimeoutSeconds: options.holdSeconds ?? 120
      });

      const fresh = messages.filter((message) => !seen.has(message.messageId));
      if (fresh.length === 0) break;

      for (const message of fresh) {
        seen.add(message.messageId);
        summary.checked++;

        const decoded = decodeMessage(message.body, {
          defaultKind: options.defaultKind,
          messageId: message.messageId
        });

        if (!isMalformed(decoded)) {
          summary.kept++;
          // This receive is not a delivery; earlier ones were
          const attempt = Math.max(decoded.attempt, message.receiveCount - 1);
          requeue.push({
            messageId: message.messageId,
            receiptHandle: message.receiptHandle,
            body: encodeWrappedMessage(decoded, attempt)
          });
          continue;
        }

        summary.reasons[decoded.reason] = (summary.reasons[decoded.reason] ?? 0) + 1;

        if (options.dryRun) {
          logger.info({ messageId: message.messageId, reason: decoded.reason }, 'Would delete malformed message');
          held.push(message.receiptHandle);
          continue;
        }

        try {
          await queue.delete(message.receiptHandle);
          summary.deleted++;
          logger.info({ messageId: message.messageId, reason: decoded.reason, preview: message.body.slice(0, 50) }, 'Deleted malformed message');
        } catch (error) {
          summary.failed++;
          logger.error({ messageId: message.messageId, error }, 'Failed to delete message');
        }
      }
    }
  } finally {
    for (const message of requeue) {
      if (await requeueMessage(queue, message)) {
        summary.requeued++;
      } else {
        held.push(message.receiptHandle);
      }
    }

    for (const receiptHandle of held) {
      try {
        await queue.changeVisibility(receiptHandle, 0);
      } catch (error) {
        logger.warn({ error }, 'Failed to release held message');
      }
    }
  }

  return summary;
}

/**
 * Send the copy, then drop the original. Returns false when the original
 * still has to be released.
 */
async function requeueMessage(queue: QueueClient, message: Requeue): Promise<boolean> {
  try {
    await queue.send(message.body, 0);
  } catch (error) {
    logger.warn({ messageId: message.messageId, error }, 'Failed to re-send valid message, releasing original');
    return false;
  }

  try {
    await queue.delete(message.receiptHandle);
  } catch (error) {
    // The copy is already queued; handlers are idempotent
    logger.error({ messageId: message.messageId, error }, 'Failed to delete original after re-send');
  }

  return true;
}
