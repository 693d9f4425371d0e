import {
  createLogger,
  isMalformed,
  sleep,
  toError,
  type QueueClient,
  type QueueMessage,
  type TaskInvocation
} from '@tracklab/core';
import type { WorkerSettings } from '../config/worker-settings';
import { decodeMessage } from '../dispatch/message-codec';
import { resolveTaskKind } from '../dispatch/task-registry';
import type { ExecutionOutcome, TaskExecutor } from '../executor/task-executor';
import { sweepTempDirectory } from '../tasks/cleanup-temp';

const logger = createLogger('queue-consumer');

const STATS_LOG_INTERVAL_MS = 5 * 60 * 1000;

export type ConsumerStats = {
  polls: number;
  idlePolls: number;
  received: number;
  succeeded: number;
  retried: number;
  exhausted: number;
  discarded: number;
};

export type MessageDisposition = 'discarded' | ExecutionOutcome['state'];

/**
 * Long-polls the queue with a fixed set of independent pollers and
 * hands each message to the executor
 */
export class QueueConsumer {
  protected running: boolean = false;
  protected jobsInFlight: number = 0;

  private readonly stats: ConsumerStats = {
    polls: 0,
    idlePolls: 0,
    received: 0,
    succeeded: 0,
    retried: 0,
    exhausted: 0,
    discarded: 0
  };

  private abortController = new AbortController();
  private pollers: Promise<void>[] = [];
  private timers: NodeJS.Timeout[] = [];

  constructor(
    private readonly settings: WorkerSettings,
    private readonly queue: QueueClient,
    private readonly executor: TaskExecutor
  ) {
    logger.info({
      pollerCount: settings.queue.pollerCount,
      waitTimeSeconds: settings.queue.waitTimeSeconds,
      visibilityTimeoutSeconds: settings.queue.visibilityTimeoutSeconds,
      retryStrategy: settings.retry.strategy
    }, 'Consumer initialized');
  }

  /**
   * Start the pollers. Resolves once they have all stopped.
   */
  async start(): Promise<void> {
    if (this.running) return;

    this.running = true;
    this.abortController = new AbortController();

    logger.info({ pollerCount: this.settings.queue.pollerCount }, 'Consumer starting');

    this.startHousekeeping();

    this.pollers = Array.from({ length: this.settings.queue.pollerCount }, (_, index) => this.pollLoop(index));
    await Promise.all(this.pollers);
  }

  /**
   * Stop fetching and wait for in-flight messages to finish
   */
  async stop(): Promise<void> {
    logger.info('Consumer stopping');
    this.running = false;
    this.abortController.abort();

    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];

    while (this.jobsInFlight > 0) {
      logger.info({ jobsInFlight: this.jobsInFlight }, 'Waiting for jobs to complete');
      await sleep(1000);
    }

    await Promise.all(this.pollers);

    logger.info({ stats: this.getStats() }, 'Consumer stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): ConsumerStats {
    return { ...this.stats };
  }

  /**
   * Receive once and process whatever arrived. Returns the number of messages.
   */
  async pollOnce(poller: number = 0): Promise<number> {
    this.stats.polls++;

    const messages = await this.queue.receive(
      {
        maxMessages: this.settings.queue.batchSize,
        waitTimeSeconds: this.settings.queue.waitTimeSeconds,
        visibilityTimeoutSeconds: this.settings.queue.visibilityTimeoutSeconds
      },
      this.abortController.signal
    );

    if (messages.length === 0) {
      this.stats.idlePolls++;
      return 0;
    }

    this.stats.received += messages.length;

    for (const message of messages) {
      this.jobsInFlight++;
      try {
        await this.handleMessage(message, poller);
      } finally {
        this.jobsInFlight--;
      }
    }

    return messages.length;
  }

  /**
   * Decode, route, execute and acknowledge one message
   */
  async handleMessage(message: QueueMessage, poller: number = 0): Promise<MessageDisposition> {
    const decoded = decodeMessage(message.body, {
      defaultKind: this.settings.defaultTask,
      messageId: message.messageId
    });

    if (isMalformed(decoded)) {
      logger.warn({
        messageId: message.messageId,
        reason: decoded.reason,
        detail: decoded.detail,
        poller
      }, 'Discarding malformed message');

      return this.discard(message);
    }

    const kind = resolveTaskKind(decoded.kind);

    if (!kind) {
      logger.error({
        messageId: message.messageId,
        taskId: decoded.id,
        task: decoded.kind,
        poller
      }, 'Unknown task kind, discarding message');

      return this.discard(message);
    }

    const invocation: TaskInvocation = {
      ...decoded,
      // Redeliveries after a visibility timeout carry no attempt header
      attempt: Math.max(decoded.attempt, message.receiveCount - 1)
    };

    const outcome = await this.executor.execute(invocation, kind);

    switch (outcome.state) {
      case 'succeeded':
        this.stats.succeeded++;
        await this.acknowledge(message);
        break;
      case 'exhausted':
        this.stats.exhausted++;
        await this.acknowledge(message);
        break;
      case 'retry_scheduled':
        this.stats.retried++;
        if (outcome.resubmitted) {
          await this.acknowledge(message);
        } else {
          await this.deferRedelivery(message, outcome.delaySeconds);
        }
        break;
    }

    return outcome.state;
  }

  private async pollLoop(poller: number): Promise<void> {
    logger.debug({ poller }, 'Poller started');

    while (this.running) {
      try {
        await this.pollOnce(poller);
      } catch (error) {
        if (!this.running) break;

        logger.error({
          poller,
          error: toError(error).message,
          retryInSeconds: this.settings.queue.errorBackoffSeconds
        }, 'Queue poll failed');

        await sleep(this.settings.queue.errorBackoffSeconds * 1000);
      }
    }

    logger.debug({ poller }, 'Poller stopped');
  }

  private async discard(message: QueueMessage): Promise<'discarded'> {
    this.stats.discarded++;
    await this.acknowledge(message);
    return 'discarded';
  }

  private async acknowledge(message: QueueMessage): Promise<void> {
    try {
      await this.queue.delete(message.receiptHandle);
    } catch (error) {
      // The broker redelivers after the visibility timeout; handlers are idempotent
      logger.error({ messageId: message.messageId, error: toError(error).message }, 'Failed to delete message');
    }
  }

  private async deferRedelivery(message: QueueMessage, delaySeconds: number): Promise<void> {
    try {
      await this.queue.changeVisibility(message.receiptHandle, delaySeconds);
    } catch (error) {
      logger.error({
        messageId: message.messageId,
        delaySeconds,
        error: toError(error).message
      }, 'Failed to set retry delay, message reappears after its visibility timeout');
    }
  }

  private startHousekeeping(): void {
    const { intervalSeconds, tempDir, maxAgeSeconds, staleAgeSeconds } = this.settings.cleanup;

    if (intervalSeconds > 0) {
      const timer = setInterval(() => {
        sweepTempDirectory(tempDir, { maxAgeSeconds, staleAgeSeconds })
          .then((result) => {
            if (result.deletedCount > 0 || result.failedCount > 0) {
              logger.info({ ...result }, 'Periodic temp sweep');
            }
          })
          .catch((error: unknown) => {
            logger.warn({ error: toError(error).message }, 'Periodic temp sweep failed');
          });
      }, intervalSeconds * 1000);
      timer.unref();
      this.timers.push(timer);
    }

    const statsTimer = setInterval(() => {
      logger.info({ stats: this.getStats(), jobsInFlight: this.jobsInFlight }, 'Consumer stats');
    }, STATS_LOG_INTERVAL_MS);
    statsTimer.unref();
    this.timers.push(statsTimer);
  }
}
