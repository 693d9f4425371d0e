import {
  canTransition,
  createLogger,
  errorCode,
  fromError,
  nowIso,
  toError,
  type ProcessingResult,
  type TaskInvocation,
  type TaskKind,
  type TaskResult,
  type TaskState,
  type WebhookEndpoint
} from '@tracklab/core';
import { encodeWrappedMessage } from '../dispatch/message-codec';
import { defaultTaskHandlers, resolveHandler, type TaskHandlers } from '../tasks';
import type { TaskServices, TaskValue } from '../tasks/task-context';
import { buildEnvelope, notifyBestEffort } from '../webhook/notifier';
import { logMemoryUsage } from '../worker/resource-monitor';
import { decideRetry } from './retry-policy';
import { TempScope } from './temp-scope';

const logger = createLogger('task-executor');

export type ExecutionOutcome =
  | { state: 'succeeded'; result: ProcessingResult }
  | {
      state: 'retry_scheduled';
      error: Error;
      delaySeconds: number;
      nextAttempt: number;
      /** True when a delayed copy was queued and the original can be deleted */
      resubmitted: boolean;
    }
  | { state: 'exhausted'; result: ProcessingResult; error: Error };

/**
 * Endpoint that receives the FAILURE callback once a kind gives up
 */
export function failureEndpointFor(kind: TaskKind): WebhookEndpoint | null {
  switch (kind) {
    case 'hash_and_notify':
    case 'analyze_audio':
      return 'completion';
    case 'delete_duplicate':
      return 'duplicate-delete-complete';
    case 'mix_stems':
      return 'mixing-complete';
    case 'health_check':
    case 'cleanup_temp':
      return null;
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

function jobIdOf(invocation: TaskInvocation): string {
  for (const key of ['stemId', 'stageId', 'upstreamId']) {
    const value = invocation.args[key];
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return invocation.id;
}

/**
 * Runs one invocation through pending -> running -> terminal state
 */
export class TaskExecutor {
  private readonly handlers: TaskHandlers;

  constructor(
    private readonly services: TaskServices,
    handlers: TaskHandlers = defaultTaskHandlers
  ) {
    this.handlers = handlers;
  }

  async execute(invocation: TaskInvocation, kind: TaskKind): Promise<ExecutionOutcome> {
    let state: TaskState = 'pending';
    const transition = (next: TaskState): void => {
      if (!canTransition(state, next)) {
        throw new Error(`Invalid task state transition: ${state} -> ${next}`);
      }
      state = next;
    };

    const startTime = Date.now();
    const temp = new TempScope(this.services.settings.cleanup.tempDir, invocation.id);
    const handler = resolveHandler(kind, this.handlers);

    transition('running');
    logger.info({ taskId: invocation.id, kind, attempt: invocation.attempt }, 'Task started');
    logMemoryUsage('start', { taskId: invocation.id, kind });

    let result: TaskResult<TaskValue>;

    try {
      result = await handler(invocation.args, {
        ...this.services,
        taskId: invocation.id,
        attempt: invocation.attempt,
        temp
      });
    } catch (error) {
      result = fromError(error);
    } finally {
      const removed = await temp.release();
      logger.debug({ taskId: invocation.id, removed }, 'Temp files released');
    }

    logMemoryUsage('end', { taskId: invocation.id, kind });
    const duration = Date.now() - startTime;

    if (result.type === 'success') {
      transition('succeeded');
      logger.info({ taskId: invocation.id, kind, duration }, 'Task succeeded');

      return {
        state: 'succeeded',
        result: {
          taskId: invocation.id,
          kind,
          status: 'SUCCESS',
          result: result.value,
          processedAt: nowIso()
        }
      };
    }

    const error = result.error;
    const decision = decideRetry(kind, result.type, invocation.attempt, this.services.settings.retry);

    if (decision.action === 'retry') {
      transition('retry_scheduled');

      const resubmitted = await this.resubmit(invocation, decision.nextAttempt, decision.delaySeconds);

      logger.warn({
        taskId: invocation.id,
        kind,
        attempt: invocation.attempt,
        nextAttempt: decision.nextAttempt,
        delaySeconds: decision.delaySeconds,
        failure: result.type,
        error: error.message,
        duration
      }, 'Task failed, retry scheduled');

      return {
        state: 'retry_scheduled',
        error,
        delaySeconds: decision.delaySeconds,
        nextAttempt: decision.nextAttempt,
        resubmitted
      };
    }

    transition('exhausted');

    logger.error({
      taskId: invocation.id,
      kind,
      attempt: invocation.attempt,
      reason: decision.reason,
      code: errorCode(error),
      error: error.message,
      duration
    }, 'Task exhausted');

    const failure: ProcessingResult = {
      taskId: invocation.id,
      kind,
      status: 'FAILURE',
      result: {
        error: error.message,
        attempts: invocation.attempt + 1
      },
      processedAt: nowIso(),
      error: {
        code: errorCode(error),
        message: error.message
      }
    };

    const endpoint = failureEndpointFor(kind);
    if (endpoint) {
      await notifyBestEffort(
        this.services.notifier,
        endpoint,
        buildEnvelope(jobIdOf(invocation), invocation.id, 'FAILURE', {
          ...failure.result,
          code: errorCode(error)
        })
      );
    }

    return { state: 'exhausted', result: failure, error };
  }

  /**
   * In resubmit mode, queue a delayed copy carrying the next attempt number
   */
  private async resubmit(invocation: TaskInvocation, nextAttempt: number, delaySeconds: number): Promise<boolean> {
    if (this.services.settings.retry.strategy !== 'resubmit') {
      return false;
    }

    try {
      await this.services.queue.send(encodeWrappedMessage(invocation, nextAttempt), delaySeconds);
      return true;
    } catch (error) {
      // Falls back to visibility-timeout redelivery
      logger.error({ taskId: invocation.id, error: toError(error).message }, 'Retry resubmission failed');
      return false;
    }
  }
}
