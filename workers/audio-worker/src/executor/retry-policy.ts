import type { TaskKind } from '@tracklab/core';
import type { WorkerSettings } from '../config/worker-settings';
import { isRetriedKind } from '../dispatch/task-registry';

export type RetryPolicy = WorkerSettings['retry'];

export type RetryDecision =
  | { action: 'retry'; delaySeconds: number; nextAttempt: number }
  | { action: 'give_up'; reason: 'max_retries' | 'fatal' | 'not_retried' };

/**
 * min(base * 2^attempt, cap), attempt counted from 0
 */
export function backoffDelaySeconds(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseDelaySeconds' | 'maxDelaySeconds'>
): number {
  return Math.min(policy.baseDelaySeconds * 2 ** attempt, policy.maxDelaySeconds);
}

export function decideRetry(
  kind: TaskKind,
  failure: 'retryable' | 'fatal',
  attempt: number,
  policy: RetryPolicy
): RetryDecision {
  if (!isRetriedKind(kind)) {
    return { action: 'give_up', reason: 'not_retried' };
  }

  if (failure === 'fatal' && !policy.retryFatalErrors) {
    return { action: 'give_up', reason: 'fatal' };
  }

  if (attempt >= policy.maxRetries) {
    return { action: 'give_up', reason: 'max_retries' };
  }

  return {
    action: 'retry',
    delaySeconds: backoffDelaySeconds(attempt, policy),
    nextAttempt: attempt + 1
  };
}
