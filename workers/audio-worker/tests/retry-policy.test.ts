import { describe, it, expect } from 'vitest';
import { backoffDelaySeconds, decideRetry, type RetryPolicy } from '../src/executor/retry-policy';

const policy: RetryPolicy = {
  maxRetries: 3,
  baseDelaySeconds: 60,
  maxDelaySeconds: 300,
  strategy: 'visibility',
  retryFatalErrors: true
};

describe('backoffDelaySeconds', () => {
  it('should double from the base up to the cap', () => {
    expect([0, 1, 2, 3, 4].map((attempt) => backoffDelaySeconds(attempt, policy))).toEqual([60, 120, 240, 300, 300]);
  });
});

describe('decideRetry', () => {
  it('should retry until the attempt reaches maxRetries', () => {
    expect(decideRetry('analyze_audio', 'retryable', 0, policy)).toEqual({ action: 'retry', delaySeconds: 60, nextAttempt: 1 });
    expect(decideRetry('analyze_audio', 'retryable', 2, policy)).toEqual({ action: 'retry', delaySeconds: 240, nextAttempt: 3 });
    expect(decideRetry('analyze_audio', 'retryable', 3, policy)).toEqual({ action: 'give_up', reason: 'max_retries' });
  });

  it('should retry fatal failures only when configured to', () => {
    expect(decideRetry('mix_stems', 'fatal', 0, policy)).toMatchObject({ action: 'retry' });
    expect(decideRetry('mix_stems', 'fatal', 0, { ...policy, retryFatalErrors: false })).toEqual({
      action: 'give_up',
      reason: 'fatal'
    });
  });

  it('should never retry health checks or cleanup', () => {
    expect(decideRetry('health_check', 'retryable', 0, policy)).toEqual({ action: 'give_up', reason: 'not_retried' });
    expect(decideRetry('cleanup_temp', 'retryable', 0, policy)).toEqual({ action: 'give_up', reason: 'not_retried' });
  });

  it('should give up immediately when maxRetries is zero', () => {
    expect(decideRetry('hash_and_notify', 'retryable', 0, { ...policy, maxRetries: 0 })).toEqual({
      action: 'give_up',
      reason: 'max_retries'
    });
  });
});
