import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@tracklab/core';
import { createWorkerEnv } from '@tracklab/test-utils';
import { loadWorkerSettings } from '../src/config/worker-settings';

function configurationIssues(env: Record<string, string | undefined>): string[] {
  try {
    loadWorkerSettings(env);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  return [];
}

describe('loadWorkerSettings', () => {
  it('should apply defaults', () => {
    const settings = loadWorkerSettings(createWorkerEnv());

    expect(settings.retry).toEqual({
      maxRetries: 3,
      baseDelaySeconds: 60,
      maxDelaySeconds: 300,
      strategy: 'visibility',
      retryFatalErrors: true
    });
    expect(settings.queue).toMatchObject({
      url: 'http://localhost:4566/000000000000/audio-jobs',
      region: 'us-east-1',
      pollerCount: 1,
      waitTimeSeconds: 20,
      batchSize: 1
    });
    expect(settings.audio.ffmpegEnabled).toBe(false);
    expect(settings.audio.defaultPeakCount).toBe(1024);
    expect(settings.defaultTask).toBe('hash_and_notify');
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it('should parse overrides', () => {
    const settings = loadWorkerSettings(createWorkerEnv({
      WEBHOOK_BASE_URL: 'http://localhost:3000/webhooks/',
      RETRY_FATAL_ERRORS: 'false',
      RETRY_STRATEGY: 'resubmit',
      MAX_FILE_SIZE_MB: '2',
      ALLOWED_AUDIO_TYPES: ' audio/WAV , audio/ogg '
    }));

    expect(settings.webhook.baseUrl).toBe('http://localhost:3000/webhooks');
    expect(settings.retry.retryFatalErrors).toBe(false);
    expect(settings.retry.strategy).toBe('resubmit');
    expect(settings.audio.maxFileSizeBytes).toBe(2_097_152);
    expect(settings.audio.allowedAudioTypes).toEqual(['audio/wav', 'audio/ogg']);
  });

  it('should report missing required variables', () => {
    expect(configurationIssues(createWorkerEnv({ SQS_QUEUE_URL: undefined }))).toContain(
      'SQS_QUEUE_URL: SQS_QUEUE_URL is required'
    );
  });

  it('should reject out-of-range values', () => {
    expect(configurationIssues(createWorkerEnv({ VISIBILITY_TIMEOUT_SEC: '4000' }))).toContain(
      'VISIBILITY_TIMEOUT_SEC: VISIBILITY_TIMEOUT_SEC must not exceed 3600'
    );
    expect(configurationIssues(createWorkerEnv({ RETRY_MAX_DELAY_SEC: '30' }))).toContain(
      'RETRY_MAX_DELAY_SEC: RETRY_MAX_DELAY_SEC cannot be lower than RETRY_BASE_DELAY_SEC'
    );
  });

  it('should throw ConfigurationError', () => {
    expect(() => loadWorkerSettings(createWorkerEnv({ RETRY_STRATEGY: 'sometimes' }))).toThrow(ConfigurationError);
  });
});
