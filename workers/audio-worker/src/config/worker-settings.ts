import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import {
  ConfigurationError,
  taskKindEnum,
  CLEANUP_INTERVAL_SEC,
  CLEANUP_MAX_AGE_SEC,
  CLEANUP_STALE_AGE_SEC,
  DEFAULT_ALLOWED_AUDIO_TYPES,
  DEFAULT_MAX_FILE_SIZE_MB,
  DEFAULT_WAVEFORM_PEAKS,
  JOB_MAX_RETRIES,
  MAX_WAVEFORM_PEAKS,
  POLL_BATCH_SIZE,
  POLL_ERROR_BACKOFF_SEC,
  POLL_WAIT_SEC,
  RETRY_BASE_DELAY_SEC,
  RETRY_MAX_DELAY_SEC,
  VISIBILITY_TIMEOUT_MAX_SEC,
  VISIBILITY_TIMEOUT_SEC,
  WEBHOOK_TIMEOUT_MS
} from '@tracklab/core';

const booleanString = (fallback: boolean) =>
  z
    .union([z.enum(['true', 'false', '1', '0']), z.literal(''), z.undefined()])
    .transform((value) => (value === undefined || value === '' ? fallback : value === 'true' || value === '1'));

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const integer = (name: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .default(fallback);

export const retryStrategyEnum = z.enum(['visibility', 'resubmit']);

export type RetryStrategy = z.infer<typeof retryStrategyEnum>;

const envSchema = z
  .object({
    SQS_QUEUE_URL: required('SQS_QUEUE_URL').url('SQS_QUEUE_URL must be a valid URL'),
    SQS_ENDPOINT: z.string().url('SQS_ENDPOINT must be a valid URL').optional(),
    AWS_REGION: z.string().min(1).default('us-east-1'),
    STORAGE_BUCKET: required('STORAGE_BUCKET'),
    SUPABASE_URL: required('SUPABASE_URL').url('SUPABASE_URL must be a valid URL'),
    SUPABASE_SERVICE_ROLE_KEY: required('SUPABASE_SERVICE_ROLE_KEY'),
    WEBHOOK_BASE_URL: required('WEBHOOK_BASE_URL')
      .url('WEBHOOK_BASE_URL must be a valid URL')
      .transform((value) => value.replace(/\/+$/, '')),
    WEBHOOK_TIMEOUT_MS: integer('WEBHOOK_TIMEOUT_MS', WEBHOOK_TIMEOUT_MS)
      .pipe(z.number().min(1000, 'WEBHOOK_TIMEOUT_MS must be at least 1000').max(30_000, 'WEBHOOK_TIMEOUT_MS must not exceed 30000')),
    MAX_FILE_SIZE_MB: z.coerce
      .number({ invalid_type_error: 'MAX_FILE_SIZE_MB must be a number' })
      .positive('MAX_FILE_SIZE_MB must be greater than 0')
      .default(DEFAULT_MAX_FILE_SIZE_MB),
    DEFAULT_WAVEFORM_PEAKS: integer('DEFAULT_WAVEFORM_PEAKS', DEFAULT_WAVEFORM_PEAKS)
      .pipe(z.number().min(1).max(MAX_WAVEFORM_PEAKS)),
    MAX_RETRIES: integer('MAX_RETRIES', JOB_MAX_RETRIES).pipe(z.number().nonnegative('MAX_RETRIES must not be negative')),
    RETRY_BASE_DELAY_SEC: integer('RETRY_BASE_DELAY_SEC', RETRY_BASE_DELAY_SEC).pipe(z.number().nonnegative()),
    RETRY_MAX_DELAY_SEC: integer('RETRY_MAX_DELAY_SEC', RETRY_MAX_DELAY_SEC).pipe(z.number().nonnegative()),
    RETRY_STRATEGY: retryStrategyEnum.default('visibility'),
    RETRY_FATAL_ERRORS: booleanString(true),
    DEFAULT_TASK: taskKindEnum.default('hash_and_notify'),
    POLLER_COUNT: integer('POLLER_COUNT', 1).pipe(z.number().min(1).max(16)),
    POLL_WAIT_SEC: integer('POLL_WAIT_SEC', POLL_WAIT_SEC).pipe(z.number().min(0).max(20)),
    POLL_BATCH_SIZE: integer('POLL_BATCH_SIZE', POLL_BATCH_SIZE).pipe(z.number().min(1).max(10)),
    VISIBILITY_TIMEOUT_SEC: integer('VISIBILITY_TIMEOUT_SEC', VISIBILITY_TIMEOUT_SEC)
      .pipe(z.number().min(1).max(VISIBILITY_TIMEOUT_MAX_SEC, `VISIBILITY_TIMEOUT_SEC must not exceed ${VISIBILITY_TIMEOUT_MAX_SEC}`)),
    POLL_ERROR_BACKOFF_SEC: integer('POLL_ERROR_BACKOFF_SEC', POLL_ERROR_BACKOFF_SEC).pipe(z.number().nonnegative()),
    TEMP_DIR: z.string().min(1).default(path.join(os.tmpdir(), 'tracklab-worker')),
    CLEANUP_MAX_AGE_SEC: integer('CLEANUP_MAX_AGE_SEC', CLEANUP_MAX_AGE_SEC).pipe(z.number().positive()),
    CLEANUP_STALE_AGE_SEC: integer('CLEANUP_STALE_AGE_SEC', CLEANUP_STALE_AGE_SEC).pipe(z.number().positive()),
    CLEANUP_INTERVAL_SEC: integer('CLEANUP_INTERVAL_SEC', CLEANUP_INTERVAL_SEC).pipe(z.number().nonnegative()),
    FFMPEG_ENABLED: booleanString(true),
    FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
    FFPROBE_PATH: z.string().min(1).default('ffprobe'),
    ALLOWED_AUDIO_TYPES: z.string().default(DEFAULT_ALLOWED_AUDIO_TYPES.join(',')),
    HEALTH_CPU_SAMPLE_MS: integer('HEALTH_CPU_SAMPLE_MS', 1000).pipe(z.number().nonnegative())
  })
  .superRefine((data, ctx) => {
    if (data.RETRY_MAX_DELAY_SEC < data.RETRY_BASE_DELAY_SEC) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'RETRY_MAX_DELAY_SEC cannot be lower than RETRY_BASE_DELAY_SEC',
        path: ['RETRY_MAX_DELAY_SEC']
      });
    }

    if (data.CLEANUP_STALE_AGE_SEC < data.CLEANUP_MAX_AGE_SEC) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'CLEANUP_STALE_AGE_SEC cannot be lower than CLEANUP_MAX_AGE_SEC',
        path: ['CLEANUP_STALE_AGE_SEC']
      });
    }
  });

export type WorkerSettings = ReturnType<typeof loadWorkerSettings>;

/**
 * Validate the environment once at process start. The result is passed
 * explicitly to every component.
 */
export function loadWorkerSettings(customEnv: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(customEnv);

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
    );
  }

  const env = parsed.data;
  const megabyte = 1024 * 1024;

  const allowedAudioTypes = env.ALLOWED_AUDIO_TYPES.split(',')
    .map((type) => type.trim().toLowerCase())
    .filter(Boolean);

  if (allowedAudioTypes.length === 0) {
    throw new ConfigurationError(['ALLOWED_AUDIO_TYPES: must include at least one MIME type']);
  }

  return Object.freeze({
    queue: {
      url: env.SQS_QUEUE_URL,
      endpoint: env.SQS_ENDPOINT,
      region: env.AWS_REGION,
      pollerCount: env.POLLER_COUNT,
      waitTimeSeconds: env.POLL_WAIT_SEC,
      batchSize: env.POLL_BATCH_SIZE,
      visibilityTimeoutSeconds: env.VISIBILITY_TIMEOUT_SEC,
      errorBackoffSeconds: env.POLL_ERROR_BACKOFF_SEC
    },
    storage: {
      bucket: env.STORAGE_BUCKET,
      supabaseUrl: env.SUPABASE_URL,
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY
    },
    webhook: {
      baseUrl: env.WEBHOOK_BASE_URL,
      timeoutMs: env.WEBHOOK_TIMEOUT_MS
    },
    retry: {
      maxRetries: env.MAX_RETRIES,
      baseDelaySeconds: env.RETRY_BASE_DELAY_SEC,
      maxDelaySeconds: env.RETRY_MAX_DELAY_SEC,
      strategy: env.RETRY_STRATEGY,
      retryFatalErrors: env.RETRY_FATAL_ERRORS
    },
    audio: {
      maxFileSizeBytes: env.MAX_FILE_SIZE_MB * megabyte,
      defaultPeakCount: env.DEFAULT_WAVEFORM_PEAKS,
      allowedAudioTypes,
      ffmpegEnabled: env.FFMPEG_ENABLED,
      ffmpegPath: env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH
    },
    cleanup: {
      tempDir: env.TEMP_DIR,
      maxAgeSeconds: env.CLEANUP_MAX_AGE_SEC,
      staleAgeSeconds: env.CLEANUP_STALE_AGE_SEC,
      intervalSeconds: env.CLEANUP_INTERVAL_SEC
    },
    health: {
      cpuSampleMs: env.HEALTH_CPU_SAMPLE_MS
    },
    defaultTask: env.DEFAULT_TASK
  });
}
