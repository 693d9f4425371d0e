/**
 * Worker limits and defaults
 */

// Waveform
export const DEFAULT_WAVEFORM_PEAKS = 1024;
export const MAX_WAVEFORM_PEAKS = 100_000;
export const PEAK_DECIMALS = 4;
export const MIX_WAVEFORM_PEAKS = 4000;

// Hashing
export const HASH_CHUNK_BYTES = 4096;

// Mixing
export const MIX_PEAK_CEILING = 0.95;

// Files
export const DEFAULT_MAX_FILE_SIZE_MB = 100;
export const DEFAULT_ALLOWED_AUDIO_TYPES = ['audio/wav', 'audio/mpeg', 'audio/flac', 'audio/ogg'];

// Retry policy
export const JOB_MAX_RETRIES = 3;
export const RETRY_BASE_DELAY_SEC = 60;
export const RETRY_MAX_DELAY_SEC = 300;

// Queue polling
export const POLL_WAIT_SEC = 20;
export const POLL_BATCH_SIZE = 1;
export const VISIBILITY_TIMEOUT_SEC = 300;
export const VISIBILITY_TIMEOUT_MAX_SEC = 3600;
export const POLL_ERROR_BACKOFF_SEC = 5;
export const QUEUE_MAX_DELAY_SEC = 900; // SQS DelaySeconds ceiling

// Temp cleanup
export const CLEANUP_MAX_AGE_SEC = 1800;
export const CLEANUP_STALE_AGE_SEC = 7200;
export const CLEANUP_INTERVAL_SEC = 3600;

// Webhooks
export const WEBHOOK_TIMEOUT_MS = 10_000;
