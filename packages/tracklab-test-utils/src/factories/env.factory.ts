/**
 * Minimal valid worker environment with placeholder credentials
 */
export function createWorkerEnv(overrides: Record<string, string | undefined> = {}): Record<string, string | undefined> {
  return {
    SQS_QUEUE_URL: 'http://localhost:4566/000000000000/audio-jobs',
    STORAGE_BUCKET: 'test-bucket',
    SUPABASE_URL: 'http://localhost:54321',
    SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    WEBHOOK_BASE_URL: 'http://localhost:3000/webhooks',
    FFMPEG_ENABLED: 'false',
    HEALTH_CPU_SAMPLE_MS: '0',
    CLEANUP_INTERVAL_SEC: '0',
    ...overrides
  };
}
