import { config } from 'dotenv';
import { ConfigurationError, createLogger } from '@tracklab/core';
import { loadWorkerSettings } from './config/worker-settings';
import { createAudioWorker } from './worker/audio-worker';

// Load environment variables
config();

const logger = createLogger('audio-worker-main');

/**
 * Audio Worker
 * Consumes hash, analysis, mixing and maintenance jobs from the queue
 */
async function main() {
  const settings = loadWorkerSettings();
  const { consumer } = createAudioWorker(settings);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received`);
    await consumer.stop();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  });

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  });

  await consumer.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.fatal({ issues: error.issues }, 'Invalid configuration');
  } else {
    logger.error({ error }, 'Worker crashed');
  }
  process.exit(1);
});
