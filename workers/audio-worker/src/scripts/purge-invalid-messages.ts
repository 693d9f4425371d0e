import { config } from 'dotenv';
import { createLogger } from '@tracklab/core';
import { loadWorkerSettings } from '../config/worker-settings';
import { purgeInvalidMessages } from '../maintenance/invalid-message-purge';
import { SqsQueueClient } from '../queue/sqs-queue-client';

config();

const logger = createLogger('purge-invalid-messages');

async function main() {
  const dryRun = process.argv.includes('--dry-run');
  const settings = loadWorkerSettings();
  const queue = new SqsQueueClient(settings.queue);

  logger.info({ queueUrl: settings.queue.url, dryRun }, 'Scanning queue for malformed messages');

  try {
    const summary = await purgeInvalidMessages(queue, { defaultKind: settings.defaultTask, dryRun });
    logger.info({ ...summary, dryRun }, 'Queue scan complete');
  } finally {
    queue.destroy();
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Queue scan failed');
  process.exit(1);
});
