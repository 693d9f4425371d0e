import { AudioProcessor } from '../audio/audio-processor';
import type { WorkerSettings } from '../config/worker-settings';
import { TaskExecutor } from '../executor/task-executor';
import { SqsQueueClient } from '../queue/sqs-queue-client';
import { SupabaseObjectStore } from '../storage/supabase-object-store';
import type { TaskServices } from '../tasks/task-context';
import { HttpWebhookNotifier } from '../webhook/notifier';
import { QueueConsumer } from './queue-consumer';

export type AudioWorker = {
  services: TaskServices;
  executor: TaskExecutor;
  consumer: QueueConsumer;
};

/**
 * Wire the production adapters; tests pass their own services
 */
export function createAudioWorker(settings: WorkerSettings, overrides: Partial<TaskServices> = {}): AudioWorker {
  const services: TaskServices = {
    settings,
    store: overrides.store ?? new SupabaseObjectStore(settings.storage),
    queue: overrides.queue ?? new SqsQueueClient(settings.queue),
    notifier: overrides.notifier ?? new HttpWebhookNotifier(settings.webhook),
    processor: overrides.processor ?? new AudioProcessor(settings.audio)
  };

  const executor = new TaskExecutor(services);
  const consumer = new QueueConsumer(settings, services.queue, executor);

  return { services, executor, consumer };
}
