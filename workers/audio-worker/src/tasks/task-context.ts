import type { z } from 'zod';
import {
  StorageError,
  TaskValidationError,
  type Notifier,
  type ObjectStore,
  type QueueClient,
  type TaskResult
} from '@tracklab/core';
import type { AudioProcessor } from '../audio/audio-processor';
import type { WorkerSettings } from '../config/worker-settings';
import type { TempScope } from '../executor/temp-scope';

/**
 * Long-lived collaborators shared by every invocation
 */
export type TaskServices = {
  settings: WorkerSettings;
  store: ObjectStore;
  queue: QueueClient;
  notifier: Notifier;
  processor: AudioProcessor;
};

/**
 * Per-invocation view handed to a handler
 */
export type TaskContext = TaskServices & {
  taskId: string;
  attempt: number;
  temp: TempScope;
};

export type TaskValue = Record<string, unknown>;

export type TaskHandler = (args: Record<string, unknown>, context: TaskContext) => Promise<TaskResult<TaskValue>>;

export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: Record<string, unknown>): z.infer<T> {
  const parsed = schema.safeParse(args);

  if (!parsed.success) {
    throw new TaskValidationError('Invalid task arguments', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`)
    });
  }

  return parsed.data;
}

export async function downloadOrThrow(store: ObjectStore, key: string, localPath: string): Promise<void> {
  if (!(await store.download(key, localPath))) {
    throw new StorageError(`Download failed: ${key}`, { key });
  }
}

export function uploadedOrThrow(key: string | null, expected: string): string {
  if (key === null) {
    throw new StorageError(`Upload failed: ${expected}`, { key: expected });
  }
  return key;
}
