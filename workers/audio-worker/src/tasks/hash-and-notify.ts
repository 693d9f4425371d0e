import * as path from 'path';
import {
  createLogger,
  fromError,
  hashAndNotifyArgsSchema,
  nowIso,
  succeed,
  type TaskResult
} from '@tracklab/core';
import { buildEnvelope } from '../webhook/notifier';
import { downloadOrThrow, parseArgs, type TaskContext } from './task-context';

const logger = createLogger('hash-and-notify');

export type HashAndNotifyValue = {
  stemId: string;
  stageId?: string;
  filepath: string;
  audioHash: string;
  status: 'hash_sent_to_webhook';
  processedAt: string;
};

/**
 * Download an uploaded file, hash it and report the hash.
 * The webhook is the task's only visible effect, so its failure fails the task.
 */
export async function hashAndNotify(
  rawArgs: Record<string, unknown>,
  context: TaskContext
): Promise<TaskResult<HashAndNotifyValue>> {
  try {
    const args = parseArgs(hashAndNotifyArgsSchema, rawArgs);

    logger.info({
      taskId: context.taskId,
      stemId: args.stemId,
      filepath: args.filepath,
      attempt: context.attempt
    }, 'Hashing uploaded file');

    const localPath = await context.temp.acquire('hash', path.extname(args.filepath) || '.wav');
    await downloadOrThrow(context.store, args.filepath, localPath);

    const audioHash = await context.processor.hash(localPath);

    await context.notifier.notify(
      'hash-check',
      buildEnvelope(args.stemId, context.taskId, 'SUCCESS', {
        taskId: context.taskId,
        stemId: args.stemId,
        userId: args.userId,
        trackId: args.trackId,
        stageId: args.stageId,
        filepath: args.filepath,
        audioHash,
        timestamp: args.timestamp,
        originalFilename: args.originalFilename,
        status: 'hash_generated'
      })
    );

    logger.info({ taskId: context.taskId, stemId: args.stemId, audioHash }, 'Hash reported');

    return succeed({
      stemId: args.stemId,
      stageId: args.stageId,
      filepath: args.filepath,
      audioHash,
      status: 'hash_sent_to_webhook',
      processedAt: nowIso()
    });
  } catch (error) {
    logger.error({ taskId: context.taskId, error }, 'Hash task failed');
    return fromError(error);
  }
}
