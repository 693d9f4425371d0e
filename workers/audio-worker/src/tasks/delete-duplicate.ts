import {
  StorageError,
  createLogger,
  deleteDuplicateArgsSchema,
  fromError,
  nowIso,
  succeed,
  type TaskResult
} from '@tracklab/core';
import { buildEnvelope, notifyBestEffort } from '../webhook/notifier';
import { parseArgs, type TaskContext } from './task-context';

const logger = createLogger('delete-duplicate');

export type DeleteDuplicateValue = {
  stemId: string;
  userId?: string;
  trackId?: string;
  audioHash?: string;
  filepath: string;
  status: 'duplicate_file_deleted';
  processedAt: string;
};

/**
 * Remove an upload that turned out to be a duplicate. No download.
 */
export async function deleteDuplicate(
  rawArgs: Record<string, unknown>,
  context: TaskContext
): Promise<TaskResult<DeleteDuplicateValue>> {
  try {
    const args = parseArgs(deleteDuplicateArgsSchema, rawArgs);

    logger.info({ taskId: context.taskId, stemId: args.stemId, filepath: args.filepath }, 'Deleting duplicate file');

    if (!(await context.store.delete(args.filepath))) {
      throw new StorageError(`Delete failed: ${args.filepath}`, { key: args.filepath });
    }

    const value: DeleteDuplicateValue = {
      stemId: args.stemId,
      userId: args.userId,
      trackId: args.trackId,
      audioHash: args.audioHash,
      filepath: args.filepath,
      status: 'duplicate_file_deleted',
      processedAt: nowIso()
    };

    await notifyBestEffort(
      context.notifier,
      'duplicate-delete-complete',
      buildEnvelope(args.stemId, context.taskId, 'SUCCESS', value)
    );

    return succeed(value);
  } catch (error) {
    logger.error({ taskId: context.taskId, error }, 'Duplicate deletion failed');
    return fromError(error);
  }
}
