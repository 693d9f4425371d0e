import { promises as fs } from 'fs';
import * as path from 'path';
import {
  ageInSeconds,
  cleanupTempArgsSchema,
  createLogger,
  fromError,
  nowIso,
  succeed,
  toError,
  type TaskResult
} from '@tracklab/core';
import { parseArgs, type TaskContext } from './task-context';

const logger = createLogger('cleanup-temp');

const KNOWN_NAME_PATTERN = /hash|audio|waveform|stem|mixed/i;
const AUDIO_EXTENSIONS = new Set(['.wav', '.mp3', '.flac', '.ogg', '.m4a', '.aac']);
const STALE_NAME_PATTERN = /^tmp/i;
const REPORTED_FILES = 10;

export type SweepOptions = {
  maxAgeSeconds: number;
  staleAgeSeconds: number;
  now?: Date;
};

export type SweepResult = {
  deletedCount: number;
  bytesReclaimed: number;
  failedCount: number;
  deletedFiles: string[];
};

export type CleanupTempValue = SweepResult & {
  directory: string;
  processedAt: string;
};

function isWorkerFile(name: string): boolean {
  return KNOWN_NAME_PATTERN.test(name) || AUDIO_EXTENSIONS.has(path.extname(name).toLowerCase());
}

/**
 * Delete abandoned temp files. Known worker files go after `maxAgeSeconds`;
 * generic `tmp*` leftovers after `staleAgeSeconds`. Anything else stays.
 */
export async function sweepTempDirectory(directory: string, options: SweepOptions): Promise<SweepResult> {
  const now = options.now ?? new Date();
  const result: SweepResult = { deletedCount: 0, bytesReclaimed: 0, failedCount: 0, deletedFiles: [] };

  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    logger.debug({ directory, error: toError(error).message }, 'Temp directory not readable, nothing to sweep');
    return result;
  }

  for (const name of entries) {
    const filePath = path.join(directory, name);

    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) continue;

      const age = ageInSeconds(stats.mtime, now);
      const expired =
        (isWorkerFile(name) && age >= options.maxAgeSeconds) ||
        (STALE_NAME_PATTERN.test(name) && age >= options.staleAgeSeconds);

      if (!expired) continue;

      await fs.unlink(filePath);

      result.deletedCount++;
      result.bytesReclaimed += stats.size;
      if (result.deletedFiles.length < REPORTED_FILES) {
        result.deletedFiles.push(name);
      }
    } catch (error) {
      result.failedCount++;
      logger.warn({ filePath, error: toError(error).message }, 'Failed to clean temp file');
    }
  }

  return result;
}

/**
 * Safety-net sweep of the worker temp directory
 */
export async function cleanupTemp(
  rawArgs: Record<string, unknown>,
  context: TaskContext
): Promise<TaskResult<CleanupTempValue>> {
  try {
    const args = parseArgs(cleanupTempArgsSchema, rawArgs);
    const { tempDir, maxAgeSeconds, staleAgeSeconds } = context.settings.cleanup;

    const sweep = await sweepTempDirectory(tempDir, {
      maxAgeSeconds: args.maxAgeSeconds ?? maxAgeSeconds,
      staleAgeSeconds: args.staleAgeSeconds ?? staleAgeSeconds
    });

    logger.info({
      taskId: context.taskId,
      deletedCount: sweep.deletedCount,
      bytesReclaimed: sweep.bytesReclaimed,
      failedCount: sweep.failedCount
    }, 'Temp cleanup complete');

    return succeed({ ...sweep, directory: tempDir, processedAt: nowIso() });
  } catch (error) {
    logger.error({ taskId: context.taskId, error }, 'Temp cleanup failed');
    return fromError(error);
  }
}
