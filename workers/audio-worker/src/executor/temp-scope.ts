import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger, toError } from '@tracklab/core';

const logger = createLogger('temp-scope');

/**
 * Name prefixes the temp sweep recognizes
 */
export type TempPrefix = 'hash' | 'audio' | 'waveform' | 'stem' | 'mixed';

/**
 * Temp files owned by one invocation. Every acquired path is removed
 * by `release`, which the executor runs in a finally block.
 */
export class TempScope {
  private readonly paths = new Set<string>();

  constructor(
    private readonly directory: string,
    private readonly owner: string
  ) {}

  /**
   * Reserve a unique path; the file itself is created by the caller
   */
  async acquire(prefix: TempPrefix, extension: string = ''): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });

    const owner = this.owner.replace(/[^A-Za-z0-9_-]/g, '').slice(0, 40) || 'task';
    const suffix = randomBytes(6).toString('hex');
    const filePath = path.join(this.directory, `${prefix}-${owner}-${suffix}${extension}`);

    this.paths.add(filePath);
    return filePath;
  }

  /**
   * Remove every acquired file. Failures are logged and never raised.
   */
  async release(): Promise<number> {
    let removed = 0;

    for (const filePath of this.paths) {
      try {
        await fs.rm(filePath, { force: true });
        removed++;
      } catch (error) {
        logger.warn({ filePath, error: toError(error).message }, 'Failed to remove temp file');
      }
    }

    this.paths.clear();
    return removed;
  }
}
