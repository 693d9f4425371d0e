import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { promises as fs } from 'fs';
import * as path from 'path';
import { StorageError, createLogger, type ObjectStore } from '@tracklab/core';
import type { WorkerSettings } from '../config/worker-settings';

const logger = createLogger('object-store');

const CONTENT_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.flac': 'audio/flac',
  '.ogg': 'audio/ogg',
  '.json': 'application/json'
};

export function contentTypeFor(key: string): string {
  return CONTENT_TYPES[path.extname(key).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Object store backed by a Supabase Storage bucket
 */
export class SupabaseObjectStore implements ObjectStore {
  private db: SupabaseClient;
  private readonly bucketName: string;

  constructor(settings: WorkerSettings['storage']) {
    this.db = createClient(settings.supabaseUrl, settings.serviceRoleKey, {
      auth: { persistSession: false }
    });
    this.bucketName = settings.bucket;

    logger.info({ bucket: this.bucketName }, 'Object store initialized');
  }

  async download(key: string, localPath: string): Promise<boolean> {
    try {
      const { data, error } = await this.db.storage.from(this.bucketName).download(key);

      if (error || !data) {
        logger.error({ key, error: error?.message }, 'Download failed');
        return false;
      }

      const buffer = Buffer.from(await data.arrayBuffer());
      await fs.writeFile(localPath, buffer);

      logger.debug({ key, sizeKB: Math.round(buffer.length / 1024) }, 'Object downloaded');
      return true;
    } catch (error) {
      logger.error({ error, key }, 'Download failed');
      return false;
    }
  }

  async upload(localPath: string, key: string, contentType?: string): Promise<string | null> {
    try {
      const body = await fs.readFile(localPath);
      return await this.put(key, body, contentType ?? contentTypeFor(key));
    } catch (error) {
      logger.error({ error, key }, 'Upload failed');
      return null;
    }
  }

  async uploadJson(value: unknown, key: string): Promise<string | null> {
    try {
      return await this.put(key, Buffer.from(JSON.stringify(value)), 'application/json');
    } catch (error) {
      logger.error({ error, key }, 'JSON upload failed');
      return null;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const { error } = await this.db.storage.from(this.bucketName).remove([key]);

      if (error) {
        logger.error({ key, error: error.message }, 'Delete failed');
        return false;
      }

      logger.debug({ key }, 'Object deleted');
      return true;
    } catch (error) {
      logger.error({ error, key }, 'Delete failed');
      return false;
    }
  }

  async probe(): Promise<void> {
    const { error } = await this.db.storage.getBucket(this.bucketName);

    if (error) {
      throw new StorageError(`Bucket ${this.bucketName} is not reachable: ${error.message}`, {
        bucket: this.bucketName
      });
    }
  }

  private async put(key: string, body: Buffer, contentType: string): Promise<string | null> {
    // Upsert keeps retried uploads idempotent
    const { error } = await this.db.storage
      .from(this.bucketName)
      .upload(key, body, { contentType, upsert: true });

    if (error) {
      logger.error({ key, error: error.message }, 'Upload failed');
      return null;
    }

    logger.debug({ key, contentType, sizeKB: Math.round(body.length / 1024) }, 'Object uploaded');
    return key;
  }
}
