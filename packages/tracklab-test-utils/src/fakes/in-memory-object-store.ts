import { promises as fs } from 'fs';
import type { ObjectStore } from '@tracklab/core';

export type StoreOperation = 'download' | 'upload' | 'uploadJson' | 'delete';

/**
 * Object store backed by a Map; failures are switched on per operation
 */
export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Buffer>();
  readonly deletedKeys: string[] = [];
  readonly failing = new Set<StoreOperation>();
  probeError: Error | null = null;

  put(key: string, data: Buffer): void {
    this.objects.set(key, data);
  }

  json(key: string): unknown {
    const data = this.objects.get(key);
    return data === undefined ? undefined : JSON.parse(data.toString('utf8'));
  }

  async download(key: string, localPath: string): Promise<boolean> {
    const data = this.objects.get(key);
    if (this.failing.has('download') || data === undefined) return false;

    await fs.writeFile(localPath, data);
    return true;
  }

  async upload(localPath: string, key: string): Promise<string | null> {
    if (this.failing.has('upload')) return null;

    this.objects.set(key, await fs.readFile(localPath));
    return key;
  }

  async uploadJson(value: unknown, key: string): Promise<string | null> {
    if (this.failing.has('uploadJson')) return null;

    this.objects.set(key, Buffer.from(JSON.stringify(value)));
    return key;
  }

  async delete(key: string): Promise<boolean> {
    if (this.failing.has('delete')) return false;

    this.objects.delete(key);
    this.deletedKeys.push(key);
    return true;
  }

  async probe(): Promise<void> {
    if (this.probeError) throw this.probeError;
  }
}
