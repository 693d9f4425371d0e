import { describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { cleanupTemp, sweepTempDirectory } from '../../src/tasks/cleanup-temp';
import { createTaskContext, createTestServices, makeTempDir, successValue } from '../support/services';

async function writeAged(dir: string, name: string, now: Date, ageSeconds: number, content: string = 'x'): Promise<void> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content);
  const mtime = new Date(now.getTime() - ageSeconds * 1000);
  await fs.utimes(filePath, mtime, mtime);
}

describe('sweepTempDirectory', () => {
  it('should delete only expired worker files and stale tmp files', async () => {
    const dir = await makeTempDir();
    const now = new Date('2024-05-01T12:00:00.000Z');
    await writeAged(dir, 'audio-old.wav', now, 3600, 'abcd');
    await writeAged(dir, 'stem-young.wav', now, 60);
    await writeAged(dir, 'notes.txt', now, 10_000);
    await writeAged(dir, 'tmpabc', now, 3600);
    await writeAged(dir, 'tmpxyz', now, 8000, 'abcdef');
    await fs.mkdir(path.join(dir, 'audio-dir'));

    const result = await sweepTempDirectory(dir, { maxAgeSeconds: 1800, staleAgeSeconds: 7200, now });

    expect(result.deletedCount).toBe(2);
    expect(result.bytesReclaimed).toBe(10);
    expect(result.failedCount).toBe(0);
    expect([...result.deletedFiles].sort()).toEqual(['audio-old.wav', 'tmpxyz']);
    expect((await fs.readdir(dir)).sort()).toEqual(['audio-dir', 'notes.txt', 'stem-young.wav', 'tmpabc']);
  });

  it('should treat audio extensions as worker files', async () => {
    const dir = await makeTempDir();
    const now = new Date('2024-05-01T12:00:00.000Z');
    await writeAged(dir, 'upload.FLAC', now, 2000);

    const result = await sweepTempDirectory(dir, { maxAgeSeconds: 1800, staleAgeSeconds: 7200, now });

    expect(result.deletedFiles).toEqual(['upload.FLAC']);
  });

  it('should return zeros for a missing directory', async () => {
    const dir = await makeTempDir();

    await expect(sweepTempDirectory(path.join(dir, 'absent'), { maxAgeSeconds: 1, staleAgeSeconds: 1 })).resolves.toEqual({
      deletedCount: 0,
      bytesReclaimed: 0,
      failedCount: 0,
      deletedFiles: []
    });
  });
});

describe('cleanupTemp', () => {
  it('should apply threshold overrides from the arguments', async () => {
    const services = await createTestServices();
    await writeAged(services.tempDir, 'stem-recent.wav', new Date(), 120);

    const value = successValue(await cleanupTemp({ max_age_seconds: 60 }, createTaskContext(services)));

    expect(value.deletedCount).toBe(1);
    expect(value.directory).toBe(services.tempDir);
  });

  it('should keep recent files under the configured thresholds', async () => {
    const services = await createTestServices();
    await writeAged(services.tempDir, 'stem-recent.wav', new Date(), 120);

    const value = successValue(await cleanupTemp({}, createTaskContext(services)));

    expect(value.deletedCount).toBe(0);
  });
});
