import { describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { TempScope } from '../src/executor/temp-scope';
import { makeTempDir } from './support/services';

async function exists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(() => true, () => false);
}

describe('TempScope', () => {
  it('should name files by prefix and owner', async () => {
    const dir = await makeTempDir();
    const scope = new TempScope(path.join(dir, 'nested'), 'job/../42');

    const filePath = await scope.acquire('stem', '.wav');

    expect(path.dirname(filePath)).toBe(path.join(dir, 'nested'));
    expect(path.basename(filePath)).toMatch(/^stem-job42-[0-9a-f]{12}\.wav$/);
  });

  it('should remove every acquired file on release', async () => {
    const dir = await makeTempDir();
    const scope = new TempScope(dir, 'task-1');
    const written = await scope.acquire('audio', '.wav');
    const reserved = await scope.acquire('waveform', '.json');
    await fs.writeFile(written, 'data');

    expect(await scope.release()).toBe(2);
    expect(await exists(written)).toBe(false);
    expect(await exists(reserved)).toBe(false);
    expect(await scope.release()).toBe(0);
  });
});

describe('makeTempDir', () => {
  let previous = '';

  it('should create a writable directory', async () => {
    previous = await makeTempDir();
    await fs.writeFile(path.join(previous, 'left-over.wav'), 'data');

    expect(await exists(previous)).toBe(true);
  });

  it('should remove directories from earlier tests', async () => {
    expect(previous).not.toBe('');
    expect(await exists(previous)).toBe(false);
  });
});
