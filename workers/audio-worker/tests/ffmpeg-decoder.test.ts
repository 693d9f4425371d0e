import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import * as path from 'path';
import { buildMonoWav } from '@tracklab/test-utils';
import { AudioDecoder } from '../src/audio/audio-decoder';
import { makeTempDir } from './support/services';

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('child_process', async (importOriginal) => ({
  ...(await importOriginal<typeof import('child_process')>()),
  spawn: spawnMock
}));

function fakeProcess(stdout: Buffer, code: number = 0) {
  const child = Object.assign(new EventEmitter(), {
    stdout: new EventEmitter(),
    stderr: new EventEmitter()
  });

  setImmediate(() => {
    child.stdout.emit('data', stdout);
    if (code !== 0) child.stderr.emit('data', Buffer.from('decoder exploded'));
    child.emit('close', code);
  });

  return child;
}

function floatBuffer(values: number[]): Buffer {
  const buffer = Buffer.alloc(values.length * 4);
  values.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

const options = { ffmpegEnabled: true, ffmpegPath: '/usr/bin/ffmpeg', ffprobePath: '/usr/bin/ffprobe' };

describe('FfmpegDecodeStrategy', () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it('should probe the native rate and read f32le mono from stdout', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'audio-c.mp3');
    await fs.writeFile(filePath, 'ID3 placeholder');

    spawnMock
      .mockImplementationOnce(() => fakeProcess(Buffer.from(JSON.stringify({ streams: [{ sample_rate: '22050', channels: 2 }] }))))
      .mockImplementationOnce(() => fakeProcess(floatBuffer([0.25, -0.5])));

    const audio = await new AudioDecoder(options).decode(filePath);

    expect(audio).toMatchObject({ sampleRate: 22050, channels: 2, decoder: 'ffmpeg' });
    expect(Array.from(audio.samples)).toEqual([0.25, -0.5]);
    expect(spawnMock.mock.calls[0][0]).toBe('/usr/bin/ffprobe');
    expect(spawnMock.mock.calls[1][0]).toBe('/usr/bin/ffmpeg');
    expect(spawnMock.mock.calls[1][1]).toContain('22050');
  });

  it('should fall back to the WAV reader when ffmpeg fails', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'audio-d.wav');
    await fs.writeFile(filePath, buildMonoWav([0.5], 8000));

    spawnMock.mockImplementation(() => fakeProcess(Buffer.alloc(0), 1));

    const audio = await new AudioDecoder(options).decode(filePath);

    expect(audio.decoder).toBe('wav');
    expect(audio.sampleRate).toBe(8000);
    expect(spawnMock).toHaveBeenCalledTimes(1);
  });
});
