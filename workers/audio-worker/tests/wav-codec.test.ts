import { describe, it, expect } from 'vitest';
import { AudioDecodeError } from '@tracklab/core';
import { buildWav } from '@tracklab/test-utils';
import { decodeWav, encodeWav } from '../src/audio/wav-codec';

describe('decodeWav', () => {
  it('should decode 16-bit PCM and average channels to mono', () => {
    const wav = buildWav({ channels: [[1, 0], [0, 0]], sampleRate: 22050 });

    const audio = decodeWav(wav);

    expect(audio.sampleRate).toBe(22050);
    expect(audio.channels).toBe(2);
    expect(audio.decoder).toBe('wav');
    expect(audio.samples).toHaveLength(2);
    expect(audio.samples[0]).toBeCloseTo(0.5, 4);
    expect(audio.samples[1]).toBe(0);
  });

  it('should decode unsigned 8-bit PCM', () => {
    const audio = decodeWav(buildWav({ channels: [[0.5, 0]], bitsPerSample: 8 }));

    expect(Array.from(audio.samples)).toEqual([0.5, 0]);
  });

  it('should decode 24-bit PCM', () => {
    const audio = decodeWav(buildWav({ channels: [[-0.25]], bitsPerSample: 24 }));

    expect(audio.samples[0]).toBe(-0.25);
  });

  it('should decode 32-bit PCM', () => {
    const audio = decodeWav(buildWav({ channels: [[0.75]], bitsPerSample: 32 }));

    expect(audio.samples[0]).toBeCloseTo(0.75, 6);
  });

  it('should decode 32-bit and 64-bit float', () => {
    const single = decodeWav(buildWav({ channels: [[0.3]], bitsPerSample: 32, float: true }));
    const double = decodeWav(buildWav({ channels: [[0.3]], bitsPerSample: 64, float: true }));

    expect(single.samples[0]).toBeCloseTo(0.3, 6);
    expect(double.samples[0]).toBeCloseTo(0.3, 6);
  });

  it('should read the sub-format of extensible headers', () => {
    const audio = decodeWav(buildWav({ channels: [[0.3], [0.1]], bitsPerSample: 32, float: true, extensible: true }));

    expect(audio.channels).toBe(2);
    expect(audio.samples[0]).toBeCloseTo(0.2, 6);
  });

  it('should skip unknown chunks including odd-sized ones', () => {
    const wav = buildWav({
      channels: [[0, 0, 0]],
      sampleRate: 8000,
      extraChunk: { id: 'LIST', data: Buffer.from('abc') }
    });

    const audio = decodeWav(wav);

    expect(audio.sampleRate).toBe(8000);
    expect(audio.samples).toHaveLength(3);
  });

  it('should reject buffers that are not RIFF/WAVE', () => {
    expect(() => decodeWav(Buffer.from('definitely not a wav file'))).toThrow(AudioDecodeError);
  });

  it('should reject a file without a fmt chunk', () => {
    const header = Buffer.alloc(12);
    header.write('RIFF', 0, 'ascii');
    header.writeUInt32LE(4, 4);
    header.write('WAVE', 8, 'ascii');

    expect(() => decodeWav(header)).toThrow('WAV file has no fmt chunk');
  });

  it('should reject unsupported bit depths', () => {
    const wav = buildWav({ channels: [[0.1]] });
    wav.writeUInt16LE(12, 34);

    expect(() => decodeWav(wav)).toThrow('Unsupported WAV encoding (format 1, 12-bit)');
  });
});

describe('encodeWav', () => {
  it('should write a 16-bit mono file that decodes back', () => {
    const wav = encodeWav(new Float32Array([0, 0.5, -0.5, 1, -1]), 8000);

    expect(wav).toHaveLength(54);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(24)).toBe(8000);

    const audio = decodeWav(wav);

    expect(audio.sampleRate).toBe(8000);
    expect(audio.channels).toBe(1);
    expect(audio.samples[0]).toBe(0);
    expect(audio.samples[1]).toBe(0.5);
    expect(audio.samples[2]).toBe(-0.5);
    expect(audio.samples[3]).toBeCloseTo(1, 4);
    expect(audio.samples[4]).toBe(-1);
  });

  it('should clamp samples outside [-1, 1]', () => {
    const wav = encodeWav(new Float32Array([2, -3]), 8000);

    expect(wav.readInt16LE(44)).toBe(32767);
    expect(wav.readInt16LE(46)).toBe(-32768);
  });
});
