import { AudioDecodeError } from '@tracklab/core';
import type { DecodedAudio } from './audio.types';

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

type WavFormat = {
  formatCode: number;
  channels: number;
  sampleRate: number;
  blockAlign: number;
  bitsPerSample: number;
};

type SampleReader = (buffer: Buffer, offset: number) => number;

/**
 * Decode a RIFF/WAVE buffer into mono samples (channel mean)
 */
export function decodeWav(buffer: Buffer): DecodedAudio {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new AudioDecodeError('Not a RIFF/WAVE file');
  }

  let format: WavFormat | null = null;
  let dataOffset = -1;
  let dataSize = 0;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      format = readFormat(buffer, body, chunkSize);
    } else if (chunkId === 'data') {
      dataOffset = body;
      // Streaming writers leave the size unset; clamp to what is present
      dataSize = Math.min(chunkSize, buffer.length - body);
      break;
    }

    offset = body + chunkSize + (chunkSize % 2);
  }

  if (!format) {
    throw new AudioDecodeError('WAV file has no fmt chunk');
  }
  if (dataOffset < 0) {
    throw new AudioDecodeError('WAV file has no data chunk');
  }
  if (format.channels < 1 || format.sampleRate < 1 || format.blockAlign < 1) {
    throw new AudioDecodeError('WAV header is inconsistent', { ...format });
  }

  const read = sampleReader(format);
  const bytesPerSample = format.bitsPerSample / 8;
  const frames = Math.floor(dataSize / format.blockAlign);
  const samples = new Float32Array(frames);

  for (let frame = 0; frame < frames; frame++) {
    const frameOffset = dataOffset + frame * format.blockAlign;
    let sum = 0;

    for (let channel = 0; channel < format.channels; channel++) {
      sum += read(buffer, frameOffset + channel * bytesPerSample);
    }

    samples[frame] = sum / format.channels;
  }

  return {
    samples,
    sampleRate: format.sampleRate,
    channels: format.channels,
    decoder: 'wav'
  };
}

/**
 * Encode mono samples as 16-bit PCM WAV
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const bytesPerSample = 2;
  const dataSize = samples.length * bytesPerSample;
  const buffer = Buffer.alloc(44 + dataSize);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  buffer.writeUInt16LE(1, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * bytesPerSample, 28);
  buffer.writeUInt16LE(bytesPerSample, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    const value = clamped < 0 ? Math.round(clamped * 32768) : Math.round(clamped * 32767);
    buffer.writeInt16LE(value, 44 + i * bytesPerSample);
  }

  return buffer;
}

function readFormat(buffer: Buffer, body: number, size: number): WavFormat {
  if (size < 16 || body + 16 > buffer.length) {
    throw new AudioDecodeError('WAV fmt chunk is truncated');
  }

  let formatCode = buffer.readUInt16LE(body);

  // Extensible headers carry the real format in the sub-format GUID
  if (formatCode === WAVE_FORMAT_EXTENSIBLE && size >= 40 && body + 26 <= buffer.length) {
    formatCode = buffer.readUInt16LE(body + 24);
  }

  return {
    formatCode,
    channels: buffer.readUInt16LE(body + 2),
    sampleRate: buffer.readUInt32LE(body + 4),
    blockAlign: buffer.readUInt16LE(body + 12),
    bitsPerSample: buffer.readUInt16LE(body + 14)
  };
}

function sampleReader(format: WavFormat): SampleReader {
  const { formatCode, bitsPerSample } = format;

  if (formatCode === WAVE_FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8:
        return (buffer, offset) => (buffer.readUInt8(offset) - 128) / 128;
      case 16:
        return (buffer, offset) => buffer.readInt16LE(offset) / 32768;
      case 24:
        return (buffer, offset) => buffer.readIntLE(offset, 3) / 8388608;
      case 32:
        return (buffer, offset) => buffer.readInt32LE(offset) / 2147483648;
    }
  }

  if (formatCode === WAVE_FORMAT_IEEE_FLOAT) {
    switch (bitsPerSample) {
      case 32:
        return (buffer, offset) => buffer.readFloatLE(offset);
      case 64:
        return (buffer, offset) => buffer.readDoubleLE(offset);
    }
  }

  throw new AudioDecodeError(`Unsupported WAV encoding (format ${formatCode}, ${bitsPerSample}-bit)`, {
    formatCode,
    bitsPerSample
  });
}
