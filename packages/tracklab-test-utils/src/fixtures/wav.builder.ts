export interface WavBuildOptions {
  /** One sample array per channel, values in [-1, 1] */
  channels: ArrayLike<number>[];
  sampleRate?: number;
  bitsPerSample?: 8 | 16 | 24 | 32 | 64;
  float?: boolean;
  extensible?: boolean;
  /** Chunk written between fmt and data */
  extraChunk?: { id: string; data: Buffer };
}

/**
 * Build a RIFF/WAVE buffer. Integer samples are scaled by 2^(bits-1) - 1.
 */
export function buildWav(options: WavBuildOptions): Buffer {
  const sampleRate = options.sampleRate ?? 44100;
  const bits = options.bitsPerSample ?? 16;
  const float = options.float ?? false;
  const channelCount = options.channels.length;
  const frames = channelCount > 0 ? Math.max(...options.channels.map((channel) => channel.length)) : 0;
  const bytesPerSample = bits / 8;
  const blockAlign = channelCount * bytesPerSample;
  const formatCode = float ? 3 : 1;

  const fmt = Buffer.alloc(options.extensible ? 40 : 16);
  fmt.writeUInt16LE(options.extensible ? 0xfffe : formatCode, 0);
  fmt.writeUInt16LE(channelCount, 2);
  fmt.writeUInt32LE(sampleRate, 4);
  fmt.writeUInt32LE(sampleRate * blockAlign, 8);
  fmt.writeUInt16LE(blockAlign, 12);
  fmt.writeUInt16LE(bits, 14);
  if (options.extensible) {
    fmt.writeUInt16LE(22, 16);
    fmt.writeUInt16LE(bits, 18);
    fmt.writeUInt32LE(0, 20);
    fmt.writeUInt16LE(formatCode, 24);
  }

  const data = Buffer.alloc(frames * blockAlign);
  for (let frame = 0; frame < frames; frame++) {
    for (let channel = 0; channel < channelCount; channel++) {
      const samples = options.channels[channel];
      const value = frame < samples.length ? Math.max(-1, Math.min(1, samples[frame])) : 0;
      writeSample(data, frame * blockAlign + channel * bytesPerSample, value, bits, float);
    }
  }

  const chunks: Buffer[] = [chunk('fmt ', fmt)];
  if (options.extraChunk) {
    chunks.push(chunk(options.extraChunk.id, options.extraChunk.data));
  }
  chunks.push(chunk('data', data));

  const body = Buffer.concat(chunks);
  const header = Buffer.alloc(12);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(4 + body.length, 4);
  header.write('WAVE', 8, 'ascii');

  return Buffer.concat([header, body]);
}

export function buildMonoWav(samples: ArrayLike<number>, sampleRate: number = 44100): Buffer {
  return buildWav({ channels: [samples], sampleRate });
}

export function sineWave(frequency: number, seconds: number, sampleRate: number, amplitude: number = 0.8): Float32Array {
  const samples = new Float32Array(Math.round(seconds * sampleRate));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate);
  }
  return samples;
}

function chunk(id: string, data: Buffer): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, 'ascii');
  header.writeUInt32LE(data.length, 4);
  const padding = data.length % 2 === 1 ? Buffer.alloc(1) : Buffer.alloc(0);
  return Buffer.concat([header, data, padding]);
}

function writeSample(buffer: Buffer, offset: number, value: number, bits: number, float: boolean): void {
  if (float) {
    if (bits === 64) buffer.writeDoubleLE(value, offset);
    else buffer.writeFloatLE(value, offset);
    return;
  }

  const scaled = Math.round(value * (2 ** (bits - 1) - 1));

  switch (bits) {
    case 8:
      buffer.writeUInt8(scaled + 128, offset);
      break;
    case 16:
      buffer.writeInt16LE(scaled, offset);
      break;
    case 24:
      buffer.writeIntLE(scaled, offset, 3);
      break;
    default:
      buffer.writeInt32LE(scaled, offset);
  }
}
