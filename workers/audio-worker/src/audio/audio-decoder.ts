import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AudioDecodeError, createLogger, toError } from '@tracklab/core';
import type { DecodedAudio } from './audio.types';
import { decodeWav } from './wav-codec';

const logger = createLogger('audio-decoder');

export type DecoderOptions = {
  ffmpegEnabled: boolean;
  ffmpegPath: string;
  ffprobePath: string;
};

/**
 * One way of turning a file into mono samples
 */
export interface DecodeStrategy {
  readonly name: string;
  decode(filePath: string): Promise<DecodedAudio>;
}

const probeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        sample_rate: z.coerce.number().int().positive(),
        channels: z.number().int().positive().optional()
      })
    )
    .min(1, 'no audio stream')
});

type ProcessOutput = {
  stdout: Buffer;
  stderr: string;
};

function runProcess(command: string, args: string[]): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args);
    const chunks: Buffer[] = [];
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      chunks.push(data);
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', reject);

    child.on('close', (code) => {
      if (code !== 0) {
        reject(new Error(`${command} failed with code ${code}: ${stderr.trim().slice(0, 500)}`));
        return;
      }

      resolve({ stdout: Buffer.concat(chunks), stderr });
    });
  });
}

/**
 * FFmpeg decode: ffprobe for the native rate, then raw f32le mono on stdout
 */
export class FfmpegDecodeStrategy implements DecodeStrategy {
  readonly name = 'ffmpeg';

  constructor(
    private readonly ffmpegPath: string,
    private readonly ffprobePath: string
  ) {}

  async decode(filePath: string): Promise<DecodedAudio> {
    const { sampleRate, channels } = await this.probe(filePath);

    const { stdout } = await runProcess(this.ffmpegPath, [
      '-v', 'error',
      '-i', filePath,
      '-f', 'f32le',
      '-acodec', 'pcm_f32le',
      '-ac', '1', // Downmix
      '-ar', sampleRate.toString(),
      '-'
    ]);

    const samples = new Float32Array(Math.floor(stdout.length / 4));
    for (let i = 0; i < samples.length; i++) {
      samples[i] = stdout.readFloatLE(i * 4);
    }

    return { samples, sampleRate, channels, decoder: this.name };
  }

  private async probe(filePath: string): Promise<{ sampleRate: number; channels: number }> {
    const { stdout } = await runProcess(this.ffprobePath, [
      '-v', 'error',
      '-select_streams', 'a:0',
      '-show_entries', 'stream=sample_rate,channels',
      '-of', 'json',
      filePath
    ]);

    const parsed = probeOutputSchema.parse(JSON.parse(stdout.toString()));
    const [stream] = parsed.streams;

    return { sampleRate: stream.sample_rate, channels: stream.channels ?? 1 };
  }
}

/**
 * Built-in RIFF/WAVE reader, used when ffmpeg is unavailable or fails
 */
export class WavDecodeStrategy implements DecodeStrategy {
  readonly name = 'wav';

  async decode(filePath: string): Promise<DecodedAudio> {
    return decodeWav(await fs.readFile(filePath));
  }
}

/**
 * Decodes audio files to mono PCM, trying each strategy in order
 */
export class AudioDecoder {
  private readonly strategies: DecodeStrategy[];

  constructor(options: DecoderOptions, strategies?: DecodeStrategy[]) {
    this.strategies = strategies ?? [
      ...(options.ffmpegEnabled ? [new FfmpegDecodeStrategy(options.ffmpegPath, options.ffprobePath)] : []),
      new WavDecodeStrategy()
    ];
  }

  async decode(filePath: string): Promise<DecodedAudio> {
    try {
      await fs.access(filePath);
    } catch (error) {
      throw new AudioDecodeError(`Audio file is not readable: ${path.basename(filePath)}`, {
        cause: toError(error).message
      });
    }

    const failures: string[] = [];

    for (const strategy of this.strategies) {
      try {
        const audio = await strategy.decode(filePath);

        logger.debug({
          file: path.basename(filePath),
          decoder: strategy.name,
          sampleRate: audio.sampleRate,
          channels: audio.channels,
          samples: audio.samples.length
        }, 'Audio decoded');

        return audio;
      } catch (error) {
        const message = toError(error).message;
        failures.push(`${strategy.name}: ${message}`);

        logger.warn({ file: path.basename(filePath), decoder: strategy.name, error: message }, 'Decode strategy failed');
      }
    }

    throw new AudioDecodeError(`Could not decode ${path.basename(filePath)}`, { failures });
  }
}
