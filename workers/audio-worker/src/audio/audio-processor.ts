import * as path from 'path';
import { createLogger, type WaveformSummary } from '@tracklab/core';
import type { WorkerSettings } from '../config/worker-settings';
import { AudioDecoder, type DecodeStrategy } from './audio-decoder';
import type { DecodedAudio, MixResult, StemAudio } from './audio.types';
import { validateAudioFile, type ValidatedAudioFile } from './audio-validator';
import { hashFile } from './hasher';
import { mixStems } from './mixer';
import { encodeWav } from './wav-codec';
import { buildWaveformSummary } from './waveform';

const logger = createLogger('audio-processor');

export type AnalysisResult = {
  contentHash: string;
  file: ValidatedAudioFile;
  waveform: WaveformSummary;
};

/**
 * Hashing and waveform engine used by the task handlers
 */
export class AudioProcessor {
  private readonly decoder: AudioDecoder;

  constructor(
    private readonly settings: WorkerSettings['audio'],
    strategies?: DecodeStrategy[]
  ) {
    this.decoder = new AudioDecoder(settings, strategies);
  }

  hash(filePath: string): Promise<string> {
    return hashFile(filePath);
  }

  decode(filePath: string): Promise<DecodedAudio> {
    return this.decoder.decode(filePath);
  }

  /**
   * Validate, hash and summarize one file
   */
  async analyze(filePath: string, numPeaks: number = this.settings.defaultPeakCount): Promise<AnalysisResult> {
    const startTime = Date.now();

    const file = await validateAudioFile(filePath, this.settings);
    const contentHash = await hashFile(filePath);
    const audio = await this.decoder.decode(filePath);
    const waveform = buildWaveformSummary(audio, numPeaks);

    logger.info({
      file: path.basename(filePath),
      mimeType: file.mimeType,
      sizeBytes: file.sizeBytes,
      durationSeconds: waveform.durationSeconds,
      sampleRate: waveform.sampleRate,
      duration: Date.now() - startTime
    }, 'Audio analyzed');

    return { contentHash, file, waveform };
  }

  summarize(audio: Pick<DecodedAudio, 'samples' | 'sampleRate'>, numPeaks: number = this.settings.defaultPeakCount): WaveformSummary {
    return buildWaveformSummary(audio, numPeaks);
  }

  mix(stems: StemAudio[]): MixResult {
    return mixStems(stems);
  }

  encode(samples: Float32Array, sampleRate: number): Buffer {
    return encodeWav(samples, sampleRate);
  }
}
