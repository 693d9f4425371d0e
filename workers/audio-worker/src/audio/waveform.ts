import {
  PEAK_DECIMALS,
  TaskValidationError,
  nowIso,
  type WaveformSummary
} from '@tracklab/core';
import type { DecodedAudio } from './audio.types';

const ROUNDING = 10 ** PEAK_DECIMALS;

/**
 * Fixed-length amplitude envelope.
 *
 * Fewer samples than peaks: each sample's magnitude, zero-padded to N.
 * Otherwise N windows of floor(total / N) samples, the remainder going
 * to the last window. Normalized by the loudest window, rounded to
 * four decimals.
 */
export function computePeaks(samples: ArrayLike<number>, numPeaks: number): number[] {
  if (!Number.isInteger(numPeaks) || numPeaks < 1) {
    throw new TaskValidationError('numPeaks must be a positive integer', { numPeaks });
  }

  const total = samples.length;
  const peaks = new Array<number>(numPeaks).fill(0);

  if (total < numPeaks) {
    for (let i = 0; i < total; i++) {
      peaks[i] = Math.abs(samples[i]);
    }
  } else {
    const windowSize = Math.floor(total / numPeaks);

    for (let i = 0; i < numPeaks; i++) {
      const start = i * windowSize;
      const end = i === numPeaks - 1 ? total : start + windowSize;
      let max = 0;

      for (let j = start; j < end; j++) {
        const magnitude = Math.abs(samples[j]);
        if (magnitude > max) max = magnitude;
      }

      peaks[i] = max;
    }
  }

  let globalMax = 0;
  for (const peak of peaks) {
    if (peak > globalMax) globalMax = peak;
  }

  return peaks.map((peak) => {
    const normalized = globalMax > 0 ? peak / globalMax : 0;
    return Math.round(normalized * ROUNDING) / ROUNDING;
  });
}

export function durationSeconds(sampleCount: number, sampleRate: number): number {
  return sampleRate > 0 ? sampleCount / sampleRate : 0;
}

export function buildWaveformSummary(
  audio: Pick<DecodedAudio, 'samples' | 'sampleRate'>,
  numPeaks: number,
  createdAt: string = nowIso()
): WaveformSummary {
  return {
    peaks: computePeaks(audio.samples, numPeaks),
    durationSeconds: durationSeconds(audio.samples.length, audio.sampleRate),
    sampleRate: audio.sampleRate,
    numPeaks,
    createdAt
  };
}
