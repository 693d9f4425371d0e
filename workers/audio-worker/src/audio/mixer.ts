import { MIX_PEAK_CEILING, TaskValidationError, createLogger } from '@tracklab/core';
import type { MixResult, StemAudio } from './audio.types';

const logger = createLogger('mixer');

/**
 * Mix stems by per-sample mean after zero-padding to the longest stem.
 * Stems whose rate differs from the first are skipped. The mix is
 * scaled down when its peak exceeds the ceiling.
 */
export function mixStems(stems: StemAudio[], ceiling: number = MIX_PEAK_CEILING): MixResult {
  if (stems.length === 0) {
    throw new TaskValidationError('No stems to mix');
  }

  const sampleRate = stems[0].sampleRate;
  const included: StemAudio[] = [];
  const skippedKeys: string[] = [];

  for (const stem of stems) {
    if (stem.sampleRate === sampleRate) {
      included.push(stem);
    } else {
      skippedKeys.push(stem.key);
      logger.warn({
        key: stem.key,
        sampleRate: stem.sampleRate,
        expected: sampleRate
      }, 'Skipping stem with mismatched sample rate');
    }
  }

  const length = Math.max(...included.map((stem) => stem.samples.length));
  const sums = new Float64Array(length);

  for (const stem of included) {
    for (let i = 0; i < stem.samples.length; i++) {
      sums[i] += stem.samples[i];
    }
  }

  let peakBeforeLimit = 0;
  for (let i = 0; i < length; i++) {
    sums[i] /= included.length;
    const magnitude = Math.abs(sums[i]);
    if (magnitude > peakBeforeLimit) peakBeforeLimit = magnitude;
  }

  const limited = peakBeforeLimit > ceiling;
  const gain = limited ? ceiling / peakBeforeLimit : 1;
  const samples = new Float32Array(length);

  for (let i = 0; i < length; i++) {
    // Clamp absorbs float rounding after scaling
    samples[i] = Math.max(-ceiling, Math.min(ceiling, sums[i] * gain));
  }

  if (limited) {
    logger.debug({ peakBeforeLimit, gain }, 'Mix soft-limited');
  }

  return {
    samples,
    sampleRate,
    includedKeys: included.map((stem) => stem.key),
    skippedKeys,
    peakBeforeLimit,
    limited
  };
}
