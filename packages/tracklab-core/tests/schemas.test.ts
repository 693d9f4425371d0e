import { describe, it, expect } from 'vitest';
import {
  analyzeAudioArgsSchema,
  cleanupTempArgsSchema,
  hashAndNotifyArgsSchema,
  mixStemsArgsSchema,
  taskKindEnum,
  waveformSummarySchema,
  webhookEnvelopeSchema
} from '../src/schemas';

describe('Task argument schemas', () => {
  it('should accept legacy snake_case names', () => {
    const args = hashAndNotifyArgsSchema.parse({
      stemId: 'stem-1',
      storageKey: 'uploads/a.wav',
      original_filename: 'a.wav'
    });

    expect(args).toEqual({
      stemId: 'stem-1',
      filepath: 'uploads/a.wav',
      originalFilename: 'a.wav'
    });
  });

  it('should prefer the canonical key when both are present', () => {
    const args = hashAndNotifyArgsSchema.parse({
      stemId: 'stem-1',
      filepath: 'uploads/canonical.wav',
      storageKey: 'uploads/alias.wav'
    });

    expect(args.filepath).toBe('uploads/canonical.wav');
  });

  it('should turn null metadata into undefined', () => {
    const args = hashAndNotifyArgsSchema.parse({ stemId: 'stem-1', filepath: 'a.wav', userId: null });

    expect(args.userId).toBeUndefined();
  });

  it('should reject a missing stemId', () => {
    expect(() => hashAndNotifyArgsSchema.parse({ filepath: 'a.wav' })).toThrow();
  });

  it('should coerce numPeaks from a string', () => {
    const args = analyzeAudioArgsSchema.parse({ stemId: 's', filepath: 'a.wav', num_peaks: '4' });

    expect(args.numPeaks).toBe(4);
  });

  it('should reject numPeaks below 1', () => {
    expect(() => analyzeAudioArgsSchema.parse({ stemId: 's', filepath: 'a.wav', numPeaks: 0 })).toThrow();
  });

  it('should require at least one stem path', () => {
    expect(() => mixStemsArgsSchema.parse({ stem_paths: [] })).toThrow();
    expect(mixStemsArgsSchema.parse({ stem_paths: ['a.wav', 'b.wav'] }).stemPaths).toEqual(['a.wav', 'b.wav']);
  });

  it('should accept empty cleanup arguments', () => {
    expect(cleanupTempArgsSchema.parse({})).toEqual({});
  });

  it('should list every task kind', () => {
    expect(taskKindEnum.options).toEqual([
      'hash_and_notify',
      'delete_duplicate',
      'analyze_audio',
      'mix_stems',
      'health_check',
      'cleanup_temp'
    ]);
  });
});

describe('Waveform Summary Schema', () => {
  const summary = {
    peaks: [0.5, 1, 0],
    durationSeconds: 1.5,
    sampleRate: 44100,
    numPeaks: 3,
    createdAt: '2024-05-01T10:00:00.000Z'
  };

  it('should validate a consistent summary', () => {
    expect(() => waveformSummarySchema.parse(summary)).not.toThrow();
  });

  it('should reject a peak count mismatch', () => {
    expect(() => waveformSummarySchema.parse({ ...summary, numPeaks: 4 })).toThrow();
  });

  it('should reject peaks above 1', () => {
    expect(() => waveformSummarySchema.parse({ ...summary, peaks: [1.2, 0, 0] })).toThrow();
  });
});

describe('Webhook Envelope Schema', () => {
  it('should reject an unknown status', () => {
    expect(() =>
      webhookEnvelopeSchema.parse({
        jobId: 'stem-1',
        taskId: 'task-1',
        status: 'PENDING',
        result: {},
        timestamp: '2024-05-01T10:00:00.000Z'
      })
    ).toThrow();
  });
});
