import { z } from 'zod';
import { MAX_WAVEFORM_PEAKS } from '../constants/limits';

/**
 * Closed set of task kinds the worker executes
 */
export const taskKindEnum = z.enum([
  'hash_and_notify',
  'delete_duplicate',
  'analyze_audio',
  'mix_stems',
  'health_check',
  'cleanup_temp'
]);

export type TaskKind = z.infer<typeof taskKindEnum>;

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const storageKey = z.string().trim().min(1, 'storage key must not be empty');

const peakCount = z.coerce
  .number({ invalid_type_error: 'numPeaks must be a number' })
  .int('numPeaks must be an integer')
  .min(1, 'numPeaks must be at least 1')
  .max(MAX_WAVEFORM_PEAKS, `numPeaks must not exceed ${MAX_WAVEFORM_PEAKS}`);

/**
 * Producers send both the legacy snake_case names and camelCase.
 * Rename aliases onto their canonical key before validation.
 */
function withAliases<T extends z.ZodTypeAny>(aliases: Record<string, string>, schema: T) {
  return z.preprocess((value) => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return value;
    }

    const renamed: Record<string, unknown> = { ...value };

    for (const [alias, canonical] of Object.entries(aliases)) {
      if (renamed[canonical] === undefined && renamed[alias] !== undefined) {
        renamed[canonical] = renamed[alias];
      }
      delete renamed[alias];
    }

    return renamed;
  }, schema);
}

/**
 * hash_and_notify arguments
 */
export const hashAndNotifyArgsSchema = withAliases(
  {
    storageKey: 'filepath',
    original_filename: 'originalFilename'
  },
  z.object({
    stemId: z.string().min(1, 'stemId is required'),
    filepath: storageKey.describe('Object key of the uploaded file'),
    userId: optionalText,
    trackId: optionalText,
    stageId: optionalText,
    timestamp: optionalText,
    originalFilename: optionalText
  })
);

export type HashAndNotifyArgs = z.infer<typeof hashAndNotifyArgsSchema>;

/**
 * delete_duplicate arguments
 */
export const deleteDuplicateArgsSchema = withAliases(
  {
    storageKey: 'filepath',
    audio_hash: 'audioHash'
  },
  z.object({
    stemId: z.string().min(1, 'stemId is required'),
    filepath: storageKey.describe('Object key of the duplicate file'),
    userId: optionalText,
    trackId: optionalText,
    audioHash: optionalText
  })
);

export type DeleteDuplicateArgs = z.infer<typeof deleteDuplicateArgsSchema>;

/**
 * analyze_audio arguments
 */
export const analyzeAudioArgsSchema = withAliases(
  {
    storageKey: 'filepath',
    audio_hash: 'audioHash',
    original_filename: 'originalFilename',
    num_peaks: 'numPeaks'
  },
  z.object({
    stemId: z.string().min(1, 'stemId is required'),
    filepath: storageKey.describe('Object key of the audio file'),
    userId: optionalText,
    trackId: optionalText,
    audioHash: optionalText,
    timestamp: optionalText,
    originalFilename: optionalText,
    numPeaks: peakCount.optional(),
    upstreamId: optionalText
  })
);

export type AnalyzeAudioArgs = z.infer<typeof analyzeAudioArgsSchema>;

/**
 * mix_stems arguments
 */
export const mixStemsArgsSchema = withAliases(
  {
    stem_paths: 'stemPaths',
    num_peaks: 'numPeaks'
  },
  z.object({
    stemPaths: z
      .array(storageKey, { invalid_type_error: 'stemPaths must be an array of keys' })
      .min(1, 'stemPaths must include at least one path'),
    stageId: optionalText,
    upstreamId: optionalText,
    numPeaks: peakCount.optional()
  })
);

export type MixStemsArgs = z.infer<typeof mixStemsArgsSchema>;

/**
 * cleanup_temp arguments (threshold overrides)
 */
export const cleanupTempArgsSchema = withAliases(
  {
    max_age_seconds: 'maxAgeSeconds',
    stale_age_seconds: 'staleAgeSeconds'
  },
  z.object({
    maxAgeSeconds: z.coerce.number().int().positive().optional(),
    staleAgeSeconds: z.coerce.number().int().positive().optional()
  })
);

export type CleanupTempArgs = z.infer<typeof cleanupTempArgsSchema>;
