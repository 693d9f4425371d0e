import { z } from 'zod';

/**
 * Waveform summary uploaded next to each analyzed file
 */
export const waveformSummarySchema = z
  .object({
    peaks: z.array(z.number().min(0).max(1)).describe('Normalized peak envelope'),
    durationSeconds: z.number().nonnegative().describe('Duration in seconds'),
    sampleRate: z.number().int().positive().describe('Native sample rate'),
    numPeaks: z.number().int().positive().describe('Requested peak count'),
    createdAt: z.string().datetime().describe('Creation timestamp')
  })
  .refine((summary) => summary.peaks.length === summary.numPeaks, {
    message: 'peaks length must equal numPeaks',
    path: ['peaks']
  });

export type WaveformSummary = z.infer<typeof waveformSummarySchema>;
