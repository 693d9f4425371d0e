import * as path from 'path';
import {
  analyzeAudioArgsSchema,
  createLogger,
  fromError,
  nowIso,
  succeed,
  type TaskResult
} from '@tracklab/core';
import { buildEnvelope, notifyBestEffort } from '../webhook/notifier';
import { downloadOrThrow, parseArgs, uploadedOrThrow, type TaskContext } from './task-context';

const logger = createLogger('analyze-audio');

export type AnalyzeAudioValue = {
  stemId: string;
  userId?: string;
  trackId?: string;
  upstreamId?: string;
  originalFilename?: string;
  audioHash: string;
  waveformDataPath: string;
  fileSize: number;
  mimeType: string;
  durationSeconds: number;
  sampleRate: number;
  numPeaks: number;
  processingTimeMs: number;
  processedAt: string;
};

export function waveformKey(stemId: string, taskId: string): string {
  return `waveforms/${stemId}_waveform_${taskId}.json`;
}

/**
 * Full analysis of one stem: hash, waveform summary upload, completion callback.
 * The source object is left in place.
 */
export async function analyzeAudio(
  rawArgs: Record<string, unknown>,
  context: TaskContext
): Promise<TaskResult<AnalyzeAudioValue>> {
  const startTime = Date.now();

  try {
    const args = parseArgs(analyzeAudioArgsSchema, rawArgs);
    const numPeaks = args.numPeaks ?? context.settings.audio.defaultPeakCount;

    logger.info({
      taskId: context.taskId,
      stemId: args.stemId,
      filepath: args.filepath,
      numPeaks,
      attempt: context.attempt
    }, 'Analyzing audio');

    const localPath = await context.temp.acquire('audio', path.extname(args.filepath) || '.wav');
    await downloadOrThrow(context.store, args.filepath, localPath);

    const analysis = await context.processor.analyze(localPath, numPeaks);

    const key = waveformKey(args.stemId, context.taskId);
    const waveformDataPath = uploadedOrThrow(await context.store.uploadJson(analysis.waveform, key), key);

    await notifyBestEffort(
      context.notifier,
      'waveform-update',
      buildEnvelope(args.stemId, context.taskId, 'SUCCESS', {
        stemId: args.stemId,
        waveformDataPath,
        numPeaks,
        status: 'waveform_ready'
      })
    );

    const value: AnalyzeAudioValue = {
      stemId: args.stemId,
      userId: args.userId,
      trackId: args.trackId,
      upstreamId: args.upstreamId,
      originalFilename: args.originalFilename,
      audioHash: analysis.contentHash,
      waveformDataPath,
      fileSize: analysis.file.sizeBytes,
      mimeType: analysis.file.mimeType,
      durationSeconds: analysis.waveform.durationSeconds,
      sampleRate: analysis.waveform.sampleRate,
      numPeaks: analysis.waveform.numPeaks,
      processingTimeMs: Date.now() - startTime,
      processedAt: nowIso()
    };

    await context.notifier.notify('completion', buildEnvelope(args.stemId, context.taskId, 'SUCCESS', value));

    logger.info({
      taskId: context.taskId,
      stemId: args.stemId,
      waveformDataPath,
      durationSeconds: value.durationSeconds
    }, 'Analysis complete');

    return succeed(value);
  } catch (error) {
    logger.error({ taskId: context.taskId, error }, 'Analysis failed');
    return fromError(error);
  }
}
