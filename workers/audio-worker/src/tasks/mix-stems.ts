import { promises as fs } from 'fs';
import * as path from 'path';
import {
  MIX_WAVEFORM_PEAKS,
  createLogger,
  fromError,
  mixStemsArgsSchema,
  nowIso,
  succeed,
  toError,
  type TaskResult
} from '@tracklab/core';
import type { StemAudio } from '../audio/audio.types';
import { buildEnvelope, notifyBestEffort } from '../webhook/notifier';
import { downloadOrThrow, parseArgs, uploadedOrThrow, type TaskContext } from './task-context';

const logger = createLogger('mix-stems');

export type MixStemsValue = {
  stageId?: string;
  upstreamId?: string;
  mixedFilePath: string;
  waveformDataPath: string | null;
  stemCount: number;
  stemPaths: string[];
  skippedStemPaths: string[];
  sampleRate: number;
  durationSeconds: number;
  processedAt: string;
};

export function mixedFileKey(mixId: string, taskId: string): string {
  return `mixed/${mixId}_mixed_${taskId}.wav`;
}

export function mixedWaveformKey(mixId: string, taskId: string): string {
  return `waveforms/${mixId}_mixed_waveform_${taskId}.json`;
}

/**
 * Mix stems into one mono WAV plus a companion waveform.
 * Any stem that fails to download or decode fails the whole mix.
 */
export async function mixStemsTask(
  rawArgs: Record<string, unknown>,
  context: TaskContext
): Promise<TaskResult<MixStemsValue>> {
  try {
    const args = parseArgs(mixStemsArgsSchema, rawArgs);
    const mixId = args.stageId ?? args.upstreamId ?? context.taskId;

    logger.info({
      taskId: context.taskId,
      stageId: args.stageId,
      stemCount: args.stemPaths.length,
      attempt: context.attempt
    }, 'Mixing stems');

    const stems: StemAudio[] = [];

    for (const stemPath of args.stemPaths) {
      const localPath = await context.temp.acquire('stem', path.extname(stemPath) || '.wav');
      await downloadOrThrow(context.store, stemPath, localPath);

      const audio = await context.processor.decode(localPath);
      stems.push({ key: stemPath, samples: audio.samples, sampleRate: audio.sampleRate });
    }

    const mix = context.processor.mix(stems);

    const mixedPath = await context.temp.acquire('mixed', '.wav');
    await fs.writeFile(mixedPath, context.processor.encode(mix.samples, mix.sampleRate));

    const mixedKey = mixedFileKey(mixId, context.taskId);
    const mixedFilePath = uploadedOrThrow(await context.store.upload(mixedPath, mixedKey, 'audio/wav'), mixedKey);

    let waveformDataPath: string | null = null;

    try {
      const waveform = context.processor.summarize(mix, args.numPeaks ?? MIX_WAVEFORM_PEAKS);
      waveformDataPath = await context.store.uploadJson(waveform, mixedWaveformKey(mixId, context.taskId));

      if (!waveformDataPath) {
        logger.warn({ taskId: context.taskId, mixId }, 'Mixed waveform upload failed');
      }
    } catch (error) {
      logger.warn({ taskId: context.taskId, mixId, error: toError(error).message }, 'Mixed waveform generation failed');
    }

    const value: MixStemsValue = {
      stageId: args.stageId,
      upstreamId: args.upstreamId,
      mixedFilePath,
      waveformDataPath,
      stemCount: mix.includedKeys.length,
      stemPaths: args.stemPaths,
      skippedStemPaths: mix.skippedKeys,
      sampleRate: mix.sampleRate,
      durationSeconds: mix.samples.length / mix.sampleRate,
      processedAt: nowIso()
    };

    if (args.stageId) {
      await notifyBestEffort(
        context.notifier,
        'mixing-complete',
        buildEnvelope(args.stageId, context.taskId, 'SUCCESS', value)
      );
    }

    logger.info({ taskId: context.taskId, mixId, mixedFilePath, waveformDataPath }, 'Mix complete');

    return succeed(value);
  } catch (error) {
    logger.error({ taskId: context.taskId, error }, 'Mix failed');
    return fromError(error);
  }
}
