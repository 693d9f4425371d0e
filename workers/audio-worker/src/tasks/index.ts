import type { TaskKind } from '@tracklab/core';
import { analyzeAudio } from './analyze-audio';
import { cleanupTemp } from './cleanup-temp';
import { deleteDuplicate } from './delete-duplicate';
import { hashAndNotify } from './hash-and-notify';
import { healthCheck } from './health-check';
import { mixStemsTask } from './mix-stems';
import type { TaskHandler } from './task-context';

export type TaskHandlers = {
  hashAndNotify: TaskHandler;
  deleteDuplicate: TaskHandler;
  analyzeAudio: TaskHandler;
  mixStems: TaskHandler;
  healthCheck: TaskHandler;
  cleanupTemp: TaskHandler;
};

export const defaultTaskHandlers: TaskHandlers = {
  hashAndNotify,
  deleteDuplicate,
  analyzeAudio,
  mixStems: mixStemsTask,
  healthCheck,
  cleanupTemp
};

export function resolveHandler(kind: TaskKind, handlers: TaskHandlers = defaultTaskHandlers): TaskHandler {
  switch (kind) {
    case 'hash_and_notify':
      return handlers.hashAndNotify;
    case 'delete_duplicate':
      return handlers.deleteDuplicate;
    case 'analyze_audio':
      return handlers.analyzeAudio;
    case 'mix_stems':
      return handlers.mixStems;
    case 'health_check':
      return handlers.healthCheck;
    case 'cleanup_temp':
      return handlers.cleanupTemp;
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled task kind: ${String(unreachable)}`);
    }
  }
}

export * from './task-context';
export * from './hash-and-notify';
export * from './delete-duplicate';
export * from './analyze-audio';
export * from './mix-stems';
export * from './health-check';
export * from './cleanup-temp';
