import { taskKindEnum, type TaskKind } from '@tracklab/core';

/**
 * Legacy producer task names
 */
const TASK_ALIASES = new Map<string, TaskKind>([
  ['app.tasks.generate_hash_and_webhook', 'hash_and_notify'],
  ['app.tasks.process_duplicate_file', 'delete_duplicate'],
  ['app.tasks.process_audio_analysis', 'analyze_audio'],
  ['app.tasks.mix_stems_and_upload', 'mix_stems'],
  ['app.tasks.health_check', 'health_check'],
  ['app.tasks.cleanup_temp_files', 'cleanup_temp'],
  ['cleanup_temp_files', 'cleanup_temp']
]);

export function resolveTaskKind(name: string): TaskKind | undefined {
  const canonical = taskKindEnum.safeParse(name);
  return canonical.success ? canonical.data : TASK_ALIASES.get(name);
}

/**
 * Kinds that run once: a failure is reported, never retried
 */
export function isRetriedKind(kind: TaskKind): boolean {
  switch (kind) {
    case 'hash_and_notify':
    case 'delete_duplicate':
    case 'analyze_audio':
    case 'mix_stems':
      return true;
    case 'health_check':
    case 'cleanup_temp':
      return false;
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}
