/**
 * Valid task execution state transitions
 */
export const TASK_STATE_TRANSITIONS: Record<string, string[]> = {
  pending: ['running'],
  running: ['succeeded', 'retry_scheduled', 'exhausted'],
  retry_scheduled: ['pending'], // Redelivery starts a new attempt
  succeeded: [],
  exhausted: []
};

export function canTransition(from: string, to: string): boolean {
  return (TASK_STATE_TRANSITIONS[from] ?? []).includes(to);
}
