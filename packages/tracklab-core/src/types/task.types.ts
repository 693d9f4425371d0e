/**
 * Task pipeline types
 */

/**
 * Canonical unit of work decoded from a queue message.
 * `kind` is the raw task name; the router resolves it.
 */
export type TaskInvocation = {
  kind: string;
  id: string;
  args: Record<string, unknown>;
  positionalArgs: unknown[];
  attempt: number;
  envelope: 'wrapped' | 'direct';
};

export type MalformedReason = 'empty' | 'invalid_json' | 'degenerate' | 'invalid_envelope';

/**
 * A message that cannot become a task; deleted without processing
 */
export type MalformedMessage = {
  malformed: true;
  reason: MalformedReason;
  detail?: string;
};

export type DecodeResult = TaskInvocation | MalformedMessage;

export function isMalformed(result: DecodeResult): result is MalformedMessage {
  return 'malformed' in result;
}

/**
 * Execution state of one invocation
 */
export type TaskState = 'pending' | 'running' | 'succeeded' | 'retry_scheduled' | 'exhausted';
