import { faker } from '@faker-js/faker';
import type { TaskInvocation } from '@tracklab/core';

export interface InvocationFactoryOptions {
  kind?: string;
  id?: string;
  args?: Record<string, unknown>;
  positionalArgs?: unknown[];
  attempt?: number;
  envelope?: TaskInvocation['envelope'];
}

export function createInvocation(options: InvocationFactoryOptions = {}): TaskInvocation {
  return {
    kind: options.kind ?? 'hash_and_notify',
    id: options.id ?? faker.string.uuid(),
    args: options.args ?? {},
    positionalArgs: options.positionalArgs ?? [],
    attempt: options.attempt ?? 0,
    envelope: options.envelope ?? 'direct'
  };
}

export function createStemArgs(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const stemId = faker.string.uuid();

  return {
    stemId,
    userId: faker.string.uuid(),
    trackId: faker.string.uuid(),
    filepath: `uploads/${stemId}.wav`,
    timestamp: faker.date.recent().toISOString(),
    original_filename: `${faker.word.noun()}.wav`,
    ...overrides
  };
}
