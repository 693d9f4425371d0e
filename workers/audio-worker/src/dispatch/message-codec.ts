import { randomUUID } from 'crypto';
import {
  DIRECT_ENVELOPE_KEYS,
  directEnvelopeSchema,
  wrappedBodySchema,
  wrappedEnvelopeSchema,
  type DecodeResult,
  type MalformedMessage,
  type MalformedReason,
  type TaskInvocation
} from '@tracklab/core';

export type DecodeOptions = {
  /** Task name used when a direct message names none */
  defaultKind: string;
  /** Broker message id; keeps the placeholder task id stable across redeliveries */
  messageId?: string;
};

type ParsedWrapped = {
  task: string;
  id?: string;
  retries?: number;
  positional: unknown[];
  keyword: Record<string, unknown>;
};

type ParsedDirect = {
  task?: string;
  id?: string;
  attempt?: number;
  positional: unknown[];
  keyword: Record<string, unknown>;
};

function malformed(reason: MalformedReason, detail?: string): MalformedMessage {
  return { malformed: true, reason, detail };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function placeholderId(messageId?: string): string {
  return `unknown-${messageId ?? randomUUID()}`;
}

function namesWrappedTask(value: Record<string, unknown>): boolean {
  const headers = value.headers;
  return isRecord(headers) && typeof headers.task === 'string';
}

/**
 * Wrapped producer format: `{ headers: { task, id, retries }, body }` where
 * body is a JSON (optionally base64) string of `[positional, keyword, ...]`
 */
export function parseWrappedEnvelope(value: Record<string, unknown>): ParsedWrapped | MalformedMessage {
  const envelope = wrappedEnvelopeSchema.safeParse(value);

  if (!envelope.success) {
    return malformed('invalid_envelope', envelope.error.issues[0]?.message);
  }

  const { headers, body, properties } = envelope.data;
  let items: unknown = body;

  if (typeof body === 'string') {
    const text = properties?.body_encoding === 'base64' ? Buffer.from(body, 'base64').toString('utf8') : body;

    try {
      items = JSON.parse(text);
    } catch {
      return malformed('invalid_envelope', 'body is not valid JSON');
    }
  }

  const decoded = wrappedBodySchema.safeParse(items);

  if (!decoded.success) {
    return malformed('invalid_envelope', 'body is not a JSON array');
  }

  return {
    task: headers.task,
    id: headers.id,
    retries: headers.retries,
    positional: decoded.data.positional,
    keyword: decoded.data.keyword
  };
}

/**
 * Direct producer format: `{ task?, id?, attempt?, args?, kwargs? }`.
 * Without kwargs every other field is a keyword argument.
 */
export function parseDirectEnvelope(value: Record<string, unknown>): ParsedDirect | MalformedMessage {
  const envelope = directEnvelopeSchema.safeParse(value);

  if (!envelope.success) {
    return malformed('invalid_envelope', envelope.error.issues[0]?.message);
  }

  const { task, id, attempt, args, kwargs } = envelope.data;
  let keyword: Record<string, unknown>;

  if (kwargs) {
    keyword = kwargs;
  } else {
    const reserved: readonly string[] = DIRECT_ENVELOPE_KEYS;
    keyword = Object.fromEntries(Object.entries(value).filter(([key]) => !reserved.includes(key)));
  }

  return { task, id, attempt, positional: args ?? [], keyword };
}

/**
 * Decode a raw queue body into a task invocation. Never throws.
 */
export function decodeMessage(raw: string, options: DecodeOptions): DecodeResult {
  if (raw.trim() === '') {
    return malformed('empty');
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return malformed('invalid_json', error instanceof Error ? error.message : undefined);
  }

  if (!isRecord(parsed) || Object.keys(parsed).length === 0) {
    return malformed('degenerate', parsed === null ? 'null' : Array.isArray(parsed) ? 'array' : typeof parsed);
  }

  if (namesWrappedTask(parsed)) {
    const wrapped = parseWrappedEnvelope(parsed);
    if ('malformed' in wrapped) return wrapped;

    return {
      kind: wrapped.task,
      id: wrapped.id ?? placeholderId(options.messageId),
      args: wrapped.keyword,
      positionalArgs: wrapped.positional,
      attempt: wrapped.retries ?? 0,
      envelope: 'wrapped'
    };
  }

  const direct = parseDirectEnvelope(parsed);
  if ('malformed' in direct) return direct;

  return {
    kind: direct.task ?? options.defaultKind,
    id: direct.id ?? placeholderId(options.messageId),
    args: direct.keyword,
    positionalArgs: direct.positional,
    attempt: direct.attempt ?? 0,
    envelope: 'direct'
  };
}

/**
 * Wrapped message for re-submitting an invocation at a later attempt
 */
export function encodeWrappedMessage(invocation: TaskInvocation, attempt: number): string {
  return JSON.stringify({
    headers: {
      task: invocation.kind,
      id: invocation.id,
      retries: attempt
    },
    body: JSON.stringify([invocation.positionalArgs, invocation.args, {}]),
    'content-type': 'application/json',
    properties: {
      body_encoding: 'utf-8'
    }
  });
}
