import { z } from 'zod';

/**
 * Wrapped protocol envelope: task name and id in headers,
 * arguments in a JSON-encoded `[positional, keyword]` body
 */
export const wrappedEnvelopeSchema = z.object({
  headers: z
    .object({
      task: z.string().min(1),
      id: z.union([z.string(), z.number()]).transform(String).optional(),
      retries: z.coerce.number().int().nonnegative().optional()
    })
    .passthrough(),
  body: z.union([z.string(), z.array(z.unknown())]),
  properties: z
    .object({
      body_encoding: z.string().optional()
    })
    .passthrough()
    .optional()
});

export type WrappedEnvelope = z.infer<typeof wrappedEnvelopeSchema>;

/**
 * Body of a wrapped envelope once decoded
 */
export const wrappedBodySchema = z
  .array(z.unknown())
  .transform((items) => ({
    positional: asArray(items[0]),
    keyword: isRecord(items[1]) ? items[1] : {}
  }));

export type WrappedBody = z.infer<typeof wrappedBodySchema>;

/**
 * Direct envelope: optional task/id/args/kwargs; everything else
 * is treated as keyword arguments when kwargs is absent
 */
export const directEnvelopeSchema = z
  .object({
    task: z.string().min(1).optional(),
    id: z.union([z.string(), z.number()]).transform(String).optional(),
    attempt: z.coerce.number().int().nonnegative().optional(),
    args: z.array(z.unknown()).optional(),
    kwargs: z.record(z.unknown()).optional()
  })
  .passthrough();

export type DirectEnvelope = z.infer<typeof directEnvelopeSchema>;

export const DIRECT_ENVELOPE_KEYS = ['task', 'id', 'attempt', 'args', 'kwargs'] as const;

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
