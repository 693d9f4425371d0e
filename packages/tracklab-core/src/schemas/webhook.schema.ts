import { z } from 'zod';
import { taskKindEnum } from './task.schema';

/**
 * Webhook endpoint suffixes under the configured base URL
 */
export const webhookEndpointEnum = z.enum([
  'hash-check',
  'completion',
  'mixing-complete',
  'duplicate-delete-complete',
  'waveform-update'
]);

export type WebhookEndpoint = z.infer<typeof webhookEndpointEnum>;

export const taskStatusEnum = z.enum(['SUCCESS', 'FAILURE']);

export type TaskStatus = z.infer<typeof taskStatusEnum>;

/**
 * Result of one task invocation, returned in-process and
 * serialized into webhook payloads
 */
export const processingResultSchema = z.object({
  taskId: z.string().min(1),
  kind: taskKindEnum,
  status: taskStatusEnum,
  result: z.record(z.unknown()),
  processedAt: z.string().datetime(),
  error: z
    .object({
      code: z.string(),
      message: z.string()
    })
    .optional()
});

export type ProcessingResult = z.infer<typeof processingResultSchema>;

/**
 * Body POSTed to every webhook endpoint
 */
export const webhookEnvelopeSchema = z.object({
  jobId: z.string().min(1).describe('stemId or stageId the callback is about'),
  taskId: z.string().min(1),
  status: taskStatusEnum,
  result: z.record(z.unknown()),
  timestamp: z.string().datetime()
});

export type WebhookEnvelope = z.infer<typeof webhookEnvelopeSchema>;
