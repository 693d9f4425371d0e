import axios, { AxiosInstance } from 'axios';
import {
  WebhookError,
  createLogger,
  nowIso,
  toError,
  type Notifier,
  type TaskStatus,
  type WebhookEndpoint,
  type WebhookEnvelope
} from '@tracklab/core';
import type { WorkerSettings } from '../config/worker-settings';

const logger = createLogger('webhook-notifier');

export function buildEnvelope(
  jobId: string,
  taskId: string,
  status: TaskStatus,
  result: Record<string, unknown>,
  timestamp: string = nowIso()
): WebhookEnvelope {
  return { jobId, taskId, status, result, timestamp };
}

/**
 * Progress and housekeeping callbacks: failures are logged, not raised
 */
export async function notifyBestEffort(
  notifier: Notifier,
  endpoint: WebhookEndpoint,
  envelope: WebhookEnvelope
): Promise<boolean> {
  try {
    await notifier.notify(endpoint, envelope);
    return true;
  } catch (error) {
    logger.warn({
      endpoint,
      jobId: envelope.jobId,
      taskId: envelope.taskId,
      error: toError(error).message
    }, 'Best-effort webhook failed');
    return false;
  }
}

/**
 * Posts JSON callbacks to `{baseUrl}/{endpoint}`
 */
export class HttpWebhookNotifier implements Notifier {
  private client: AxiosInstance;

  constructor(settings: WorkerSettings['webhook'], client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      headers: { 'Content-Type': 'application/json' }
    });

    logger.info({ baseUrl: settings.baseUrl, timeout: settings.timeoutMs }, 'Webhook notifier initialized');
  }

  async notify(endpoint: WebhookEndpoint, envelope: WebhookEnvelope): Promise<void> {
    const startTime = Date.now();

    try {
      const response = await this.client.post(`/${endpoint}`, envelope);

      logger.info({
        endpoint,
        jobId: envelope.jobId,
        status: envelope.status,
        httpStatus: response.status,
        duration: Date.now() - startTime
      }, 'Webhook delivered');
    } catch (error) {
      const duration = Date.now() - startTime;

      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED') {
          logger.error({ endpoint, duration }, 'Webhook timeout');
          throw new WebhookError(`Webhook ${endpoint} timed out`, { endpoint, jobId: envelope.jobId });
        }

        logger.error({
          endpoint,
          httpStatus: error.response?.status,
          error: error.message,
          duration
        }, 'Webhook failed');

        throw new WebhookError(`Webhook ${endpoint} failed: ${error.message}`, {
          endpoint,
          jobId: envelope.jobId,
          httpStatus: error.response?.status
        });
      }

      throw error;
    }
  }
}
