import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { WebhookError } from '@tracklab/core';
import { RecordingNotifier } from '@tracklab/test-utils';
import { HttpWebhookNotifier, buildEnvelope, notifyBestEffort } from '../src/webhook/notifier';

const settings = { baseUrl: 'http://localhost:3000/webhooks', timeoutMs: 5000 };
const envelope = buildEnvelope('stem-1', 'task-1', 'SUCCESS', { audioHash: 'abc' }, '2024-05-01T10:00:00.000Z');

function clientWith(adapter: AxiosAdapter) {
  return axios.create({ baseURL: settings.baseUrl, adapter });
}

async function ok(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
  return { data: {}, status: 200, statusText: 'OK', headers: {}, config };
}

describe('buildEnvelope', () => {
  it('should carry job, task, status and result', () => {
    expect(envelope).toEqual({
      jobId: 'stem-1',
      taskId: 'task-1',
      status: 'SUCCESS',
      result: { audioHash: 'abc' },
      timestamp: '2024-05-01T10:00:00.000Z'
    });
  });
});

describe('HttpWebhookNotifier', () => {
  it('should POST the envelope to the endpoint path', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const notifier = new HttpWebhookNotifier(settings, clientWith((config) => {
      requests.push(config);
      return ok(config);
    }));

    await notifier.notify('hash-check', envelope);

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe('/hash-check');
    expect(JSON.parse(String(requests[0].data))).toEqual(envelope);
  });

  it('should raise WebhookError with the HTTP status on failure', async () => {
    const notifier = new HttpWebhookNotifier(settings, clientWith(async (config) => {
      throw new AxiosError('Request failed with status code 503', AxiosError.ERR_BAD_RESPONSE, config, undefined, {
        data: {},
        status: 503,
        statusText: 'Service Unavailable',
        headers: {},
        config
      });
    }));

    const error = await notifier.notify('completion', envelope).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WebhookError);
    expect(error).toMatchObject({
      message: 'Webhook completion failed: Request failed with status code 503',
      retryable: true,
      context: { endpoint: 'completion', jobId: 'stem-1', httpStatus: 503 }
    });
  });

  it('should report timeouts distinctly', async () => {
    const notifier = new HttpWebhookNotifier(settings, clientWith(async (config) => {
      throw new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED', config);
    }));

    await expect(notifier.notify('completion', envelope)).rejects.toThrow('Webhook completion timed out');
  });
});

describe('notifyBestEffort', () => {
  it('should swallow delivery failures and report them', async () => {
    const notifier = new RecordingNotifier();
    notifier.failing.add('waveform-update');

    await expect(notifyBestEffort(notifier, 'waveform-update', envelope)).resolves.toBe(false);
    await expect(notifyBestEffort(notifier, 'completion', envelope)).resolves.toBe(true);
    expect(notifier.calls.map((call) => call.delivered)).toEqual([false, true]);
  });
});
