import { createLogger, nowIso, succeed, toError, type TaskResult } from '@tracklab/core';
import { cpuUsagePercent, memoryUsagePercent } from '../worker/resource-monitor';
import type { TaskContext } from './task-context';

const logger = createLogger('health-check');

// 'ok' or the probe's error message
export type ProbeStatus = string;

export type HealthCheckValue = {
  status: 'healthy' | 'degraded';
  timestamp: string;
  connections: {
    storage: ProbeStatus;
    queue: ProbeStatus;
  };
  systemResources: {
    memoryUsagePercent: number;
    cpuUsagePercent: number;
  };
};

async function runProbe(probe: () => Promise<void>): Promise<ProbeStatus> {
  try {
    await probe();
    return 'ok';
  } catch (error) {
    return `error: ${toError(error).message}`;
  }
}

/**
 * Probe storage and queue reachability and sample local resources.
 * Probe failures are reported in the result, never raised.
 */
export async function healthCheck(
  _args: Record<string, unknown>,
  context: TaskContext
): Promise<TaskResult<HealthCheckValue>> {
  const [storage, queue, cpu] = await Promise.all([
    runProbe(() => context.store.probe()),
    runProbe(() => context.queue.probe()),
    cpuUsagePercent(context.settings.health.cpuSampleMs)
  ]);

  const value: HealthCheckValue = {
    status: storage === 'ok' && queue === 'ok' ? 'healthy' : 'degraded',
    timestamp: nowIso(),
    connections: { storage, queue },
    systemResources: {
      memoryUsagePercent: memoryUsagePercent(),
      cpuUsagePercent: cpu
    }
  };

  if (value.status === 'healthy') {
    logger.info({ taskId: context.taskId, ...value.systemResources }, 'Health check passed');
  } else {
    logger.warn({ taskId: context.taskId, connections: value.connections }, 'Health check degraded');
  }

  return succeed(value);
}
