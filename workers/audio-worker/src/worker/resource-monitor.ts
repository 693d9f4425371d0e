import * as os from 'os';
import { createLogger, sleep } from '@tracklab/core';

const logger = createLogger('resource-monitor');

type CpuTimes = { idle: number; total: number };

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;

  for (const cpu of os.cpus()) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }

  return { idle, total };
}

function roundPercent(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * System memory in use, percent
 */
export function memoryUsagePercent(): number {
  const total = os.totalmem();
  return total > 0 ? roundPercent(((total - os.freemem()) / total) * 100) : 0;
}

/**
 * CPU busy percent across all cores, measured over `sampleMs`
 */
export async function cpuUsagePercent(sampleMs: number): Promise<number> {
  const start = readCpuTimes();
  await sleep(sampleMs);
  const end = readCpuTimes();

  const total = end.total - start.total;
  if (total <= 0) return 0;

  return roundPercent((1 - (end.idle - start.idle) / total) * 100);
}

/**
 * Debug trace of process memory at a processing stage
 */
export function logMemoryUsage(stage: string, fields: Record<string, unknown> = {}): void {
  if (!logger.isLevelEnabled('debug')) return;

  const usage = process.memoryUsage();
  const megabyte = 1024 * 1024;

  logger.debug({
    ...fields,
    stage,
    rssMB: Math.round(usage.rss / megabyte),
    heapUsedMB: Math.round(usage.heapUsed / megabyte)
  }, 'Memory usage');
}
