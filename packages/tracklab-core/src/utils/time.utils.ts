import { differenceInSeconds } from 'date-fns';

/**
 * Current UTC timestamp in ISO-8601 form
 */
export function nowIso(now: Date = new Date()): string {
  return now.toISOString();
}

/**
 * Age of a file or event in whole seconds
 */
export function ageInSeconds(since: Date, now: Date = new Date()): number {
  return differenceInSeconds(now, since);
}

/**
 * Promise-based sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
