/**
 * Interruptible sleep.
 *
 * Every suspension point in the scheduler goes through a Sleeper so that
 * stop() cuts long waits short and tests can record requested durations.
 */

import { setTimeout as delay } from 'timers/promises';

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or early (without throwing) when the signal aborts. */
export const timerSleeper: Sleeper = async (ms, signal) => {
  if (ms <= 0 || signal.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) return;
    throw err;
  }
};
