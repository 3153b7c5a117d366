/**
 * Wall-clock access and calendar keys.
 *
 * Day-keyed counters partition on the local calendar date, the same clock
 * the sleep window reads, so "today" always resets at local midnight.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

function pad(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/** Local calendar date as YYYY-MM-DD. */
export function localDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local date plus hour, e.g. 2024-05-01T13. Changes on every wall-clock hour. */
export function localHourKey(date: Date): string {
  return `${localDateKey(date)}T${pad(date.getHours())}`;
}

const DAY_KEY = /^\d{4}-\d{2}-\d{2}$/;

export function isDateKey(value: string): boolean {
  return DAY_KEY.test(value);
}
