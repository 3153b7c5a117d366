import type { SleepWindow } from '../config/profiles.js';

/**
 * True when the local hour of `at` falls in [startHour, endHour).
 * A window with start > end wraps past midnight; start === end never matches.
 */
export function inSleepWindow(window: SleepWindow, at: Date): boolean {
  const { startHour, endHour } = window;
  if (startHour === endHour) return false;
  const hour = at.getHours();
  if (startHour < endHour) return hour >= startHour && hour < endHour;
  return hour >= startHour || hour < endHour;
}

/** Milliseconds until the window closes, or 0 when outside it. */
export function msUntilWindowEnds(window: SleepWindow, at: Date): number {
  if (!inSleepWindow(window, at)) return 0;
  const end = new Date(at);
  end.setHours(window.endHour, 0, 0, 0);
  if (end.getTime() <= at.getTime()) end.setDate(end.getDate() + 1);
  return end.getTime() - at.getTime();
}
