/**
 * Pacing profiles.
 *
 * One policy implementation, several parameter sets. `cautious` is the
 * default; `disabled` removes every delay and random skip for local runs.
 */

import type { ActionKind } from '../domain/types.js';
import type { Range } from '../pacing/random.js';

export type PacingProfileName = 'cautious' | 'relaxed' | 'disabled';

export interface SleepWindow {
  /** Local hour (0-23) the window opens. */
  startHour: number;
  /** Local hour (0-23) the window closes (exclusive). Equal to start disables it. */
  endHour: number;
}

export interface EngagementAction {
  kind: ActionKind;
  /** Probability of taking this action on each considered item. */
  chance: number;
  /** Pause after the action executes. */
  delayMs: Range;
}

/**
 * Light engagement interleaved with the main action kind: on some cycles,
 * the leading items of the batch may also be liked or reposted.
 */
export interface EngagementConfig {
  /** Probability a cycle includes an engagement pass (0 disables it). */
  cycleChance: number;
  /** Leading batch items the pass considers. */
  topItems: number;
  actions: EngagementAction[];
}

export interface PacingConfig {
  profile: PacingProfileName;
  /** Maximum executed actions per local calendar day, per kind. */
  dailyLimits: Record<ActionKind, number>;
  /** Integer range the hourly target is drawn from at each new hour. */
  hourlyTargetRange: Range;
  /** Kinds counted against the hourly target. */
  hourlyKinds: ActionKind[];
  /** Integer range the session length is drawn from after every break. */
  sessionTargetRange: Range;
  /** Break length range in minutes. */
  breakMinutesRange: Range;
  sleepWindow: SleepWindow;
  /** Per-candidate skip probability range. */
  skipChanceRange: Range;
  /** Minimum time between two contacts with the same account. */
  accountCooldownMs: number;
  engagement: EngagementConfig;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const LIGHT_ENGAGEMENT: EngagementConfig = {
  cycleChance: 0.3,
  topItems: 2,
  actions: [
    { kind: 'like', chance: 0.3, delayMs: [3_000, 8_000] },
    { kind: 'retweet', chance: 0.1, delayMs: [5_000, 15_000] },
  ],
};

const DEFAULT_DAILY_LIMITS: Record<ActionKind, number> = {
  reply: 70,
  like: 20,
  retweet: 4,
  post: 2,
  thread: 1,
  quote: 2,
};

export const PACING_PROFILES: Record<PacingProfileName, PacingConfig> = {
  cautious: {
    profile: 'cautious',
    dailyLimits: { ...DEFAULT_DAILY_LIMITS },
    hourlyTargetRange: [8, 12],
    hourlyKinds: ['reply'],
    sessionTargetRange: [3, 7],
    breakMinutesRange: [5, 25],
    sleepWindow: { startHour: 2, endHour: 7 },
    skipChanceRange: [0.2, 0.35],
    accountCooldownMs: DAY_MS,
    engagement: LIGHT_ENGAGEMENT,
  },

  relaxed: {
    profile: 'relaxed',
    dailyLimits: { ...DEFAULT_DAILY_LIMITS, reply: 100, like: 40 },
    hourlyTargetRange: [8, 14],
    hourlyKinds: ['reply'],
    sessionTargetRange: [4, 9],
    breakMinutesRange: [3, 15],
    sleepWindow: { startHour: 2, endHour: 7 },
    skipChanceRange: [0.1, 0.2],
    accountCooldownMs: DAY_MS,
    engagement: LIGHT_ENGAGEMENT,
  },

  disabled: {
    profile: 'disabled',
    dailyLimits: { reply: 9999, like: 9999, retweet: 9999, post: 9999, thread: 9999, quote: 9999 },
    hourlyTargetRange: [9999, 9999],
    hourlyKinds: [],
    sessionTargetRange: [9999, 9999],
    breakMinutesRange: [0, 0],
    sleepWindow: { startHour: 0, endHour: 0 },
    skipChanceRange: [0, 0],
    accountCooldownMs: 0,
    engagement: { cycleChance: 0, topItems: 0, actions: [] },
  },
};
