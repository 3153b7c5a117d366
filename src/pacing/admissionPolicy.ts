/**
 * Admission Policy
 *
 * Decides whether one more action of a given kind may run now. Checks run
 * in a fixed order and the first failure wins:
 *
 *   sleep window → daily limit → hourly target → session break
 *     → already acted → account cooldown → random skip
 *
 * The first four apply to every candidate alike (global scope); the last
 * three only to the candidate at hand. Daily counts and cooldowns live in the
 * shared CounterStore; hourly and session counters are process-local.
 */

import type { ActionKind, AdmissionReason } from '../domain/types.js';
import type { PacingConfig } from '../config/profiles.js';
import type { CounterStore } from '../store/counterStore.js';
import type { RecentHistory } from '../store/recentHistory.js';
import { type Clock, systemClock, localHourKey } from './clock.js';
import { type Rng, mathRng, randomInt, uniform } from './random.js';
import { inSleepWindow, msUntilWindowEnds } from './sleepWindow.js';
import { createLogger, type ComponentLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type AdmissionScope = 'global' | 'candidate';

export type AdmissionDecision =
  | { allowed: true }
  | {
      allowed: false;
      reason: AdmissionReason;
      scope: AdmissionScope;
      detail: string;
      /** For global rejections: how long until the condition can clear. */
      retryAfterMs?: number;
    };

/** What an action is aimed at. Both parts are optional. */
export interface AdmissionTarget {
  /** Author handle, for the per-account cooldown. */
  account?: string;
  /** Candidate id, for the acted-once check. */
  targetId?: string;
}

export interface SessionState {
  sessionActions: number;
  sessionTarget: number;
  hourKey: string;
  actionsThisHour: number;
  hourlyTarget: number;
  /** Epoch ms the current break ends, or null when not on a break. */
  breakUntilMs: number | null;
}

export interface RecordOutcome {
  /** New daily count for the kind, or null when the write failed. */
  dailyCount: number | null;
  /** Break to take before the next action, or null. */
  breakMs: number | null;
  /** First storage failure while recording; the action itself already happened. */
  bookkeepingError: Error | null;
}

export interface AdmissionPolicyDeps {
  store: CounterStore;
  history: RecentHistory;
  clock?: Clock;
  rng?: Rng;
  logger?: ComponentLogger;
}

const HOUR_MS = 3_600_000;
const MINUTE_MS = 60_000;

function formatHours(ms: number): string {
  return `${(ms / HOUR_MS).toFixed(1)}h`;
}

// ============================================================================
// POLICY
// ============================================================================

export class AdmissionPolicy {
  private readonly store: CounterStore;
  private readonly history: RecentHistory;
  private readonly clock: Clock;
  private readonly rng: Rng;
  private readonly logger: ComponentLogger;
  private state: SessionState;

  constructor(private readonly config: PacingConfig, deps: AdmissionPolicyDeps) {
    this.store = deps.store;
    this.history = deps.history;
    this.clock = deps.clock ?? systemClock;
    this.rng = deps.rng ?? mathRng;
    this.logger = deps.logger ?? createLogger('admission');
    this.state = {
      sessionActions: 0,
      sessionTarget: randomInt(this.rng, config.sessionTargetRange),
      hourKey: localHourKey(this.clock.now()),
      actionsThisHour: 0,
      hourlyTarget: randomInt(this.rng, config.hourlyTargetRange),
      breakUntilMs: null,
    };
  }

  getConfig(): PacingConfig {
    return this.config;
  }

  snapshot(): SessionState {
    return { ...this.state };
  }

  isSleepWindow(at: Date = this.clock.now()): boolean {
    return inSleepWindow(this.config.sleepWindow, at);
  }

  /**
   * Reset the hourly counter and draw a new target when the wall-clock hour
   * has changed since the last check. Returns true on rollover.
   */
  rollHour(at: Date = this.clock.now()): boolean {
    const key = localHourKey(at);
    if (key === this.state.hourKey) return false;
    this.state.hourKey = key;
    this.state.actionsThisHour = 0;
    this.state.hourlyTarget = randomInt(this.rng, this.config.hourlyTargetRange);
    this.logger.info('hourly_reset', { hourKey: key, hourlyTarget: this.state.hourlyTarget });
    return true;
  }

  countsTowardHour(kind: ActionKind): boolean {
    return this.config.hourlyKinds.includes(kind);
  }

  hourlyTargetMet(kind: ActionKind): boolean {
    return this.countsTowardHour(kind) && this.state.actionsThisHour >= this.state.hourlyTarget;
  }

  /** Run every check for one candidate action. */
  async admit(kind: ActionKind, target: AdmissionTarget = {}): Promise<AdmissionDecision> {
    const global = await this.checkGlobal(kind);
    if (!global.allowed) return global;
    return this.checkCandidate(kind, target);
  }

  /** Executed actions of `kind` still allowed today. */
  async dailyRemaining(kind: ActionKind, at: Date = this.clock.now()): Promise<number> {
    const today = await this.store.getTodayCount(kind, at);
    return Math.max(0, this.config.dailyLimits[kind] - today);
  }

  /** Checks shared by every candidate: sleep window, daily, hourly, session break. */
  async checkGlobal(kind: ActionKind): Promise<AdmissionDecision> {
    const now = this.clock.now();
    this.rollHour(now);

    if (this.isSleepWindow(now)) {
      const { startHour, endHour } = this.config.sleepWindow;
      return {
        allowed: false,
        reason: 'sleep_window',
        scope: 'global',
        detail: `Sleep window ${startHour}:00-${endHour}:00`,
        retryAfterMs: msUntilWindowEnds(this.config.sleepWindow, now),
      };
    }

    const limit = this.config.dailyLimits[kind];
    const today = await this.store.getTodayCount(kind, now);
    if (today >= limit) {
      return {
        allowed: false,
        reason: 'daily_limit',
        scope: 'global',
        detail: `Daily limit reached (${today}/${limit})`,
      };
    }

    if (this.hourlyTargetMet(kind)) {
      const nextHour = new Date(now);
      nextHour.setMinutes(60, 0, 0);
      return {
        allowed: false,
        reason: 'hourly_limit',
        scope: 'global',
        detail: `Hourly limit reached (${this.state.actionsThisHour}/${this.state.hourlyTarget})`,
        retryAfterMs: nextHour.getTime() - now.getTime(),
      };
    }

    const breakUntil = this.state.breakUntilMs;
    if (breakUntil !== null) {
      if (now.getTime() < breakUntil) {
        return {
          allowed: false,
          reason: 'session_break',
          scope: 'global',
          detail: `On a session break until ${new Date(breakUntil).toISOString()}`,
          retryAfterMs: breakUntil - now.getTime(),
        };
      }
      this.endBreak();
    }

    return { allowed: true };
  }

  /** Checks specific to one candidate: already acted, account cooldown, random skip. */
  async checkCandidate(kind: ActionKind, target: AdmissionTarget = {}): Promise<AdmissionDecision> {
    const now = this.clock.now();
    const { account, targetId } = target;
    const cooldownMs = this.config.accountCooldownMs;

    if (targetId && await this.store.hasActedOn(targetId, kind)) {
      return {
        allowed: false,
        reason: 'already_acted',
        scope: 'candidate',
        detail: `Already acted on ${targetId} (${kind})`,
      };
    }

    if (account && cooldownMs > 0 && await this.store.isAccountOnCooldown(account, cooldownMs, now)) {
      const last = await this.store.getLastContact(account);
      const elapsed = last === null ? 0 : now.getTime() - last;
      return {
        allowed: false,
        reason: 'account_cooldown',
        scope: 'candidate',
        detail: `@${account} contacted ${formatHours(elapsed)} ago, ${formatHours(cooldownMs - elapsed)} cooldown remaining`,
      };
    }

    const probability = uniform(this.rng, this.config.skipChanceRange);
    const roll = this.rng.next();
    if (roll < probability) {
      return {
        allowed: false,
        reason: 'random_skip',
        scope: 'candidate',
        detail: `Randomly skipped (p=${probability.toFixed(2)})`,
      };
    }

    return { allowed: true };
  }

  /**
   * Advance counters after an action executed. In-memory counters move first
   * so pacing stays correct even if the durable writes fail.
   */
  async recordSuccess(kind: ActionKind, target: AdmissionTarget, text: string | null): Promise<RecordOutcome> {
    const now = this.clock.now();
    const { account, targetId } = target;
    this.rollHour(now);
    if (this.countsTowardHour(kind)) this.state.actionsThisHour++;
    this.state.sessionActions++;

    let dailyCount: number | null = null;
    let bookkeepingError: Error | null = null;
    const attempt = async (operation: string, fn: () => Promise<void>): Promise<void> => {
      try {
        await fn();
      } catch (err) {
        const error = toError(err);
        bookkeepingError ??= error;
        this.logger.error('bookkeeping_failed', {
          operation,
          kind,
          account,
          error: error.message,
          note: 'action already executed externally; durable accounting is now behind',
        });
      }
    };

    await attempt('recordAction', async () => {
      dailyCount = await this.store.recordAction(kind, now);
    });
    if (targetId) {
      await attempt('recordActedTarget', () => this.store.recordActedTarget(targetId, kind, now));
    }
    if (account) {
      await attempt('recordAccountContact', () => this.store.recordAccountContact(account, now));
    }
    if (text) {
      await attempt('appendReplyHistory', () => this.history.append(text, now));
    }

    let breakMs: number | null = null;
    if (this.state.sessionActions >= this.state.sessionTarget) {
      breakMs = Math.round(uniform(this.rng, this.config.breakMinutesRange) * MINUTE_MS);
      if (breakMs > 0) {
        this.state.breakUntilMs = now.getTime() + breakMs;
        this.logger.info('session_break', {
          sessionActions: this.state.sessionActions,
          sessionTarget: this.state.sessionTarget,
          breakMs,
        });
      } else {
        this.endBreak();
        breakMs = null;
      }
    }

    return { dailyCount, breakMs, bookkeepingError };
  }

  /** Finish a break: zero the session and draw the next session length. */
  endBreak(): void {
    this.state.breakUntilMs = null;
    this.state.sessionActions = 0;
    this.state.sessionTarget = randomInt(this.rng, this.config.sessionTargetRange);
    this.logger.info('session_reset', { sessionTarget: this.state.sessionTarget });
  }
}
