import { describe, it, expect } from 'vitest';
import { AdmissionPolicy } from '../../src/pacing/admissionPolicy.js';
import { InMemoryCounterStore } from '../../src/store/counterStore.js';
import { RecentHistory } from '../../src/store/recentHistory.js';
import { sequenceRng, type Rng } from '../../src/pacing/random.js';
import type { PacingConfig } from '../../src/config/profiles.js';
import { ManualClock, localDate, quietPacing } from '../helpers/fakes.js';

const HOUR_MS = 3_600_000;
const MINUTE_MS = 60_000;

function setup(pacing: Partial<PacingConfig> = {}, at = localDate(2024, 5, 1, 10, 15), rng: Rng = sequenceRng([0.5])) {
  const store = new InMemoryCounterStore();
  const history = new RecentHistory(store);
  const clock = new ManualClock(at);
  const policy = new AdmissionPolicy(quietPacing(pacing), { store, history, clock, rng });
  return { store, history, clock, policy };
}

describe('AdmissionPolicy', () => {
  it('admits when nothing limits the action', async () => {
    const { policy } = setup();
    expect(await policy.admit('reply', { account: 'alice' })).toEqual({ allowed: true });
  });

  // ──────────────────────────────────────────────────────────────────────────
  // GLOBAL CHECKS
  // ──────────────────────────────────────────────────────────────────────────

  it('rejects inside the sleep window before looking at the daily limit', async () => {
    const { policy, store, clock } = setup(
      { sleepWindow: { startHour: 2, endHour: 7 }, dailyLimits: { ...quietPacing().dailyLimits, reply: 1 } },
      localDate(2024, 5, 1, 3, 0),
    );
    await store.recordAction('reply', clock.now());

    const decision = await policy.admit('reply');
    expect(decision).toMatchObject({ allowed: false, reason: 'sleep_window', scope: 'global', retryAfterMs: 4 * HOUR_MS });
  });

  it('rejects once the daily limit for the kind is reached', async () => {
    const { policy, store, clock } = setup({ dailyLimits: { ...quietPacing().dailyLimits, reply: 2 } });
    await store.recordAction('reply', clock.now());
    await store.recordAction('reply', clock.now());

    expect(await policy.admit('reply')).toMatchObject({
      allowed: false,
      reason: 'daily_limit',
      scope: 'global',
      detail: 'Daily limit reached (2/2)',
    });
    expect(await policy.admit('like')).toEqual({ allowed: true });
  });

  it('checks the daily limit before the hourly target', async () => {
    const { policy } = setup({ dailyLimits: { ...quietPacing().dailyLimits, reply: 1 }, hourlyTargetRange: [1, 1] });
    await policy.recordSuccess('reply', {}, null);
    expect(await policy.admit('reply')).toMatchObject({ reason: 'daily_limit' });
  });

  it('stops at the hourly target and resumes in the next hour', async () => {
    const { policy, clock } = setup({ hourlyTargetRange: [2, 2] });
    await policy.recordSuccess('reply', {}, null);
    await policy.recordSuccess('reply', {}, null);

    expect(await policy.admit('reply')).toMatchObject({
      allowed: false,
      reason: 'hourly_limit',
      scope: 'global',
      detail: 'Hourly limit reached (2/2)',
      retryAfterMs: 45 * MINUTE_MS,
    });
    // likes are not counted against the hourly target
    expect(await policy.admit('like')).toEqual({ allowed: true });

    clock.set(localDate(2024, 5, 1, 11, 0));
    expect(await policy.admit('reply')).toEqual({ allowed: true });
    expect(policy.snapshot()).toMatchObject({ actionsThisHour: 0, hourlyTarget: 2, hourKey: '2024-05-01T11' });
  });

  it('resets the hour when the same hour comes round on the next day', async () => {
    const { policy, clock } = setup({ hourlyTargetRange: [1, 1] });
    await policy.recordSuccess('reply', {}, null);
    expect(policy.hourlyTargetMet('reply')).toBe(true);

    clock.set(localDate(2024, 5, 2, 10, 15));
    expect(policy.rollHour()).toBe(true);
    expect(policy.hourlyTargetMet('reply')).toBe(false);
  });

  it('forces a session break after the session target and resets after it', async () => {
    const { policy, clock } = setup({ sessionTargetRange: [2, 2], breakMinutesRange: [5, 5] });

    const first = await policy.recordSuccess('reply', {}, null);
    expect(first.breakMs).toBeNull();
    const second = await policy.recordSuccess('reply', {}, null);
    expect(second.breakMs).toBe(5 * MINUTE_MS);

    expect(await policy.admit('reply')).toMatchObject({
      allowed: false,
      reason: 'session_break',
      scope: 'global',
      retryAfterMs: 5 * MINUTE_MS,
    });

    clock.advance(5 * MINUTE_MS);
    expect(await policy.admit('reply')).toEqual({ allowed: true });
    expect(policy.snapshot()).toMatchObject({ sessionActions: 0, sessionTarget: 2, breakUntilMs: null });
  });

  it('ends the session without a break when the drawn break is zero', async () => {
    const { policy } = setup({ sessionTargetRange: [1, 1], breakMinutesRange: [0, 0] });
    const outcome = await policy.recordSuccess('reply', {}, null);
    expect(outcome.breakMs).toBeNull();
    expect(policy.snapshot()).toMatchObject({ sessionActions: 0, breakUntilMs: null });
  });

  // ──────────────────────────────────────────────────────────────────────────
  // CANDIDATE CHECKS
  // ──────────────────────────────────────────────────────────────────────────

  it('rejects an account contacted within the cooldown', async () => {
    const { policy, store, clock } = setup({ accountCooldownMs: 24 * HOUR_MS });
    await store.recordAccountContact('alice', new Date(clock.now().getTime() - 2 * HOUR_MS));

    expect(await policy.admit('reply', { account: 'alice' })).toEqual({
      allowed: false,
      reason: 'account_cooldown',
      scope: 'candidate',
      detail: '@alice contacted 2.0h ago, 22.0h cooldown remaining',
    });
    expect(await policy.admit('reply', { account: 'bob' })).toEqual({ allowed: true });
  });

  it('rejects a target already acted on for the same kind, even without a cooldown', async () => {
    const { policy } = setup({ accountCooldownMs: 0 });
    await policy.recordSuccess('reply', { targetId: 'p1' }, 'Acted on this one already.');

    expect(await policy.admit('reply', { targetId: 'p1' })).toEqual({
      allowed: false,
      reason: 'already_acted',
      scope: 'candidate',
      detail: 'Already acted on p1 (reply)',
    });
    expect(await policy.admit('like', { targetId: 'p1' })).toEqual({ allowed: true });
    expect(await policy.admit('reply', { targetId: 'p2' })).toEqual({ allowed: true });
  });

  it('checks acted targets before the account cooldown', async () => {
    const { policy, store, clock } = setup({ accountCooldownMs: 24 * HOUR_MS });
    await store.recordActedTarget('p1', 'reply', clock.now());
    await store.recordAccountContact('alice', clock.now());

    expect(await policy.admit('reply', { account: 'alice', targetId: 'p1' })).toMatchObject({ reason: 'already_acted' });
  });

  it('reports the remaining daily allowance', async () => {
    const { policy, store, clock } = setup({ dailyLimits: { ...quietPacing().dailyLimits, reply: 2 } });
    expect(await policy.dailyRemaining('reply')).toBe(2);
    await store.recordAction('reply', clock.now());
    await store.recordAction('reply', clock.now());
    await store.recordAction('reply', clock.now());
    expect(await policy.dailyRemaining('reply')).toBe(0);
  });

  it('skips when the roll falls under the drawn probability', async () => {
    const { policy } = setup({ skipChanceRange: [0.3, 0.3] }, undefined, sequenceRng([0.29, 0.31]));

    expect(await policy.admit('reply')).toEqual({
      allowed: false,
      reason: 'random_skip',
      scope: 'candidate',
      detail: 'Randomly skipped (p=0.30)',
    });
    expect(await policy.admit('reply')).toEqual({ allowed: true });
  });

  // ──────────────────────────────────────────────────────────────────────────
  // RECORDING
  // ──────────────────────────────────────────────────────────────────────────

  it('records counters, contact and history on success', async () => {
    const { policy, store, history, clock } = setup();
    const outcome = await policy.recordSuccess('reply', { account: 'alice', targetId: 'p9' }, 'A short accepted reply.');

    expect(outcome).toEqual({ dailyCount: 1, breakMs: null, bookkeepingError: null });
    expect(await store.getLastContact('alice')).toBe(clock.now().getTime());
    expect(await store.hasActedOn('p9', 'reply')).toBe(true);
    expect(history.entries()).toEqual(['A short accepted reply.']);
    expect(policy.snapshot()).toMatchObject({ sessionActions: 1, actionsThisHour: 1 });
  });

  it('reports bookkeeping failures without throwing and still advances pacing', async () => {
    const { policy, store } = setup();
    store.recordAction = async () => { throw new Error('database is locked'); };

    const outcome = await policy.recordSuccess('reply', { account: 'alice' }, 'Another accepted reply.');
    expect(outcome.dailyCount).toBeNull();
    expect(outcome.bookkeepingError?.message).toBe('database is locked');
    expect(await store.getLastContact('alice')).not.toBeNull();
    expect(policy.snapshot().sessionActions).toBe(1);
  });
});
