/**
 * Pacing Scheduler
 *
 * Persistent loop: discover → filter → admit → generate → validate → execute
 * → record, followed on some cycles by a light engagement pass over the
 * leading items of the batch.
 *
 * One candidate at a time, on one logical thread. Every wait (reading delay,
 * session break, backoff, inter-cycle interval) goes through the context's
 * Sleeper with the scheduler's abort signal, so stop() takes effect at the
 * next suspension point while an action already in flight completes.
 */

import { EventEmitter } from 'eventemitter3';
import { type ActionKind, type CandidateItem, isTextKind } from '../domain/types.js';
import type { EngineContext } from './context.js';
import { type CycleStats, type DecisionEntry, emptyCycleStats } from './observer.js';
import { buildPrompt } from '../collaborators/prompts.js';
import { validateContent } from '../safety/contentValidator.js';
import { isRelevant } from '../safety/relevance.js';
import { uniform } from '../pacing/random.js';
import { createLogger, type ComponentLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SchedulerEvents {
  'cycle:start': () => void;
  'cycle:end': (stats: CycleStats) => void;
  'decision': (entry: DecisionEntry) => void;
  'action': (kind: ActionKind, candidate: CandidateItem, text: string | null) => void;
  'break:start': (breakMs: number) => void;
  'break:end': () => void;
  'error': (error: Error) => void;
}

export interface CycleOutcome {
  stats: CycleStats;
  /** Wait before the next cycle. */
  nextDelayMs: number;
}

export interface SchedulerStatus {
  running: boolean;
  actionKind: ActionKind;
  /** Actions this hour of the kinds under the hourly target (replies by default). */
  repliesThisHour: number;
  hourlyTarget: number;
  sessionActions: number;
  sessionTarget: number;
  /** ISO time the current session break ends, or null. */
  onBreakUntil: string | null;
  totals: ReturnType<EngineContext['observer']['getTotals']>;
}

type CandidateStep = 'executed' | 'passed' | 'halt';

// ============================================================================
// SCHEDULER
// ============================================================================

export class PacingScheduler extends EventEmitter<SchedulerEvents> {
  private running = false;
  private abort = new AbortController();
  private loopDone?: Promise<void>;
  private logger: ComponentLogger;

  constructor(private readonly ctx: EngineContext) {
    super();
    this.logger = createLogger('scheduler');
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();

    let seeded: number;
    try {
      seeded = await this.ctx.history.reseed();
      await this.ctx.observer.start();
    } catch (err) {
      this.running = false;
      throw err;
    }

    const { scheduler, pacing } = this.ctx.config;
    this.decide({
      event: 'scheduler_start',
      outcome: 'start',
      kind: scheduler.actionKind,
      detail: `profile=${pacing.profile}, history=${seeded}, max=${scheduler.maxActionsPerCycle}/cycle`,
    });

    this.loopDone = this.loop();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.abort.abort();
    await this.loopDone;
    this.loopDone = undefined;

    this.decide({ event: 'scheduler_stop', outcome: 'stop' });
    await this.ctx.observer.stop();
  }

  isRunning(): boolean {
    return this.running;
  }

  status(): SchedulerStatus {
    const state = this.ctx.policy.snapshot();
    return {
      running: this.running,
      actionKind: this.ctx.config.scheduler.actionKind,
      repliesThisHour: state.actionsThisHour,
      hourlyTarget: state.hourlyTarget,
      sessionActions: state.sessionActions,
      sessionTarget: state.sessionTarget,
      onBreakUntil: state.breakUntilMs === null ? null : new Date(state.breakUntilMs).toISOString(),
      totals: this.ctx.observer.getTotals(),
    };
  }

  // ==========================================================================
  // LOOP
  // ==========================================================================

  private async loop(): Promise<void> {
    while (this.running) {
      try {
        const { nextDelayMs } = await this.runCycle();
        await this.sleep(nextDelayMs);
      } catch (err) {
        const error = toError(err);
        this.decide({ event: 'cycle_error', outcome: 'error', reason: 'cycle_error', detail: error.message });
        this.emit('error', error);
        try {
          await this.sleep(this.ctx.config.scheduler.errorCooldownMs);
        } catch (sleepErr) {
          this.logger.error('loop_aborted', { error: toError(sleepErr).message });
          this.running = false;
        }
      }
    }
  }

  /**
   * One pass over freshly discovered candidates. Returns the wait the loop
   * should take before the next pass.
   */
  async runCycle(): Promise<CycleOutcome> {
    const { policy, discovery, rng } = this.ctx;
    const config = this.ctx.config.scheduler;
    const kind = config.actionKind;
    const signal = this.abort.signal;
    const stats = emptyCycleStats();

    this.emit('cycle:start');
    const finish = (nextDelayMs: number): CycleOutcome => {
      this.ctx.observer.recordCycle(stats);
      this.emit('cycle:end', stats);
      return { stats, nextDelayMs };
    };

    if (policy.isSleepWindow()) {
      const { startHour, endHour } = this.ctx.config.pacing.sleepWindow;
      this.decide({
        event: 'backoff',
        outcome: 'backoff',
        reason: 'sleep_window_backoff',
        kind,
        detail: `Inside sleep window ${startHour}:00-${endHour}:00`,
      });
      return finish(config.sleepWindowBackoffMs);
    }

    policy.rollHour();
    if (policy.hourlyTargetMet(kind)) {
      const state = policy.snapshot();
      this.decide({
        event: 'backoff',
        outcome: 'backoff',
        reason: 'hourly_backoff',
        kind,
        detail: `Hourly target met (${state.actionsThisHour}/${state.hourlyTarget})`,
      });
      return finish(config.hourlyBackoffMs);
    }

    const remaining = await policy.dailyRemaining(kind);
    if (remaining === 0) {
      this.decide({
        event: 'backoff',
        outcome: 'backoff',
        reason: 'daily_backoff',
        kind,
        detail: `Daily limit reached (${this.ctx.config.pacing.dailyLimits[kind]})`,
      });
      return finish(config.dailyBackoffMs);
    }

    let candidates: CandidateItem[];
    try {
      candidates = await discovery.scanFeed(config.maxCandidates);
    } catch (err) {
      const error = toError(err);
      stats.errors++;
      this.decide({ event: 'discovery', outcome: 'error', reason: 'discovery_failed', kind, detail: error.message });
      this.emit('error', error);
      return finish(this.nextCycleDelay());
    }

    const seen = new Set<string>();
    const batch: CandidateItem[] = [];
    for (const candidate of candidates.slice(0, config.maxCandidates)) {
      if (seen.has(candidate.id)) {
        this.decide({
          event: 'discovery',
          outcome: 'skipped',
          reason: 'duplicate_candidate',
          kind,
          candidateId: candidate.id,
        });
        continue;
      }
      seen.add(candidate.id);
      if (!isRelevant(candidate.text, config.relevanceKeywords)) {
        stats.skipped++;
        this.decide({
          event: 'discovery',
          outcome: 'skipped',
          reason: 'irrelevant',
          kind,
          candidateId: candidate.id,
          account: candidate.authorHandle || undefined,
        });
        continue;
      }
      batch.push(candidate);
    }
    stats.discovered = batch.length;

    let executed = 0;
    for (const candidate of batch) {
      if (signal.aborted) break;
      if (config.maxActionsPerCycle > 0 && executed >= config.maxActionsPerCycle) break;

      await this.sleep(uniform(rng, config.readingDelayMs));
      if (signal.aborted) break;

      stats.considered++;
      const step = await this.processCandidate(candidate, kind, stats);
      if (step === 'halt') break;
      if (step === 'executed') executed++;
    }

    await this.runEngagement(batch, kind, stats);
    return finish(this.nextCycleDelay());
  }

  /**
   * On a random share of cycles, consider the leading items of the batch for
   * each configured engagement kind. Every action goes through the same
   * admission and bookkeeping as the main kind; a global rejection retires
   * that kind for the rest of the pass.
   */
  private async runEngagement(batch: CandidateItem[], mainKind: ActionKind, stats: CycleStats): Promise<void> {
    const { engagement } = this.ctx.config.pacing;
    const { rng } = this.ctx;
    const signal = this.abort.signal;
    if (signal.aborted || engagement.cycleChance <= 0 || engagement.actions.length === 0) return;
    if (rng.next() >= engagement.cycleChance) return;

    const retired = new Set<ActionKind>();
    for (const candidate of batch.slice(0, engagement.topItems)) {
      for (const action of engagement.actions) {
        if (signal.aborted) return;
        if (action.kind === mainKind || retired.has(action.kind)) continue;
        if (action.chance <= 0 || rng.next() >= action.chance) continue;

        stats.considered++;
        const step = await this.processCandidate(candidate, action.kind, stats);
        if (step === 'halt') retired.add(action.kind);
        if (step === 'executed') await this.sleep(uniform(rng, action.delayMs));
      }
    }
  }

  // ==========================================================================
  // CANDIDATE
  // ==========================================================================

  private async processCandidate(candidate: CandidateItem, kind: ActionKind, stats: CycleStats): Promise<CandidateStep> {
    const { policy, executor, store } = this.ctx;
    const account = candidate.authorHandle || undefined;
    const base = { kind, candidateId: candidate.id, account };
    const target = { account, targetId: candidate.id };

    const admission = await policy.admit(kind, target);
    if (!admission.allowed) {
      stats.skipped++;
      this.decide({ ...base, event: 'admission', outcome: 'skipped', reason: admission.reason, detail: admission.detail });
      return admission.scope === 'global' ? 'halt' : 'passed';
    }

    let text: string | null = null;
    if (isTextKind(kind)) {
      text = await this.produceText(candidate, kind, stats);
      if (text === null) return 'passed';
    }

    let performed: boolean;
    let failure: string | null = null;
    try {
      performed = await executor.performAction(kind, candidate, text);
      if (!performed) failure = 'Executor reported failure';
    } catch (err) {
      performed = false;
      failure = toError(err).message;
    }

    const at = this.ctx.clock.now();
    if (!performed) {
      stats.failed++;
      this.decide({ ...base, event: 'execution', outcome: 'error', reason: 'execution_failed', detail: failure ?? undefined });
      await this.logAttempt(() => store.recordActionLog({
        kind, target: candidate.id, content: text, status: 'failed', error: failure, at,
      }), base);
      return 'passed';
    }

    await this.logAttempt(() => store.recordActionLog({
      kind, target: candidate.id, content: text, status: 'success', at,
    }), base);
    const outcome = await policy.recordSuccess(kind, target, text);

    stats.executed++;
    this.decide({
      ...base,
      event: 'execution',
      outcome: 'executed',
      reason: 'executed',
      detail: outcome.dailyCount === null
        ? undefined
        : `${outcome.dailyCount}/${this.ctx.config.pacing.dailyLimits[kind]} today`,
    });
    if (outcome.bookkeepingError) {
      this.decide({ ...base, event: 'bookkeeping', outcome: 'error', reason: 'bookkeeping_failed', detail: outcome.bookkeepingError.message });
    }
    this.emit('action', kind, candidate, text);

    if (outcome.breakMs !== null) await this.takeBreak(outcome.breakMs);
    return 'executed';
  }

  /**
   * Generate and validate, allowing the configured number of
   * re-generations after a validation rejection. Null means give up.
   */
  private async produceText(candidate: CandidateItem, kind: ActionKind, stats: CycleStats): Promise<string | null> {
    const { generator, history } = this.ctx;
    const base = { kind, candidateId: candidate.id, account: candidate.authorHandle || undefined };
    const prompt = buildPrompt(candidate, kind);
    const attempts = 1 + this.ctx.config.scheduler.generationRetries;

    let lastReason = '';
    for (let attempt = 1; attempt <= attempts; attempt++) {
      let generated: { text: string | null; error: string | null };
      try {
        generated = await generator.generate(prompt, kind);
      } catch (err) {
        generated = { text: null, error: toError(err).message };
      }

      if (generated.text === null) {
        stats.errors++;
        this.decide({ ...base, event: 'generation', outcome: 'error', reason: 'generation_failed', detail: generated.error ?? 'No text' });
        return null;
      }
      stats.generated++;

      const result = validateContent(generated.text, kind, history.entries());
      if (result.accepted) return generated.text.trim();

      stats.rejected++;
      lastReason = result.reason;
      this.decide({
        ...base,
        event: 'validation_rejected',
        outcome: 'rejected',
        reason: result.reason,
        detail: `${result.detail} (attempt ${attempt}/${attempts})`,
      });
    }

    this.decide({
      ...base,
      event: 'generation',
      outcome: 'rejected',
      reason: 'regeneration_exhausted',
      detail: `${attempts} attempt(s) rejected, last: ${lastReason}`,
    });
    return null;
  }

  private async takeBreak(breakMs: number): Promise<void> {
    this.decide({ event: 'session_break', outcome: 'break', reason: 'session_break', detail: `${Math.round(breakMs / 1000)}s` });
    this.emit('break:start', breakMs);
    await this.sleep(breakMs);
    if (this.abort.signal.aborted) return;
    this.ctx.policy.endBreak();
    this.emit('break:end');
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private async logAttempt(write: () => Promise<void>, base: Pick<DecisionEntry, 'kind' | 'candidateId' | 'account'>): Promise<void> {
    try {
      await write();
    } catch (err) {
      this.decide({ ...base, event: 'action_log', outcome: 'error', reason: 'bookkeeping_failed', detail: toError(err).message });
    }
  }

  private nextCycleDelay(): number {
    const { cycleIntervalMs, cycleJitterMs } = this.ctx.config.scheduler;
    return uniform(this.ctx.rng, cycleIntervalMs) + uniform(this.ctx.rng, cycleJitterMs);
  }

  private sleep(ms: number): Promise<void> {
    return this.ctx.sleeper(Math.max(0, Math.round(ms)), this.abort.signal);
  }

  private decide(entry: Omit<DecisionEntry, 'timestamp'>): DecisionEntry {
    const recorded = this.ctx.observer.record({ ...entry, timestamp: this.ctx.clock.now().toISOString() });
    this.emit('decision', recorded);
    return recorded;
  }
}

export function createPacingScheduler(ctx: EngineContext): PacingScheduler {
  return new PacingScheduler(ctx);
}
