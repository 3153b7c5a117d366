/**
 * Decision Observer
 *
 * Audit trail for the scheduler: every admission, validation and execution
 * outcome with its reason code. Entries are buffered and appended as JSONL
 * to <logDir>/decisions.jsonl; a bounded tail stays in memory for status
 * queries.
 */

import { appendFile, mkdir } from 'fs/promises';
import { join } from 'path';
import type { ActionKind, ReasonCode } from '../domain/types.js';
import { createLogger, type ComponentLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type DecisionOutcome =
  | 'executed'
  | 'skipped'
  | 'rejected'
  | 'error'
  | 'backoff'
  | 'break'
  | 'cycle'
  | 'start'
  | 'stop';

export interface DecisionEntry {
  timestamp: string;
  event: string;
  outcome: DecisionOutcome;
  kind?: ActionKind;
  candidateId?: string;
  account?: string;
  reason?: ReasonCode;
  detail?: string;
}

export interface CycleStats {
  discovered: number;
  considered: number;
  generated: number;
  rejected: number;
  skipped: number;
  executed: number;
  failed: number;
  errors: number;
}

const STAT_KEYS = [
  'discovered', 'considered', 'generated', 'rejected', 'skipped', 'executed', 'failed', 'errors',
] as const satisfies ReadonlyArray<keyof CycleStats>;

export function emptyCycleStats(): CycleStats {
  return { discovered: 0, considered: 0, generated: 0, rejected: 0, skipped: 0, executed: 0, failed: 0, errors: 0 };
}

export interface DecisionObserverOptions {
  /** Directory for decisions.jsonl; omit to keep entries in memory only. */
  logDir?: string;
  /** In-memory tail size (default: 200). */
  tailSize?: number;
  /** Flush interval in ms (default: 5000). */
  flushIntervalMs?: number;
}

// ============================================================================
// OBSERVER
// ============================================================================

export class DecisionObserver {
  private buffer: string[] = [];
  private tail: DecisionEntry[] = [];
  private flushTimer?: ReturnType<typeof setInterval>;
  private totals: CycleStats = emptyCycleStats();
  private cycles = 0;
  private startedAt?: string;
  private readonly logDir?: string;
  private readonly logPath?: string;
  private readonly tailSize: number;
  private readonly flushIntervalMs: number;
  private readonly logger: ComponentLogger;

  constructor(options: DecisionObserverOptions = {}) {
    this.logDir = options.logDir;
    this.logPath = options.logDir ? join(options.logDir, 'decisions.jsonl') : undefined;
    this.tailSize = options.tailSize ?? 200;
    this.flushIntervalMs = options.flushIntervalMs ?? 5_000;
    this.logger = createLogger('decisions');
  }

  async start(): Promise<void> {
    if (this.logDir) await mkdir(this.logDir, { recursive: true });
    this.startedAt = new Date().toISOString();
    if (this.logPath && !this.flushTimer) {
      this.flushTimer = setInterval(() => void this.flush(), this.flushIntervalMs);
      this.flushTimer.unref();
    }
  }

  async stop(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = undefined;
    }
    await this.flush();
  }

  record(entry: Omit<DecisionEntry, 'timestamp'> & { timestamp?: string }): DecisionEntry {
    const full: DecisionEntry = { ...entry, timestamp: entry.timestamp ?? new Date().toISOString() };
    this.tail.push(full);
    if (this.tail.length > this.tailSize) this.tail.splice(0, this.tail.length - this.tailSize);
    if (this.logPath) this.buffer.push(JSON.stringify(full));

    const data = { event: full.event, outcome: full.outcome, reason: full.reason, kind: full.kind,
      candidateId: full.candidateId, account: full.account, detail: full.detail };
    if (full.outcome === 'error') this.logger.warn('decision', data);
    else this.logger.info('decision', data);
    return full;
  }

  recordCycle(stats: CycleStats): void {
    this.cycles++;
    for (const key of STAT_KEYS) {
      this.totals[key] += stats[key];
    }
    this.record({ event: 'cycle_complete', outcome: 'cycle', detail: JSON.stringify(stats) });
  }

  /** Most recent entries, oldest first. */
  recent(limit = this.tailSize): DecisionEntry[] {
    return this.tail.slice(-limit);
  }

  getTotals(): CycleStats & { cycles: number; startedAt?: string } {
    return { ...this.totals, cycles: this.cycles, startedAt: this.startedAt };
  }

  async flush(): Promise<void> {
    if (!this.logPath || this.buffer.length === 0) return;
    const lines = this.buffer.splice(0).join('\n') + '\n';
    try {
      await appendFile(this.logPath, lines);
    } catch (err) {
      this.logger.error('decision_log_write_failed', { path: this.logPath, error: toError(err).message });
    }
  }
}

export function createDecisionObserver(options?: DecisionObserverOptions): DecisionObserver {
  return new DecisionObserver(options);
}
