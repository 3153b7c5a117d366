import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DecisionObserver, emptyCycleStats, type CycleStats } from '../../src/engine/observer.js';

describe('DecisionObserver', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cadence-observer-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  // ──────────────────────────────────────────────────────────────────────────
  // TAIL
  // ──────────────────────────────────────────────────────────────────────────

  it('keeps a bounded tail of recent entries', () => {
    const observer = new DecisionObserver({ tailSize: 3 });
    for (let i = 1; i <= 5; i++) {
      observer.record({ event: 'admission', outcome: 'skipped', reason: 'random_skip', candidateId: `c${i}` });
    }
    expect(observer.recent().map(e => e.candidateId)).toEqual(['c3', 'c4', 'c5']);
    expect(observer.recent(1).map(e => e.candidateId)).toEqual(['c5']);
  });

  it('keeps a supplied timestamp and fills one in otherwise', () => {
    const observer = new DecisionObserver();
    const fixed = observer.record({ event: 'x', outcome: 'executed', timestamp: '2024-05-01T10:00:00.000Z' });
    const filled = observer.record({ event: 'y', outcome: 'executed' });
    expect(fixed.timestamp).toBe('2024-05-01T10:00:00.000Z');
    expect(Number.isNaN(Date.parse(filled.timestamp))).toBe(false);
  });

  // ──────────────────────────────────────────────────────────────────────────
  // TOTALS
  // ──────────────────────────────────────────────────────────────────────────

  it('accumulates cycle stats', () => {
    const observer = new DecisionObserver();
    const a: CycleStats = { ...emptyCycleStats(), discovered: 5, executed: 2, skipped: 1 };
    const b: CycleStats = { ...emptyCycleStats(), discovered: 3, executed: 1, errors: 1 };
    observer.recordCycle(a);
    observer.recordCycle(b);

    expect(observer.getTotals()).toMatchObject({ discovered: 8, executed: 3, skipped: 1, errors: 1, cycles: 2 });
    expect(observer.recent(1)[0]).toMatchObject({ event: 'cycle_complete', outcome: 'cycle' });
  });

  // ──────────────────────────────────────────────────────────────────────────
  // FILE OUTPUT
  // ──────────────────────────────────────────────────────────────────────────

  it('appends entries as JSON lines on flush', async () => {
    const logDir = join(dir, 'logs');
    const observer = new DecisionObserver({ logDir });
    await observer.start();

    observer.record({ event: 'admission', outcome: 'skipped', reason: 'account_cooldown', account: 'alice' });
    observer.record({ event: 'execution', outcome: 'executed', reason: 'executed', candidateId: 't1' });
    await observer.stop();

    const path = join(logDir, 'decisions.jsonl');
    expect(existsSync(path)).toBe(true);
    const lines = readFileSync(path, 'utf-8').trim().split('\n').map(l => JSON.parse(l));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ event: 'admission', reason: 'account_cooldown', account: 'alice' });
    expect(lines[1]).toMatchObject({ event: 'execution', reason: 'executed', candidateId: 't1' });
  });

  it('writes nothing without a log directory', async () => {
    const observer = new DecisionObserver();
    await observer.start();
    observer.record({ event: 'x', outcome: 'start' });
    await observer.stop();
    expect(existsSync(join(dir, 'decisions.jsonl'))).toBe(false);
    expect(observer.getTotals().startedAt).toBeDefined();
  });
});
