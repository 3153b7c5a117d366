import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { buildDailyReport, formatDailyReport } from '../../src/analytics/dailyReport.js';
import { InMemoryCounterStore } from '../../src/store/counterStore.js';
import { localDate, quietPacing } from '../helpers/fakes.js';

describe('daily report', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  async function seeded(): Promise<InMemoryCounterStore> {
    const store = new InMemoryCounterStore();
    const at = localDate(2024, 5, 1, 12);
    await store.recordAction('reply', at);
    await store.recordAction('reply', at);
    await store.recordAction('thread', at);
    await store.recordActionLog({ kind: 'reply', target: 't1', content: 'x', status: 'success', at });
    await store.recordActionLog({ kind: 'reply', target: 't2', content: 'y', status: 'success', at });
    await store.recordActionLog({ kind: 'thread', target: 't3', content: 'z', status: 'success', at });
    await store.recordActionLog({ kind: 'reply', target: 't4', content: null, status: 'failed', error: 'boom', at });
    return store;
  }

  it('compares counts with limits and computes the success rate', async () => {
    const report = await buildDailyReport(await seeded(), quietPacing(), '2024-05-01');

    expect(report.kinds.find(k => k.kind === 'reply')).toEqual({ kind: 'reply', count: 2, limit: 70, remaining: 68 });
    expect(report.kinds.find(k => k.kind === 'thread')).toEqual({ kind: 'thread', count: 1, limit: 1, remaining: 0 });
    expect(report).toMatchObject({ totalActions: 3, attempts: 4, successes: 3, failures: 1, successRate: 0.75 });
  });

  it('has no success rate for a day without attempts', async () => {
    const report = await buildDailyReport(new InMemoryCounterStore(), quietPacing(), '2024-05-02');
    expect(report.successRate).toBeNull();
    expect(report.totalActions).toBe(0);
  });

  it('renders one line per kind and a summary', async () => {
    const report = await buildDailyReport(await seeded(), quietPacing(), '2024-05-01');
    const lines = formatDailyReport(report).split('\n');

    expect(lines[0]).toBe('Daily report 2024-05-01 (cautious)');
    expect(lines).toContain('  reply      2 / 70');
    expect(lines).toContain('  thread     1 / 1');
    expect(lines[lines.length - 1]).toBe('  Attempts 4 (3 ok, 1 failed, rate 75.0%)');
  });
});
