/**
 * Daily Report
 *
 * Per-kind usage against the day's limits plus execution success rate,
 * read from the counter store and the action log.
 */

import chalk from 'chalk';
import { ACTION_KINDS, type ActionKind } from '../domain/types.js';
import type { PacingConfig } from '../config/profiles.js';
import type { CounterStore } from '../store/counterStore.js';

export interface KindUsage {
  kind: ActionKind;
  count: number;
  limit: number;
  remaining: number;
}

export interface DailyReport {
  day: string;
  profile: string;
  kinds: KindUsage[];
  totalActions: number;
  attempts: number;
  successes: number;
  failures: number;
  /** successes / attempts, or null with no attempts logged. */
  successRate: number | null;
}

export async function buildDailyReport(store: CounterStore, pacing: PacingConfig, day: string): Promise<DailyReport> {
  const counts = await store.getCountsForDay(day);
  const log = await store.getActionLog(day);

  const kinds = ACTION_KINDS.map(kind => {
    const limit = pacing.dailyLimits[kind];
    return { kind, count: counts[kind], limit, remaining: Math.max(0, limit - counts[kind]) };
  });

  const successes = log.filter(e => e.status === 'success').length;
  const failures = log.length - successes;

  return {
    day,
    profile: pacing.profile,
    kinds,
    totalActions: kinds.reduce((sum, k) => sum + k.count, 0),
    attempts: log.length,
    successes,
    failures,
    successRate: log.length === 0 ? null : successes / log.length,
  };
}

export function formatDailyReport(report: DailyReport): string {
  const lines = [chalk.cyan(`Daily report ${report.day} (${report.profile})`), ''];

  for (const usage of report.kinds) {
    const full = usage.count >= usage.limit;
    const value = `${String(usage.count).padStart(4)} / ${usage.limit}`;
    lines.push(`  ${chalk.gray(usage.kind.padEnd(8))}${full ? chalk.yellow(value) : chalk.white(value)}`);
  }

  const rate = report.successRate === null ? 'n/a' : `${(report.successRate * 100).toFixed(1)}%`;
  lines.push('');
  lines.push(`  ${chalk.gray('Total')}   ${report.totalActions}`);
  lines.push(`  ${chalk.gray('Attempts')} ${report.attempts} (${chalk.green(`${report.successes} ok`)}, ${chalk.red(`${report.failures} failed`)}, rate ${rate})`);
  return lines.join('\n');
}
