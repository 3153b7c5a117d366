/**
 * Durable Counter Store
 *
 * Day-keyed action counters, per-account last-contact times, the targets
 * already acted on, the append-only reply log and the action attempt log.
 *
 * Two implementations:
 * - SqlCounterStore: PostgreSQL dialect over PGlite (embedded) or a pg Pool
 *   (shared between processes). Every increment and upsert is a single
 *   statement so concurrent writers never lose updates.
 * - InMemoryCounterStore: volatile, for tests and ephemeral runs.
 */

import { z } from 'zod';
import { ACTION_KINDS, ActionKind } from '../domain/types.js';
import { localDateKey } from '../pacing/clock.js';
import { StorageError, toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type ActionStatus = 'success' | 'failed';

export interface ActionLogInput {
  kind: ActionKind;
  target: string;
  content: string | null;
  status: ActionStatus;
  error?: string | null;
  at?: Date;
}

export interface ActionLogEntry {
  id: number;
  day: string;
  kind: ActionKind;
  target: string;
  content: string | null;
  status: ActionStatus;
  error: string | null;
  createdAtMs: number;
}

export interface PruneResult {
  counters: number;
  actionLog: number;
}

export interface CounterStore {
  init(): Promise<void>;
  /** Increment today's counter for `kind`; returns the new count. */
  recordAction(kind: ActionKind, at?: Date): Promise<number>;
  getTodayCount(kind: ActionKind, at?: Date): Promise<number>;
  getCountsForDay(day: string): Promise<Record<ActionKind, number>>;
  isAccountOnCooldown(accountId: string, cooldownMs: number, at?: Date): Promise<boolean>;
  getLastContact(accountId: string): Promise<number | null>;
  recordAccountContact(accountId: string, at?: Date): Promise<void>;
  /** True once an action of `kind` has been recorded against the target. */
  hasActedOn(targetId: string, kind: ActionKind): Promise<boolean>;
  recordActedTarget(targetId: string, kind: ActionKind, at?: Date): Promise<void>;
  appendReplyHistory(text: string, at?: Date): Promise<void>;
  /** Most recent `limit` entries, oldest first. */
  loadRecentReplyHistory(limit: number): Promise<string[]>;
  recordActionLog(entry: ActionLogInput): Promise<void>;
  getActionLog(day: string): Promise<ActionLogEntry[]>;
  /** Delete counters and action-log rows for days before `day`. Acted targets are kept. */
  pruneBefore(day: string): Promise<PruneResult>;
  close(): Promise<void>;
}

export function emptyCounts(): Record<ActionKind, number> {
  return { reply: 0, like: 0, retweet: 0, post: 0, thread: 0, quote: 0 };
}

// ============================================================================
// SQL EXECUTOR
// ============================================================================

/**
 * The slice of a PostgreSQL client the store needs. PGlite and pg.Pool both
 * fit behind it.
 */
export interface SqlExecutor {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
  /** Run one or more statements without parameters. */
  exec(sql: string): Promise<unknown>;
  close(): Promise<void>;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS action_counters (
    day TEXT NOT NULL,
    kind TEXT NOT NULL,
    count INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY (day, kind)
  );

  CREATE TABLE IF NOT EXISTS account_cooldowns (
    account TEXT PRIMARY KEY,
    last_contact_ms DOUBLE PRECISION NOT NULL
  );

  CREATE TABLE IF NOT EXISTS acted_targets (
    target TEXT NOT NULL,
    kind TEXT NOT NULL,
    acted_at_ms DOUBLE PRECISION NOT NULL,
    PRIMARY KEY (target, kind)
  );

  CREATE TABLE IF NOT EXISTS reply_history (
    id SERIAL PRIMARY KEY,
    text TEXT NOT NULL,
    created_at_ms DOUBLE PRECISION NOT NULL
  );

  CREATE TABLE IF NOT EXISTS action_log (
    id SERIAL PRIMARY KEY,
    day TEXT NOT NULL,
    kind TEXT NOT NULL,
    target TEXT NOT NULL,
    content TEXT,
    status TEXT NOT NULL,
    error TEXT,
    created_at_ms DOUBLE PRECISION NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_reply_history_created ON reply_history(created_at_ms);
  CREATE INDEX IF NOT EXISTS idx_action_log_day ON action_log(day);
`;

// pg returns BIGINT/NUMERIC as strings; coerce so both drivers read the same.
const CountRow = z.object({ count: z.coerce.number() });
const KindCountRow = z.object({ kind: ActionKind, count: z.coerce.number() });
const ContactRow = z.object({ last_contact_ms: z.coerce.number() });
const TextRow = z.object({ text: z.string() });
const FoundRow = z.object({ found: z.coerce.number() });
const ActionLogRow = z.object({
  id: z.coerce.number(),
  day: z.string(),
  kind: ActionKind,
  target: z.string(),
  content: z.string().nullable(),
  status: z.enum(['success', 'failed']),
  error: z.string().nullable(),
  created_at_ms: z.coerce.number(),
});

export class SqlCounterStore implements CounterStore {
  constructor(private readonly db: SqlExecutor) {}

  async init(): Promise<void> {
    await this.run('init', () => this.db.exec(SCHEMA));
  }

  async recordAction(kind: ActionKind, at: Date = new Date()): Promise<number> {
    const rows = await this.rows('recordAction', CountRow,
      `INSERT INTO action_counters (day, kind, count) VALUES ($1, $2, 1)
       ON CONFLICT (day, kind) DO UPDATE SET count = action_counters.count + 1
       RETURNING count`,
      [localDateKey(at), kind]);
    return rows[0]?.count ?? 0;
  }

  async getTodayCount(kind: ActionKind, at: Date = new Date()): Promise<number> {
    const rows = await this.rows('getTodayCount', CountRow,
      'SELECT count FROM action_counters WHERE day = $1 AND kind = $2',
      [localDateKey(at), kind]);
    return rows[0]?.count ?? 0;
  }

  async getCountsForDay(day: string): Promise<Record<ActionKind, number>> {
    const rows = await this.rows('getCountsForDay', KindCountRow,
      'SELECT kind, count FROM action_counters WHERE day = $1',
      [day]);
    const counts = emptyCounts();
    for (const row of rows) counts[row.kind] = row.count;
    return counts;
  }

  async isAccountOnCooldown(accountId: string, cooldownMs: number, at: Date = new Date()): Promise<boolean> {
    const last = await this.getLastContact(accountId);
    if (last === null) return false;
    return at.getTime() - last < cooldownMs;
  }

  async getLastContact(accountId: string): Promise<number | null> {
    const rows = await this.rows('getLastContact', ContactRow,
      'SELECT last_contact_ms FROM account_cooldowns WHERE account = $1',
      [accountId]);
    return rows[0]?.last_contact_ms ?? null;
  }

  async recordAccountContact(accountId: string, at: Date = new Date()): Promise<void> {
    await this.run('recordAccountContact', () => this.db.query(
      `INSERT INTO account_cooldowns (account, last_contact_ms) VALUES ($1, $2)
       ON CONFLICT (account) DO UPDATE SET last_contact_ms = EXCLUDED.last_contact_ms`,
      [accountId, at.getTime()]));
  }

  async hasActedOn(targetId: string, kind: ActionKind): Promise<boolean> {
    const rows = await this.rows('hasActedOn', FoundRow,
      'SELECT 1 AS found FROM acted_targets WHERE target = $1 AND kind = $2',
      [targetId, kind]);
    return rows.length > 0;
  }

  async recordActedTarget(targetId: string, kind: ActionKind, at: Date = new Date()): Promise<void> {
    await this.run('recordActedTarget', () => this.db.query(
      `INSERT INTO acted_targets (target, kind, acted_at_ms) VALUES ($1, $2, $3)
       ON CONFLICT (target, kind) DO NOTHING`,
      [targetId, kind, at.getTime()]));
  }

  async appendReplyHistory(text: string, at: Date = new Date()): Promise<void> {
    await this.run('appendReplyHistory', () => this.db.query(
      'INSERT INTO reply_history (text, created_at_ms) VALUES ($1, $2)',
      [text, at.getTime()]));
  }

  async loadRecentReplyHistory(limit: number): Promise<string[]> {
    const rows = await this.rows('loadRecentReplyHistory', TextRow,
      'SELECT text FROM reply_history ORDER BY created_at_ms DESC, id DESC LIMIT $1',
      [limit]);
    return rows.map(r => r.text).reverse();
  }

  async recordActionLog(entry: ActionLogInput): Promise<void> {
    const at = entry.at ?? new Date();
    await this.run('recordActionLog', () => this.db.query(
      `INSERT INTO action_log (day, kind, target, content, status, error, created_at_ms)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [localDateKey(at), entry.kind, entry.target, entry.content, entry.status, entry.error ?? null, at.getTime()]));
  }

  async getActionLog(day: string): Promise<ActionLogEntry[]> {
    const rows = await this.rows('getActionLog', ActionLogRow,
      `SELECT id, day, kind, target, content, status, error, created_at_ms
       FROM action_log WHERE day = $1 ORDER BY created_at_ms ASC, id ASC`,
      [day]);
    return rows.map(r => ({
      id: r.id,
      day: r.day,
      kind: r.kind,
      target: r.target,
      content: r.content,
      status: r.status,
      error: r.error,
      createdAtMs: r.created_at_ms,
    }));
  }

  async pruneBefore(day: string): Promise<PruneResult> {
    const counters = await this.rows('pruneBefore', z.object({ day: z.string() }),
      'DELETE FROM action_counters WHERE day < $1 RETURNING day',
      [day]);
    const actionLog = await this.rows('pruneBefore', z.object({ id: z.coerce.number() }),
      'DELETE FROM action_log WHERE day < $1 RETURNING id',
      [day]);
    return { counters: counters.length, actionLog: actionLog.length };
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // ==========================================================================
  // INTERNAL
  // ==========================================================================

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageError(`${operation} failed: ${toError(err).message}`, operation, { cause: err });
    }
  }

  private async rows<S extends z.ZodTypeAny>(
    operation: string,
    schema: S,
    sql: string,
    params: unknown[],
  ): Promise<Array<z.infer<S>>> {
    const result = await this.run(operation, () => this.db.query(sql, params));
    const parsed = z.array(schema).safeParse(result.rows);
    if (!parsed.success) {
      throw new StorageError(`${operation} returned unexpected rows: ${parsed.error.message}`, operation);
    }
    return parsed.data;
  }
}

// ============================================================================
// IN-MEMORY IMPLEMENTATION
// ============================================================================

export class InMemoryCounterStore implements CounterStore {
  private counters = new Map<string, number>();
  private contacts = new Map<string, number>();
  private acted = new Map<string, number>();
  private history: Array<{ text: string; createdAtMs: number }> = [];
  private actionLog: ActionLogEntry[] = [];

  async init(): Promise<void> {}

  async recordAction(kind: ActionKind, at: Date = new Date()): Promise<number> {
    const key = `${localDateKey(at)}|${kind}`;
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next);
    return next;
  }

  async getTodayCount(kind: ActionKind, at: Date = new Date()): Promise<number> {
    return this.counters.get(`${localDateKey(at)}|${kind}`) ?? 0;
  }

  async getCountsForDay(day: string): Promise<Record<ActionKind, number>> {
    const counts = emptyCounts();
    for (const kind of ACTION_KINDS) {
      counts[kind] = this.counters.get(`${day}|${kind}`) ?? 0;
    }
    return counts;
  }

  async isAccountOnCooldown(accountId: string, cooldownMs: number, at: Date = new Date()): Promise<boolean> {
    const last = this.contacts.get(accountId);
    if (last === undefined) return false;
    return at.getTime() - last < cooldownMs;
  }

  async getLastContact(accountId: string): Promise<number | null> {
    return this.contacts.get(accountId) ?? null;
  }

  async recordAccountContact(accountId: string, at: Date = new Date()): Promise<void> {
    this.contacts.set(accountId, at.getTime());
  }

  async hasActedOn(targetId: string, kind: ActionKind): Promise<boolean> {
    return this.acted.has(`${targetId}|${kind}`);
  }

  async recordActedTarget(targetId: string, kind: ActionKind, at: Date = new Date()): Promise<void> {
    const key = `${targetId}|${kind}`;
    if (!this.acted.has(key)) this.acted.set(key, at.getTime());
  }

  async appendReplyHistory(text: string, at: Date = new Date()): Promise<void> {
    this.history.push({ text, createdAtMs: at.getTime() });
  }

  async loadRecentReplyHistory(limit: number): Promise<string[]> {
    if (limit <= 0) return [];
    return this.history.slice(-limit).map(h => h.text);
  }

  async recordActionLog(entry: ActionLogInput): Promise<void> {
    const at = entry.at ?? new Date();
    this.actionLog.push({
      id: this.actionLog.length + 1,
      day: localDateKey(at),
      kind: entry.kind,
      target: entry.target,
      content: entry.content,
      status: entry.status,
      error: entry.error ?? null,
      createdAtMs: at.getTime(),
    });
  }

  async getActionLog(day: string): Promise<ActionLogEntry[]> {
    return this.actionLog.filter(e => e.day === day);
  }

  async pruneBefore(day: string): Promise<PruneResult> {
    let counters = 0;
    for (const key of [...this.counters.keys()]) {
      if (key.slice(0, key.indexOf('|')) < day) {
        this.counters.delete(key);
        counters++;
      }
    }
    const before = this.actionLog.length;
    this.actionLog = this.actionLog.filter(e => e.day >= day);
    return { counters, actionLog: before - this.actionLog.length };
  }

  async close(): Promise<void> {}
}
