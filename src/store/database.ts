/**
 * Database connections for the counter store.
 *
 * PGlite keeps everything in one local directory and serves one process.
 * Processes that must share counters point DATABASE_URL at PostgreSQL.
 */

import { mkdirSync } from 'fs';
import { PGlite } from '@electric-sql/pglite';
import pg from 'pg';
import { SqlCounterStore, type SqlExecutor } from './counterStore.js';
import type { StorageConfig } from '../config/engineConfig.js';

export function pgliteExecutor(dataDir: string): SqlExecutor {
  if (!dataDir.startsWith('memory://')) mkdirSync(dataDir, { recursive: true });
  const db = new PGlite(dataDir);
  return {
    query: (sql, params) => db.query(sql, params),
    exec: sql => db.exec(sql),
    close: () => db.close(),
  };
}

export function postgresExecutor(connectionString: string): SqlExecutor {
  const pool = new pg.Pool({ connectionString });
  return {
    query: (sql, params) => pool.query(sql, params),
    exec: sql => pool.query(sql),
    close: () => pool.end(),
  };
}

/** Open and initialize the store described by the storage config. */
export async function openCounterStore(storage: StorageConfig): Promise<SqlCounterStore> {
  const executor = storage.databaseUrl
    ? postgresExecutor(storage.databaseUrl)
    : pgliteExecutor(storage.dataDir);
  const store = new SqlCounterStore(executor);
  await store.init();
  return store;
}
