/**
 * Database - SQLite (sql.js WASM) for local persistence
 *
 * In-memory WASM database that saves to disk after every committed
 * mutation. A null path keeps the database purely in memory (tests).
 */

import initSqlJs from 'sql.js';
import type { Database as SqlJsDatabase, SqlValue } from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync } from 'fs';
import { createLogger } from '../utils/logger';
import { SCHEMA_SQL } from './schema';

const logger = createLogger('db');

export type { SqlValue };

/** A result row keyed by column name */
export type SqlRow = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface Database {
  /** Execute a statement and return the number of rows it changed */
  run(sql: string, params?: SqlValue[]): number;
  query(sql: string, params?: SqlValue[]): SqlRow[];
  /** Run `fn` inside BEGIN/COMMIT; any throw rolls back and rethrows */
  transaction<T>(fn: () => T): T;
  save(): void;
  close(): void;
}

export interface DatabaseOptions {
  /** File to load from and save to; null for an in-memory database */
  path: string | null;
}

// ---------------------------------------------------------------------------
// createDatabase
// ---------------------------------------------------------------------------

export async function createDatabase(options: DatabaseOptions): Promise<Database> {
  const { path } = options;
  const SQL = await initSqlJs();

  let raw: SqlJsDatabase;
  if (path && existsSync(path)) {
    logger.info({ path }, 'Opening database');
    raw = new SQL.Database(readFileSync(path));
  } else {
    if (path) {
      mkdirSync(dirname(path), { recursive: true });
      logger.info({ path }, 'Creating database');
    }
    raw = new SQL.Database();
  }

  raw.run(SCHEMA_SQL);

  let inTransaction = false;
  let closed = false;

  function saveDb(): void {
    if (!path || closed) return;
    const tmpPath = path + '.tmp';
    writeFileSync(tmpPath, Buffer.from(raw.export()));
    renameSync(tmpPath, path);
  }

  const instance: Database = {
    run(sql: string, params: SqlValue[] = []): number {
      raw.run(sql, params);
      const changes = raw.getRowsModified();
      if (!inTransaction) saveDb();
      return changes;
    },

    query(sql: string, params: SqlValue[] = []): SqlRow[] {
      const stmt = raw.prepare(sql);
      try {
        stmt.bind(params);
        const results: SqlRow[] = [];
        while (stmt.step()) {
          results.push(stmt.getAsObject());
        }
        return results;
      } finally {
        stmt.free();
      }
    },

    transaction<T>(fn: () => T): T {
      if (inTransaction) return fn();

      raw.run('BEGIN');
      inTransaction = true;
      try {
        const result = fn();
        raw.run('COMMIT');
        inTransaction = false;
        saveDb();
        return result;
      } catch (err) {
        inTransaction = false;
        raw.run('ROLLBACK');
        throw err;
      }
    },

    save() {
      saveDb();
    },

    close() {
      if (closed) return;
      saveDb();
      raw.close();
      closed = true;
    },
  };

  // Persist the schema on first creation
  saveDb();
  return instance;
}
