import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createDatabase, type Database } from './index';
import { text } from './rows';

const open: Database[] = [];
const dirs: string[] = [];

async function openDb(path: string | null): Promise<Database> {
  const db = await createDatabase({ path });
  open.push(db);
  return db;
}

afterEach(() => {
  for (const db of open.splice(0)) db.close();
  for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe('createDatabase', () => {
  it('creates the schema', async () => {
    const db = await openDb(null);
    const tables = db
      .query("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .map((row) => text(row, 'name'));
    expect(tables).toEqual([
      'alert_settings',
      'pending_alerts',
      'preferences',
      'product_status_cache',
      'settings',
      'subscriptions',
      'users',
    ]);
  });

  it('reports changed rows', async () => {
    const db = await openDb(null);
    expect(db.run('INSERT INTO settings (key, value) VALUES (?, ?)', ['a', '1'])).toBe(1);
    expect(db.run('UPDATE settings SET value = ? WHERE key = ?', ['2', 'missing'])).toBe(0);
  });

  it('rolls back a failed transaction', async () => {
    const db = await openDb(null);
    expect(() =>
      db.transaction(() => {
        db.run('INSERT INTO settings (key, value) VALUES (?, ?)', ['a', '1']);
        throw new Error('abort');
      }),
    ).toThrow('abort');
    expect(db.query('SELECT * FROM settings')).toEqual([]);
  });

  it('runs a nested transaction inside the outer one', async () => {
    const db = await openDb(null);
    const result = db.transaction(() => {
      db.run('INSERT INTO settings (key, value) VALUES (?, ?)', ['a', '1']);
      return db.transaction(() => db.run('INSERT INTO settings (key, value) VALUES (?, ?)', ['b', '2']));
    });
    expect(result).toBe(1);
    expect(db.query('SELECT key FROM settings ORDER BY key').map((row) => text(row, 'key'))).toEqual(['a', 'b']);
  });

  it('persists to disk and reloads', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'stockbot-db-'));
    dirs.push(dir);
    const path = join(dir, 'nested', 'bot.db');

    const first = await createDatabase({ path });
    first.run('INSERT INTO settings (key, value) VALUES (?, ?)', ['auto_approve', 'true']);
    first.close();

    const second = await openDb(path);
    const rows = second.query('SELECT value FROM settings WHERE key = ?', ['auto_approve']);
    expect(rows.map((row) => text(row, 'value'))).toEqual(['true']);
  });
});
