/**
 * Subscription Store - users, subscriptions, preferences, alert settings
 * and runtime settings, all keyed by user id.
 */

import type { Database, SqlRow } from '../db/index';
import { bool, date, dateOrNull, int, intOrNull, msOrNull, text, textOrNull } from '../db/rows';
import { createLogger } from '../utils/logger';
import {
  CADENCES,
  SUBSCRIPTION_STATUSES,
  type AlertSettings,
  type Cadence,
  type QuietHours,
  type Subscriber,
  type Subscription,
  type SubscriptionStatus,
  type UnpausedStatus,
  type User,
} from '../types';

const logger = createLogger('subscription-store');

// =============================================================================
// TYPES
// =============================================================================

export interface NewUser {
  id: string;
  username: string | null;
}

export interface SubscriptionStore {
  /** Creates the user with a trial subscription and default settings; no-op if present */
  insertUser(user: NewUser, now: Date): User;
  getUser(userId: string): User | null;
  setLocation(userId: string, location: string): void;
  setBlocked(userId: string, blocked: boolean): void;
  setUsername(userId: string, username: string | null): void;

  getSubscription(userId: string): Subscription | null;
  /** Writes every mutable column of the subscription in one UPDATE */
  saveSubscription(sub: Subscription): void;
  listSubscriptionsByStatus(status: SubscriptionStatus): Subscription[];
  countByStatus(): Record<SubscriptionStatus, number>;
  countBlocked(): number;

  getSettings(userId: string): AlertSettings | null;
  setCadence(userId: string, cadence: Cadence): void;
  setQuietHours(userId: string, quiet: QuietHours | null): void;

  getPreferences(userId: string): string[];
  /** Returns false when the product was already selected */
  addPreference(userId: string, productId: string, now: Date): boolean;
  removePreference(userId: string, productId: string): boolean;

  getSubscriber(userId: string): Subscriber | null;
  /** Users with a location set, optionally narrowed to one location */
  listSubscribers(filter?: { location?: string }): Subscriber[];

  getSetting(key: string): string | null;
  setSetting(key: string, value: string): void;
}

// =============================================================================
// ROW PARSING
// =============================================================================

function parseStatus(value: string): SubscriptionStatus {
  const status = SUBSCRIPTION_STATUSES.find((s) => s === value);
  if (!status) throw new TypeError(`Unknown subscription status: ${value}`);
  return status;
}

function parseResumeStatus(value: string | null): UnpausedStatus | null {
  if (value === null) return null;
  const status = parseStatus(value);
  if (status === 'paused') throw new TypeError('resume_status cannot be paused');
  return status;
}

function parseCadence(value: string): Cadence {
  const cadence = CADENCES.find((c) => c === value);
  if (!cadence) throw new TypeError(`Unknown cadence: ${value}`);
  return cadence;
}

function rowToUser(row: SqlRow): User {
  return {
    id: text(row, 'id'),
    username: textOrNull(row, 'username'),
    location: textOrNull(row, 'location'),
    blocked: bool(row, 'blocked'),
    registeredAt: date(row, 'registered_at'),
  };
}

function rowToSubscription(row: SqlRow): Subscription {
  return {
    userId: text(row, 'user_id'),
    status: parseStatus(text(row, 'status')),
    approved: bool(row, 'approved'),
    expiresAt: dateOrNull(row, 'expires_at'),
    pausedUntil: dateOrNull(row, 'paused_until'),
    resumeStatus: parseResumeStatus(textOrNull(row, 'resume_status')),
    updatedAt: date(row, 'updated_at'),
  };
}

function rowToSettings(row: SqlRow): AlertSettings {
  const start = intOrNull(row, 'quiet_start');
  const end = intOrNull(row, 'quiet_end');
  return {
    userId: text(row, 'user_id'),
    cadence: parseCadence(text(row, 'cadence')),
    quietHours: start !== null && end !== null ? { start, end } : null,
  };
}

// =============================================================================
// STORE
// =============================================================================

export function createSubscriptionStore(db: Database): SubscriptionStore {
  function getPreferences(userId: string): string[] {
    return db
      .query('SELECT product_id FROM preferences WHERE user_id = ? ORDER BY product_id', [userId])
      .map((row) => text(row, 'product_id'));
  }

  function assemble(user: User): Subscriber | null {
    const subRow = db.query('SELECT * FROM subscriptions WHERE user_id = ?', [user.id])[0];
    const settingsRow = db.query('SELECT * FROM alert_settings WHERE user_id = ?', [user.id])[0];
    if (!subRow || !settingsRow) {
      logger.warn({ userId: user.id }, 'User row without subscription or settings');
      return null;
    }
    return {
      user,
      subscription: rowToSubscription(subRow),
      settings: rowToSettings(settingsRow),
      preferences: getPreferences(user.id),
    };
  }

  const store: SubscriptionStore = {
    insertUser(user, now) {
      const existing = store.getUser(user.id);
      if (existing) return existing;

      const ts = now.getTime();
      db.transaction(() => {
        db.run('INSERT INTO users (id, username, location, blocked, registered_at) VALUES (?, ?, NULL, 0, ?)', [
          user.id,
          user.username,
          ts,
        ]);
        db.run(
          "INSERT INTO subscriptions (user_id, status, approved, updated_at) VALUES (?, 'trial', 0, ?)",
          [user.id, ts],
        );
        db.run("INSERT INTO alert_settings (user_id, cadence) VALUES (?, 'instant')", [user.id]);
      });

      logger.info({ userId: user.id, username: user.username }, 'User registered');
      return { id: user.id, username: user.username, location: null, blocked: false, registeredAt: now };
    },

    getUser(userId) {
      const row = db.query('SELECT * FROM users WHERE id = ?', [userId])[0];
      return row ? rowToUser(row) : null;
    },

    setLocation(userId, location) {
      db.run('UPDATE users SET location = ? WHERE id = ?', [location, userId]);
    },

    setBlocked(userId, blocked) {
      db.run('UPDATE users SET blocked = ? WHERE id = ?', [blocked ? 1 : 0, userId]);
    },

    setUsername(userId, username) {
      db.run('UPDATE users SET username = ? WHERE id = ?', [username, userId]);
    },

    getSubscription(userId) {
      const row = db.query('SELECT * FROM subscriptions WHERE user_id = ?', [userId])[0];
      return row ? rowToSubscription(row) : null;
    },

    saveSubscription(sub) {
      db.run(
        `UPDATE subscriptions
         SET status = ?, approved = ?, expires_at = ?, paused_until = ?, resume_status = ?, updated_at = ?
         WHERE user_id = ?`,
        [
          sub.status,
          sub.approved ? 1 : 0,
          msOrNull(sub.expiresAt),
          msOrNull(sub.pausedUntil),
          sub.resumeStatus,
          sub.updatedAt.getTime(),
          sub.userId,
        ],
      );
    },

    listSubscriptionsByStatus(status) {
      return db
        .query('SELECT * FROM subscriptions WHERE status = ? ORDER BY user_id', [status])
        .map(rowToSubscription);
    },

    countByStatus() {
      const counts: Record<SubscriptionStatus, number> = { trial: 0, active: 0, expired: 0, paused: 0 };
      for (const row of db.query('SELECT status, COUNT(*) AS n FROM subscriptions GROUP BY status')) {
        counts[parseStatus(text(row, 'status'))] = int(row, 'n');
      }
      return counts;
    },

    countBlocked() {
      const row = db.query('SELECT COUNT(*) AS n FROM users WHERE blocked = 1')[0];
      return row ? int(row, 'n') : 0;
    },

    getSettings(userId) {
      const row = db.query('SELECT * FROM alert_settings WHERE user_id = ?', [userId])[0];
      return row ? rowToSettings(row) : null;
    },

    setCadence(userId, cadence) {
      db.run('UPDATE alert_settings SET cadence = ? WHERE user_id = ?', [cadence, userId]);
    },

    setQuietHours(userId, quiet) {
      db.run('UPDATE alert_settings SET quiet_start = ?, quiet_end = ? WHERE user_id = ?', [
        quiet ? quiet.start : null,
        quiet ? quiet.end : null,
        userId,
      ]);
    },

    getPreferences,

    addPreference(userId, productId, now) {
      return (
        db.run('INSERT OR IGNORE INTO preferences (user_id, product_id, created_at) VALUES (?, ?, ?)', [
          userId,
          productId,
          now.getTime(),
        ]) > 0
      );
    },

    removePreference(userId, productId) {
      return db.run('DELETE FROM preferences WHERE user_id = ? AND product_id = ?', [userId, productId]) > 0;
    },

    getSubscriber(userId) {
      const user = store.getUser(userId);
      return user ? assemble(user) : null;
    },

    listSubscribers(filter = {}) {
      const rows =
        filter.location !== undefined
          ? db.query('SELECT * FROM users WHERE location = ? ORDER BY id', [filter.location])
          : db.query('SELECT * FROM users WHERE location IS NOT NULL ORDER BY id');

      const subscribers: Subscriber[] = [];
      for (const row of rows) {
        const subscriber = assemble(rowToUser(row));
        if (subscriber) subscribers.push(subscriber);
      }
      return subscribers;
    },

    getSetting(key) {
      const row = db.query('SELECT value FROM settings WHERE key = ?', [key])[0];
      return row ? text(row, 'value') : null;
    },

    setSetting(key, value) {
      db.run('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)', [key, value]);
    },
  };

  return store;
}
