/**
 * Pending alert queue.
 *
 * Rows are claimed for a flush with a single UPDATE, deleted when the digest
 * was delivered and released when it was not. A claim that outlives
 * CLAIM_TIMEOUT_MS belongs to a flush that died and is released again.
 *
 * Only unclaimed rows are unique per (user, product, location), so a detection
 * made while a digest is in flight is queued next to the claimed row. When the
 * claim is released the claimed duplicate is dropped in favour of that row.
 */

import type { Database, SqlRow, SqlValue } from '../db/index';
import { date, dateOrNull, int, text } from '../db/rows';
import type { PendingAlert } from '../types';
import { MINUTE_MS } from '../utils/time';

export const CLAIM_TIMEOUT_MS = 10 * MINUTE_MS;

export interface PendingAlertQueue {
  /** Returns false when the same (user, product, location) is already queued */
  enqueue(alert: Omit<PendingAlert, 'id'>): boolean;
  /** Users holding at least one unclaimed alert */
  usersWithPending(): string[];
  /** Detection time of the user's oldest unclaimed alert */
  oldestUnclaimed(userId: string): Date | null;
  /** Claims every unclaimed alert of the user, ordered by product then detection time */
  claim(userId: string, claimId: string, now: Date): PendingAlert[];
  complete(claimId: string): number;
  release(claimId: string): number;
  releaseStale(now: Date): number;
  countForUser(userId: string): number;
}

function rowToAlert(row: SqlRow): PendingAlert {
  return {
    id: int(row, 'id'),
    userId: text(row, 'user_id'),
    productId: text(row, 'product_id'),
    location: text(row, 'location'),
    detectedAt: date(row, 'detected_at'),
  };
}

/** Deletes claimed rows matching `where` that already have an unclaimed twin */
const dropShadowedSql = (where: string) => `
  DELETE FROM pending_alerts
  WHERE ${where}
    AND EXISTS (
      SELECT 1 FROM pending_alerts AS queued
      WHERE queued.claim_id IS NULL
        AND queued.user_id = pending_alerts.user_id
        AND queued.product_id = pending_alerts.product_id
        AND queued.location = pending_alerts.location
    )`;

export function createPendingAlertQueue(db: Database): PendingAlertQueue {
  /** Clears the claim of matching rows; returns how many rows went back to the queue */
  function unclaim(where: string, params: SqlValue[]): number {
    return db.transaction(() => {
      db.run(dropShadowedSql(where), params);
      return db.run(`UPDATE pending_alerts SET claim_id = NULL, claimed_at = NULL WHERE ${where}`, params);
    });
  }

  return {
    enqueue(alert) {
      return (
        db.run(
          `INSERT OR IGNORE INTO pending_alerts (user_id, product_id, location, detected_at)
           VALUES (?, ?, ?, ?)`,
          [alert.userId, alert.productId, alert.location, alert.detectedAt.getTime()],
        ) > 0
      );
    },

    usersWithPending() {
      return db
        .query('SELECT DISTINCT user_id FROM pending_alerts WHERE claim_id IS NULL ORDER BY user_id')
        .map((row) => text(row, 'user_id'));
    },

    oldestUnclaimed(userId) {
      const row = db.query(
        'SELECT MIN(detected_at) AS oldest FROM pending_alerts WHERE user_id = ? AND claim_id IS NULL',
        [userId],
      )[0];
      return row ? dateOrNull(row, 'oldest') : null;
    },

    claim(userId, claimId, now) {
      const claimed = db.run(
        'UPDATE pending_alerts SET claim_id = ?, claimed_at = ? WHERE user_id = ? AND claim_id IS NULL',
        [claimId, now.getTime(), userId],
      );
      if (claimed === 0) return [];
      return db
        .query('SELECT * FROM pending_alerts WHERE claim_id = ? ORDER BY product_id, detected_at, id', [claimId])
        .map(rowToAlert);
    },

    complete(claimId) {
      return db.run('DELETE FROM pending_alerts WHERE claim_id = ?', [claimId]);
    },

    release(claimId) {
      return unclaim('claim_id = ?', [claimId]);
    },

    releaseStale(now) {
      return unclaim('claim_id IS NOT NULL AND claimed_at <= ?', [now.getTime() - CLAIM_TIMEOUT_MS]);
    },

    countForUser(userId) {
      const row = db.query('SELECT COUNT(*) AS n FROM pending_alerts WHERE user_id = ?', [userId])[0];
      return row ? int(row, 'n') : 0;
    },
  };
}
