/**
 * Product Status Cache - last known availability per (product, location).
 */

import type { Database } from '../db/index';
import { bool, date, text } from '../db/rows';
import type { AvailabilityReading } from '../types';

export interface CachedStatus {
  available: boolean;
  observedAt: Date;
}

export interface StatusCache {
  get(productId: string, location: string): CachedStatus | null;
  set(reading: AvailabilityReading): void;
  /** Deletes entries last observed before `cutoff`; returns how many went */
  prune(cutoff: Date): number;
  /** Deletes entries whose pair is not in `tracked` (location -> product ids) */
  retainOnly(tracked: ReadonlyMap<string, readonly string[]>): number;
}

export function createStatusCache(db: Database): StatusCache {
  return {
    get(productId, location) {
      const row = db.query(
        'SELECT available, observed_at FROM product_status_cache WHERE product_id = ? AND location = ?',
        [productId, location],
      )[0];
      if (!row) return null;
      return { available: bool(row, 'available'), observedAt: date(row, 'observed_at') };
    },

    set(reading) {
      db.run(
        `INSERT INTO product_status_cache (product_id, location, available, observed_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (product_id, location) DO UPDATE SET
           available = excluded.available,
           observed_at = excluded.observed_at`,
        [reading.productId, reading.location, reading.available ? 1 : 0, reading.observedAt.getTime()],
      );
    },

    prune(cutoff) {
      return db.run('DELETE FROM product_status_cache WHERE observed_at < ?', [cutoff.getTime()]);
    },

    retainOnly(tracked) {
      const stale = db
        .query('SELECT product_id, location FROM product_status_cache')
        .map((row) => ({ productId: text(row, 'product_id'), location: text(row, 'location') }))
        .filter(({ productId, location }) => !tracked.get(location)?.includes(productId));
      if (stale.length === 0) return 0;

      return db.transaction(() => {
        let removed = 0;
        for (const { productId, location } of stale) {
          removed += db.run('DELETE FROM product_status_cache WHERE product_id = ? AND location = ?', [
            productId,
            location,
          ]);
        }
        return removed;
      });
    },
  };
}
