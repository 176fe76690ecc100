/**
 * Scrape cycle - checks every tracked (product, location) pair and feeds the
 * readings to the matcher. A failed pair is logged and skipped with its cache
 * entry untouched; the next cycle retries it. Cache entries of pairs nobody
 * eligible tracks any more are dropped, so a pair that is tracked again starts
 * from "unavailable" instead of a reading that may since have gone stale.
 */

import type { AvailabilityOracle } from '../oracle/index';
import { isEligible } from '../subscriptions/lifecycle';
import type { SubscriptionStore } from '../subscriptions/store';
import { createLogger } from '../utils/logger';
import type { AlertMatcher } from './matcher';
import type { StatusCache } from './status-cache';

const logger = createLogger('scrape-cycle');

export interface ScrapeCycleDeps {
  store: SubscriptionStore;
  oracle: AvailabilityOracle;
  matcher: AlertMatcher;
  cache: StatusCache;
  now?: () => Date;
}

export interface ScrapeCycleResult {
  checked: number;
  transitions: number;
  errors: number;
}

export interface ScrapeCycle {
  /** Products to check per location, from eligible users' preferences */
  trackedPairs(now?: Date): Map<string, string[]>;
  run(): Promise<ScrapeCycleResult>;
}

export function createScrapeCycle(deps: ScrapeCycleDeps): ScrapeCycle {
  const { store, oracle, matcher, cache } = deps;
  const clock = deps.now ?? (() => new Date());

  function trackedPairs(now: Date = clock()): Map<string, string[]> {
    const byLocation = new Map<string, Set<string>>();

    for (const s of store.listSubscribers()) {
      const location = s.user.location;
      if (!location || s.preferences.length === 0) continue;
      if (!isEligible(s.user.blocked, s.subscription, now)) continue;

      let products = byLocation.get(location);
      if (!products) {
        products = new Set();
        byLocation.set(location, products);
      }
      for (const productId of s.preferences) products.add(productId);
    }

    const pairs = new Map<string, string[]>();
    for (const [location, products] of [...byLocation].sort(([a], [b]) => a.localeCompare(b))) {
      pairs.set(location, [...products].sort());
    }
    return pairs;
  }

  async function run(): Promise<ScrapeCycleResult> {
    const result: ScrapeCycleResult = { checked: 0, transitions: 0, errors: 0 };
    const startedAt = Date.now();

    const pairs = trackedPairs();
    for (const [location, products] of pairs) {
      for (const productId of products) {
        try {
          const reading = await oracle.check(productId, location);
          result.checked++;

          const match = await matcher.processReading(
            { productId, location, available: reading.available, observedAt: reading.observedAt },
            clock(),
          );
          if (match.transition) result.transitions++;
        } catch (err) {
          result.errors++;
          logger.warn({ err, productId, location }, 'Availability check failed, skipping');
        }
      }
    }

    const forgotten = cache.retainOnly(pairs);
    logger.info({ ...result, forgotten, durationMs: Date.now() - startedAt }, 'Scrape cycle complete');
    return result;
  }

  return { trackedPairs, run };
}
