/**
 * Alert Matcher - turns availability readings into alerts.
 *
 * Edge-triggered: only an unavailable -> available transition produces
 * candidates. A missing cache entry counts as unavailable, so the first
 * sighting of an available product alerts. The cache is written before any
 * alert is queued or sent.
 */

import type { ChannelAdapter } from '../channels/base-adapter';
import { isEligible } from '../subscriptions/lifecycle';
import type { SubscriptionStore } from '../subscriptions/store';
import type { AvailabilityReading, Subscriber } from '../types';
import { createLogger } from '../utils/logger';
import { isQuietAt } from '../utils/time';
import { renderInstantAlert } from './messages';
import type { PendingAlertQueue } from './pending';
import type { StatusCache } from './status-cache';

const logger = createLogger('alert-matcher');

// =============================================================================
// TYPES
// =============================================================================

export interface AlertMatcherDeps {
  store: SubscriptionStore;
  cache: StatusCache;
  queue: PendingAlertQueue;
  channel: Pick<ChannelAdapter, 'sendMessage'>;
  timeZone: string;
}

export interface MatchResult {
  transition: boolean;
  /** User ids that got an instant message */
  delivered: string[];
  /** User ids that got a pending alert (new or already queued) */
  queued: string[];
  /** User ids whose instant message could not be delivered */
  failed: string[];
}

export interface AlertMatcher {
  processReading(reading: AvailabilityReading, now?: Date): Promise<MatchResult>;
  /** Eligible subscribers at the location who selected the product */
  findRecipients(productId: string, location: string, now: Date): Subscriber[];
}

// =============================================================================
// MATCHER
// =============================================================================

export function createAlertMatcher(deps: AlertMatcherDeps): AlertMatcher {
  const { store, cache, queue, channel, timeZone } = deps;

  function findRecipients(productId: string, location: string, now: Date): Subscriber[] {
    return store
      .listSubscribers({ location })
      .filter(
        (s) => s.preferences.includes(productId) && isEligible(s.user.blocked, s.subscription, now),
      );
  }

  async function processReading(reading: AvailabilityReading, now: Date = new Date()): Promise<MatchResult> {
    const result: MatchResult = { transition: false, delivered: [], queued: [], failed: [] };
    const { productId, location } = reading;

    const prior = cache.get(productId, location);
    cache.set(reading);

    const wasAvailable = prior?.available ?? false;
    if (wasAvailable || !reading.available) return result;

    result.transition = true;
    const recipients = findRecipients(productId, location, now);
    logger.info({ productId, location, recipients: recipients.length }, 'Product back in stock');

    // Queue everything before the first await so a digest never sees a
    // half-processed reading
    const instant: Subscriber[] = [];
    for (const subscriber of recipients) {
      const { cadence, quietHours } = subscriber.settings;
      if (cadence === 'instant' && !isQuietAt(quietHours, now, timeZone)) {
        instant.push(subscriber);
        continue;
      }
      queue.enqueue({ userId: subscriber.user.id, productId, location, detectedAt: reading.observedAt });
      result.queued.push(subscriber.user.id);
    }

    const text = renderInstantAlert(productId, location);
    for (const subscriber of instant) {
      const userId = subscriber.user.id;
      try {
        const messageId = await channel.sendMessage(userId, text);
        if (messageId === null) {
          result.failed.push(userId);
        } else {
          result.delivered.push(userId);
        }
      } catch (err) {
        logger.error({ err, userId, productId, location }, 'Instant alert failed');
        result.failed.push(userId);
      }
    }

    if (result.failed.length > 0) {
      logger.error({ productId, location, failed: result.failed }, 'Instant alerts dropped');
    }
    return result;
  }

  return { processReading, findRecipients };
}
