/**
 * Digest Scheduler - flushes queued alerts as one message per user.
 *
 * The hourly trigger serves hourly users and instant users whose alerts were
 * held back by quiet hours; the daily trigger serves daily users. Users in
 * their quiet hours or no longer eligible keep their alerts for a later run.
 * A daily user still holding alerts from before the last daily digest hour
 * (skipped for quiet hours, ineligible or a failed send) is served by the next
 * hourly run instead of waiting another day.
 */

import { randomUUID } from 'crypto';
import type { ChannelAdapter } from '../channels/base-adapter';
import { isEligible } from '../subscriptions/lifecycle';
import type { SubscriptionStore } from '../subscriptions/store';
import type { Cadence } from '../types';
import { createLogger } from '../utils/logger';
import { DAY_MS, isQuietAt, nextDailyRun } from '../utils/time';
import { renderDigest } from './messages';
import type { PendingAlertQueue } from './pending';

const logger = createLogger('digest');

export type DigestTrigger = 'hourly' | 'daily';

const CADENCES_BY_TRIGGER: Record<DigestTrigger, readonly Cadence[]> = {
  hourly: ['hourly', 'instant'],
  daily: ['daily'],
};

export interface DigestDeps {
  store: SubscriptionStore;
  queue: PendingAlertQueue;
  channel: Pick<ChannelAdapter, 'sendMessage'>;
  timeZone: string;
  /** Local hour of the daily digest */
  dailyHour: number;
  newClaimId?: () => string;
}

export interface FlushResult {
  /** Users whose digest was delivered */
  sent: string[];
  /** Users left queued: wrong cadence, quiet hours or not eligible */
  skipped: string[];
  /** Users whose digest failed and whose alerts were released */
  failed: string[];
  /** Stale claims released before the flush */
  staleReleased: number;
}

export interface DigestScheduler {
  flush(trigger: DigestTrigger, now?: Date): Promise<FlushResult>;
}

export function createDigestScheduler(deps: DigestDeps): DigestScheduler {
  const { store, queue, channel, timeZone, dailyHour } = deps;
  const newClaimId = deps.newClaimId ?? randomUUID;

  /** Most recent daily digest time at or before `now` */
  function lastDailyRun(now: Date): Date | null {
    const next = nextDailyRun(new Date(now.getTime() - DAY_MS), dailyHour, timeZone);
    if (!next) return null;
    return next.getTime() > now.getTime() ? new Date(next.getTime() - DAY_MS) : next;
  }

  function isDue(userId: string, cadence: Cadence, trigger: DigestTrigger, now: Date): boolean {
    if (CADENCES_BY_TRIGGER[trigger].includes(cadence)) return true;
    if (trigger !== 'hourly' || cadence !== 'daily') return false;

    const missed = lastDailyRun(now);
    const oldest = queue.oldestUnclaimed(userId);
    return missed !== null && oldest !== null && oldest.getTime() < missed.getTime();
  }

  async function flush(trigger: DigestTrigger, now: Date = new Date()): Promise<FlushResult> {
    const result: FlushResult = { sent: [], skipped: [], failed: [], staleReleased: 0 };

    result.staleReleased = queue.releaseStale(now);
    if (result.staleReleased > 0) {
      logger.warn({ count: result.staleReleased }, 'Released stale digest claims');
    }

    for (const userId of queue.usersWithPending()) {
      const subscriber = store.getSubscriber(userId);
      if (!subscriber || !isDue(userId, subscriber.settings.cadence, trigger, now)) {
        continue;
      }
      if (
        !isEligible(subscriber.user.blocked, subscriber.subscription, now) ||
        isQuietAt(subscriber.settings.quietHours, now, timeZone)
      ) {
        result.skipped.push(userId);
        continue;
      }

      const claimId = newClaimId();
      const alerts = queue.claim(userId, claimId, now);
      if (alerts.length === 0) continue;

      let delivered = false;
      try {
        delivered = (await channel.sendMessage(userId, renderDigest(alerts))) !== null;
      } catch (err) {
        logger.error({ err, userId }, 'Digest send threw');
      }

      if (delivered) {
        queue.complete(claimId);
        result.sent.push(userId);
      } else {
        queue.release(claimId);
        result.failed.push(userId);
        logger.error({ userId, alerts: alerts.length }, 'Digest failed, alerts requeued');
      }
    }

    logger.info(
      { trigger, sent: result.sent.length, skipped: result.skipped.length, failed: result.failed.length },
      'Digest flush complete',
    );
    return result;
  }

  return { flush };
}
