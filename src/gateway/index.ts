/**
 * Gateway - wires every service of the stock bot together
 *
 * Initializes: DB, subscription store and service, alert pipeline (cache,
 * pending queue, matcher, digest, scrape cycle), Telegram channel, command
 * registry and the cron jobs that drive polling, digests and sweeps.
 */

import type { ChannelAdapter, IncomingMessage } from '../channels/base-adapter';
import { createTelegramAdapter } from '../channels/telegram';
import {
  createAdminCommands,
  createCommandRegistry,
  createConversationStore,
  createUserCommands,
  type CommandServices,
} from '../commands';
import { CronScheduler } from '../cron';
import { createDatabase } from '../db';
import { createDigestScheduler, type DigestTrigger } from '../alerts/digest';
import { createAlertMatcher } from '../alerts/matcher';
import { createPendingAlertQueue } from '../alerts/pending';
import { createScrapeCycle } from '../alerts/scrape-cycle';
import { createStatusCache } from '../alerts/status-cache';
import { createHttpOracle, type AvailabilityOracle } from '../oracle';
import { createSubscriptionService } from '../subscriptions/service';
import { createSubscriptionStore } from '../subscriptions/store';
import type { AppConfig } from '../utils/config';
import { createLogger } from '../utils/logger';
import { DAY_MS } from '../utils/time';

const logger = createLogger('gateway');

/** Cached readings older than this are dropped once a day */
const CACHE_RETENTION_MS = 30 * DAY_MS;

export const JOB_IDS = {
  scrape: 'scrape_cycle',
  hourlyDigest: 'hourly_digest',
  dailyDigest: 'daily_digest',
  sweep: 'subscription_sweep',
  cachePrune: 'cache_prune',
} as const;

export interface Gateway {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Run a scheduled job out of band; false when unknown or already running */
  runJob(id: string): Promise<boolean>;
}

/** Replacements for the parts that talk to the outside world */
export interface GatewayOverrides {
  channel?: ChannelAdapter;
  oracle?: AvailabilityOracle;
  /** null keeps the database in memory */
  databasePath?: string | null;
  now?: () => Date;
}

export async function createGateway(config: AppConfig, overrides: GatewayOverrides = {}): Promise<Gateway> {
  logger.info('Initializing stock bot gateway...');
  const clock = overrides.now ?? (() => new Date());
  const { timeZone } = config;

  // 1. Database and subscriptions
  const db = await createDatabase({
    path: overrides.databasePath === undefined ? config.database.path : overrides.databasePath,
  });
  const store = createSubscriptionStore(db);
  const subscriptions = createSubscriptionService(store, {
    ...config.subscription,
    products: config.products,
  });
  logger.info('Database initialized');

  // 2. Channel
  const channel =
    overrides.channel ??
    createTelegramAdapter({
      token: config.telegram.token,
      retry: { maxAttempts: config.delivery.maxAttempts },
    });

  async function notify(chatId: string, text: string): Promise<boolean> {
    return (await channel.sendMessage(chatId, text)) !== null;
  }

  // 3. Alert pipeline
  const cache = createStatusCache(db);
  const queue = createPendingAlertQueue(db);
  const matcher = createAlertMatcher({ store, cache, queue, channel, timeZone });
  const digest = createDigestScheduler({
    store,
    queue,
    channel,
    timeZone,
    dailyHour: config.schedule.dailyDigestHour,
  });
  const oracle = overrides.oracle ?? createHttpOracle(config.oracle);
  const scrape = createScrapeCycle({ store, oracle, matcher, cache, now: clock });

  // 4. Commands
  const { adminChatId, adminUserIds } = config.telegram;
  const registry = createCommandRegistry({
    isAdmin: (message: IncomingMessage) =>
      message.chatId === adminChatId && (adminUserIds.length === 0 || adminUserIds.includes(message.userId)),
    now: clock,
  });
  registry.registerMany(createUserCommands());
  registry.registerMany(createAdminCommands());

  const services: CommandServices = {
    subscriptions,
    conversation: createConversationStore({ now: () => clock().getTime() }),
    products: config.products,
    timeZone,
    adminChatId,
    dailyDigestHour: config.schedule.dailyDigestHour,
    notify,
  };

  channel.onMessage(async (message) => {
    const reply = await registry.handle(message, services);
    if (reply === null) return;
    const sent = await channel.sendMessage(message.chatId, reply);
    if (sent === null) {
      logger.warn({ chatId: message.chatId, userId: message.userId }, 'Command reply not delivered');
    }
  });

  // 5. Cron jobs
  const cron = new CronScheduler({ now: clock });

  cron.addJob({
    id: JOB_IDS.scrape,
    name: 'Stock check',
    schedule: { type: 'interval', intervalMs: config.schedule.checkIntervalMs },
    runOnStart: true,
    handler: async () => {
      await scrape.run();
    },
  });

  const flushDigest = async (trigger: DigestTrigger) => {
    const result = await digest.flush(trigger, clock());
    logger.info(
      {
        trigger,
        sent: result.sent.length,
        skipped: result.skipped.length,
        failed: result.failed.length,
        staleReleased: result.staleReleased,
      },
      'Cron: digest flush complete',
    );
  };

  cron.addJob({
    id: JOB_IDS.hourlyDigest,
    name: 'Hourly digest',
    schedule: { type: 'hourly', timeZone },
    handler: () => flushDigest('hourly'),
  });

  cron.addJob({
    id: JOB_IDS.dailyDigest,
    name: 'Daily digest',
    schedule: { type: 'daily', hour: config.schedule.dailyDigestHour, timeZone },
    handler: () => flushDigest('daily'),
  });

  cron.addJob({
    id: JOB_IDS.sweep,
    name: 'Subscription sweep',
    schedule: { type: 'interval', intervalMs: config.schedule.sweepIntervalMs },
    runOnStart: true,
    handler: async () => {
      const { expired, resumed } = subscriptions.sweep(clock());
      const lapsed = new Set(expired);

      for (const userId of resumed) {
        if (lapsed.has(userId)) continue;
        await notify(userId, '▶️ Your pause is over. Stock alerts have resumed.');
      }
      for (const userId of expired) {
        await notify(userId, '⌛ Your subscription has expired. Use /dm to contact the admin about renewing.');
      }
    },
  });

  cron.addJob({
    id: JOB_IDS.cachePrune,
    name: 'Status cache prune',
    schedule: { type: 'daily', hour: 3, timeZone },
    handler: () => {
      const removed = cache.prune(new Date(clock().getTime() - CACHE_RETENTION_MS));
      logger.info({ removed }, 'Cron: cache_prune complete');
    },
  });

  logger.info({ jobs: cron.getJobs().length }, 'Cron scheduler initialized');

  return {
    async start() {
      await channel.start();
      cron.start();
      logger.info({ platform: channel.platform, products: config.products.length, timeZone }, 'Stock bot gateway started');
    },

    async stop() {
      logger.info('Shutting down stock bot gateway...');
      await cron.stop();
      await channel.stop();
      db.close();
      logger.info('Stock bot gateway stopped');
    },

    runJob(id) {
      return cron.runNow(id);
    },
  };
}
