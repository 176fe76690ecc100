/**
 * User commands - private chat with the bot
 */

import { escapeMarkdown } from '../channels/base-adapter';
import { MAX_PAUSE_DAYS, MIN_PAUSE_DAYS } from '../subscriptions/lifecycle';
import { CADENCES, type Cadence, type Subscriber } from '../types';
import { createLogger } from '../utils/logger';
import { formatDateTime, formatHour } from '../utils/time';
import type { CommandContext, CommandDefinition } from './registry';

const logger = createLogger('user-commands');

const CADENCE_DESCRIPTIONS: Record<Cadence, string> = {
  instant: 'as soon as stock is found',
  hourly: 'as an hourly digest',
  daily: 'as a daily digest',
};

// =============================================================================
// Helpers
// =============================================================================

function findProduct(ctx: CommandContext, input: string): string {
  const wanted = input.trim().toLowerCase();
  // Unknown names fall through so the service reports them
  return ctx.products.find((p) => p.toLowerCase() === wanted) ?? input.trim();
}

function parseCadence(input: string): Cadence | null {
  const wanted = input.trim().toLowerCase();
  return CADENCES.find((c) => c === wanted) ?? null;
}

function describeStatus(subscriber: Subscriber, timeZone: string): string {
  const { subscription } = subscriber;
  switch (subscription.status) {
    case 'trial':
      return 'trial (awaiting approval)';
    case 'active':
      return subscription.expiresAt
        ? `active until ${formatDateTime(subscription.expiresAt, timeZone)}`
        : 'active';
    case 'expired':
      return 'expired';
    case 'paused':
      return subscription.pausedUntil
        ? `paused until ${formatDateTime(subscription.pausedUntil, timeZone)}`
        : 'paused';
  }
}

export function renderSubscription(subscriber: Subscriber, timeZone: string): string {
  const { user, settings, preferences } = subscriber;
  const quiet = settings.quietHours
    ? `${formatHour(settings.quietHours.start)} to ${formatHour(settings.quietHours.end)}`
    : 'off';
  const products = preferences.length > 0 ? preferences.map((p) => escapeMarkdown(p)).join(', ') : 'none';

  return [
    '📋 *Your subscription*',
    `Status: ${describeStatus(subscriber, timeZone)}`,
    `Pincode: ${user.location ?? 'not set'}`,
    `Alerts: ${settings.cadence}`,
    `Quiet hours: ${quiet}`,
    `Products: ${products}`,
  ].join('\n');
}

// =============================================================================
// Commands
// =============================================================================

export function createUserCommands(): CommandDefinition[] {
  return [
    {
      name: 'start',
      description: 'Register and show how the bot works',
      usage: '/start',
      handler: () =>
        [
          '👋 Welcome! I send an alert when products come back in stock at your pincode.',
          '',
          '1. Set your pincode: /add <pincode>',
          '2. Pick products: /products',
          '3. Choose how often: /frequency instant|hourly|daily',
          '',
          'Send /help for all commands.',
        ].join('\n'),
    },

    {
      name: 'add',
      description: 'Set or change your pincode',
      usage: '/add <pincode>',
      aliases: ['pincode'],
      handler: async (args, ctx) => {
        const userId = ctx.message.userId;
        if (!args) {
          ctx.conversation.expectReply(userId, 'add');
          return 'Send me your six-digit pincode.';
        }

        const previous = ctx.subscriptions.getSubscriber(userId).subscription.status;
        const result = ctx.subscriptions.setLocation(userId, args, ctx.now);

        if (result.autoApproved && result.subscription.expiresAt) {
          return `✅ Welcome! Your free trial for pincode ${result.location} is active until ${formatDateTime(result.subscription.expiresAt, ctx.timeZone)}.`;
        }
        if (previous !== 'trial') {
          return `✅ Your pincode has been updated to ${result.location}.`;
        }

        const username = ctx.message.username ? ` (@${escapeMarkdown(ctx.message.username)})` : '';
        const delivered = await ctx.notify(
          ctx.adminChatId,
          `🆕 User \`${userId}\`${username} set pincode ${result.location} and is waiting for approval.\nApprove with \`/approve ${userId} [days]\``,
        );
        if (!delivered) logger.warn({ userId }, 'Could not notify admins about a new user');
        return `✅ Your pincode has been set to ${result.location}. An admin will review your access soon.`;
      },
    },

    {
      name: 'products',
      description: 'List products you can track',
      usage: '/products',
      handler: (_args, ctx) => {
        const tracked = new Set(ctx.subscriptions.getSubscriber(ctx.message.userId).preferences);
        const lines = ctx.products.map((p) => `${tracked.has(p) ? '✅' : '▫️'} ${escapeMarkdown(p)}`);
        return ['*Products* (✅ = tracked)', ...lines, '', 'Use /track <product> or /untrack <product>.'].join('\n');
      },
    },

    {
      name: 'track',
      description: 'Get alerts for a product',
      usage: '/track <product>',
      handler: (args, ctx) => {
        if (!args) return 'Usage: /track <product>. See /products for the list.';
        const productId = findProduct(ctx, args);
        const added = ctx.subscriptions.trackProduct(ctx.message.userId, productId, ctx.now);
        const name = escapeMarkdown(productId);
        return added ? `✅ Now tracking ${name}.` : `You are already tracking ${name}.`;
      },
    },

    {
      name: 'untrack',
      description: 'Stop alerts for a product',
      usage: '/untrack <product>',
      handler: (args, ctx) => {
        if (!args) return 'Usage: /untrack <product>';
        const productId = findProduct(ctx, args);
        const removed = ctx.subscriptions.untrackProduct(ctx.message.userId, productId);
        const name = escapeMarkdown(productId);
        return removed ? `🗑 Stopped tracking ${name}.` : `You were not tracking ${name}.`;
      },
    },

    {
      name: 'frequency',
      description: 'Choose instant, hourly or daily alerts',
      usage: '/frequency instant|hourly|daily',
      handler: (args, ctx) => {
        const cadence = parseCadence(args);
        if (!cadence) {
          const current = ctx.subscriptions.getSubscriber(ctx.message.userId).settings.cadence;
          return `Alerts currently arrive ${CADENCE_DESCRIPTIONS[current]}.\nUsage: /frequency instant|hourly|daily`;
        }
        ctx.subscriptions.setCadence(ctx.message.userId, cadence);
        const when = cadence === 'daily' ? ` at ${formatHour(ctx.dailyDigestHour)}` : '';
        return `✅ Alerts will now arrive ${CADENCE_DESCRIPTIONS[cadence]}${when}.`;
      },
    },

    {
      name: 'quiet',
      description: 'Silence alerts during set hours',
      usage: '/quiet <start hour> <end hour> | /quiet off',
      handler: (args, ctx) => {
        const userId = ctx.message.userId;
        if (args.toLowerCase() === 'off') {
          ctx.subscriptions.setQuietHours(userId, null);
          return '🔔 Quiet hours turned off.';
        }

        const match = /^(\d{1,2})\s+(\d{1,2})$/.exec(args);
        if (!match) {
          return 'Usage: /quiet <start hour> <end hour>, e.g. /quiet 22 7\nOr /quiet off';
        }
        const start = Number.parseInt(match[1], 10);
        const end = Number.parseInt(match[2], 10);
        ctx.subscriptions.setQuietHours(userId, { start, end });
        return `🌙 Quiet hours set: ${formatHour(start)} to ${formatHour(end)} (${escapeMarkdown(ctx.timeZone)}). Alerts found meanwhile are saved for later.`;
      },
    },

    {
      name: 'pause',
      description: 'Pause alerts for a number of days',
      usage: `/pause <days ${MIN_PAUSE_DAYS}-${MAX_PAUSE_DAYS}>`,
      handler: (args, ctx) => {
        if (!/^\d+$/.test(args)) {
          return `Usage: /pause <days>, between ${MIN_PAUSE_DAYS} and ${MAX_PAUSE_DAYS}.`;
        }
        const sub = ctx.subscriptions.pause(ctx.message.userId, Number.parseInt(args, 10), ctx.now);
        const until = sub.pausedUntil ? formatDateTime(sub.pausedUntil, ctx.timeZone) : 'further notice';
        return `⏸ Alerts paused until ${until}. Send /resume to restart them earlier.`;
      },
    },

    {
      name: 'resume',
      description: 'Resume paused alerts',
      usage: '/resume',
      handler: (_args, ctx) => {
        const sub = ctx.subscriptions.resume(ctx.message.userId, ctx.now);
        if (sub.status === 'expired') {
          return '▶️ Alerts resumed, but your subscription has expired. Use /dm to contact the admin.';
        }
        return '▶️ Alerts resumed.';
      },
    },

    {
      name: 'subscription',
      description: 'Show your subscription and alert settings',
      usage: '/subscription',
      aliases: ['status'],
      handler: (_args, ctx) => renderSubscription(ctx.subscriptions.getSubscriber(ctx.message.userId), ctx.timeZone),
    },

    {
      name: 'dm',
      description: 'Send a message to the admin',
      usage: '/dm <message>',
      cooldownMs: 30_000,
      handler: async (args, ctx) => {
        if (!args) return 'Usage: /dm <your message to the admin>';
        const userId = ctx.message.userId;
        const from = ctx.message.username ? `@${escapeMarkdown(ctx.message.username)}` : 'a user';
        const delivered = await ctx.notify(
          ctx.adminChatId,
          `✉️ Message from ${from} (\`${userId}\`):\n\n${escapeMarkdown(args)}\n\nReply with \`/reply ${userId} <message>\``,
        );
        return delivered ? '✅ Your message has been sent to the admin.' : '❌ Could not reach the admin. Please try again later.';
      },
    },

    {
      name: 'rules',
      description: 'Show the service rules',
      usage: '/rules',
      handler: () =>
        [
          '📜 *Service rules*',
          '1. Each subscription covers one pincode.',
          '2. You can change your pincode at any time with /add.',
          '3. Alerts are informational; stock can sell out quickly.',
          '4. Spamming commands may get your account blocked.',
        ].join('\n'),
    },

    {
      name: 'cancel',
      description: 'Cancel the current step',
      usage: '/cancel',
      cooldownMs: 0,
      handler: (_args, ctx) => (ctx.pendingCommand ? '👍 Cancelled.' : 'Nothing to cancel.'),
    },

    {
      name: 'help',
      description: 'Show available commands',
      usage: '/help',
      handler: (_args, ctx) => {
        const lines = ['*Commands*'];
        for (const cmd of ctx.commands.list({ adminOnly: false })) {
          lines.push(`${escapeMarkdown(cmd.usage)} - ${cmd.description}`);
        }
        return lines.join('\n');
      },
    },
  ];
}
