/**
 * Admin commands - only answered in the admin chat
 */

import { escapeMarkdown } from '../channels/base-adapter';
import { ValidationError } from '../types';
import { createLogger } from '../utils/logger';
import { formatDateTime, formatHour } from '../utils/time';
import type { CommandContext, CommandDefinition } from './registry';

const logger = createLogger('admin-commands');

const BROADCAST_DELAY_MS = 100;

// =============================================================================
// Helpers
// =============================================================================

/** Splits "<user> <rest>" and rejects a missing user id */
function splitTarget(args: string, usage: string): { userId: string; rest: string } {
  const [userId = '', ...rest] = args.split(/\s+/).filter(Boolean);
  if (!userId) throw new ValidationError(`Usage: ${usage}`);
  return { userId, rest: rest.join(' ') };
}

function parseDays(input: string, usage: string): number {
  if (!/^\d+$/.test(input)) throw new ValidationError(`Usage: ${usage}`);
  return Number.parseInt(input, 10);
}

async function tellUser(ctx: CommandContext, userId: string, text: string): Promise<string> {
  const delivered = await ctx.notify(userId, text);
  return delivered ? 'User notified.' : 'Could not notify the user.';
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// =============================================================================
// Commands
// =============================================================================

export function createAdminCommands(options: { broadcastDelayMs?: number } = {}): CommandDefinition[] {
  const broadcastDelayMs = options.broadcastDelayMs ?? BROADCAST_DELAY_MS;

  return [
    {
      name: 'approve',
      description: 'Activate a subscription',
      usage: '/approve <user> [days]',
      adminOnly: true,
      handler: async (args, ctx) => {
        const { userId, rest } = splitTarget(args, '/approve <user> [days]');
        const days = rest ? parseDays(rest, '/approve <user> [days]') : undefined;
        const sub = ctx.subscriptions.approve(userId, days, ctx.now);
        const until = sub.expiresAt ? formatDateTime(sub.expiresAt, ctx.timeZone) : 'n/a';

        const notified = await tellUser(
          ctx,
          userId,
          `🎉 Your subscription is active until ${until}. You will now receive stock alerts.`,
        );
        return `✅ Approved \`${userId}\` until ${until}. ${notified}`;
      },
    },

    {
      name: 'extend',
      description: 'Add days to an active subscription',
      usage: '/extend <user> <days>',
      adminOnly: true,
      handler: async (args, ctx) => {
        const { userId, rest } = splitTarget(args, '/extend <user> <days>');
        const sub = ctx.subscriptions.extend(userId, parseDays(rest, '/extend <user> <days>'), ctx.now);
        const until = sub.expiresAt ? formatDateTime(sub.expiresAt, ctx.timeZone) : 'n/a';

        const notified = await tellUser(ctx, userId, `⏳ Your subscription has been extended until ${until}.`);
        return `✅ Extended \`${userId}\` until ${until}. ${notified}`;
      },
    },

    {
      name: 'block',
      description: 'Stop all alerts and commands for a user',
      usage: '/block <user>',
      adminOnly: true,
      handler: (args, ctx) => {
        const { userId } = splitTarget(args, '/block <user>');
        ctx.subscriptions.block(userId);
        return `🚫 Blocked \`${userId}\`.`;
      },
    },

    {
      name: 'unblock',
      description: 'Lift a block',
      usage: '/unblock <user>',
      adminOnly: true,
      handler: (args, ctx) => {
        const { userId } = splitTarget(args, '/unblock <user>');
        ctx.subscriptions.unblock(userId);
        return `✅ Unblocked \`${userId}\`.`;
      },
    },

    {
      name: 'autoapprove',
      description: 'Toggle automatic trial approval',
      usage: '/autoapprove on|off',
      adminOnly: true,
      handler: (args, ctx) => {
        const choice = args.trim().toLowerCase();
        if (choice !== 'on' && choice !== 'off') {
          const current = ctx.subscriptions.isAutoApprove() ? 'on' : 'off';
          return `Auto-approve is ${current}.\nUsage: /autoapprove on|off`;
        }
        ctx.subscriptions.setAutoApprove(choice === 'on');
        return choice === 'on'
          ? '✅ Auto-approve is on. New users get a free trial when they set a pincode.'
          : '✅ Auto-approve is off. New users wait for /approve.';
      },
    },

    {
      name: 'settings',
      description: 'Show bot settings',
      usage: '/settings',
      adminOnly: true,
      handler: (_args, ctx) =>
        [
          '⚙️ *Settings*',
          `Auto-approve: ${ctx.subscriptions.isAutoApprove() ? 'on' : 'off'}`,
          `Time zone: ${escapeMarkdown(ctx.timeZone)}`,
          `Daily digest: ${formatHour(ctx.dailyDigestHour)}`,
          `Products: ${ctx.products.map((p) => escapeMarkdown(p)).join(', ')}`,
        ].join('\n'),
    },

    {
      name: 'stats',
      description: 'Count users by subscription status',
      usage: '/stats',
      adminOnly: true,
      handler: (_args, ctx) => {
        const stats = ctx.subscriptions.stats();
        return [
          '📊 *Stats*',
          `Users: ${stats.total}`,
          `Trial: ${stats.byStatus.trial}`,
          `Active: ${stats.byStatus.active}`,
          `Paused: ${stats.byStatus.paused}`,
          `Expired: ${stats.byStatus.expired}`,
          `Blocked: ${stats.blocked}`,
        ].join('\n');
      },
    },

    {
      name: 'reply',
      description: 'Message a user',
      usage: '/reply <user> <message>',
      adminOnly: true,
      handler: async (args, ctx) => {
        const { userId, rest } = splitTarget(args, '/reply <user> <message>');
        if (!rest) return 'Usage: /reply <user> <message>';
        const delivered = await ctx.notify(userId, `💬 *Message from the admin:*\n\n${escapeMarkdown(rest)}`);
        return delivered ? `Reply sent to \`${userId}\`.` : `❌ Could not deliver the reply to \`${userId}\`.`;
      },
    },

    {
      name: 'broadcast',
      description: 'Message every active subscriber',
      usage: '/broadcast <message>',
      adminOnly: true,
      handler: async (args, ctx) => {
        if (!args) return 'Usage: /broadcast <message>';

        const text = `📢 *A message from the admin:*\n\n${escapeMarkdown(args)}`;
        let sent = 0;
        let failed = 0;
        for (const userId of ctx.subscriptions.eligibleUserIds(ctx.now)) {
          if (await ctx.notify(userId, text)) {
            sent++;
          } else {
            failed++;
          }
          if (broadcastDelayMs > 0) await sleep(broadcastDelayMs);
        }

        logger.info({ adminId: ctx.message.userId, sent, failed }, 'Broadcast sent');
        return `Broadcast complete.\n✅ Sent: ${sent}\n❌ Failed: ${failed}`;
      },
    },

    {
      name: 'adminhelp',
      description: 'Show admin commands',
      usage: '/adminhelp',
      adminOnly: true,
      handler: (_args, ctx) => {
        const lines = ['*Admin commands*'];
        for (const cmd of ctx.commands.list({ adminOnly: true })) {
          lines.push(`${escapeMarkdown(cmd.usage)} - ${cmd.description}`);
        }
        return lines.join('\n');
      },
    },
  ];
}
