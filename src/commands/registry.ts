/**
 * Slash Command Registry - command registration and dispatch
 *
 * Every private message registers its sender on first contact. Blocked users
 * are ignored, admin commands answer only in the admin chat, and a plain-text
 * message is routed to the command that asked for it (see conversation.ts).
 */

import type { IncomingMessage } from '../channels/base-adapter';
import { LifecycleError } from '../subscriptions/lifecycle';
import type { SubscriptionService } from '../subscriptions/service';
import { NotFoundError, ValidationError } from '../types';
import { createLogger } from '../utils/logger';
import type { ConversationStore } from './conversation';

const logger = createLogger('commands');

const DEFAULT_COOLDOWN_MS = 2000;

// =============================================================================
// Types
// =============================================================================

export interface CommandServices {
  subscriptions: SubscriptionService;
  conversation: ConversationStore;
  /** Product ids users may track */
  products: string[];
  timeZone: string;
  adminChatId: string;
  dailyDigestHour: number;
  /** Message another chat; resolves false when delivery failed */
  notify: (chatId: string, text: string) => Promise<boolean>;
}

export interface CommandContext extends CommandServices {
  message: IncomingMessage;
  commands: CommandRegistry;
  isAdmin: boolean;
  /** Command that was waiting for a reply when this one arrived */
  pendingCommand: string | null;
  now: Date;
}

export interface CommandDefinition {
  /** Command name without leading slash, e.g. "help" */
  name: string;
  description: string;
  /** Usage string including slash */
  usage: string;
  aliases?: string[];
  /** Only runs for admins in the admin chat */
  adminOnly?: boolean;
  /** Minimum gap between two invocations by the same user */
  cooldownMs?: number;
  handler: (args: string, ctx: CommandContext) => Promise<string> | string;
}

export interface CommandInfo {
  name: string;
  description: string;
  usage: string;
  adminOnly: boolean;
}

export interface CommandRegistryOptions {
  isAdmin: (message: IncomingMessage) => boolean;
  defaultCooldownMs?: number;
  now?: () => Date;
}

export interface CommandRegistry {
  register(command: CommandDefinition): void;
  registerMany(commands: CommandDefinition[]): void;
  list(filter?: { adminOnly?: boolean }): CommandInfo[];
  /**
   * Handle an incoming message. Returns the reply, or null when the message
   * is not for this registry or must be ignored.
   */
  handle(message: IncomingMessage, services: CommandServices): Promise<string | null>;
}

// =============================================================================
// Command parsing
// =============================================================================

export function parseCommand(text: string): { name: string; args: string } | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) return null;

  const spaceIdx = trimmed.search(/\s/);
  const head = spaceIdx > 0 ? trimmed.slice(1, spaceIdx) : trimmed.slice(1);
  const args = spaceIdx > 0 ? trimmed.slice(spaceIdx + 1).trim() : '';

  // Strip @botname (e.g. /help@mybot)
  const name = head.split('@')[0].toLowerCase();
  return name ? { name, args } : null;
}

/** User-facing text for an error thrown by a handler */
export function describeError(error: unknown): string | null {
  if (error instanceof ValidationError || error instanceof LifecycleError) {
    return `⚠️ ${error.message}`;
  }
  if (error instanceof NotFoundError) {
    return `⚠️ ${error.message}. Use /start to register.`;
  }
  return null;
}

// =============================================================================
// Command Registry
// =============================================================================

export function createCommandRegistry(options: CommandRegistryOptions): CommandRegistry {
  const commands = new Map<string, CommandDefinition>();
  const aliasToName = new Map<string, string>();
  const lastUsed = new Map<string, number>();
  const clock = options.now ?? (() => new Date());

  function register(command: CommandDefinition): void {
    commands.set(command.name, command);
    for (const alias of command.aliases ?? []) {
      aliasToName.set(alias, command.name);
    }
  }

  function registerMany(defs: CommandDefinition[]): void {
    for (const def of defs) register(def);
  }

  function list(filter: { adminOnly?: boolean } = {}): CommandInfo[] {
    return Array.from(commands.values())
      .filter((c) => filter.adminOnly === undefined || Boolean(c.adminOnly) === filter.adminOnly)
      .map((c) => ({
        name: `/${c.name}`,
        description: c.description,
        usage: c.usage,
        adminOnly: Boolean(c.adminOnly),
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  function resolve(name: string): CommandDefinition | undefined {
    return commands.get(name) ?? commands.get(aliasToName.get(name) ?? '');
  }

  function onCooldown(command: CommandDefinition, userId: string, now: Date): boolean {
    const cooldownMs = command.cooldownMs ?? options.defaultCooldownMs ?? DEFAULT_COOLDOWN_MS;
    if (cooldownMs <= 0) return false;

    const key = `${userId}:${command.name}`;
    const last = lastUsed.get(key);
    if (last !== undefined && now.getTime() - last < cooldownMs) return true;
    lastUsed.set(key, now.getTime());
    return false;
  }

  async function run(
    command: CommandDefinition,
    args: string,
    ctx: CommandContext,
  ): Promise<string> {
    try {
      const response = await command.handler(args, ctx);
      logger.info({ command: command.name, userId: ctx.message.userId }, 'Command handled');
      return response;
    } catch (error) {
      const reply = describeError(error);
      if (reply) {
        logger.info({ command: command.name, userId: ctx.message.userId, reason: reply }, 'Command rejected');
        return reply;
      }
      logger.error({ err: error, command: command.name, userId: ctx.message.userId }, 'Command handler failed');
      return '❌ Something went wrong. Please try again later.';
    }
  }

  async function handle(message: IncomingMessage, services: CommandServices): Promise<string | null> {
    const now = clock();
    const isAdmin = options.isAdmin(message);
    const isPrivate = message.chatType === 'dm';

    if (isPrivate) {
      const user = services.subscriptions.ensureUser(message.userId, message.username ?? null, now);
      if (user.blocked && !isAdmin) {
        logger.debug({ userId: message.userId }, 'Ignoring message from blocked user');
        return null;
      }
    }

    const parsed = parseCommand(message.text);
    let command: CommandDefinition | undefined;
    let args: string;
    let pendingCommand: string | null = null;

    if (parsed) {
      command = resolve(parsed.name);
      if (!command) return isPrivate ? `Unknown command /${parsed.name}. Send /help for the list.` : null;
      args = parsed.args;
      if (isPrivate) pendingCommand = services.conversation.take(message.userId);
    } else {
      if (!isPrivate) return null;
      // Plain text answers the command that asked for it, if any
      const awaiting = services.conversation.take(message.userId);
      command = awaiting ? resolve(awaiting) : undefined;
      if (!command) return null;
      args = message.text.trim();
    }

    if (command.adminOnly) {
      if (!isAdmin) {
        logger.warn({ command: command.name, userId: message.userId, chatId: message.chatId }, 'Admin command refused');
        return null;
      }
    } else if (!isPrivate) {
      // User commands belong in the private chat with the bot
      return null;
    } else if (parsed && onCooldown(command, message.userId, now)) {
      return `⏳ Please wait a moment before using /${command.name} again.`;
    }

    return run(command, args, {
      ...services,
      message,
      commands: registry,
      isAdmin,
      pendingCommand,
      now,
    });
  }

  const registry: CommandRegistry = {
    register,
    registerMany,
    list,
    handle,
  };

  return registry;
}
