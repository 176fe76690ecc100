/**
 * Per-user conversation state: which command is waiting for the user's next
 * plain-text message (e.g. /add without a pincode). In memory only.
 */

import { MINUTE_MS } from '../utils/time';

const DEFAULT_TTL_MS = 10 * MINUTE_MS;

export interface ConversationStore {
  /** Remember that `command` expects the user's next message */
  expectReply(userId: string, command: string): void;
  /** Returns and clears the pending command, if any and not expired */
  take(userId: string): string | null;
  clear(userId: string): boolean;
}

export interface ConversationOptions {
  ttlMs?: number;
  now?: () => number;
}

export function createConversationStore(options: ConversationOptions = {}): ConversationStore {
  const ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
  const now = options.now ?? Date.now;
  const pending = new Map<string, { command: string; expiresAt: number }>();

  return {
    expectReply(userId, command) {
      pending.set(userId, { command, expiresAt: now() + ttlMs });
    },

    take(userId) {
      const entry = pending.get(userId);
      if (!entry) return null;
      pending.delete(userId);
      return entry.expiresAt > now() ? entry.command : null;
    },

    clear(userId) {
      return pending.delete(userId);
    },
  };
}
