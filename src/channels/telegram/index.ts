/**
 * Telegram Channel Adapter
 *
 * Calls the Telegram Bot API over fetch (no SDK dependency).
 *
 * Features:
 * - Long polling for incoming messages
 * - Markdown parse mode, with a plain-text resend when Telegram rejects the
 *   markup
 * - Message chunking for >4096 char messages
 */

import { z } from 'zod';
import { createLogger } from '../../utils/logger';
import { BaseAdapter, type IncomingMessage, type RetryOptions } from '../base-adapter';

const logger = createLogger('telegram');

// =============================================================================
// TYPES
// =============================================================================

export interface TelegramConfig {
  token: string;
  retry?: RetryOptions;
  fetchImpl?: typeof fetch;
}

const messageSchema = z.object({
  message_id: z.number(),
  from: z
    .object({
      id: z.number(),
      is_bot: z.boolean(),
      first_name: z.string(),
      last_name: z.string().optional(),
      username: z.string().optional(),
    })
    .optional(),
  chat: z.object({
    id: z.number(),
    type: z.string(),
  }),
  date: z.number(),
  text: z.string().optional(),
});

type TelegramMessage = z.infer<typeof messageSchema>;

const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
});

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const getMeSchema = z.object({ id: z.number(), username: z.string().optional() });
const sentSchema = z.object({ message_id: z.number() });

export class TelegramApiError extends Error {
  readonly method: string;
  readonly errorCode: number | null;

  constructor(method: string, errorCode: number | null, description: string) {
    super(`Telegram ${method} failed: ${description}`);
    this.name = 'TelegramApiError';
    this.method = method;
    this.errorCode = errorCode;
  }

  /** Rate limits, server errors and transport failures are worth retrying */
  get retryable(): boolean {
    return this.errorCode === null || this.errorCode === 429 || this.errorCode >= 500;
  }
}

// =============================================================================
// CONSTANTS
// =============================================================================

const TELEGRAM_API_BASE = 'https://api.telegram.org';
const MAX_MESSAGE_LENGTH = 4096;
const POLL_TIMEOUT_SEC = 30;
const POLL_ERROR_DELAY_MS = 5000;
const MAX_POLL_ERRORS = 10;

// =============================================================================
// TELEGRAM ADAPTER
// =============================================================================

export class TelegramAdapter extends BaseAdapter {
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;
  private lastUpdateId: number = 0;
  private polling: boolean = false;
  private pollAbort: AbortController | null = null;
  private pollTask: Promise<void> | null = null;
  private consecutiveErrors: number = 0;

  constructor(config: TelegramConfig) {
    super('telegram', config.retry, MAX_MESSAGE_LENGTH);
    this.token = config.token;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  // ---- BaseAdapter abstract implementations ----

  protected async doStart(): Promise<void> {
    const me = getMeSchema.parse(await this.apiCall('getMe'));
    logger.info({ botId: me.id, username: me.username }, 'Telegram bot authenticated');

    this.polling = true;
    this.pollTask = this.pollLoop();
  }

  protected async doStop(): Promise<void> {
    this.polling = false;
    this.pollAbort?.abort();
    this.pollAbort = null;
    await this.pollTask;
    this.pollTask = null;
  }

  protected async doSend(chatId: string, text: string): Promise<string | null> {
    const result = await this.sendChunk(chatId, text);
    return String(sentSchema.parse(result).message_id);
  }

  protected isRetryable(err: unknown): boolean {
    return !(err instanceof TelegramApiError) || err.retryable;
  }

  private async sendChunk(chatId: string, chunk: string): Promise<unknown> {
    try {
      return await this.apiCall('sendMessage', { chat_id: chatId, text: chunk, parse_mode: 'Markdown' });
    } catch (err) {
      if (err instanceof TelegramApiError && err.errorCode === 400 && /parse entities/i.test(err.message)) {
        logger.warn({ chatId }, 'Markdown rejected, resending as plain text');
        return this.apiCall('sendMessage', { chat_id: chatId, text: chunk });
      }
      throw err;
    }
  }

  // ---- Long polling ----

  private async pollLoop(): Promise<void> {
    while (this.polling) {
      try {
        this.pollAbort = new AbortController();

        const result = await this.apiCall(
          'getUpdates',
          { offset: this.lastUpdateId + 1, timeout: POLL_TIMEOUT_SEC, allowed_updates: ['message'] },
          this.pollAbort.signal,
        );
        const updates = z.array(updateSchema).parse(result);

        this.consecutiveErrors = 0;

        for (const update of updates) {
          this.lastUpdateId = Math.max(this.lastUpdateId, update.update_id);
          if (update.message) this.processMessage(update.message);
        }
      } catch (err: unknown) {
        if (!this.polling) break;
        if (err instanceof Error && err.name === 'AbortError') break;

        this.consecutiveErrors++;
        logger.error({ err, consecutiveErrors: this.consecutiveErrors }, 'Telegram poll error');

        if (this.consecutiveErrors >= MAX_POLL_ERRORS) {
          logger.error('Too many consecutive poll errors, stopping polling');
          this.polling = false;
          break;
        }

        await new Promise((resolve) => setTimeout(resolve, POLL_ERROR_DELAY_MS));
      }
    }
  }

  private processMessage(msg: TelegramMessage): void {
    if (!msg.text || !msg.from || msg.from.is_bot) return;

    this.handleIncoming(toIncomingMessage(msg, msg.from, msg.text));
  }

  // ---- API helper ----

  private async apiCall(method: string, body?: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const url = `${TELEGRAM_API_BASE}/bot${this.token}/${method}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: body ? JSON.stringify(body) : undefined,
        signal,
      });
    } catch (err: unknown) {
      // Aborts end the poll loop; everything else is a transport failure
      if (err instanceof Error && err.name === 'AbortError') throw err;
      throw new TelegramApiError(method, null, err instanceof Error ? err.message : String(err));
    }

    const parsed = apiResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new TelegramApiError(method, res.status, 'malformed response');
    }

    const data = parsed.data;
    if (!data.ok) {
      throw new TelegramApiError(method, data.error_code ?? res.status, data.description ?? 'unknown error');
    }
    return data.result;
  }
}

function toIncomingMessage(
  msg: TelegramMessage,
  from: NonNullable<TelegramMessage['from']>,
  text: string,
): IncomingMessage {
  return {
    id: String(msg.message_id),
    platform: 'telegram',
    chatId: String(msg.chat.id),
    chatType: msg.chat.type === 'private' ? 'dm' : 'group',
    userId: String(from.id),
    username: from.username,
    displayName: [from.first_name, from.last_name].filter(Boolean).join(' '),
    text: text.trim(),
    timestamp: new Date(msg.date * 1000),
  };
}

// =============================================================================
// FACTORY
// =============================================================================

export function createTelegramAdapter(config: TelegramConfig): TelegramAdapter {
  return new TelegramAdapter(config);
}
