/**
 * Base Channel Adapter
 *
 * - ChannelAdapter interface for all channel implementations
 * - BaseAdapter abstract class: bounded send retries with exponential
 *   backoff, then the message is dropped and logged at error level
 * - IncomingMessage type for normalized incoming messages
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('base-adapter');

// =============================================================================
// TYPES
// =============================================================================

export interface IncomingMessage {
  id: string;
  platform: string;
  chatId: string;
  chatType: 'dm' | 'group';
  userId: string;
  username?: string;
  displayName?: string;
  text: string;
  timestamp: Date;
}

export type MessageHandler = (msg: IncomingMessage) => Promise<void>;

export interface ChannelAdapter {
  readonly platform: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Resolves to the sent message id, or null once every attempt failed */
  sendMessage(chatId: string, text: string): Promise<string | null>;
  onMessage(handler: MessageHandler): void;
}

export interface RetryOptions {
  /** Total send attempts, first try included */
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 500;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// =============================================================================
// MARKDOWN FORMATTING
// =============================================================================

/**
 * Escape markdown special characters for platforms that need it.
 */
export function escapeMarkdown(text: string, chars: string[] = ['_', '*', '`', '[', ']']): string {
  let escaped = text;
  for (const char of chars) {
    escaped = escaped.replace(new RegExp(`\\${char}`, 'g'), `\\${char}`);
  }
  return escaped;
}

/**
 * Chunk a long message into parts that fit within a platform's limit.
 * Tries to split on newlines first, then on spaces, then hard-cuts.
 */
export function chunkMessage(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    // Paragraph break, then line break, then space, then hard cut
    let splitAt = remaining.lastIndexOf('\n\n', maxLength);
    if (splitAt < maxLength * 0.3) {
      splitAt = remaining.lastIndexOf('\n', maxLength);
    }
    if (splitAt < maxLength * 0.3) {
      splitAt = remaining.lastIndexOf(' ', maxLength);
    }
    if (splitAt < maxLength * 0.3) {
      splitAt = maxLength;
    }

    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt).trimStart();
  }

  return chunks;
}

// =============================================================================
// BASE ADAPTER
// =============================================================================

export abstract class BaseAdapter implements ChannelAdapter {
  readonly platform: string;
  protected _started: boolean = false;
  protected _messageHandler: MessageHandler | null = null;

  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxMessageLength: number;

  constructor(platform: string, retry: RetryOptions = {}, maxMessageLength = Number.POSITIVE_INFINITY) {
    this.platform = platform;
    this.maxMessageLength = maxMessageLength;
    this.maxAttempts = Math.max(1, retry.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = retry.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.sleep = retry.sleep ?? defaultSleep;
  }

  // ---- Abstract methods for subclasses ----

  /** Platform-specific startup (connect, authenticate, etc.) */
  protected abstract doStart(): Promise<void>;

  protected abstract doStop(): Promise<void>;

  /** Platform-specific message send. Throws on failure. */
  protected abstract doSend(chatId: string, text: string): Promise<string | null>;

  /** Whether a failed send is worth another attempt */
  protected isRetryable(_err: unknown): boolean {
    return true;
  }

  // ---- Public API ----

  async start(): Promise<void> {
    if (this._started) {
      logger.warn({ platform: this.platform }, 'Adapter already started');
      return;
    }

    await this.doStart();
    this._started = true;
    logger.info({ platform: this.platform }, 'Adapter started');
  }

  async stop(): Promise<void> {
    if (!this._started) return;

    await this.doStop();
    this._started = false;
    logger.info({ platform: this.platform }, 'Adapter stopped');
  }

  /**
   * Sends the text in chunks of at most maxMessageLength, retrying each chunk
   * on its own. Resolves to the last chunk's message id, or null when a chunk
   * could not be delivered; later chunks are then not sent.
   */
  async sendMessage(chatId: string, text: string): Promise<string | null> {
    const chunks = chunkMessage(text, this.maxMessageLength);
    let lastMessageId: string | null = null;

    for (const [index, chunk] of chunks.entries()) {
      lastMessageId = await this.sendWithRetry(chatId, chunk);
      if (lastMessageId === null) {
        if (index > 0) {
          logger.error({ platform: this.platform, chatId, sent: index, total: chunks.length }, 'Message partially delivered');
        }
        return null;
      }
    }
    return lastMessageId;
  }

  onMessage(handler: MessageHandler): void {
    this._messageHandler = handler;
  }

  private async sendWithRetry(chatId: string, text: string): Promise<string | null> {
    let lastErr: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await this.doSend(chatId, text);
      } catch (err) {
        lastErr = err;
        if (attempt >= this.maxAttempts || !this.isRetryable(err)) break;

        logger.warn({ err, platform: this.platform, chatId, attempt }, 'Send failed, retrying');
        await this.sleep(this.baseDelayMs * Math.pow(2, attempt - 1));
      }
    }

    logger.error({ err: lastErr, platform: this.platform, chatId }, 'Send failed, message dropped');
    return null;
  }

  // ---- Protected helpers for subclasses ----

  /**
   * Called by subclasses when an incoming message is received.
   * Dispatches to the registered handler without awaiting it.
   */
  protected handleIncoming(msg: IncomingMessage): void {
    if (!this._messageHandler) {
      logger.warn({ platform: this.platform }, 'No message handler registered, dropping message');
      return;
    }

    this._messageHandler(msg).catch((err: unknown) => {
      logger.error({ err, platform: this.platform }, 'Error handling incoming message');
    });
  }
}
