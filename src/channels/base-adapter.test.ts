import { describe, it, expect, vi } from 'vitest';
import { BaseAdapter, chunkMessage, escapeMarkdown, type RetryOptions } from './base-adapter';

class FakeAdapter extends BaseAdapter {
  readonly send = vi.fn<(chatId: string, text: string) => Promise<string | null>>();
  retryable = true;

  constructor(retry: RetryOptions, maxMessageLength?: number) {
    super('fake', retry, maxMessageLength);
  }

  protected async doStart(): Promise<void> {}
  protected async doStop(): Promise<void> {}

  protected doSend(chatId: string, text: string): Promise<string | null> {
    return this.send(chatId, text);
  }

  protected isRetryable(): boolean {
    return this.retryable;
  }
}

function adapter(maxAttempts = 3) {
  const sleep = vi.fn(async (_ms: number) => {});
  return { adapter: new FakeAdapter({ maxAttempts, baseDelayMs: 100, sleep }), sleep };
}

describe('BaseAdapter.sendMessage', () => {
  it('returns the message id on first success', async () => {
    const { adapter: a, sleep } = adapter();
    a.send.mockResolvedValueOnce('m1');

    await expect(a.sendMessage('42', 'hi')).resolves.toBe('m1');
    expect(a.send).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries with exponential backoff until a send succeeds', async () => {
    const { adapter: a, sleep } = adapter();
    a.send.mockRejectedValueOnce(new Error('boom')).mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce('m3');

    await expect(a.sendMessage('42', 'hi')).resolves.toBe('m3');
    expect(a.send).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
  });

  it('drops the message after the last attempt', async () => {
    const { adapter: a, sleep } = adapter(2);
    a.send.mockRejectedValue(new Error('down'));

    await expect(a.sendMessage('42', 'hi')).resolves.toBeNull();
    expect(a.send).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('stops at the first non-retryable failure', async () => {
    const { adapter: a } = adapter();
    a.retryable = false;
    a.send.mockRejectedValue(new Error('forbidden'));

    await expect(a.sendMessage('42', 'hi')).resolves.toBeNull();
    expect(a.send).toHaveBeenCalledTimes(1);
  });
});

describe('BaseAdapter.sendMessage with chunks', () => {
  function chunked() {
    const sleep = vi.fn(async (_ms: number) => {});
    return new FakeAdapter({ maxAttempts: 3, baseDelayMs: 100, sleep }, 10);
  }

  it('sends long text as several messages', async () => {
    const a = chunked();
    a.send.mockResolvedValueOnce('m1').mockResolvedValueOnce('m2');

    await expect(a.sendMessage('42', 'aaaa\nbbbb\ncccc')).resolves.toBe('m2');
    expect(a.send.mock.calls).toEqual([
      ['42', 'aaaa\nbbbb'],
      ['42', 'cccc'],
    ]);
  });

  it('retries only the chunk that failed', async () => {
    const a = chunked();
    a.send.mockResolvedValueOnce('m1').mockRejectedValueOnce(new Error('timeout')).mockResolvedValueOnce('m2');

    await expect(a.sendMessage('42', 'aaaa\nbbbb\ncccc')).resolves.toBe('m2');
    expect(a.send.mock.calls.map(([, text]) => text)).toEqual(['aaaa\nbbbb', 'cccc', 'cccc']);
  });

  it('stops at a chunk that cannot be delivered', async () => {
    const a = chunked();
    a.retryable = false;
    a.send.mockRejectedValueOnce(new Error('forbidden'));

    await expect(a.sendMessage('42', 'aaaa\nbbbb\ncccc')).resolves.toBeNull();
    expect(a.send).toHaveBeenCalledTimes(1);
  });
});

describe('chunkMessage', () => {
  it('returns short text as one chunk', () => {
    expect(chunkMessage('hello', 10)).toEqual(['hello']);
  });

  it('splits on newlines before hard cutting', () => {
    expect(chunkMessage('aaaa\nbbbb\ncccc', 10)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('hard cuts text without break points', () => {
    expect(chunkMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });
});

describe('escapeMarkdown', () => {
  it('escapes Telegram markdown characters', () => {
    expect(escapeMarkdown('a_b*c`d[e]')).toBe('a\\_b\\*c\\`d\\[e\\]');
  });
});
