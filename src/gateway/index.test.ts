import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ChannelAdapter, IncomingMessage, MessageHandler } from '../channels/base-adapter';
import type { AvailabilityOracle } from '../oracle';
import type { AppConfig } from '../utils/config';
import { DAY_MS } from '../utils/time';
import { createGateway, JOB_IDS, type Gateway } from './index';

const NOW = new Date('2024-06-01T06:00:00Z');
const ADMIN_CHAT = '-1001';

const config: AppConfig = {
  telegram: { token: 'test-token', adminChatId: ADMIN_CHAT, adminUserIds: [] },
  database: { path: '/unused/stockbot.db' },
  timeZone: 'Asia/Kolkata',
  schedule: { checkIntervalMs: 300_000, sweepIntervalMs: 3_600_000, dailyDigestHour: 9 },
  subscription: { trialDays: 1, defaultApproveDays: 30, autoApprove: true },
  products: ['milk', 'curd'],
  oracle: { urlTemplate: 'https://shop.test/p/{product}', soldOutMarker: 'Notify Me', timeoutMs: 1000 },
  delivery: { maxAttempts: 1 },
  logLevel: 'silent',
};

function createFakeChannel() {
  let handler: MessageHandler | null = null;
  const sent: Array<{ chatId: string; text: string }> = [];

  const channel: ChannelAdapter = {
    platform: 'fake',
    start: async () => {},
    stop: async () => {},
    async sendMessage(chatId, text) {
      sent.push({ chatId, text });
      return String(sent.length);
    },
    onMessage(next) {
      handler = next;
    },
  };

  async function receive(userId: string, text: string): Promise<void> {
    if (!handler) throw new Error('no message handler registered');
    const message: IncomingMessage = {
      id: String(Math.random()),
      platform: 'fake',
      chatId: userId,
      chatType: 'dm',
      userId,
      text,
      timestamp: NOW,
    };
    await handler(message);
  }

  return { channel, sent, receive };
}

let clock: Date;
let stock: Map<string, boolean>;
let fake: ReturnType<typeof createFakeChannel>;
let gateway: Gateway;

beforeEach(async () => {
  clock = NOW;
  stock = new Map();
  fake = createFakeChannel();
  const oracle: AvailabilityOracle = {
    async check(productId, location) {
      return { available: stock.get(`${productId}@${location}`) ?? false, observedAt: clock };
    },
  };
  gateway = await createGateway(config, {
    channel: fake.channel,
    oracle,
    databasePath: null,
    now: () => clock,
  });
});

afterEach(async () => {
  await gateway.stop();
});

describe('gateway', () => {
  it('replies to commands in the sender chat', async () => {
    await fake.receive('100', '/rules');
    expect(fake.sent).toHaveLength(1);
    expect(fake.sent[0].chatId).toBe('100');
    expect(fake.sent[0].text.startsWith('📜 *Service rules*')).toBe(true);
  });

  it('sends an instant alert when a tracked product comes back', async () => {
    await fake.receive('100', '/add 411001');
    await fake.receive('100', '/track milk');
    fake.sent.length = 0;

    expect(await gateway.runJob(JOB_IDS.scrape)).toBe(true);
    expect(fake.sent).toEqual([]);

    stock.set('milk@411001', true);
    clock = new Date(NOW.getTime() + 300_000);
    await gateway.runJob(JOB_IDS.scrape);
    expect(fake.sent).toEqual([{ chatId: '100', text: '🔔 *milk* is back in stock at 411001.' }]);

    // Still in stock: no repeat
    clock = new Date(NOW.getTime() + 600_000);
    await gateway.runJob(JOB_IDS.scrape);
    expect(fake.sent).toHaveLength(1);
  });

  it('tells users when their subscription lapses', async () => {
    await fake.receive('100', '/add 411001');
    fake.sent.length = 0;

    clock = new Date(NOW.getTime() + 2 * DAY_MS);
    await gateway.runJob(JOB_IDS.sweep);
    expect(fake.sent).toEqual([
      {
        chatId: '100',
        text: '⌛ Your subscription has expired. Use /dm to contact the admin about renewing.',
      },
    ]);
  });

  it('rejects unknown job ids', async () => {
    expect(await gateway.runJob('nope')).toBe(false);
  });
});
