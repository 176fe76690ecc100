import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from './config';

const baseEnv = {
  BOT_TOKEN: 'test-token',
  ADMIN_CHAT_ID: '-1001',
  PRODUCTS: 'milk, curd,milk',
  ORACLE_URL_TEMPLATE: 'https://shop.test/p/{product}?pin={location}',
  DATABASE_PATH: '/tmp/stockbot-test/bot.db',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config.telegram).toEqual({ token: 'test-token', adminChatId: '-1001', adminUserIds: [] });
    expect(config.database.path).toBe('/tmp/stockbot-test/bot.db');
    expect(config.timeZone).toBe('Asia/Kolkata');
    expect(config.schedule).toEqual({ checkIntervalMs: 300_000, sweepIntervalMs: 3_600_000, dailyDigestHour: 9 });
    expect(config.subscription).toEqual({ trialDays: 30, defaultApproveDays: 30, autoApprove: false });
    expect(config.products).toEqual(['milk', 'curd']);
    expect(config.oracle).toEqual({
      urlTemplate: 'https://shop.test/p/{product}?pin={location}',
      soldOutMarker: 'Notify Me',
      timeoutMs: 15_000,
    });
    expect(config.delivery.maxAttempts).toBe(3);
    expect(config.logLevel).toBe('info');
  });

  it('parses flags, lists and numbers', () => {
    const config = loadConfig({
      ...baseEnv,
      AUTO_APPROVE: 'on',
      ADMIN_USER_IDS: '11, 12',
      CHECK_INTERVAL_SECONDS: '60',
      DAILY_DIGEST_HOUR: '20',
      BOT_TIMEZONE: 'Europe/London',
    });

    expect(config.subscription.autoApprove).toBe(true);
    expect(config.telegram.adminUserIds).toEqual(['11', '12']);
    expect(config.schedule.checkIntervalMs).toBe(60_000);
    expect(config.schedule.dailyDigestHour).toBe(20);
    expect(config.timeZone).toBe('Europe/London');
  });

  it('accepts a pino log level', () => {
    expect(loadConfig({ ...baseEnv, LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
  });

  it('places the database in the state dir by default', () => {
    const config = loadConfig({ ...baseEnv, DATABASE_PATH: undefined, STOCKBOT_STATE_DIR: '/srv/stockbot' });
    expect(config.database.path).toBe('/srv/stockbot/stockbot.db');
  });

  it.each([
    ['a missing token', { BOT_TOKEN: undefined }],
    ['an unknown time zone', { BOT_TIMEZONE: 'Nowhere/City' }],
    ['a template without {product}', { ORACLE_URL_TEMPLATE: 'https://shop.test/p' }],
    ['a digest hour of 24', { DAILY_DIGEST_HOUR: '24' }],
    ['an empty product list', { PRODUCTS: ' , ' }],
    ['an unknown log level', { LOG_LEVEL: 'loud' }],
  ])('rejects %s', (_label, overrides) => {
    expect(() => loadConfig({ ...baseEnv, ...overrides })).toThrow(ZodError);
  });
});
