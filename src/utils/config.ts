/**
 * Configuration loading for the stock bot
 *
 * Reads environment variables (from ~/.stockbot/.env, then the CWD .env),
 * validates them with zod and returns an explicit AppConfig object that the
 * gateway hands to each component.
 */

import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { isValidTimeZone } from './time';

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.STOCKBOT_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.stockbot');
}

/**
 * Load .env from the state dir first, then the CWD (later files never
 * override variables that are already set).
 */
export function loadEnvFiles(): void {
  dotenvConfig({ path: join(resolveStateDir(), '.env') });
  dotenvConfig();
}

const commaList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const flag = z
  .enum(['true', 'false', '1', '0', 'on', 'off', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'on' || value === 'yes');

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
  ADMIN_CHAT_ID: z.string().regex(/^-?\d+$/, 'ADMIN_CHAT_ID must be a numeric chat id'),
  ADMIN_USER_IDS: commaList,
  STOCKBOT_STATE_DIR: z.string().optional(),
  DATABASE_PATH: z.string().optional(),
  BOT_TIMEZONE: z
    .string()
    .default('Asia/Kolkata')
    .refine(isValidTimeZone, { message: 'BOT_TIMEZONE must be an IANA time zone' }),
  CHECK_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(3600),
  DAILY_DIGEST_HOUR: z.coerce.number().int().min(0).max(23).default(9),
  TRIAL_DAYS: z.coerce.number().int().positive().default(30),
  DEFAULT_APPROVE_DAYS: z.coerce.number().int().positive().default(30),
  AUTO_APPROVE: flag,
  PRODUCTS: commaList.refine((list) => list.length > 0, { message: 'PRODUCTS must list at least one product id' }),
  ORACLE_URL_TEMPLATE: z
    .string()
    .url()
    .refine((url) => url.includes('{product}'), { message: 'ORACLE_URL_TEMPLATE must contain {product}' }),
  ORACLE_SOLD_OUT_MARKER: z.string().min(1).default('Notify Me'),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  DELIVERY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  telegram: {
    token: string;
    adminChatId: string;
    /** Empty means every member of the admin chat may run admin commands */
    adminUserIds: string[];
  };
  database: {
    path: string;
  };
  timeZone: string;
  schedule: {
    checkIntervalMs: number;
    sweepIntervalMs: number;
    dailyDigestHour: number;
  };
  subscription: {
    trialDays: number;
    defaultApproveDays: number;
    autoApprove: boolean;
  };
  products: string[];
  oracle: {
    urlTemplate: string;
    soldOutMarker: string;
    timeoutMs: number;
  };
  delivery: {
    maxAttempts: number;
  };
  logLevel: LogLevel;
}

/**
 * Validate the environment and build the config. Throws a ZodError listing
 * every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const stateDir = parsed.STOCKBOT_STATE_DIR
    ? resolveUserPath(parsed.STOCKBOT_STATE_DIR)
    : resolveStateDir(env);

  return {
    telegram: {
      token: parsed.BOT_TOKEN,
      adminChatId: parsed.ADMIN_CHAT_ID,
      adminUserIds: parsed.ADMIN_USER_IDS,
    },
    database: {
      path: parsed.DATABASE_PATH ? resolveUserPath(parsed.DATABASE_PATH) : join(stateDir, 'stockbot.db'),
    },
    timeZone: parsed.BOT_TIMEZONE,
    schedule: {
      checkIntervalMs: parsed.CHECK_INTERVAL_SECONDS * 1000,
      sweepIntervalMs: parsed.SWEEP_INTERVAL_SECONDS * 1000,
      dailyDigestHour: parsed.DAILY_DIGEST_HOUR,
    },
    subscription: {
      trialDays: parsed.TRIAL_DAYS,
      defaultApproveDays: parsed.DEFAULT_APPROVE_DAYS,
      autoApprove: parsed.AUTO_APPROVE,
    },
    products: Array.from(new Set(parsed.PRODUCTS)),
    oracle: {
      urlTemplate: parsed.ORACLE_URL_TEMPLATE,
      soldOutMarker: parsed.ORACLE_SOLD_OUT_MARKER,
      timeoutMs: parsed.ORACLE_TIMEOUT_MS,
    },
    delivery: {
      maxAttempts: parsed.DELIVERY_MAX_ATTEMPTS,
    },
    logLevel: parsed.LOG_LEVEL,
  };
}
