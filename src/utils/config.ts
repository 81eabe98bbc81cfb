import { ConfigError } from './errorHandler';
import { toCronExpression } from './cronInterval';
import { FilterConfig, DEFAULT_MAX_AGE_MINUTES, DEFAULT_MIN_VOLUME_USD } from '../types/filter';

export interface AppConfig {
  telegramBotToken: string;
  telegramChatId: string;
  filter: FilterConfig;
  searchQuery: string;
  pollIntervalSeconds: number;
  runOnStart: boolean;
  ledgerFile: string;
  dexScreenerBaseUrl: string;
  requestTimeoutMs: number;
  port: number;
  timezone: string;
  nodeEnv: string;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, options: { integer?: boolean; min?: number } = {}): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  if (options.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${key} must be a whole number, got "${raw}"`);
  }
  if (options.min !== undefined && value < options.min) {
    throw new ConfigError(`${key} must be at least ${options.min}, got ${value}`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['true', '1', 'yes'].includes(raw)) return true;
  if (['false', '0', 'no'].includes(raw)) return false;
  throw new ConfigError(`${key} must be true or false, got "${raw}"`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const requiredEnvVars = ['TELEGRAM_BOT_TOKEN', 'TELEGRAM_CHAT_ID'];
  const missing = requiredEnvVars.filter(key => !env[key]);

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const targetNetwork = (env.TARGET_NETWORK || 'solana').trim().toLowerCase();
  const pollIntervalSeconds = readNumber(env, 'POLL_INTERVAL_SECONDS', 900, { integer: true, min: 1 });

  // Fail at start rather than on the first tick.
  toCronExpression(pollIntervalSeconds);

  return {
    telegramBotToken: env.TELEGRAM_BOT_TOKEN ?? '',
    telegramChatId: env.TELEGRAM_CHAT_ID ?? '',
    filter: {
      targetNetwork,
      maxAgeMinutes: readNumber(env, 'MAX_AGE_MINUTES', DEFAULT_MAX_AGE_MINUTES, { min: 0 }),
      minVolumeUsd: readNumber(env, 'MIN_VOLUME_USD', DEFAULT_MIN_VOLUME_USD, { min: 0 })
    },
    searchQuery: env.SEARCH_QUERY?.trim() || targetNetwork,
    pollIntervalSeconds,
    runOnStart: readBoolean(env, 'RUN_ON_START', true),
    ledgerFile: env.LEDGER_FILE || 'alerted_coins.json',
    dexScreenerBaseUrl: env.DEXSCREENER_BASE_URL || 'https://api.dexscreener.com',
    requestTimeoutMs: readNumber(env, 'REQUEST_TIMEOUT_MS', 10000, { integer: true, min: 1 }),
    port: readNumber(env, 'PORT', 8000, { integer: true, min: 0 }),
    timezone: env.TIMEZONE || 'UTC',
    nodeEnv: env.NODE_ENV || 'development'
  };
}
