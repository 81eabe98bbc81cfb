import { loadConfig } from '../utils/config';
import { ConfigError } from '../utils/errorHandler';

const required = {
  TELEGRAM_BOT_TOKEN: 'test-token',
  TELEGRAM_CHAT_ID: '-100123'
};

describe('loadConfig', () => {
  it('should apply defaults when only the required variables are set', () => {
    expect(loadConfig(required)).toEqual({
      telegramBotToken: 'test-token',
      telegramChatId: '-100123',
      filter: {
        targetNetwork: 'solana',
        maxAgeMinutes: 60,
        minVolumeUsd: 500000
      },
      searchQuery: 'solana',
      pollIntervalSeconds: 900,
      runOnStart: true,
      ledgerFile: 'alerted_coins.json',
      dexScreenerBaseUrl: 'https://api.dexscreener.com',
      requestTimeoutMs: 10000,
      port: 8000,
      timezone: 'UTC',
      nodeEnv: 'development'
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ...required,
      TARGET_NETWORK: ' Base ',
      MAX_AGE_MINUTES: '30',
      MIN_VOLUME_USD: '250000.5',
      POLL_INTERVAL_SECONDS: '300',
      RUN_ON_START: 'false',
      LEDGER_FILE: 'state/alerted.json',
      PORT: '3002'
    });

    expect(config.filter).toEqual({ targetNetwork: 'base', maxAgeMinutes: 30, minVolumeUsd: 250000.5 });
    expect(config.searchQuery).toBe('base');
    expect(config.pollIntervalSeconds).toBe(300);
    expect(config.runOnStart).toBe(false);
    expect(config.ledgerFile).toBe('state/alerted.json');
    expect(config.port).toBe(3002);
  });

  it('should keep an explicit search query', () => {
    expect(loadConfig({ ...required, SEARCH_QUERY: 'SOL/USDC' }).searchQuery).toBe('SOL/USDC');
  });

  it('should name every missing required variable', () => {
    expect(() => loadConfig({})).toThrow('Missing required environment variables: TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID');
    expect(() => loadConfig({ TELEGRAM_BOT_TOKEN: 'test-token' })).toThrow(ConfigError);
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ ...required, MIN_VOLUME_USD: 'lots' }))
      .toThrow('MIN_VOLUME_USD must be a number, got "lots"');
    expect(() => loadConfig({ ...required, MAX_AGE_MINUTES: '-5' }))
      .toThrow('MAX_AGE_MINUTES must be at least 0, got -5');
    expect(() => loadConfig({ ...required, PORT: '80.5' }))
      .toThrow('PORT must be a whole number, got "80.5"');
  });

  it('should reject a poll interval that cannot be scheduled', () => {
    expect(() => loadConfig({ ...required, POLL_INTERVAL_SECONDS: '420' })).toThrow(ConfigError);
  });

  it('should reject an unreadable boolean', () => {
    expect(() => loadConfig({ ...required, RUN_ON_START: 'sometimes' }))
      .toThrow('RUN_ON_START must be true or false, got "sometimes"');
  });
});
