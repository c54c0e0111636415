/**
 * Typed configuration read from environment variables.
 * The entry points load `.env` through dotenv before calling loadConfig().
 */

import { ConfigError } from '../core/errors';
import { LogFormat, LogLevel, parseLogLevel } from '../core/StructuredLogger';

export type SeenStoreKind = 'file' | 'sqlite' | 'memory';

export interface BotConfig {
  NODE_ENV: string;
  IS_PROD: boolean;
  LOG_LEVEL: LogLevel;
  LOG_FORMAT: LogFormat;

  // Telegram
  TELEGRAM_BOT_TOKEN: string;
  TELEGRAM_CHAT_ID: string;
  TELEGRAM_API_URL: string;
  TELEGRAM_TIMEOUT_MS: number;
  MESSAGE_DELAY_MS: number;
  NOTIFY_ON_START: boolean;
  NOTIFY_CYCLE_SUMMARY: boolean;
  DRY_RUN: boolean;
  TELEGRAM_DISABLE_PREVIEW: boolean;

  // Marketplace
  OLX_BASE_URL: string;
  OLX_QUERY_URLS: string[];
  OLX_TITLE_KEYWORDS: string[];
  USER_AGENT: string;
  HTTP_TIMEOUT_MS: number;
  HTTP_MAX_RETRIES: number;
  HTTP_RETRY_DELAY_MS: number;

  // Seen set
  SEEN_STORE: SeenStoreKind;
  SEEN_FILE: string;
  SEEN_LOCK_STALE_MS: number;
  SQLITE_PATH: string;

  // Scheduling
  RUN_ONCE: boolean;
  POLL_INTERVAL_MS: number;
  STATS_LOG_INTERVAL_MIN: number;
  TIMEZONE: string;
}

export interface ConfigValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

type Env = Record<string, string | undefined>;

export const DEFAULT_QUERY_URL = 'https://www.olx.ua/uk/list/q-playstation-tv/';
export const MIN_POLL_INTERVAL_MS = 10_000;

export const toBool = (value?: string, defaultValue = false): boolean => {
  if (value == null || value.trim() === '') return defaultValue;
  return /^(1|true|yes|y|on)$/i.test(value.trim());
};

export const toNumber = (value?: string, defaultValue = 0): number => {
  if (value == null || value.trim() === '') return defaultValue;
  return Number(value.trim());
};

export const toString = (value?: string, defaultValue = ''): string => {
  return value?.trim() || defaultValue;
};

export const toList = (value: string | undefined, defaultValue: string): string[] => {
  return (value ?? defaultValue)
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
};

/**
 * Unknown values throw instead of falling back, so a typo cannot silently
 * switch persistence.
 */
export function toSeenStoreKind(value?: string): SeenStoreKind {
  const kind = toString(value, 'file').toLowerCase();
  if (!isSeenStoreKind(kind)) {
    throw new ConfigError([`SEEN_STORE must be one of file, sqlite, memory (got '${kind}')`]);
  }
  return kind;
}

export function loadConfig(env: Env = process.env): BotConfig {
  const nodeEnv = toString(env.NODE_ENV, 'development');
  const isProd = nodeEnv === 'production';

  return {
    NODE_ENV: nodeEnv,
    IS_PROD: isProd,
    LOG_LEVEL: parseLogLevel(env.LOG_LEVEL, LogLevel.INFO),
    LOG_FORMAT: toString(env.LOG_FORMAT, isProd ? 'json' : 'pretty') === 'json' ? 'json' : 'pretty',

    TELEGRAM_BOT_TOKEN: toString(env.TELEGRAM_BOT_TOKEN),
    TELEGRAM_CHAT_ID: toString(env.TELEGRAM_CHAT_ID),
    TELEGRAM_API_URL: toString(env.TELEGRAM_API_URL, 'https://api.telegram.org'),
    TELEGRAM_TIMEOUT_MS: toNumber(env.TELEGRAM_TIMEOUT_MS, 10_000),
    MESSAGE_DELAY_MS: toNumber(env.MESSAGE_DELAY_MS, 1_000),
    NOTIFY_ON_START: toBool(env.NOTIFY_ON_START),
    NOTIFY_CYCLE_SUMMARY: toBool(env.NOTIFY_CYCLE_SUMMARY),
    DRY_RUN: toBool(env.DRY_RUN),
    TELEGRAM_DISABLE_PREVIEW: toBool(env.TELEGRAM_DISABLE_PREVIEW),

    OLX_BASE_URL: toString(env.OLX_BASE_URL, 'https://www.olx.ua'),
    OLX_QUERY_URLS: toList(env.OLX_QUERY_URLS, DEFAULT_QUERY_URL),
    OLX_TITLE_KEYWORDS: toList(env.OLX_TITLE_KEYWORDS, 'tv,playstation').map(kw => kw.toLowerCase()),
    USER_AGENT: toString(env.USER_AGENT, 'Mozilla/5.0'),
    HTTP_TIMEOUT_MS: toNumber(env.HTTP_TIMEOUT_MS, 20_000),
    HTTP_MAX_RETRIES: toNumber(env.HTTP_MAX_RETRIES, 2),
    HTTP_RETRY_DELAY_MS: toNumber(env.HTTP_RETRY_DELAY_MS, 1_000),

    SEEN_STORE: toSeenStoreKind(env.SEEN_STORE),
    SEEN_FILE: toString(env.SEEN_FILE, 'seen_ads.json'),
    SEEN_LOCK_STALE_MS: toNumber(env.SEEN_LOCK_STALE_MS, 600_000),
    SQLITE_PATH: toString(env.SQLITE_PATH, './data/olx-watch.db'),

    RUN_ONCE: toBool(env.RUN_ONCE),
    POLL_INTERVAL_MS: toNumber(env.POLL_INTERVAL_MS, 300_000),
    STATS_LOG_INTERVAL_MIN: toNumber(env.STATS_LOG_INTERVAL_MIN, 60),
    TIMEZONE: toString(env.TIMEZONE, 'Europe/Kyiv')
  };
}

export function isSeenStoreKind(value: string): value is SeenStoreKind {
  return value === 'file' || value === 'sqlite' || value === 'memory';
}

/**
 * Telegram tokens look like "123456789:AA..."
 */
export function isTokenFormatValid(token: string): boolean {
  return /^\d+:\S+$/.test(token);
}

/**
 * Numeric id of the bot, i.e. the part of the token before the colon
 */
export function botIdFromToken(token: string): string | null {
  return isTokenFormatValid(token) ? token.split(':')[0] : null;
}

export function validateConfig(config: BotConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.DRY_RUN) {
    if (!config.TELEGRAM_BOT_TOKEN) {
      errors.push('TELEGRAM_BOT_TOKEN is required (or set DRY_RUN=true)');
    } else if (!isTokenFormatValid(config.TELEGRAM_BOT_TOKEN)) {
      errors.push("TELEGRAM_BOT_TOKEN format looks invalid (expected '123456789:...')");
    }

    if (!config.TELEGRAM_CHAT_ID) {
      errors.push('TELEGRAM_CHAT_ID is required (or set DRY_RUN=true)');
    }

    const botId = botIdFromToken(config.TELEGRAM_BOT_TOKEN);
    if (botId && config.TELEGRAM_CHAT_ID === botId) {
      warnings.push(`TELEGRAM_CHAT_ID equals the bot's own id (${botId}); use your user or group id instead`);
    }
  }

  if (config.OLX_QUERY_URLS.length === 0) {
    errors.push('OLX_QUERY_URLS must list at least one search URL');
  }

  for (const query of config.OLX_QUERY_URLS) {
    if (!/^https?:\/\//i.test(query)) {
      errors.push(`OLX_QUERY_URLS entry is not an http(s) URL: ${query}`);
    }
  }

  const numbers: Array<[string, number]> = [
    ['POLL_INTERVAL_MS', config.POLL_INTERVAL_MS],
    ['HTTP_TIMEOUT_MS', config.HTTP_TIMEOUT_MS],
    ['HTTP_MAX_RETRIES', config.HTTP_MAX_RETRIES],
    ['HTTP_RETRY_DELAY_MS', config.HTTP_RETRY_DELAY_MS],
    ['TELEGRAM_TIMEOUT_MS', config.TELEGRAM_TIMEOUT_MS],
    ['MESSAGE_DELAY_MS', config.MESSAGE_DELAY_MS],
    ['SEEN_LOCK_STALE_MS', config.SEEN_LOCK_STALE_MS],
    ['STATS_LOG_INTERVAL_MIN', config.STATS_LOG_INTERVAL_MIN]
  ];
  for (const [name, value] of numbers) {
    if (!Number.isFinite(value) || value < 0) {
      errors.push(`${name} must be a non-negative number`);
    }
  }

  if (!config.RUN_ONCE && Number.isFinite(config.POLL_INTERVAL_MS) && config.POLL_INTERVAL_MS < MIN_POLL_INTERVAL_MS) {
    warnings.push(`POLL_INTERVAL_MS is below ${MIN_POLL_INTERVAL_MS}ms, this may get the bot rate limited`);
  }

  if (config.OLX_TITLE_KEYWORDS.length === 0) {
    warnings.push('OLX_TITLE_KEYWORDS is empty, every listing will be notified');
  }

  if (config.DRY_RUN) {
    warnings.push('DRY_RUN=true: messages are logged, not sent');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Configuration without secrets, for logs and the start-up message
 */
export function getConfigSummary(config: BotConfig): Record<string, string | number | boolean> {
  return {
    NODE_ENV: config.NODE_ENV,
    DRY_RUN: config.DRY_RUN,
    RUN_ONCE: config.RUN_ONCE,
    POLL_INTERVAL_MS: config.POLL_INTERVAL_MS,
    QUERIES: config.OLX_QUERY_URLS.length,
    KEYWORDS: config.OLX_TITLE_KEYWORDS.join(','),
    SEEN_STORE: config.SEEN_STORE,
    TELEGRAM_CHAT_ID: config.TELEGRAM_CHAT_ID,
    TELEGRAM_TOKEN_VALID: isTokenFormatValid(config.TELEGRAM_BOT_TOKEN)
  };
}

export function logConfigSummary(config: BotConfig, log: (line: string) => void = console.log): void {
  log('🔧 Configuration:');
  log(`  📍 Environment: ${config.NODE_ENV}${config.DRY_RUN ? ' (DRY RUN)' : ''}`);
  log(`  🔄 Mode: ${config.RUN_ONCE ? 'single cycle' : `every ${config.POLL_INTERVAL_MS}ms`}`);
  log(`  🔎 Queries (${config.OLX_QUERY_URLS.length}):`);
  for (const query of config.OLX_QUERY_URLS) {
    log(`    ${query}`);
  }
  log(`  🏷️ Keywords: ${config.OLX_TITLE_KEYWORDS.join(', ') || '(none)'}`);
  log(`  💾 Seen store: ${config.SEEN_STORE} (${config.SEEN_STORE === 'sqlite' ? config.SQLITE_PATH : config.SEEN_FILE})`);
  log(`  📱 Telegram chat: ${config.TELEGRAM_CHAT_ID || '(unset)'} | token format valid: ${isTokenFormatValid(config.TELEGRAM_BOT_TOKEN) ? '✅' : '❌'}`);
}
