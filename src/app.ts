import * as fs from 'fs';
import * as path from 'path';
import { Database } from 'sqlite3';
import { BotConfig, SeenStoreKind } from './config/env';
import { HttpClient } from './core/HttpClient';
import { StructuredLogger } from './core/StructuredLogger';
import { ConfigError, StoreError } from './core/errors';
import { DryRunNotifier } from './notify/DryRunNotifier';
import { Notifier } from './notify/Notifier';
import { TelegramService } from './notify/TelegramService';
import { OlxSource } from './sources/OlxSource';
import { FileLock } from './store/FileLock';
import { JsonFileSeenStore } from './store/JsonFileSeenStore';
import { MemorySeenStore } from './store/MemorySeenStore';
import { MigrationRunner } from './store/Migrations';
import { SeenStore } from './store/SeenStore';
import { SqliteSeenStore } from './store/SqliteSeenStore';

export interface App {
  source: OlxSource;
  store: SeenStore;
  notifier: Notifier;
  /** Set unless DRY_RUN */
  telegram: TelegramService | null;
  close(): Promise<void>;
}

export function openDatabase(filename: string): Promise<Database> {
  return new Promise((resolve, reject) => {
    const db = new Database(filename, (err) => {
      if (err) reject(new StoreError(`Cannot open database ${filename}: ${err.message}`, err));
      else resolve(db);
    });
  });
}

export function closeDatabase(db: Database): Promise<void> {
  return new Promise((resolve, reject) => {
    db.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

export function createOlxSource(config: BotConfig, logger: StructuredLogger): OlxSource {
  const http = new HttpClient(
    'olx',
    {
      timeoutMs: config.HTTP_TIMEOUT_MS,
      maxRetries: config.HTTP_MAX_RETRIES,
      baseRetryDelayMs: config.HTTP_RETRY_DELAY_MS,
      maxRetryDelayMs: 30_000,
      jitterPercent: 20,
      userAgent: config.USER_AGENT
    },
    undefined,
    logger
  );

  return new OlxSource(
    http,
    {
      queries: config.OLX_QUERY_URLS,
      baseUrl: config.OLX_BASE_URL,
      keywords: config.OLX_TITLE_KEYWORDS
    },
    logger
  );
}

export function createTelegramService(config: BotConfig, logger: StructuredLogger): TelegramService {
  const http = new HttpClient(
    'telegram',
    {
      timeoutMs: config.TELEGRAM_TIMEOUT_MS,
      maxRetries: config.HTTP_MAX_RETRIES,
      baseRetryDelayMs: config.HTTP_RETRY_DELAY_MS,
      maxRetryDelayMs: 60_000,
      jitterPercent: 10
    },
    undefined,
    logger
  );

  return new TelegramService(
    http,
    {
      botToken: config.TELEGRAM_BOT_TOKEN,
      chatId: config.TELEGRAM_CHAT_ID,
      apiUrl: config.TELEGRAM_API_URL,
      minIntervalMs: config.MESSAGE_DELAY_MS,
      disableWebPagePreview: config.TELEGRAM_DISABLE_PREVIEW
    },
    logger
  );
}

/**
 * Wires source, seen store and notifier from a validated configuration.
 * A dry run keeps its seen ids in memory: nothing was sent, so nothing may
 * be recorded in the persistent store.
 */
export async function createApp(config: BotConfig, logger: StructuredLogger): Promise<App> {
  let db: Database | null = null;
  let store: SeenStore;

  const storeKind: SeenStoreKind = config.DRY_RUN ? 'memory' : config.SEEN_STORE;
  if (config.DRY_RUN && config.SEEN_STORE !== 'memory') {
    logger.info(`DRY_RUN: seen ids kept in memory, the ${config.SEEN_STORE} store is left untouched`);
  }

  switch (storeKind) {
    case 'sqlite': {
      if (config.SQLITE_PATH !== ':memory:') {
        await fs.promises.mkdir(path.dirname(path.resolve(config.SQLITE_PATH)), { recursive: true });
      }
      db = await openDatabase(config.SQLITE_PATH);
      const lock = config.SQLITE_PATH === ':memory:'
        ? undefined
        : new FileLock(`${config.SQLITE_PATH}.lock`, config.SEEN_LOCK_STALE_MS, logger.child('seen-lock'));
      store = new SqliteSeenStore(db, logger, new MigrationRunner(db, logger.child('migrations')), lock);
      break;
    }
    case 'memory':
      store = new MemorySeenStore();
      break;
    case 'file':
      store = new JsonFileSeenStore(
        { filePath: config.SEEN_FILE, lockStaleMs: config.SEEN_LOCK_STALE_MS },
        logger
      );
      break;
    default: {
      const exhausted: never = storeKind;
      throw new ConfigError([`Unknown seen store: ${String(exhausted)}`]);
    }
  }

  const telegram = config.DRY_RUN ? null : createTelegramService(config, logger);
  const notifier: Notifier = telegram ?? new DryRunNotifier(logger);

  const openDb = db;
  return {
    source: createOlxSource(config, logger),
    store,
    notifier,
    telegram,
    close: async () => {
      if (openDb) {
        await closeDatabase(openDb);
      }
    }
  };
}
