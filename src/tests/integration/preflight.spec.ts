import * as fs from 'fs';
import * as path from 'path';
import { App } from '../../app';
import { PreflightChecker } from '../../bin/preflight';
import { BotConfig, loadConfig } from '../../config/env';
import { TelegramService } from '../../notify/TelegramService';
import { OlxSource } from '../../sources/OlxSource';
import { MigrationRunner } from '../../store/Migrations';
import { MemorySeenStore } from '../../store/MemorySeenStore';
import { SeenStore, withSeenSet } from '../../store/SeenStore';
import { SqliteSeenStore } from '../../store/SqliteSeenStore';
import { closeTestDb, createTestDb } from '../helpers/testDb';
import { makeListing } from '../helpers/listings';
import { createTestClient, httpResponse, testLogger } from '../helpers/http';

const FIXTURE = fs.readFileSync(path.join(__dirname, '../fixtures/olx-search.html'), 'utf-8');
const QUERY = 'https://www.olx.ua/uk/list/q-playstation-tv/';

describe('PreflightChecker', () => {
  const logger = testLogger();

  function setup(env: Record<string, string> = {}, store: SeenStore = new MemorySeenStore(['x', 'y'])) {
    const config: BotConfig = loadConfig({
      TELEGRAM_BOT_TOKEN: '123456:test-secret',
      TELEGRAM_CHAT_ID: '987654',
      SEEN_STORE: 'memory',
      OLX_QUERY_URLS: QUERY,
      ...env
    });
    const olx = createTestClient('olx', { maxRetries: 0 });
    const telegramHttp = createTestClient('telegram', { maxRetries: 0 });
    const telegram = new TelegramService(telegramHttp.client, { botToken: config.TELEGRAM_BOT_TOKEN, chatId: config.TELEGRAM_CHAT_ID }, logger);
    const close = jest.fn(async () => undefined);
    const app: App = {
      source: new OlxSource(olx.client, { queries: config.OLX_QUERY_URLS, baseUrl: config.OLX_BASE_URL, keywords: config.OLX_TITLE_KEYWORDS }, logger),
      store,
      notifier: telegram,
      telegram,
      close
    };
    const buildApp = jest.fn(async () => app);
    const lines: string[] = [];
    const checker = new PreflightChecker(config, logger, line => lines.push(line), buildApp);

    return { checker, buildApp, close, lines, olxTransport: olx.transport, telegramTransport: telegramHttp.transport };
  }

  it('passes when Telegram and every search page answer', async () => {
    const { checker, close, lines, olxTransport, telegramTransport } = setup();
    telegramTransport.request.mockResolvedValueOnce(
      httpResponse(200, { ok: true, result: { id: 123456, is_bot: true, first_name: 'Watcher', username: 'olx_watch_bot' } })
    );
    olxTransport.request.mockResolvedValueOnce(httpResponse(200, FIXTURE));

    const code = await checker.run();

    expect(code).toBe(0);
    expect(close).toHaveBeenCalledTimes(1);
    expect(checker.getResults().map(r => `${r.status} ${r.section}: ${r.message}`)).toEqual([
      '✅ Config: 1 search page(s), store memory',
      '✅ Seen store: memory store holds 2 id(s)',
      '✅ Telegram: Bot @olx_watch_bot (id 123456) reachable',
      `✅ OLX: ${QUERY}: 3 ads, 2 match keywords`
    ]);
    expect(lines[lines.length - 1]).toBe('\n✅ PREFLIGHT PASSED');
  });

  it('fails when Telegram rejects the token', async () => {
    const { checker, olxTransport, telegramTransport } = setup();
    telegramTransport.request.mockResolvedValueOnce(httpResponse(404, { ok: false, description: 'Not Found' }));
    olxTransport.request.mockResolvedValueOnce(httpResponse(200, FIXTURE));

    const code = await checker.run();

    expect(code).toBe(1);
    const telegram = checker.getResults().find(r => r.section === 'Telegram');
    expect(telegram).toMatchObject({ status: '❌', critical: true });
  });

  it('fails when a search page cannot be fetched', async () => {
    const { checker, olxTransport, telegramTransport } = setup();
    telegramTransport.request.mockResolvedValueOnce(httpResponse(200, { ok: true, result: { id: 123456, first_name: 'Watcher' } }));
    olxTransport.request.mockResolvedValueOnce(httpResponse(403, 'blocked'));

    const code = await checker.run();

    expect(code).toBe(1);
    expect(checker.getResults().find(r => r.section === 'OLX')).toMatchObject({
      status: '❌',
      message: `${QUERY}: HTTP 403: Forbidden`
    });
  });

  it('stops at an invalid configuration without building anything', async () => {
    const { checker, buildApp } = setup({ TELEGRAM_CHAT_ID: '' });

    const code = await checker.run();

    expect(code).toBe(1);
    expect(buildApp).not.toHaveBeenCalled();
    expect(checker.getResults()).toEqual([
      { section: 'Config', status: '❌', message: 'TELEGRAM_CHAT_ID is required (or set DRY_RUN=true)', critical: true }
    ]);
  });

  it('flags a chat id that points at the bot', async () => {
    const { checker, olxTransport, telegramTransport } = setup({ TELEGRAM_CHAT_ID: '123456' });
    telegramTransport.request.mockResolvedValueOnce(httpResponse(200, { ok: true, result: { id: 123456, first_name: 'Watcher' } }));
    olxTransport.request.mockResolvedValueOnce(httpResponse(200, FIXTURE));

    const code = await checker.run();

    expect(code).toBe(1);
    expect(checker.getResults()).toContainEqual({
      section: 'Telegram',
      status: '❌',
      message: 'TELEGRAM_CHAT_ID is the bot itself; bots cannot message bots',
      critical: true
    });
  });

  it('lists the latest notified ads of an SQLite store', async () => {
    const db = await createTestDb();
    try {
      const store = new SqliteSeenStore(db, logger, new MigrationRunner(db, logger));
      await withSeenSet(store, seen => seen.markSeen(makeListing('a', { title: 'PS4 + TV' })));
      const { checker, olxTransport, telegramTransport } = setup({}, store);
      telegramTransport.request.mockResolvedValueOnce(httpResponse(200, { ok: true, result: { id: 123456, first_name: 'Watcher' } }));
      olxTransport.request.mockResolvedValueOnce(httpResponse(200, FIXTURE));

      const code = await checker.run();

      expect(code).toBe(0);
      const seen = checker.getResults().filter(r => r.section === 'Seen store').map(r => r.message);
      expect(seen).toHaveLength(2);
      expect(seen[0]).toBe('sqlite store holds 1 id(s)');
      expect(seen[1]).toMatch(/^Last notified: a \(PS4 \+ TV\) at \d{4}-\d{2}-\d{2}T/);
    } finally {
      await closeTestDb(db);
    }
  });
});
