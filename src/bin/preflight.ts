#!/usr/bin/env node

/**
 * Start-up checks: configuration, seen store, Telegram credentials and every
 * search page. Exits 1 when a critical check fails.
 */

import 'dotenv/config';
import { App, createApp } from '../app';
import { BotConfig, botIdFromToken, loadConfig, validateConfig } from '../config/env';
import { ConfigError, errorMessage } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { parseOlxListings } from '../sources/OlxSource';
import { matchesAllKeywords } from '../filters/keywordFilter';
import { withSeenSet } from '../store/SeenStore';
import { SqliteSeenStore } from '../store/SqliteSeenStore';

const RECENT_ROWS = 3;

export interface PreflightResult {
  section: string;
  status: '✅' | '❌' | '⚠️';
  message: string;
  critical: boolean;
}

export class PreflightChecker {
  private results: PreflightResult[] = [];

  constructor(
    private readonly config: BotConfig,
    private readonly logger: StructuredLogger,
    private readonly print: (line: string) => void = console.log,
    private readonly buildApp: (config: BotConfig, logger: StructuredLogger) => Promise<App> = createApp
  ) {}

  /**
   * Runs every check and returns the process exit code
   */
  async run(): Promise<number> {
    this.print('🚀 Starting preflight...\n');

    if (!this.checkEnvConfig()) {
      this.displayResults();
      return 1;
    }

    let app: App;
    try {
      app = await this.buildApp(this.config, this.logger);
    } catch (error) {
      this.add('Setup', '❌', errorMessage(error), true);
      this.displayResults();
      return 1;
    }

    try {
      await this.checkSeenStore(app);
      await this.checkTelegram(app);
      await this.checkSearchPages(app);
    } finally {
      await app.close();
    }

    this.displayResults();

    const critical = this.results.filter(r => r.critical && r.status === '❌');
    if (critical.length > 0) {
      this.print(`\n❌ PREFLIGHT FAILED: ${critical.length} critical error(s)`);
      return 1;
    }

    const warnings = this.results.filter(r => r.status === '⚠️').length;
    this.print(`\n✅ PREFLIGHT PASSED${warnings > 0 ? ` with ${warnings} warning(s)` : ''}`);
    return 0;
  }

  getResults(): PreflightResult[] {
    return [...this.results];
  }

  private add(section: string, status: PreflightResult['status'], message: string, critical: boolean): void {
    this.results.push({ section, status, message, critical });
  }

  private checkEnvConfig(): boolean {
    this.print('🔧 Checking configuration...');
    const validation = validateConfig(this.config);

    for (const error of validation.errors) {
      this.add('Config', '❌', error, true);
    }
    for (const warning of validation.warnings) {
      this.add('Config', '⚠️', warning, false);
    }
    if (validation.isValid) {
      this.add('Config', '✅', `${this.config.OLX_QUERY_URLS.length} search page(s), store ${this.config.SEEN_STORE}`, false);
    }

    return validation.isValid;
  }

  private async checkSeenStore(app: App): Promise<void> {
    this.print('💾 Checking seen store...');
    try {
      const size = await withSeenSet(app.store, async seen => seen.size);
      this.add('Seen store', '✅', `${app.store.kind} store holds ${size} id(s)`, false);

      if (app.store instanceof SqliteSeenStore) {
        for (const row of await app.store.recent(RECENT_ROWS)) {
          this.add('Seen store', '✅', `Last notified: ${row.listing_id} (${row.title}) at ${row.notified_at_utc}`, false);
        }
      }
    } catch (error) {
      this.add('Seen store', '❌', errorMessage(error), true);
    }
  }

  private async checkTelegram(app: App): Promise<void> {
    this.print('📱 Checking Telegram...');

    if (!app.telegram) {
      this.add('Telegram', '⚠️', 'DRY_RUN: Telegram not contacted', false);
      return;
    }

    try {
      const me = await app.telegram.getMe();
      this.add('Telegram', '✅', `Bot @${me.username ?? me.firstName} (id ${me.id}) reachable`, false);

      if (String(me.id) === this.config.TELEGRAM_CHAT_ID || botIdFromToken(this.config.TELEGRAM_BOT_TOKEN) === this.config.TELEGRAM_CHAT_ID) {
        this.add('Telegram', '❌', 'TELEGRAM_CHAT_ID is the bot itself; bots cannot message bots', true);
      }
    } catch (error) {
      this.add('Telegram', '❌', errorMessage(error), true);
    }
  }

  private async checkSearchPages(app: App): Promise<void> {
    this.print('🔎 Checking search pages...');

    for (const query of this.config.OLX_QUERY_URLS) {
      try {
        const html = await app.source.fetchPage(query);
        const cards = parseOlxListings(html, {
          baseUrl: this.config.OLX_BASE_URL,
          query,
          seenAt: new Date().toISOString()
        });
        const matching = cards.filter(card => matchesAllKeywords(card.title, this.config.OLX_TITLE_KEYWORDS));

        if (cards.length === 0) {
          this.add('OLX', '⚠️', `${query}: no listing cards found, the layout may have changed`, false);
        } else {
          this.add('OLX', '✅', `${query}: ${cards.length} ads, ${matching.length} match keywords`, false);
        }
      } catch (error) {
        this.add('OLX', '❌', `${query}: ${errorMessage(error)}`, true);
      }
    }
  }

  private displayResults(): void {
    this.print('\n📋 Preflight results:');
    for (const result of this.results) {
      this.print(`  ${result.status} [${result.section}] ${result.message}`);
    }
  }
}

if (require.main === module) {
  let config: BotConfig;
  try {
    config = loadConfig();
  } catch (error) {
    const problems = error instanceof ConfigError ? error.problems : [errorMessage(error)];
    for (const problem of problems) {
      console.error(`❌ Config: ${problem}`);
    }
    process.exit(1);
  }
  const logger = new StructuredLogger({ level: config.LOG_LEVEL, format: config.LOG_FORMAT, component: 'preflight' });

  new PreflightChecker(config, logger)
    .run()
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      logger.fatal('Preflight crashed', error);
      process.exit(1);
    });
}
