#!/usr/bin/env node
import 'dotenv/config';
import { App, createApp } from './app';
import { BotConfig, getConfigSummary, loadConfig, logConfigSummary, validateConfig } from './config/env';
import { describeCycle } from './core/pollCycle';
import { ConfigError, errorMessage } from './core/errors';
import { StructuredLogger } from './core/StructuredLogger';
import { RunStatsTracker } from './metrics/RunStats';
import { formatStartMessage } from './notify/formatMessage';
import { ListingPoller } from './watchers/ListingPoller';

let isShuttingDown = false;
let app: App | null = null;
let poller: ListingPoller | null = null;
let stats: RunStatsTracker | null = null;

function createLogger(config: BotConfig): StructuredLogger {
  return new StructuredLogger({
    level: config.LOG_LEVEL,
    format: config.LOG_FORMAT,
    colors: config.LOG_FORMAT === 'pretty' && process.stdout.isTTY === true,
    component: 'olx-watch'
  });
}

async function gracefulShutdown(signal: string, logger: StructuredLogger, exitCode = 0): Promise<void> {
  if (isShuttingDown) {
    logger.warn(`[${signal}] Shutdown already in progress`);
    return;
  }
  isShuttingDown = true;
  logger.info(`[${signal}] Shutting down`);

  try {
    if (poller) {
      await poller.stop();
    }
    if (stats) {
      stats.stop();
      stats.logStats();
    }
    if (app?.telegram) {
      logger.info('Telegram delivery totals', app.telegram.getStatus());
    }
    if (app) {
      await app.close();
    }
    logger.info('Shutdown complete');
    process.exit(exitCode);
  } catch (error) {
    logger.error('Error during shutdown', error);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (!validation.isValid) {
    throw new ConfigError(validation.errors);
  }

  if (config.LOG_FORMAT === 'json') {
    logger.info('Configuration', getConfigSummary(config));
  } else {
    logConfigSummary(config, line => logger.info(line));
  }

  app = await createApp(config, logger);
  stats = new RunStatsTracker(logger.child('runstats'), config.STATS_LOG_INTERVAL_MIN);
  poller = new ListingPoller(
    app.source,
    app.store,
    app.notifier,
    stats,
    {
      pollIntervalMs: config.POLL_INTERVAL_MS,
      notifyCycleSummary: config.NOTIFY_CYCLE_SUMMARY,
      timezone: config.TIMEZONE
    },
    logger
  );

  if (config.NOTIFY_ON_START) {
    try {
      await app.notifier.sendText(formatStartMessage(config.OLX_QUERY_URLS.length, new Date(), config.TIMEZONE));
    } catch (error) {
      logger.warn('Start-up message not sent', { reason: errorMessage(error) });
    }
  }

  if (config.RUN_ONCE) {
    const result = await poller.runOnce();
    logger.info(`Single cycle done: ${describeCycle(result)}`);
    if (app.telegram) {
      logger.info('Telegram delivery totals', app.telegram.getStatus());
    }
    await app.close();
    return;
  }

  process.on('SIGINT', () => void gracefulShutdown('SIGINT', logger));
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM', logger));
  process.on('unhandledRejection', (reason) => {
    logger.fatal('Unhandled rejection', reason);
    void gracefulShutdown('UNHANDLED_REJECTION', logger, 1);
  });

  stats.startPeriodicLogging();
  await poller.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    for (const problem of error.problems) {
      console.error(`❌ Config: ${problem}`);
    }
  } else {
    console.error('💥 Main function failed:', error);
  }
  process.exit(1);
});
