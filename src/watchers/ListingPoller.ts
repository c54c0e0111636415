import { describeCycle, runPollCycle } from '../core/pollCycle';
import { errorMessage } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { RunStatsTracker } from '../metrics/RunStats';
import { formatCycleSummary } from '../notify/formatMessage';
import { Notifier } from '../notify/Notifier';
import { ListingSource } from '../sources/ListingSource';
import { SeenStore, withSeenSet } from '../store/SeenStore';
import { CycleResult } from '../types/listing';

export interface ListingPollerConfig {
  pollIntervalMs: number;
  notifyCycleSummary: boolean;
  timezone: string;
}

export interface PollerStatus {
  isRunning: boolean;
  totalPolls: number;
  consecutiveErrors: number;
  lastPollTime: number;
  lastErrorTime: number;
  lastResult: CycleResult | null;
}

/**
 * Runs poll cycles on a timer. The next cycle is scheduled only after the
 * previous one finished, so two cycles never hold the seen set at once.
 */
export class ListingPoller {
  private readonly logger: StructuredLogger;
  private isRunning = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleResult | null> | null = null;

  private totalPolls = 0;
  private consecutiveErrors = 0;
  private lastPollTime = 0;
  private lastErrorTime = 0;
  private lastResult: CycleResult | null = null;

  constructor(
    private readonly source: ListingSource,
    private readonly store: SeenStore,
    private readonly notifier: Notifier,
    private readonly stats: RunStatsTracker,
    private readonly config: ListingPollerConfig,
    logger: StructuredLogger
  ) {
    this.logger = logger.child('poller');
  }

  /**
   * One cycle inside an acquired seen-set session. Rejects only when the
   * seen set cannot be acquired, written or released.
   */
  async runOnce(): Promise<CycleResult> {
    this.totalPolls++;
    this.lastPollTime = Date.now();
    this.logger.info(`Poll #${this.totalPolls} started`, { source: this.source.name, store: this.store.kind });

    let result: CycleResult;
    try {
      result = await withSeenSet(this.store, seen =>
        runPollCycle({ source: this.source, seen, notifier: this.notifier, logger: this.logger })
      );
    } catch (error) {
      this.stats.recordAborted();
      throw error;
    }

    this.lastResult = result;
    this.stats.record(result);
    this.logger.info(`Poll #${this.totalPolls} ${describeCycle(result)}`);

    if (this.config.notifyCycleSummary) {
      await this.sendSummary(result);
    }

    return result;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Poller already running');
      return;
    }

    this.isRunning = true;
    this.logger.info(`Poller started with ${this.config.pollIntervalMs}ms interval`);

    await this.tick();
  }

  /**
   * Cancels the pending tick and waits for the running cycle, if any
   */
  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.isRunning = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }

    if (this.inFlight) {
      this.logger.info('Waiting for the running cycle to finish');
      await this.inFlight;
    }

    this.logger.info('Poller stopped');
  }

  getStatus(): PollerStatus {
    return {
      isRunning: this.isRunning,
      totalPolls: this.totalPolls,
      consecutiveErrors: this.consecutiveErrors,
      lastPollTime: this.lastPollTime,
      lastErrorTime: this.lastErrorTime,
      lastResult: this.lastResult
    };
  }

  private async tick(): Promise<void> {
    if (!this.isRunning) return;

    this.inFlight = this.guardedRun();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }

    this.scheduleNextPoll();
  }

  private async guardedRun(): Promise<CycleResult | null> {
    try {
      const result = await this.runOnce();
      this.consecutiveErrors = 0;
      return result;
    } catch (error) {
      this.consecutiveErrors++;
      this.lastErrorTime = Date.now();
      this.logger.error(`Poll #${this.totalPolls} aborted`, error, { consecutiveErrors: this.consecutiveErrors });
      return null;
    }
  }

  private scheduleNextPoll(): void {
    if (!this.isRunning) return;

    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      void this.tick();
    }, this.config.pollIntervalMs);
  }

  private async sendSummary(result: CycleResult): Promise<void> {
    try {
      await this.notifier.sendText(formatCycleSummary(result, new Date(), this.config.timezone));
    } catch (error) {
      this.logger.warn('Cycle summary not sent', { reason: errorMessage(error) });
    }
  }
}
