/**
 * Run statistics since process start
 */

import { StructuredLogger } from '../core/StructuredLogger';
import { CycleResult } from '../types/listing';

export interface RunStats {
  startTime: Date;
  cycles: number;
  skippedCycles: number;
  abortedCycles: number;
  listingsFetched: number;
  notified: number;
  failedDeliveries: number;
  lastNotificationTime: Date | null;
  uptimeMs: number;
}

export class RunStatsTracker {
  private readonly startTime: Date;
  private cycles = 0;
  private skippedCycles = 0;
  private abortedCycles = 0;
  private listingsFetched = 0;
  private notified = 0;
  private failedDeliveries = 0;
  private lastNotificationTime: Date | null = null;
  private logInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly logger: StructuredLogger,
    private readonly logIntervalMinutes = 60,
    now: Date = new Date()
  ) {
    this.startTime = now;
  }

  record(result: CycleResult, at: Date = new Date()): void {
    this.cycles++;
    if (result.skipped) {
      this.skippedCycles++;
      return;
    }

    this.listingsFetched += result.fetched;
    this.notified += result.notified;
    this.failedDeliveries += result.failed;
    if (result.notified > 0) {
      this.lastNotificationTime = at;
    }
  }

  /**
   * A cycle that threw before producing a result (seen-set failure)
   */
  recordAborted(): void {
    this.cycles++;
    this.abortedCycles++;
  }

  getStats(now: Date = new Date()): RunStats {
    return {
      startTime: this.startTime,
      cycles: this.cycles,
      skippedCycles: this.skippedCycles,
      abortedCycles: this.abortedCycles,
      listingsFetched: this.listingsFetched,
      notified: this.notified,
      failedDeliveries: this.failedDeliveries,
      lastNotificationTime: this.lastNotificationTime,
      uptimeMs: now.getTime() - this.startTime.getTime()
    };
  }

  getFormattedStats(now: Date = new Date()): Record<string, string | number | null> {
    const stats = this.getStats(now);
    return {
      uptime: formatUptime(stats.uptimeMs),
      cycles: stats.cycles,
      skipped_cycles: stats.skippedCycles,
      aborted_cycles: stats.abortedCycles,
      listings_fetched: stats.listingsFetched,
      notified: stats.notified,
      failed_deliveries: stats.failedDeliveries,
      start_time: stats.startTime.toISOString(),
      last_notification_time: stats.lastNotificationTime?.toISOString() ?? null
    };
  }

  logStats(): void {
    this.logger.info('📊 runstats', this.getFormattedStats());
  }

  startPeriodicLogging(): void {
    if (this.logInterval || this.logIntervalMinutes <= 0) return;

    this.logInterval = setInterval(() => this.logStats(), this.logIntervalMinutes * 60 * 1000);
    this.logInterval.unref();
  }

  stop(): void {
    if (this.logInterval) {
      clearInterval(this.logInterval);
      this.logInterval = null;
    }
  }
}

export function formatUptime(ms: number): string {
  const hours = Math.floor(ms / (1000 * 60 * 60));
  const minutes = Math.floor((ms % (1000 * 60 * 60)) / (1000 * 60));
  return `${hours}h ${minutes}m`;
}
