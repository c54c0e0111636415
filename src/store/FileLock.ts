import * as fs from 'fs';
import * as os from 'os';
import { v4 as uuidv4 } from 'uuid';
import { StoreError, errorMessage } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';

export interface LockInfo {
  holder: string;
  pid: number;
  host: string;
  acquiredAtUtc: string;
}

function isLockInfo(value: unknown): value is LockInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'holder' in value && typeof value.holder === 'string' &&
    'pid' in value && typeof value.pid === 'number' &&
    'host' in value && typeof value.host === 'string' &&
    'acquiredAtUtc' in value && typeof value.acquiredAtUtc === 'string'
  );
}

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Exclusive lock backed by a file created with O_EXCL. A lock whose process
 * is gone (same host) or that is older than staleMs is taken over.
 */
export class FileLock {
  private readonly holder = uuidv4();
  private held = false;

  constructor(
    private readonly lockPath: string,
    private readonly staleMs: number,
    private readonly logger: StructuredLogger
  ) {}

  async acquire(): Promise<void> {
    if (this.held) {
      throw new StoreError(`Lock ${this.lockPath} is already held by this process`);
    }

    if (await this.tryCreate()) {
      return;
    }

    const existing = await this.read();
    if (existing && !this.isStale(existing)) {
      throw new StoreError(
        `Seen set is locked by ${existing.holder} (pid ${existing.pid} on ${existing.host}) since ${existing.acquiredAtUtc}`
      );
    }
    // An empty or partial lock may still be being written by its creator
    if (!existing && !(await this.isOlderThanStale())) {
      throw new StoreError(`Seen set lock ${this.lockPath} is unreadable and younger than ${this.staleMs}ms`);
    }

    this.logger.warn('Taking over stale seen-set lock', {
      lockPath: this.lockPath,
      previousHolder: existing?.holder ?? 'unreadable'
    });
    await fs.promises.rm(this.lockPath, { force: true });

    if (!(await this.tryCreate())) {
      throw new StoreError(`Lost the race for ${this.lockPath}`);
    }
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;

    const existing = await this.read();
    if (existing && existing.holder !== this.holder) {
      this.logger.warn('Seen-set lock was taken over by another holder, leaving it in place', {
        lockPath: this.lockPath,
        holder: existing.holder
      });
      return;
    }

    await fs.promises.rm(this.lockPath, { force: true });
  }

  isHeld(): boolean {
    return this.held;
  }

  private async tryCreate(): Promise<boolean> {
    const info: LockInfo = {
      holder: this.holder,
      pid: process.pid,
      host: os.hostname(),
      acquiredAtUtc: new Date().toISOString()
    };

    try {
      await fs.promises.writeFile(this.lockPath, JSON.stringify(info), { flag: 'wx' });
      this.held = true;
      return true;
    } catch (error) {
      if (hasCode(error, 'EEXIST')) {
        return false;
      }
      throw new StoreError(`Cannot create lock ${this.lockPath}: ${errorMessage(error)}`, error);
    }
  }

  private async read(): Promise<LockInfo | null> {
    try {
      const parsed: unknown = JSON.parse(await fs.promises.readFile(this.lockPath, 'utf-8'));
      return isLockInfo(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  private async isOlderThanStale(): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(this.lockPath);
      return Date.now() - stats.mtimeMs > this.staleMs;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return true;
      }
      throw new StoreError(`Cannot inspect lock ${this.lockPath}: ${errorMessage(error)}`, error);
    }
  }

  private isStale(info: LockInfo): boolean {
    const age = Date.now() - new Date(info.acquiredAtUtc).getTime();
    if (!Number.isFinite(age) || age > this.staleMs) {
      return true;
    }

    if (info.host === os.hostname() && info.pid !== process.pid) {
      try {
        process.kill(info.pid, 0);
      } catch (error) {
        return hasCode(error, 'ESRCH');
      }
    }

    return false;
  }
}
