import * as fs from 'fs';
import * as path from 'path';
import { StoreError, errorMessage } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { Listing } from '../types/listing';
import { FileLock } from './FileLock';
import { SeenHandle, SeenStore } from './SeenStore';

export interface JsonFileSeenStoreOptions {
  filePath: string;
  /** Age after which somebody else's lock is taken over */
  lockStaleMs: number;
}

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Seen set kept as a JSON array of listing ids. Writes go to a temporary
 * file that is renamed over the target, so a crash leaves either the old or
 * the new content on disk.
 */
export class JsonFileSeenStore implements SeenStore {
  readonly kind = 'file';
  private readonly logger: StructuredLogger;
  private readonly lock: FileLock;

  constructor(private readonly options: JsonFileSeenStoreOptions, logger: StructuredLogger) {
    this.logger = logger.child('seen-file');
    this.lock = new FileLock(`${options.filePath}.lock`, options.lockStaleMs, this.logger);
  }

  async acquire(): Promise<SeenHandle> {
    await fs.promises.mkdir(path.dirname(path.resolve(this.options.filePath)), { recursive: true });
    await this.lock.acquire();

    let ids: Set<string>;
    try {
      ids = await this.load();
    } catch (error) {
      await this.lock.release();
      throw error;
    }

    let released = false;
    return {
      get size() {
        return ids.size;
      },
      has: (id: string) => ids.has(id),
      markSeen: async (listing: Listing) => {
        if (released) throw new StoreError('Seen set handle used after release');
        if (ids.has(listing.id)) return;

        ids.add(listing.id);
        try {
          await this.save(ids);
        } catch (error) {
          ids.delete(listing.id);
          throw error;
        }
      },
      release: async () => {
        if (released) return;
        released = true;
        await this.lock.release();
      }
    };
  }

  private async load(): Promise<Set<string>> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.options.filePath, 'utf-8');
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        this.logger.info('No seen file yet, starting with an empty set', { file: this.options.filePath });
        return new Set();
      }
      throw new StoreError(`Cannot read ${this.options.filePath}: ${errorMessage(error)}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      await this.setAsideCorrupt(errorMessage(error));
      return new Set();
    }

    if (!isStringArray(parsed)) {
      await this.setAsideCorrupt('content is not an array of ids');
      return new Set();
    }

    this.logger.debug(`Loaded ${parsed.length} seen id(s)`, { file: this.options.filePath });
    return new Set(parsed);
  }

  /**
   * Moves an unreadable seen file out of the way so the next write does not
   * destroy it.
   */
  private async setAsideCorrupt(reason: string): Promise<void> {
    const backup = `${this.options.filePath}.corrupt-${Date.now()}`;
    this.logger.warn('Could not load seen ads, starting fresh', {
      file: this.options.filePath,
      reason,
      backup
    });

    try {
      await fs.promises.rename(this.options.filePath, backup);
    } catch (error) {
      throw new StoreError(`Cannot move corrupt seen file aside: ${errorMessage(error)}`, error);
    }
  }

  private async save(ids: Set<string>): Promise<void> {
    const tmpPath = `${this.options.filePath}.${process.pid}.tmp`;

    try {
      await fs.promises.writeFile(tmpPath, JSON.stringify(Array.from(ids), null, 2), 'utf-8');
      await fs.promises.rename(tmpPath, this.options.filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw new StoreError(`Cannot save ${this.options.filePath}: ${errorMessage(error)}`, error);
    }
  }
}
