import { Database } from 'sqlite3';
import { StoreError, errorMessage } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { Listing } from '../types/listing';
import { FileLock } from './FileLock';
import { MigrationRunner } from './Migrations';
import { SeenHandle, SeenStore } from './SeenStore';

export interface SeenRow {
  listing_id: string;
  title: string;
  price: string;
  url: string;
  query: string;
  notified_at_utc: string;
}

/**
 * Seen set in the `seen_listings` table. Each markSeen is its own
 * INSERT OR IGNORE, committed before the promise resolves.
 */
export class SqliteSeenStore implements SeenStore {
  readonly kind = 'sqlite';
  private readonly logger: StructuredLogger;
  private migrated = false;
  private held = false;

  constructor(
    private readonly db: Database,
    logger: StructuredLogger,
    private readonly migrations: MigrationRunner,
    /** Guards against a second process on the same database file */
    private readonly lock?: FileLock
  ) {
    this.logger = logger.child('seen-sqlite');
  }

  async acquire(): Promise<SeenHandle> {
    if (this.held) {
      throw new StoreError('Seen set is already held by another cycle');
    }
    this.held = true;

    let ids: Set<string>;
    try {
      await this.lock?.acquire();
      ids = await this.load();
    } catch (error) {
      this.held = false;
      await this.lock?.release();
      throw error instanceof StoreError ? error : new StoreError(`Cannot open seen set: ${errorMessage(error)}`, error);
    }

    let released = false;
    return {
      get size() {
        return ids.size;
      },
      has: (id: string) => ids.has(id),
      markSeen: async (listing: Listing) => {
        if (released) throw new StoreError('Seen set handle used after release');
        await this.insert(listing);
        ids.add(listing.id);
      },
      release: async () => {
        if (released) return;
        released = true;
        this.held = false;
        await this.lock?.release();
      }
    };
  }

  /**
   * Most recent rows first, for diagnostics
   */
  recent(limit = 20): Promise<SeenRow[]> {
    return new Promise((resolve, reject) => {
      this.db.all(
        'SELECT listing_id, title, price, url, query, notified_at_utc FROM seen_listings ORDER BY notified_at_utc DESC LIMIT ?',
        [limit],
        (err: Error | null, rows: SeenRow[]) => {
          if (err) reject(new StoreError(`Cannot read seen_listings: ${err.message}`, err));
          else resolve(rows);
        }
      );
    });
  }

  private async load(): Promise<Set<string>> {
    if (!this.migrated) {
      await this.migrations.runMigrations();
      this.migrated = true;
    }

    const rows = await new Promise<Array<{ listing_id: string }>>((resolve, reject) => {
      this.db.all('SELECT listing_id FROM seen_listings', (err: Error | null, result: Array<{ listing_id: string }>) => {
        if (err) reject(err);
        else resolve(result);
      });
    });

    this.logger.debug(`Loaded ${rows.length} seen id(s)`);
    return new Set(rows.map(row => row.listing_id));
  }

  private insert(listing: Listing): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.run(
        `INSERT OR IGNORE INTO seen_listings (listing_id, title, price, url, query, notified_at_utc)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [listing.id, listing.title, listing.price, listing.url, listing.query, new Date().toISOString()],
        (err) => {
          if (err) reject(new StoreError(`Cannot record ${listing.id}: ${err.message}`, err));
          else resolve();
        }
      );
    });
  }
}
