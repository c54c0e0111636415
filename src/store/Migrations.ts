import { Database } from 'sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { StructuredLogger } from '../core/StructuredLogger';

export interface Migration {
  id: string;
  name: string;
  sql: string;
}

export const DEFAULT_MIGRATIONS_PATH = path.resolve(__dirname, '../../migrations');

/**
 * Applies `NNN_name.sql` files in numeric order, each once, inside a transaction
 */
export class MigrationRunner {
  constructor(
    private readonly db: Database,
    private readonly logger: StructuredLogger,
    private readonly migrationsPath: string = DEFAULT_MIGRATIONS_PATH
  ) {}

  async runMigrations(): Promise<number> {
    await this.createMigrationsTable();

    const migrationFiles = await this.getMigrationFiles();
    const appliedMigrations = new Set(await this.getAppliedMigrations());
    const pendingMigrations = migrationFiles.filter(file => !appliedMigrations.has(file.id));

    if (pendingMigrations.length === 0) {
      this.logger.debug('No pending migrations', { total: migrationFiles.length });
      return 0;
    }

    for (const migration of pendingMigrations) {
      await this.applyMigration(migration);
    }

    this.logger.info(`Applied ${pendingMigrations.length} migration(s)`);
    return pendingMigrations.length;
  }

  private createMigrationsTable(): Promise<void> {
    const sql = `
      CREATE TABLE IF NOT EXISTS _migrations (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at_utc TEXT NOT NULL
      )
    `;

    return new Promise((resolve, reject) => {
      this.db.run(sql, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private async getMigrationFiles(): Promise<Migration[]> {
    const files = await fs.promises.readdir(this.migrationsPath);
    const migrations: Migration[] = [];

    for (const file of files) {
      const idMatch = file.match(/^(\d+)_(.+)\.sql$/);
      if (!idMatch) continue;

      const sql = await fs.promises.readFile(path.join(this.migrationsPath, file), 'utf-8');
      migrations.push({
        id: idMatch[1],
        name: idMatch[2].replace(/_/g, ' '),
        sql
      });
    }

    return migrations.sort((a, b) => parseInt(a.id, 10) - parseInt(b.id, 10));
  }

  private getAppliedMigrations(): Promise<string[]> {
    return new Promise((resolve, reject) => {
      this.db.all('SELECT id FROM _migrations ORDER BY id', (err: Error | null, rows: Array<{ id: string }>) => {
        if (err) reject(err);
        else resolve(rows.map(row => row.id));
      });
    });
  }

  private applyMigration(migration: Migration): Promise<void> {
    this.logger.info(`Applying migration ${migration.id}: ${migration.name}`);

    return new Promise((resolve, reject) => {
      const fail = (err: Error): void => {
        this.logger.error(`Migration ${migration.id} failed`, err);
        this.db.run('ROLLBACK', () => reject(err));
      };

      this.db.serialize(() => {
        this.db.run('BEGIN TRANSACTION');
        this.db.exec(migration.sql, (err) => {
          if (err) {
            fail(err);
            return;
          }

          this.db.run(
            'INSERT INTO _migrations (id, name, applied_at_utc) VALUES (?, ?, ?)',
            [migration.id, migration.name, new Date().toISOString()],
            (insertErr) => {
              if (insertErr) {
                fail(insertErr);
                return;
              }

              this.db.run('COMMIT', (commitErr) => {
                if (commitErr) reject(commitErr);
                else resolve();
              });
            }
          );
        });
      });
    });
  }
}
