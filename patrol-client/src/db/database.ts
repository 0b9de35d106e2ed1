/**
 * SQLite database for the patrol client
 *
 * Holds the offline entity store, cached patrol reference data and the
 * sync queue. One connection per process; every repository call runs inside
 * a transaction on it.
 */

import BetterSqlite3 from 'better-sqlite3';
import { CREATE_VERSION_TABLE_SQL, TABLE_NAMES } from './schema.js';
import { MigrationManager, type Migration } from './migration-manager.js';
import { MIGRATIONS } from './migrations.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('Database');

export type SqlValue = string | number | bigint | Buffer | null;

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

export class Database {
  private db: BetterSqlite3.Database;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
    this.db = new BetterSqlite3(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
  }

  /**
   * Brings the schema to the latest version and records each applied
   * migration in VersionInfo. Returns the version reached.
   */
  initialize(migrations: Migration<Database>[] = MIGRATIONS): number {
    this.db.exec(CREATE_VERSION_TABLE_SQL);
    const current = this.getVersion();

    const manager = new MigrationManager(migrations);
    const reached = manager.apply(this, current, version => this.setVersion(version));

    if (reached !== current) {
      logger.info('Database schema migrated', { from: current, to: reached, path: this.dbPath });
    }
    return reached;
  }

  // ==========================================================================
  // Generic query methods
  // ==========================================================================

  run(sql: string, params: SqlValue[] = []): RunResult {
    return this.db.prepare<SqlValue[]>(sql).run(...params);
  }

  get<T>(sql: string, params: SqlValue[] = []): T | undefined {
    return this.db.prepare<SqlValue[], T>(sql).get(...params);
  }

  all<T>(sql: string, params: SqlValue[] = []): T[] {
    return this.db.prepare<SqlValue[], T>(sql).all(...params);
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  /** Nested calls run as savepoints of the outer transaction. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  columnExists(table: string, column: string): boolean {
    const columns = this.all<{ name: string }>(`PRAGMA table_info(${table})`);
    return columns.some(c => c.name === column);
  }

  tableExists(table: string): boolean {
    const row = this.get<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`,
      [table]
    );
    return row !== undefined;
  }

  /** Adds a column unless it is already there. Safe to re-run. */
  addColumnIfMissing(table: string, column: string, definition: string): void {
    if (!this.columnExists(table, column)) {
      this.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    }
  }

  // ==========================================================================
  // Version bookkeeping
  // ==========================================================================

  getVersion(): number {
    if (!this.tableExists('VersionInfo')) return 0;
    const row = this.get<{ Version: number }>('SELECT Version FROM VersionInfo LIMIT 1');
    return row?.Version ?? 0;
  }

  setVersion(version: number): void {
    this.transaction(() => {
      this.run('DELETE FROM VersionInfo');
      this.run('INSERT INTO VersionInfo (Version) VALUES (?)', [version]);
    });
  }

  /** Drops every table and rebuilds the schema from scratch. */
  reset(migrations: Migration<Database>[] = MIGRATIONS): number {
    const dropOrder = [...TABLE_NAMES].reverse();
    this.transaction(() => {
      for (const table of dropOrder) {
        this.exec(`DROP TABLE IF EXISTS ${table}`);
      }
      this.exec('DROP TABLE IF EXISTS VersionInfo');
    });
    logger.warn('Database reset', { path: this.dbPath });
    return this.initialize(migrations);
  }

  close(): void {
    this.db.close();
  }
}
