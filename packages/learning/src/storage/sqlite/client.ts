/**
 * SQLite Client Wrapper
 *
 * Wraps better-sqlite3 with WAL mode, typed statements and transactions.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType, Statement } from 'better-sqlite3';

import type { Logger } from '../../utils/logger.js';

/**
 * SQLite client configuration
 */
export interface SQLiteClientConfig {
  /** Path to the database file, or ":memory:" */
  dbPath: string;
  /** Enable WAL mode (default: true) */
  walMode?: boolean;
  /** Log every statement at debug level */
  logger?: Logger;
}

/**
 * SQLite client wrapper
 */
export class SQLiteClient {
  private db: DatabaseType;

  constructor(config: SQLiteClientConfig) {
    const logger = config.logger;

    this.db = logger
      ? new Database(config.dbPath, { verbose: (sql) => logger.debug(String(sql)) })
      : new Database(config.dbPath);

    // Configure pragmas
    if (config.walMode ?? true) {
      this.db.pragma('journal_mode = WAL');
    }
  }

  /**
   * Execute raw SQL
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Prepare a statement with a typed result row
   */
  prepare<R = unknown>(sql: string): Statement<unknown[], R> {
    return this.db.prepare<unknown[], R>(sql);
  }

  /**
   * Run a function inside a transaction; it rolls back if fn throws
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Read the schema version stored in PRAGMA user_version
   */
  get userVersion(): number {
    const value = this.db.pragma('user_version', { simple: true });
    return typeof value === 'number' ? value : 0;
  }

  set userVersion(version: number) {
    this.db.pragma(`user_version = ${Math.trunc(version)}`);
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }

  /**
   * Check if the database is open
   */
  get isOpen(): boolean {
    return this.db.open;
  }
}
