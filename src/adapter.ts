/**
 * SqliteAdapter: Thin abstraction over better-sqlite3.
 *
 * Internal code goes through the adapter, not better-sqlite3 directly, so the
 * EntityManager only sees prepare/exec and the connection's transaction flag.
 */

import Database from 'better-sqlite3';
import { createLogger } from './logger';

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/**
 * Configuration options for the SQLite adapter.
 */
export interface SqliteAdapterOptions {
  /** Path to the SQLite database file, or ':memory:' */
  filename: string;
  /** Print every statement better-sqlite3 executes */
  verbose?: boolean;
  /** Milliseconds to wait on a locked database before failing with SQLITE_BUSY. Defaults to 5000. */
  busyTimeout?: number;
}

export class SqliteAdapter {
  private db: Database.Database;

  constructor(options: SqliteAdapterOptions) {
    const sqlLog = createLogger('[SQL]', options.verbose ? 'DEBUG' : undefined);
    this.db = new Database(options.filename, {
      timeout: options.busyTimeout ?? DEFAULT_BUSY_TIMEOUT_MS,
      verbose: options.verbose ? (message?: unknown) => sqlLog.debug(String(message)) : undefined,
    });

    this.db.pragma('foreign_keys = ON');
    if (options.filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
  }

  /**
   * Prepare and return a statement for execution.
   */
  prepare(sql: string): Database.Statement {
    return this.db.prepare(sql);
  }

  /**
   * Execute one or more statements that take no parameters and return no rows.
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Whether the connection has an open transaction.
   */
  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  /**
   * Check if a table exists in the database.
   */
  tableExists(tableName: string): boolean {
    const result = this.db.prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name = ?`).get(tableName);
    return result !== undefined;
  }

  /**
   * Close the database connection.
   * After calling this, no further operations are possible.
   */
  close(): void {
    this.db.close();
  }
}
