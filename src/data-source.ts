/**
 * DataSource is the primary orchestrator for data access.
 *
 * Responsibilities:
 * 1. Opens the better-sqlite3 connection on initialize()
 * 2. Optional schema synchronization (create missing tables)
 * 3. Dispenses the EntityManager (session) and Repositories
 */

import { SqliteAdapter } from './adapter';
import type { DataSourceOptions, EntityClass } from './types';
import { EntityManager } from './entity-manager';
import { Repository } from './repository';
import { getEntityMetadata } from './decorators';
import { SqliteCompiler } from './sqlite-dialect';
import { DatabaseError, ImplementationError } from './errors';
import { createLogger, Logger } from './logger';

export class DataSource {
  private adapter: SqliteAdapter | null = null;
  private entityManager: EntityManager | null = null;
  private readonly options: DataSourceOptions;
  private readonly log: Logger;

  constructor(options: DataSourceOptions) {
    this.options = {
      synchronize: false,
      logging: false,
      ...options,
    };
    this.log = createLogger('[DataSource]', this.options.logging ? 'INFO' : undefined);
  }

  /**
   * Open the database connection and optionally create tables.
   * Calling it again on an initialized data source does nothing.
   *
   * @example
   * ```typescript
   * const dataSource = new DataSource({
   *   dbPath: "classroom.db",
   *   entities: [Grade, Section],
   *   synchronize: true,
   * });
   *
   * await dataSource.initialize();
   * const grades = dataSource.getRepository(Grade);
   * ```
   */
  async initialize(): Promise<this> {
    if (this.adapter) {
      return this;
    }

    let adapter: SqliteAdapter;
    try {
      adapter = new SqliteAdapter({
        filename: this.options.dbPath,
        verbose: this.options.logging,
        busyTimeout: this.options.busyTimeout,
      });
    } catch (error) {
      throw initializationError(error);
    }
    this.log.info(`Connected to ${this.options.dbPath}`);

    if (this.options.synchronize) {
      try {
        this.synchronizeSchema(adapter);
      } catch (error) {
        adapter.close();
        throw initializationError(error);
      }
      this.log.info('Schema synchronized');
    }

    this.adapter = adapter;
    this.entityManager = new EntityManager(adapter, this.options.logging);
    return this;
  }

  /**
   * The session shared by every repository this data source hands out.
   */
  get manager(): EntityManager {
    if (!this.entityManager) {
      throw new ImplementationError('DataSource not initialized. Call .initialize() first.');
    }
    return this.entityManager;
  }

  get isInitialized(): boolean {
    return this.adapter !== null;
  }

  /**
   * Get a Repository for an entity type.
   * Delegates to the EntityManager which caches repositories.
   */
  getRepository<T extends object>(entity: EntityClass<T>): Repository<T> {
    return this.manager.getRepository(entity);
  }

  /**
   * Close the connection. An open transaction is rolled back first.
   */
  async destroy(): Promise<void> {
    if (!this.adapter) return;

    if (this.entityManager?.inTransaction()) {
      await this.entityManager.rollback();
    }
    this.adapter.close();
    this.adapter = null;
    this.entityManager = null;
    this.log.info('Connection closed');
  }

  /**
   * Create every registered entity's table if it does not exist, in
   * registration order: list referenced entities before the ones that reference them.
   */
  private synchronizeSchema(adapter: SqliteAdapter): void {
    const compiler = new SqliteCompiler();
    for (const entity of this.options.entities) {
      const meta = getEntityMetadata(entity);
      if (adapter.tableExists(meta.tableName)) {
        continue;
      }
      adapter.exec(compiler.compileCreate(meta));
      this.log.info(`Created table: ${meta.tableName}`);
    }
  }
}

function initializationError(error: unknown): DatabaseError {
  return new DatabaseError('Failed to initialize DataSource', {
    details: error instanceof Error ? error.message : String(error),
    instance: 'DataSource.initialize',
    cause: error,
  });
}
