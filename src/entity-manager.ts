/**
 * EntityManager implements the Unit of Work pattern and is the session every
 * repository call runs against.
 *
 * Staged inserts and deletes, and changes to loaded instances, reach the
 * database on flush(). Any statement or staged change opens a transaction if
 * none is open (autobegin); commit() and rollback() close it.
 *
 * One EntityManager belongs to one call chain at a time. It holds a single
 * better-sqlite3 connection, whose transaction state is the session's.
 */

import { SqliteAdapter } from './adapter';
import { Repository } from './repository';
import type {
  EntityClass,
  EntityMetadata,
  QuerySession,
  Row,
  RunResult,
  SqlParams,
  SqlValue,
  TransactionalSession,
  TransactionSettings,
} from './types';
import { getEntityMetadata, readField, writeField } from './decorators';
import { SqliteCompiler, readRow, sameSqlValue, snapshotOf, toColumnValue } from './sqlite-dialect';
import { DatabaseError, ImplementationError } from './errors';
import { isRow } from './type-guards';
import { createLogger, Logger } from './logger';
import { throwIfCancelled } from './call-scope';

interface TrackedEntity {
  entity: object;
  meta: EntityMetadata;
  snapshot: Row;
}

export class EntityManager implements TransactionalSession, QuerySession {
  private repositoryCache: Map<Function, Repository<object>> = new Map();
  private identityMap = new Map<string, TrackedEntity>();
  private pendingInserts = new Set<object>();
  private pendingDeletes = new Set<object>();
  private readOnlyActive = false;
  private savepointDepth = 0;
  private compiler = new SqliteCompiler();
  private log: Logger;

  constructor(
    private adapter: SqliteAdapter,
    logging = false,
  ) {
    this.log = createLogger('[EntityManager]', logging ? 'DEBUG' : undefined);
  }

  /**
   * Get or create a Repository for an entity type.
   * Caches repositories to avoid re-instantiation.
   */
  getRepository<T extends object>(entity: EntityClass<T>): Repository<T> {
    if (!this.repositoryCache.has(entity)) {
      this.repositoryCache.set(entity, new Repository(entity, this));
    }
    return this.repositoryCache.get(entity) as Repository<T>;
  }

  inTransaction(): boolean {
    return this.adapter.inTransaction;
  }

  async begin(settings: TransactionSettings = {}): Promise<void> {
    if (this.adapter.inTransaction) {
      throw new ImplementationError('A transaction is already in progress on this session');
    }
    this.ensureTransaction(settings);
  }

  /**
   * Apply settings to the open transaction. Its isolation is fixed once it has
   * begun; read-only holds until it ends.
   */
  async configure(settings: TransactionSettings): Promise<void> {
    if (!this.adapter.inTransaction) {
      throw new ImplementationError('No transaction in progress to configure');
    }
    if (settings.isolation) {
      this.log.debug(`Isolation ${settings.isolation} ignored: the transaction has already begun`);
    }
    if (settings.readOnly && !this.readOnlyActive) {
      this.setQueryOnly(true);
    }
  }

  async commit(): Promise<void> {
    await this.flush();
    if (this.adapter.inTransaction) {
      this.adapter.exec('COMMIT');
      this.log.debug('COMMIT');
    }
    this.endTransaction();
  }

  async rollback(): Promise<void> {
    if (this.adapter.inTransaction) {
      this.adapter.exec('ROLLBACK');
      this.log.debug('ROLLBACK');
    }
    this.discardState();
    this.endTransaction();
  }

  async nested<R>(operation: () => Promise<R>): Promise<R> {
    this.ensureTransaction();
    await this.flush();

    const name = `sp_${++this.savepointDepth}`;
    this.adapter.exec(`SAVEPOINT ${name}`);
    try {
      const result = await operation();
      await this.flush();
      this.adapter.exec(`RELEASE ${name}`);
      return result;
    } catch (error) {
      if (this.adapter.inTransaction) {
        this.adapter.exec(`ROLLBACK TO ${name}`);
        this.adapter.exec(`RELEASE ${name}`);
      }
      this.discardState();
      throw error;
    } finally {
      this.savepointDepth--;
    }
  }

  /**
   * Stage a new entity for insertion on the next flush.
   */
  add(entity: object): void {
    this.ensureTransaction();
    if (this.pendingDeletes.delete(entity)) return;
    if (this.pendingInserts.has(entity) || this.trackedEntry(entity)) return;
    if (!this.attach(entity)) {
      this.pendingInserts.add(entity);
    }
  }

  /**
   * Stage an entity for deletion on the next flush.
   */
  remove(entity: object): void {
    this.ensureTransaction();
    if (this.pendingInserts.delete(entity)) return;
    this.pendingDeletes.add(entity);
  }

  /**
   * Write staged inserts, changed columns of loaded instances, and staged deletes.
   */
  async flush(): Promise<void> {
    throwIfCancelled();
    if (this.pendingInserts.size > 0 || this.pendingDeletes.size > 0) {
      this.ensureTransaction();
    }
    for (const entity of this.pendingInserts) {
      this.insert(entity);
    }
    this.pendingInserts.clear();

    for (const tracked of this.identityMap.values()) {
      if (!this.pendingDeletes.has(tracked.entity)) {
        this.update(tracked);
      }
    }

    for (const entity of this.pendingDeletes) {
      this.deleteRow(entity);
    }
    this.pendingDeletes.clear();
  }

  /**
   * Reload every column of a persisted instance, e.g. store-generated defaults.
   */
  async refresh(entity: object): Promise<void> {
    const meta = getEntityMetadata(entity.constructor);
    const id = toColumnValue(meta.primaryKey, readField(entity, meta.primaryKey.property));
    const row = await this.get(this.compiler.compileSelectById(meta), [id]);
    if (!row) {
      throw new DatabaseError(`Could not refresh ${meta.target.name}`, {
        details: `No row in "${meta.tableName}" with ${meta.primaryKey.column} = ${String(id)}`,
      });
    }
    readRow(meta, row, entity);
    this.track(meta, entity);
  }

  /**
   * Forget every loaded instance. Staged inserts and deletes stay staged.
   */
  expireAll(): void {
    this.identityMap.clear();
  }

  /**
   * Drop every cached instance of one table, after a set-based statement changed it.
   */
  evict(tableName: string): void {
    for (const [key, tracked] of this.identityMap) {
      if (tracked.meta.tableName === tableName) {
        this.identityMap.delete(key);
      }
    }
  }

  /**
   * Turn a row into the session's instance for that identity.
   * An instance already loaded in this session is returned as it is.
   */
  hydrate<T extends object>(entity: EntityClass<T>, row: Row): T {
    const meta = getEntityMetadata(entity);
    const key = `${meta.tableName}:${String(row[meta.primaryKey.column])}`;
    const tracked = this.identityMap.get(key);
    if (tracked && tracked.entity instanceof entity) {
      return tracked.entity;
    }

    const instance = new entity();
    readRow(meta, row, instance);
    this.track(meta, instance);
    return instance;
  }

  async all(sql: string, params: SqlParams = []): Promise<Row[]> {
    this.ensureTransaction();
    this.log.debug(sql);
    return bind(this.adapter.prepare(sql), params, 'all').filter(isRow);
  }

  async get(sql: string, params: SqlParams = []): Promise<Row | undefined> {
    this.ensureTransaction();
    this.log.debug(sql);
    const row = bind(this.adapter.prepare(sql), params, 'get');
    return isRow(row) ? row : undefined;
  }

  async run(sql: string, params: SqlParams = []): Promise<RunResult> {
    this.ensureTransaction();
    this.log.debug(sql);
    return this.runSync(sql, params);
  }

  private runSync(sql: string, params: SqlParams): RunResult {
    const result = bind(this.adapter.prepare(sql), params, 'run');
    return { changes: result.changes, lastInsertRowid: result.lastInsertRowid };
  }

  private ensureTransaction(settings: TransactionSettings = {}): void {
    throwIfCancelled();
    if (this.adapter.inTransaction) return;
    const { isolation = 'DEFERRED', readOnly } = settings;
    this.adapter.exec(`BEGIN ${isolation}`);
    this.log.debug(`BEGIN ${isolation}`);
    if (readOnly) {
      this.setQueryOnly(true);
    }
  }

  private endTransaction(): void {
    if (this.readOnlyActive) {
      this.setQueryOnly(false);
    }
  }

  private setQueryOnly(enabled: boolean): void {
    this.adapter.exec(`PRAGMA query_only = ${enabled ? 'ON' : 'OFF'}`);
    this.readOnlyActive = enabled;
  }

  private discardState(): void {
    this.identityMap.clear();
    this.pendingInserts.clear();
    this.pendingDeletes.clear();
  }

  private keyOf(meta: EntityMetadata, entity: object): string {
    return `${meta.tableName}:${String(toColumnValue(meta.primaryKey, readField(entity, meta.primaryKey.property)))}`;
  }

  /**
   * Take back an instance that has an id but is no longer tracked (loaded
   * before a rollback, expiry or eviction), so the next flush updates its row.
   * Returns false when there is no row to update.
   */
  private attach(entity: object): boolean {
    const meta = getEntityMetadata(entity.constructor);
    const id = readField(entity, meta.primaryKey.property);
    if (id === undefined || id === null) return false;

    const key = this.keyOf(meta, entity);
    const current = this.identityMap.get(key);
    if (current) {
      this.identityMap.set(key, { entity, meta, snapshot: current.snapshot });
      return true;
    }

    const row = bind(this.adapter.prepare(this.compiler.compileSelectById(meta)), [toColumnValue(meta.primaryKey, id)], 'get');
    if (!isRow(row)) return false;
    this.identityMap.set(key, { entity, meta, snapshot: row });
    return true;
  }

  private trackedEntry(entity: object): TrackedEntity | undefined {
    const meta = getEntityMetadata(entity.constructor);
    const tracked = this.identityMap.get(this.keyOf(meta, entity));
    return tracked?.entity === entity ? tracked : undefined;
  }

  private track(meta: EntityMetadata, entity: object): void {
    this.identityMap.set(this.keyOf(meta, entity), { entity, meta, snapshot: snapshotOf(meta, entity) });
  }

  private insert(entity: object): void {
    const meta = getEntityMetadata(entity.constructor);
    const columns = meta.columns.filter((c) => {
      const value = readField(entity, c.property);
      return c.isPrimary ? value !== undefined && value !== null : value !== undefined;
    });
    const values = columns.map((c) => toColumnValue(c, readField(entity, c.property)));
    const result = this.runSync(this.compiler.compileInsert(meta, columns), values);

    if (!columns.includes(meta.primaryKey)) {
      writeField(entity, meta.primaryKey.property, Number(result.lastInsertRowid));
    }
    this.track(meta, entity);
  }

  private update(tracked: TrackedEntity): void {
    const { meta, entity, snapshot } = tracked;
    const current = snapshotOf(meta, entity);
    const changed = meta.columns.filter(
      (c) => !c.isPrimary && !sameSqlValue(current[c.column], snapshot[c.column]),
    );
    if (changed.length === 0) return;

    this.ensureTransaction();
    this.runSync(this.compiler.compileUpdateById(meta, changed), [
      ...changed.map((c) => current[c.column]),
      current[meta.primaryKey.column],
    ]);
    tracked.snapshot = current;
  }

  private deleteRow(entity: object): void {
    const meta = getEntityMetadata(entity.constructor);
    const id = toColumnValue(meta.primaryKey, readField(entity, meta.primaryKey.property));
    this.runSync(this.compiler.compileDeleteById(meta), [id]);
    this.identityMap.delete(this.keyOf(meta, entity));
  }
}

type StatementMode = 'all' | 'get' | 'run';

function bind(statement: ReturnType<SqliteAdapter['prepare']>, params: SqlParams, mode: 'all'): unknown[];
function bind(statement: ReturnType<SqliteAdapter['prepare']>, params: SqlParams, mode: 'get'): unknown;
function bind(statement: ReturnType<SqliteAdapter['prepare']>, params: SqlParams, mode: 'run'): RunResult;
function bind(statement: ReturnType<SqliteAdapter['prepare']>, params: SqlParams, mode: StatementMode): unknown {
  const args: unknown[] = isPositional(params) ? [...params] : [params];
  switch (mode) {
    case 'all':
      return statement.all(...args);
    case 'get':
      return statement.get(...args);
    case 'run':
      return statement.run(...args);
  }
}

function isPositional(params: SqlParams): params is readonly SqlValue[] {
  return Array.isArray(params);
}
