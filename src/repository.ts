/**
 * Repository implements the Data Mapper pattern for entity persistence.
 *
 * Every public operation runs under {@link withTransaction}: reads as
 * `readonly`, writes not. A call made while no transaction is open commits
 * its own; a call made inside a service's root transaction only flushes.
 * Operations that reuse each other go through the protected helpers below,
 * so one public call is one transactional unit.
 */

import type { EntityManager } from './entity-manager';
import type {
  ColumnMetadata,
  EntityClass,
  EntityMetadata,
  Filters,
  IRepository,
  Page,
  PageRequest,
  QueryOptions,
  SqlValue,
} from './types';
import { getEntityMetadata, readField, writeField } from './decorators';
import {
  Predicate,
  SelectQuery,
  SqliteCompiler,
  fromColumnValue,
  qualify,
  selectFrom,
  toColumnValue,
  withLimit,
  withOrder,
  withPredicate,
  withProjection,
} from './sqlite-dialect';
import {
  applyFilters,
  applyJoins,
  applyWhereConditions,
  columnOf,
  compare,
  equals,
  inList,
  validateFields,
} from './repository-helpers';
import { buildPagination, pageWindow } from './pagination';
import { withTransaction } from './transactional';
import type { LogLevel } from './logger';

export interface RepositoryOptions {
  /** Log level passed to the transaction wrapper of every operation. */
  logLevel?: LogLevel;
}

export class Repository<T extends object> implements IRepository<T> {
  protected readonly meta: EntityMetadata<T>;
  protected readonly compiler = new SqliteCompiler();

  constructor(
    protected readonly entity: EntityClass<T>,
    readonly manager: EntityManager,
    private readonly options: RepositoryOptions = {},
  ) {
    this.meta = getEntityMetadata(entity);
  }

  save(entity: T): Promise<T> {
    return this.run('save', false, () => this.persist(entity));
  }

  async saveAll(entities: T[]): Promise<T[]> {
    if (entities.length === 0) return [];
    return this.run('saveAll', false, async () => {
      for (const entity of entities) {
        this.manager.add(entity);
      }
      await this.manager.flush();
      for (const entity of entities) {
        await this.manager.refresh(entity);
      }
      return entities;
    });
  }

  getAll(options: QueryOptions = {}): Promise<T[]> {
    return this.run('getAll', true, () => this.selectAll(this.query({}, options)));
  }

  getById(id: number): Promise<T | undefined> {
    return this.run('getById', true, () => this.findById(id));
  }

  existsById(id: number): Promise<boolean> {
    return this.run('existsById', true, async () => (await this.findById(id)) !== undefined);
  }

  findOneBy(filters: Filters<T>, options: QueryOptions = {}): Promise<T | undefined> {
    return this.run('findOneBy', true, () => this.selectOne(this.query(filters, options)));
  }

  findAllBy(filters: Filters<T>, options: QueryOptions = {}): Promise<T[]> {
    return this.run('findAllBy', true, () => this.selectAll(this.query(filters, options)));
  }

  existsBy(filters: Filters<T>): Promise<boolean> {
    return this.run('existsBy', true, () => this.exists(this.query(filters)));
  }

  count(): Promise<number> {
    return this.run('count', true, () => this.countOf(selectFrom(this.meta)));
  }

  countBy(filters: Filters<T>): Promise<number> {
    return this.run('countBy', true, () => this.countOf(this.query(filters)));
  }

  async findByIds(ids: readonly number[]): Promise<T[]> {
    if (ids.length === 0) return [];
    return this.run('findByIds', true, () => this.selectByIds(ids));
  }

  delete(id: number): Promise<boolean> {
    return this.run('delete', false, async () => {
      const entity = await this.findById(id);
      if (!entity) return false;
      this.manager.remove(entity);
      await this.manager.flush();
      return true;
    });
  }

  deleteAllBy(filters: Filters<T>): Promise<number> {
    return this.run('deleteAllBy', false, () => this.bulkDelete(this.query(filters).where));
  }

  /**
   * Delete every requested entity, or none of them when any id is missing.
   */
  async deleteByIds(ids: readonly number[]): Promise<boolean> {
    if (ids.length === 0) return true;
    return this.run('deleteByIds', false, async () => {
      const requested = [...new Set(ids)];
      const found = await this.selectByIds(requested);
      if (found.length !== requested.length) return false;

      for (const entity of found) {
        this.manager.remove(entity);
      }
      await this.manager.flush();
      return true;
    });
  }

  updateById(id: number, data: Filters<T>): Promise<T | undefined> {
    return this.run('updateById', false, async () => {
      validateFields(this.meta, data);
      const entity = await this.findById(id);
      if (!entity) return undefined;

      for (const [field, value] of Object.entries(data)) {
        if (field !== this.meta.primaryKey.property) {
          writeField(entity, field, value);
        }
      }
      await this.manager.flush();
      await this.manager.refresh(entity);
      return entity;
    });
  }

  updateAllBy(filters: Filters<T>, data: Filters<T>): Promise<number> {
    return this.run('updateAllBy', false, async () => {
      validateFields(this.meta, { ...filters, ...data });
      const assignments = Object.entries(data).map(
        ([field, value]) => this.assignment(columnOf(this.meta, field), value),
      );
      if (assignments.length === 0) return 0;
      return this.bulkUpdate(assignments, this.query(filters).where);
    });
  }

  getPageable(page: number, size: number, options: QueryOptions = {}): Promise<Page<T>> {
    return this.run('getPageable', true, () => this.pageOf(this.query({}, options), page, size));
  }

  getPageableBy(page: number, size: number, filters: Filters<T>, options: QueryOptions = {}): Promise<Page<T>> {
    return this.run('getPageableBy', true, () => this.pageOf(this.query(filters, options), page, size));
  }

  findPageables(request: PageRequest<T>): Promise<Page<T>> {
    const { page, size, filters = {}, ...options } = request;
    return this.run('findPageables', true, () => this.pageOf(this.query(filters, options), page, size));
  }

  /**
   * Merge into the stored entity with the same id, or insert when there is none.
   * The stored entity's id is never overwritten.
   */
  saveOrUpdate(entity: T): Promise<T> {
    return this.run('saveOrUpdate', false, async () => {
      const id = readField(entity, this.meta.primaryKey.property);
      const existing = typeof id === 'number' ? await this.findById(id) : undefined;
      if (!existing) {
        return this.persist(entity);
      }

      if (existing !== entity) {
        for (const column of this.meta.columns) {
          const value = readField(entity, column.property);
          if (!column.isPrimary && value !== undefined) {
            writeField(existing, column.property, value);
          }
        }
      }
      await this.manager.flush();
      await this.manager.refresh(existing);
      return existing;
    });
  }

  findAllOrderedBy(field: string, ascending = true, filters: Filters<T> = {}, options: QueryOptions = {}): Promise<T[]> {
    return this.run('findAllOrderedBy', true, () =>
      this.selectAll(this.orderedQuery(field, ascending, filters, options)),
    );
  }

  findFirstOrderedBy(
    field: string,
    ascending = true,
    filters: Filters<T> = {},
    options: QueryOptions = {},
  ): Promise<T | undefined> {
    return this.run('findFirstOrderedBy', true, () =>
      this.selectOne(this.orderedQuery(field, ascending, filters, options)),
    );
  }

  /**
   * The first entity of the reversed order. Among rows tied on `field`, the
   * one returned is whichever the store yields first.
   */
  findLastOrderedBy(
    field: string,
    ascending = true,
    filters: Filters<T> = {},
    options: QueryOptions = {},
  ): Promise<T | undefined> {
    return this.run('findLastOrderedBy', true, () =>
      this.selectOne(this.orderedQuery(field, !ascending, filters, options)),
    );
  }

  findAllInRange(field: string, min: unknown, max: unknown): Promise<T[]> {
    return this.run('findAllInRange', true, () => this.selectInRange(field, min, max));
  }

  findAllLike(field: string, pattern: string): Promise<T[]> {
    return this.run('findAllLike', true, () => {
      const column = columnOf(this.meta, field);
      return this.selectAll(withPredicate(this.query(), compare(this.meta, column, 'LIKE', pattern)));
    });
  }

  async findAllInList(field: string, values: readonly unknown[]): Promise<T[]> {
    if (values.length === 0) return [];
    return this.run('findAllInList', true, () => {
      const column = columnOf(this.meta, field);
      return this.selectAll(withPredicate(this.query(), inList(this.meta, column, values)));
    });
  }

  findAllNotInList(field: string, values: readonly unknown[]): Promise<T[]> {
    return this.run('findAllNotInList', true, () => {
      if (values.length === 0) {
        return this.selectAll(this.query());
      }
      const column = columnOf(this.meta, field);
      return this.selectAll(withPredicate(this.query(), inList(this.meta, column, values, true)));
    });
  }

  /**
   * Unique non-null values of a field, sorted by the store.
   */
  getDistinctValues(field: string): Promise<unknown[]> {
    return this.run('getDistinctValues', true, async () => {
      const column = columnOf(this.meta, field);
      const query = withOrder(withProjection(selectFrom(this.meta), { kind: 'distinct', column }), 'value ASC');
      const { sql, params } = this.compiler.compileSelect(query);
      await this.manager.flush();
      const rows = await this.manager.all(sql, params);
      return rows.filter((row) => row.value !== null).map((row) => fromColumnValue(column, row.value));
    });
  }

  findAllGreaterThan(field: string, value: unknown): Promise<T[]> {
    return this.run('findAllGreaterThan', true, () => {
      const column = columnOf(this.meta, field);
      return this.selectAll(withPredicate(this.query(), compare(this.meta, column, '>', value)));
    });
  }

  findAllLessThan(field: string, value: unknown): Promise<T[]> {
    return this.run('findAllLessThan', true, () => {
      const column = columnOf(this.meta, field);
      return this.selectAll(withPredicate(this.query(), compare(this.meta, column, '<', value)));
    });
  }

  findAllBetweenDates(field: string, start: Date, end: Date): Promise<T[]> {
    return this.run('findAllBetweenDates', true, () => this.selectInRange(field, start, end));
  }

  softDeleteById(id: number, deletedField = 'deleted'): Promise<boolean> {
    return this.run('softDeleteById', false, () => this.setFlag(id, deletedField, true));
  }

  restoreById(id: number, deletedField = 'deleted'): Promise<boolean> {
    return this.run('restoreById', false, () => this.setFlag(id, deletedField, false));
  }

  findAllActive(activeField = 'active'): Promise<T[]> {
    return this.run('findAllActive', true, () => this.selectAll(this.query({ [activeField]: true })));
  }

  findAllInactive(activeField = 'active'): Promise<T[]> {
    return this.run('findAllInactive', true, () => this.selectAll(this.query({ [activeField]: false })));
  }

  async bulkUpdateField(ids: readonly number[], field: string, value: unknown): Promise<number> {
    if (ids.length === 0) return 0;
    return this.run('bulkUpdateField', false, () => {
      const column = columnOf(this.meta, field);
      return this.bulkUpdate(
        [this.assignment(column, value)],
        [inList(this.meta, this.meta.primaryKey, ids)],
      );
    });
  }

  /**
   * Up to `limit` entities in random order. A limit that is not a finite number counts as 1.
   */
  findRandom(limit = 1): Promise<T[]> {
    const size = Number.isFinite(limit) ? Math.max(0, Math.trunc(limit)) : 1;
    return this.run('findRandom', true, () =>
      this.selectAll(withLimit(withOrder(selectFrom(this.meta), 'RANDOM()'), size)),
    );
  }

  /**
   * Run an operation under the transaction wrapper, labelled `<Entity>Repository.<method>`.
   */
  protected run<R>(method: string, readonly: boolean, operation: () => Promise<R>): Promise<R> {
    return withTransaction(
      this.manager,
      { readonly, name: `${this.entity.name}Repository.${method}`, logLevel: this.options.logLevel },
      operation,
    );
  }

  /**
   * Base query: joins, equality filters, where-conditions, then ordered by id.
   */
  protected query(filters: Record<string, unknown> = {}, options: QueryOptions = {}, orderById = true): SelectQuery {
    let query = applyJoins(selectFrom(this.meta), options.joins, options.joinType);
    query = applyFilters(query, filters);
    query = applyWhereConditions(query, this.meta, options.where);
    return orderById ? withOrder(query, `${qualify(this.meta, this.meta.primaryKey)} ASC`) : query;
  }

  protected async selectAll(query: SelectQuery): Promise<T[]> {
    const { sql, params } = this.compiler.compileSelect(query);
    await this.manager.flush();
    const rows = await this.manager.all(sql, params);
    return rows.map((row) => this.manager.hydrate(this.entity, row));
  }

  protected async selectOne(query: SelectQuery): Promise<T | undefined> {
    const { sql, params } = this.compiler.compileSelect(withLimit(query, 1));
    await this.manager.flush();
    const row = await this.manager.get(sql, params);
    return row ? this.manager.hydrate(this.entity, row) : undefined;
  }

  protected async exists(query: SelectQuery): Promise<boolean> {
    const { sql, params } = this.compiler.compileSelect(withLimit(withProjection(query, { kind: 'exists' }), 1));
    await this.manager.flush();
    return (await this.manager.get(sql, params)) !== undefined;
  }

  protected async countOf(query: SelectQuery): Promise<number> {
    const { sql, params } = this.compiler.compileSelect(withProjection(query, { kind: 'count' }));
    await this.manager.flush();
    const row = await this.manager.get(sql, params);
    return Number(row?.count ?? 0);
  }

  /**
   * One page of a query plus its metadata. The count ignores the page window.
   */
  protected async pageOf(query: SelectQuery, page: number, size: number): Promise<Page<T>> {
    const window = pageWindow(page, size);
    const total = await this.countOf(query);
    const data = await this.selectAll(withLimit(query, window.size, window.offset));
    return { data, meta: buildPagination(window.page, window.size, total) };
  }

  protected findById(id: number): Promise<T | undefined> {
    return this.selectOne(withPredicate(selectFrom(this.meta), equals(this.meta, this.meta.primaryKey, id)));
  }

  private selectByIds(ids: readonly number[]): Promise<T[]> {
    return this.selectAll(withPredicate(this.query(), inList(this.meta, this.meta.primaryKey, ids)));
  }

  private selectInRange(field: string, min: unknown, max: unknown): Promise<T[]> {
    const column = columnOf(this.meta, field);
    let query = withPredicate(this.query(), compare(this.meta, column, '>=', min));
    query = withPredicate(query, compare(this.meta, column, '<=', max));
    return this.selectAll(query);
  }

  private orderedQuery(field: string, ascending: boolean, filters: Filters<T>, options: QueryOptions): SelectQuery {
    validateFields(this.meta, { [field]: null, ...filters });
    const column = columnOf(this.meta, field);
    return withOrder(this.query(filters, options, false), `${qualify(this.meta, column)} ${ascending ? 'ASC' : 'DESC'}`);
  }

  private async persist(entity: T): Promise<T> {
    this.manager.add(entity);
    await this.manager.flush();
    await this.manager.refresh(entity);
    return entity;
  }

  private async setFlag(id: number, field: string, value: boolean): Promise<boolean> {
    columnOf(this.meta, field);
    const entity = await this.findById(id);
    if (!entity) return false;
    writeField(entity, field, value);
    await this.manager.flush();
    return true;
  }

  private assignment(column: ColumnMetadata, value: unknown): [ColumnMetadata, SqlValue] {
    return [column, toColumnValue(column, value)];
  }

  private async bulkUpdate(
    assignments: ReadonlyArray<readonly [ColumnMetadata, SqlValue]>,
    where: readonly Predicate[],
  ): Promise<number> {
    await this.manager.flush();
    const { sql, params } = this.compiler.compileUpdate(this.meta, assignments, where);
    const result = await this.manager.run(sql, params);
    this.manager.evict(this.meta.tableName);
    return result.changes;
  }

  private async bulkDelete(where: readonly Predicate[]): Promise<number> {
    await this.manager.flush();
    const { sql, params } = this.compiler.compileDelete(this.meta, where);
    const result = await this.manager.run(sql, params);
    this.manager.evict(this.meta.tableName);
    return result.changes;
  }
}
