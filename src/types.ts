/**
 * Core type definitions and interfaces.
 * This module defines metadata keys, configuration options, session contracts
 * and value mappings shared by the data-access layer.
 */

/**
 * Metadata keys for storing entity and column information.
 * Using Symbols prevents naming collisions in the metadata registry.
 */
export const TABLE_KEY = Symbol('table');
export const COLUMN_KEY = Symbol('column');
export const PRIMARY_KEY = Symbol('primary');

/**
 * An entity class: instantiable without arguments so rows can be hydrated.
 */
export type EntityClass<T extends object = object> = new () => T;

/**
 * Values better-sqlite3 can bind and return.
 */
export type SqlValue = string | number | bigint | Buffer | null;

/** A result row keyed by column name. */
export type Row = Record<string, SqlValue>;

/** Positional (`?`) or named (`:name`) bind parameters. */
export type SqlParams = readonly SqlValue[] | Readonly<Record<string, SqlValue>>;

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/**
 * Configuration options for DataSource initialization.
 */
export interface DataSourceOptions {
  /** Path to the SQLite database file, or ':memory:' */
  dbPath: string;
  /** Array of entity classes to register */
  entities: EntityClass[];
  /** If true, auto-creates tables based on entity metadata */
  synchronize?: boolean;
  /** Log connection events and SQL statements */
  logging?: boolean;
  /** Milliseconds to wait on a locked database before SQLITE_BUSY */
  busyTimeout?: number;
}

/**
 * Options accepted by the @Column decorator.
 */
export interface ColumnOptions {
  /** Database column name. Defaults to the property name. */
  name?: string;
  primary?: boolean;
  /** Runtime type, required when emitDecoratorMetadata reports Object (unions, nullable). */
  type?: SupportedConstructor;
  nullable?: boolean;
  unique?: boolean;
  /** Raw SQL default expression, e.g. `(strftime('%Y-%m-%dT%H:%M:%fZ','now'))`. */
  default?: string;
  /** Entity whose primary key this column references. Used for joins. */
  references?: () => EntityClass;
}

export type SupportedConstructor =
  | StringConstructor
  | NumberConstructor
  | BooleanConstructor
  | DateConstructor
  | BufferConstructor;

/**
 * Internal metadata for a column definition.
 * Stores the mapping between TypeScript properties and database columns.
 */
export interface ColumnMetadata {
  /** TypeScript property name */
  property: string;
  /** Database column name */
  column: string;
  /** Runtime type name (String, Number, Boolean, Date, Buffer, Object) */
  type: SupportedType;
  isPrimary: boolean;
  nullable: boolean;
  unique: boolean;
  default?: string;
  references?: () => EntityClass;
}

/**
 * Everything the data-access layer knows about an entity class.
 */
export interface EntityMetadata<T extends object = object> {
  target: EntityClass<T>;
  tableName: string;
  columns: readonly ColumnMetadata[];
  primaryKey: ColumnMetadata;
  /** Static registry of the property names callers may filter, order or update by. */
  fieldNames: ReadonlySet<string>;
}

/**
 * Supported runtime types for column mapping.
 */
export type SupportedType = 'String' | 'Number' | 'Boolean' | 'Date' | 'Buffer' | 'Object';

/**
 * Maps runtime types to SQLite column types.
 * Used during schema synchronization.
 */
export const TYPE_MAP: Record<SupportedType, string> = {
  String: 'TEXT',
  Number: 'INTEGER',
  Boolean: 'INTEGER',
  Date: 'TEXT',
  Buffer: 'BLOB',
  Object: 'TEXT',
};

/**
 * Converters for transforming values between TypeScript and SQLite.
 * - toDb: Prepares a value for storage (e.g., Boolean -> 0/1, Date -> ISO string)
 * - fromDb: Hydrates a value from storage (e.g., 0/1 -> Boolean, ISO string -> Date)
 */
export const VALUE_CONVERTERS: Partial<
  Record<SupportedType, { toDb: (v: unknown) => unknown; fromDb: (v: SqlValue) => unknown }>
> = {
  Boolean: {
    toDb: (v: unknown) => (v === true ? 1 : v === false ? 0 : v),
    fromDb: (v: SqlValue) => (v === 1 ? true : v === 0 ? false : Boolean(v)),
  },
  Date: {
    toDb: (v: unknown) => (v instanceof Date ? v.toISOString() : v),
    fromDb: (v: SqlValue) => (typeof v === 'string' ? new Date(v) : v),
  },
};

/**
 * SQLite transaction modes, passed through as the transaction's isolation hint.
 */
export type IsolationLevel = 'DEFERRED' | 'IMMEDIATE' | 'EXCLUSIVE';

export interface TransactionSettings {
  isolation?: IsolationLevel;
  readOnly?: boolean;
}

/**
 * The minimal unit-of-work contract the transaction wrapper depends on.
 */
export interface TransactionalSession {
  inTransaction(): boolean;
  begin(settings?: TransactionSettings): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** Run an operation inside a SAVEPOINT of the open transaction. */
  nested<R>(operation: () => Promise<R>): Promise<R>;
  flush(): Promise<void>;
  /** Apply settings to the open transaction. */
  configure(settings: TransactionSettings): Promise<void>;
  /** Forget every cached instance so the next read reloads from the store. */
  expireAll(): void;
}

/**
 * The minimal contract the raw query wrapper depends on.
 */
export interface QuerySession {
  all(sql: string, params?: SqlParams): Promise<Row[]>;
  get(sql: string, params?: SqlParams): Promise<Row | undefined>;
  run(sql: string, params?: SqlParams): Promise<RunResult>;
}

/**
 * Where a transactional call finds its session: the session itself, or an
 * object that owns one (a repository, a data source).
 */
export type SessionSource = TransactionalSession | { readonly manager: TransactionalSession };

export enum JoinType {
  INNER = 'inner',
  LEFT_OUTER = 'left_outer',
}

/**
 * Structured comparison for a single field. Present operators are ANDed.
 */
export interface Condition {
  gt?: unknown;
  gte?: unknown;
  lt?: unknown;
  lte?: unknown;
  like?: string;
  ne?: unknown;
}

/**
 * Field name → literal (equality), array (IN) or {@link Condition}.
 */
export type WhereConditions = Record<string, unknown>;

/** Field name → value equality filters. */
export type Filters<T extends object> = Partial<T> & Record<string, unknown>;

export interface QueryOptions {
  joins?: readonly EntityClass[];
  joinType?: JoinType;
  where?: WhereConditions;
}

export interface Pagination {
  currentPage: number;
  perPage: number;
  total: number;
  totalPages: number;
  nextPage: number | null;
  previousPage: number | null;
}

export interface Page<T> {
  data: T[];
  meta: Pagination;
}

/**
 * Repository interface defining the contract for all data access operations.
 */
export interface IRepository<T extends object> {
  save(entity: T): Promise<T>;
  saveAll(entities: T[]): Promise<T[]>;
  getAll(options?: QueryOptions): Promise<T[]>;
  getById(id: number): Promise<T | undefined>;
  existsById(id: number): Promise<boolean>;
  findOneBy(filters: Filters<T>, options?: QueryOptions): Promise<T | undefined>;
  findAllBy(filters: Filters<T>, options?: QueryOptions): Promise<T[]>;
  existsBy(filters: Filters<T>): Promise<boolean>;
  count(): Promise<number>;
  countBy(filters: Filters<T>): Promise<number>;
  findByIds(ids: readonly number[]): Promise<T[]>;
  delete(id: number): Promise<boolean>;
  deleteAllBy(filters: Filters<T>): Promise<number>;
  deleteByIds(ids: readonly number[]): Promise<boolean>;
  updateById(id: number, data: Filters<T>): Promise<T | undefined>;
  updateAllBy(filters: Filters<T>, data: Filters<T>): Promise<number>;
  getPageable(page: number, size: number, options?: QueryOptions): Promise<Page<T>>;
  getPageableBy(page: number, size: number, filters: Filters<T>, options?: QueryOptions): Promise<Page<T>>;
  findPageables(request: PageRequest<T>): Promise<Page<T>>;
  saveOrUpdate(entity: T): Promise<T>;
  findAllOrderedBy(field: string, ascending?: boolean, filters?: Filters<T>, options?: QueryOptions): Promise<T[]>;
  findFirstOrderedBy(
    field: string,
    ascending?: boolean,
    filters?: Filters<T>,
    options?: QueryOptions,
  ): Promise<T | undefined>;
  findLastOrderedBy(
    field: string,
    ascending?: boolean,
    filters?: Filters<T>,
    options?: QueryOptions,
  ): Promise<T | undefined>;
  findAllInRange(field: string, min: unknown, max: unknown): Promise<T[]>;
  findAllLike(field: string, pattern: string): Promise<T[]>;
  findAllInList(field: string, values: readonly unknown[]): Promise<T[]>;
  findAllNotInList(field: string, values: readonly unknown[]): Promise<T[]>;
  getDistinctValues(field: string): Promise<unknown[]>;
  findAllGreaterThan(field: string, value: unknown): Promise<T[]>;
  findAllLessThan(field: string, value: unknown): Promise<T[]>;
  findAllBetweenDates(field: string, start: Date, end: Date): Promise<T[]>;
  softDeleteById(id: number, deletedField?: string): Promise<boolean>;
  restoreById(id: number, deletedField?: string): Promise<boolean>;
  findAllActive(activeField?: string): Promise<T[]>;
  findAllInactive(activeField?: string): Promise<T[]>;
  bulkUpdateField(ids: readonly number[], field: string, value: unknown): Promise<number>;
  findRandom(limit?: number): Promise<T[]>;
}

export interface PageRequest<T extends object> extends QueryOptions {
  page: number;
  size: number;
  filters?: Filters<T>;
}
