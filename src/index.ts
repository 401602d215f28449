/**
 * classroom-records: a transactional data-access core for grade and section
 * records, on better-sqlite3.
 *
 * Core concepts:
 * - Decorators: @Entity, @Column declare tables, columns and the field registry
 * - EntityManager: the session (unit of work, transactions, savepoints)
 * - withTransaction: root / joined / savepoint scopes, timeout, deadlock retry
 * - defineQuery: screened raw SQL with named parameters
 * - Repository: CRUD, paging, finders, bulk updates, soft delete
 * - DataSource: connection and schema management
 *
 * @example
 * ```typescript
 * import { createApp, loadConfig } from 'classroom-records'
 *
 * const app = await createApp(loadConfig())
 * await app.grades.create({ gradeName: '1°' })
 * const page = await app.grades.getPage(1, 10)
 * ```
 */

import 'reflect-metadata';

// Decorators: Define entity metadata
export { Entity, Column, getTableName, getColumnMetadata, getPrimaryKey, getEntityMetadata } from './decorators';

// Core: Session, repositories and wrappers
export { EntityManager } from './entity-manager';
export { Repository } from './repository';
export type { RepositoryOptions } from './repository';
export { withTransaction, wrapError } from './transactional';
export type { TransactionOptions } from './transactional';
export { defineQuery, normalizeSql, validateSqlSecurity, DANGEROUS_SQL_PATTERNS } from './query';
export type { FetchMode, Query, QueryArgs, QueryDefinition, RowFactory, RowModel } from './query';
export { validateFields, applyJoins, applyWhereConditions } from './repository-helpers';
export { buildPagination, pageWindow, DEFAULT_PAGE_SIZE } from './pagination';

// DataSource: Primary orchestrator
export { DataSource } from './data-source';
export { SqliteAdapter } from './adapter';
export type { SqliteAdapterOptions } from './adapter';

// Config and logging
export { defineConfig, env, envFlag, envInt, resolveDbPath, loadConfig, DEFAULT_DATABASE_URL } from './config';
export type { AppConfig } from './config';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';

// Errors
export * from './errors';

// Domain
export { Grade } from './classrooms/grade.entity';
export { Section } from './classrooms/section.entity';
export { GradeRepository } from './classrooms/grade.repository';
export { SectionRepository } from './classrooms/section.repository';
export { GradeService } from './classrooms/grade.service';
export { SectionService } from './classrooms/section.service';
export * from './classrooms/dto';
export { createApp } from './app';
export type { App, AppOptions } from './app';

// Types
export type {
  ColumnMetadata,
  ColumnOptions,
  Condition,
  DataSourceOptions,
  EntityClass,
  EntityMetadata,
  Filters,
  IRepository,
  IsolationLevel,
  Page,
  PageRequest,
  Pagination,
  QueryOptions,
  QuerySession,
  Row,
  SessionSource,
  SqlValue,
  TransactionalSession,
  TransactionSettings,
  WhereConditions,
} from './types';
export { JoinType, TABLE_KEY, COLUMN_KEY, PRIMARY_KEY } from './types';
