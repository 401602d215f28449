/**
 * Raw SQL escape hatch for queries the repository API cannot express.
 *
 * The SQL is checked once when the query is defined: dangerous patterns are
 * rejected and every `:placeholder` must be a declared parameter. Every call
 * re-checks its string arguments and binds them by name.
 *
 * @example
 * ```typescript
 * const searchGrades = defineQuery({
 *   name: 'GradeRepository.searchByName',
 *   sql: `
 *     SELECT * FROM grades
 *     WHERE grade_name LIKE :pattern
 *     ORDER BY id
 *   `,
 *   params: ['pattern'],
 *   model: Grade,
 * });
 *
 * const grades = await searchGrades(manager, { pattern: '1%' });
 * ```
 */

import type { QuerySession, Row, SqlValue } from './types';
import { getEntityMetadata, isEntityClass } from './decorators';
import { DatabaseError, SqlValidationError } from './errors';
import { readRow, toSqlValue } from './sqlite-dialect';
import { isStoreError } from './type-guards';
import { withTimeout, wrapError } from './transactional';
import { createLogger, LogLevel } from './logger';

export const DANGEROUS_SQL_PATTERNS: readonly RegExp[] = [
  /\b(DROP|ALTER|CREATE|TRUNCATE|DELETE|INSERT|UPDATE)\s+(?!.*WHERE)/i,
  /;\s*DROP\s+/i,
  /--\s*/i,
  /\/\*.*\*\//i,
  /\b(EXEC|EXECUTE|SP_|XP_)\s*\(/i,
  /\b(UNION\s+SELECT|UNION\s+ALL\s+SELECT)/i,
  /@@\w+/i,
];

const PLACEHOLDER = /:(\w+)/g;

export type FetchMode = 'all' | 'one' | 'scalar' | 'none';

/** A type that builds itself from a raw row. */
export interface RowFactory<M> {
  fromRow(row: Row): M;
}

/**
 * Row mapping target: a {@link RowFactory}, an @Entity class (hydrated
 * through its columns), or any class whose instances receive the row's fields.
 */
export type RowModel<M extends object> = RowFactory<M> | (new () => M);

export interface QueryDefinition<P extends string> {
  /** Caller identity used in logs and error instances. */
  name: string;
  sql: string;
  params?: readonly P[];
  fetch?: FetchMode;
  /** Seconds before the call fails with OperationTimeoutError. */
  timeout?: number;
  logLevel?: LogLevel;
  /** Skip dangerous-pattern screening of the SQL text. Arguments are still screened. */
  allowDangerous?: boolean;
}

export type QueryArgs<P extends string> = Readonly<Record<P, unknown>>;

export type Query<P extends string, R> = (session: QuerySession, args: QueryArgs<P>) => Promise<R>;

export function defineQuery<P extends string = never, M extends object = Row>(
  definition: QueryDefinition<P> & { fetch: 'one'; model: RowModel<M> },
): Query<P, M | undefined>;
export function defineQuery<P extends string = never>(
  definition: QueryDefinition<P> & { fetch: 'one'; model?: undefined },
): Query<P, Row | undefined>;
export function defineQuery<P extends string = never>(
  definition: QueryDefinition<P> & { fetch: 'scalar'; model?: undefined },
): Query<P, SqlValue | undefined>;
export function defineQuery<P extends string = never>(
  definition: QueryDefinition<P> & { fetch: 'none'; model?: undefined },
): Query<P, void>;
export function defineQuery<P extends string = never, M extends object = Row>(
  definition: QueryDefinition<P> & { fetch?: 'all'; model: RowModel<M> },
): Query<P, M[]>;
export function defineQuery<P extends string = never>(
  definition: QueryDefinition<P> & { fetch?: 'all'; model?: undefined },
): Query<P, Row[]>;
export function defineQuery(definition: QueryDefinition<string> & { model?: RowModel<object> }): unknown {
  const { name, fetch = 'all', model, timeout, allowDangerous = false } = definition;
  const sql = normalizeSql(definition.sql);
  const declared = new Set(definition.params ?? []);
  const log = createLogger('[QUERY]', definition.logLevel);

  if (!allowDangerous) {
    validateSqlSecurity(sql);
  }
  const placeholders = findPlaceholders(sql);
  validateSqlParameters(placeholders, declared);

  const execute = async (session: QuerySession, params: Record<string, SqlValue>): Promise<unknown> => {
    const start = performance.now();
    try {
      switch (fetch) {
        case 'none':
          await session.run(sql, params);
          return undefined;
        case 'scalar': {
          const row = await session.get(sql, params);
          return row === undefined ? undefined : Object.values(row)[0];
        }
        case 'one': {
          const row = await session.get(sql, params);
          return row === undefined ? undefined : mapRow(row, model);
        }
        case 'all': {
          const rows = await session.all(sql, params);
          return rows.map((row) => mapRow(row, model));
        }
      }
    } catch (error) {
      if (isStoreError(error)) {
        throw new DatabaseError('Native SQL error', { details: error.message, instance: name, cause: error });
      }
      throw wrapError(error, name);
    } finally {
      log.debug(`${sql.split(/\s+/)[0]} in ${((performance.now() - start) / 1000).toFixed(4)}s`);
    }
  };

  return async (session: QuerySession, args: Readonly<Record<string, unknown>>): Promise<unknown> => {
    validateParameterValues(args, name);

    const params: Record<string, SqlValue> = {};
    for (const placeholder of placeholders) {
      params[placeholder] = toSqlValue(args[placeholder]);
    }

    if (timeout === undefined) {
      return execute(session, params);
    }
    log.info(`Timeout ${timeout}s`);
    return withTimeout(() => execute(session, params), timeout, name);
  };
}

/**
 * Strip the common leading indentation and surrounding blank space.
 */
export function normalizeSql(sql: string): string {
  const lines = sql.split('\n');
  const indents = lines.filter((line) => line.trim().length > 0).map((line) => /^[ \t]*/.exec(line)?.[0].length ?? 0);
  const indent = indents.length > 0 ? Math.min(...indents) : 0;
  return lines
    .map((line) => line.slice(Math.min(indent, /^[ \t]*/.exec(line)?.[0].length ?? 0)))
    .join('\n')
    .trim();
}

export function findPlaceholders(sql: string): ReadonlySet<string> {
  return new Set(Array.from(sql.matchAll(PLACEHOLDER), (match) => match[1]));
}

export function validateSqlSecurity(sql: string): void {
  for (const pattern of DANGEROUS_SQL_PATTERNS) {
    if (pattern.test(sql)) {
      throw new SqlValidationError('Potentially dangerous SQL pattern detected', {
        details: `Pattern matched: ${pattern.source}`,
        instance: 'SQL Security Validation',
      });
    }
  }
}

function validateSqlParameters(placeholders: ReadonlySet<string>, declared: ReadonlySet<string>): void {
  const missing = [...placeholders].filter((placeholder) => !declared.has(placeholder));
  if (missing.length > 0) {
    throw new SqlValidationError('SQL parameters missing from query definition', {
      details: `Missing parameters: ${missing.join(', ')}`,
      instance: 'SQL Parameter Validation',
    });
  }
}

function validateParameterValues(args: Readonly<Record<string, unknown>>, name: string): void {
  for (const [param, value] of Object.entries(args)) {
    if (typeof value === 'string' && DANGEROUS_SQL_PATTERNS.some((pattern) => pattern.test(value))) {
      throw new SqlValidationError('Suspicious SQL pattern in parameter value', {
        details: `Parameter '${param}' contains potential injection`,
        instance: name,
      });
    }
  }
}

function mapRow(row: Row, model?: RowModel<object>): unknown {
  if (!model) return row;
  if ('fromRow' in model) return model.fromRow(row);
  const instance = new model();
  if (isEntityClass(model)) {
    readRow(getEntityMetadata(model), row, instance);
    return instance;
  }
  return Object.assign(instance, row);
}
