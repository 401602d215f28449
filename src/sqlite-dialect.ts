import type { ColumnMetadata, EntityMetadata, Row, SqlValue } from './types';
import { TYPE_MAP, VALUE_CONVERTERS } from './types';
import { getTableName, readField, writeField } from './decorators';
import { ValidationError } from './errors';

/** Column default producing the same UTC format as `Date.prototype.toISOString`. */
export const ISO_TIMESTAMP_DEFAULT = "(strftime('%Y-%m-%dT%H:%M:%fZ','now'))";

export interface Predicate {
  sql: string;
  params: SqlValue[];
}

export interface JoinClause {
  kind: 'INNER' | 'LEFT OUTER';
  table: string;
  on: string;
}

export type Projection =
  | { kind: 'entity' }
  | { kind: 'count' }
  | { kind: 'exists' }
  | { kind: 'distinct'; column: ColumnMetadata };

/**
 * An immutable SELECT under construction. Every helper returns a new query,
 * so the same base can feed both a page query and its count query.
 */
export interface SelectQuery {
  meta: EntityMetadata;
  projection: Projection;
  /** Entities reachable in the FROM clause, base first. */
  sources: readonly EntityMetadata[];
  joins: readonly JoinClause[];
  where: readonly Predicate[];
  orderBy: readonly string[];
  limit?: number;
  offset?: number;
}

export function selectFrom(meta: EntityMetadata): SelectQuery {
  return { meta, projection: { kind: 'entity' }, sources: [meta], joins: [], where: [], orderBy: [] };
}

export function withPredicate(query: SelectQuery, predicate: Predicate): SelectQuery {
  return { ...query, where: [...query.where, predicate] };
}

export function withOrder(query: SelectQuery, clause: string): SelectQuery {
  return { ...query, orderBy: [...query.orderBy, clause] };
}

export function withLimit(query: SelectQuery, limit: number, offset?: number): SelectQuery {
  return { ...query, limit, offset };
}

export function withProjection(query: SelectQuery, projection: Projection): SelectQuery {
  return { ...query, projection };
}

export function quote(identifier: string): string {
  return `"${identifier}"`;
}

export function qualify(meta: EntityMetadata, column: ColumnMetadata): string {
  return `${quote(meta.tableName)}.${quote(column.column)}`;
}

/**
 * Compiles entity metadata and queries to SQLite SQL strings.
 * Encapsulates all SQL generation logic.
 */
export class SqliteCompiler {
  compileCreate(meta: EntityMetadata): string {
    const columns = meta.columns
      .map((col) => {
        let def = `${quote(col.column)} ${TYPE_MAP[col.type]}`;
        if (col.isPrimary) {
          def += col.type === 'Number' ? ' PRIMARY KEY AUTOINCREMENT' : ' PRIMARY KEY';
        } else {
          if (!col.nullable) def += ' NOT NULL';
          if (col.unique) def += ' UNIQUE';
        }
        if (col.default !== undefined) def += ` DEFAULT ${col.default}`;
        if (col.references) {
          def += ` REFERENCES ${quote(referencedTable(col))}`;
        }
        return def;
      })
      .join(', ');
    return `CREATE TABLE IF NOT EXISTS ${quote(meta.tableName)} (${columns})`;
  }

  compileInsert(meta: EntityMetadata, columns: readonly ColumnMetadata[]): string {
    if (columns.length === 0) {
      return `INSERT INTO ${quote(meta.tableName)} DEFAULT VALUES`;
    }
    const cols = columns.map((c) => quote(c.column)).join(', ');
    const placeholders = columns.map(() => '?').join(', ');
    return `INSERT INTO ${quote(meta.tableName)} (${cols}) VALUES (${placeholders})`;
  }

  compileUpdateById(meta: EntityMetadata, columns: readonly ColumnMetadata[]): string {
    const setClauses = columns.map((c) => `${quote(c.column)} = ?`).join(', ');
    return `UPDATE ${quote(meta.tableName)} SET ${setClauses} WHERE ${quote(meta.primaryKey.column)} = ?`;
  }

  compileDeleteById(meta: EntityMetadata): string {
    return `DELETE FROM ${quote(meta.tableName)} WHERE ${quote(meta.primaryKey.column)} = ?`;
  }

  compileSelectById(meta: EntityMetadata): string {
    return `SELECT * FROM ${quote(meta.tableName)} WHERE ${quote(meta.primaryKey.column)} = ?`;
  }

  compileUpdate(
    meta: EntityMetadata,
    assignments: ReadonlyArray<readonly [ColumnMetadata, SqlValue]>,
    where: readonly Predicate[],
  ): { sql: string; params: SqlValue[] } {
    const setClauses = assignments.map(([c]) => `${quote(c.column)} = ?`).join(', ');
    const params = assignments.map(([, value]) => value);
    const { clause, params: whereParams } = this.compileWhere(where);
    return {
      sql: `UPDATE ${quote(meta.tableName)} SET ${setClauses}${clause}`,
      params: [...params, ...whereParams],
    };
  }

  compileDelete(meta: EntityMetadata, where: readonly Predicate[]): { sql: string; params: SqlValue[] } {
    const { clause, params } = this.compileWhere(where);
    return { sql: `DELETE FROM ${quote(meta.tableName)}${clause}`, params };
  }

  compileSelect(query: SelectQuery): { sql: string; params: SqlValue[] } {
    const table = quote(query.meta.tableName);
    let sql = `SELECT ${this.compileProjection(query)} FROM ${table}`;

    for (const join of query.joins) {
      sql += ` ${join.kind} JOIN ${quote(join.table)} ON ${join.on}`;
    }

    const { clause, params } = this.compileWhere(query.where);
    sql += clause;

    if (query.orderBy.length > 0 && query.projection.kind !== 'count') {
      sql += ` ORDER BY ${query.orderBy.join(', ')}`;
    }
    if (query.limit !== undefined) {
      sql += ` LIMIT ${Math.trunc(query.limit)}`;
      if (query.offset !== undefined) sql += ` OFFSET ${Math.trunc(query.offset)}`;
    }

    return { sql, params };
  }

  private compileProjection(query: SelectQuery): string {
    const { projection, meta } = query;
    switch (projection.kind) {
      case 'entity':
        return `${quote(meta.tableName)}.*`;
      case 'count':
        return `COUNT(${qualify(meta, meta.primaryKey)}) AS count`;
      case 'exists':
        return qualify(meta, meta.primaryKey);
      case 'distinct':
        return `DISTINCT ${qualify(meta, projection.column)} AS value`;
    }
  }

  private compileWhere(where: readonly Predicate[]): { clause: string; params: SqlValue[] } {
    if (where.length === 0) return { clause: '', params: [] };
    return {
      clause: ` WHERE ${where.map((p) => p.sql).join(' AND ')}`,
      params: where.flatMap((p) => p.params),
    };
  }
}

function referencedTable(column: ColumnMetadata): string {
  const target = column.references?.();
  return target ? getTableName(target) : '';
}

/**
 * Normalize a JavaScript value before binding it to better-sqlite3.
 */
export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
  if (Buffer.isBuffer(value)) return value;
  throw new ValidationError(`Unsupported value of type ${typeof value} for a SQL parameter`);
}

/**
 * Normalize a property value for its column, using VALUE_CONVERTERS from types.ts.
 */
export function toColumnValue(column: ColumnMetadata, value: unknown): SqlValue {
  const converter = VALUE_CONVERTERS[column.type];
  return toSqlValue(converter && value != null ? converter.toDb(value) : value);
}

/**
 * Hydrate a stored value back to its property type.
 */
export function fromColumnValue(column: ColumnMetadata, value: SqlValue): unknown {
  const converter = VALUE_CONVERTERS[column.type];
  return converter && value !== null ? converter.fromDb(value) : value;
}

/**
 * Copy a row's columns onto an instance. Columns missing from the row are left untouched.
 */
export function readRow(meta: EntityMetadata, row: Row, instance: object): void {
  for (const column of meta.columns) {
    if (column.column in row) {
      writeField(instance, column.property, fromColumnValue(column, row[column.column]));
    }
  }
}

/**
 * The stored form of every column of an entity.
 */
export function snapshotOf(meta: EntityMetadata, entity: object): Row {
  const snapshot: Row = {};
  for (const column of meta.columns) {
    snapshot[column.column] = toColumnValue(column, readField(entity, column.property));
  }
  return snapshot;
}

export function sameSqlValue(a: SqlValue, b: SqlValue): boolean {
  if (Buffer.isBuffer(a) && Buffer.isBuffer(b)) return a.equals(b);
  return a === b;
}
