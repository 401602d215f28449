/**
 * Field validation and condition building shared by every repository.
 *
 * Callers hand us field names they got from somewhere else (query strings,
 * service code), so every name is checked against the entity's @Column
 * registry before it reaches SQL.
 */

import type { ColumnMetadata, EntityClass, EntityMetadata, WhereConditions } from './types';
import { JoinType } from './types';
import { getEntityMetadata } from './decorators';
import { ImplementationError, InvalidFieldError } from './errors';
import { isCondition } from './type-guards';
import { Predicate, SelectQuery, qualify, quote, toColumnValue, withPredicate } from './sqlite-dialect';

/**
 * Throws InvalidFieldError if any key of `fields` is not a declared column
 * property of the entity. The error lists every valid field name.
 */
export function validateFields(entity: EntityClass | EntityMetadata, fields: Record<string, unknown>): void {
  const meta = typeof entity === 'function' ? getEntityMetadata(entity) : entity;
  for (const key of Object.keys(fields)) {
    if (!meta.fieldNames.has(key)) {
      throw new InvalidFieldError(`Field '${key}' does not exist in the ${meta.target.name} model`, {
        details: `Valid fields are: ${[...meta.fieldNames].sort().join(', ')}`,
      });
    }
  }
}

/**
 * Validate a single field name and return its column.
 */
export function columnOf(meta: EntityMetadata, field: string): ColumnMetadata {
  validateFields(meta, { [field]: null });
  const column = meta.columns.find((c) => c.property === field);
  if (!column) {
    throw new ImplementationError(`Field '${field}' is registered on ${meta.target.name} without a column`);
  }
  return column;
}

/**
 * Append JOIN clauses in the given order. The ON clause follows a `references`
 * column: either the joined entity points at an entity already in the query,
 * or an entity already in the query points at the joined one.
 */
export function applyJoins(
  query: SelectQuery,
  joins: readonly EntityClass[] = [],
  joinType: JoinType = JoinType.INNER,
): SelectQuery {
  let result = query;
  for (const target of joins) {
    const joined = getEntityMetadata(target);
    result = {
      ...result,
      sources: [...result.sources, joined],
      joins: [
        ...result.joins,
        {
          kind: joinType === JoinType.LEFT_OUTER ? 'LEFT OUTER' : 'INNER',
          table: joined.tableName,
          on: joinCondition(result.sources, joined),
        },
      ],
    };
  }
  return result;
}

function joinCondition(sources: readonly EntityMetadata[], joined: EntityMetadata): string {
  for (const source of sources) {
    const outgoing = joined.columns.find((c) => c.references?.() === source.target);
    if (outgoing) {
      return `${qualify(joined, outgoing)} = ${qualify(source, source.primaryKey)}`;
    }
    const incoming = source.columns.find((c) => c.references?.() === joined.target);
    if (incoming) {
      return `${qualify(source, incoming)} = ${qualify(joined, joined.primaryKey)}`;
    }
  }
  throw new ImplementationError(
    `No relationship between ${joined.target.name} and ${sources.map((s) => s.target.name).join(', ')}`,
    { details: `Declare a column with 'references' on one side to join ${quote(joined.tableName)}` },
  );
}

/**
 * Equality predicate for one column. `null` compares with IS NULL.
 */
export function equals(meta: EntityMetadata, column: ColumnMetadata, value: unknown): Predicate {
  const sqlValue = toColumnValue(column, value);
  if (sqlValue === null) {
    return { sql: `${qualify(meta, column)} IS NULL`, params: [] };
  }
  return { sql: `${qualify(meta, column)} = ?`, params: [sqlValue] };
}

export function inList(
  meta: EntityMetadata,
  column: ColumnMetadata,
  values: readonly unknown[],
  negate = false,
): Predicate {
  if (values.length === 0) {
    return { sql: negate ? '1 = 1' : '1 = 0', params: [] };
  }
  const placeholders = values.map(() => '?').join(', ');
  return {
    sql: `${qualify(meta, column)} ${negate ? 'NOT IN' : 'IN'} (${placeholders})`,
    params: values.map((v) => toColumnValue(column, v)),
  };
}

export function compare(
  meta: EntityMetadata,
  column: ColumnMetadata,
  operator: '>' | '>=' | '<' | '<=' | '!=' | 'LIKE',
  value: unknown,
): Predicate {
  return { sql: `${qualify(meta, column)} ${operator} ?`, params: [toColumnValue(column, value)] };
}

/**
 * Equality filters (`field = value`) after validating every field name.
 */
export function applyFilters(query: SelectQuery, filters: Record<string, unknown> = {}): SelectQuery {
  validateFields(query.meta, filters);
  let result = query;
  for (const [field, value] of Object.entries(filters)) {
    result = withPredicate(result, equals(query.meta, columnOf(query.meta, field), value));
  }
  return result;
}

const OPERATORS = [
  ['gt', '>'],
  ['gte', '>='],
  ['lt', '<'],
  ['lte', '<='],
  ['like', 'LIKE'],
  ['ne', '!='],
] as const;

/**
 * Apply declarative WHERE conditions. Per field, in insertion order:
 * - array → IN (...)
 * - {@link Condition} object → each present operator, in the order gt, gte, lt, lte, like, ne
 * - anything else → equality
 *
 * Every predicate is ANDed.
 */
export function applyWhereConditions(
  query: SelectQuery,
  entity: EntityClass | EntityMetadata,
  conditions?: WhereConditions,
): SelectQuery {
  if (!conditions) return query;

  const meta = typeof entity === 'function' ? getEntityMetadata(entity) : entity;
  validateFields(meta, conditions);

  let result = query;
  for (const [field, value] of Object.entries(conditions)) {
    const column = columnOf(meta, field);
    if (Array.isArray(value)) {
      result = withPredicate(result, inList(meta, column, value));
    } else if (isCondition(value)) {
      for (const [key, operator] of OPERATORS) {
        if (key in value) {
          result = withPredicate(result, compare(meta, column, operator, value[key]));
        }
      }
    } else {
      result = withPredicate(result, equals(meta, column, value));
    }
  }
  return result;
}
