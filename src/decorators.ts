/**
 * Decorators for defining entity metadata.
 * These decorators use reflect-metadata to store schema information on the entity class.
 *
 * Decorators are purely declarative. They don't execute queries; they annotate
 * classes with the table, columns and field registry that the repository reads.
 */

import 'reflect-metadata';
import {
  TABLE_KEY,
  COLUMN_KEY,
  PRIMARY_KEY,
  ColumnMetadata,
  ColumnOptions,
  EntityClass,
  EntityMetadata,
  SupportedType,
} from './types';
import { ImplementationError } from './errors';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const SUPPORTED_TYPES: readonly SupportedType[] = ['String', 'Number', 'Boolean', 'Date', 'Buffer', 'Object'];

function toSupportedType(name: string): SupportedType {
  return SUPPORTED_TYPES.find((t) => t === name) ?? 'Object';
}

/**
 * Entity decorator maps a class to a database table.
 *
 * @example
 * ```typescript
 * @Entity("grades")
 * class Grade {
 *   @Column({ primary: true })
 *   id!: number;
 * }
 * ```
 */
export function Entity(tableName: string): ClassDecorator {
  return (target: Function) => {
    if (!tableName || tableName.trim().length === 0) {
      throw new Error(`Entity decorator requires a non-empty table name.`);
    }

    if (!IDENTIFIER.test(tableName)) {
      throw new Error(
        `Invalid table name "${tableName}". Must start with letter or underscore and contain only alphanumeric characters and underscores.`,
      );
    }

    Reflect.defineMetadata(TABLE_KEY, tableName, target);
  };
}

/**
 * Column decorator maps a property to a database column and registers the
 * property as a valid field name for filters, ordering and updates.
 *
 * The runtime type comes from emitDecoratorMetadata. Nullable or union-typed
 * properties are reported as Object, so pass `type` explicitly for those.
 *
 * @example
 * ```typescript
 * @Column({ name: "grade_name", unique: true })
 * gradeName!: string;
 *
 * @Column({ name: "updated_at", type: Date, nullable: true })
 * updatedAt!: Date | null;
 * ```
 */
export function Column(options: ColumnOptions | string = {}): PropertyDecorator {
  const opts: ColumnOptions = typeof options === 'string' ? { name: options } : options;

  return (target: object, propertyKey: string | symbol) => {
    if (typeof propertyKey === 'symbol') {
      throw new Error(`@Column cannot decorate symbol property ${String(propertyKey)}.`);
    }

    const designType: unknown = Reflect.getMetadata('design:type', target, propertyKey);
    const typeName = opts.type?.name ?? (typeof designType === 'function' ? designType.name : undefined);

    if (!typeName) {
      throw new Error(
        `@Column on ${propertyKey} failed to detect type. Ensure emitDecoratorMetadata is enabled in tsconfig.json`,
      );
    }

    const column = opts.name ?? propertyKey;
    if (!IDENTIFIER.test(column)) {
      throw new Error(`Invalid column name "${column}" on ${propertyKey}.`);
    }

    const existing: ColumnMetadata[] = Reflect.getMetadata(COLUMN_KEY, target.constructor) ?? [];
    const isPrimary = opts.primary ?? false;

    Reflect.defineMetadata(
      COLUMN_KEY,
      [
        ...existing,
        {
          property: propertyKey,
          column,
          type: toSupportedType(typeName),
          isPrimary,
          nullable: opts.nullable ?? !isPrimary,
          unique: opts.unique ?? false,
          default: opts.default,
          references: opts.references,
        },
      ],
      target.constructor,
    );

    if (isPrimary) {
      Reflect.defineMetadata(PRIMARY_KEY, propertyKey, target.constructor);
    }
  };
}

/**
 * Extract the table name from an entity class.
 *
 * @throws Error if entity is not decorated with @Entity
 */
export function getTableName(entity: Function): string {
  const table: unknown = Reflect.getMetadata(TABLE_KEY, entity);
  if (typeof table !== 'string') {
    throw new ImplementationError(`Entity ${entity.name} is missing @Entity decorator or has no metadata.`);
  }
  return table;
}

/**
 * Extract column metadata from an entity class.
 *
 * @throws Error if entity has no columns
 */
export function getColumnMetadata(entity: Function): ColumnMetadata[] {
  const columns: ColumnMetadata[] | undefined = Reflect.getMetadata(COLUMN_KEY, entity);
  if (!columns || columns.length === 0) {
    throw new ImplementationError(`Entity ${entity.name} has no @Column decorators defined.`);
  }
  return columns;
}

/**
 * Get the primary key property for an entity, or undefined if not marked.
 */
export function getPrimaryKey(entity: Function): string | undefined {
  const key: unknown = Reflect.getMetadata(PRIMARY_KEY, entity);
  return typeof key === 'string' ? key : undefined;
}

export function isEntityClass(value: unknown): value is EntityClass {
  return typeof value === 'function' && Reflect.hasMetadata(TABLE_KEY, value);
}

const metadataCache = new WeakMap<Function, EntityMetadata>();

/**
 * Resolve and cache the full metadata of an entity class.
 */
export function getEntityMetadata<T extends object>(entity: EntityClass<T>): EntityMetadata<T>;
export function getEntityMetadata(entity: Function): EntityMetadata;
export function getEntityMetadata(entity: Function): EntityMetadata {
  const cached = metadataCache.get(entity);
  if (cached) return cached;

  if (!isEntityClass(entity)) {
    throw new ImplementationError(`Entity ${entity.name} is missing @Entity decorator or has no metadata.`);
  }

  const columns = getColumnMetadata(entity);
  const primaryProperty = getPrimaryKey(entity);
  const primaryKey = columns.find((c) => c.property === primaryProperty);
  if (!primaryKey) {
    throw new ImplementationError(`Entity ${entity.name} has no primary key defined.`);
  }

  const metadata: EntityMetadata = {
    target: entity,
    tableName: getTableName(entity),
    columns,
    primaryKey,
    fieldNames: new Set(columns.map((c) => c.property)),
  };
  metadataCache.set(entity, metadata);
  return metadata;
}

export function readField(entity: object, property: string): unknown {
  return Reflect.get(entity, property);
}

export function writeField(entity: object, property: string, value: unknown): void {
  Reflect.set(entity, property, value);
}
