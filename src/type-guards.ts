import type { Condition, Row, SqlValue } from './types';

/**
 * Runtime checks used at I/O boundaries: rows coming back from the driver,
 * condition objects coming in from callers, and errors thrown by the store.
 */

export function isSqlValue(value: unknown): value is SqlValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    Buffer.isBuffer(value)
  );
}

/**
 * @example
 *   const row: unknown = stmt.get(id);
 *   if (isRow(row)) { // row is Record<string, SqlValue> }
 */
export function isRow(value: unknown): value is Row {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(isSqlValue);
}

const CONDITION_KEYS: ReadonlySet<string> = new Set(['gt', 'gte', 'lt', 'lte', 'like', 'ne']);

/**
 * A plain object literal, as opposed to a Date, Buffer, array or class instance.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isCondition(value: unknown): value is Condition {
  return isPlainObject(value) && Object.keys(value).every((key) => CONDITION_KEYS.has(key));
}

export interface StoreError extends Error {
  code: string;
}

/**
 * An error raised by the database driver: SQLite result codes (`SQLITE_*`)
 * or five-character SQLSTATE codes from server databases.
 */
export function isStoreError(error: unknown): error is StoreError {
  if (!(error instanceof Error) || !('code' in error)) return false;
  const { code } = error;
  return typeof code === 'string' && (code.startsWith('SQLITE_') || /^[0-9A-Z]{5}$/.test(code));
}

const DEADLOCK_CODES: readonly string[] = ['SQLITE_BUSY', 'SQLITE_LOCKED', '40P01', '40001'];

/**
 * Lock contention the caller may retry: SQLITE_BUSY / SQLITE_LOCKED and their
 * extended codes, PostgreSQL deadlock and serialization failures, or any
 * store error whose message mentions a deadlock.
 */
export function isDeadlockError(error: unknown): error is StoreError {
  if (!isStoreError(error)) return false;
  if (DEADLOCK_CODES.some((code) => error.code === code || error.code.startsWith(`${code}_`))) {
    return true;
  }
  return error.message.toLowerCase().includes('deadlock');
}
