/**
 * Configuration helpers.
 *
 * - defineConfig(): define DataSource options with type safety
 * - env() / envFlag(): environment variable access with validation
 * - loadConfig(): the application's options, read from the environment
 *
 * Nothing loads a .env file automatically. Run with
 * `node --env-file=.env dist/main.js` or export the variables.
 */

import type { DataSourceOptions } from './types';
import type { LogLevel } from './logger';
import { ImplementationError } from './errors';
import { DEFAULT_BUSY_TIMEOUT_MS } from './adapter';

export const DEFAULT_DATABASE_URL = 'file:./classroom.db';

/**
 * Return the options unchanged after checking them.
 *
 * @example
 * ```typescript
 * export default defineConfig({
 *   dbPath: resolveDbPath(env('DATABASE_URL', 'file:./classroom.db')),
 *   entities: [Grade, Section],
 *   synchronize: envFlag('DB_SYNCHRONIZE', false),
 * })
 * ```
 */
export function defineConfig(options: DataSourceOptions): DataSourceOptions {
  validateConfig(options);
  return options;
}

/**
 * Read an environment variable. Throws if it is unset and no default is given.
 *
 * @example
 * ```typescript
 * const url = env('DATABASE_URL') // throws if not set
 * const url = env('DATABASE_URL', 'file:./classroom.db')
 * ```
 */
export function env(name: string, defaultValue?: string): string {
  const value = process.env[name];

  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ImplementationError(`Missing required environment variable: ${name}`, {
      details: `Please set ${name} or provide a default in your config.`,
      instance: 'config',
    });
  }

  return value;
}

const TRUE_VALUES: ReadonlySet<string> = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES: ReadonlySet<string> = new Set(['0', 'false', 'no', 'off']);

/**
 * Read a boolean environment variable (`1/true/yes/on`, `0/false/no/off`).
 */
export function envFlag(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return defaultValue;
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  throw new ImplementationError(`Invalid boolean in environment variable ${name}: "${raw}"`, {
    details: 'Use one of 1, true, yes, on, 0, false, no, off.',
    instance: 'config',
  });
}

/**
 * Read a non-negative integer environment variable.
 */
export function envInt(name: string, defaultValue: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return defaultValue;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ImplementationError(`Invalid integer in environment variable ${name}: "${raw}"`, { instance: 'config' });
  }
  return value;
}

/**
 * Turn a `file:` URL (`file:./classroom.db`, `file::memory:`) into a
 * better-sqlite3 filename. Other values are taken as paths already.
 */
export function resolveDbPath(url: string): string {
  const path = url.startsWith('file:') ? url.slice('file:'.length) : url;
  if (path.length === 0) {
    throw new ImplementationError(`Invalid database URL: "${url}"`, { instance: 'config' });
  }
  return path;
}

export interface AppConfig {
  dbPath: string;
  logging: boolean;
  synchronize: boolean;
  busyTimeout: number;
  /** Log level of every repository's transaction wrapper. */
  logLevel?: LogLevel;
}

export function loadConfig(): AppConfig {
  const logging = envFlag('DB_LOGGING', false);
  return {
    dbPath: resolveDbPath(env('DATABASE_URL', DEFAULT_DATABASE_URL)),
    logging,
    synchronize: envFlag('DB_SYNCHRONIZE', true),
    busyTimeout: envInt('DB_BUSY_TIMEOUT_MS', DEFAULT_BUSY_TIMEOUT_MS),
    logLevel: logging ? 'INFO' : undefined,
  };
}

function validateConfig(options: DataSourceOptions): void {
  if (!options.dbPath) {
    throw new ImplementationError('DataSourceOptions.dbPath is required.', {
      details: 'Example: { dbPath: "classroom.db", entities: [Grade] }',
      instance: 'config',
    });
  }

  if (!options.entities || options.entities.length === 0) {
    throw new ImplementationError('DataSourceOptions.entities is required and must not be empty.', {
      details: 'Example: { dbPath: "classroom.db", entities: [Grade, Section] }',
      instance: 'config',
    });
  }
}
