/**
 * Console logging with a bracketed prefix, e.g. `[DataSource] Connected to app.db`.
 *
 * Level `undefined` is silent, `INFO` prints info and error lines, `DEBUG`
 * prints everything.
 */

export type LogLevel = 'DEBUG' | 'INFO';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(prefix: string, level?: LogLevel): Logger {
  return {
    debug(message) {
      if (level === 'DEBUG') {
        console.log(`${prefix} ${message}`);
      }
    },
    info(message) {
      if (level) {
        console.log(`${prefix} ${message}`);
      }
    },
    error(message, error) {
      if (!level) return;
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}:`, error instanceof Error ? error.message : String(error));
      }
    },
  };
}
