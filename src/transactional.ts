/**
 * Transaction wrapper for data-access calls.
 *
 * `withTransaction` runs an operation against a session and decides, from the
 * session's state when the call starts, whether this call owns the
 * transaction (and commits or rolls it back) or joins an outer one (and only
 * flushes).
 *
 * @example
 * ```typescript
 * await withTransaction(gradeRepository, { root: true, name: 'GradeService.create' }, async () => {
 *   if (await gradeRepository.existsBy({ gradeName })) throw new ConflictError('Grade already exists');
 *   return gradeRepository.save(new Grade({ gradeName }));
 * });
 * ```
 */

import type { IsolationLevel, SessionSource, TransactionalSession } from './types';
import {
  AppError,
  DatabaseError,
  ImplementationError,
  NotFoundError,
  OperationTimeoutError,
  ServerError,
} from './errors';
import { isDeadlockError, isStoreError } from './type-guards';
import { runInScope, throwIfCancelled } from './call-scope';
import { createLogger, Logger, LogLevel } from './logger';

export interface TransactionOptions {
  /** The operation only reads. Reads still commit a transaction they opened. */
  readonly?: boolean;
  /** Own the transaction: begin before the operation, commit after it. */
  root?: boolean;
  isolation?: IsolationLevel;
  /** Reject writes for the rest of the transaction. */
  readonlyTx?: boolean;
  /** Seconds before the call fails with OperationTimeoutError. */
  timeout?: number;
  /** Extra attempts after a deadlock-class store error. */
  retries?: number;
  /** Run inside a SAVEPOINT when a transaction is already open. */
  savepoint?: boolean;
  /** Flush when joining an outer transaction. Defaults to true. */
  autoFlush?: boolean;
  logLevel?: LogLevel;
  /** Appended to the call label, e.g. a request id. */
  tag?: string;
  /** Forget cached instances after success. */
  expireOnEnd?: boolean;
  /** Emit an audit signal when this call committed. */
  auditable?: boolean;
  onAudit?: (label: string) => void;
  /** Fail with NotFoundError when the operation returns undefined, null or []. */
  raiseOnEmpty?: boolean;
  /** Caller identity used in logs and error instances, e.g. `GradeRepository.save`. */
  name?: string;
}

export function resolveSession(source: SessionSource): TransactionalSession {
  return 'manager' in source ? source.manager : source;
}

export async function withTransaction<R>(
  source: SessionSource,
  options: TransactionOptions,
  operation: () => Promise<R>,
): Promise<R> {
  const {
    readonly = false,
    root = false,
    isolation,
    readonlyTx = false,
    savepoint = false,
    autoFlush = true,
    expireOnEnd = false,
    auditable = false,
  } = options;

  throwIfCancelled();

  const session = resolveSession(source);
  const label = options.tag ? `${options.name ?? 'transaction'}[${options.tag}]` : (options.name ?? 'transaction');
  const log = createLogger('[TX]', options.logLevel);

  const txBefore = session.inTransaction();
  log.debug(`Enter ${label} | root=${root} readonly=${readonly} | txBefore=${txBefore}`);

  const settings = isolation || readonlyTx ? { isolation, readOnly: readonlyTx } : undefined;
  if (isolation) log.info(`Isolation → ${isolation}`);
  if (readonlyTx) log.info('READ ONLY');

  const execute = (): Promise<R> => runWithRetries(operation, options, label, log);

  try {
    let result: R;
    let owner: boolean;

    if (root && !txBefore) {
      log.info(`Begin ROOT ${label}`);
      await session.begin(settings);
      result = await execute();
      await session.commit();
      log.info(`ROOT commit ${label}`);
      owner = true;
    } else {
      if (settings) {
        // Settings bind to a transaction: this call's own, or the open one.
        if (txBefore) {
          await session.configure(settings);
        } else {
          await session.begin(settings);
        }
      }

      if (savepoint && txBefore) {
        log.info('SAVEPOINT start');
        result = await session.nested(execute);
      } else {
        result = await execute();
      }

      owner = !txBefore && session.inTransaction();
      if (owner) {
        log.info(readonly ? 'Read-only → COMMIT' : 'COMMIT');
        await session.commit();
      } else if (autoFlush) {
        log.debug(readonly ? 'Read-only → FLUSH' : 'Flush outer tx');
        await session.flush();
      }
    }

    if (expireOnEnd) {
      session.expireAll();
      log.debug('Objects expired');
    }
    if (auditable && owner) {
      audit(label, options.onAudit);
    }

    log.debug(`${label} finished`);
    return result;
  } catch (error) {
    if (!txBefore && session.inTransaction()) {
      log.info('ROLLBACK');
      await rollbackQuietly(session, log);
    }
    log.error(`${label} error`, error);
    throw wrapError(error, label);
  }
}

async function runWithRetries<R>(
  operation: () => Promise<R>,
  options: TransactionOptions,
  label: string,
  log: Logger,
): Promise<R> {
  const retries = Math.max(0, options.retries ?? 0);
  for (let attempt = 0; ; attempt++) {
    try {
      if (attempt > 0) log.info(`Retry ${attempt}/${retries}`);
      return await runWithTimeout(operation, options, label, log);
    } catch (error) {
      if (attempt >= retries || !isDeadlockError(error)) {
        throw error;
      }
      await yieldToScheduler();
    }
  }
}

async function runWithTimeout<R>(
  operation: () => Promise<R>,
  options: TransactionOptions,
  label: string,
  log: Logger,
): Promise<R> {
  const body = async (): Promise<R> => {
    const start = performance.now();
    try {
      const result = await operation();
      if (options.raiseOnEmpty && isEmpty(result)) {
        throw new NotFoundError('Entity not found', { details: `${label} returned no result`, instance: label });
      }
      return result;
    } finally {
      log.debug(`Body took ${((performance.now() - start) / 1000).toFixed(4)}s`);
    }
  };

  if (options.timeout === undefined) {
    return body();
  }
  log.info(`Timeout ${options.timeout}s`);
  return withTimeout(body, options.timeout, label);
}

/**
 * Run an operation against a deadline. When the deadline passes the caller
 * gets OperationTimeoutError at once, and the operation's scope is aborted:
 * its later session statements and transactional calls throw the same error.
 */
export async function withTimeout<R>(operation: () => Promise<R>, seconds: number, instance: string): Promise<R> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new OperationTimeoutError(seconds, { instance });
      controller.abort(error);
      reject(error);
    }, seconds * 1000);
  });
  try {
    return await Promise.race([runInScope(controller.signal, operation), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function yieldToScheduler(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function isEmpty(value: unknown): boolean {
  return value === undefined || value === null || (Array.isArray(value) && value.length === 0);
}

function audit(label: string, onAudit?: (label: string) => void): void {
  if (onAudit) {
    onAudit(label);
  } else {
    console.log(`[AUDIT] ${label} committed`);
  }
}

async function rollbackQuietly(session: TransactionalSession, log: Logger): Promise<void> {
  try {
    await session.rollback();
  } catch (rollbackError) {
    log.error('Rollback failed', rollbackError);
  }
}

/**
 * Wrap a thrown value once. Errors from this package pass through as they are.
 */
export function wrapError(error: unknown, instance: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (isStoreError(error)) {
    return new DatabaseError(`Database error in ${instance}`, { details: error.message, instance, cause: error });
  }
  if (error instanceof TypeError || error instanceof ReferenceError) {
    return new ImplementationError(error.message, { instance, cause: error });
  }
  return new ServerError('An unexpected error occurred', {
    details: error instanceof Error ? error.message : String(error),
    instance,
    cause: error,
  });
}
