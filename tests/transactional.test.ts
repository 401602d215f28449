/**
 * Test suite for the transaction wrapper
 * Uses an in-process session that records what the wrapper asks of it
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { withTransaction, wrapError } from '../src/transactional';
import {
  ConflictError,
  DatabaseError,
  ImplementationError,
  NotFoundError,
  OperationTimeoutError,
  ServerError,
} from '../src/errors';
import type { TransactionalSession, TransactionSettings } from '../src/types';
import { SqliteAdapter } from '../src/adapter';
import { EntityManager } from '../src/entity-manager';
import type { App } from '../src/app';
import { Grade } from '../src/classrooms/grade.entity';
import { createTestApp, seedGrades } from './helpers/test-app';

class RecordingSession implements TransactionalSession {
  open = false;
  calls: string[] = [];

  inTransaction(): boolean {
    return this.open;
  }

  async begin(settings?: TransactionSettings): Promise<void> {
    this.calls.push(settings ? `begin ${JSON.stringify(settings)}` : 'begin');
    this.open = true;
  }

  async commit(): Promise<void> {
    this.calls.push('commit');
    this.open = false;
  }

  async rollback(): Promise<void> {
    this.calls.push('rollback');
    this.open = false;
  }

  async nested<R>(operation: () => Promise<R>): Promise<R> {
    this.calls.push('savepoint');
    try {
      const result = await operation();
      this.calls.push('release');
      return result;
    } catch (error) {
      this.calls.push('rollback to savepoint');
      throw error;
    }
  }

  async flush(): Promise<void> {
    this.calls.push('flush');
  }

  async configure(settings: TransactionSettings): Promise<void> {
    this.calls.push(`configure ${JSON.stringify(settings)}`);
  }

  expireAll(): void {
    this.calls.push('expire');
  }

  /** What any statement does on a real session: open a transaction if none is. */
  touch(): void {
    this.open = true;
  }
}

function storeError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('withTransaction', () => {
  let session: RecordingSession;

  beforeEach(() => {
    session = new RecordingSession();
  });

  describe('ownership', () => {
    it('begins and commits a root call', async () => {
      const result = await withTransaction(session, { root: true }, async () => 'done');

      expect(result).toBe('done');
      expect(session.calls).toEqual(['begin', 'commit']);
    });

    it('rolls back a root call and rethrows our own error unchanged', async () => {
      const conflict = new ConflictError('Grade with this name already exists.');

      await expect(
        withTransaction(session, { root: true }, async () => {
          throw conflict;
        }),
      ).rejects.toBe(conflict);
      expect(session.calls).toEqual(['begin', 'rollback']);
    });

    it('commits a transaction the operation opened', async () => {
      await withTransaction(session, {}, async () => session.touch());

      expect(session.calls).toEqual(['commit']);
    });

    it('commits a read that opened a transaction', async () => {
      await withTransaction(session, { readonly: true }, async () => session.touch());

      expect(session.calls).toEqual(['commit']);
    });

    it('flushes without committing when the operation opened no transaction', async () => {
      await withTransaction(session, {}, async () => 1);

      expect(session.calls).toEqual(['flush']);
    });

    it('only flushes when joining an outer transaction', async () => {
      session.open = true;

      await withTransaction(session, {}, async () => 1);

      expect(session.calls).toEqual(['flush']);
      expect(session.open).toBe(true);
    });

    it('neither flushes nor commits when joining with autoFlush off', async () => {
      session.open = true;

      await withTransaction(session, { autoFlush: false }, async () => 1);

      expect(session.calls).toEqual([]);
    });

    it('joins instead of beginning when root is requested inside a transaction', async () => {
      session.open = true;

      await withTransaction(session, { root: true }, async () => 1);

      expect(session.calls).toEqual(['flush']);
    });

    it('leaves an outer transaction open when a joined call fails', async () => {
      session.open = true;

      await expect(
        withTransaction(session, {}, async () => {
          throw new NotFoundError('Grade not found.');
        }),
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(session.calls).toEqual([]);
      expect(session.open).toBe(true);
    });

    it('resolves the session of an object that owns one', async () => {
      await withTransaction({ manager: session }, { root: true }, async () => 1);

      expect(session.calls).toEqual(['begin', 'commit']);
    });
  });

  describe('savepoints', () => {
    it('runs inside a savepoint when a transaction is open', async () => {
      session.open = true;

      await withTransaction(session, { savepoint: true }, async () => 1);

      expect(session.calls).toEqual(['savepoint', 'release', 'flush']);
    });

    it('rolls back only the savepoint when the operation fails', async () => {
      session.open = true;

      await expect(
        withTransaction(session, { savepoint: true }, async () => {
          throw new ConflictError('duplicate');
        }),
      ).rejects.toBeInstanceOf(ConflictError);
      expect(session.calls).toEqual(['savepoint', 'rollback to savepoint']);
      expect(session.open).toBe(true);
    });

    it('ignores savepoint without an open transaction', async () => {
      await withTransaction(session, { savepoint: true }, async () => session.touch());

      expect(session.calls).toEqual(['commit']);
    });
  });

  describe('settings', () => {
    it('begins a root transaction with its isolation', async () => {
      await withTransaction(session, { root: true, isolation: 'IMMEDIATE' }, async () => 1);

      expect(session.calls).toEqual(['begin {"isolation":"IMMEDIATE","readOnly":false}', 'commit']);
    });

    it('begins a read-only transaction', async () => {
      await withTransaction(session, { root: true, readonlyTx: true }, async () => 1);

      expect(session.calls[0]).toBe('begin {"readOnly":true}');
    });

    it('opens and owns a transaction for settings when none is open', async () => {
      await withTransaction(session, { readonlyTx: true }, async () => 'cached');

      expect(session.calls).toEqual(['begin {"readOnly":true}', 'commit']);
    });

    it('applies settings to the open transaction when joining', async () => {
      session.open = true;

      await withTransaction(session, { isolation: 'EXCLUSIVE' }, async () => 1);

      expect(session.calls).toEqual(['configure {"isolation":"EXCLUSIVE","readOnly":false}', 'flush']);
    });

    it('expires cached instances after success when asked', async () => {
      await withTransaction(session, { root: true, expireOnEnd: true }, async () => 1);

      expect(session.calls).toEqual(['begin', 'commit', 'expire']);
    });
  });

  describe('retries', () => {
    it('retries a deadlock-class error and returns the later result', async () => {
      const busy = storeError('database is locked', 'SQLITE_BUSY');
      const operation = jest
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(busy)
        .mockRejectedValueOnce(busy)
        .mockResolvedValue('ok');

      await expect(withTransaction(session, { retries: 2 }, operation)).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('retries a store error whose message mentions a deadlock', async () => {
      const deadlock = storeError('deadlock detected', 'XX000');
      const operation = jest.fn<() => Promise<number>>().mockRejectedValueOnce(deadlock).mockResolvedValue(7);

      await expect(withTransaction(session, { retries: 1 }, operation)).resolves.toBe(7);
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('gives up after the last retry with a DatabaseError', async () => {
      const busy = storeError('database is locked', 'SQLITE_BUSY');
      const operation = jest.fn<() => Promise<number>>().mockRejectedValue(busy);

      await expect(withTransaction(session, { retries: 1, name: 'GradeRepository.save' }, operation)).rejects.toMatchObject({
        name: 'DatabaseError',
        message: 'Database error in GradeRepository.save',
        details: 'database is locked',
        instance: 'GradeRepository.save',
      });
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('does not retry other store errors', async () => {
      const unique = storeError('UNIQUE constraint failed: grades.grade_name', 'SQLITE_CONSTRAINT_UNIQUE');
      const operation = jest.fn<() => Promise<number>>().mockRejectedValue(unique);

      await expect(withTransaction(session, { retries: 3 }, operation)).rejects.toBeInstanceOf(DatabaseError);
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('timeout', () => {
    it('fails with OperationTimeoutError when the operation is too slow', async () => {
      const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 100));

      await expect(withTransaction(session, { timeout: 0.01, name: 'slow' }, slow)).rejects.toMatchObject({
        name: 'OperationTimeoutError',
        message: 'Operation exceeded 0.01s',
        timeoutSeconds: 0.01,
        instance: 'slow',
      });
    });

    it('returns the result of an operation that finishes in time', async () => {
      await expect(withTransaction(session, { timeout: 1 }, async () => 'fast')).resolves.toBe('fast');
    });

    it('rolls back a root call that timed out', async () => {
      const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 100));

      await expect(withTransaction(session, { root: true, timeout: 0.01 }, slow)).rejects.toBeInstanceOf(
        OperationTimeoutError,
      );
      expect(session.calls).toEqual(['begin', 'rollback']);
    });
  });

  describe('raiseOnEmpty', () => {
    it.each([[undefined], [null], [[]]])('fails with NotFoundError for %p', async (empty) => {
      await expect(
        withTransaction(session, { root: true, raiseOnEmpty: true, name: 'GradeRepository.getById' }, async () => empty),
      ).rejects.toMatchObject({
        name: 'NotFoundError',
        message: 'Entity not found',
        instance: 'GradeRepository.getById',
      });
      expect(session.calls).toEqual(['begin', 'rollback']);
    });

    it('accepts falsy values that are not empty', async () => {
      await expect(withTransaction(session, { raiseOnEmpty: true }, async () => 0)).resolves.toBe(0);
      await expect(withTransaction(session, { raiseOnEmpty: true }, async () => '')).resolves.toBe('');
    });
  });

  describe('audit', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('signals the label of an auditable call that committed', async () => {
      const onAudit = jest.fn<(label: string) => void>();

      const options = { root: true, auditable: true, onAudit, name: 'GradeService.create', tag: 'req-1' };
      await withTransaction(session, options, async () => 1);

      expect(onAudit).toHaveBeenCalledWith('GradeService.create[req-1]');
    });

    it('logs an audit line when no callback is given', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      await withTransaction(session, { root: true, auditable: true, name: 'GradeService.delete' }, async () => 1);

      expect(log).toHaveBeenCalledWith('[AUDIT] GradeService.delete committed');
    });

    it('does not audit a call that joined an outer transaction', async () => {
      const onAudit = jest.fn<(label: string) => void>();
      session.open = true;

      await withTransaction(session, { auditable: true, onAudit }, async () => 1);

      expect(onAudit).not.toHaveBeenCalled();
    });

    it('does not audit a failed call', async () => {
      const onAudit = jest.fn<(label: string) => void>();

      await expect(
        withTransaction(session, { root: true, auditable: true, onAudit }, async () => {
          throw new ConflictError('duplicate');
        }),
      ).rejects.toBeInstanceOf(ConflictError);
      expect(onAudit).not.toHaveBeenCalled();
    });
  });
});

describe('wrapError', () => {
  it('passes our own errors through', () => {
    const notFound = new NotFoundError('Grade not found.');
    expect(wrapError(notFound, 'x')).toBe(notFound);
  });

  it('wraps store errors as DatabaseError with the original as cause', () => {
    const original = storeError('no such table: grades', 'SQLITE_ERROR');
    const wrapped = wrapError(original, 'GradeRepository.getAll');

    expect(wrapped).toBeInstanceOf(DatabaseError);
    expect(wrapped.cause).toBe(original);
    expect(wrapped.details).toBe('no such table: grades');
  });

  it('wraps programming errors as ImplementationError', () => {
    expect(wrapError(new TypeError('x is not a function'), 'call')).toBeInstanceOf(ImplementationError);
  });

  it('wraps anything else as ServerError', () => {
    const wrapped = wrapError(new Error('boom'), 'call');

    expect(wrapped).toBeInstanceOf(ServerError);
    expect(wrapped).toMatchObject({
      message: 'An unexpected error occurred',
      details: 'boom',
      instance: 'call',
    });
    expect(wrapError('plain string', 'call').details).toBe('plain string');
  });
});

describe('withTransaction on an EntityManager', () => {
  let adapter: SqliteAdapter;
  let manager: EntityManager;

  beforeEach(() => {
    adapter = new SqliteAdapter({ filename: ':memory:' });
    manager = new EntityManager(adapter);
  });

  afterEach(() => {
    adapter.close();
  });

  it('begins with the requested isolation and commits', async () => {
    const exec = jest.spyOn(adapter, 'exec');

    await withTransaction(manager, { root: true, isolation: 'IMMEDIATE' }, async () => 1);

    expect(exec.mock.calls).toEqual([['BEGIN IMMEDIATE'], ['COMMIT']]);
    expect(manager.inTransaction()).toBe(false);
  });

  it('wraps a savepoint call in SAVEPOINT and RELEASE', async () => {
    const exec = jest.spyOn(adapter, 'exec');

    await withTransaction(manager, { root: true }, () => withTransaction(manager, { savepoint: true }, async () => 1));

    expect(exec.mock.calls).toEqual([['BEGIN DEFERRED'], ['SAVEPOINT sp_1'], ['RELEASE sp_1'], ['COMMIT']]);
  });

  it('leaves the next transaction at the default isolation after a joined call asked for another', async () => {
    await withTransaction(manager, { root: true }, () =>
      withTransaction(manager, { isolation: 'EXCLUSIVE' }, async () => 1),
    );
    const exec = jest.spyOn(adapter, 'exec');

    await withTransaction(manager, {}, () => manager.get('SELECT 1 AS one'));

    expect(exec.mock.calls).toEqual([['BEGIN DEFERRED'], ['COMMIT']]);
  });

  it('does not carry read-only over from a call that never touched the store', async () => {
    await manager.run('CREATE TABLE notes (body TEXT)');
    await manager.commit();

    await withTransaction(manager, { readonlyTx: true }, async () => 'cached');
    await withTransaction(manager, {}, () => manager.run("INSERT INTO notes VALUES ('z')"));

    expect(await manager.get('SELECT COUNT(*) AS n FROM notes')).toEqual({ n: 1 });
  });

  it('rejects writes in a read-only transaction and lifts the restriction afterwards', async () => {
    await manager.run('CREATE TABLE notes (body TEXT)');
    await manager.commit();

    await expect(
      withTransaction(manager, { root: true, readonlyTx: true }, () => manager.run("INSERT INTO notes VALUES ('x')")),
    ).rejects.toBeInstanceOf(DatabaseError);
    expect(manager.inTransaction()).toBe(false);

    await withTransaction(manager, { root: true }, () => manager.run("INSERT INTO notes VALUES ('y')"));
    expect(await manager.get('SELECT COUNT(*) AS n FROM notes')).toEqual({ n: 1 });
  });
});

describe('withTransaction on an application session', () => {
  let app: App;

  beforeEach(async () => {
    app = await createTestApp();
    await seedGrades(app, '1°', '2°', '3°');
  });

  afterEach(async () => {
    await app.close();
  });

  it('keeps staged inserts when a joined call expires cached instances', async () => {
    const manager = app.dataSource.manager;

    await withTransaction(app.dataSource, { root: true }, async () => {
      manager.add(new Grade({ gradeName: '4°' }));
      await withTransaction(app.dataSource, { autoFlush: false, expireOnEnd: true }, async () => 1);
    });

    expect(await app.gradeRepository.count()).toBe(4);
  });

  it('discards a write the call makes after its deadline', async () => {
    const late = withTransaction(app.dataSource, { root: true, timeout: 0.01, name: 'slowCreate' }, async () => {
      await sleep(50);
      return app.gradeRepository.save(new Grade({ gradeName: 'late' }));
    });

    await expect(late).rejects.toBeInstanceOf(OperationTimeoutError);
    await sleep(100);

    expect(await app.gradeRepository.count()).toBe(3);
    expect(await app.gradeRepository.existsBy({ gradeName: 'late' })).toBe(false);
  });

  it('rejects statements the call issues on the session after its deadline', async () => {
    const manager = app.dataSource.manager;
    let lateError: unknown;

    await expect(
      withTransaction(app.dataSource, { root: true, timeout: 0.01 }, async () => {
        await sleep(50);
        try {
          await manager.run("INSERT INTO grades (grade_name) VALUES ('late')");
        } catch (error) {
          lateError = error;
        }
      }),
    ).rejects.toBeInstanceOf(OperationTimeoutError);
    await sleep(100);

    expect(lateError).toBeInstanceOf(OperationTimeoutError);
    expect(manager.inTransaction()).toBe(false);
    expect(await app.gradeRepository.count()).toBe(3);
  });

  it('leaves later calls on the session unaffected', async () => {
    await expect(
      withTransaction(app.dataSource, { root: true, timeout: 0.01 }, () => sleep(50)),
    ).rejects.toBeInstanceOf(OperationTimeoutError);

    await app.gradeRepository.save(new Grade({ gradeName: '4°' }));

    expect(await app.gradeRepository.count()).toBe(4);
  });
});
