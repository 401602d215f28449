/**
 * Test suite for DataSource
 */

import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { DataSource } from '../src/data-source';
import { Repository } from '../src/repository';
import { DatabaseError, ImplementationError } from '../src/errors';
import { Grade } from '../src/classrooms/grade.entity';
import { Section } from '../src/classrooms/section.entity';

const TABLES_SQL = "SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('grades', 'sections') ORDER BY name";

describe('DataSource', () => {
  let dataSource: DataSource | undefined;

  afterEach(async () => {
    await dataSource?.destroy();
    dataSource = undefined;
    jest.restoreAllMocks();
  });

  it('creates missing tables when synchronizing', async () => {
    dataSource = await new DataSource({ dbPath: ':memory:', entities: [Grade, Section], synchronize: true }).initialize();

    expect(await dataSource.manager.all(TABLES_SQL)).toEqual([{ name: 'grades' }, { name: 'sections' }]);
  });

  it('leaves the schema alone without synchronize', async () => {
    dataSource = await new DataSource({ dbPath: ':memory:', entities: [Grade, Section] }).initialize();

    expect(await dataSource.manager.all(TABLES_SQL)).toEqual([]);
  });

  it('initializes once', async () => {
    dataSource = new DataSource({ dbPath: ':memory:', entities: [Grade] });

    const first = await dataSource.initialize();
    const manager = first.manager;

    expect(await dataSource.initialize()).toBe(first);
    expect(dataSource.manager).toBe(manager);
    expect(dataSource.isInitialized).toBe(true);
  });

  it('refuses access before initialize and after destroy', async () => {
    dataSource = new DataSource({ dbPath: ':memory:', entities: [Grade] });
    expect(() => dataSource?.manager).toThrow(ImplementationError);

    await dataSource.initialize();
    await dataSource.destroy();

    expect(dataSource.isInitialized).toBe(false);
    expect(() => dataSource?.getRepository(Grade)).toThrow('DataSource not initialized. Call .initialize() first.');
  });

  it('hands out one cached repository per entity', async () => {
    dataSource = await new DataSource({ dbPath: ':memory:', entities: [Grade], synchronize: true }).initialize();

    const repository = dataSource.getRepository(Grade);

    expect(repository).toBeInstanceOf(Repository);
    expect(dataSource.getRepository(Grade)).toBe(repository);
    expect(await repository.count()).toBe(0);
  });

  it('rolls back an open transaction on destroy', async () => {
    dataSource = await new DataSource({ dbPath: ':memory:', entities: [Grade], synchronize: true }).initialize();
    const manager = dataSource.manager;
    const rollback = jest.spyOn(manager, 'rollback');
    await manager.run("INSERT INTO grades (grade_name) VALUES ('1°')");

    await dataSource.destroy();

    expect(rollback).toHaveBeenCalledTimes(1);
  });

  it('wraps a connection failure', async () => {
    const error = await new DataSource({ dbPath: '/nonexistent-directory/classroom.db', entities: [Grade] })
      .initialize()
      .then(
        () => undefined,
        (rejection: unknown) => rejection,
      );

    expect(error).toBeInstanceOf(DatabaseError);
    expect(error).toMatchObject({
      message: 'Failed to initialize DataSource',
      instance: 'DataSource.initialize',
    });
  });

  it('logs connection and schema events when logging is on', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    dataSource = await new DataSource({
      dbPath: ':memory:',
      entities: [Grade, Section],
      synchronize: true,
      logging: true,
    }).initialize();

    expect(log).toHaveBeenCalledWith('[DataSource] Connected to :memory:');
    expect(log).toHaveBeenCalledWith('[DataSource] Created table: grades');
    expect(log).toHaveBeenCalledWith('[DataSource] Created table: sections');
    expect(log).toHaveBeenCalledWith('[DataSource] Schema synchronized');
  });
});
