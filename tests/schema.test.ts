/**
 * Test suite for entity decorators and schema compilation
 */

import { describe, it, expect } from '@jest/globals';
import { Column, Entity, getEntityMetadata, getPrimaryKey, getTableName } from '../src/decorators';
import { SqliteCompiler } from '../src/sqlite-dialect';
import { ImplementationError } from '../src/errors';
import { Grade } from '../src/classrooms/grade.entity';
import { Section } from '../src/classrooms/section.entity';

const compiler = new SqliteCompiler();

describe('decorators', () => {
  it('registers table, columns and field names', () => {
    const meta = getEntityMetadata(Section);

    expect(meta.tableName).toBe('sections');
    expect(meta.primaryKey.column).toBe('id');
    expect(meta.columns.map((c) => c.column)).toEqual([
      'id',
      'section_name',
      'grade_id',
      'active',
      'deleted',
      'created_at',
      'updated_at',
    ]);
    expect([...meta.fieldNames]).toEqual([
      'id',
      'sectionName',
      'gradeId',
      'active',
      'deleted',
      'createdAt',
      'updatedAt',
    ]);
  });

  it('records the runtime type of each column', () => {
    const types = Object.fromEntries(getEntityMetadata(Section).columns.map((c) => [c.property, c.type]));

    expect(types).toEqual({
      id: 'Number',
      sectionName: 'String',
      gradeId: 'Number',
      active: 'Boolean',
      deleted: 'Boolean',
      createdAt: 'Date',
      updatedAt: 'Date',
    });
  });

  it('exposes table name and primary key', () => {
    expect(getTableName(Grade)).toBe('grades');
    expect(getPrimaryKey(Grade)).toBe('id');
  });

  it('rejects an invalid table name', () => {
    expect(() => Entity('bad name')(class {})).toThrow('Invalid table name "bad name"');
  });

  it('rejects an undecorated class', () => {
    class Plain {}
    expect(() => getEntityMetadata(Plain)).toThrow(ImplementationError);
  });

  it('rejects an entity without a primary key', () => {
    @Entity('notes')
    class Note {
      @Column()
      body!: string;
    }

    expect(() => getEntityMetadata(Note)).toThrow('Entity Note has no primary key defined.');
  });
});

describe('SqliteCompiler.compileCreate', () => {
  it('creates the grades table', () => {
    expect(compiler.compileCreate(getEntityMetadata(Grade))).toBe(
      'CREATE TABLE IF NOT EXISTS "grades" (' +
        '"id" INTEGER PRIMARY KEY AUTOINCREMENT, ' +
        '"grade_name" TEXT NOT NULL UNIQUE, ' +
        `"created_at" TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')), ` +
        '"updated_at" TEXT)',
    );
  });

  it('creates the sections table with its reference to grades', () => {
    expect(compiler.compileCreate(getEntityMetadata(Section))).toBe(
      'CREATE TABLE IF NOT EXISTS "sections" (' +
        '"id" INTEGER PRIMARY KEY AUTOINCREMENT, ' +
        '"section_name" TEXT NOT NULL UNIQUE, ' +
        '"grade_id" INTEGER REFERENCES "grades", ' +
        '"active" INTEGER NOT NULL DEFAULT 1, ' +
        '"deleted" INTEGER NOT NULL DEFAULT 0, ' +
        `"created_at" TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')), ` +
        '"updated_at" TEXT)',
    );
  });
});
