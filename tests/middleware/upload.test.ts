import { describe, it, expect } from 'vitest';
import { parseSeedForm } from '../../src/middleware/upload';
import { SeederConfigError } from '../../src/seeder/errors';

describe('middleware: parseSeedForm', () => {

  it('requires a table', () => {
    expect(() => parseSeedForm({}, '/tmp/upload.csv')).toThrow(SeederConfigError);
    expect(() => parseSeedForm({ table: '  ' }, '/tmp/upload.csv')).toThrow('Form field "table" is required');
  });

  it('uses only the table when nothing else is set', () => {
    expect(parseSeedForm({ table: 'users' }, '/tmp/upload.csv')).toEqual({
      source: '/tmp/upload.csv',
      tableName: 'users',
    });
  });

  it('translates every form field', () => {
    const options = parseSeedForm({
      table: 'users',
      delimiter: 'tab',
      truncate: 'false',
      hasHeader: 'yes',
      mapping: 'id,name',
      aliases: 'mail=email',
      hash: 'password,salt',
      defaults: 'role=user,level=2',
      skipPrefix: '#',
      timestamps: 'false',
      offset: '2',
      chunk: '100',
    }, '/tmp/upload.csv');

    expect(options).toEqual({
      source: '/tmp/upload.csv',
      tableName: 'users',
      delimiter: '\t',
      truncate: false,
      hasHeader: true,
      columnMapping: ['id', 'name'],
      aliasMap: { mail: 'email' },
      hashFields: ['password', 'salt'],
      defaults: { role: 'user', level: 2 },
      skipPrefix: '#',
      timestampPolicy: false,
      rowOffset: 2,
      chunkSize: 100,
    });
  });

  it('turns hashing off with an empty hash field', () => {
    expect(parseSeedForm({ table: 'users', hash: '' }, '/tmp/upload.csv').hashFields).toEqual([]);
  });

  it('ignores fields that are not strings', () => {
    expect(parseSeedForm({ table: 'users', chunk: ['1', '2'] }, '/tmp/upload.csv')).toEqual({
      source: '/tmp/upload.csv',
      tableName: 'users',
    });
  });

  it('rejects malformed values', () => {
    expect(() => parseSeedForm({ table: 'users', offset: 'two' }, '/tmp/upload.csv'))
      .toThrow('Option offset expects an integer, got "two"');
  });
});
