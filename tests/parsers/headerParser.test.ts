import { describe, it, expect } from 'vitest';
import { resolveHeader } from '../../src/parsers/headerParser';
import { SeederConfigError } from '../../src/seeder/errors';

describe('parsers: resolveHeader', () => {

  it('keeps every column in file order', () => {
    const { columns, warnings } = resolveHeader(['id', 'name', 'password']);

    expect(columns).toEqual([
      { sourceIndex: 0, targetName: 'id', skip: false },
      { sourceIndex: 1, targetName: 'name', skip: false },
      { sourceIndex: 2, targetName: 'password', skip: false },
    ]);
    expect(warnings).toEqual([]);
  });

  it('marks columns starting with the skip prefix', () => {
    const { columns } = resolveHeader(['id', '#temp', 'name'], { skipPrefix: '#' });

    expect(columns.map(c => c.skip)).toEqual([false, true, false]);
    expect(columns[1]).toEqual({ sourceIndex: 1, targetName: '', skip: true });
  });

  it('renames aliased columns', () => {
    const { columns } = resolveHeader(['id', 'mail'], { aliasMap: { mail: 'email' } });

    expect(columns.map(c => c.targetName)).toEqual(['id', 'email']);
  });

  it('checks the skip prefix before the alias', () => {
    const { columns } = resolveHeader(['%mail'], { aliasMap: { '%mail': 'email' }, skipPrefix: '%' });

    expect(columns[0].skip).toBe(true);
  });

  it('skips a column whose alias carries the skip prefix', () => {
    const { columns } = resolveHeader(['id', 'legacy_id'], { aliasMap: { legacy_id: '%legacy' }, skipPrefix: '%' });

    expect(columns[1]).toEqual({ sourceIndex: 1, targetName: '', skip: true });
  });

  it('does not skip anything when the prefix is empty', () => {
    const { columns } = resolveHeader(['%id', '#name'], { skipPrefix: '' });

    expect(columns.map(c => c.targetName)).toEqual(['%id', '#name']);
  });

  it('skips columns without a name', () => {
    const { columns } = resolveHeader(['id', 'name', '']);

    expect(columns[2]).toEqual({ sourceIndex: 2, targetName: '', skip: true });
  });

  it('throws a configuration error for an empty header', () => {
    expect(() => resolveHeader([])).toThrow(SeederConfigError);
    expect(() => resolveHeader([])).toThrow('No CSV headers were parsed');
  });

  it('warns when the header has a single column', () => {
    const { columns, warnings } = resolveHeader(['col'], { delimiter: ';' });

    expect(columns).toHaveLength(1);
    expect(warnings).toEqual([
      'Found only one column in header, maybe a wrong delimiter (;) for the CSV file was set',
    ]);
  });

  it('names a tab delimiter in the warning', () => {
    const { warnings } = resolveHeader(['id,name'], { delimiter: '\t' });

    expect(warnings).toEqual([
      'Found only one column in header, maybe a wrong delimiter (TAB) for the CSV file was set',
    ]);
  });

  it('does not warn about a single-column mapping', () => {
    const { columns, warnings } = resolveHeader(['id'], { delimiter: ';', fromFile: false });

    expect(columns).toEqual([{ sourceIndex: 0, targetName: 'id', skip: false }]);
    expect(warnings).toEqual([]);
  });
});
