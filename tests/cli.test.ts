import { afterEach, describe, it, expect, vi } from 'vitest';
import { main, parseCliArgs } from '../src/cli';
import { SeederConfigError } from '../src/seeder/errors';

describe('cli: parseCliArgs', () => {

  it('takes the file as the only positional argument', () => {
    expect(parseCliArgs(['database/seeds/users.csv'])).toEqual({ source: 'database/seeds/users.csv' });
  });

  it('parses every option', () => {
    const options = parseCliArgs([
      'users.csv',
      '--table', 'people',
      '--delimiter=tab',
      '--no-truncate',
      '--no-header',
      '--mapping', 'id,name,password',
      '--alias', 'mail=email',
      '--hash', 'password,salt',
      '--default', 'role=user',
      '--skip-prefix', '#',
      '--timestamps', '1970-01-01 00:00:00',
      '--offset', '2',
      '--chunk=10',
      '--base-path', '/srv/app',
    ]);

    expect(options).toEqual({
      source: 'users.csv',
      tableName: 'people',
      delimiter: '\t',
      truncate: false,
      hasHeader: false,
      columnMapping: ['id', 'name', 'password'],
      aliasMap: { mail: 'email' },
      hashFields: ['password', 'salt'],
      defaults: { role: 'user' },
      skipPrefix: '#',
      timestampPolicy: '1970-01-01 00:00:00',
      rowOffset: 2,
      chunkSize: 10,
      basePath: '/srv/app',
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['users.csv', '--verbose', 'x'])).toThrow('Unknown option --verbose');
  });

  it('rejects an option without its value', () => {
    expect(() => parseCliArgs(['users.csv', '--table'])).toThrow('Option --table expects a value');
  });

  it('rejects a second file', () => {
    expect(() => parseCliArgs(['users.csv', 'roles.csv'])).toThrow(SeederConfigError);
  });
});

describe('cli: main', () => {

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints usage and fails on bad arguments', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const code = await main(['users.csv', '--chunk', 'many']);

    expect(code).toBe(1);
    expect(error).toHaveBeenNthCalledWith(1, 'Error: Option --chunk expects an integer, got "many"');
    expect(error.mock.calls[1][0]).toContain('Usage: npm run seed -- <file> [options]');
  });
});
