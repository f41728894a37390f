import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { processSeedJob, summarizeResult } from '../src/server';
import { csvSourceProvider } from '../src/parsers/csvParser';
import { createMemoryReporter } from '../src/seeder/reporter';
import { SeederWriteError } from '../src/seeder/errors';
import { MemoryTable } from './utils/fakes';

describe('server: summarizeResult', () => {

  it('summarizes a completed run', () => {
    expect(summarizeResult({
      status: 'completed',
      tableName: 'users',
      totalRows: 3,
      insertedRows: 2,
      insertCalls: 1,
      rowErrors: [{ line: 3, message: 'Row shape mismatch: expected 2 column(s), got 1', recoverable: true }],
    })).toEqual({ status: 'completed', tableName: 'users', totalRows: 3, insertedRows: 2, skippedRows: 1 });
  });

  it('summarizes a failed run with the error message', () => {
    const error = new SeederWriteError('insert', 'users', 50, new Error('connection reset'));

    expect(summarizeResult({
      status: 'failed',
      tableName: 'users',
      totalRows: 100,
      insertedRows: 100,
      flushedRows: 50,
      error,
    })).toEqual({
      status: 'failed',
      tableName: 'users',
      totalRows: 100,
      insertedRows: 100,
      flushedRows: 50,
      error: 'Failed to insert 50 row(s) into "users": connection reset',
    });
  });

  it('summarizes an invalid run', () => {
    expect(summarizeResult({ status: 'invalid', reason: 'missing-source', message: 'No CSV file given' }))
      .toEqual({ status: 'invalid', error: 'No CSV file given' });
  });
});

describe('server: processSeedJob', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-seed-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('seeds the uploaded file and removes it', async () => {
    const filePath = path.join(dir, 'seed-upload-1.csv');
    fs.writeFileSync(filePath, 'id,name\n1,Ann\n2,Ben\n');
    const table = new MemoryTable({ people: [] });
    const reporter = createMemoryReporter();

    const result = await processSeedJob(
      {
        id: 'job-1',
        filePath,
        originalName: 'people.csv',
        options: { source: filePath, tableName: 'people', delimiter: ',', timestampPolicy: false },
      },
      { catalog: table, writer: table, sources: csvSourceProvider, reporter },
    );

    expect(result).toMatchObject({ status: 'completed', totalRows: 2, insertedRows: 2 });
    expect(table.rows('people')).toEqual([
      { id: '1', name: 'Ann', created_at: null, updated_at: null },
      { id: '2', name: 'Ben', created_at: null, updated_at: null },
    ]);
    expect(reporter.messages).toEqual([
      { message: '2 of 2 rows have been seeded in table "people"', level: 'info' },
    ]);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it('removes the file when the table is missing', async () => {
    const filePath = path.join(dir, 'seed-upload-2.csv');
    fs.writeFileSync(filePath, 'id\n1\n');
    const table = new MemoryTable();

    const result = await processSeedJob(
      { id: 'job-2', filePath, originalName: 'x.csv', options: { source: filePath, tableName: 'missing' } },
      { catalog: table, writer: table, sources: csvSourceProvider, reporter: createMemoryReporter() },
    );

    expect(result).toEqual({
      status: 'invalid',
      reason: 'table-not-found',
      message: 'Table "missing" could not be found in database',
    });
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
