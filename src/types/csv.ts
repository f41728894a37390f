/**
 * Types shared by the CSV source, the database gateway and the seeder run.
 */

import type { SeedRecord, SeedValue } from './record';
import type { ConfigErrorReason, SeederRunError } from '../seeder/errors';

export interface ParserError {
  line: number;
  message: string;
  rawValue?: string;
  recoverable: boolean;
}

/**
 * An opened CSV file, read one row at a time.
 */
export interface CsvSource {
  /** Next row, or null at end of file */
  readRow(): Promise<string[] | null>;
  close(): Promise<void>;
}

export interface SourceProvider {
  canRead(path: string): Promise<boolean>;
  open(path: string, delimiter: string): Promise<CsvSource>;
}

export interface SchemaCatalog {
  tableExists(tableName: string): Promise<boolean>;
}

export interface TableWriter {
  truncate(tableName: string): Promise<void>;
  insertMany(tableName: string, records: SeedRecord[]): Promise<void>;
}

export type ReportLevel = 'info' | 'warn' | 'error';

export interface ReportingSink {
  emit(message: string, level?: ReportLevel): void;
}

export type RunState =
  | 'Idle'
  | 'Validated'
  | 'Truncated'
  | 'HeaderResolved'
  | 'Iterating'
  | 'Draining'
  | 'Closed'
  | 'Reported';

export interface RunCounters {
  totalRows: number;
  insertedRows: number;
}

export interface CompletedRun extends RunCounters {
  status: 'completed';
  tableName: string;
  insertCalls: number;
  rowErrors: ParserError[];
}

export interface InvalidRun {
  status: 'invalid';
  reason: ConfigErrorReason;
  message: string;
}

export interface FailedRun extends RunCounters {
  status: 'failed';
  tableName: string;
  flushedRows: number;
  error: SeederRunError;
}

export type RunResult = CompletedRun | InvalidRun | FailedRun;

/**
 * Anything the seed harness can run.
 */
export interface Runnable {
  run(): Promise<RunResult>;
}

export type { SeedRecord, SeedValue };
