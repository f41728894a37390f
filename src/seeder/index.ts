import type { ReportingSink } from '../types/csv';
import { PostgresTableGateway } from '../db/postgres';
import { csvSourceProvider } from '../parsers/csvParser';
import { createConsoleReporter } from './reporter';
import type { SeederDependencies } from './csvSeeder';

/**
 * Dependencies for seeding a PostgreSQL table from CSV files on disk.
 */
export function createDefaultDependencies(reporter: ReportingSink = createConsoleReporter()): SeederDependencies {
  const gateway = new PostgresTableGateway();

  return {
    catalog: gateway,
    writer: gateway,
    sources: csvSourceProvider,
    reporter,
  };
}

export { CsvSeeder, runSeeder } from './csvSeeder';
export type { SeederDependencies } from './csvSeeder';
export { BatchLoader } from './batchLoader';
export { SeederConfigError, SeederReadError, SeederWriteError } from './errors';
export type { ConfigErrorReason, SeederRunError, WriteOperation } from './errors';
export { createConsoleReporter, createMemoryReporter, teeReporter } from './reporter';
