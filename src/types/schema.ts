/**
 * Header and seeder option definitions.
 *
 * A seeder run is described by a single immutable configuration value. Callers
 * hand in `SeederOptions`; `createSeederConfig` fills in the defaults.
 */

import type { SeedRecord } from './record';

/**
 * Resolved header column.
 */
export interface ColumnSpec {
  /** Position of the column in the CSV row */
  sourceIndex: number;
  /** Column name in the destination table (empty when skipped) */
  targetName: string;
  /** Whether the column is dropped before insertion */
  skip: boolean;
}

/**
 * `true` stamps the current time, `false` writes NULL, a string is written verbatim.
 */
export type TimestampPolicy = boolean | string;

export interface SeederOptions {
  /** Path of the CSV file, relative to `basePath` */
  source?: string;
  /** Directory the source path is resolved against (default: SEED_BASE_PATH or cwd) */
  basePath?: string;
  /** Destination table; defaults to the file name without extension */
  tableName?: string;
  /** Truncate the table before seeding (default: true) */
  truncate?: boolean;
  /** Whether the first row contains headers (default: true) */
  hasHeader?: boolean;
  /** Delimiter character (default: ';') */
  delimiter?: string;
  /** Column names used instead of the file header, positionally */
  columnMapping?: string[];
  /** Header name -> table column name */
  aliasMap?: Record<string, string>;
  /** Columns hashed before insertion (default: ['password']) */
  hashFields?: string[];
  /** Values for columns the file leaves empty or does not have */
  defaults?: SeedRecord;
  /** Header prefix marking columns to skip (default: '%') */
  skipPrefix?: string;
  /** created_at / updated_at handling (default: true) */
  timestampPolicy?: TimestampPolicy;
  /** Number of data rows to discard after the header (default: 0) */
  rowOffset?: number;
  /** Rows per insert statement (default: 50) */
  chunkSize?: number;
}

export interface SeederConfig {
  readonly source: string | null;
  readonly sourcePath: string | null;
  readonly tableName: string | null;
  readonly truncate: boolean;
  readonly hasHeader: boolean;
  readonly delimiter: string;
  readonly columnMapping: readonly string[] | null;
  readonly aliasMap: Readonly<Record<string, string>>;
  readonly hashFields: readonly string[];
  readonly defaults: Readonly<SeedRecord>;
  readonly skipPrefix: string;
  readonly timestampPolicy: TimestampPolicy;
  readonly rowOffset: number;
  readonly chunkSize: number;
}
