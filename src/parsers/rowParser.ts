import { createHash } from 'crypto';
import type { ColumnSpec, TimestampPolicy } from '../types/schema';
import type { ParserError } from '../types/csv';
import { CREATED_AT_COLUMN, UPDATED_AT_COLUMN, type SeedRecord, type SeedValue } from '../types/record';

export interface RowOptions {
  /** Values for columns the row leaves empty or does not have */
  defaults?: Readonly<SeedRecord>;
  /** created_at / updated_at handling (default: true) */
  timestamps?: TimestampPolicy;
  /** Columns replaced by their SHA-256 digest */
  hashFields?: readonly string[];
  /** Clock used for timestamps */
  now?: () => Date;
  /** Line number reported with errors */
  line?: number;
}

export interface RowResult {
  record: SeedRecord | null;
  errors: ParserError[];
}

/**
 * One-way hash of a seeded value: SHA-256 as 64 hex characters.
 */
export function hashValue(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Convert a raw cell to the value written to the table.
 * Empty cells and the literal NULL become null.
 */
export function normalizeValue(raw: string): SeedValue {
  if (raw === '' || raw.toUpperCase() === 'NULL') {
    return null;
  }

  return raw;
}

function timestampValue(policy: TimestampPolicy, now: () => Date): SeedValue {
  if (policy === true) return now().toISOString();
  if (policy === false) return null;

  return policy;
}

/**
 * Transform a raw row into a record for the destination table.
 *
 * Order: row values, then defaults, then timestamps, then hashing, so a
 * default written to a hashed column is hashed as well.
 */
export function transformRow(
  row: readonly string[],
  columns: readonly ColumnSpec[],
  options: RowOptions = {}
): RowResult {
  const line = options.line ?? 0;

  if (row.length !== columns.length) {
    return {
      record: null,
      errors: [{
        line,
        message: `Row shape mismatch: expected ${columns.length} column(s), got ${row.length}`,
        rawValue: row.join(','),
        recoverable: true,
      }],
    };
  }

  // Built in a Map so header names such as __proto__ or constructor stay plain keys
  const values = new Map<string, SeedValue>();

  for (const column of columns) {
    if (column.skip) continue;

    values.set(column.targetName, normalizeValue(row[column.sourceIndex]));
  }

  if (values.size === 0) {
    return { record: null, errors: [] };
  }

  const fillEmpty = (key: string, value: SeedValue) => {
    if (values.get(key) == null) values.set(key, value);
  };

  for (const [key, value] of Object.entries(options.defaults ?? {})) {
    fillEmpty(key, value);
  }

  const stamp = timestampValue(options.timestamps ?? true, options.now ?? (() => new Date()));
  fillEmpty(CREATED_AT_COLUMN, stamp);
  fillEmpty(UPDATED_AT_COLUMN, stamp);

  for (const key of options.hashFields ?? []) {
    const value = values.get(key);
    if (value !== undefined && value !== null) {
      values.set(key, hashValue(String(value)));
    }
  }

  const record: SeedRecord = Object.fromEntries(values);
  return { record, errors: [] };
}
