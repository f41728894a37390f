import * as path from 'path';
import type { SeederConfig, SeederOptions, TimestampPolicy } from '../types/schema';
import type { SeedRecord, SeedValue } from '../types/record';
import { SeederConfigError } from '../seeder/errors';

// Process-wide defaults, overridable per run
const DEFAULT_CHUNK_SIZE = parseInt(process.env.SEED_CHUNK_SIZE || '50', 10);
const DEFAULT_DELIMITER = process.env.SEED_DELIMITER || ';';
const DEFAULT_BASE_PATH = process.env.SEED_BASE_PATH || process.cwd();

export const DEFAULT_HASH_FIELDS: readonly string[] = ['password'];
export const DEFAULT_SKIP_PREFIX = '%';

/**
 * Build the immutable configuration of one seeder run.
 *
 * A missing source is not an error here: the run reports it during validation.
 * Option values that can never work (a zero chunk size, a negative offset, an
 * empty delimiter) throw `SeederConfigError` with reason `invalid-option`.
 */
export function createSeederConfig(options: SeederOptions = {}): SeederConfig {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const rowOffset = options.rowOffset ?? 0;
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new SeederConfigError('invalid-option', `Chunk size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(rowOffset) || rowOffset < 0) {
    throw new SeederConfigError('invalid-option', `Row offset must be zero or a positive integer, got ${rowOffset}`);
  }
  if (delimiter === '') {
    throw new SeederConfigError('invalid-option', 'Delimiter must not be empty');
  }

  const source = options.source?.trim() || null;
  const sourcePath = source ? path.resolve(options.basePath ?? DEFAULT_BASE_PATH, source) : null;
  const tableName = options.tableName?.trim() || (source ? resolveTableName(source) : null);

  return Object.freeze({
    source,
    sourcePath,
    tableName,
    truncate: options.truncate ?? true,
    hasHeader: options.hasHeader ?? true,
    delimiter,
    columnMapping: options.columnMapping && options.columnMapping.length > 0
      ? Object.freeze([...options.columnMapping])
      : null,
    aliasMap: Object.freeze({ ...options.aliasMap }),
    hashFields: Object.freeze([...(options.hashFields ?? DEFAULT_HASH_FIELDS)]),
    defaults: Object.freeze({ ...options.defaults }),
    skipPrefix: options.skipPrefix ?? DEFAULT_SKIP_PREFIX,
    timestampPolicy: options.timestampPolicy ?? true,
    rowOffset,
    chunkSize,
  });
}

/**
 * Table name derived from the CSV file name, e.g. `seeds/users.csv` -> `users`.
 */
export function resolveTableName(source: string): string {
  return path.parse(source).name;
}

/**
 * Split a comma-separated option value, dropping blanks.
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item !== '');
}

/**
 * Parse `key=value` pairs, e.g. `csv_name=name,mail=email`.
 */
export function parsePairs(value: string): Record<string, string> {
  const pairs = splitList(value).map((item): [string, string] => {
    const separator = item.indexOf('=');
    if (separator <= 0) {
      throw new SeederConfigError('invalid-option', `Expected key=value, got "${item}"`);
    }
    return [item.slice(0, separator).trim(), item.slice(separator + 1).trim()];
  });

  // fromEntries keeps keys such as __proto__ as own properties
  return Object.fromEntries(pairs);
}

/**
 * Parse `key=value` default pairs, keeping numbers as numbers.
 */
export function parseDefaults(value: string): SeedRecord {
  return Object.fromEntries(
    Object.entries(parsePairs(value)).map(([key, raw]): [string, SeedValue] => {
      const num = Number(raw);
      return [key, raw !== '' && !isNaN(num) ? num : raw];
    })
  );
}

export function parseBooleanFlag(value: string, option: string): boolean {
  const lower = value.trim().toLowerCase();
  if (['true', 'yes', '1', 'y', 't'].includes(lower)) return true;
  if (['false', 'no', '0', 'n', 'f'].includes(lower)) return false;

  throw new SeederConfigError('invalid-option', `Option ${option} expects true or false, got "${value}"`);
}

export function parseIntegerOption(value: string, option: string): number {
  const num = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(num)) {
    throw new SeederConfigError('invalid-option', `Option ${option} expects an integer, got "${value}"`);
  }

  return num;
}

/**
 * `true`/`false` switch the policy; anything else is a literal timestamp.
 */
export function parseTimestampPolicy(value: string): TimestampPolicy {
  const lower = value.trim().toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;

  return value.trim();
}
