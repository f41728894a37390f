import type { ColumnSpec } from '../types/schema';
import { SeederConfigError } from '../seeder/errors';

export interface HeaderOptions {
  /** Header name -> table column name */
  aliasMap?: Readonly<Record<string, string>>;
  /** Prefix marking a column to skip; empty disables skipping */
  skipPrefix?: string;
  /** Only used in the single-column warning */
  delimiter?: string;
  /** Whether the header was read from the file; a column mapping is never warned about (default: true) */
  fromFile?: boolean;
}

export interface ResolvedHeader {
  columns: ColumnSpec[];
  warnings: string[];
}

/**
 * Resolve the CSV header (or a positional column mapping) to target columns.
 *
 * The skip prefix is checked against the header name first and then against
 * its alias, so a column can be dropped from either place.
 */
export function resolveHeader(rawHeader: readonly string[], options: HeaderOptions = {}): ResolvedHeader {
  if (rawHeader.length === 0) {
    throw new SeederConfigError('empty-header', 'No CSV headers were parsed');
  }

  const aliasMap = options.aliasMap ?? {};
  const skipPrefix = options.skipPrefix ?? '';
  const isSkipped = (name: string) => skipPrefix !== '' && name.startsWith(skipPrefix);

  const columns = rawHeader.map((name, sourceIndex): ColumnSpec => {
    if (isSkipped(name)) {
      return { sourceIndex, targetName: '', skip: true };
    }

    const targetName = Object.prototype.hasOwnProperty.call(aliasMap, name) ? aliasMap[name] : name;

    if (targetName === '' || isSkipped(targetName)) {
      return { sourceIndex, targetName: '', skip: true };
    }

    return { sourceIndex, targetName, skip: false };
  });

  const warnings: string[] = [];
  if (columns.length === 1 && (options.fromFile ?? true)) {
    const delimiter = options.delimiter === '\t' ? 'TAB' : options.delimiter;
    warnings.push(
      delimiter
        ? `Found only one column in header, maybe a wrong delimiter (${delimiter}) for the CSV file was set`
        : 'Found only one column in header, maybe a wrong delimiter for the CSV file was set'
    );
  }

  return { columns, warnings };
}
