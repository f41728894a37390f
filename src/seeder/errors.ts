/**
 * Seeder errors.
 *
 * Configuration errors end a run before any row is inserted and are reported,
 * not thrown to the process. Read and write errors abort a run part-way through.
 */

export type ConfigErrorReason =
  | 'missing-source'
  | 'source-not-readable'
  | 'table-not-found'
  | 'catalog-unavailable'
  | 'empty-header'
  | 'invalid-option';

/**
 * Error when the run cannot start (or cannot resolve its header).
 *
 * @example
 * ```typescript
 * throw new SeederConfigError('table-not-found', 'Table "users" could not be found in database');
 * ```
 */
export class SeederConfigError extends Error {

  override readonly name = 'SeederConfigError' as const;

  constructor(
    public readonly reason: ConfigErrorReason,
    message: string,
  ) {
    super(message);
  }
}

export type WriteOperation = 'truncate' | 'insert';

/**
 * Error when the table rejects a truncate or a chunk insert.
 *
 * The driver error is kept as `cause`.
 */
export class SeederWriteError extends Error {

  override readonly name = 'SeederWriteError' as const;

  constructor(
    public readonly operation: WriteOperation,
    public readonly tableName: string,
    public readonly rowCount: number,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : 'Unknown error';
    const what = operation === 'truncate'
      ? `truncate table "${tableName}"`
      : `insert ${rowCount} row(s) into "${tableName}"`;

    super(`Failed to ${what}: ${detail}`, { cause });
  }
}

/**
 * Error when the CSV source cannot be opened or tokenized, such as a quote
 * that is never closed.
 */
export class SeederReadError extends Error {

  override readonly name = 'SeederReadError' as const;

  constructor(
    public readonly source: string,
    cause: unknown,
  ) {
    super(`Failed to read "${source}": ${errorMessage(cause)}`, { cause });
  }
}

/** Errors that abort a run after validation */
export type SeederRunError = SeederWriteError | SeederReadError;

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
