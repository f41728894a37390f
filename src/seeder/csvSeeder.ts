import type { ColumnSpec, SeederConfig, SeederOptions } from '../types/schema';
import type {
  CsvSource,
  ParserError,
  ReportingSink,
  RunCounters,
  RunResult,
  RunState,
  Runnable,
  SchemaCatalog,
  SourceProvider,
  TableWriter,
} from '../types/csv';
import { createSeederConfig } from '../config/seederConfig';
import { resolveHeader } from '../parsers/headerParser';
import { transformRow } from '../parsers/rowParser';
import { BatchLoader } from './batchLoader';
import {
  SeederConfigError,
  SeederReadError,
  SeederWriteError,
  errorMessage,
  type SeederRunError,
} from './errors';

export interface SeederDependencies {
  catalog: SchemaCatalog;
  writer: TableWriter;
  sources: SourceProvider;
  reporter: ReportingSink;
  /** Clock used for created_at / updated_at */
  now?: () => Date;
}

function isBlankRow(row: readonly string[]): boolean {
  return row.every(cell => cell.trim() === '');
}

/**
 * Seeds one table from one CSV file.
 *
 * A run moves through Idle, Validated, Truncated, HeaderResolved, Iterating,
 * Draining, Closed and Reported, never backwards. Configuration problems end
 * the run with an `invalid` result; a failed read or write jumps to Closed and
 * ends it with a `failed` result. Each outcome is reported exactly once.
 */
export class CsvSeeder implements Runnable {
  private currentState: RunState = 'Idle';
  private started = false;
  private readonly counters: RunCounters = { totalRows: 0, insertedRows: 0 };

  constructor(
    private readonly config: SeederConfig,
    private readonly deps: SeederDependencies,
  ) {}

  get state(): RunState {
    return this.currentState;
  }

  async run(): Promise<RunResult> {
    if (this.started) {
      throw new Error('A CsvSeeder runs once; create a new one for the next run');
    }
    this.started = true;

    try {
      const { sourcePath, tableName } = await this.validate();
      return await this.seed(sourcePath, tableName);
    } catch (err) {
      if (err instanceof SeederConfigError) {
        this.deps.reporter.emit(err.message, 'error');
        return { status: 'invalid', reason: err.reason, message: err.message };
      }
      throw err;
    }
  }

  private async validate(): Promise<{ sourcePath: string; tableName: string }> {
    const { source, sourcePath, tableName } = this.config;

    if (!source || !sourcePath) {
      throw new SeederConfigError('missing-source', 'No CSV file given');
    }

    const readable = await this.deps.sources.canRead(sourcePath).catch((err: unknown) => {
      throw new SeederConfigError(
        'source-not-readable',
        `File "${source}" could not be found or is not readable: ${errorMessage(err)}`,
      );
    });

    if (!readable) {
      throw new SeederConfigError('source-not-readable', `File "${source}" could not be found or is not readable`);
    }

    const exists = tableName
      ? await this.deps.catalog.tableExists(tableName).catch((err: unknown) => {
        throw new SeederConfigError(
          'catalog-unavailable',
          `Table "${tableName}" could not be looked up in database: ${errorMessage(err)}`,
        );
      })
      : false;

    if (!tableName || !exists) {
      throw new SeederConfigError('table-not-found', `Table "${tableName ?? ''}" could not be found in database`);
    }

    this.currentState = 'Validated';
    return { sourcePath, tableName };
  }

  private async seed(sourcePath: string, tableName: string): Promise<RunResult> {
    const loader = new BatchLoader(this.deps.writer, tableName, this.config.chunkSize);
    const rowErrors: ParserError[] = [];
    let source: CsvSource | null = null;
    let failure: SeederRunError | null = null;

    try {
      await loader.beginRun(this.config.truncate);
      this.currentState = 'Truncated';

      source = await this.deps.sources.open(sourcePath, this.config.delimiter).catch((err: unknown) => {
        throw new SeederReadError(this.sourceName(), err);
      });
      const columns = await this.readHeader(source);
      this.currentState = 'HeaderResolved';

      await this.readRows(source, columns, loader, rowErrors);

      this.currentState = 'Draining';
      await loader.endRun();
    } catch (err) {
      if (!(err instanceof SeederWriteError || err instanceof SeederReadError)) throw err;
      failure = err;
    } finally {
      if (source) await source.close();
      this.currentState = 'Closed';
    }

    const { totalRows, insertedRows } = this.counters;

    if (failure) {
      this.deps.reporter.emit(`Seeding "${this.sourceName()}" aborted: ${failure.message}`, 'error');
      return {
        status: 'failed',
        tableName,
        totalRows,
        insertedRows,
        flushedRows: loader.flushedRows,
        error: failure,
      };
    }

    this.deps.reporter.emit(`${insertedRows} of ${totalRows} rows have been seeded in table "${tableName}"`);
    this.currentState = 'Reported';

    return {
      status: 'completed',
      tableName,
      totalRows,
      insertedRows,
      insertCalls: loader.insertCalls,
      rowErrors,
    };
  }

  private sourceName(): string {
    return this.config.source ?? this.config.sourcePath ?? '';
  }

  /** Next row of the source; tokenizer failures become read errors. */
  private async nextRow(source: CsvSource): Promise<string[] | null> {
    try {
      return await source.readRow();
    } catch (err) {
      throw new SeederReadError(this.sourceName(), err);
    }
  }

  /**
   * Header row of the file, replaced by the column mapping when one is set.
   * The header row is consumed either way.
   */
  private async readHeader(source: CsvSource): Promise<ColumnSpec[]> {
    let header: readonly string[] = [];

    if (this.config.hasHeader) {
      const row = await this.nextRow(source);
      header = row ? row.map(name => name.trim()) : [];
    }

    if (this.config.columnMapping) {
      header = this.config.columnMapping;
    }

    const { columns, warnings } = resolveHeader(header, {
      aliasMap: this.config.aliasMap,
      skipPrefix: this.config.skipPrefix,
      delimiter: this.config.delimiter,
      fromFile: !this.config.columnMapping,
    });

    for (const warning of warnings) {
      this.deps.reporter.emit(warning, 'warn');
    }

    return columns;
  }

  private async readRows(
    source: CsvSource,
    columns: ColumnSpec[],
    loader: BatchLoader,
    rowErrors: ParserError[],
  ): Promise<void> {
    let offset = this.config.rowOffset;
    let line = this.config.hasHeader ? 1 : 0;
    let row: string[] | null;

    this.currentState = 'Iterating';
    while ((row = await this.nextRow(source)) !== null) {
      line++;

      if (isBlankRow(row)) continue;

      this.counters.totalRows++;

      if (offset > 0) {
        offset--;
        continue;
      }

      const { record, errors } = transformRow(row, columns, {
        defaults: this.config.defaults,
        timestamps: this.config.timestampPolicy,
        hashFields: this.config.hashFields,
        now: this.deps.now,
        line,
      });

      rowErrors.push(...errors);
      if (!record) continue;

      this.counters.insertedRows++;
      await loader.append(record);
    }
  }
}

/**
 * Build the configuration from options and run a seeder with it.
 * Configuration errors are reported and returned, never thrown.
 */
export async function runSeeder(options: SeederOptions, deps: SeederDependencies): Promise<RunResult> {
  let config: SeederConfig;

  try {
    config = createSeederConfig(options);
  } catch (err) {
    if (!(err instanceof SeederConfigError)) throw err;

    deps.reporter.emit(err.message, 'error');
    return { status: 'invalid', reason: err.reason, message: err.message };
  }

  return new CsvSeeder(config, deps).run();
}
