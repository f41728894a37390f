import type { SeedRecord, TableWriter } from '../types/csv';
import { SeederWriteError } from './errors';

/**
 * Buffers records and writes them to one table in chunks.
 *
 * Every appended record ends up in exactly one place: the buffer, the table,
 * or nowhere because an earlier chunk failed and the loader aborted. There is
 * no retry, so a record is never inserted twice.
 *
 * Truncation and each chunk insert are separate statements. If the process
 * dies after the truncate, the table stays empty.
 */
export class BatchLoader {
  private buffer: SeedRecord[] = [];
  private started = false;
  private aborted = false;
  private flushed = 0;
  private calls = 0;

  constructor(
    private readonly writer: TableWriter,
    private readonly tableName: string,
    private readonly chunkSize: number,
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
  }

  /** Rows written so far */
  get flushedRows(): number {
    return this.flushed;
  }

  /** Insert statements issued so far */
  get insertCalls(): number {
    return this.calls;
  }

  get pendingRows(): number {
    return this.buffer.length;
  }

  async beginRun(truncate: boolean): Promise<void> {
    if (this.started) {
      throw new Error(`Batch loader for "${this.tableName}" has already been started`);
    }
    this.started = true;

    if (!truncate) return;

    try {
      await this.writer.truncate(this.tableName);
    } catch (err) {
      this.aborted = true;
      throw new SeederWriteError('truncate', this.tableName, 0, err);
    }
  }

  async append(record: SeedRecord): Promise<void> {
    this.assertWritable();

    this.buffer.push(record);

    if (this.buffer.length >= this.chunkSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    this.assertWritable();

    if (this.buffer.length === 0) return;

    const chunk = this.buffer;
    this.buffer = [];
    this.calls++;

    try {
      await this.writer.insertMany(this.tableName, chunk);
    } catch (err) {
      this.aborted = true;
      throw new SeederWriteError('insert', this.tableName, chunk.length, err);
    }

    this.flushed += chunk.length;
  }

  /**
   * Write the last, possibly short, chunk.
   */
  async endRun(): Promise<void> {
    await this.flush();
  }

  private assertWritable(): void {
    if (!this.started) {
      throw new Error(`Batch loader for "${this.tableName}" has not been started`);
    }
    if (this.aborted) {
      throw new Error(`Batch loader for "${this.tableName}" was aborted after a write failure`);
    }
  }
}
