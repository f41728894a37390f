import { parse, type Parser } from 'csv-parse';
import * as fs from 'fs';
import type { CsvSource, SourceProvider } from '../types/csv';

function parserOptions(delimiter: string) {
  return {
    delimiter,
    bom: true,
    skip_empty_lines: true,
    // Rows of the wrong length are reported by the row parser, not here
    relax_column_count: true,
    relax_quotes: true,
  };
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(cell => typeof cell === 'string');
}

/**
 * Open a CSV file as a one-shot row reader.
 */
export function openCsvFile(filePath: string, delimiter: string): CsvSource {
  const stream = fs.createReadStream(filePath);
  const parser: Parser = parse(parserOptions(delimiter));

  stream.on('error', (err: Error) => {
    parser.destroy(err);
  });

  stream.pipe(parser);

  const rows: AsyncIterator<unknown> = parser[Symbol.asyncIterator]();
  let closed = false;

  return {
    async readRow(): Promise<string[] | null> {
      if (closed) return null;

      const { value, done } = await rows.next();
      if (done) return null;

      if (!isStringRow(value)) {
        throw new Error('CSV parser returned a row that is not a list of strings');
      }

      return value;
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;

      stream.destroy();
      parser.destroy();
    },
  };
}

/**
 * Source provider reading CSV files from disk.
 */
export const csvSourceProvider: SourceProvider = {
  async canRead(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) return false;

      await fs.promises.access(filePath, fs.constants.R_OK);
      return true;
    } catch {
      return false;
    }
  },

  async open(filePath: string, delimiter: string): Promise<CsvSource> {
    return openCsvFile(filePath, delimiter);
  },
};

/**
 * Count the number of records in a file (excluding header)
 */
export async function countRecords(filePath: string, delimiter: string, hasHeader: boolean = true): Promise<number> {
  return new Promise((resolve, reject) => {
    let count = 0;
    let isFirstLine = hasHeader;

    const parser = parse(parserOptions(delimiter));
    const stream = fs.createReadStream(filePath);

    parser.on('readable', () => {
      let record: unknown;
      while ((record = parser.read()) !== null) {
        if (isFirstLine) {
          isFirstLine = false;
          continue; // Skip header
        }
        count++;
      }
    });

    stream.on('error', reject);
    parser.on('error', reject);
    parser.on('end', () => resolve(count));

    stream.pipe(parser);
  });
}
