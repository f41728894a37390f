import pgPromise from 'pg-promise';
import type { SchemaCatalog, SeedRecord, TableWriter } from '../types/csv';

const pgp = pgPromise();

let db: pgPromise.IDatabase<{}> | null = null;

/**
 * Get the pg-promise database instance (lazy-initialized)
 */
export function getDb(): pgPromise.IDatabase<{}> {
  if (db) return db;

  db = pgp({
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    database: process.env.DB_NAME || 'postgres',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || '',
    max: parseInt(process.env.DB_POOL_MAX || '5', 10),
  });

  return db;
}

/**
 * Close the database connection (for graceful shutdown)
 */
export async function closeDb(): Promise<void> {
  if (db) {
    pgp.end();
    db = null;
  }
}

/**
 * Split `schema.table` into pg-promise's table descriptor.
 */
export function toTableName(tableName: string): pgPromise.TableName {
  const dot = tableName.indexOf('.');
  if (dot === -1) {
    return new pgp.helpers.TableName({ table: tableName });
  }

  return new pgp.helpers.TableName({
    schema: tableName.slice(0, dot),
    table: tableName.slice(dot + 1),
  });
}

export function buildTruncateQuery(tableName: string): string {
  return `TRUNCATE TABLE ${toTableName(tableName).name} RESTART IDENTITY CASCADE`;
}

/**
 * Multi-row insert for a batch. The column set is the union of the batch's
 * keys; a record without one of them inserts NULL there.
 */
export function buildInsertQuery(tableName: string, records: SeedRecord[]): string {
  const names: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!names.includes(key)) names.push(key);
    }
  }

  const columns = new pgp.helpers.ColumnSet(
    names.map(name => ({ name, def: null })),
    { table: toTableName(tableName) }
  );

  return pgp.helpers.insert(records, columns);
}

/**
 * Schema catalog and table writer backed by PostgreSQL.
 */
export class PostgresTableGateway implements SchemaCatalog, TableWriter {

  constructor(private readonly database: pgPromise.IDatabase<{}> = getDb()) {}

  async tableExists(tableName: string): Promise<boolean> {
    const { schema, table } = toTableName(tableName);

    return this.database.one(
      `SELECT EXISTS (
         SELECT 1 FROM information_schema.tables
         WHERE table_schema = COALESCE($<schema>, current_schema())
           AND table_name = $<table>
       ) AS "exists"`,
      { schema: schema ?? null, table },
      (row: { exists: boolean }) => row.exists
    );
  }

  async truncate(tableName: string): Promise<void> {
    await this.database.none(buildTruncateQuery(tableName));
    console.log(`[DB] Truncated table "${tableName}"`);
  }

  async insertMany(tableName: string, records: SeedRecord[]): Promise<void> {
    if (records.length === 0) return;

    const result = await this.database.result(buildInsertQuery(tableName, records));
    console.log(`[DB] Inserted ${result.rowCount} row(s) into "${tableName}"`);
  }
}
