/**
 * Record types for rows written to the destination table.
 */

export type SeedValue = string | number | boolean | null;

/**
 * One row of the CSV expressed as target column name -> value.
 */
export interface SeedRecord {
  [column: string]: SeedValue;
}

/**
 * Columns stamped by the timestamp policy.
 */
export const CREATED_AT_COLUMN = 'created_at';
export const UPDATED_AT_COLUMN = 'updated_at';
