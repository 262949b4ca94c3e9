import { SqlRow } from './database.service';

/**
 * Typed column readers for rows coming back from sql.js
 */
export function readString(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new TypeError(`Column ${column} is not text`);
}

export function readNullableString(row: SqlRow, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : readString(row, column);
}

export function readNumber(row: SqlRow, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (value === null || value === undefined) return 0;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Column ${column} is not numeric`);
  }
  return parsed;
}
