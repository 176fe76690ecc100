/**
 * Column readers for sql.js rows. Each one throws a TypeError when the stored
 * value has the wrong type.
 */

import type { SqlRow } from './index';

function columnError(column: string, expected: string, value: unknown): Error {
  return new TypeError(`Column ${column}: expected ${expected}, got ${value === null ? 'null' : typeof value}`);
}

export function textOrNull(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw columnError(column, 'text', value);
}

export function text(row: SqlRow, column: string): string {
  const value = textOrNull(row, column);
  if (value === null) throw columnError(column, 'text', null);
  return value;
}

export function intOrNull(row: SqlRow, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw columnError(column, 'integer', value);
}

export function int(row: SqlRow, column: string): number {
  const value = intOrNull(row, column);
  if (value === null) throw columnError(column, 'integer', null);
  return value;
}

export function bool(row: SqlRow, column: string): boolean {
  return int(row, column) !== 0;
}

export function dateOrNull(row: SqlRow, column: string): Date | null {
  const ms = intOrNull(row, column);
  return ms === null ? null : new Date(ms);
}

export function date(row: SqlRow, column: string): Date {
  return new Date(int(row, column));
}

export function msOrNull(value: Date | null): number | null {
  return value ? value.getTime() : null;
}
