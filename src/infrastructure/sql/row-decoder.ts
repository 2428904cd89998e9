import type { Property } from '../../core/property/property';
import { DatabaseType, ExecuteResult } from '../../shared/types/query-builder.types';
import { underscore } from '../../shared/utils/naming-helpers';

export type Row = Record<string, unknown>;

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

function toRows(value: unknown): Row[] {
  return Array.isArray(value) ? value.filter(isRow) : [];
}

function toCount(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return 0;
}

function toInsertId(value: unknown): number | bigint | string | undefined {
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'string') {
    return value;
  }
  return undefined;
}

/**
 * Normalizes what knex.raw resolves to for each driver:
 * - pg: `{ rows, rowCount }`
 * - mysql2: `[rows | { affectedRows, insertId }, fields]`
 * - better-sqlite3: a row array for readers, `{ changes, lastInsertRowid }` otherwise
 */
export function normalizeDriverResult(type: DatabaseType, raw: unknown): ExecuteResult {
  switch (type) {
    case 'postgres': {
      if (!isRow(raw)) break;
      const rows = toRows(raw.rows);
      return { affectedRows: toCount(raw.rowCount), rows, raw };
    }
    case 'mysql': {
      const first: unknown = Array.isArray(raw) ? raw[0] : raw;
      if (Array.isArray(first)) {
        const rows = toRows(first);
        return { affectedRows: rows.length, rows, raw };
      }
      if (!isRow(first)) break;
      return {
        affectedRows: toCount(first.affectedRows),
        // mysql reports 0 when the statement generated no id
        insertId: toInsertId(first.insertId) || undefined,
        rows: [],
        raw,
      };
    }
    case 'sqlite': {
      if (Array.isArray(raw)) {
        const rows = toRows(raw);
        return { affectedRows: rows.length, rows, raw };
      }
      if (!isRow(raw)) break;
      return {
        affectedRows: toCount(raw.changes),
        insertId: toInsertId(raw.lastInsertRowid),
        rows: [],
        raw,
      };
    }
  }
  return { affectedRows: 0, rows: [], raw };
}

/** Decoded values of `fields`, in field order, read by column name. */
export function decodeRow(fields: readonly Property[], row: Row): unknown[] {
  return fields.map((field) => field.decode(row[field.field()]));
}

/**
 * A bare value for single-column rows, otherwise a record keyed by the
 * underscored column names.
 */
export function collapseRow(row: Row): unknown {
  const columns = Object.keys(row);
  if (columns.length === 1) {
    return row[columns[0]];
  }
  const record: Row = {};
  for (const column of columns) {
    record[underscore(column)] = row[column];
  }
  return record;
}
