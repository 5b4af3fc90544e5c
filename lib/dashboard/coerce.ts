/**
 * Cell coercion for Athena result rows
 *
 * Athena returns every cell as a VarCharValue string. Values with a decimal
 * point become floats, plain digit strings become integers, everything else
 * (dates, timestamps, labels) stays a string.
 */

import type { RawResultSet } from '../athena/types';

export type CellValue = number | string | null;
export type ResultRow = Record<string, CellValue>;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.\d*|\.\d+)([eE][+-]?\d+)?$/;

export function coerceCell(value: string | null | undefined): CellValue {
  if (value === null || value === undefined) return null;

  const trimmed = value.trim();

  if (trimmed.includes('.')) {
    if (!FLOAT_PATTERN.test(trimmed)) return value;
    const parsed = Number(trimmed);
    // JSON has no Infinity
    return Number.isFinite(parsed) ? parsed : value;
  }

  if (INTEGER_PATTERN.test(trimmed)) {
    const parsed = Number(trimmed);
    // Keep digits exact for ids beyond 2^53
    return Number.isSafeInteger(parsed) ? parsed : value;
  }

  return value;
}

export function toRows(resultSet: RawResultSet): ResultRow[] {
  const keys = resultSet.columns.map((column) => column.toLowerCase());

  return resultSet.rows.map((cells) => {
    const row: ResultRow = {};
    keys.forEach((key, i) => {
      row[key] = coerceCell(cells[i]);
    });
    return row;
  });
}
