/**
 * Coercion of driver values into result-set scalars.
 */

import type { Row, Scalar } from './types.js';

export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return JSON.stringify(value);
}

/**
 * Numbers some drivers hand back as text (64-bit integers, arbitrary
 * precision decimals). Values a JS number cannot hold stay as text.
 */
export function numericText(value: Scalar): Scalar {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
}

/**
 * Project a raw driver row onto `columns`. Columns listed in `numeric` are
 * parsed from text into numbers.
 */
export function toRow(columns: string[], raw: Record<string, unknown>, numeric?: ReadonlySet<string>): Row {
  const row: Row = {};
  for (const col of columns) {
    const value = toScalar(raw[col]);
    row[col] = numeric?.has(col) ? numericText(value) : value;
  }
  return row;
}
