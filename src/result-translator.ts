/**
 * sqlgate Result Translator — engine rows → JSON objects
 *
 *   NULL     → null
 *   INTEGER  → number, or a decimal string outside ±(2^53 − 1)
 *   REAL     → number
 *   TEXT     → string
 *   BLOB     → base64 string (standard alphabet, padded)
 *
 * Keys follow the engine's column order, except that integer-like names
 * ("2", "10") are enumerated first in ascending order, as for any JS object.
 * A repeated column name keeps the last column's value.
 */

import type { EngineRows, JsonRow, JsonValue, SqlValue } from './types.js';

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

export function translateValueToJson(value: SqlValue): JsonValue {
  if (value === null) return null;
  if (typeof value === 'bigint') {
    return value > MAX_SAFE || value < MIN_SAFE ? value.toString() : Number(value);
  }
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return value;
}

export function translateRow(columns: string[], row: SqlValue[]): JsonRow {
  // fromEntries defines own properties, so a column named __proto__ survives.
  return Object.fromEntries(columns.map((column, i) => [column, translateValueToJson(row[i] ?? null)]));
}

export function translateRows(result: EngineRows): JsonRow[] {
  return result.rows.map(row => translateRow(result.columns, row));
}
