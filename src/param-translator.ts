/**
 * sqlgate Parameter Translator — JSON object → named engine parameters
 *
 *   null            → NULL
 *   safe integer    → INTEGER (bound as bigint)
 *   other number    → REAL
 *   string          → TEXT
 *   boolean         → INTEGER 1 / 0
 *
 * Arrays, objects and non-finite numbers have no scalar form and are rejected.
 */

import { translationError, validationError } from './errors.js';
import type { NamedParams, SqlValue } from './types.js';

const NAME_PREFIX = /^[:@$]/;

export function translateParams(values: Record<string, unknown>): NamedParams {
  const seen = new Set<string>();
  const entries = Object.entries(values).map(([key, value]): [string, SqlValue] => {
    const name = key.replace(NAME_PREFIX, '');
    if (name === '') {
      throw validationError(`parameter name "${key}" is empty`);
    }
    if (seen.has(name)) {
      throw validationError(`parameter "${name}" is given more than once`);
    }
    seen.add(name);
    return [name, translateValue(name, value)];
  });
  return Object.fromEntries(entries);
}

export function translateValue(name: string, value: unknown): SqlValue {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
      return value;
    case 'boolean':
      return value ? 1n : 0n;
    case 'number':
      if (!Number.isFinite(value)) {
        throw translationError(name, 'is not a finite number');
      }
      return Number.isSafeInteger(value) ? BigInt(value) : value;
    case 'object':
      throw translationError(name, Array.isArray(value) ? 'is an array' : 'is an object');
    default:
      throw translationError(name, `has unsupported type ${typeof value}`);
  }
}
