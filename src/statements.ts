/**
 * sqlgate Stored Statements — name → SQL registry and resolution
 *
 * Operators vet SQL in advance by naming it in configuration. Clients refer to
 * it by exact name, or explicitly as `^name`. In stored-only mode any other
 * text is refused before it reaches the engine.
 */

import { GatewayError } from './errors.js';
import type { StoredStatementConfig } from './types.js';

export const STORED_REF_PREFIX = '^';

export class StoredStatements {
  private readonly byName: ReadonlyMap<string, string>;

  private constructor(byName: Map<string, string>) {
    this.byName = byName;
    Object.freeze(this);
  }

  static from(entries: StoredStatementConfig[] = [], database?: string): StoredStatements {
    const map = new Map<string, string>();
    for (const { id, sql } of entries) {
      if (map.has(id)) {
        throw new GatewayError({
          code: 'CONFIG_ERROR',
          message: `duplicate stored statement "${id}"`,
          fix: 'Give every stored statement a unique id.',
          database,
        });
      }
      if (sql.trim() === '') {
        throw new GatewayError({
          code: 'CONFIG_ERROR',
          message: `stored statement "${id}" has empty SQL`,
          database,
        });
      }
      map.set(id, sql);
    }
    return new StoredStatements(map);
  }

  get size(): number {
    return this.byName.size;
  }

  get(name: string): string | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return [...this.byName.keys()];
  }
}

/**
 * Resolve statement text to the SQL that will run.
 * Throws RESOLUTION_ERROR for an unknown `^name`, or for raw SQL in stored-only mode.
 */
export function resolveStatement(
  text: string,
  registry: StoredStatements,
  storedOnly: boolean,
): string {
  const exact = registry.get(text);
  if (exact !== undefined) return exact;

  if (text.startsWith(STORED_REF_PREFIX)) {
    const name = text.slice(STORED_REF_PREFIX.length);
    const sql = registry.get(name);
    if (sql !== undefined) return sql;
    throw new GatewayError({
      code: 'RESOLUTION_ERROR',
      message: `stored statement "${name}" does not exist`,
      fix: registry.size > 0 ? `Known stored statements: ${registry.names().join(', ')}.` : 'No stored statements are configured.',
    });
  }

  if (storedOnly) {
    throw new GatewayError({
      code: 'RESOLUTION_ERROR',
      message: 'this database accepts only stored statements',
      fix: 'Refer to a configured stored statement by name instead of sending SQL.',
    });
  }

  return text;
}
