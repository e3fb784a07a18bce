/**
 * sqlgate Connection Registry — one guarded connection per database
 *
 * Each configured database owns exactly one adapter and a single-permit
 * semaphore. withConnection() is the only way to reach an adapter, so at most
 * one request touches a connection at a time, and the permit is returned on
 * every exit path. Different databases never wait on each other.
 */

import type { DatabaseAdapter } from './adapters/adapter.js';
import { databaseNotFoundError } from './errors.js';
import { Semaphore } from './semaphore.js';
import type { StoredStatements } from './statements.js';
import type { CredentialVerifier, DatabaseConfig } from './types.js';

export interface DatabaseEntry {
  readonly config: DatabaseConfig;
  readonly adapter: DatabaseAdapter;
  readonly statements: StoredStatements;
  /** Present only when config.auth is set. */
  readonly verifier?: CredentialVerifier;
}

interface Slot {
  entry: DatabaseEntry;
  lock: Semaphore;
}

export class ConnectionRegistry {
  private slots = new Map<string, Slot>();

  register(entry: DatabaseEntry): void {
    this.slots.set(entry.config.name, { entry, lock: new Semaphore(1) });
  }

  has(name: string): boolean {
    return this.slots.has(name);
  }

  names(): string[] {
    return [...this.slots.keys()];
  }

  entries(): DatabaseEntry[] {
    return [...this.slots.values()].map(s => s.entry);
  }

  /** Requests waiting for or holding the named connection. */
  pending(name: string): number {
    const slot = this.slots.get(name);
    if (!slot) return 0;
    return slot.lock.queued + (slot.lock.available === 0 ? 1 : 0);
  }

  async withConnection<T>(name: string, fn: (entry: DatabaseEntry) => Promise<T> | T): Promise<T> {
    const slot = this.slots.get(name);
    if (!slot) throw databaseNotFoundError(name, this.names());
    return slot.lock.use(() => fn(slot.entry));
  }

  /** Waits for in-flight requests on each database, then closes it. */
  async closeAll(): Promise<void> {
    for (const slot of this.slots.values()) {
      await slot.lock.use(() => slot.entry.adapter.close());
    }
    this.slots.clear();
  }
}
