/**
 * sqlgate Abstract Adapter Interface
 *
 * The engine behind one configured database. The orchestrator only talks to
 * the engine through SqlTransaction, inside withTransaction.
 */

import type { DatabaseStatus, EngineRows, NamedParams } from '../types.js';

export interface SqlTransaction {
  /** False once the engine has dropped the transaction on its own. */
  readonly active: boolean;

  /** Prepare, bind and fetch every row. */
  query(sql: string, params?: NamedParams): EngineRows;
  /** Execute once; returns the affected-row count. */
  execute(sql: string, params?: NamedParams): number;
  /** Prepare once, execute per parameter object in order. */
  executeBatch(sql: string, batch: NamedParams[]): number[];
  /** Run fn in a savepoint. If fn throws, its effects are undone and the error rethrown. */
  savepoint<T>(fn: () => T): T;
}

export interface TransactionOutcome<T> {
  commit: boolean;
  value: T;
}

export interface DatabaseAdapter {
  readonly name: string;
  readonly path: string;
  readonly readOnly: boolean;

  // ─── Lifecycle ────────────────────────────────────────────────────
  connect(): Promise<void>;
  close(): Promise<void>;
  status(): DatabaseStatus;

  // ─── Operations ───────────────────────────────────────────────────
  /** Autocommit query, outside any transaction. */
  query(sql: string, params?: NamedParams): EngineRows;

  /**
   * Open one transaction, hand it to fn, then commit or roll back as fn decides.
   * A throw from fn rolls back and propagates as a GatewayError.
   */
  withTransaction<T>(fn: (tx: SqlTransaction) => TransactionOutcome<T>): T;
}
