/**
 * sqlgate SQLite Adapter
 *
 * Wraps one better-sqlite3 connection. Integers come back as bigint
 * (safe-integer mode) so INTEGER and REAL stay distinguishable for the
 * result translator.
 */

import { existsSync } from 'fs';
import Database from 'better-sqlite3';
import type { DatabaseAdapter, SqlTransaction, TransactionOutcome } from './adapter.js';
import type { DatabaseConfig, DatabaseStatus, EngineRows, NamedParams, SqlValue } from '../types.js';
import { GatewayError, mapNativeError, validationError } from '../errors.js';
import type { GatewayEventEmitter } from '../events.js';

const MEMORY_PATH = ':memory:';

type Connection = Database.Database;

// ─── Shared Helpers (used by both SqliteAdapter and SqliteTransaction) ───────

function toSqlValue(value: unknown): SqlValue {
  if (
    value === null ||
    typeof value === 'bigint' ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  throw new GatewayError({
    code: 'ENGINE_ERROR',
    message: `engine returned an unsupported value of type ${typeof value}`,
  });
}

function toSqlRow(row: unknown): SqlValue[] {
  if (!Array.isArray(row)) {
    throw new GatewayError({ code: 'ENGINE_ERROR', message: 'engine returned a row that is not an array' });
  }
  return row.map(toSqlValue);
}

// Leading comments and whitespace, then the first keyword.
const LEADING_KEYWORD = /^(?:\s|--[^\n]*(?:\n|$)|\/\*[\s\S]*?\*\/)*([A-Za-z]+)/;
const TRANSACTION_CONTROL = new Set(['BEGIN', 'COMMIT', 'END', 'ROLLBACK', 'SAVEPOINT', 'RELEASE']);

/** The request owns the transaction; client SQL may not end or nest it. */
function refuseTransactionControl(sql: string): void {
  const keyword = LEADING_KEYWORD.exec(sql)?.[1]?.toUpperCase();
  if (keyword !== undefined && TRANSACTION_CONTROL.has(keyword)) {
    throw validationError(
      `transaction control statement ${keyword} is not allowed`,
      'Each request runs as one transaction. Remove BEGIN, COMMIT, ROLLBACK, SAVEPOINT and RELEASE items.',
    );
  }
}

function prepare(db: Connection, sql: string) {
  refuseTransactionControl(sql);
  return db.prepare(sql);
}

/** Statements that produce no rows are executed and yield an empty result. */
function runQuery(db: Connection, sql: string, params?: NamedParams): EngineRows {
  const stmt = prepare(db, sql);
  if (!stmt.reader) {
    if (params) stmt.run(params);
    else stmt.run();
    return { columns: [], rows: [] };
  }
  const columns = stmt.columns().map(c => c.name);
  stmt.raw(true);
  const rows = params ? stmt.all(params) : stmt.all();
  return { columns, rows: rows.map(toSqlRow) };
}

function prepareWriter(db: Connection, sql: string) {
  const stmt = prepare(db, sql);
  if (stmt.reader) {
    throw new GatewayError({
      code: 'ENGINE_ERROR',
      message: 'statement returns rows; send it as a query',
    });
  }
  return stmt;
}

function runStatement(db: Connection, sql: string, params?: NamedParams): number {
  const stmt = prepareWriter(db, sql);
  return (params ? stmt.run(params) : stmt.run()).changes;
}

function runBatch(db: Connection, sql: string, batch: NamedParams[]): number[] {
  const stmt = prepareWriter(db, sql);
  return batch.map(params => stmt.run(params).changes);
}

export class SqliteAdapter implements DatabaseAdapter {
  readonly name: string;
  readonly path: string;
  readonly readOnly: boolean;

  private config: DatabaseConfig;
  private emitter: GatewayEventEmitter;
  private db: Connection | null = null;
  private connectedAt: Date | null = null;
  private storedStatementCount: number;

  constructor(config: DatabaseConfig, emitter: GatewayEventEmitter) {
    this.config = config;
    this.emitter = emitter;
    this.name = config.name;
    this.path = config.path;
    this.readOnly = config.readOnly ?? false;
    this.storedStatementCount = config.storedStatements?.length ?? 0;
  }

  async connect(): Promise<void> {
    if (this.db) return;

    const created = this.path === MEMORY_PATH || !existsSync(this.path);
    let db: Connection | null = null;
    try {
      db = new Database(this.path);
      db.defaultSafeIntegers(true);

      const init = this.config.initStatements ?? [];
      if (created && init.length > 0) {
        const conn = db;
        conn.transaction(() => {
          for (const sql of init) conn.exec(sql);
        })();
      }

      if (this.readOnly) {
        db.pragma('query_only = ON');
      }
    } catch (err) {
      db?.close();
      const cause = mapNativeError(err, this.name);
      throw new GatewayError({
        code: 'CONNECTION_FAILED',
        message: `cannot open database "${this.name}" at ${this.path}: ${cause.message}`,
        fix: 'Check the path, its directory permissions and the initStatements.',
        database: this.name,
        engineCode: cause.engineCode,
        originalError: err,
      });
    }

    this.db = db;
    this.connectedAt = new Date();
    this.emitter.emit('connected', { database: this.name, path: this.path, created });
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.connectedAt = null;
    this.emitter.emit('closed', { database: this.name });
  }

  status(): DatabaseStatus {
    return {
      name: this.name,
      path: this.path,
      state: this.db ? 'connected' : 'closed',
      readOnly: this.readOnly,
      storedStatements: this.storedStatementCount,
      uptimeMs: this.connectedAt ? Date.now() - this.connectedAt.getTime() : 0,
    };
  }

  query(sql: string, params?: NamedParams): EngineRows {
    const db = this.requireDb();
    try {
      return runQuery(db, sql, params);
    } catch (err) {
      throw mapNativeError(err, this.name);
    }
  }

  withTransaction<T>(fn: (tx: SqlTransaction) => TransactionOutcome<T>): T {
    const db = this.requireDb();
    if (db.inTransaction) {
      throw new GatewayError({
        code: 'ENGINE_ERROR',
        message: `a transaction is already open on "${this.name}"`,
        database: this.name,
      });
    }

    db.exec('BEGIN');
    try {
      const outcome = fn(new SqliteTransaction(db, this.name));
      if (outcome.commit) {
        db.exec('COMMIT');
      } else if (db.inTransaction) {
        db.exec('ROLLBACK');
      }
      return outcome.value;
    } catch (err) {
      if (db.inTransaction) db.exec('ROLLBACK');
      throw mapNativeError(err, this.name);
    }
  }

  private requireDb(): Connection {
    if (!this.db) {
      throw new GatewayError({
        code: 'CONNECTION_FAILED',
        message: `database "${this.name}" is not open`,
        fix: 'Call connect() first, or create the gateway with SqlGateway.create().',
        database: this.name,
      });
    }
    return this.db;
  }
}

// ─── Transaction-Scoped Handle ───────────────────────────────────────────────

class SqliteTransaction implements SqlTransaction {
  private db: Connection;
  private database: string;

  constructor(db: Connection, database: string) {
    this.db = db;
    this.database = database;
  }

  get active(): boolean {
    return this.db.inTransaction;
  }

  query(sql: string, params?: NamedParams): EngineRows {
    try {
      return runQuery(this.db, sql, params);
    } catch (err) {
      throw mapNativeError(err, this.database);
    }
  }

  execute(sql: string, params?: NamedParams): number {
    try {
      return runStatement(this.db, sql, params);
    } catch (err) {
      throw mapNativeError(err, this.database);
    }
  }

  executeBatch(sql: string, batch: NamedParams[]): number[] {
    try {
      return runBatch(this.db, sql, batch);
    } catch (err) {
      throw mapNativeError(err, this.database);
    }
  }

  // better-sqlite3 turns a nested transaction() into SAVEPOINT / ROLLBACK TO / RELEASE.
  savepoint<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}
