/**
 * sqlgate Error System — Normalized errors with fix hints
 *
 * Every failure the gateway reports is a GatewayError. Native better-sqlite3
 * errors are normalized by mapNativeError before they leave an adapter, so the
 * orchestrator only ever sees one error type.
 */

import type { GatewayErrorCode } from './types.js';

// ─── GatewayError ────────────────────────────────────────────────────────────

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  readonly fix?: string;
  readonly database?: string;
  /** SQLite result code name, e.g. SQLITE_CONSTRAINT_UNIQUE. */
  readonly engineCode?: string;
  readonly originalError: unknown;
  readonly timestamp: Date;

  constructor(opts: {
    code: GatewayErrorCode;
    message: string;
    fix?: string;
    database?: string;
    engineCode?: string;
    originalError?: unknown;
  }) {
    super(opts.message);
    this.name = 'GatewayError';
    this.code = opts.code;
    this.fix = opts.fix;
    this.database = opts.database;
    this.engineCode = opts.engineCode;
    this.originalError = opts.originalError;
    this.timestamp = new Date();
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

/** Errors caused by the request itself rather than by the engine. */
export const CLIENT_ERROR: Record<GatewayErrorCode, boolean> = {
  VALIDATION_ERROR: true,
  RESOLUTION_ERROR: true,
  TRANSLATION_ERROR: true,
  ENGINE_ERROR: false,
  AUTH_ERROR: true,
  CONFIG_ERROR: false,
  DATABASE_NOT_FOUND: true,
  CONNECTION_FAILED: false,
};

// ─── Constructors ────────────────────────────────────────────────────────────

export function validationError(message: string, fix?: string): GatewayError {
  return new GatewayError({ code: 'VALIDATION_ERROR', message, fix });
}

export function translationError(param: string, reason: string): GatewayError {
  return new GatewayError({
    code: 'TRANSLATION_ERROR',
    message: `parameter "${param}" ${reason}`,
    fix: 'Parameters must be JSON null, numbers, strings or booleans.',
  });
}

export function authError(database: string): GatewayError {
  return new GatewayError({
    code: 'AUTH_ERROR',
    message: 'Authorization failed',
    database,
  });
}

export function databaseNotFoundError(name: string, known: string[]): GatewayError {
  const list = known.length > 0 ? `Configured databases: ${known.join(', ')}.` : 'No databases are configured.';
  return new GatewayError({
    code: 'DATABASE_NOT_FOUND',
    message: `database "${name}" is not configured`,
    fix: list,
    database: name,
  });
}

// ─── SQLite Error Mapping ────────────────────────────────────────────────────

/**
 * Normalize anything thrown by better-sqlite3 into an ENGINE_ERROR.
 * The engine's own message is kept verbatim; it is what clients see.
 */
export function mapNativeError(err: unknown, database?: string): GatewayError {
  if (err instanceof GatewayError) return err;

  const engineCode = readErrorCode(err);
  const message = err instanceof Error ? err.message : String(err);

  let fix: string | undefined;
  if (engineCode?.startsWith('SQLITE_CONSTRAINT')) {
    fix = 'A constraint rejected the row. Check unique keys, NOT NULL columns and foreign keys.';
  } else if (engineCode === 'SQLITE_READONLY') {
    fix = 'The database is read-only. Only queries are accepted.';
  } else if (engineCode === 'SQLITE_BUSY' || engineCode === 'SQLITE_LOCKED') {
    fix = 'Another connection holds a lock on the database file.';
  } else if (message.includes('no such table')) {
    fix = 'Create the table first, or list its DDL under initStatements.';
  } else if (message.includes('syntax error')) {
    fix = 'Check the SQL text.';
  }

  return new GatewayError({
    code: 'ENGINE_ERROR',
    message,
    fix,
    database,
    engineCode,
    originalError: err,
  });
}

function readErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}
