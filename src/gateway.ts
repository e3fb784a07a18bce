/**
 * sqlgate — The Gateway
 *
 * One entry point per call. Every request flows through the pipeline:
 *
 *   transport call → SqlGateway.execute (router)
 *     → validate envelope
 *     → registry (take the database's connection)
 *     → auth gate
 *     → transaction orchestrator (items in order, commit or rollback)
 *     → logger (emit events)
 *     → registry (give the connection back)
 *     → { status, body } to the transport
 */

import { SqliteAdapter } from './adapters/sqlite-adapter.js';
import { authorize, pickCredentials, verifierFor } from './auth.js';
import { parseGatewayConfig } from './config.js';
import { CLIENT_ERROR, GatewayError, authError, databaseNotFoundError, mapNativeError } from './errors.js';
import { GatewayEventEmitter } from './events.js';
import type { GatewayEventName, GatewayListener } from './events.js';
import { GatewayLogger } from './logger.js';
import { ConnectionRegistry } from './registry.js';
import type { DatabaseEntry } from './registry.js';
import { REQUEST_LEVEL_ERROR, errorResponse, okResponse } from './response.js';
import { StoredStatements } from './statements.js';
import { runTransaction } from './transaction.js';
import type {
  CredentialVerifier,
  Credentials,
  DatabaseStatus,
  GatewayConfig,
  GatewayResult,
} from './types.js';
import { parseRequest } from './validate.js';
import type { ParsedRequest } from './validate.js';

export interface GatewayOptions {
  /** Custom credential verifiers by database name; they replace byQuery / byCredentials. */
  verifiers?: Record<string, CredentialVerifier>;
}

export interface ExecuteOptions {
  /** Credentials the transport parsed from an `Authorization: Basic` header. */
  basicAuth?: Credentials;
}

const STATUS_OK = 200;
const STATUS_BAD_REQUEST = 400;
const STATUS_UNAUTHORIZED = 401;
const STATUS_NOT_FOUND = 404;
const STATUS_SERVER_ERROR = 500;

export class SqlGateway {
  private registry: ConnectionRegistry;
  private emitter: GatewayEventEmitter;
  private logger: GatewayLogger;
  private engineErrorStatus: number;

  private constructor(
    config: GatewayConfig,
    registry: ConnectionRegistry,
    emitter: GatewayEventEmitter,
    logger: GatewayLogger,
  ) {
    this.registry = registry;
    this.emitter = emitter;
    this.logger = logger;
    this.engineErrorStatus = config.engineErrorStatus ?? STATUS_BAD_REQUEST;
  }

  /**
   * Validate the configuration and open every database in it.
   */
  static async create(config: GatewayConfig, options: GatewayOptions = {}): Promise<SqlGateway> {
    const parsed = parseGatewayConfig(config);
    const emitter = new GatewayEventEmitter();
    const logger = new GatewayLogger(
      {
        enabled: parsed.logging !== false,
        verbose: parsed.logging === 'verbose',
        slowTransactionMs: parsed.slowTransactionMs ?? 1000,
      },
      emitter,
    );

    const registry = new ConnectionRegistry();
    try {
      for (const db of parsed.databases) {
        const statements = StoredStatements.from(db.storedStatements, db.name);
        const adapter = new SqliteAdapter(db, emitter);
        await adapter.connect();
        const verifier = db.auth
          ? options.verifiers?.[db.name] ?? verifierFor(db.auth, adapter)
          : undefined;
        registry.register({ config: db, adapter, statements, verifier });
      }
    } catch (err) {
      await registry.closeAll();
      throw err;
    }

    return new SqlGateway(parsed, registry, emitter, logger);
  }

  // ─── Execution ─────────────────────────────────────────────────────────────

  /**
   * Run one JSON request against the named database.
   * Never throws for request or engine problems; they come back as a failure body.
   */
  async execute(database: string, body: unknown, options: ExecuteOptions = {}): Promise<GatewayResult> {
    let request: ParsedRequest;
    try {
      request = parseRequest(body);
    } catch (err) {
      return this.requestFailure(STATUS_BAD_REQUEST, mapNativeError(err, database));
    }

    if (!this.registry.has(database)) {
      return this.requestFailure(STATUS_NOT_FOUND, databaseNotFoundError(database, this.registry.names()));
    }

    try {
      return await this.registry.withConnection(database, entry => this.process(entry, request, options));
    } catch (err) {
      return this.requestFailure(STATUS_SERVER_ERROR, mapNativeError(err, database));
    }
  }

  private async process(entry: DatabaseEntry, request: ParsedRequest, options: ExecuteOptions): Promise<GatewayResult> {
    const { config } = entry;

    if (config.auth) {
      const credentials = pickCredentials(config.auth, request.credentials, options.basicAuth);
      const verifier = entry.verifier ?? verifierFor(config.auth, entry.adapter);
      if (!(await authorize(verifier, credentials))) {
        this.logger.logAuthFailure(config.name, credentials?.user);
        const error = authError(config.name);
        return {
          status: config.auth.customErrorCode ?? STATUS_UNAUTHORIZED,
          body: errorResponse(REQUEST_LEVEL_ERROR, error.message),
        };
      }
    }

    const startTime = Date.now();
    const report = runTransaction(entry.adapter, request.items, {
      database: config.name,
      statements: entry.statements,
      storedOnly: config.useOnlyStoredStatements ?? false,
      logger: this.logger,
    });

    this.logger.logTransaction({
      database: config.name,
      items: request.items.length,
      committed: report.committed,
      failedIndex: report.committed ? undefined : report.failedIndex,
      durationMs: Date.now() - startTime,
    });

    if (report.committed) {
      return { status: STATUS_OK, body: okResponse(report.results) };
    }
    return {
      status: CLIENT_ERROR[report.error.code] ? STATUS_BAD_REQUEST : this.engineErrorStatus,
      body: errorResponse(report.failedIndex, report.error.message),
    };
  }

  private requestFailure(status: number, error: GatewayError): GatewayResult {
    this.logger.logError(error.code, error.message, error.database);
    return { status, body: errorResponse(REQUEST_LEVEL_ERROR, error.message) };
  }

  // ─── Status & Health ───────────────────────────────────────────────────────

  databases(): string[] {
    return this.registry.names();
  }

  status(): DatabaseStatus[] {
    return this.registry.entries().map(e => e.adapter.status());
  }

  // ─── Events ────────────────────────────────────────────────────────────────

  on<E extends GatewayEventName>(event: E, listener: GatewayListener<E>): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends GatewayEventName>(event: E, listener: GatewayListener<E>): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends GatewayEventName>(event: E, listener: GatewayListener<E>): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /** Waits for in-flight requests, then closes every database. */
  async close(): Promise<void> {
    await this.registry.closeAll();
  }
}
