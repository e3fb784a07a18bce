/**
 * sqlgate Logger — Structured transaction logging
 *
 * Turns finished transactions and failed items into events, with timing.
 */

import type { GatewayErrorCode, TransactionSummary } from './types.js';
import type { GatewayEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowTransactionMs: number;
}

export class GatewayLogger {
  private config: LoggerConfig;
  private emitter: GatewayEventEmitter;

  constructor(config: LoggerConfig, emitter: GatewayEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Log a transaction that reached commit or rollback.
   */
  logTransaction(summary: TransactionSummary): void {
    if (!this.config.enabled) return;

    this.emitter.emit('transaction', summary);

    if (summary.durationMs >= this.config.slowTransactionMs) {
      this.emitter.emit('slow-transaction', {
        database: summary.database,
        durationMs: summary.durationMs,
        threshold: this.config.slowTransactionMs,
      });
    }
  }

  /**
   * Item failures are only reported in verbose mode, except the one that
   * aborted the batch.
   */
  logItemFailure(database: string, index: number, code: GatewayErrorCode, message: string, noFail: boolean): void {
    if (!this.config.enabled) return;
    if (noFail && !this.config.verbose) return;

    this.emitter.emit('item-failed', { database, index, code, message, noFail });
  }

  logAuthFailure(database: string, user?: string): void {
    if (!this.config.enabled) return;
    this.emitter.emit('auth-failed', { database, user });
  }

  /** 'error' has throw-if-unhandled semantics on EventEmitter; only emit when someone listens. */
  logError(code: GatewayErrorCode, message: string, database?: string): void {
    if (!this.config.enabled) return;
    if (this.emitter.listenerCount('error') === 0) return;
    this.emitter.emit('error', { code, message, database });
  }
}
