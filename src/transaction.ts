/**
 * sqlgate Transaction Orchestrator
 *
 * One request, one transaction, items strictly in input order:
 *
 *   validate item → resolve SQL → translate params → engine → translate rows
 *
 * A failing item with noFail is recorded and processing continues; its own
 * effects are undone through a savepoint, earlier items' effects stay. A
 * failing item without noFail stops processing and the whole transaction is
 * rolled back. Exactly one of commit / rollback happens per call.
 */

import type { DatabaseAdapter, SqlTransaction } from './adapters/adapter.js';
import { GatewayError, mapNativeError, validationError } from './errors.js';
import type { GatewayLogger } from './logger.js';
import { translateParams } from './param-translator.js';
import { batchResult, failedItem, queryResult, statementResult } from './response.js';
import { translateRows } from './result-translator.js';
import { resolveStatement } from './statements.js';
import type { StoredStatements } from './statements.js';
import type { ResponseItem, TransactionItem } from './types.js';
import { readNoFail, validateItem } from './validate.js';

export interface TransactionContext {
  database: string;
  statements: StoredStatements;
  storedOnly: boolean;
  logger?: GatewayLogger;
}

export type TransactionReport =
  | { committed: true; results: ResponseItem[] }
  | { committed: false; failedIndex: number; error: GatewayError };

export function executeItem(tx: SqlTransaction, item: TransactionItem, ctx: TransactionContext): ResponseItem {
  const sql = resolveStatement(item.text, ctx.statements, ctx.storedOnly);
  const { params } = item;

  if (item.kind === 'query') {
    switch (params.mode) {
      case 'none':
        return queryResult(translateRows(tx.query(sql)));
      case 'single':
        return queryResult(translateRows(tx.query(sql, translateParams(params.values))));
      case 'batch':
        throw validationError("'valuesBatch' is only accepted for statements");
    }
  }

  switch (params.mode) {
    case 'none':
      return statementResult(tx.execute(sql));
    case 'single':
      return statementResult(tx.execute(sql, translateParams(params.values)));
    case 'batch':
      return batchResult(tx.executeBatch(sql, params.batch.map(translateParams)));
  }
}

/**
 * Run every item of one request inside a single transaction on adapter.
 * The caller must hold the adapter exclusively for the duration of the call.
 */
export function runTransaction(
  adapter: DatabaseAdapter,
  items: unknown[],
  ctx: TransactionContext,
): TransactionReport {
  return adapter.withTransaction<TransactionReport>(tx => {
    const results: ResponseItem[] = [];
    const abort = (failedIndex: number, error: GatewayError) => ({
      commit: false,
      value: { committed: false as const, failedIndex, error },
    });

    for (const [index, raw] of items.entries()) {
      let noFail = readNoFail(raw);
      try {
        const item = validateItem(raw);
        noFail = item.noFail;
        results.push(noFail ? tx.savepoint(() => executeItem(tx, item, ctx)) : executeItem(tx, item, ctx));
      } catch (err) {
        const error = mapNativeError(err, ctx.database);
        ctx.logger?.logItemFailure(ctx.database, index, error.code, error.message, noFail);

        if (!noFail) return abort(index, error);

        // Some engine errors (disk full, I/O) roll back the whole transaction.
        // Carrying on would run later items in autocommit mode.
        if (!tx.active) {
          return abort(index, new GatewayError({
            code: error.code,
            message: `${error.message} (the engine rolled back the transaction)`,
            database: ctx.database,
            engineCode: error.engineCode,
            originalError: error,
          }));
        }

        results.push(failedItem(error.message));
        continue;
      }

      if (!tx.active) {
        const lost = new GatewayError({
          code: 'ENGINE_ERROR',
          message: 'the engine ended the transaction early',
          database: ctx.database,
        });
        ctx.logger?.logItemFailure(ctx.database, index, lost.code, lost.message, noFail);
        return abort(index, lost);
      }
    }

    return { commit: true, value: { committed: true, results } };
  });
}
