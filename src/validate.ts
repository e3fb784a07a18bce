/**
 * sqlgate Request Validation — JSON body → validated request and items
 *
 * The envelope is checked once up front. Items are checked one at a time by
 * the orchestrator, so a malformed item is an item failure that the noFail
 * policy applies to, not a rejected request.
 */

import { z } from 'zod';
import { validationError } from './errors.js';
import type { Credentials, ParamSet, TransactionItem } from './types.js';

const paramsSchema = z.record(z.unknown());

export const credentialsSchema = z.object({
  user: z.string(),
  password: z.string(),
});

export const requestSchema = z.object({
  credentials: credentialsSchema.nullish(),
  transaction: z.array(z.unknown()),
});

export const itemSchema = z.object({
  query: z.string().nullish(),
  statement: z.string().nullish(),
  values: paramsSchema.nullish(),
  valuesBatch: z.array(paramsSchema).nullish(),
  noFail: z.boolean().nullish(),
});

export interface ParsedRequest {
  credentials?: Credentials;
  items: unknown[];
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join(', ');
}

export function parseRequest(body: unknown): ParsedRequest {
  const parsed = requestSchema.safeParse(body);
  if (!parsed.success) {
    throw validationError(
      `malformed request: ${formatIssues(parsed.error)}`,
      'Send { "transaction": [ ... ] } with optional "credentials": { "user", "password" }.',
    );
  }
  return {
    credentials: parsed.data.credentials ?? undefined,
    items: parsed.data.transaction,
  };
}

/**
 * Build the tagged item, enforcing exactly one of query/statement and at most
 * one of values/valuesBatch.
 */
export function validateItem(raw: unknown): TransactionItem {
  const parsed = itemSchema.safeParse(raw);
  if (!parsed.success) {
    throw validationError(`malformed transaction item: ${formatIssues(parsed.error)}`);
  }
  const { query, statement, values, valuesBatch, noFail } = parsed.data;

  const hasQuery = query !== null && query !== undefined;
  const hasStatement = statement !== null && statement !== undefined;
  if (hasQuery === hasStatement) {
    throw validationError("exactly one of 'query' and 'statement' must be provided");
  }

  let params: ParamSet;
  if (values && valuesBatch) {
    throw validationError("at most one of 'values' and 'valuesBatch' must be provided");
  } else if (valuesBatch) {
    if (hasQuery) {
      throw validationError("'valuesBatch' is only accepted for statements");
    }
    params = { mode: 'batch', batch: valuesBatch };
  } else if (values) {
    params = { mode: 'single', values };
  } else {
    params = { mode: 'none' };
  }

  return {
    kind: hasQuery ? 'query' : 'statement',
    text: query ?? statement ?? '',
    params,
    noFail: noFail ?? false,
  };
}

/** Best-effort read of noFail from an item that failed validation. */
export function readNoFail(raw: unknown): boolean {
  if (typeof raw !== 'object' || raw === null || !('noFail' in raw)) return false;
  return raw.noFail === true;
}
