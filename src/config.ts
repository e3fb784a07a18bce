/**
 * sqlgate Configuration — zod schemas for the gateway and its databases
 *
 * parseGatewayConfig() validates an in-memory object, loadGatewayConfig()
 * reads a JSON file first. Both throw CONFIG_ERROR with every zod issue.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { GatewayError } from './errors.js';
import type { GatewayConfig } from './types.js';
import { formatIssues } from './validate.js';

const nameSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, 'use letters, digits, "_" and "-" only');

const credentialEntrySchema = z.object({
  user: z.string().min(1),
  password: z.string().optional(),
  hashedPassword: z.string().regex(/^[0-9a-fA-F]{64}$/, 'must be a hex SHA-256 digest').optional(),
}).refine(
  e => (e.password === undefined) !== (e.hashedPassword === undefined),
  { message: 'give exactly one of password and hashedPassword' },
);

const authSchema = z.object({
  mode: z.enum(['INLINE', 'HTTP_BASIC']).default('INLINE'),
  customErrorCode: z.number().int().min(100).max(599).optional(),
  byQuery: z.string().min(1).optional(),
  byCredentials: z.array(credentialEntrySchema).min(1).optional(),
}).refine(
  a => (a.byQuery === undefined) !== (a.byCredentials === undefined),
  { message: 'give exactly one of byQuery and byCredentials' },
);

const storedStatementSchema = z.object({
  id: z.string().min(1),
  sql: z.string().min(1),
});

export const databaseConfigSchema = z.object({
  name: nameSchema,
  path: z.string().min(1),
  readOnly: z.boolean().optional(),
  auth: authSchema.optional(),
  useOnlyStoredStatements: z.boolean().optional(),
  storedStatements: z.array(storedStatementSchema).optional(),
  initStatements: z.array(z.string().min(1)).optional(),
}).refine(
  db => !db.useOnlyStoredStatements || (db.storedStatements?.length ?? 0) > 0,
  { message: 'useOnlyStoredStatements needs at least one stored statement', path: ['useOnlyStoredStatements'] },
);

export const gatewayConfigSchema = z.object({
  databases: z.array(databaseConfigSchema).min(1),
  slowTransactionMs: z.number().int().nonnegative().optional(),
  logging: z.union([z.boolean(), z.literal('verbose')]).optional(),
  engineErrorStatus: z.union([z.literal(400), z.literal(500)]).optional(),
}).superRefine((cfg, ctx) => {
  const seen = new Set<string>();
  cfg.databases.forEach((db, i) => {
    if (seen.has(db.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate database name "${db.name}"`,
        path: ['databases', i, 'name'],
      });
    }
    seen.add(db.name);
  });
});

export function parseGatewayConfig(input: unknown): GatewayConfig {
  const parsed = gatewayConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new GatewayError({
      code: 'CONFIG_ERROR',
      message: `invalid configuration: ${formatIssues(parsed.error)}`,
      originalError: parsed.error,
    });
  }
  return parsed.data;
}

export function loadGatewayConfig(file: string): GatewayConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    throw new GatewayError({
      code: 'CONFIG_ERROR',
      message: `cannot read configuration from ${file}: ${err instanceof Error ? err.message : String(err)}`,
      originalError: err,
    });
  }
  return parseGatewayConfig(raw);
}
