/**
 * sqlgate Auth Gate — credential checks before any transaction opens
 *
 * Where credentials come from depends on the mode:
 * - INLINE: the request body's "credentials"
 * - HTTP_BASIC: handed over by the transport, already parsed from the header
 *
 * How they are checked depends on the verifier: a configured credential list,
 * a query on the database itself, or a custom function.
 */

import { createHash, timingSafeEqual } from 'crypto';
import type { DatabaseAdapter } from './adapters/adapter.js';
import type { AuthConfig, CredentialEntry, CredentialVerifier, Credentials } from './types.js';

export function hashPassword(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}

function sameDigest(hexA: string, hexB: string): boolean {
  const a = Buffer.from(hexA, 'hex');
  const b = Buffer.from(hexB, 'hex');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function credentialListVerifier(entries: CredentialEntry[]): CredentialVerifier {
  return (user, password) => {
    const digest = hashPassword(password);
    return entries.some(entry => {
      if (entry.user !== user) return false;
      if (entry.hashedPassword !== undefined) {
        return sameDigest(digest, entry.hashedPassword.toLowerCase());
      }
      if (entry.password !== undefined) {
        return sameDigest(digest, hashPassword(entry.password));
      }
      return false;
    });
  };
}

/**
 * Authorized when the query returns at least one row.
 * The query sees the credentials as :user and :password.
 */
export function queryVerifier(adapter: DatabaseAdapter, sql: string): CredentialVerifier {
  return (user, password) => adapter.query(sql, { user, password }).rows.length > 0;
}

export function verifierFor(auth: AuthConfig, adapter: DatabaseAdapter): CredentialVerifier {
  if (auth.byQuery !== undefined) return queryVerifier(adapter, auth.byQuery);
  return credentialListVerifier(auth.byCredentials ?? []);
}

export function pickCredentials(
  auth: AuthConfig,
  fromBody: Credentials | undefined,
  fromTransport: Credentials | undefined,
): Credentials | undefined {
  return auth.mode === 'HTTP_BASIC' ? fromTransport : fromBody;
}

/**
 * True when the request may proceed. Missing credentials never pass.
 */
export async function authorize(
  verifier: CredentialVerifier,
  credentials: Credentials | undefined,
): Promise<boolean> {
  if (!credentials) return false;
  return await verifier(credentials.user, credentials.password);
}
