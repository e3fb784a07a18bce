/**
 * sqlgate — Public API Entry Point
 *
 * JSON-described SQL transactions against embedded SQLite databases.
 */

// Main class
export { SqlGateway } from './gateway.js';
export type { ExecuteOptions, GatewayOptions } from './gateway.js';

// Events
export type { GatewayEventName, GatewayListener } from './events.js';

// Configuration
export { parseGatewayConfig, loadGatewayConfig } from './config.js';

// Error class
export { GatewayError } from './errors.js';

// Building blocks, usable on their own
export { StoredStatements, resolveStatement } from './statements.js';
export { translateParams } from './param-translator.js';
export { translateRows } from './result-translator.js';
export { credentialListVerifier, hashPassword } from './auth.js';

// Types
export type {
  AuthConfig,
  AuthMode,
  CredentialEntry,
  Credentials,
  CredentialVerifier,
  DatabaseConfig,
  DatabaseStatus,
  FailureResponse,
  GatewayConfig,
  GatewayErrorCode,
  GatewayEvents,
  GatewayRequest,
  GatewayResponse,
  GatewayResult,
  JsonRow,
  JsonValue,
  RequestItem,
  ResponseItem,
  StoredStatementConfig,
  SuccessResponse,
  TransactionSummary,
} from './types.js';
