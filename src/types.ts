/**
 * sqlgate — All shared types and interfaces
 *
 * Wire shapes, the validated item model, configuration and events.
 * No file under src/ is imported from here.
 */

// ─── JSON Values ─────────────────────────────────────────────────────────────

export type JsonScalar = string | number | boolean | null;

export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };

export type JsonRow = Record<string, JsonValue>;

// ─── Engine Values ───────────────────────────────────────────────────────────

/** Values as the SQLite engine binds and returns them (safe-integer mode). */
export type SqlValue = null | bigint | number | string | Buffer;

/** Parameters bound by bare name (no `:`, `@` or `$` prefix). */
export type NamedParams = Record<string, SqlValue>;

export interface EngineRows {
  columns: string[];
  rows: SqlValue[][];
}

// ─── Request (wire) ──────────────────────────────────────────────────────────

export interface Credentials {
  user: string;
  password: string;
}

export interface RequestItem {
  query?: string;
  statement?: string;
  values?: Record<string, JsonValue>;
  valuesBatch?: Array<Record<string, JsonValue>>;
  noFail?: boolean;
}

export interface GatewayRequest {
  credentials?: Credentials;
  transaction: RequestItem[];
}

// ─── Validated Item Model ────────────────────────────────────────────────────

export type ItemKind = 'query' | 'statement';

export type ParamSet =
  | { mode: 'none' }
  | { mode: 'single'; values: Record<string, unknown> }
  | { mode: 'batch'; batch: Array<Record<string, unknown>> };

export interface TransactionItem {
  kind: ItemKind;
  /** Raw statement text or stored statement name, before resolution. */
  text: string;
  params: ParamSet;
  noFail: boolean;
}

// ─── Response (wire) ─────────────────────────────────────────────────────────

export interface ResponseItem {
  success: boolean;
  error?: string;
  resultSet?: JsonRow[];
  rowsUpdated?: number;
  rowsUpdatedBatch?: number[];
}

export interface SuccessResponse {
  success: true;
  results: ResponseItem[];
}

export interface FailureResponse {
  success: false;
  errorCode: number;
  message: string;
}

export type GatewayResponse = SuccessResponse | FailureResponse;

export interface GatewayResult {
  /** Transport status the caller should answer with. */
  status: number;
  body: GatewayResponse;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export type AuthMode = 'INLINE' | 'HTTP_BASIC';

export interface CredentialEntry {
  user: string;
  password?: string;
  /** Lowercase hex SHA-256 of the password. */
  hashedPassword?: string;
}

export interface AuthConfig {
  mode: AuthMode;
  customErrorCode?: number;
  byQuery?: string;
  byCredentials?: CredentialEntry[];
}

export interface StoredStatementConfig {
  id: string;
  sql: string;
}

export interface DatabaseConfig {
  name: string;
  path: string;
  readOnly?: boolean;
  auth?: AuthConfig;
  useOnlyStoredStatements?: boolean;
  storedStatements?: StoredStatementConfig[];
  initStatements?: string[];
}

export interface GatewayConfig {
  databases: DatabaseConfig[];
  slowTransactionMs?: number;
  logging?: boolean | 'verbose';
  engineErrorStatus?: 400 | 500;
}

/** `(user, password) → authorized` */
export type CredentialVerifier = (user: string, password: string) => boolean | Promise<boolean>;

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type GatewayErrorCode =
  | 'VALIDATION_ERROR'
  | 'RESOLUTION_ERROR'
  | 'TRANSLATION_ERROR'
  | 'ENGINE_ERROR'
  | 'AUTH_ERROR'
  | 'CONFIG_ERROR'
  | 'DATABASE_NOT_FOUND'
  | 'CONNECTION_FAILED';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface TransactionSummary {
  database: string;
  items: number;
  committed: boolean;
  failedIndex?: number;
  durationMs: number;
}

export interface GatewayEvents {
  connected: { database: string; path: string; created: boolean };
  closed: { database: string };
  transaction: TransactionSummary;
  'slow-transaction': { database: string; durationMs: number; threshold: number };
  'item-failed': { database: string; index: number; code: GatewayErrorCode; message: string; noFail: boolean };
  'auth-failed': { database: string; user?: string };
  error: { code: GatewayErrorCode; message: string; database?: string };
}

// ─── Status ──────────────────────────────────────────────────────────────────

export interface DatabaseStatus {
  name: string;
  path: string;
  state: 'connected' | 'closed';
  readOnly: boolean;
  storedStatements: number;
  uptimeMs: number;
}
