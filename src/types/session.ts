/**
 * shadow-alter - Session Types
 *
 * Connection configuration, retry policy and the operation contract
 * of the session manager.
 */

/**
 * Supported database dialects
 */
export type Dialect = "mysql" | "postgres";

/**
 * TLS settings; `false` disables TLS entirely
 */
export type SslConfig =
  | false
  | {
      rejectUnauthorized: boolean;
      ca?: string | undefined;
    };

/**
 * Immutable connection configuration, loaded once at startup
 */
export interface ConnectionConfig {
  readonly dialect: Dialect;
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password?: string | undefined;

  /** Database to connect to (MySQL schema) */
  readonly database: string;

  /** PostgreSQL schema that must exist and is put on the search path */
  readonly schema?: string | undefined;

  readonly ssl: SslConfig;

  /** Bound on a single connect attempt in ms */
  readonly connectTimeoutMs: number;

  /** Default per-operation deadline in ms (0 = none) */
  readonly queryTimeoutMs: number;

  /** Reported to the server where the protocol supports it */
  readonly applicationName: string;
}

/**
 * Capped exponential backoff for connect and reconnect attempts
 */
export interface RetryPolicy {
  /** Connect attempts per connect episode, including the first */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
}

/**
 * Session lifecycle states
 */
export type SessionState =
  | "DISCONNECTED"
  | "CONNECTING"
  | "READY"
  | "DEGRADED"
  | "FAILED"
  | "CLOSED";

/**
 * A unit of work submitted through `SessionManager.execute`
 */
export interface OperationRequest {
  sql: string;
  params?: readonly unknown[] | undefined;

  /**
   * Whether the statement may run twice with the same net effect.
   * Inferred from the leading keyword when omitted.
   */
  idempotent?: boolean | undefined;
}

/**
 * Successful outcome of an operation
 */
export interface OperationResult {
  rows: Record<string, unknown>[];

  /** Rows returned or affected */
  rowCount: number;

  /** Command tag, where the driver reports one */
  command?: string | undefined;

  durationMs: number;

  /** 2 when the operation was re-run after a reconnect */
  attempts: number;
}

/**
 * Per-call deadline and cancellation
 */
export interface CallOptions {
  /** Overrides the configured query timeout for this call */
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface SessionStats {
  operations: number;
  failedOperations: number;
  connectAttempts: number;
  reconnects: number;
}

export interface HealthStatus {
  state: SessionState;
  connected: boolean;
  latencyMs?: number | undefined;
  retryCount: number;
  lastActivityAt?: Date | undefined;
  error?: string | undefined;
}

export type StateChangeListener = (
  to: SessionState,
  from: SessionState,
) => void;
