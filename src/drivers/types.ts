/**
 * shadow-alter - Driver Contract
 *
 * A driver opens exactly one physical connection per `connect` call. The session
 * manager owns the handle's lifetime; drivers never reconnect on their own.
 */

import type { ConnectionConfig, Dialect } from "../types/session.js";

/**
 * Closed classification of driver failures
 */
export type FaultKind =
  | "auth" // credentials or privileges rejected at login
  | "schema-missing" // database or schema does not exist
  | "protocol" // unsupported protocol, auth plugin or TLS mode
  | "network" // transport refused, reset or unreachable
  | "timeout" // server or socket timeout
  | "statement" // server rejected the statement; connection still usable
  | "unknown";

export interface DriverResult {
  rows: Record<string, unknown>[];
  rowCount: number;
  command?: string | undefined;
}

export interface DriverConnection {
  query(sql: string, params: readonly unknown[]): Promise<DriverResult>;
  ping(): Promise<void>;

  /** False once the transport has ended or errored */
  isAlive(): boolean;

  /** Called once when the transport ends or errors outside a query */
  onLost(listener: (error?: unknown) => void): void;

  /** Graceful end */
  close(): Promise<void>;

  /** Immediate teardown; never throws */
  destroy(): void;
}

export interface DatabaseDriver {
  readonly dialect: Dialect;
  connect(config: ConnectionConfig): Promise<DriverConnection>;
  classify(error: unknown): FaultKind;
}
