/**
 * shadow-alter - Error Types
 *
 * Custom error classes for session, driver and migration failures.
 * Session failures form the closed `SessionError` union, discriminated by `kind`,
 * so retry and exit-code decisions can switch over them exhaustively.
 */

/**
 * Base error class for shadow-alter
 */
export class ShadowAlterError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ShadowAlterError";
  }
}

/**
 * Why a connection attempt failed
 */
export type ConnectFailureReason =
  | "auth" // credentials rejected
  | "network" // refused, reset, unreachable
  | "timeout" // connect timeout elapsed
  | "protocol" // unsupported auth plugin, TLS or protocol version
  | "schema-missing" // target database/schema does not exist
  | "config"; // server rejected session setup

/**
 * Only transport-level causes are worth another attempt.
 */
export function isRetryableConnectFailure(reason: ConnectFailureReason): boolean {
  switch (reason) {
    case "network":
    case "timeout":
      return true;
    case "auth":
    case "protocol":
    case "schema-missing":
    case "config":
      return false;
  }
}

/**
 * Handshake, authentication or network failure while establishing a connection
 */
export class ConnectError extends ShadowAlterError {
  readonly kind = "connect" as const;

  constructor(
    message: string,
    public readonly reason: ConnectFailureReason,
    details?: Record<string, unknown>,
  ) {
    super(message, "CONNECT_ERROR", { reason, ...details });
    this.name = "ConnectError";
  }

  get retryable(): boolean {
    return isRetryableConnectFailure(this.reason);
  }
}

/**
 * A statement failed while the connection was healthy
 */
export class OperationError extends ShadowAlterError {
  readonly kind = "operation" as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "OPERATION_ERROR", details);
    this.name = "OperationError";
  }
}

/**
 * The transport broke while an operation was in flight
 */
export class ConnectivityLostError extends ShadowAlterError {
  readonly kind = "connectivity-lost" as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONNECTIVITY_LOST", details);
    this.name = "ConnectivityLostError";
  }
}

/**
 * What ran out of time
 */
export type TimeoutTrigger =
  | "deadline" // caller or default per-operation deadline
  | "connect-timeout" // a single connect attempt
  | "statement-timeout" // server-side statement timeout
  | "cancelled"; // caller aborted the signal

export class TimeoutError extends ShadowAlterError {
  readonly kind = "timeout" as const;

  constructor(
    message: string,
    public readonly trigger: TimeoutTrigger,
    details?: Record<string, unknown>,
  ) {
    super(message, "TIMEOUT", { trigger, ...details });
    this.name = "TimeoutError";
  }
}

/**
 * Any call made after the session reached FAILED or CLOSED
 */
export class SessionClosedError extends ShadowAlterError {
  readonly kind = "session-closed" as const;

  constructor(
    message: string,
    public readonly failure: SessionError | null = null,
  ) {
    super(
      message,
      "SESSION_CLOSED",
      failure ? { failure: failure.code } : undefined,
    );
    this.name = "SessionClosedError";
  }
}

export type SessionError =
  | ConnectError
  | OperationError
  | ConnectivityLostError
  | TimeoutError
  | SessionClosedError;

export function isSessionError(error: unknown): error is SessionError {
  return (
    error instanceof ConnectError ||
    error instanceof OperationError ||
    error instanceof ConnectivityLostError ||
    error instanceof TimeoutError ||
    error instanceof SessionClosedError
  );
}

/**
 * Validation error for configuration and migration plans
 */
export class ValidationError extends ShadowAlterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * Error thrown when an identifier is invalid
 */
export class InvalidIdentifierError extends ShadowAlterError {
  constructor(
    public readonly identifier: string,
    public readonly reason: string,
  ) {
    super(`Invalid identifier "${identifier}": ${reason}`, "INVALID_IDENTIFIER", {
      identifier,
    });
    this.name = "InvalidIdentifierError";
  }
}
