/**
 * shadow-alter - Session Manager
 *
 * Owns one logical database session on top of a single physical connection.
 * Connects lazily, reconnects with capped exponential backoff after a loss,
 * and re-runs an operation once on the new connection only when it is
 * idempotent. All reconnect triggers share one in-flight attempt.
 *
 * State machine:
 *   DISCONNECTED -> CONNECTING -> READY <-> DEGRADED -> CONNECTING
 *   any -> FAILED (non-retryable connect failure or exhausted budget)
 *   any -> CLOSED (close)
 */

import { createDriver } from "../drivers/index.js";
import { errorCode, errorMessage } from "../drivers/faults.js";
import type { DatabaseDriver, DriverConnection } from "../drivers/types.js";
import {
  ConnectError,
  ConnectivityLostError,
  OperationError,
  SessionClosedError,
  TimeoutError,
  ValidationError,
} from "../types/errors.js";
import type { SessionError } from "../types/errors.js";
import type {
  CallOptions,
  ConnectionConfig,
  Dialect,
  HealthStatus,
  OperationRequest,
  OperationResult,
  RetryPolicy,
  SessionState,
  SessionStats,
  StateChangeListener,
} from "../types/session.js";
import { logger } from "../utils/logger.js";
import { isReadOnlyStatement } from "../utils/sql.js";
import { abortReason, createDeadline, raceAbort } from "./deadline.js";
import { computeBackoff, resolveRetryPolicy, sleep } from "./retry.js";
import type { RetryOverrides } from "./retry.js";
import { SerialQueue } from "./SerialQueue.js";

const log = logger.forModule("SESSION");

/** Marks an operation that reached the queue after its connection was replaced */
const STALE = Symbol("stale-connection");

export interface SessionOptions {
  /** Defaults to the driver for `config.dialect` */
  driver?: DatabaseDriver | undefined;
  retry?: RetryOverrides | undefined;

  /** Idle ping interval in ms (0 = off) */
  healthCheckIntervalMs?: number | undefined;
}

interface ConnectFlight {
  readonly promise: Promise<DriverConnection>;
  readonly controller: AbortController;
  waiters: number;

  /** Started by loss detection; never abandoned by its waiters */
  readonly detached: boolean;
}

function preview(sql: string): string {
  return sql.replace(/\s+/g, " ").trim().substring(0, 100);
}

export class SessionManager {
  private state: SessionState = "DISCONNECTED";
  private handle: DriverConnection | null = null;
  private flight: ConnectFlight | null = null;
  private failure: SessionError | null = null;
  private everConnected = false;
  private retryCount = 0;
  private lastActivityAt: Date | null = null;
  private healthTimer: NodeJS.Timeout | null = null;

  private readonly driver: DatabaseDriver;
  private readonly retry: RetryPolicy;
  private readonly healthCheckIntervalMs: number;
  private readonly queue = new SerialQueue();
  private readonly listeners = new Set<StateChangeListener>();
  private readonly stats: SessionStats = {
    operations: 0,
    failedOperations: 0,
    connectAttempts: 0,
    reconnects: 0,
  };

  constructor(
    private readonly config: ConnectionConfig,
    options: SessionOptions = {},
  ) {
    this.driver = options.driver ?? createDriver(config.dialect);
    if (this.driver.dialect !== config.dialect) {
      throw new ValidationError("Driver dialect does not match configuration", {
        driver: this.driver.dialect,
        dialect: config.dialect,
      });
    }
    this.retry = resolveRetryPolicy(options.retry);
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 0;
  }

  // =========================================================================
  // Introspection
  // =========================================================================

  get dialect(): Dialect {
    return this.config.dialect;
  }

  getConfig(): ConnectionConfig {
    return this.config;
  }

  getState(): SessionState {
    return this.state;
  }

  /** Failed attempts in the current connect episode */
  getRetryCount(): number {
    return this.retryCount;
  }

  getLastActivityAt(): Date | null {
    return this.lastActivityAt;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  /**
   * Subscribe to state transitions; returns the unsubscribe function
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // =========================================================================
  // Public operations
  // =========================================================================

  /**
   * Connect if not connected. Resolves once READY.
   */
  async open(options: CallOptions = {}): Promise<void> {
    const deadline = createDeadline({
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
    try {
      await this.acquire(deadline.signal);
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Run one statement. A statement interrupted by connectivity loss is re-run
   * once after reconnecting if it is idempotent; otherwise the loss surfaces.
   */
  async execute(
    request: OperationRequest,
    options: CallOptions = {},
  ): Promise<OperationResult> {
    const idempotent =
      request.idempotent ?? isReadOnlyStatement(request.sql, this.config.dialect);
    const deadline = createDeadline({
      timeoutMs:
        options.timeoutMs ??
        (this.config.queryTimeoutMs > 0 ? this.config.queryTimeoutMs : undefined),
      signal: options.signal,
    });

    try {
      try {
        return await this.attempt(request, deadline.signal, 1);
      } catch (error) {
        if (!(error instanceof ConnectivityLostError)) {
          throw error;
        }
        if (!idempotent) {
          log.warn("Connection lost during non-idempotent operation; not re-executing", {
            operation: "execute",
            sql: preview(request.sql),
          });
          throw error;
        }
        log.info("Connection lost during idempotent operation; retrying once", {
          operation: "execute",
          sql: preview(request.sql),
        });
        return await this.attempt(request, deadline.signal, 2);
      }
    } catch (error) {
      this.stats.failedOperations++;
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Release the connection. Idempotent and never throws.
   */
  async close(): Promise<void> {
    if (this.state === "CLOSED") {
      return;
    }

    this.stopHealthCheck();
    const flight = this.flight;
    const handle = this.handle;
    this.flight = null;
    this.handle = null;
    this.setState("CLOSED");

    flight?.controller.abort(
      new SessionClosedError("Session closed while connecting"),
    );
    if (handle !== null) {
      await this.release(handle);
    }

    log.info("Session closed", { ...this.stats });
  }

  /**
   * Return a FAILED or CLOSED session to DISCONNECTED so it can be opened again
   */
  reset(): void {
    if (this.state !== "FAILED" && this.state !== "CLOSED") {
      return;
    }
    this.failure = null;
    this.retryCount = 0;
    this.everConnected = false;
    this.setState("DISCONNECTED");
  }

  /**
   * Ping the current connection. Never opens one.
   */
  async checkHealth(): Promise<HealthStatus> {
    const connection = this.handle;
    if (this.state !== "READY" || connection === null) {
      return {
        state: this.state,
        connected: false,
        retryCount: this.retryCount,
        lastActivityAt: this.lastActivityAt ?? undefined,
        error: this.failure?.message ?? `Session is ${this.state}`,
      };
    }

    const startedAt = Date.now();
    const deadline = createDeadline({ timeoutMs: this.config.connectTimeoutMs });
    const probe = { started: false };

    try {
      await this.queue.run(async () => {
        if (this.handle !== connection) {
          return;
        }
        probe.started = true;
        await raceAbort(connection.ping(), deadline.signal);
      }, deadline.signal);

      const connected = this.handle === connection;
      if (connected) {
        this.lastActivityAt = new Date();
      }
      return {
        state: this.state,
        connected,
        latencyMs: Date.now() - startedAt,
        retryCount: this.retryCount,
        lastActivityAt: this.lastActivityAt ?? undefined,
      };
    } catch (error) {
      let message = errorMessage(error);
      if (deadline.signal.aborted) {
        // a ping stuck on the wire leaves the handle in an unknown state
        if (probe.started) {
          this.degrade(connection);
        }
      } else {
        message = this.toOperationFailure(connection, error).message;
      }
      return {
        state: this.state,
        connected: false,
        retryCount: this.retryCount,
        lastActivityAt: this.lastActivityAt ?? undefined,
        error: message,
      };
    } finally {
      deadline.dispose();
    }
  }

  // =========================================================================
  // Operations
  // =========================================================================

  private async attempt(
    request: OperationRequest,
    signal: AbortSignal,
    attempts: number,
  ): Promise<OperationResult> {
    for (;;) {
      const connection = await this.acquire(signal);
      const outcome = await this.queue.run<OperationResult | typeof STALE>(
        async () => {
          if (this.handle !== connection) {
            return STALE;
          }
          return this.runOn(connection, request, signal, attempts);
        },
        signal,
      );
      if (outcome !== STALE) {
        return outcome;
      }
    }
  }

  private async runOn(
    connection: DriverConnection,
    request: OperationRequest,
    signal: AbortSignal,
    attempts: number,
  ): Promise<OperationResult> {
    const startedAt = Date.now();
    const pending = connection.query(request.sql, request.params ?? []);

    try {
      const result = await raceAbort(pending, signal);
      const durationMs = Date.now() - startedAt;
      this.lastActivityAt = new Date();
      this.stats.operations++;

      log.debug("Operation executed", {
        operation: "execute",
        sql: preview(request.sql),
        rowCount: result.rowCount,
        durationMs,
        attempts,
      });

      return {
        rows: result.rows,
        rowCount: result.rowCount,
        command: result.command,
        durationMs,
        attempts,
      };
    } catch (error) {
      if (signal.aborted) {
        log.warn("Operation interrupted mid-statement; discarding connection", {
          operation: "execute",
          sql: preview(request.sql),
        });
        this.degrade(connection);
        throw abortReason(signal);
      }
      throw this.toOperationFailure(connection, error);
    }
  }

  /**
   * Map a query failure onto the session taxonomy. Degrades the session when
   * the connection can no longer be trusted.
   */
  private toOperationFailure(
    connection: DriverConnection,
    error: unknown,
  ): SessionError {
    const message = errorMessage(error);
    const details = { driverCode: errorCode(error), error: message };
    const fault = this.driver.classify(error);

    switch (fault) {
      case "timeout":
        if (!connection.isAlive()) {
          this.degrade(connection);
        }
        return new TimeoutError(
          `Statement timed out: ${message}`,
          "statement-timeout",
          details,
        );
      case "network":
        this.degrade(connection);
        return new ConnectivityLostError(
          `Connection lost during operation: ${message}`,
          details,
        );
      case "auth":
      case "schema-missing":
      case "protocol":
      case "statement":
      case "unknown":
        if (!connection.isAlive()) {
          this.degrade(connection);
          return new ConnectivityLostError(
            `Connection lost during operation: ${message}`,
            details,
          );
        }
        return new OperationError(message, details);
    }
  }

  // =========================================================================
  // Connection lifecycle
  // =========================================================================

  private async acquire(signal: AbortSignal): Promise<DriverConnection> {
    if (signal.aborted) {
      throw abortReason(signal);
    }
    if (this.state === "FAILED" || this.state === "CLOSED") {
      throw this.closedError();
    }
    if (this.state === "READY" && this.handle !== null) {
      return this.handle;
    }

    const flight = this.flight ?? this.startFlight(false);
    return this.join(flight, signal);
  }

  private async join(
    flight: ConnectFlight,
    signal: AbortSignal,
  ): Promise<DriverConnection> {
    flight.waiters++;
    try {
      return await raceAbort(flight.promise, signal);
    } finally {
      flight.waiters--;
      if (
        signal.aborted &&
        flight.waiters === 0 &&
        !flight.detached &&
        this.flight === flight
      ) {
        log.debug("Abandoning connect attempt with no remaining waiters");
        flight.controller.abort(abortReason(signal));
      }
    }
  }

  private startFlight(detached: boolean): ConnectFlight {
    const controller = new AbortController();
    // deferred so the flight is registered before any state listener runs
    const promise = Promise.resolve().then(() =>
      this.establish(controller.signal),
    );
    const flight: ConnectFlight = { promise, controller, waiters: 0, detached };
    this.flight = flight;

    void promise.then(
      () => {
        this.clearFlight(flight);
      },
      (error: unknown) => {
        this.clearFlight(flight);
        log.debug("Connect attempt ended without a connection", {
          error: errorMessage(error),
        });
      },
    );
    return flight;
  }

  private clearFlight(flight: ConnectFlight): void {
    if (this.flight === flight) {
      this.flight = null;
    }
  }

  /**
   * One connect episode: up to `maxAttempts` attempts with backoff in between
   */
  private async establish(signal: AbortSignal): Promise<DriverConnection> {
    const recovering = this.everConnected;
    const revertTo: SessionState = recovering ? "DEGRADED" : "DISCONNECTED";
    this.retryCount = 0;

    for (let attempt = 1; ; attempt++) {
      if (signal.aborted) {
        this.abandon(signal, revertTo);
        throw abortReason(signal);
      }
      this.setState("CONNECTING");

      let connection: DriverConnection;
      try {
        connection = await this.connectOnce(signal);
      } catch (error) {
        if (signal.aborted) {
          this.abandon(signal, revertTo);
          throw abortReason(signal);
        }

        const failure = this.toConnectError(error, attempt);
        this.retryCount = attempt;

        if (!failure.retryable) {
          this.fail(failure);
          throw failure;
        }
        if (attempt >= this.retry.maxAttempts) {
          const exhausted = new ConnectError(
            `Could not connect after ${String(attempt)} attempt(s): ${failure.message}`,
            failure.reason,
            { attempts: attempt, exhausted: true },
          );
          this.fail(exhausted);
          throw exhausted;
        }

        const delayMs = computeBackoff(this.retry, attempt);
        log.warn("Connect attempt failed; retrying", {
          operation: recovering ? "reconnect" : "connect",
          attempt,
          maxAttempts: this.retry.maxAttempts,
          delayMs,
          reason: failure.reason,
          error: failure.message,
        });
        if (recovering) {
          this.setState("DEGRADED");
        }

        try {
          await sleep(delayMs, signal);
        } catch (sleepError) {
          this.abandon(signal, revertTo);
          throw sleepError;
        }
        continue;
      }

      if (signal.aborted) {
        connection.destroy();
        this.abandon(signal, revertTo);
        throw abortReason(signal);
      }

      this.install(connection, recovering);
      return connection;
    }
  }

  /**
   * A single connect attempt bounded by the connect timeout
   */
  private async connectOnce(signal: AbortSignal): Promise<DriverConnection> {
    this.stats.connectAttempts++;
    const deadline = createDeadline({
      timeoutMs: this.config.connectTimeoutMs,
      signal,
      trigger: "connect-timeout",
    });
    const pending = this.driver.connect(this.config);

    try {
      return await raceAbort(pending, deadline.signal);
    } catch (error) {
      if (deadline.signal.aborted) {
        // the attempt may still complete after we gave up on it
        void pending.then(
          (late) => {
            late.destroy();
          },
          (lateError: unknown) => {
            log.debug("Abandoned connect attempt failed", {
              error: errorMessage(lateError),
            });
          },
        );
      }
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  private toConnectError(error: unknown, attempt: number): ConnectError {
    const { host, port } = this.config;

    if (error instanceof TimeoutError && error.trigger === "connect-timeout") {
      return new ConnectError(
        `Connect attempt to ${host}:${String(port)} timed out after ${String(this.config.connectTimeoutMs)}ms`,
        "timeout",
        { attempt, host, port },
      );
    }

    const message = errorMessage(error);
    const details = { attempt, host, port, driverCode: errorCode(error) };

    switch (this.driver.classify(error)) {
      case "auth":
        return new ConnectError(`Authentication rejected: ${message}`, "auth", details);
      case "schema-missing":
        return new ConnectError(
          `Target database or schema does not exist: ${message}`,
          "schema-missing",
          details,
        );
      case "protocol":
        return new ConnectError(`Protocol negotiation failed: ${message}`, "protocol", details);
      case "timeout":
        return new ConnectError(`Connect attempt timed out: ${message}`, "timeout", details);
      case "statement":
        return new ConnectError(`Session setup rejected: ${message}`, "config", details);
      case "network":
      case "unknown":
        return new ConnectError(
          `Could not reach ${host}:${String(port)}: ${message}`,
          "network",
          details,
        );
    }
  }

  private install(connection: DriverConnection, recovering: boolean): void {
    this.handle = connection;
    this.everConnected = true;
    this.retryCount = 0;
    this.lastActivityAt = new Date();
    if (recovering) {
      this.stats.reconnects++;
    }

    connection.onLost((error) => {
      if (this.handle !== connection) {
        return;
      }
      log.warn("Connection lost while idle", {
        error: error === undefined ? "connection ended" : errorMessage(error),
      });
      this.degrade(connection);
    });

    this.setState("READY");
    log.info(recovering ? "Reconnected" : "Connected", {
      dialect: this.config.dialect,
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
    });
    this.startHealthCheck();
  }

  /**
   * Drop the current handle and start a background reconnect
   */
  private degrade(connection: DriverConnection): void {
    if (this.handle !== connection) {
      return;
    }
    this.handle = null;
    connection.destroy();
    this.stopHealthCheck();
    this.setState("DEGRADED");

    if (this.flight === null) {
      this.startFlight(true);
    }
  }

  /**
   * Undo the state of a cancelled connect episode. Once close() or a newer
   * flight has taken over, the state belongs to them and is left alone.
   */
  private abandon(signal: AbortSignal, revertTo: SessionState): void {
    if (this.flight?.controller.signal !== signal) {
      return;
    }
    if (this.state === "FAILED" || this.state === "CLOSED") {
      return;
    }
    this.retryCount = 0;
    this.setState(revertTo);
  }

  private fail(error: SessionError): void {
    this.failure = error;
    const handle = this.handle;
    this.handle = null;
    handle?.destroy();
    this.stopHealthCheck();
    this.setState("FAILED");
    log.error("Session failed", { code: error.code, error: error.message });
  }

  private async release(handle: DriverConnection): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      log.warn("Graceful close failed; destroying connection", {
        error: errorMessage(error),
      });
      handle.destroy();
    }
  }

  private closedError(): SessionClosedError {
    if (this.state === "FAILED" && this.failure !== null) {
      return new SessionClosedError(
        `Session failed: ${this.failure.message}`,
        this.failure,
      );
    }
    return new SessionClosedError("Session is closed");
  }

  private setState(next: SessionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    log.debug("Session state changed", { from: previous, to: next });

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        log.warn("State change listener threw", { error: errorMessage(error) });
      }
    }
  }

  // =========================================================================
  // Health check
  // =========================================================================

  private startHealthCheck(): void {
    if (this.healthCheckIntervalMs <= 0 || this.healthTimer !== null) {
      return;
    }
    this.healthTimer = setInterval(() => {
      if (this.queue.size > 0) {
        return;
      }
      void this.checkHealth().then((status) => {
        if (!status.connected) {
          log.warn("Idle health check failed", {
            state: status.state,
            error: status.error,
          });
        }
      });
    }, this.healthCheckIntervalMs);
    this.healthTimer.unref();
  }

  private stopHealthCheck(): void {
    if (this.healthTimer !== null) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
  }
}

/**
 * Open a session, run `fn`, and always close the session afterwards
 */
export async function withSession<T>(
  config: ConnectionConfig,
  options: SessionOptions,
  fn: (session: SessionManager) => Promise<T>,
  callOptions: CallOptions = {},
): Promise<T> {
  const session = new SessionManager(config, options);
  try {
    await session.open(callOptions);
    return await fn(session);
  } finally {
    await session.close();
  }
}
