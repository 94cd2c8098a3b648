/**
 * shadow-alter - MySQL Driver
 *
 * One `mysql2/promise` connection per handle. mysql2 marks errors that leave
 * the connection unusable with `fatal: true`.
 */

import mysql from "mysql2/promise";
import type {
  Connection,
  ConnectionOptions,
  ResultSetHeader,
  RowDataPacket,
} from "mysql2/promise";
import type { ConnectionConfig } from "../types/session.js";
import { logger } from "../utils/logger.js";
import {
  MissingSchemaError,
  classifySocketCode,
  errorCode,
  errorMessage,
} from "./faults.js";
import type {
  DatabaseDriver,
  DriverConnection,
  DriverResult,
  FaultKind,
} from "./types.js";

const log = logger.forModule("DRIVER");

const MYSQL_FAULTS: Readonly<Record<string, FaultKind>> = {
  ER_ACCESS_DENIED_ERROR: "auth",
  ER_ACCESS_DENIED_NO_PASSWORD_ERROR: "auth",
  ER_DBACCESS_DENIED_ERROR: "auth",
  ER_BAD_DB_ERROR: "schema-missing",
  ER_NOT_SUPPORTED_AUTH_MODE: "protocol",
  HANDSHAKE_NO_SSL_SUPPORT: "protocol",
  PROTOCOL_SEQUENCE_TIMEOUT: "timeout",
  ER_QUERY_TIMEOUT: "timeout",
  PROTOCOL_CONNECTION_LOST: "network",
  PROTOCOL_ENQUEUE_AFTER_FATAL_ERROR: "network",
  PROTOCOL_ENQUEUE_AFTER_QUIT: "network",
  ER_SERVER_SHUTDOWN: "network",
  ER_CON_COUNT_ERROR: "network",
};

function isFatal(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "fatal" in error &&
    error.fatal === true
  );
}

export function classifyMySqlError(error: unknown): FaultKind {
  if (error instanceof MissingSchemaError) {
    return "schema-missing";
  }

  const code = errorCode(error);
  if (code !== undefined) {
    const known = MYSQL_FAULTS[code] ?? classifySocketCode(code);
    if (known !== undefined) {
      return known;
    }
  }

  if (isFatal(error)) {
    return "network";
  }

  return code === undefined ? "unknown" : "statement";
}

export function buildConnectionOptions(
  config: ConnectionConfig,
): ConnectionOptions {
  const options: ConnectionOptions = {
    host: config.host,
    port: config.port,
    user: config.user,
    database: config.database,
    connectTimeout: config.connectTimeoutMs,
    charset: "utf8mb4",
    supportBigNumbers: true,
    enableKeepAlive: true,
    multipleStatements: false,
  };

  if (config.password !== undefined) {
    options.password = config.password;
  }

  if (config.ssl !== false) {
    options.ssl =
      config.ssl.ca !== undefined
        ? { rejectUnauthorized: config.ssl.rejectUnauthorized, ca: config.ssl.ca }
        : { rejectUnauthorized: config.ssl.rejectUnauthorized };
  }

  return options;
}

export class MySqlConnection implements DriverConnection {
  private alive = true;
  private readonly lostListeners: ((error?: unknown) => void)[] = [];

  constructor(private readonly connection: Connection) {
    connection.on("error", (error: unknown) => {
      this.markLost(error);
    });
    connection.on("end", () => {
      this.markLost();
    });
  }

  private markLost(error?: unknown): void {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    log.warn("MySQL connection lost", {
      error: error === undefined ? "connection ended" : errorMessage(error),
      driverCode: errorCode(error),
    });
    for (const listener of this.lostListeners) {
      listener(error);
    }
  }

  async query(sql: string, params: readonly unknown[]): Promise<DriverResult> {
    try {
      const [result] = await this.connection.query<
        RowDataPacket[] | ResultSetHeader
      >(sql, [...params]);

      if (Array.isArray(result)) {
        return { rows: result, rowCount: result.length };
      }
      return { rows: [], rowCount: result.affectedRows };
    } catch (error) {
      if (isFatal(error)) {
        this.markLost(error);
      }
      throw error;
    }
  }

  async ping(): Promise<void> {
    await this.connection.ping();
  }

  isAlive(): boolean {
    return this.alive;
  }

  onLost(listener: (error?: unknown) => void): void {
    this.lostListeners.push(listener);
  }

  async close(): Promise<void> {
    this.alive = false;
    await this.connection.end();
  }

  destroy(): void {
    this.alive = false;
    this.connection.destroy();
  }
}

export class MySqlDriver implements DatabaseDriver {
  readonly dialect = "mysql" as const;

  async connect(config: ConnectionConfig): Promise<DriverConnection> {
    const connection = await mysql.createConnection(
      buildConnectionOptions(config),
    );

    log.debug("MySQL connection established", {
      host: config.host,
      port: config.port,
      database: config.database,
    });
    return new MySqlConnection(connection);
  }

  classify(error: unknown): FaultKind {
    return classifyMySqlError(error);
  }
}
