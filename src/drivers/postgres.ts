/**
 * shadow-alter - PostgreSQL Driver
 *
 * One `pg.Client` per connection, with transport-loss tracking and
 * SQLSTATE-based fault classification.
 */

import pg from "pg";
import type { ConnectionConfig } from "../types/session.js";
import { quoteIdentifier } from "../utils/identifiers.js";
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

/**
 * Map a SQLSTATE code to a fault
 * @see https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
export function classifySqlState(code: string): FaultKind {
  switch (code) {
    case "28P01": // invalid_password
    case "28000": // invalid_authorization_specification
      return "auth";
    case "3D000": // invalid_catalog_name
    case "3F000": // invalid_schema_name
      return "schema-missing";
    case "08P01": // protocol_violation
      return "protocol";
    case "57014": // query_canceled (statement_timeout)
      return "timeout";
    case "57P01": // admin_shutdown
    case "57P02": // crash_shutdown
    case "57P03": // cannot_connect_now
    case "53300": // too_many_connections
      return "network";
  }

  // Class 08 - Connection Exception
  if (code.startsWith("08")) {
    return "network";
  }

  return "statement";
}

export function buildClientConfig(config: ConnectionConfig): pg.ClientConfig {
  const clientConfig: pg.ClientConfig = {
    host: config.host,
    port: config.port,
    user: config.user,
    database: config.database,
    connectionTimeoutMillis: config.connectTimeoutMs,
    application_name: config.applicationName,
    keepAlive: true,
  };

  if (config.password !== undefined) {
    clientConfig.password = config.password;
  }

  if (config.ssl !== false) {
    clientConfig.ssl =
      config.ssl.ca !== undefined
        ? { rejectUnauthorized: config.ssl.rejectUnauthorized, ca: config.ssl.ca }
        : { rejectUnauthorized: config.ssl.rejectUnauthorized };
  }

  if (config.queryTimeoutMs > 0) {
    clientConfig.statement_timeout = config.queryTimeoutMs;
  }

  return clientConfig;
}

export class PostgresConnection implements DriverConnection {
  private alive = true;
  private readonly lostListeners: ((error?: unknown) => void)[] = [];

  constructor(private readonly client: pg.Client) {
    // An unhandled 'error' event would crash the process
    client.on("error", (error: Error) => {
      this.markLost(error);
    });
    client.on("end", () => {
      this.markLost();
    });
  }

  private markLost(error?: unknown): void {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    log.warn("PostgreSQL connection lost", {
      error: error === undefined ? "connection ended" : errorMessage(error),
      driverCode: errorCode(error),
    });
    for (const listener of this.lostListeners) {
      listener(error);
    }
  }

  async query(sql: string, params: readonly unknown[]): Promise<DriverResult> {
    const result = await this.client.query<Record<string, unknown>>(sql, [
      ...params,
    ]);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? result.rows.length,
      command: result.command,
    };
  }

  async ping(): Promise<void> {
    await this.client.query("SELECT 1");
  }

  isAlive(): boolean {
    return this.alive;
  }

  onLost(listener: (error?: unknown) => void): void {
    this.lostListeners.push(listener);
  }

  async close(): Promise<void> {
    this.alive = false;
    await this.client.end();
  }

  // pg's end() destroys the socket outright while a query is still pending,
  // so a statement abandoned after a deadline does not hold the teardown up
  destroy(): void {
    this.alive = false;
    void this.client.end().catch((error: unknown) => {
      log.debug("Error while tearing down PostgreSQL connection", {
        error: errorMessage(error),
      });
    });
  }
}

/**
 * Confirm the schema exists, then put it first on the search path
 */
async function selectSchema(client: pg.Client, schema: string): Promise<void> {
  const found = await client.query(
    "SELECT 1 FROM pg_catalog.pg_namespace WHERE nspname = $1",
    [schema],
  );
  if (found.rowCount === 0) {
    throw new MissingSchemaError(schema);
  }
  await client.query(`SET search_path TO ${quoteIdentifier(schema, "postgres")}`);
}

export class PostgresDriver implements DatabaseDriver {
  readonly dialect = "postgres" as const;

  async connect(config: ConnectionConfig): Promise<DriverConnection> {
    const client = new pg.Client(buildClientConfig(config));
    const connection = new PostgresConnection(client);

    try {
      await client.connect();
      if (config.schema !== undefined) {
        await selectSchema(client, config.schema);
      }
    } catch (error) {
      connection.destroy();
      throw error;
    }

    log.debug("PostgreSQL connection established", {
      host: config.host,
      port: config.port,
      database: config.database,
    });
    return connection;
  }

  classify(error: unknown): FaultKind {
    if (error instanceof MissingSchemaError) {
      return "schema-missing";
    }

    const code = errorCode(error);
    if (code === undefined) {
      return "unknown";
    }

    return classifySocketCode(code) ?? classifySqlState(code);
  }
}
