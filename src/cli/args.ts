/**
 * shadow-alter - CLI Configuration Resolution
 *
 * Turns command-line flags and the process environment into validated,
 * immutable configuration. Precedence: explicit flag, then connection URL,
 * then environment variable, then default.
 */

import {
  ConnectionConfigSchema,
  DialectSchema,
  RetryPolicySchema,
  parseMigrationPlan,
  parseWith,
} from "../config/schema.js";
import { DEFAULT_RETRY_POLICY } from "../session/retry.js";
import { ValidationError } from "../types/errors.js";
import type { MigrationPlan } from "../types/migration.js";
import type {
  ConnectionConfig,
  Dialect,
  RetryPolicy,
} from "../types/session.js";
import { isLogLevel } from "../utils/logger.js";
import type { LogLevel } from "../utils/logger.js";

type Env = NodeJS.ProcessEnv;

export const APPLICATION_NAME = "shadow-alter";

/**
 * Connection and session flags shared by every command
 */
export interface ConnectionFlags {
  dialect?: string | undefined;
  url?: string | undefined;
  host?: string | undefined;
  port?: string | undefined;
  user?: string | undefined;
  password?: string | undefined;
  database?: string | undefined;
  schema?: string | undefined;
  ssl?: boolean | undefined;
  sslInsecure?: boolean | undefined;
  connectTimeout?: string | undefined;
  queryTimeout?: string | undefined;
  retryAttempts?: string | undefined;
  retryBaseDelay?: string | undefined;
  retryMaxDelay?: string | undefined;
  healthInterval?: string | undefined;
  logLevel?: string | undefined;
}

export interface MigrateFlags {
  table?: string | undefined;
  alter?: string | undefined;
  keyColumn?: string | undefined;
  chunkSize?: string | undefined;
  replayBatchSize?: string | undefined;
  swapTables?: boolean | undefined;
  dropOldTable?: boolean | undefined;
  dropTriggers?: boolean | undefined;
  dropAuditTable?: boolean | undefined;
}

/**
 * Parts of a `mysql://` or `postgres://` connection URL
 */
export interface ConnectionUrlParts {
  dialect: Dialect;
  host?: string;
  port?: string;
  user?: string;
  password?: string;
  database?: string;
  ssl?: boolean;
}

/**
 * Dialect-specific environment variables consulted after the DB_* ones
 */
const NATIVE_ENV: Record<
  Dialect,
  { host: string; port: string; user: string; password: string; database: string }
> = {
  mysql: {
    host: "MYSQL_HOST",
    port: "MYSQL_TCP_PORT",
    user: "MYSQL_USER",
    password: "MYSQL_PWD",
    database: "MYSQL_DATABASE",
  },
  postgres: {
    host: "PGHOST",
    port: "PGPORT",
    user: "PGUSER",
    password: "PGPASSWORD",
    database: "PGDATABASE",
  },
};

const DEFAULTS: Record<Dialect, { port: number; user: string }> = {
  mysql: { port: 3306, user: "root" },
  postgres: { port: 5432, user: "postgres" },
};

const DEFAULT_HOST = "localhost";
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/**
 * First value that is set and not empty
 */
function pick(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value !== "");
}

function isTrue(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

/**
 * Parse a connection URL. Secrets in the URL never appear in error messages.
 */
export function parseConnectionString(raw: string): ConnectionUrlParts {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ValidationError("Invalid connection URL");
  }

  const scheme = url.protocol.replace(/:$/, "");
  let dialect: Dialect;
  switch (scheme) {
    case "mysql":
      dialect = "mysql";
      break;
    case "postgres":
    case "postgresql":
      dialect = "postgres";
      break;
    default:
      throw new ValidationError(`Unsupported connection URL scheme "${scheme}"`, {
        scheme,
      });
  }

  const parts: ConnectionUrlParts = { dialect };
  if (url.hostname) parts.host = url.hostname;
  if (url.port) parts.port = url.port;
  if (url.username) parts.user = decodeURIComponent(url.username);
  if (url.password) parts.password = decodeURIComponent(url.password);

  const database = decodeURIComponent(url.pathname.replace(/^\//, ""));
  if (database) parts.database = database;

  const sslmode = url.searchParams.get("sslmode");
  if (
    url.searchParams.get("ssl") === "true" ||
    sslmode === "require" ||
    sslmode === "verify-ca" ||
    sslmode === "verify-full"
  ) {
    parts.ssl = true;
  }

  return parts;
}

/**
 * Resolve the immutable connection configuration
 *
 * @throws ValidationError when a value is missing or malformed
 */
export function resolveConnectionConfig(
  flags: ConnectionFlags,
  env: Env = process.env,
): ConnectionConfig {
  const urlString = pick(flags.url, env["DATABASE_URL"]);
  const url = urlString !== undefined ? parseConnectionString(urlString) : undefined;

  const dialect = parseWith(
    DialectSchema,
    pick(flags.dialect, url?.dialect, env["DB_DIALECT"]) ?? "mysql",
    "dialect",
  );
  const native = NATIVE_ENV[dialect];

  const schema = pick(flags.schema, env["DB_SCHEMA"]);
  if (schema !== undefined && dialect !== "postgres") {
    throw new ValidationError("A schema can only be selected for PostgreSQL", {
      dialect,
    });
  }

  const sslEnabled =
    flags.ssl === true ||
    flags.sslInsecure === true ||
    url?.ssl === true ||
    isTrue(env["DB_SSL"]);
  const rejectUnauthorized =
    flags.sslInsecure !== true && env["DB_SSL_REJECT_UNAUTHORIZED"] !== "false";

  const config = parseWith(
    ConnectionConfigSchema,
    {
      dialect,
      host:
        pick(flags.host, url?.host, env["DB_HOST"], env[native.host]) ??
        DEFAULT_HOST,
      port:
        pick(flags.port, url?.port, env["DB_PORT"], env[native.port]) ??
        DEFAULTS[dialect].port,
      user:
        pick(flags.user, url?.user, env["DB_USER"], env[native.user]) ??
        DEFAULTS[dialect].user,
      password: pick(
        flags.password,
        url?.password,
        env["DB_PASSWORD"],
        env[native.password],
      ),
      database: pick(
        flags.database,
        url?.database,
        env["DB_NAME"],
        env[native.database],
      ),
      schema,
      ssl: sslEnabled ? { rejectUnauthorized } : false,
      connectTimeoutMs:
        pick(flags.connectTimeout, env["DB_CONNECT_TIMEOUT_MS"]) ??
        DEFAULT_CONNECT_TIMEOUT_MS,
      queryTimeoutMs: pick(flags.queryTimeout, env["DB_QUERY_TIMEOUT_MS"]) ?? 0,
      applicationName: APPLICATION_NAME,
    },
    "connection configuration",
  );

  return Object.freeze(config);
}

export function resolveRetrySettings(
  flags: ConnectionFlags,
  env: Env = process.env,
): RetryPolicy {
  const policy = parseWith(
    RetryPolicySchema,
    {
      maxAttempts:
        pick(flags.retryAttempts, env["DB_RETRY_MAX_ATTEMPTS"]) ??
        DEFAULT_RETRY_POLICY.maxAttempts,
      baseDelayMs:
        pick(flags.retryBaseDelay, env["DB_RETRY_BASE_DELAY_MS"]) ??
        DEFAULT_RETRY_POLICY.baseDelayMs,
      maxDelayMs:
        pick(flags.retryMaxDelay, env["DB_RETRY_MAX_DELAY_MS"]) ??
        DEFAULT_RETRY_POLICY.maxDelayMs,
      multiplier: DEFAULT_RETRY_POLICY.multiplier,
    },
    "retry policy",
  );
  return Object.freeze(policy);
}

export function resolveHealthCheckInterval(
  flags: ConnectionFlags,
  env: Env = process.env,
): number {
  const raw = pick(flags.healthInterval, env["DB_HEALTH_CHECK_INTERVAL_MS"]);
  if (raw === undefined) {
    return 0;
  }
  const interval = Number(raw);
  if (!Number.isInteger(interval) || interval < 0) {
    throw new ValidationError("Health check interval must be a non-negative integer", {
      healthInterval: raw,
    });
  }
  return interval;
}

export function resolveLogLevel(
  flags: ConnectionFlags,
  env: Env = process.env,
): LogLevel | undefined {
  const level = pick(flags.logLevel, env["LOG_LEVEL"]);
  if (level === undefined) {
    return undefined;
  }
  if (!isLogLevel(level)) {
    throw new ValidationError(`Unknown log level "${level}"`, { level });
  }
  return level;
}

/**
 * Build the migration plan; `--alter` holds clauses separated by `;`
 */
export function buildMigrationPlan(flags: MigrateFlags): MigrationPlan {
  const alter = (flags.alter ?? "")
    .split(";")
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0);

  return parseMigrationPlan({
    table: flags.table,
    alter,
    keyColumn: flags.keyColumn,
    chunkSize: flags.chunkSize,
    replayBatchSize: flags.replayBatchSize,
    swapTables: flags.swapTables === true,
    dropOldTable: flags.dropOldTable === true,
    dropTriggers: flags.dropTriggers === true,
    dropAuditTable: flags.dropAuditTable === true,
  });
}
