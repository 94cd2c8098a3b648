/**
 * shadow-alter - CLI Program
 *
 * Builds the commander program and runs it to completion, turning every
 * failure into an exit code instead of exiting the process.
 */

import { Command, CommanderError } from "commander";
import { createDriver } from "../drivers/index.js";
import type { DatabaseDriver } from "../drivers/types.js";
import { OnlineSchemaChange } from "../migration/OnlineSchemaChange.js";
import { withSession } from "../session/SessionManager.js";
import type { SessionManager } from "../session/SessionManager.js";
import { ShadowAlterError } from "../types/errors.js";
import type { Dialect } from "../types/session.js";
import { logger } from "../utils/logger.js";
import {
  buildMigrationPlan,
  resolveConnectionConfig,
  resolveHealthCheckInterval,
  resolveLogLevel,
  resolveRetrySettings,
} from "./args.js";
import type { ConnectionFlags, MigrateFlags } from "./args.js";
import { ExitCode, exitCodeFor } from "./exit-codes.js";

const VERSION = "0.1.0";

const log = logger.forModule("CLI");

/**
 * Seams for tests and embedding
 */
export interface ProgramDeps {
  createDriver?: ((dialect: Dialect) => DatabaseDriver) | undefined;
  env?: NodeJS.ProcessEnv | undefined;

  /** Cancels the running command */
  signal?: AbortSignal | undefined;

  /** Command results (one JSON document per line) */
  writeOut?: ((line: string) => void) | undefined;

  /** Usage and help text from commander */
  writeErr?: ((text: string) => void) | undefined;
}

async function runWithSession<T>(
  flags: ConnectionFlags,
  deps: ProgramDeps,
  work: (session: SessionManager) => Promise<T>,
): Promise<T> {
  const env = deps.env ?? process.env;

  const level = resolveLogLevel(flags, env);
  if (level !== undefined) {
    logger.setLevel(level);
  }

  const config = resolveConnectionConfig(flags, env);
  const retry = resolveRetrySettings(flags, env);
  const healthCheckIntervalMs = resolveHealthCheckInterval(flags, env);
  const driver = (deps.createDriver ?? createDriver)(config.dialect);

  log.info("Opening session", {
    dialect: config.dialect,
    host: config.host,
    port: config.port,
    database: config.database,
  });

  return withSession(
    config,
    { driver, retry, healthCheckIntervalMs },
    work,
    { signal: deps.signal },
  );
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const writeOut = deps.writeOut ?? ((line: string) => console.log(line));
  const program = new Command();

  program
    .name("shadow-alter")
    .description(
      "Online schema changes for MySQL and PostgreSQL over a self-healing connection",
    )
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeErr: deps.writeErr ?? ((text) => process.stderr.write(text)),
    });

  program
    // Connection options
    .option("--dialect <dialect>", "Database dialect: mysql, postgres (default: mysql)")
    .option("--url <url>", "Connection URL (mysql://... or postgres://...)")
    .option("--host <host>", "Database host (default: localhost)")
    .option("--port <port>", "Database port (default: 3306 / 5432)")
    .option("--user <user>", "Database user")
    .option("--password <password>", "Database password")
    .option("--database <database>", "Database name")
    .option("--schema <schema>", "PostgreSQL schema to operate in")
    .option("--ssl", "Enable TLS")
    .option("--ssl-insecure", "Enable TLS without verifying the server certificate")
    // Session options
    .option("--connect-timeout <ms>", "Timeout of a single connect attempt (default: 10000)")
    .option("--query-timeout <ms>", "Default statement deadline, 0 for none (default: 0)")
    .option("--retry-attempts <n>", "Connect attempts per episode (default: 5)")
    .option("--retry-base-delay <ms>", "First backoff delay (default: 250)")
    .option("--retry-max-delay <ms>", "Backoff delay cap (default: 10000)")
    .option("--health-interval <ms>", "Idle health check interval, 0 for none (default: 0)")
    .option(
      "--log-level <level>",
      "Log level: debug, info, notice, warning, error, critical, alert, emergency (default: info)",
    );

  program
    .command("migrate")
    .description("Alter a table through a trigger-synchronized shadow copy")
    .requiredOption("--table <table>", "Table to alter")
    .requiredOption("--alter <clauses>", "ALTER TABLE clauses, separated by ';'")
    .option("--key-column <column>", "Integer primary key column (default: id)")
    .option("--chunk-size <rows>", "Key range copied per chunk (default: 1000)")
    .option("--replay-batch-size <rows>", "Audit entries read per batch (default: 500)")
    .option("--swap-tables", "Swap the shadow table in after copying")
    .option("--drop-old-table", "Drop the original table after the swap")
    .option("--drop-triggers", "Drop the audit triggers when done")
    .option("--drop-audit-table", "Drop the audit table when done (requires --drop-triggers)")
    .action(async (_options: MigrateFlags, command: Command) => {
      const flags: ConnectionFlags & MigrateFlags = command.optsWithGlobals();
      const plan = buildMigrationPlan(flags);

      const report = await runWithSession(flags, deps, (session) =>
        new OnlineSchemaChange(session, plan).run(deps.signal),
      );
      writeOut(JSON.stringify(report));
    });

  program
    .command("ping")
    .description("Open a session, report its health and close it")
    .action(async (_options: unknown, command: Command) => {
      const flags: ConnectionFlags = command.optsWithGlobals();

      const status = await runWithSession(flags, deps, (session) =>
        session.checkHealth(),
      );
      writeOut(JSON.stringify(status));
    });

  return program;
}

/**
 * Run the CLI with user arguments (without node and script path)
 */
export async function run(
  argv: string[],
  deps: ProgramDeps = {},
): Promise<ExitCode> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv, { from: "user" });
    return ExitCode.OK;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.OK : ExitCode.USAGE;
    }

    const exitCode = exitCodeFor(error);
    const message = error instanceof Error ? error.message : String(error);
    log.error(
      message,
      error instanceof ShadowAlterError
        ? { code: error.code, exitCode, details: error.details }
        : { exitCode },
    );
    return exitCode;
  }
}
