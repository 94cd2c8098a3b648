#!/usr/bin/env node
/**
 * shadow-alter - CLI Entry Point
 *
 * SIGINT and SIGTERM cancel the running command; the session is closed on the
 * way out and the process exits with 130.
 */

import { run } from "./cli/program.js";
import { ExitCode } from "./cli/exit-codes.js";
import { TimeoutError } from "./types/errors.js";
import { logger } from "./utils/logger.js";

const controller = new AbortController();

const onSignal = (signal: NodeJS.Signals): void => {
  logger.warn(`Received ${signal}, cancelling...`);
  controller.abort(new TimeoutError(`Interrupted by ${signal}`, "cancelled"));
};

process.once("SIGINT", onSignal);
process.once("SIGTERM", onSignal);

void run(process.argv.slice(2), { signal: controller.signal }).then(
  (code) => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.critical("Fatal error", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = ExitCode.INTERNAL;
  },
);
