/**
 * shadow-alter - Process Exit Codes
 *
 * sysexits(3)-style codes so wrappers can tell a bad flag from an unreachable
 * server from a rejected statement.
 */

import {
  InvalidIdentifierError,
  ValidationError,
  isSessionError,
} from "../types/errors.js";
import type { ConnectError, SessionError } from "../types/errors.js";

export const ExitCode = {
  OK: 0,
  INTERNAL: 1,
  USAGE: 64,
  OPERATION: 65,
  UNAVAILABLE: 69,
  TIMEOUT: 75,
  CONFIG: 78,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

function connectExitCode(error: ConnectError): ExitCode {
  switch (error.reason) {
    case "network":
    case "timeout":
      return ExitCode.UNAVAILABLE;
    case "auth":
    case "schema-missing":
    case "protocol":
    case "config":
      return ExitCode.CONFIG;
  }
}

function sessionExitCode(error: SessionError): ExitCode {
  switch (error.kind) {
    case "connect":
      return connectExitCode(error);
    case "operation":
      return ExitCode.OPERATION;
    case "connectivity-lost":
      return ExitCode.UNAVAILABLE;
    case "timeout":
      return error.trigger === "cancelled" ? ExitCode.INTERRUPTED : ExitCode.TIMEOUT;
    case "session-closed":
      return error.failure !== null ? sessionExitCode(error.failure) : ExitCode.INTERNAL;
  }
}

/**
 * Exit code for an error that reached the top of the CLI
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isSessionError(error)) {
    return sessionExitCode(error);
  }
  if (error instanceof ValidationError || error instanceof InvalidIdentifierError) {
    return ExitCode.CONFIG;
  }
  return ExitCode.INTERNAL;
}
