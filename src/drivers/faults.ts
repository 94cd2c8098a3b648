/**
 * shadow-alter - Driver Fault Helpers
 *
 * Classification reads error codes only: SQLSTATE for PostgreSQL, symbolic
 * codes for MySQL, and errno names for sockets.
 */

import type { FaultKind } from "./types.js";

/**
 * Node socket and DNS error codes that mean the transport is unusable
 */
export const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "EPIPE",
  "EHOSTUNREACH",
  "EHOSTDOWN",
  "ENETUNREACH",
  "ENETDOWN",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ERR_SOCKET_CLOSED",
  "ERR_STREAM_DESTROYED",
]);

/**
 * Raised by a driver when the handshake succeeded but the requested
 * database or schema does not exist
 */
export class MissingSchemaError extends Error {
  constructor(public readonly schema: string) {
    super(`Schema "${schema}" does not exist`);
    this.name = "MissingSchemaError";
  }
}

/**
 * Read the `code` property drivers attach to their errors
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Shared handling of socket-level codes; undefined when the code is not one
 */
export function classifySocketCode(code: string): FaultKind | undefined {
  if (code === "ETIMEDOUT") {
    return "timeout";
  }
  return NETWORK_ERROR_CODES.has(code) ? "network" : undefined;
}
