/**
 * shadow-alter - Exit Code Tests
 */

import { describe, it, expect } from "vitest";
import { ExitCode, exitCodeFor } from "../exit-codes.js";
import {
  ConnectError,
  ConnectivityLostError,
  InvalidIdentifierError,
  OperationError,
  SessionClosedError,
  TimeoutError,
  ValidationError,
} from "../../types/errors.js";

describe("exitCodeFor", () => {
  it("should report unreachable servers as unavailable", () => {
    expect(exitCodeFor(new ConnectError("refused", "network"))).toBe(69);
    expect(exitCodeFor(new ConnectError("slow", "timeout"))).toBe(69);
    expect(exitCodeFor(new ConnectivityLostError("reset"))).toBe(69);
  });

  it("should report rejected connections as configuration errors", () => {
    expect(exitCodeFor(new ConnectError("denied", "auth"))).toBe(78);
    expect(exitCodeFor(new ConnectError("no db", "schema-missing"))).toBe(78);
    expect(exitCodeFor(new ConnectError("tls", "protocol"))).toBe(78);
    expect(exitCodeFor(new ConnectError("setup", "config"))).toBe(78);
  });

  it("should separate statement failures, timeouts and interrupts", () => {
    expect(exitCodeFor(new OperationError("syntax"))).toBe(ExitCode.OPERATION);
    expect(exitCodeFor(new TimeoutError("slow", "deadline"))).toBe(ExitCode.TIMEOUT);
    expect(exitCodeFor(new TimeoutError("slow", "statement-timeout"))).toBe(75);
    expect(exitCodeFor(new TimeoutError("stop", "cancelled"))).toBe(ExitCode.INTERRUPTED);
  });

  it("should report a closed session by the failure that closed it", () => {
    const failed = new SessionClosedError("failed", new ConnectError("denied", "auth"));

    expect(exitCodeFor(failed)).toBe(78);
    expect(exitCodeFor(new SessionClosedError("closed"))).toBe(ExitCode.INTERNAL);
  });

  it("should map invalid input to a configuration error", () => {
    expect(exitCodeFor(new ValidationError("bad plan"))).toBe(78);
    expect(exitCodeFor(new InvalidIdentifierError("a-b", "dash"))).toBe(78);
  });

  it("should treat anything else as internal", () => {
    expect(exitCodeFor(new Error("bug"))).toBe(1);
    expect(exitCodeFor("string")).toBe(1);
  });
});
