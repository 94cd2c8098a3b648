/**
 * shadow-alter - Deadlines and Cancellation
 *
 * A deadline is an AbortSignal whose reason is always a ShadowAlterError, so a
 * rejected race can be rethrown to the caller as-is.
 */

import { ShadowAlterError, TimeoutError } from "../types/errors.js";
import type { TimeoutTrigger } from "../types/errors.js";

export interface Deadline {
  readonly signal: AbortSignal;

  /** Clear the timer and detach from the parent signal */
  dispose(): void;
}

export interface DeadlineOptions {
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;

  /** Trigger reported when the timer fires (default: deadline) */
  trigger?: Extract<TimeoutTrigger, "deadline" | "connect-timeout"> | undefined;
}

/**
 * Error to surface for an aborted signal
 */
export function abortReason(signal: AbortSignal): ShadowAlterError {
  const reason: unknown = signal.reason;
  if (reason instanceof ShadowAlterError) {
    return reason;
  }
  return new TimeoutError("Operation cancelled", "cancelled");
}

export function createDeadline(options: DeadlineOptions = {}): Deadline {
  const controller = new AbortController();
  const parent = options.signal;
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = (): void => {
    if (parent !== undefined) {
      controller.abort(abortReason(parent));
    }
  };

  if (parent !== undefined) {
    if (parent.aborted) {
      onParentAbort();
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  const { timeoutMs } = options;
  if (!controller.signal.aborted && timeoutMs !== undefined && timeoutMs > 0) {
    const trigger = options.trigger ?? "deadline";
    timer = setTimeout(() => {
      controller.abort(
        new TimeoutError(
          `Timed out after ${String(timeoutMs)}ms`,
          trigger,
          { timeoutMs },
        ),
      );
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    dispose(): void {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Settle with `promise` or reject with the abort reason, whichever comes first.
 * The losing promise's rejection is still observed.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal));
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
