/**
 * shadow-alter - Retry Policy
 *
 * Capped exponential backoff for connect and reconnect attempts.
 */

import { ValidationError } from "../types/errors.js";
import type { RetryPolicy } from "../types/session.js";
import { abortReason } from "./deadline.js";

export type RetryOverrides = {
  [K in keyof RetryPolicy]?: RetryPolicy[K] | undefined;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 5,
  baseDelayMs: 250,
  maxDelayMs: 10_000,
  multiplier: 2,
});

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveRetryPolicy(overrides: RetryOverrides = {}): RetryPolicy {
  const policy: RetryPolicy = {
    maxAttempts: overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    multiplier: overrides.multiplier ?? DEFAULT_RETRY_POLICY.multiplier,
  };

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ValidationError("Retry maxAttempts must be an integer >= 1", {
      maxAttempts: policy.maxAttempts,
    });
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0) {
    throw new ValidationError("Retry delays must not be negative", {
      baseDelayMs: policy.baseDelayMs,
      maxDelayMs: policy.maxDelayMs,
    });
  }
  if (policy.multiplier < 1) {
    throw new ValidationError("Retry multiplier must be >= 1", {
      multiplier: policy.multiplier,
    });
  }

  return Object.freeze(policy);
}

/**
 * Delay before the next attempt, after `failedAttempts` consecutive failures
 */
export function computeBackoff(policy: RetryPolicy, failedAttempts: number): number {
  const exponent = Math.max(0, failedAttempts - 1);
  const delay = policy.baseDelayMs * Math.pow(policy.multiplier, exponent);
  return Math.min(policy.maxDelayMs, delay);
}

/**
 * Wait `ms`, rejecting early with the abort reason
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal !== undefined) {
        reject(abortReason(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
