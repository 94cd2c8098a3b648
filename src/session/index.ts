export { SessionManager, withSession } from "./SessionManager.js";
export type { SessionOptions } from "./SessionManager.js";
export {
  DEFAULT_RETRY_POLICY,
  computeBackoff,
  resolveRetryPolicy,
  sleep,
} from "./retry.js";
export type { RetryOverrides } from "./retry.js";
export { abortReason, createDeadline, raceAbort } from "./deadline.js";
export type { Deadline, DeadlineOptions } from "./deadline.js";
export { SerialQueue } from "./SerialQueue.js";
