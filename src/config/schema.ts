/**
 * shadow-alter - Configuration Schemas
 *
 * Validation schemas for connection settings, retry policy and migration plans.
 * Numeric fields accept strings so flag and environment values parse directly.
 */

import { z } from "zod";
import { ValidationError } from "../types/errors.js";
import type { MigrationPlan } from "../types/migration.js";

// =============================================================================
// Connection
// =============================================================================

export const DialectSchema = z.enum(["mysql", "postgres"]);

const milliseconds = z.coerce.number().int().min(0);

export const SslConfigSchema = z.union([
  z.literal(false),
  z.object({
    rejectUnauthorized: z.boolean(),
    ca: z.string().optional(),
  }),
]);

export const ConnectionConfigSchema = z.object({
  dialect: DialectSchema,
  host: z.string().min(1, "host is required"),
  port: z.coerce.number().int().min(1).max(65535),
  user: z.string().min(1, "user is required"),
  password: z.string().optional(),
  database: z.string().min(1, "database is required"),
  schema: z.string().min(1).optional(),
  ssl: SslConfigSchema,
  connectTimeoutMs: z.coerce.number().int().positive(),
  queryTimeoutMs: milliseconds,
  applicationName: z.string().min(1),
});

// =============================================================================
// Retry
// =============================================================================

export const RetryPolicySchema = z
  .object({
    maxAttempts: z.coerce.number().int().min(1),
    baseDelayMs: milliseconds,
    maxDelayMs: milliseconds,
    multiplier: z.coerce.number().min(1),
  })
  .refine((policy) => policy.maxDelayMs >= policy.baseDelayMs, {
    message: "maxDelayMs must not be lower than baseDelayMs",
    path: ["maxDelayMs"],
  });

// =============================================================================
// Migration plan
// =============================================================================

export const MigrationPlanSchema = z
  .object({
    table: z.string().min(1, "table is required"),
    alter: z
      .array(z.string().trim().min(1))
      .min(1, "at least one ALTER clause is required"),
    keyColumn: z.string().min(1).default("id"),
    chunkSize: z.coerce.number().int().positive().default(1000),
    replayBatchSize: z.coerce.number().int().positive().default(500),
    swapTables: z.boolean().default(false),
    dropOldTable: z.boolean().default(false),
    dropTriggers: z.boolean().default(false),
    dropAuditTable: z.boolean().default(false),
  })
  .refine((plan) => !plan.dropAuditTable || plan.dropTriggers, {
    message: "dropping the audit table while keeping the triggers would break writes",
    path: ["dropAuditTable"],
  });

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse `input` or throw a ValidationError listing every issue
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  subject: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ValidationError(`Invalid ${subject}: ${issues.join("; ")}`, {
      issues,
    });
  }
  return result.data;
}

export function parseMigrationPlan(input: unknown): MigrationPlan {
  return parseWith(MigrationPlanSchema, input, "migration plan");
}
