/**
 * shadow-alter - Online Schema Change Tool
 *
 * Managed, self-healing database sessions for MySQL and PostgreSQL, and an
 * online schema change built on top of them.
 *
 * @module shadow-alter
 */

// Export types
export * from "./types/index.js";

// Export session
export * from "./session/index.js";

// Export drivers
export * from "./drivers/index.js";

// Export migration
export * from "./migration/index.js";

// Export configuration
export {
  parseConnectionString,
  resolveConnectionConfig,
  resolveRetrySettings,
  buildMigrationPlan,
} from "./cli/args.js";
export { ExitCode, exitCodeFor } from "./cli/exit-codes.js";
export { logger } from "./utils/logger.js";
export { isReadOnlyStatement } from "./utils/sql.js";
export { quoteIdentifier, validateIdentifier } from "./utils/identifiers.js";
