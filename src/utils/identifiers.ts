/**
 * shadow-alter - Identifier Sanitization Utilities
 *
 * Table, column, trigger and schema names are interpolated into DDL, so every
 * identifier is validated and quoted for its dialect before use.
 *
 * Accepted identifiers:
 * - Must start with a letter (a-z) or underscore (_)
 * - Can contain letters, digits (0-9), underscores, and dollar signs ($)
 * - MySQL allows 64 characters, PostgreSQL 63 (NAMEDATALEN - 1)
 */

import { InvalidIdentifierError } from "../types/errors.js";
import type { Dialect } from "../types/session.js";

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_$]*$/;

export const MAX_IDENTIFIER_LENGTH: Record<Dialect, number> = {
  mysql: 64,
  postgres: 63,
};

/**
 * Validate an identifier for the given dialect
 *
 * @throws InvalidIdentifierError if the identifier is invalid
 */
export function validateIdentifier(name: string, dialect: Dialect): void {
  if (!name) {
    throw new InvalidIdentifierError(
      name,
      "Identifier must be a non-empty string",
    );
  }

  const maxLength = MAX_IDENTIFIER_LENGTH[dialect];
  if (name.length > maxLength) {
    throw new InvalidIdentifierError(
      name,
      `Identifier exceeds maximum length of ${String(maxLength)} characters`,
    );
  }

  if (!IDENTIFIER_PATTERN.test(name)) {
    if (name.includes(".")) {
      throw new InvalidIdentifierError(
        name,
        "Qualified names (schema.table) are not supported; pass the schema separately",
      );
    }
    throw new InvalidIdentifierError(
      name,
      "Identifier contains invalid characters. Must start with a letter or underscore and contain only letters, digits, underscores, or dollar signs",
    );
  }
}

/**
 * Validate and quote an identifier
 *
 * @example
 * quoteIdentifier('users', 'mysql') // Returns: `users`
 * quoteIdentifier('users', 'postgres') // Returns: "users"
 */
export function quoteIdentifier(name: string, dialect: Dialect): string {
  validateIdentifier(name, dialect);
  return dialect === "mysql" ? `\`${name}\`` : `"${name}"`;
}

/**
 * Quote a list of column names and join them for a SELECT or INSERT list
 */
export function createColumnList(columns: string[], dialect: Dialect): string {
  return columns.map((column) => quoteIdentifier(column, dialect)).join(", ");
}
