/**
 * shadow-alter - Migration Dialects
 */

import type { MigrationTables } from "../../types/migration.js";
import type { ConnectionConfig, Dialect } from "../../types/session.js";
import { validateIdentifier } from "../../utils/identifiers.js";
import { MySqlDialect } from "./mysql.js";
import { PostgresDialect } from "./postgres.js";
import type { MigrationDialect } from "./MigrationDialect.js";

/**
 * Database (MySQL) or schema (PostgreSQL) that holds the migrated table
 */
export function namespaceOf(config: ConnectionConfig): string {
  return config.dialect === "mysql" ? config.database : (config.schema ?? "public");
}

export function createDialect(config: ConnectionConfig): MigrationDialect {
  const namespace = namespaceOf(config);
  switch (config.dialect) {
    case "mysql":
      return new MySqlDialect(namespace);
    case "postgres":
      return new PostgresDialect(namespace);
  }
}

/**
 * Derive and validate every name the migration creates
 *
 * @throws InvalidIdentifierError when a derived name is not a valid identifier
 */
export function deriveTables(
  table: string,
  keyColumn: string,
  dialect: Dialect,
): MigrationTables {
  const tables: MigrationTables = {
    source: table,
    shadow: `_${table}_new`,
    audit: `_${table}_audit`,
    old: `${table}_old`,
    key: keyColumn,
    triggers: {
      insert: `${table}_insert`,
      update: `${table}_update`,
      delete: `${table}_delete`,
    },
    triggerFunction: `_${table}_audit_fn`,
  };

  for (const name of [
    tables.source,
    tables.shadow,
    tables.audit,
    tables.old,
    tables.key,
    tables.triggers.insert,
    tables.triggers.update,
    tables.triggers.delete,
    // MySQL triggers need no function
    ...(dialect === "postgres" ? [tables.triggerFunction] : []),
  ]) {
    validateIdentifier(name, dialect);
  }

  return tables;
}

export { MigrationDialect } from "./MigrationDialect.js";
export type { Statement } from "./MigrationDialect.js";
export { MySqlDialect } from "./mysql.js";
export { PostgresDialect } from "./postgres.js";
