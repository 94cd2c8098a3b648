/**
 * shadow-alter - Migration Dialect Base
 *
 * Builds the statements of an online schema change. Statements common to both
 * dialects live here; DDL that differs (audit table, triggers, swap) is left
 * to the subclasses.
 */

import type { MigrationTables } from "../../types/migration.js";
import type { Dialect } from "../../types/session.js";
import { createColumnList, quoteIdentifier } from "../../utils/identifiers.js";

/**
 * A statement ready for `SessionManager.execute`
 */
export interface Statement {
  readonly sql: string;
  readonly params: readonly unknown[];

  /** Safe to re-run after a reconnect */
  readonly idempotent: boolean;
}

export abstract class MigrationDialect {
  abstract readonly name: Dialect;

  /**
   * @param namespace - MySQL database or PostgreSQL schema holding the table
   */
  constructor(protected readonly namespace: string) {}

  /** Bind marker for the n-th parameter (1-based) */
  protected abstract placeholder(index: number): string;

  abstract createAuditTable(tables: MigrationTables): Statement;
  abstract createTriggers(tables: MigrationTables, columns: string[]): Statement[];
  abstract createShadowTable(tables: MigrationTables): Statement;
  abstract swapTables(tables: MigrationTables): Statement;
  abstract dropTriggers(tables: MigrationTables, swapped: boolean): Statement[];

  quote(name: string): string {
    return quoteIdentifier(name, this.name);
  }

  protected columnList(columns: string[]): string {
    return createColumnList(columns, this.name);
  }

  protected statement(
    sql: string,
    idempotent: boolean,
    params: readonly unknown[] = [],
  ): Statement {
    return { sql, params, idempotent };
  }

  listColumns(table: string): Statement {
    return this.statement(
      `SELECT column_name AS column_name FROM information_schema.columns ` +
        `WHERE table_schema = ${this.placeholder(1)} AND table_name = ${this.placeholder(2)} ` +
        `ORDER BY ordinal_position`,
      true,
      [this.namespace, table],
    );
  }

  alterShadowTable(tables: MigrationTables, clause: string): Statement {
    return this.statement(`ALTER TABLE ${this.quote(tables.shadow)} ${clause}`, false);
  }

  keyRange(tables: MigrationTables): Statement {
    const key = this.quote(tables.key);
    return this.statement(
      `SELECT MIN(${key}) AS min_id, MAX(${key}) AS max_id FROM ${this.quote(tables.source)}`,
      true,
    );
  }

  /** Empty a key range of the shadow table so the range can be copied again */
  clearRange(tables: MigrationTables, from: number, to: number): Statement {
    return this.statement(
      `DELETE FROM ${this.quote(tables.shadow)} WHERE ${this.quote(tables.key)} ` +
        `BETWEEN ${this.placeholder(1)} AND ${this.placeholder(2)}`,
      true,
      [from, to],
    );
  }

  copyRange(
    tables: MigrationTables,
    columns: string[],
    from: number,
    to: number,
  ): Statement {
    const list = this.columnList(columns);
    return this.statement(
      `INSERT INTO ${this.quote(tables.shadow)} (${list}) SELECT ${list} ` +
        `FROM ${this.quote(tables.source)} WHERE ${this.quote(tables.key)} ` +
        `BETWEEN ${this.placeholder(1)} AND ${this.placeholder(2)}`,
      false,
      [from, to],
    );
  }

  readAudit(tables: MigrationTables, afterId: number, limit: number): Statement {
    return this.statement(
      `SELECT id, action, original_id FROM ${this.quote(tables.audit)} ` +
        `WHERE id > ${this.placeholder(1)} ORDER BY id LIMIT ${String(limit)}`,
      true,
      [afterId],
    );
  }

  deleteShadowRow(tables: MigrationTables, key: number): Statement {
    return this.statement(
      `DELETE FROM ${this.quote(tables.shadow)} WHERE ${this.quote(tables.key)} = ${this.placeholder(1)}`,
      true,
      [key],
    );
  }

  copyRow(tables: MigrationTables, columns: string[], key: number): Statement {
    const list = this.columnList(columns);
    return this.statement(
      `INSERT INTO ${this.quote(tables.shadow)} (${list}) SELECT ${list} ` +
        `FROM ${this.quote(tables.source)} WHERE ${this.quote(tables.key)} = ${this.placeholder(1)}`,
      false,
      [key],
    );
  }

  deleteAuditEntry(tables: MigrationTables, id: number): Statement {
    return this.statement(
      `DELETE FROM ${this.quote(tables.audit)} WHERE id = ${this.placeholder(1)}`,
      true,
      [id],
    );
  }

  dropTable(name: string): Statement {
    return this.statement(`DROP TABLE IF EXISTS ${this.quote(name)}`, true);
  }
}
