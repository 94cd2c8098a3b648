/**
 * shadow-alter - MySQL Migration Dialect
 */

import type { MigrationTables } from "../../types/migration.js";
import { MigrationDialect } from "./MigrationDialect.js";
import type { Statement } from "./MigrationDialect.js";

export class MySqlDialect extends MigrationDialect {
  readonly name = "mysql" as const;

  protected placeholder(): string {
    return "?";
  }

  createAuditTable(tables: MigrationTables): Statement {
    return this.statement(
      `CREATE TABLE IF NOT EXISTS ${this.quote(tables.audit)} (
        id BIGINT AUTO_INCREMENT PRIMARY KEY,
        action VARCHAR(10) NOT NULL,
        original_id BIGINT NOT NULL,
        row_data JSON,
        action_time TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )`,
      true,
    );
  }

  private jsonObject(row: "NEW" | "OLD", columns: string[]): string {
    const pairs = columns.map((column) => `'${column}', ${row}.${this.quote(column)}`);
    return `JSON_OBJECT(${pairs.join(", ")})`;
  }

  createTriggers(tables: MigrationTables, columns: string[]): Statement[] {
    const source = this.quote(tables.source);
    const audit = this.quote(tables.audit);
    const key = this.quote(tables.key);

    const trigger = (
      name: string,
      event: "INSERT" | "UPDATE" | "DELETE",
      keyRef: string,
      rowData: string,
    ): Statement =>
      this.statement(
        `CREATE TRIGGER ${this.quote(name)} AFTER ${event} ON ${source} FOR EACH ROW ` +
          `INSERT INTO ${audit} (action, original_id, row_data) ` +
          `VALUES ('${event}', ${keyRef}, ${rowData})`,
        false,
      );

    return [
      trigger(tables.triggers.insert, "INSERT", `NEW.${key}`, this.jsonObject("NEW", columns)),
      trigger(tables.triggers.update, "UPDATE", `NEW.${key}`, this.jsonObject("NEW", columns)),
      trigger(
        tables.triggers.delete,
        "DELETE",
        `OLD.${key}`,
        `JSON_OBJECT('old', ${this.jsonObject("OLD", columns)})`,
      ),
    ];
  }

  createShadowTable(tables: MigrationTables): Statement {
    return this.statement(
      `CREATE TABLE ${this.quote(tables.shadow)} LIKE ${this.quote(tables.source)}`,
      false,
    );
  }

  /** RENAME TABLE swaps both names atomically */
  swapTables(tables: MigrationTables): Statement {
    return this.statement(
      `RENAME TABLE ${this.quote(tables.source)} TO ${this.quote(tables.old)}, ` +
        `${this.quote(tables.shadow)} TO ${this.quote(tables.source)}`,
      false,
    );
  }

  // Triggers follow their table through RENAME TABLE and are dropped by name
  dropTriggers(tables: MigrationTables, _swapped: boolean): Statement[] {
    return [tables.triggers.insert, tables.triggers.update, tables.triggers.delete].map(
      (name) => this.statement(`DROP TRIGGER IF EXISTS ${this.quote(name)}`, true),
    );
  }
}
