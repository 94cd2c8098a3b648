/**
 * shadow-alter - PostgreSQL Migration Dialect
 *
 * Row triggers share one PL/pgSQL function. The function body references the
 * audit table schema-qualified, since triggers fire under the search path of
 * whichever session wrote the row.
 */

import type { MigrationTables } from "../../types/migration.js";
import { MigrationDialect } from "./MigrationDialect.js";
import type { Statement } from "./MigrationDialect.js";

export class PostgresDialect extends MigrationDialect {
  readonly name = "postgres" as const;

  protected placeholder(index: number): string {
    return `$${String(index)}`;
  }

  private qualify(name: string): string {
    return `${this.quote(this.namespace)}.${this.quote(name)}`;
  }

  createAuditTable(tables: MigrationTables): Statement {
    return this.statement(
      `CREATE TABLE IF NOT EXISTS ${this.quote(tables.audit)} (
        id BIGSERIAL PRIMARY KEY,
        action VARCHAR(10) NOT NULL,
        original_id BIGINT NOT NULL,
        row_data JSONB,
        action_time TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
      )`,
      true,
    );
  }

  createTriggers(tables: MigrationTables): Statement[] {
    const audit = this.qualify(tables.audit);
    const key = this.quote(tables.key);
    const fn = this.qualify(tables.triggerFunction);
    const source = this.quote(tables.source);

    const createFunction = this.statement(
      `CREATE OR REPLACE FUNCTION ${fn}() RETURNS trigger AS $$
      BEGIN
        IF TG_OP = 'DELETE' THEN
          INSERT INTO ${audit} (action, original_id, row_data)
          VALUES ('DELETE', OLD.${key}, jsonb_build_object('old', to_jsonb(OLD)));
          RETURN OLD;
        END IF;
        INSERT INTO ${audit} (action, original_id, row_data)
        VALUES (TG_OP, NEW.${key}, to_jsonb(NEW));
        RETURN NEW;
      END;
      $$ LANGUAGE plpgsql`,
      true,
    );

    const trigger = (name: string, event: "INSERT" | "UPDATE" | "DELETE"): Statement =>
      this.statement(
        `CREATE TRIGGER ${this.quote(name)} AFTER ${event} ON ${source} ` +
          `FOR EACH ROW EXECUTE FUNCTION ${fn}()`,
        false,
      );

    return [
      createFunction,
      trigger(tables.triggers.insert, "INSERT"),
      trigger(tables.triggers.update, "UPDATE"),
      trigger(tables.triggers.delete, "DELETE"),
    ];
  }

  createShadowTable(tables: MigrationTables): Statement {
    return this.statement(
      `CREATE TABLE ${this.quote(tables.shadow)} (LIKE ${this.quote(tables.source)} INCLUDING ALL)`,
      false,
    );
  }

  /** Both renames in one anonymous block, so they commit together */
  swapTables(tables: MigrationTables): Statement {
    return this.statement(
      `DO $$ BEGIN ` +
        `ALTER TABLE ${this.quote(tables.source)} RENAME TO ${this.quote(tables.old)}; ` +
        `ALTER TABLE ${this.quote(tables.shadow)} RENAME TO ${this.quote(tables.source)}; ` +
        `END $$`,
      false,
    );
  }

  dropTriggers(tables: MigrationTables, swapped: boolean): Statement[] {
    const target = this.quote(swapped ? tables.old : tables.source);
    return [
      ...[tables.triggers.insert, tables.triggers.update, tables.triggers.delete].map(
        (name) =>
          this.statement(`DROP TRIGGER IF EXISTS ${this.quote(name)} ON ${target}`, true),
      ),
      this.statement(
        `DROP FUNCTION IF EXISTS ${this.qualify(tables.triggerFunction)}()`,
        true,
      ),
    ];
  }
}
