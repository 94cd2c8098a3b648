/**
 * shadow-alter - Online Schema Change
 *
 * Alters a live table without blocking writers:
 *   1. record concurrent changes into an audit table through row triggers
 *   2. build a shadow table with the new definition
 *   3. copy rows across in key-range chunks
 *   4. replay the audit table into the shadow table
 *   5. optionally swap the tables and clean up
 *
 * Every statement runs through the session, so connection losses are healed
 * underneath. Units that insert rows clear their target first and are re-run
 * as a whole after a reconnect.
 *
 * Known limitation: the key column must not change in an UPDATE, and writes
 * landing between the final replay and the swap are not replayed.
 */

import { z } from "zod";
import { parseMigrationPlan } from "../config/schema.js";
import type { SessionManager } from "../session/SessionManager.js";
import { ConnectivityLostError, ValidationError } from "../types/errors.js";
import type {
  AuditEntry,
  MigrationPlan,
  MigrationReport,
  MigrationTables,
} from "../types/migration.js";
import type { CallOptions, OperationResult } from "../types/session.js";
import { logger } from "../utils/logger.js";
import { createDialect, deriveTables } from "./dialects/index.js";
import type { MigrationDialect, Statement } from "./dialects/index.js";

const log = logger.forModule("MIGRATION");

/**
 * The part of the session a migration needs
 */
export type MigrationSession = Pick<SessionManager, "dialect" | "getConfig"> & {
  execute(statement: Statement, options?: CallOptions): Promise<OperationResult>;
};

// Drivers return integer keys as numbers, numeric strings or bigints.
// Keys past 2^53 would be rounded onto a neighbouring row, so they are rejected.
const KeyValueSchema = z
  .union([
    z.number().int(),
    z.string().regex(/^-?\d+$/).transform(Number),
    z.bigint().transform(Number),
  ])
  .refine((value) => Number.isSafeInteger(value), {
    message: "key is outside the safe integer range",
  });

const KeyRangeRowSchema = z.object({
  min_id: KeyValueSchema.nullable(),
  max_id: KeyValueSchema.nullable(),
});

const ColumnRowSchema = z.object({ column_name: z.string() });

const AuditRowSchema = z
  .object({
    id: KeyValueSchema,
    action: z.enum(["INSERT", "UPDATE", "DELETE"]),
    original_id: KeyValueSchema,
  })
  .transform(
    (row): AuditEntry => ({
      id: row.id,
      action: row.action,
      originalId: row.original_id,
    }),
  );

function parseRows<S extends z.ZodTypeAny>(
  schema: S,
  rows: Record<string, unknown>[],
  subject: string,
): z.output<S>[] {
  const result = z.array(schema).safeParse(rows);
  if (!result.success) {
    throw new ValidationError(`Unexpected ${subject} rows returned by the server`, {
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data;
}

export class OnlineSchemaChange {
  private readonly plan: MigrationPlan;
  private readonly dialect: MigrationDialect;
  private readonly tables: MigrationTables;

  constructor(
    private readonly session: MigrationSession,
    plan: MigrationPlan,
  ) {
    this.plan = parseMigrationPlan(plan);
    this.dialect = createDialect(session.getConfig());
    this.tables = deriveTables(this.plan.table, this.plan.keyColumn, session.dialect);
  }

  getTables(): MigrationTables {
    return this.tables;
  }

  async run(signal?: AbortSignal): Promise<MigrationReport> {
    const startedAt = Date.now();
    const { plan, tables } = this;

    log.info("Starting online schema change", {
      entityId: tables.source,
      alter: plan.alter,
      chunkSize: plan.chunkSize,
    });

    const sourceColumns = await this.readColumns(tables.source, signal);
    if (sourceColumns.length === 0) {
      throw new ValidationError(`Table "${tables.source}" does not exist`, {
        table: tables.source,
      });
    }
    if (!sourceColumns.includes(tables.key)) {
      throw new ValidationError(
        `Table "${tables.source}" has no key column "${tables.key}"`,
        { table: tables.source, keyColumn: tables.key },
      );
    }

    await this.exec(this.dialect.createAuditTable(tables), signal);
    log.info("Audit table created", { entityId: tables.audit });

    for (const statement of this.dialect.createTriggers(tables, sourceColumns)) {
      await this.exec(statement, signal);
    }
    log.info("Triggers created", { entityId: tables.source });

    await this.exec(this.dialect.createShadowTable(tables), signal);
    for (const clause of plan.alter) {
      await this.exec(this.dialect.alterShadowTable(tables, clause), signal);
    }
    log.info("Shadow table created and altered", {
      entityId: tables.shadow,
      clauses: plan.alter.length,
    });

    const shadowColumns = await this.readColumns(tables.shadow, signal);
    const columns = sourceColumns.filter((column) => shadowColumns.includes(column));
    if (!columns.includes(tables.key)) {
      throw new ValidationError(
        `The ALTER clauses removed key column "${tables.key}" from the shadow table`,
        { keyColumn: tables.key },
      );
    }

    const { chunksCopied, rowsCopied } = await this.copyData(columns, signal);
    let auditEntriesReplayed = await this.replayAudit(columns, signal);

    let swapped = false;
    if (plan.swapTables) {
      // catch up on writes made during the first replay
      auditEntriesReplayed += await this.replayAudit(columns, signal);
      await this.exec(this.dialect.swapTables(tables), signal);
      swapped = true;
      log.info("Tables swapped", { entityId: tables.source, old: tables.old });
    }

    await this.cleanup(swapped, signal);

    const report: MigrationReport = {
      chunksCopied,
      rowsCopied,
      auditEntriesReplayed,
      swapped,
      durationMs: Date.now() - startedAt,
    };
    log.info("Migration completed", { entityId: tables.source, ...report });
    return report;
  }

  private async exec(
    statement: Statement,
    signal: AbortSignal | undefined,
  ): Promise<OperationResult> {
    return this.session.execute(statement, { signal });
  }

  /**
   * Run a unit of statements, re-running it once if the connection drops
   */
  private async runUnit<T>(unit: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (!(error instanceof ConnectivityLostError)) {
        throw error;
      }
      log.warn("Connection lost mid-unit; re-running it", { unit });
      return work();
    }
  }

  private async readColumns(
    table: string,
    signal: AbortSignal | undefined,
  ): Promise<string[]> {
    const result = await this.exec(this.dialect.listColumns(table), signal);
    return parseRows(ColumnRowSchema, result.rows, "column").map(
      (row) => row.column_name,
    );
  }

  private async copyData(
    columns: string[],
    signal: AbortSignal | undefined,
  ): Promise<{ chunksCopied: number; rowsCopied: number }> {
    const { tables } = this;
    const result = await this.exec(this.dialect.keyRange(tables), signal);
    const [range] = parseRows(KeyRangeRowSchema, result.rows, "key range");

    if (range === undefined || range.min_id === null || range.max_id === null) {
      log.info("Source table is empty; nothing to copy", { entityId: tables.source });
      return { chunksCopied: 0, rowsCopied: 0 };
    }

    const minId = range.min_id;
    const maxId = range.max_id;
    log.info("Copying rows to shadow table", { entityId: tables.shadow, minId, maxId });

    let chunksCopied = 0;
    let rowsCopied = 0;
    for (let from = minId; from <= maxId; from += this.plan.chunkSize) {
      const to = Math.min(from + this.plan.chunkSize - 1, maxId);
      const copied = await this.runUnit(`copy ${String(from)}-${String(to)}`, async () => {
        await this.exec(this.dialect.clearRange(tables, from, to), signal);
        const inserted = await this.exec(
          this.dialect.copyRange(tables, columns, from, to),
          signal,
        );
        return inserted.rowCount;
      });

      chunksCopied++;
      rowsCopied += copied;
      log.info("Copied chunk", { from, to, rows: copied });
    }

    return { chunksCopied, rowsCopied };
  }

  /**
   * Apply recorded changes to the shadow table until a short batch is read
   */
  private async replayAudit(
    columns: string[],
    signal: AbortSignal | undefined,
  ): Promise<number> {
    const { tables } = this;
    const batchSize = this.plan.replayBatchSize;
    let afterId = 0;
    let applied = 0;

    for (;;) {
      const result = await this.exec(
        this.dialect.readAudit(tables, afterId, batchSize),
        signal,
      );
      const entries = parseRows(AuditRowSchema, result.rows, "audit");

      for (const entry of entries) {
        await this.runUnit(`audit entry ${String(entry.id)}`, () =>
          this.applyEntry(entry, columns, signal),
        );
        afterId = entry.id;
        applied++;
      }

      if (entries.length < batchSize) {
        break;
      }
    }

    log.info("Audit log replayed", { entityId: tables.shadow, applied });
    return applied;
  }

  private async applyEntry(
    entry: AuditEntry,
    columns: string[],
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const { tables } = this;
    await this.exec(this.dialect.deleteShadowRow(tables, entry.originalId), signal);

    switch (entry.action) {
      case "INSERT":
      case "UPDATE":
        // current source row, or nothing if it has since been deleted
        await this.exec(
          this.dialect.copyRow(tables, columns, entry.originalId),
          signal,
        );
        break;
      case "DELETE":
        break;
    }

    await this.exec(this.dialect.deleteAuditEntry(tables, entry.id), signal);
  }

  private async cleanup(
    swapped: boolean,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const { plan, tables } = this;

    if (plan.dropTriggers) {
      for (const statement of this.dialect.dropTriggers(tables, swapped)) {
        await this.exec(statement, signal);
      }
      log.info("Triggers dropped", { entityId: tables.source });
    }

    if (plan.dropOldTable) {
      if (swapped) {
        await this.exec(this.dialect.dropTable(tables.old), signal);
        log.info("Old table dropped", { entityId: tables.old });
      } else {
        log.warn("Not dropping the old table: tables were not swapped", {
          entityId: tables.source,
        });
      }
    }

    if (plan.dropAuditTable) {
      await this.exec(this.dialect.dropTable(tables.audit), signal);
      log.info("Audit table dropped", { entityId: tables.audit });
    }
  }
}
