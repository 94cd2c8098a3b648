/**
 * shadow-alter - Migration Types
 */

/**
 * A validated online schema change request
 */
export interface MigrationPlan {
  /** Table to alter */
  table: string;

  /** Clauses applied to the shadow table, one ALTER TABLE each */
  alter: string[];

  /** Integer primary key used for chunking and replay */
  keyColumn: string;

  chunkSize: number;
  replayBatchSize: number;

  swapTables: boolean;
  dropOldTable: boolean;
  dropTriggers: boolean;
  dropAuditTable: boolean;
}

/**
 * Names derived from the source table
 */
export interface MigrationTables {
  source: string;
  shadow: string;
  audit: string;
  old: string;
  key: string;
  triggers: {
    insert: string;
    update: string;
    delete: string;
  };

  /** Trigger function (PostgreSQL only) */
  triggerFunction: string;
}

export interface MigrationReport {
  chunksCopied: number;
  rowsCopied: number;
  auditEntriesReplayed: number;
  swapped: boolean;
  durationMs: number;
}

/**
 * A change recorded by the audit triggers
 */
export interface AuditEntry {
  id: number;
  action: "INSERT" | "UPDATE" | "DELETE";
  originalId: number;
}
