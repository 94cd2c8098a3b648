/**
 * shadow-alter - Driver Registry
 */

import type { Dialect } from "../types/session.js";
import { MySqlDriver } from "./mysql.js";
import { PostgresDriver } from "./postgres.js";
import type { DatabaseDriver } from "./types.js";

export function createDriver(dialect: Dialect): DatabaseDriver {
  switch (dialect) {
    case "mysql":
      return new MySqlDriver();
    case "postgres":
      return new PostgresDriver();
  }
}

export { MySqlDriver, classifyMySqlError } from "./mysql.js";
export { PostgresDriver, classifySqlState } from "./postgres.js";
export { MissingSchemaError } from "./faults.js";
export type {
  DatabaseDriver,
  DriverConnection,
  DriverResult,
  FaultKind,
} from "./types.js";
