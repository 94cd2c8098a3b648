export { OnlineSchemaChange } from "./OnlineSchemaChange.js";
export type { MigrationSession } from "./OnlineSchemaChange.js";
export {
  MigrationDialect,
  MySqlDialect,
  PostgresDialect,
  createDialect,
  deriveTables,
  namespaceOf,
} from "./dialects/index.js";
export type { Statement } from "./dialects/index.js";
