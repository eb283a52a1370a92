export type { QueryExecutor, QueryResult } from "./executors/query-executor.js";
export { createPgQueryExecutor, type PgQueryable, type CreatePgQueryExecutorOptions } from "./executors/pg-query-executor.js";
export {
  createPostgresTelemetry,
  type PostgresTelemetryContext,
  type PostgresTelemetryMetrics,
  type PostgresTelemetryOptions,
} from "./telemetry.js";
export { postgresTableNames, type PostgresTableNames } from "./tables.js";
export { postgresMigrations, runPostgresMigrations, type PostgresMigration } from "./migrations/index.js";
export { PostgresAuditEventStore, createPostgresAuditEventStore } from "./repositories/audit-event-repository.js";
export {
  createPostgresDataSource,
  createPostgresDataSourceFromUrl,
  type CreatePostgresDataSourceOptions,
  type PostgresConnectionOptions,
  type PostgresDataSource,
} from "./postgres-data-source.js";
