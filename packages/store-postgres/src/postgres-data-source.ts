import type { AuditEventStorePort } from "@actiontrail/contracts";
import pg, { type Pool } from "pg";

import { createPgQueryExecutor } from "./executors/pg-query-executor.js";
import type { QueryExecutor } from "./executors/query-executor.js";
import { runPostgresMigrations } from "./migrations/index.js";
import { createPostgresAuditEventStore } from "./repositories/audit-event-repository.js";
import { createPostgresTelemetry, type PostgresTelemetryOptions } from "./telemetry.js";

export interface PostgresDataSource {
  readonly executor: QueryExecutor;
  readonly auditEventStore: AuditEventStorePort;
  /** Applies pending migrations; returns the ids it applied. */
  migrate(): Promise<string[]>;
  close(): Promise<void>;
}

export interface CreatePostgresDataSourceOptions {
  readonly pool?: Pool;
  readonly executor?: QueryExecutor;
  readonly telemetry?: PostgresTelemetryOptions;
}

export const createPostgresDataSource = (options: CreatePostgresDataSourceOptions): PostgresDataSource => {
  const { pool } = options;
  let executor = options.executor;

  if (!executor && pool) {
    executor = createPgQueryExecutor(pool, { telemetry: createPostgresTelemetry(options.telemetry) });
  }

  if (!executor) {
    throw new Error("createPostgresDataSource requires a pool or query executor");
  }

  const resolvedExecutor = executor;
  return {
    executor: resolvedExecutor,
    auditEventStore: createPostgresAuditEventStore(resolvedExecutor),
    migrate: () => runPostgresMigrations(resolvedExecutor),
    close: async () => {
      await pool?.end();
    },
  };
};

export interface PostgresConnectionOptions {
  readonly connectionString: string;
  readonly maxConnections?: number;
  readonly telemetry?: PostgresTelemetryOptions;
}

/** Opens a pool for `connectionString`; `close()` ends it. */
export const createPostgresDataSourceFromUrl = (options: PostgresConnectionOptions): PostgresDataSource =>
  createPostgresDataSource({
    pool: new pg.Pool({ connectionString: options.connectionString, max: options.maxConnections ?? 10 }),
    telemetry: options.telemetry,
  });
