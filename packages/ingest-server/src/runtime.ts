import type { AuditEventStorePort } from "@actiontrail/contracts";
import { createMemoryAuditEventStore } from "@actiontrail/store-memory";
import { createPostgresDataSourceFromUrl, type PostgresDataSource } from "@actiontrail/store-postgres";
import { createTrailLogger, type TrailLogger } from "@actiontrail/telemetry";

import type { IngestConfig } from "./config.js";
import { createIngestHandler, type IngestHandler } from "./server.js";

export type IngestStorageKind = "postgres" | "memory";

export interface IngestRuntime {
  readonly config: IngestConfig;
  readonly handler: IngestHandler;
  readonly store: AuditEventStorePort;
  readonly storage: IngestStorageKind;
  readonly logger: TrailLogger;
  close(): Promise<void>;
}

export interface CreateIngestRuntimeOptions {
  readonly logger?: TrailLogger;
  /** Opens the Postgres data source; replaced in tests. */
  readonly openPostgres?: (
    connectionString: string,
    logger: TrailLogger,
  ) => PostgresDataSource | Promise<PostgresDataSource>;
}

const openPostgresDataSource = (connectionString: string, logger: TrailLogger): PostgresDataSource =>
  createPostgresDataSourceFromUrl({ connectionString, telemetry: { logger } });

const redactConnectionString = (connectionString: string): string => {
  try {
    const url = new URL(connectionString);
    if (url.password) {
      url.password = "***";
    }
    return url.toString();
  } catch {
    return "<unparseable>";
  }
};

/** Wires storage and the request handler from configuration. */
export const createIngestRuntime = async (
  config: IngestConfig,
  options: CreateIngestRuntimeOptions = {},
): Promise<IngestRuntime> => {
  const logger = options.logger ?? createTrailLogger({ name: config.serviceName, level: config.logLevel });
  const handlerFor = (store: AuditEventStorePort) =>
    createIngestHandler({
      store,
      serviceName: config.serviceName,
      allowedOrigins: config.allowedOrigins,
      telemetry: { logger },
    });

  if (!config.databaseUrl) {
    logger.warn("ingest.storage.in_memory", { reason: "DATABASE_URL not set; events are lost on restart" });
    const store = createMemoryAuditEventStore();
    return {
      config,
      handler: handlerFor(store),
      store,
      storage: "memory",
      logger,
      close: async () => undefined,
    };
  }

  const dataSource = await (options.openPostgres ?? openPostgresDataSource)(
    config.databaseUrl,
    logger.child({ component: "store-postgres" }),
  );
  if (config.migrate) {
    try {
      const applied = await dataSource.migrate();
      logger.info("ingest.storage.migrated", { applied });
    } catch (error) {
      await dataSource.close();
      throw error;
    }
  }

  logger.info("ingest.storage.postgres", { database: redactConnectionString(config.databaseUrl) });
  return {
    config,
    handler: handlerFor(dataSource.auditEventStore),
    store: dataSource.auditEventStore,
    storage: "postgres",
    logger,
    close: () => dataSource.close(),
  };
};
