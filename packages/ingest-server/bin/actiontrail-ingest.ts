#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";

import {
  createIngestRuntime,
  loadIngestConfig,
  startIngestServer,
  type IngestConfig,
} from "../src/index.js";

type ServeOptions = {
  readonly port?: number;
  readonly host?: string;
  readonly databaseUrl?: string;
  readonly migrate: boolean;
};

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError("Expected a port between 0 and 65535.");
  }
  return port;
};

const program = new Command();

program.name("actiontrail-ingest").description("Audit event ingestion and query service");

program
  .command("serve")
  .description("Start the HTTP API")
  .option("--port <port>", "Port to listen on (default: PORT or 8000)", parsePort)
  .option("--host <host>", "Interface to bind (default: HOST or 0.0.0.0)")
  .option("--database-url <url>", "Postgres connection string (default: DATABASE_URL, else in-memory)")
  .option("--no-migrate", "Skip applying database migrations on startup")
  .action(async (options: ServeOptions) => {
    const fromEnv = loadIngestConfig(process.env);
    const config: IngestConfig = {
      ...fromEnv,
      port: options.port ?? fromEnv.port,
      host: options.host ?? fromEnv.host,
      ...(options.databaseUrl ? { databaseUrl: options.databaseUrl } : {}),
      migrate: fromEnv.migrate && options.migrate,
    };

    const runtime = await createIngestRuntime(config);
    const server = await startIngestServer(runtime.handler, {
      port: config.port,
      host: config.host,
      logger: runtime.logger,
    });

    const shutdown = (signal: NodeJS.Signals) => {
      runtime.logger.info("ingest.server.shutting_down", { signal });
      server
        .close()
        .then(() => runtime.close())
        .catch((error: unknown) => {
          runtime.logger.error("ingest.server.shutdown_failed", {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exitCode = 1;
        });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
