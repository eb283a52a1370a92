import { formatZodIssues } from "@actiontrail/contracts";
import { TRAIL_LOG_LEVELS, type TrailLogLevel } from "@actiontrail/telemetry";
import { z } from "zod";

import { DEFAULT_SERVICE_NAME } from "./server.js";

export const DEFAULT_ALLOWED_ORIGINS = ["http://localhost:3000", "http://localhost:8080"] as const;

export interface IngestConfig {
  readonly port: number;
  readonly host: string;
  /** Absent means the in-process store. */
  readonly databaseUrl?: string;
  readonly allowedOrigins: ReadonlyArray<string>;
  readonly logLevel: TrailLogLevel;
  readonly serviceName: string;
  readonly migrate: boolean;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const logLevelSchema = z.custom<TrailLogLevel>(
  (value) => typeof value === "string" && TRAIL_LOG_LEVELS.some((level) => level === value),
  { message: `Expected one of ${TRAIL_LOG_LEVELS.join(", ")}` },
);

const ingestEnvSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65_535).default(8000)),
  HOST: z.preprocess(blankToUndefined, z.string().default("0.0.0.0")),
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  ALLOWED_ORIGINS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform((value) =>
        value
          .split(",")
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0),
      )
      .optional(),
  ),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value),
    logLevelSchema.default("info"),
  ),
  SERVICE_NAME: z.preprocess(blankToUndefined, z.string().default(DEFAULT_SERVICE_NAME)),
  MIGRATE: z.preprocess(
    blankToUndefined,
    z
      .enum(["true", "false", "1", "0"])
      .transform((value) => value === "true" || value === "1")
      .default("true"),
  ),
});

export class IngestConfigError extends Error {
  constructor(readonly issues: string) {
    super(`Invalid ingestion service configuration: ${issues}`);
    this.name = "IngestConfigError";
  }
}

export const loadIngestConfig = (env: Record<string, string | undefined> = process.env): IngestConfig => {
  const parsed = ingestEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new IngestConfigError(formatZodIssues(parsed.error.issues));
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    ...(values.DATABASE_URL ? { databaseUrl: values.DATABASE_URL } : {}),
    allowedOrigins: values.ALLOWED_ORIGINS ?? [...DEFAULT_ALLOWED_ORIGINS],
    logLevel: values.LOG_LEVEL,
    serviceName: values.SERVICE_NAME,
    migrate: values.MIGRATE,
  };
};
