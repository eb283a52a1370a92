import type { Counter, Histogram } from "@opentelemetry/api";

import {
  createTrailCounter,
  createTrailHistogram,
  createTrailLogger,
  getTrailTracer,
  type TrailInstrumentationOptions,
  type TrailLogger,
  type TrailTracer,
} from "@actiontrail/telemetry";

export interface PostgresTelemetryMetrics {
  readonly queryCounter: Counter;
  readonly queryDuration: Histogram;
}

export interface PostgresTelemetryOptions {
  readonly instrumentation?: TrailInstrumentationOptions;
  readonly tracer?: TrailTracer;
  readonly logger?: TrailLogger;
  readonly metrics?: Partial<PostgresTelemetryMetrics>;
}

export interface PostgresTelemetryContext {
  readonly tracer: TrailTracer;
  readonly logger: TrailLogger;
  readonly metrics: PostgresTelemetryMetrics;
  readonly instrumentation: TrailInstrumentationOptions;
}

const DEFAULT_INSTRUMENTATION: TrailInstrumentationOptions = { name: "store-postgres" };

export const createPostgresTelemetry = (options: PostgresTelemetryOptions = {}): PostgresTelemetryContext => {
  const instrumentation: TrailInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getTrailTracer(instrumentation);
  const logger = options.logger ?? createTrailLogger({ name: instrumentation.name ?? "store-postgres" });
  const metrics: PostgresTelemetryMetrics = {
    queryCounter:
      options.metrics?.queryCounter ??
      createTrailCounter("postgres_queries_total", {
        description: "Count of Postgres queries executed.",
        instrumentation,
      }),
    queryDuration:
      options.metrics?.queryDuration ??
      createTrailHistogram("postgres_query_duration_ms", {
        description: "Duration of Postgres queries.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics, instrumentation } satisfies PostgresTelemetryContext;
};
