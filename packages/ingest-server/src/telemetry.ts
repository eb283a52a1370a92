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

export interface IngestServerMetrics {
  readonly requestCounter: Counter;
  readonly requestDuration: Histogram;
  readonly eventCounter: Counter;
  readonly healthCheckCounter: Counter;
}

export interface IngestTelemetryOptions {
  readonly instrumentation?: TrailInstrumentationOptions;
  readonly tracer?: TrailTracer;
  readonly logger?: TrailLogger;
  readonly metrics?: Partial<IngestServerMetrics>;
}

export interface IngestTelemetryContext {
  readonly tracer: TrailTracer;
  readonly logger: TrailLogger;
  readonly metrics: IngestServerMetrics;
}

const DEFAULT_INSTRUMENTATION: TrailInstrumentationOptions = { name: "ingest-server" };

export const createIngestTelemetry = (options: IngestTelemetryOptions = {}): IngestTelemetryContext => {
  const instrumentation: TrailInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getTrailTracer(instrumentation);
  const logger = options.logger ?? createTrailLogger({ name: instrumentation.name ?? "ingest-server" });
  const metrics: IngestServerMetrics = {
    requestCounter:
      options.metrics?.requestCounter ??
      createTrailCounter("ingest_requests_total", {
        description: "Count of HTTP requests handled by the ingestion service",
        instrumentation,
      }),
    requestDuration:
      options.metrics?.requestDuration ??
      createTrailHistogram("ingest_request_duration_ms", {
        description: "Ingestion service request duration",
        unit: "ms",
        instrumentation,
      }),
    eventCounter:
      options.metrics?.eventCounter ??
      createTrailCounter("ingest_events_total", {
        description: "Submitted audit events, by outcome",
        instrumentation,
      }),
    healthCheckCounter:
      options.metrics?.healthCheckCounter ??
      createTrailCounter("ingest_health_checks_total", {
        description: "Count of health checks, by result",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics } satisfies IngestTelemetryContext;
};
