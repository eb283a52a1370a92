import type { Counter, Histogram } from "@opentelemetry/api";

import {
  createTrailCounter,
  createTrailHistogram,
  createTrailLogger,
  type TrailInstrumentationOptions,
  type TrailLogger,
} from "@actiontrail/telemetry";

export interface CaptureTelemetryMetrics {
  readonly captureCounter: Counter;
  readonly deliveryCounter: Counter;
  readonly attemptCounter: Counter;
  readonly cycleDuration: Histogram;
}

export interface CaptureTelemetryOptions {
  readonly instrumentation?: TrailInstrumentationOptions;
  readonly logger?: TrailLogger;
  readonly metrics?: Partial<CaptureTelemetryMetrics>;
}

export interface CaptureTelemetryContext {
  readonly logger: TrailLogger;
  readonly metrics: CaptureTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: TrailInstrumentationOptions = { name: "capture-client" };

export const createCaptureTelemetry = (options: CaptureTelemetryOptions = {}): CaptureTelemetryContext => {
  const instrumentation: TrailInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const logger = options.logger ?? createTrailLogger({ name: instrumentation.name ?? "capture-client" });
  const metrics: CaptureTelemetryMetrics = {
    captureCounter:
      options.metrics?.captureCounter ??
      createTrailCounter("capture_events_total", {
        description: "Events offered to the capture buffer, by outcome.",
        instrumentation,
      }),
    deliveryCounter:
      options.metrics?.deliveryCounter ??
      createTrailCounter("capture_deliveries_total", {
        description: "Events leaving the delivery worker, by disposition.",
        instrumentation,
      }),
    attemptCounter:
      options.metrics?.attemptCounter ??
      createTrailCounter("capture_delivery_attempts_total", {
        description: "HTTP delivery attempts, by result.",
        instrumentation,
      }),
    cycleDuration:
      options.metrics?.cycleDuration ??
      createTrailHistogram("capture_cycle_duration_ms", {
        description: "Duration of delivery worker cycles.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { logger, metrics } satisfies CaptureTelemetryContext;
};
