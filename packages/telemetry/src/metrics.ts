import {
  metrics,
  type Counter,
  type Histogram,
  type Meter,
  type MeterOptions,
  type MetricOptions,
} from "@opentelemetry/api";

export interface TrailInstrumentationOptions extends MeterOptions {
  readonly name?: string;
  readonly version?: string;
}

const DEFAULT_METER_NAME = "actiontrail";

/**
 * Meter from the globally registered provider. Until the host registers an SDK the API
 * hands back no-op instruments.
 */
export const getTrailMeter = (options: TrailInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_METER_NAME, options.version, { schemaUrl: options.schemaUrl });

export interface TrailInstrumentOptions extends MetricOptions {
  readonly instrumentation?: TrailInstrumentationOptions;
}

export const createTrailCounter = (name: string, options: TrailInstrumentOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getTrailMeter(instrumentation).createCounter(name, counterOptions);
};

export const createTrailHistogram = (name: string, options: TrailInstrumentOptions = {}): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getTrailMeter(instrumentation).createHistogram(name, histogramOptions);
};
