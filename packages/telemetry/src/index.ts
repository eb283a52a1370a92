export type { TrailInstrumentationOptions, TrailInstrumentOptions } from "./metrics.js";
export { getTrailMeter, createTrailCounter, createTrailHistogram } from "./metrics.js";

export type {
  TrailLogger,
  TrailLoggerOptions,
  TrailLogLevel,
  TrailLogEntry,
  TrailLogSink,
} from "./logging.js";
export {
  createTrailLogger,
  createRecordingLogger,
  consoleSink,
  isTrailLogLevel,
  TRAIL_LOG_LEVELS,
} from "./logging.js";

export type { TrailTracer, RunWithSpanOptions } from "./tracing.js";
export { getTrailTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
