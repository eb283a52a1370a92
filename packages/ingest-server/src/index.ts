export {
  createIngestHandler,
  DEFAULT_EVENTS_LIMIT,
  DEFAULT_SERVICE_NAME,
  DEFAULT_SERVICE_VERSION,
  MAX_EVENTS_LIMIT,
  type IngestHandler,
  type IngestHandlerOptions,
} from "./server.js";
export { SECURITY_HEADERS } from "./http.js";
export {
  createIngestTelemetry,
  type IngestServerMetrics,
  type IngestTelemetryContext,
  type IngestTelemetryOptions,
} from "./telemetry.js";
export { DEFAULT_ALLOWED_ORIGINS, IngestConfigError, loadIngestConfig, type IngestConfig } from "./config.js";
export {
  createIngestRuntime,
  type CreateIngestRuntimeOptions,
  type IngestRuntime,
  type IngestStorageKind,
} from "./runtime.js";
export {
  startIngestServer,
  toFetchRequest,
  writeFetchResponse,
  type NodeRequestLike,
  type RunningIngestServer,
  type StartIngestServerOptions,
} from "./node-server.js";
