export * from "./types.js";
export * from "./retry.js";
export * from "./event-buffer.js";
export * from "./failure-classifier.js";
export * from "./default-http-client.js";
export * from "./sleep.js";
export * from "./telemetry.js";
export * from "./delivery-worker.js";
export * from "./client.js";
