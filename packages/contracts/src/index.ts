export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/audit-event.js";

export * from "./schemas/validation.js";
export * from "./schemas/audit-event-schema.js";
export * from "./events/create-audit-event.js";

export * from "./ports/storage/audit-event-store-port.js";
