export { MemoryAuditEventStore, createMemoryAuditEventStore } from "./memory-audit-event-store.js";
export type { MemoryAuditEventStoreOptions } from "./memory-audit-event-store.js";
