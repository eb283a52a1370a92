import type { TrailError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type { AgentEventsPage, AuditEvent, StoredAuditEvent } from "../../types/audit-event.js";

export interface ListAgentEventsOptions {
  readonly limit: number;
}

/**
 * Durable event storage keyed by `eventId`.
 *
 * `upsertEvent` must be a single atomic insert-if-absent: concurrent submissions of the
 * same id (retried deliveries, several agent processes) leave exactly one record, and the
 * first stored payload wins.
 *
 * `listEventsForAgent` returns the newest events first (by `timestamp`, then `eventId`)
 * and `total` counts every stored event for the agent, not just the returned page.
 */
export interface AuditEventStorePort {
  upsertEvent(event: AuditEvent): Promise<Result<StoredAuditEvent, TrailError>>;
  listEventsForAgent(
    agentInstanceId: string,
    options: ListAgentEventsOptions,
  ): Promise<Result<AgentEventsPage, TrailError>>;
  checkHealth(): Promise<boolean>;
}
