import {
  createDomainError,
  err,
  ok,
  type AgentEventsPage,
  type AuditEvent,
  type AuditEventStorePort,
  type ListAgentEventsOptions,
  type Result,
  type StoredAuditEvent,
  type TrailError,
} from "@actiontrail/contracts";

export interface MemoryAuditEventStoreOptions {
  readonly initialEvents?: ReadonlyArray<AuditEvent>;
}

const cloneEvent = (event: AuditEvent): AuditEvent => ({
  ...event,
  metadata: { ...event.metadata },
});

/** Newest first; equal instants fall back to the id so pages are stable. */
const compareNewestFirst = (left: AuditEvent, right: AuditEvent): number => {
  const byTime = Date.parse(right.timestamp) - Date.parse(left.timestamp);
  if (byTime !== 0) {
    return byTime;
  }
  if (left.eventId === right.eventId) {
    return 0;
  }
  return left.eventId < right.eventId ? 1 : -1;
};

export class MemoryAuditEventStore implements AuditEventStorePort {
  private readonly events = new Map<string, AuditEvent>();
  private readonly eventIdsByAgent = new Map<string, Set<string>>();

  constructor(options: MemoryAuditEventStoreOptions = {}) {
    for (const event of options.initialEvents ?? []) {
      if (!this.events.has(event.eventId)) {
        this.insert(event);
      }
    }
  }

  get size(): number {
    return this.events.size;
  }

  async upsertEvent(event: AuditEvent): Promise<Result<StoredAuditEvent, TrailError>> {
    const existing = this.events.get(event.eventId);
    if (existing) {
      return ok({ event: cloneEvent(existing), created: false });
    }

    const stored = this.insert(event);
    return ok({ event: cloneEvent(stored), created: true });
  }

  async listEventsForAgent(
    agentInstanceId: string,
    options: ListAgentEventsOptions,
  ): Promise<Result<AgentEventsPage, TrailError>> {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      return err(
        createDomainError("audit_event.memory.invalid_limit", "Limit must be a positive integer.", {
          limit: options.limit,
        }),
      );
    }

    const ids = this.eventIdsByAgent.get(agentInstanceId);
    if (!ids) {
      return ok({ events: [], total: 0 });
    }

    const events: AuditEvent[] = [];
    for (const id of ids) {
      const event = this.events.get(id);
      if (event) {
        events.push(event);
      }
    }
    events.sort(compareNewestFirst);

    return ok({
      events: events.slice(0, options.limit).map(cloneEvent),
      total: events.length,
    });
  }

  async checkHealth(): Promise<boolean> {
    return true;
  }

  private insert(event: AuditEvent): AuditEvent {
    const stored = cloneEvent(event);
    this.events.set(stored.eventId, stored);
    const ids = this.eventIdsByAgent.get(stored.agentInstanceId) ?? new Set<string>();
    ids.add(stored.eventId);
    this.eventIdsByAgent.set(stored.agentInstanceId, ids);
    return stored;
  }
}

export const createMemoryAuditEventStore = (options: MemoryAuditEventStoreOptions = {}): AuditEventStorePort =>
  new MemoryAuditEventStore(options);
