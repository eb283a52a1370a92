import { describe, expect, it } from "vitest";

import { createAuditEvent, type AuditEvent } from "@actiontrail/contracts";

import { MemoryAuditEventStore } from "./memory-audit-event-store.js";

const eventId = (sequence: number): string => `00000000-0000-4000-8000-${String(sequence).padStart(12, "0")}`;

const buildEvent = (sequence: number, timestamp: string, agentInstanceId = "agent-1"): AuditEvent =>
  createAuditEvent({
    eventId: eventId(sequence),
    timestamp,
    agentInstanceId,
    traceId: "trace-1",
    actor: "agent",
    actionType: "db_query",
    resource: "postgres://orders",
    status: "success",
  });

const unwrap = <T>(result: { ok: true; value: T } | { ok: false; error: unknown }): T => {
  if (!result.ok) {
    throw new Error(`Expected ok result, received ${JSON.stringify(result.error)}`);
  }
  return result.value;
};

describe("MemoryAuditEventStore", () => {
  it("stores a new event once and reports duplicates", async () => {
    const store = new MemoryAuditEventStore();
    const event = buildEvent(1, "2024-01-01T10:00:00Z");

    const first = unwrap(await store.upsertEvent(event));
    const second = unwrap(await store.upsertEvent({ ...event, resource: "postgres://changed" }));

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.event.resource).toBe("postgres://orders");
    expect(store.size).toBe(1);
  });

  it("keeps one record under concurrent submissions of the same id", async () => {
    const store = new MemoryAuditEventStore();
    const event = buildEvent(1, "2024-01-01T10:00:00Z");

    const results = await Promise.all(Array.from({ length: 5 }, () => store.upsertEvent(event)));

    expect(results.map((result) => unwrap(result).created).filter(Boolean)).toHaveLength(1);
    expect(store.size).toBe(1);
  });

  it("lists an agent's events newest first with the full total", async () => {
    const store = new MemoryAuditEventStore({
      initialEvents: [
        buildEvent(1, "2024-01-01T10:00:00Z"),
        buildEvent(3, "2024-01-01T12:00:00Z"),
        buildEvent(2, "2024-01-01T11:00:00Z"),
        buildEvent(4, "2024-01-01T13:00:00Z", "agent-2"),
      ],
    });

    const page = unwrap(await store.listEventsForAgent("agent-1", { limit: 2 }));

    expect(page.events.map((event) => event.eventId)).toEqual([eventId(3), eventId(2)]);
    expect(page.total).toBe(3);
  });

  it("orders by instant across offsets and breaks ties by id", async () => {
    const store = new MemoryAuditEventStore({
      initialEvents: [
        buildEvent(1, "2024-01-01T12:00:00+02:00"),
        buildEvent(2, "2024-01-01T11:00:00Z"),
        buildEvent(3, "2024-01-01T11:00:00Z"),
      ],
    });

    const page = unwrap(await store.listEventsForAgent("agent-1", { limit: 10 }));

    expect(page.events.map((event) => event.eventId)).toEqual([eventId(3), eventId(2), eventId(1)]);
  });

  it("returns an empty page for unknown agents", async () => {
    const store = new MemoryAuditEventStore();

    expect(unwrap(await store.listEventsForAgent("missing", { limit: 100 }))).toEqual({ events: [], total: 0 });
  });

  it("rejects a non-positive limit", async () => {
    const store = new MemoryAuditEventStore();

    const result = await store.listEventsForAgent("agent-1", { limit: 0 });

    expect(result.ok).toBe(false);
  });

  it("returns copies that callers cannot use to alter stored events", async () => {
    const store = new MemoryAuditEventStore({ initialEvents: [buildEvent(1, "2024-01-01T10:00:00Z")] });

    const page = unwrap(await store.listEventsForAgent("agent-1", { limit: 1 }));
    const [event] = page.events;
    if (event) {
      Object.assign(event.metadata, { injected: true });
    }

    const again = unwrap(await store.listEventsForAgent("agent-1", { limit: 1 }));
    expect(again.events[0]?.metadata).toEqual({});
  });

  it("reports healthy", async () => {
    await expect(new MemoryAuditEventStore().checkHealth()).resolves.toBe(true);
  });
});
