import { describe, expect, it } from "vitest";

import { createAuditEvent } from "../events/create-audit-event.js";
import { ACTION_TYPES, ACTOR_TYPES, EVENT_STATUSES, toAuditEventPayload } from "../types/audit-event.js";
import { auditEventShapeSchema, parseAuditEventPayload } from "./audit-event-schema.js";

const basePayload = {
  event_id: "6f1c2a8e-3b4d-4c5e-9f60-718293a4b5c6",
  timestamp: "2026-01-25T10:30:00Z",
  agent_instance_id: "agent-001",
  trace_id: "trace-abc",
  actor: "agent",
  action_type: "tool_call",
  resource: "web_search",
  status: "success",
  latency_ms: 342,
  metadata: { tool_name: "search", query: "[REDACTED]" },
};

describe("parseAuditEventPayload", () => {
  it("maps a valid wire payload to an event", () => {
    const result = parseAuditEventPayload(basePayload);

    expect(result).toEqual({
      ok: true,
      value: {
        eventId: "6f1c2a8e-3b4d-4c5e-9f60-718293a4b5c6",
        timestamp: "2026-01-25T10:30:00Z",
        agentInstanceId: "agent-001",
        traceId: "trace-abc",
        actor: "agent",
        actionType: "tool_call",
        resource: "web_search",
        status: "success",
        latencyMs: 342,
        metadata: { tool_name: "search", query: "[REDACTED]" },
      },
    });
  });

  it("accepts every member of each closed enumeration", () => {
    for (const actor of ACTOR_TYPES) {
      expect(parseAuditEventPayload({ ...basePayload, actor }).ok).toBe(true);
    }
    for (const actionType of ACTION_TYPES) {
      expect(parseAuditEventPayload({ ...basePayload, action_type: actionType }).ok).toBe(true);
    }
    for (const status of EVENT_STATUSES) {
      expect(parseAuditEventPayload({ ...basePayload, status }).ok).toBe(true);
    }
  });

  it("rejects values outside the enumerations instead of coercing them", () => {
    const result = parseAuditEventPayload({ ...basePayload, actor: "robot" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("audit_event.invalid");
      expect(result.error.message).toMatch(/^actor: Invalid enum value/);
    }
    expect(parseAuditEventPayload({ ...basePayload, action_type: "policy_check" }).ok).toBe(false);
    expect(parseAuditEventPayload({ ...basePayload, status: "denied" }).ok).toBe(false);
  });

  it.each(["event_id", "agent_instance_id", "trace_id", "actor", "action_type", "resource", "status"])(
    "requires %s",
    (field) => {
      const payload: Record<string, unknown> = { ...basePayload };
      delete payload[field];

      const result = parseAuditEventPayload(payload);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(`${field}: Required`);
      }
    },
  );

  it("rejects identifiers that are not version-4 UUIDs", () => {
    const result = parseAuditEventPayload({ ...basePayload, event_id: "e1" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("event_id: Expected a version-4 UUID");
    }
    expect(
      parseAuditEventPayload({ ...basePayload, event_id: "6f1c2a8e-3b4d-1c5e-9f60-718293a4b5c6" }).ok,
    ).toBe(false);
  });

  it("requires an explicit timezone on the timestamp", () => {
    const result = parseAuditEventPayload({ ...basePayload, timestamp: "2026-01-25T10:30:00" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("timestamp: Expected an ISO-8601 timestamp with timezone");
    }
    expect(parseAuditEventPayload({ ...basePayload, timestamp: "2026-01-25T12:30:00+02:00" }).ok).toBe(true);
  });

  it("permits timestamps in the future", () => {
    expect(parseAuditEventPayload({ ...basePayload, timestamp: "2999-12-31T23:59:59Z" }).ok).toBe(true);
  });

  it("uses the receipt time when the timestamp is omitted", () => {
    const payload: Record<string, unknown> = { ...basePayload };
    delete payload.timestamp;

    const result = parseAuditEventPayload(payload, { receivedAt: new Date("2026-02-01T08:00:00.000Z") });

    expect(result.ok && result.value.timestamp).toBe("2026-02-01T08:00:00.000Z");
  });

  it("rejects negative or fractional latency and treats null as absent", () => {
    expect(parseAuditEventPayload({ ...basePayload, latency_ms: -1 }).ok).toBe(false);
    expect(parseAuditEventPayload({ ...basePayload, latency_ms: 1.5 }).ok).toBe(false);

    const result = parseAuditEventPayload({ ...basePayload, latency_ms: null });
    expect(result.ok && "latencyMs" in result.value).toBe(false);
  });

  it("enforces field length limits", () => {
    expect(parseAuditEventPayload({ ...basePayload, agent_instance_id: "a".repeat(255) }).ok).toBe(true);
    expect(parseAuditEventPayload({ ...basePayload, agent_instance_id: "a".repeat(256) }).ok).toBe(false);
    expect(parseAuditEventPayload({ ...basePayload, trace_id: "t".repeat(256) }).ok).toBe(false);
    expect(parseAuditEventPayload({ ...basePayload, resource: "r".repeat(1024) }).ok).toBe(true);
    expect(parseAuditEventPayload({ ...basePayload, resource: "r".repeat(1025) }).ok).toBe(false);
  });

  it("drops unknown top-level fields", () => {
    const result = parseAuditEventPayload({ ...basePayload, schema_version: 2, extra: { nested: true } });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(Object.keys(result.value)).not.toContain("schema_version");
      expect(Object.keys(result.value)).not.toContain("extra");
    }
  });

  it("rejects nested metadata values", () => {
    const result = parseAuditEventPayload({ ...basePayload, metadata: { headers: { authorization: "x" } } });

    expect(result.ok).toBe(false);
  });

  it("caps latency at the largest value the store can hold", () => {
    const atLimit = parseAuditEventPayload({ ...basePayload, latency_ms: 2_147_483_647 });
    const overLimit = parseAuditEventPayload({ ...basePayload, latency_ms: 3_000_000_000 });

    expect(atLimit.ok && atLimit.value.latencyMs).toBe(2_147_483_647);
    expect(overLimit.ok ? undefined : overLimit.error.message).toBe(
      "latency_ms: Number must be less than or equal to 2147483647",
    );
  });

  it("stores upper-case event ids in lower case", () => {
    const result = parseAuditEventPayload({ ...basePayload, event_id: "6F1C2A8E-3B4D-4C5E-9F60-718293A4B5C6" });

    expect(result.ok && result.value.eventId).toBe("6f1c2a8e-3b4d-4c5e-9f60-718293a4b5c6");
  });

  it("rejects NUL characters in text fields and metadata", () => {
    const inResource = parseAuditEventPayload({ ...basePayload, resource: "web\u0000search" });
    const inMetadata = parseAuditEventPayload({ ...basePayload, metadata: { query: "a\u0000b" } });
    const inMetadataKey = parseAuditEventPayload({ ...basePayload, metadata: { "q\u0000": "a" } });

    expect(inResource.ok ? undefined : inResource.error.message).toBe("resource: Must not contain NUL characters");
    expect(inMetadata.ok ? undefined : inMetadata.error.message).toBe(
      "metadata.query: Must not contain NUL characters",
    );
    expect(inMetadataKey.ok).toBe(false);
  });

  it("reports a non-object body against the body itself", () => {
    const result = parseAuditEventPayload([basePayload]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("body: Expected object, received array");
    }
  });
});

describe("createAuditEvent", () => {
  it("fills in identity and time and round-trips through the wire payload", () => {
    const event = createAuditEvent(
      {
        agentInstanceId: "agent-001",
        traceId: "trace-abc",
        actor: "agent",
        actionType: "file_read",
        resource: "/tmp/report.csv",
        status: "success",
      },
      { clock: { now: () => new Date("2026-03-01T00:00:00.000Z") } },
    );

    expect(event.timestamp).toBe("2026-03-01T00:00:00.000Z");
    expect(event.eventId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(Object.isFrozen(event)).toBe(true);

    const reparsed = parseAuditEventPayload(toAuditEventPayload(event));
    expect(reparsed).toEqual({ ok: true, value: event });
  });

  it("generates distinct ids for distinct events", () => {
    const input = {
      agentInstanceId: "agent-001",
      traceId: "trace-abc",
      actor: "system",
      actionType: "api_call",
      resource: "billing",
      status: "pending",
    } as const;

    expect(createAuditEvent(input).eventId).not.toBe(createAuditEvent(input).eventId);
  });
});

describe("auditEventShapeSchema", () => {
  it("checks presence only and leaves enum membership to the server", () => {
    const event = {
      eventId: "not-validated-here",
      timestamp: "2026-01-25T10:30:00Z",
      agentInstanceId: "agent-001",
      traceId: "trace-abc",
      actor: "robot",
      actionType: "tool_call",
      resource: "search",
      status: "success",
      metadata: {},
    };

    expect(auditEventShapeSchema.safeParse(event).success).toBe(true);
    expect(auditEventShapeSchema.safeParse({ ...event, traceId: "" }).success).toBe(false);
    expect(auditEventShapeSchema.safeParse({ ...event, resource: undefined }).success).toBe(false);
  });
});
