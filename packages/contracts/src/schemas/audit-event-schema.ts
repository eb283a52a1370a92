import { z } from "zod";

import {
  ACTION_TYPES,
  ACTOR_TYPES,
  EVENT_STATUSES,
  type AuditEvent,
} from "../types/audit-event.js";
import { createDomainError, type DomainError } from "../types/domain-error.js";
import type { Result } from "../types/result.js";
import { safeParse } from "./validation.js";

const UUID_V4_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export const MAX_IDENTIFIER_LENGTH = 255;
export const MAX_RESOURCE_LENGTH = 1024;
/** Largest latency a Postgres `INTEGER` column holds. */
export const MAX_LATENCY_MS = 2_147_483_647;

const NO_NUL_PATTERN = /^[^\u0000]*$/;

/** Text that Postgres can store: `TEXT` and `JSONB` both refuse U+0000. */
const storableText = () => z.string().regex(NO_NUL_PATTERN, "Must not contain NUL characters");

export const auditMetadataSchema = z.record(
  storableText(),
  z.union([storableText(), z.number(), z.boolean(), z.null()]),
);

export const auditTimestampSchema = z
  .string()
  .datetime({ offset: true, message: "Expected an ISO-8601 timestamp with timezone" });

/**
 * Server-side contract for `POST /v1/events`. Unknown keys are stripped, enums are closed.
 */
export const auditEventPayloadSchema = z.object({
  event_id: z.string().regex(UUID_V4_PATTERN, "Expected a version-4 UUID"),
  timestamp: auditTimestampSchema.optional(),
  agent_instance_id: storableText().min(1).max(MAX_IDENTIFIER_LENGTH),
  trace_id: storableText().min(1).max(MAX_IDENTIFIER_LENGTH),
  actor: z.enum(ACTOR_TYPES),
  action_type: z.enum(ACTION_TYPES),
  resource: storableText().min(1).max(MAX_RESOURCE_LENGTH),
  status: z.enum(EVENT_STATUSES),
  latency_ms: z.number().int().nonnegative().max(MAX_LATENCY_MS).nullish(),
  metadata: auditMetadataSchema.nullish(),
});

export type AuditEventPayloadInput = z.input<typeof auditEventPayloadSchema>;

/**
 * Structural check used by the capture client: required fields present and non-empty.
 * Enum membership is left to the ingestion service.
 */
export const auditEventShapeSchema = z
  .object({
    eventId: z.string().min(1),
    timestamp: z.string().min(1),
    agentInstanceId: z.string().min(1),
    traceId: z.string().min(1),
    actor: z.string().min(1),
    actionType: z.string().min(1),
    resource: z.string().min(1),
    status: z.string().min(1),
  })
  .passthrough();

export interface ParseAuditEventOptions {
  /** Used as the event timestamp when the payload carries none. */
  readonly receivedAt?: Date;
}

const createInvalidEventError = (issues: string): DomainError =>
  createDomainError("audit_event.invalid", issues, { issues });

export const parseAuditEventPayload = (
  input: unknown,
  options: ParseAuditEventOptions = {},
): Result<AuditEvent> => {
  const parsed = safeParse(auditEventPayloadSchema, input, createInvalidEventError);
  if (!parsed.ok) {
    return parsed;
  }

  const payload = parsed.value;
  const event: AuditEvent = {
    // One stored spelling per id.
    eventId: payload.event_id.toLowerCase(),
    timestamp: payload.timestamp ?? (options.receivedAt ?? new Date()).toISOString(),
    agentInstanceId: payload.agent_instance_id,
    traceId: payload.trace_id,
    actor: payload.actor,
    actionType: payload.action_type,
    resource: payload.resource,
    status: payload.status,
    ...(payload.latency_ms === null || payload.latency_ms === undefined ? {} : { latencyMs: payload.latency_ms }),
    metadata: payload.metadata ?? {},
  };

  return { ok: true, value: event };
};
