import { randomUUID } from "node:crypto";

import type {
  ActionType,
  ActorType,
  AuditEvent,
  AuditMetadata,
  EventStatus,
} from "../types/audit-event.js";

export interface CreateAuditEventInput {
  readonly agentInstanceId: string;
  readonly traceId: string;
  readonly actor: ActorType;
  readonly actionType: ActionType;
  readonly resource: string;
  readonly status: EventStatus;
  readonly eventId?: string;
  readonly timestamp?: Date | string;
  readonly latencyMs?: number;
  readonly metadata?: AuditMetadata;
}

export interface AuditEventFactoryOptions {
  readonly idFactory?: () => string;
  readonly clock?: { now(): Date };
}

const toIsoTimestamp = (value: Date | string): string => (typeof value === "string" ? value : value.toISOString());

/**
 * Builds an immutable event, filling in a fresh v4 id and the current UTC time when omitted.
 */
export const createAuditEvent = (
  input: CreateAuditEventInput,
  options: AuditEventFactoryOptions = {},
): AuditEvent => {
  const idFactory = options.idFactory ?? randomUUID;
  const now = options.clock?.now() ?? new Date();

  return Object.freeze({
    eventId: input.eventId ?? idFactory(),
    timestamp: toIsoTimestamp(input.timestamp ?? now),
    agentInstanceId: input.agentInstanceId,
    traceId: input.traceId,
    actor: input.actor,
    actionType: input.actionType,
    resource: input.resource,
    status: input.status,
    ...(input.latencyMs === undefined ? {} : { latencyMs: input.latencyMs }),
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
  });
};
