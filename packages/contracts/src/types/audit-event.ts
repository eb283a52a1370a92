export const ACTOR_TYPES = ["agent", "human", "system"] as const;
export type ActorType = (typeof ACTOR_TYPES)[number];

export const ACTION_TYPES = [
  "tool_call",
  "http_request",
  "db_query",
  "file_read",
  "file_write",
  "api_call",
] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

export const EVENT_STATUSES = ["success", "error", "pending"] as const;
export type EventStatus = (typeof EVENT_STATUSES)[number];

export type AuditMetadataValue = string | number | boolean | null;

/** Caller-redacted context. Flat by contract; never inspected by the pipeline. */
export type AuditMetadata = Readonly<Record<string, AuditMetadataValue>>;

/**
 * One recorded action. `eventId` is the identity: every delivery attempt of the same
 * logical event carries the same id, and storage keeps exactly one record per id.
 */
export interface AuditEvent {
  readonly eventId: string;
  /** When the action happened (not when it was received), ISO-8601 with offset. */
  readonly timestamp: string;
  readonly agentInstanceId: string;
  readonly traceId: string;
  readonly actor: ActorType;
  readonly actionType: ActionType;
  readonly resource: string;
  readonly status: EventStatus;
  readonly latencyMs?: number;
  readonly metadata: AuditMetadata;
}

/** JSON body of `POST /v1/events` and the items of the query response. */
export interface AuditEventPayload {
  readonly event_id: string;
  readonly timestamp: string;
  readonly agent_instance_id: string;
  readonly trace_id: string;
  readonly actor: ActorType;
  readonly action_type: ActionType;
  readonly resource: string;
  readonly status: EventStatus;
  readonly latency_ms?: number;
  readonly metadata: AuditMetadata;
}

export interface AgentEventsPage {
  readonly events: ReadonlyArray<AuditEvent>;
  readonly total: number;
}

export interface StoredAuditEvent {
  readonly event: AuditEvent;
  /** False when an event with the same id was already stored. */
  readonly created: boolean;
}

export const toAuditEventPayload = (event: AuditEvent): AuditEventPayload => ({
  event_id: event.eventId,
  timestamp: event.timestamp,
  agent_instance_id: event.agentInstanceId,
  trace_id: event.traceId,
  actor: event.actor,
  action_type: event.actionType,
  resource: event.resource,
  status: event.status,
  ...(event.latencyMs === undefined ? {} : { latency_ms: event.latencyMs }),
  metadata: { ...event.metadata },
});

export const isActorType = (value: unknown): value is ActorType =>
  ACTOR_TYPES.some((entry) => entry === value);

export const isActionType = (value: unknown): value is ActionType =>
  ACTION_TYPES.some((entry) => entry === value);

export const isEventStatus = (value: unknown): value is EventStatus =>
  EVENT_STATUSES.some((entry) => entry === value);
