import {
  auditMetadataSchema,
  createDomainError,
  createInfraError,
  err,
  isActionType,
  isActorType,
  isEventStatus,
  ok,
  type AgentEventsPage,
  type AuditEvent,
  type AuditEventStorePort,
  type AuditMetadata,
  type ListAgentEventsOptions,
  type Result,
  type StoredAuditEvent,
  type TrailError,
} from "@actiontrail/contracts";

import type { QueryExecutor } from "../executors/query-executor.js";
import { postgresTableNames } from "../tables.js";

type AuditEventRow = {
  readonly event_id: string;
  readonly occurred_at: Date | string;
  readonly agent_instance_id: string;
  readonly trace_id: string;
  readonly actor: string;
  readonly action_type: string;
  readonly resource: string;
  readonly status: string;
  readonly latency_ms: number | null;
  readonly metadata: unknown;
};

type CountRow = {
  readonly total: number | string;
};

const EVENT_COLUMNS = `event_id, occurred_at, agent_instance_id, trace_id, actor, action_type, resource, status, latency_ms, metadata`;

const readColumn = <T extends string>(value: string, guard: (candidate: unknown) => candidate is T, column: string): T => {
  if (!guard(value)) {
    throw new Error(`Unexpected ${column} value "${value}" in stored audit event`);
  }
  return value;
};

const readMetadata = (value: unknown): AuditMetadata => {
  const parsed = auditMetadataSchema.safeParse(typeof value === "string" ? JSON.parse(value) : value ?? {});
  if (!parsed.success) {
    throw new Error("Stored audit event metadata is not a flat object");
  }
  return parsed.data;
};

const toAuditEvent = (row: AuditEventRow): AuditEvent => ({
  eventId: row.event_id,
  timestamp: new Date(row.occurred_at).toISOString(),
  agentInstanceId: row.agent_instance_id,
  traceId: row.trace_id,
  actor: readColumn(row.actor, isActorType, "actor"),
  actionType: readColumn(row.action_type, isActionType, "action_type"),
  resource: row.resource,
  status: readColumn(row.status, isEventStatus, "status"),
  ...(row.latency_ms === null ? {} : { latencyMs: Number(row.latency_ms) }),
  metadata: readMetadata(row.metadata),
});

export class PostgresAuditEventStore implements AuditEventStorePort {
  private readonly table = postgresTableNames.auditEvents;

  constructor(private readonly executor: QueryExecutor) {}

  async upsertEvent(event: AuditEvent): Promise<Result<StoredAuditEvent, TrailError>> {
    try {
      const { rows } = await this.executor.query<AuditEventRow>(
        `INSERT INTO ${this.table} (${EVENT_COLUMNS})
        VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10)
        ON CONFLICT (event_id) DO NOTHING
        RETURNING ${EVENT_COLUMNS}`,
        [
          event.eventId,
          event.timestamp,
          event.agentInstanceId,
          event.traceId,
          event.actor,
          event.actionType,
          event.resource,
          event.status,
          event.latencyMs ?? null,
          { ...event.metadata },
        ],
      );

      const inserted = rows[0];
      if (inserted) {
        return ok({ event: toAuditEvent(inserted), created: true });
      }

      const existing = await this.executor.query<AuditEventRow>(
        `SELECT ${EVENT_COLUMNS} FROM ${this.table} WHERE event_id = $1 LIMIT 1`,
        [event.eventId],
      );
      const stored = existing.rows[0];
      if (!stored) {
        return err(
          createInfraError(
            "audit_event.postgres.upsert_conflict",
            "Event conflicted on insert but could not be read back.",
            undefined,
          ),
        );
      }
      return ok({ event: toAuditEvent(stored), created: false });
    } catch (error) {
      return err(createInfraError("audit_event.postgres.upsert_failed", "Failed to store audit event.", error));
    }
  }

  async listEventsForAgent(
    agentInstanceId: string,
    options: ListAgentEventsOptions,
  ): Promise<Result<AgentEventsPage, TrailError>> {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      return err(
        createDomainError("audit_event.postgres.invalid_limit", "Limit must be a positive integer.", {
          limit: options.limit,
        }),
      );
    }

    try {
      const { rows } = await this.executor.query<AuditEventRow>(
        `SELECT ${EVENT_COLUMNS}
        FROM ${this.table}
        WHERE agent_instance_id = $1
        ORDER BY occurred_at DESC, event_id DESC
        LIMIT ${options.limit}`,
        [agentInstanceId],
      );
      const count = await this.executor.query<CountRow>(
        `SELECT COUNT(*) AS total FROM ${this.table} WHERE agent_instance_id = $1`,
        [agentInstanceId],
      );

      return ok({
        events: rows.map(toAuditEvent),
        total: Number(count.rows[0]?.total ?? 0),
      });
    } catch (error) {
      return err(createInfraError("audit_event.postgres.query_failed", "Failed to list audit events.", error));
    }
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.executor.query("SELECT 1 AS healthy");
      return true;
    } catch {
      return false;
    }
  }
}

export const createPostgresAuditEventStore = (executor: QueryExecutor): AuditEventStorePort =>
  new PostgresAuditEventStore(executor);
