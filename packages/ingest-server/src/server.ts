import {
  parseAuditEventPayload,
  toAuditEventPayload,
  formatZodIssues,
  type AuditEventStorePort,
} from "@actiontrail/contracts";
import { runWithSpan, type TrailLogger } from "@actiontrail/telemetry";
import { z } from "zod";

import {
  SECURITY_HEADERS,
  corsHeaders,
  detailResponse,
  jsonResponse,
  normalizePath,
  resolveAllowedOrigin,
  withHeaders,
} from "./http.js";
import { createIngestTelemetry, type IngestTelemetryContext, type IngestTelemetryOptions } from "./telemetry.js";

export const DEFAULT_SERVICE_NAME = "actiontrail-ingest";
export const DEFAULT_SERVICE_VERSION = "0.1.0";
export const DEFAULT_EVENTS_LIMIT = 100;
export const MAX_EVENTS_LIMIT = 1000;

interface Clock {
  now(): Date;
}

export interface IngestHandlerOptions {
  readonly store: AuditEventStorePort;
  readonly serviceName?: string;
  readonly version?: string;
  /** Origins allowed to call the API from a browser; `*` allows any. */
  readonly allowedOrigins?: ReadonlyArray<string>;
  readonly clock?: Clock;
  readonly telemetry?: IngestTelemetryOptions;
}

export type IngestHandler = (request: Request) => Promise<Response>;

type RouteName = "health" | "events.create" | "agents.events";

interface MatchedRoute {
  readonly name: RouteName;
  readonly methods: ReadonlyArray<string>;
  readonly params: Readonly<Record<string, string>>;
}

const AGENT_EVENTS_PATTERN = /^\/v1\/agents\/([^/]+)\/events$/;

const decodeSegment = (segment: string): string => {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
};

const describeThrown = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const matchRoute = (path: string): MatchedRoute | undefined => {
  if (path === "/") {
    return { name: "health", methods: ["GET"], params: {} };
  }
  if (path === "/v1/events") {
    return { name: "events.create", methods: ["POST"], params: {} };
  }
  const agentMatch = AGENT_EVENTS_PATTERN.exec(path);
  if (agentMatch?.[1]) {
    return { name: "agents.events", methods: ["GET"], params: { agentId: decodeSegment(agentMatch[1]) } };
  }
  return undefined;
};

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_EVENTS_LIMIT).default(DEFAULT_EVENTS_LIMIT),
});

const defaultClock: Clock = { now: () => new Date() };

interface RouteContext {
  readonly request: Request;
  readonly url: URL;
  readonly params: Readonly<Record<string, string>>;
  readonly logger: TrailLogger;
}

class IngestRoutes {
  constructor(
    private readonly store: AuditEventStorePort,
    private readonly telemetry: IngestTelemetryContext,
    private readonly clock: Clock,
    private readonly service: { readonly name: string; readonly version: string },
  ) {}

  async health({ logger }: RouteContext): Promise<Response> {
    let healthy: boolean;
    try {
      healthy = await this.store.checkHealth();
    } catch (error) {
      logger.error("ingest.health.check_failed", { error: describeThrown(error) });
      healthy = false;
    }

    this.telemetry.metrics.healthCheckCounter.add(1, { status: healthy ? "ok" : "error" });
    return jsonResponse(healthy ? 200 : 503, {
      service: this.service.name,
      status: healthy ? "operational" : "degraded",
      version: this.service.version,
    });
  }

  async createEvent({ request, logger }: RouteContext): Promise<Response> {
    let body: unknown;
    try {
      body = JSON.parse(await request.text());
    } catch (error) {
      logger.warn("ingest.event.malformed_body", { error: describeThrown(error) });
      this.telemetry.metrics.eventCounter.add(1, { outcome: "malformed" });
      return detailResponse(400, "Request body must be valid JSON");
    }

    const parsed = parseAuditEventPayload(body, { receivedAt: this.clock.now() });
    if (!parsed.ok) {
      logger.warn("ingest.event.rejected", { issues: parsed.error.message });
      this.telemetry.metrics.eventCounter.add(1, { outcome: "invalid" });
      return detailResponse(422, parsed.error.message);
    }

    const event = parsed.value;
    let stored: Awaited<ReturnType<AuditEventStorePort["upsertEvent"]>>;
    try {
      stored = await this.store.upsertEvent(event);
    } catch (error) {
      logger.error("ingest.event.store_failed", { eventId: event.eventId, error: describeThrown(error) });
      this.telemetry.metrics.eventCounter.add(1, { outcome: "failed" });
      return detailResponse(500, "Failed to capture event");
    }
    if (!stored.ok) {
      logger.error("ingest.event.store_failed", {
        eventId: event.eventId,
        code: stored.error.code,
        error: stored.error.message,
        details: stored.error.details,
      });
      this.telemetry.metrics.eventCounter.add(1, { outcome: "failed" });
      return detailResponse(500, "Failed to capture event");
    }

    const outcome = stored.value.created ? "created" : "duplicate";
    this.telemetry.metrics.eventCounter.add(1, { outcome });
    logger.info("ingest.event.captured", {
      eventId: event.eventId,
      agentInstanceId: event.agentInstanceId,
      traceId: event.traceId,
      outcome,
    });
    return jsonResponse(201, { event_id: event.eventId, status: "captured" });
  }

  async listAgentEvents({ url, params, logger }: RouteContext): Promise<Response> {
    const agentId = params.agentId ?? "";
    const query = listQuerySchema.safeParse({ limit: url.searchParams.get("limit") ?? undefined });
    if (!query.success) {
      return detailResponse(422, formatZodIssues(query.error.issues));
    }

    let page: Awaited<ReturnType<AuditEventStorePort["listEventsForAgent"]>>;
    try {
      page = await this.store.listEventsForAgent(agentId, { limit: query.data.limit });
    } catch (error) {
      logger.error("ingest.query.failed", { agentInstanceId: agentId, error: describeThrown(error) });
      return detailResponse(500, "Failed to retrieve events");
    }
    if (!page.ok) {
      logger.error("ingest.query.failed", {
        agentInstanceId: agentId,
        code: page.error.code,
        error: page.error.message,
        details: page.error.details,
      });
      return detailResponse(500, "Failed to retrieve events");
    }

    return jsonResponse(200, {
      events: page.value.events.map(toAuditEventPayload),
      total: page.value.total,
      agent_instance_id: agentId,
    });
  }
}

/**
 * Fetch-style handler for the ingestion and query API. Every response carries the security
 * headers; CORS headers are added for allowed origins.
 */
export const createIngestHandler = (options: IngestHandlerOptions): IngestHandler => {
  const telemetry = createIngestTelemetry(options.telemetry);
  const { logger, tracer, metrics } = telemetry;
  const routes = new IngestRoutes(options.store, telemetry, options.clock ?? defaultClock, {
    name: options.serviceName ?? DEFAULT_SERVICE_NAME,
    version: options.version ?? DEFAULT_SERVICE_VERSION,
  });
  const corsPolicy = { allowedOrigins: options.allowedOrigins ?? [] };

  const dispatch = async (request: Request, url: URL, route: MatchedRoute | undefined): Promise<Response> => {
    const allowedOrigin = resolveAllowedOrigin(corsPolicy, request.headers.get("origin"));

    if (!route) {
      return detailResponse(404, "Not Found");
    }
    if (request.method === "OPTIONS") {
      return new Response(null, { status: 204, headers: corsHeaders(allowedOrigin, true) });
    }

    const cors = corsHeaders(allowedOrigin, false);
    if (!route.methods.includes(request.method)) {
      return detailResponse(405, "Method Not Allowed", { allow: [...route.methods, "OPTIONS"].join(", "), ...cors });
    }

    const context: RouteContext = { request, url, params: route.params, logger };
    const response = await (() => {
      switch (route.name) {
        case "health":
          return routes.health(context);
        case "events.create":
          return routes.createEvent(context);
        case "agents.events":
          return routes.listAgentEvents(context);
        default: {
          const unhandled: never = route.name;
          throw new Error(`Unhandled route ${String(unhandled)}`);
        }
      }
    })();
    return withHeaders(response, cors);
  };

  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const path = normalizePath(url.pathname);
    const route = matchRoute(path);
    const routeName = route?.name ?? "unmatched";
    const start = performance.now();

    let response: Response;
    try {
      response = await runWithSpan(
        tracer,
        "ingest.request",
        async (span) => {
          span.setAttribute("http.method", request.method);
          span.setAttribute("http.target", url.pathname);
          const routed = await dispatch(request, url, route);
          span.setAttribute("http.status_code", routed.status);
          return routed;
        },
        { attributes: { "http.route": routeName } },
      );
    } catch (error) {
      logger.error("ingest.request_failed", {
        method: request.method,
        route: routeName,
        error: describeThrown(error),
      });
      response = detailResponse(500, "Internal Server Error");
    }

    const durationMs = performance.now() - start;
    metrics.requestCounter.add(1, { route: routeName, method: request.method, status: response.status });
    metrics.requestDuration.record(durationMs, { route: routeName, method: request.method, status: response.status });
    logger.info("ingest.request_completed", {
      method: request.method,
      path: url.pathname,
      route: routeName,
      status: response.status,
      durationMs: Math.round(durationMs),
    });

    return withHeaders(response, SECURITY_HEADERS);
  };
};
