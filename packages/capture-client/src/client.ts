import { auditEventShapeSchema, formatZodIssues, type AuditEvent } from "@actiontrail/contracts";
import type { TrailLogger } from "@actiontrail/telemetry";

import { DeliveryWorker } from "./delivery-worker.js";
import { BoundedEventBuffer } from "./event-buffer.js";
import type { RetryPolicy } from "./retry.js";
import { createCaptureTelemetry, type CaptureTelemetryContext, type CaptureTelemetryOptions } from "./telemetry.js";
import type {
  AuditClientStats,
  CaptureOutcome,
  CloseReport,
  DeliveryCycleSummary,
  DeliverySettings,
  FlushReport,
  HttpClient,
  InvalidEventPolicy,
  OverflowPolicy,
  Sleep,
  TlsOptions,
} from "./types.js";

export const DEFAULT_BUFFER_CAPACITY = 100;
export const DEFAULT_FLUSH_TIMEOUT_MS = 10_000;
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface AuditClientOptions {
  readonly endpoint: string;
  readonly bufferCapacity?: number;
  readonly overflowPolicy?: OverflowPolicy;
  readonly flushIntervalMs?: number;
  readonly batchSize?: number;
  readonly retryPolicy?: Partial<RetryPolicy>;
  readonly requestTimeoutMs?: number;
  readonly tls?: TlsOptions;
  readonly onInvalidEvent?: InvalidEventPolicy;
  readonly httpClient?: HttpClient;
  readonly logger?: TrailLogger;
  readonly telemetry?: CaptureTelemetryOptions;
  readonly sleep?: Sleep;
  /** Start the periodic delivery timer on construction. Defaults to true. */
  readonly autoStart?: boolean;
}

export class InvalidAuditEventError extends Error {
  readonly code = "audit_event.invalid";

  constructor(readonly issues: string) {
    super(`Invalid audit event: ${issues}`);
    this.name = "InvalidAuditEventError";
  }
}

interface MutableStats {
  captured: number;
  dropped: number;
  delivered: number;
  rejected: number;
  failed: number;
}

const snapshotEvent = (event: AuditEvent): AuditEvent =>
  Object.freeze({
    ...event,
    metadata: Object.freeze({ ...(event.metadata ?? {}) }),
  });

/**
 * Producer-side entry point. `capture` only ever touches the in-memory buffer; network I/O
 * happens on the delivery worker.
 */
export class AuditClient {
  private readonly buffer: BoundedEventBuffer<AuditEvent>;
  private readonly worker: DeliveryWorker;
  private readonly telemetry: CaptureTelemetryContext;
  private readonly logger: TrailLogger;
  private readonly onInvalidEvent: InvalidEventPolicy;
  private readonly counters: MutableStats = { captured: 0, dropped: 0, delivered: 0, rejected: 0, failed: 0 };

  private closing = false;
  private closePromise?: Promise<CloseReport>;

  constructor(options: AuditClientOptions) {
    this.telemetry = createCaptureTelemetry({
      ...options.telemetry,
      logger: options.logger ?? options.telemetry?.logger,
    });
    this.logger = this.telemetry.logger;
    this.onInvalidEvent = options.onInvalidEvent ?? "drop";
    this.buffer = new BoundedEventBuffer<AuditEvent>(
      options.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY,
      options.overflowPolicy ?? "drop_newest",
    );
    this.worker = new DeliveryWorker(this.buffer, {
      endpoint: options.endpoint,
      httpClient: options.httpClient,
      tls: options.tls,
      batchSize: options.batchSize,
      flushIntervalMs: options.flushIntervalMs,
      requestTimeoutMs: options.requestTimeoutMs,
      retryPolicy: options.retryPolicy,
      sleep: options.sleep,
      telemetry: { logger: this.logger, metrics: this.telemetry.metrics },
      onCycleComplete: (summary) => this.recordCycle(summary),
    });

    if (options.autoStart ?? true) {
      this.worker.start();
    }
  }

  get settings(): DeliverySettings & { readonly bufferCapacity: number; readonly overflowPolicy: OverflowPolicy } {
    return {
      ...this.worker.settings,
      bufferCapacity: this.buffer.capacity,
      overflowPolicy: this.buffer.overflowPolicy,
    };
  }

  get closed(): boolean {
    return this.closing;
  }

  /** Starts the periodic delivery timer when `autoStart` was false. */
  start(): void {
    if (!this.closing) {
      this.worker.start();
    }
  }

  capture(event: AuditEvent): CaptureOutcome {
    if (this.closing) {
      this.countDrop("closed");
      this.logger.warn("capture.event.dropped", { reason: "closed", eventId: event.eventId });
      return { status: "dropped", reason: "closed", eventId: event.eventId };
    }

    const shape = auditEventShapeSchema.safeParse(event);
    if (!shape.success) {
      const issues = formatZodIssues(shape.error.issues);
      if (this.onInvalidEvent === "throw") {
        throw new InvalidAuditEventError(issues);
      }
      this.countDrop("invalid");
      this.logger.warn("capture.event.invalid", { issues });
      return { status: "dropped", reason: "invalid" };
    }

    const snapshot = snapshotEvent(event);
    const offered = this.buffer.offer(snapshot);
    if (this.buffer.isFull) {
      this.worker.requestCycle();
    }

    if (!offered.accepted) {
      this.countDrop("buffer_full");
      this.logger.warn("capture.buffer.overflow", {
        policy: this.buffer.overflowPolicy,
        capacity: this.buffer.capacity,
        droppedEventId: snapshot.eventId,
      });
      return { status: "dropped", reason: "buffer_full", eventId: snapshot.eventId };
    }

    this.counters.captured += 1;
    this.telemetry.metrics.captureCounter.add(1, { outcome: "buffered" });

    if (offered.evicted) {
      this.countDrop("evicted");
      this.logger.warn("capture.buffer.overflow", {
        policy: this.buffer.overflowPolicy,
        capacity: this.buffer.capacity,
        droppedEventId: offered.evicted.eventId,
      });
      return { status: "buffered", eventId: snapshot.eventId, evictedEventId: offered.evicted.eventId };
    }

    return { status: "buffered", eventId: snapshot.eventId };
  }

  /**
   * Delivers everything buffered now, waiting at most `timeoutMs`. On timeout the in-flight
   * request is aborted and undelivered events go back to the buffer. Limits past the range of
   * `setTimeout` (including `Infinity`) wait for delivery to finish.
   */
  async flush(timeoutMs: number = DEFAULT_FLUSH_TIMEOUT_MS): Promise<FlushReport> {
    const controller = new AbortController();
    let timedOut = false;
    const timer =
      timeoutMs <= MAX_TIMER_DELAY_MS
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
            this.worker.interrupt();
          }, timeoutMs)
        : undefined;

    try {
      const summary = await this.worker.runCycle({ drainAll: true, signal: controller.signal });
      if (timedOut) {
        this.logger.warn("capture.flush.timed_out", { timeoutMs, pending: this.buffer.size });
      }
      return { ...summary, timedOut, pending: this.buffer.size };
    } finally {
      clearTimeout(timer);
    }
  }

  /** Flushes, then discards whatever is still buffered. Later captures are dropped. */
  close(timeoutMs: number = DEFAULT_FLUSH_TIMEOUT_MS): Promise<CloseReport> {
    this.closePromise ??= this.shutdown(timeoutMs);
    return this.closePromise;
  }

  stats(): AuditClientStats {
    return { buffered: this.buffer.size, ...this.counters };
  }

  private async shutdown(timeoutMs: number): Promise<CloseReport> {
    this.closing = true;
    this.worker.stop();

    const report = await this.flush(timeoutMs);
    const leftovers = this.buffer.drain();
    if (leftovers.length > 0) {
      this.counters.dropped += leftovers.length;
      this.telemetry.metrics.captureCounter.add(leftovers.length, { outcome: "discarded" });
      this.logger.warn("capture.client.discarded", {
        count: leftovers.length,
        eventIds: leftovers.map((event) => event.eventId),
      });
    }

    await this.worker.dispose();
    this.logger.info("capture.client.closed", {
      delivered: this.counters.delivered,
      dropped: this.counters.dropped,
      failed: this.counters.failed,
    });

    return { ...report, pending: 0, discarded: leftovers.length };
  }

  private countDrop(reason: "closed" | "invalid" | "buffer_full" | "evicted"): void {
    this.counters.dropped += 1;
    this.telemetry.metrics.captureCounter.add(1, { outcome: "dropped", reason });
  }

  private recordCycle(summary: DeliveryCycleSummary): void {
    this.counters.delivered += summary.delivered;
    this.counters.rejected += summary.rejected;
    this.counters.failed += summary.failed;
    this.counters.dropped += summary.dropped;
  }
}

export const createAuditClient = (options: AuditClientOptions): AuditClient => new AuditClient(options);
