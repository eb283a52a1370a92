import { toAuditEventPayload, type AuditEvent } from "@actiontrail/contracts";
import type { TrailLogger } from "@actiontrail/telemetry";

import { FetchHttpClient } from "./default-http-client.js";
import type { BoundedEventBuffer } from "./event-buffer.js";
import { classifyResponseStatus, classifyThrownError, describeError } from "./failure-classifier.js";
import { determineRetryDecision, resolveRetryPolicy, type RetryPolicy } from "./retry.js";
import { abortableSleep, settledOrAborted } from "./sleep.js";
import {
  createCaptureTelemetry,
  type CaptureTelemetryContext,
  type CaptureTelemetryOptions,
} from "./telemetry.js";
import type {
  DeliveryCycleSummary,
  DeliveryFailureKind,
  DeliverySettings,
  HttpClient,
  HttpResponse,
  Sleep,
  TlsOptions,
} from "./types.js";

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_FLUSH_INTERVAL_MS = 5000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

const EVENTS_PATH = "/v1/events";
const MAX_LOGGED_BODY_LENGTH = 500;

export interface DeliveryWorkerOptions {
  /** Base URL of the ingestion service, e.g. `http://localhost:8000`. */
  readonly endpoint: string;
  /** Supplied transports stay open when the worker is disposed. */
  readonly httpClient?: HttpClient;
  readonly tls?: TlsOptions;
  readonly batchSize?: number;
  readonly flushIntervalMs?: number;
  readonly requestTimeoutMs?: number;
  readonly retryPolicy?: Partial<RetryPolicy>;
  readonly sleep?: Sleep;
  readonly logger?: TrailLogger;
  readonly telemetry?: CaptureTelemetryOptions;
  readonly onCycleComplete?: (summary: DeliveryCycleSummary) => void;
}

export interface RunCycleOptions {
  /** Drain the whole buffer instead of one batch. */
  readonly drainAll?: boolean;
  readonly signal?: AbortSignal;
}

type AttemptResult =
  | { readonly kind: "delivered"; readonly status: number }
  | {
      readonly kind: "failed";
      readonly failure: DeliveryFailureKind;
      readonly description: string;
      readonly status?: number;
    };

type EventDisposition = "delivered" | "rejected" | "failed" | "aborted";

interface EventDeliveryResult {
  readonly disposition: EventDisposition;
  readonly attempts: number;
}

interface MutableSummary {
  drained: number;
  delivered: number;
  rejected: number;
  failed: number;
  deferred: number;
  dropped: number;
  attempts: number;
}

export const emptyCycleSummary = (): DeliveryCycleSummary => ({
  drained: 0,
  delivered: 0,
  rejected: 0,
  failed: 0,
  deferred: 0,
  dropped: 0,
  attempts: 0,
});

const normalizeEndpoint = (endpoint: string): string => endpoint.replace(/\/+$/, "");

const truncate = (value: string | undefined): string | undefined =>
  value && value.length > MAX_LOGGED_BODY_LENGTH ? `${value.slice(0, MAX_LOGGED_BODY_LENGTH)}…` : value;

/**
 * Single consumer of the capture buffer. Cycles run one at a time: each drains a batch in
 * FIFO order and POSTs the events one by one, retrying transient failures with backoff.
 */
export class DeliveryWorker {
  private readonly endpoint: string;
  private readonly url: string;
  private readonly httpClient: HttpClient;
  private readonly ownsHttpClient: boolean;
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly logger: TrailLogger;
  private readonly telemetry: CaptureTelemetryContext;
  private readonly onCycleComplete?: (summary: DeliveryCycleSummary) => void;

  private timer?: ReturnType<typeof setInterval>;
  private tail: Promise<void> = Promise.resolve();
  private activeCycle?: AbortController;
  private queuedCycles = 0;
  private disposed = false;

  constructor(
    private readonly buffer: BoundedEventBuffer<AuditEvent>,
    options: DeliveryWorkerOptions,
  ) {
    this.endpoint = normalizeEndpoint(options.endpoint);
    this.url = `${this.endpoint}${EVENTS_PATH}`;
    this.ownsHttpClient = !options.httpClient;
    this.httpClient =
      options.httpClient ??
      new FetchHttpClient({ tls: options.tls, defaultTimeoutMs: options.requestTimeoutMs });
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.flushIntervalMs = Math.max(1, options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS);
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryPolicy = resolveRetryPolicy(options.retryPolicy);
    this.sleep = options.sleep ?? abortableSleep;
    this.telemetry = createCaptureTelemetry({ ...options.telemetry, logger: options.logger ?? options.telemetry?.logger });
    this.logger = this.telemetry.logger;
    this.onCycleComplete = options.onCycleComplete;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  get settings(): DeliverySettings {
    return {
      endpoint: this.endpoint,
      batchSize: this.batchSize,
      flushIntervalMs: this.flushIntervalMs,
      requestTimeoutMs: this.requestTimeoutMs,
      retryPolicy: this.retryPolicy,
    };
  }

  start(): void {
    if (this.timer || this.disposed) {
      return;
    }
    this.timer = setInterval(() => this.scheduleCycle("interval"), this.flushIntervalMs);
    // The interval must never be what keeps the host process alive.
    this.timer.unref();
    this.logger.debug("capture.worker.started", { flushIntervalMs: this.flushIntervalMs, url: this.url });
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
    this.logger.debug("capture.worker.stopped");
  }

  /** Starts a cycle in the background unless one is already waiting to run. */
  requestCycle(): void {
    if (!this.running) {
      return;
    }
    this.scheduleCycle("buffer_full");
  }

  /** Aborts the cycle currently delivering; its undelivered events go back to the buffer. */
  interrupt(): void {
    this.activeCycle?.abort();
  }

  runCycle(options: RunCycleOptions = {}): Promise<DeliveryCycleSummary> {
    const previous = this.tail;
    const run = (async () => {
      await settledOrAborted(previous, options.signal);
      if (options.signal?.aborted) {
        return emptyCycleSummary();
      }
      return this.executeCycle(options);
    })();

    this.tail = Promise.all([previous, run]).then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Stops the interval, waits for the running cycle and releases an owned transport. */
  async dispose(): Promise<void> {
    this.stop();
    this.disposed = true;
    await this.tail;
    if (this.ownsHttpClient) {
      await this.httpClient.close?.();
    }
  }

  private scheduleCycle(trigger: "interval" | "buffer_full"): void {
    if (this.queuedCycles > 0 || (trigger === "interval" && this.buffer.size === 0)) {
      return;
    }
    this.queuedCycles += 1;
    this.runCycle()
      .catch((error: unknown) => {
        this.logger.error("capture.worker.cycle_crashed", { trigger, error: describeError(error) });
      })
      .finally(() => {
        this.queuedCycles -= 1;
      });
  }

  private async executeCycle(options: RunCycleOptions): Promise<DeliveryCycleSummary> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
    this.activeCycle = controller;

    const start = performance.now();
    const summary: MutableSummary = { ...emptyCycleSummary() };

    try {
      const batch = this.buffer.drain(options.drainAll ? this.buffer.size : this.batchSize);
      summary.drained = batch.length;

      for (const [index, event] of batch.entries()) {
        const result = await this.deliverEvent(event, controller.signal);
        summary.attempts += result.attempts;

        if (result.disposition === "delivered") {
          summary.delivered += 1;
          continue;
        }
        if (result.disposition === "rejected") {
          summary.rejected += 1;
          continue;
        }
        if (result.disposition === "failed") {
          summary.failed += 1;
          this.deferRemainder(batch.slice(index + 1), summary, "endpoint_unavailable");
          break;
        }
        this.deferRemainder(batch.slice(index), summary, "aborted");
        break;
      }
    } catch (error) {
      this.logger.error("capture.worker.cycle_failed", { error: describeError(error) });
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
      if (this.activeCycle === controller) {
        this.activeCycle = undefined;
      }
    }

    const duration = performance.now() - start;
    const completed: DeliveryCycleSummary = { ...summary };
    this.telemetry.metrics.cycleDuration.record(duration);
    if (completed.drained > 0) {
      this.logger.info("capture.worker.cycle_completed", { ...completed, durationMs: Math.round(duration) });
    }
    this.onCycleComplete?.(completed);
    return completed;
  }

  private deferRemainder(
    remainder: ReadonlyArray<AuditEvent>,
    summary: MutableSummary,
    reason: "endpoint_unavailable" | "aborted",
  ): void {
    if (remainder.length === 0) {
      return;
    }
    const overflow = this.buffer.requeue(remainder);
    const deferred = remainder.length - overflow.length;
    summary.deferred += deferred;
    summary.dropped += overflow.length;
    this.telemetry.metrics.deliveryCounter.add(deferred, { disposition: "deferred" });
    if (overflow.length > 0) {
      this.telemetry.metrics.deliveryCounter.add(overflow.length, { disposition: "dropped" });
    }

    this.logger.warn("capture.delivery.deferred", {
      reason,
      deferred,
      droppedEventIds: overflow.map((event) => event.eventId),
    });
  }

  private async deliverEvent(event: AuditEvent, signal: AbortSignal): Promise<EventDeliveryResult> {
    const body = JSON.stringify(toAuditEventPayload(event));
    const maxAttempts = this.retryPolicy.maxAttempts;

    for (let attempt = 1; ; attempt += 1) {
      const result = await this.attempt(event, body, attempt, signal);
      this.telemetry.metrics.attemptCounter.add(1, {
        result: result.kind === "delivered" ? "delivered" : result.failure,
      });

      if (result.kind === "delivered") {
        this.logger.debug("capture.delivery.succeeded", {
          eventId: event.eventId,
          attempt,
          status: result.status,
        });
        this.telemetry.metrics.deliveryCounter.add(1, { disposition: "delivered" });
        return { disposition: "delivered", attempts: attempt };
      }

      const decision = determineRetryDecision(attempt, result.failure, this.retryPolicy);
      if (decision.shouldRetry) {
        this.logger.warn("capture.delivery.retry_scheduled", {
          eventId: event.eventId,
          attempt,
          maxAttempts,
          delayMs: decision.delayMs,
          status: result.status,
          error: result.description,
        });
        await this.sleep(decision.delayMs, signal);
        if (signal.aborted) {
          return { disposition: "aborted", attempts: attempt };
        }
        continue;
      }

      return this.settleFailure(event, attempt, result);
    }
  }

  private settleFailure(
    event: AuditEvent,
    attempt: number,
    result: Extract<AttemptResult, { kind: "failed" }>,
  ): EventDeliveryResult {
    const context = {
      eventId: event.eventId,
      attempt,
      status: result.status,
      error: result.description,
    } satisfies Record<string, unknown>;

    switch (result.failure) {
      case "rejected":
        this.logger.error("capture.delivery.rejected", context);
        this.telemetry.metrics.deliveryCounter.add(1, { disposition: "rejected" });
        return { disposition: "rejected", attempts: attempt };
      case "security":
        this.logger.error("capture.delivery.security_failure", context);
        this.telemetry.metrics.deliveryCounter.add(1, { disposition: "failed", reason: "security" });
        return { disposition: "failed", attempts: attempt };
      case "transient":
        this.logger.error("capture.delivery.failed", { ...context, maxAttempts: this.retryPolicy.maxAttempts });
        this.telemetry.metrics.deliveryCounter.add(1, { disposition: "failed", reason: "exhausted" });
        return { disposition: "failed", attempts: attempt };
      case "aborted":
        return { disposition: "aborted", attempts: attempt };
      default: {
        const unhandled: never = result.failure;
        throw new Error(`Unhandled delivery failure kind: ${String(unhandled)}`);
      }
    }
  }

  private async attempt(
    event: AuditEvent,
    body: string,
    attempt: number,
    signal: AbortSignal,
  ): Promise<AttemptResult> {
    let response: HttpResponse;
    try {
      response = await this.httpClient.execute({
        url: this.url,
        method: "POST",
        headers: {
          "content-type": "application/json",
          "x-actiontrail-event-id": event.eventId,
          "x-actiontrail-attempt": String(attempt),
        },
        body,
        signal,
        timeoutMs: this.requestTimeoutMs,
      });
    } catch (error) {
      return { kind: "failed", failure: classifyThrownError(error, signal), description: describeError(error) };
    }

    const classification = classifyResponseStatus(response.status);
    if (classification === "delivered") {
      return { kind: "delivered", status: response.status };
    }
    return {
      kind: "failed",
      failure: classification,
      status: response.status,
      description: `HTTP ${response.status}${response.body ? `: ${truncate(response.body)}` : ""}`,
    };
  }
}
