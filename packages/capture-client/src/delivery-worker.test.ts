import { afterEach, describe, expect, it, vi } from "vitest";

import type { AuditEvent } from "@actiontrail/contracts";
import { createRecordingLogger } from "@actiontrail/telemetry";

import { DeliveryWorker, type DeliveryWorkerOptions } from "./delivery-worker.js";
import { BoundedEventBuffer } from "./event-buffer.js";
import {
  ScriptedHttpClient,
  buildTestEvent,
  createRecordingSleep,
  hangUntilAborted,
  testEventId,
  type ScriptStep,
} from "./testing/scripted-http-client.js";

const certificateError = (): Error =>
  new TypeError("fetch failed", {
    cause: Object.assign(new Error("self-signed certificate"), { code: "DEPTH_ZERO_SELF_SIGNED_CERT" }),
  });

const setup = (
  script: ScriptStep[] = [],
  options: { capacity?: number; events?: number } & Partial<DeliveryWorkerOptions> = {},
) => {
  const { capacity = 10, events = 0, ...workerOptions } = options;
  const buffer = new BoundedEventBuffer<AuditEvent>(capacity);
  for (let sequence = 1; sequence <= events; sequence += 1) {
    buffer.offer(buildTestEvent(sequence));
  }
  const http = new ScriptedHttpClient(script);
  const { sleep, delays } = createRecordingSleep();
  const { logger, entries } = createRecordingLogger({ name: "capture-client" });
  const worker = new DeliveryWorker(buffer, {
    endpoint: "http://ingest.test/",
    httpClient: http,
    sleep,
    logger,
    ...workerOptions,
  });
  const messages = () => entries.map((entry) => entry.message);
  return { buffer, http, delays, entries, messages, worker };
};

const bufferedIds = (buffer: BoundedEventBuffer<AuditEvent>): string[] =>
  buffer.drain().map((event) => event.eventId);

describe("DeliveryWorker", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("posts each drained event in FIFO order", async () => {
    const { http, worker } = setup([], { events: 3 });

    const summary = await worker.runCycle();

    expect(summary).toEqual({
      drained: 3,
      delivered: 3,
      rejected: 0,
      failed: 0,
      deferred: 0,
      dropped: 0,
      attempts: 3,
    });
    expect(http.sentEventIds()).toEqual([testEventId(1), testEventId(2), testEventId(3)]);
    expect(http.requests[0]?.url).toBe("http://ingest.test/v1/events");
    expect(http.requests[0]?.method).toBe("POST");
    expect(http.requests[0]?.headers?.["content-type"]).toBe("application/json");
    expect(http.requests[0]?.timeoutMs).toBe(5000);
  });

  it("sends the snake_case wire payload", async () => {
    const { http, worker } = setup([], { events: 1 });

    await worker.runCycle();

    expect(JSON.parse(http.requests[0]?.body ?? "{}")).toEqual({
      event_id: testEventId(1),
      timestamp: "2024-01-01T12:00:01.000Z",
      agent_instance_id: "agent-1",
      trace_id: "trace-1",
      actor: "agent",
      action_type: "tool_call",
      resource: "tool://search/1",
      status: "success",
      latency_ms: 12,
      metadata: {},
    });
  });

  it("retries transient failures with the backoff schedule and the same event id", async () => {
    const { delays, http, messages, worker } = setup([503, 503, 201], { events: 1 });

    const summary = await worker.runCycle();

    expect(summary.delivered).toBe(1);
    expect(summary.attempts).toBe(3);
    expect(delays).toEqual([1000, 2000]);
    expect(http.sentEventIds()).toEqual([testEventId(1), testEventId(1), testEventId(1)]);
    expect(http.requests.map((request) => request.headers?.["x-actiontrail-attempt"])).toEqual(["1", "2", "3"]);
    expect(messages().filter((message) => message === "capture.delivery.retry_scheduled")).toHaveLength(2);
  });

  it("retries thrown connection errors", async () => {
    const { delays, worker } = setup([new TypeError("fetch failed"), 201], { events: 1 });

    const summary = await worker.runCycle();

    expect(summary.delivered).toBe(1);
    expect(delays).toEqual([1000]);
  });

  it("drops a rejected event without retrying and moves on", async () => {
    const { delays, http, messages, worker } = setup([422, 201], { events: 2 });

    const summary = await worker.runCycle();

    expect(summary).toMatchObject({ drained: 2, delivered: 1, rejected: 1, attempts: 2 });
    expect(delays).toEqual([]);
    expect(http.sentEventIds()).toEqual([testEventId(1), testEventId(2)]);
    expect(messages()).toContain("capture.delivery.rejected");
  });

  it("defers the rest of the batch once retries are exhausted", async () => {
    const { buffer, delays, messages, worker } = setup([503, 503, 503], { events: 3 });

    const summary = await worker.runCycle();

    expect(summary).toMatchObject({ drained: 3, delivered: 0, failed: 1, deferred: 2, attempts: 3 });
    expect(delays).toEqual([1000, 2000]);
    expect(messages()).toContain("capture.delivery.failed");
    expect(messages()).toContain("capture.delivery.deferred");
    expect(bufferedIds(buffer)).toEqual([testEventId(2), testEventId(3)]);
  });

  it("does not retry certificate failures and logs them as security failures", async () => {
    const { buffer, delays, entries, worker } = setup([certificateError()], { events: 2 });

    const summary = await worker.runCycle();

    expect(summary).toMatchObject({ failed: 1, deferred: 1, attempts: 1 });
    expect(delays).toEqual([]);
    const security = entries.find((entry) => entry.message === "capture.delivery.security_failure");
    expect(security?.level).toBe("error");
    expect(security?.error).toBe("TypeError: fetch failed (DEPTH_ZERO_SELF_SIGNED_CERT)");
    expect(bufferedIds(buffer)).toEqual([testEventId(2)]);
  });

  it("drains one batch per cycle unless asked to drain everything", async () => {
    const { buffer, worker } = setup([], { events: 5, batchSize: 2 });

    expect((await worker.runCycle()).drained).toBe(2);
    expect(buffer.size).toBe(3);
    expect((await worker.runCycle({ drainAll: true })).drained).toBe(3);
    expect(buffer.size).toBe(0);
  });

  it("counts deferred events that no longer fit as dropped", async () => {
    const buffer = new BoundedEventBuffer<AuditEvent>(2);
    buffer.offer(buildTestEvent(1));
    buffer.offer(buildTestEvent(2));
    const http = new ScriptedHttpClient([
      async () => {
        buffer.offer(buildTestEvent(3));
        buffer.offer(buildTestEvent(4));
        return { status: 503, headers: {} };
      },
    ]);
    const worker = new DeliveryWorker(buffer, {
      endpoint: "http://ingest.test",
      httpClient: http,
      retryPolicy: { maxAttempts: 1 },
      logger: createRecordingLogger().logger,
    });

    const summary = await worker.runCycle();

    expect(summary).toMatchObject({ drained: 2, failed: 1, deferred: 0, dropped: 1 });
    expect(bufferedIds(buffer)).toEqual([testEventId(3), testEventId(4)]);
  });

  it("puts the in-flight event back when interrupted", async () => {
    const { buffer, http, worker } = setup([hangUntilAborted], { events: 2 });

    const pending = worker.runCycle();
    await vi.waitFor(() => expect(http.requests).toHaveLength(1));
    worker.interrupt();
    const summary = await pending;

    expect(summary).toMatchObject({ drained: 2, delivered: 0, failed: 0, deferred: 2, attempts: 1 });
    expect(bufferedIds(buffer)).toEqual([testEventId(1), testEventId(2)]);
  });

  it("runs cycles one at a time", async () => {
    const { http, worker } = setup([], { events: 2, batchSize: 1 });

    const [first, second] = await Promise.all([worker.runCycle(), worker.runCycle()]);

    expect(first.delivered).toBe(1);
    expect(second.delivered).toBe(1);
    expect(http.sentEventIds()).toEqual([testEventId(1), testEventId(2)]);
  });

  it("reports each completed cycle", async () => {
    const onCycleComplete = vi.fn();
    const { worker } = setup([], { events: 1, onCycleComplete });

    await worker.runCycle();

    expect(onCycleComplete).toHaveBeenCalledWith(expect.objectContaining({ drained: 1, delivered: 1 }));
  });

  it("delivers on the flush interval once started", async () => {
    vi.useFakeTimers();
    const { http, worker } = setup([], { events: 1, flushIntervalMs: 1000 });

    worker.start();
    await vi.advanceTimersByTimeAsync(999);
    expect(http.requests).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    await worker.dispose();

    expect(http.requests).toHaveLength(1);
    expect(worker.running).toBe(false);
  });

  it("ignores cycle requests until started", async () => {
    const { http, worker } = setup([], { events: 1 });

    worker.requestCycle();
    await worker.dispose();

    expect(http.requests).toHaveLength(0);
  });

  it("leaves a supplied transport open on dispose", async () => {
    const { http, worker } = setup();

    await worker.dispose();

    expect(http.closed).toBe(false);
  });
});
