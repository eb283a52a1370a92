import type { RetryPolicy } from "./retry.js";

export interface HttpRequest {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: string;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: Record<string, string>;
  readonly body?: string;
}

export interface HttpClient {
  execute(request: HttpRequest): Promise<HttpResponse>;
  close?(): Promise<void>;
}

export interface TlsOptions {
  /** Verify the server certificate chain. Defaults to true. */
  readonly rejectUnauthorized?: boolean;
  /** Extra PEM-encoded certificate authorities to trust. */
  readonly ca?: string | string[];
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type OverflowPolicy = "drop_newest" | "drop_oldest";

export type InvalidEventPolicy = "drop" | "throw";

export type CaptureDropReason = "invalid" | "buffer_full" | "closed";

export type CaptureOutcome =
  | { readonly status: "buffered"; readonly eventId: string; readonly evictedEventId?: string }
  | { readonly status: "dropped"; readonly reason: CaptureDropReason; readonly eventId?: string };

/**
 * transient: timeouts, resets, 5xx, 408, 429. Retried within the attempt budget.
 * rejected: any other non-2xx; the payload will never be accepted.
 * security: certificate or TLS validation failure.
 * aborted: the cycle was interrupted by a flush timeout or shutdown.
 */
export type DeliveryFailureKind = "transient" | "rejected" | "security" | "aborted";

export interface DeliveryCycleSummary {
  /** Events taken from the buffer by this cycle. */
  readonly drained: number;
  readonly delivered: number;
  readonly rejected: number;
  readonly failed: number;
  /** Events put back at the front of the buffer for a later cycle. */
  readonly deferred: number;
  /** Deferred events that no longer fit in the buffer. */
  readonly dropped: number;
  readonly attempts: number;
}

export interface FlushReport extends DeliveryCycleSummary {
  readonly timedOut: boolean;
  /** Events still buffered when the flush returned. */
  readonly pending: number;
}

export interface CloseReport extends FlushReport {
  /** Buffered events abandoned at shutdown. */
  readonly discarded: number;
}

export interface AuditClientStats {
  readonly buffered: number;
  readonly captured: number;
  readonly dropped: number;
  readonly delivered: number;
  readonly rejected: number;
  readonly failed: number;
}

export interface DeliverySettings {
  readonly endpoint: string;
  readonly batchSize: number;
  readonly flushIntervalMs: number;
  readonly requestTimeoutMs: number;
  readonly retryPolicy: RetryPolicy;
}
