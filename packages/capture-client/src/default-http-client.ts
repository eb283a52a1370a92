import { Agent, fetch, type Dispatcher } from "undici";

import type { HttpClient, HttpRequest, HttpResponse, TlsOptions } from "./types.js";

const DEFAULT_TIMEOUT_MS = 5000;

export class RequestTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export interface FetchHttpClientOptions {
  readonly tls?: TlsOptions;
  /** Replaces the pooled agent built from `tls`. The client does not close a supplied dispatcher. */
  readonly dispatcher?: Dispatcher;
  readonly defaultTimeoutMs?: number;
}

const readResponseHeaders = (headers: { forEach(callback: (value: string, key: string) => void): void }) => {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
};

/**
 * undici-backed transport. Owns one connection pool for its lifetime; TLS verification is
 * configured on that pool rather than per request.
 */
export class FetchHttpClient implements HttpClient {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly defaultTimeoutMs: number;

  constructor(options: FetchHttpClientOptions = {}) {
    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connect: {
          rejectUnauthorized: options.tls?.rejectUnauthorized ?? true,
          ...(options.tls?.ca === undefined ? {} : { ca: options.tls.ca }),
        },
      });
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async execute(request: HttpRequest): Promise<HttpResponse> {
    const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs);
    const forwardAbort = () => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      forwardAbort();
    } else {
      request.signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    try {
      const response = await fetch(request.url, {
        method: request.method ?? "POST",
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      const body = await response.text();
      return {
        status: response.status,
        headers: readResponseHeaders(response.headers),
        body,
      } satisfies HttpResponse;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
