import {
  SpanStatusCode,
  trace,
  type Attributes,
  type Span,
  type SpanOptions,
  type Tracer,
} from "@opentelemetry/api";

import type { TrailInstrumentationOptions } from "./metrics.js";

export type TrailTracer = Tracer;

export interface RunWithSpanOptions {
  readonly spanOptions?: SpanOptions;
  readonly attributes?: Attributes;
  readonly onError?: (error: unknown, span: Span) => void;
}

export const getTrailTracer = (options: TrailInstrumentationOptions = {}): Tracer =>
  trace.getTracer(options.name ?? "actiontrail", options.version);

export const runWithSpan = async <T>(
  tracer: Tracer,
  name: string,
  callback: (span: Span) => Promise<T> | T,
  options: RunWithSpanOptions = {},
): Promise<T> =>
  tracer.startActiveSpan(name, options.spanOptions ?? {}, async (span) => {
    span.setAttributes(options.attributes ?? {});

    try {
      const result = await callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      if (error instanceof Error) {
        span.recordException(error);
      }
      options.onError?.(error, span);
      throw error;
    } finally {
      span.end();
    }
  });

export { SpanStatusCode };
