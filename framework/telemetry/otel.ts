/**
 * OpenTelemetry Integration
 *
 * Spans for pipeline operations through `@opentelemetry/api`. Without a
 * registered SDK every call here is a no-op, so the pipeline carries no
 * tracing cost unless the host application installs a tracer provider.
 *
 * @module
 */

import {
  trace,
  SpanKind,
  SpanStatusCode,
  type Attributes,
  type Span,
  type Tracer,
} from '@opentelemetry/api';

export const TRACER_NAME = 'strata';

/**
 * Tracer for framework spans
 */
export function getTracer(): Tracer {
  return trace.getTracer(TRACER_NAME);
}

/**
 * Run `fn` inside an active span. The span records a thrown error, gets
 * an error status, and is always ended.
 */
export function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return getTracer().startActiveSpan(name, { kind: SpanKind.INTERNAL, attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordSpanError(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Record an exception on a span and set error status
 */
export function recordSpanError(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  } else {
    span.recordException(String(error));
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
  }
}

export { SpanStatusCode, type Attributes, type Span };
