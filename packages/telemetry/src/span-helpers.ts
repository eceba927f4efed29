/**
 * Span helper: one place for span creation with error handling.
 *
 * Wraps OpenTelemetry's tracer.startActiveSpan with:
 * - Attribute setting
 * - Error recording + status propagation
 * - Span ending (even on error)
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

export const TRACER_NAME = "recurrent";

/**
 * Execute a function within a named OTel span.
 *
 * The function may be synchronous or return a promise; either way the span
 * ends once it has settled. Errors are recorded on the span and re-thrown
 * unchanged.
 *
 * When no tracer provider is registered the function still executes, with
 * a no-op span.
 *
 * @param name - Span name (e.g., "recurrent.scheduler.invoke")
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => T | Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      span.setAttributes(attributes);
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
