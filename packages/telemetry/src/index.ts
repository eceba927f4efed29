/**
 * @recurrent/telemetry: OpenTelemetry tracing helpers.
 *
 * Public API:
 * - isTelemetryEnabled(): check OTEL_ENABLED env var
 * - withSpan(): span creation helper
 */

export { SpanStatusCode, trace } from "@opentelemetry/api";
export { isTelemetryEnabled } from "./setup.js";
export { TRACER_NAME, withSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue } from "./types.js";
