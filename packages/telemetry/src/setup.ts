/**
 * Telemetry switch.
 *
 * Span export is configured by the host application (any OTel SDK that
 * registers a global tracer provider). This package only decides whether
 * recurrent code should open spans at all.
 */

/**
 * Check if telemetry is enabled via the OTEL_ENABLED env var.
 *
 * Returns true only when OTEL_ENABLED is explicitly set to "true" or "1".
 */
export function isTelemetryEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.OTEL_ENABLED;
  return value === "true" || value === "1";
}
