/**
 * Scheduler options. Each returns a modifier; later options win.
 */

import type { Clock, SchedulerLogger, SchedulerOption } from "./types.js";

/**
 * Sets the interval at which the target is invoked automatically
 * (default is one second).
 */
export function withInterval(intervalMs: number): SchedulerOption {
  return (config) => ({ ...config, intervalMs });
}

/**
 * Sets the minimum spacing between two invocations: triggers are released
 * at most once per `throttleMs` (no minimum by default).
 */
export function withThrottle(throttleMs: number): SchedulerOption {
  return (config) => ({ ...config, throttleMs });
}

export function withClock(clock: Clock): SchedulerOption {
  return (config) => ({ ...config, clock });
}

export function withLogger(logger: SchedulerLogger): SchedulerOption {
  return (config) => ({ ...config, logger });
}

/**
 * Wraps every invocation in an OpenTelemetry span. Defaults to the
 * OTEL_ENABLED environment switch.
 */
export function withTracing(tracing = true): SchedulerOption {
  return (config) => ({ ...config, tracing });
}
