/**
 * Configuration validation and resolution.
 */

import { SchedulerConfigurationError, type ValidationIssue } from "@recurrent/errors";
import { isTelemetryEnabled } from "@recurrent/telemetry";
import { z } from "zod";
import { defaultClock } from "./clock.js";
import { DEFAULT_INTERVAL_MS, MAX_TIMER_DELAY_MS } from "./constants.js";
import type { ResolvedSchedulerConfig, SchedulerConfig, SchedulerOption } from "./types.js";

const DurationMsSchema = z.number().finite().positive().max(MAX_TIMER_DELAY_MS);

export const SchedulerConfigSchema = z.object({
  /** Period between automatic invocations */
  intervalMs: DurationMsSchema,

  /** Throttle window; absent means every trigger is released immediately */
  throttleMs: DurationMsSchema.optional(),

  /** Open a span around each invocation */
  tracing: z.boolean(),
});

/**
 * Folds `options` over an empty config, validates the result, and applies
 * defaults.
 *
 * @throws {SchedulerConfigurationError} on invalid input
 */
export function resolveSchedulerConfig(
  options: readonly SchedulerOption[] = [],
): ResolvedSchedulerConfig {
  const config = options.reduce<SchedulerConfig>((acc, option) => option(acc), {});

  const parsed = SchedulerConfigSchema.safeParse({
    intervalMs: config.intervalMs ?? DEFAULT_INTERVAL_MS,
    throttleMs: config.throttleMs,
    tracing: config.tracing ?? isTelemetryEnabled(),
  });

  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new SchedulerConfigurationError(
      issues.map((issue) => `${issue.field}: ${issue.message}`).join("; "),
      issues,
    );
  }

  return {
    intervalMs: parsed.data.intervalMs,
    ...(parsed.data.throttleMs !== undefined ? { throttleMs: parsed.data.throttleMs } : {}),
    clock: config.clock ?? defaultClock,
    logger: config.logger ?? console,
    tracing: parsed.data.tracing,
  };
}
