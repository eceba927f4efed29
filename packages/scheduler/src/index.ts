/**
 * @recurrent/scheduler
 *
 * Single-task recurring scheduler.
 *
 * Provides:
 * - Periodic invocation of a target at a fixed interval
 * - Non-blocking signal() for out-of-band invocations, coalesced to one
 *   pending request
 * - Optional throttle window limiting invocations to one per window
 * - Injectable clock for deterministic tests
 */

// Clock
export { defaultClock } from "./clock.js";
// Config
export { resolveSchedulerConfig, SchedulerConfigSchema } from "./config.js";
// Constants
export {
  DEFAULT_INTERVAL_MS,
  INVOKE_SPAN_NAME,
  LOG_TAG,
  MAX_TIMER_DELAY_MS,
  PACKAGE_NAME,
} from "./constants.js";
// Loop internals
export { SchedulerLoop, type SchedulerLoopOptions } from "./loop.js";
// Options
export { withClock, withInterval, withLogger, withThrottle, withTracing } from "./options.js";
export {
  createReadySource,
  ImmediateReadySource,
  type ReadySource,
  ThrottledReadySource,
} from "./ready-source.js";
// Scheduler
export { createScheduler, Scheduler } from "./scheduler.js";
export { SignalBuffer } from "./signal-buffer.js";
// Types
export type {
  Clock,
  ResolvedSchedulerConfig,
  SchedulerConfig,
  SchedulerLogger,
  SchedulerOption,
  SchedulerState,
  SchedulerStatus,
  SchedulerTarget,
  TimerHandle,
  TriggerOrigin,
} from "./types.js";
