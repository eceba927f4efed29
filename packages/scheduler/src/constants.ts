/**
 * Constants for @recurrent/scheduler.
 */

export const PACKAGE_NAME = "@recurrent/scheduler";
export const LOG_TAG = "RecurrentScheduler";
export const DEFAULT_INTERVAL_MS = 1_000; // 1 second
/** Largest delay Node timers accept before clamping to 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const INVOKE_SPAN_NAME = "recurrent.scheduler.invoke";
