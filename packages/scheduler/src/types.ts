/**
 * Type definitions for @recurrent/scheduler.
 */

import type { Clock } from "@recurrent/core";

export type { Clock, TimerHandle } from "@recurrent/core";

// ---------------------------------------------------------------------------
// Target and lifecycle
// ---------------------------------------------------------------------------

/** The callback the scheduler invokes. A returned promise is awaited. */
export type SchedulerTarget = () => void | Promise<void>;

export type SchedulerState = "created" | "running" | "stopped";

/** Where a pending trigger came from. */
export type TriggerOrigin = "signal" | "interval";

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export interface SchedulerLogger {
  warn(message: string): void;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface SchedulerConfig {
  readonly intervalMs?: number;
  readonly throttleMs?: number;
  readonly clock?: Clock;
  readonly logger?: SchedulerLogger;
  readonly tracing?: boolean;
}

export interface ResolvedSchedulerConfig {
  readonly intervalMs: number;
  readonly throttleMs?: number;
  readonly clock: Clock;
  readonly logger: SchedulerLogger;
  readonly tracing: boolean;
}

/** Composable modifier applied over the defaults, in order. */
export type SchedulerOption = (config: SchedulerConfig) => SchedulerConfig;

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export interface SchedulerStatus {
  readonly state: SchedulerState;
  readonly invocations: number;
  readonly pending: boolean;
  readonly intervalMs: number;
  readonly throttleMs?: number;
}
