/**
 * Clock abstraction: injectable for deterministic testing.
 *
 * Production code uses globalThis timers via `defaultClock`
 * (@recurrent/scheduler). Tests inject a clock that controls time explicitly.
 */

/** Handle to a scheduled timer; cancelling twice is a no-op. */
export interface TimerHandle {
  readonly cancel: () => void;
}

export interface Clock {
  /** One-shot: run `fn` once after `ms` milliseconds. */
  readonly setTimeout: (fn: () => void, ms: number) => TimerHandle;
  /** Periodic: run `fn` every `ms` milliseconds until cancelled. */
  readonly setInterval: (fn: () => void, ms: number) => TimerHandle;
}
