/**
 * Scheduler: periodically invokes a target, and on demand via signal().
 *
 * Lifecycle: created → running → stopped, each transition at most once.
 * Both interval firings and signals go through one single-slot buffer, so at
 * most one trigger is ever queued; with a throttle window both share the
 * same budget of one invocation per window.
 */

import { getErrorMessage, SchedulerStateError } from "@recurrent/errors";
import { withSpan } from "@recurrent/telemetry";
import { resolveSchedulerConfig } from "./config.js";
import { INVOKE_SPAN_NAME, LOG_TAG } from "./constants.js";
import { SchedulerLoop } from "./loop.js";
import { createReadySource } from "./ready-source.js";
import { SignalBuffer } from "./signal-buffer.js";
import type {
  ResolvedSchedulerConfig,
  SchedulerOption,
  SchedulerState,
  SchedulerStatus,
  SchedulerTarget,
  TriggerOrigin,
} from "./types.js";

export class Scheduler {
  private readonly _target: SchedulerTarget;
  private readonly _config: ResolvedSchedulerConfig;
  private readonly _buffer = new SignalBuffer();
  private readonly _shutdown = new AbortController();
  private _state: SchedulerState = "created";
  private _invocations = 0;
  private _done: Promise<void> = Promise.resolve();

  constructor(target: SchedulerTarget, ...options: SchedulerOption[]) {
    this._target = target;
    this._config = resolveSchedulerConfig(options);
  }

  get state(): SchedulerState {
    return this._state;
  }

  /**
   * The background loop. Resolves once the loop has shut down after stop();
   * rejects with the target's error, unchanged, if an invocation throws. In
   * that case the scheduler never fires again.
   */
  get done(): Promise<void> {
    return this._done;
  }

  /**
   * Launch the loop and return immediately.
   *
   * @throws {SchedulerStateError} when already started or stopped
   */
  start(): void {
    if (this._state !== "created") {
      throw new SchedulerStateError("start", this._state);
    }
    this._state = "running";

    const { clock, intervalMs, throttleMs } = this._config;
    const loop = new SchedulerLoop({
      intervalMs,
      clock,
      buffer: this._buffer,
      readySource: createReadySource(this._buffer, clock, throttleMs),
      shutdown: this._shutdown.signal,
      invoke: (origin) => this._invoke(origin),
    });
    this._done = loop.run();
  }

  /**
   * Request shutdown without waiting for an in-flight invocation. Later
   * calls are ignored with a warning.
   */
  stop(): void {
    if (this._state === "stopped") {
      this._config.logger.warn(`[${LOG_TAG}] stop() called on a stopped scheduler; ignoring`);
      return;
    }

    const wasRunning = this._state === "running";
    this._state = "stopped";
    this._shutdown.abort();
    if (!wasRunning) {
      // no loop to close the buffer
      this._buffer.close();
    }
  }

  /**
   * Request an invocation. Never blocks; coalesced into the pending request
   * if there is one, dropped once the scheduler has stopped.
   */
  signal(): void {
    this._buffer.post("signal");
  }

  status(): SchedulerStatus {
    const { intervalMs, throttleMs } = this._config;
    return {
      state: this._state,
      invocations: this._invocations,
      pending: this._buffer.pending,
      intervalMs,
      ...(throttleMs !== undefined ? { throttleMs } : {}),
    };
  }

  private async _invoke(origin: TriggerOrigin): Promise<void> {
    const invocation = ++this._invocations;

    try {
      if (this._config.tracing) {
        await withSpan(
          INVOKE_SPAN_NAME,
          { "scheduler.invocation": invocation, "scheduler.trigger": origin },
          this._target,
        );
      } else {
        await this._target();
      }
    } catch (error) {
      this._config.logger.warn(
        `[${LOG_TAG}] Target failed on invocation ${invocation}, loop terminated: ${getErrorMessage(error)}`,
      );
      throw error;
    }
  }
}

/**
 * Factory function to create a Scheduler that will invoke `target`.
 */
export function createScheduler(target: SchedulerTarget, ...options: SchedulerOption[]): Scheduler {
  return new Scheduler(target, ...options);
}
