/**
 * SchedulerLoop: the control loop behind a running scheduler.
 *
 * Each turn races three events and handles whichever comes first:
 * - ready: the ready-source released the pending trigger; the target is
 *   invoked inline and awaited, so invocations never overlap
 * - interval: the interval elapsed; a trigger is posted to the same buffer
 *   external signals use, and the loop waits again
 * - shutdown: the abort signal fired; the loop exits
 *
 * The interval deadline is re-armed on every turn. Between two invocations
 * the loop yields to the macrotask queue, even when the target signalled
 * itself. On exit the ready-source is released and the buffer closed, whether
 * the loop ended cleanly or the target threw.
 */

import { setImmediate } from "node:timers/promises";
import type { ReadySource } from "./ready-source.js";
import type { SignalBuffer } from "./signal-buffer.js";
import type { Clock, TriggerOrigin } from "./types.js";

type LoopEvent = "ready" | "interval" | "shutdown";

export interface SchedulerLoopOptions {
  readonly intervalMs: number;
  readonly clock: Clock;
  readonly buffer: SignalBuffer;
  readonly readySource: ReadySource;
  readonly shutdown: AbortSignal;
  /** Runs one invocation; a rejection ends the loop. */
  readonly invoke: (origin: TriggerOrigin) => Promise<void>;
}

export class SchedulerLoop {
  constructor(private readonly _options: SchedulerLoopOptions) {}

  async run(): Promise<void> {
    const { buffer, readySource, shutdown, invoke } = this._options;

    try {
      for (;;) {
        const event = await this._nextEvent();
        // stop() may land between the event and this continuation
        if (event === "shutdown" || shutdown.aborted) return;

        if (event === "interval") {
          buffer.post("interval");
          continue;
        }

        const origin = buffer.take();
        if (origin !== undefined) {
          await invoke(origin);
          await setImmediate();
        }
      }
    } finally {
      readySource.release();
      buffer.close();
    }
  }

  private _nextEvent(): Promise<LoopEvent> {
    const { clock, intervalMs, readySource, shutdown } = this._options;
    if (shutdown.aborted) return Promise.resolve("shutdown");

    return new Promise<LoopEvent>((resolve) => {
      const disposers: (() => void)[] = [];
      let settled = false;

      const dispose = (): void => {
        for (const fn of disposers.splice(0)) fn();
      };
      const settle = (event: LoopEvent): void => {
        if (settled) return;
        settled = true;
        dispose();
        resolve(event);
      };

      const onAbort = (): void => settle("shutdown");
      shutdown.addEventListener("abort", onAbort, { once: true });
      disposers.push(() => shutdown.removeEventListener("abort", onAbort));

      const deadline = clock.setTimeout(() => settle("interval"), intervalMs);
      disposers.push(deadline.cancel);

      // may settle synchronously when a trigger is already released
      disposers.push(readySource.wait(() => settle("ready")));
      if (settled) dispose();
    });
  }
}
