/**
 * Ready-Source: decides when a pending trigger may reach the loop.
 *
 * - immediate: a trigger is released as soon as it is posted
 * - throttled: a gate timer ticks every `windowMs`; each tick releases the
 *   pending trigger, if there is one. Ticks with nothing pending are lost.
 *
 * The variant is chosen once, when the loop starts.
 */

import type { SignalBuffer } from "./signal-buffer.js";
import type { Clock, TimerHandle } from "./types.js";

export interface ReadySource {
  readonly kind: "immediate" | "throttled";
  /**
   * Call `listener` once the pending trigger is released. May call it
   * synchronously. Returns a function that withdraws the listener.
   */
  wait(listener: () => void): () => void;
  /** Stop owned timers. */
  release(): void;
}

const noop = (): void => {};

export class ImmediateReadySource implements ReadySource {
  readonly kind = "immediate" as const;

  constructor(private readonly _buffer: SignalBuffer) {}

  wait(listener: () => void): () => void {
    if (this._buffer.pending) {
      listener();
      return noop;
    }
    return this._buffer.onPost(listener);
  }

  release(): void {}
}

export class ThrottledReadySource implements ReadySource {
  readonly kind = "throttled" as const;

  private readonly _ticker: TimerHandle;
  private _waiter: (() => void) | undefined;
  // A tick found a pending trigger while the loop was busy
  private _released = false;

  constructor(
    readonly windowMs: number,
    private readonly _buffer: SignalBuffer,
    clock: Clock,
  ) {
    this._ticker = clock.setInterval(() => this._onTick(), windowMs);
  }

  wait(listener: () => void): () => void {
    if (this._released) {
      this._released = false;
      if (this._buffer.pending) {
        listener();
        return noop;
      }
    }

    this._waiter = listener;
    return () => {
      if (this._waiter === listener) this._waiter = undefined;
    };
  }

  release(): void {
    this._ticker.cancel();
    this._waiter = undefined;
    this._released = false;
  }

  private _onTick(): void {
    if (!this._buffer.pending) return;

    const waiter = this._waiter;
    if (waiter) {
      this._waiter = undefined;
      waiter();
    } else {
      this._released = true;
    }
  }
}

/**
 * Pick the ready-source variant: throttled when a window is given.
 */
export function createReadySource(
  buffer: SignalBuffer,
  clock: Clock,
  throttleMs?: number,
): ReadySource {
  return throttleMs === undefined
    ? new ImmediateReadySource(buffer)
    : new ThrottledReadySource(throttleMs, buffer, clock);
}
