/**
 * Single-slot coalescing mailbox.
 *
 * At most one trigger is pending at a time; posting while one is pending, or
 * after close(), is dropped. Posting never blocks.
 */

import type { TriggerOrigin } from "./types.js";

export class SignalBuffer {
  private _pending: TriggerOrigin | undefined;
  private _closed = false;
  private readonly _listeners = new Set<() => void>();

  get pending(): boolean {
    return this._pending !== undefined;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Offer a trigger. Returns false when it was coalesced into the pending
   * one or the buffer is closed.
   */
  post(origin: TriggerOrigin = "signal"): boolean {
    if (this._closed || this._pending !== undefined) return false;

    this._pending = origin;
    for (const listener of [...this._listeners]) {
      listener();
    }
    return true;
  }

  /** Consume the pending trigger, returning its origin. */
  take(): TriggerOrigin | undefined {
    const origin = this._pending;
    this._pending = undefined;
    return origin;
  }

  /** Listen for accepted posts. Returns an unsubscribe function. */
  onPost(listener: () => void): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  close(): void {
    this._closed = true;
    this._pending = undefined;
    this._listeners.clear();
  }
}
