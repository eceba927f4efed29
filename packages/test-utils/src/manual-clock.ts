/**
 * Deterministic clock for scheduler tests.
 *
 * Time only moves through `advance(ms)`, which fires due timers in order.
 * `settle()` yields to the real event loop so async continuations triggered
 * by fired timers get to run.
 */

import { setTimeout as delay, setImmediate } from "node:timers/promises";
import type { Clock, TimerHandle } from "@recurrent/core";

interface PendingTimer {
  readonly id: number;
  readonly fn: () => void;
  readonly periodMs: number | undefined;
  at: number;
  cancelled: boolean;
}

export class ManualClock implements Clock {
  private _now: number;
  private _nextTimerId = 1;
  private _timers: PendingTimer[] = [];
  private readonly _timeoutArgs: number[] = [];
  private readonly _intervalArgs: number[] = [];

  constructor(startAt = 0) {
    this._now = startAt;
  }

  /** Current manual time. */
  now(): number {
    return this._now;
  }

  readonly setTimeout = (fn: () => void, ms: number): TimerHandle => {
    this._timeoutArgs.push(ms);
    return this._schedule(fn, ms, undefined);
  };

  readonly setInterval = (fn: () => void, ms: number): TimerHandle => {
    this._intervalArgs.push(ms);
    return this._schedule(fn, ms, Math.max(1, ms));
  };

  /** Delays passed to `setTimeout`, in call order. */
  get timeoutArgs(): readonly number[] {
    return this._timeoutArgs;
  }

  /** Periods passed to `setInterval`, in call order. */
  get intervalArgs(): readonly number[] {
    return this._intervalArgs;
  }

  /** Number of live one-shot timers. */
  get pendingTimeouts(): number {
    return this._timers.filter((t) => !t.cancelled && t.periodMs === undefined).length;
  }

  /** Number of live periodic timers. */
  get pendingIntervals(): number {
    return this._timers.filter((t) => !t.cancelled && t.periodMs !== undefined).length;
  }

  /**
   * Advance time by `ms`, firing every timer that falls due on the way,
   * earliest first (ties in registration order). A periodic timer fires once
   * per elapsed period.
   */
  advance(ms: number): void {
    const target = this._now + ms;

    for (;;) {
      const next = this._nextDue(target);
      if (!next) break;

      this._now = next.at;
      if (next.periodMs === undefined) {
        next.cancelled = true;
      } else {
        next.at += next.periodMs;
      }
      next.fn();
    }

    this._now = target;
    this._timers = this._timers.filter((t) => !t.cancelled);
  }

  /**
   * Let pending promise continuations run, including code queued behind one
   * `setImmediate` yield.
   */
  async settle(): Promise<void> {
    await delay(0);
    await setImmediate();
  }

  /** Advance time and wait for async continuations to settle. */
  async advanceAndSettle(ms: number): Promise<void> {
    this.advance(ms);
    await this.settle();
  }

  private _schedule(fn: () => void, ms: number, periodMs: number | undefined): TimerHandle {
    const timer: PendingTimer = {
      id: this._nextTimerId++,
      fn,
      periodMs,
      at: this._now + Math.max(0, ms),
      cancelled: false,
    };
    this._timers.push(timer);
    return {
      cancel: () => {
        timer.cancelled = true;
      },
    };
  }

  private _nextDue(target: number): PendingTimer | undefined {
    let next: PendingTimer | undefined;
    for (const timer of this._timers) {
      if (timer.cancelled || timer.at > target) continue;
      if (!next || timer.at < next.at || (timer.at === next.at && timer.id < next.id)) {
        next = timer;
      }
    }
    return next;
  }
}
