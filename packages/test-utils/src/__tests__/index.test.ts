import { setImmediate } from "node:timers/promises";
import { describe, expect, it, vi } from "vitest";
import { ManualClock, PACKAGE_NAME } from "../index.js";

describe("@recurrent/test-utils", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@recurrent/test-utils");
  });
});

describe("ManualClock", () => {
  it("should only move time on advance", () => {
    const clock = new ManualClock(1000);
    expect(clock.now()).toBe(1000);

    clock.advance(250);
    expect(clock.now()).toBe(1250);
  });

  it("should fire a timeout once when its delay elapses", () => {
    const clock = new ManualClock();
    const fn = vi.fn();
    clock.setTimeout(fn, 100);

    clock.advance(99);
    expect(fn).not.toHaveBeenCalled();

    clock.advance(1);
    expect(fn).toHaveBeenCalledTimes(1);

    clock.advance(1000);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(clock.pendingTimeouts).toBe(0);
  });

  it("should not fire a cancelled timeout", () => {
    const clock = new ManualClock();
    const fn = vi.fn();
    const handle = clock.setTimeout(fn, 10);

    handle.cancel();
    clock.advance(20);

    expect(fn).not.toHaveBeenCalled();
  });

  it("should fire an interval once per elapsed period", () => {
    const clock = new ManualClock();
    const fn = vi.fn();
    const handle = clock.setInterval(fn, 10);

    clock.advance(35);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.pendingIntervals).toBe(1);

    handle.cancel();
    clock.advance(100);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.pendingIntervals).toBe(0);
  });

  it("should fire due timers in time order, ties by registration", () => {
    const clock = new ManualClock();
    const order: string[] = [];
    clock.setTimeout(() => order.push("late"), 30);
    clock.setInterval(() => order.push("tick"), 20);
    clock.setTimeout(() => order.push("tie"), 20);

    clock.advance(40);

    expect(order).toEqual(["tick", "tie", "late", "tick"]);
  });

  it("should expose the time of the firing timer to its callback", () => {
    const clock = new ManualClock();
    let seen = -1;
    clock.setTimeout(() => {
      seen = clock.now();
    }, 15);

    clock.advance(50);

    expect(seen).toBe(15);
    expect(clock.now()).toBe(50);
  });

  it("should fire timers registered by a firing timer within the same advance", () => {
    const clock = new ManualClock();
    const fn = vi.fn();
    clock.setTimeout(() => clock.setTimeout(fn, 5), 5);

    clock.advance(10);

    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should keep timer functions bound when detached from the clock", () => {
    const clock = new ManualClock();
    const { setTimeout, setInterval } = clock;
    const once = vi.fn();
    const tick = vi.fn();

    setTimeout(once, 10);
    setInterval(tick, 10);
    clock.advance(20);

    expect(once).toHaveBeenCalledTimes(1);
    expect(tick).toHaveBeenCalledTimes(2);
    expect(clock.timeoutArgs).toEqual([10]);
    expect(clock.intervalArgs).toEqual([10]);
  });

  it("should record timer arguments", () => {
    const clock = new ManualClock();
    clock.setTimeout(() => {}, 1000);
    clock.setInterval(() => {}, 5);

    expect(clock.timeoutArgs).toEqual([1000]);
    expect(clock.intervalArgs).toEqual([5]);
  });

  it("should let promise continuations run on settle", async () => {
    const clock = new ManualClock();
    let resolved = false;
    const pending = new Promise<void>((resolve) => clock.setTimeout(resolve, 10));
    void pending.then(() => {
      resolved = true;
    });

    await clock.advanceAndSettle(10);

    expect(resolved).toBe(true);
  });

  it("should let code queued behind a setImmediate yield run on settle", async () => {
    const clock = new ManualClock();
    let ran = false;
    void (async () => {
      await setImmediate();
      ran = true;
    })();

    await clock.settle();

    expect(ran).toBe(true);
  });
});
