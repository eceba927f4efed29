/**
 * Default clock implementation.
 *
 * Thin wrapper over globalThis timers.
 * Tests inject a manual clock for deterministic behavior.
 */

import type { Clock } from "./types.js";

export const defaultClock: Clock = {
  setTimeout: (fn, ms) => {
    const id = globalThis.setTimeout(fn, ms);
    return { cancel: () => globalThis.clearTimeout(id) };
  },
  setInterval: (fn, ms) => {
    const id = globalThis.setInterval(fn, ms);
    return { cancel: () => globalThis.clearInterval(id) };
  },
};
