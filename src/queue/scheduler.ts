/**
 * elastic-list - Scheduler
 * Frame and time source for the engine's UI context
 */

import type { Scheduler } from "../types";
import { FALLBACK_FRAME_INTERVAL } from "../constants";

/**
 * Create the default scheduler.
 *
 * Uses requestAnimationFrame when the environment has one (browsers,
 * jsdom with `pretendToBeVisual`), timers otherwise.
 */
export const createScheduler = (): Scheduler => {
  const hasRaf =
    typeof globalThis.requestAnimationFrame === "function" &&
    typeof globalThis.cancelAnimationFrame === "function";

  // Timer fallback keeps its own ids so the handle type stays opaque
  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextTimerId = 0;

  const now = (): number => performance.now();

  const requestFrame = (callback: () => void): number => {
    if (hasRaf) {
      return globalThis.requestAnimationFrame(() => callback());
    }

    const id = ++nextTimerId;
    timers.set(
      id,
      setTimeout(() => {
        timers.delete(id);
        callback();
      }, FALLBACK_FRAME_INTERVAL),
    );
    return id;
  };

  const cancelFrame = (id: number): void => {
    if (hasRaf) {
      globalThis.cancelAnimationFrame(id);
      return;
    }

    const handle = timers.get(id);
    if (handle !== undefined) {
      clearTimeout(handle);
      timers.delete(id);
    }
  };

  const defer = (callback: () => void): void => {
    setTimeout(callback, 0);
  };

  return { now, requestFrame, cancelFrame, defer };
};
