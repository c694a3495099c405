/**
 * elastic-list - Springback Animator
 * Time-interpolated height animation that snaps a decoration back to
 * zero or to its content height
 *
 * The animator never loops on its own: every step asks the scheduler for
 * a frame, and the frame is routed through the engine mailbox (via
 * `onFrame`) so animation ticks interleave with gestures and completion
 * notifications in arrival order.
 */

import type { Easing, Scheduler } from "../types";
import type { DecorationState } from "../decoration/state";
import { DEFAULT_SPRINGBACK_DURATION } from "../constants";

// =============================================================================
// Types
// =============================================================================

/** One running animation */
export interface ScrollAnimation {
  readonly fromHeight: number;
  readonly delta: number;
  readonly startTime: number;
  readonly duration: number;
}

export interface SpringbackConfig {
  decoration: DecorationState;
  scheduler: Scheduler;

  /** Default duration in ms */
  duration?: number;

  easing?: Easing;

  /** Decoration still occupies its slot in the visible part of the list */
  isInView?: () => boolean;

  /**
   * Deliver a frame to the engine. Must eventually call `step()`.
   * Defaults to calling `step()` directly.
   */
  onFrame?: () => void;
}

export interface SpringbackAnimator {
  /** Animate from `fromHeight` to `fromHeight + delta`. Replaces any running animation. */
  start: (fromHeight: number, delta: number, duration?: number) => void;

  /** Advance to the current time; schedules the next frame if unfinished */
  step: () => void;

  /** Stop where it is (height untouched) */
  abort: () => void;

  isRunning: () => boolean;

  /** The running animation, if any */
  current: () => ScrollAnimation | null;
}

export const linear: Easing = (t) => t;

// =============================================================================
// Factory
// =============================================================================

export const createSpringbackAnimator = (
  config: SpringbackConfig,
): SpringbackAnimator => {
  const {
    decoration,
    scheduler,
    duration: defaultDuration = DEFAULT_SPRINGBACK_DURATION,
    easing = linear,
    isInView = () => true,
  } = config;

  let animation: ScrollAnimation | null = null;
  let frameId: number | null = null;

  const scheduleStep = (): void => {
    if (frameId !== null) return;
    frameId = scheduler.requestFrame(() => {
      frameId = null;
      if (config.onFrame) {
        config.onFrame();
      } else {
        step();
      }
    });
  };

  const cancelFrame = (): void => {
    if (frameId !== null) {
      scheduler.cancelFrame(frameId);
      frameId = null;
    }
  };

  const abort = (): void => {
    cancelFrame();
    animation = null;
  };

  const start = (
    fromHeight: number,
    delta: number,
    duration = defaultDuration,
  ): void => {
    abort();
    if (delta === 0) return;

    animation = {
      fromHeight,
      delta,
      startTime: scheduler.now(),
      duration,
    };
    scheduleStep();
  };

  const step = (): void => {
    const running = animation;
    if (running === null) return;

    const elapsed = scheduler.now() - running.startTime;
    const progress =
      running.duration > 0 ? Math.min(1, elapsed / running.duration) : 1;
    const height = Math.round(
      running.fromHeight + running.delta * easing(progress),
    );
    decoration.setHeight(height);

    if (progress >= 1) {
      animation = null;
      return;
    }

    if (height <= 0) {
      abort();
      return;
    }

    // Scrolled out of view mid-animation: hide now rather than let it
    // reappear when the slot comes back
    if (!isInView()) {
      decoration.setHeight(0);
      abort();
      return;
    }

    scheduleStep();
  };

  return {
    start,
    step,
    abort,
    isRunning: () => animation !== null,
    current: () => animation,
  };
};
