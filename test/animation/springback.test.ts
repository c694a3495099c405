/**
 * elastic-list - Springback Animator Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { createSpringbackAnimator } from "../../src/animation";
import {
  createDecorationState,
  type DecorationState,
} from "../../src/decoration";
import { createManualScheduler, type ManualScheduler } from "../helpers";

describe("createSpringbackAnimator", () => {
  let scheduler: ManualScheduler;
  let decoration: DecorationState;

  beforeEach(() => {
    scheduler = createManualScheduler();
    decoration = createDecorationState({ slot: "header", alignment: "bottom" });
    decoration.setHeight(100);
  });

  it("should interpolate linearly over the duration", () => {
    const animator = createSpringbackAnimator({
      decoration,
      scheduler,
      duration: 1000,
    });

    animator.start(100, -100);
    expect(animator.isRunning()).toBe(true);

    scheduler.tick(250);
    expect(decoration.getHeight()).toBe(75);

    scheduler.tick(250);
    expect(decoration.getHeight()).toBe(50);

    scheduler.tick(500);
    expect(decoration.getHeight()).toBe(0);
    expect(animator.isRunning()).toBe(false);
    expect(scheduler.pendingFrames()).toBe(0);
  });

  it("should settle exactly on a nonzero target", () => {
    const animator = createSpringbackAnimator({
      decoration,
      scheduler,
      duration: 300,
    });

    animator.start(100, -40);
    scheduler.settle(100);

    expect(decoration.getHeight()).toBe(60);
    expect(animator.isRunning()).toBe(false);
  });

  it("should use the default duration of one second", () => {
    const animator = createSpringbackAnimator({ decoration, scheduler });

    animator.start(100, -50);
    scheduler.tick(999);
    expect(animator.isRunning()).toBe(true);

    scheduler.tick(1);
    expect(animator.isRunning()).toBe(false);
  });

  it("should apply the easing curve", () => {
    const animator = createSpringbackAnimator({
      decoration,
      scheduler,
      duration: 1000,
      easing: (t) => t * t,
    });

    animator.start(100, -100);
    scheduler.tick(500);

    expect(decoration.getHeight()).toBe(75);
  });

  it("should stop early once the height reaches zero", () => {
    const animator = createSpringbackAnimator({
      decoration,
      scheduler,
      duration: 1000,
    });

    animator.start(100, -200);
    scheduler.tick(500);

    expect(decoration.getHeight()).toBe(0);
    expect(animator.isRunning()).toBe(false);
    expect(scheduler.pendingFrames()).toBe(0);
  });

  it("should hide the decoration when it scrolls out of view", () => {
    const animator = createSpringbackAnimator({
      decoration,
      scheduler,
      duration: 1000,
      isInView: () => false,
    });

    animator.start(100, -50);
    scheduler.tick(100);

    expect(decoration.getHeight()).toBe(0);
    expect(animator.isRunning()).toBe(false);
  });

  it("should leave the height where it is on abort", () => {
    const animator = createSpringbackAnimator({
      decoration,
      scheduler,
      duration: 1000,
    });

    animator.start(100, -100);
    scheduler.tick(500);
    animator.abort();
    scheduler.tick(500);

    expect(decoration.getHeight()).toBe(50);
    expect(animator.isRunning()).toBe(false);
    expect(animator.current()).toBeNull();
  });

  it("should replace a running animation on start", () => {
    const animator = createSpringbackAnimator({
      decoration,
      scheduler,
      duration: 1000,
    });

    animator.start(100, -100);
    scheduler.tick(500);
    animator.start(50, -10);

    expect(animator.current()).toEqual({
      fromHeight: 50,
      delta: -10,
      startTime: 500,
      duration: 1000,
    });
    expect(scheduler.pendingFrames()).toBe(1);
  });

  it("should skip zero-distance animations", () => {
    const animator = createSpringbackAnimator({ decoration, scheduler });

    animator.start(100, 0);

    expect(animator.isRunning()).toBe(false);
    expect(scheduler.pendingFrames()).toBe(0);
  });

  it("should hand frames to onFrame instead of stepping itself", () => {
    const onFrame = vi.fn();
    const animator = createSpringbackAnimator({
      decoration,
      scheduler,
      duration: 1000,
      onFrame,
    });

    animator.start(100, -100);
    scheduler.tick(500);

    expect(onFrame).toHaveBeenCalledTimes(1);
    expect(decoration.getHeight()).toBe(100);

    animator.step();
    expect(decoration.getHeight()).toBe(50);
  });
});
