/**
 * elastic-list - Gesture Arbiter Tests
 * Which decoration a movement belongs to, and what a release does
 */

import { describe, it, expect, vi } from "vitest";
import { createGestureArbiter } from "../../src/gesture";
import {
  createLoadDecoration,
  createUpdateDecoration,
} from "../../src/decoration";
import { createSpringbackAnimator } from "../../src/animation";
import type { LoadAction, LoadSource, UpdateSource } from "../../src/types";
import { createFakeHost, createManualScheduler, fixedContent } from "../helpers";

// =============================================================================
// Setup
// =============================================================================

const setup = (loadAction: LoadAction = "release") => {
  const scheduler = createManualScheduler();
  const host = createFakeHost();
  host.attached.add("header");
  host.attached.add("footer");

  const header = createUpdateDecoration();
  header.setContent(fixedContent(50));
  header.measure();

  const footer = createLoadDecoration({ loadAction });
  footer.setContent(fixedContent(40));
  footer.measure();

  const headerAnimator = createSpringbackAnimator({
    decoration: header,
    scheduler,
    duration: 1000,
  });
  const footerAnimator = createSpringbackAnimator({
    decoration: footer,
    scheduler,
    duration: 1000,
  });

  const enabled = { header: true, footer: true };

  const fireUpdate = vi.fn((_source: UpdateSource) => {
    header.setActive(true);
    return true;
  });
  const fireLoad = vi.fn((_source: LoadSource) => {
    footer.setActive(true);
    return true;
  });

  const arbiter = createGestureArbiter({
    header,
    footer,
    host,
    headerAnimator,
    footerAnimator,
    damping: 0.5,
    isHeaderEnabled: () => enabled.header,
    isFooterEnabled: () => enabled.footer,
    fireUpdate,
    fireLoad,
  });

  return {
    scheduler,
    host,
    header,
    footer,
    headerAnimator,
    footerAnimator,
    enabled,
    fireUpdate,
    fireLoad,
    arbiter,
  };
};

/** List scrolled to its end, so only the footer can be revealed */
const atBottom = (loadAction: LoadAction = "release") => {
  const ctx = setup(loadAction);
  ctx.host.atTop = false;
  ctx.host.atBottom = true;
  return ctx;
};

// =============================================================================
// Header
// =============================================================================

describe("header gestures", () => {
  it("should ignore movement without a touch-down", () => {
    const { arbiter, header } = setup();

    expect(arbiter.move(120)).toBe(false);
    expect(header.getHeight()).toBe(0);
    expect(arbiter.isTracking()).toBe(false);
  });

  it("should reveal the header by half the finger travel at the top", () => {
    const { arbiter, header } = setup();
    arbiter.down(100);

    expect(arbiter.isTracking()).toBe(true);
    expect(arbiter.move(180)).toBe(true);
    expect(header.getHeight()).toBe(40);
  });

  it("should leave movement to the list when not at the top", () => {
    const { arbiter, header, host } = setup();
    host.atTop = false;
    arbiter.down(0);

    expect(arbiter.move(100)).toBe(false);
    expect(header.getHeight()).toBe(0);
  });

  it("should keep consuming while the header shows, in both directions", () => {
    const { arbiter, header } = setup();
    arbiter.down(0);
    arbiter.move(100);

    expect(arbiter.move(40)).toBe(true);
    expect(header.getHeight()).toBe(20);
  });

  it("should ignore a disabled header or one without content", () => {
    const disabled = setup();
    disabled.enabled.header = false;
    disabled.arbiter.down(0);
    expect(disabled.arbiter.move(100)).toBe(false);

    const empty = setup();
    empty.header.replaceContent(null);
    empty.arbiter.down(0);
    expect(empty.arbiter.move(100)).toBe(false);
  });

  it("should fire the update when released past the content height", () => {
    const { arbiter, header, headerAnimator, fireUpdate } = setup();
    arbiter.down(0);
    arbiter.move(120);

    expect(arbiter.up()).toBe(true);
    expect(fireUpdate).toHaveBeenCalledWith("release");
    expect(header.isActive()).toBe(true);
    expect(headerAnimator.current()?.delta).toBe(-10);
    expect(arbiter.isTracking()).toBe(false);
  });

  it("should hide without firing when released under the content height", () => {
    const { arbiter, headerAnimator, fireUpdate } = setup();
    arbiter.down(100);
    arbiter.move(180);
    arbiter.up();

    expect(fireUpdate).not.toHaveBeenCalled();
    expect(headerAnimator.current()?.delta).toBe(-40);
  });

  it("should spring back without firing on cancel", () => {
    const { arbiter, headerAnimator, fireUpdate } = setup();
    arbiter.down(0);
    arbiter.move(120);

    expect(arbiter.cancel()).toBe(true);
    expect(fireUpdate).not.toHaveBeenCalled();
    expect(headerAnimator.current()?.delta).toBe(-60);
  });

  it("should report an unhandled release when nothing shows", () => {
    const { arbiter } = setup();
    arbiter.down(0);

    expect(arbiter.up()).toBe(false);
  });
});

// =============================================================================
// Animations
// =============================================================================

describe("gestures and animations", () => {
  it("should stop running springbacks on touch-down", () => {
    const { arbiter, headerAnimator, header, scheduler } = setup();
    arbiter.down(100);
    arbiter.move(180);
    arbiter.up();
    scheduler.tick(500);
    expect(header.getHeight()).toBe(20);

    arbiter.down(0);
    scheduler.tick(500);

    expect(headerAnimator.isRunning()).toBe(false);
    expect(header.getHeight()).toBe(20);
  });

  it("should let the finger take over a springback started mid-gesture", () => {
    const { arbiter, headerAnimator, header } = setup();
    arbiter.down(0);
    arbiter.move(120);
    headerAnimator.start(60, -60);

    arbiter.move(130);

    expect(headerAnimator.isRunning()).toBe(false);
    expect(header.getHeight()).toBe(65);
  });
});

// =============================================================================
// Footer
// =============================================================================

describe("footer gestures", () => {
  it("should reveal the footer when pulling up at the bottom", () => {
    const { arbiter, footer, host } = atBottom();
    arbiter.down(300);

    expect(arbiter.move(260)).toBe(true);
    expect(footer.getHeight()).toBe(20);
    expect(host.reveals).toBe(1);
  });

  it("should fire a release-to-load past the content height", () => {
    const { arbiter, footer, footerAnimator, fireLoad } = atBottom();
    arbiter.down(300);
    arbiter.move(260);
    arbiter.move(200);
    expect(footer.getHeight()).toBe(50);

    arbiter.up();

    expect(fireLoad).toHaveBeenCalledWith("release");
    expect(footerAnimator.current()?.delta).toBe(-10);
  });

  it("should require more items than fit on screen", () => {
    const full = atBottom();
    full.host.visibleCount = 20;
    full.arbiter.down(300);
    expect(full.arbiter.move(200)).toBe(false);

    const empty = atBottom();
    empty.host.itemCount = 0;
    empty.host.visibleCount = 0;
    empty.arbiter.down(300);
    expect(empty.arbiter.move(200)).toBe(false);
  });

  it("should accumulate small steps until the footer shows", () => {
    const { arbiter, footer, host } = atBottom();
    arbiter.down(300);

    expect(arbiter.move(299)).toBe(true);
    expect(footer.getHeight()).toBe(0);
    expect(host.reveals).toBe(0);

    arbiter.move(298);
    expect(footer.getHeight()).toBe(1);
  });

  it("should fire an auto load as soon as the footer shows", () => {
    const { arbiter, footer, fireLoad } = atBottom("auto");
    arbiter.down(300);
    arbiter.move(298);

    expect(footer.getHeight()).toBe(40);
    expect(fireLoad).toHaveBeenCalledTimes(1);
    expect(fireLoad).toHaveBeenCalledWith("auto");

    arbiter.move(250);
    expect(footer.getHeight()).toBe(64);
    expect(fireLoad).toHaveBeenCalledTimes(1);
  });

  it("should only reveal a click-to-load footer", () => {
    const { arbiter, footer, fireLoad } = atBottom("click");
    arbiter.down(300);
    arbiter.move(200);
    arbiter.up();

    expect(footer.getHeight()).toBe(50);
    expect(fireLoad).not.toHaveBeenCalled();
  });

  it("should not reveal the footer while the header is updating", () => {
    const { arbiter, header, footer } = atBottom();
    header.setActive(true);
    arbiter.down(300);

    expect(arbiter.move(200)).toBe(false);
    expect(footer.getHeight()).toBe(0);
  });

  it("should not reveal the header while the footer is loading", () => {
    const { arbiter, header, footer } = setup();
    footer.setActive(true);
    arbiter.down(0);

    expect(arbiter.move(100)).toBe(false);
    expect(header.getHeight()).toBe(0);
  });
});

// =============================================================================
// Overscroll
// =============================================================================

describe("overscroll", () => {
  it("should fire the update when the overscroll passes the content height", () => {
    const { arbiter, header, headerAnimator, fireUpdate } = setup();

    expect(arbiter.overscroll(-80)).toBe(true);
    expect(header.getHeight()).toBe(80);
    expect(fireUpdate).toHaveBeenCalledWith("overscroll");
    expect(headerAnimator.current()?.delta).toBe(-30);
  });

  it("should show and hide the header on a short overscroll", () => {
    const { arbiter, headerAnimator, fireUpdate } = setup();
    arbiter.overscroll(-30);

    expect(fireUpdate).not.toHaveBeenCalled();
    expect(headerAnimator.current()?.delta).toBe(-30);
  });

  it("should ignore overscroll while a springback runs", () => {
    const { arbiter, header } = setup();
    arbiter.overscroll(-30);

    expect(arbiter.overscroll(-80)).toBe(false);
    expect(header.getHeight()).toBe(30);
  });

  it("should fire a release-to-load past the content height", () => {
    const { arbiter, footer, footerAnimator, fireLoad, host } = atBottom();

    expect(arbiter.overscroll(60)).toBe(true);
    expect(footer.getHeight()).toBe(60);
    expect(host.reveals).toBe(1);
    expect(fireLoad).toHaveBeenCalledWith("overscroll");
    expect(footerAnimator.current()?.delta).toBe(-20);
  });

  it("should fire an auto load on any overscroll at the bottom", () => {
    const { arbiter, footer, footerAnimator, fireLoad } = atBottom("auto");
    arbiter.overscroll(10);

    expect(footer.getHeight()).toBe(40);
    expect(fireLoad).toHaveBeenCalledWith("overscroll");
    expect(footerAnimator.isRunning()).toBe(false);
  });

  it("should leave a click-to-load footer revealed for a tap", () => {
    const { arbiter, footerAnimator, fireLoad } = atBottom("click");
    arbiter.overscroll(60);

    expect(fireLoad).not.toHaveBeenCalled();
    expect(footerAnimator.current()?.delta).toBe(-20);
  });

  it("should ignore an overscroll away from the decoration", () => {
    const { arbiter } = setup();

    expect(arbiter.overscroll(0)).toBe(false);
  });
});
