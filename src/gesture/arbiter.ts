/**
 * elastic-list - Gesture Arbiter
 * Decides which decoration (if any) a vertical movement belongs to
 *
 * Rules, in order:
 * - the header is only considered while the footer is idle, and the
 *   footer only while the header is idle
 * - a decoration takes the movement when it is already showing, or when
 *   the list sits at its edge and the finger moves away from that edge
 * - the decoration grows by a damped share of the finger travel
 *
 * A consumed movement must not also scroll the list; adapters cancel the
 * native event when `move()` returns true.
 */

import type { LoadSource, ScrollableHost, UpdateSource } from "../types";
import type { UpdateDecoration } from "../decoration/update";
import type { LoadDecoration } from "../decoration/load";
import type { SpringbackAnimator } from "../animation/springback";

// =============================================================================
// Types
// =============================================================================

export interface GestureArbiterConfig {
  header: UpdateDecoration;
  footer: LoadDecoration;
  host: ScrollableHost;
  headerAnimator: SpringbackAnimator;
  footerAnimator: SpringbackAnimator;

  /** Share of the finger travel applied to the height */
  damping: number;

  isHeaderEnabled: () => boolean;
  isFooterEnabled: () => boolean;

  /** Start the update action; false when nobody listens */
  fireUpdate: (source: UpdateSource) => boolean;

  /** Start the load action; false when nobody listens */
  fireLoad: (source: LoadSource) => boolean;
}

export interface GestureArbiter {
  /** Finger down at absolute `y` */
  down: (y: number) => void;

  /** Finger moved to `y`; true when a decoration consumed the movement */
  move: (y: number) => boolean;

  /** Finger lifted; true when a decoration handled the release */
  up: () => boolean;

  /** Gesture interrupted; visible decorations spring back without firing */
  cancel: () => boolean;

  /**
   * The list ran past its edge without a drag accounting for it
   * (momentum, wheel). Negative: past the top. Positive: past the bottom.
   */
  overscroll: (delta: number) => boolean;

  /** Between down and up/cancel */
  isTracking: () => boolean;
}

// =============================================================================
// Factory
// =============================================================================

export const createGestureArbiter = (
  config: GestureArbiterConfig,
): GestureArbiter => {
  const {
    header,
    footer,
    host,
    headerAnimator,
    footerAnimator,
    damping,
    isHeaderEnabled,
    isFooterEnabled,
    fireUpdate,
    fireLoad,
  } = config;

  let lastY: number | null = null;

  // ── Eligibility ────────────────────────────────────────────────

  const headerEligible = (): boolean =>
    isHeaderEnabled() && header.getContent() !== null && footer.isIdle();

  const footerEligible = (): boolean =>
    isFooterEnabled() && footer.getContent() !== null && header.isIdle();

  /** More items than fit on screen */
  const contentFillsViewport = (): boolean => {
    const total = host.getItemCount();
    if (total <= 0) return false;
    return host.getVisibleItemCount() < total;
  };

  const canRevealHeader = (delta: number): boolean =>
    delta > 0 && host.isAtTop();

  const canRevealFooter = (delta: number): boolean =>
    delta < 0 && contentFillsViewport() && host.isAtBottom();

  const damp = (delta: number): number => Math.trunc(delta * damping);

  const springHeader = (): void => {
    headerAnimator.start(header.getHeight(), header.bounceDelta());
  };

  const springFooter = (): void => {
    footerAnimator.start(footer.getHeight(), footer.bounceDelta());
  };

  // ── Touch ──────────────────────────────────────────────────────

  const down = (y: number): void => {
    lastY = y;
    headerAnimator.abort();
    footerAnimator.abort();
  };

  const move = (y: number): boolean => {
    // No session: the finger never went down on the list
    if (lastY === null) return false;

    const delta = y - lastY;

    if (headerEligible() && (header.isVisible() || canRevealHeader(delta))) {
      // The finger takes over from any springback in flight
      headerAnimator.abort();
      header.growBy(damp(delta));
      lastY = y;
      return true;
    }

    if (footerEligible() && (footer.isVisible() || canRevealFooter(delta))) {
      footerAnimator.abort();
      footer.growBy(-damp(delta));

      if (
        footer.getPolicy().firesOnMove &&
        footer.isVisible() &&
        !footer.isActive() &&
        footer.getHeight() >= footer.getMinHeight()
      ) {
        fireLoad("auto");
      }

      // Until the footer actually shows, keep accumulating from the
      // original position so small steps are not lost to damping
      if (footer.isVisible()) {
        host.revealFooter();
        lastY = y;
      }
      return true;
    }

    lastY = y;
    return false;
  };

  const release = (fire: boolean): boolean => {
    lastY = null;

    if (isHeaderEnabled() && header.isVisible()) {
      if (fire && header.canFire()) {
        fireUpdate("release");
      }
      // Fired or not, the header either settles at content height or hides
      springHeader();
      return true;
    }

    if (isFooterEnabled() && footer.isVisible()) {
      if (fire && footer.getPolicy().firesOnRelease && footer.canFire()) {
        fireLoad("release");
      }
      springFooter();
      return true;
    }

    return false;
  };

  // ── Overscroll ─────────────────────────────────────────────────

  const overscroll = (delta: number): boolean => {
    if (headerAnimator.isRunning() || footerAnimator.isRunning()) {
      return false;
    }

    if (delta < 0 && headerEligible() && !header.isVisible()) {
      header.growBy(-delta);
      if (header.canFire()) {
        fireUpdate("overscroll");
      }
      springHeader();
      return true;
    }

    if (
      delta > 0 &&
      footerEligible() &&
      !footer.isVisible() &&
      contentFillsViewport()
    ) {
      footer.growBy(delta);

      if (footer.isVisible()) {
        host.revealFooter();
        if (
          !footer.isActive() &&
          footer.getPolicy().firesOnOverscroll(footer.canFire())
        ) {
          fireLoad("overscroll");
        }
      }

      springFooter();
      return true;
    }

    return false;
  };

  return {
    down,
    move,
    up: () => release(true),
    cancel: () => release(false),
    overscroll,
    isTracking: () => lastY !== null,
  };
};
