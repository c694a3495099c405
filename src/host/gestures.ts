/**
 * elastic-list - Gesture Binding
 * Feeds DOM touch, wheel and click events into a controller
 *
 * - touchmove is non-passive so a move consumed by a decoration can
 *   cancel the native scroll
 * - a wheel turned past the top or bottom edge is reported as overscroll
 * - taps on the footer go to `clickFooter` (click-to-load)
 * - every layout change of the host is a `render()` pass, which measures
 *   content and runs a deferred `requestUpdate()`
 */

import type { ElasticListController } from "../controller";
import type { DomHost } from "./dom";

/** Remove every listener added by `bindGestures` */
export type Unbind = () => void;

export const bindGestures = (
  host: DomHost,
  controller: ElasticListController,
): Unbind => {
  const { viewport, footer } = host;

  // Only the first finger drives decorations
  let trackedId: number | null = null;

  const findTracked = (touches: TouchList): Touch | null => {
    for (let i = 0; i < touches.length; i++) {
      const touch = touches.item(i);
      if (touch !== null && touch.identifier === trackedId) return touch;
    }
    return null;
  };

  const touchStartHandler = (e: TouchEvent): void => {
    if (trackedId !== null) return;
    const touch = e.changedTouches.item(0);
    if (touch === null) return;

    trackedId = touch.identifier;
    controller.touchDown(touch.clientY);
  };

  const touchMoveHandler = (e: TouchEvent): void => {
    if (trackedId === null) return;
    const touch = findTracked(e.touches);
    if (touch === null) return;

    if (controller.touchMove(touch.clientY) && e.cancelable) {
      e.preventDefault();
    }
  };

  const touchEndHandler = (e: TouchEvent): void => {
    if (trackedId === null || findTracked(e.changedTouches) === null) return;
    trackedId = null;
    controller.touchUp();
  };

  const touchCancelHandler = (): void => {
    if (trackedId === null) return;
    trackedId = null;
    controller.touchCancel();
  };

  const wheelHandler = (e: WheelEvent): void => {
    const delta = e.deltaY;
    const pastEdge =
      (delta < 0 && host.isAtTop()) || (delta > 0 && host.isAtBottom());
    if (!pastEdge) return;

    if (controller.overscroll(Math.trunc(delta)) && e.cancelable) {
      e.preventDefault();
    }
  };

  const clickHandler = (): void => {
    controller.clickFooter();
  };

  viewport.addEventListener("touchstart", touchStartHandler, {
    passive: true,
  });
  viewport.addEventListener("touchmove", touchMoveHandler, { passive: false });
  viewport.addEventListener("touchend", touchEndHandler, { passive: true });
  viewport.addEventListener("touchcancel", touchCancelHandler, {
    passive: true,
  });
  viewport.addEventListener("wheel", wheelHandler, { passive: false });
  footer.addEventListener("click", clickHandler);

  const stopLayout = host.onLayout(() => controller.render());
  controller.render();

  return () => {
    viewport.removeEventListener("touchstart", touchStartHandler);
    viewport.removeEventListener("touchmove", touchMoveHandler);
    viewport.removeEventListener("touchend", touchEndHandler);
    viewport.removeEventListener("touchcancel", touchCancelHandler);
    viewport.removeEventListener("wheel", wheelHandler);
    footer.removeEventListener("click", clickHandler);
    stopLayout();
    trackedId = null;
  };
};
