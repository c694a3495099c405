/**
 * elastic-list - DOM Host
 * Binds the engine to a scrolling element whose children are list items
 *
 * Structure created around the existing items:
 * ```
 * viewport (overflow: auto)
 *   └── list (defaults to viewport)
 *         ├── .elastic-header   ← update header slot (first)
 *         ├── ...items
 *         └── .elastic-footer   ← load footer slot (last)
 * ```
 *
 * Layout changes are reported to `onLayout` listeners: content mounts
 * and alignments right away, slot resizes, list mutations and content
 * resizes once per frame. The footer is moved back to the end when
 * items are appended after it.
 */

import type {
  DecorationContent,
  DecorationSlot,
  Scheduler,
  ScrollableHost,
  Unsubscribe,
  VerticalAlignment,
} from "../types";
import {
  DEFAULT_CLASS_PREFIX,
  DEFAULT_FOOTER_ALIGNMENT,
  DEFAULT_HEADER_ALIGNMENT,
  DEFAULT_ITEM_SELECTOR,
  EDGE_THRESHOLD,
} from "../constants";
import { createScheduler } from "../queue";
import { isAtBottom, isAtTop, isRangeVisible } from "./geometry";

// =============================================================================
// Types
// =============================================================================

export interface DomHostConfig {
  /** Element holding the items and decorations (default: viewport) */
  list?: HTMLElement;

  /** Custom CSS class prefix (default: 'elastic') */
  classPrefix?: string;

  /** Selector matching list items (default: '[data-index]') */
  itemSelector?: string;

  /** Selector matching other list headers (default: '[data-list-header]') */
  headerSelector?: string;

  /**
   * Total item count. Virtual lists render a window of items only, so
   * pass the data length here; defaults to counting rendered items.
   */
  getItemCount?: () => number;

  /** Frame source for layout notifications (default: requestAnimationFrame) */
  scheduler?: Scheduler;
}

/** Content backed by a DOM element */
export interface ElementContent extends DecorationContent {
  readonly element: HTMLElement;
}

export interface DomHost extends ScrollableHost {
  readonly viewport: HTMLElement;
  readonly list: HTMLElement;
  readonly header: HTMLElement;
  readonly footer: HTMLElement;

  /** Decoration element for a slot */
  slotElement: (slot: DecorationSlot) => HTMLElement;

  /** Called after the layout of the list or a decoration changed */
  onLayout: (listener: () => void) => Unsubscribe;

  /** Stop observing the list and drop layout listeners */
  destroy: () => void;
}

// =============================================================================
// Content
// =============================================================================

/** Wrap an element as decoration content; its rendered height is the minimum */
export const createElementContent = (element: HTMLElement): ElementContent => ({
  element,
  measureHeight: () =>
    element.offsetHeight || element.getBoundingClientRect().height,
});

export const isElementContent = (
  content: DecorationContent,
): content is ElementContent =>
  "element" in content && content.element instanceof HTMLElement;

const JUSTIFY: Record<VerticalAlignment, string> = {
  top: "flex-start",
  center: "center",
  bottom: "flex-end",
};

// =============================================================================
// Factory
// =============================================================================

export const createDomHost = (
  viewport: HTMLElement,
  config: DomHostConfig = {},
): DomHost => {
  const {
    list = viewport,
    classPrefix = DEFAULT_CLASS_PREFIX,
    itemSelector = DEFAULT_ITEM_SELECTOR,
    headerSelector = "[data-list-header]",
    scheduler = createScheduler(),
  } = config;

  const createSlot = (
    slot: DecorationSlot,
    alignment: VerticalAlignment,
  ): HTMLElement => {
    const element = document.createElement("div");
    element.className = `${classPrefix}-${slot}`;
    element.setAttribute("aria-hidden", "true");
    element.style.height = "0px";
    element.style.overflow = "hidden";
    element.style.display = "flex";
    element.style.flexDirection = "column";
    element.style.justifyContent = JUSTIFY[alignment];
    return element;
  };

  const header = createSlot("header", DEFAULT_HEADER_ALIGNMENT);
  const footer = createSlot("footer", DEFAULT_FOOTER_ALIGNMENT);

  const slotElement = (slot: DecorationSlot): HTMLElement =>
    slot === "header" ? header : footer;

  const items = (): HTMLElement[] =>
    Array.from(list.querySelectorAll<HTMLElement>(itemSelector));

  const getItemCount = (): number =>
    config.getItemCount ? config.getItemCount() : items().length;

  const getVisibleItemCount = (): number => {
    const bounds = viewport.getBoundingClientRect();
    let count = 0;
    for (const item of items()) {
      const rect = item.getBoundingClientRect();
      if (isRangeVisible(rect.top, rect.bottom, bounds.top, bounds.bottom)) {
        count++;
      }
    }
    return count;
  };

  const isDecorationVisible = (slot: DecorationSlot): boolean => {
    const element = slotElement(slot);
    if (element.parentElement !== list) return false;

    const bounds = viewport.getBoundingClientRect();
    const rect = element.getBoundingClientRect();
    return isRangeVisible(rect.top, rect.bottom, bounds.top, bounds.bottom);
  };

  // ── Layout ────────────────────────────────────────────────────

  const layoutListeners = new Set<() => void>();
  let layoutFrame: number | null = null;

  const notifyLayout = (): void => {
    for (const listener of Array.from(layoutListeners)) listener();
  };

  const scheduleLayout = (): void => {
    if (layoutFrame !== null || layoutListeners.size === 0) return;
    layoutFrame = scheduler.requestFrame(() => {
      layoutFrame = null;
      notifyLayout();
    });
  };

  const onLayout = (listener: () => void): Unsubscribe => {
    layoutListeners.add(listener);
    return () => {
      layoutListeners.delete(listener);
    };
  };

  const keepFooterLast = (): void => {
    if (footer.parentElement === list && list.lastElementChild !== footer) {
      list.appendChild(footer);
    }
  };

  const mutationObserver = new MutationObserver(() => {
    keepFooterLast();
    scheduleLayout();
  });
  mutationObserver.observe(list, { childList: true });

  // Not every environment has ResizeObserver (jsdom)
  const resizeObserver =
    typeof ResizeObserver === "function"
      ? new ResizeObserver(() => scheduleLayout())
      : null;
  const observed: Record<DecorationSlot, HTMLElement | null> = {
    header: null,
    footer: null,
  };

  // ── Slots ─────────────────────────────────────────────────────

  const attachDecoration = (slot: DecorationSlot): void => {
    if (slot === "header") {
      list.insertBefore(header, list.firstChild);
    } else {
      list.appendChild(footer);
    }
  };

  const mountContent = (
    slot: DecorationSlot,
    content: DecorationContent | null,
  ): void => {
    const element = slotElement(slot);
    element.replaceChildren();

    const previous = observed[slot];
    if (previous !== null) resizeObserver?.unobserve(previous);
    observed[slot] = null;

    if (content !== null && isElementContent(content)) {
      element.appendChild(content.element);
      resizeObserver?.observe(content.element);
      observed[slot] = content.element;
    }
    notifyLayout();
  };

  const destroy = (): void => {
    mutationObserver.disconnect();
    resizeObserver?.disconnect();
    if (layoutFrame !== null) {
      scheduler.cancelFrame(layoutFrame);
      layoutFrame = null;
    }
    layoutListeners.clear();
  };

  return {
    viewport,
    list,
    header,
    footer,
    slotElement,
    onLayout,
    destroy,

    isAtTop: () => isAtTop(viewport.scrollTop, EDGE_THRESHOLD),
    isAtBottom: () =>
      isAtBottom(
        viewport.scrollTop,
        viewport.scrollHeight,
        viewport.clientHeight,
        EDGE_THRESHOLD,
      ),
    getItemCount,
    getVisibleItemCount,
    getHeaderCount: () =>
      list.querySelectorAll(headerSelector).length,
    attachDecoration,
    detachDecoration: (slot) => {
      slotElement(slot).remove();
    },
    isDecorationVisible,
    revealFooter: () => {
      keepFooterLast();
      viewport.scrollTop = viewport.scrollHeight;
    },
    resizeDecoration: (slot, height) => {
      slotElement(slot).style.height = `${height}px`;
      scheduleLayout();
    },
    mountContent,
    alignDecoration: (slot, alignment) => {
      slotElement(slot).style.justifyContent = JUSTIFY[alignment];
      notifyLayout();
    },
  };
};
