/**
 * elastic-list - Controller
 * Owns both decorations, the gesture arbiter and the animators, and
 * exposes the public API
 *
 * Every state change runs as a message through one mailbox. Input from
 * the UI (touches, overscroll, taps, render passes) is sent and handled
 * synchronously; completion notifications are posted and handled on a
 * later turn, so they may be called from anywhere.
 */

import type {
  DecorationContent,
  DecorationSlot,
  ElasticConfig,
  ElasticEvents,
  EventHandler,
  LoadAction,
  LoadPhase,
  LoadSource,
  OnLoadListener,
  OnLoadStateListener,
  OnUpdateListener,
  OnUpdateStateListener,
  ScrollableHost,
  Unsubscribe,
  UpdatePhase,
  UpdateSource,
  VerticalAlignment,
} from "./types";
import {
  DEFAULT_DAMPING,
  DEFAULT_LOAD_ACTION,
  DEFAULT_LOAD_FOOTER_ENABLED,
  DEFAULT_SPRINGBACK_DURATION,
  DEFAULT_UPDATE_HEADER_ENABLED,
  LOG_PREFIX,
} from "./constants";
import { ConfigurationError } from "./errors";
import { createElasticEmitter } from "./events";
import { createMailbox, createScheduler } from "./queue";
import { createUpdateDecoration } from "./decoration/update";
import { createLoadDecoration } from "./decoration/load";
import { createSpringbackAnimator, linear } from "./animation/springback";
import { createGestureArbiter } from "./gesture/arbiter";

const DEBUG = false;
const log = (...args: unknown[]): void => {
  if (DEBUG) console.log(LOG_PREFIX, ...args);
};

// =============================================================================
// Messages
// =============================================================================

/** Every input the engine handles, in arrival order */
export type EngineMessage =
  | { type: "touch-down"; y: number }
  | { type: "touch-move"; y: number }
  | { type: "touch-up" }
  | { type: "touch-cancel" }
  | { type: "overscroll"; delta: number }
  | { type: "click-footer" }
  | { type: "render" }
  | { type: "request-update" }
  | { type: "tick"; slot: DecorationSlot }
  | { type: "updated" }
  | { type: "loaded" };

// =============================================================================
// Public Types
// =============================================================================

/** Read/configure handle for the update header */
export interface UpdateHeaderHandle {
  setContentView: (content: DecorationContent) => UpdateHeaderHandle;
  replaceContentView: (content: DecorationContent | null) => UpdateHeaderHandle;
  getContentView: () => DecorationContent | null;
  setAlignment: (alignment: VerticalAlignment) => UpdateHeaderHandle;
  getAlignment: () => VerticalAlignment;
  setOnUpdateStateListener: (
    listener: OnUpdateStateListener | null,
  ) => UpdateHeaderHandle;
  isUpdating: () => boolean;
  getHeight: () => number;
  getMinHeight: () => number;
  getPhase: () => UpdatePhase;
}

/** Read/configure handle for the load footer */
export interface LoadFooterHandle {
  setContentView: (content: DecorationContent) => LoadFooterHandle;
  replaceContentView: (content: DecorationContent | null) => LoadFooterHandle;
  getContentView: () => DecorationContent | null;
  setAlignment: (alignment: VerticalAlignment) => LoadFooterHandle;
  getAlignment: () => VerticalAlignment;
  setLoadAction: (action: LoadAction) => LoadFooterHandle;
  getLoadAction: () => LoadAction;
  isClickable: () => boolean;
  setOnLoadStateListener: (
    listener: OnLoadStateListener | null,
  ) => LoadFooterHandle;
  isLoading: () => boolean;
  getHeight: () => number;
  getMinHeight: () => number;
  getPhase: () => LoadPhase;
}

export interface ElasticListController {
  getUpdateHeader: () => UpdateHeaderHandle;
  getLoadFooter: () => LoadFooterHandle;

  setOnUpdateListener: (
    listener: OnUpdateListener | null,
  ) => ElasticListController;
  setOnLoadListener: (listener: OnLoadListener | null) => ElasticListController;

  enableUpdateHeader: (enable: boolean) => ElasticListController;
  enableLoadFooter: (enable: boolean) => ElasticListController;
  isUpdateHeaderEnabled: () => boolean;
  isLoadFooterEnabled: () => boolean;

  /**
   * Run the update action as if the user pulled. Deferred to the next
   * `render()` while the header has no measured content or no listener.
   * Fires at most once per call.
   */
  requestUpdate: () => ElasticListController;

  /** The update work finished. Safe to call from any context. */
  notifyUpdated: () => void;

  /** The load work finished. Safe to call from any context. */
  notifyLoaded: () => void;

  /** Header is in its slot on screen with a nonzero height */
  isUpdating: () => boolean;

  /** Footer is in its slot on screen with a nonzero height */
  isLoading: () => boolean;

  // ── Input ─────────────────────────────────────────────────────
  touchDown: (y: number) => void;
  /** True when a decoration consumed the movement (cancel native scroll) */
  touchMove: (y: number) => boolean;
  touchUp: () => boolean;
  touchCancel: () => boolean;
  /** Negative: past the top edge. Positive: past the bottom edge. */
  overscroll: (delta: number) => boolean;
  /** Tap on the footer (click-to-load) */
  clickFooter: () => boolean;
  /** Host finished a layout pass: measure content, run deferred requests */
  render: () => void;

  // ── Events ────────────────────────────────────────────────────
  on: <K extends keyof ElasticEvents>(
    event: K,
    handler: EventHandler<ElasticEvents[K]>,
  ) => Unsubscribe;
  off: <K extends keyof ElasticEvents>(
    event: K,
    handler: EventHandler<ElasticEvents[K]>,
  ) => void;

  destroy: () => void;
}

// =============================================================================
// Configuration
// =============================================================================

const LOAD_ACTIONS: readonly LoadAction[] = ["auto", "release", "click"];

interface ResolvedConfig {
  readonly duration: number;
  readonly damping: number;
  readonly loadAction: LoadAction;
}

const resolveConfig = (config: ElasticConfig): ResolvedConfig => {
  const duration = config.duration ?? DEFAULT_SPRINGBACK_DURATION;
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new ConfigurationError("duration must be a positive number");
  }

  const damping = config.damping ?? DEFAULT_DAMPING;
  if (!Number.isFinite(damping) || damping <= 0 || damping > 1) {
    throw new ConfigurationError("damping must be in the range (0, 1]");
  }

  const loadAction = config.loadAction ?? DEFAULT_LOAD_ACTION;
  if (!LOAD_ACTIONS.includes(loadAction)) {
    throw new ConfigurationError(`Unknown load action: ${String(loadAction)}`);
  }

  return { duration, damping, loadAction };
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an elastic controller for a scrollable host.
 *
 * @example
 * ```ts
 * const host = createDomHost(viewport)
 * const elastic = createElasticController(host, { loadFooter: true })
 *
 * elastic.getUpdateHeader().setContentView(createElementContent(spinner))
 * elastic.getLoadFooter().setContentView(createElementContent(loadMore))
 * elastic
 *   .setOnUpdateListener({
 *     onUpdate: () => fetchLatest().finally(() => elastic.notifyUpdated()),
 *   })
 *   .setOnLoadListener({
 *     onLoad: () => fetchMore().finally(() => elastic.notifyLoaded()),
 *   })
 *
 * // Touch, wheel and tap input, plus a render pass on every layout change
 * const unbind = bindGestures(host, elastic)
 *
 * // Teardown
 * unbind()
 * elastic.destroy()
 * host.destroy()
 * ```
 */
export const createElasticController = (
  host: ScrollableHost,
  config: ElasticConfig = {},
): ElasticListController => {
  const resolved = resolveConfig(config);
  const scheduler = config.scheduler ?? createScheduler();
  const emitter = createElasticEmitter();

  let updateListener: OnUpdateListener | null = null;
  let loadListener: OnLoadListener | null = null;
  let headerEnabled = false;
  let footerEnabled = false;
  let pendingUpdate = false;
  let destroyed = false;

  // ── Decorations ───────────────────────────────────────────────

  const onHeightChange =
    (slot: DecorationSlot) =>
    (height: number): void => {
      host.resizeDecoration(slot, height);
      emitter.emit("height", { slot, height });
    };

  const header = createUpdateDecoration({
    onHeightChange: onHeightChange("header"),
  });
  const footer = createLoadDecoration({
    loadAction: resolved.loadAction,
    onHeightChange: onHeightChange("footer"),
  });

  // ── Mailbox ───────────────────────────────────────────────────

  // Declared before the animators so their frames can be routed through it
  const mailbox = createMailbox<EngineMessage>(
    (message) => handle(message),
    scheduler,
  );

  const headerAnimator = createSpringbackAnimator({
    decoration: header,
    scheduler,
    duration: resolved.duration,
    easing: config.easing ?? linear,
    isInView: () => host.isDecorationVisible("header"),
    onFrame: () => {
      mailbox.send({ type: "tick", slot: "header" });
    },
  });

  const footerAnimator = createSpringbackAnimator({
    decoration: footer,
    scheduler,
    duration: resolved.duration,
    easing: config.easing ?? linear,
    isInView: () => host.isDecorationVisible("footer"),
    onFrame: () => {
      mailbox.send({ type: "tick", slot: "footer" });
    },
  });

  // ── Actions ───────────────────────────────────────────────────

  const invoke = (name: string, fn: () => void): void => {
    try {
      fn();
    } catch (error) {
      console.error(`${LOG_PREFIX} Error in ${name} listener:`, error);
    }
  };

  const fireUpdate = (source: UpdateSource): boolean => {
    const listener = updateListener;
    if (listener === null) return false;

    log("update", source);
    header.setActive(true);
    emitter.emit("update", { source });
    invoke("onUpdate", () => listener.onUpdate());
    return true;
  };

  const fireLoad = (source: LoadSource): boolean => {
    const listener = loadListener;
    if (listener === null) return false;

    log("load", source);
    footer.setActive(true);
    emitter.emit("load", { source });
    invoke("onLoad", () => listener.onLoad());
    return true;
  };

  const arbiter = createGestureArbiter({
    header,
    footer,
    host,
    headerAnimator,
    footerAnimator,
    damping: resolved.damping,
    isHeaderEnabled: () => headerEnabled,
    isFooterEnabled: () => footerEnabled,
    fireUpdate,
    fireLoad,
  });

  // ── Requested update ──────────────────────────────────────────

  const canRunRequestedUpdate = (): boolean =>
    headerEnabled &&
    header.getContent() !== null &&
    header.isMeasured() &&
    updateListener !== null &&
    footer.isIdle();

  const runRequestedUpdate = (): boolean => {
    pendingUpdate = false;
    if (header.isActive()) return false;

    headerAnimator.abort();
    header.setHeight(header.getMinHeight());
    return fireUpdate("request");
  };

  // ── Completion ────────────────────────────────────────────────

  const complete = (slot: DecorationSlot): boolean => {
    const decoration = slot === "header" ? header : footer;
    const animator = slot === "header" ? headerAnimator : footerAnimator;

    // Already done: no callback, no animation
    if (!decoration.isActive()) return false;

    decoration.setActive(false);

    const enabled = slot === "header" ? headerEnabled : footerEnabled;
    if (enabled && host.isDecorationVisible(slot)) {
      const height = decoration.getHeight();
      animator.start(height, -height);
    } else {
      animator.abort();
      decoration.setHeight(0);
    }
    return true;
  };

  // ── Phases ────────────────────────────────────────────────────

  let headerPhase: UpdatePhase = header.phase();
  let footerPhase: LoadPhase = footer.phase();

  const syncPhases = (): void => {
    const nextHeader = header.phase();
    if (nextHeader !== headerPhase) {
      headerPhase = nextHeader;
      emitter.emit("phase", { slot: "header", phase: nextHeader });
    }

    const nextFooter = footer.phase();
    if (nextFooter !== footerPhase) {
      footerPhase = nextFooter;
      emitter.emit("phase", { slot: "footer", phase: nextFooter });
    }
  };

  // ── Message handling ──────────────────────────────────────────

  const dispatch = (message: EngineMessage): boolean => {
    switch (message.type) {
      case "touch-down":
        arbiter.down(message.y);
        return false;

      case "touch-move":
        return arbiter.move(message.y);

      case "touch-up":
        return arbiter.up();

      case "touch-cancel":
        return arbiter.cancel();

      case "overscroll":
        return arbiter.overscroll(message.delta);

      case "click-footer":
        if (!footerEnabled || !footer.acceptsClick() || !header.isIdle()) {
          return false;
        }
        if (!fireLoad("click")) return false;
        footerAnimator.start(footer.getHeight(), footer.bounceDelta());
        return true;

      case "render":
        header.measure();
        footer.measure();
        if (pendingUpdate && canRunRequestedUpdate()) {
          return runRequestedUpdate();
        }
        return false;

      case "request-update":
        if (!headerEnabled) return false;
        if (canRunRequestedUpdate()) return runRequestedUpdate();
        pendingUpdate = !header.isActive();
        return false;

      case "tick":
        if (message.slot === "header") {
          headerAnimator.step();
        } else {
          footerAnimator.step();
        }
        return false;

      case "updated":
        return complete("header");

      case "loaded":
        return complete("footer");
    }
  };

  function handle(message: EngineMessage): boolean {
    const result = dispatch(message);
    syncPhases();
    return result;
  }

  // ── Slots ─────────────────────────────────────────────────────

  const enableUpdateHeader = (enable: boolean): ElasticListController => {
    if (enable && !headerEnabled) {
      if (host.getHeaderCount() > 0) {
        throw new ConfigurationError(
          "Remove other list headers before enabling the update header",
        );
      }
      host.attachDecoration("header");
    } else if (!enable && headerEnabled) {
      headerAnimator.abort();
      header.setHeight(0);
      host.detachDecoration("header");
      syncPhases();
    }

    headerEnabled = enable;
    return api;
  };

  const enableLoadFooter = (enable: boolean): ElasticListController => {
    if (enable && !footerEnabled) {
      host.attachDecoration("footer");
    } else if (!enable && footerEnabled) {
      footerAnimator.abort();
      footer.setHeight(0);
      host.detachDecoration("footer");
      syncPhases();
    }

    footerEnabled = enable;
    return api;
  };

  // ── Handles ───────────────────────────────────────────────────

  const headerHandle: UpdateHeaderHandle = {
    setContentView: (content) => {
      header.setContent(content);
      host.mountContent?.("header", content);
      return headerHandle;
    },
    replaceContentView: (content) => {
      header.replaceContent(content);
      host.mountContent?.("header", content);
      return headerHandle;
    },
    getContentView: () => header.getContent(),
    setAlignment: (alignment) => {
      header.setAlignment(alignment);
      host.alignDecoration?.("header", alignment);
      return headerHandle;
    },
    getAlignment: () => header.getAlignment(),
    setOnUpdateStateListener: (listener) => {
      header.setStateListener(listener);
      return headerHandle;
    },
    isUpdating: () => header.isActive(),
    getHeight: () => header.getHeight(),
    getMinHeight: () => header.getMinHeight(),
    getPhase: () => header.phase(),
  };

  const footerHandle: LoadFooterHandle = {
    setContentView: (content) => {
      footer.setContent(content);
      host.mountContent?.("footer", content);
      return footerHandle;
    },
    replaceContentView: (content) => {
      footer.replaceContent(content);
      host.mountContent?.("footer", content);
      return footerHandle;
    },
    getContentView: () => footer.getContent(),
    setAlignment: (alignment) => {
      footer.setAlignment(alignment);
      host.alignDecoration?.("footer", alignment);
      return footerHandle;
    },
    getAlignment: () => footer.getAlignment(),
    setLoadAction: (action) => {
      footer.setLoadAction(action);
      return footerHandle;
    },
    getLoadAction: () => footer.getLoadAction(),
    isClickable: () => footer.isClickable(),
    setOnLoadStateListener: (listener) => {
      footer.setStateListener(listener);
      return footerHandle;
    },
    isLoading: () => footer.isActive(),
    getHeight: () => footer.getHeight(),
    getMinHeight: () => footer.getMinHeight(),
    getPhase: () => footer.phase(),
  };

  // ── Public API ────────────────────────────────────────────────

  const isShowing = (slot: DecorationSlot): boolean => {
    const decoration = slot === "header" ? header : footer;
    const enabled = slot === "header" ? headerEnabled : footerEnabled;
    if (!enabled || decoration.getContent() === null) return false;
    return host.isDecorationVisible(slot) && decoration.getHeight() > 0;
  };

  const destroy = (): void => {
    if (destroyed) return;
    destroyed = true;

    headerAnimator.abort();
    footerAnimator.abort();
    mailbox.close();
    emitter.clear();
    updateListener = null;
    loadListener = null;
    header.setStateListener(null);
    footer.setStateListener(null);

    if (headerEnabled) host.detachDecoration("header");
    if (footerEnabled) host.detachDecoration("footer");
    headerEnabled = false;
    footerEnabled = false;
  };

  const api: ElasticListController = {
    getUpdateHeader: () => headerHandle,
    getLoadFooter: () => footerHandle,

    setOnUpdateListener: (listener) => {
      updateListener = listener;
      return api;
    },
    setOnLoadListener: (listener) => {
      loadListener = listener;
      return api;
    },

    enableUpdateHeader,
    enableLoadFooter,
    isUpdateHeaderEnabled: () => headerEnabled,
    isLoadFooterEnabled: () => footerEnabled,

    requestUpdate: () => {
      mailbox.send({ type: "request-update" });
      return api;
    },
    notifyUpdated: () => mailbox.post({ type: "updated" }),
    notifyLoaded: () => mailbox.post({ type: "loaded" }),

    isUpdating: () => isShowing("header"),
    isLoading: () => isShowing("footer"),

    touchDown: (y) => {
      mailbox.send({ type: "touch-down", y });
    },
    touchMove: (y) => mailbox.send({ type: "touch-move", y }),
    touchUp: () => mailbox.send({ type: "touch-up" }),
    touchCancel: () => mailbox.send({ type: "touch-cancel" }),
    overscroll: (delta) => mailbox.send({ type: "overscroll", delta }),
    clickFooter: () => mailbox.send({ type: "click-footer" }),
    render: () => {
      mailbox.send({ type: "render" });
    },

    on: emitter.on,
    off: emitter.off,

    destroy,
  };

  // ── Initialization ────────────────────────────────────────────

  if (config.updateHeader ?? DEFAULT_UPDATE_HEADER_ENABLED) {
    enableUpdateHeader(true);
  }
  if (config.loadFooter ?? DEFAULT_LOAD_FOOTER_ENABLED) {
    enableLoadFooter(true);
  }

  return api;
};
