/**
 * elastic-list - Core Types
 * Public contracts between the engine, the host list and the application
 */

// =============================================================================
// Event Handlers
// =============================================================================

/** Event handler function */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Enumerations
// =============================================================================

/**
 * How the load footer triggers its action.
 *
 * - `auto`: loads as soon as the footer is pulled into view
 * - `release`: loads when the finger is lifted past the content height
 * - `click`: loads only when the revealed footer is tapped
 */
export type LoadAction = "auto" | "release" | "click";

export const LoadAction = {
  AUTO_LOAD: "auto",
  RELEASE_TO_LOAD: "release",
  CLICK_TO_LOAD: "click",
} as const satisfies Record<string, LoadAction>;

/** Placement of the content view inside a decoration taller than it */
export type VerticalAlignment = "top" | "center" | "bottom";

export const VerticalAlignment = {
  TOP: "top",
  CENTER: "center",
  BOTTOM: "bottom",
} as const satisfies Record<string, VerticalAlignment>;

/** Decoration slot on the host list */
export type DecorationSlot = "header" | "footer";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Content placed inside a decoration (arrow, spinner, label...).
 * The engine only needs its natural height, which becomes the
 * decoration's minimum height on the next render.
 */
export interface DecorationContent {
  measureHeight(): number;
}

/**
 * The narrow capability surface the engine needs from a scrollable list.
 * Bind it to a concrete list with an adapter (see `createDomHost`).
 */
export interface ScrollableHost {
  /** Viewport is at the logical top of its content */
  isAtTop(): boolean;

  /** Viewport is at the logical bottom of its content */
  isAtBottom(): boolean;

  /** Total number of items in the list */
  getItemCount(): number;

  /** Number of items currently (even partially) visible */
  getVisibleItemCount(): number;

  /** Number of non-engine header decorations already attached */
  getHeaderCount(): number;

  /** Attach the decoration at the first (header) or last (footer) slot */
  attachDecoration(slot: DecorationSlot): void;

  /** Detach a previously attached decoration */
  detachDecoration(slot: DecorationSlot): void;

  /** The decoration currently occupies the first/last visible slot */
  isDecorationVisible(slot: DecorationSlot): boolean;

  /** Scroll so that the footer slot is on screen */
  revealFooter(): void;

  /** Apply a new decoration height (repaint) */
  resizeDecoration(slot: DecorationSlot, height: number): void;

  /** Place (or with null, remove) the content inside the decoration */
  mountContent?(slot: DecorationSlot, content: DecorationContent | null): void;

  /** Apply the content alignment */
  alignDecoration?(slot: DecorationSlot, alignment: VerticalAlignment): void;
}

// =============================================================================
// Listeners
// =============================================================================

export interface OnUpdateListener {
  onUpdate(): void;
}

export interface OnLoadListener {
  onLoad(): void;
}

/** Visual feedback hooks for the update header; no effect on the engine */
export interface OnUpdateStateListener {
  onPullingDown(content: DecorationContent | null): void;
  onWillRelease(content: DecorationContent | null): void;
  onUpdating(content: DecorationContent | null): void;
  onDidUpdate(content: DecorationContent | null): void;
}

/** Visual feedback hooks for the load footer; no effect on the engine */
export interface OnLoadStateListener {
  onPullingUp(content: DecorationContent | null): void;
  onWillRelease(content: DecorationContent | null): void;
  onLoading(content: DecorationContent | null): void;
  onDidLoad(content: DecorationContent | null): void;
}

// =============================================================================
// Phases
// =============================================================================

/** Derived header phase */
export type UpdatePhase = "idle" | "pulling" | "will-release" | "updating";

/** Derived footer phase */
export type LoadPhase = "idle" | "pulling" | "will-release" | "loading";

// =============================================================================
// Controller Events
// =============================================================================

/** Events emitted by the controller */
export interface ElasticEvents {
  /** Update action fired */
  update: { source: UpdateSource };

  /** Load action fired */
  load: { source: LoadSource };

  /** A decoration height changed (repaint hint) */
  height: { slot: DecorationSlot; height: number };

  /** A decoration moved to a new phase */
  phase: { slot: DecorationSlot; phase: UpdatePhase | LoadPhase };
}

/** What triggered an update */
export type UpdateSource = "release" | "overscroll" | "request";

/** What triggered a load */
export type LoadSource = "auto" | "release" | "overscroll" | "click";

// =============================================================================
// Configuration
// =============================================================================

/** Easing curve mapping linear progress (0-1) to eased progress (0-1) */
export type Easing = (t: number) => number;

/**
 * Time and frame source for animations and deferred delivery.
 * All callbacks run on the engine's single UI context.
 */
export interface Scheduler {
  /** Monotonic time in ms */
  now(): number;

  /** Run `callback` on the next animation frame */
  requestFrame(callback: () => void): number;

  /** Cancel a frame request */
  cancelFrame(id: number): void;

  /** Run `callback` on a later turn of the event loop */
  defer(callback: () => void): void;
}

/** Controller configuration */
export interface ElasticConfig {
  /** Springback duration in ms (default: 1000) */
  duration?: number;

  /** Share of the finger distance applied to the decoration (default: 0.5) */
  damping?: number;

  /** Springback easing (default: linear) */
  easing?: Easing;

  /** Frame/time source (default: requestAnimationFrame or timers) */
  scheduler?: Scheduler;

  /** Attach the update header on creation (default: true) */
  updateHeader?: boolean;

  /** Attach the load footer on creation (default: false) */
  loadFooter?: boolean;

  /** Footer load action (default: 'auto') */
  loadAction?: LoadAction;
}
