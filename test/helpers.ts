/**
 * elastic-list - Test Helpers
 * Manual scheduler, in-memory host and fixed-height content
 */

import type {
  DecorationContent,
  DecorationSlot,
  Scheduler,
  ScrollableHost,
  VerticalAlignment,
} from "../src/types";

// =============================================================================
// Manual Scheduler
// =============================================================================

export interface ManualScheduler extends Scheduler {
  /** Advance the clock by `ms` and run the frames queued before the call */
  tick: (ms?: number) => void;

  /** Tick until no frame is queued (bounded) */
  settle: (ms?: number) => void;

  /** Run every deferred callback, including ones queued while running */
  runDeferred: () => void;

  pendingFrames: () => number;
  pendingDeferred: () => number;
}

export const createManualScheduler = (): ManualScheduler => {
  let time = 0;
  let nextId = 0;
  const frames = new Map<number, () => void>();
  const deferred: Array<() => void> = [];

  const tick = (ms = 16): void => {
    time += ms;
    const due = Array.from(frames.entries());
    frames.clear();
    for (const [, callback] of due) callback();
  };

  return {
    now: () => time,
    requestFrame: (callback) => {
      const id = ++nextId;
      frames.set(id, callback);
      return id;
    },
    cancelFrame: (id) => {
      frames.delete(id);
    },
    defer: (callback) => {
      deferred.push(callback);
    },
    tick,
    settle: (ms = 16) => {
      for (let i = 0; i < 1000 && frames.size > 0; i++) tick(ms);
    },
    runDeferred: () => {
      let next = deferred.shift();
      while (next !== undefined) {
        next();
        next = deferred.shift();
      }
    },
    pendingFrames: () => frames.size,
    pendingDeferred: () => deferred.length,
  };
};

// =============================================================================
// Fake Host
// =============================================================================

export interface FakeHost extends ScrollableHost {
  atTop: boolean;
  atBottom: boolean;
  itemCount: number;
  visibleCount: number;
  headerCount: number;

  /** Slots currently attached */
  readonly attached: Set<DecorationSlot>;

  /** Attached slots scrolled out of the viewport */
  readonly offscreen: Set<DecorationSlot>;

  /** Last height painted per slot */
  readonly painted: Record<DecorationSlot, number>;

  readonly mounted: Record<DecorationSlot, DecorationContent | null>;
  readonly aligned: Partial<Record<DecorationSlot, VerticalAlignment>>;

  reveals: number;
}

export const createFakeHost = (overrides: Partial<FakeHost> = {}): FakeHost => {
  const host: FakeHost = {
    atTop: true,
    atBottom: false,
    itemCount: 20,
    visibleCount: 10,
    headerCount: 0,
    attached: new Set(),
    offscreen: new Set(),
    painted: { header: 0, footer: 0 },
    mounted: { header: null, footer: null },
    aligned: {},
    reveals: 0,

    isAtTop: () => host.atTop,
    isAtBottom: () => host.atBottom,
    getItemCount: () => host.itemCount,
    getVisibleItemCount: () => host.visibleCount,
    getHeaderCount: () => host.headerCount,
    attachDecoration: (slot) => {
      host.attached.add(slot);
    },
    detachDecoration: (slot) => {
      host.attached.delete(slot);
    },
    isDecorationVisible: (slot) =>
      host.attached.has(slot) && !host.offscreen.has(slot),
    revealFooter: () => {
      host.reveals++;
      host.offscreen.delete("footer");
    },
    resizeDecoration: (slot, height) => {
      host.painted[slot] = height;
    },
    mountContent: (slot, content) => {
      host.mounted[slot] = content;
    },
    alignDecoration: (slot, alignment) => {
      host.aligned[slot] = alignment;
    },
  };

  return Object.assign(host, overrides);
};

// =============================================================================
// Content
// =============================================================================

/** Content with a fixed natural height */
export const fixedContent = (height: number): DecorationContent => ({
  measureHeight: () => height,
});
