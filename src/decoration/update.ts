/**
 * elastic-list - Update Decoration
 * Pull-down header state machine
 *
 *   idle ──pull──► pulling ──past content height──► will-release
 *     ▲                ◄──back under content height──┘      │
 *     │                                                release
 *     └──────────── springback ◄──── updating ◄─────────────┘
 */

import type {
  OnUpdateStateListener,
  UpdatePhase,
  VerticalAlignment,
} from "../types";
import { DEFAULT_HEADER_ALIGNMENT } from "../constants";
import { createDecorationState, type DecorationState } from "./state";

// =============================================================================
// Types
// =============================================================================

export interface UpdateDecorationConfig {
  alignment?: VerticalAlignment;
  onHeightChange?: (height: number) => void;
}

export interface UpdateDecoration extends DecorationState {
  /** Grow (or shrink, with a negative delta) by a gesture */
  growBy: (delta: number) => void;

  /** Pulled past the content height and not already updating */
  canFire: () => boolean;

  /** Enter or leave the updating state */
  setActive: (active: boolean) => void;

  /** Signed distance to the springback target */
  bounceDelta: () => number;

  phase: () => UpdatePhase;

  setStateListener: (listener: OnUpdateStateListener | null) => void;
}

// =============================================================================
// Factory
// =============================================================================

export const createUpdateDecoration = (
  config: UpdateDecorationConfig = {},
): UpdateDecoration => {
  const state = createDecorationState({
    slot: "header",
    alignment: config.alignment ?? DEFAULT_HEADER_ALIGNMENT,
    onHeightChange: config.onHeightChange,
  });

  let listener: OnUpdateStateListener | null = null;

  const growBy = (delta: number): void => {
    const before = state.getHeight();
    state.setHeight(before + delta);

    if (state.isActive() || listener === null) return;

    const after = state.getHeight();
    const min = state.getMinHeight();

    if (after > min && before <= min) {
      listener.onWillRelease(state.getContent());
    } else if ((before <= 0 && after > 0) || (before > min && after <= min)) {
      listener.onPullingDown(state.getContent());
    }
  };

  const canFire = (): boolean =>
    !state.isActive() && state.getHeight() > state.getMinHeight();

  const setActive = (active: boolean): void => {
    if (!state.markActive(active) || listener === null) return;

    if (active) {
      listener.onUpdating(state.getContent());
    } else {
      listener.onDidUpdate(state.getContent());
    }
  };

  // Settle at content height while updating, otherwise hide completely
  const bounceDelta = (): number => {
    const height = state.getHeight();
    const min = state.getMinHeight();
    return state.isActive() && height >= min ? min - height : -height;
  };

  const phase = (): UpdatePhase => {
    if (state.isActive()) return "updating";
    const height = state.getHeight();
    if (height <= 0) return "idle";
    return height > state.getMinHeight() ? "will-release" : "pulling";
  };

  return {
    ...state,
    growBy,
    canFire,
    setActive,
    bounceDelta,
    phase,
    setStateListener: (next) => {
      listener = next;
    },
  };
};
