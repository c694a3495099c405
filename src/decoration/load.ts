/**
 * elastic-list - Load Decoration
 * Pull-up footer state machine; behavior per load action lives in the policy
 */

import type {
  LoadAction,
  LoadPhase,
  OnLoadStateListener,
  VerticalAlignment,
} from "../types";
import { DEFAULT_FOOTER_ALIGNMENT, DEFAULT_LOAD_ACTION } from "../constants";
import { ConfigurationError } from "../errors";
import { createDecorationState, type DecorationState } from "./state";
import { getLoadPolicy, type LoadPolicy } from "./policy";

// =============================================================================
// Types
// =============================================================================

export interface LoadDecorationConfig {
  alignment?: VerticalAlignment;
  loadAction?: LoadAction;
  onHeightChange?: (height: number) => void;
}

export interface LoadDecoration extends DecorationState {
  growBy: (delta: number) => void;

  /** Pulled past the content height and not already loading */
  canFire: () => boolean;

  setActive: (active: boolean) => void;

  /** Signed distance to the springback target */
  bounceDelta: () => number;

  phase: () => LoadPhase;

  getPolicy: () => LoadPolicy;
  getLoadAction: () => LoadAction;

  /** Switch the load action. Only while the footer is idle. */
  setLoadAction: (action: LoadAction) => void;

  /** Footer accepts taps (click-to-load) */
  isClickable: () => boolean;

  /** A tap on the footer should fire the load action */
  acceptsClick: () => boolean;

  setStateListener: (listener: OnLoadStateListener | null) => void;
}

// =============================================================================
// Factory
// =============================================================================

export const createLoadDecoration = (
  config: LoadDecorationConfig = {},
): LoadDecoration => {
  const state = createDecorationState({
    slot: "footer",
    alignment: config.alignment ?? DEFAULT_FOOTER_ALIGNMENT,
    onHeightChange: config.onHeightChange,
  });

  let policy = getLoadPolicy(config.loadAction ?? DEFAULT_LOAD_ACTION);
  let listener: OnLoadStateListener | null = null;

  const growBy = (delta: number): void => {
    const before = state.getHeight();
    const min = state.getMinHeight();
    state.setHeight(policy.clamp(Math.max(0, before + delta), min));

    if (state.isActive() || listener === null || !policy.reportsPull) return;

    const after = state.getHeight();
    if (after > min && before <= min) {
      listener.onWillRelease(state.getContent());
    } else if ((before <= 0 && after > 0) || (before > min && after <= min)) {
      listener.onPullingUp(state.getContent());
    }
  };

  const canFire = (): boolean =>
    !state.isActive() && state.getHeight() > state.getMinHeight();

  const setActive = (active: boolean): void => {
    if (!state.markActive(active) || listener === null) return;

    if (active) {
      listener.onLoading(state.getContent());
    } else {
      listener.onDidLoad(state.getContent());
    }
  };

  // Over-pulled: settle at content height. Loading at or under it: stay.
  const bounceDelta = (): number => {
    const height = state.getHeight();
    const min = state.getMinHeight();
    if (height > min) return min - height;
    if (state.isActive()) return 0;
    return -height;
  };

  const phase = (): LoadPhase => {
    if (state.isActive()) return "loading";
    const height = state.getHeight();
    if (height <= 0) return "idle";
    return height > state.getMinHeight() ? "will-release" : "pulling";
  };

  const setLoadAction = (action: LoadAction): void => {
    if (action === policy.action) return;
    if (!state.isIdle()) {
      throw new ConfigurationError(
        `Cannot change the load action to "${action}" while the footer is in use`,
      );
    }
    policy = getLoadPolicy(action);
  };

  const acceptsClick = (): boolean => {
    if (!policy.clickable || state.isActive()) return false;
    const height = state.getHeight();
    return height > 0 && height >= state.getMinHeight();
  };

  return {
    ...state,
    growBy,
    canFire,
    setActive,
    bounceDelta,
    phase,
    getPolicy: () => policy,
    getLoadAction: () => policy.action,
    setLoadAction,
    isClickable: () => policy.clickable,
    acceptsClick,
    setStateListener: (next) => {
      listener = next;
    },
  };
};
