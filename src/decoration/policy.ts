/**
 * elastic-list - Load Policies
 * One strategy per load action, picked when the action is set
 */

import type { LoadAction } from "../types";

export interface LoadPolicy {
  readonly action: LoadAction;

  /** Footer reacts to taps */
  readonly clickable: boolean;

  /** Pull callbacks (pulling-up / will-release) are reported */
  readonly reportsPull: boolean;

  /** Action fires while dragging, as soon as the footer shows */
  readonly firesOnMove: boolean;

  /** Action fires when the finger lifts past the content height */
  readonly firesOnRelease: boolean;

  /** Height after a gesture step, given the unclamped height */
  clamp(height: number, minHeight: number): number;

  /** Action fires after an overscroll pushed the footer out */
  firesOnOverscroll(canFire: boolean): boolean;
}

const identity = (height: number): number => height;

/** Footer never shows less than its content and loads right away */
const autoLoad: LoadPolicy = {
  action: "auto",
  clickable: false,
  reportsPull: false,
  firesOnMove: true,
  firesOnRelease: false,
  clamp: (height, minHeight) => Math.max(height, minHeight),
  firesOnOverscroll: () => true,
};

const releaseToLoad: LoadPolicy = {
  action: "release",
  clickable: false,
  reportsPull: true,
  firesOnMove: false,
  firesOnRelease: true,
  clamp: identity,
  firesOnOverscroll: (canFire) => canFire,
};

/** Gestures only reveal the footer; a tap loads */
const clickToLoad: LoadPolicy = {
  action: "click",
  clickable: true,
  reportsPull: true,
  firesOnMove: false,
  firesOnRelease: false,
  clamp: identity,
  firesOnOverscroll: () => false,
};

const POLICIES: Record<LoadAction, LoadPolicy> = {
  auto: autoLoad,
  release: releaseToLoad,
  click: clickToLoad,
};

export const getLoadPolicy = (action: LoadAction): LoadPolicy =>
  POLICIES[action];
