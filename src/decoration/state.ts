/**
 * elastic-list - Decoration State
 * Height, minimum height and active flag of one decoration
 *
 * Rendering-independent: the state only knows numbers and the content
 * it measures. The update header and load footer build their transition
 * rules on top of it.
 */

import type {
  DecorationContent,
  DecorationSlot,
  VerticalAlignment,
} from "../types";
import { ConfigurationError } from "../errors";

// =============================================================================
// Types
// =============================================================================

export interface DecorationStateConfig {
  slot: DecorationSlot;
  alignment: VerticalAlignment;

  /** Called after every height change with the new height */
  onHeightChange?: (height: number) => void;
}

export interface DecorationState {
  readonly slot: DecorationSlot;

  /** Current height (never negative) */
  getHeight: () => number;

  /** Height of the content, as of the last `measure()` */
  getMinHeight: () => number;

  /** Action in progress, waiting for completion */
  isActive: () => boolean;

  /** Height above zero */
  isVisible: () => boolean;

  /** Hidden and not active */
  isIdle: () => boolean;

  getAlignment: () => VerticalAlignment;
  setAlignment: (alignment: VerticalAlignment) => void;

  getContent: () => DecorationContent | null;

  /**
   * Attach the content view. Throws if a different one is attached;
   * use `replaceContent` to swap.
   */
  setContent: (content: DecorationContent) => void;

  /** Swap (or remove, with null) the content view */
  replaceContent: (content: DecorationContent | null) => void;

  /** Re-measure the content; returns the new minimum height */
  measure: () => number;

  /** Content measured at least once since it was attached */
  isMeasured: () => boolean;

  /** Set height directly (clamped to ≥ 0). Animation and controller only. */
  setHeight: (height: number) => void;

  /** Flip the active flag; returns whether it changed */
  markActive: (active: boolean) => boolean;
}

// =============================================================================
// Factory
// =============================================================================

export const createDecorationState = (
  config: DecorationStateConfig,
): DecorationState => {
  const { slot, onHeightChange } = config;

  let height = 0;
  let minHeight = 0;
  let active = false;
  let measured = false;
  let alignment = config.alignment;
  let content: DecorationContent | null = null;

  const setHeight = (next: number): void => {
    const clamped = next > 0 ? Math.round(next) : 0;
    if (clamped === height) return;
    height = clamped;
    onHeightChange?.(height);
  };

  const setContent = (next: DecorationContent): void => {
    if (content === next) return;
    if (content !== null) {
      throw new ConfigurationError(
        `The ${slot} decoration can only have one content view`,
      );
    }
    content = next;
    measured = false;
  };

  const replaceContent = (next: DecorationContent | null): void => {
    content = next;
    measured = false;
    if (next === null) minHeight = 0;
  };

  const measure = (): number => {
    if (content === null) return minHeight;
    const measuredHeight = content.measureHeight();
    minHeight =
      Number.isFinite(measuredHeight) && measuredHeight > 0
        ? Math.round(measuredHeight)
        : 0;
    measured = true;
    return minHeight;
  };

  const markActive = (next: boolean): boolean => {
    if (active === next) return false;
    active = next;
    return true;
  };

  return {
    slot,
    getHeight: () => height,
    getMinHeight: () => minHeight,
    isActive: () => active,
    isVisible: () => height > 0,
    isIdle: () => !active && height <= 0,
    getAlignment: () => alignment,
    setAlignment: (next) => {
      alignment = next;
    },
    getContent: () => content,
    setContent,
    replaceContent,
    measure,
    isMeasured: () => measured,
    setHeight,
    markActive,
  };
};
