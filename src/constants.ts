/**
 * elastic-list - Constants
 * All default values and magic numbers in one place
 */

import type { LoadAction, VerticalAlignment } from "./types";

// =============================================================================
// Gesture
// =============================================================================

/** Share of the finger travel applied to a decoration's height */
export const DEFAULT_DAMPING = 0.5;

// =============================================================================
// Springback
// =============================================================================

/** Springback duration in milliseconds */
export const DEFAULT_SPRINGBACK_DURATION = 1000;

/** Fallback frame interval when requestAnimationFrame is unavailable (ms) */
export const FALLBACK_FRAME_INTERVAL = 16;

// =============================================================================
// Decorations
// =============================================================================

/** Header is attached when the controller is created */
export const DEFAULT_UPDATE_HEADER_ENABLED = true;

/** Footer is opt-in */
export const DEFAULT_LOAD_FOOTER_ENABLED = false;

/** Default footer load action */
export const DEFAULT_LOAD_ACTION: LoadAction = "auto";

/** Header content hangs from the bottom edge, next to the first item */
export const DEFAULT_HEADER_ALIGNMENT: VerticalAlignment = "bottom";

/** Footer content sits on the top edge, next to the last item */
export const DEFAULT_FOOTER_ALIGNMENT: VerticalAlignment = "top";

// =============================================================================
// DOM Adapter
// =============================================================================

/** Default CSS class prefix */
export const DEFAULT_CLASS_PREFIX = "elastic";

/** Default selector for list items inside the host viewport */
export const DEFAULT_ITEM_SELECTOR = "[data-index]";

/** Tolerance (px) when comparing scroll position with the edges */
export const EDGE_THRESHOLD = 1;

/** Log prefix */
export const LOG_PREFIX = "[elastic-list]";
