/**
 * elastic-list - Scroll Geometry
 * Pure edge and visibility checks on scroll values
 */

/**
 * Check if scroll position is at bottom
 */
export const isAtBottom = (
  scrollTop: number,
  scrollHeight: number,
  clientHeight: number,
  threshold = 0,
): boolean => {
  return scrollTop + clientHeight >= scrollHeight - threshold;
};

/**
 * Check if scroll position is at top
 */
export const isAtTop = (scrollTop: number, threshold = 0): boolean => {
  return scrollTop <= threshold;
};

/**
 * Check if a vertical range overlaps the visible range
 */
export const isRangeVisible = (
  rangeStart: number,
  rangeEnd: number,
  visibleStart: number,
  visibleEnd: number,
): boolean => {
  return rangeStart <= visibleEnd && rangeEnd >= visibleStart;
};
