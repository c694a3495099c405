/**
 * elastic-list - Gesture Domain
 */

export {
  createGestureArbiter,
  type GestureArbiter,
  type GestureArbiterConfig,
} from "./arbiter";
