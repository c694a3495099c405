/**
 * elastic-list - Animation Domain
 */

export {
  createSpringbackAnimator,
  linear,
  type SpringbackAnimator,
  type SpringbackConfig,
  type ScrollAnimation,
} from "./springback";
