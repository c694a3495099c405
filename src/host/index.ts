/**
 * elastic-list - DOM Host Domain
 */

export {
  createDomHost,
  createElementContent,
  isElementContent,
  type DomHost,
  type DomHostConfig,
  type ElementContent,
} from "./dom";
export { bindGestures, type Unbind } from "./gestures";
export { isAtBottom, isAtTop, isRangeVisible } from "./geometry";
