/**
 * elastic-list - Decoration Domain
 */

export {
  createDecorationState,
  type DecorationState,
  type DecorationStateConfig,
} from "./state";
export {
  createUpdateDecoration,
  type UpdateDecoration,
  type UpdateDecorationConfig,
} from "./update";
export {
  createLoadDecoration,
  type LoadDecoration,
  type LoadDecorationConfig,
} from "./load";
export { getLoadPolicy, type LoadPolicy } from "./policy";
