/**
 * elastic-list - Pull to Update / Pull to Load for scrollable lists
 * Elastic header and footer decorations driven by vertical gestures
 *
 * @packageDocumentation
 */

// Controller
export {
  createElasticController,
  type ElasticListController,
  type UpdateHeaderHandle,
  type LoadFooterHandle,
  type EngineMessage,
} from "./controller";

// DOM adapter
export {
  createDomHost,
  createElementContent,
  isElementContent,
  bindGestures,
  type DomHost,
  type DomHostConfig,
  type ElementContent,
  type Unbind,
} from "./host";

// Building blocks
export { createScheduler } from "./queue";
export { linear } from "./animation";

// Errors
export { ConfigurationError, isConfigurationError } from "./errors";

// Enumerations (values)
export { LoadAction, VerticalAlignment } from "./types";

// Types
export type {
  DecorationContent,
  DecorationSlot,
  ElasticConfig,
  ElasticEvents,
  Easing,
  EventHandler,
  LoadPhase,
  LoadSource,
  OnLoadListener,
  OnLoadStateListener,
  OnUpdateListener,
  OnUpdateStateListener,
  Scheduler,
  ScrollableHost,
  Unsubscribe,
  UpdatePhase,
  UpdateSource,
} from "./types";
