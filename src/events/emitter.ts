/**
 * elastic-list - Engine Events
 * Observer channel for the events a controller reports
 */

import type { ElasticEvents, EventHandler, Unsubscribe } from "../types";
import { LOG_PREFIX } from "../constants";

type EventName = keyof ElasticEvents;

type HandlerSets = {
  [K in EventName]: Set<EventHandler<ElasticEvents[K]>>;
};

export interface ElasticEmitter {
  on: <K extends EventName>(
    event: K,
    handler: EventHandler<ElasticEvents[K]>,
  ) => Unsubscribe;

  off: <K extends EventName>(
    event: K,
    handler: EventHandler<ElasticEvents[K]>,
  ) => void;

  /**
   * Deliver to the handlers registered when the emit started. A throwing
   * handler is logged and the rest still run.
   */
  emit: <K extends EventName>(event: K, payload: ElasticEvents[K]) => void;

  /** Drop every handler of every event */
  clear: () => void;
}

// =============================================================================
// Factory
// =============================================================================

export const createElasticEmitter = (): ElasticEmitter => {
  const handlers: HandlerSets = {
    update: new Set(),
    load: new Set(),
    height: new Set(),
    phase: new Set(),
  };

  const off = <K extends EventName>(
    event: K,
    handler: EventHandler<ElasticEvents[K]>,
  ): void => {
    handlers[event].delete(handler);
  };

  const on = <K extends EventName>(
    event: K,
    handler: EventHandler<ElasticEvents[K]>,
  ): Unsubscribe => {
    handlers[event].add(handler);
    return () => off(event, handler);
  };

  const emit = <K extends EventName>(
    event: K,
    payload: ElasticEvents[K],
  ): void => {
    for (const handler of Array.from(handlers[event])) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`${LOG_PREFIX} Error in "${event}" handler:`, error);
      }
    }
  };

  const clear = (): void => {
    handlers.update.clear();
    handlers.load.clear();
    handlers.height.clear();
    handlers.phase.clear();
  };

  return { on, off, emit, clear };
};
