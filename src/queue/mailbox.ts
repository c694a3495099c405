/**
 * elastic-list - Mailbox
 * Single-threaded FIFO queue that serializes every engine input
 *
 * Gestures, animation ticks and completion notifications all arrive as
 * typed messages and are handled strictly in arrival order. Nothing else
 * mutates decoration state, so no locking is needed.
 *
 * Two ways in:
 * - `send` for input that already runs on the UI context and needs an
 *   answer (was the touch consumed?). Earlier queued messages are handled
 *   first, then this one, synchronously.
 * - `post` for input from anywhere else (a worker finishing its job).
 *   The message is queued and drained on a later scheduler turn.
 */

import type { Scheduler } from "../types";
import { LOG_PREFIX } from "../constants";

/** Base shape of a mailbox message */
export interface Message {
  readonly type: string;
}

/** Handler return value is the `send` result (e.g. "consumed") */
export type MessageHandler<M extends Message> = (message: M) => boolean;

export interface Mailbox<M extends Message> {
  /** Handle now (after anything already queued) and return the result */
  send: (message: M) => boolean;

  /** Queue for delivery on a later turn */
  post: (message: M) => void;

  /** Number of queued, unhandled messages */
  size: () => number;

  /** Currently handling a message */
  isBusy: () => boolean;

  /** Drop queued messages and refuse new ones */
  close: () => void;
}

// =============================================================================
// Factory
// =============================================================================

export const createMailbox = <M extends Message>(
  handler: MessageHandler<M>,
  scheduler: Scheduler,
): Mailbox<M> => {
  const queue: M[] = [];
  let draining = false;
  let drainScheduled = false;
  let closed = false;

  const run = (message: M): boolean => {
    try {
      return handler(message);
    } catch (error) {
      console.error(
        `${LOG_PREFIX} Error while handling "${message.type}":`,
        error,
      );
      return false;
    }
  };

  const flush = (): void => {
    let next = queue.shift();
    while (next !== undefined) {
      run(next);
      next = queue.shift();
    }
  };

  const send = (message: M): boolean => {
    if (closed) return false;

    // Re-entrant send (a listener feeding input back into the engine):
    // keep FIFO order and handle it once the current message is done
    if (draining) {
      queue.push(message);
      return false;
    }

    draining = true;
    try {
      flush();
      const result = run(message);
      flush();
      return result;
    } finally {
      draining = false;
    }
  };

  const post = (message: M): void => {
    if (closed) return;

    queue.push(message);
    if (draining || drainScheduled) return;

    drainScheduled = true;
    scheduler.defer(() => {
      drainScheduled = false;
      if (closed || draining) return;

      draining = true;
      try {
        flush();
      } finally {
        draining = false;
      }
    });
  };

  const close = (): void => {
    closed = true;
    queue.length = 0;
  };

  return {
    send,
    post,
    size: () => queue.length,
    isBusy: () => draining,
    close,
  };
};
