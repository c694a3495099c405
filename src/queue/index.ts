/**
 * elastic-list - Queue Domain
 * Scheduler and mailbox for the single UI context
 */

export { createScheduler } from "./scheduler";
export {
  createMailbox,
  type Mailbox,
  type Message,
  type MessageHandler,
} from "./mailbox";
