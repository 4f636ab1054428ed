/**
 * Conversation Session Adapters
 */

export { InMemorySessionStore, type InMemorySessionStoreOptions } from './in-memory-session-store.js';

export {
  ConversationEngine,
  createConversationEngine,
  COMMAND_HELP,
  type ConversationEngineOptions,
} from './conversation-engine.js';

export {
  FLOW_LABELS,
  STEP_PROMPTS,
  formatPrice,
  mainMenuOptions,
  type StepMenu,
} from './flow-steps.js';

export {
  interactionEventSchema,
  type InteractionEvent,
  type InteractionEventInput,
  type TextEvent,
  type ButtonEvent,
  type CommandEvent,
} from './events.js';

export type {
  SessionResponse,
  MenuOption,
  ErrorInfo,
  FlowOutcome,
  CommandReport,
  CommandHelp,
  IgnoreReason,
} from './responses.js';
