/**
 * ConversationEngine
 *
 * Drives the multi-step flows. Each event is validated, serialized per
 * session, matched against the session's current step and either advances
 * the flow, commits it through the ledger, or is ignored.
 *
 * Session lifecycle:
 *   Idle (no record) → entry step → ... → last step → commit → Terminal (record cleared)
 *
 * Menus are rebuilt from a fresh snapshot both when a step is entered and
 * when its button arrives, so a choice that went stale in between is ignored.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import type { Logger } from 'pino';
import {
  ButtonAction,
  auditSnapshot,
  decodePayload,
  encodeSnapshot,
  FlowKind,
  FlowStep,
  isBusinessError,
  isFlowKind,
  isTextStep,
  isValidAdvance,
  parseSlotCount,
  startFlow,
  STEP_ACTIONS,
  systemClock,
  validateFlowInput,
  ValidationError,
  type Clock,
  type ConversationSession,
  type FlowSession,
} from '@seatshare/core/domain';
import { isStoreError, type ISessionStore } from '@seatshare/core/ports';
import type { SubscriptionLedger } from '../ledger/index.js';
import {
  interactionEventSchema,
  type ButtonEvent,
  type CommandEvent,
  type InteractionEventInput,
  type TextEvent,
} from './events.js';
import {
  buildMenu,
  mainMenuOptions,
  recordChoice,
  recordText,
  STEP_PROMPTS,
  type FlowCompletion,
  type FlowTransition,
} from './flow-steps.js';
import type {
  CommandHelp,
  CommandReport,
  ErrorInfo,
  FlowOutcome,
  IgnoreReason,
  SessionResponse,
} from './responses.js';

// =============================================================================
// Commands
// =============================================================================

export const COMMAND_HELP: CommandHelp[] = [
  { command: 'start', usage: '/start', description: 'Show the main menu' },
  { command: 'cancel', usage: '/cancel', description: 'Cancel the current operation' },
  { command: 'listpeople', usage: '/listpeople', description: 'List people and their subscriptions' },
  { command: 'listsubs', usage: '/listsubs', description: 'List every subscription' },
  { command: 'listservices', usage: '/listservices', description: 'List services and prices' },
  { command: 'income', usage: '/income', description: 'Sum of all current subscription prices' },
  { command: 'export', usage: '/export', description: 'Download the stored data as JSON' },
  { command: 'removesub', usage: '/removesub', description: 'Remove a subscription' },
  { command: 'setprices', usage: '/setprices', description: 'Add or edit a service price' },
  { command: 'skip', usage: '/skip', description: 'Keep the current emoji while setting a price' },
  {
    command: 'setdefaultslots',
    usage: '/setdefaultslots <service> <count>',
    description: 'Slot count for new accounts of a service',
  },
  { command: 'addslot', usage: '/addslot <account> <slot>...', description: 'Add slots to an account' },
  { command: 'removeslot', usage: '/removeslot <account> <slot>...', description: 'Remove empty slots' },
  { command: 'help', usage: '/help', description: 'Show this list' },
];

// =============================================================================
// Types
// =============================================================================

export interface ConversationEngineOptions {
  /** Transactional mutations and fresh reads */
  ledger: SubscriptionLedger;
  /** Session records */
  sessions: ISessionStore;
  /** Logger instance */
  logger: Logger;
  /** Source of session timestamps (default: system clock) */
  clock?: Clock;
}

interface SessionLane {
  limit: LimitFunction;
  users: number;
}

// =============================================================================
// Implementation
// =============================================================================

export class ConversationEngine {
  private readonly ledger: SubscriptionLedger;
  private readonly sessions: ISessionStore;
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly lanes = new Map<string, SessionLane>();

  constructor(options: ConversationEngineOptions) {
    this.ledger = options.ledger;
    this.sessions = options.sessions;
    this.log = options.logger.child({ component: 'ConversationEngine' });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Handle one interaction event. Events of the same session run one at a
   * time in arrival order.
   */
  async handle(input: InteractionEventInput): Promise<SessionResponse> {
    const parsed = interactionEventSchema.safeParse(input);
    if (!parsed.success) {
      this.log.debug({ issues: parsed.error.issues.length }, 'Dropping malformed event');
      return ignored('invalid_event');
    }

    const event = parsed.data;
    return this.serialize(event.sessionId, () => {
      switch (event.type) {
        case 'command':
          return this.handleCommand(event);
        case 'button':
          return this.handleButton(event);
        case 'text':
          return this.handleText(event);
      }
    });
  }

  // ===========================================================================
  // Event Handlers
  // ===========================================================================

  private async handleButton(event: ButtonEvent): Promise<SessionResponse> {
    if (event.payload === ButtonAction.CANCEL) {
      return this.cancel(event.sessionId);
    }

    const menuChoice = decodePayload(event.payload, ButtonAction.MENU);
    if (menuChoice !== null) {
      if (!isFlowKind(menuChoice)) {
        return this.ignore(event.sessionId, 'unexpected_button');
      }
      return this.beginFlow(event.sessionId, menuChoice);
    }

    const session = await this.sessions.get(event.sessionId);
    if (!session) {
      return this.ignore(event.sessionId, 'no_session');
    }

    if (event.payload === ButtonAction.SKIP) {
      return this.skip(session);
    }

    const action = STEP_ACTIONS[session.active.step];
    const value = action ? decodePayload(event.payload, action) : null;
    if (value === null) {
      return this.ignore(event.sessionId, 'unexpected_button');
    }

    return this.choose(session, value);
  }

  private async handleText(event: TextEvent): Promise<SessionResponse> {
    const session = await this.sessions.get(event.sessionId);
    if (!session) {
      return this.ignore(event.sessionId, 'no_session');
    }
    if (!isTextStep(session.active.step)) {
      return this.ignore(event.sessionId, 'unexpected_text');
    }
    return this.answer(session, event.text);
  }

  private async handleCommand(event: CommandEvent): Promise<SessionResponse> {
    const { sessionId, name, args } = event;

    switch (name) {
      case 'start':
        await this.sessions.delete(sessionId);
        return { kind: 'main_menu', options: mainMenuOptions() };

      case 'cancel':
        return this.cancel(sessionId);

      case 'removesub':
        return this.beginFlow(sessionId, FlowKind.REMOVE_SUBSCRIPTION);

      case 'setprices':
        return this.beginFlow(sessionId, FlowKind.SET_PRICE);

      case 'skip': {
        const session = await this.sessions.get(sessionId);
        return session ? this.skip(session) : this.ignore(sessionId, 'no_session');
      }

      case 'help':
        return report(name, { type: 'help', commands: COMMAND_HELP });

      case 'listpeople':
        return this.runCommand(name, async () => ({
          type: 'people',
          people: await this.ledger.listPeople(),
        }));

      case 'listsubs':
        return this.runCommand(name, async () => ({
          type: 'subscriptions',
          subscriptions: await this.ledger.listSubscriptions(),
        }));

      case 'listservices':
        return this.runCommand(name, async () => ({
          type: 'services',
          services: await this.ledger.listServices(),
        }));

      case 'income':
        return this.runCommand(name, async () => ({
          type: 'income',
          income: await this.ledger.income(),
        }));

      case 'export':
        return this.runCommand(name, async () => {
          const snapshot = await this.ledger.snapshot();
          return {
            type: 'export',
            document: encodeSnapshot(snapshot),
            violations: auditSnapshot(snapshot),
          };
        });

      case 'setdefaultslots':
        return this.runCommand(name, async () => {
          const [service, countText] = args;
          if (args.length !== 2 || service === undefined || countText === undefined) {
            throw new ValidationError('Usage: /setdefaultslots <service> <count>');
          }
          const count = await this.ledger.setDefaultSlots(service, parseSlotCount(countText));
          return { type: 'default_slots', service, count };
        });

      case 'addslot':
      case 'removeslot':
        return this.runCommand(name, async () => {
          const [account, ...keys] = args;
          if (account === undefined || keys.length === 0) {
            throw new ValidationError(`Usage: /${name} <account> <slot>...`);
          }
          const result =
            name === 'addslot'
              ? await this.ledger.addSlots(account, keys)
              : await this.ledger.removeSlots(account, keys);
          return { type: 'slots', operation: name === 'addslot' ? 'add' : 'remove', result };
        });

      default:
        return this.ignore(sessionId, 'unknown_command');
    }
  }

  // ===========================================================================
  // Flow Control
  // ===========================================================================

  /**
   * Enter a flow at its first step, discarding any flow in progress.
   */
  private async beginFlow(sessionId: string, flow: FlowKind): Promise<SessionResponse> {
    const previous = await this.sessions.get(sessionId);
    if (previous) {
      this.log.debug(
        { sessionId, replaced: previous.active.flow, flow },
        'Replacing flow in progress'
      );
    }

    const now = this.clock();
    return this.enterStep({ sessionId, active: startFlow(flow), startedAt: now, updatedAt: now });
  }

  /**
   * Store the session at its current step and present that step. Menu steps
   * with nothing to choose from end the flow.
   */
  private async enterStep(session: ConversationSession): Promise<SessionResponse> {
    const { active } = session;

    const check = validateFlowInput(active);
    if (!check.valid) {
      return this.abort(session, new ValidationError(check.errors.join('; ')));
    }

    if (isTextStep(active.step)) {
      await this.sessions.set(session);
      return {
        kind: 'prompt',
        flow: active.flow,
        step: active.step,
        prompt: STEP_PROMPTS[active.step],
        canSkip: active.step === FlowStep.ENTER_EMOJI,
      };
    }

    try {
      const menu = buildMenu(await this.ledger.snapshot(), active);
      await this.sessions.set(session);
      return { kind: 'menu', flow: active.flow, step: active.step, ...menu };
    } catch (error) {
      return this.abort(session, error);
    }
  }

  private async choose(session: ConversationSession, value: string): Promise<SessionResponse> {
    let transition: FlowTransition;
    try {
      const menu = buildMenu(await this.ledger.snapshot(), session.active);
      if (!menu.options.some((option) => option.value === value)) {
        return this.ignore(session.sessionId, 'stale_option');
      }
      transition = recordChoice(session.active, value);
    } catch (error) {
      return this.abort(session, error);
    }
    return this.follow(session, transition);
  }

  private async answer(session: ConversationSession, text: string): Promise<SessionResponse> {
    const { active } = session;
    let transition: FlowTransition;
    try {
      transition = recordText(await this.ledger.snapshot(), active, text);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.log.debug({ sessionId: session.sessionId, step: active.step, reason: error.message }, 'Answer rejected');
        return {
          kind: 'prompt',
          flow: active.flow,
          step: active.step,
          prompt: STEP_PROMPTS[active.step],
          error: error.message,
          canSkip: active.step === FlowStep.ENTER_EMOJI,
        };
      }
      return this.abort(session, error);
    }
    return this.follow(session, transition);
  }

  private async skip(session: ConversationSession): Promise<SessionResponse> {
    if (session.active.step !== FlowStep.ENTER_EMOJI) {
      return this.ignore(session.sessionId, 'unexpected_command');
    }
    return this.answer(session, '');
  }

  private async follow(session: ConversationSession, transition: FlowTransition): Promise<SessionResponse> {
    if (transition.type === 'advance') {
      assertAdvance(session.active, transition.next);
      return this.enterStep({ ...session, active: transition.next, updatedAt: this.clock() });
    }
    return this.complete(session, transition.completion);
  }

  private async complete(session: ConversationSession, completion: FlowCompletion): Promise<SessionResponse> {
    try {
      const outcome = await this.commit(completion);
      await this.sessions.delete(session.sessionId);
      this.log.info({ sessionId: session.sessionId, flow: completion.flow, outcome: outcome.type }, 'Flow completed');
      return { kind: 'completed', flow: completion.flow, outcome };
    } catch (error) {
      return this.abort(session, error);
    }
  }

  private async commit(completion: FlowCompletion): Promise<FlowOutcome> {
    switch (completion.flow) {
      case FlowKind.ADD_PERSON: {
        const person = await this.ledger.addPerson(completion.name);
        return { type: 'person_added', person: person.name };
      }
      case FlowKind.REMOVE_PERSON: {
        const freedSlots = await this.ledger.removePerson(completion.person);
        return { type: 'person_removed', person: completion.person, freedSlots };
      }
      case FlowKind.ADD_ACCOUNT: {
        const account = await this.ledger.createAccount(completion.accountId, completion.service);
        return { type: 'account_added', account };
      }
      case FlowKind.REMOVE_ACCOUNT:
        await this.ledger.removeAccount(completion.account);
        return { type: 'account_removed', account: completion.account };
      case FlowKind.ADD_SUBSCRIPTION: {
        const subscription = await this.ledger.createSubscription(completion.request);
        return { type: 'subscription_added', person: completion.request.person, subscription };
      }
      case FlowKind.REMOVE_SUBSCRIPTION: {
        const subscription = await this.ledger.removeSubscriptionAt(completion.person, completion.key);
        return { type: 'subscription_removed', person: completion.person, subscription };
      }
      case FlowKind.SET_PRICE: {
        const service = await this.ledger.setPrice(completion.request);
        return {
          type: 'price_set',
          service,
          durationDays: completion.request.durationDays,
          price: completion.request.price,
        };
      }
      case FlowKind.REMOVE_PRICE:
        await this.ledger.removePrice(completion.service, completion.durationDays);
        return { type: 'price_removed', service: completion.service, durationDays: completion.durationDays };
    }
  }

  private async cancel(sessionId: string): Promise<SessionResponse> {
    const session = await this.sessions.get(sessionId);
    if (session) {
      await this.sessions.delete(sessionId);
      this.log.info({ sessionId, flow: session.active.flow, step: session.active.step }, 'Flow cancelled');
    }
    return { kind: 'cancelled', flow: session?.active.flow ?? null };
  }

  /**
   * End the flow with a business or store error. Anything else clears the
   * session and propagates.
   */
  private async abort(session: ConversationSession, error: unknown): Promise<SessionResponse> {
    await this.sessions.delete(session.sessionId);
    const { flow, step } = session.active;

    if (isBusinessError(error)) {
      this.log.info({ sessionId: session.sessionId, flow, step, code: error.code, reason: error.message }, 'Flow aborted');
      return { kind: 'aborted', flow, error: toErrorInfo(error) };
    }
    if (isStoreError(error)) {
      this.log.error({ sessionId: session.sessionId, flow, step, code: error.code, reason: error.message }, 'Flow failed in storage');
      return { kind: 'aborted', flow, error: toErrorInfo(error) };
    }
    throw error;
  }

  private async runCommand(name: string, work: () => Promise<CommandReport>): Promise<SessionResponse> {
    try {
      return report(name, await work());
    } catch (error) {
      if (isBusinessError(error) || isStoreError(error)) {
        this.log.info({ command: name, code: error.code, reason: error.message }, 'Command failed');
        return { kind: 'failed', command: name, error: toErrorInfo(error) };
      }
      throw error;
    }
  }

  private ignore(sessionId: string, reason: IgnoreReason): SessionResponse {
    this.log.debug({ sessionId, reason }, 'Event ignored');
    return ignored(reason);
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  private async serialize<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    let lane = this.lanes.get(sessionId);
    if (!lane) {
      lane = { limit: pLimit(1), users: 0 };
      this.lanes.set(sessionId, lane);
    }
    lane.users++;

    try {
      return await lane.limit(work);
    } finally {
      lane.users--;
      if (lane.users === 0) {
        this.lanes.delete(sessionId);
      }
    }
  }

  /** Sessions with events queued or running */
  get busySessions(): number {
    return this.lanes.size;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function ignored(reason: IgnoreReason): SessionResponse {
  return { kind: 'ignored', reason };
}

function report(command: string, payload: CommandReport): SessionResponse {
  return { kind: 'report', command, report: payload };
}

function toErrorInfo(error: { code: ErrorInfo['code']; message: string }): ErrorInfo {
  return { code: error.code, message: error.message };
}

function assertAdvance(from: FlowSession, to: FlowSession): void {
  if (!isValidAdvance(from, to)) {
    throw new Error(`Invalid step transition ${from.flow}: ${from.step} → ${to.step}`);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createConversationEngine(options: ConversationEngineOptions): ConversationEngine {
  return new ConversationEngine(options);
}
