/**
 * Conversation Session Domain Types
 *
 * Defines the multi-step flows that collect a sequence of choices before
 * committing one mutation. Each flow is a strictly ordered list of steps;
 * no step is optional and none is skipped:
 *
 *   ADD_SUBSCRIPTION: CHOOSE_PERSON → CHOOSE_SERVICE → CHOOSE_ACCOUNT →
 *                     CHOOSE_SLOT → CHOOSE_DURATION → (commit) → Terminal
 *
 * Idle is the absence of a session record. Terminal is reached by commit,
 * abort or cancel, and clears the record.
 *
 * @module packages/core/domain/session
 */

// =============================================================================
// Flows and Steps
// =============================================================================

export enum FlowKind {
  ADD_PERSON = 'add_person',
  REMOVE_PERSON = 'remove_person',
  ADD_ACCOUNT = 'add_account',
  REMOVE_ACCOUNT = 'remove_account',
  ADD_SUBSCRIPTION = 'add_subscription',
  REMOVE_SUBSCRIPTION = 'remove_subscription',
  SET_PRICE = 'set_price',
  REMOVE_PRICE = 'remove_price',
}

/**
 * What input a session expects next.
 * ENTER_* steps take a text message, CHOOSE_* steps a button.
 */
export enum FlowStep {
  ENTER_NAME = 'ENTER_NAME',
  ENTER_ACCOUNT_ID = 'ENTER_ACCOUNT_ID',
  ENTER_SERVICE = 'ENTER_SERVICE',
  ENTER_EMOJI = 'ENTER_EMOJI',
  ENTER_DURATION = 'ENTER_DURATION',
  ENTER_PRICE = 'ENTER_PRICE',
  CHOOSE_PERSON = 'CHOOSE_PERSON',
  CHOOSE_SERVICE = 'CHOOSE_SERVICE',
  CHOOSE_ACCOUNT = 'CHOOSE_ACCOUNT',
  CHOOSE_SLOT = 'CHOOSE_SLOT',
  CHOOSE_DURATION = 'CHOOSE_DURATION',
  CHOOSE_SUBSCRIPTION = 'CHOOSE_SUBSCRIPTION',
}

/**
 * Ordered steps per flow. After the last step the flow commits.
 */
export const FLOW_STEPS = {
  [FlowKind.ADD_PERSON]: [FlowStep.ENTER_NAME],
  [FlowKind.REMOVE_PERSON]: [FlowStep.CHOOSE_PERSON],
  [FlowKind.ADD_ACCOUNT]: [FlowStep.ENTER_ACCOUNT_ID, FlowStep.CHOOSE_SERVICE],
  [FlowKind.REMOVE_ACCOUNT]: [FlowStep.CHOOSE_ACCOUNT],
  [FlowKind.ADD_SUBSCRIPTION]: [
    FlowStep.CHOOSE_PERSON,
    FlowStep.CHOOSE_SERVICE,
    FlowStep.CHOOSE_ACCOUNT,
    FlowStep.CHOOSE_SLOT,
    FlowStep.CHOOSE_DURATION,
  ],
  [FlowKind.REMOVE_SUBSCRIPTION]: [FlowStep.CHOOSE_PERSON, FlowStep.CHOOSE_SUBSCRIPTION],
  [FlowKind.SET_PRICE]: [
    FlowStep.ENTER_SERVICE,
    FlowStep.ENTER_EMOJI,
    FlowStep.ENTER_DURATION,
    FlowStep.ENTER_PRICE,
  ],
  [FlowKind.REMOVE_PRICE]: [FlowStep.CHOOSE_SERVICE, FlowStep.CHOOSE_DURATION],
} as const satisfies Record<FlowKind, readonly FlowStep[]>;

/** Steps of one flow */
export type StepOf<F extends FlowKind> = (typeof FLOW_STEPS)[F][number];

// =============================================================================
// Accumulated Input
// =============================================================================

export type AddPersonInput = Record<string, never>;
export type RemovePersonInput = Record<string, never>;

export interface AddAccountInput {
  accountId?: string;
}

export type RemoveAccountInput = Record<string, never>;

export interface AddSubscriptionInput {
  person?: string;
  service?: string;
  account?: string;
  slot?: string;
}

export interface RemoveSubscriptionInput {
  person?: string;
}

export interface SetPriceInput {
  service?: string;
  /** Undefined or empty keeps the current emoji */
  emoji?: string;
  durationDays?: number;
}

export interface RemovePriceInput {
  service?: string;
}

interface FlowInputs {
  [FlowKind.ADD_PERSON]: AddPersonInput;
  [FlowKind.REMOVE_PERSON]: RemovePersonInput;
  [FlowKind.ADD_ACCOUNT]: AddAccountInput;
  [FlowKind.REMOVE_ACCOUNT]: RemoveAccountInput;
  [FlowKind.ADD_SUBSCRIPTION]: AddSubscriptionInput;
  [FlowKind.REMOVE_SUBSCRIPTION]: RemoveSubscriptionInput;
  [FlowKind.SET_PRICE]: SetPriceInput;
  [FlowKind.REMOVE_PRICE]: RemovePriceInput;
}

export type FlowInputOf<F extends FlowKind> = FlowInputs[F];

/**
 * The active flow of a session: one variant per flow, each carrying its own
 * accumulator.
 */
export type FlowSession = {
  [F in FlowKind]: { flow: F; step: StepOf<F>; input: FlowInputs[F] };
}[FlowKind];

/**
 * Session record. Exists only while a flow is in progress.
 */
export interface ConversationSession {
  /** Initiator key, e.g. chat + user */
  sessionId: string;
  active: FlowSession;
  startedAt: Date;
  updatedAt: Date;
}

// =============================================================================
// State Machine Utilities
// =============================================================================

export function isFlowKind(value: string): value is FlowKind {
  return Object.values(FlowKind).some((kind) => kind === value);
}

export function getFlowSteps(flow: FlowKind): readonly FlowStep[] {
  return FLOW_STEPS[flow];
}

/**
 * Step after `step`, or null when `step` is the last one and the flow
 * commits (or is not part of the flow at all).
 */
export function getNextStep(flow: FlowKind, step: FlowStep): FlowStep | null {
  const steps = getFlowSteps(flow);
  const index = steps.indexOf(step);
  return index >= 0 ? steps[index + 1] ?? null : null;
}

/**
 * Check that `to` directly follows `from` within a flow.
 */
export function isValidAdvance(from: FlowSession, to: FlowSession): boolean {
  return from.flow === to.flow && getNextStep(from.flow, from.step) === to.step;
}

export function isFinalStep(flow: FlowKind, step: FlowStep): boolean {
  return getFlowSteps(flow).includes(step) && getNextStep(flow, step) === null;
}

/**
 * 1-based position of a step in its flow (0 when not part of it).
 */
export function getStepNumber(flow: FlowKind, step: FlowStep): number {
  return getFlowSteps(flow).indexOf(step) + 1;
}

export function isTextStep(step: FlowStep): boolean {
  return step.startsWith('ENTER_');
}

/**
 * Start a flow at its entry step with an empty accumulator.
 */
export function startFlow(flow: FlowKind): FlowSession {
  switch (flow) {
    case FlowKind.ADD_PERSON:
      return { flow, step: FlowStep.ENTER_NAME, input: {} };
    case FlowKind.REMOVE_PERSON:
      return { flow, step: FlowStep.CHOOSE_PERSON, input: {} };
    case FlowKind.ADD_ACCOUNT:
      return { flow, step: FlowStep.ENTER_ACCOUNT_ID, input: {} };
    case FlowKind.REMOVE_ACCOUNT:
      return { flow, step: FlowStep.CHOOSE_ACCOUNT, input: {} };
    case FlowKind.ADD_SUBSCRIPTION:
      return { flow, step: FlowStep.CHOOSE_PERSON, input: {} };
    case FlowKind.REMOVE_SUBSCRIPTION:
      return { flow, step: FlowStep.CHOOSE_PERSON, input: {} };
    case FlowKind.SET_PRICE:
      return { flow, step: FlowStep.ENTER_SERVICE, input: {} };
    case FlowKind.REMOVE_PRICE:
      return { flow, step: FlowStep.CHOOSE_SERVICE, input: {} };
  }
}

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Check that a session has collected everything the steps before its
 * current one are responsible for.
 */
export function validateFlowInput(session: FlowSession): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const need = (present: boolean, field: string) => {
    if (!present) {
      errors.push(`${field} has not been chosen`);
    }
  };

  switch (session.flow) {
    case FlowKind.ADD_ACCOUNT:
      if (session.step === FlowStep.CHOOSE_SERVICE) {
        need(Boolean(session.input.accountId), 'Account id');
      }
      break;

    case FlowKind.ADD_SUBSCRIPTION: {
      const position = getStepNumber(session.flow, session.step);
      if (position > 1) need(Boolean(session.input.person), 'Person');
      if (position > 2) need(Boolean(session.input.service), 'Service');
      if (position > 3) need(Boolean(session.input.account), 'Account');
      if (position > 4) need(Boolean(session.input.slot), 'Slot');
      break;
    }

    case FlowKind.REMOVE_SUBSCRIPTION:
      if (session.step === FlowStep.CHOOSE_SUBSCRIPTION) {
        need(Boolean(session.input.person), 'Person');
      }
      break;

    case FlowKind.SET_PRICE: {
      const position = getStepNumber(session.flow, session.step);
      if (position > 1) need(Boolean(session.input.service), 'Service');
      if (position > 3) need(session.input.durationDays !== undefined, 'Duration');
      break;
    }

    case FlowKind.REMOVE_PRICE:
      if (session.step === FlowStep.CHOOSE_DURATION) {
        need(Boolean(session.input.service), 'Service');
      }
      break;

    default:
      break;
  }

  return { valid: errors.length === 0, errors };
}

// =============================================================================
// Button Payloads
// =============================================================================

/**
 * Button actions. Payloads are `<action>_<value>`; the value is everything
 * after the first separator, so it may itself contain underscores.
 */
export enum ButtonAction {
  MENU = 'menu',
  PERSON = 'person',
  SERVICE = 'service',
  ACCOUNT = 'account',
  SLOT = 'slot',
  DURATION = 'duration',
  SUBSCRIPTION = 'sub',
  SKIP = 'skip',
  CANCEL = 'cancel',
}

/**
 * The only button action each menu step accepts.
 */
export const STEP_ACTIONS: Partial<Record<FlowStep, ButtonAction>> = {
  [FlowStep.CHOOSE_PERSON]: ButtonAction.PERSON,
  [FlowStep.CHOOSE_SERVICE]: ButtonAction.SERVICE,
  [FlowStep.CHOOSE_ACCOUNT]: ButtonAction.ACCOUNT,
  [FlowStep.CHOOSE_SLOT]: ButtonAction.SLOT,
  [FlowStep.CHOOSE_DURATION]: ButtonAction.DURATION,
  [FlowStep.CHOOSE_SUBSCRIPTION]: ButtonAction.SUBSCRIPTION,
};

const PAYLOAD_SEPARATOR = '_';

export function encodePayload(action: ButtonAction, value?: string): string {
  return value === undefined ? action : `${action}${PAYLOAD_SEPARATOR}${value}`;
}

/**
 * Extract the value of a payload for one action.
 *
 * @returns The value, or null if the payload belongs to another action or has none
 */
export function decodePayload(payload: string, action: ButtonAction): string | null {
  const prefix = `${action}${PAYLOAD_SEPARATOR}`;
  if (!payload.startsWith(prefix) || payload.length === prefix.length) {
    return null;
  }
  return payload.slice(prefix.length);
}
