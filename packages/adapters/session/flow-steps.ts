/**
 * Flow Steps
 *
 * Per-step menus, prompts and input handling for the conversation flows.
 * Everything here is pure over a snapshot; the engine does the I/O.
 */

import {
  ButtonAction,
  ConflictError,
  encodePayload,
  FlowKind,
  FlowStep,
  formatSubscriptionKey,
  listFreeSlots,
  listPrices,
  NotFoundError,
  parseAccountId,
  parseDurationDays,
  parsePersonName,
  parsePrice,
  parseServiceName,
  parseSubscriptionKey,
  requirePerson,
  requireService,
  sortSlotKeys,
  STEP_ACTIONS,
  ValidationError,
  type CreateSubscriptionRequest,
  type FlowSession,
  type Snapshot,
  type SubscriptionKey,
} from '@seatshare/core/domain';
import type { SetPriceRequest } from '../ledger/index.js';
import type { MenuOption } from './responses.js';

// =============================================================================
// Labels and Prompts
// =============================================================================

export const FLOW_LABELS: Record<FlowKind, string> = {
  [FlowKind.ADD_PERSON]: 'Add Person',
  [FlowKind.REMOVE_PERSON]: 'Remove Person',
  [FlowKind.ADD_ACCOUNT]: 'Add Account',
  [FlowKind.REMOVE_ACCOUNT]: 'Remove Account',
  [FlowKind.ADD_SUBSCRIPTION]: 'Add Subscription',
  [FlowKind.REMOVE_SUBSCRIPTION]: 'Remove Subscription',
  [FlowKind.SET_PRICE]: 'Set Price',
  [FlowKind.REMOVE_PRICE]: 'Remove Price',
};

export const STEP_PROMPTS: Record<FlowStep, string> = {
  [FlowStep.ENTER_NAME]: 'Send the name of the person to add:',
  [FlowStep.ENTER_ACCOUNT_ID]: 'Send the account name:',
  [FlowStep.ENTER_SERVICE]: 'Send the service name to add or edit (e.g. Netflix):',
  [FlowStep.ENTER_EMOJI]: 'Send an emoji for the service, or /skip to keep the current one:',
  [FlowStep.ENTER_DURATION]: 'Send the duration in days (e.g. 30):',
  [FlowStep.ENTER_PRICE]: 'Send the price (e.g. 10.99):',
  [FlowStep.CHOOSE_PERSON]: 'Select a person:',
  [FlowStep.CHOOSE_SERVICE]: 'Select a service:',
  [FlowStep.CHOOSE_ACCOUNT]: 'Select an account:',
  [FlowStep.CHOOSE_SLOT]: 'Select a slot:',
  [FlowStep.CHOOSE_DURATION]: 'Select a duration:',
  [FlowStep.CHOOSE_SUBSCRIPTION]: 'Select a subscription:',
};

export function formatPrice(price: number): string {
  return price.toFixed(2);
}

export function mainMenuOptions(): MenuOption[] {
  return Object.values(FlowKind).map((flow) => ({
    label: FLOW_LABELS[flow],
    value: flow,
    payload: encodePayload(ButtonAction.MENU, flow),
  }));
}

// =============================================================================
// Menus
// =============================================================================

export interface StepMenu {
  prompt: string;
  options: MenuOption[];
}

/**
 * Options for the session's current menu step, read from `snapshot`.
 *
 * @throws NotFoundError if there is nothing to choose from
 */
export function buildMenu(snapshot: Snapshot, active: FlowSession): StepMenu {
  const action = STEP_ACTIONS[active.step];
  if (!action) {
    throw new Error(`${active.step} is not a menu step`);
  }

  const choices = listChoices(snapshot, active);
  return {
    prompt: STEP_PROMPTS[active.step],
    options: choices.map(([value, label]) => ({ label, value, payload: encodePayload(action, value) })),
  };
}

type Choice = [value: string, label: string];

function listChoices(snapshot: Snapshot, active: FlowSession): Choice[] {
  switch (active.flow) {
    case FlowKind.REMOVE_PERSON:
      return nonEmpty(personChoices(snapshot), 'No people found. Add a person first.');

    case FlowKind.REMOVE_ACCOUNT:
      return nonEmpty(
        Array.from(snapshot.accounts.values(), (account): Choice => [
          account.id,
          `${account.id} (${account.service ?? 'no service'})`,
        ]),
        'No accounts found. Add an account first.'
      );

    case FlowKind.ADD_ACCOUNT:
      return nonEmpty(
        Array.from(snapshot.services.values(), (service): Choice => [
          service.name,
          `${service.emoji} ${service.name}`,
        ]),
        'No services defined. Use /setprices to add services.'
      );

    case FlowKind.ADD_SUBSCRIPTION:
      switch (active.step) {
        case FlowStep.CHOOSE_PERSON:
          return nonEmpty(personChoices(snapshot), 'No people found. Add a person first.');
        case FlowStep.CHOOSE_SERVICE:
          return pricedServiceChoices(snapshot);
        case FlowStep.CHOOSE_ACCOUNT: {
          const service = requireInput(active.input.service, 'Service');
          return nonEmpty(
            Array.from(snapshot.accounts.values())
              .filter((account) => account.service === service)
              .map((account): [string, number] => [account.id, listFreeSlots(snapshot, account.id).length])
              .filter(([, free]) => free > 0)
              .map(([id, free]): Choice => [id, `${id} (${free} free)`]),
            `No account for '${service}' has a free slot.`
          );
        }
        case FlowStep.CHOOSE_SLOT: {
          const account = requireInput(active.input.account, 'Account');
          return nonEmpty(
            sortSlotKeys(listFreeSlots(snapshot, account)).map((key): Choice => [key, `Slot ${key}`]),
            `No free slots available on '${account}'.`
          );
        }
        case FlowStep.CHOOSE_DURATION:
          return durationChoices(snapshot, requireInput(active.input.service, 'Service'));
      }
      break;

    case FlowKind.REMOVE_SUBSCRIPTION:
      switch (active.step) {
        case FlowStep.CHOOSE_PERSON:
          return nonEmpty(
            Array.from(snapshot.people.values())
              .filter((person) => person.subscriptions.length > 0)
              .map((person): Choice => [person.name, `${person.name} (${person.subscriptions.length})`]),
            'Nobody has a subscription to remove.'
          );
        case FlowStep.CHOOSE_SUBSCRIPTION: {
          const person = requirePerson(snapshot, requireInput(active.input.person, 'Person'));
          return nonEmpty(
            person.subscriptions.map((sub): Choice => {
              const emoji = snapshot.services.get(sub.service)?.emoji;
              const service = emoji ? `${emoji} ${sub.service}` : sub.service;
              return [formatSubscriptionKey(sub), `${service} · ${sub.account} slot ${sub.slot} · until ${sub.endDate}`];
            }),
            `'${person.name}' has no subscriptions.`
          );
        }
      }
      break;

    case FlowKind.REMOVE_PRICE:
      switch (active.step) {
        case FlowStep.CHOOSE_SERVICE:
          return pricedServiceChoices(snapshot);
        case FlowStep.CHOOSE_DURATION:
          return durationChoices(snapshot, requireInput(active.input.service, 'Service'));
      }
      break;

    case FlowKind.ADD_PERSON:
    case FlowKind.SET_PRICE:
      break;
  }

  throw new Error(`${active.flow} has no menu at ${active.step}`);
}

function personChoices(snapshot: Snapshot): Choice[] {
  return Array.from(snapshot.people.keys(), (name): Choice => [name, name]);
}

function pricedServiceChoices(snapshot: Snapshot): Choice[] {
  return nonEmpty(
    Array.from(snapshot.services.values())
      .filter((service) => service.durations.size > 0)
      .map((service): Choice => [service.name, `${service.emoji} ${service.name}`]),
    'No services with prices. Use /setprices to add one.'
  );
}

function durationChoices(snapshot: Snapshot, serviceName: string): Choice[] {
  const service = requireService(snapshot, serviceName);
  return nonEmpty(
    listPrices(service).map(({ durationDays, price }): Choice => [
      String(durationDays),
      `${durationDays} days · ${formatPrice(price)}`,
    ]),
    `No durations priced for '${service.name}'.`
  );
}

function nonEmpty(choices: Choice[], message: string): Choice[] {
  if (choices.length === 0) {
    throw new NotFoundError(message);
  }
  return choices;
}

function requireInput<T>(value: T | undefined, field: string): T {
  if (value === undefined) {
    throw new ValidationError(`${field} has not been chosen`);
  }
  return value;
}

// =============================================================================
// Transitions
// =============================================================================

/**
 * Everything a flow needs to commit.
 */
export type FlowCompletion =
  | { flow: FlowKind.ADD_PERSON; name: string }
  | { flow: FlowKind.REMOVE_PERSON; person: string }
  | { flow: FlowKind.ADD_ACCOUNT; accountId: string; service: string }
  | { flow: FlowKind.REMOVE_ACCOUNT; account: string }
  | { flow: FlowKind.ADD_SUBSCRIPTION; request: CreateSubscriptionRequest }
  | { flow: FlowKind.REMOVE_SUBSCRIPTION; person: string; key: SubscriptionKey }
  | { flow: FlowKind.SET_PRICE; request: SetPriceRequest }
  | { flow: FlowKind.REMOVE_PRICE; service: string; durationDays: number };

export type FlowTransition =
  | { type: 'advance'; next: FlowSession }
  | { type: 'commit'; completion: FlowCompletion };

/**
 * Record a menu choice. The value has already been checked against the
 * current options.
 */
export function recordChoice(active: FlowSession, value: string): FlowTransition {
  switch (active.flow) {
    case FlowKind.REMOVE_PERSON:
      return commit({ flow: active.flow, person: value });

    case FlowKind.REMOVE_ACCOUNT:
      return commit({ flow: active.flow, account: value });

    case FlowKind.ADD_ACCOUNT:
      return commit({
        flow: active.flow,
        accountId: requireInput(active.input.accountId, 'Account id'),
        service: value,
      });

    case FlowKind.ADD_SUBSCRIPTION: {
      const { input } = active;
      switch (active.step) {
        case FlowStep.CHOOSE_PERSON:
          return advance({ flow: active.flow, step: FlowStep.CHOOSE_SERVICE, input: { ...input, person: value } });
        case FlowStep.CHOOSE_SERVICE:
          return advance({ flow: active.flow, step: FlowStep.CHOOSE_ACCOUNT, input: { ...input, service: value } });
        case FlowStep.CHOOSE_ACCOUNT:
          return advance({ flow: active.flow, step: FlowStep.CHOOSE_SLOT, input: { ...input, account: value } });
        case FlowStep.CHOOSE_SLOT:
          return advance({ flow: active.flow, step: FlowStep.CHOOSE_DURATION, input: { ...input, slot: value } });
        case FlowStep.CHOOSE_DURATION:
          return commit({
            flow: active.flow,
            request: {
              person: requireInput(input.person, 'Person'),
              service: requireInput(input.service, 'Service'),
              account: requireInput(input.account, 'Account'),
              slot: requireInput(input.slot, 'Slot'),
              durationDays: Number(value),
            },
          });
      }
      break;
    }

    case FlowKind.REMOVE_SUBSCRIPTION:
      switch (active.step) {
        case FlowStep.CHOOSE_PERSON:
          return advance({ flow: active.flow, step: FlowStep.CHOOSE_SUBSCRIPTION, input: { person: value } });
        case FlowStep.CHOOSE_SUBSCRIPTION:
          return commit({
            flow: active.flow,
            person: requireInput(active.input.person, 'Person'),
            key: parseSubscriptionKey(value),
          });
      }
      break;

    case FlowKind.REMOVE_PRICE:
      switch (active.step) {
        case FlowStep.CHOOSE_SERVICE:
          return advance({ flow: active.flow, step: FlowStep.CHOOSE_DURATION, input: { service: value } });
        case FlowStep.CHOOSE_DURATION:
          return commit({
            flow: active.flow,
            service: requireInput(active.input.service, 'Service'),
            durationDays: Number(value),
          });
      }
      break;

    case FlowKind.ADD_PERSON:
    case FlowKind.SET_PRICE:
      break;
  }

  throw new Error(`${active.flow} takes no choice at ${active.step}`);
}

/**
 * Parse and record a text answer.
 *
 * @throws ValidationError when the text does not parse (the step is asked again)
 * @throws ConflictError when a new account id is already taken
 */
export function recordText(snapshot: Snapshot, active: FlowSession, text: string): FlowTransition {
  switch (active.flow) {
    case FlowKind.ADD_PERSON:
      return commit({ flow: active.flow, name: parsePersonName(text) });

    case FlowKind.ADD_ACCOUNT: {
      const accountId = parseAccountId(text);
      if (snapshot.accounts.has(accountId)) {
        throw new ConflictError(`Account '${accountId}' already exists`);
      }
      return advance({ flow: active.flow, step: FlowStep.CHOOSE_SERVICE, input: { accountId } });
    }

    case FlowKind.SET_PRICE: {
      const { input } = active;
      switch (active.step) {
        case FlowStep.ENTER_SERVICE:
          return advance({
            flow: active.flow,
            step: FlowStep.ENTER_EMOJI,
            input: { service: parseServiceName(text) },
          });
        case FlowStep.ENTER_EMOJI: {
          const emoji = text.trim();
          return advance({
            flow: active.flow,
            step: FlowStep.ENTER_DURATION,
            input: { ...input, emoji: emoji || undefined },
          });
        }
        case FlowStep.ENTER_DURATION:
          return advance({
            flow: active.flow,
            step: FlowStep.ENTER_PRICE,
            input: { ...input, durationDays: parseDurationDays(text) },
          });
        case FlowStep.ENTER_PRICE:
          return commit({
            flow: active.flow,
            request: {
              service: requireInput(input.service, 'Service'),
              emoji: input.emoji,
              durationDays: requireInput(input.durationDays, 'Duration'),
              price: parsePrice(text),
            },
          });
      }
      break;
    }

    case FlowKind.REMOVE_PERSON:
    case FlowKind.REMOVE_ACCOUNT:
    case FlowKind.ADD_SUBSCRIPTION:
    case FlowKind.REMOVE_SUBSCRIPTION:
    case FlowKind.REMOVE_PRICE:
      break;
  }

  throw new Error(`${active.flow} takes no text at ${active.step}`);
}

function advance(next: FlowSession): FlowTransition {
  return { type: 'advance', next };
}

function commit(completion: FlowCompletion): FlowTransition {
  return { type: 'commit', completion };
}
