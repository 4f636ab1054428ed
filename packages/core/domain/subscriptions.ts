/**
 * Subscription Engine
 *
 * Creates and removes subscriptions on people, keeping slot occupancy in
 * step with them through the slot allocator, and quoting prices from the
 * catalog.
 *
 * @module packages/core/domain/subscriptions
 */

import { getPrice } from './catalog.js';
import { addDays, type IsoDay } from './dates.js';
import { ConflictError, NotFoundError, ValidationError } from './errors.js';
import type { Person, SlotKey, Snapshot, Subscription } from './snapshot.js';
import { assign, deleteAccount, freeIfHeldBy, requireAccount } from './slots.js';
import { parsePersonName, roundToCents } from './validation.js';

// =============================================================================
// Types
// =============================================================================

export interface CreateSubscriptionRequest {
  person: string;
  service: string;
  account: string;
  slot: SlotKey;
  durationDays: number;
}

/**
 * A subscription together with where it lives, for listings and removal.
 */
export interface SubscriptionRef {
  person: string;
  index: number;
  subscription: Subscription;
}

/**
 * Where a subscription lives. A person holds a slot at most once, so this
 * identifies one of their subscriptions regardless of its list position.
 */
export interface SubscriptionKey {
  account: string;
  slot: SlotKey;
}

export interface PersonSummary {
  name: string;
  lastActiveDate: IsoDay | null;
  subscriptions: Subscription[];
}

// =============================================================================
// People
// =============================================================================

export function requirePerson(snapshot: Snapshot, name: string): Person {
  const person = snapshot.people.get(name);
  if (!person) {
    throw new NotFoundError(`Unknown person '${name}'`);
  }
  return person;
}

/**
 * Register a person with no subscriptions.
 *
 * @throws ConflictError if the name is taken
 */
export function addPerson(snapshot: Snapshot, name: string, today: IsoDay): Person {
  const personName = parsePersonName(name);
  if (snapshot.people.has(personName)) {
    throw new ConflictError(`Person '${personName}' already exists`);
  }
  const person: Person = { name: personName, subscriptions: [], lastActiveDate: today };
  snapshot.people.set(personName, person);
  return person;
}

/**
 * Delete a person after freeing every slot they occupy on any account.
 *
 * @returns Number of slots freed
 */
export function removePerson(snapshot: Snapshot, name: string): number {
  requirePerson(snapshot, name);

  let freed = 0;
  for (const account of snapshot.accounts.values()) {
    for (const slot of account.slots) {
      if (slot.occupant === name) {
        slot.occupant = null;
        freed++;
      }
    }
  }

  snapshot.people.delete(name);
  return freed;
}

// =============================================================================
// Subscriptions
// =============================================================================

/**
 * Quote the price, take the slot and append the subscription.
 * Unknown people are registered on the fly.
 *
 * @throws NotFoundError if no price is configured or the account/slot is unknown
 * @throws ValidationError if the account belongs to a different service
 * @throws OccupiedError if the slot was taken since the menu was shown
 */
export function createSubscription(
  snapshot: Snapshot,
  request: CreateSubscriptionRequest,
  today: IsoDay
): Subscription {
  const personName = parsePersonName(request.person);
  const price = getPrice(snapshot, request.service, request.durationDays);

  const account = requireAccount(snapshot, request.account);
  if (account.service !== request.service) {
    throw new ValidationError(
      `Account '${account.id}' is for '${account.service ?? 'no service'}', not '${request.service}'`
    );
  }

  assign(snapshot, account.id, request.slot, personName);

  const subscription: Subscription = {
    service: request.service,
    account: account.id,
    slot: request.slot,
    durationDays: request.durationDays,
    endDate: addDays(today, request.durationDays),
    price,
  };

  let person = snapshot.people.get(personName);
  if (!person) {
    person = { name: personName, subscriptions: [], lastActiveDate: today };
    snapshot.people.set(personName, person);
  }
  person.subscriptions.push(subscription);
  person.lastActiveDate = today;

  return subscription;
}

/**
 * Remove a subscription by position. The slot is freed only while it still
 * shows this person, so a slot reassigned by hand is left alone.
 *
 * @throws NotFoundError if the person is unknown or the index is out of range
 */
export function removeSubscription(
  snapshot: Snapshot,
  personName: string,
  index: number,
  today: IsoDay
): Subscription {
  const person = requirePerson(snapshot, personName);
  const subscription = Number.isInteger(index) ? person.subscriptions[index] : undefined;
  if (!subscription) {
    throw new NotFoundError(`'${person.name}' has no subscription #${index + 1}`);
  }

  person.subscriptions.splice(index, 1);
  freeIfHeldBy(snapshot, subscription.account, subscription.slot, person.name);
  person.lastActiveDate = today;

  return subscription;
}

/**
 * Remove the subscription a person holds on `key`, wherever it sits in
 * their list now.
 *
 * @throws NotFoundError if the person is unknown or no longer holds the slot
 */
export function removeSubscriptionAt(
  snapshot: Snapshot,
  personName: string,
  key: SubscriptionKey,
  today: IsoDay
): Subscription {
  const person = requirePerson(snapshot, personName);
  const index = person.subscriptions.findIndex((sub) => sub.account === key.account && sub.slot === key.slot);
  if (index < 0) {
    throw new NotFoundError(`'${person.name}' has no subscription on ${key.account} slot ${key.slot}`);
  }
  return removeSubscription(snapshot, person.name, index, today);
}

// Slot keys are letters and digits, so the last ':' always separates them
const KEY_SEPARATOR = ':';

export function formatSubscriptionKey(key: SubscriptionKey): string {
  return `${key.account}${KEY_SEPARATOR}${key.slot}`;
}

/**
 * @throws ValidationError if `value` is not `<account>:<slot>`
 */
export function parseSubscriptionKey(value: string): SubscriptionKey {
  const at = value.lastIndexOf(KEY_SEPARATOR);
  if (at <= 0 || at === value.length - 1) {
    throw new ValidationError(`'${value}' does not name a subscription`);
  }
  return { account: value.slice(0, at), slot: value.slice(at + 1) };
}

// =============================================================================
// Accounts
// =============================================================================

/**
 * Remove an account nobody subscribes to.
 *
 * @throws ConflictError if any subscription references the account, or a slot is occupied
 */
export function removeAccount(snapshot: Snapshot, accountId: string): void {
  requireAccount(snapshot, accountId);

  const holders = listSubscriptions(snapshot)
    .filter((ref) => ref.subscription.account === accountId)
    .map((ref) => ref.person);
  if (holders.length > 0) {
    throw new ConflictError(
      `Account '${accountId}' has active subscriptions (${[...new Set(holders)].join(', ')})`
    );
  }

  deleteAccount(snapshot, accountId);
}

// =============================================================================
// Read Models
// =============================================================================

export function listPeople(snapshot: Snapshot): PersonSummary[] {
  return Array.from(snapshot.people.values(), (person) => ({
    name: person.name,
    lastActiveDate: person.lastActiveDate,
    subscriptions: person.subscriptions.map((sub) => ({ ...sub })),
  }));
}

/**
 * Every subscription, flattened in person order.
 */
export function listSubscriptions(snapshot: Snapshot): SubscriptionRef[] {
  const refs: SubscriptionRef[] = [];
  for (const person of snapshot.people.values()) {
    person.subscriptions.forEach((subscription, index) => {
      refs.push({ person: person.name, index, subscription });
    });
  }
  return refs;
}

/**
 * Sum of frozen prices across all current subscriptions, rounded to cents.
 */
export function totalIncome(snapshot: Snapshot): number {
  const cents = listSubscriptions(snapshot).reduce(
    (sum, ref) => sum + Math.round(ref.subscription.price * 100),
    0
  );
  return roundToCents(cents / 100);
}
