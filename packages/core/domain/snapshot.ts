/**
 * Snapshot Domain Types
 *
 * The whole entity graph (people, accounts, services, default slot counts)
 * lives in one Snapshot aggregate that the repository loads and replaces
 * wholesale. Collections are insertion-ordered Maps; callers mutate a freshly
 * loaded draft inside a repository transaction.
 *
 * Invariants that hold after every committed mutation:
 * - every occupied slot (a, s) = p has exactly one subscription on p
 *   with (account = a, slot = s)
 * - slot keys are unique per account; occupants are known people
 * - subscription prices are frozen quotes taken at creation
 * - duration keys are positive integers; prices are non-negative
 * - no slot is held by two people
 *
 * @module packages/core/domain/snapshot
 */

import type { IsoDay } from './dates.js';

// =============================================================================
// Entities
// =============================================================================

/**
 * Opaque slot identifier. Default-created slots use "1".."n", but keys are
 * never assumed to be numeric.
 */
export type SlotKey = string;

/**
 * One seat on an account. `occupant` is a person name or null when free.
 */
export interface SlotEntry {
  key: SlotKey;
  occupant: string | null;
}

/**
 * A credential/seat-holder for one service.
 */
export interface Account {
  id: string;
  /** Null only for legacy accounts created before a service was chosen */
  service: string | null;
  /** Storage order; use compareSlotKeys for display order */
  slots: SlotEntry[];
}

/**
 * A subscribable product with its duration → price catalog.
 */
export interface Service {
  name: string;
  emoji: string;
  /** durationDays → price */
  durations: Map<number, number>;
}

/**
 * One person holding one slot for a fixed duration at a frozen price.
 */
export interface Subscription {
  service: string;
  account: string;
  slot: SlotKey;
  durationDays: number;
  endDate: IsoDay;
  price: number;
}

export interface Person {
  name: string;
  subscriptions: Subscription[];
  /** Null for legacy records that never stored it */
  lastActiveDate: IsoDay | null;
}

/**
 * The aggregate root.
 */
export interface Snapshot {
  people: Map<string, Person>;
  accounts: Map<string, Account>;
  services: Map<string, Service>;
  /** serviceName → slot count used when creating accounts */
  defaultSlots: Map<string, number>;
}

// =============================================================================
// Constructors
// =============================================================================

export function createEmptySnapshot(): Snapshot {
  return {
    people: new Map(),
    accounts: new Map(),
    services: new Map(),
    defaultSlots: new Map(),
  };
}

// =============================================================================
// Invariant Audit
// =============================================================================

export type ViolationKind =
  | 'slot_without_subscription'
  | 'duplicate_slot'
  | 'unknown_occupant'
  | 'double_booking'
  | 'invalid_price';

/**
 * A single invariant violation found by auditSnapshot.
 */
export interface InvariantViolation {
  kind: ViolationKind;
  message: string;
}

/**
 * Check the structural invariants of a snapshot.
 * Frozen prices are a property of history and cannot be checked from one
 * snapshot.
 *
 * @returns Every violation found (empty when consistent)
 */
export function auditSnapshot(snapshot: Snapshot): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  for (const account of snapshot.accounts.values()) {
    const seen = new Set<SlotKey>();
    for (const slot of account.slots) {
      if (seen.has(slot.key)) {
        violations.push({
          kind: 'duplicate_slot',
          message: `Duplicate slot '${slot.key}' on account '${account.id}'`,
        });
      }
      seen.add(slot.key);

      if (slot.occupant === null) {
        continue;
      }

      const person = snapshot.people.get(slot.occupant);
      if (!person) {
        violations.push({
          kind: 'unknown_occupant',
          message: `Slot '${slot.key}' on '${account.id}' held by unknown person '${slot.occupant}'`,
        });
        continue;
      }

      const holders = person.subscriptions.filter(
        (sub) => sub.account === account.id && sub.slot === slot.key
      ).length;
      if (holders !== 1) {
        violations.push({
          kind: 'slot_without_subscription',
          message: `Slot '${slot.key}' on '${account.id}' has ${holders} matching subscriptions on '${person.name}'`,
        });
      }
    }
  }

  // A slot referenced by subscriptions of two different people
  const claims = new Map<string, string>();
  for (const person of snapshot.people.values()) {
    for (const sub of person.subscriptions) {
      const key = `${sub.account}\u0000${sub.slot}`;
      const holder = claims.get(key);
      if (holder !== undefined && holder !== person.name) {
        violations.push({
          kind: 'double_booking',
          message: `Slot '${sub.slot}' on '${sub.account}' claimed by '${holder}' and '${person.name}'`,
        });
      }
      claims.set(key, person.name);
    }
  }

  for (const service of snapshot.services.values()) {
    for (const [days, price] of service.durations) {
      if (!Number.isInteger(days) || days <= 0 || !Number.isFinite(price) || price < 0) {
        violations.push({
          kind: 'invalid_price',
          message: `Invalid price entry ${days} → ${price} on service '${service.name}'`,
        });
      }
    }
  }

  return violations;
}
