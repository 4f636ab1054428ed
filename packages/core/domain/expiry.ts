/**
 * Expiry Sweep
 *
 * Retires subscriptions that ended long ago and people who have been idle
 * with nothing subscribed. Pure over a snapshot draft; the ledger's
 * ExpiryReaper decides whether to persist based on `changed`.
 *
 * Idempotent: a second sweep on the same day finds nothing to do.
 *
 * @module packages/core/domain/expiry
 */

import { daysBetween, type IsoDay } from './dates.js';
import { DataIntegrityError } from './errors.js';
import type { Snapshot, Subscription } from './snapshot.js';
import { freeIfHeldBy } from './slots.js';

// =============================================================================
// Policy
// =============================================================================

export interface ExpiryPolicy {
  /** Subscriptions more than this many days past their end are dropped */
  retentionDays: number;
  /** Empty people idle for more than this many days are deleted */
  inactivityDays: number;
}

export const DEFAULT_EXPIRY_POLICY: ExpiryPolicy = {
  retentionDays: 60,
  inactivityDays: 10,
};

// =============================================================================
// Report
// =============================================================================

export interface ExpiredSubscription {
  person: string;
  subscription: Subscription;
  daysPastEnd: number;
  slotFreed: boolean;
}

export interface ExpirySweepReport {
  today: IsoDay;
  expired: ExpiredSubscription[];
  removedPeople: string[];
  integrityErrors: DataIntegrityError[];
  changed: boolean;
}

// =============================================================================
// Sweep
// =============================================================================

/**
 * Run one sweep over a draft.
 *
 * 1. Drop subscriptions with `today - endDate > retentionDays`, freeing the
 *    slot when it still shows the same person.
 * 2. Delete people left with no subscriptions whose last activity is more
 *    than `inactivityDays` ago.
 *
 * Records with unparsable dates are kept and reported.
 */
export function sweepExpired(
  snapshot: Snapshot,
  today: IsoDay,
  policy: ExpiryPolicy = DEFAULT_EXPIRY_POLICY
): ExpirySweepReport {
  const report: ExpirySweepReport = {
    today,
    expired: [],
    removedPeople: [],
    integrityErrors: [],
    changed: false,
  };

  for (const person of [...snapshot.people.values()]) {
    const kept: Subscription[] = [];

    person.subscriptions.forEach((subscription, index) => {
      const daysPastEnd = daysBetween(subscription.endDate, today);
      if (daysPastEnd === null) {
        report.integrityErrors.push(
          new DataIntegrityError({
            person: person.name,
            field: 'end_date',
            value: subscription.endDate,
            subscriptionIndex: index,
          })
        );
        kept.push(subscription);
        return;
      }

      if (daysPastEnd <= policy.retentionDays) {
        kept.push(subscription);
        return;
      }

      const slotFreed = freeIfHeldBy(snapshot, subscription.account, subscription.slot, person.name);
      report.expired.push({ person: person.name, subscription, daysPastEnd, slotFreed });
    });

    if (kept.length !== person.subscriptions.length) {
      person.subscriptions = kept;
      report.changed = true;
    }

    if (person.subscriptions.length > 0 || person.lastActiveDate === null) {
      continue;
    }

    const idleDays = daysBetween(person.lastActiveDate, today);
    if (idleDays === null) {
      report.integrityErrors.push(
        new DataIntegrityError({ person: person.name, field: 'last_active', value: person.lastActiveDate })
      );
      continue;
    }

    if (idleDays > policy.inactivityDays) {
      snapshot.people.delete(person.name);
      report.removedPeople.push(person.name);
      report.changed = true;
    }
  }

  return report;
}
