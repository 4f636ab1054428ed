/**
 * Snapshot audit tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { setPrice } from '../catalog.js';
import { auditSnapshot, createEmptySnapshot, type Snapshot } from '../snapshot.js';
import { createAccount } from '../slots.js';
import { createSubscription } from '../subscriptions.js';

describe('auditSnapshot', () => {
  let snapshot: Snapshot;

  beforeEach(() => {
    snapshot = createEmptySnapshot();
    setPrice(snapshot, 'Stream', 30, 9.99);
    createAccount(snapshot, 'acc1', 'Stream', 2);
    createSubscription(
      snapshot,
      { person: 'Ann', service: 'Stream', account: 'acc1', slot: '1', durationDays: 30 },
      '2024-01-01'
    );
  });

  const setOccupant = (key: string, occupant: string | null) => {
    const slot = snapshot.accounts.get('acc1')?.slots.find((entry) => entry.key === key);
    if (slot) {
      slot.occupant = occupant;
    }
  };

  it('should find nothing in a consistent snapshot', () => {
    expect(auditSnapshot(snapshot)).toEqual([]);
  });

  it('should flag an occupied slot without a subscription', () => {
    setOccupant('2', 'Ann');

    expect(auditSnapshot(snapshot)).toEqual([
      { kind: 'slot_without_subscription', message: "Slot '2' on 'acc1' has 0 matching subscriptions on 'Ann'" },
    ]);
  });

  it('should flag an unknown occupant', () => {
    setOccupant('2', 'Zed');

    expect(auditSnapshot(snapshot)).toEqual([
      { kind: 'unknown_occupant', message: "Slot '2' on 'acc1' held by unknown person 'Zed'" },
    ]);
  });

  it('should flag duplicate slot keys', () => {
    snapshot.accounts.get('acc1')?.slots.push({ key: '2', occupant: null });

    expect(auditSnapshot(snapshot)).toEqual([
      { kind: 'duplicate_slot', message: "Duplicate slot '2' on account 'acc1'" },
    ]);
  });

  it('should flag a slot claimed by two people', () => {
    const held = snapshot.people.get('Ann')?.subscriptions[0];
    if (held) {
      snapshot.people.set('Bob', { name: 'Bob', lastActiveDate: null, subscriptions: [{ ...held }] });
    }

    expect(auditSnapshot(snapshot)).toEqual([
      { kind: 'double_booking', message: "Slot '1' on 'acc1' claimed by 'Ann' and 'Bob'" },
    ]);
  });

  it('should flag invalid price entries', () => {
    snapshot.services.get('Stream')?.durations.set(0, 5);

    expect(auditSnapshot(snapshot)).toEqual([
      { kind: 'invalid_price', message: "Invalid price entry 0 → 5 on service 'Stream'" },
    ]);
  });
});
