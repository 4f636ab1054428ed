/**
 * SubscriptionLedger Tests
 *
 * Exercises the ledger against a SQLite repository in memory, so every
 * operation goes through a real transaction.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import {
  auditSnapshot,
  ConflictError,
  DomainErrorCode,
  NotFoundError,
  OccupiedError,
  ValidationError,
} from '@seatshare/core/domain';
import { SqliteSnapshotRepository } from '../../storage/index.js';
import { SubscriptionLedger } from '../subscription-ledger.js';

// =============================================================================
// Mock Logger
// =============================================================================

const createMockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

// =============================================================================
// Tests
// =============================================================================

describe('SubscriptionLedger', () => {
  let db: Database.Database;
  let logger: ReturnType<typeof createMockLogger>;
  let repository: SqliteSnapshotRepository;
  let ledger: SubscriptionLedger;
  let now: Date;

  beforeEach(() => {
    db = new Database(':memory:');
    logger = createMockLogger();
    now = new Date('2024-01-01T12:00:00Z');
    repository = new SqliteSnapshotRepository({ db, logger: logger as unknown as Logger });
    ledger = new SubscriptionLedger({
      repository,
      logger: logger as unknown as Logger,
      clock: () => now,
    });
  });

  afterEach(() => {
    db.close();
  });

  const seedStreamAccount = async (slots = 2) => {
    await ledger.setPrice({ service: 'Stream', durationDays: 30, price: 9.99, emoji: '📺' });
    await ledger.setDefaultSlots('Stream', slots);
    await ledger.createAccount('acc1', 'Stream');
  };

  // ===========================================================================
  // End-to-end
  // ===========================================================================

  describe('subscription lifecycle', () => {
    it('should price, assign and free a slot', async () => {
      const listing = await ledger.setPrice({
        service: 'Stream',
        durationDays: 30,
        price: 9.99,
        emoji: '📺',
      });
      expect(listing).toEqual({
        name: 'Stream',
        emoji: '📺',
        prices: [{ durationDays: 30, price: 9.99 }],
      });

      await ledger.setDefaultSlots('Stream', 2);
      const account = await ledger.createAccount('acc1', 'Stream');
      expect(account.slots).toEqual([
        { key: '1', occupant: null },
        { key: '2', occupant: null },
      ]);

      const subscription = await ledger.createSubscription({
        person: 'Ann',
        service: 'Stream',
        account: 'acc1',
        slot: '1',
        durationDays: 30,
      });
      expect(subscription).toEqual({
        service: 'Stream',
        account: 'acc1',
        slot: '1',
        durationDays: 30,
        endDate: '2024-01-31',
        price: 9.99,
      });

      let snapshot = await ledger.snapshot();
      expect(snapshot.accounts.get('acc1')?.slots[0]).toEqual({ key: '1', occupant: 'Ann' });
      expect(snapshot.people.get('Ann')?.lastActiveDate).toBe('2024-01-01');
      expect(auditSnapshot(snapshot)).toEqual([]);

      now = new Date('2024-01-05T08:00:00Z');
      const removed = await ledger.removeSubscription('Ann', 0);
      expect(removed.slot).toBe('1');

      snapshot = await ledger.snapshot();
      expect(snapshot.accounts.get('acc1')?.slots[0]).toEqual({ key: '1', occupant: null });
      expect(snapshot.people.get('Ann')).toEqual({
        name: 'Ann',
        subscriptions: [],
        lastActiveDate: '2024-01-05',
      });
      expect(auditSnapshot(snapshot)).toEqual([]);
    });

    it('should log each applied operation', async () => {
      await ledger.addPerson('Ann');

      expect(logger.info).toHaveBeenCalledWith(
        { operation: 'addPerson', person: 'Ann' },
        'Ledger operation applied'
      );
    });

    it('should remove a subscription by account and slot after the list shifted', async () => {
      await seedStreamAccount();
      await ledger.createSubscription({ person: 'Ann', service: 'Stream', account: 'acc1', slot: '1', durationDays: 30 });
      await ledger.createSubscription({ person: 'Ann', service: 'Stream', account: 'acc1', slot: '2', durationDays: 30 });
      await ledger.removeSubscription('Ann', 0);

      await expect(ledger.removeSubscriptionAt('Ann', { account: 'acc1', slot: '1' })).rejects.toThrow(
        "'Ann' has no subscription on acc1 slot 1"
      );
      const removed = await ledger.removeSubscriptionAt('Ann', { account: 'acc1', slot: '2' });

      expect(removed.slot).toBe('2');
      const snapshot = await ledger.snapshot();
      expect(snapshot.people.get('Ann')?.subscriptions).toEqual([]);
      expect(snapshot.accounts.get('acc1')?.slots[1]).toEqual({ key: '2', occupant: null });
    });

    it('should keep the quoted price when the catalog changes', async () => {
      await seedStreamAccount();
      await ledger.createSubscription({
        person: 'Ann',
        service: 'Stream',
        account: 'acc1',
        slot: '1',
        durationDays: 30,
      });

      await ledger.setPrice({ service: 'Stream', durationDays: 30, price: 12.99 });
      await ledger.createSubscription({
        person: 'Bob',
        service: 'Stream',
        account: 'acc1',
        slot: '2',
        durationDays: 30,
      });

      const refs = await ledger.listSubscriptions();
      expect(refs.map((ref) => [ref.person, ref.subscription.price])).toEqual([
        ['Ann', 9.99],
        ['Bob', 12.99],
      ]);
      expect(await ledger.income()).toEqual({ total: 22.98, subscriptionCount: 2 });
    });

    it('should keep the emoji when a price is set without one', async () => {
      await ledger.setPrice({ service: 'Stream', durationDays: 30, price: 9.99, emoji: '📺' });

      const listing = await ledger.setPrice({ service: 'Stream', durationDays: 7, price: 2.5, emoji: '' });

      expect(listing.emoji).toBe('📺');
      expect(listing.prices).toEqual([
        { durationDays: 7, price: 2.5 },
        { durationDays: 30, price: 9.99 },
      ]);
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('failed operations', () => {
    it('should persist nothing when the slot is taken', async () => {
      await seedStreamAccount();
      await ledger.createSubscription({
        person: 'Ann',
        service: 'Stream',
        account: 'acc1',
        slot: '1',
        durationDays: 30,
      });
      const versionBefore = repository.currentVersion;

      await expect(
        ledger.createSubscription({
          person: 'Bob',
          service: 'Stream',
          account: 'acc1',
          slot: '1',
          durationDays: 30,
        })
      ).rejects.toBeInstanceOf(OccupiedError);

      const snapshot = await ledger.snapshot();
      expect(snapshot.people.has('Bob')).toBe(false);
      expect(repository.currentVersion).toBe(versionBefore);
      expect(logger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ operation: 'createSubscription', code: DomainErrorCode.OCCUPIED }),
        'Ledger operation rejected'
      );
    });

    it('should reject an unpriced duration', async () => {
      await seedStreamAccount();

      await expect(
        ledger.createSubscription({
          person: 'Ann',
          service: 'Stream',
          account: 'acc1',
          slot: '1',
          durationDays: 90,
        })
      ).rejects.toThrow("No 90-day price configured for 'Stream'");
    });

    it('should reject an account of another service', async () => {
      await seedStreamAccount();
      await ledger.setPrice({ service: 'Music', durationDays: 30, price: 4.99 });

      await expect(
        ledger.createSubscription({
          person: 'Ann',
          service: 'Music',
          account: 'acc1',
          slot: '1',
          durationDays: 30,
        })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should give the last slot to exactly one of two concurrent requests', async () => {
      await seedStreamAccount(1);

      const results = await Promise.allSettled([
        ledger.createSubscription({ person: 'Ann', service: 'Stream', account: 'acc1', slot: '1', durationDays: 30 }),
        ledger.createSubscription({ person: 'Bob', service: 'Stream', account: 'acc1', slot: '1', durationDays: 30 }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      const rejected = results[1];
      expect(rejected?.status === 'rejected' && rejected.reason instanceof OccupiedError).toBe(true);

      const snapshot = await ledger.snapshot();
      expect(snapshot.accounts.get('acc1')?.slots).toEqual([{ key: '1', occupant: 'Ann' }]);
      expect(snapshot.people.has('Bob')).toBe(false);
      expect(auditSnapshot(snapshot)).toEqual([]);
    });
  });

  // ===========================================================================
  // People and Accounts
  // ===========================================================================

  describe('people and accounts', () => {
    it('should reject a duplicate person', async () => {
      await ledger.addPerson('Ann');

      await expect(ledger.addPerson(' Ann ')).rejects.toBeInstanceOf(ConflictError);
    });

    it('should free every slot of a removed person', async () => {
      await seedStreamAccount();
      await ledger.createSubscription({ person: 'Ann', service: 'Stream', account: 'acc1', slot: '1', durationDays: 30 });
      await ledger.createSubscription({ person: 'Ann', service: 'Stream', account: 'acc1', slot: '2', durationDays: 30 });

      expect(await ledger.removePerson('Ann')).toBe(2);

      const snapshot = await ledger.snapshot();
      expect(snapshot.people.size).toBe(0);
      expect(snapshot.accounts.get('acc1')?.slots.every((slot) => slot.occupant === null)).toBe(true);
    });

    it('should use the fallback slot count for services without a default', async () => {
      const fallbackLedger = new SubscriptionLedger({
        repository,
        logger: logger as unknown as Logger,
        defaultSlotCount: 3,
      });
      await fallbackLedger.setPrice({ service: 'Music', durationDays: 30, price: 4.99 });

      const account = await fallbackLedger.createAccount('m1', 'Music');

      expect(account.slots.map((slot) => slot.key)).toEqual(['1', '2', '3']);
    });

    it('should refuse an account for an unknown service', async () => {
      await expect(ledger.createAccount('acc1', 'Nope')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should refuse to remove an account with subscriptions', async () => {
      await seedStreamAccount();
      await ledger.createSubscription({ person: 'Ann', service: 'Stream', account: 'acc1', slot: '1', durationDays: 30 });

      await expect(ledger.removeAccount('acc1')).rejects.toThrow(
        "Account 'acc1' has active subscriptions (Ann)"
      );
    });

    it('should remove an unused account', async () => {
      await seedStreamAccount();

      await ledger.removeAccount('acc1');

      expect((await ledger.snapshot()).accounts.has('acc1')).toBe(false);
    });
  });

  // ===========================================================================
  // Slot edits
  // ===========================================================================

  describe('slot edits', () => {
    it('should apply valid keys and report the rest', async () => {
      await seedStreamAccount();

      const result = await ledger.addSlots('acc1', ['3', '2', 'x-y']);

      expect(result.applied).toEqual(['3']);
      expect(result.rejected.map((entry) => [entry.key, entry.error.code])).toEqual([
        ['2', DomainErrorCode.CONFLICT],
        ['x-y', DomainErrorCode.VALIDATION],
      ]);
      const snapshot = await ledger.snapshot();
      expect(snapshot.accounts.get('acc1')?.slots.map((slot) => slot.key)).toEqual(['1', '2', '3']);
    });

    it('should not remove an occupied slot', async () => {
      await seedStreamAccount();
      await ledger.createSubscription({ person: 'Ann', service: 'Stream', account: 'acc1', slot: '1', durationDays: 30 });

      const result = await ledger.removeSlots('acc1', ['1', '2', '9']);

      expect(result.applied).toEqual(['2']);
      expect(result.rejected.map((entry) => [entry.key, entry.error.code])).toEqual([
        ['1', DomainErrorCode.OCCUPIED],
        ['9', DomainErrorCode.NOT_FOUND],
      ]);
    });

    it('should write nothing when no key applies', async () => {
      await seedStreamAccount();
      const versionBefore = repository.currentVersion;

      const result = await ledger.addSlots('acc1', ['1']);

      expect(result.applied).toEqual([]);
      expect(repository.currentVersion).toBe(versionBefore);
    });
  });

  // ===========================================================================
  // Read models
  // ===========================================================================

  describe('read models', () => {
    it('should report zero income for an empty ledger', async () => {
      expect(await ledger.income()).toEqual({ total: 0, subscriptionCount: 0 });
    });

    it('should export the persisted layout', async () => {
      await seedStreamAccount();
      await ledger.createSubscription({ person: 'Ann', service: 'Stream', account: 'acc1', slot: '2', durationDays: 30 });

      expect(await ledger.exportDocument()).toEqual({
        people: {
          Ann: {
            subscriptions: [
              { service: 'Stream', account: 'acc1', slot: '2', duration: 30, end_date: '2024-01-31', price: 9.99 },
            ],
            last_active: '2024-01-01',
          },
        },
        accounts: { acc1: { service: 'Stream', slots: { '1': null, '2': 'Ann' } } },
        services: { Stream: { emoji: '📺', durations: { '30': 9.99 } } },
        default_slots: { Stream: 2 },
      });
    });
  });
});
