/**
 * ExpiryReaper Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import {
  assign,
  createAccount,
  createEmptySnapshot,
  setPrice,
  type Snapshot,
} from '@seatshare/core/domain';
import { SqliteSnapshotRepository } from '../../storage/index.js';
import { ExpiryReaper } from '../expiry-reaper.js';

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
// Test Data
// =============================================================================

/**
 * Ann holds slot 1 with a subscription that ended on 2024-01-01 and was
 * active on 2024-03-01.
 */
const createSnapshotWithEndedSubscription = (endDate = '2024-01-01'): Snapshot => {
  const snapshot = createEmptySnapshot();
  setPrice(snapshot, 'Stream', 30, 9.99);
  createAccount(snapshot, 'acc1', 'Stream', 2);
  assign(snapshot, 'acc1', '1', 'Ann');
  snapshot.people.set('Ann', {
    name: 'Ann',
    subscriptions: [
      { service: 'Stream', account: 'acc1', slot: '1', durationDays: 30, endDate, price: 9.99 },
    ],
    lastActiveDate: '2024-03-01',
  });
  return snapshot;
};

// =============================================================================
// Tests
// =============================================================================

describe('ExpiryReaper', () => {
  let db: Database.Database;
  let logger: ReturnType<typeof createMockLogger>;
  let repository: SqliteSnapshotRepository;
  let now: Date;
  let reaper: ExpiryReaper;

  beforeEach(() => {
    db = new Database(':memory:');
    logger = createMockLogger();
    repository = new SqliteSnapshotRepository({ db, logger: logger as unknown as Logger });
    now = new Date('2024-03-01T00:00:00Z');
    reaper = new ExpiryReaper({
      repository,
      logger: logger as unknown as Logger,
      clock: () => now,
    });
  });

  afterEach(() => {
    reaper.stop();
    vi.useRealTimers();
    db.close();
  });

  // ===========================================================================
  // run
  // ===========================================================================

  describe('run', () => {
    it('should retain a subscription exactly 60 days past its end', async () => {
      await repository.save(createSnapshotWithEndedSubscription());
      const versionBefore = repository.currentVersion;

      const report = await reaper.run();

      expect(report.changed).toBe(false);
      expect(report.expired).toEqual([]);
      expect(repository.currentVersion).toBe(versionBefore);
    });

    it('should drop a subscription 61 days past its end and free the slot', async () => {
      await repository.save(createSnapshotWithEndedSubscription());
      now = new Date('2024-03-02T00:00:00Z');

      const report = await reaper.run();

      expect(report.changed).toBe(true);
      expect(report.expired).toHaveLength(1);
      expect(report.expired[0]).toMatchObject({ person: 'Ann', daysPastEnd: 61, slotFreed: true });
      // Ann was active yesterday, so she stays
      expect(report.removedPeople).toEqual([]);

      const stored = await repository.load();
      expect(stored.people.get('Ann')?.subscriptions).toEqual([]);
      expect(stored.accounts.get('acc1')?.slots[0]).toEqual({ key: '1', occupant: null });
      expect(logger.info).toHaveBeenCalledWith(
        { today: '2024-03-02', expired: 1, removedPeople: [] },
        'Expiry sweep removed stale records'
      );
    });

    it('should change nothing on a second run', async () => {
      await repository.save(createSnapshotWithEndedSubscription());
      now = new Date('2024-03-02T00:00:00Z');
      await reaper.run();
      const versionAfterFirst = repository.currentVersion;

      const second = await reaper.run();

      expect(second.changed).toBe(false);
      expect(second.expired).toEqual([]);
      expect(repository.currentVersion).toBe(versionAfterFirst);
    });

    it('should log unparsable dates and keep the record', async () => {
      await repository.save(createSnapshotWithEndedSubscription('01/01/2024'));

      const report = await reaper.run();

      expect(report.changed).toBe(false);
      expect(report.integrityErrors).toHaveLength(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { person: 'Ann', field: 'end_date', value: '01/01/2024', subscriptionIndex: 0 },
        "Unparsable end_date '01/01/2024' on subscription #0 of 'Ann'"
      );
      const stored = await repository.load();
      expect(stored.people.get('Ann')?.subscriptions).toHaveLength(1);
    });

    it('should apply a custom policy', async () => {
      await repository.save(createSnapshotWithEndedSubscription());
      const strict = new ExpiryReaper({
        repository,
        logger: logger as unknown as Logger,
        clock: () => now,
        policy: { retentionDays: 30, inactivityDays: 10 },
      });

      const report = await strict.run();

      expect(report.expired.map((entry) => entry.daysPastEnd)).toEqual([60]);
    });
  });

  // ===========================================================================
  // Scheduling
  // ===========================================================================

  describe('start / stop', () => {
    it('should not schedule anything when the interval is 0', () => {
      reaper.start();

      expect(reaper.running).toBe(false);
    });

    it('should run on every interval until stopped', async () => {
      vi.useFakeTimers();
      const scheduled = new ExpiryReaper({
        repository,
        logger: logger as unknown as Logger,
        clock: () => now,
        intervalMinutes: 5,
      });
      const run = vi.spyOn(scheduled, 'run').mockResolvedValue({
        today: '2024-03-01',
        expired: [],
        removedPeople: [],
        integrityErrors: [],
        changed: false,
      });

      scheduled.start();
      expect(scheduled.running).toBe(true);

      await vi.advanceTimersByTimeAsync(5 * 60_000);
      await vi.advanceTimersByTimeAsync(5 * 60_000);
      expect(run).toHaveBeenCalledTimes(2);

      scheduled.stop();
      await vi.advanceTimersByTimeAsync(5 * 60_000);
      expect(run).toHaveBeenCalledTimes(2);
      expect(scheduled.running).toBe(false);
    });

    it('should log a failed scheduled run and keep the timer', async () => {
      vi.useFakeTimers();
      const scheduled = new ExpiryReaper({
        repository,
        logger: logger as unknown as Logger,
        intervalMinutes: 1,
      });
      const failure = new Error('disk full');
      vi.spyOn(scheduled, 'run').mockRejectedValue(failure);

      scheduled.start();
      await vi.advanceTimersByTimeAsync(60_000);

      expect(logger.error).toHaveBeenCalledWith({ error: failure }, 'Scheduled expiry sweep failed');
      expect(scheduled.running).toBe(true);
      scheduled.stop();
    });
  });
});
