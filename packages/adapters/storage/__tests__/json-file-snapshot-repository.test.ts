/**
 * JsonFileSnapshotRepository Tests
 *
 * Each test works in its own temporary directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { setPrice, createAccount } from '@seatshare/core/domain';
import { StoreErrorCode } from '@seatshare/core/ports';
import { JsonFileSnapshotRepository } from '../json-file-snapshot-repository.js';

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

describe('JsonFileSnapshotRepository', () => {
  let dir: string;
  let path: string;
  let repository: JsonFileSnapshotRepository;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seatshare-json-'));
    path = join(dir, 'data.json');
    repository = new JsonFileSnapshotRepository({
      path,
      logger: createMockLogger() as unknown as Logger,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create the file with an empty document on first load', async () => {
    const snapshot = await repository.load();

    expect(snapshot.people.size).toBe(0);
    const stored: unknown = JSON.parse(await readFile(path, 'utf8'));
    expect(stored).toEqual({ people: {}, accounts: {}, services: {}, default_slots: {} });
  });

  it('should create missing parent directories', async () => {
    const nested = new JsonFileSnapshotRepository({
      path: join(dir, 'nested', 'deeper', 'data.json'),
      logger: createMockLogger() as unknown as Logger,
    });

    await nested.load();

    expect(await readdir(join(dir, 'nested', 'deeper'))).toEqual(['data.json']);
  });

  it('should write the persisted layout', async () => {
    await repository.transaction((draft) => {
      setPrice(draft, 'Stream', 30, 9.99);
      createAccount(draft, 'acc1', 'Stream', 2);
    });

    const stored: unknown = JSON.parse(await readFile(path, 'utf8'));
    expect(stored).toEqual({
      people: {},
      accounts: { acc1: { service: 'Stream', slots: { '1': null, '2': null } } },
      services: { Stream: { emoji: '❓', durations: { '30': 9.99 } } },
      default_slots: {},
    });
  });

  it('should leave no temporary files behind', async () => {
    await repository.transaction((draft) => {
      setPrice(draft, 'Stream', 30, 9.99);
    });

    expect(await readdir(dir)).toEqual(['data.json']);
  });

  it('should read a document written by hand', async () => {
    await writeFile(
      path,
      JSON.stringify({
        people: { Ann: { subscriptions: [], last_active: '2024-01-01' } },
        accounts: {},
        services: { Stream: { emoji: '📺', durations: { '30': 9.99, '7': 2.5 } } },
      })
    );

    const snapshot = await repository.load();

    expect(snapshot.people.get('Ann')?.lastActiveDate).toBe('2024-01-01');
    expect(snapshot.services.get('Stream')?.emoji).toBe('📺');
    expect(snapshot.services.get('Stream')?.durations.get(7)).toBe(2.5);
  });

  it('should load a subscription without a configured price and warn', async () => {
    const logger = createMockLogger();
    const legacy = new JsonFileSnapshotRepository({ path, logger: logger as unknown as Logger });
    await writeFile(
      path,
      JSON.stringify({
        people: {
          Ann: {
            subscriptions: [
              { service: 'Stream', account: 'acc1', slot: 1, duration: 30, end_date: '2024-01-31', price: 'N/A' },
            ],
          },
        },
        accounts: { acc1: { service: 'Stream', slots: { '1': 'Ann' } } },
        services: { Stream: { emoji: '📺', durations: {} } },
      })
    );

    const snapshot = await legacy.load();

    expect(snapshot.people.get('Ann')?.subscriptions[0]?.price).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      { warnings: ['people.Ann.subscriptions.0.price: price "N/A" read as 0'] },
      'Stored snapshot has legacy values'
    );
  });

  it('should reject a file that is not JSON', async () => {
    await writeFile(path, 'not json at all');

    await expect(repository.load()).rejects.toMatchObject({
      code: StoreErrorCode.CORRUPT_DOCUMENT,
    });
  });

  it('should reject a duration key that is not a positive integer', async () => {
    await writeFile(
      path,
      JSON.stringify({ services: { Stream: { emoji: '📺', durations: { thirty: 9.99 } } } })
    );

    await expect(repository.load()).rejects.toMatchObject({
      code: StoreErrorCode.CORRUPT_DOCUMENT,
    });
  });
});
