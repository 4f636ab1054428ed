/**
 * Slot Allocator
 *
 * Account → ordered slot list. Assigns and frees slots and applies the
 * per-service default slot count when accounts are created.
 *
 * All operations mutate a snapshot draft in place; the repository
 * transaction around them is what makes the occupancy check in `assign`
 * a re-check at commit time.
 *
 * @module packages/core/domain/slots
 */

import { requireService } from './catalog.js';
import {
  ConflictError,
  DomainError,
  NotFoundError,
  OccupiedError,
} from './errors.js';
import type { Account, SlotEntry, SlotKey, Snapshot } from './snapshot.js';
import {
  parseAccountId,
  parseSlotKey,
  parseWith,
  slotCountSchema,
} from './validation.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Outcome of a multi-key slot edit. Keys are processed independently, so a
 * batch can partially succeed.
 */
export interface SlotBatchResult {
  account: string;
  applied: SlotKey[];
  rejected: Array<{ key: string; error: DomainError }>;
}

// =============================================================================
// Ordering
// =============================================================================

const slotCollator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' });

/**
 * Display order for slot keys: numeric runs compare as numbers, so "2" < "10".
 */
export function compareSlotKeys(a: SlotKey, b: SlotKey): number {
  return slotCollator.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0);
}

export function sortSlotKeys(keys: readonly SlotKey[]): SlotKey[] {
  return [...keys].sort(compareSlotKeys);
}

// =============================================================================
// Lookups
// =============================================================================

export function requireAccount(snapshot: Snapshot, accountId: string): Account {
  const account = snapshot.accounts.get(accountId);
  if (!account) {
    throw new NotFoundError(`Unknown account '${accountId}'`);
  }
  return account;
}

export function findSlot(account: Account, key: SlotKey): SlotEntry | undefined {
  return account.slots.find((slot) => slot.key === key);
}

function requireSlot(account: Account, key: SlotKey): SlotEntry {
  const slot = findSlot(account, key);
  if (!slot) {
    throw new NotFoundError(`Account '${account.id}' has no slot '${key}'`);
  }
  return slot;
}

/**
 * Free slot keys in storage order.
 */
export function listFreeSlots(snapshot: Snapshot, accountId: string): SlotKey[] {
  return requireAccount(snapshot, accountId)
    .slots.filter((slot) => slot.occupant === null)
    .map((slot) => slot.key);
}

// =============================================================================
// Default Slot Counts
// =============================================================================

/**
 * @throws ValidationError unless count is an integer >= 0
 * @throws NotFoundError if the service is not in the catalog
 */
export function setDefaultSlots(snapshot: Snapshot, serviceName: string, count: number): number {
  const slotCount = parseWith(slotCountSchema, count);
  const service = requireService(snapshot, serviceName);
  snapshot.defaultSlots.set(service.name, slotCount);
  return slotCount;
}

export function resolveDefaultSlotCount(
  snapshot: Snapshot,
  serviceName: string,
  fallback: number
): number {
  return snapshot.defaultSlots.get(serviceName) ?? fallback;
}

// =============================================================================
// Accounts
// =============================================================================

/**
 * Create an account with slots "1".."defaultSlotCount", all empty.
 *
 * @throws ConflictError if the id is taken
 * @throws NotFoundError if the service is not in the catalog
 */
export function createAccount(
  snapshot: Snapshot,
  id: string,
  serviceName: string,
  defaultSlotCount: number
): Account {
  const accountId = parseAccountId(id);
  const slotCount = parseWith(slotCountSchema, defaultSlotCount);

  if (snapshot.accounts.has(accountId)) {
    throw new ConflictError(`Account '${accountId}' already exists`);
  }
  const service = requireService(snapshot, serviceName);

  const account: Account = {
    id: accountId,
    service: service.name,
    slots: Array.from({ length: slotCount }, (_, i) => ({ key: String(i + 1), occupant: null })),
  };
  snapshot.accounts.set(accountId, account);
  return account;
}

/**
 * Delete an account that has no occupied slots.
 *
 * @throws ConflictError if any slot is occupied
 */
export function deleteAccount(snapshot: Snapshot, accountId: string): Account {
  const account = requireAccount(snapshot, accountId);
  const occupied = account.slots.filter((slot) => slot.occupant !== null);
  if (occupied.length > 0) {
    throw new ConflictError(
      `Account '${accountId}' still has occupied slots: ${occupied.map((slot) => slot.key).join(', ')}`
    );
  }
  snapshot.accounts.delete(accountId);
  return account;
}

// =============================================================================
// Slot Edits
// =============================================================================

/**
 * Insert empty slots. Existing or malformed keys are rejected individually.
 */
export function addSlots(snapshot: Snapshot, accountId: string, keys: readonly string[]): SlotBatchResult {
  const account = requireAccount(snapshot, accountId);
  const result: SlotBatchResult = { account: account.id, applied: [], rejected: [] };

  for (const raw of keys) {
    try {
      const key = parseSlotKey(raw);
      if (findSlot(account, key)) {
        throw new ConflictError(`Slot '${key}' already exists on '${account.id}'`);
      }
      account.slots.push({ key, occupant: null });
      result.applied.push(key);
    } catch (error) {
      if (!(error instanceof DomainError)) {
        throw error;
      }
      result.rejected.push({ key: raw, error });
    }
  }

  return result;
}

/**
 * Delete empty slots. Occupied or unknown keys are rejected individually.
 */
export function removeSlots(
  snapshot: Snapshot,
  accountId: string,
  keys: readonly string[]
): SlotBatchResult {
  const account = requireAccount(snapshot, accountId);
  const result: SlotBatchResult = { account: account.id, applied: [], rejected: [] };

  for (const raw of keys) {
    const key = raw.trim();
    const index = account.slots.findIndex((slot) => slot.key === key);
    const slot = account.slots[index];
    if (!slot) {
      result.rejected.push({ key: raw, error: new NotFoundError(`Account '${account.id}' has no slot '${key}'`) });
      continue;
    }
    if (slot.occupant !== null) {
      result.rejected.push({
        key: raw,
        error: new OccupiedError(`Slot '${key}' on '${account.id}' is held by '${slot.occupant}'`),
      });
      continue;
    }
    account.slots.splice(index, 1);
    result.applied.push(key);
  }

  return result;
}

// =============================================================================
// Occupancy
// =============================================================================

/**
 * Put a person on a slot.
 *
 * @throws NotFoundError if the account or slot does not exist
 * @throws OccupiedError if the slot is not empty
 */
export function assign(snapshot: Snapshot, accountId: string, key: SlotKey, person: string): void {
  const slot = requireSlot(requireAccount(snapshot, accountId), key);
  if (slot.occupant !== null) {
    throw new OccupiedError(`Slot '${key}' on '${accountId}' is already held by '${slot.occupant}'`);
  }
  slot.occupant = person;
}

/**
 * Empty a slot. Idempotent; unknown accounts and slots are a no-op.
 *
 * @returns True if the slot was occupied before
 */
export function free(snapshot: Snapshot, accountId: string, key: SlotKey): boolean {
  const account = snapshot.accounts.get(accountId);
  const slot = account ? findSlot(account, key) : undefined;
  if (!slot || slot.occupant === null) {
    return false;
  }
  slot.occupant = null;
  return true;
}

/**
 * Empty a slot only while it is still held by `person`.
 *
 * @returns True if the slot was freed
 */
export function freeIfHeldBy(snapshot: Snapshot, accountId: string, key: SlotKey, person: string): boolean {
  const account = snapshot.accounts.get(accountId);
  const slot = account ? findSlot(account, key) : undefined;
  if (!slot || slot.occupant !== person) {
    return false;
  }
  slot.occupant = null;
  return true;
}
