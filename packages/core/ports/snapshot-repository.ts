/**
 * ISnapshotRepository Interface
 *
 * Port for whole-snapshot persistence. The snapshot is loaded and replaced
 * as one unit; `transaction` is the only way mutations should reach it.
 */

import type { Snapshot } from '../domain/snapshot.js';

// =============================================================================
// Errors
// =============================================================================

export enum StoreErrorCode {
  READ_FAILED = 'READ_FAILED',
  WRITE_FAILED = 'WRITE_FAILED',
  CORRUPT_DOCUMENT = 'CORRUPT_DOCUMENT',
  /** Another writer committed since this transaction read */
  VERSION_CONFLICT = 'VERSION_CONFLICT',
}

/**
 * Backend fault. The last persisted snapshot stays authoritative.
 */
export class StoreError extends Error {
  readonly code: StoreErrorCode;

  constructor(message: string, code: StoreErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
  }
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * Mutates the draft. Resolving commits the draft, throwing discards it.
 */
export type TransactionWork<T> = (draft: Snapshot) => T | Promise<T>;

export interface TransactionOptions<T> {
  /**
   * Skip the write when this returns false. The result is still returned.
   * Used by the expiry sweep to persist only when something changed.
   */
  commitWhen?: (result: T) => boolean;
}

// =============================================================================
// ISnapshotRepository Interface
// =============================================================================

export interface ISnapshotRepository {
  /**
   * Read the persisted snapshot. Creates and persists an empty one when the
   * store has none yet.
   *
   * @throws StoreError READ_FAILED or CORRUPT_DOCUMENT
   */
  load(): Promise<Snapshot>;

  /**
   * Replace the persisted snapshot entirely.
   *
   * @throws StoreError WRITE_FAILED or VERSION_CONFLICT
   */
  save(snapshot: Snapshot): Promise<void>;

  /**
   * Serialized read-modify-write. `work` receives a deep clone of the current
   * snapshot; no other transaction runs in this process until it settles.
   */
  transaction<T>(work: TransactionWork<T>, options?: TransactionOptions<T>): Promise<T>;

  /**
   * Wait for pending transactions and release the backend.
   */
  close(): Promise<void>;
}
