/**
 * BaseSnapshotRepository
 *
 * Shared transaction logic for snapshot backends. Subclasses only move raw
 * documents in and out; decoding, validation and the process-wide lock
 * live here.
 *
 * Every transaction runs under one p-limit queue with concurrency 1, so a
 * read-dependent mutation re-reads the snapshot immediately before it
 * mutates and writes before the next one starts.
 */

import pLimit from 'p-limit';
import type { Logger } from 'pino';
import {
  createEmptySnapshot,
  decodeSnapshot,
  encodeSnapshot,
  SnapshotDocumentError,
  type Snapshot,
  type SnapshotDocument,
} from '@seatshare/core/domain';
import {
  StoreError,
  StoreErrorCode,
  type ISnapshotRepository,
  type TransactionOptions,
  type TransactionWork,
} from '@seatshare/core/ports';

// =============================================================================
// Types
// =============================================================================

export interface SnapshotRepositoryOptions {
  /** Logger instance */
  logger: Logger;
}

// =============================================================================
// Implementation
// =============================================================================

export abstract class BaseSnapshotRepository implements ISnapshotRepository {
  protected readonly log: Logger;
  private readonly lock = pLimit(1);
  private closed = false;

  constructor(options: SnapshotRepositoryOptions, component: string) {
    this.log = options.logger.child({ component });
  }

  // ===========================================================================
  // Backend Hooks
  // ===========================================================================

  /**
   * @returns The stored document as plain data, or null when nothing is stored
   */
  protected abstract readDocument(): Promise<unknown>;

  protected abstract writeDocument(document: SnapshotDocument): Promise<void>;

  protected abstract release(): Promise<void>;

  // ===========================================================================
  // ISnapshotRepository
  // ===========================================================================

  async load(): Promise<Snapshot> {
    this.assertOpen();
    return this.lock(() => this.readSnapshot());
  }

  async save(snapshot: Snapshot): Promise<void> {
    this.assertOpen();
    await this.lock(() => this.writeSnapshot(snapshot));
  }

  async transaction<T>(work: TransactionWork<T>, options: TransactionOptions<T> = {}): Promise<T> {
    this.assertOpen();
    return this.lock(async () => {
      const draft = await this.readSnapshot();
      const result = await work(draft);

      if (options.commitWhen && !options.commitWhen(result)) {
        this.log.debug('Transaction finished without changes, nothing written');
        return result;
      }

      await this.writeSnapshot(draft);
      return result;
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.lock(() => this.release());
    this.log.info('Snapshot repository closed');
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError('Snapshot repository is closed', StoreErrorCode.WRITE_FAILED);
    }
  }

  private async readSnapshot(): Promise<Snapshot> {
    let raw: unknown;
    try {
      raw = await this.readDocument();
    } catch (error) {
      throw this.toStoreError(error, StoreErrorCode.READ_FAILED, 'Failed to read snapshot');
    }

    if (raw === null) {
      const empty = createEmptySnapshot();
      await this.writeSnapshot(empty);
      this.log.info('No stored snapshot found, created an empty one');
      return empty;
    }

    const warnings: string[] = [];
    let snapshot: Snapshot;
    try {
      snapshot = decodeSnapshot(raw, warnings);
    } catch (error) {
      if (error instanceof SnapshotDocumentError) {
        this.log.error({ issues: error.issues }, 'Stored snapshot is corrupt');
        throw new StoreError(error.message, StoreErrorCode.CORRUPT_DOCUMENT, { cause: error });
      }
      throw error;
    }

    if (warnings.length > 0) {
      this.log.warn({ warnings }, 'Stored snapshot has legacy values');
    }
    return snapshot;
  }

  private async writeSnapshot(snapshot: Snapshot): Promise<void> {
    try {
      await this.writeDocument(encodeSnapshot(snapshot));
    } catch (error) {
      throw this.toStoreError(error, StoreErrorCode.WRITE_FAILED, 'Failed to write snapshot');
    }
  }

  private toStoreError(error: unknown, code: StoreErrorCode, message: string): StoreError {
    const storeError =
      error instanceof StoreError
        ? error
        : new StoreError(
            `${message}: ${error instanceof Error ? error.message : String(error)}`,
            code,
            { cause: error }
          );
    this.log.error({ error: storeError.message, code: storeError.code }, message);
    return storeError;
  }
}
