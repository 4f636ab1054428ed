/**
 * SqliteSnapshotRepository
 *
 * better-sqlite3 backend. The snapshot document is one row of the
 * `snapshots` table; every write is a compare-and-swap on its `version`
 * column, so a second process committing in between surfaces as a
 * VERSION_CONFLICT instead of a lost update.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import type { SnapshotDocument } from '@seatshare/core/domain';
import { StoreError, StoreErrorCode } from '@seatshare/core/ports';
import { BaseSnapshotRepository, type SnapshotRepositoryOptions } from './base-snapshot-repository.js';

// =============================================================================
// Schema
// =============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS snapshots (
    id TEXT PRIMARY KEY,
    version INTEGER NOT NULL,
    document TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  )
`;

const snapshotRowSchema = z.object({
  version: z.number().int(),
  document: z.string(),
});

const DEFAULT_SNAPSHOT_ID = 'default';

// =============================================================================
// Types
// =============================================================================

export interface SqliteSnapshotRepositoryOptions extends SnapshotRepositoryOptions {
  /** Open database handle. Left open on close unless `ownsDatabase` is set. */
  db: Database.Database;
  /** Row key, to keep several snapshots in one file */
  snapshotId?: string;
  /** Close the database handle on close() */
  ownsDatabase?: boolean;
}

// =============================================================================
// Implementation
// =============================================================================

export class SqliteSnapshotRepository extends BaseSnapshotRepository {
  private readonly db: Database.Database;
  private readonly snapshotId: string;
  private readonly ownsDatabase: boolean;
  /** Version seen by the last read or write; null before the first one */
  private version: number | null = null;

  constructor(options: SqliteSnapshotRepositoryOptions) {
    super(options, 'SqliteSnapshotRepository');
    this.db = options.db;
    this.snapshotId = options.snapshotId ?? DEFAULT_SNAPSHOT_ID;
    this.ownsDatabase = options.ownsDatabase ?? false;
    this.db.exec(SCHEMA_SQL);
  }

  /** Version of the stored row as last seen by this repository */
  get currentVersion(): number | null {
    return this.version;
  }

  protected async readDocument(): Promise<unknown> {
    const row = this.readRow();
    if (!row) {
      return null;
    }
    this.version = row.version;
    try {
      const document: unknown = JSON.parse(row.document);
      return document;
    } catch (error) {
      throw new StoreError(
        `Stored snapshot '${this.snapshotId}' is not valid JSON`,
        StoreErrorCode.CORRUPT_DOCUMENT,
        { cause: error }
      );
    }
  }

  protected async writeDocument(document: SnapshotDocument): Promise<void> {
    const body = JSON.stringify(document);
    const expected = this.version ?? this.readRow()?.version ?? null;

    if (expected === null) {
      this.db
        .prepare(`INSERT INTO snapshots (id, version, document) VALUES (?, 1, ?)`)
        .run(this.snapshotId, body);
      this.version = 1;
      return;
    }

    const result = this.db
      .prepare(
        `UPDATE snapshots
         SET document = ?, version = version + 1, updated_at = datetime('now')
         WHERE id = ? AND version = ?`
      )
      .run(body, this.snapshotId, expected);

    if (result.changes === 0) {
      // Forget the stale version so the next transaction re-reads
      this.version = null;
      throw new StoreError(
        `Snapshot '${this.snapshotId}' was modified by another writer (expected version ${expected})`,
        StoreErrorCode.VERSION_CONFLICT
      );
    }

    this.version = expected + 1;
    this.log.debug({ version: this.version }, 'Snapshot written');
  }

  protected async release(): Promise<void> {
    if (this.ownsDatabase) {
      this.db.close();
    }
  }

  private readRow(): z.infer<typeof snapshotRowSchema> | null {
    const row: unknown = this.db
      .prepare(`SELECT version, document FROM snapshots WHERE id = ?`)
      .get(this.snapshotId);
    if (row === undefined) {
      return null;
    }
    const parsed = snapshotRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new StoreError(
        `Snapshot row '${this.snapshotId}' has an unexpected shape`,
        StoreErrorCode.CORRUPT_DOCUMENT
      );
    }
    return parsed.data;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Open (or create) a SQLite file and wrap it in a repository that owns it.
 */
export function createSqliteSnapshotRepository(options: {
  path: string;
  logger: SnapshotRepositoryOptions['logger'];
}): SqliteSnapshotRepository {
  const db = new Database(options.path);
  db.pragma('journal_mode = WAL');
  return new SqliteSnapshotRepository({ db, logger: options.logger, ownsDatabase: true });
}
