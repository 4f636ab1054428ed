/**
 * JsonFileSnapshotRepository
 *
 * Stores the snapshot document as pretty-printed JSON in a single file.
 * Writes go to a temporary sibling first and are renamed over the target,
 * so readers never see a partial document.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { SnapshotDocument } from '@seatshare/core/domain';
import { StoreError, StoreErrorCode } from '@seatshare/core/ports';
import { BaseSnapshotRepository, type SnapshotRepositoryOptions } from './base-snapshot-repository.js';

export interface JsonFileSnapshotRepositoryOptions extends SnapshotRepositoryOptions {
  /** Path of the JSON document */
  path: string;
}

export class JsonFileSnapshotRepository extends BaseSnapshotRepository {
  private readonly path: string;

  constructor(options: JsonFileSnapshotRepositoryOptions) {
    super(options, 'JsonFileSnapshotRepository');
    this.path = options.path;
  }

  protected async readDocument(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    try {
      const document: unknown = JSON.parse(text);
      return document;
    } catch (error) {
      throw new StoreError(`${this.path} is not valid JSON`, StoreErrorCode.CORRUPT_DOCUMENT, {
        cause: error,
      });
    }
  }

  protected async writeDocument(document: SnapshotDocument): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });
    try {
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
    this.log.debug({ path: this.path }, 'Snapshot written');
  }

  protected async release(): Promise<void> {
    // Nothing held open between operations
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
