/**
 * Snapshot Storage Adapters
 */

export {
  BaseSnapshotRepository,
  type SnapshotRepositoryOptions,
} from './base-snapshot-repository.js';

export {
  SqliteSnapshotRepository,
  createSqliteSnapshotRepository,
  type SqliteSnapshotRepositoryOptions,
} from './sqlite-snapshot-repository.js';

export {
  JsonFileSnapshotRepository,
  type JsonFileSnapshotRepositoryOptions,
} from './json-file-snapshot-repository.js';
