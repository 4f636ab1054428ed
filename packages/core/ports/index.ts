/**
 * Core Ports
 *
 * Contracts between the domain and its adapters.
 */

// Snapshot Repository Interface
export * from './snapshot-repository.js';

// Session Store Interface
export * from './session-store.js';
