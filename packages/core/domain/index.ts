/**
 * Core Domain
 *
 * Entities, errors and the pure snapshot operations. Nothing here performs
 * I/O; adapters apply these operations to a repository draft.
 */

export * from './errors.js';
export * from './dates.js';
export * from './snapshot.js';
export * from './validation.js';
export * from './document.js';

// Components
export * from './catalog.js';
export * from './slots.js';
export * from './subscriptions.js';
export * from './expiry.js';

// Conversation flows
export * from './session.js';
