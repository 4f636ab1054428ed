/**
 * Price Catalog
 *
 * Service → { emoji, duration → price } operations on a snapshot draft.
 * Prices quoted here are copied onto subscriptions at creation and never
 * read back afterwards.
 *
 * @module packages/core/domain/catalog
 */

import { NotFoundError } from './errors.js';
import type { Service, Snapshot } from './snapshot.js';
import {
  durationDaysSchema,
  parseServiceName,
  parseWith,
  priceSchema,
} from './validation.js';

/** Emoji given to services created without one */
export const DEFAULT_SERVICE_EMOJI = '❓';

// =============================================================================
// Read Models
// =============================================================================

export interface PriceEntry {
  durationDays: number;
  price: number;
}

export interface ServiceListing {
  name: string;
  emoji: string;
  /** Sorted by duration ascending */
  prices: PriceEntry[];
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Create a service if absent. On an existing service the emoji is replaced
 * only when a non-empty value is supplied.
 */
export function upsertService(snapshot: Snapshot, name: string, emoji?: string): Service {
  const serviceName = parseServiceName(name);
  const trimmedEmoji = emoji?.trim() ?? '';

  const existing = snapshot.services.get(serviceName);
  if (existing) {
    if (trimmedEmoji) {
      existing.emoji = trimmedEmoji;
    }
    return existing;
  }

  const service: Service = {
    name: serviceName,
    emoji: trimmedEmoji || DEFAULT_SERVICE_EMOJI,
    durations: new Map(),
  };
  snapshot.services.set(serviceName, service);
  return service;
}

/**
 * Insert or overwrite the price for a duration. Creates the service when
 * this is its first price.
 *
 * @throws ValidationError if durationDays is not a positive integer or price is negative
 */
export function setPrice(
  snapshot: Snapshot,
  serviceName: string,
  durationDays: number,
  price: number
): Service {
  const days = parseWith(durationDaysSchema, durationDays);
  const amount = parseWith(priceSchema, price);
  const service = upsertService(snapshot, serviceName);
  service.durations.set(days, amount);
  return service;
}

/**
 * @throws NotFoundError if the service or the duration is not configured
 */
export function removePrice(snapshot: Snapshot, serviceName: string, durationDays: number): void {
  const service = requireService(snapshot, serviceName);
  if (!service.durations.delete(durationDays)) {
    throw new NotFoundError(`No ${durationDays}-day price configured for '${service.name}'`);
  }
}

/**
 * @throws NotFoundError if no price is configured for the pairing
 */
export function getPrice(snapshot: Snapshot, serviceName: string, durationDays: number): number {
  const service = requireService(snapshot, serviceName);
  const price = service.durations.get(durationDays);
  if (price === undefined) {
    throw new NotFoundError(`No ${durationDays}-day price configured for '${service.name}'`);
  }
  return price;
}

export function requireService(snapshot: Snapshot, serviceName: string): Service {
  const service = snapshot.services.get(serviceName);
  if (!service) {
    throw new NotFoundError(`Unknown service '${serviceName}'`);
  }
  return service;
}

/**
 * Read-only listing for display.
 */
export function listServices(snapshot: Snapshot): ServiceListing[] {
  return Array.from(snapshot.services.values(), (service) => ({
    name: service.name,
    emoji: service.emoji,
    prices: listPrices(service),
  }));
}

export function listPrices(service: Service): PriceEntry[] {
  return Array.from(service.durations, ([durationDays, price]) => ({ durationDays, price })).sort(
    (a, b) => a.durationDays - b.durationDays
  );
}
