/**
 * Snapshot Document Codec
 *
 * The persisted, format-agnostic layout of a snapshot:
 *
 *   people:        name → { subscriptions: [{ service, account, slot, duration, end_date, price }], last_active }
 *   accounts:      id → { service, slots: key → occupant | null }
 *   services:      name → { emoji, durations: days → price }
 *   default_slots: service → count
 *
 * Documents written by older versions are accepted: numeric slot keys are
 * turned into strings, `default_slots` and `last_active` may be missing, and
 * a subscription price stored as text ("N/A" when no price was configured)
 * is read as a number, or 0 when it is not one, with a warning.
 *
 * @module packages/core/domain/document
 */

import { z } from 'zod';
import type { Snapshot } from './snapshot.js';

// =============================================================================
// Schema
// =============================================================================

const subscriptionDocumentSchema = z.object({
  service: z.string(),
  account: z.string(),
  slot: z.union([z.string(), z.number()]).transform(String),
  duration: z.number().int().positive(),
  // Kept as a raw string: unparsable dates are reported by the sweep, not rejected here
  end_date: z.string(),
  price: z.union([z.number().nonnegative(), z.string()]),
});

const personDocumentSchema = z.object({
  subscriptions: z.array(subscriptionDocumentSchema).default([]),
  last_active: z.string().nullable().optional(),
});

const accountDocumentSchema = z.object({
  service: z.string().nullable().default(null),
  slots: z.record(z.string().nullable()).default({}),
});

const serviceDocumentSchema = z.object({
  emoji: z.string(),
  durations: z.record(z.number().nonnegative()).default({}),
});

export const snapshotDocumentSchema = z.object({
  people: z.record(personDocumentSchema).default({}),
  accounts: z.record(accountDocumentSchema).default({}),
  services: z.record(serviceDocumentSchema).default({}),
  default_slots: z.record(z.number().int().nonnegative()).default({}),
});

/** Document as read (legacy shapes allowed) */
export type SnapshotDocumentInput = z.input<typeof snapshotDocumentSchema>;

/** Document as written */
export type SnapshotDocument = z.output<typeof snapshotDocumentSchema>;

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when a stored document does not match the layout.
 */
export class SnapshotDocumentError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Snapshot document is invalid: ${issues.join('; ')}`);
    this.name = 'SnapshotDocumentError';
    this.issues = issues;
  }
}

// =============================================================================
// Codec
// =============================================================================

/**
 * Convert a snapshot to its document layout.
 */
export function encodeSnapshot(snapshot: Snapshot): SnapshotDocument {
  const document: SnapshotDocument = { people: {}, accounts: {}, services: {}, default_slots: {} };

  for (const person of snapshot.people.values()) {
    document.people[person.name] = {
      subscriptions: person.subscriptions.map((sub) => ({
        service: sub.service,
        account: sub.account,
        slot: sub.slot,
        duration: sub.durationDays,
        end_date: sub.endDate,
        price: sub.price,
      })),
      last_active: person.lastActiveDate,
    };
  }

  for (const account of snapshot.accounts.values()) {
    document.accounts[account.id] = {
      service: account.service,
      slots: Object.fromEntries(account.slots.map((slot) => [slot.key, slot.occupant])),
    };
  }

  for (const service of snapshot.services.values()) {
    document.services[service.name] = {
      emoji: service.emoji,
      durations: Object.fromEntries(
        Array.from(service.durations, ([days, price]) => [String(days), price])
      ),
    };
  }

  for (const [service, count] of snapshot.defaultSlots) {
    document.default_slots[service] = count;
  }

  return document;
}

/**
 * Read a legacy text price. Anything that is not a non-negative number is 0.
 */
function readLegacyPrice(value: string, path: string, warnings: string[]): number {
  const price = value.trim() === '' ? Number.NaN : Number(value);
  if (Number.isFinite(price) && price >= 0) {
    return price;
  }
  warnings.push(`${path}: price ${JSON.stringify(value)} read as 0`);
  return 0;
}

/**
 * Validate and convert a stored document.
 *
 * @param warnings Receives one entry per legacy value that had to be replaced
 * @throws SnapshotDocumentError if the document does not match the layout
 */
export function decodeSnapshot(raw: unknown, warnings: string[] = []): Snapshot {
  const parsed = snapshotDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotDocumentError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  const document = parsed.data;
  const snapshot: Snapshot = {
    people: new Map(),
    accounts: new Map(),
    services: new Map(),
    defaultSlots: new Map(Object.entries(document.default_slots)),
  };

  for (const [name, person] of Object.entries(document.people)) {
    snapshot.people.set(name, {
      name,
      subscriptions: person.subscriptions.map((sub, index) => ({
        service: sub.service,
        account: sub.account,
        slot: sub.slot,
        durationDays: sub.duration,
        endDate: sub.end_date,
        price:
          typeof sub.price === 'number'
            ? sub.price
            : readLegacyPrice(sub.price, `people.${name}.subscriptions.${index}.price`, warnings),
      })),
      lastActiveDate: person.last_active ?? null,
    });
  }

  for (const [id, account] of Object.entries(document.accounts)) {
    snapshot.accounts.set(id, {
      id,
      service: account.service,
      slots: Object.entries(account.slots).map(([key, occupant]) => ({ key, occupant })),
    });
  }

  for (const [name, service] of Object.entries(document.services)) {
    const durations = new Map<number, number>();
    for (const [days, price] of Object.entries(service.durations)) {
      const durationDays = Number(days);
      if (!Number.isInteger(durationDays) || durationDays <= 0) {
        throw new SnapshotDocumentError([`services.${name}.durations.${days}: not a positive integer`]);
      }
      durations.set(durationDays, price);
    }
    snapshot.services.set(name, { name, emoji: service.emoji, durations });
  }

  return snapshot;
}

/**
 * Serialize a snapshot for export or file storage.
 */
export function serializeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify(encodeSnapshot(snapshot), null, 2);
}
