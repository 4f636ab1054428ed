/**
 * SubscriptionLedger
 *
 * Applies the domain operations to the repository, one transaction each.
 * A failing operation leaves the stored snapshot untouched; business errors
 * propagate to the caller unchanged.
 */

import type { Logger } from 'pino';
import {
  addPerson,
  addSlots,
  createAccount,
  createSubscription,
  encodeSnapshot,
  isBusinessError,
  listPeople,
  listServices,
  listSubscriptions,
  removeAccount,
  removePerson,
  removePrice,
  removeSlots,
  removeSubscription,
  removeSubscriptionAt,
  resolveDefaultSlotCount,
  setDefaultSlots,
  setPrice,
  systemClock,
  today,
  totalIncome,
  upsertService,
  type Account,
  type Clock,
  type CreateSubscriptionRequest,
  type IsoDay,
  type Person,
  type PersonSummary,
  type ServiceListing,
  type SlotBatchResult,
  type Snapshot,
  type SnapshotDocument,
  type Subscription,
  type SubscriptionKey,
  type SubscriptionRef,
} from '@seatshare/core/domain';
import type { ISnapshotRepository, TransactionOptions } from '@seatshare/core/ports';

// =============================================================================
// Types
// =============================================================================

/** Slot count used for services without a configured default */
export const FALLBACK_DEFAULT_SLOT_COUNT = 4;

export interface SubscriptionLedgerOptions {
  /** Snapshot repository */
  repository: ISnapshotRepository;
  /** Logger instance */
  logger: Logger;
  /** Source of "today" (default: system clock) */
  clock?: Clock;
  /** Slot count for services with no default configured (default: 4) */
  defaultSlotCount?: number;
}

export interface SetPriceRequest {
  service: string;
  durationDays: number;
  price: number;
  /** Empty or undefined keeps the current emoji */
  emoji?: string;
}

export interface IncomeReport {
  total: number;
  subscriptionCount: number;
}

// =============================================================================
// Implementation
// =============================================================================

export class SubscriptionLedger {
  private readonly repository: ISnapshotRepository;
  private readonly log: Logger;
  private readonly clock: Clock;
  readonly defaultSlotCount: number;

  constructor(options: SubscriptionLedgerOptions) {
    this.repository = options.repository;
    this.log = options.logger.child({ component: 'SubscriptionLedger' });
    this.clock = options.clock ?? systemClock;
    this.defaultSlotCount = options.defaultSlotCount ?? FALLBACK_DEFAULT_SLOT_COUNT;
  }

  /** Current UTC day according to the ledger's clock */
  today(): IsoDay {
    return today(this.clock);
  }

  // ===========================================================================
  // People
  // ===========================================================================

  async addPerson(name: string): Promise<Person> {
    return this.apply('addPerson', { person: name }, (draft, day) => addPerson(draft, name, day));
  }

  /**
   * @returns Number of slots freed
   */
  async removePerson(name: string): Promise<number> {
    return this.apply('removePerson', { person: name }, (draft) => removePerson(draft, name));
  }

  // ===========================================================================
  // Accounts and Slots
  // ===========================================================================

  /**
   * Create an account with the service's default slot count.
   */
  async createAccount(id: string, service: string): Promise<Account> {
    return this.apply('createAccount', { account: id, service }, (draft) =>
      createAccount(draft, id, service, resolveDefaultSlotCount(draft, service, this.defaultSlotCount))
    );
  }

  async removeAccount(id: string): Promise<void> {
    await this.apply('removeAccount', { account: id }, (draft) => removeAccount(draft, id));
  }

  /**
   * Partial success is committed; rejected keys are reported in the result.
   */
  async addSlots(account: string, keys: readonly string[]): Promise<SlotBatchResult> {
    return this.apply('addSlots', { account, keys }, (draft) => addSlots(draft, account, keys), {
      commitWhen: (result) => result.applied.length > 0,
    });
  }

  async removeSlots(account: string, keys: readonly string[]): Promise<SlotBatchResult> {
    return this.apply('removeSlots', { account, keys }, (draft) => removeSlots(draft, account, keys), {
      commitWhen: (result) => result.applied.length > 0,
    });
  }

  async setDefaultSlots(service: string, count: number): Promise<number> {
    return this.apply('setDefaultSlots', { service, count }, (draft) =>
      setDefaultSlots(draft, service, count)
    );
  }

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  async createSubscription(request: CreateSubscriptionRequest): Promise<Subscription> {
    return this.apply('createSubscription', { ...request }, (draft, day) =>
      createSubscription(draft, request, day)
    );
  }

  async removeSubscription(person: string, index: number): Promise<Subscription> {
    return this.apply('removeSubscription', { person, index }, (draft, day) =>
      removeSubscription(draft, person, index, day)
    );
  }

  /**
   * Remove the subscription `person` holds on `key`, resolved inside the
   * transaction.
   */
  async removeSubscriptionAt(person: string, key: SubscriptionKey): Promise<Subscription> {
    return this.apply('removeSubscription', { person, ...key }, (draft, day) =>
      removeSubscriptionAt(draft, person, key, day)
    );
  }

  // ===========================================================================
  // Catalog
  // ===========================================================================

  /**
   * Upsert the service (emoji) and its price in one transaction.
   */
  async setPrice(request: SetPriceRequest): Promise<ServiceListing> {
    return this.apply(
      'setPrice',
      { service: request.service, durationDays: request.durationDays, price: request.price },
      (draft) => {
        const service = upsertService(draft, request.service, request.emoji);
        setPrice(draft, service.name, request.durationDays, request.price);
        const listing = listServices(draft).find((entry) => entry.name === service.name);
        return listing ?? { name: service.name, emoji: service.emoji, prices: [] };
      }
    );
  }

  async removePrice(service: string, durationDays: number): Promise<void> {
    await this.apply('removePrice', { service, durationDays }, (draft) =>
      removePrice(draft, service, durationDays)
    );
  }

  // ===========================================================================
  // Read Models
  // ===========================================================================

  /**
   * Fresh read of the stored snapshot. Mutating it has no effect on the store.
   */
  async snapshot(): Promise<Snapshot> {
    return this.repository.load();
  }

  async listPeople(): Promise<PersonSummary[]> {
    return listPeople(await this.repository.load());
  }

  async listSubscriptions(): Promise<SubscriptionRef[]> {
    return listSubscriptions(await this.repository.load());
  }

  async listServices(): Promise<ServiceListing[]> {
    return listServices(await this.repository.load());
  }

  async income(): Promise<IncomeReport> {
    const snapshot = await this.repository.load();
    return {
      total: totalIncome(snapshot),
      subscriptionCount: listSubscriptions(snapshot).length,
    };
  }

  async exportDocument(): Promise<SnapshotDocument> {
    return encodeSnapshot(await this.repository.load());
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async apply<T>(
    operation: string,
    context: Record<string, unknown>,
    work: (draft: Snapshot, day: IsoDay) => T,
    options?: TransactionOptions<T>
  ): Promise<T> {
    const day = this.today();
    try {
      const result = await this.repository.transaction((draft) => work(draft, day), options);
      this.log.info({ operation, ...context }, 'Ledger operation applied');
      return result;
    } catch (error) {
      if (isBusinessError(error)) {
        this.log.debug(
          { operation, ...context, code: error.code, reason: error.message },
          'Ledger operation rejected'
        );
      }
      throw error;
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createSubscriptionLedger(options: SubscriptionLedgerOptions): SubscriptionLedger {
  return new SubscriptionLedger(options);
}
