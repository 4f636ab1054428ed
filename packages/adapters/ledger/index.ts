/**
 * Ledger Services
 *
 * Transactional application of domain operations to the snapshot store.
 */

export {
  SubscriptionLedger,
  createSubscriptionLedger,
  FALLBACK_DEFAULT_SLOT_COUNT,
  type SubscriptionLedgerOptions,
  type SetPriceRequest,
  type IncomeReport,
} from './subscription-ledger.js';

export {
  ExpiryReaper,
  createExpiryReaper,
  type ExpiryReaperOptions,
} from './expiry-reaper.js';
