/**
 * Session Responses
 *
 * What the conversation engine answers with. Gateways render these; the
 * engine never formats chat text beyond the step prompts.
 */

import type {
  Account,
  DomainErrorCode,
  FlowKind,
  FlowStep,
  InvariantViolation,
  PersonSummary,
  ServiceListing,
  SlotBatchResult,
  SnapshotDocument,
  Subscription,
  SubscriptionRef,
} from '@seatshare/core/domain';
import type { StoreErrorCode } from '@seatshare/core/ports';
import type { IncomeReport } from '../ledger/index.js';

// =============================================================================
// Building Blocks
// =============================================================================

export interface MenuOption {
  /** Button text */
  label: string;
  /** The chosen entity: a name, id, slot key, duration or index */
  value: string;
  /** Button payload, `<action>_<value>` */
  payload: string;
}

export interface ErrorInfo {
  code: DomainErrorCode | StoreErrorCode;
  message: string;
}

export interface CommandHelp {
  command: string;
  usage: string;
  description: string;
}

// =============================================================================
// Flow Outcomes
// =============================================================================

export type FlowOutcome =
  | { type: 'person_added'; person: string }
  | { type: 'person_removed'; person: string; freedSlots: number }
  | { type: 'account_added'; account: Account }
  | { type: 'account_removed'; account: string }
  | { type: 'subscription_added'; person: string; subscription: Subscription }
  | { type: 'subscription_removed'; person: string; subscription: Subscription }
  | { type: 'price_set'; service: ServiceListing; durationDays: number; price: number }
  | { type: 'price_removed'; service: string; durationDays: number };

// =============================================================================
// Command Reports
// =============================================================================

export type CommandReport =
  | { type: 'people'; people: PersonSummary[] }
  | { type: 'subscriptions'; subscriptions: SubscriptionRef[] }
  | { type: 'services'; services: ServiceListing[] }
  | { type: 'income'; income: IncomeReport }
  | { type: 'export'; document: SnapshotDocument; violations: InvariantViolation[] }
  | { type: 'slots'; operation: 'add' | 'remove'; result: SlotBatchResult }
  | { type: 'default_slots'; service: string; count: number }
  | { type: 'help'; commands: CommandHelp[] };

// =============================================================================
// Responses
// =============================================================================

export type IgnoreReason =
  | 'invalid_event'
  | 'no_session'
  | 'unexpected_text'
  | 'unexpected_button'
  | 'unexpected_command'
  | 'stale_option'
  | 'unknown_command';

export type SessionResponse =
  | {
      kind: 'menu';
      flow: FlowKind;
      step: FlowStep;
      prompt: string;
      options: MenuOption[];
    }
  | {
      kind: 'prompt';
      flow: FlowKind;
      step: FlowStep;
      prompt: string;
      /** Set when the previous answer was rejected */
      error?: string;
      /** The step accepts `skip` */
      canSkip: boolean;
    }
  | { kind: 'completed'; flow: FlowKind; outcome: FlowOutcome }
  | { kind: 'aborted'; flow: FlowKind; error: ErrorInfo }
  | { kind: 'cancelled'; flow: FlowKind | null }
  | { kind: 'main_menu'; options: MenuOption[] }
  | { kind: 'report'; command: string; report: CommandReport }
  | { kind: 'failed'; command: string; error: ErrorInfo }
  | { kind: 'ignored'; reason: IgnoreReason };
