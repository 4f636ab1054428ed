/**
 * Telegram Rendering
 *
 * Turns conversation engine responses into message text and inline
 * keyboards. Plain text only, so user-supplied names need no escaping.
 */

import { InlineKeyboard } from 'grammy';
import { formatPrice, type CommandReport, type FlowOutcome, type MenuOption, type SessionResponse } from '@seatshare/adapters/session';
import { ButtonAction } from '@seatshare/core/domain';

// =============================================================================
// Types
// =============================================================================

export interface RenderedReply {
  text: string;
  keyboard?: InlineKeyboard;
  /** Sent as a file with `text` as its caption */
  document?: {
    filename: string;
    content: string;
  };
}

export const EXPORT_FILENAME = 'subscriptions.json';

const CANCEL_LABEL = '❌ Cancel';
const SKIP_LABEL = '⏭ Skip';

// =============================================================================
// Responses
// =============================================================================

/**
 * @returns The reply to send, or null when the event is silently ignored
 */
export function renderResponse(response: SessionResponse): RenderedReply | null {
  switch (response.kind) {
    case 'menu':
      return { text: response.prompt, keyboard: optionKeyboard(response.options, true) };

    case 'prompt': {
      const rows = response.canSkip ? [[InlineKeyboard.text(SKIP_LABEL, ButtonAction.SKIP)]] : [];
      return {
        text: response.error ? `⚠️ ${response.error}\n${response.prompt}` : response.prompt,
        keyboard: InlineKeyboard.from([...rows, [InlineKeyboard.text(CANCEL_LABEL, ButtonAction.CANCEL)]]),
      };
    }

    case 'completed':
      return { text: `✅ ${describeOutcome(response.outcome)}` };

    case 'aborted':
    case 'failed':
      return { text: `❌ ${response.error.message}` };

    case 'cancelled':
      return { text: response.flow ? 'Operation cancelled.' : 'Nothing to cancel.' };

    case 'main_menu':
      return { text: 'What would you like to do?', keyboard: optionKeyboard(response.options, false) };

    case 'report':
      return renderReport(response.report);

    case 'ignored':
      return null;
  }
}

function optionKeyboard(options: MenuOption[], cancellable: boolean): InlineKeyboard {
  const rows = options.map((option) => [InlineKeyboard.text(option.label, option.payload)]);
  if (cancellable) {
    rows.push([InlineKeyboard.text(CANCEL_LABEL, ButtonAction.CANCEL)]);
  }
  return InlineKeyboard.from(rows);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function describeOutcome(outcome: FlowOutcome): string {
  switch (outcome.type) {
    case 'person_added':
      return `Added ${outcome.person}.`;
    case 'person_removed':
      return `Removed ${outcome.person} and freed ${plural(outcome.freedSlots, 'slot')}.`;
    case 'account_added':
      return `Created account ${outcome.account.id} for ${outcome.account.service ?? 'no service'} with ${plural(outcome.account.slots.length, 'slot')}.`;
    case 'account_removed':
      return `Removed account ${outcome.account}.`;
    case 'subscription_added': {
      const { subscription: sub } = outcome;
      return `${outcome.person} now holds slot ${sub.slot} on ${sub.account} (${sub.service}) until ${sub.endDate} for ${formatPrice(sub.price)}.`;
    }
    case 'subscription_removed': {
      const { subscription: sub } = outcome;
      return `Removed ${outcome.person}'s ${sub.service} subscription on ${sub.account} slot ${sub.slot}.`;
    }
    case 'price_set':
      return `${outcome.service.emoji} ${outcome.service.name}: ${outcome.durationDays} days now cost ${formatPrice(outcome.price)}.`;
    case 'price_removed':
      return `Removed the ${outcome.durationDays}-day price of ${outcome.service}.`;
  }
}

// =============================================================================
// Reports
// =============================================================================

function renderReport(report: CommandReport): RenderedReply {
  switch (report.type) {
    case 'people': {
      if (report.people.length === 0) {
        return { text: 'No people yet.' };
      }
      const lines = report.people.flatMap((person) => [
        `👤 ${person.name}`,
        ...person.subscriptions.map(
          (sub) => `  • ${sub.service} · ${sub.account} slot ${sub.slot} · until ${sub.endDate} · ${formatPrice(sub.price)}`
        ),
      ]);
      return { text: lines.join('\n') };
    }

    case 'subscriptions':
      if (report.subscriptions.length === 0) {
        return { text: 'No subscriptions.' };
      }
      return {
        text: report.subscriptions
          .map(
            ({ person, subscription: sub }) =>
              `${person}: ${sub.service} · ${sub.account} slot ${sub.slot} · until ${sub.endDate}`
          )
          .join('\n'),
      };

    case 'services':
      if (report.services.length === 0) {
        return { text: 'No services defined.' };
      }
      return {
        text: report.services
          .map((service) => {
            const prices = service.prices.map(({ durationDays, price }) => `${durationDays}d ${formatPrice(price)}`);
            return `${service.emoji} ${service.name}: ${prices.length > 0 ? prices.join(', ') : 'no prices'}`;
          })
          .join('\n'),
      };

    case 'income':
      return {
        text: `💰 Total income: ${formatPrice(report.income.total)} from ${plural(report.income.subscriptionCount, 'subscription')}.`,
      };

    case 'export': {
      const people = Object.keys(report.document.people).length;
      const accounts = Object.keys(report.document.accounts).length;
      const lines = [`Export of ${people} ${people === 1 ? 'person' : 'people'} and ${plural(accounts, 'account')}.`];
      if (report.violations.length > 0) {
        lines.push(`⚠️ ${plural(report.violations.length, 'consistency problem')}:`);
        lines.push(...report.violations.map((violation) => `  • ${violation.message}`));
      }
      return {
        text: lines.join('\n'),
        document: { filename: EXPORT_FILENAME, content: JSON.stringify(report.document, null, 2) },
      };
    }

    case 'slots': {
      const { result } = report;
      const verb = report.operation === 'add' ? 'added to' : 'removed from';
      const lines = [
        result.applied.length > 0
          ? `Slots ${verb} ${result.account}: ${result.applied.join(', ')}`
          : `No slots ${verb} ${result.account}.`,
        ...result.rejected.map(({ key, error }) => `  • ${key}: ${error.message}`),
      ];
      return { text: lines.join('\n') };
    }

    case 'default_slots':
      return { text: `New ${report.service} accounts will get ${plural(report.count, 'slot')}.` };

    case 'help':
      return { text: report.commands.map((entry) => `${entry.usage} - ${entry.description}`).join('\n') };
  }
}
