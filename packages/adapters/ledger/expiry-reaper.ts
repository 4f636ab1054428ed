/**
 * ExpiryReaper
 *
 * Runs the expiry sweep inside one repository transaction and writes only
 * when the sweep changed something. Runs at startup and optionally on a
 * fixed interval.
 */

import type { Logger } from 'pino';
import {
  DEFAULT_EXPIRY_POLICY,
  sweepExpired,
  systemClock,
  today,
  type Clock,
  type ExpiryPolicy,
  type ExpirySweepReport,
} from '@seatshare/core/domain';
import type { ISnapshotRepository } from '@seatshare/core/ports';

// =============================================================================
// Types
// =============================================================================

export interface ExpiryReaperOptions {
  /** Snapshot repository */
  repository: ISnapshotRepository;
  /** Logger instance */
  logger: Logger;
  /** Source of "today" (default: system clock) */
  clock?: Clock;
  /** Retention and inactivity thresholds (default: 60 / 10 days) */
  policy?: ExpiryPolicy;
  /** Interval between scheduled runs; 0 disables the timer (default: 0) */
  intervalMinutes?: number;
}

// =============================================================================
// Implementation
// =============================================================================

export class ExpiryReaper {
  private readonly repository: ISnapshotRepository;
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly policy: ExpiryPolicy;
  private readonly intervalMinutes: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ExpiryReaperOptions) {
    this.repository = options.repository;
    this.log = options.logger.child({ component: 'ExpiryReaper' });
    this.clock = options.clock ?? systemClock;
    this.policy = options.policy ?? DEFAULT_EXPIRY_POLICY;
    this.intervalMinutes = options.intervalMinutes ?? 0;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Sweep once. Integrity problems are logged and do not stop the sweep.
   */
  async run(): Promise<ExpirySweepReport> {
    const day = today(this.clock);
    const report = await this.repository.transaction(
      (draft) => sweepExpired(draft, day, this.policy),
      { commitWhen: (result) => result.changed }
    );

    for (const error of report.integrityErrors) {
      this.log.warn(
        { person: error.person, field: error.field, value: error.value, subscriptionIndex: error.subscriptionIndex },
        error.message
      );
    }

    if (report.changed) {
      this.log.info(
        {
          today: day,
          expired: report.expired.length,
          removedPeople: report.removedPeople,
        },
        'Expiry sweep removed stale records'
      );
    } else {
      this.log.debug({ today: day }, 'Expiry sweep found nothing to remove');
    }

    return report;
  }

  /**
   * Schedule periodic sweeps. No-op when the interval is 0 or a timer is
   * already running.
   */
  start(): void {
    if (this.intervalMinutes <= 0 || this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.run().catch((error: unknown) => {
        this.log.error({ error }, 'Scheduled expiry sweep failed');
      });
    }, this.intervalMinutes * 60_000);

    if (this.timer.unref) {
      this.timer.unref();
    }

    this.log.info({ intervalMinutes: this.intervalMinutes }, 'Expiry sweep scheduled');
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.log.info('Expiry sweep stopped');
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createExpiryReaper(options: ExpiryReaperOptions): ExpiryReaper {
  return new ExpiryReaper(options);
}
