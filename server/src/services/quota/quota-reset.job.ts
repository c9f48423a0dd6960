/**
 * Daily Quota Reset Job
 * At a configured UTC time, restores every known free-tier user to the default allotment.
 */

import type { Logger } from '../../lib/logger/structured-logger.js';
import type { QuotaStore } from './quota-store.interface.js';
import type { QuotaService } from './quota.service.js';

export interface QuotaResetJobOptions {
  /** HH:MM, UTC */
  resetAtUtc: string;
  batchSize: number;
}

export interface ResetSummary {
  total: number;
  reset: number;
  failed: number;
  aborted: boolean;
}

/**
 * Milliseconds from `now` until the next HH:MM in UTC (strictly in the future)
 */
export function msUntilNextReset(resetAtUtc: string, now: Date): number {
  const [hours = 0, minutes = 0] = resetAtUtc.split(':').map(part => Number.parseInt(part, 10));
  const next = new Date(Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate(),
    hours,
    minutes
  ));
  if (next.getTime() <= now.getTime()) {
    next.setUTCDate(next.getUTCDate() + 1);
  }
  return next.getTime() - now.getTime();
}

export class QuotaResetJob {
  private timer: NodeJS.Timeout | null = null;
  private readonly controller = new AbortController();

  constructor(
    private readonly store: QuotaStore,
    private readonly quota: QuotaService,
    private readonly options: QuotaResetJobOptions,
    private readonly log: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  start(): void {
    if (this.timer || this.controller.signal.aborted) return;
    this.scheduleNext();
    this.log.info({ event: 'quota_reset_scheduled', resetAtUtc: this.options.resetAtUtc }, '[QuotaReset] Daily reset scheduled');
  }

  stop(): void {
    this.controller.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private scheduleNext(): void {
    const delay = msUntilNextReset(this.options.resetAtUtc, this.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runOnce(this.controller.signal)
        .catch(err => {
          this.log.error({
            event: 'quota_reset_failed',
            error: err instanceof Error ? err.message : String(err)
          }, '[QuotaReset] Reset run failed');
        })
        .finally(() => {
          if (!this.controller.signal.aborted) this.scheduleNext();
        });
    }, delay);
    this.timer.unref();
  }

  /**
   * Reset every known user, in batches. Stops between batches when aborted.
   */
  async runOnce(signal?: AbortSignal): Promise<ResetSummary> {
    const userIds = await this.store.listUserIds();
    const summary: ResetSummary = { total: userIds.length, reset: 0, failed: 0, aborted: false };

    this.log.info({ event: 'quota_reset_started', users: userIds.length }, '[QuotaReset] Starting reset');

    for (let i = 0; i < userIds.length; i += this.options.batchSize) {
      if (signal?.aborted) {
        summary.aborted = true;
        break;
      }

      const batch = userIds.slice(i, i + this.options.batchSize);
      const results = await Promise.allSettled(batch.map(userId => this.quota.resetUser(userId)));

      results.forEach((result, index) => {
        if (result.status === 'fulfilled') {
          summary.reset++;
          return;
        }
        summary.failed++;
        this.log.warn({
          event: 'quota_reset_user_failed',
          userId: batch[index],
          error: result.reason instanceof Error ? result.reason.message : String(result.reason)
        }, '[QuotaReset] User reset failed');
      });
    }

    this.log.info({ event: 'quota_reset_completed', ...summary }, '[QuotaReset] Reset completed');
    return summary;
  }
}
