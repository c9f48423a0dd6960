/**
 * Quota Service (admission controller)
 * Composes the entitlement oracle and the quota store into one
 * "may this request proceed, and if so charge it" decision.
 *
 * Every failure path denies. Nothing here ever grants on error.
 */

import type { Logger } from '../../lib/logger/structured-logger.js';
import { withTimeout } from '../../lib/reliability/timeout-guard.js';
import type { EntitlementClaims, EntitlementOracle } from './entitlement.service.js';
import type { QuotaStore } from './quota-store.interface.js';

export interface QuotaServiceOptions {
  defaultFreeQuota: number;
  operationTimeoutMs: number;
}

export type AdmissionDecision =
  | { granted: true; premium: boolean; remaining: number | null; limit: number }
  | { granted: false; reason: 'exhausted' | 'system_error'; remaining: number; limit: number };

export interface QuotaStatus {
  /** null: unlimited */
  remaining: number | null;
  limit: number;
  premium: boolean;
}

export interface QuotaSnapshot {
  granted: number;
  premiumGranted: number;
  denied: number;
  systemErrors: number;
  usersAtZeroQuota: number;
  timestamp: string;
}

/**
 * Counters owned by the admission controller. Other components read them
 * only through snapshot().
 */
class QuotaCounters {
  private granted = 0;
  private premiumGranted = 0;
  private denied = 0;
  private systemErrors = 0;
  private readonly atZero = new Set<string>();

  recordGrant(premium: boolean): void {
    if (premium) this.premiumGranted++;
    else this.granted++;
  }

  recordDenied(): void {
    this.denied++;
  }

  recordSystemError(): void {
    this.systemErrors++;
  }

  observeRemaining(userId: string, remaining: number): void {
    if (remaining <= 0) this.atZero.add(userId);
    else this.atZero.delete(userId);
  }

  snapshot(): QuotaSnapshot {
    return {
      granted: this.granted,
      premiumGranted: this.premiumGranted,
      denied: this.denied,
      systemErrors: this.systemErrors,
      usersAtZeroQuota: this.atZero.size,
      timestamp: new Date().toISOString()
    };
  }
}

export class QuotaService {
  private readonly counters = new QuotaCounters();

  constructor(
    private readonly store: QuotaStore,
    private readonly entitlement: EntitlementOracle,
    private readonly options: QuotaServiceOptions,
    private readonly log: Logger
  ) {}

  get defaultFreeQuota(): number {
    return this.options.defaultFreeQuota;
  }

  /**
   * Create the user's record with the default allotment if absent and not premium.
   * Safe to call redundantly.
   */
  async initializeIfNeeded(userId: string, claims?: EntitlementClaims): Promise<void> {
    const existing = await this.store.get(userId);
    if (existing !== null) return;

    if (await this.entitlement.isPremium(userId, claims)) return;

    await this.store.set(userId, this.options.defaultFreeQuota);
    this.log.info({
      event: 'quota_initialized',
      userId,
      credits: this.options.defaultFreeQuota
    }, '[Quota] Initialized free-tier quota');
  }

  /**
   * Charge `amount` credits. Premium users pass without touching the store.
   */
  async tryConsume(userId: string, amount = 1, claims?: EntitlementClaims): Promise<boolean> {
    try {
      if (await this.entitlement.isPremium(userId, claims)) {
        return true;
      }
      return await this.store.compareExchangeConsume(userId, amount);
    } catch (err) {
      this.log.error({
        event: 'quota_consume_error',
        userId,
        amount,
        error: err instanceof Error ? err.message : String(err)
      }, '[Quota] Consume failed, denying');
      return false;
    }
  }

  /**
   * Remaining credits; 0 when unknown
   */
  async getRemaining(userId: string): Promise<number> {
    try {
      return (await this.store.get(userId)) ?? 0;
    } catch (err) {
      this.log.warn({
        event: 'quota_read_error',
        userId,
        error: err instanceof Error ? err.message : String(err)
      }, '[Quota] Read failed, reporting 0');
      return 0;
    }
  }

  /**
   * Full admission step: initialize, then charge one credit, all under one deadline.
   * A timeout or backend failure is a denial with reason 'system_error'.
   */
  async admit(userId: string, claims?: EntitlementClaims): Promise<AdmissionDecision> {
    const limit = this.options.defaultFreeQuota;

    try {
      return await withTimeout(this.admitUnbounded(userId, limit, claims), this.options.operationTimeoutMs, 'quota_admit');
    } catch (err) {
      this.counters.recordSystemError();
      this.log.error({
        event: 'quota_admission_system_error',
        userId,
        error: err instanceof Error ? err.message : String(err)
      }, '[Quota] Admission failed closed');
      return { granted: false, reason: 'system_error', remaining: 0, limit };
    }
  }

  private async admitUnbounded(userId: string, limit: number, claims?: EntitlementClaims): Promise<AdmissionDecision> {
    if (await this.entitlement.isPremium(userId, claims)) {
      this.counters.recordGrant(true);
      return { granted: true, premium: true, remaining: null, limit };
    }

    await this.initializeIfNeeded(userId, claims);

    const granted = await this.store.compareExchangeConsume(userId, 1);
    const remaining = await this.getRemaining(userId);
    this.counters.observeRemaining(userId, remaining);

    if (!granted) {
      this.counters.recordDenied();
      this.log.info({ event: 'quota_denied', userId, remaining }, '[Quota] Quota exhausted');
      return { granted: false, reason: 'exhausted', remaining, limit };
    }

    this.counters.recordGrant(false);
    return { granted: true, premium: false, remaining, limit };
  }

  /**
   * Read-only view for the caller. A user without a record yet still has
   * the full default allotment. Store errors propagate.
   */
  async describe(userId: string, claims?: EntitlementClaims): Promise<QuotaStatus> {
    const limit = this.options.defaultFreeQuota;
    if (await this.entitlement.isPremium(userId, claims)) {
      return { remaining: null, limit, premium: true };
    }
    const stored = await withTimeout(this.store.get(userId), this.options.operationTimeoutMs, 'quota_read');
    return { remaining: stored ?? limit, limit, premium: false };
  }

  /**
   * Restore the default allotment (daily reset)
   */
  async resetUser(userId: string): Promise<void> {
    await this.store.set(userId, this.options.defaultFreeQuota);
    this.counters.observeRemaining(userId, this.options.defaultFreeQuota);
  }

  getQuotaSnapshot(): QuotaSnapshot {
    return this.counters.snapshot();
  }
}
