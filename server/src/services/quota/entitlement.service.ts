/**
 * Entitlement Oracle
 * Answers whether a user currently holds unlimited (premium) access.
 * Missing or ambiguous signals resolve to false.
 */

import type { Logger } from '../../lib/logger/structured-logger.js';

/** Verified token claims relevant to entitlement */
export interface EntitlementClaims {
  subscription?: string;
  roles?: readonly string[];
}

export type SubscriptionStatus = 'active' | 'trialing' | 'grace' | 'past_due' | 'canceled' | 'expired';

export interface Subscription {
  userId: string;
  plan: string;
  status: SubscriptionStatus;
  currentPeriodEndsAt: number;
}

export interface SubscriptionLookup {
  getActiveSubscription(userId: string): Promise<Subscription | null>;
}

export interface EntitlementOracle {
  isPremium(userId: string, claims?: EntitlementClaims): Promise<boolean>;
}

const ENTITLED_STATUSES: ReadonlySet<SubscriptionStatus> = new Set(['active', 'trialing', 'grace']);
const PREMIUM = 'premium';

export function claimsGrantPremium(claims: EntitlementClaims | undefined): boolean {
  if (!claims) return false;
  if (claims.subscription?.toLowerCase() === PREMIUM) return true;
  return claims.roles?.some(role => role.toLowerCase() === PREMIUM) ?? false;
}

export class EntitlementService implements EntitlementOracle {
  constructor(
    private readonly subscriptions: SubscriptionLookup | null,
    private readonly log: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async isPremium(userId: string, claims?: EntitlementClaims): Promise<boolean> {
    if (!userId) return false;

    try {
      if (this.subscriptions) {
        const subscription = await this.subscriptions.getActiveSubscription(userId);
        if (
          subscription &&
          subscription.plan.toLowerCase() === PREMIUM &&
          ENTITLED_STATUSES.has(subscription.status) &&
          subscription.currentPeriodEndsAt > this.now()
        ) {
          return true;
        }
      }

      return claimsGrantPremium(claims);
    } catch (err) {
      this.log.warn({
        event: 'entitlement_lookup_failed',
        userId,
        error: err instanceof Error ? err.message : String(err)
      }, '[Entitlement] Lookup failed, treating as free tier');
      return false;
    }
  }
}

/**
 * Process-local subscription registry
 */
export class InMemorySubscriptionLookup implements SubscriptionLookup {
  private subscriptions = new Map<string, Subscription>();

  upsert(subscription: Subscription): void {
    this.subscriptions.set(subscription.userId, { ...subscription });
  }

  async getActiveSubscription(userId: string): Promise<Subscription | null> {
    return this.subscriptions.get(userId) ?? null;
  }
}
