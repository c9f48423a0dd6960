/**
 * Post-commit notifications
 *
 * The orchestrator publishes one event after reaching its terminal state.
 * Listeners run on a later event-loop turn; a failing listener is logged and
 * has no effect on the response or on other listeners.
 */

import type { Logger } from '../../../lib/logger/structured-logger.js';
import type { RequestOutcome } from '../../../lib/metrics/performance-metrics.js';
import type { SuggestionIntent } from '../types.js';

export interface SuggestionOutcomeEvent {
  requestId: string;
  outcome: RequestOutcome;
  intent: SuggestionIntent;
  userId?: string;
  placeIds: string[];
  errorCode?: string;
  durationMs: number;
  timings: Record<string, number>;
  occurredAt: string;
}

export type SuggestionListener = (event: SuggestionOutcomeEvent) => void | Promise<void>;

interface Subscription {
  name: string;
  listener: SuggestionListener;
}

export class SuggestionNotifier {
  private subscriptions: Subscription[] = [];
  private pending = new Set<Promise<void>>();

  constructor(private readonly log: Logger) {}

  subscribe(name: string, listener: SuggestionListener): () => void {
    const subscription = { name, listener };
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter(s => s !== subscription);
    };
  }

  publish(event: SuggestionOutcomeEvent): void {
    for (const { name, listener } of this.subscriptions) {
      const delivery: Promise<void> = new Promise<void>(resolve => setImmediate(resolve))
        .then(() => listener(event))
        .catch(err => {
          this.log.warn({
            event: 'suggestion_listener_failed',
            listener: name,
            requestId: event.requestId,
            error: err instanceof Error ? err.message : String(err)
          }, '[Notifier] Listener failed');
        })
        .finally(() => {
          this.pending.delete(delivery);
        });
      this.pending.add(delivery);
    }
  }

  /**
   * Resolves once every delivery published so far has settled (shutdown, tests)
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
