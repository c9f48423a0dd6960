/**
 * Built-in outcome listeners
 */

import type { PerformanceMetrics } from '../../../lib/metrics/performance-metrics.js';
import type { ExclusionStore } from '../collaborators/exclusion-store.js';
import type { SuggestionListener } from './suggestion-notifier.js';

/**
 * Remember delivered places so the recent-suggestion window can exclude them next time
 */
export function suggestionHistoryListener(exclusions: ExclusionStore): SuggestionListener {
  return async event => {
    if (event.outcome !== 'delivered' || !event.userId || event.placeIds.length === 0) return;
    await exclusions.recordSuggestions(event.userId, event.placeIds);
  };
}

export function metricsListener(metrics: PerformanceMetrics): SuggestionListener {
  return event => {
    metrics.recordRequest(event.outcome, event.durationMs);
  };
}
