/**
 * Diversity re-rank
 *
 * Greedy selection over hybrid scores. Each pick is the candidate with the
 * highest adjusted score, where
 *   adjusted = score * (1 - CATEGORY_REPEAT_PENALTY * diversityFactor) ^ k
 * and k counts already-picked places sharing its primary category.
 * Novelty is already part of the hybrid score, so only the score is used here.
 */

import { normalizeCategory } from './category-mapper.js';
import { compareScoredPlaces } from './hybrid-scorer.js';
import type { ScoredPlace } from '../types.js';

export const CATEGORY_REPEAT_PENALTY = 0.15;

export function primaryCategoryOf(scored: ScoredPlace): string {
  const primary = scored.place.primaryCategory ?? scored.place.categories[0] ?? 'unknown';
  return normalizeCategory(primary);
}

export function diversityRerank(ranked: readonly ScoredPlace[], diversityFactor: number, limit: number): ScoredPlace[] {
  const factor = Math.max(0, Math.min(1, diversityFactor));
  if (factor === 0) {
    return ranked.slice(0, limit);
  }

  const decay = 1 - CATEGORY_REPEAT_PENALTY * factor;
  const remaining = [...ranked];
  const picked: ScoredPlace[] = [];
  const categoryCounts = new Map<string, number>();

  while (picked.length < limit && remaining.length > 0) {
    let bestIndex = 0;
    let bestAdjusted = -1;

    remaining.forEach((candidate, index) => {
      const repeats = categoryCounts.get(primaryCategoryOf(candidate)) ?? 0;
      const adjusted = candidate.score * Math.pow(decay, repeats);
      const best = remaining[bestIndex];
      if (
        adjusted > bestAdjusted ||
        (adjusted === bestAdjusted && best !== undefined && compareScoredPlaces(candidate, best) < 0)
      ) {
        bestIndex = index;
        bestAdjusted = adjusted;
      }
    });

    const [chosen] = remaining.splice(bestIndex, 1);
    if (!chosen) break;
    picked.push(chosen);
    const category = primaryCategoryOf(chosen);
    categoryCounts.set(category, (categoryCounts.get(category) ?? 0) + 1);
  }

  return picked;
}
