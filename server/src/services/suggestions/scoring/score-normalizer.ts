/**
 * ScoreNormalizer
 * Pure normalization helpers. Every method returns a value in [0, 1].
 */

export class ScoreNormalizer {
  clamp(value: number, min = 0, max = 1): number {
    if (Number.isNaN(value)) return min;
    return Math.max(min, Math.min(max, value));
  }

  /**
   * Bayesian-smoothed rating on a 0-1 scale:
   * (rating * n / (n + k)) / 5
   *
   * Examples (k = 50):
   * - rating 4.0, 50 reviews => 2.0 / 5 = 0.4
   * - rating 5.0, 0 reviews => 0
   * - missing rating => 0
   */
  smoothedRating(rating: number | undefined, reviewCount: number | undefined, smoothingFactor: number): number {
    const r = rating ?? 0;
    const n = Math.max(0, reviewCount ?? 0);
    if (r <= 0 || n === 0) return 0;
    return this.clamp((r * n) / (n + smoothingFactor) / 5);
  }

  /**
   * Distance decay: 1.0 at or below start, linear to 0 at max, 0 beyond
   */
  distanceDecay(distanceMeters: number, startMeters: number, maxMeters: number): number {
    if (distanceMeters <= startMeters) return 1;
    if (distanceMeters >= maxMeters) return 0;
    return this.clamp(1 - (distanceMeters - startMeters) / (maxMeters - startMeters));
  }
}

export const scoreNormalizer = new ScoreNormalizer();
