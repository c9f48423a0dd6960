/**
 * Route optimization contract and a nearest-neighbour default.
 * The ordering algorithm is replaceable; the pipeline only depends on RouteOptimizer.
 */

import { distanceCalculator } from '../scoring/distance-calculator.js';
import type { GeoPoint, OrderedRoute, Place, TravelMode } from '../types.js';

export interface RouteOptimizer {
  optimize(
    origin: GeoPoint,
    places: readonly Place[],
    maxWalkingDistanceMeters: number,
    mode: TravelMode,
    signal?: AbortSignal
  ): Promise<OrderedRoute>;
}

const SPEED_METERS_PER_SECOND: Record<TravelMode, number> = {
  walking: 1.3,
  driving: 8.3
};

export const MAX_ROUTE_STOPS = 8;

/**
 * Repeatedly walks to the closest unvisited place while the total stays
 * within the walking budget.
 */
export class GreedyRouteOptimizer implements RouteOptimizer {
  constructor(private readonly maxStops = MAX_ROUTE_STOPS) {}

  async optimize(
    origin: GeoPoint,
    places: readonly Place[],
    maxWalkingDistanceMeters: number,
    mode: TravelMode,
    signal?: AbortSignal
  ): Promise<OrderedRoute> {
    signal?.throwIfAborted();

    const remaining = [...places];
    const stops: Place[] = [];
    let current = origin;
    let total = 0;

    while (remaining.length > 0 && stops.length < this.maxStops) {
      let bestIndex = -1;
      let bestDistance = Number.POSITIVE_INFINITY;

      remaining.forEach((place, index) => {
        const distance = distanceCalculator.haversineMeters(current, place.location);
        if (distance < bestDistance) {
          bestDistance = distance;
          bestIndex = index;
        }
      });

      if (bestIndex < 0 || total + bestDistance > maxWalkingDistanceMeters) break;

      const [next] = remaining.splice(bestIndex, 1);
      if (!next) break;
      stops.push(next);
      total += bestDistance;
      current = next.location;
    }

    return {
      stops,
      totalDistanceMeters: Math.round(total),
      estimatedDurationSeconds: Math.round(total / SPEED_METERS_PER_SECOND[mode]),
      mode
    };
  }
}
