/**
 * DistanceCalculator
 * Great-circle distances using the Haversine formula
 */

import type { GeoPoint } from '../types.js';

export class DistanceCalculator {
  private readonly EARTH_RADIUS_METERS = 6_371_000;

  /**
   * Haversine distance between two coordinates, in meters
   *
   * Examples:
   * - Same point: 0
   * - (0, 0) to (0, 1): ~111195 m
   */
  haversineMeters(from: GeoPoint, to: GeoPoint): number {
    const dLat = this.toRadians(to.latitude - from.latitude);
    const dLon = this.toRadians(to.longitude - from.longitude);

    const a =
      Math.sin(dLat / 2) * Math.sin(dLat / 2) +
      Math.cos(this.toRadians(from.latitude)) *
      Math.cos(this.toRadians(to.latitude)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
    return this.EARTH_RADIUS_METERS * c;
  }

  toRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
  }
}

export const distanceCalculator = new DistanceCalculator();
