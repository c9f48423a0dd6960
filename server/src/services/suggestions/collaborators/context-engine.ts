/**
 * Context Engine
 * Time of day and season come from the request time; weather from the
 * weather service. A weather failure leaves `weather` absent.
 */

import type { Logger } from '../../../lib/logger/structured-logger.js';
import type { ContextualInsights, GeoPoint, Season, TimeOfDay } from '../types.js';
import type { WeatherService } from './weather.service.js';

export interface ContextProvider {
  getContextualInsights(location: GeoPoint, time: Date, signal?: AbortSignal): Promise<ContextualInsights>;
}

/**
 * Local hour from longitude (solar offset). Good enough to pick a time bucket
 * without a timezone database.
 */
export function localHour(time: Date, longitude: number): number {
  const offsetHours = Math.round(longitude / 15);
  return (((time.getUTCHours() + offsetHours) % 24) + 24) % 24;
}

export function timeOfDayFor(hour: number): TimeOfDay {
  if (hour >= 6 && hour < 9) return 'early_morning';
  if (hour >= 9 && hour < 12) return 'morning';
  if (hour >= 12 && hour < 14) return 'lunch';
  if (hour >= 14 && hour < 17) return 'afternoon';
  if (hour >= 17 && hour < 20) return 'evening';
  if (hour >= 20 && hour < 23) return 'night';
  return 'late_night';
}

/**
 * Meteorological season; southern hemisphere is shifted by six months
 */
export function seasonFor(time: Date, latitude: number): Season {
  const month = time.getUTCMonth() + 1;
  const shifted = latitude < 0 ? ((month + 5) % 12) + 1 : month;
  if (shifted >= 3 && shifted <= 5) return 'spring';
  if (shifted >= 6 && shifted <= 8) return 'summer';
  if (shifted >= 9 && shifted <= 11) return 'autumn';
  return 'winter';
}

export class ContextEngine implements ContextProvider {
  constructor(
    private readonly weather: WeatherService | null,
    private readonly log: Logger
  ) {}

  async getContextualInsights(location: GeoPoint, time: Date, signal?: AbortSignal): Promise<ContextualInsights> {
    const insights: ContextualInsights = {
      timeOfDay: timeOfDayFor(localHour(time, location.longitude)),
      season: seasonFor(time, location.latitude)
    };

    if (!this.weather) return insights;

    try {
      insights.weather = await this.weather.getCurrentWeather(location, signal);
    } catch (err) {
      this.log.warn({
        event: 'weather_lookup_failed',
        error: err instanceof Error ? err.message : String(err)
      }, '[Context] Weather unavailable, continuing without it');
    }

    return insights;
  }
}
