/**
 * Weather lookup contract and the OpenWeather adapter
 */

import { z } from 'zod';
import { ensureOk, fetchWithTimeout } from '../../../utils/fetch-with-timeout.js';
import type { GeoPoint, WeatherCondition, WeatherSnapshot } from '../types.js';

export interface WeatherService {
  getCurrentWeather(location: GeoPoint, signal?: AbortSignal): Promise<WeatherSnapshot>;
}

const CURRENT_WEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';

const OpenWeatherResponseSchema = z.object({
  weather: z.array(z.object({ main: z.string(), description: z.string().optional() })).default([]),
  main: z.object({ temp: z.number() }).optional()
});

const CONDITIONS: Record<string, WeatherCondition> = {
  clear: 'clear',
  clouds: 'clouds',
  rain: 'rain',
  drizzle: 'drizzle',
  thunderstorm: 'thunderstorm',
  snow: 'snow',
  mist: 'mist',
  fog: 'mist',
  haze: 'mist'
};

export function toWeatherCondition(main: string | undefined): WeatherCondition {
  return (main && CONDITIONS[main.toLowerCase()]) || 'unknown';
}

export class OpenWeatherService implements WeatherService {
  constructor(private readonly apiKey: string, private readonly timeoutMs: number) {}

  async getCurrentWeather(location: GeoPoint, signal?: AbortSignal): Promise<WeatherSnapshot> {
    const url = new URL(CURRENT_WEATHER_URL);
    url.searchParams.set('lat', String(location.latitude));
    url.searchParams.set('lon', String(location.longitude));
    url.searchParams.set('units', 'metric');
    url.searchParams.set('appid', this.apiKey);

    const response = await fetchWithTimeout(url.toString(), { method: 'GET' }, {
      timeoutMs: this.timeoutMs,
      provider: 'openweather',
      signal
    });
    await ensureOk(response, 'openweather');

    const body = OpenWeatherResponseSchema.parse(await response.json());
    const first = body.weather[0];
    return {
      condition: toWeatherCondition(first?.main),
      ...(body.main && { temperatureC: body.main.temp }),
      ...(first?.description && { description: first.description })
    };
  }
}
