/**
 * Context signal: fit with time of day, weather and season.
 * Neutral 0.5 when no insights are available (degraded context).
 */

import contextFit from '../data/context-fit.json' with { type: 'json' };
import { scoreNormalizer } from '../score-normalizer.js';
import { normalizeCategory } from '../category-mapper.js';
import type { ContextualInsights, Place, Season, TimeOfDay, WeatherSnapshot } from '../../types.js';

export interface ContextSignal {
  score: number;
  reasons: string[];
}

export const NEUTRAL_CONTEXT_SCORE = 0.5;
export const MAX_CONTEXTUAL_REASONS = 2;

const TIME_FIT_BOOST = 0.2;
const WEATHER_FIT_BOOST = 0.2;
const WEATHER_MISFIT_PENALTY = 0.2;
const SEASON_FIT_BOOST = 0.1;

const TIME_LABELS: Record<TimeOfDay, string> = {
  early_morning: 'an early start',
  morning: 'the morning',
  lunch: 'lunch time',
  afternoon: 'the afternoon',
  evening: 'the evening',
  night: 'a night out',
  late_night: 'late night'
};

const timeCategories: Record<TimeOfDay, ReadonlySet<string>> = {
  early_morning: new Set(contextFit.timeOfDay.early_morning),
  morning: new Set(contextFit.timeOfDay.morning),
  lunch: new Set(contextFit.timeOfDay.lunch),
  afternoon: new Set(contextFit.timeOfDay.afternoon),
  evening: new Set(contextFit.timeOfDay.evening),
  night: new Set(contextFit.timeOfDay.night),
  late_night: new Set(contextFit.timeOfDay.late_night)
};

const seasonCategories: Record<Season, ReadonlySet<string>> = {
  spring: new Set(contextFit.season.spring),
  summer: new Set(contextFit.season.summer),
  autumn: new Set(contextFit.season.autumn),
  winter: new Set(contextFit.season.winter)
};

const indoorCategories: ReadonlySet<string> = new Set(contextFit.indoor);
const outdoorCategories: ReadonlySet<string> = new Set(contextFit.outdoor);

function matchesAny(place: Place, categories: ReadonlySet<string>): boolean {
  return place.categories.some(category => {
    const normalized = normalizeCategory(category);
    return categories.has(normalized) || normalized.split('_').some(token => categories.has(token));
  });
}

export function isBadWeather(weather: WeatherSnapshot): boolean {
  if (['rain', 'drizzle', 'thunderstorm', 'snow'].includes(weather.condition)) return true;
  if (weather.temperatureC !== undefined && (weather.temperatureC < 5 || weather.temperatureC > 33)) return true;
  return false;
}

export function isPleasantWeather(weather: WeatherSnapshot): boolean {
  if (weather.condition !== 'clear' && weather.condition !== 'clouds') return false;
  return weather.temperatureC === undefined || (weather.temperatureC >= 15 && weather.temperatureC <= 28);
}

function describeWeather(weather: WeatherSnapshot): string {
  if (weather.temperatureC !== undefined) return `${Math.round(weather.temperatureC)}°C`;
  return weather.description ?? weather.condition;
}

export function isIndoorPlace(place: Place): boolean {
  return matchesAny(place, indoorCategories) && !matchesAny(place, outdoorCategories);
}

export function isOutdoorPlace(place: Place): boolean {
  return matchesAny(place, outdoorCategories);
}

export function scoreContext(place: Place, insights: ContextualInsights | undefined): ContextSignal {
  if (!insights || (!insights.timeOfDay && !insights.weather && !insights.season)) {
    return { score: NEUTRAL_CONTEXT_SCORE, reasons: [] };
  }

  let score = NEUTRAL_CONTEXT_SCORE;
  const reasons: string[] = [];

  if (insights.weather) {
    const indoor = isIndoorPlace(place);
    const outdoor = isOutdoorPlace(place);

    if (isBadWeather(insights.weather)) {
      if (indoor) {
        score += WEATHER_FIT_BOOST;
        reasons.push(`Indoor spot, good for the current weather (${describeWeather(insights.weather)})`);
      } else if (outdoor) {
        score -= WEATHER_MISFIT_PENALTY;
      }
    } else if (isPleasantWeather(insights.weather) && outdoor) {
      score += WEATHER_FIT_BOOST;
      reasons.push(`Outdoor spot for nice weather (${describeWeather(insights.weather)})`);
    }
  }

  if (insights.timeOfDay && matchesAny(place, timeCategories[insights.timeOfDay])) {
    score += TIME_FIT_BOOST;
    reasons.push(`Good fit for ${TIME_LABELS[insights.timeOfDay]}`);
  }

  if (insights.season && matchesAny(place, seasonCategories[insights.season])) {
    score += SEASON_FIT_BOOST;
    reasons.push(`A good pick for ${insights.season}`);
  }

  return {
    score: scoreNormalizer.clamp(score),
    reasons: reasons.slice(0, MAX_CONTEXTUAL_REASONS)
  };
}
