import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError, ConfigValidator, formatZodIssues, type ConfigRequirements } from '../lib/config/config-validator.js';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  QUOTA_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().url().optional(),
  DEFAULT_FREE_QUOTA: z.coerce.number().int().min(1).max(1000).default(5),
  QUOTA_DAILY_RESET_ENABLED: booleanFlag.default('false'),
  QUOTA_DAILY_RESET_AT_UTC: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM').default('00:00'),
  QUOTA_RESET_BATCH_SIZE: z.coerce.number().int().min(1).max(10_000).default(100),

  JWT_SECRET: z.string().min(1).optional(),

  GOOGLE_PLACES_API_KEY: z.string().optional(),
  OPENWEATHER_API_KEY: z.string().optional(),

  CONTEXT_TIMEOUT_MS: z.coerce.number().int().min(50).default(1500),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
  ROUTE_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
  QUOTA_TIMEOUT_MS: z.coerce.number().int().min(50).default(2000),
  STORE_TIMEOUT_MS: z.coerce.number().int().min(50).default(2000),

  RECENT_SUGGESTION_WINDOW: z.coerce.number().int().min(0).max(500).default(20),

  ANON_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),
  ANON_RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(30),

  CORS_ORIGINS: z.string().optional()
});

export type QuotaBackend = 'memory' | 'redis';

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  quotaBackend: QuotaBackend;
  redisUrl: string | undefined;
  defaultFreeQuota: number;
  dailyResetEnabled: boolean;
  dailyResetAtUtc: string;
  resetBatchSize: number;
  jwtSecret: string | undefined;
  googlePlacesApiKey: string | undefined;
  openWeatherApiKey: string | undefined;
  timeouts: {
    contextMs: number;
    providerMs: number;
    routeMs: number;
    quotaMs: number;
    storeMs: number;
  };
  recentSuggestionWindow: number;
  anonRateLimit: { windowMs: number; max: number };
  corsOrigins: string[] | undefined;
}

/**
 * Parse environment into a typed config.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;

  if (e.QUOTA_BACKEND === 'redis' && !e.REDIS_URL) {
    throw new ConfigError('REDIS_URL must be set when QUOTA_BACKEND=redis', ['REDIS_URL']);
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    quotaBackend: e.QUOTA_BACKEND,
    redisUrl: e.REDIS_URL,
    defaultFreeQuota: e.DEFAULT_FREE_QUOTA,
    dailyResetEnabled: e.QUOTA_DAILY_RESET_ENABLED,
    dailyResetAtUtc: e.QUOTA_DAILY_RESET_AT_UTC,
    resetBatchSize: e.QUOTA_RESET_BATCH_SIZE,
    jwtSecret: e.JWT_SECRET,
    googlePlacesApiKey: e.GOOGLE_PLACES_API_KEY,
    openWeatherApiKey: e.OPENWEATHER_API_KEY,
    timeouts: {
      contextMs: e.CONTEXT_TIMEOUT_MS,
      providerMs: e.PROVIDER_TIMEOUT_MS,
      routeMs: e.ROUTE_TIMEOUT_MS,
      quotaMs: e.QUOTA_TIMEOUT_MS,
      storeMs: e.STORE_TIMEOUT_MS
    },
    recentSuggestionWindow: e.RECENT_SUGGESTION_WINDOW,
    anonRateLimit: { windowMs: e.ANON_RATE_LIMIT_WINDOW_MS, max: e.ANON_RATE_LIMIT_MAX },
    corsOrigins: e.CORS_ORIGINS?.split(',').map(origin => origin.trim()).filter(Boolean)
  };
}

/** Variables the process needs before it can serve in production */
export const PRODUCTION_REQUIREMENTS: ConfigRequirements = {
  required: ['JWT_SECRET', 'GOOGLE_PLACES_API_KEY'],
  optional: ['OPENWEATHER_API_KEY', 'REDIS_URL', 'LOG_LEVEL']
};

export function createConfigValidator(config: AppConfig, env: NodeJS.ProcessEnv = process.env): ConfigValidator {
  return new ConfigValidator(
    config.env === 'production' ? PRODUCTION_REQUIREMENTS : { required: [], optional: PRODUCTION_REQUIREMENTS.required },
    env
  );
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
