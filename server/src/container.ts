/**
 * Process wiring
 * Every collaborator is chosen once here, never per request.
 */

import type { Redis } from 'ioredis';
import type { AppConfig } from './config/env.js';
import type { RecommendationScoringOptions } from './config/scoring.config.js';
import type { AppDeps } from './app.js';
import type { Logger } from './lib/logger/structured-logger.js';
import { PerformanceMetrics } from './lib/metrics/performance-metrics.js';
import { getRedisClient } from './lib/redis/redis-client.js';
import { MemoryRateLimitStore, RedisRateLimitStore, type RateLimitStore } from './middleware/rate-limit.middleware.js';
import { createQuotaStore } from './services/quota/index.js';
import { EntitlementService, type SubscriptionLookup } from './services/quota/entitlement.service.js';
import { QuotaResetJob } from './services/quota/quota-reset.job.js';
import type { QuotaStore } from './services/quota/quota-store.interface.js';
import { QuotaService } from './services/quota/quota.service.js';
import { ContextEngine } from './services/suggestions/collaborators/context-engine.js';
import { InMemoryExclusionStore, type ExclusionStore } from './services/suggestions/collaborators/exclusion-store.js';
import { GooglePlacesProvider } from './services/suggestions/collaborators/google-places.provider.js';
import type { PlacesProvider } from './services/suggestions/collaborators/places-provider.js';
import { GreedyRouteOptimizer } from './services/suggestions/collaborators/route-optimizer.js';
import { StaticPlacesProvider } from './services/suggestions/collaborators/static-places.provider.js';
import { InMemoryUserProfileStore, type UserProfileStore } from './services/suggestions/collaborators/user-profile-store.js';
import { OpenWeatherService } from './services/suggestions/collaborators/weather.service.js';
import { metricsListener, suggestionHistoryListener } from './services/suggestions/notifications/listeners.js';
import { SuggestionNotifier } from './services/suggestions/notifications/suggestion-notifier.js';
import { SuggestionOrchestrator } from './services/suggestions/orchestrator/suggestion.orchestrator.js';
import { SuggestionPolicy } from './services/suggestions/policy/suggestion-policy.js';
import { HybridScoringEngine } from './services/suggestions/scoring/hybrid-scorer.js';

export interface ContainerOverrides {
  /** Skip connecting and use this client (null: no Redis) */
  redis?: Redis | null;
  places?: PlacesProvider;
  subscriptions?: SubscriptionLookup | null;
  exclusions?: ExclusionStore;
  profiles?: UserProfileStore;
}

export interface Container {
  appDeps: AppDeps;
  quotaStore: QuotaStore;
  quota: QuotaService;
  notifier: SuggestionNotifier;
  resetJob: QuotaResetJob | null;
}

function createPlacesProvider(config: AppConfig, log: Logger): PlacesProvider {
  if (config.googlePlacesApiKey) {
    return new GooglePlacesProvider({ apiKey: config.googlePlacesApiKey, timeoutMs: config.timeouts.providerMs });
  }
  if (config.env === 'production') {
    throw new Error('GOOGLE_PLACES_API_KEY is required in production');
  }
  log.warn({ event: 'places_provider_static' }, '[Container] GOOGLE_PLACES_API_KEY not set, serving an empty static catalogue');
  return new StaticPlacesProvider([]);
}

export async function createContainer(
  config: AppConfig,
  scoringOptions: RecommendationScoringOptions,
  log: Logger,
  overrides: ContainerOverrides = {}
): Promise<Container> {
  const redis = overrides.redis !== undefined
    ? overrides.redis
    : config.redisUrl
      ? await getRedisClient({ url: config.redisUrl, commandTimeout: config.timeouts.quotaMs })
      : null;

  const quotaStore = createQuotaStore(config, redis);
  const entitlement = new EntitlementService(overrides.subscriptions ?? null, log);
  const quota = new QuotaService(quotaStore, entitlement, {
    defaultFreeQuota: config.defaultFreeQuota,
    operationTimeoutMs: config.timeouts.quotaMs
  }, log);

  const exclusions = overrides.exclusions ?? new InMemoryExclusionStore();
  const profiles = overrides.profiles ?? new InMemoryUserProfileStore();
  const metrics = new PerformanceMetrics();

  const notifier = new SuggestionNotifier(log);
  notifier.subscribe('suggestion_history', suggestionHistoryListener(exclusions));
  notifier.subscribe('metrics', metricsListener(metrics));

  const weather = config.openWeatherApiKey
    ? new OpenWeatherService(config.openWeatherApiKey, config.timeouts.contextMs)
    : null;

  const policy = new SuggestionPolicy();
  const orchestrator = new SuggestionOrchestrator({
    policy,
    scoring: new HybridScoringEngine(scoringOptions),
    quota,
    places: overrides.places ?? createPlacesProvider(config, log),
    context: new ContextEngine(weather, log),
    routes: new GreedyRouteOptimizer(),
    exclusions,
    profiles,
    notifier,
    options: {
      timeouts: config.timeouts,
      recentSuggestionWindow: config.recentSuggestionWindow
    }
  });

  const memoryLimits = new MemoryRateLimitStore();
  const rateLimitStore: RateLimitStore = redis
    ? new RedisRateLimitStore(redis, memoryLimits, log)
    : memoryLimits;

  const resetJob = config.dailyResetEnabled
    ? new QuotaResetJob(quotaStore, quota, {
      resetAtUtc: config.dailyResetAtUtc,
      batchSize: config.resetBatchSize
    }, log)
    : null;

  log.info({
    event: 'container_ready',
    quotaBackend: quotaStore.backend,
    rateLimitStore: rateLimitStore.kind,
    placesProvider: orchestrator.providerName,
    weather: weather !== null,
    dailyReset: resetJob !== null
  }, '[Container] Services wired');

  return {
    appDeps: {
      logger: log,
      quotaBackend: config.quotaBackend,
      redis,
      corsOrigins: config.corsOrigins,
      jwtSecret: config.jwtSecret,
      anonRateLimit: config.anonRateLimit,
      rateLimitStore,
      orchestrator,
      quota,
      policy,
      defaultRadiusMeters: scoringOptions.defaultRadiusMeters,
      metrics
    },
    quotaStore,
    quota,
    notifier,
    resetJob
  };
}
