/**
 * Suggestion Orchestrator
 *
 * Linear pipeline, no backtracking:
 *   validate_intent -> build_context -> admit -> fetch_candidates -> load_exclusions
 *   -> filter_by_intent -> score -> explain -> build_route (ROUTE_PLANNING only) -> assemble
 *
 * Admit is the only irreversible step. It runs after validation and before any
 * costly work, is never retried here, and a credit spent there is not refunded
 * when a later stage fails or the caller goes away.
 */

import type { Logger } from '../../../lib/logger/structured-logger.js';
import type { RequestOutcome } from '../../../lib/metrics/performance-metrics.js';
import { withDeadline } from '../../../lib/reliability/timeout-guard.js';
import { startTimer, timeStage, type TimedContext } from '../../../lib/telemetry/stage-timer.js';
import type { QuotaService } from '../../quota/quota.service.js';
import type { ContextProvider } from '../collaborators/context-engine.js';
import type { ExclusionStore } from '../collaborators/exclusion-store.js';
import type { PlacesProvider } from '../collaborators/places-provider.js';
import type { RouteOptimizer } from '../collaborators/route-optimizer.js';
import type { UserProfileStore } from '../collaborators/user-profile-store.js';
import type { SuggestionNotifier } from '../notifications/suggestion-notifier.js';
import type { SuggestionPolicy } from '../policy/suggestion-policy.js';
import type { TasteProfile } from '../profile/taste-profile.js';
import { diversityRerank } from '../scoring/diversity-reranker.js';
import type { HybridScoringEngine } from '../scoring/hybrid-scorer.js';
import {
  SUGGESTION_INTENTS,
  type ContextualInsights,
  type FilterInfo,
  type GeoPoint,
  type ImplicitProfile,
  type OrderedRoute,
  type Place,
  type Principal,
  type QuotaInfo,
  type ScoredPlace,
  type SuggestionMeta,
  type SuggestionRequest,
  type SuggestionResult,
  type SuggestionView
} from '../types.js';
import {
  AdmissionSystemError,
  CollaboratorFailureError,
  QuotaExceededError,
  RequestCancelledError,
  SuggestionValidationError,
  isSuggestionError
} from './suggestion-errors.js';

export interface OrchestratorOptions {
  timeouts: {
    contextMs: number;
    providerMs: number;
    routeMs: number;
    storeMs: number;
  };
  recentSuggestionWindow: number;
}

export interface SuggestionOrchestratorDeps {
  policy: SuggestionPolicy;
  scoring: HybridScoringEngine;
  quota: QuotaService;
  places: PlacesProvider;
  context: ContextProvider;
  routes: RouteOptimizer;
  exclusions: ExclusionStore;
  profiles: UserProfileStore;
  notifier: SuggestionNotifier;
  options: OrchestratorOptions;
}

export interface ExecutionOptions {
  requestId: string;
  traceId?: string;
  log: Logger;
  signal?: AbortSignal;
  now?: Date;
}

export interface SuggestionOutcome {
  result: SuggestionResult;
  /** null for anonymous callers, who are not charged */
  quota: QuotaInfo | null;
}

interface PipelineContext extends TimedContext {
  signal?: AbortSignal;
}

interface UserSignals {
  exclusions: Set<string>;
  recentCount: number;
  implicitProfile?: ImplicitProfile;
  tasteProfile?: TasteProfile;
}

const NO_USER_SIGNALS: UserSignals = { exclusions: new Set(), recentCount: 0 };

function outcomeOf(error: unknown): RequestOutcome {
  if (error instanceof SuggestionValidationError) return 'validation_error';
  if (error instanceof QuotaExceededError || error instanceof AdmissionSystemError) return 'quota_exhausted';
  if (error instanceof CollaboratorFailureError) return 'collaborator_failure';
  if (error instanceof RequestCancelledError) return 'cancelled';
  return 'error';
}

function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export class SuggestionOrchestrator {
  constructor(private readonly deps: SuggestionOrchestratorDeps) {}

  get providerName(): string {
    return this.deps.places.name;
  }

  async execute(request: SuggestionRequest, principal: Principal, execution: ExecutionOptions): Promise<SuggestionOutcome> {
    const timer = startTimer();
    const ctx: PipelineContext = {
      requestId: execution.requestId,
      ...(execution.traceId && { traceId: execution.traceId }),
      log: execution.log,
      timings: {},
      ...(execution.signal && { signal: execution.signal })
    };

    try {
      const outcome = await this.run(request, principal, ctx, execution.now ?? new Date());
      this.publish(ctx, request, principal, 'delivered', timer.stop(), placeIdsOf(outcome.result));
      return outcome;
    } catch (error) {
      const outcome = outcomeOf(error);
      this.publish(ctx, request, principal, outcome, timer.stop(), [], isSuggestionError(error) ? error.code : 'INTERNAL_ERROR');
      throw error;
    }
  }

  private async run(request: SuggestionRequest, principal: Principal, ctx: PipelineContext, now: Date): Promise<SuggestionOutcome> {
    const { policy, scoring } = this.deps;
    const origin: GeoPoint = { latitude: request.latitude, longitude: request.longitude };
    const userId = principal.userId;

    await timeStage(ctx, 'validate_intent', async () => this.validate(request, origin));

    this.ensureActive(ctx, 'build_context');
    const insights = await timeStage(ctx, 'build_context', () => this.buildContext(ctx, origin, now));

    this.ensureActive(ctx, 'admit');
    const quota = userId
      ? await timeStage(ctx, 'admit', () => this.admit(userId, principal))
      : null;

    this.ensureActive(ctx, 'fetch_candidates');
    const candidates = await timeStage(ctx, 'fetch_candidates', () => this.fetchCandidates(ctx, request, origin));

    this.ensureActive(ctx, 'load_exclusions');
    const signals = userId
      ? await timeStage(ctx, 'load_exclusions', () => this.loadUserSignals(ctx, userId))
      : NO_USER_SIGNALS;

    const filtered = await timeStage(ctx, 'filter_by_intent', async () => {
      const byIntent = policy.applyIntentFilter(request.intent, candidates, signals.exclusions);
      return policy.applyRequestFilters(byIntent, request);
    }, { candidates: candidates.length });

    const diversityFactor = policy.getDiversityFactor(request.intent);
    const scored = await timeStage(ctx, 'score', async () => {
      const ranked = scoring.rankAll({
        ...(userId && { userId }),
        ...(signals.implicitProfile && { implicitProfile: signals.implicitProfile }),
        ...(signals.tasteProfile && { tasteProfile: signals.tasteProfile }),
        origin,
        requestTime: now,
        ...(insights && { insights }),
        ...(principal.sessionId && { sessionId: principal.sessionId }),
        includeDebugInfo: request.debug === true
      }, filtered);
      return diversityRerank(ranked, diversityFactor, scoring.maxResults);
    }, { filtered: filtered.length });

    const views = await timeStage(ctx, 'explain', async () =>
      scored.map(item => this.toView(request, origin, item))
    );

    const isPersonalized = Boolean(userId);
    const meta = (): SuggestionMeta => ({
      generatedAt: now.toISOString(),
      requestId: ctx.requestId,
      intent: request.intent,
      source: this.deps.places.name,
      diversityFactor,
      usedAI: false,
      usedPersonalization: signals.implicitProfile !== undefined || signals.tasteProfile !== undefined,
      usedContextEngine: insights !== undefined,
      usedVariabilityEngine: diversityFactor > 0 || signals.recentCount > 0,
      ...(insights?.timeOfDay && { timeOfDay: insights.timeOfDay }),
      ...(insights?.weather && { weatherCondition: insights.weather.condition }),
      ...(insights?.season && { season: insights.season }),
      candidateCount: candidates.length,
      timings: { ...ctx.timings }
    });

    if (policy.shouldBuildRoute(request.intent)) {
      this.ensureActive(ctx, 'build_route');
      const maxWalking = policy.getMaxWalkingDistance(request.intent, request.walkingDistanceMeters);
      const route = await timeStage(ctx, 'build_route', () =>
        this.buildRoute(ctx, origin, scored.map(item => item.place), maxWalking)
      );

      return await timeStage<SuggestionOutcome>(ctx, 'assemble', async () => {
        const viewsById = new Map(views.map(view => [view.id, view]));
        const stops = route.stops.flatMap((place, index) => {
          const view = viewsById.get(place.id);
          return view ? [{ ...view, order: index + 1 }] : [];
        });
        return {
          result: {
            kind: 'route',
            route: {
              stops,
              totalDistanceMeters: route.totalDistanceMeters,
              estimatedDurationSeconds: route.estimatedDurationSeconds,
              maxWalkingDistanceMeters: maxWalking,
              mode: route.mode
            },
            metadata: meta(),
            isPersonalized
          },
          quota
        };
      });
    }

    return await timeStage<SuggestionOutcome>(ctx, 'assemble', async () => ({
      result: {
        kind: 'suggestions',
        suggestions: views,
        totalCount: views.length,
        filters: this.filterInfo(request, signals, insights, diversityFactor),
        metadata: meta(),
        isPersonalized
      },
      quota
    }));
  }

  private validate(request: SuggestionRequest, origin: GeoPoint): void {
    const { policy } = this.deps;
    const errors: string[] = [];

    if (!SUGGESTION_INTENTS.includes(request.intent)) {
      errors.push(`Intent must be one of ${SUGGESTION_INTENTS.join(', ')}`);
    } else {
      errors.push(...policy.validateRequest(request.intent, origin, request.radiusMeters, request.walkingDistanceMeters));
    }
    errors.push(...policy.validateFilters(request));

    if (errors.length > 0) {
      throw new SuggestionValidationError(errors);
    }
  }

  /**
   * Best effort. Any failure or timeout degrades to "no insights".
   */
  private async buildContext(ctx: PipelineContext, origin: GeoPoint, now: Date): Promise<ContextualInsights | undefined> {
    try {
      return await withDeadline('context_lookup', this.deps.options.timeouts.contextMs, ctx.signal, signal =>
        this.deps.context.getContextualInsights(origin, now, signal)
      );
    } catch (err) {
      ctx.log.warn({
        event: 'context_degraded',
        requestId: ctx.requestId,
        error: err instanceof Error ? err.message : String(err)
      }, '[Suggestions] Context unavailable, using neutral context score');
      return undefined;
    }
  }

  private async admit(userId: string, principal: Principal): Promise<QuotaInfo> {
    const decision = await this.deps.quota.admit(userId, principal.claims);
    if (!decision.granted) {
      if (decision.reason === 'system_error') {
        throw new AdmissionSystemError(decision.limit);
      }
      throw new QuotaExceededError(decision.remaining, decision.limit);
    }
    return { remaining: decision.remaining, limit: decision.limit, premium: decision.premium };
  }

  private async fetchCandidates(ctx: PipelineContext, request: SuggestionRequest, origin: GeoPoint): Promise<Place[]> {
    try {
      return await withDeadline('places_search', this.deps.options.timeouts.providerMs, ctx.signal, signal =>
        this.deps.places.search(origin, request.radiusMeters, {
          ...(request.includeCategories && { includeCategories: request.includeCategories }),
          ...(request.excludeCategories && { excludeCategories: request.excludeCategories }),
          ...(request.budgetLevel && { budgetLevel: request.budgetLevel })
        }, signal)
      );
    } catch (err) {
      if (ctx.signal?.aborted) throw new RequestCancelledError('fetch_candidates');
      throw new CollaboratorFailureError('places_provider', err);
    }
  }

  /**
   * Exclusions, recent suggestions and profiles. A store failure degrades
   * to "nothing known" rather than failing the request.
   */
  private async loadUserSignals(ctx: PipelineContext, userId: string): Promise<UserSignals> {
    const { exclusions, profiles, options } = this.deps;

    const guarded = async <T>(name: string, fallback: T, load: () => Promise<T>): Promise<T> => {
      try {
        return await withDeadline(name, options.timeouts.storeMs, ctx.signal, () => load());
      } catch (err) {
        ctx.log.warn({
          event: 'user_signal_degraded',
          requestId: ctx.requestId,
          source: name,
          error: err instanceof Error ? err.message : String(err)
        }, '[Suggestions] User signal unavailable');
        return fallback;
      }
    };

    const [active, recent, implicitProfile, tasteProfile] = await Promise.all([
      guarded<Set<string>>('active_exclusions', new Set<string>(), () => exclusions.getActiveExclusions(userId)),
      guarded<string[]>('recent_suggestions', [], () => exclusions.getRecentSuggestions(userId, options.recentSuggestionWindow)),
      guarded<ImplicitProfile | null>('implicit_profile', null, () => profiles.getImplicitPreferences(userId)),
      guarded<TasteProfile | null>('taste_profile', null, () => profiles.getTasteProfile(userId))
    ]);

    return {
      exclusions: new Set([...active, ...recent]),
      recentCount: recent.length,
      ...(implicitProfile && { implicitProfile }),
      ...(tasteProfile && { tasteProfile })
    };
  }

  private async buildRoute(ctx: PipelineContext, origin: GeoPoint, places: Place[], maxWalking: number): Promise<OrderedRoute> {
    try {
      return await withDeadline('route_optimize', this.deps.options.timeouts.routeMs, ctx.signal, signal =>
        this.deps.routes.optimize(origin, places, maxWalking, 'walking', signal)
      );
    } catch (err) {
      if (ctx.signal?.aborted) throw new RequestCancelledError('build_route');
      throw new CollaboratorFailureError('route_optimizer', err);
    }
  }

  private toView(request: SuggestionRequest, origin: GeoPoint, item: ScoredPlace): SuggestionView {
    const { place } = item;
    return {
      id: place.id,
      name: place.name,
      latitude: place.location.latitude,
      longitude: place.location.longitude,
      categories: [...place.categories],
      ...(place.address && { address: place.address }),
      ...(place.rating !== undefined && { rating: place.rating }),
      ...(place.reviewCount !== undefined && { reviewCount: place.reviewCount }),
      ...(place.priceLevel !== undefined && { priceLevel: place.priceLevel }),
      distanceMeters: Math.round(item.distanceMeters),
      score: round(item.score),
      reasons: this.deps.policy.generateReasons(
        request.intent,
        place,
        origin,
        item.matchedPreferences,
        item.noveltyScore,
        item.contextualReasons
      ),
      reasonCodes: item.reasons.map(reason => reason.code),
      ...(item.debugBreakdown && { debug: item.debugBreakdown })
    };
  }

  private filterInfo(
    request: SuggestionRequest,
    signals: UserSignals,
    insights: ContextualInsights | undefined,
    diversityFactor: number
  ): FilterInfo {
    return {
      radiusMeters: request.radiusMeters,
      ...(request.walkingDistanceMeters !== undefined && { walkingDistanceMeters: request.walkingDistanceMeters }),
      ...(request.budgetLevel && { budgetLevel: request.budgetLevel }),
      includedCategories: request.includeCategories ?? [],
      excludedCategories: request.excludeCategories ?? [],
      dietaryRestrictions: request.dietaryRestrictions ?? [],
      appliedVariety: signals.recentCount > 0 || diversityFactor > 0,
      appliedContextual: insights !== undefined
    };
  }

  private ensureActive(ctx: PipelineContext, stage: string): void {
    if (ctx.signal?.aborted) {
      ctx.log.info({ event: 'request_cancelled', requestId: ctx.requestId, stage }, '[Suggestions] Request cancelled');
      throw new RequestCancelledError(stage);
    }
  }

  private publish(
    ctx: PipelineContext,
    request: SuggestionRequest,
    principal: Principal,
    outcome: RequestOutcome,
    durationMs: number,
    placeIds: string[],
    errorCode?: string
  ): void {
    ctx.log.info({
      event: 'pipeline_completed',
      requestId: ctx.requestId,
      intent: request.intent,
      outcome,
      durationMs,
      ...(errorCode && { errorCode })
    }, `[Suggestions] Pipeline ${outcome}`);

    this.deps.notifier.publish({
      requestId: ctx.requestId,
      outcome,
      intent: request.intent,
      ...(principal.userId && { userId: principal.userId }),
      placeIds,
      ...(errorCode && { errorCode }),
      durationMs,
      timings: { ...ctx.timings },
      occurredAt: new Date().toISOString()
    });
  }
}

function placeIdsOf(result: SuggestionResult): string[] {
  return result.kind === 'route'
    ? result.route.stops.map(stop => stop.id)
    : result.suggestions.map(suggestion => suggestion.id);
}
