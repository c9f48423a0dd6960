import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SuggestionOrchestrator, type ExecutionOptions } from '../suggestion.orchestrator.js';
import {
  AdmissionSystemError,
  CollaboratorFailureError,
  QuotaExceededError,
  RequestCancelledError,
  SuggestionValidationError
} from '../suggestion-errors.js';
import { SuggestionPolicy } from '../../policy/suggestion-policy.js';
import { HybridScoringEngine } from '../../scoring/hybrid-scorer.js';
import { StaticPlacesProvider } from '../../collaborators/static-places.provider.js';
import { InMemoryExclusionStore } from '../../collaborators/exclusion-store.js';
import { InMemoryUserProfileStore } from '../../collaborators/user-profile-store.js';
import { GreedyRouteOptimizer, type RouteOptimizer } from '../../collaborators/route-optimizer.js';
import type { ContextProvider } from '../../collaborators/context-engine.js';
import { SuggestionNotifier, type SuggestionOutcomeEvent } from '../../notifications/suggestion-notifier.js';
import { suggestionHistoryListener } from '../../notifications/listeners.js';
import { QuotaService } from '../../../quota/quota.service.js';
import { InMemoryQuotaStore } from '../../../quota/inmemory-quota.store.js';
import type { QuotaStore } from '../../../quota/quota-store.interface.js';
import { EntitlementService } from '../../../quota/entitlement.service.js';
import { loadScoringOptions } from '../../../../config/scoring.config.js';
import type { ContextualInsights, Principal, SuggestionRequest, SuggestionResult } from '../../types.js';
import { TestLogger } from '../../../../__tests__/support/test-logger.js';
import { mixedCatalogue } from '../../../../__tests__/support/places.js';

class FixedContext implements ContextProvider {
  constructor(private readonly behaviour: ContextualInsights | Error | ((signal?: AbortSignal) => ContextualInsights)) {}

  async getContextualInsights(_location: unknown, _time: Date, signal?: AbortSignal): Promise<ContextualInsights> {
    if (this.behaviour instanceof Error) throw this.behaviour;
    if (typeof this.behaviour === 'function') return this.behaviour(signal);
    return this.behaviour;
  }
}

class FailingPlacesProvider extends StaticPlacesProvider {
  constructor() {
    super([]);
  }

  override async search(): Promise<never> {
    this.calls++;
    throw new Error('upstream 502');
  }
}

class UnreachableQuotaStore implements QuotaStore {
  readonly backend = 'redis' as const;

  async get(): Promise<number | null> {
    throw new Error('connection refused');
  }

  async compareExchangeConsume(): Promise<boolean> {
    throw new Error('connection refused');
  }

  async set(): Promise<void> {
    throw new Error('connection refused');
  }

  async listUserIds(): Promise<string[]> {
    return [];
  }
}

const failingRoutes: RouteOptimizer = {
  async optimize() {
    throw new Error('solver crashed');
  }
};

interface HarnessOptions {
  places?: StaticPlacesProvider;
  quotaStore?: QuotaStore;
  context?: ContextProvider;
  routes?: RouteOptimizer;
}

function createHarness(options: HarnessOptions = {}) {
  const logger = new TestLogger();
  const quotaStore = options.quotaStore ?? new InMemoryQuotaStore();
  const places = options.places ?? new StaticPlacesProvider(mixedCatalogue());
  const exclusions = new InMemoryExclusionStore();
  const profiles = new InMemoryUserProfileStore();
  const notifier = new SuggestionNotifier(logger.log);
  const events: SuggestionOutcomeEvent[] = [];

  notifier.subscribe('history', suggestionHistoryListener(exclusions));
  notifier.subscribe('recorder', event => { events.push(event); });

  const quota = new QuotaService(
    quotaStore,
    new EntitlementService(null, logger.log),
    { defaultFreeQuota: 5, operationTimeoutMs: 200 },
    logger.log
  );

  const orchestrator = new SuggestionOrchestrator({
    policy: new SuggestionPolicy(),
    scoring: new HybridScoringEngine(loadScoringOptions()),
    quota,
    places,
    context: options.context ?? new FixedContext({ timeOfDay: 'lunch', season: 'spring' }),
    routes: options.routes ?? new GreedyRouteOptimizer(),
    exclusions,
    profiles,
    notifier,
    options: {
      timeouts: { contextMs: 200, providerMs: 200, routeMs: 200, storeMs: 200 },
      recentSuggestionWindow: 20
    }
  });

  const execution = (extra: Partial<ExecutionOptions> = {}): ExecutionOptions => ({
    requestId: 'req-1',
    log: logger.log,
    now: new Date('2026-05-01T12:00:00Z'),
    ...extra
  });

  return { orchestrator, logger, quotaStore, places, exclusions, profiles, notifier, events, execution };
}

function request(extra: Partial<SuggestionRequest> = {}): SuggestionRequest {
  return { intent: 'FOOD_ONLY', latitude: 0, longitude: 0, radiusMeters: 3000, ...extra };
}

const ANONYMOUS: Principal = {};
const SIGNED_IN: Principal = { userId: 'user-1' };

function suggestionsOf(result: SuggestionResult) {
  assert.equal(result.kind, 'suggestions');
  if (result.kind !== 'suggestions') throw new Error('expected a suggestion list');
  return result;
}

describe('SuggestionOrchestrator', () => {
  let harness: ReturnType<typeof createHarness>;

  beforeEach(() => {
    harness = createHarness();
  });

  it('returns only food places for an anonymous FOOD_ONLY request', async () => {
    const { orchestrator, execution, quotaStore } = harness;
    const { result, quota } = await orchestrator.execute(request(), ANONYMOUS, execution());
    const list = suggestionsOf(result);

    assert.equal(list.suggestions.length, 12);
    assert.equal(list.totalCount, 12);
    assert.ok(list.suggestions.every(s => s.id.startsWith('food-')));
    assert.ok(list.suggestions.every(s => s.reasons.length <= 5));
    assert.equal(list.isPersonalized, false);
    assert.equal(list.filters.radiusMeters, 3000);
    assert.equal(list.metadata.source, 'static');
    assert.equal(list.metadata.usedAI, false);
    assert.equal(list.metadata.candidateCount, 15);
    assert.equal(list.metadata.usedContextEngine, true);
    assert.equal(list.metadata.timeOfDay, 'lunch');
    assert.equal(quota, null);
    assert.deepEqual(await quotaStore.listUserIds(), []);
  });

  it('charges one credit for a signed-in caller', async () => {
    const { orchestrator, execution } = harness;
    const { result, quota } = await orchestrator.execute(request(), SIGNED_IN, execution());

    assert.deepEqual(quota, { remaining: 4, limit: 5, premium: false });
    assert.equal(result.isPersonalized, true);
  });

  it('lets premium callers through without touching the store', async () => {
    const { orchestrator, execution, quotaStore } = harness;
    const { quota } = await orchestrator.execute(
      request(),
      { userId: 'user-9', claims: { subscription: 'premium' } },
      execution()
    );

    assert.deepEqual(quota, { remaining: null, limit: 5, premium: true });
    assert.equal(await quotaStore.get('user-9'), null);
  });

  it('denies an exhausted caller before searching for places', async () => {
    const { orchestrator, execution, quotaStore, places, notifier, events } = harness;
    await quotaStore.set('user-1', 0);

    await assert.rejects(orchestrator.execute(request(), SIGNED_IN, execution()), (err: unknown) => {
      assert.ok(err instanceof QuotaExceededError);
      assert.equal(err.remaining, 0);
      assert.equal(err.limit, 5);
      assert.equal(err.httpStatus, 403);
      return true;
    });
    assert.equal(places.calls, 0);

    await notifier.drain();
    assert.equal(events[0]?.outcome, 'quota_exhausted');
    assert.equal(events[0]?.errorCode, 'QUOTA_EXHAUSTED');
  });

  it('fails closed when the quota store is unreachable', async () => {
    const { orchestrator, execution, places } = createHarness({ quotaStore: new UnreachableQuotaStore() });

    await assert.rejects(orchestrator.execute(request(), SIGNED_IN, execution()), (err: unknown) => {
      assert.ok(err instanceof AdmissionSystemError);
      assert.equal(err.code, 'QUOTA_EXHAUSTED');
      assert.equal(err.limit, 5);
      return true;
    });
    assert.equal(places.calls, 0);
  });

  it('reports every validation error and charges nothing', async () => {
    const { orchestrator, execution, quotaStore } = harness;

    await assert.rejects(
      orchestrator.execute(request({ latitude: 100, radiusMeters: 50 }), SIGNED_IN, execution()),
      (err: unknown) => {
        assert.ok(err instanceof SuggestionValidationError);
        assert.deepEqual(err.errors, [
          'Latitude must be between -90 and 90',
          'Radius must be between 100 and 50,000 meters'
        ]);
        return true;
      }
    );
    assert.equal(await quotaStore.get('user-1'), null);
  });

  it('requires a walking distance for route planning', async () => {
    const { orchestrator, execution } = harness;
    await assert.rejects(
      orchestrator.execute(request({ intent: 'ROUTE_PLANNING' }), ANONYMOUS, execution()),
      (err: unknown) => {
        assert.ok(err instanceof SuggestionValidationError);
        assert.deepEqual(err.errors, ['Route planning requires a walking distance of at least 500 meters']);
        return true;
      }
    );
  });

  it('does not charge a request cancelled before admission', async () => {
    const controller = new AbortController();
    const context = new FixedContext(() => {
      controller.abort();
      return { timeOfDay: 'lunch' };
    });
    const { orchestrator, execution, quotaStore, places } = createHarness({ context });

    await assert.rejects(
      orchestrator.execute(request(), SIGNED_IN, execution({ signal: controller.signal })),
      (err: unknown) => {
        assert.ok(err instanceof RequestCancelledError);
        assert.equal(err.stage, 'admit');
        return true;
      }
    );
    assert.equal(await quotaStore.get('user-1'), null);
    assert.equal(places.calls, 0);
  });

  it('surfaces a places provider failure without refunding the credit', async () => {
    const { orchestrator, execution, quotaStore } = createHarness({ places: new FailingPlacesProvider() });

    await assert.rejects(orchestrator.execute(request(), SIGNED_IN, execution()), (err: unknown) => {
      assert.ok(err instanceof CollaboratorFailureError);
      assert.equal(err.collaborator, 'places_provider');
      assert.equal(err.httpStatus, 503);
      return true;
    });
    assert.equal(await quotaStore.get('user-1'), 4);
  });

  it('continues without context when the context lookup fails', async () => {
    const { orchestrator, execution, logger } = createHarness({ context: new FixedContext(new Error('weather down')) });
    const list = suggestionsOf((await orchestrator.execute(request(), ANONYMOUS, execution())).result);

    assert.equal(list.suggestions.length, 12);
    assert.equal(list.metadata.usedContextEngine, false);
    assert.equal(list.filters.appliedContextual, false);
    assert.equal(logger.find('context_degraded')?.error, 'weather down');
  });

  it('skips excluded and recently suggested places, then records what it delivered', async () => {
    const { orchestrator, execution, exclusions, notifier } = harness;
    exclusions.exclude('user-1', 'food-1');
    await exclusions.recordSuggestions('user-1', ['food-2']);

    const list = suggestionsOf((await orchestrator.execute(request(), SIGNED_IN, execution())).result);
    const ids = list.suggestions.map(s => s.id);

    assert.equal(ids.length, 10);
    assert.ok(!ids.includes('food-1'));
    assert.ok(!ids.includes('food-2'));
    assert.equal(list.metadata.usedVariabilityEngine, true);

    await notifier.drain();
    const recent = await exclusions.getRecentSuggestions('user-1', 20);
    assert.deepEqual(recent, [...ids, 'food-2']);
  });

  it('builds an ordered walking route for ROUTE_PLANNING', async () => {
    const { orchestrator, execution, events, notifier } = harness;
    const { result } = await orchestrator.execute(
      request({ intent: 'ROUTE_PLANNING', walkingDistanceMeters: 2000 }),
      ANONYMOUS,
      execution()
    );

    assert.equal(result.kind, 'route');
    if (result.kind !== 'route') return;
    assert.deepEqual(result.route.stops.map(s => s.id), [
      'food-1', 'food-2', 'food-3', 'food-4', 'food-5', 'museum-1', 'food-6', 'food-7'
    ]);
    assert.deepEqual(result.route.stops.map(s => s.order), [1, 2, 3, 4, 5, 6, 7, 8]);
    assert.equal(result.route.totalDistanceMeters, 1100);
    assert.equal(result.route.maxWalkingDistanceMeters, 2000);
    assert.equal(result.route.mode, 'walking');

    await notifier.drain();
    assert.equal(events[0]?.outcome, 'delivered');
    assert.equal(events[0]?.userId, undefined);
    assert.deepEqual(events[0]?.placeIds, result.route.stops.map(s => s.id));
  });

  it('surfaces a route optimizer failure', async () => {
    const { orchestrator, execution } = createHarness({ routes: failingRoutes });
    await assert.rejects(
      orchestrator.execute(request({ intent: 'ROUTE_PLANNING', walkingDistanceMeters: 2000 }), ANONYMOUS, execution()),
      (err: unknown) => err instanceof CollaboratorFailureError && err.collaborator === 'route_optimizer'
    );
  });

  it('records stage timings in the metadata', async () => {
    const { orchestrator, execution } = harness;
    const { result } = await orchestrator.execute(request(), ANONYMOUS, execution());
    const timings = result.metadata.timings;

    assert.equal(typeof timings.validateIntentMs, 'number');
    assert.equal(typeof timings.fetchCandidatesMs, 'number');
    assert.equal(typeof timings.scoreMs, 'number');
    assert.equal(timings.buildRouteMs, undefined);
  });
});
