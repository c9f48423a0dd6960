/**
 * Exclusions and suggestion history
 */

export interface ExclusionStore {
  /** Places the user has blocked and whose exclusion has not expired */
  getActiveExclusions(userId: string): Promise<Set<string>>;
  /** Most recent first, at most n ids */
  getRecentSuggestions(userId: string, n: number): Promise<string[]>;
  recordSuggestions(userId: string, placeIds: readonly string[]): Promise<void>;
}

interface Exclusion {
  placeId: string;
  expiresAt: number | null;
}

const HISTORY_CAP = 200;

export class InMemoryExclusionStore implements ExclusionStore {
  private exclusions = new Map<string, Exclusion[]>();
  private history = new Map<string, string[]>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Block a place for a user, permanently or for ttlMs
   */
  exclude(userId: string, placeId: string, ttlMs?: number): void {
    const list = (this.exclusions.get(userId) ?? []).filter(e => e.placeId !== placeId);
    list.push({ placeId, expiresAt: ttlMs !== undefined ? this.now() + ttlMs : null });
    this.exclusions.set(userId, list);
  }

  async getActiveExclusions(userId: string): Promise<Set<string>> {
    const now = this.now();
    const active = (this.exclusions.get(userId) ?? []).filter(e => e.expiresAt === null || e.expiresAt > now);
    this.exclusions.set(userId, active);
    return new Set(active.map(e => e.placeId));
  }

  async getRecentSuggestions(userId: string, n: number): Promise<string[]> {
    if (n <= 0) return [];
    return (this.history.get(userId) ?? []).slice(0, n);
  }

  async recordSuggestions(userId: string, placeIds: readonly string[]): Promise<void> {
    if (placeIds.length === 0) return;
    const previous = this.history.get(userId) ?? [];
    const fresh = new Set(placeIds);
    this.history.set(userId, [...placeIds, ...previous.filter(id => !fresh.has(id))].slice(0, HISTORY_CAP));
  }
}
