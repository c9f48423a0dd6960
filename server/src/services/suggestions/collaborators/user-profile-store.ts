/**
 * User profile lookups used to personalize scoring
 */

import {
  applyTasteDelta,
  applyTasteWeights,
  createDefaultTasteProfile,
  type TasteProfile,
  type TasteWeights
} from '../profile/taste-profile.js';
import type { ImplicitProfile } from '../types.js';

export interface UserProfileStore {
  getImplicitPreferences(userId: string): Promise<ImplicitProfile | null>;
  getTasteProfile(userId: string): Promise<TasteProfile | null>;
}

export class InMemoryUserProfileStore implements UserProfileStore {
  private implicit = new Map<string, ImplicitProfile>();
  private taste = new Map<string, TasteProfile>();

  setImplicitPreferences(userId: string, profile: ImplicitProfile): void {
    this.implicit.set(userId, profile);
  }

  /**
   * Store absolute weights from onboarding, starting from a neutral profile
   */
  saveQuizWeights(userId: string, weights: TasteWeights): TasteProfile {
    const profile = applyTasteWeights(this.taste.get(userId) ?? createDefaultTasteProfile(), weights);
    this.taste.set(userId, profile);
    return profile;
  }

  /**
   * Apply bounded feedback deltas to an existing profile
   */
  applyFeedback(userId: string, deltas: TasteWeights): TasteProfile {
    const profile = applyTasteDelta(this.taste.get(userId) ?? createDefaultTasteProfile(), deltas);
    this.taste.set(userId, profile);
    return profile;
  }

  async getImplicitPreferences(userId: string): Promise<ImplicitProfile | null> {
    return this.implicit.get(userId) ?? null;
  }

  async getTasteProfile(userId: string): Promise<TasteProfile | null> {
    return this.taste.get(userId) ?? null;
  }
}
