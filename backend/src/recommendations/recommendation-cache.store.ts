import { Place, RecommendationCategory, SupportedLanguage } from '@guest-concierge/shared-types';

export const RECOMMENDATION_CACHE_STORE = Symbol('RECOMMENDATION_CACHE_STORE');

export interface RecommendationCacheKey {
  locationKey: string;
  category: RecommendationCategory;
  language: SupportedLanguage;
}

export interface RecommendationCacheEntry extends RecommendationCacheKey {
  places: Place[];
  /** Provider that produced the places. */
  source: string;
  createdAt: Date;
  expiresAt: Date;
}

/** Storage for cached recommendation sets. Expiry is enforced by the caller. */
export interface RecommendationCacheStore {
  find(key: RecommendationCacheKey): Promise<RecommendationCacheEntry | null>;

  /** Inserts or replaces the entry for the key. */
  save(entry: RecommendationCacheEntry): Promise<void>;

  /** Deletes entries expired at `now`, returning how many were removed. */
  purgeExpired(now: Date): Promise<number>;
}
