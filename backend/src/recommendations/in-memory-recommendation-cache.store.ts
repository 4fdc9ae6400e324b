import { Injectable } from '@nestjs/common';

import {
  RecommendationCacheEntry,
  RecommendationCacheKey,
  RecommendationCacheStore,
} from './recommendation-cache.store';

const keyOf = ({ locationKey, category, language }: RecommendationCacheKey) =>
  `${locationKey}|${category}|${language}`;

@Injectable()
export class InMemoryRecommendationCacheStore implements RecommendationCacheStore {
  private readonly entries = new Map<string, RecommendationCacheEntry>();

  async find(key: RecommendationCacheKey): Promise<RecommendationCacheEntry | null> {
    const entry = this.entries.get(keyOf(key));
    return entry ? { ...entry, places: entry.places.map((place) => ({ ...place })) } : null;
  }

  async save(entry: RecommendationCacheEntry): Promise<void> {
    this.entries.set(keyOf(entry), {
      ...entry,
      places: entry.places.map((place) => ({ ...place })),
    });
  }

  async purgeExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt.getTime() <= now.getTime()) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }
}
