import { Injectable, Logger } from '@nestjs/common';
import { isPlace } from '@guest-concierge/shared-types';

import { DatabaseService } from '../database/database.service';
import {
  RecommendationCacheEntry,
  RecommendationCacheKey,
  RecommendationCacheStore,
} from './recommendation-cache.store';

interface CacheRow {
  places: unknown;
  source: string;
  created_at: Date;
  expires_at: Date;
}

@Injectable()
export class PgRecommendationCacheStore implements RecommendationCacheStore {
  private readonly logger = new Logger(PgRecommendationCacheStore.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async find(key: RecommendationCacheKey): Promise<RecommendationCacheEntry | null> {
    const result = await this.databaseService.runQuery<CacheRow>(
      `select places, source, created_at, expires_at
         from recommendation_cache
        where location_key = $1 and category = $2 and language = $3`,
      [key.locationKey, key.category, key.language],
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    if (!Array.isArray(row.places) || !row.places.every(isPlace)) {
      this.logger.warn(`Discarding unreadable cache entry ${key.locationKey}/${key.category}`);
      return null;
    }

    return {
      ...key,
      places: row.places,
      source: row.source,
      createdAt: row.created_at,
      expiresAt: row.expires_at,
    };
  }

  async save(entry: RecommendationCacheEntry): Promise<void> {
    await this.databaseService.runQuery(
      `insert into recommendation_cache
         (location_key, category, language, places, source, created_at, expires_at)
       values ($1, $2, $3, $4::jsonb, $5, $6, $7)
       on conflict (location_key, category, language) do update set
         places = excluded.places,
         source = excluded.source,
         created_at = excluded.created_at,
         expires_at = excluded.expires_at`,
      [
        entry.locationKey,
        entry.category,
        entry.language,
        JSON.stringify(entry.places),
        entry.source,
        entry.createdAt,
        entry.expiresAt,
      ],
    );
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.databaseService.runQuery(
      'delete from recommendation_cache where expires_at <= $1',
      [now],
    );
    return result.rowCount ?? 0;
  }
}
