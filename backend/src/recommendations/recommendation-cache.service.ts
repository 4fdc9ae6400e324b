import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Place } from '@guest-concierge/shared-types';
import { addSeconds, isAfter } from 'date-fns';

import { errorMessage } from '../common/utils/error-message';
import { readNumber } from '../config/config.helpers';
import { Coordinates } from '../geo/geo.types';
import { buildLocationKey } from '../geo/geo.utils';
import {
  RECOMMENDATION_CACHE_STORE,
  RecommendationCacheEntry,
  RecommendationCacheKey,
  RecommendationCacheStore,
} from './recommendation-cache.store';

/**
 * TTL policy over the cache store. Store failures never reach callers: a
 * failed read is a miss and a failed write leaves the cache as it was.
 */
@Injectable()
export class RecommendationCacheService {
  private readonly logger = new Logger(RecommendationCacheService.name);
  readonly ttlSeconds: number;
  readonly precision: number;

  constructor(
    @Inject(RECOMMENDATION_CACHE_STORE)
    private readonly cacheStore: RecommendationCacheStore,
    configService: ConfigService,
  ) {
    this.ttlSeconds = readNumber(configService, 'RECOMMENDATION_CACHE_TTL_SECONDS', 900);
    this.precision = readNumber(configService, 'RECOMMENDATION_LOCATION_PRECISION', 3);
  }

  locationKeyFor(coordinates: Coordinates): string {
    return buildLocationKey(coordinates, this.precision);
  }

  async lookup(key: RecommendationCacheKey, now: Date): Promise<RecommendationCacheEntry | null> {
    let entry: RecommendationCacheEntry | null;
    try {
      entry = await this.cacheStore.find(key);
    } catch (error) {
      this.logger.warn(
        `Cache read failed for ${key.locationKey}/${key.category}, treating as miss: ${errorMessage(error)}`,
      );
      return null;
    }

    if (!entry || !isAfter(entry.expiresAt, now)) {
      return null;
    }
    return entry;
  }

  /** Returns the stored entry, or null when the write failed. */
  async store(
    key: RecommendationCacheKey,
    places: Place[],
    source: string,
    now: Date,
  ): Promise<RecommendationCacheEntry | null> {
    const entry: RecommendationCacheEntry = {
      ...key,
      places,
      source,
      createdAt: now,
      expiresAt: addSeconds(now, this.ttlSeconds),
    };

    try {
      await this.cacheStore.save(entry);
      return entry;
    } catch (error) {
      this.logger.warn(
        `Cache write failed for ${key.locationKey}/${key.category}: ${errorMessage(error)}`,
      );
      return null;
    }
  }

  async purgeExpired(now: Date): Promise<number> {
    return this.cacheStore.purgeExpired(now);
  }
}
