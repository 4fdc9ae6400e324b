import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  Place,
  RecommendationCategory,
  SupportedLanguage,
} from '@guest-concierge/shared-types';

import { RecommendationError } from '../common/errors/concierge.errors';
import { readList, readNumber } from '../config/config.helpers';
import { Coordinates, PLACE_PROVIDERS, PlaceProvider } from '../geo/geo.types';
import { orderProviders, runProviderChain } from '../geo/provider-chain';
import { LoggingService } from '../logging/logging.service';
import { rankPlaces } from './place-ranking';
import { RecommendationCacheService } from './recommendation-cache.service';

const DEFAULT_NEARBY_ORDER = ['mapmyindia', 'google'];

export interface RecommendationQuery {
  coordinates: Coordinates;
  category: RecommendationCategory;
  language: SupportedLanguage;
  radiusMeters?: number;
}

export interface RecommendationResult {
  places: Place[];
  /** `cache` on a hit, otherwise the provider that answered (`none` when all were empty). */
  source: string;
  /** Null when nothing was cached. */
  expiresAt: Date | null;
  locationKey: string;
}

@Injectable()
export class RecommendationsService {
  private readonly providers: PlaceProvider[];
  private readonly timeoutMs: number;
  private readonly radiusMeters: number;
  private readonly maxResults: number;

  constructor(
    @Inject(PLACE_PROVIDERS) providers: PlaceProvider[],
    configService: ConfigService,
    private readonly cacheService: RecommendationCacheService,
    private readonly loggingService: LoggingService,
  ) {
    this.providers = orderProviders(
      providers,
      readList(configService, 'NEARBY_PROVIDER_ORDER', DEFAULT_NEARBY_ORDER),
      'nearby',
    );
    this.timeoutMs = readNumber(configService, 'PROVIDER_TIMEOUT_MS', 5000);
    this.radiusMeters = readNumber(configService, 'RECOMMENDATION_RADIUS_METERS', 5000);
    this.maxResults = readNumber(configService, 'MAX_RECOMMENDATIONS', 20);
  }

  async recommend(query: RecommendationQuery, now: Date = new Date()): Promise<RecommendationResult> {
    const key = {
      locationKey: this.cacheService.locationKeyFor(query.coordinates),
      category: query.category,
      language: query.language,
    };

    const cached = await this.cacheService.lookup(key, now);
    if (cached) {
      return {
        places: cached.places,
        source: 'cache',
        expiresAt: cached.expiresAt,
        locationKey: key.locationKey,
      };
    }

    const request = {
      origin: query.coordinates,
      category: query.category,
      radiusMeters: query.radiusMeters ?? this.radiusMeters,
      language: query.language,
    };

    const { winner, failures, declined } = await runProviderChain({
      providers: this.providers,
      timeoutMs: this.timeoutMs,
      attempt: async (provider, signal) =>
        provider.searchNearby ? provider.searchNearby(request, { signal }) : [],
      accept: (places) => places.length > 0,
      onFailure: ({ provider, reason }) =>
        this.loggingService.logProviderFailure('nearby', provider, reason, {
          category: query.category,
          locationKey: key.locationKey,
        }),
    });

    if (!winner) {
      // Errors only: nobody answered, so there is nothing truthful to return
      if (declined.length === 0) {
        throw new RecommendationError(query.category, failures);
      }
      return { places: [], source: 'none', expiresAt: null, locationKey: key.locationKey };
    }

    this.loggingService.logProviderSuccess('nearby', winner.provider, {
      category: query.category,
      count: winner.value.length,
      fallback: failures.length + declined.length > 0,
    });

    const places = rankPlaces(winner.value, this.maxResults);
    const entry = await this.cacheService.store(key, places, winner.provider, now);

    return {
      places,
      source: winner.provider,
      expiresAt: entry ? entry.expiresAt : null,
      locationKey: key.locationKey,
    };
  }
}
