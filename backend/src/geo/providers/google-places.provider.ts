import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Place, RecommendationCategory } from '@guest-concierge/shared-types';
import axios, { AxiosInstance } from 'axios';

import { readNumber as readConfigNumber } from '../../config/config.helpers';
import {
  isRecord,
  readArray,
  readNumber,
  readString,
} from '../../common/utils/payload-reader';
import { haversineKm, isValidCoordinates } from '../geo.utils';
import {
  GeocodeMatch,
  NearbySearchRequest,
  PlaceProvider,
  ProviderCallOptions,
} from '../geo.types';

const BASE_URL = 'https://maps.googleapis.com/maps/api';

// Google has no place type for events; those are searched by keyword
const CATEGORY_QUERIES: Record<RecommendationCategory, { type?: string; keyword?: string }> = {
  restaurants: { type: 'restaurant' },
  sightseeing: { type: 'tourist_attraction' },
  events: { keyword: 'events' },
  shopping: { type: 'shopping_mall' },
  nightlife: { type: 'bar' },
  atms: { type: 'atm' },
  pharmacy: { type: 'pharmacy' },
};

@Injectable()
export class GooglePlacesProvider implements PlaceProvider {
  readonly name = 'google';

  private readonly logger = new Logger(GooglePlacesProvider.name);
  private readonly api: AxiosInstance;
  private readonly apiKey: string | undefined;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('GOOGLE_PLACES_API_KEY');
    this.api = axios.create({
      baseURL: BASE_URL,
      timeout: readConfigNumber(this.configService, 'PROVIDER_TIMEOUT_MS', 5000),
    });

    if (!this.isEnabled()) {
      this.logger.warn('GOOGLE_PLACES_API_KEY not set, provider disabled');
    }
  }

  isEnabled(): boolean {
    return Boolean(this.apiKey);
  }

  async geocode(locationText: string, options: ProviderCallOptions = {}): Promise<GeocodeMatch | null> {
    const { data } = await this.api.get<unknown>('/geocode/json', {
      params: { address: locationText, key: this.apiKey },
      signal: options.signal,
    });

    const results = this.unwrapResults(data, 'geocode');
    const match = results[0];
    if (match === undefined) {
      return null;
    }

    const latitude = readNumber(match, 'geometry.location.lat');
    const longitude = readNumber(match, 'geometry.location.lng');
    if (
      latitude === undefined ||
      longitude === undefined ||
      !isValidCoordinates(latitude, longitude)
    ) {
      throw new Error('Google geocode result has no usable location');
    }

    return {
      latitude,
      longitude,
      formattedAddress: readString(match, 'formatted_address') ?? null,
    };
  }

  async searchNearby(
    request: NearbySearchRequest,
    options: ProviderCallOptions = {},
  ): Promise<Place[]> {
    const { origin } = request;
    const query = CATEGORY_QUERIES[request.category];

    const { data } = await this.api.get<unknown>('/place/nearbysearch/json', {
      params: {
        location: `${origin.latitude},${origin.longitude}`,
        radius: request.radiusMeters,
        language: request.language,
        key: this.apiKey,
        ...query,
      },
      signal: options.signal,
    });

    return this.unwrapResults(data, 'nearby search').flatMap((place): Place[] => {
      const name = readString(place, 'name');
      const latitude = readNumber(place, 'geometry.location.lat');
      const longitude = readNumber(place, 'geometry.location.lng');
      if (
        !name ||
        latitude === undefined ||
        longitude === undefined ||
        !isValidCoordinates(latitude, longitude)
      ) {
        return [];
      }

      const rating = readNumber(place, 'rating');
      return [
        {
          name,
          rating: rating !== undefined && rating >= 0 && rating <= 5 ? rating : null,
          distanceKm: haversineKm(origin, { latitude, longitude }),
          address: readString(place, 'vicinity', 'formatted_address') ?? '',
          externalId: readString(place, 'place_id') ?? name,
        },
      ];
    });
  }

  /** Google reports errors in-band with HTTP 200 and a status field. */
  private unwrapResults(data: unknown, operation: string): unknown[] {
    if (!isRecord(data)) {
      throw new Error(`Google ${operation} returned a malformed body`);
    }

    const status = readString(data, 'status');
    if (status === 'ZERO_RESULTS') {
      return [];
    }
    if (status !== 'OK') {
      throw new Error(`Google ${operation} returned status ${status ?? 'unknown'}`);
    }
    return readArray(data, 'results');
  }
}
