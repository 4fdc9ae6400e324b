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

const TOKEN_URL = 'https://outpost.mapmyindia.com/api/security/oauth/token';
const ATLAS_URL = 'https://atlas.mapmyindia.com/api/places';

// MapMyIndia point-of-interest category codes
const CATEGORY_CODES: Record<RecommendationCategory, string> = {
  restaurants: 'FODCOF',
  sightseeing: 'TOUATT',
  events: 'ENTDIS',
  shopping: 'SHPMAL',
  nightlife: 'FODBAR',
  atms: 'FINATM',
  pharmacy: 'HLTPHR',
};

const TOKEN_REFRESH_MARGIN_MS = 60_000;

interface MapMyIndiaTokenResponse {
  access_token?: string;
  expires_in?: number;
}

@Injectable()
export class MapMyIndiaProvider implements PlaceProvider {
  readonly name = 'mapmyindia';

  private readonly logger = new Logger(MapMyIndiaProvider.name);
  private readonly api: AxiosInstance;
  private readonly clientId: string | undefined;
  private readonly clientSecret: string | undefined;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(private readonly configService: ConfigService) {
    this.clientId = this.configService.get<string>('MAPMYINDIA_CLIENT_ID');
    this.clientSecret = this.configService.get<string>('MAPMYINDIA_CLIENT_SECRET');
    this.api = axios.create({
      timeout: readConfigNumber(this.configService, 'PROVIDER_TIMEOUT_MS', 5000),
    });

    if (!this.isEnabled()) {
      this.logger.warn('MAPMYINDIA_CLIENT_ID/SECRET not set, provider disabled');
    }
  }

  isEnabled(): boolean {
    return Boolean(this.clientId && this.clientSecret);
  }

  async geocode(locationText: string, options: ProviderCallOptions = {}): Promise<GeocodeMatch | null> {
    const accessToken = await this.getAccessToken(options.signal);
    const { data } = await this.api.get<unknown>(`${ATLAS_URL}/geocode`, {
      params: { address: locationText, itemCount: 1 },
      headers: { Authorization: `Bearer ${accessToken}` },
      signal: options.signal,
    });

    if (!isRecord(data)) {
      throw new Error('MapMyIndia geocode returned a malformed body');
    }

    // copResults is an object for single matches and a list otherwise
    const match = Array.isArray(data.copResults) ? data.copResults[0] : data.copResults;
    if (!isRecord(match)) {
      return null;
    }

    const latitude = readNumber(match, 'latitude', 'lat');
    const longitude = readNumber(match, 'longitude', 'lng');
    if (latitude === undefined || longitude === undefined) {
      return null;
    }
    if (!isValidCoordinates(latitude, longitude)) {
      throw new Error('MapMyIndia geocode returned out-of-range coordinates');
    }

    return {
      latitude,
      longitude,
      formattedAddress: readString(match, 'formattedAddress', 'formatted_address') ?? null,
    };
  }

  async searchNearby(
    request: NearbySearchRequest,
    options: ProviderCallOptions = {},
  ): Promise<Place[]> {
    const accessToken = await this.getAccessToken(options.signal);
    const { origin } = request;

    const { data } = await this.api.get<unknown>(`${ATLAS_URL}/nearby/json`, {
      params: {
        keywords: CATEGORY_CODES[request.category],
        refLocation: `${origin.latitude},${origin.longitude}`,
        radius: request.radiusMeters,
        page: 1,
      },
      headers: { Authorization: `Bearer ${accessToken}` },
      signal: options.signal,
    });

    if (!isRecord(data)) {
      throw new Error('MapMyIndia nearby search returned a malformed body');
    }

    const entries = Array.isArray(data.suggestedLocations)
      ? data.suggestedLocations
      : readArray(data, 'results');

    return entries.flatMap((entry): Place[] => {
      const name = readString(entry, 'placeName', 'name');
      if (!name) {
        return [];
      }

      const latitude = readNumber(entry, 'latitude', 'lat');
      const longitude = readNumber(entry, 'longitude', 'lng');
      const distanceMeters = readNumber(entry, 'distance');

      let distanceKm: number;
      if (
        latitude !== undefined &&
        longitude !== undefined &&
        isValidCoordinates(latitude, longitude)
      ) {
        distanceKm = haversineKm(origin, { latitude, longitude });
      } else if (distanceMeters !== undefined) {
        distanceKm = Math.round(distanceMeters / 10) / 100;
      } else {
        return [];
      }

      return [
        {
          name,
          // Nearby search carries no ratings
          rating: null,
          distanceKm,
          address: readString(entry, 'placeAddress', 'address') ?? '',
          externalId: readString(entry, 'eLoc', 'place_id') ?? name,
        },
      ];
    });
  }

  private async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const params = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.clientId ?? '',
      client_secret: this.clientSecret ?? '',
    });

    const { data } = await this.api.post<MapMyIndiaTokenResponse>(TOKEN_URL, params.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      signal,
    });

    if (!data.access_token) {
      throw new Error('MapMyIndia did not return an access token');
    }

    const expiresInSeconds = data.expires_in ?? 3600;
    this.token = {
      value: data.access_token,
      expiresAt: Date.now() + expiresInSeconds * 1000 - TOKEN_REFRESH_MARGIN_MS,
    };
    this.logger.debug('Obtained MapMyIndia access token');
    return this.token.value;
  }
}
