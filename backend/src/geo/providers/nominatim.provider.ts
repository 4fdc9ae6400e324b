import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';

import { readNumber as readConfigNumber } from '../../config/config.helpers';
import { readNumber, readString } from '../../common/utils/payload-reader';
import { isValidCoordinates } from '../geo.utils';
import { GeocodeMatch, PlaceProvider, ProviderCallOptions } from '../geo.types';

const DEFAULT_BASE_URL = 'https://nominatim.openstreetmap.org';

/** OpenStreetMap geocoder. Needs no credentials but requires an identifying User-Agent. */
@Injectable()
export class NominatimProvider implements PlaceProvider {
  readonly name = 'nominatim';

  private readonly api: AxiosInstance;

  constructor(private readonly configService: ConfigService) {
    this.api = axios.create({
      baseURL: this.configService.get<string>('NOMINATIM_BASE_URL') ?? DEFAULT_BASE_URL,
      timeout: readConfigNumber(this.configService, 'PROVIDER_TIMEOUT_MS', 5000),
      headers: {
        'User-Agent': this.configService.get<string>('NOMINATIM_USER_AGENT') ?? 'guest-concierge',
      },
    });
  }

  isEnabled(): boolean {
    return true;
  }

  async geocode(locationText: string, options: ProviderCallOptions = {}): Promise<GeocodeMatch | null> {
    const { data } = await this.api.get<unknown>('/search', {
      params: { q: locationText, format: 'json', limit: 1 },
      signal: options.signal,
    });

    if (!Array.isArray(data)) {
      throw new Error('Nominatim returned a malformed body');
    }

    const match: unknown = data[0];
    if (match === undefined) {
      return null;
    }

    // Nominatim encodes coordinates as strings
    const latitude = readNumber(match, 'lat');
    const longitude = readNumber(match, 'lon');
    if (
      latitude === undefined ||
      longitude === undefined ||
      !isValidCoordinates(latitude, longitude)
    ) {
      throw new Error('Nominatim result has no usable location');
    }

    return {
      latitude,
      longitude,
      formattedAddress: readString(match, 'display_name') ?? null,
    };
  }
}
