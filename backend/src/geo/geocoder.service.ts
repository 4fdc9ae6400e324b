import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { GeocodeError } from '../common/errors/concierge.errors';
import { readList, readNumber } from '../config/config.helpers';
import { LoggingService } from '../logging/logging.service';
import { GeocodeMatch, PLACE_PROVIDERS, PlaceProvider } from './geo.types';
import { orderProviders, runProviderChain } from './provider-chain';

const DEFAULT_GEOCODE_ORDER = ['mapmyindia', 'nominatim'];

@Injectable()
export class GeocoderService {
  private readonly providers: PlaceProvider[];
  private readonly timeoutMs: number;

  constructor(
    @Inject(PLACE_PROVIDERS) providers: PlaceProvider[],
    configService: ConfigService,
    private readonly loggingService: LoggingService,
  ) {
    this.providers = orderProviders(
      providers,
      readList(configService, 'GEOCODE_PROVIDER_ORDER', DEFAULT_GEOCODE_ORDER),
      'geocode',
    );
    this.timeoutMs = readNumber(configService, 'PROVIDER_TIMEOUT_MS', 5000);
  }

  /** Throws GeocodeError once every configured provider failed or found nothing. */
  async resolve(locationText: string): Promise<GeocodeMatch> {
    const query = locationText.trim();
    if (!query) {
      throw new GeocodeError(locationText, [{ provider: 'none', reason: 'empty location text' }]);
    }

    const { winner, failures, declined } = await runProviderChain({
      providers: this.providers,
      timeoutMs: this.timeoutMs,
      attempt: async (provider, signal) =>
        provider.geocode ? provider.geocode(query, { signal }) : null,
      accept: (match) => match !== null,
      onFailure: ({ provider, reason }) =>
        this.loggingService.logProviderFailure('geocode', provider, reason, { query }),
    });

    if (!winner || !winner.value) {
      const attempts = [
        ...failures,
        ...declined.map((provider) => ({ provider, reason: 'no match' })),
      ];
      throw new GeocodeError(
        locationText,
        attempts.length > 0 ? attempts : [{ provider: 'none', reason: 'no geocoding provider enabled' }],
      );
    }

    this.loggingService.logProviderSuccess('geocode', winner.provider, { query });
    return winner.value;
  }
}
