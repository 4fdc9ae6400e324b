import { Place, RecommendationCategory, SupportedLanguage } from '@guest-concierge/shared-types';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface GeocodeMatch extends Coordinates {
  formattedAddress: string | null;
}

export interface NearbySearchRequest {
  origin: Coordinates;
  category: RecommendationCategory;
  radiusMeters: number;
  language: SupportedLanguage;
}

export interface ProviderCallOptions {
  signal?: AbortSignal;
}

/**
 * Uniform capability surface of an external place backend. Adapters implement
 * whichever capabilities their backend offers; chains skip the rest.
 */
export interface PlaceProvider {
  readonly name: string;

  /** False when credentials are missing; the chains skip disabled providers. */
  isEnabled(): boolean;

  /** Resolves to null when the backend answered but found no match. */
  geocode?(locationText: string, options?: ProviderCallOptions): Promise<GeocodeMatch | null>;

  searchNearby?(request: NearbySearchRequest, options?: ProviderCallOptions): Promise<Place[]>;
}

export const PLACE_PROVIDERS = Symbol('PLACE_PROVIDERS');
