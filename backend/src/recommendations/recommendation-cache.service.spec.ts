import { ConfigService } from '@nestjs/config';
import { Place } from '@guest-concierge/shared-types';

import { InMemoryRecommendationCacheStore } from './in-memory-recommendation-cache.store';
import {
  RecommendationCacheEntry,
  RecommendationCacheKey,
  RecommendationCacheStore,
} from './recommendation-cache.store';
import { RecommendationCacheService } from './recommendation-cache.service';

const key: RecommendationCacheKey = {
  locationKey: '28.631,77.217',
  category: 'restaurants',
  language: 'hi',
};
const places: Place[] = [
  { name: 'Haldiram', rating: 4, distanceKm: 0.3, address: 'Connaught Circus', externalId: 'mmi-1' },
];
const start = new Date('2025-06-05T10:00:00.000Z');
const minutesLater = (minutes: number) => new Date(start.getTime() + minutes * 60_000);

class UnreachableStore implements RecommendationCacheStore {
  async find(): Promise<RecommendationCacheEntry | null> {
    throw new Error('connection refused');
  }

  async save(): Promise<void> {
    throw new Error('connection refused');
  }

  async purgeExpired(): Promise<number> {
    throw new Error('connection refused');
  }
}

describe('RecommendationCacheService', () => {
  const config = new ConfigService({ RECOMMENDATION_CACHE_TTL_SECONDS: '600' });
  let store: InMemoryRecommendationCacheStore;
  let service: RecommendationCacheService;

  beforeEach(() => {
    store = new InMemoryRecommendationCacheStore();
    service = new RecommendationCacheService(store, config);
  });

  it('stamps entries with the configured TTL', async () => {
    const entry = await service.store(key, places, 'mapmyindia', start);

    expect(entry?.expiresAt).toEqual(minutesLater(10));
    expect(entry?.source).toBe('mapmyindia');
  });

  it('serves an entry until the instant it expires', async () => {
    await service.store(key, places, 'mapmyindia', start);

    expect((await service.lookup(key, minutesLater(9)))?.places).toEqual(places);
    expect(await service.lookup(key, minutesLater(10))).toBeNull();
  });

  it('rounds coordinates into the location key', () => {
    expect(service.locationKeyFor({ latitude: 28.6315, longitude: 77.2167 })).toBe('28.631,77.217');
    expect(service.locationKeyFor({ latitude: -0.0001, longitude: 0 })).toBe('0.000,0.000');
  });

  it('purges only expired entries', async () => {
    await service.store(key, places, 'mapmyindia', start);
    await service.store({ ...key, language: 'en' }, places, 'google', minutesLater(5));

    expect(await service.purgeExpired(minutesLater(12))).toBe(1);
    expect(store.size()).toBe(1);
  });

  it('treats an unreachable store as a miss and skips the write', async () => {
    const degraded = new RecommendationCacheService(new UnreachableStore(), config);

    await expect(degraded.lookup(key, start)).resolves.toBeNull();
    await expect(degraded.store(key, places, 'mapmyindia', start)).resolves.toBeNull();
  });
});
