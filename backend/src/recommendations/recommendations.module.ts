import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { resolvePersistenceDriver } from '../config/config.helpers';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/database.service';
import { GeoModule } from '../geo/geo.module';
import { InMemoryRecommendationCacheStore } from './in-memory-recommendation-cache.store';
import { PgRecommendationCacheStore } from './pg-recommendation-cache.store';
import { RECOMMENDATION_CACHE_STORE } from './recommendation-cache.store';
import { RecommendationCacheService } from './recommendation-cache.service';
import { RecommendationsService } from './recommendations.service';

@Module({
  imports: [DatabaseModule, GeoModule],
  providers: [
    {
      provide: RECOMMENDATION_CACHE_STORE,
      inject: [ConfigService, DatabaseService],
      useFactory: (config: ConfigService, database: DatabaseService) =>
        resolvePersistenceDriver(config) === 'postgres'
          ? new PgRecommendationCacheStore(database)
          : new InMemoryRecommendationCacheStore(),
    },
    RecommendationCacheService,
    RecommendationsService,
  ],
  exports: [RecommendationsService, RecommendationCacheService],
})
export class RecommendationsModule {}
