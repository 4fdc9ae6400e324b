import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';

import { ChatService } from '../chat/chat.service';
import { errorMessage } from '../common/utils/error-message';
import { RecommendationCacheService } from '../recommendations/recommendation-cache.service';

@Injectable()
export class MaintenanceService {
  private readonly logger = new Logger(MaintenanceService.name);

  constructor(
    private readonly cacheService: RecommendationCacheService,
    private readonly chatService: ChatService,
  ) {}

  @Cron(CronExpression.EVERY_10_MINUTES)
  async purgeExpiredRecommendations(now: Date = new Date()): Promise<number> {
    try {
      const purged = await this.cacheService.purgeExpired(now);
      if (purged > 0) {
        this.logger.log(`Purged ${purged} expired recommendation cache entries`);
      } else {
        this.logger.debug('No expired recommendation cache entries');
      }
      return purged;
    } catch (error) {
      this.logger.error(`Recommendation cache purge failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  @Cron(CronExpression.EVERY_HOUR)
  async closeStaleSessions(now: Date = new Date()): Promise<number> {
    try {
      return await this.chatService.deactivateStaleSessions(now);
    } catch (error) {
      this.logger.error(`Stale session sweep failed: ${errorMessage(error)}`);
      return 0;
    }
  }
}
