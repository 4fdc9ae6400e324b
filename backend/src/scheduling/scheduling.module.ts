import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';

import { ChatModule } from '../chat/chat.module';
import { RecommendationsModule } from '../recommendations/recommendations.module';
import { MaintenanceService } from './maintenance.service';

@Module({
  imports: [ScheduleModule.forRoot(), RecommendationsModule, ChatModule],
  providers: [MaintenanceService],
})
export class SchedulingModule {}
