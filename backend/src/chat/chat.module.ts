import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { BookingsModule } from '../bookings/bookings.module';
import { resolvePersistenceDriver } from '../config/config.helpers';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/database.service';
import { GeoModule } from '../geo/geo.module';
import { RecommendationsModule } from '../recommendations/recommendations.module';
import { BookingSessionsController } from './booking-sessions.controller';
import { CHAT_SESSIONS_REPOSITORY } from './chat-sessions.repository';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { InMemoryChatSessionsRepository } from './in-memory-chat-sessions.repository';
import { IntentService } from './intent.service';
import { PgChatSessionsRepository } from './pg-chat-sessions.repository';

@Module({
  imports: [DatabaseModule, BookingsModule, GeoModule, RecommendationsModule],
  controllers: [ChatController, BookingSessionsController],
  providers: [
    {
      provide: CHAT_SESSIONS_REPOSITORY,
      inject: [ConfigService, DatabaseService],
      useFactory: (config: ConfigService, database: DatabaseService) =>
        resolvePersistenceDriver(config) === 'postgres'
          ? new PgChatSessionsRepository(database)
          : new InMemoryChatSessionsRepository(),
    },
    IntentService,
    ChatService,
  ],
  exports: [ChatService],
})
export class ChatModule {}
