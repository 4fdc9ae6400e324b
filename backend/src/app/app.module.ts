import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { BookingsModule } from '../bookings/bookings.module';
import { ChatModule } from '../chat/chat.module';
import { validateEnvironment } from '../config/env.validation';
import { DatabaseModule } from '../database/database.module';
import { I18nModule } from '../i18n/i18n.module';
import { LoggingModule } from '../logging/logging.module';
import { SchedulingModule } from '../scheduling/scheduling.module';
import { WebhooksModule } from '../webhooks/webhooks.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    LoggingModule,
    I18nModule,
    DatabaseModule,
    BookingsModule,
    ChatModule,
    WebhooksModule,
    SchedulingModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
