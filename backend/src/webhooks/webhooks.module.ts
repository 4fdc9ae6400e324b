import { Module } from '@nestjs/common';

import { BookingsModule } from '../bookings/bookings.module';
import { ChatModule } from '../chat/chat.module';
import { SecurityModule } from '../security/security.module';
import { BookingEventsService } from './booking-events.service';
import { BookingWebhookController } from './booking.webhook.controller';

@Module({
  imports: [BookingsModule, ChatModule, SecurityModule],
  controllers: [BookingWebhookController],
  providers: [BookingEventsService],
})
export class WebhooksModule {}
