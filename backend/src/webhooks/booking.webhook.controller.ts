import {
  Body,
  Controller,
  Headers,
  HttpCode,
  Logger,
  OnModuleInit,
  Post,
  RawBodyRequest,
  Req,
} from '@nestjs/common';
import { BookingWebhookAck } from '@guest-concierge/shared-types';
import { Request } from 'express';

import { readString } from '../common/utils/payload-reader';
import { LoggingService } from '../logging/logging.service';
import { WebhookSignatureService } from '../security/webhook-signature.service';
import { BookingEventsService } from './booking-events.service';

@Controller('webhooks')
export class BookingWebhookController implements OnModuleInit {
  private readonly logger = new Logger(BookingWebhookController.name);

  constructor(
    private readonly bookingEventsService: BookingEventsService,
    private readonly signatureService: WebhookSignatureService,
    private readonly loggingService: LoggingService,
  ) {}

  onModuleInit(): void {
    if (!this.signatureService.isEnabled()) {
      this.logger.warn('WEBHOOK_SECRET is not set, booking webhooks are accepted unsigned');
    }
  }

  @Post('booking')
  @HttpCode(200)
  async handleBookingEvent(
    @Req() req: Pick<RawBodyRequest<Request>, 'rawBody'>,
    @Headers('x-webhook-signature') signature: string | undefined,
    @Body() payload: unknown,
  ): Promise<BookingWebhookAck> {
    const eventType = readString(payload, 'event_type') ?? 'unknown';

    try {
      this.signatureService.verify(req.rawBody, signature);
    } catch (error) {
      this.loggingService.logBookingEventError(error, undefined, eventType);
      throw error;
    }

    let ack: BookingWebhookAck;
    try {
      ack = await this.bookingEventsService.process(payload);
    } catch (error) {
      this.loggingService.logBookingEventError(error, payload, eventType);
      throw error;
    }

    this.loggingService.logBookingEvent(payload, ack.eventType, ack.bookingId);
    return ack;
  }
}
