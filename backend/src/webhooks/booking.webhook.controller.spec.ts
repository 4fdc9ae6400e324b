import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { BookingWebhookAck } from '@guest-concierge/shared-types';
import { createHmac } from 'crypto';

import { legacyEvent } from '../bookings/booking-events.fixture';
import { InvalidSignatureError } from '../common/errors/concierge.errors';
import { LoggingService } from '../logging/logging.service';
import { WebhookSignatureService } from '../security/webhook-signature.service';
import { BookingEventsService } from './booking-events.service';
import { BookingWebhookController } from './booking.webhook.controller';

const ack: BookingWebhookAck = {
  received: true,
  status: 'processed',
  eventType: 'booking.created',
  bookingId: 'TRB1',
  sessionId: 'session-1',
};

describe('BookingWebhookController', () => {
  const rawBody = Buffer.from(JSON.stringify(legacyEvent));
  const signature = `sha256=${createHmac('sha256', 'test-secret').update(rawBody).digest('hex')}`;

  let processEvent: jest.Mock<Promise<BookingWebhookAck>, [unknown]>;
  let loggingService: LoggingService;
  let controller: BookingWebhookController;

  beforeEach(async () => {
    const config = new ConfigService({ NODE_ENV: 'test', WEBHOOK_SECRET: 'test-secret' });
    processEvent = jest.fn<Promise<BookingWebhookAck>, [unknown]>();
    loggingService = new LoggingService(config);

    const module = await Test.createTestingModule({
      controllers: [BookingWebhookController],
      providers: [
        { provide: BookingEventsService, useValue: { process: processEvent } },
        { provide: WebhookSignatureService, useValue: new WebhookSignatureService(config) },
        { provide: LoggingService, useValue: loggingService },
      ],
    }).compile();

    controller = module.get(BookingWebhookController);
  });

  it('processes a correctly signed event and logs it', async () => {
    processEvent.mockResolvedValue(ack);
    const logEvent = jest.spyOn(loggingService, 'logBookingEvent');

    await expect(controller.handleBookingEvent({ rawBody }, signature, legacyEvent)).resolves.toEqual(ack);
    expect(processEvent).toHaveBeenCalledWith(legacyEvent);
    expect(logEvent).toHaveBeenCalledWith(legacyEvent, 'booking.created', 'TRB1');
  });

  it('rejects an unsigned event before processing it', async () => {
    const logError = jest.spyOn(loggingService, 'logBookingEventError');

    await expect(
      controller.handleBookingEvent({ rawBody }, undefined, legacyEvent),
    ).rejects.toBeInstanceOf(InvalidSignatureError);
    expect(processEvent).not.toHaveBeenCalled();
    expect(logError).toHaveBeenCalledWith(expect.any(InvalidSignatureError), undefined, 'booking.created');
  });

  it('logs and rethrows processing failures', async () => {
    const failure = new Error('store offline');
    processEvent.mockRejectedValue(failure);
    const logError = jest.spyOn(loggingService, 'logBookingEventError');

    await expect(controller.handleBookingEvent({ rawBody }, signature, legacyEvent)).rejects.toBe(failure);
    expect(logError).toHaveBeenCalledWith(failure, legacyEvent, 'booking.created');
  });

  describe('onModuleInit', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('stays quiet when a webhook secret is configured', () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      controller.onModuleInit();

      expect(warn).not.toHaveBeenCalled();
    });

    it('warns that unsigned events are accepted without a secret', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      const module = await Test.createTestingModule({
        controllers: [BookingWebhookController],
        providers: [
          { provide: BookingEventsService, useValue: { process: processEvent } },
          {
            provide: WebhookSignatureService,
            useValue: new WebhookSignatureService(new ConfigService({ NODE_ENV: 'test' })),
          },
          { provide: LoggingService, useValue: loggingService },
        ],
      }).compile();

      module.get(BookingWebhookController).onModuleInit();

      expect(warn).toHaveBeenCalledWith(
        'WEBHOOK_SECRET is not set, booking webhooks are accepted unsigned',
      );
    });
  });
});
