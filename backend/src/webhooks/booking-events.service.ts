import { Injectable, Logger } from '@nestjs/common';
import { BookingWebhookAck } from '@guest-concierge/shared-types';

import { BookingsService } from '../bookings/bookings.service';
import { ChatService } from '../chat/chat.service';

/**
 * Applies an ingested booking event to the conversation side: new bookings
 * get a session, cancellations close theirs.
 */
@Injectable()
export class BookingEventsService {
  private readonly logger = new Logger(BookingEventsService.name);

  constructor(
    private readonly bookingsService: BookingsService,
    private readonly chatService: ChatService,
  ) {}

  async process(payload: unknown): Promise<BookingWebhookAck> {
    const outcome = await this.bookingsService.ingestEvent(payload);

    if (outcome.status === 'ignored') {
      return {
        received: true,
        status: 'ignored',
        eventType: outcome.event.eventType,
        bookingId: outcome.event.draft.bookingId,
        sessionId: null,
      };
    }

    const bookingId = outcome.result.booking.bookingId;
    let sessionId: string | null = null;

    switch (outcome.eventType) {
      case 'booking.created': {
        const { session, created } = await this.chatService.ensureSessionForBooking(bookingId);
        if (created) {
          this.logger.log(`Opened chat session ${session.sessionId} for booking ${bookingId}`);
        }
        sessionId = session.sessionId;
        break;
      }
      case 'booking.updated': {
        const session = await this.chatService.findActiveSessionForBooking(bookingId);
        sessionId = session?.sessionId ?? null;
        break;
      }
      case 'booking.cancelled': {
        const closed = await this.chatService.closeSessionsForBooking(bookingId);
        this.logger.log(`Booking ${bookingId} cancelled; closed ${closed} chat session(s)`);
        break;
      }
    }

    return {
      received: true,
      status: 'processed',
      eventType: outcome.eventType,
      bookingId,
      sessionId,
    };
  }
}
