import { Inject, Injectable, Logger } from '@nestjs/common';
import { isBookingEventType, BookingEventType } from '@guest-concierge/shared-types';

import { BookingNotFoundError } from '../common/errors/concierge.errors';
import { Coordinates } from '../geo/geo.types';
import { normalizeBookingEvent } from './booking-normalizer';
import { Booking, NormalizedBookingEvent, UpsertBookingResult } from './booking.types';
import { BOOKINGS_REPOSITORY, BookingsRepository } from './bookings.repository';

export type IngestOutcome =
  | { status: 'ignored'; event: NormalizedBookingEvent }
  | {
      status: 'processed';
      eventType: BookingEventType;
      event: NormalizedBookingEvent;
      result: UpsertBookingResult;
    };

@Injectable()
export class BookingsService {
  private readonly logger = new Logger(BookingsService.name);

  constructor(
    @Inject(BOOKINGS_REPOSITORY)
    private readonly bookingsRepository: BookingsRepository,
  ) {}

  /**
   * Normalizes and upserts one inbound event. Unknown event types are
   * validated but not persisted.
   */
  async ingestEvent(payload: unknown): Promise<IngestOutcome> {
    const event = normalizeBookingEvent(payload);

    if (!isBookingEventType(event.eventType)) {
      this.logger.warn(`Ignoring unsupported event type ${event.eventType}`);
      return { status: 'ignored', event };
    }

    const draft =
      event.eventType === 'booking.cancelled'
        ? { ...event.draft, bookingStatus: 'cancelled' }
        : event.draft;

    const result = await this.bookingsRepository.upsert(draft);
    this.logger.log(
      `${result.created ? 'Created' : 'Merged'} booking ${result.booking.bookingId} (${event.variant} ${event.eventType})`,
    );

    return { status: 'processed', eventType: event.eventType, event, result };
  }

  async getBooking(bookingId: string): Promise<Booking> {
    const booking = await this.bookingsRepository.findByBookingId(bookingId);
    if (!booking) {
      throw new BookingNotFoundError(bookingId);
    }
    return booking;
  }

  async storeCoordinates(
    booking: Booking,
    geocodedLocation: string,
    coordinates: Coordinates,
  ): Promise<boolean> {
    const stored = await this.bookingsRepository.updateCoordinates(
      booking.bookingId,
      geocodedLocation,
      coordinates,
    );
    if (!stored) {
      this.logger.debug(
        `Coordinates for ${booking.bookingId} not stored; hotel location changed during geocoding`,
      );
    }
    return stored;
  }
}
