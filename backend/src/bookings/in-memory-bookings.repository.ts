import { Injectable } from '@nestjs/common';

import { Coordinates } from '../geo/geo.types';
import { mergeBooking } from './booking-merge';
import { Booking, BookingDraft, UpsertBookingResult } from './booking.types';
import { BookingsRepository } from './bookings.repository';

@Injectable()
export class InMemoryBookingsRepository implements BookingsRepository {
  private readonly bookings = new Map<string, Booking>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async upsert(draft: BookingDraft): Promise<UpsertBookingResult> {
    const existing = this.bookings.get(draft.bookingId) ?? null;
    const booking = mergeBooking(existing, draft, this.clock());
    this.bookings.set(booking.bookingId, booking);
    return { booking: { ...booking }, created: existing === null };
  }

  async findByBookingId(bookingId: string): Promise<Booking | null> {
    const booking = this.bookings.get(bookingId);
    return booking ? { ...booking } : null;
  }

  async updateCoordinates(
    bookingId: string,
    geocodedLocation: string,
    coordinates: Coordinates,
  ): Promise<boolean> {
    const booking = this.bookings.get(bookingId);
    if (!booking || booking.hotelLocation !== geocodedLocation) {
      return false;
    }

    this.bookings.set(bookingId, {
      ...booking,
      latitude: coordinates.latitude,
      longitude: coordinates.longitude,
      updatedAt: this.clock().toISOString(),
    });
    return true;
  }

  count(): number {
    return this.bookings.size;
  }
}
