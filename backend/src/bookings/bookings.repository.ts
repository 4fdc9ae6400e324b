import { Coordinates } from '../geo/geo.types';
import { Booking, BookingDraft, UpsertBookingResult } from './booking.types';

export const BOOKINGS_REPOSITORY = Symbol('BOOKINGS_REPOSITORY');

export interface BookingsRepository {
  /** Atomic create-or-merge keyed by bookingId. */
  upsert(draft: BookingDraft): Promise<UpsertBookingResult>;

  findByBookingId(bookingId: string): Promise<Booking | null>;

  /**
   * Stores geocoded coordinates only if the hotel location is still the one
   * that was geocoded. Returns false when the location changed meanwhile.
   */
  updateCoordinates(
    bookingId: string,
    geocodedLocation: string,
    coordinates: Coordinates,
  ): Promise<boolean>;
}
