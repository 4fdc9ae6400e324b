import { BookingSummary } from '@guest-concierge/shared-types';

import { Booking } from './booking.types';

export const toBookingSummary = (booking: Booking): BookingSummary => ({
  booking_id: booking.bookingId,
  guest_name: booking.guestName,
  guest_email: booking.guestEmail,
  guest_phone: booking.guestPhone,
  hotel_name: booking.hotelName,
  hotel_location: booking.hotelLocation,
  latitude: booking.latitude,
  longitude: booking.longitude,
  check_in_date: booking.checkInDate,
  check_out_date: booking.checkOutDate,
  guest_language: booking.guestLanguage,
  reference_number: booking.referenceNumber,
  hotel_id: booking.hotelId,
  booking_status: booking.bookingStatus,
  created_at: booking.createdAt,
  updated_at: booking.updatedAt,
});
