import { DEFAULT_LANGUAGE } from '@guest-concierge/shared-types';

import { Booking, BookingDraft } from './booking.types';

/**
 * Field-level merge of an event draft into the stored booking: supplied fields
 * overwrite, unsupplied fields keep their stored value. A changed hotel
 * location invalidates the stored coordinates. The PostgreSQL repository
 * performs the same merge inside its upsert statement.
 */
export function mergeBooking(existing: Booking | null, draft: BookingDraft, now: Date): Booking {
  const timestamp = now.toISOString();

  if (!existing) {
    return {
      bookingId: draft.bookingId,
      guestName: draft.guestName ?? '',
      guestEmail: draft.guestEmail,
      guestPhone: draft.guestPhone,
      hotelName: draft.hotelName ?? '',
      hotelLocation: draft.hotelLocation ?? '',
      latitude: null,
      longitude: null,
      checkInDate: draft.checkInDate,
      checkOutDate: draft.checkOutDate,
      guestLanguage: draft.guestLanguage ?? DEFAULT_LANGUAGE,
      referenceNumber: draft.referenceNumber,
      hotelId: draft.hotelId,
      bookingStatus: draft.bookingStatus,
      bookingSource: draft.bookingSource,
      rawEventData: draft.rawEventData,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  const locationChanged =
    draft.hotelLocation !== null && draft.hotelLocation !== existing.hotelLocation;

  return {
    bookingId: existing.bookingId,
    guestName: draft.guestName ?? existing.guestName,
    guestEmail: draft.guestEmail ?? existing.guestEmail,
    guestPhone: draft.guestPhone ?? existing.guestPhone,
    hotelName: draft.hotelName ?? existing.hotelName,
    hotelLocation: draft.hotelLocation ?? existing.hotelLocation,
    latitude: locationChanged ? null : existing.latitude,
    longitude: locationChanged ? null : existing.longitude,
    checkInDate: draft.checkInDate ?? existing.checkInDate,
    checkOutDate: draft.checkOutDate ?? existing.checkOutDate,
    guestLanguage: draft.guestLanguage ?? existing.guestLanguage,
    referenceNumber: draft.referenceNumber ?? existing.referenceNumber,
    hotelId: draft.hotelId ?? existing.hotelId,
    bookingStatus: draft.bookingStatus ?? existing.bookingStatus,
    bookingSource: draft.bookingSource ?? existing.bookingSource,
    rawEventData: draft.rawEventData,
    createdAt: existing.createdAt,
    updatedAt: timestamp,
  };
}
