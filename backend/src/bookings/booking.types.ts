import { SupportedLanguage } from '@guest-concierge/shared-types';

import { PayloadRecord } from '../common/utils/payload-reader';

export interface Booking {
  bookingId: string;
  guestName: string;
  guestEmail: string | null;
  guestPhone: string | null;
  hotelName: string;
  hotelLocation: string;
  latitude: number | null;
  longitude: number | null;
  /** YYYY-MM-DD */
  checkInDate: string | null;
  checkOutDate: string | null;
  guestLanguage: SupportedLanguage;
  referenceNumber: string | null;
  hotelId: string | null;
  bookingStatus: string | null;
  bookingSource: PayloadRecord | null;
  rawEventData: PayloadRecord;
  createdAt: string;
  updatedAt: string;
}

/**
 * Fields extracted from one inbound event. `null` means the event did not
 * supply the field, so merging keeps whatever is stored.
 */
export interface BookingDraft {
  bookingId: string;
  guestName: string | null;
  guestEmail: string | null;
  guestPhone: string | null;
  hotelName: string | null;
  hotelLocation: string | null;
  checkInDate: string | null;
  checkOutDate: string | null;
  guestLanguage: SupportedLanguage | null;
  referenceNumber: string | null;
  hotelId: string | null;
  bookingStatus: string | null;
  bookingSource: PayloadRecord | null;
  rawEventData: PayloadRecord;
}

export interface EventEntity {
  entityName: string;
  payload: PayloadRecord;
}

export interface LegacyBookingEvent {
  variant: 'legacy';
  eventType: string | undefined;
  booking: PayloadRecord;
  raw: PayloadRecord;
}

export interface EnvelopedBookingEvent {
  variant: 'enveloped';
  eventType: string | undefined;
  entities: EventEntity[];
  raw: PayloadRecord;
}

export type InboundBookingEvent = LegacyBookingEvent | EnvelopedBookingEvent;

export interface NormalizedBookingEvent {
  variant: InboundBookingEvent['variant'];
  eventType: string;
  draft: BookingDraft;
}

export interface UpsertBookingResult {
  booking: Booking;
  created: boolean;
}
