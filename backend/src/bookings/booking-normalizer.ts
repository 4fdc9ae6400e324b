import { isSupportedLanguage, DEFAULT_LANGUAGE, SupportedLanguage } from '@guest-concierge/shared-types';
import { isValid, parseISO } from 'date-fns';

import { MalformedEventError } from '../common/errors/concierge.errors';
import {
  PayloadRecord,
  isRecord,
  readArray,
  readRecord,
  readString,
} from '../common/utils/payload-reader';
import {
  BookingDraft,
  EnvelopedBookingEvent,
  EventEntity,
  InboundBookingEvent,
  LegacyBookingEvent,
  NormalizedBookingEvent,
} from './booking.types';

const DEFAULT_EVENT_TYPE = 'booking.created';

/**
 * Classifies a raw webhook body into one of the two supported event shapes.
 * A non-empty `events` list wins over a `booking` object; an empty one is ignored.
 */
export function detectEventShape(payload: unknown): InboundBookingEvent {
  if (!isRecord(payload)) {
    throw new MalformedEventError('payload must be a JSON object');
  }

  const eventType = readString(payload, 'event_type');

  if (Array.isArray(payload.events) && payload.events.length > 0) {
    const entities: EventEntity[] = payload.events.flatMap((entry): EventEntity[] => {
      const entityName = readString(entry, 'entity_name');
      const entityPayload = readRecord(entry, 'payload');
      return entityName && entityPayload ? [{ entityName, payload: entityPayload }] : [];
    });

    return { variant: 'enveloped', eventType, entities, raw: payload };
  }

  if (isRecord(payload.booking)) {
    return { variant: 'legacy', eventType, booking: payload.booking, raw: payload };
  }

  throw new MalformedEventError('expected either a non-empty "events" list or a "booking" object');
}

export function normalizeBookingEvent(payload: unknown): NormalizedBookingEvent {
  const event = detectEventShape(payload);

  switch (event.variant) {
    case 'legacy':
      return {
        variant: event.variant,
        eventType: event.eventType ?? DEFAULT_EVENT_TYPE,
        draft: normalizeLegacy(event),
      };
    case 'enveloped':
      return {
        variant: event.variant,
        eventType: event.eventType ?? DEFAULT_EVENT_TYPE,
        draft: normalizeEnveloped(event),
      };
  }
}

function normalizeLegacy(event: LegacyBookingEvent): BookingDraft {
  const booking = event.booking;

  return {
    bookingId: requireIdentifier(booking),
    guestName: readString(booking, 'guest_name') ?? null,
    guestEmail: readString(booking, 'guest_email') ?? null,
    guestPhone: readString(booking, 'guest_phone') ?? null,
    hotelName: readString(booking, 'hotel_name') ?? null,
    hotelLocation: readString(booking, 'hotel_location') ?? null,
    checkInDate: toCalendarDate(booking, 'check_in_date', 'checkin_date'),
    checkOutDate: toCalendarDate(booking, 'check_out_date', 'checkout_date'),
    guestLanguage: normalizeLanguage(booking),
    referenceNumber: readString(booking, 'reference_number') ?? null,
    hotelId: readString(booking, 'hotel_id') ?? null,
    bookingStatus: readString(booking, 'status', 'booking_status') ?? null,
    bookingSource: null,
    rawEventData: event.raw,
  };
}

function normalizeEnveloped(event: EnvelopedBookingEvent): BookingDraft {
  const booking = event.entities.find((entity) => entity.entityName === 'booking')?.payload;
  if (!booking) {
    throw new MalformedEventError('no "booking" entity in events list');
  }

  // A missing bill leaves the hotel fields unset instead of rejecting the event
  const vendor = readRecord(
    event.entities.find((entity) => entity.entityName === 'bill')?.payload,
    'vendor_details',
  );
  const customer = selectPrimaryCustomer(readArray(booking, 'customers'));

  return {
    bookingId: requireIdentifier(booking),
    guestName: customer ? composeName(customer) : null,
    guestEmail: readString(customer, 'email') ?? null,
    guestPhone: customer ? composePhone(customer) : null,
    hotelName: readString(vendor, 'hotel_name', 'vendor_name') ?? null,
    hotelLocation:
      readString(booking, 'hotel_location') ??
      readString(vendor, 'hotel_location') ??
      composeAddress(readRecord(vendor, 'address')),
    checkInDate: toCalendarDate(booking, 'checkin_date', 'check_in_date'),
    checkOutDate: toCalendarDate(booking, 'checkout_date', 'check_out_date'),
    guestLanguage: normalizeLanguage(booking),
    referenceNumber: readString(booking, 'reference_number') ?? null,
    hotelId: readString(booking, 'hotel_id') ?? null,
    bookingStatus: readString(booking, 'status') ?? null,
    bookingSource: readRecord(booking, 'source') ?? null,
    rawEventData: event.raw,
  };
}

function requireIdentifier(booking: PayloadRecord): string {
  const bookingId = readString(booking, 'booking_id', 'reference_number');
  if (!bookingId) {
    throw new MalformedEventError('booking_id and reference_number are both missing');
  }
  return bookingId;
}

/** Explicit primary first, then the first real guest with an email, then any real guest. */
export function selectPrimaryCustomer(customers: unknown[]): PayloadRecord | undefined {
  const candidates = customers.filter(isRecord);
  const real = candidates.filter((customer) => customer.dummy !== true);

  return (
    candidates.find((customer) => customer.is_primary === true) ??
    real.find((customer) => readString(customer, 'email') !== undefined) ??
    real[0]
  );
}

function composeName(customer: PayloadRecord): string | null {
  const parts = [readString(customer, 'first_name'), readString(customer, 'last_name')].filter(
    (part): part is string => part !== undefined,
  );
  return parts.length > 0 ? parts.join(' ') : null;
}

function composePhone(customer: PayloadRecord): string | null {
  const number = readString(customer, 'phone.number');
  if (!number) {
    return null;
  }
  return `${readString(customer, 'phone.country_code') ?? ''}${number}`;
}

function composeAddress(address: PayloadRecord | undefined): string | null {
  const parts = ['field_1', 'city', 'state']
    .map((field) => readString(address, field))
    .filter((part): part is string => part !== undefined);
  return parts.length > 0 ? parts.join(', ') : null;
}

function normalizeLanguage(booking: PayloadRecord): SupportedLanguage | null {
  const raw = readString(booking, 'guest_language', 'language');
  if (raw === undefined) {
    return null;
  }

  const code = raw.toLowerCase().split(/[-_]/)[0];
  return isSupportedLanguage(code) ? code : DEFAULT_LANGUAGE;
}

/** Keeps the calendar date as written, so `2025-06-05T23:00:00+05:30` stays on the 5th. */
function toCalendarDate(source: PayloadRecord, ...paths: string[]): string | null {
  const raw = readString(source, ...paths);
  if (raw === undefined) {
    return null;
  }

  const datePart = raw.slice(0, 10);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(datePart) || !isValid(parseISO(datePart))) {
    throw new MalformedEventError(`unparseable date "${raw}"`);
  }
  return datePart;
}
