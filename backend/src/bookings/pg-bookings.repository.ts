import { Injectable, Logger } from '@nestjs/common';
import { isSupportedLanguage, DEFAULT_LANGUAGE } from '@guest-concierge/shared-types';

import { isRecord } from '../common/utils/payload-reader';
import { DatabaseService } from '../database/database.service';
import { Coordinates } from '../geo/geo.types';
import { Booking, BookingDraft, UpsertBookingResult } from './booking.types';
import { BookingsRepository } from './bookings.repository';

interface BookingRow {
  booking_id: string;
  guest_name: string;
  guest_email: string | null;
  guest_phone: string | null;
  hotel_name: string;
  hotel_location: string;
  latitude: number | null;
  longitude: number | null;
  check_in_date: string | null;
  check_out_date: string | null;
  guest_language: string;
  reference_number: string | null;
  hotel_id: string | null;
  booking_status: string | null;
  booking_source: unknown;
  raw_event_data: unknown;
  created_at: Date;
  updated_at: Date;
}

const BOOKING_COLUMNS = `
  booking_id, guest_name, guest_email, guest_phone, hotel_name, hotel_location,
  latitude, longitude,
  to_char(check_in_date, 'YYYY-MM-DD') as check_in_date,
  to_char(check_out_date, 'YYYY-MM-DD') as check_out_date,
  guest_language, reference_number, hotel_id, booking_status,
  booking_source, raw_event_data, created_at, updated_at`;

// Coordinates are cleared in the same statement when the hotel location changes
const UPSERT_SQL = `
  insert into bookings (
    booking_id, guest_name, guest_email, guest_phone, hotel_name, hotel_location,
    check_in_date, check_out_date, guest_language, reference_number, hotel_id,
    booking_status, booking_source, raw_event_data
  ) values (
    $1, coalesce($2, ''), $3, $4, coalesce($5, ''), coalesce($6, ''),
    $7::date, $8::date, coalesce($9, 'en'), $10, $11, $12, $13::jsonb, $14::jsonb
  )
  on conflict (booking_id) do update set
    guest_name       = coalesce($2, bookings.guest_name),
    guest_email      = coalesce($3, bookings.guest_email),
    guest_phone      = coalesce($4, bookings.guest_phone),
    hotel_name       = coalesce($5, bookings.hotel_name),
    hotel_location   = coalesce($6, bookings.hotel_location),
    latitude         = case when $6 is not null and $6 <> bookings.hotel_location then null else bookings.latitude end,
    longitude        = case when $6 is not null and $6 <> bookings.hotel_location then null else bookings.longitude end,
    check_in_date    = coalesce($7::date, bookings.check_in_date),
    check_out_date   = coalesce($8::date, bookings.check_out_date),
    guest_language   = coalesce($9, bookings.guest_language),
    reference_number = coalesce($10, bookings.reference_number),
    hotel_id         = coalesce($11, bookings.hotel_id),
    booking_status   = coalesce($12, bookings.booking_status),
    booking_source   = coalesce($13::jsonb, bookings.booking_source),
    raw_event_data   = $14::jsonb,
    updated_at       = now()
  returning ${BOOKING_COLUMNS}, (xmax = 0) as inserted`;

@Injectable()
export class PgBookingsRepository implements BookingsRepository {
  private readonly logger = new Logger(PgBookingsRepository.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async upsert(draft: BookingDraft): Promise<UpsertBookingResult> {
    const result = await this.databaseService.runQuery<BookingRow & { inserted: boolean }>(
      UPSERT_SQL,
      [
        draft.bookingId,
        draft.guestName,
        draft.guestEmail,
        draft.guestPhone,
        draft.hotelName,
        draft.hotelLocation,
        draft.checkInDate,
        draft.checkOutDate,
        draft.guestLanguage,
        draft.referenceNumber,
        draft.hotelId,
        draft.bookingStatus,
        draft.bookingSource === null ? null : JSON.stringify(draft.bookingSource),
        JSON.stringify(draft.rawEventData),
      ],
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`Upsert of booking ${draft.bookingId} returned no row`);
    }

    return { booking: this.mapRow(row), created: row.inserted };
  }

  async findByBookingId(bookingId: string): Promise<Booking | null> {
    const result = await this.databaseService.runQuery<BookingRow>(
      `select ${BOOKING_COLUMNS} from bookings where booking_id = $1`,
      [bookingId],
    );
    const row = result.rows[0];
    return row ? this.mapRow(row) : null;
  }

  async updateCoordinates(
    bookingId: string,
    geocodedLocation: string,
    coordinates: Coordinates,
  ): Promise<boolean> {
    const result = await this.databaseService.runQuery(
      `update bookings
          set latitude = $3, longitude = $4, updated_at = now()
        where booking_id = $1 and hotel_location = $2`,
      [bookingId, geocodedLocation, coordinates.latitude, coordinates.longitude],
    );

    if (!result.rowCount) {
      this.logger.debug(`Skipped coordinate update for ${bookingId}: location changed`);
      return false;
    }
    return true;
  }

  private mapRow(row: BookingRow): Booking {
    return {
      bookingId: row.booking_id,
      guestName: row.guest_name,
      guestEmail: row.guest_email,
      guestPhone: row.guest_phone,
      hotelName: row.hotel_name,
      hotelLocation: row.hotel_location,
      latitude: row.latitude,
      longitude: row.longitude,
      checkInDate: row.check_in_date,
      checkOutDate: row.check_out_date,
      guestLanguage: isSupportedLanguage(row.guest_language) ? row.guest_language : DEFAULT_LANGUAGE,
      referenceNumber: row.reference_number,
      hotelId: row.hotel_id,
      bookingStatus: row.booking_status,
      bookingSource: isRecord(row.booking_source) ? row.booking_source : null,
      rawEventData: isRecord(row.raw_event_data) ? row.raw_event_data : {},
      createdAt: row.created_at.toISOString(),
      updatedAt: row.updated_at.toISOString(),
    };
  }
}
