import { Test, TestingModule } from '@nestjs/testing';

import { BookingNotFoundError, MalformedEventError } from '../common/errors/concierge.errors';
import { envelopedEvent, legacyEvent } from './booking-events.fixture';
import { Booking } from './booking.types';
import { BOOKINGS_REPOSITORY } from './bookings.repository';
import { BookingsService } from './bookings.service';
import { InMemoryBookingsRepository } from './in-memory-bookings.repository';

describe('BookingsService', () => {
  let service: BookingsService;
  let repository: InMemoryBookingsRepository;

  beforeEach(async () => {
    repository = new InMemoryBookingsRepository(() => new Date('2025-06-01T10:00:00.000Z'));

    const module: TestingModule = await Test.createTestingModule({
      providers: [BookingsService, { provide: BOOKINGS_REPOSITORY, useValue: repository }],
    }).compile();

    service = module.get(BookingsService);
  });

  const stripAudit = ({ rawEventData: _raw, bookingSource: _source, ...rest }: Booking) => rest;

  it('creates a booking on first sight and merges on redelivery', async () => {
    const first = await service.ingestEvent(legacyEvent);
    const second = await service.ingestEvent(legacyEvent);

    expect(first.status === 'processed' && first.result.created).toBe(true);
    expect(second.status === 'processed' && second.result.created).toBe(false);
    expect(repository.count()).toBe(1);
  });

  it('stores field-equal bookings for either event shape', async () => {
    await service.ingestEvent(legacyEvent);
    const fromLegacy = await service.getBooking('TRB1');

    const otherRepository = new InMemoryBookingsRepository(
      () => new Date('2025-06-01T10:00:00.000Z'),
    );
    const other = new BookingsService(otherRepository);
    await other.ingestEvent(envelopedEvent);
    const fromEnveloped = await other.getBooking('TRB1');

    expect(stripAudit(fromEnveloped)).toEqual(stripAudit(fromLegacy));
    expect(fromEnveloped.bookingSource).toEqual({ channel: 'ota' });
  });

  it('keeps stored fields the update does not supply', async () => {
    await service.ingestEvent(legacyEvent);
    await service.ingestEvent({
      event_type: 'booking.updated',
      booking: { booking_id: 'TRB1', guest_phone: '+919800000002' },
    });

    const booking = await service.getBooking('TRB1');
    expect(booking.guestPhone).toBe('+919800000002');
    expect(booking.guestName).toBe('Asha Rao');
    expect(booking.guestLanguage).toBe('hi');
  });

  it('clears stored coordinates when the hotel location changes', async () => {
    await service.ingestEvent(legacyEvent);
    const booking = await service.getBooking('TRB1');
    await service.storeCoordinates(booking, booking.hotelLocation, {
      latitude: 28.6315,
      longitude: 77.2167,
    });

    await service.ingestEvent({
      event_type: 'booking.updated',
      booking: { booking_id: 'TRB1', hotel_location: 'Bandra West, Mumbai' },
    });

    const moved = await service.getBooking('TRB1');
    expect(moved.hotelLocation).toBe('Bandra West, Mumbai');
    expect(moved.latitude).toBeNull();
    expect(moved.longitude).toBeNull();
  });

  it('does not store coordinates geocoded for a superseded location', async () => {
    await service.ingestEvent(legacyEvent);
    const booking = await service.getBooking('TRB1');

    const stored = await service.storeCoordinates(booking, 'Old Town', {
      latitude: 1,
      longitude: 2,
    });

    expect(stored).toBe(false);
    expect((await service.getBooking('TRB1')).latitude).toBeNull();
  });

  it('applies defaults for a sparse new booking', async () => {
    await service.ingestEvent({ booking: { booking_id: 'B2' } });

    const booking = await service.getBooking('B2');
    expect(booking.guestName).toBe('');
    expect(booking.hotelName).toBe('');
    expect(booking.guestLanguage).toBe('en');
  });

  it('marks cancelled bookings', async () => {
    await service.ingestEvent(legacyEvent);
    const outcome = await service.ingestEvent({ ...legacyEvent, event_type: 'booking.cancelled' });

    expect(outcome.status).toBe('processed');
    expect((await service.getBooking('TRB1')).bookingStatus).toBe('cancelled');
  });

  it('ignores unsupported event types without persisting', async () => {
    const outcome = await service.ingestEvent({ ...legacyEvent, event_type: 'booking.archived' });

    expect(outcome.status).toBe('ignored');
    expect(repository.count()).toBe(0);
  });

  it('persists nothing for malformed events', async () => {
    await expect(service.ingestEvent({ booking: { guest_name: 'x' } })).rejects.toThrow(
      MalformedEventError,
    );
    expect(repository.count()).toBe(0);
  });

  it('reports unknown bookings', async () => {
    await expect(service.getBooking('missing')).rejects.toThrow(BookingNotFoundError);
  });
});
