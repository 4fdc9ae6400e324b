import { Controller, Get, Param } from '@nestjs/common';
import { BookingSummary } from '@guest-concierge/shared-types';

import { toBookingSummary } from './booking.view';
import { BookingsService } from './bookings.service';

@Controller('bookings')
export class BookingsController {
  constructor(private readonly bookingsService: BookingsService) {}

  @Get(':bookingId')
  async getBooking(@Param('bookingId') bookingId: string): Promise<BookingSummary> {
    return toBookingSummary(await this.bookingsService.getBooking(bookingId));
  }
}
