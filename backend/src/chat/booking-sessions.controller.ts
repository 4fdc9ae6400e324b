import { Controller, Get, Param } from '@nestjs/common';
import { ChatSessionView } from '@guest-concierge/shared-types';

import { ChatService } from './chat.service';
import { toSessionView } from './chat.view';

/** Session listing lives under /bookings but belongs to the chat module. */
@Controller('bookings')
export class BookingSessionsController {
  constructor(private readonly chatService: ChatService) {}

  @Get(':bookingId/sessions')
  async listSessions(@Param('bookingId') bookingId: string): Promise<ChatSessionView[]> {
    const sessions = await this.chatService.listSessionsForBooking(bookingId);
    return sessions.map(toSessionView);
  }
}
