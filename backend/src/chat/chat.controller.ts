import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import {
  BookingSummary,
  ChatMessageResponse,
  ChatMessageView,
  ChatSessionView,
  Place,
  SupportedLanguage,
} from '@guest-concierge/shared-types';

import { toBookingSummary } from '../bookings/booking.view';
import { ChatService, SessionSnapshot } from './chat.service';
import { toMessageView, toSessionView } from './chat.view';
import { CreateSessionDto } from './dto/create-session.dto';
import { SendMessageDto } from './dto/send-message.dto';

export interface SessionSnapshotResponse {
  session_id: string;
  language: SupportedLanguage;
  status: ChatSessionView['status'];
  booking: BookingSummary;
  messages: ChatMessageView[];
}

export interface CategoryRecommendationsResponse {
  session_id: string;
  category: string;
  recommendations: Place[];
  message: string;
}

const toSnapshotResponse = ({ session, booking, messages }: SessionSnapshot): SessionSnapshotResponse => ({
  session_id: session.sessionId,
  language: session.guestLanguage,
  status: session.status,
  booking: toBookingSummary(booking),
  messages: messages.map(toMessageView),
});

@Controller('chat')
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post('session')
  async createSession(@Body() dto: CreateSessionDto): Promise<SessionSnapshotResponse> {
    return toSnapshotResponse(await this.chatService.createSession(dto.booking_id, dto.language));
  }

  @Post('message')
  @HttpCode(200)
  async sendMessage(@Body() dto: SendMessageDto): Promise<ChatMessageResponse> {
    const response = await this.chatService.handleMessage(dto.session_id, dto.message);
    return { session_id: dto.session_id, response };
  }

  @Get('recommendations/:sessionId/:category')
  async recommendations(
    @Param('sessionId') sessionId: string,
    @Param('category') category: string,
  ): Promise<CategoryRecommendationsResponse> {
    const result = await this.chatService.recommendByCategory(sessionId, category);
    return { session_id: sessionId, ...result };
  }

  @Get('history/:sessionId')
  async history(@Param('sessionId') sessionId: string): Promise<SessionSnapshotResponse> {
    return toSnapshotResponse(await this.chatService.getHistory(sessionId));
  }

  @Post('session/:sessionId/close')
  @HttpCode(200)
  async closeSession(@Param('sessionId') sessionId: string): Promise<ChatSessionView> {
    return toSessionView(await this.chatService.closeSession(sessionId));
  }
}
