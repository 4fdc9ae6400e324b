import { ChatMessageView, ChatSessionView } from '@guest-concierge/shared-types';

import { ChatMessage, ChatSession, isSessionActive } from './chat.types';

export const toSessionView = (session: ChatSession): ChatSessionView => ({
  session_id: session.sessionId,
  booking_id: session.bookingId,
  guest_language: session.guestLanguage,
  status: session.status,
  is_active: isSessionActive(session),
  created_at: session.createdAt,
  updated_at: session.updatedAt,
});

export const toMessageView = (message: ChatMessage): ChatMessageView => ({
  id: message.id,
  message_type: message.messageType,
  content: message.content,
  metadata: message.metadata,
  timestamp: message.timestamp,
});
