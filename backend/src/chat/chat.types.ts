import {
  ChatMessageType,
  ChatSessionStatus,
  RecommendationCategory,
  SupportedLanguage,
} from '@guest-concierge/shared-types';

export interface ChatSession {
  sessionId: string;
  bookingId: string;
  guestLanguage: SupportedLanguage;
  status: ChatSessionStatus;
  createdAt: string;
  updatedAt: string;
}

export const isSessionActive = (session: Pick<ChatSession, 'status'>): boolean =>
  session.status !== 'closed';

export interface ChatMessage {
  id: string;
  sessionId: string;
  messageType: ChatMessageType;
  content: string;
  metadata: Record<string, unknown> | null;
  timestamp: string;
}

export type NewChatMessage = Pick<ChatMessage, 'messageType' | 'content' | 'metadata'>;

export type ChatIntent = RecommendationCategory | 'greeting' | 'thanks' | 'unknown';

export interface IntentClassification {
  intent: ChatIntent;
  confidence: number;
  reason: string;
}
