import { SupportedLanguage } from '@guest-concierge/shared-types';

import { ChatMessage, ChatSession, NewChatMessage } from './chat.types';

export const CHAT_SESSIONS_REPOSITORY = Symbol('CHAT_SESSIONS_REPOSITORY');

export interface NewChatSession {
  sessionId: string;
  bookingId: string;
  guestLanguage: SupportedLanguage;
}

export interface ChatSessionsRepository {
  create(session: NewChatSession): Promise<ChatSession>;

  findById(sessionId: string): Promise<ChatSession | null>;

  /** Newest first. */
  listByBooking(bookingId: string): Promise<ChatSession[]>;

  findLatestActiveByBooking(bookingId: string): Promise<ChatSession | null>;

  /** Moves a `created` session to `active`; null when it was not `created`. */
  markActive(sessionId: string): Promise<ChatSession | null>;

  /** Closes one open session; null when it is missing or already closed. */
  close(sessionId: string): Promise<ChatSession | null>;

  /** Closes every open session of the booking and returns how many changed. */
  closeByBooking(bookingId: string): Promise<number>;

  /** Closes open sessions untouched since `cutoff`. */
  closeIdleSince(cutoff: Date): Promise<number>;

  /**
   * Appends to the log and marks the session as touched. Resolves to null, writing
   * nothing, when the session is missing or closed.
   */
  appendMessage(sessionId: string, message: NewChatMessage): Promise<ChatMessage | null>;

  /** Oldest first. */
  listMessages(sessionId: string): Promise<ChatMessage[]>;
}
