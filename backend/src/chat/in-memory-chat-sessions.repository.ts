import { Injectable } from '@nestjs/common';
import { ChatSessionStatus } from '@guest-concierge/shared-types';

import { ChatSessionsRepository, NewChatSession } from './chat-sessions.repository';
import { ChatMessage, ChatSession, NewChatMessage, isSessionActive } from './chat.types';

@Injectable()
export class InMemoryChatSessionsRepository implements ChatSessionsRepository {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly messages = new Map<string, ChatMessage[]>();
  private nextMessageId = 1;
  // Insertion counter keeps newest-first ordering stable within one clock tick
  private readonly creationOrder = new Map<string, number>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(session: NewChatSession): Promise<ChatSession> {
    const timestamp = this.clock().toISOString();
    const created: ChatSession = {
      ...session,
      status: 'created',
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.sessions.set(created.sessionId, created);
    this.creationOrder.set(created.sessionId, this.creationOrder.size);
    this.messages.set(created.sessionId, []);
    return { ...created };
  }

  async findById(sessionId: string): Promise<ChatSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async listByBooking(bookingId: string): Promise<ChatSession[]> {
    return [...this.sessions.values()]
      .filter((session) => session.bookingId === bookingId)
      .sort(
        (a, b) => (this.creationOrder.get(b.sessionId) ?? 0) - (this.creationOrder.get(a.sessionId) ?? 0),
      )
      .map((session) => ({ ...session }));
  }

  async findLatestActiveByBooking(bookingId: string): Promise<ChatSession | null> {
    const sessions = await this.listByBooking(bookingId);
    return sessions.find(isSessionActive) ?? null;
  }

  async markActive(sessionId: string): Promise<ChatSession | null> {
    return this.transition(sessionId, 'active', (session) => session.status === 'created');
  }

  async close(sessionId: string): Promise<ChatSession | null> {
    return this.transition(sessionId, 'closed', isSessionActive);
  }

  async closeByBooking(bookingId: string): Promise<number> {
    return this.closeWhere((session) => session.bookingId === bookingId);
  }

  async closeIdleSince(cutoff: Date): Promise<number> {
    return this.closeWhere((session) => new Date(session.updatedAt).getTime() < cutoff.getTime());
  }

  async appendMessage(sessionId: string, message: NewChatMessage): Promise<ChatMessage | null> {
    const log = this.messages.get(sessionId);
    const session = this.sessions.get(sessionId);
    if (!log || !session || !isSessionActive(session)) {
      return null;
    }

    const timestamp = this.clock().toISOString();
    const stored: ChatMessage = {
      ...message,
      id: String(this.nextMessageId++),
      sessionId,
      timestamp,
    };
    log.push(stored);
    this.sessions.set(sessionId, { ...session, updatedAt: timestamp });
    return { ...stored };
  }

  async listMessages(sessionId: string): Promise<ChatMessage[]> {
    return (this.messages.get(sessionId) ?? []).map((message) => ({ ...message }));
  }

  private transition(
    sessionId: string,
    status: ChatSessionStatus,
    allowed: (session: ChatSession) => boolean,
  ): ChatSession | null {
    const session = this.sessions.get(sessionId);
    if (!session || !allowed(session)) {
      return null;
    }
    const updated = { ...session, status, updatedAt: this.clock().toISOString() };
    this.sessions.set(sessionId, updated);
    return { ...updated };
  }

  private closeWhere(predicate: (session: ChatSession) => boolean): number {
    const timestamp = this.clock().toISOString();
    let closed = 0;
    for (const session of this.sessions.values()) {
      if (isSessionActive(session) && predicate(session)) {
        this.sessions.set(session.sessionId, { ...session, status: 'closed', updatedAt: timestamp });
        closed += 1;
      }
    }
    return closed;
  }
}
