import { Injectable } from '@nestjs/common';
import {
  ChatSessionStatus,
  DEFAULT_LANGUAGE,
  isSupportedLanguage,
} from '@guest-concierge/shared-types';

import { isRecord } from '../common/utils/payload-reader';
import { DatabaseService } from '../database/database.service';
import { ChatSessionsRepository, NewChatSession } from './chat-sessions.repository';
import { ChatMessage, ChatSession, NewChatMessage } from './chat.types';

interface SessionRow {
  session_id: string;
  booking_id: string;
  guest_language: string;
  status: ChatSessionStatus;
  created_at: Date;
  updated_at: Date;
}

interface MessageRow {
  id: string;
  session_id: string;
  message_type: ChatMessage['messageType'];
  content: string;
  metadata: unknown;
  created_at: Date;
}

const SESSION_COLUMNS = 'session_id, booking_id, guest_language, status, created_at, updated_at';
const MESSAGE_COLUMNS = 'id::text as id, session_id, message_type, content, metadata, created_at';

@Injectable()
export class PgChatSessionsRepository implements ChatSessionsRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async create(session: NewChatSession): Promise<ChatSession> {
    const result = await this.databaseService.runQuery<SessionRow>(
      `insert into chat_sessions (session_id, booking_id, guest_language, status)
       values ($1, $2, $3, 'created')
       returning ${SESSION_COLUMNS}`,
      [session.sessionId, session.bookingId, session.guestLanguage],
    );
    return this.mapSession(result.rows[0]);
  }

  async findById(sessionId: string): Promise<ChatSession | null> {
    const result = await this.databaseService.runQuery<SessionRow>(
      `select ${SESSION_COLUMNS} from chat_sessions where session_id = $1`,
      [sessionId],
    );
    const row = result.rows[0];
    return row ? this.mapSession(row) : null;
  }

  async listByBooking(bookingId: string): Promise<ChatSession[]> {
    const result = await this.databaseService.runQuery<SessionRow>(
      `select ${SESSION_COLUMNS} from chat_sessions
        where booking_id = $1
        order by created_at desc`,
      [bookingId],
    );
    return result.rows.map((row) => this.mapSession(row));
  }

  async findLatestActiveByBooking(bookingId: string): Promise<ChatSession | null> {
    const result = await this.databaseService.runQuery<SessionRow>(
      `select ${SESSION_COLUMNS} from chat_sessions
        where booking_id = $1 and status <> 'closed'
        order by created_at desc
        limit 1`,
      [bookingId],
    );
    const row = result.rows[0];
    return row ? this.mapSession(row) : null;
  }

  async markActive(sessionId: string): Promise<ChatSession | null> {
    const result = await this.databaseService.runQuery<SessionRow>(
      `update chat_sessions set status = 'active', updated_at = now()
        where session_id = $1 and status = 'created'
        returning ${SESSION_COLUMNS}`,
      [sessionId],
    );
    const row = result.rows[0];
    return row ? this.mapSession(row) : null;
  }

  async close(sessionId: string): Promise<ChatSession | null> {
    const result = await this.databaseService.runQuery<SessionRow>(
      `update chat_sessions set status = 'closed', updated_at = now()
        where session_id = $1 and status <> 'closed'
        returning ${SESSION_COLUMNS}`,
      [sessionId],
    );
    const row = result.rows[0];
    return row ? this.mapSession(row) : null;
  }

  async closeByBooking(bookingId: string): Promise<number> {
    const result = await this.databaseService.runQuery(
      `update chat_sessions set status = 'closed', updated_at = now()
        where booking_id = $1 and status <> 'closed'`,
      [bookingId],
    );
    return result.rowCount ?? 0;
  }

  async closeIdleSince(cutoff: Date): Promise<number> {
    const result = await this.databaseService.runQuery(
      `update chat_sessions set status = 'closed', updated_at = now()
        where status <> 'closed' and updated_at < $1`,
      [cutoff],
    );
    return result.rowCount ?? 0;
  }

  async appendMessage(sessionId: string, message: NewChatMessage): Promise<ChatMessage | null> {
    // The row lock taken by the update orders this insert against a concurrent close
    const result = await this.databaseService.runQuery<MessageRow>(
      `with touched as (
         update chat_sessions set updated_at = now()
          where session_id = $1 and status <> 'closed'
          returning session_id
       )
       insert into chat_messages (session_id, message_type, content, metadata)
       select touched.session_id, $2, $3, $4::jsonb from touched
       returning ${MESSAGE_COLUMNS}`,
      [
        sessionId,
        message.messageType,
        message.content,
        message.metadata === null ? null : JSON.stringify(message.metadata),
      ],
    );
    const row = result.rows[0];
    return row ? this.mapMessage(row) : null;
  }

  async listMessages(sessionId: string): Promise<ChatMessage[]> {
    const result = await this.databaseService.runQuery<MessageRow>(
      `select ${MESSAGE_COLUMNS} from chat_messages where session_id = $1 order by id asc`,
      [sessionId],
    );
    return result.rows.map((row) => this.mapMessage(row));
  }

  private mapSession(row: SessionRow): ChatSession {
    return {
      sessionId: row.session_id,
      bookingId: row.booking_id,
      guestLanguage: isSupportedLanguage(row.guest_language) ? row.guest_language : DEFAULT_LANGUAGE,
      status: row.status,
      createdAt: row.created_at.toISOString(),
      updatedAt: row.updated_at.toISOString(),
    };
  }

  private mapMessage(row: MessageRow): ChatMessage {
    return {
      id: row.id,
      sessionId: row.session_id,
      messageType: row.message_type,
      content: row.content,
      metadata: isRecord(row.metadata) ? row.metadata : null,
      timestamp: row.created_at.toISOString(),
    };
  }
}
