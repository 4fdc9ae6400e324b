import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ChatReply,
  Place,
  RECOMMENDATION_CATEGORIES,
  RecommendationCategory,
  RecommendationsMetadata,
  isRecommendationCategory,
} from '@guest-concierge/shared-types';
import { randomUUID } from 'crypto';
import { subHours } from 'date-fns';

import { Booking } from '../bookings/booking.types';
import { BookingsService } from '../bookings/bookings.service';
import {
  GeocodeError,
  InvalidCategoryError,
  RecommendationError,
  SessionClosedError,
  SessionNotFoundError,
} from '../common/errors/concierge.errors';
import { readNumber } from '../config/config.helpers';
import { Coordinates } from '../geo/geo.types';
import { GeocoderService } from '../geo/geocoder.service';
import { TranslationService } from '../i18n/translation.service';
import { LoggingService } from '../logging/logging.service';
import { RecommendationsService } from '../recommendations/recommendations.service';
import {
  CHAT_SESSIONS_REPOSITORY,
  ChatSessionsRepository,
} from './chat-sessions.repository';
import { ChatMessage, ChatSession, NewChatMessage, isSessionActive } from './chat.types';
import { IntentService } from './intent.service';

export interface SessionSnapshot {
  session: ChatSession;
  booking: Booking;
  messages: ChatMessage[];
}

export interface CategoryRecommendations {
  category: RecommendationCategory;
  recommendations: Place[];
  message: string;
}

interface ResolvedReply extends ChatReply {
  places: Place[];
}

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly staleAfterHours: number;

  constructor(
    @Inject(CHAT_SESSIONS_REPOSITORY)
    private readonly sessionsRepository: ChatSessionsRepository,
    private readonly bookingsService: BookingsService,
    private readonly geocoderService: GeocoderService,
    private readonly recommendationsService: RecommendationsService,
    private readonly translationService: TranslationService,
    private readonly intentService: IntentService,
    private readonly loggingService: LoggingService,
    configService: ConfigService,
  ) {
    this.staleAfterHours = readNumber(configService, 'SESSION_STALE_AFTER_HOURS', 72);
  }

  /** Opens a session, greeting the guest with the welcome and category menu. */
  async createSession(bookingId: string, language?: string): Promise<SessionSnapshot> {
    const booking = await this.bookingsService.getBooking(bookingId);
    const guestLanguage =
      language !== undefined
        ? this.translationService.resolveLanguage(language)
        : booking.guestLanguage;

    const session = await this.sessionsRepository.create({
      sessionId: randomUUID(),
      bookingId: booking.bookingId,
      guestLanguage,
    });

    await this.append(session, {
      messageType: 'bot',
      content: this.translationService.welcomeMessage(
        booking.guestName,
        booking.hotelName,
        guestLanguage,
      ),
      metadata: { type: 'welcome' },
    });
    await this.append(session, {
      messageType: 'bot',
      content: this.translationService.categoryOptionsMessage(guestLanguage),
      metadata: { type: 'category_options', categories: [...RECOMMENDATION_CATEGORIES] },
    });

    this.loggingService.logConversation(
      'Chat session created',
      { language: guestLanguage },
      session.sessionId,
      booking.bookingId,
    );

    return {
      session,
      booking,
      messages: await this.sessionsRepository.listMessages(session.sessionId),
    };
  }

  /** Newest open session of the booking, or a fresh one. */
  async ensureSessionForBooking(
    bookingId: string,
  ): Promise<{ session: ChatSession; created: boolean }> {
    const existing = await this.sessionsRepository.findLatestActiveByBooking(bookingId);
    if (existing) {
      return { session: existing, created: false };
    }
    const { session } = await this.createSession(bookingId);
    return { session, created: true };
  }

  async findActiveSessionForBooking(bookingId: string): Promise<ChatSession | null> {
    return this.sessionsRepository.findLatestActiveByBooking(bookingId);
  }

  async handleMessage(sessionId: string, text: string): Promise<ChatReply> {
    const session = await this.requireOpenSession(sessionId);
    const language = session.guestLanguage;

    await this.append(session, {
      messageType: 'user',
      content: text,
      metadata: null,
    });

    const classification = this.intentService.classify(text, language);
    this.loggingService.logConversation(
      'Guest message classified',
      { ...classification },
      sessionId,
      session.bookingId,
    );

    const booking = await this.bookingsService.getBooking(session.bookingId);
    let reply: ChatReply;

    const { intent } = classification;
    switch (intent) {
      case 'greeting':
        reply = {
          message: this.translationService.greetingMessage(
            booking.guestName,
            booking.hotelName,
            language,
          ),
          metadata: { type: 'greeting' },
        };
        break;
      case 'thanks':
        reply = {
          message: this.translationService.localize('thanks', language),
          metadata: { type: 'thanks' },
        };
        break;
      case 'unknown':
        reply = {
          // Blank input gets the menu prompt rather than a complaint
          message: this.translationService.localize(
            classification.confidence === 0 ? 'help' : 'not_understood',
            language,
          ),
          metadata: { type: 'general_help' },
        };
        break;
      default: {
        const { message, metadata } = await this.resolveRecommendations(
          session,
          booking,
          intent,
        );
        reply = { message, metadata };
      }
    }

    await this.append(session, {
      messageType: 'bot',
      content: reply.message,
      metadata: reply.metadata ?? null,
    });
    await this.activate(session);

    return reply;
  }

  async recommendByCategory(sessionId: string, category: string): Promise<CategoryRecommendations> {
    if (!isRecommendationCategory(category)) {
      throw new InvalidCategoryError(category, RECOMMENDATION_CATEGORIES);
    }

    const session = await this.requireOpenSession(sessionId);
    const booking = await this.bookingsService.getBooking(session.bookingId);
    const reply = await this.resolveRecommendations(session, booking, category);

    await this.append(session, {
      messageType: 'bot',
      content: reply.message,
      metadata: reply.metadata ?? null,
    });
    await this.activate(session);

    return { category, recommendations: reply.places, message: reply.message };
  }

  async getHistory(sessionId: string): Promise<SessionSnapshot> {
    const session = await this.requireSession(sessionId);
    const [booking, messages] = await Promise.all([
      this.bookingsService.getBooking(session.bookingId),
      this.sessionsRepository.listMessages(sessionId),
    ]);
    return { session, booking, messages };
  }

  async closeSession(sessionId: string): Promise<ChatSession> {
    const session = await this.requireSession(sessionId);
    if (!isSessionActive(session)) {
      return session;
    }

    const closed = await this.sessionsRepository.close(sessionId);
    if (!closed) {
      // Closed by someone else since it was read
      return this.requireSession(sessionId);
    }
    this.loggingService.logConversation('Chat session closed', {}, sessionId, session.bookingId);
    return closed;
  }

  async closeSessionsForBooking(bookingId: string): Promise<number> {
    return this.sessionsRepository.closeByBooking(bookingId);
  }

  async listSessionsForBooking(bookingId: string): Promise<ChatSession[]> {
    await this.bookingsService.getBooking(bookingId);
    return this.sessionsRepository.listByBooking(bookingId);
  }

  /** Closes sessions idle for longer than the configured threshold. */
  async deactivateStaleSessions(now: Date = new Date()): Promise<number> {
    const closed = await this.sessionsRepository.closeIdleSince(subHours(now, this.staleAfterHours));
    if (closed > 0) {
      this.logger.log(`Closed ${closed} chat session(s) idle for over ${this.staleAfterHours}h`);
    }
    return closed;
  }

  private async requireSession(sessionId: string): Promise<ChatSession> {
    const session = await this.sessionsRepository.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private async requireOpenSession(sessionId: string): Promise<ChatSession> {
    const session = await this.requireSession(sessionId);
    if (!isSessionActive(session)) {
      throw new SessionClosedError(
        sessionId,
        this.translationService.localize('session_closed', session.guestLanguage),
      );
    }
    return session;
  }

  /** Writes to the log only while the session is still open at write time. */
  private async append(session: ChatSession, message: NewChatMessage): Promise<ChatMessage> {
    const stored = await this.sessionsRepository.appendMessage(session.sessionId, message);
    if (!stored) {
      throw new SessionClosedError(
        session.sessionId,
        this.translationService.localize('session_closed', session.guestLanguage),
      );
    }
    return stored;
  }

  private async activate(session: ChatSession): Promise<void> {
    if (session.status === 'created') {
      await this.sessionsRepository.markActive(session.sessionId);
    }
  }

  private async resolveRecommendations(
    session: ChatSession,
    booking: Booking,
    category: RecommendationCategory,
  ): Promise<ResolvedReply> {
    const language = session.guestLanguage;
    const categoryName = this.translationService.categoryLabel(category, language);

    let coordinates: Coordinates;
    try {
      coordinates = await this.ensureCoordinates(booking);
    } catch (error) {
      if (!(error instanceof GeocodeError)) {
        throw error;
      }
      this.logger.warn(`Geocoding failed for booking ${booking.bookingId}: ${error.message}`);
      return {
        message: this.translationService.localize('location_unavailable', language),
        metadata: { type: 'error', reason: 'location_unavailable', category },
        places: [],
      };
    }

    try {
      const result = await this.recommendationsService.recommend({
        coordinates,
        category,
        language,
      });
      const metadata: RecommendationsMetadata = {
        type: 'recommendations',
        category,
        recommendations: result.places,
        source: result.source,
      };

      return {
        message: this.translationService.formatRecommendations(result.places, category, language),
        metadata: { ...metadata },
        places: result.places,
      };
    } catch (error) {
      if (!(error instanceof RecommendationError)) {
        throw error;
      }
      this.logger.warn(`No provider could serve ${category} for booking ${booking.bookingId}`);
      return {
        message: this.translationService.localize('recommendations_unavailable', language, {
          category: categoryName,
        }),
        metadata: { type: 'error', reason: 'recommendations_unavailable', category },
        places: [],
      };
    }
  }

  /** Geocodes the hotel location once and remembers the result on the booking. */
  private async ensureCoordinates(booking: Booking): Promise<Coordinates> {
    if (booking.latitude !== null && booking.longitude !== null) {
      return { latitude: booking.latitude, longitude: booking.longitude };
    }

    const match = await this.geocoderService.resolve(booking.hotelLocation);
    const coordinates = { latitude: match.latitude, longitude: match.longitude };
    await this.bookingsService.storeCoordinates(booking, booking.hotelLocation, coordinates);
    return coordinates;
  }
}
