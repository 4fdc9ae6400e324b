export const SUPPORTED_LANGUAGES = ['en', 'hi', 'es', 'fr', 'de', 'ja', 'ko', 'zh'] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: SupportedLanguage = 'en';

export const RECOMMENDATION_CATEGORIES = [
  'restaurants',
  'sightseeing',
  'events',
  'shopping',
  'nightlife',
  'atms',
  'pharmacy',
] as const;

export type RecommendationCategory = (typeof RECOMMENDATION_CATEGORIES)[number];

export const BOOKING_EVENT_TYPES = [
  'booking.created',
  'booking.updated',
  'booking.cancelled',
] as const;

export type BookingEventType = (typeof BOOKING_EVENT_TYPES)[number];

/**
 * A nearby place as returned to guests. Provider adapters normalize into this
 * shape; nothing provider-specific travels past them except the opaque id.
 */
export interface Place {
  name: string;
  /** 0-5, or null when the provider has no rating. */
  rating: number | null;
  distanceKm: number;
  address: string;
  externalId: string;
}

export type ChatMessageType = 'user' | 'bot';

export type ChatSessionStatus = 'created' | 'active' | 'closed';

export interface ChatMessageView {
  id: string;
  message_type: ChatMessageType;
  content: string;
  metadata: Record<string, unknown> | null;
  timestamp: string;
}

export interface ChatSessionView {
  session_id: string;
  booking_id: string;
  guest_language: SupportedLanguage;
  status: ChatSessionStatus;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

/** Booking as exposed over HTTP; the raw event payload stays server-side. */
export interface BookingSummary {
  booking_id: string;
  guest_name: string;
  guest_email: string | null;
  guest_phone: string | null;
  hotel_name: string;
  hotel_location: string;
  latitude: number | null;
  longitude: number | null;
  check_in_date: string | null;
  check_out_date: string | null;
  guest_language: SupportedLanguage;
  reference_number: string | null;
  hotel_id: string | null;
  booking_status: string | null;
  created_at: string;
  updated_at: string;
}

export interface RecommendationsMetadata {
  type: 'recommendations';
  category: RecommendationCategory;
  recommendations: Place[];
  source: string;
}

export interface ChatReply {
  message: string;
  metadata?: Record<string, unknown>;
}

export interface ChatMessageResponse {
  session_id: string;
  response: ChatReply;
}

export interface BookingWebhookAck {
  received: true;
  status: 'processed' | 'ignored';
  eventType: string;
  bookingId: string | null;
  sessionId: string | null;
}

export const isSupportedLanguage = (value: unknown): value is SupportedLanguage =>
  SUPPORTED_LANGUAGES.some((entry) => entry === value);

export const isRecommendationCategory = (value: unknown): value is RecommendationCategory =>
  RECOMMENDATION_CATEGORIES.some((entry) => entry === value);

export const isBookingEventType = (value: unknown): value is BookingEventType =>
  BOOKING_EVENT_TYPES.some((entry) => entry === value);

export const isPlace = (value: unknown): value is Place =>
  typeof value === 'object' &&
  value !== null &&
  'name' in value &&
  'rating' in value &&
  'distanceKm' in value &&
  'address' in value &&
  'externalId' in value &&
  typeof value.name === 'string' &&
  (value.rating === null || typeof value.rating === 'number') &&
  typeof value.distanceKm === 'number' &&
  typeof value.address === 'string' &&
  typeof value.externalId === 'string';
