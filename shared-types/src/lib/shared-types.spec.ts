import {
  DEFAULT_LANGUAGE,
  RECOMMENDATION_CATEGORIES,
  RecommendationCategory,
  SUPPORTED_LANGUAGES,
  isBookingEventType,
  isRecommendationCategory,
  isSupportedLanguage,
} from './shared-types';

describe('shared-types', () => {
  it('exposes the recommendation category list', () => {
    const expected: RecommendationCategory[] = [
      'restaurants',
      'sightseeing',
      'events',
      'shopping',
      'nightlife',
      'atms',
      'pharmacy',
    ];

    expect(RECOMMENDATION_CATEGORIES).toEqual(expected);
  });

  it('defaults to a language it supports', () => {
    expect(SUPPORTED_LANGUAGES).toContain(DEFAULT_LANGUAGE);
  });

  it('narrows supported languages and categories', () => {
    expect(isSupportedLanguage('hi')).toBe(true);
    expect(isSupportedLanguage('pt')).toBe(false);
    expect(isSupportedLanguage(42)).toBe(false);
    expect(isRecommendationCategory('nightlife')).toBe(true);
    expect(isRecommendationCategory('museums')).toBe(false);
  });

  it('recognises booking event types', () => {
    expect(isBookingEventType('booking.cancelled')).toBe(true);
    expect(isBookingEventType('booking.deleted')).toBe(false);
  });
});
