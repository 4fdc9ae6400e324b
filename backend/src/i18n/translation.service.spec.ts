import { Place } from '@guest-concierge/shared-types';

import de from './locales/de.json';
import en from './locales/en.json';
import es from './locales/es.json';
import fr from './locales/fr.json';
import hi from './locales/hi.json';
import ja from './locales/ja.json';
import ko from './locales/ko.json';
import zh from './locales/zh.json';
import { TranslationService } from './translation.service';

const place = (name: string, distanceKm: number, rating: number | null, address = ''): Place => ({
  name,
  distanceKm,
  rating,
  address,
  externalId: name,
});

describe('TranslationService', () => {
  const service = new TranslationService();

  it('resolves language tags to supported codes', () => {
    expect(service.resolveLanguage('hi')).toBe('hi');
    expect(service.resolveLanguage('ZH-tw')).toBe('zh');
    expect(service.resolveLanguage('pt')).toBe('en');
    expect(service.resolveLanguage(undefined)).toBe('en');
  });

  it('substitutes parameters', () => {
    expect(service.localize('greeting', 'en', { guestName: 'Asha', hotelName: 'The Grand' })).toBe(
      'Hello Asha! What would you like to explore around The Grand today?',
    );
  });

  it('falls back to English for unsupported languages', () => {
    expect(service.localize('thanks', 'pt')).toBe(en.thanks);
  });

  it('leaves unknown placeholders visible', () => {
    expect(service.localize('greeting', 'en')).toBe(
      'Hello {{guestName}}! What would you like to explore around {{hotelName}} today?',
    );
  });

  it('keeps every locale table in step with English', () => {
    const englishKeys = Object.keys(en).sort();

    for (const table of [de, es, fr, hi, ja, ko, zh]) {
      expect(Object.keys(table).sort()).toEqual(englishKeys);
    }
  });

  it('uses fallbacks when the booking has no names', () => {
    expect(service.welcomeMessage('', '', 'en')).toBe(
      "Hello there! Welcome to your hotel. I'm your personal travel assistant. I can help you discover restaurants, attractions and events near your hotel.",
    );
  });

  it('lists every category option', () => {
    expect(service.categoryOptionsMessage('en')).toBe(
      [
        'What would you like to explore? Choose from:',
        '',
        '• 🍽️ Restaurants & Dining',
        '• 🏛️ Sightseeing & Attractions',
        '• 🎭 Events & Entertainment',
        '• 🛍️ Shopping',
        '• 🌃 Nightlife',
        '• 🏧 ATMs',
        '• 💊 Pharmacies',
      ].join('\n'),
    );
  });

  it('formats places with localized labels', () => {
    const message = service.formatRecommendations(
      [place('Haldiram', 0.34, 4, 'Connaught Circus'), place('Karim', 1.42, null)],
      'restaurants',
      'hi',
    );

    expect(message).toBe(
      [
        'यहाँ आपके होटल के पास के शीर्ष रेस्तरां हैं:',
        '1. **Haldiram**\n   ⭐ रेटिंग: 4.0/5\n   📍 दूरी: 0.3 किमी\n   🏠 पता: Connaught Circus',
        '2. **Karim**\n   📍 दूरी: 1.4 किमी',
      ].join('\n\n'),
    );
  });

  it('writes the distance unit in the guest language', () => {
    const message = service.formatRecommendations([place('Ichiran', 2.4, null)], 'restaurants', 'ja');

    expect(message.split('\n\n')[1]).toBe('1. **Ichiran**\n   📍 距離: 2.4キロ');
  });

  it('shows at most five places', () => {
    const places = Array.from({ length: 7 }, (_, index) => place(`Place ${index + 1}`, index, null));

    const message = service.formatRecommendations(places, 'atms', 'en');

    expect(message).toContain('5. **Place 5**');
    expect(message).not.toContain('6. **Place 6**');
  });

  it('renders the empty state in the guest language', () => {
    expect(service.formatRecommendations([], 'pharmacy', 'es')).toBe(
      'Lo siento, no encontré farmacias cerca de tu hotel en este momento.',
    );
  });
});
