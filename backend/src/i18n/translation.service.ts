import { Injectable, Logger } from '@nestjs/common';
import {
  DEFAULT_LANGUAGE,
  Place,
  RECOMMENDATION_CATEGORIES,
  RecommendationCategory,
  SupportedLanguage,
  isSupportedLanguage,
} from '@guest-concierge/shared-types';

import de from './locales/de.json';
import en from './locales/en.json';
import es from './locales/es.json';
import fr from './locales/fr.json';
import hi from './locales/hi.json';
import ja from './locales/ja.json';
import ko from './locales/ko.json';
import zh from './locales/zh.json';

export type TemplateKey = keyof typeof en;
export type TemplateParams = Record<string, string | number>;

type TemplateTable = Partial<Record<TemplateKey, string>>;

const TEMPLATES: Record<SupportedLanguage, TemplateTable> = { en, hi, es, fr, de, ja, ko, zh };

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;

export const RECOMMENDATIONS_SHOWN = 5;

@Injectable()
export class TranslationService {
  private readonly logger = new Logger(TranslationService.name);

  /** Supported language code for any input, `en` otherwise. */
  resolveLanguage(value: unknown): SupportedLanguage {
    if (typeof value !== 'string') {
      return DEFAULT_LANGUAGE;
    }
    const code = value.trim().toLowerCase().split(/[-_]/)[0];
    return isSupportedLanguage(code) ? code : DEFAULT_LANGUAGE;
  }

  localize(key: TemplateKey, language: string, params: TemplateParams = {}): string {
    const resolved = this.resolveLanguage(language);
    const template = TEMPLATES[resolved][key] ?? en[key];

    return template.replace(PLACEHOLDER, (match, name: string) => {
      const value = params[name];
      if (value === undefined) {
        this.logger.debug(`Missing parameter ${name} for template ${key}`);
        return match;
      }
      return String(value);
    });
  }

  categoryLabel(category: RecommendationCategory, language: string): string {
    return this.localize(`category.${category}`, language);
  }

  welcomeMessage(guestName: string, hotelName: string, language: string): string {
    return this.localize('welcome', language, this.guestParams(guestName, hotelName, language));
  }

  greetingMessage(guestName: string, hotelName: string, language: string): string {
    return this.localize('greeting', language, this.guestParams(guestName, hotelName, language));
  }

  categoryOptionsMessage(language: string): string {
    const options = RECOMMENDATION_CATEGORIES.map(
      (category) => `• ${this.localize(`option.${category}`, language)}`,
    ).join('\n');
    return this.localize('category_options', language, { options });
  }

  /** Numbered list of the first few places; labels follow the guest language. */
  formatRecommendations(
    places: readonly Place[],
    category: RecommendationCategory,
    language: string,
  ): string {
    const categoryName = this.categoryLabel(category, language);
    if (places.length === 0) {
      return this.localize('no_results', language, { category: categoryName });
    }

    const ratingLabel = this.localize('label.rating', language);
    const distanceLabel = this.localize('label.distance', language);
    const addressLabel = this.localize('label.address', language);

    const entries = places.slice(0, RECOMMENDATIONS_SHOWN).map((place, index) => {
      const lines = [`${index + 1}. **${place.name}**`];
      if (place.rating !== null) {
        lines.push(`   ⭐ ${ratingLabel}: ${place.rating.toFixed(1)}/5`);
      }
      const distance = this.localize('label.km', language, {
        distance: place.distanceKm.toFixed(1),
      });
      lines.push(`   📍 ${distanceLabel}: ${distance}`);
      if (place.address) {
        lines.push(`   🏠 ${addressLabel}: ${place.address}`);
      }
      return lines.join('\n');
    });

    const header = this.localize('recommendations_header', language, { category: categoryName });
    return [header, ...entries].join('\n\n');
  }

  private guestParams(guestName: string, hotelName: string, language: string): TemplateParams {
    return {
      guestName: guestName || this.localize('guest_fallback', language),
      hotelName: hotelName || this.localize('hotel_fallback', language),
    };
  }
}
