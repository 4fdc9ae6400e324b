import { Injectable } from '@nestjs/common';
import {
  DEFAULT_LANGUAGE,
  RECOMMENDATION_CATEGORIES,
  SupportedLanguage,
} from '@guest-concierge/shared-types';

import lexicon from '../i18n/lexicon.json';
import { ChatIntent, IntentClassification } from './chat.types';

type KeywordIntent = Exclude<ChatIntent, 'unknown'>;

// Categories outrank small talk: "hi, any restaurants?" is a restaurant request
const INTENT_PRIORITY: readonly KeywordIntent[] = [...RECOMMENDATION_CATEGORIES, 'greeting', 'thanks'];

const LATIN_KEYWORD = /^[\p{Script=Latin}\s'-]+$/u;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Latin keywords match whole words, allowing a plural `s`/`es`; other scripts
 * are matched as substrings since they do not separate words with spaces.
 */
function keywordMatches(text: string, keyword: string): boolean {
  const normalizedKeyword = keyword.toLowerCase();
  if (!LATIN_KEYWORD.test(normalizedKeyword)) {
    return text.includes(normalizedKeyword);
  }
  const pattern = new RegExp(
    `(?<![\\p{Script=Latin}\\p{N}])${escapeRegExp(normalizedKeyword)}(?:s|es)?(?![\\p{Script=Latin}\\p{N}])`,
    'u',
  );
  return pattern.test(text);
}

function keywordsFor(language: SupportedLanguage, intent: KeywordIntent): string[] {
  const own = lexicon[language][intent];
  return language === DEFAULT_LANGUAGE ? own : [...own, ...lexicon[DEFAULT_LANGUAGE][intent]];
}

export function classifyIntent(message: string, language: SupportedLanguage): IntentClassification {
  const text = message.trim().toLowerCase();
  if (!text) {
    return { intent: 'unknown', confidence: 0, reason: 'Empty message' };
  }

  for (const intent of INTENT_PRIORITY) {
    const keyword = keywordsFor(language, intent).find((candidate) => keywordMatches(text, candidate));
    if (keyword) {
      const isCategory = intent !== 'greeting' && intent !== 'thanks';
      return {
        intent,
        confidence: isCategory ? 0.8 : 0.7,
        reason: `Keyword match: ${keyword}`,
      };
    }
  }

  return { intent: 'unknown', confidence: 0.3, reason: 'Fallback' };
}

@Injectable()
export class IntentService {
  classify(message: string, language: SupportedLanguage): IntentClassification {
    return classifyIntent(message, language);
  }
}
