import { NEGATIVE_SENTIMENT_KEYWORDS, POSITIVE_SENTIMENT_KEYWORDS } from './constants';
import { SENTIMENTS, type Sentiment } from './types';

/**
 * Positive keywords are checked first, so text carrying both a positive and
 * a negative keyword is classified as positive.
 */
export function classifySentiment(text: string): Sentiment {
  const textLower = text.toLowerCase();

  if (containsAnyKeyword(textLower, POSITIVE_SENTIMENT_KEYWORDS)) {
    return 'positive';
  }

  if (containsAnyKeyword(textLower, NEGATIVE_SENTIMENT_KEYWORDS)) {
    return 'negative';
  }

  return 'neutral';
}

export function isSentiment(value: unknown): value is Sentiment {
  return typeof value === 'string' && SENTIMENTS.some((sentiment) => sentiment === value);
}

function containsAnyKeyword(haystack: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => haystack.includes(keyword));
}
