export const SENTIMENTS = ['positive', 'negative', 'neutral'] as const;

export type Sentiment = (typeof SENTIMENTS)[number];
