export { SENTIMENTS, type Sentiment } from './types';
export { NEGATIVE_SENTIMENT_KEYWORDS, POSITIVE_SENTIMENT_KEYWORDS } from './constants';
export { classifySentiment, isSentiment } from './classify';
