// Stems, matched as substrings of the lower-cased text.
export const POSITIVE_SENTIMENT_KEYWORDS = ['хорош', 'люблю'] as const;

export const NEGATIVE_SENTIMENT_KEYWORDS = ['плохо', 'ненавиж'] as const;
