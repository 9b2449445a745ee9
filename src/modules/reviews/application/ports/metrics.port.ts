import type { Sentiment } from '../../domain/sentiment';

export type ReviewStoreOperation = 'insert' | 'list';

export interface MetricsPort {
  incrementReviewCreated(sentiment: Sentiment): void;

  incrementListRequest(input: { filtered: boolean }): void;

  incrementStoreFailure(operation: ReviewStoreOperation): void;

  observeStoreLatency(input: { operation: ReviewStoreOperation; seconds: number }): void;
}
