import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '@/common/utils/logger';
import type { Review } from '@/modules/reviews/domain/review';
import { classifySentiment } from '@/modules/reviews/domain/sentiment';
import type { MetricsPort } from '../../ports/metrics.port';
import type { ReviewsRepositoryPort } from '../../ports/reviews-repository.port';
import { METRICS_PORT, REVIEWS_REPOSITORY_PORT } from '../../ports/tokens';

export interface CreateReviewInput {
  requestId: string;
  text: string;
}

@Injectable()
export class CreateReviewUseCase {
  private readonly logger = createLogger(CreateReviewUseCase.name);

  constructor(
    @Inject(REVIEWS_REPOSITORY_PORT)
    private readonly reviewsRepository: ReviewsRepositoryPort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
  ) {}

  async execute(input: CreateReviewInput): Promise<Review> {
    const sentiment = classifySentiment(input.text);
    const createdAt = new Date();
    const startedAt = Date.now();

    let review: Review;
    try {
      review = await this.reviewsRepository.insertReview({
        text: input.text,
        sentiment,
        createdAt,
      });
    } catch (error: unknown) {
      this.metricsPort.incrementStoreFailure('insert');
      this.logger.warn('review_store_failed', {
        event: 'review_store_failed',
        request_id: input.requestId,
        operation: 'insert',
        error_type: error instanceof Error ? error.name : 'UnknownError',
      });
      throw error;
    } finally {
      this.metricsPort.observeStoreLatency({
        operation: 'insert',
        seconds: (Date.now() - startedAt) / 1000,
      });
    }

    this.metricsPort.incrementReviewCreated(review.sentiment);
    this.logger.review('review_created', {
      event: 'review_created',
      request_id: input.requestId,
      review_id: review.id,
      sentiment: review.sentiment,
      text_length: review.text.length,
    });

    return review;
  }
}
