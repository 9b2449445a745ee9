import { Inject, Injectable } from '@nestjs/common';
import { createLogger } from '@/common/utils/logger';
import type { Review } from '@/modules/reviews/domain/review';
import type { MetricsPort } from '../../ports/metrics.port';
import type { ReviewsRepositoryPort } from '../../ports/reviews-repository.port';
import { METRICS_PORT, REVIEWS_REPOSITORY_PORT } from '../../ports/tokens';

export interface ListReviewsInput {
  requestId: string;
  sentiment?: string;
}

@Injectable()
export class ListReviewsUseCase {
  private readonly logger = createLogger(ListReviewsUseCase.name);

  constructor(
    @Inject(REVIEWS_REPOSITORY_PORT)
    private readonly reviewsRepository: ReviewsRepositoryPort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
  ) {}

  async execute(input: ListReviewsInput): Promise<Review[]> {
    // An empty filter value means "no filter"; any other value is matched
    // literally, so an unknown sentiment simply yields no rows.
    const sentiment =
      typeof input.sentiment === 'string' && input.sentiment.length > 0
        ? input.sentiment
        : undefined;
    const startedAt = Date.now();

    this.metricsPort.incrementListRequest({ filtered: sentiment !== undefined });

    let reviews: Review[];
    try {
      reviews = await this.reviewsRepository.listReviews({ sentiment });
    } catch (error: unknown) {
      this.metricsPort.incrementStoreFailure('list');
      this.logger.warn('review_store_failed', {
        event: 'review_store_failed',
        request_id: input.requestId,
        operation: 'list',
        error_type: error instanceof Error ? error.name : 'UnknownError',
      });
      throw error;
    } finally {
      this.metricsPort.observeStoreLatency({
        operation: 'list',
        seconds: (Date.now() - startedAt) / 1000,
      });
    }

    this.logger.debug('reviews_listed', {
      event: 'reviews_listed',
      request_id: input.requestId,
      sentiment_filter: sentiment ?? null,
      count: reviews.length,
    });

    return reviews;
  }
}
