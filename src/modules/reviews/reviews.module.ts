import { Module } from '@nestjs/common';
import { MetricsController } from './controllers/metrics.controller';
import { ReviewsController } from './controllers/reviews.controller';
import { METRICS_PORT, REVIEWS_REPOSITORY_PORT } from './application/ports/tokens';
import { CreateReviewUseCase } from './application/use-cases/create-review';
import { ListReviewsUseCase } from './application/use-cases/list-reviews';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics/prometheus-metrics.adapter';
import { pgPoolFactory, PgPoolProvider } from './infrastructure/repositories/pg-pool.provider';
import { PgReviewsRepository } from './infrastructure/repositories/pg-reviews.repository';

@Module({
  controllers: [ReviewsController, MetricsController],
  providers: [
    CreateReviewUseCase,
    ListReviewsUseCase,
    PrometheusMetricsAdapter,
    PgPoolProvider,
    pgPoolFactory,
    PgReviewsRepository,
    {
      provide: REVIEWS_REPOSITORY_PORT,
      useExisting: PgReviewsRepository,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
  ],
})
export class ReviewsModule {}
