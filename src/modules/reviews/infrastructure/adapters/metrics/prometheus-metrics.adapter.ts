import { Injectable } from '@nestjs/common';
import {
  REVIEWS_METRIC_CREATED_TOTAL,
  REVIEWS_METRIC_LIST_REQUESTS_TOTAL,
  REVIEWS_METRIC_STORE_FAILURES_TOTAL,
  REVIEWS_METRIC_STORE_LATENCY_SECONDS,
  REVIEWS_STORE_LATENCY_BUCKETS,
} from '@/common/metrics/constants';
import type {
  MetricsPort,
  ReviewStoreOperation,
} from '@/modules/reviews/application/ports/metrics.port';
import type { Sentiment } from '@/modules/reviews/domain/sentiment';

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly created = new Map<string, number>();
  private readonly listRequests = new Map<string, number>();
  private readonly storeFailures = new Map<string, number>();

  // Per operation, one cumulative count per entry of REVIEWS_STORE_LATENCY_BUCKETS.
  private readonly latencyBuckets = new Map<string, number[]>();
  private readonly latencySum = new Map<string, number>();
  private readonly latencyCount = new Map<string, number>();

  incrementReviewCreated(sentiment: Sentiment): void {
    increment(this.created, sentiment);
  }

  incrementListRequest(input: { filtered: boolean }): void {
    increment(this.listRequests, input.filtered ? 'true' : 'false');
  }

  incrementStoreFailure(operation: ReviewStoreOperation): void {
    increment(this.storeFailures, operation);
  }

  observeStoreLatency(input: { operation: ReviewStoreOperation; seconds: number }): void {
    const operation = input.operation;
    const latency = Number.isFinite(input.seconds) && input.seconds >= 0 ? input.seconds : 0;

    this.latencySum.set(operation, (this.latencySum.get(operation) ?? 0) + latency);
    increment(this.latencyCount, operation);

    const counts =
      this.latencyBuckets.get(operation) ?? REVIEWS_STORE_LATENCY_BUCKETS.map(() => 0);
    REVIEWS_STORE_LATENCY_BUCKETS.forEach((bucket, index) => {
      if (latency <= bucket) {
        counts[index] = (counts[index] ?? 0) + 1;
      }
    });
    this.latencyBuckets.set(operation, counts);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${REVIEWS_METRIC_CREATED_TOTAL} Total reviews created by sentiment.`);
    lines.push(`# TYPE ${REVIEWS_METRIC_CREATED_TOTAL} counter`);
    for (const [sentiment, value] of this.created.entries()) {
      lines.push(`${REVIEWS_METRIC_CREATED_TOTAL}{sentiment="${sentiment}"} ${value}`);
    }

    lines.push(`# HELP ${REVIEWS_METRIC_LIST_REQUESTS_TOTAL} Total list requests.`);
    lines.push(`# TYPE ${REVIEWS_METRIC_LIST_REQUESTS_TOTAL} counter`);
    for (const [filtered, value] of this.listRequests.entries()) {
      lines.push(`${REVIEWS_METRIC_LIST_REQUESTS_TOTAL}{filtered="${filtered}"} ${value}`);
    }

    lines.push(`# HELP ${REVIEWS_METRIC_STORE_FAILURES_TOTAL} Total failed store operations.`);
    lines.push(`# TYPE ${REVIEWS_METRIC_STORE_FAILURES_TOTAL} counter`);
    for (const [operation, value] of this.storeFailures.entries()) {
      lines.push(`${REVIEWS_METRIC_STORE_FAILURES_TOTAL}{operation="${operation}"} ${value}`);
    }

    lines.push(`# HELP ${REVIEWS_METRIC_STORE_LATENCY_SECONDS} Store operation latency in seconds.`);
    lines.push(`# TYPE ${REVIEWS_METRIC_STORE_LATENCY_SECONDS} histogram`);
    for (const [operation, total] of this.latencyCount.entries()) {
      const counts = this.latencyBuckets.get(operation) ?? [];
      REVIEWS_STORE_LATENCY_BUCKETS.forEach((bucket, index) => {
        lines.push(
          `${REVIEWS_METRIC_STORE_LATENCY_SECONDS}_bucket{operation="${operation}",le="${bucket}"} ${counts[index] ?? 0}`,
        );
      });
      lines.push(
        `${REVIEWS_METRIC_STORE_LATENCY_SECONDS}_bucket{operation="${operation}",le="+Inf"} ${total}`,
      );
    }
    for (const [operation, value] of this.latencySum.entries()) {
      lines.push(`${REVIEWS_METRIC_STORE_LATENCY_SECONDS}_sum{operation="${operation}"} ${value}`);
    }
    for (const [operation, value] of this.latencyCount.entries()) {
      lines.push(`${REVIEWS_METRIC_STORE_LATENCY_SECONDS}_count{operation="${operation}"} ${value}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}
