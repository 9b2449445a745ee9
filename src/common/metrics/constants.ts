export const REVIEWS_METRIC_CREATED_TOTAL = 'reviews_created_total';
export const REVIEWS_METRIC_LIST_REQUESTS_TOTAL = 'reviews_list_requests_total';
export const REVIEWS_METRIC_STORE_FAILURES_TOTAL = 'reviews_store_failures_total';
export const REVIEWS_METRIC_STORE_LATENCY_SECONDS = 'reviews_store_latency_seconds';

export const REVIEWS_STORE_LATENCY_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5] as const;
