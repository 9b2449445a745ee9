export const PG_POOL = Symbol('PG_POOL');
export const REVIEWS_REPOSITORY_PORT = Symbol('REVIEWS_REPOSITORY_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
