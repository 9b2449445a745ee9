export type { Review, ReviewRow } from './types';
export { mapReviewRow, mapReviewRows } from './map';
