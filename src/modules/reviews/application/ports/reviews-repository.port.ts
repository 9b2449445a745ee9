import type { Review } from '../../domain/review';
import type { Sentiment } from '../../domain/sentiment';

export interface InsertReviewInput {
  text: string;
  sentiment: Sentiment;
  createdAt: Date;
}

export interface ListReviewsFilter {
  /** Literal match against the stored value; unknown values match nothing. */
  sentiment?: string;
}

export interface ReviewsRepositoryPort {
  ensureSchema(): Promise<void>;

  /** Inserts one row and returns it as read back from the store. */
  insertReview(input: InsertReviewInput): Promise<Review>;

  /** Most recent first. */
  listReviews(filter: ListReviewsFilter): Promise<Review[]>;
}
