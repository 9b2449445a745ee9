import type { Review } from '../domain/review';
import type { Sentiment } from '../domain/sentiment';

export interface ReviewResponseDto {
  id: number;
  text: string;
  sentiment: Sentiment;
  created_at: string;
}

export function toReviewResponse(review: Review): ReviewResponseDto {
  return {
    id: review.id,
    text: review.text,
    sentiment: review.sentiment,
    created_at: review.createdAt,
  };
}
